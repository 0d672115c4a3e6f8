import { Link } from "react-router-dom";
import { ASSET_CATALOG } from "../constants/assetCatalog";
import { useAuthStore } from "../stores/auth-store";

const steps = ["Pick a type", "Choose a style", "Set colors", "Describe it", "Spend a gemstone"];

export const LandingPage = () => {
  const signedIn = useAuthStore((state) => state.status === "authenticated");

  return (
    <div className="relative overflow-hidden">
      <div className="pointer-events-none absolute -left-24 top-10 h-80 w-80 rounded-full bg-[var(--brand-coral)]/25 blur-3xl" />

      <section className="mx-auto flex max-w-5xl flex-col px-6 pb-12 pt-24">
        <p className="w-fit rounded-full border border-[var(--brand-sand)]/50 px-4 py-1 text-xs font-semibold uppercase tracking-[0.2em] text-[var(--brand-sand)]">
          AssetCraft AI
        </p>
        <h1 className="mt-5 max-w-3xl font-display text-5xl leading-tight text-[var(--ink-100)] sm:text-6xl">
          Game and brand art from a handful of choices.
        </h1>
        <ol className="mt-6 flex flex-wrap gap-2 text-xs text-[var(--ink-200)]">
          {steps.map((step, index) => (
            <li key={step} className="rounded-full bg-white/5 px-3 py-1">
              {index + 1}. {step}
            </li>
          ))}
        </ol>

        <div className="mt-10 flex flex-wrap gap-4">
          <Link
            to={signedIn ? "/generator" : "/auth"}
            className="rounded-full bg-[var(--brand-sand)] px-7 py-3 text-sm font-bold uppercase tracking-wide text-[var(--ink-900)]"
          >
            {signedIn ? "Open the generator" : "Sign in to start"}
          </Link>
          {signedIn ? (
            <Link to="/library" className="rounded-full border border-white/30 px-7 py-3 text-sm font-bold uppercase text-[var(--ink-100)]">
              My library
            </Link>
          ) : null}
        </div>
      </section>

      <section className="mx-auto grid max-w-5xl gap-3 px-6 pb-24 sm:grid-cols-2 lg:grid-cols-4">
        {ASSET_CATALOG.map((descriptor) => (
          <article key={descriptor.key} className="rounded-2xl border border-white/10 bg-[var(--ink-900)]/60 p-4">
            <h2 className="font-display text-lg text-[var(--ink-100)]">{descriptor.label}</h2>
            <p className="mt-1 text-sm text-[var(--ink-300)]">{descriptor.description}</p>
            <p className="mt-3 text-xs text-[var(--ink-200)]">
              {descriptor.subtypes.map((subtype) => subtype.label).join(" · ")}
            </p>
          </article>
        ))}
      </section>
    </div>
  );
};
