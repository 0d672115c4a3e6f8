import { useEffect } from "react";
import { NavLink, Outlet, useNavigate } from "react-router-dom";
import { logger } from "../lib/logger";
import { useAuthStore } from "../stores/auth-store";
import { useGemstoneStore } from "../stores/gemstone-store";

const sections = [
  { to: "/generator", label: "Generator" },
  { to: "/library", label: "Library" }
] as const;

const tabClass = ({ isActive }: { isActive: boolean }) =>
  `rounded-full px-4 py-2 text-sm font-semibold ${
    isActive ? "bg-[var(--brand-sand)] text-[var(--ink-900)]" : "text-[var(--ink-200)] hover:bg-white/10"
  }`;

const GemstoneBadge = () => {
  const balance = useGemstoneStore((state) => state.balance);
  const source = useGemstoneStore((state) => state.source);
  const refresh = useGemstoneStore((state) => state.refresh);

  useEffect(() => {
    void refresh();
  }, [refresh]);

  return (
    <p
      className="rounded-full border border-[var(--brand-sand)]/50 px-3 py-1 text-xs font-semibold text-[var(--brand-sand)]"
      title={source === "local" ? "Offline balance, including today's free gemstones" : "Gemstone balance"}
    >
      💎 {balance ?? "–"}
      {source === "local" ? <span className="ml-1 text-[var(--ink-300)]">offline</span> : null}
    </p>
  );
};

export const AppShell = () => {
  const email = useAuthStore((state) => state.user?.email ?? null);
  const logout = useAuthStore((state) => state.logout);
  const navigate = useNavigate();

  const signOut = () => {
    void logout()
      .catch((error: unknown) => {
        logger.error("logout_failed", { error });
      })
      .finally(() => {
        navigate("/auth");
      });
  };

  return (
    <div className="flex min-h-screen flex-col">
      <header className="sticky top-0 z-20 border-b border-white/10 bg-[var(--ink-900)]/90">
        <div className="mx-auto flex w-full max-w-6xl flex-wrap items-center gap-4 px-4 py-3 sm:px-6">
          <NavLink to="/" className="font-display text-lg tracking-wider text-[var(--brand-sand)]">
            ASSETCRAFT
          </NavLink>

          <nav aria-label="Workshop" className="flex flex-1 items-center gap-1">
            {sections.map((section) => (
              <NavLink key={section.to} to={section.to} className={tabClass}>
                {section.label}
              </NavLink>
            ))}
          </nav>

          <GemstoneBadge />
          {email ? <span className="hidden text-xs text-[var(--ink-200)] md:inline">{email}</span> : null}
          <button
            type="button"
            className="rounded-full border border-[var(--brand-coral)] px-4 py-1.5 text-sm font-semibold text-[var(--brand-coral)]"
            onClick={signOut}
          >
            Sign out
          </button>
        </div>
      </header>

      <main className="mx-auto w-full max-w-6xl flex-1 px-4 py-8 sm:px-6">
        <Outlet />
      </main>
    </div>
  );
};
