import { useMemo, useState, type FormEvent } from "react";
import { useLocation, useNavigate } from "react-router-dom";
import { useAuthStore } from "../stores/auth-store";

type Mode = "login" | "register";

const copy: Record<Mode, { tab: string; title: string; submit: string; failure: string }> = {
  login: { tab: "Sign In", title: "Welcome back", submit: "Sign In", failure: "Login failed." },
  register: { tab: "Register", title: "Create your workshop", submit: "Create Account", failure: "Registration failed." }
};

const modes: readonly Mode[] = ["login", "register"];

const fieldClass =
  "w-full rounded-xl border border-white/20 bg-black/20 px-3 py-2 text-[var(--ink-100)] outline-none ring-[var(--brand-coral)]/60 focus:ring";

const readRedirect = (state: unknown) =>
  typeof state === "object" && state !== null && "from" in state && typeof state.from === "string"
    ? state.from
    : "/generator";

export const AuthPage = () => {
  const navigate = useNavigate();
  const location = useLocation();
  const login = useAuthStore((state) => state.login);
  const register = useAuthStore((state) => state.register);

  const [mode, setMode] = useState<Mode>("login");
  const [credentials, setCredentials] = useState({ email: "", password: "" });
  const [feedback, setFeedback] = useState<{ tone: "notice" | "error"; text: string } | null>(null);
  const [busy, setBusy] = useState(false);

  const redirectTo = useMemo(() => readRedirect(location.state), [location.state]);

  const switchMode = (next: Mode) => {
    setMode(next);
    setFeedback(null);
  };

  const onSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    setFeedback(null);
    setBusy(true);

    try {
      if (mode === "register") {
        const { needsConfirmation } = await register(credentials);
        if (needsConfirmation) {
          setMode("login");
          setFeedback({ tone: "notice", text: "Check your inbox to confirm your email, then sign in." });
          return;
        }
      } else {
        await login(credentials);
      }
      navigate(redirectTo, { replace: true });
    } catch (error) {
      setFeedback({ tone: "error", text: error instanceof Error ? error.message : copy[mode].failure });
    } finally {
      setBusy(false);
    }
  };

  return (
    <div className="grid min-h-screen place-items-center px-5 py-12">
      <div className="w-full max-w-md rounded-3xl border border-white/15 bg-[var(--ink-900)]/80 p-8 shadow-2xl">
        <h1 className="font-display text-3xl text-[var(--ink-100)]">{copy[mode].title}</h1>
        <p className="mt-2 text-sm text-[var(--ink-200)]">New accounts start with 10 gemstones.</p>

        <div role="tablist" className="mt-6 grid grid-cols-2 gap-2 rounded-full border border-white/20 p-1">
          {modes.map((option) => (
            <button
              key={option}
              type="button"
              role="tab"
              aria-selected={mode === option}
              className={`rounded-full px-3 py-2 text-sm font-semibold ${
                mode === option ? "bg-[var(--brand-sand)] text-[var(--ink-900)]" : "text-[var(--ink-100)]"
              }`}
              onClick={() => switchMode(option)}
            >
              {copy[option].tab}
            </button>
          ))}
        </div>

        <form className="mt-6 space-y-4" onSubmit={onSubmit}>
          <input
            type="email"
            required
            aria-label="Email"
            placeholder="you@example.com"
            autoComplete="email"
            value={credentials.email}
            onChange={(event) => setCredentials((current) => ({ ...current, email: event.target.value }))}
            className={fieldClass}
          />
          <input
            type="password"
            required
            minLength={6}
            aria-label="Password"
            placeholder={mode === "register" ? "At least 6 characters" : "Password"}
            autoComplete={mode === "register" ? "new-password" : "current-password"}
            value={credentials.password}
            onChange={(event) => setCredentials((current) => ({ ...current, password: event.target.value }))}
            className={fieldClass}
          />

          {feedback ? (
            <p className={`text-sm ${feedback.tone === "error" ? "text-[var(--brand-coral)]" : "text-[var(--brand-sand)]"}`}>
              {feedback.text}
            </p>
          ) : null}

          <button
            type="submit"
            disabled={busy}
            className="w-full rounded-full bg-[var(--brand-coral)] px-4 py-3 text-sm font-bold uppercase tracking-wide text-[var(--ink-900)] disabled:opacity-70"
          >
            {busy ? "Working..." : copy[mode].submit}
          </button>
        </form>
      </div>
    </div>
  );
};
