import { Component, type ErrorInfo, type ReactNode } from "react";
import { logger } from "../lib/logger";

type Props = {
  children: ReactNode;
};

type State = {
  error: Error | null;
};

/** Last line of defence for render errors. Async failures are handled in the stores. */
export class ErrorBoundary extends Component<Props, State> {
  state: State = { error: null };

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    logger.error("ui_render_failed", {
      error,
      path: window.location.pathname,
      componentStack: info.componentStack ?? null
    });
  }

  private retry = () => {
    this.setState({ error: null });
  };

  render() {
    const { error } = this.state;
    if (!error) return this.props.children;

    return (
      <div role="alert" className="grid min-h-screen place-items-center p-8">
        <div className="max-w-md rounded-2xl border border-[var(--brand-coral)]/60 bg-[var(--ink-900)]/95 p-6 text-[var(--ink-100)]">
          <h1 className="font-display text-2xl text-[var(--brand-sand)]">This screen stopped working</h1>
          <p className="mt-3 text-sm text-[var(--ink-200)]">
            Your gemstones and saved assets are safe. Try the screen again or head back home.
          </p>
          <p className="mt-2 truncate font-mono text-xs text-[var(--ink-300)]">{error.message}</p>
          <div className="mt-6 flex gap-3">
            <button
              type="button"
              className="rounded-full bg-[var(--brand-sand)] px-4 py-2 text-sm font-semibold text-[var(--ink-900)]"
              onClick={this.retry}
            >
              Try again
            </button>
            <a href="/" className="rounded-full border border-white/30 px-4 py-2 text-sm font-semibold">
              Home
            </a>
          </div>
        </div>
      </div>
    );
  }
}
