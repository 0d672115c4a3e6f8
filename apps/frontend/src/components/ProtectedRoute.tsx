import { Navigate, Outlet, useLocation } from "react-router-dom";
import { useAuthStore } from "../stores/auth-store";

type Gate = "pending" | "signedIn" | "signedOut";

export const ProtectedRoute = () => {
  const gate = useAuthStore((state): Gate => {
    if (!state.initialized || state.status === "idle" || state.status === "loading") return "pending";
    return state.status === "authenticated" ? "signedIn" : "signedOut";
  });
  const location = useLocation();

  if (gate === "pending") {
    return (
      <div className="grid min-h-[50vh] place-items-center text-[var(--ink-100)]">
        <p className="rounded-full border border-white/20 px-6 py-3">Opening your workshop...</p>
      </div>
    );
  }

  if (gate === "signedOut") {
    return <Navigate to="/auth" state={{ from: `${location.pathname}${location.search}` }} replace />;
  }

  return <Outlet />;
};
