import { useEffect } from "react";
import { BrowserRouter, Navigate, useRoutes, type RouteObject } from "react-router-dom";
import { AppShell } from "./components/AppShell";
import { ProtectedRoute } from "./components/ProtectedRoute";
import { AuthPage } from "./pages/AuthPage";
import { GeneratorPage } from "./pages/GeneratorPage";
import { LandingPage } from "./pages/LandingPage";
import { LibraryPage } from "./pages/LibraryPage";
import { useAuthStore } from "./stores/auth-store";

const routes: RouteObject[] = [
  { path: "/", element: <LandingPage /> },
  { path: "/auth", element: <AuthPage /> },
  {
    element: <ProtectedRoute />,
    children: [
      {
        element: <AppShell />,
        children: [
          { path: "/generator", element: <GeneratorPage /> },
          { path: "/library", element: <LibraryPage /> }
        ]
      }
    ]
  },
  { path: "*", element: <Navigate to="/" replace /> }
];

const AppRoutes = () => useRoutes(routes);

function App() {
  const boot = useAuthStore((state) => state.boot);

  useEffect(() => {
    void boot();
  }, [boot]);

  return (
    <BrowserRouter>
      <AppRoutes />
    </BrowserRouter>
  );
}

export default App;
