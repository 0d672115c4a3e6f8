import type { Session } from "@supabase/supabase-js";
import { create } from "zustand";
import { persist } from "zustand/middleware";
import { configureHttpAuthHandlers } from "../api/http";
import { getSupabase } from "../lib/supabase";
import { logger } from "../lib/logger";
import type { User } from "../types/models";

type AuthStatus = "idle" | "loading" | "authenticated" | "anonymous";

type AuthState = {
  user: User | null;
  accessToken: string | null;
  status: AuthStatus;
  initialized: boolean;
  boot: () => Promise<void>;
  login: (payload: { email: string; password: string }) => Promise<void>;
  register: (payload: { email: string; password: string }) => Promise<{ needsConfirmation: boolean }>;
  logout: () => Promise<void>;
  forceAnonymous: () => void;
  refreshSession: () => Promise<string | null>;
};

const fromSession = (session: Session | null) =>
  session
    ? {
        user: { id: session.user.id, email: session.user.email ?? null },
        accessToken: session.access_token,
        status: "authenticated" as const
      }
    : { user: null, accessToken: null, status: "anonymous" as const };

let unsubscribe: (() => void) | null = null;

export const useAuthStore = create<AuthState>()(
  persist(
    (set, get) => ({
      user: null,
      accessToken: null,
      status: "idle",
      initialized: false,
      boot: async () => {
        if (get().initialized) return;

        set({ status: "loading" });
        try {
          const supabase = getSupabase();
          const { data, error } = await supabase.auth.getSession();
          if (error) throw error;
          set({ ...fromSession(data.session), initialized: true });

          if (!unsubscribe) {
            const { data: listener } = supabase.auth.onAuthStateChange((_event, session) => {
              set(fromSession(session));
            });
            unsubscribe = () => listener.subscription.unsubscribe();
          }
        } catch (error) {
          logger.error("auth_boot_failed", { error });
          set({ user: null, accessToken: null, status: "anonymous", initialized: true });
        }
      },
      login: async ({ email, password }) => {
        const { data, error } = await getSupabase().auth.signInWithPassword({ email, password });
        if (error) throw new Error(error.message);
        set({ ...fromSession(data.session), initialized: true });
      },
      register: async ({ email, password }) => {
        const { data, error } = await getSupabase().auth.signUp({ email, password });
        if (error) throw new Error(error.message);
        set({ ...fromSession(data.session), initialized: true });
        return { needsConfirmation: data.session === null };
      },
      logout: async () => {
        try {
          const { error } = await getSupabase().auth.signOut();
          if (error) logger.warn("auth_sign_out_failed", { message: error.message });
        } finally {
          set({ user: null, accessToken: null, status: "anonymous" });
        }
      },
      forceAnonymous: () => {
        set({ user: null, accessToken: null, status: "anonymous" });
      },
      refreshSession: async () => {
        const { data, error } = await getSupabase().auth.refreshSession();
        if (error || !data.session) {
          logger.warn("auth_refresh_failed", { message: error?.message ?? "no session" });
          return null;
        }
        set(fromSession(data.session));
        return data.session.access_token;
      }
    }),
    {
      name: "assetcraft-auth",
      partialize: (state) => ({
        user: state.user
      })
    }
  )
);

configureHttpAuthHandlers({
  getAccessToken: () => useAuthStore.getState().accessToken,
  refreshAccessToken: () => useAuthStore.getState().refreshSession(),
  onUnauthorized: () => {
    useAuthStore.getState().forceAnonymous();
  }
});
