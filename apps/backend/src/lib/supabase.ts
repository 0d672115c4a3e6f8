import { createClient } from "@supabase/supabase-js";
import { env } from "../config/env.js";

// Service-role client: row level security is bypassed, so every query scopes by user id itself.
export const supabase = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
  auth: {
    persistSession: false,
    autoRefreshToken: false
  }
});
