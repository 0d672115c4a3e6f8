import jwt from "jsonwebtoken";
import { z } from "zod";
import { env } from "../config/env.js";
import type { AccessTokenPayload } from "../types/auth.js";

const accessTokenSchema = z.object({
  sub: z.string().min(1),
  email: z.string().optional(),
  role: z.string().default("authenticated")
});

// Supabase Auth signs session tokens with the project's HS256 secret.
export const verifyAccessToken = (token: string): AccessTokenPayload => {
  const decoded = jwt.verify(token, env.SUPABASE_JWT_SECRET, {
    algorithms: ["HS256"],
    audience: "authenticated"
  });
  return accessTokenSchema.parse(decoded);
};

export const signAccessToken = (payload: { sub: string; email?: string }, expiresInSeconds = 3600) =>
  jwt.sign({ ...payload, role: "authenticated" }, env.SUPABASE_JWT_SECRET, {
    algorithm: "HS256",
    audience: "authenticated",
    expiresIn: expiresInSeconds
  });
