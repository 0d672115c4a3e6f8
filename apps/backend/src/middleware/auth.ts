import type { NextFunction, Request, Response } from "express";
import { verifyAccessToken } from "../lib/jwt.js";
import { ApiError } from "../utils/errors.js";

const bearerToken = (req: Request) => {
  const header = req.get("authorization");
  if (!header) return null;
  const [scheme, token] = header.split(" ");
  if (scheme?.toLowerCase() !== "bearer" || !token) return null;
  return token.trim();
};

export const requireAuth = (req: Request, _res: Response, next: NextFunction) => {
  const token = bearerToken(req);
  if (!token) {
    return next(new ApiError(401, "Authentication required"));
  }

  try {
    const payload = verifyAccessToken(token);
    req.auth = {
      userId: payload.sub,
      email: payload.email ?? null
    };
    return next();
  } catch {
    return next(new ApiError(401, "Invalid or expired access token"));
  }
};

export const authenticatedUserId = (req: Request) => {
  if (!req.auth) {
    throw new ApiError(401, "Authentication required");
  }
  return req.auth.userId;
};
