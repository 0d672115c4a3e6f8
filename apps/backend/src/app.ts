import { randomUUID } from "crypto";
import cors from "cors";
import express from "express";
import helmet from "helmet";
import { env } from "./config/env.js";
import { errorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { apiRateLimit } from "./middleware/rate-limit.js";
import { logger } from "./observability/logger.js";
import { createApiRouter, type ApiServices } from "./routes/index.js";

export const createApp = (services: ApiServices) => {
  const app = express();
  app.set("etag", false);

  app.set("trust proxy", 1);
  app.use(
    helmet({
      crossOriginResourcePolicy: false
    })
  );
  const allowedOrigins = env.FRONTEND_ORIGIN.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin) return callback(null, true); // allow non-browser clients
        if (allowedOrigins.includes("*") || allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        return callback(new Error("Not allowed by CORS"));
      }
    })
  );
  app.use((_req, res, next) => {
    res.setHeader("Cache-Control", "no-store");
    next();
  });
  app.use((req, res, next) => {
    const requestId = randomUUID();
    const startNs = process.hrtime.bigint();
    res.setHeader("x-request-id", requestId);

    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - startNs) / 1_000_000;
      logger.http("http_request", {
        requestId,
        method: req.method,
        path: req.originalUrl,
        statusCode: res.statusCode,
        durationMs: Number(durationMs.toFixed(3)),
        userId: req.auth?.userId ?? null,
        userAgent: req.get("user-agent") ?? null
      });
    });

    next();
  });
  // Saved assets arrive as base64 image bodies.
  app.use(express.json({ limit: "16mb" }));
  app.use(apiRateLimit);

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok"
    });
  });

  app.use("/api", createApiRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
