import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { isProd } from "../config/env.js";
import { logger } from "../observability/logger.js";
import { ApiError, notFound } from "../utils/errors.js";

export const notFoundHandler = (_req: Request, _res: Response, next: NextFunction) => {
  next(notFound("Route"));
};

const requestContext = (req: Request, res: Response) => {
  const requestId = res.getHeader("x-request-id");
  return {
    requestId: typeof requestId === "string" ? requestId : null,
    method: req.method,
    path: req.originalUrl,
    userId: req.auth?.userId ?? null
  };
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  void _next;
  const context = requestContext(req, res);

  if (err instanceof ZodError) {
    logger.warn("request_validation_error", { ...context, issues: err.issues });
    return res.status(400).json({ message: "Validation failed", errors: err.flatten() });
  }

  if (err instanceof ApiError) {
    const payload = { ...context, statusCode: err.statusCode, message: err.message, details: err.details };
    if (err.isServerError) {
      logger.error("request_api_error", payload);
    } else {
      logger.warn("request_api_error", payload);
    }
    return res.status(err.statusCode).json({ message: err.message, details: err.details });
  }

  logger.error("request_unhandled_error", { ...context, error: err });

  // Internals stay out of production responses.
  const message = !isProd && err instanceof Error ? err.message : "Unexpected server error";
  return res.status(500).json({ message, requestId: context.requestId });
};
