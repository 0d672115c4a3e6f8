import { createApp } from "./app.js";
import { env, resolvedEnvFilePath } from "./config/env.js";
import { isAiConfigured } from "./lib/openai.js";
import { logFilePath, logger } from "./observability/logger.js";
import { createProductionServices } from "./services/index.js";

const app = createApp(createProductionServices());

if (!isAiConfigured()) {
  logger.warn("ai_provider_not_configured", { hint: "Set OPENAI_API_KEY to enable generation" });
}

const server = app.listen(env.PORT, () => {
  logger.info("api_server_started", {
    port: env.PORT,
    envFilePath: resolvedEnvFilePath,
    logFilePath
  });
});

let shuttingDown = false;

const shutdown = async (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("shutdown_requested", { signal });

  server.close(async () => {
    logger.info("shutdown_completed");
    await logger.close();
    process.exit(0);
  });
};

server.on("error", (error) => {
  logger.error("api_server_error", { error });
});

process.on("unhandledRejection", (reason) => {
  logger.error("process_unhandled_rejection", { reason });
});

process.on("uncaughtException", (error) => {
  logger.error("process_uncaught_exception", { error });
  void shutdown("uncaughtException");
});

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
