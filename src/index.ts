import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createApp } from "./app.js";
import { OpenAIBackendClient } from "./services/backendClient.js";
import { createUsageRecorder } from "./services/usageRecorder.js";

const backend = new OpenAIBackendClient(config.backend);
const usage = createUsageRecorder(config.databaseUrl);
const app = createApp({ config, backend, usage });

// ── Start server ────────────────────────────────────────────────────────────
const server = app.listen(config.port, config.host, () => {
  logger.info({
    action: "server_start",
    host: config.host,
    port: config.port,
    env: config.env,
    baseUrl: config.backend.baseUrl,
    apiType: config.backend.apiType,
    models: config.models,
    usageLedger: config.databaseUrl ? "postgres" : "disabled",
    message: `Messages bridge listening on ${config.host}:${config.port}`,
  });
});

// ── Graceful shutdown ───────────────────────────────────────────────────────
function shutdown(signal: string): void {
  logger.info({ action: "shutdown_start", signal });

  server.close(() => {
    usage
      .close()
      .then(() => {
        logger.info({ action: "shutdown_complete", signal });
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({
          action: "shutdown_failed",
          signal,
          error: err instanceof Error ? err.message : String(err),
        });
        process.exit(1);
      });
  });

  // Force exit after 10s if connections won't drain
  setTimeout(() => {
    logger.error({ action: "shutdown_forced", signal });
    process.exit(1);
  }, 10_000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
