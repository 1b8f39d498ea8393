import express from "express";
import cors from "cors";
import helmet from "helmet";
import type { AppConfig } from "./config/index.js";
import { requestContext } from "./middleware/request-context.js";
import { requestLogger } from "./middleware/request-logger.js";
import { errorHandler } from "./middleware/error-handler.js";
import { createHealthRouter } from "./routes/health.js";
import { createMessagesRouter } from "./routes/messages.js";
import type { BackendClient } from "./services/backendClient.js";
import type { UsageRecorder } from "./services/usageRecorder.js";

export interface AppDeps {
  config: AppConfig;
  backend: BackendClient;
  usage: UsageRecorder;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // ── Global middleware ─────────────────────────────────────────────────────
  app.use(helmet());
  app.use(
    cors({
      origin: deps.config.corsOrigin,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: [
        "Content-Type", "Authorization", "X-Request-Id",
        "X-Api-Key", "Anthropic-Version", "Anthropic-Beta",
      ],
      exposedHeaders: ["X-Request-Id"],
    }),
  );
  app.use(requestContext);
  // Base64 images make bodies large.
  app.use(express.json({ limit: "20mb" }));
  app.use(requestLogger);

  // ── Routes ────────────────────────────────────────────────────────────────
  app.use("/", createHealthRouter(deps.config));
  app.use("/v1/messages", createMessagesRouter(deps));

  // ── Error handler (must be last) ──────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
