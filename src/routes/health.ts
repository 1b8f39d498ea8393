import { Router } from "express";
import type { AppConfig } from "../config/index.js";
import type { HealthResponse } from "../types/index.js";

const startTime = Date.now();

export function createHealthRouter(config: AppConfig): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    const response: HealthResponse = {
      status: "ok",
      version: process.env.npm_package_version ?? "0.1.0",
      uptime: Math.floor((Date.now() - startTime) / 1000),
      backend: {
        baseUrl: config.backend.baseUrl,
        apiType: config.backend.apiType,
      },
    };
    res.json(response);
  });

  router.get("/", (_req, res) => {
    res.json({
      message: "Claude Messages API bridge to an OpenAI-compatible backend",
      endpoints: {
        messages: "/v1/messages",
        countTokens: "/v1/messages/count_tokens",
        health: "/health",
      },
      models: {
        haiku: config.models.smallModel,
        sonnet: config.models.middleModel,
        opus: config.models.bigModel,
        ...(config.models.defaultModel && { default: config.models.defaultModel }),
      },
    });
  });

  return router;
}
