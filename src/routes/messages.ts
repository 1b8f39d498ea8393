import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import type { AppConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import { validateBody } from "../middleware/validate-body.js";
import type { BackendClient } from "../services/backendClient.js";
import { RequestTimeoutError, toClaudeError } from "../services/errorTranslator.js";
import type { ErrorEnvelope } from "../services/errorTranslator.js";
import { MessagesPipeline } from "../services/pipeline.js";
import type { UsageSummary } from "../services/pipeline.js";
import { estimateInputTokens } from "../services/tokenCounter.js";
import { recordUsage } from "../services/usageRecorder.js";
import type { UsageRecorder } from "../services/usageRecorder.js";
import type {
  ClaudeMessagesRequest,
  ClaudeStreamEvent,
  ClaudeTokenCountRequest,
} from "../types/anthropic.js";
import { messagesRequestSchema, tokenCountRequestSchema } from "./schemas.js";

export interface MessagesRouterDeps {
  config: AppConfig;
  backend: BackendClient;
  usage: UsageRecorder;
}

function sendEnvelope(res: Response, envelope: ErrorEnvelope): void {
  // Nobody is listening for a cancelled request.
  if (res.destroyed) return;
  const { status, body } = toClaudeError(envelope);
  res.status(status).json(body);
}

function writeEvent(res: Response, event: ClaudeStreamEvent): void {
  if (res.destroyed) return;
  res.write(`event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
}

/**
 * Ties a backend call to the client connection: disconnecting before the response has
 * finished aborts it, and so does the request timeout.
 */
function abortScope(res: Response, timeoutMs: number) {
  const controller = new AbortController();
  const onClose = () => {
    if (!res.writableFinished) controller.abort();
  };
  res.on("close", onClose);

  const timer = setTimeout(() => controller.abort(new RequestTimeoutError(timeoutMs)), timeoutMs);

  return {
    signal: controller.signal,
    /** The backend has answered; the timeout no longer applies. */
    settle: () => clearTimeout(timer),
  };
}

export function createMessagesRouter(deps: MessagesRouterDeps): Router {
  const router = Router();
  const { config, backend, usage } = deps;

  const onUsage = (summary: UsageSummary) => {
    recordUsage(usage, {
      requestId: summary.requestId,
      stream: summary.stream,
      clientModel: summary.clientModel,
      backendModel: summary.backendModel,
      baseUrl: backend.baseUrl,
      apiType: backend.apiType,
      inputTokens: summary.usage.input_tokens,
      outputTokens: summary.usage.output_tokens,
      cacheReadInputTokens: summary.usage.cache_read_input_tokens ?? 0,
      latencyMs: summary.latencyMs,
      status: summary.status,
      error: summary.error?.message,
    });
  };

  // ── POST /v1/messages ─────────────────────────────────────────────────────

  router.post(
    "/",
    validateBody(messagesRequestSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      const request: ClaudeMessagesRequest = req.body;
      const { requestId } = req.context;
      const scope = abortScope(res, config.requestTimeoutMs);
      const pipeline = new MessagesPipeline({
        config: {
          models: config.models,
          defaultMaxTokens: config.defaultMaxTokens,
          maxTokensLimit: config.maxTokensLimit,
        },
        backend,
        onUsage,
      });

      logger.info({
        action: "messages_start",
        requestId,
        model: request.model,
        stream: !!request.stream,
        messageCount: request.messages.length,
        toolCount: request.tools?.length ?? 0,
      });

      try {
        if (!request.stream) {
          const result = await pipeline.complete(request, { requestId, signal: scope.signal });
          scope.settle();
          if (result.ok) {
            res.json(result.value);
          } else {
            sendEnvelope(res, result.error);
          }
          return;
        }

        const result = await pipeline.stream(request, { requestId, signal: scope.signal });
        scope.settle();
        if (!result.ok) {
          sendEnvelope(res, result.error);
          return;
        }

        res.status(200);
        res.setHeader("Content-Type", "text/event-stream");
        res.setHeader("Cache-Control", "no-cache");
        res.setHeader("Connection", "keep-alive");
        res.flushHeaders();

        for await (const event of result.value) {
          writeEvent(res, event);
        }
        res.end();
      } catch (err) {
        scope.settle();
        next(err);
      }
    },
  );

  // ── POST /v1/messages/count_tokens ────────────────────────────────────────

  router.post(
    "/count_tokens",
    validateBody(tokenCountRequestSchema),
    (req: Request, res: Response) => {
      const request: ClaudeTokenCountRequest = req.body;
      const inputTokens = estimateInputTokens(request);
      logger.debug({
        action: "tokens_counted",
        requestId: req.context.requestId,
        model: request.model,
        inputTokens,
      });
      res.json({ input_tokens: inputTokens });
    },
  );

  return router;
}
