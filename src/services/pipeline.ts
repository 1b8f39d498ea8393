import type { ModelMappingConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import type {
  ClaudeMessagesRequest,
  ClaudeMessagesResponse,
  ClaudeStreamEvent,
  ClaudeUsage,
} from "../types/anthropic.js";
import type { BackendChunk, BackendRequest, BackendStreamRequest } from "../types/openai.js";
import type { BackendClient } from "./backendClient.js";
import { translateBackendError } from "./errorTranslator.js";
import type { ErrorEnvelope, Result } from "./errorTranslator.js";
import { mapModel } from "./modelMapper.js";
import { convertRequest } from "./requestConverter.js";
import { convertResponse } from "./responseConverter.js";
import { StreamConverter, convertStream } from "./streamConverter.js";
import type { StreamOutcome } from "./streamConverter.js";
import type { UsageStatus } from "./usageRecorder.js";

export interface PipelineConfig {
  models: ModelMappingConfig;
  defaultMaxTokens: number;
  maxTokensLimit?: number;
}

export interface PipelineOptions {
  requestId: string;
  signal?: AbortSignal;
}

export interface UsageSummary {
  requestId: string;
  stream: boolean;
  clientModel: string;
  backendModel: string;
  usage: ClaudeUsage;
  latencyMs: number;
  status: UsageStatus;
  error?: ErrorEnvelope;
}

export interface PipelineDeps {
  config: PipelineConfig;
  backend: BackendClient;
  onUsage?: (summary: UsageSummary) => void;
}

const ZERO_USAGE: ClaudeUsage = { input_tokens: 0, output_tokens: 0 };

/**
 * One instance per inbound request: model mapping, request conversion, the backend call
 * and response conversion. Failures come back as `{ ok: false }`, never as a throw.
 */
export class MessagesPipeline {
  private readonly startedAt = Date.now();

  constructor(private readonly deps: PipelineDeps) {}

  private prepare(request: ClaudeMessagesRequest, options: PipelineOptions): BackendRequest {
    const mapping = mapModel(request.model, this.deps.config.models);
    if (request.top_k !== undefined) {
      logger.debug({ action: "param_dropped", requestId: options.requestId, param: "top_k" });
    }

    const body = convertRequest(request, {
      backendModel: mapping.backendModel,
      defaultMaxTokens: this.deps.config.defaultMaxTokens,
      maxTokensLimit: this.deps.config.maxTokensLimit,
    });

    logger.info({
      action: "model_mapped",
      requestId: options.requestId,
      requestedModel: request.model,
      backendModel: mapping.backendModel,
      tier: mapping.tier ?? "(none)",
      passthrough: mapping.passthrough,
    });
    return body;
  }

  private fail(envelope: ErrorEnvelope, options: PipelineOptions): { ok: false; error: ErrorEnvelope } {
    const meta = {
      requestId: options.requestId,
      kind: envelope.kind,
      status: envelope.status,
      error: envelope.message,
      hint: envelope.hint,
    };
    switch (envelope.kind) {
      case "cancelled":
        logger.info({ action: "request_cancelled", ...meta });
        break;
      case "validation-error":
        logger.warn({ action: "request_invalid", ...meta });
        break;
      case "decode-error":
        logger.warn({ action: "decode_error", message: "Backend response is not Chat Completions compatible", ...meta });
        break;
      default:
        logger.error({ action: "backend_error", ...meta });
    }
    return { ok: false, error: envelope };
  }

  private report(summary: Omit<UsageSummary, "latencyMs">): void {
    this.deps.onUsage?.({ ...summary, latencyMs: Date.now() - this.startedAt });
  }

  async complete(
    request: ClaudeMessagesRequest,
    options: PipelineOptions,
  ): Promise<Result<ClaudeMessagesResponse>> {
    let backendModel = request.model;
    try {
      const body = this.prepare(request, options);
      backendModel = body.model;
      const completion = await this.deps.backend.complete(body, options);
      const response = convertResponse(completion, request.model);

      logger.info({
        action: "messages_done",
        requestId: options.requestId,
        model: request.model,
        backendModel,
        stopReason: response.stop_reason,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      });
      this.report({
        requestId: options.requestId,
        stream: false,
        clientModel: request.model,
        backendModel,
        usage: response.usage,
        status: "success",
      });
      return { ok: true, value: response };
    } catch (err) {
      const envelope = translateBackendError(err, options.signal);
      if (envelope.kind !== "validation-error") {
        this.report({
          requestId: options.requestId,
          stream: false,
          clientModel: request.model,
          backendModel,
          usage: ZERO_USAGE,
          status: envelope.kind === "cancelled" ? "cancelled" : "error",
          error: envelope,
        });
      }
      return this.fail(envelope, options);
    }
  }

  /**
   * Resolves after the backend has accepted the request, so rejections (4xx, 5xx) are
   * reported as a result rather than inside the event sequence.
   */
  async stream(
    request: ClaudeMessagesRequest,
    options: PipelineOptions,
  ): Promise<Result<AsyncGenerator<ClaudeStreamEvent>>> {
    let backendModel = request.model;
    let fragments: AsyncGenerator<BackendChunk>;
    try {
      const prepared = this.prepare(request, options);
      backendModel = prepared.model;
      const body: BackendStreamRequest = {
        ...prepared,
        stream: true,
        stream_options: { include_usage: true },
      };
      fragments = await this.deps.backend.stream(body, options);
    } catch (err) {
      const envelope = translateBackendError(err, options.signal);
      if (envelope.kind !== "validation-error") {
        this.report({
          requestId: options.requestId,
          stream: true,
          clientModel: request.model,
          backendModel,
          usage: ZERO_USAGE,
          status: envelope.kind === "cancelled" ? "cancelled" : "error",
          error: envelope,
        });
      }
      return this.fail(envelope, options);
    }

    const converter = new StreamConverter({ clientModel: request.model });
    const onComplete = (outcome: StreamOutcome) => {
      if (outcome.status === "error") {
        this.fail(outcome.error, options);
      } else if (outcome.status === "cancelled") {
        logger.info({ action: "request_cancelled", requestId: options.requestId, stream: true });
      }
      logger.info({
        action: "stream_done",
        requestId: options.requestId,
        model: request.model,
        backendModel,
        status: outcome.status,
        stopReason: converter.stopReason,
        toolCalls: converter.toolCalls.length,
        inputTokens: converter.usage.input_tokens,
        outputTokens: converter.usage.output_tokens,
      });
      this.report({
        requestId: options.requestId,
        stream: true,
        clientModel: request.model,
        backendModel,
        usage: converter.usage,
        status: outcome.status,
        ...(outcome.status === "error" && { error: outcome.error }),
      });
    };

    return { ok: true, value: convertStream(fragments, converter, onComplete) };
  }
}
