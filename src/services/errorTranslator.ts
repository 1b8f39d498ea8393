import OpenAI from "openai";
import type { ClaudeErrorBody, ClaudeErrorType } from "../types/anthropic.js";

// ── Types ───────────────────────────────────────────────────────────────────

export type ErrorKind =
  | "validation-error"
  | "client-error"
  | "upstream-error"
  | "decode-error"
  | "cancelled";

export interface ErrorEnvelope {
  readonly kind: ErrorKind;
  readonly message: string;
  /** HTTP status reported by the backend, when there was one. */
  readonly status?: number;
  readonly timedOut?: boolean;
  /** Operator guidance for common misconfigurations. Logged, never shown in place of `message`. */
  readonly hint?: string;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ErrorEnvelope };

export function createEnvelope(
  kind: ErrorKind,
  message: string,
  extra: Omit<ErrorEnvelope, "kind" | "message"> = {},
): ErrorEnvelope {
  return Object.freeze({ kind, message, ...extra });
}

/** Carries an ErrorEnvelope across async boundaries inside the pipeline. */
export class PipelineError extends Error {
  constructor(public readonly envelope: ErrorEnvelope) {
    super(envelope.message);
    this.name = "PipelineError";
  }
}

export function validationError(message: string): PipelineError {
  return new PipelineError(createEnvelope("validation-error", message));
}

export function decodeError(message: string): PipelineError {
  return new PipelineError(createEnvelope("decode-error", message));
}

/** Abort reason used by the HTTP layer when its request timeout fires. */
export class RequestTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Backend request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

// ── Backend failures → envelope ────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Finds the human-readable message in an error body: OpenAI's `{ error: { message } }`,
 * vLLM's top-level `message`, FastAPI's `detail`, or a bare `{ error: "..." }`.
 */
export function backendErrorMessage(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  if (typeof body.message === "string" && body.message) return body.message;
  if (isRecord(body.error) && typeof body.error.message === "string" && body.error.message) {
    return body.error.message;
  }
  if (typeof body.error === "string" && body.error) return body.error;
  if (typeof body.detail === "string" && body.detail) return body.detail;
  return undefined;
}

export function describeBackendError(message: string): string | undefined {
  const text = message.toLowerCase();

  if (
    text.includes("unsupported_country_region_territory") ||
    text.includes("country, region, or territory not supported")
  ) {
    return "The backend is not available in this region. Consider Azure OpenAI or another compatible endpoint.";
  }
  if (text.includes("invalid_api_key") || text.includes("unauthorized") || text.includes("incorrect api key")) {
    return "Check the OPENAI_API_KEY configuration.";
  }
  if (text.includes("rate_limit") || text.includes("rate limit") || text.includes("quota")) {
    return "Rate limit or quota exceeded. Wait and retry, or raise the account limits.";
  }
  if (text.includes("model") && (text.includes("not found") || text.includes("does not exist"))) {
    return "Check the BIG_MODEL, MIDDLE_MODEL and SMALL_MODEL configuration.";
  }
  if (text.includes("billing") || text.includes("payment")) {
    return "Check the backend account's billing status.";
  }
  return undefined;
}

function abortEnvelope(reason: unknown): ErrorEnvelope {
  if (reason instanceof RequestTimeoutError) {
    return createEnvelope("upstream-error", reason.message, { timedOut: true });
  }
  return createEnvelope("cancelled", "Request cancelled by client");
}

export function translateBackendError(err: unknown, signal?: AbortSignal): ErrorEnvelope {
  if (err instanceof PipelineError) return err.envelope;

  if (signal?.aborted) return abortEnvelope(signal.reason);

  if (err instanceof OpenAI.APIUserAbortError) {
    return createEnvelope("cancelled", "Request cancelled by client");
  }

  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return createEnvelope("upstream-error", "Backend request timed out", { timedOut: true });
  }

  if (err instanceof OpenAI.APIError) {
    const message = backendErrorMessage(err.error) ?? err.message;
    const hint = describeBackendError(message);
    const status = err.status;

    if (status === undefined) {
      return createEnvelope("upstream-error", message, { hint });
    }
    if (status >= 400 && status < 500) {
      return createEnvelope("client-error", message, { status, hint });
    }
    return createEnvelope("upstream-error", message, { status, hint });
  }

  if (err instanceof SyntaxError) {
    return createEnvelope("decode-error", `Malformed backend payload: ${err.message}`);
  }

  if (err instanceof Error) {
    return createEnvelope("upstream-error", err.message);
  }

  return createEnvelope("upstream-error", String(err));
}

// ── Envelope → Claude error payload ────────────────────────────────────────

function clientErrorType(status: number): ClaudeErrorType {
  switch (status) {
    case 401:
      return "authentication_error";
    case 403:
      return "permission_error";
    case 404:
      return "not_found_error";
    case 413:
      return "request_too_large";
    case 429:
      return "rate_limit_error";
    default:
      return "invalid_request_error";
  }
}

export function toClaudeError(envelope: ErrorEnvelope): { status: number; body: ClaudeErrorBody } {
  const build = (status: number, type: ClaudeErrorType) => ({
    status,
    body: { type: "error" as const, error: { type, message: envelope.message } },
  });

  switch (envelope.kind) {
    case "validation-error":
      return build(400, "invalid_request_error");
    case "client-error": {
      const status = envelope.status ?? 400;
      return build(status >= 400 && status < 500 ? status : 400, clientErrorType(status));
    }
    case "upstream-error":
      if (envelope.timedOut) return build(504, "api_error");
      if (envelope.status === 503 || envelope.status === 529) return build(529, "overloaded_error");
      return build(502, "api_error");
    case "decode-error":
      return build(502, "api_error");
    case "cancelled":
      return build(499, "api_error");
    default: {
      const unreachable: never = envelope.kind;
      throw new Error(`Unhandled error kind: ${String(unreachable)}`);
    }
  }
}
