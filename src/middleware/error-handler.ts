import type { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger.js";
import { PipelineError, toClaudeError } from "../services/errorTranslator.js";
import type { ClaudeErrorBody, ClaudeErrorType } from "../types/anthropic.js";

function sendError(res: Response, status: number, type: ClaudeErrorType, message: string): void {
  const body: ClaudeErrorBody = { type: "error", error: { type, message } };
  res.status(status).json(body);
}

/** body-parser attaches a `type` such as "entity.parse.failed" to the errors it raises. */
function bodyParserErrorType(err: Error): string | undefined {
  return "type" in err && typeof err.type === "string" ? err.type : undefined;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const requestId = req.context?.requestId ?? "unknown";

  if (res.headersSent) {
    logger.error({ action: "error_after_headers", requestId, error: err.message });
    res.end();
    return;
  }

  if (err instanceof PipelineError) {
    const { status, body } = toClaudeError(err.envelope);
    logger.warn({
      action: "request_error",
      requestId,
      kind: err.envelope.kind,
      statusCode: status,
      error: err.message,
    });
    res.status(status).json(body);
    return;
  }

  switch (bodyParserErrorType(err)) {
    case "entity.parse.failed":
      logger.warn({ action: "request_error", requestId, statusCode: 400, error: err.message });
      sendError(res, 400, "invalid_request_error", `Request body is not valid JSON: ${err.message}`);
      return;
    case "entity.too.large":
      logger.warn({ action: "request_error", requestId, statusCode: 413, error: err.message });
      sendError(res, 413, "request_too_large", "Request body exceeds the size limit");
      return;
  }

  logger.error({
    action: "unhandled_error",
    requestId,
    error: err.message,
    stack: err.stack,
  });
  sendError(res, 500, "api_error", "Internal server error");
}
