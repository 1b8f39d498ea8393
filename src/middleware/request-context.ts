import type { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import type { RequestContext } from "../types/common.js";

export function requestContext(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const context: RequestContext = {
    requestId: req.get("x-request-id") || uuidv4(),
    startTime: Date.now(),
  };
  req.context = context;
  res.setHeader("X-Request-Id", context.requestId);
  next();
}
