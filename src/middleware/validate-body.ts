import type { Request, Response, NextFunction } from "express";
import type { z } from "zod";
import { validationError } from "../services/errorTranslator.js";

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Replaces req.body with the parsed value or fails with a validation error. */
export function validateBody<T>(schema: z.ZodType<T>) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const parsed = schema.safeParse(req.body);
    if (!parsed.success) {
      next(validationError(formatIssues(parsed.error)));
      return;
    }
    req.body = parsed.data;
    next();
  };
}
