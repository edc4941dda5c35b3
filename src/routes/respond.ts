import type { Response } from "express";
import type { ZodError } from "zod";
import { AppError } from "../errors.js";
import { logger } from "../logger.js";

export function sendError(res: Response, err: unknown, context: string) {
  if (err instanceof AppError) {
    if (err.httpStatus >= 500) {
      logger.error({ err }, context);
    } else {
      logger.debug({ err: err.message, code: err.code }, context);
    }
    res.status(err.httpStatus).json({ error: err.message, code: err.code });
    return;
  }

  logger.error({ err }, context);
  res.status(500).json({ error: "Internal Server Error", code: "INTERNAL" });
}

export function validationMessage(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid request body";
  const field = issue.path.join(".");
  return field ? `\`${field}\` ${issue.message.toLowerCase()}` : issue.message;
}
