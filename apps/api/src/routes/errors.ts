import type { NextFunction, Request, Response } from "express";
import { ClaimwatchError, type ErrorCode } from "../services/errors";
import { logError } from "../services/logger";

const STATUS: Partial<Record<ErrorCode, number>> = {
  validation: 400,
  claim_not_found: 404,
  supersession_conflict: 409,
  refresh_in_progress: 409,
  provider_unavailable: 503
};

export function httpStatusOf(err: unknown): number {
  return err instanceof ClaimwatchError ? (STATUS[err.code] ?? 500) : 500;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const status = httpStatusOf(err);
  const message = err instanceof Error ? err.message : "Unknown error";
  const code = err instanceof ClaimwatchError ? err.code : "internal";
  if (status >= 500) logError("Request failed", { code, error: message });

  if (res.headersSent) return;
  res.status(status).json({ error: message, code });
}
