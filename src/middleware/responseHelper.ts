// src/middleware/responseHelper.ts
import { Response } from "express";

/**
 * Standardized API response format.
 * All endpoints use these helpers for consistent responses.
 */

export interface ApiResponse<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  meta?: Record<string, unknown>;
}

/**
 * Send a successful response.
 */
export function sendSuccess<T>(
  res: Response,
  data: T,
  statusCode: number = 200,
  meta?: Record<string, unknown>
): Response {
  const body: ApiResponse<T> = { ok: true, data };
  if (meta) {
    body.meta = meta;
  }
  return res.status(statusCode).json(body);
}

/**
 * Send an error response.
 */
export function sendError(
  res: Response,
  error: string,
  statusCode: number = 400,
  meta?: Record<string, unknown>
): Response {
  const response: ApiResponse = {
    ok: false,
    error,
  };

  if (meta) {
    response.meta = meta;
  }

  return res.status(statusCode).json(response);
}

/**
 * Send a validation error response.
 */
export function sendValidationError(res: Response, errors: string | string[]): Response {
  const details = Array.isArray(errors) ? errors : [errors];
  return sendError(res, details.join(", "), 400, { code: "VALIDATION_ERROR", type: "validation", details });
}

/**
 * Send a server error response.
 */
export function sendServerError(res: Response, message: string = "Internal server error"): Response {
  return sendError(res, message, 500, { code: "INTERNAL_ERROR" });
}
