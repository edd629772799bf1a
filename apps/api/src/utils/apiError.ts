// src/utils/apiError.ts

import type { FastifyReply } from "fastify";

/**
 * Canonical API error codes.
 * MUST stay in sync with routes, services and the client.
 */
export type ApiErrorCode =
  | "INVALID_REQUEST_BODY"
  | "INVALID_REQUEST"
  | "INVALID_SESSION_ID"
  | "INVALID_FILENAME"
  | "INVALID_CHUNK"
  | "ACCESS_DENIED"
  | "FILE_NOT_FOUND"
  | "UPLOAD_NOT_FOUND"
  | "SESSION_EXISTS"
  | "UPLOAD_CAPACITY_REACHED"
  | "UPLOAD_FINALIZATION_IN_PROGRESS"
  | "UPLOAD_INCOMPLETE"
  | "CHUNK_INTEGRITY_FAILED"
  | "CHUNK_TOO_LARGE"
  | "CHUNK_OUT_OF_RANGE"
  | "DECODE_FAILED"
  | "UPLOAD_FAILED"
  | "INTERNAL_ERROR";

export interface ApiErrorResponse {
  error: {
    code: ApiErrorCode;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  };
}

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: ApiErrorCode,
  message: string,
  options?: {
    retryable?: boolean;
    details?: Record<string, unknown>;
  }
) {
  const safeStatus =
    Number.isInteger(statusCode) &&
    statusCode >= 400 &&
    statusCode <= 599
      ? statusCode
      : 500;

  const response: ApiErrorResponse = {
    error: {
      code,
      message,
      retryable: options?.retryable ?? false,
      ...(options?.details && { details: options.details }),
    },
  };

  return reply.code(safeStatus).send(response);
}

export function isApiErrorResponse(value: unknown): value is ApiErrorResponse {
  if (!value || typeof value !== "object" || !("error" in value)) return false;
  const error = value.error;
  return (
    !!error &&
    typeof error === "object" &&
    "code" in error &&
    typeof error.code === "string" &&
    "message" in error &&
    typeof error.message === "string"
  );
}
