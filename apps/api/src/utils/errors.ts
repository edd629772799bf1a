// src/utils/errors.ts

import type { ApiErrorCode } from "./apiError.js";

export interface TransferErrorOptions {
  code?: ApiErrorCode;
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for every failure the transfer core reports. Carries the HTTP
 * status and canonical code the error handler sends back to clients.
 */
export class TransferError extends Error {
  readonly statusCode: number;
  readonly code: ApiErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: ApiErrorCode,
    options: TransferErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = options.code ?? code;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }
}

export class ValidationError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 400, "INVALID_REQUEST", options);
  }
}

export class AccessDeniedError extends TransferError {
  constructor(message = "Access denied: path outside of root directory", options?: TransferErrorOptions) {
    super(message, 403, "ACCESS_DENIED", options);
  }
}

export class NotFoundError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 404, "FILE_NOT_FOUND", options);
  }
}

export class ConflictError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 409, "SESSION_EXISTS", options);
  }
}

export class CapacityError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 429, "UPLOAD_CAPACITY_REACHED", { retryable: true, ...options });
  }
}

export class IntegrityError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 400, "CHUNK_INTEGRITY_FAILED", { retryable: true, ...options });
  }
}

export class IncompleteUploadError extends TransferError {
  readonly missingChunks: number[];

  constructor(missingChunks: number[], totalChunks: number) {
    super(
      `Upload incomplete: missing ${missingChunks.length}/${totalChunks} chunks`,
      400,
      "UPLOAD_INCOMPLETE",
      { retryable: true, details: { missing_chunks: missingChunks } }
    );
    this.missingChunks = missingChunks;
  }
}

export class OutOfRangeError extends TransferError {
  constructor(chunkId: number, totalChunks: number) {
    super(
      `Chunk ${chunkId} is out of range (total chunks: ${totalChunks})`,
      416,
      "CHUNK_OUT_OF_RANGE"
    );
  }
}

export class DecodeError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 422, "DECODE_FAILED", options);
  }
}

export class InternalError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 500, "INTERNAL_ERROR", options);
  }
}

// Client-side failures.

export class NetworkError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super(message, 503, "INTERNAL_ERROR", { retryable: true, ...options });
  }
}

/**
 * The server answered, but not with what the client asked for: a non-2xx
 * status or a body that does not match the wire format.
 */
export class ProtocolError extends TransferError {
  constructor(
    message: string,
    statusCode: number,
    options?: TransferErrorOptions
  ) {
    super(message, statusCode, "INTERNAL_ERROR", options);
  }
}

/**
 * A single chunk task failed, which fails the whole transfer. `sessionId`
 * is set for uploads so the caller can cancel the server-side session.
 */
export class ChunkTransferError extends TransferError {
  readonly chunkId: number;
  readonly sessionId?: string;

  constructor(chunkId: number, cause: unknown, sessionId?: string) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const base = cause instanceof TransferError ? cause : null;
    super(
      `Chunk ${chunkId} failed: ${reason}`,
      base?.statusCode ?? 500,
      base?.code ?? "UPLOAD_FAILED",
      { cause, retryable: false, details: { chunk_id: chunkId, session_id: sessionId } }
    );
    this.chunkId = chunkId;
    this.sessionId = sessionId;
  }
}
