// src/routes/uploads.routes.ts

import type { FastifyInstance } from "fastify";
import type { MultipartFields } from "@fastify/multipart";
import crypto from "crypto";
import fs from "fs/promises";
import path from "path";

import type { TransferConfig } from "../config/transfer.config.js";
import {
  isComplete,
  missingChunks,
  type UploadSessionStore,
} from "../services/upload/upload.session.js";
import { verify } from "../transfer/chunk.codec.js";
import type {
  UploadCancelResponse,
  UploadChunkResponse,
  UploadFinalizeResponse,
  UploadInitResponse,
  UploadSessionSnapshot,
  UploadStatusResponse,
} from "../types/transfer.js";
import {
  IntegrityError,
  InternalError,
  NotFoundError,
  TransferError,
  ValidationError,
} from "../utils/errors.js";
import {
  asFields,
  optionalBoolean,
  optionalString,
  requireNonNegativeInt,
  requireString,
  type Fields,
} from "../utils/request.js";
import { assertSafeFilename, resolveSafePath } from "../utils/safePath.js";

export interface UploadsRoutesOptions {
  config: TransferConfig;
  store: UploadSessionStore;
}

function isUuid(value: unknown): value is string {
  return (
    typeof value === "string" &&
    /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i.test(
      value
    )
  );
}

function requireSessionId(fields: Fields): string {
  const sessionId = requireString(fields, "session_id");
  if (!isUuid(sessionId)) {
    throw new ValidationError("session_id must be a UUID", {
      code: "INVALID_SESSION_ID",
    });
  }
  return sessionId;
}

function sessionNotFound() {
  return new NotFoundError("Invalid session ID", { code: "UPLOAD_NOT_FOUND" });
}

function multipartField(fields: MultipartFields, name: string): string | undefined {
  const entry = fields[name];
  const field = Array.isArray(entry) ? entry[0] : entry;
  if (!field || field.type !== "field") return undefined;
  return typeof field.value === "string" ? field.value : undefined;
}

function toStatusResponse(session: UploadSessionSnapshot): UploadStatusResponse {
  const complete = isComplete(session);
  return {
    session_id: session.id,
    filename: session.filename,
    total_chunks: session.totalChunks,
    received_chunks: session.receivedChunks.length,
    is_complete: complete,
    missing_chunks: complete ? [] : missingChunks(session),
    compressed: session.compressed,
    buffered_bytes: session.bufferedBytes,
    status: session.status,
    created_at: session.createdAt,
    last_updated: session.lastUpdated,
  };
}

export default async function uploadRoutes(
  app: FastifyInstance,
  opts: UploadsRoutesOptions
) {
  const { config, store } = opts;

  app.post("/v1/uploads/init", async (req, reply) => {
    const log = req.log;
    const body = asFields(req.body);

    const filename = assertSafeFilename(requireString(body, "filename"));
    const chunks = requireNonNegativeInt(body, "total_chunks");
    if (chunks > config.maxTotalChunks) {
      throw new ValidationError(
        `total_chunks must not exceed ${config.maxTotalChunks}`
      );
    }
    const destination = optionalString(body, "path") ?? "";
    const compressed = optionalBoolean(body, "compressed", true);

    const destDir = resolveSafePath(config.rootDir, destination);
    resolveSafePath(config.rootDir, path.join(destination, filename));
    await fs.mkdir(destDir, { recursive: true });

    const session = store.create({
      id: crypto.randomUUID(),
      filename,
      totalChunks: chunks,
      compressed,
      destinationPath: destination,
    });

    log.info(
      { sessionId: session.id, filename, totalChunks: chunks, compressed },
      "Upload session initialized"
    );

    const response: UploadInitResponse = {
      session_id: session.id,
      status: "initialized",
      filename: session.filename,
      total_chunks: session.totalChunks,
      max_parallel_chunks: config.maxParallelChunks,
    };

    return reply.code(201).send(response);
  });

  app.post("/v1/uploads/chunk", async (req) => {
    if (!req.isMultipart()) {
      throw new ValidationError("Chunk upload must be multipart/form-data", {
        code: "INVALID_REQUEST_BODY",
      });
    }

    const part = await req.file();
    if (!part || part.fieldname !== "chunk_data") {
      throw new ValidationError("Missing chunk data", { code: "INVALID_CHUNK" });
    }

    // Fields must precede the file part to be visible here.
    const fields: Fields = {
      session_id: multipartField(part.fields, "session_id"),
      chunk_id: multipartField(part.fields, "chunk_id"),
      chunk_hash: multipartField(part.fields, "chunk_hash"),
    };

    const bytes = await part.toBuffer();
    if (part.file.truncated) {
      throw new TransferError(
        `Chunk exceeds ${config.maxChunkBytes} bytes`,
        413,
        "CHUNK_TOO_LARGE"
      );
    }

    const sessionId = requireSessionId(fields);
    const chunkId = requireNonNegativeInt(fields, "chunk_id");
    const chunkHash = requireString(fields, "chunk_hash");

    if (!store.get(sessionId)) {
      throw sessionNotFound();
    }

    if (!verify(bytes, chunkHash)) {
      req.log.warn({ sessionId, chunkId }, "Chunk integrity verification failed");
      throw new IntegrityError("Chunk integrity verification failed", {
        details: { chunk_id: chunkId },
      });
    }

    // The session may have expired or been cancelled since the lookup above.
    if (!store.addChunk(sessionId, chunkId, bytes)) {
      throw sessionNotFound();
    }

    const session = store.get(sessionId);
    if (!session) {
      throw sessionNotFound();
    }

    const complete = isComplete(session);
    const response: UploadChunkResponse = {
      status: "chunk_received",
      chunk_id: chunkId,
      received_chunks: session.receivedChunks.length,
      total_chunks: session.totalChunks,
      is_complete: complete,
      missing_chunks: complete ? [] : missingChunks(session),
    };

    return response;
  });

  app.post("/v1/uploads/finalize", async (req) => {
    const log = req.log;
    const body = asFields(req.body);
    const sessionId = requireSessionId(body);

    const session = store.get(sessionId);
    if (!session) {
      log.warn({ sessionId }, "Upload finalize failed: invalid session");
      throw sessionNotFound();
    }

    const destination = optionalString(body, "path") ?? session.destinationPath;
    const destDir = resolveSafePath(config.rootDir, destination);
    const outPath = resolveSafePath(config.rootDir, path.join(destination, session.filename));

    try {
      await fs.mkdir(destDir, { recursive: true });
    } catch (err) {
      store.remove(sessionId);
      throw new InternalError("Could not create destination directory", {
        code: "UPLOAD_FAILED",
        cause: err,
      });
    }

    const fileSize = await store.finalize(sessionId, outPath);

    log.info(
      { sessionId, filename: session.filename, sizeBytes: fileSize },
      "Upload completed"
    );

    const response: UploadFinalizeResponse = {
      status: "completed",
      filename: session.filename,
      file_size: fileSize,
      path: path.relative(config.rootDir, outPath).split(path.sep).join("/"),
    };

    return response;
  });

  app.get("/v1/uploads/status", async (req) => {
    const query = asFields(req.query, "Query");
    const sessionId = requireSessionId(query);

    const session = store.get(sessionId);
    if (!session) {
      throw new NotFoundError("Session not found", { code: "UPLOAD_NOT_FOUND" });
    }

    return toStatusResponse(session);
  });

  // Idempotent: cancelling an unknown or already removed session succeeds.
  // Requests already in flight for the session are not interrupted.
  app.post("/v1/uploads/cancel", async (req) => {
    const body = asFields(req.body);
    const sessionId = requireSessionId(body);

    if (store.remove(sessionId)) {
      req.log.info({ sessionId }, "Upload canceled");
    }

    const response: UploadCancelResponse = {
      status: "cancelled",
      session_id: sessionId,
    };

    return response;
  });
}
