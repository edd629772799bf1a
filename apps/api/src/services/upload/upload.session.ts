// src/services/upload/upload.session.ts

import type { FastifyBaseLogger } from "fastify";

import type { UploadSessionSnapshot, UploadStatus } from "../../types/transfer.js";
import {
  CapacityError,
  ConflictError,
  IncompleteUploadError,
  InternalError,
  NotFoundError,
  ValidationError,
} from "../../utils/errors.js";
import { assembleChunksToFile } from "../../transfer/chunk.assembler.js";

interface InternalSession {
  id: string;
  filename: string;
  destinationPath: string;
  totalChunks: number;
  chunks: Map<number, Uint8Array>;
  compressed: boolean;
  status: UploadStatus;
  createdAt: number;
  lastUpdated: number;
}

export interface UploadSessionStoreOptions {
  sessionTtlMs: number;
  maxActiveUploads?: number;
  now?: () => number;
  log?: FastifyBaseLogger;
}

export function isComplete(session: UploadSessionSnapshot): boolean {
  return session.receivedChunks.length === session.totalChunks;
}

export function missingChunks(session: UploadSessionSnapshot): number[] {
  const received = new Set(session.receivedChunks);
  const missing: number[] = [];
  for (let i = 0; i < session.totalChunks; i++) {
    if (!received.has(i)) missing.push(i);
  }
  return missing;
}

function snapshot(session: InternalSession): UploadSessionSnapshot {
  let bufferedBytes = 0;
  for (const bytes of session.chunks.values()) {
    bufferedBytes += bytes.length;
  }

  return {
    id: session.id,
    filename: session.filename,
    destinationPath: session.destinationPath,
    totalChunks: session.totalChunks,
    receivedChunks: [...session.chunks.keys()].sort((a, b) => a - b),
    bufferedBytes,
    compressed: session.compressed,
    status: session.status,
    createdAt: session.createdAt,
    lastUpdated: session.lastUpdated,
  };
}

/**
 * In-memory registry of in-progress chunked uploads.
 *
 * Every accessor that touches the session table runs to completion without
 * yielding, so handlers never see a half-created or half-swept session.
 * `finalize` is the only async operation; it flips the session to
 * `finalizing` before its first await, which keeps chunk writes, the sweeper
 * and a second finalize away from it until it is removed.
 *
 * Chunk bytes are buffered without a cap. Callers only ever receive
 * snapshots, never the live record.
 */
export class UploadSessionStore {
  private readonly sessions = new Map<string, InternalSession>();
  private readonly sessionTtlMs: number;
  private readonly maxActiveUploads: number;
  private readonly now: () => number;
  private readonly log?: FastifyBaseLogger;

  constructor(options: UploadSessionStoreOptions) {
    if (!Number.isFinite(options.sessionTtlMs) || options.sessionTtlMs <= 0) {
      throw new Error("sessionTtlMs must be a positive number");
    }

    this.sessionTtlMs = options.sessionTtlMs;
    this.maxActiveUploads = options.maxActiveUploads ?? Number.POSITIVE_INFINITY;
    this.now = options.now ?? (() => Date.now());
    this.log = options.log;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(input: {
    id: string;
    filename: string;
    totalChunks: number;
    compressed: boolean;
    destinationPath?: string;
  }): UploadSessionSnapshot {
    const { id, filename, totalChunks, compressed } = input;

    if (!id) throw new ValidationError("Session id is required");
    if (!Number.isInteger(totalChunks) || totalChunks < 0) {
      throw new ValidationError("total_chunks must be a non-negative integer");
    }

    if (this.sessions.has(id)) {
      throw new ConflictError(`Upload session already exists: ${id}`);
    }
    if (this.sessions.size >= this.maxActiveUploads) {
      throw new CapacityError("Too many active uploads");
    }

    const now = this.now();
    const session: InternalSession = {
      id,
      filename,
      destinationPath: input.destinationPath ?? "",
      totalChunks,
      chunks: new Map(),
      compressed,
      status: "uploading",
      createdAt: now,
      lastUpdated: now,
    };

    this.sessions.set(id, session);
    return snapshot(session);
  }

  get(id: string): UploadSessionSnapshot | null {
    const session = this.sessions.get(id);
    return session ? snapshot(session) : null;
  }

  /**
   * Stores `bytes` under `chunkId`. A repeated chunk id replaces the earlier
   * bytes (last write wins), so a retried push is harmless.
   *
   * Returns false when the session is unknown.
   */
  addChunk(id: string, chunkId: number, bytes: Uint8Array): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;

    if (!Number.isInteger(chunkId) || chunkId < 0 || chunkId >= session.totalChunks) {
      throw new ValidationError(
        `chunk_id must be an integer in [0, ${session.totalChunks})`,
        { code: "INVALID_CHUNK" }
      );
    }
    if (session.status === "finalizing") {
      throw new ConflictError("Upload is currently finalizing", {
        code: "UPLOAD_FINALIZATION_IN_PROGRESS",
      });
    }

    session.chunks.set(chunkId, bytes);
    session.lastUpdated = this.now();
    return true;
  }

  isComplete(id: string): boolean {
    const session = this.get(id);
    return session !== null && isComplete(session);
  }

  missingChunks(id: string): number[] {
    const session = this.get(id);
    if (!session) {
      throw new NotFoundError("Session not found", { code: "UPLOAD_NOT_FOUND" });
    }
    return missingChunks(session);
  }

  /**
   * Removes every idle session whose last activity is older than the TTL.
   * Sessions being finalized are left alone.
   */
  expireSweep(now = this.now()): string[] {
    const expired: string[] = [];

    for (const [id, session] of this.sessions) {
      if (session.status === "finalizing") continue;
      if (now - session.lastUpdated > this.sessionTtlMs) {
        expired.push(id);
      }
    }

    for (const id of expired) {
      this.sessions.delete(id);
    }

    if (expired.length > 0) {
      this.log?.info({ expired: expired.length }, "Expired upload sessions removed");
    }

    return expired;
  }

  /**
   * Reassembles the upload into `outPath` in ascending chunk order and
   * removes the session. Incompleteness leaves the session in place so the
   * caller can push the gaps; any other failure removes it and surfaces as an
   * InternalError. Resolves to the written file size.
   */
  async finalize(id: string, outPath: string): Promise<number> {
    const session = this.sessions.get(id);
    if (!session) {
      throw new NotFoundError("Invalid session ID", { code: "UPLOAD_NOT_FOUND" });
    }
    if (session.status === "finalizing") {
      throw new ConflictError("Upload is currently finalizing", {
        code: "UPLOAD_FINALIZATION_IN_PROGRESS",
        retryable: true,
      });
    }

    const view = snapshot(session);
    const missing = missingChunks(view);
    if (missing.length > 0) {
      throw new IncompleteUploadError(missing, session.totalChunks);
    }

    session.status = "finalizing";

    try {
      const ordered = view.receivedChunks.map((chunkId) => {
        const bytes = session.chunks.get(chunkId);
        if (!bytes) {
          throw new Error(`Chunk ${chunkId} is registered but has no data`);
        }
        return bytes;
      });

      return await assembleChunksToFile({
        chunks: ordered,
        compressed: session.compressed,
        outPath,
      });
    } catch (err) {
      this.log?.error({ sessionId: id, err }, "Upload finalization failed");
      const reason = err instanceof Error ? err.message : String(err);
      throw new InternalError(`Upload finalization failed: ${reason}`, {
        code: "UPLOAD_FAILED",
        cause: err,
      });
    } finally {
      this.remove(id);
    }
  }

  remove(id: string): boolean {
    return this.sessions.delete(id);
  }
}
