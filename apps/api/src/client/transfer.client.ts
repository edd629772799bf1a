// src/client/transfer.client.ts

import fs from "fs/promises";
import path from "path";
import { Readable } from "stream";

import { ChunkDefaults, type CompressionLevel } from "../config/transfer.config.js";
import { assembleChunksToFile, writeStreamToFile } from "../transfer/chunk.assembler.js";
import { compress, decompress, hash, verify } from "../transfer/chunk.codec.js";
import { readChunk, totalChunks } from "../transfer/file.chunker.js";
import {
  ChunkHeaders,
  type FileInfoResponse,
  type UploadCancelResponse,
  type UploadFinalizeResponse,
  type UploadInitResponse,
  type UploadStatusResponse,
} from "../types/transfer.js";
import { isApiErrorResponse } from "../utils/apiError.js";
import {
  ChunkTransferError,
  IntegrityError,
  NetworkError,
  NotFoundError,
  ProtocolError,
  ValidationError,
} from "../utils/errors.js";
import { runTaskGroup } from "./task.group.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type UploadState = "init" | "sending" | "all_sent" | "finalized" | "failed";
export type DownloadState = "init" | "fetching" | "reassembling" | "done" | "failed";

export interface TransferProgress {
  completedChunks: number;
  totalChunks: number;
  percent: number;
}

export interface TransferStats {
  filename: string;
  sizeBytes: number;
  totalChunks: number;
  compressed: boolean;
  durationMs: number;
  bytesPerSecond: number;
}

export interface UploadStats extends TransferStats {
  sessionId: string;
  /** Server-side path of the assembled file, relative to its root. */
  path: string;
}

export interface DownloadOptions {
  /** Parallel chunk fetch (default) or one whole-file request. */
  chunked?: boolean;
  /** Ask for compression; only honoured when the server recommends it. */
  compress?: boolean;
  onProgress?: (progress: TransferProgress) => void;
  onStateChange?: (state: DownloadState) => void;
}

export interface UploadOptions {
  compress?: boolean;
  onProgress?: (progress: TransferProgress) => void;
  onStateChange?: (state: UploadState) => void;
}

export interface TransferClientOptions {
  /** e.g. http://localhost:3000 */
  baseUrl: string;
  parallelism?: number;
  chunkSize?: number;
  compressionLevel?: CompressionLevel;
  /** Defaults to the global fetch. */
  fetchFn?: FetchFn;
}

type Json = Record<string, unknown>;

function field<T>(
  json: Json,
  name: string,
  guard: (value: unknown) => value is T,
  what: string
): T {
  const value = json[name];
  if (!guard(value)) {
    throw new ProtocolError(`Malformed server response: ${name} must be ${what}`, 502);
  }
  return value;
}

const isJson = (v: unknown): v is Json =>
  typeof v === "object" && v !== null && !Array.isArray(v);
const isString = (v: unknown): v is string => typeof v === "string";
const isNumber = (v: unknown): v is number => typeof v === "number" && Number.isFinite(v);
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isIdList = (v: unknown): v is number[] =>
  Array.isArray(v) && v.every((id) => Number.isInteger(id));

function progressOf(completedChunks: number, total: number): TransferProgress {
  return {
    completedChunks,
    totalChunks: total,
    percent: total === 0 ? 100 : (completedChunks / total) * 100,
  };
}

function statsOf(params: Omit<TransferStats, "bytesPerSecond">): TransferStats {
  return {
    ...params,
    bytesPerSecond: (params.sizeBytes / Math.max(params.durationMs, 1)) * 1000,
  };
}

/**
 * Client driver for chunked transfers.
 *
 * Downloads fetch chunks in parallel, verify and decode each one as it
 * arrives, and write the file in chunk order once every fetch has finished.
 * Uploads read, compress and hash each chunk inside its own task, push it,
 * and call finalize only after every push succeeded.
 *
 * Any chunk failure fails the whole transfer. Nothing is retried; a failed
 * download leaves no file behind and a failed upload is never finalized.
 */
export class TransferClient {
  readonly baseUrl: string;
  readonly parallelism: number;
  readonly chunkSize: number;
  readonly compressionLevel: CompressionLevel;
  private readonly fetchFn: FetchFn;

  constructor(options: TransferClientOptions) {
    if (!/^https?:\/\//.test(options.baseUrl)) {
      throw new ValidationError("baseUrl must start with http:// or https://");
    }

    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.parallelism = options.parallelism ?? ChunkDefaults.parallelism;
    this.chunkSize = options.chunkSize ?? ChunkDefaults.chunkSizeBytes;
    this.compressionLevel = options.compressionLevel ?? ChunkDefaults.compressionLevel;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));

    if (!Number.isInteger(this.parallelism) || this.parallelism < 1) {
      throw new ValidationError("parallelism must be a positive integer");
    }
    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new ValidationError("chunkSize must be a positive integer");
    }
  }

  async getFileInfo(remotePath: string): Promise<FileInfoResponse> {
    const json = await this.requestJson(
      `/v1/files/info?${new URLSearchParams({ path: remotePath })}`
    );

    return {
      filename: field(json, "filename", isString, "a string"),
      file_size: field(json, "file_size", isNumber, "a number"),
      chunk_size: field(json, "chunk_size", isNumber, "a number"),
      total_chunks: field(json, "total_chunks", isNumber, "a number"),
      should_compress: field(json, "should_compress", isBoolean, "a boolean"),
      estimated_compression_ratio: field(json, "estimated_compression_ratio", isNumber, "a number"),
      recommended_chunk_size: field(json, "recommended_chunk_size", isNumber, "a number"),
      max_parallel_chunks: field(json, "max_parallel_chunks", isNumber, "a number"),
      last_modified: field(json, "last_modified", isNumber, "a number"),
    };
  }

  async downloadFile(
    remotePath: string,
    localPath: string,
    options: DownloadOptions = {}
  ): Promise<TransferStats> {
    const { chunked = true, compress: wantCompressed = true, onStateChange } = options;
    const start = Date.now();

    onStateChange?.("init");

    try {
      const stats = chunked
        ? await this.downloadChunked(remotePath, localPath, wantCompressed, options, start)
        : await this.downloadWhole(remotePath, localPath, wantCompressed, options, start);

      onStateChange?.("done");
      return stats;
    } catch (err) {
      onStateChange?.("failed");
      throw err;
    }
  }

  private async downloadWhole(
    remotePath: string,
    localPath: string,
    wantCompressed: boolean,
    options: DownloadOptions,
    start: number
  ): Promise<TransferStats> {
    options.onStateChange?.("fetching");

    const res = await this.request(
      `/v1/files/download?${new URLSearchParams({
        path: remotePath,
        compress: String(wantCompressed),
      })}`
    );
    if (!res.body) {
      throw new ProtocolError("Download response has no body", 502);
    }
    const compressed =
      res.headers.get(ChunkHeaders.compressed) === "true" ||
      (res.headers.get("content-type") ?? "").startsWith("application/gzip");

    // One pass: the body is decoded as it arrives.
    const sizeBytes = await writeStreamToFile({
      source: Readable.fromWeb(res.body),
      compressed,
      outPath: localPath,
    });

    options.onStateChange?.("reassembling");
    options.onProgress?.(progressOf(1, 1));

    return statsOf({
      filename: path.basename(remotePath),
      sizeBytes,
      totalChunks: 1,
      compressed,
      durationMs: Date.now() - start,
    });
  }

  private async downloadChunked(
    remotePath: string,
    localPath: string,
    wantCompressed: boolean,
    options: DownloadOptions,
    start: number
  ): Promise<TransferStats> {
    const info = await this.getFileInfo(remotePath);
    const total = info.total_chunks;
    const compressed = info.should_compress && wantCompressed;

    options.onStateChange?.("fetching");

    const chunks = new Map<number, Uint8Array>();
    let completed = 0;
    const ids = Array.from({ length: total }, (_, i) => i);

    await runTaskGroup(ids, this.parallelism, async (chunkId) => {
      try {
        chunks.set(chunkId, await this.fetchChunk(remotePath, chunkId, compressed));
      } catch (err) {
        throw new ChunkTransferError(chunkId, err);
      }

      completed++;
      options.onProgress?.(progressOf(completed, total));
    });

    options.onStateChange?.("reassembling");

    const ordered = ids.map((chunkId) => {
      const data = chunks.get(chunkId);
      if (!data) {
        throw new ChunkTransferError(chunkId, new Error("Chunk missing after fetch"));
      }
      return data;
    });

    const sizeBytes = await assembleChunksToFile({
      chunks: ordered,
      compressed: false,
      outPath: localPath,
    });

    return statsOf({
      filename: info.filename,
      sizeBytes,
      totalChunks: total,
      compressed,
      durationMs: Date.now() - start,
    });
  }

  private async fetchChunk(
    remotePath: string,
    chunkId: number,
    compressed: boolean
  ): Promise<Uint8Array> {
    const res = await this.request(
      `/v1/files/chunk?${new URLSearchParams({
        path: remotePath,
        chunk_id: String(chunkId),
        compress: String(compressed),
      })}`
    );

    const payload = new Uint8Array(await res.arrayBuffer());
    const expectedHash = res.headers.get(ChunkHeaders.hash);
    if (!expectedHash) {
      throw new ProtocolError(`Chunk ${chunkId} response has no hash`, 502);
    }
    if (!verify(payload, expectedHash)) {
      throw new IntegrityError(`Chunk ${chunkId} integrity check failed`);
    }

    return res.headers.get(ChunkHeaders.compressed) === "true"
      ? decompress(payload)
      : payload;
  }

  async uploadFile(
    localPath: string,
    destinationPath: string,
    options: UploadOptions = {}
  ): Promise<UploadStats> {
    const { compress: useCompression = true, onProgress, onStateChange } = options;
    const start = Date.now();

    onStateChange?.("init");

    try {
      const st = await fs.stat(localPath).catch(() => null);
      if (!st || !st.isFile()) {
        throw new NotFoundError(`File not found: ${localPath}`);
      }

      const filename = path.basename(localPath);
      const total = totalChunks(st.size, this.chunkSize);

      const init = await this.initUpload({
        filename,
        totalChunks: total,
        destinationPath,
        compressed: useCompression,
      });
      const id = init.session_id;

      onStateChange?.("sending");

      let completed = 0;
      const ids = Array.from({ length: total }, (_, i) => i);

      await runTaskGroup(ids, this.parallelism, async (chunkId) => {
        try {
          await this.pushChunk(id, localPath, chunkId, useCompression);
        } catch (err) {
          throw new ChunkTransferError(chunkId, err, id);
        }

        completed++;
        onProgress?.(progressOf(completed, total));
      });

      onStateChange?.("all_sent");

      const result = await this.finalizeUpload(id, destinationPath);

      onStateChange?.("finalized");

      return {
        ...statsOf({
          filename,
          sizeBytes: st.size,
          totalChunks: total,
          compressed: useCompression,
          durationMs: Date.now() - start,
        }),
        sessionId: id,
        path: result.path,
      };
    } catch (err) {
      onStateChange?.("failed");
      throw err;
    }
  }

  private async pushChunk(
    sessionId: string,
    localPath: string,
    chunkId: number,
    useCompression: boolean
  ): Promise<void> {
    const raw = await readChunk(localPath, chunkId, this.chunkSize);
    const payload = useCompression ? compress(raw, this.compressionLevel) : raw;

    // Fields go before the file part; the server reads them from there.
    const form = new FormData();
    form.append("session_id", sessionId);
    form.append("chunk_id", String(chunkId));
    form.append("chunk_hash", hash(payload));
    form.append("chunk_data", new Blob([new Uint8Array(payload)]), `chunk-${chunkId}`);

    const json = await this.requestJson("/v1/uploads/chunk", {
      method: "POST",
      body: form,
    });

    const ackId = field(json, "chunk_id", isNumber, "a number");
    if (ackId !== chunkId) {
      throw new ProtocolError(`Server acknowledged chunk ${ackId}, expected ${chunkId}`, 502);
    }
  }

  async initUpload(params: {
    filename: string;
    totalChunks: number;
    destinationPath: string;
    compressed: boolean;
  }): Promise<UploadInitResponse> {
    const json = await this.postJson("/v1/uploads/init", {
      filename: params.filename,
      total_chunks: params.totalChunks,
      path: params.destinationPath,
      compressed: params.compressed,
    });

    return {
      session_id: field(json, "session_id", isString, "a string"),
      status: "initialized",
      filename: field(json, "filename", isString, "a string"),
      total_chunks: field(json, "total_chunks", isNumber, "a number"),
      max_parallel_chunks: field(json, "max_parallel_chunks", isNumber, "a number"),
    };
  }

  async finalizeUpload(
    sessionId: string,
    destinationPath?: string
  ): Promise<UploadFinalizeResponse> {
    const json = await this.postJson("/v1/uploads/finalize", {
      session_id: sessionId,
      ...(destinationPath !== undefined && { path: destinationPath }),
    });

    return {
      status: "completed",
      filename: field(json, "filename", isString, "a string"),
      file_size: field(json, "file_size", isNumber, "a number"),
      path: field(json, "path", isString, "a string"),
    };
  }

  async getUploadStatus(sessionId: string): Promise<UploadStatusResponse> {
    const json = await this.requestJson(
      `/v1/uploads/status?${new URLSearchParams({ session_id: sessionId })}`
    );
    const status = field(json, "status", isString, "a string");
    if (status !== "uploading" && status !== "finalizing") {
      throw new ProtocolError(`Unknown upload status: ${status}`, 502);
    }

    return {
      session_id: field(json, "session_id", isString, "a string"),
      filename: field(json, "filename", isString, "a string"),
      total_chunks: field(json, "total_chunks", isNumber, "a number"),
      received_chunks: field(json, "received_chunks", isNumber, "a number"),
      is_complete: field(json, "is_complete", isBoolean, "a boolean"),
      missing_chunks: field(json, "missing_chunks", isIdList, "a list of chunk ids"),
      compressed: field(json, "compressed", isBoolean, "a boolean"),
      buffered_bytes: field(json, "buffered_bytes", isNumber, "a number"),
      status,
      created_at: field(json, "created_at", isNumber, "a number"),
      last_updated: field(json, "last_updated", isNumber, "a number"),
    };
  }

  /**
   * Drops the server-side session. Chunk requests already sent are not
   * interrupted.
   */
  async cancelUpload(sessionId: string): Promise<UploadCancelResponse> {
    const json = await this.postJson("/v1/uploads/cancel", { session_id: sessionId });

    return {
      status: "cancelled",
      session_id: field(json, "session_id", isString, "a string"),
    };
  }

  private postJson(route: string, body: Json): Promise<Json> {
    return this.requestJson(route, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  private async requestJson(route: string, init?: RequestInit): Promise<Json> {
    const res = await this.request(route, init);

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new ProtocolError("Server returned invalid JSON", res.status, { cause: err });
    }

    if (!isJson(json)) {
      throw new ProtocolError("Server returned an unexpected response", res.status);
    }
    return json;
  }

  private async request(route: string, init?: RequestInit): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchFn(`${this.baseUrl}${route}`, init);
    } catch (err) {
      throw new NetworkError("Could not reach the server", { cause: err });
    }

    if (res.ok) return res;

    const body: unknown = await res.json().catch(() => null);
    if (isApiErrorResponse(body)) {
      throw new ProtocolError(body.error.message, res.status, {
        code: body.error.code,
        retryable: body.error.retryable,
        details: body.error.details,
      });
    }

    throw new ProtocolError(`Request failed with status ${res.status}`, res.status);
  }
}
