// src/config/transfer.config.ts

import os from "os";
import path from "path";

export type CompressionLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

const DEFAULT_COMPRESSION_LEVEL: CompressionLevel = 6;

/**
 * Defaults shared by the server and the client.
 */
export const ChunkDefaults = {
  chunkSizeBytes: 1024 * 1024,        // 1 MB
  maxChunkBytes: 20 * 1024 * 1024,    // 20 MB
  maxTotalChunks: 100_000,
  compressionLevel: DEFAULT_COMPRESSION_LEVEL,
  parallelism: 5,

  // Compression advisor
  sampleBytes: 1024 * 1024,
  compressionThreshold: 0.9,
};

export interface TransferConfig {
  rootDir: string;
  host: string;
  port: number;
  logLevel: string;

  chunkSizeBytes: number;
  maxChunkBytes: number;
  compressionLevel: CompressionLevel;
  maxParallelChunks: number;
  /** Upper bound on `total_chunks` accepted by upload-init. */
  maxTotalChunks: number;

  sessionTtlMs: number;
  sweepIntervalMs: number;
  maxActiveUploads: number;
}

type Env = Record<string, string | undefined>;

function parsePositiveIntEnv(env: Env, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min}`);
  }
  return n;
}

export function isCompressionLevel(value: number): value is CompressionLevel {
  return Number.isInteger(value) && value >= 0 && value <= 9;
}

export function loadTransferConfig(env: Env = process.env): TransferConfig {
  const rawRoot = env.TRANSFER_ROOT_DIR;
  if (!rawRoot) {
    throw new Error("Missing required env: TRANSFER_ROOT_DIR");
  }
  if (!path.isAbsolute(rawRoot)) {
    throw new Error("TRANSFER_ROOT_DIR must be an absolute path");
  }

  const rootDir = path.resolve(rawRoot);
  if (rootDir === "/" || rootDir === "/home" || rootDir === os.homedir()) {
    throw new Error(`TRANSFER_ROOT_DIR is unsafe: ${rootDir}`);
  }

  const compressionLevel = parsePositiveIntEnv(
    env,
    "COMPRESSION_LEVEL",
    ChunkDefaults.compressionLevel,
    0
  );
  if (!isCompressionLevel(compressionLevel)) {
    throw new Error("COMPRESSION_LEVEL must be an integer between 0 and 9");
  }

  const chunkSizeBytes = parsePositiveIntEnv(env, "CHUNK_SIZE_BYTES", ChunkDefaults.chunkSizeBytes);
  const maxChunkBytes = parsePositiveIntEnv(env, "MAX_CHUNK_BYTES", ChunkDefaults.maxChunkBytes);
  if (chunkSizeBytes > maxChunkBytes) {
    throw new Error("CHUNK_SIZE_BYTES must not exceed MAX_CHUNK_BYTES");
  }

  return {
    rootDir,
    host: env.HOST || "0.0.0.0",
    port: parsePositiveIntEnv(env, "PORT", 3000),
    logLevel: env.LOG_LEVEL || (env.NODE_ENV === "production" ? "info" : "debug"),

    chunkSizeBytes,
    maxChunkBytes,
    compressionLevel,
    maxParallelChunks: parsePositiveIntEnv(env, "MAX_PARALLEL_CHUNKS", 4),
    maxTotalChunks: parsePositiveIntEnv(env, "MAX_TOTAL_CHUNKS", ChunkDefaults.maxTotalChunks),

    sessionTtlMs: parsePositiveIntEnv(env, "SESSION_TTL_MS", 60 * 60 * 1000), // 1 hour
    sweepIntervalMs: parsePositiveIntEnv(env, "SESSION_SWEEP_INTERVAL_MS", 60 * 1000),
    maxActiveUploads: parsePositiveIntEnv(env, "MAX_ACTIVE_UPLOADS", 100),
  };
}
