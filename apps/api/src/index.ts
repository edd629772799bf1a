// src/index.ts

export { buildApp, type BuildAppOptions } from "./app.js";
export {
  ChunkDefaults,
  loadTransferConfig,
  type CompressionLevel,
  type TransferConfig,
} from "./config/transfer.config.js";

export * as ChunkCodec from "./transfer/chunk.codec.js";
export * as FileChunker from "./transfer/file.chunker.js";
export * as CompressionAdvisor from "./transfer/compression.advisor.js";
export { assembleChunksToFile, writeStreamToFile } from "./transfer/chunk.assembler.js";
export { createGunzipStream, createGzipStream } from "./transfer/gzip.stream.js";

export {
  UploadSessionStore,
  isComplete,
  missingChunks,
  type UploadSessionStoreOptions,
} from "./services/upload/upload.session.js";
export { UploadGcScheduler } from "./state/gc/upload.gc.scheduler.js";

export {
  TransferClient,
  type DownloadOptions,
  type DownloadState,
  type FetchFn,
  type TransferClientOptions,
  type TransferProgress,
  type TransferStats,
  type UploadOptions,
  type UploadState,
  type UploadStats,
} from "./client/transfer.client.js";
export { runTaskGroup } from "./client/task.group.js";

export * from "./types/transfer.js";
export * from "./utils/errors.js";
export type { ApiErrorCode, ApiErrorResponse } from "./utils/apiError.js";
export { resolveSafePath } from "./utils/safePath.js";
