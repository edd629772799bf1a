// src/types/transfer.ts

export interface ChunkMetadata {
  chunkId: number;
  /** sha256 of the bytes as sent (post-compression when compressed) */
  hash: string;
  size: number;
  /** Byte offset in the original, uncompressed file. */
  offset: number;
  totalChunks: number;
  filename: string;
  compressed: boolean;
}

export type UploadStatus = "uploading" | "finalizing";

export interface UploadSessionSnapshot {
  id: string;
  filename: string;
  destinationPath: string;
  totalChunks: number;
  receivedChunks: number[];
  bufferedBytes: number;
  compressed: boolean;
  status: UploadStatus;
  createdAt: number;
  lastUpdated: number;
}

// Wire format. Field names are part of the protocol.

export interface FileInfoResponse {
  filename: string;
  file_size: number;
  chunk_size: number;
  total_chunks: number;
  should_compress: boolean;
  estimated_compression_ratio: number;
  recommended_chunk_size: number;
  max_parallel_chunks: number;
  last_modified: number;
}

export interface UploadInitResponse {
  session_id: string;
  status: "initialized";
  filename: string;
  total_chunks: number;
  max_parallel_chunks: number;
}

export interface UploadChunkResponse {
  status: "chunk_received";
  chunk_id: number;
  received_chunks: number;
  total_chunks: number;
  is_complete: boolean;
  missing_chunks: number[];
}

export interface UploadFinalizeResponse {
  status: "completed";
  filename: string;
  file_size: number;
  path: string;
}

export interface UploadStatusResponse {
  session_id: string;
  filename: string;
  total_chunks: number;
  received_chunks: number;
  is_complete: boolean;
  missing_chunks: number[];
  compressed: boolean;
  buffered_bytes: number;
  status: UploadStatus;
  created_at: number;
  last_updated: number;
}

export interface UploadCancelResponse {
  status: "cancelled";
  session_id: string;
}

export const ChunkHeaders = {
  id: "x-chunk-id",
  hash: "x-chunk-hash",
  size: "x-chunk-size",
  totalChunks: "x-total-chunks",
  compressed: "x-compressed",
} as const;
