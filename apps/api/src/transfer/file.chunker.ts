// src/transfer/file.chunker.ts

import fs from "fs/promises";
import path from "path";

import type { ChunkMetadata } from "../types/transfer.js";
import { OutOfRangeError, ValidationError } from "../utils/errors.js";

export function totalChunks(fileSize: number, chunkSize: number): number {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError("chunkSize must be a positive integer");
  }
  if (!Number.isInteger(fileSize) || fileSize < 0) {
    throw new ValidationError("fileSize must be a non-negative integer");
  }
  return Math.ceil(fileSize / chunkSize);
}

export function chunkOffset(chunkId: number, chunkSize: number): number {
  return chunkId * chunkSize;
}

/**
 * Reads `[chunkId * chunkSize, min(fileSize, (chunkId + 1) * chunkSize))`
 * from the uncompressed file.
 */
export async function readChunk(
  filePath: string,
  chunkId: number,
  chunkSize: number
): Promise<Uint8Array> {
  const fh = await fs.open(filePath, "r");

  try {
    const { size } = await fh.stat();
    const total = totalChunks(size, chunkSize);

    if (!Number.isInteger(chunkId) || chunkId < 0 || chunkId >= total) {
      throw new OutOfRangeError(chunkId, total);
    }

    const offset = chunkOffset(chunkId, chunkSize);
    const length = Math.min(chunkSize, size - offset);
    const buf = Buffer.alloc(length);

    let read = 0;
    while (read < length) {
      const { bytesRead } = await fh.read(buf, read, length - read, offset + read);
      if (bytesRead === 0) break;
      read += bytesRead;
    }

    return read === length ? buf : buf.subarray(0, read);
  } finally {
    await fh.close();
  }
}

export function describeChunk(params: {
  chunkId: number;
  hash: string;
  payloadSize: number;
  chunkSize: number;
  totalChunks: number;
  filePath: string;
  compressed: boolean;
}): ChunkMetadata {
  return {
    chunkId: params.chunkId,
    hash: params.hash,
    size: params.payloadSize,
    offset: chunkOffset(params.chunkId, params.chunkSize),
    totalChunks: params.totalChunks,
    filename: path.basename(params.filePath),
    compressed: params.compressed,
  };
}
