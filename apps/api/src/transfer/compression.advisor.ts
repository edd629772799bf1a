// src/transfer/compression.advisor.ts

import fs from "fs/promises";
import path from "path";

import { ChunkDefaults } from "../config/transfer.config.js";
import { compress } from "./chunk.codec.js";

/**
 * Archive and media formats that are already compressed. Recompressing them
 * costs CPU and saves nothing.
 */
const INCOMPRESSIBLE_EXTENSIONS = new Set([
  ".zip", ".gz", ".bz2", ".xz", ".7z", ".rar",
  ".jpg", ".jpeg", ".png", ".gif",
  ".mp4", ".mp3", ".avi", ".mkv",
  ".pdf", ".apk",
]);

export interface CompressionAdvice {
  shouldCompress: boolean;
  /** compressed / original for the sample; 1 when not sampled */
  estimatedRatio: number;
}

export function hasIncompressibleExtension(filePath: string): boolean {
  return INCOMPRESSIBLE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export async function estimateCompressionRatio(
  filePath: string,
  sampleBytes = ChunkDefaults.sampleBytes
): Promise<number> {
  const fh = await fs.open(filePath, "r");

  let sample: Buffer;
  try {
    const { size } = await fh.stat();
    const length = Math.min(sampleBytes, size);
    sample = Buffer.alloc(length);
    const { bytesRead } = await fh.read(sample, 0, length, 0);
    sample = sample.subarray(0, bytesRead);
  } finally {
    await fh.close();
  }

  if (sample.length === 0) return 1;

  return compress(sample).length / sample.length;
}

export async function adviseCompression(
  filePath: string,
  options: { sampleBytes?: number; threshold?: number } = {}
): Promise<CompressionAdvice> {
  if (hasIncompressibleExtension(filePath)) {
    return { shouldCompress: false, estimatedRatio: 1 };
  }

  const threshold = options.threshold ?? ChunkDefaults.compressionThreshold;
  const ratio = await estimateCompressionRatio(
    filePath,
    options.sampleBytes ?? ChunkDefaults.sampleBytes
  );

  return { shouldCompress: ratio < threshold, estimatedRatio: ratio };
}

export async function shouldCompress(filePath: string): Promise<boolean> {
  const advice = await adviseCompression(filePath);
  return advice.shouldCompress;
}
