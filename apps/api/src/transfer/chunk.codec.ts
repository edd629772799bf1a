// src/transfer/chunk.codec.ts

import crypto from "crypto";
import { gunzipSync, gzipSync } from "fflate";

import { ChunkDefaults, type CompressionLevel } from "../config/transfer.config.js";
import { DecodeError } from "../utils/errors.js";
import { crc32, readUint32LE } from "./crc32.js";

const GZIP_MAGIC_0 = 0x1f;
const GZIP_MAGIC_1 = 0x8b;
const GZIP_MIN_BYTES = 18; // 10-byte header + 8-byte trailer
// inflate never yields more than this many bytes per input byte
const MAX_DEFLATE_RATIO = 1032;

/**
 * gzip-compress one block. Every chunk is compressed on its own so it can be
 * decoded without any other chunk.
 */
export function compress(
  data: Uint8Array,
  level: CompressionLevel = ChunkDefaults.compressionLevel
): Uint8Array {
  return gzipSync(data, { level });
}

/**
 * Inverse of {@link compress}. Throws a DecodeError rather than returning
 * partial output when the input is not a complete, intact gzip member.
 *
 * fflate inflates without checking the trailer and sizes its output buffer
 * from ISIZE, so the size bound, ISIZE and CRC-32 are checked here.
 */
export function decompress(data: Uint8Array): Uint8Array {
  if (
    data.length < GZIP_MIN_BYTES ||
    data[0] !== GZIP_MAGIC_0 ||
    data[1] !== GZIP_MAGIC_1
  ) {
    throw new DecodeError("Input is not gzip data");
  }

  const expectedCrc = readUint32LE(data, data.length - 8);
  const expectedSize = readUint32LE(data, data.length - 4);

  // The output buffer is sized from the trailer, so check it before inflating.
  if (expectedSize > data.length * MAX_DEFLATE_RATIO) {
    throw new DecodeError("gzip trailer declares an impossible size");
  }

  let out: Uint8Array;
  try {
    out = gunzipSync(data);
  } catch (err) {
    throw new DecodeError("Corrupt gzip data", { cause: err });
  }

  if (out.length % 0x100000000 !== expectedSize) {
    throw new DecodeError("Decompressed size does not match gzip trailer");
  }
  if (crc32(out) !== expectedCrc) {
    throw new DecodeError("Decompressed data failed CRC check");
  }

  return out;
}

export function hash(data: Uint8Array): string {
  return crypto.createHash("sha256").update(data).digest("hex");
}

export function verify(data: Uint8Array, expectedHash: string): boolean {
  return hash(data) === expectedHash.toLowerCase();
}
