// src/transfer/gzip.stream.ts

import { Transform, type TransformCallback } from "stream";
import { Gunzip, Gzip } from "fflate";

import { ChunkDefaults, type CompressionLevel } from "../config/transfer.config.js";
import { DecodeError } from "../utils/errors.js";
import { CRC32_INITIAL, crc32Update, readUint32LE } from "./crc32.js";

const TRAILER_BYTES = 8;
const EMPTY = new Uint8Array(0);

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Streaming gzip encoder for whole-file transfers. Produces a single gzip
 * member, so its output decodes with `decompress` as well.
 */
export function createGzipStream(
  level: CompressionLevel = ChunkDefaults.compressionLevel
): Transform {
  const gzip = new Gzip({ level });

  const stream = new Transform({
    transform(chunk: Buffer, _enc, cb: TransformCallback) {
      try {
        gzip.push(chunk, false);
        cb();
      } catch (err) {
        cb(asError(err));
      }
    },
    flush(cb: TransformCallback) {
      try {
        gzip.push(EMPTY, true);
        cb();
      } catch (err) {
        cb(asError(err));
      }
    },
  });

  gzip.ondata = (data) => {
    stream.push(data);
  };

  return stream;
}

/**
 * Streaming gzip decoder. Fails with a DecodeError on malformed or truncated
 * input, and when the output does not match the trailer's CRC-32 or size.
 */
export function createGunzipStream(): Transform {
  const gunzip = new Gunzip();
  let crc = CRC32_INITIAL;
  let size = 0;
  let tail: Uint8Array = EMPTY;

  const stream = new Transform({
    transform(chunk: Buffer, _enc, cb: TransformCallback) {
      if (chunk.length >= TRAILER_BYTES) {
        tail = new Uint8Array(chunk.subarray(chunk.length - TRAILER_BYTES));
      } else {
        const joined = new Uint8Array(tail.length + chunk.length);
        joined.set(tail);
        joined.set(chunk, tail.length);
        tail = joined.slice(Math.max(0, joined.length - TRAILER_BYTES));
      }

      try {
        gunzip.push(chunk, false);
        cb();
      } catch (err) {
        cb(new DecodeError("Corrupt gzip stream", { cause: err }));
      }
    },
    flush(cb: TransformCallback) {
      try {
        gunzip.push(EMPTY, true);
      } catch (err) {
        cb(new DecodeError("Corrupt gzip stream", { cause: err }));
        return;
      }

      if (tail.length < TRAILER_BYTES) {
        cb(new DecodeError("gzip stream is truncated"));
      } else if (readUint32LE(tail, 4) !== size % 0x100000000) {
        cb(new DecodeError("Decompressed size does not match gzip trailer"));
      } else if (readUint32LE(tail, 0) !== crc) {
        cb(new DecodeError("Decompressed data failed CRC check"));
      } else {
        cb();
      }
    },
  });

  gunzip.ondata = (data) => {
    crc = crc32Update(crc, data);
    size += data.length;
    stream.push(data);
  };

  return stream;
}
