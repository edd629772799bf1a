// src/transfer/chunk.assembler.ts

import fs from "fs/promises";
import { createWriteStream } from "fs";
import { once } from "events";
import crypto from "crypto";
import { pipeline } from "stream/promises";
import type { Readable } from "stream";

import { decompress } from "./chunk.codec.js";
import { createGunzipStream } from "./gzip.stream.js";

function tempPathFor(outPath: string) {
  return `${outPath}.${crypto.randomUUID()}.part`;
}

/**
 * Writes chunks to `outPath` in the order given, decoding each one on its own
 * when `compressed`. Output goes to a temp file that is renamed into place only
 * once every chunk is written, so a failure never leaves a partial file.
 *
 * Resolves to the size of the assembled file.
 */
export async function assembleChunksToFile(params: {
  chunks: Iterable<Uint8Array>;
  compressed: boolean;
  outPath: string;
}): Promise<number> {
  const tmpPath = tempPathFor(params.outPath);
  const ws = createWriteStream(tmpPath, { flags: "wx" });
  const finished = once(ws, "finish");
  const failed = once(ws, "error").then(([err]) => {
    throw err;
  });
  // Both are only observed through the races below.
  finished.catch(() => undefined);
  failed.catch(() => undefined);

  let written = 0;

  try {
    for (const chunk of params.chunks) {
      const data = params.compressed ? decompress(chunk) : chunk;
      written += data.length;

      if (!ws.write(data)) {
        await Promise.race([once(ws, "drain"), failed]);
      }
    }

    ws.end();
    await Promise.race([finished, failed]);

    await fs.rename(tmpPath, params.outPath);
    return written;
  } catch (err) {
    ws.destroy();
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

/**
 * Streams `source` into `outPath`, gunzipping on the way when `compressed`.
 * Same temp-file-then-rename contract as {@link assembleChunksToFile}.
 */
export async function writeStreamToFile(params: {
  source: Readable;
  compressed: boolean;
  outPath: string;
}): Promise<number> {
  const tmpPath = tempPathFor(params.outPath);
  const ws = createWriteStream(tmpPath, { flags: "wx" });

  try {
    if (params.compressed) {
      await pipeline(params.source, createGunzipStream(), ws);
    } else {
      await pipeline(params.source, ws);
    }

    const { size } = await fs.stat(tmpPath);
    await fs.rename(tmpPath, params.outPath);
    return size;
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}
