// src/routes/files.routes.ts

import type { FastifyInstance } from "fastify";
import fs from "fs/promises";
import { createReadStream } from "fs";
import path from "path";
import { pipeline } from "stream";

import type { TransferConfig } from "../config/transfer.config.js";
import { adviseCompression } from "../transfer/compression.advisor.js";
import { compress, hash } from "../transfer/chunk.codec.js";
import { describeChunk, readChunk, totalChunks } from "../transfer/file.chunker.js";
import { createGzipStream } from "../transfer/gzip.stream.js";
import { ChunkHeaders, type FileInfoResponse } from "../types/transfer.js";
import { NotFoundError } from "../utils/errors.js";
import {
  asFields,
  optionalBoolean,
  requireNonNegativeInt,
  requireString,
  toBuffer,
} from "../utils/request.js";
import { resolveSafePath } from "../utils/safePath.js";

export interface FilesRoutesOptions {
  config: TransferConfig;
}

function attachment(filename: string) {
  return `attachment; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

async function statFile(fullPath: string) {
  const st = await fs.stat(fullPath).catch(() => null);
  if (!st || !st.isFile()) {
    throw new NotFoundError("File not found");
  }
  return st;
}

export default async function filesRoutes(
  app: FastifyInstance,
  opts: FilesRoutesOptions
) {
  const { config } = opts;

  app.get("/v1/files/info", async (req) => {
    const query = asFields(req.query, "Query");
    const filePath = requireString(query, "path");

    const fullPath = resolveSafePath(config.rootDir, filePath);
    const st = await statFile(fullPath);
    const advice = await adviseCompression(fullPath);
    const chunks = totalChunks(st.size, config.chunkSizeBytes);

    req.log.info(
      { path: filePath, sizeBytes: st.size, totalChunks: chunks },
      "File info requested"
    );

    const info: FileInfoResponse = {
      filename: path.basename(fullPath),
      file_size: st.size,
      chunk_size: config.chunkSizeBytes,
      total_chunks: chunks,
      should_compress: advice.shouldCompress,
      estimated_compression_ratio: advice.shouldCompress ? advice.estimatedRatio : 1,
      recommended_chunk_size: config.chunkSizeBytes,
      max_parallel_chunks: config.maxParallelChunks,
      last_modified: st.mtimeMs / 1000,
    };

    return info;
  });

  app.get("/v1/files/chunk", async (req, reply) => {
    const query = asFields(req.query, "Query");
    const filePath = requireString(query, "path");
    const chunkId = requireNonNegativeInt(query, "chunk_id");
    const wantCompressed = optionalBoolean(query, "compress", true);

    const fullPath = resolveSafePath(config.rootDir, filePath);
    const st = await statFile(fullPath);

    const raw = await readChunk(fullPath, chunkId, config.chunkSizeBytes);
    const payload = wantCompressed ? compress(raw, config.compressionLevel) : raw;

    const meta = describeChunk({
      chunkId,
      hash: hash(payload),
      payloadSize: payload.length,
      chunkSize: config.chunkSizeBytes,
      totalChunks: totalChunks(st.size, config.chunkSizeBytes),
      filePath: fullPath,
      compressed: wantCompressed,
    });

    return reply
      .type("application/octet-stream")
      .header(ChunkHeaders.id, String(meta.chunkId))
      .header(ChunkHeaders.hash, meta.hash)
      .header(ChunkHeaders.size, String(meta.size))
      .header(ChunkHeaders.totalChunks, String(meta.totalChunks))
      .header(ChunkHeaders.compressed, String(meta.compressed))
      .send(toBuffer(payload));
  });

  app.get("/v1/files/download", async (req, reply) => {
    const query = asFields(req.query, "Query");
    const filePath = requireString(query, "path");
    const wantCompressed = optionalBoolean(query, "compress", false);

    const fullPath = resolveSafePath(config.rootDir, filePath);
    await statFile(fullPath);
    const filename = path.basename(fullPath);

    if (wantCompressed) {
      const advice = await adviseCompression(fullPath);

      if (advice.shouldCompress) {
        const body = pipeline(
          createReadStream(fullPath),
          createGzipStream(config.compressionLevel),
          (err) => {
            if (err) req.log.warn({ err, path: filePath }, "Compressed download aborted");
          }
        );

        return reply
          .type("application/gzip")
          .header("content-disposition", attachment(`${filename}.gz`))
          .header(ChunkHeaders.compressed, "true")
          .send(body);
      }
    }

    return reply
      .type("application/octet-stream")
      .header("content-disposition", attachment(filename))
      .header(ChunkHeaders.compressed, "false")
      .send(createReadStream(fullPath));
  });
}
