import { describe, it, expect, beforeAll, afterAll } from "vitest";
import crypto from "crypto";
import fs from "fs/promises";
import path from "path";
import type { FastifyInstance } from "fastify";

import { buildApp } from "../app.js";
import { decompress, hash } from "../transfer/chunk.codec.js";
import { makeTempDir, removeDir, testConfig } from "../testing/fixtures.js";

const CHUNK = 64 * 1024;

describe("files routes", () => {
  let dir: string;
  let app: FastifyInstance;
  const text = Buffer.from("hello world\n".repeat(20_000));
  const noise = crypto.randomBytes(CHUNK + 100);

  beforeAll(async () => {
    dir = await makeTempDir();
    await fs.mkdir(path.join(dir, "docs"));
    await fs.writeFile(path.join(dir, "docs", "notes.txt"), text);
    await fs.writeFile(path.join(dir, "noise.bin"), noise);
    await fs.writeFile(path.join(dir, "empty.txt"), "");

    ({ app } = await buildApp({ config: testConfig(dir), logger: false }));
  });

  afterAll(async () => {
    await app.close();
    await removeDir(dir);
  });

  describe("GET /v1/files/info", () => {
    it("describes the chunk layout", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/info",
        query: { path: "docs/notes.txt" },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body).toMatchObject({
        filename: "notes.txt",
        file_size: 240_000,
        chunk_size: CHUNK,
        total_chunks: 4,
        should_compress: true,
        recommended_chunk_size: CHUNK,
        max_parallel_chunks: 4,
      });
      expect(body.estimated_compression_ratio).toBeLessThan(0.1);
      expect(typeof body.last_modified).toBe("number");
    });

    it("reports a ratio of 1 when compression is not worth it", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/info",
        query: { path: "noise.bin" },
      });

      expect(res.json()).toMatchObject({
        total_chunks: 2,
        should_compress: false,
        estimated_compression_ratio: 1,
      });
    });

    it("reports zero chunks for an empty file", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/info",
        query: { path: "empty.txt" },
      });

      expect(res.json()).toMatchObject({ file_size: 0, total_chunks: 0 });
    });

    it("returns 404 for a missing file", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/info",
        query: { path: "nope.txt" },
      });

      expect(res.statusCode).toBe(404);
      expect(res.json().error.code).toBe("FILE_NOT_FOUND");
    });

    it("returns 404 for a directory", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/info",
        query: { path: "docs" },
      });

      expect(res.statusCode).toBe(404);
    });

    it("refuses paths outside the root", async () => {
      for (const p of ["../outside.txt", "/etc/hostname", "docs/../../x"]) {
        const res = await app.inject({
          method: "GET",
          url: "/v1/files/info",
          query: { path: p },
        });

        expect(res.statusCode).toBe(403);
        expect(res.json().error.code).toBe("ACCESS_DENIED");
      }
    });

    it("requires a path", async () => {
      const res = await app.inject({ method: "GET", url: "/v1/files/info" });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: {
          code: "INVALID_REQUEST",
          message: "Missing 'path' parameter",
          retryable: false,
        },
      });
    });
  });

  describe("GET /v1/files/chunk", () => {
    it("serves a compressed chunk with its metadata", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/chunk",
        query: { path: "docs/notes.txt", chunk_id: "1" },
      });

      expect(res.statusCode).toBe(200);
      expect(res.headers["content-type"]).toBe("application/octet-stream");
      expect(res.headers["x-chunk-id"]).toBe("1");
      expect(res.headers["x-total-chunks"]).toBe("4");
      expect(res.headers["x-compressed"]).toBe("true");
      expect(res.headers["x-chunk-hash"]).toBe(hash(res.rawPayload));
      expect(res.headers["x-chunk-size"]).toBe(String(res.rawPayload.length));

      const plain = Buffer.from(decompress(res.rawPayload));
      expect(plain.equals(text.subarray(CHUNK, 2 * CHUNK))).toBe(true);
    });

    it("serves the raw bytes of the last chunk", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/chunk",
        query: { path: "docs/notes.txt", chunk_id: "3", compress: "false" },
      });

      expect(res.headers["x-compressed"]).toBe("false");
      expect(res.rawPayload.length).toBe(43_392);
      expect(res.rawPayload.equals(text.subarray(3 * CHUNK))).toBe(true);
    });

    it("compresses a requested chunk without consulting the advisor", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/chunk",
        query: { path: "noise.bin", chunk_id: "0" },
      });

      expect(res.headers["x-compressed"]).toBe("true");
      expect(Buffer.from(decompress(res.rawPayload)).equals(noise.subarray(0, CHUNK))).toBe(true);
    });

    it("returns 416 past the last chunk", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/chunk",
        query: { path: "docs/notes.txt", chunk_id: "4" },
      });

      expect(res.statusCode).toBe(416);
      expect(res.json().error.code).toBe("CHUNK_OUT_OF_RANGE");
    });

    it("rejects a malformed chunk id", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/chunk",
        query: { path: "docs/notes.txt", chunk_id: "-1" },
      });

      expect(res.statusCode).toBe(400);
    });
  });

  describe("GET /v1/files/download", () => {
    it("streams the file as is by default", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/download",
        query: { path: "docs/notes.txt" },
      });

      expect(res.statusCode).toBe(200);
      expect(res.headers["x-compressed"]).toBe("false");
      expect(res.headers["content-disposition"]).toBe(
        "attachment; filename*=UTF-8''notes.txt"
      );
      expect(res.rawPayload.equals(text)).toBe(true);
    });

    it("sends gzip when asked and worthwhile", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/download",
        query: { path: "docs/notes.txt", compress: "true" },
      });

      expect(res.headers["content-type"]).toBe("application/gzip");
      expect(res.headers["x-compressed"]).toBe("true");
      expect(res.headers["content-disposition"]).toBe(
        "attachment; filename*=UTF-8''notes.txt.gz"
      );
      expect(Buffer.from(decompress(res.rawPayload)).equals(text)).toBe(true);
    });

    it("ignores the compression request for incompressible data", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/v1/files/download",
        query: { path: "noise.bin", compress: "true" },
      });

      expect(res.headers["x-compressed"]).toBe("false");
      expect(res.rawPayload.equals(noise)).toBe(true);
    });
  });
});
