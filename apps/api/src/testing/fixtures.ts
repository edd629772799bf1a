// src/testing/fixtures.ts

import type { FastifyInstance } from "fastify";
import fs from "fs/promises";
import os from "os";
import path from "path";

import type { FetchFn } from "../client/transfer.client.js";
import type { TransferConfig } from "../config/transfer.config.js";

export async function makeTempDir(prefix = "chunkline-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(
  rootDir: string,
  overrides: Partial<TransferConfig> = {}
): TransferConfig {
  return {
    rootDir,
    host: "127.0.0.1",
    port: 0,
    logLevel: "silent",
    chunkSizeBytes: 64 * 1024,
    maxChunkBytes: 1024 * 1024,
    compressionLevel: 6,
    maxParallelChunks: 4,
    maxTotalChunks: 1_000,
    sessionTtlMs: 60_000,
    sweepIntervalMs: 1_000,
    maxActiveUploads: 10,
    ...overrides,
  };
}

/**
 * Serializes form data the way fetch would, for use with `app.inject`.
 */
export async function multipartPayload(
  fields: Record<string, string>,
  file?: { name: string; data: Uint8Array }
): Promise<{ payload: Buffer; headers: Record<string, string> }> {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    form.append(name, value);
  }
  if (file) {
    form.append(file.name, new Blob([new Uint8Array(file.data)]), "chunk.bin");
  }

  const req = new Request("http://localhost/", { method: "POST", body: form });
  const contentType = req.headers.get("content-type");
  if (!contentType) {
    throw new Error("FormData request has no content-type");
  }

  return {
    payload: Buffer.from(await req.arrayBuffer()),
    headers: { "content-type": contentType },
  };
}

function injectMethod(method: string): "GET" | "POST" {
  if (method === "GET" || method === "POST") return method;
  throw new Error(`Unsupported method in test fetch: ${method}`);
}

/**
 * A fetch implementation that routes requests into `app.inject`, so the
 * client and server run in the same process without a socket.
 */
export function injectFetch(app: FastifyInstance): FetchFn {
  return async (input, init) => {
    const req = new Request(input, init);
    const url = new URL(req.url);

    const headers: Record<string, string> = {};
    req.headers.forEach((value, key) => {
      headers[key] = value;
    });

    const res = await app.inject({
      method: injectMethod(req.method),
      url: `${url.pathname}${url.search}`,
      headers,
      ...(req.body && { payload: Buffer.from(await req.arrayBuffer()) }),
    });

    const responseHeaders = new Headers();
    for (const [key, value] of Object.entries(res.headers)) {
      if (value === undefined) continue;
      if (Array.isArray(value)) {
        for (const v of value) responseHeaders.append(key, v);
      } else {
        responseHeaders.set(key, String(value));
      }
    }

    return new Response(new Uint8Array(res.rawPayload), {
      status: res.statusCode,
      headers: responseHeaders,
    });
  };
}
