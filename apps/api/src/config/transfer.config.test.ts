import { describe, it, expect } from "vitest";

import { loadTransferConfig } from "./transfer.config.js";

describe("loadTransferConfig", () => {
  it("applies defaults", () => {
    const config = loadTransferConfig({ TRANSFER_ROOT_DIR: "/srv/transfer" });

    expect(config).toEqual({
      rootDir: "/srv/transfer",
      host: "0.0.0.0",
      port: 3000,
      logLevel: "debug",
      chunkSizeBytes: 1024 * 1024,
      maxChunkBytes: 20 * 1024 * 1024,
      compressionLevel: 6,
      maxParallelChunks: 4,
      maxTotalChunks: 100_000,
      sessionTtlMs: 3_600_000,
      sweepIntervalMs: 60_000,
      maxActiveUploads: 100,
    });
  });

  it("reads overrides", () => {
    const config = loadTransferConfig({
      TRANSFER_ROOT_DIR: "/srv/transfer/",
      PORT: "8080",
      COMPRESSION_LEVEL: "0",
      CHUNK_SIZE_BYTES: "4096",
      MAX_TOTAL_CHUNKS: "50",
      NODE_ENV: "production",
    });

    expect(config).toMatchObject({
      rootDir: "/srv/transfer",
      port: 8080,
      compressionLevel: 0,
      chunkSizeBytes: 4096,
      maxTotalChunks: 50,
      logLevel: "info",
    });
  });

  it("requires an absolute root directory", () => {
    expect(() => loadTransferConfig({})).toThrow("Missing required env: TRANSFER_ROOT_DIR");
    expect(() => loadTransferConfig({ TRANSFER_ROOT_DIR: "data" })).toThrow(
      "TRANSFER_ROOT_DIR must be an absolute path"
    );
    expect(() => loadTransferConfig({ TRANSFER_ROOT_DIR: "/" })).toThrow("unsafe");
  });

  it("rejects invalid numbers", () => {
    const base = { TRANSFER_ROOT_DIR: "/srv/transfer" };

    expect(() => loadTransferConfig({ ...base, PORT: "abc" })).toThrow("PORT must be an integer >= 1");
    expect(() => loadTransferConfig({ ...base, COMPRESSION_LEVEL: "10" })).toThrow(
      "COMPRESSION_LEVEL must be an integer between 0 and 9"
    );
    expect(() =>
      loadTransferConfig({ ...base, CHUNK_SIZE_BYTES: "2048", MAX_CHUNK_BYTES: "1024" })
    ).toThrow("CHUNK_SIZE_BYTES must not exceed MAX_CHUNK_BYTES");
  });
});
