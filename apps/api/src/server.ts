// src/server.ts

import fs from "fs/promises";
import path from "path";

import { buildApp } from "./app.js";
import { loadTransferConfig } from "./config/transfer.config.js";
import { UploadGcScheduler } from "./state/gc/upload.gc.scheduler.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled promise rejection:", reason);
});

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

const config = loadTransferConfig();
const { app, store } = await buildApp({ config });

async function validateRootDir() {
  const dir = config.rootDir;

  await fs.mkdir(dir, { recursive: true });

  // Verify we can write to the directory. This prevents starting with a
  // misconfigured path that will later fail during finalize.
  const probe = path.join(dir, `.chunkline_write_test_${process.pid}_${Date.now()}`);
  await fs.writeFile(probe, "ok");
  await fs.unlink(probe);
}

try {
  await validateRootDir();
  app.log.info({ rootDir: config.rootDir }, "Root directory ready");
} catch (err) {
  app.log.error(err, "Root directory is not usable");
  process.exit(1);
}

const gc = new UploadGcScheduler(store, app.log, config.sweepIntervalMs);
gc.start();

try {
  await app.listen({
    port: config.port,
    host: config.host,
  });

  app.log.info(
    { port: config.port, env: process.env.NODE_ENV ?? "development" },
    "API server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}

async function shutdown(signal: string) {
  app.log.info({ signal }, "Shutting down server");

  try {
    gc.stop();
    await app.close();
    process.exit(0);
  } catch (err) {
    app.log.error(err, "Shutdown failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
