// src/app.ts

import Fastify, { type FastifyServerOptions } from "fastify";
import multipart from "@fastify/multipart";

import type { TransferConfig } from "./config/transfer.config.js";
import filesRoutes from "./routes/files.routes.js";
import healthRoute from "./routes/health.js";
import uploadRoutes from "./routes/uploads.routes.js";
import { UploadSessionStore } from "./services/upload/upload.session.js";
import { sendApiError } from "./utils/apiError.js";
import { TransferError } from "./utils/errors.js";

export interface BuildAppOptions {
  config: TransferConfig;
  /** Defaults to a fresh store built from `config`. */
  store?: UploadSessionStore;
  logger?: FastifyServerOptions["logger"];
}

function hasStatusCode(err: unknown): err is { statusCode: number } {
  return (
    typeof err === "object" &&
    err !== null &&
    "statusCode" in err &&
    typeof err.statusCode === "number" &&
    Number.isInteger(err.statusCode)
  );
}

export async function buildApp(options: BuildAppOptions) {
  const { config } = options;

  const app = Fastify({
    logger: options.logger ?? {
      level: config.logLevel,
      redact: {
        paths: ["req.headers.authorization"],
        remove: true,
      },
    },
    // Requests should be chunk-sized (multipart) or small JSON.
    bodyLimit: config.maxChunkBytes + 1024 * 1024,
  });

  const store =
    options.store ??
    new UploadSessionStore({
      sessionTtlMs: config.sessionTtlMs,
      maxActiveUploads: config.maxActiveUploads,
      log: app.log,
    });

  await app.register(multipart, {
    attachFieldsToBody: false,
    throwFileSizeLimit: false,
    limits: {
      // One chunk per request.
      fileSize: config.maxChunkBytes,
      files: 1,
    },
  });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof TransferError) {
      const level = err.statusCode >= 500 ? "error" : "warn";
      req.log[level]({ err, url: req.url, method: req.method }, "Request failed");

      return sendApiError(reply, err.statusCode, err.code, err.message, {
        retryable: err.retryable,
        details: err.details,
      });
    }

    const statusCode = hasStatusCode(err) ? err.statusCode : 500;

    req.log.error(
      { err, url: req.url, method: req.method, requestId: req.id },
      "Request error"
    );

    return sendApiError(
      reply,
      statusCode,
      statusCode < 500 ? "INVALID_REQUEST" : "INTERNAL_ERROR",
      statusCode < 500 ? err.message : "Unexpected server error"
    );
  });

  await app.register(uploadRoutes, { config, store });
  await app.register(filesRoutes, { config });
  await app.register(healthRoute, { store });

  return { app, store };
}
