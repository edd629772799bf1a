// src/routes/health.ts

import type { FastifyInstance } from "fastify";
import type { UploadSessionStore } from "../services/upload/upload.session.js";

export interface HealthRouteOptions {
  store: UploadSessionStore;
}

export default async function healthRoute(
  app: FastifyInstance,
  opts: HealthRouteOptions
) {
  app.get("/health", async () => {
    return {
      status: "UP",
      service: "chunkline-api-v1",
      active_uploads: opts.store.size,
      timestamp: new Date().toISOString(),
    };
  });
}
