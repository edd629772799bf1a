// src/state/gc/upload.gc.scheduler.ts

import type { FastifyBaseLogger } from "fastify";
import type { UploadSessionStore } from "../../services/upload/upload.session.js";

/**
 * Periodically expires idle upload sessions. Bound to the process lifetime:
 * started after the server is built, stopped during shutdown.
 */
export class UploadGcScheduler {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: UploadSessionStore,
    private readonly log: FastifyBaseLogger,
    private readonly intervalMs: number
  ) {}

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    this.log.info({ intervalMs: this.intervalMs }, "Upload GC started");

    this.timer = setInterval(() => this.runOnce(), this.intervalMs);
    this.timer.unref();
  }

  runOnce(): string[] {
    try {
      return this.store.expireSweep();
    } catch (err) {
      this.log.error(err, "Upload GC failed");
      return [];
    }
  }

  stop(): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    this.log.info("Upload GC stopped");
  }
}
