import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import Fastify from "fastify";

import { UploadGcScheduler } from "./upload.gc.scheduler.js";
import { UploadSessionStore } from "../../services/upload/upload.session.js";

describe("UploadGcScheduler", () => {
  const log = Fastify({ logger: false }).log;
  let store: UploadSessionStore;
  let gc: UploadGcScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    store = new UploadSessionStore({ sessionTtlMs: 5_000 });
    gc = new UploadGcScheduler(store, log, 1_000);
  });

  afterEach(() => {
    gc.stop();
    vi.useRealTimers();
  });

  it("expires idle sessions on its interval", () => {
    store.create({ id: "s1", filename: "a", totalChunks: 1, compressed: false });
    gc.start();

    vi.advanceTimersByTime(5_000);
    expect(store.get("s1")).not.toBeNull();

    vi.advanceTimersByTime(1_000);
    expect(store.get("s1")).toBeNull();
  });

  it("stops sweeping once stopped", () => {
    gc.start();
    gc.stop();
    expect(gc.isRunning).toBe(false);

    store.create({ id: "s1", filename: "a", totalChunks: 1, compressed: false });
    vi.advanceTimersByTime(60_000);
    expect(store.get("s1")).not.toBeNull();
  });

  it("does not schedule twice", () => {
    gc.start();
    gc.start();
    expect(vi.getTimerCount()).toBe(1);
  });

  it("sweeps on demand", () => {
    store.create({ id: "s1", filename: "a", totalChunks: 1, compressed: false });
    vi.setSystemTime(5_001);
    expect(gc.runOnce()).toEqual(["s1"]);
  });
});
