// src/client/task.group.ts

import PQueue from "p-queue";

/**
 * Runs `worker` over `items` with at most `concurrency` in flight.
 *
 * The first failure stops the group: queued items are dropped, tasks already
 * running are allowed to settle, then that first error is rethrown. Resolves
 * only once nothing is running.
 */
export async function runTaskGroup<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError("concurrency must be a positive integer");
  }

  const queue = new PQueue({ concurrency });
  const failures: unknown[] = [];

  for (const item of items) {
    void queue.add(async () => {
      if (failures.length > 0) return;

      try {
        await worker(item);
      } catch (error) {
        failures.push(error);
        queue.clear();
      }
    });
  }

  await queue.onIdle();

  if (failures.length > 0) {
    throw failures[0];
  }
}
