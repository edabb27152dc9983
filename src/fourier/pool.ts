/**
 * Bounded task pool with index-addressed result slots.
 *
 * Tasks share the single JavaScript thread: the pool interleaves them on the
 * event loop and gives no CPU parallelism.
 *
 * At most `poolSize` tasks are in flight. Each task starts on its own
 * macrotask so long runs yield to the event loop between harmonics; results
 * are written to the slot of the task's index, so completion order never
 * affects the output order.
 */

import { setImmediate as nextMacrotask } from "node:timers/promises";

export type PoolTask<T> = (index: number) => T | Promise<T>;

export async function runPool<T>(count: number, poolSize: number, task: PoolTask<T>): Promise<T[]> {
  const slots = new Array<T>(count);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < count) {
      const index = next++;
      await nextMacrotask();
      slots[index] = await task(index);
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(1, poolSize), count) }, () => worker());
  await Promise.all(workers);
  return slots;
}

/** The same contract as runPool, run inline */
export function runSerial<T>(count: number, task: (index: number) => T): T[] {
  const slots = new Array<T>(count);
  for (let i = 0; i < count; i++) {
    slots[i] = task(i);
  }
  return slots;
}
