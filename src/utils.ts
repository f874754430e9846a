/**
 * Common utility functions for the sync engine and its consumers.
 */

import { createHash, randomUUID } from 'node:crypto';

/**
 * Generate a UUID v4 (random UUID).
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Get the current timestamp as an ISO string.
 */
export function now(clock: () => number = Date.now): string {
  return new Date(clock()).toISOString();
}

/**
 * Timestamp for a new version of a record: the clock reading, or one
 * millisecond past the previous version when the clock has not moved
 * forward (or has moved backwards).
 */
export function nextTimestamp(previous: string | null, clock: () => number = Date.now): string {
  const current = clock();
  if (previous === null) return new Date(current).toISOString();
  const floor = Date.parse(previous) + 1;
  return new Date(Math.max(current, floor)).toISOString();
}

/**
 * SHA-256 hex digest over the JSON encoding of `parts`.
 */
export function contentFingerprint(...parts: unknown[]): string {
  return createHash('sha256').update(JSON.stringify(parts)).digest('hex');
}

/**
 * Race a promise against a deadline.
 *
 * @throws {Error} `"<label> timed out after <n>s"` when the deadline passes first.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${Math.round(ms / 1000)}s`));
    }, ms);
    promise.then(
      (val) => { clearTimeout(timer); resolve(val); },
      (err) => { clearTimeout(timer); reject(err); }
    );
  });
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Stops taking new items once `signal` is aborted; calls already started
 * run to completion. Worker errors propagate after in-flight calls settle.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let next = 0;
  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, async () => {
    while (next < items.length && !signal?.aborted) {
      const item = items[next++];
      await worker(item);
    }
  });
  const results = await Promise.allSettled(lanes);
  const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
  if (failure) throw failure.reason;
}

/**
 * Calculate new order value when moving an item to a new position.
 * Uses fractional ordering to minimize updates.
 *
 * @param items - The sorted array of items with order property
 * @param fromIndex - Current index of the item being moved
 * @param toIndex - Target index where the item should be placed
 * @returns The new order value for the moved item
 */
export function calculateNewOrder<T extends { order: number }>(
  items: T[],
  fromIndex: number,
  toIndex: number
): number {
  if (fromIndex === toIndex) {
    return items[fromIndex].order;
  }

  if (toIndex === 0) {
    return items[0].order - 1;
  }

  if (toIndex === items.length - 1) {
    return items[items.length - 1].order + 1;
  }

  // Account for the shift that happens when removing the item from its original position
  const prevIndex = fromIndex < toIndex ? toIndex : toIndex - 1;
  const nextIndex = fromIndex < toIndex ? toIndex + 1 : toIndex;

  return (items[prevIndex].order + items[nextIndex].order) / 2;
}
