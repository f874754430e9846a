/**
 * @fileoverview Outbox Queue & Coalescing
 *
 * Every local mutation of a synced record is mirrored by an entry in the
 * `outbox` table (Dexie), written in the same transaction as the record
 * itself. The sync engine drains the outbox into remote calls.
 *
 * ## One Entry Per Record
 *
 * The queue stores **state snapshots**, not field intents. A new mutation of
 * a record that already has an entry is folded into that entry instead of
 * appending a second one, so same-record operations can never be reordered
 * or sent twice:
 *
 *   | existing | new    | result                                              |
 *   |----------|--------|-----------------------------------------------------|
 *   | create   | update | create with the new snapshot                        |
 *   | create   | delete | entry removed, unless it was ever sent (then delete)|
 *   | update   | update | update with the new snapshot                        |
 *   | update   | delete | delete                                              |
 *   | delete   | create | update (record re-created under the same id)        |
 *
 * A coalesced entry keeps its original `createdAt`, gets a fresh attempt
 * budget, becomes eligible immediately and bumps `revision` so a drain that
 * sent the previous snapshot can tell its result is stale.
 *
 * ## Retry & Backoff
 *
 * Failed entries wait `min(base * 2^(attempt-1), max)` before they are handed
 * out again. After `maxAttempts` (or a permanent rejection) the entry is
 * parked in state `'failed'` until {@link Outbox.requeue}.
 *
 * ## Capacity
 *
 * The queue is bounded. An enqueue that would add a new entry to a full
 * queue throws {@link OutboxCapacityError}, which aborts the surrounding
 * transaction and therefore the local mutation.
 */

import type Dexie from 'dexie';
import { OUTBOX_TABLE, outboxTable } from './database';
import { debugLog, debugWarn } from './debug';
import { OutboxCapacityError } from './errors';
import type { ResolvedConfig } from './config';
import type { CollectionName, OutboxEntry, OutboxOperation } from './types';
import { generateId } from './utils';

// =============================================================================
// Types
// =============================================================================

export interface EnqueueInput {
  collection: CollectionName;
  recordId: string;
  operation: OutboxOperation;
  payload: unknown;
  updatedAt: string;
  baseUpdatedAt: string | null;
  large: boolean;
}

/** What {@link Outbox.enqueue} did with the mutation. */
export type EnqueueOutcome = 'added' | 'coalesced' | 'cancelled';

/** What {@link Outbox.recordFailure} did with the entry. */
export type FailureOutcome = 'scheduled' | 'exhausted' | 'superseded';

export type OutboxConfig = Pick<
  ResolvedConfig,
  'outboxCapacity' | 'maxAttempts' | 'baseBackoffMs' | 'maxBackoffMs' | 'clock'
>;

// =============================================================================
// Pure Helpers
// =============================================================================

export function toRecordKey(collection: CollectionName, recordId: string): string {
  return `${collection}/${recordId}`;
}

/**
 * Delay before attempt number `attempt + 1`, given `attempt` failures so far.
 */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * Math.pow(2, Math.max(attempt - 1, 0)), maxMs);
}

/**
 * Fold a new mutation into the existing entry for the same record.
 *
 * @param inFlight - Whether a drain is currently sending `existing`.
 * @returns The merged entry, or `null` when both cancel out.
 */
export function coalesceEntry(
  existing: OutboxEntry,
  input: EnqueueInput,
  nowMs: number,
  inFlight: boolean
): OutboxEntry | null {
  let operation: OutboxOperation;

  if (input.operation === 'delete') {
    /* Born and died offline: the remote never heard of it. */
    if (existing.operation === 'create' && !existing.dispatched && !inFlight) return null;
    operation = 'delete';
  } else if (existing.operation === 'delete') {
    operation = 'update';
  } else if (existing.operation === 'create') {
    operation = 'create';
  } else {
    operation = 'update';
  }

  return {
    ...existing,
    operation,
    payloadSnapshot: input.payload,
    snapshotUpdatedAt: input.updatedAt,
    large: input.large,
    attemptCount: 0,
    lastError: null,
    nextAttemptAt: nowMs,
    revision: existing.revision + 1,
    state: 'queued'
  };
}

function byCreatedAt(a: OutboxEntry, b: OutboxEntry): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

// =============================================================================
// Outbox
// =============================================================================

export class Outbox {
  private readonly db: Dexie;
  private readonly config: OutboxConfig;
  /** Record keys a drain is currently sending. Not persisted. */
  private readonly inFlight = new Set<string>();

  constructor(db: Dexie, config: OutboxConfig) {
    this.db = db;
    this.config = config;
  }

  /**
   * Add or coalesce the entry for a mutated record.
   *
   * Joins the caller's transaction when one is active (it must include the
   * outbox table), so the entry commits or rolls back with the mutation.
   *
   * @throws {OutboxCapacityError} When a new entry would exceed capacity.
   */
  async enqueue(input: EnqueueInput): Promise<EnqueueOutcome> {
    return this.db.transaction('rw', OUTBOX_TABLE, async () => {
      const table = outboxTable(this.db);
      const recordKey = toRecordKey(input.collection, input.recordId);
      const nowMs = this.config.clock();
      const existing = await table.where('recordKey').equals(recordKey).first();

      if (existing) {
        const merged = coalesceEntry(existing, input, nowMs, this.inFlight.has(recordKey));
        if (merged === null) {
          await table.delete(existing.id);
          debugLog(`[QUEUE] ${recordKey}: create + delete cancelled out`);
          return 'cancelled';
        }
        await table.put(merged);
        debugLog(`[QUEUE] ${recordKey}: ${existing.operation} + ${input.operation} -> ${merged.operation} (rev ${merged.revision})`);
        return 'coalesced';
      }

      const count = await table.count();
      if (count >= this.config.outboxCapacity) {
        debugWarn(`[QUEUE] Rejecting ${recordKey}: outbox full (${count})`);
        throw new OutboxCapacityError(this.config.outboxCapacity);
      }

      await table.add({
        id: generateId(),
        recordKey,
        collection: input.collection,
        recordId: input.recordId,
        operation: input.operation,
        payloadSnapshot: input.payload,
        snapshotUpdatedAt: input.updatedAt,
        baseUpdatedAt: input.baseUpdatedAt,
        createdAt: new Date(nowMs).toISOString(),
        attemptCount: 0,
        lastError: null,
        nextAttemptAt: nowMs,
        revision: 0,
        dispatched: false,
        large: input.large,
        state: 'queued'
      });
      return 'added';
    });
  }

  /**
   * Entries ready to send, oldest first: queued, past their backoff, not
   * already in flight, and (unless `allowLarge`) not needing a full
   * connection.
   */
  async getEligible(
    limit: number,
    options: { allowLarge: boolean; exclude?: ReadonlySet<string> }
  ): Promise<OutboxEntry[]> {
    const nowMs = this.config.clock();
    const queued = await outboxTable(this.db).where('state').equals('queued').toArray();
    return queued
      .filter(
        (entry) =>
          entry.nextAttemptAt <= nowMs &&
          (options.allowLarge || !entry.large) &&
          !this.inFlight.has(entry.recordKey) &&
          !options.exclude?.has(entry.recordKey)
      )
      .sort(byCreatedAt)
      .slice(0, limit);
  }

  async get(collection: CollectionName, recordId: string): Promise<OutboxEntry | undefined> {
    return outboxTable(this.db).where('recordKey').equals(toRecordKey(collection, recordId)).first();
  }

  async count(): Promise<number> {
    return outboxTable(this.db).count();
  }

  async listFailed(): Promise<OutboxEntry[]> {
    const failed = await outboxTable(this.db).where('state').equals('failed').toArray();
    return failed.sort(byCreatedAt);
  }

  /**
   * Earliest `nextAttemptAt` in the future among queued entries, or `null`
   * when nothing is waiting on a backoff timer.
   */
  async nextRetryAt(): Promise<number | null> {
    const nowMs = this.config.clock();
    const queued = await outboxTable(this.db).where('state').equals('queued').toArray();
    let earliest: number | null = null;
    for (const entry of queued) {
      if (entry.nextAttemptAt > nowMs && (earliest === null || entry.nextAttemptAt < earliest)) {
        earliest = entry.nextAttemptAt;
      }
    }
    return earliest;
  }

  // ---------------------------------------------------------------------------
  // Drain bookkeeping
  // ---------------------------------------------------------------------------

  /**
   * Claim an entry for sending. Re-reads it inside a transaction so a
   * mutation that cancelled or coalesced it since {@link getEligible} is
   * seen; marks it in flight and persists `dispatched`.
   *
   * @returns The current version of the entry, or `undefined` when it is
   *          gone or no longer queued.
   */
  async claim(entry: OutboxEntry): Promise<OutboxEntry | undefined> {
    return this.db.transaction('rw', OUTBOX_TABLE, async () => {
      const table = outboxTable(this.db);
      const current = await table.get(entry.id);
      if (!current || current.state !== 'queued' || this.inFlight.has(current.recordKey)) {
        return undefined;
      }
      this.inFlight.add(current.recordKey);
      if (!current.dispatched) {
        await table.update(current.id, { dispatched: true });
      }
      return { ...current, dispatched: true };
    });
  }

  clearInFlight(recordKey: string): void {
    this.inFlight.delete(recordKey);
  }

  isInFlight(recordKey: string): boolean {
    return this.inFlight.has(recordKey);
  }

  /**
   * Record a failed send of `entry`. No-op (`'superseded'`) when the entry
   * was coalesced or removed while in flight: the newer snapshot keeps its
   * fresh attempt budget.
   */
  async recordFailure(entry: OutboxEntry, message: string, retryable: boolean): Promise<FailureOutcome> {
    return this.db.transaction('rw', OUTBOX_TABLE, async () => {
      const table = outboxTable(this.db);
      const current = await table.get(entry.id);
      if (!current || current.revision !== entry.revision) return 'superseded';

      const attemptCount = current.attemptCount + 1;
      if (!retryable || attemptCount >= this.config.maxAttempts) {
        await table.update(entry.id, { attemptCount, lastError: message, state: 'failed' });
        debugWarn(`[QUEUE] ${entry.recordKey} failed after ${attemptCount} attempt(s): ${message}`);
        return 'exhausted';
      }

      const delay = backoffDelay(attemptCount, this.config.baseBackoffMs, this.config.maxBackoffMs);
      await table.update(entry.id, {
        attemptCount,
        lastError: message,
        nextAttemptAt: this.config.clock() + delay
      });
      debugLog(`[QUEUE] ${entry.recordKey} retry ${attemptCount} in ${delay}ms`);
      return 'scheduled';
    });
  }

  /**
   * Put a parked (`'failed'`) entry back in the queue with a fresh attempt
   * budget.
   *
   * @returns The requeued entry, or `undefined` when there is nothing to retry.
   */
  async requeue(collection: CollectionName, recordId: string): Promise<OutboxEntry | undefined> {
    return this.db.transaction('rw', OUTBOX_TABLE, async () => {
      const table = outboxTable(this.db);
      const entry = await table.where('recordKey').equals(toRecordKey(collection, recordId)).first();
      if (!entry || entry.state !== 'failed') return undefined;
      const requeued: OutboxEntry = {
        ...entry,
        state: 'queued',
        attemptCount: 0,
        lastError: null,
        nextAttemptAt: this.config.clock()
      };
      await table.put(requeued);
      return requeued;
    });
  }
}
