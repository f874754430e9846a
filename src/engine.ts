/**
 * @fileoverview Sync Engine
 *
 * Drains the outbox into remote calls and applies the outcomes to local
 * records. One drain runs at a time per engine; a trigger that arrives
 * during a drain schedules one follow-up cycle instead of a second drain.
 *
 * ## Drain Cycle
 *
 *   1. Take up to `batchSize` eligible entries (oldest first).
 *   2. Send them through a pool of `concurrency` workers, each call bounded
 *      by `remoteTimeoutMs`.
 *   3. Classify every outcome:
 *      - **applied**   → entry removed, record `synced` (or, if the record
 *                        changed while in flight, only the precondition is
 *                        refreshed and the newer snapshot goes next).
 *      - **transient** → attempt counted, exponential backoff; at
 *                        `maxAttempts` the record becomes `failed`.
 *      - **permanent** → record `failed` immediately.
 *      - **conflict**  → last-writer-wins (see `conflicts.ts`).
 *   4. Repeat until nothing is eligible, the drain is cancelled, or the
 *      network becomes unreachable.
 *
 * ## Triggers
 *
 *   - reachability transition to a reachable state
 *   - debounced local writes ({@link SyncEngine.scheduleSyncPush})
 *   - the periodic interval (push + pull)
 *   - backoff timers for entries waiting to be retried
 *   - host activation (via the runtime)
 *
 * ## Pull
 *
 * {@link SyncEngine.pull} fetches remote changes after a per-collection
 * cursor stored in the `meta` table and applies them with the same
 * last-writer-wins policy. Drains and pulls share one lock so a pulled
 * version can never race an in-flight push of the same record.
 */

import type Dexie from 'dexie';
import type { ResolvedConfig } from './config';
import {
  resolveRecordConflict,
  storeConflictHistory,
  cleanupConflictHistory,
  type ConflictResolution,
  type VersionStamp
} from './conflicts';
import { OUTBOX_TABLE, outboxTable, readMeta, recordTable, writeMeta } from './database';
import { debugError, debugLog, debugWarn } from './debug';
import { ConflictError, extractErrorMessage, isTransientError } from './errors';
import type { DrainSummary, SyncEvents } from './events';
import type { Outbox } from './queue';
import { toRecordKey } from './queue';
import type { RemoteApi } from './remote';
import type { ReachabilityMonitor } from './stores/network';
import type { SyncStatusStore } from './stores/sync';
import type { LocalChange } from './syncingRepository';
import type {
  CollectionName,
  DrainTrigger,
  OutboxEntry,
  RemoteRecord,
  RemoteWriteRequest,
  RemoteWriteResult,
  SyncRecord,
  SyncState
} from './types';
import { now, runPool, withTimeout } from './utils';

// =============================================================================
// Types
// =============================================================================

export type EngineConfig = Pick<
  ResolvedConfig,
  | 'deviceId'
  | 'batchSize'
  | 'concurrency'
  | 'maxConflictRounds'
  | 'remoteTimeoutMs'
  | 'syncDebounceMs'
  | 'syncIntervalMs'
  | 'clock'
>;

export interface SyncEngineDeps {
  db: Dexie;
  outbox: Outbox;
  remote: RemoteApi;
  reachability: ReachabilityMonitor;
  events: SyncEvents;
  status: SyncStatusStore;
  collections: readonly CollectionName[];
  config: EngineConfig;
}

export interface PullSummary {
  applied: number;
  conflicts: number;
}

export interface SyncSummary {
  drain: DrainSummary;
  pull: PullSummary;
}

interface PulledOutcome {
  state: SyncState | 'deleted' | null;
  resolution: ConflictResolution | null;
}

type DrainCounts = Pick<DrainSummary, 'sent' | 'succeeded' | 'conflicts' | 'retried' | 'failed'>;

/** Rows fetched per pull request. */
const PULL_PAGE_SIZE = 500;

function pullCursorKey(collection: CollectionName): string {
  return `pullCursor:${collection}`;
}

function isCursor(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Whether a synced local record already holds `remote`: an older version,
 * or the same version echoed back.
 */
function isAcknowledged(local: SyncRecord<unknown>, remote: RemoteRecord): boolean {
  if (local.baseUpdatedAt === null) return false;
  const base = Date.parse(local.baseUpdatedAt);
  const incoming = Date.parse(remote.updatedAt);
  return base > incoming || (base === incoming && local.deviceId === remote.deviceId);
}

function stampOf(remote: RemoteRecord): VersionStamp {
  return { updatedAt: remote.updatedAt, deviceId: remote.deviceId };
}

// =============================================================================
// Engine
// =============================================================================

export class SyncEngine {
  private readonly db: Dexie;
  private readonly outbox: Outbox;
  private readonly remote: RemoteApi;
  private readonly reachability: ReachabilityMonitor;
  private readonly events: SyncEvents;
  private readonly status: SyncStatusStore;
  private readonly collections: readonly CollectionName[];
  private readonly config: EngineConfig;

  private running = false;
  private activeDrain: Promise<DrainSummary> | null = null;
  private rerunRequested = false;
  private abortController: AbortController | null = null;
  private lock: Promise<unknown> = Promise.resolve();

  private syncTimeout: ReturnType<typeof setTimeout> | null = null;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private intervalTimer: ReturnType<typeof setInterval> | null = null;
  private unsubscribeReachability: (() => void) | null = null;

  constructor(deps: SyncEngineDeps) {
    this.db = deps.db;
    this.outbox = deps.outbox;
    this.remote = deps.remote;
    this.reachability = deps.reachability;
    this.events = deps.events;
    this.status = deps.status;
    this.collections = deps.collections;
    this.config = deps.config;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start reacting to reachability transitions and run the periodic sync.
   * Idempotent.
   */
  start(): void {
    if (this.running) return;
    this.running = true;

    this.unsubscribeReachability = this.reachability.onTransition(async (current, previous) => {
      if (current === 'unreachable') {
        this.cancel();
        this.status.setStatus('offline');
        return;
      }
      // Newly reachable, or large payloads newly allowed
      if (previous === 'unreachable' || current === 'full') {
        await this.sync('reachable').catch((e) => debugError('[SYNC] Reconnect sync failed:', e));
      }
    });

    this.intervalTimer = setInterval(() => {
      if (!this.reachability.isReachable()) return;
      this.sync('interval').catch((e) => debugError('[SYNC] Interval sync failed:', e));
      cleanupConflictHistory(this.db, this.config.clock()).catch((e) =>
        debugError('[SYNC] Conflict history cleanup failed:', e)
      );
    }, this.config.syncIntervalMs);

    if (!this.reachability.isReachable()) this.status.setStatus('offline');
    debugLog(`[SYNC] Engine started (device ${this.config.deviceId})`);
  }

  /** Stop timers and listeners and cancel the running drain. */
  stop(): void {
    this.running = false;
    this.unsubscribeReachability?.();
    this.unsubscribeReachability = null;
    if (this.intervalTimer) clearInterval(this.intervalTimer);
    if (this.syncTimeout) clearTimeout(this.syncTimeout);
    if (this.retryTimer) clearTimeout(this.retryTimer);
    this.intervalTimer = null;
    this.syncTimeout = null;
    this.retryTimer = null;
    this.cancel();
  }

  /** Stop and wait for any running drain to settle. */
  async dispose(): Promise<void> {
    this.stop();
    await this.lock;
    this.status.reset();
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Cancel the running drain. Calls already sent complete (or time out) and
   * their outcomes are still applied; nothing new is sent.
   */
  cancel(): void {
    if (this.abortController) {
      debugLog('[SYNC] Cancelling drain');
      this.abortController.abort();
    }
  }

  // ---------------------------------------------------------------------------
  // Triggers
  // ---------------------------------------------------------------------------

  /**
   * Called by the sync decorator after a local mutation has committed.
   */
  notifyLocalChange(change: LocalChange): void {
    this.events.emit('recordSyncStateChanged', {
      collection: change.collection,
      recordId: change.recordId,
      syncState: change.operation === 'delete' ? 'deleted' : 'pending'
    });
    this.refreshCounts().catch((e) => debugError('[SYNC] Pending count refresh failed:', e));
    this.scheduleSyncPush();
  }

  /** Schedule a debounced drain after local writes. No-op while stopped. */
  scheduleSyncPush(): void {
    if (!this.running) return;
    if (this.syncTimeout) {
      clearTimeout(this.syncTimeout);
    }
    this.syncTimeout = setTimeout(() => {
      this.syncTimeout = null;
      this.drain('local_write').catch((e) => debugError('[SYNC] Push-triggered drain failed:', e));
    }, this.config.syncDebounceMs);
  }

  private async scheduleRetryTimer(): Promise<void> {
    if (!this.running) return;
    const at = await this.outbox.nextRetryAt();
    if (this.retryTimer) clearTimeout(this.retryTimer);
    this.retryTimer = null;
    if (at === null) return;

    const delay = Math.max(at - this.config.clock(), 0);
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.drain('retry').catch((e) => debugError('[SYNC] Retry drain failed:', e));
    }, delay);
    debugLog(`[SYNC] Next retry in ${delay}ms`);
  }

  // ---------------------------------------------------------------------------
  // Drain
  // ---------------------------------------------------------------------------

  /**
   * Push pending outbox entries to the remote.
   *
   * If a drain is already running, marks it for one more cycle and returns
   * its (extended) summary instead of starting a second drain.
   *
   * @throws {LocalStorageError} When applying an outcome fails locally.
   */
  drain(trigger: DrainTrigger = 'manual'): Promise<DrainSummary> {
    if (this.activeDrain) {
      this.rerunRequested = true;
      return this.activeDrain;
    }
    const run = this.runExclusive(() => this.runDrainCycles(trigger));
    this.activeDrain = run;
    const release = () => {
      if (this.activeDrain === run) this.activeDrain = null;
    };
    run.then(release, release);
    return run;
  }

  /** Drain, then pull remote changes. */
  async sync(trigger: DrainTrigger = 'manual'): Promise<SyncSummary> {
    const drain = await this.drain(trigger);
    let pull: PullSummary = { applied: 0, conflicts: 0 };
    try {
      pull = await this.pull();
    } catch (error) {
      if (!isTransientError(error)) throw error;
      debugWarn('[SYNC] Pull failed, will retry on next sync:', extractErrorMessage(error));
    }
    return { drain, pull };
  }

  private runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn, fn);
    this.lock = run.catch(() => undefined);
    return run;
  }

  private async runDrainCycles(trigger: DrainTrigger): Promise<DrainSummary> {
    const startedAt = Date.now();
    const summary: DrainSummary = {
      trigger,
      sent: 0,
      succeeded: 0,
      conflicts: 0,
      retried: 0,
      failed: 0,
      interrupted: false,
      remaining: 0,
      durationMs: 0
    };

    if (!this.reachability.isReachable()) {
      debugLog(`[SYNC] Drain (${trigger}) skipped: unreachable`);
      this.status.setStatus('offline');
      summary.remaining = await this.outbox.count();
      this.events.emit('drainCompleted', summary);
      return summary;
    }

    this.status.setStatus('syncing');
    try {
      do {
        this.rerunRequested = false;
        const interrupted = await this.drainOnce(summary);
        if (interrupted) {
          summary.interrupted = true;
          break;
        }
      } while (this.rerunRequested);

      summary.remaining = await this.outbox.count();
      summary.durationMs = Date.now() - startedAt;
      await this.refreshCounts();
      this.status.setStatus(this.reachability.isReachable() ? 'idle' : 'offline');
      this.status.setLastSyncTime(now(this.config.clock));
      debugLog(
        `[SYNC] Drain (${trigger}) done: sent=${summary.sent} ok=${summary.succeeded} ` +
          `conflicts=${summary.conflicts} retry=${summary.retried} failed=${summary.failed} ` +
          `remaining=${summary.remaining}${summary.interrupted ? ' (interrupted)' : ''}`
      );
      this.events.emit('drainCompleted', summary);
      await this.scheduleRetryTimer();
      return summary;
    } catch (error) {
      debugError(`[SYNC] Drain (${trigger}) failed:`, error);
      this.status.setStatus('error');
      this.status.setError('Sync failed', extractErrorMessage(error));
      this.events.emit('drainFailed', { trigger, error });
      throw error;
    }
  }

  /**
   * One pass over the outbox.
   *
   * @returns Whether the pass stopped early (cancelled or unreachable).
   */
  private async drainOnce(counts: DrainCounts): Promise<boolean> {
    const controller = new AbortController();
    this.abortController = controller;
    const rounds = new Map<string, number>();
    const exclude = new Set<string>();

    try {
      for (;;) {
        if (controller.signal.aborted || !this.reachability.isReachable()) return true;

        const batch = await this.outbox.getEligible(this.config.batchSize, {
          allowLarge: this.reachability.allowsLargePayloads(),
          exclude
        });
        if (batch.length === 0) return false;

        await runPool(
          batch,
          this.config.concurrency,
          (entry) => this.processEntry(entry, counts, rounds, exclude),
          controller.signal
        );
      }
    } finally {
      if (this.abortController === controller) this.abortController = null;
    }
  }

  private async processEntry(
    candidate: OutboxEntry,
    counts: DrainCounts,
    rounds: Map<string, number>,
    exclude: Set<string>
  ): Promise<void> {
    const entry = await this.outbox.claim(candidate);
    if (!entry) return;

    counts.sent++;
    try {
      let result: RemoteWriteResult;
      try {
        result = await withTimeout(
          this.send(entry),
          this.config.remoteTimeoutMs,
          `${entry.operation} ${entry.recordKey}`
        );
      } catch (error) {
        await this.handleFailure(entry, error, counts);
        return;
      }

      if (result.status === 'applied') {
        counts.succeeded++;
        await this.applySuccess(entry, result.record);
      } else {
        counts.conflicts++;
        await this.handleConflict(entry, result.record, rounds, exclude);
      }
    } finally {
      this.outbox.clearInFlight(entry.recordKey);
    }
  }

  private send(entry: OutboxEntry): Promise<RemoteWriteResult> {
    const request: RemoteWriteRequest = {
      id: entry.recordId,
      baseUpdatedAt: entry.baseUpdatedAt,
      updatedAt: entry.snapshotUpdatedAt,
      deviceId: this.config.deviceId,
      fields: entry.payloadSnapshot
    };
    return entry.operation === 'delete'
      ? this.remote.delete(entry.collection, request)
      : this.remote.upsert(entry.collection, request);
  }

  // ---------------------------------------------------------------------------
  // Outcomes
  // ---------------------------------------------------------------------------

  private async applySuccess(entry: OutboxEntry, canonical: RemoteRecord): Promise<void> {
    const synced = await this.db.transaction('rw', [entry.collection, OUTBOX_TABLE], async () => {
      const queue = outboxTable(this.db);
      const records = recordTable<unknown>(this.db, entry.collection);
      const current = await queue.get(entry.id);
      const record = await records.get(entry.recordId);

      if (current && current.revision !== entry.revision) {
        // Edited while in flight: the newer snapshot builds on this version
        await queue.update(current.id, { baseUpdatedAt: canonical.updatedAt });
        if (record) {
          await records.update(record.id, { remoteId: canonical.remoteId, baseUpdatedAt: canonical.updatedAt });
        }
        return false;
      }

      if (current) await queue.delete(current.id);
      if (record && entry.operation !== 'delete') {
        await records.put({
          ...record,
          remoteId: canonical.remoteId,
          baseUpdatedAt: canonical.updatedAt,
          syncState: 'synced'
        });
      }
      return entry.operation !== 'delete';
    });

    if (synced) this.emitState(entry.collection, entry.recordId, 'synced');
  }

  private async handleFailure(entry: OutboxEntry, error: unknown, counts: DrainCounts): Promise<void> {
    const retryable = isTransientError(error);
    const message = extractErrorMessage(error);
    const outcome = await this.outbox.recordFailure(entry, message, retryable);

    if (outcome === 'scheduled') {
      counts.retried++;
      debugWarn(`[SYNC] ${entry.recordKey} transient failure: ${message}`);
      return;
    }
    if (outcome === 'exhausted') {
      counts.failed++;
      debugError(`[SYNC] ${entry.recordKey} failed permanently: ${message}`);
      await this.setRecordState(entry.collection, entry.recordId, 'failed');
      this.status.addSyncError({
        collection: entry.collection,
        operation: entry.operation,
        recordId: entry.recordId,
        message,
        timestamp: now(this.config.clock)
      });
    }
  }

  private async handleConflict(
    entry: OutboxEntry,
    remote: RemoteRecord,
    rounds: Map<string, number>,
    exclude: Set<string>
  ): Promise<void> {
    await this.setRecordState(entry.collection, entry.recordId, 'conflict');

    const local: VersionStamp = { updatedAt: entry.snapshotUpdatedAt, deviceId: this.config.deviceId };
    const decision = resolveRecordConflict(local, stampOf(remote));
    const resolution: ConflictResolution = {
      ...decision,
      collection: entry.collection,
      recordId: entry.recordId,
      local,
      remote: stampOf(remote),
      origin: 'push',
      timestamp: now(this.config.clock)
    };
    debugLog(`[CONFLICT] ${entry.recordKey}: ${decision.winner} wins (${decision.reason})`);

    if (decision.winner === 'remote') {
      await this.applyRemoteWin(entry, remote);
    } else {
      await this.keepLocal(entry, remote);
      const round = (rounds.get(entry.recordKey) ?? 0) + 1;
      rounds.set(entry.recordKey, round);
      if (round >= this.config.maxConflictRounds) {
        const error = new ConflictError(entry.collection, entry.recordId);
        debugWarn(`[CONFLICT] ${error.message}; skipping for this drain after ${round} rounds`);
        exclude.add(entry.recordKey);
        this.status.addSyncError({
          collection: entry.collection,
          operation: entry.operation,
          recordId: entry.recordId,
          message: error.message,
          timestamp: now(this.config.clock)
        });
      }
    }

    await storeConflictHistory(this.db, resolution);
    this.events.emit('conflictResolved', resolution);
  }

  /** Remote version wins: overwrite (or delete) the local record, drop the entry. */
  private async applyRemoteWin(entry: OutboxEntry, remote: RemoteRecord): Promise<void> {
    const state = await this.db.transaction('rw', [entry.collection, OUTBOX_TABLE], async () => {
      const queue = outboxTable(this.db);
      const current = await queue.get(entry.id);

      if (current && current.revision !== entry.revision) {
        // A newer local edit was made while in flight; it competes next
        await queue.update(current.id, { baseUpdatedAt: remote.updatedAt });
        await recordTable<unknown>(this.db, entry.collection).update(entry.recordId, { syncState: 'pending' });
        return 'pending';
      }
      if (current) await queue.delete(current.id);
      return this.writeRemoteVersion(entry.collection, remote);
    });
    this.emitState(entry.collection, entry.recordId, state);
  }

  /** Local version wins: resubmit against the remote's current version. */
  private async keepLocal(entry: OutboxEntry, remote: RemoteRecord): Promise<void> {
    await this.db.transaction('rw', [entry.collection, OUTBOX_TABLE], async () => {
      const current = await outboxTable(this.db).get(entry.id);
      if (current) {
        await outboxTable(this.db).update(current.id, { baseUpdatedAt: remote.updatedAt });
      }
      await recordTable<unknown>(this.db, entry.collection).update(entry.recordId, {
        remoteId: remote.remoteId,
        syncState: 'pending'
      });
    });
    this.emitState(entry.collection, entry.recordId, 'pending');
  }

  /**
   * Replace the local record with the remote version. Must run inside a
   * transaction that includes the collection table.
   */
  private async writeRemoteVersion(
    collection: CollectionName,
    remote: RemoteRecord
  ): Promise<SyncState | 'deleted'> {
    const records = recordTable<unknown>(this.db, collection);
    const existing = await records.get(remote.localId);

    if (remote.deleted) {
      if (existing) await records.delete(remote.localId);
      return 'deleted';
    }

    const record: SyncRecord<unknown> = {
      id: remote.localId,
      remoteId: remote.remoteId,
      payload: remote.fields,
      createdAt: existing?.createdAt ?? remote.updatedAt,
      updatedAt: remote.updatedAt,
      syncState: 'synced',
      baseUpdatedAt: remote.updatedAt,
      deviceId: remote.deviceId
    };
    if (existing?.fingerprint) record.fingerprint = existing.fingerprint;
    await records.put(record);
    return 'synced';
  }

  private async setRecordState(collection: CollectionName, recordId: string, syncState: SyncState): Promise<void> {
    const changed = await recordTable<unknown>(this.db, collection).update(recordId, { syncState });
    if (changed > 0) this.emitState(collection, recordId, syncState);
  }

  private emitState(collection: CollectionName, recordId: string, syncState: SyncState | 'deleted'): void {
    this.events.emit('recordSyncStateChanged', { collection, recordId, syncState });
  }

  // ---------------------------------------------------------------------------
  // Pull
  // ---------------------------------------------------------------------------

  /**
   * Fetch and apply remote changes for every collection since the stored
   * cursors. No-op while unreachable.
   */
  pull(): Promise<PullSummary> {
    return this.runExclusive(async () => {
      const summary: PullSummary = { applied: 0, conflicts: 0 };
      if (!this.reachability.isReachable()) return summary;

      for (const collection of this.collections) {
        let cursor = await readMeta(this.db, pullCursorKey(collection), isCursor, 0);
        for (;;) {
          const changes = await withTimeout(
            this.remote.fetchChanges(collection, cursor, PULL_PAGE_SIZE),
            this.config.remoteTimeoutMs,
            `pull ${collection}`
          );
          for (const remote of changes) {
            const outcome = await this.applyPulled(collection, remote);
            if (outcome === 'applied') summary.applied++;
            if (outcome === 'conflict') summary.conflicts++;
            cursor = Math.max(cursor, remote.revision);
          }
          await writeMeta(this.db, pullCursorKey(collection), cursor);
          if (changes.length < PULL_PAGE_SIZE) break;
        }
      }

      if (summary.applied + summary.conflicts > 0) {
        debugLog(`[SYNC] Pulled ${summary.applied} change(s), ${summary.conflicts} conflict(s)`);
        await this.refreshCounts();
      }
      return summary;
    });
  }

  private async applyPulled(
    collection: CollectionName,
    remote: RemoteRecord
  ): Promise<'applied' | 'conflict' | 'skipped'> {
    const recordKey = toRecordKey(collection, remote.localId);

    const outcome = await this.db.transaction('rw', [collection, OUTBOX_TABLE], async (): Promise<PulledOutcome> => {
      const queue = outboxTable(this.db);
      const entry = await queue.where('recordKey').equals(recordKey).first();

      if (!entry) {
        const existing = await recordTable<unknown>(this.db, collection).get(remote.localId);
        if (!existing && remote.deleted) return { state: null, resolution: null };
        if (existing && isAcknowledged(existing, remote)) return { state: null, resolution: null };
        return { state: await this.writeRemoteVersion(collection, remote), resolution: null };
      }

      // The in-flight push will learn about this version from its response
      if (this.outbox.isInFlight(recordKey)) return { state: null, resolution: null };
      // The pending edit was already based on this version
      if (entry.baseUpdatedAt !== null && Date.parse(remote.updatedAt) <= Date.parse(entry.baseUpdatedAt)) {
        return { state: null, resolution: null };
      }

      const local: VersionStamp = { updatedAt: entry.snapshotUpdatedAt, deviceId: this.config.deviceId };
      const decision = resolveRecordConflict(local, stampOf(remote));
      const resolution: ConflictResolution = {
        ...decision,
        collection,
        recordId: remote.localId,
        local,
        remote: stampOf(remote),
        origin: 'pull',
        timestamp: now(this.config.clock)
      };

      if (decision.winner === 'remote') {
        await queue.delete(entry.id);
        return { state: await this.writeRemoteVersion(collection, remote), resolution };
      }
      await queue.update(entry.id, { baseUpdatedAt: remote.updatedAt });
      return { state: null, resolution };
    });

    if (outcome.state) this.emitState(collection, remote.localId, outcome.state);
    if (outcome.resolution) {
      await storeConflictHistory(this.db, outcome.resolution);
      this.events.emit('conflictResolved', outcome.resolution);
      return 'conflict';
    }
    return outcome.state ? 'applied' : 'skipped';
  }

  // ---------------------------------------------------------------------------
  // Manual Retry
  // ---------------------------------------------------------------------------

  /**
   * Re-enqueue a `failed` record with a fresh attempt budget.
   *
   * @returns Whether there was a failed entry to retry.
   */
  async retry(collection: CollectionName, recordId: string): Promise<boolean> {
    const entry = await this.outbox.requeue(collection, recordId);
    if (!entry) return false;
    debugLog(`[SYNC] Manual retry of ${entry.recordKey}`);
    const changed = await recordTable<unknown>(this.db, collection).update(recordId, { syncState: 'pending' });
    if (changed > 0) this.emitState(collection, recordId, 'pending');
    await this.refreshCounts();
    this.scheduleSyncPush();
    return true;
  }

  /** Retry every `failed` record. @returns How many were requeued. */
  async retryAllFailed(): Promise<number> {
    const failed = await this.outbox.listFailed();
    let count = 0;
    for (const entry of failed) {
      if (await this.retry(entry.collection, entry.recordId)) count++;
    }
    return count;
  }

  private async refreshCounts(): Promise<void> {
    const [pending, failed] = await Promise.all([this.outbox.count(), this.outbox.listFailed()]);
    this.status.setPendingCount(pending);
    this.status.setFailedCount(failed.length);
  }
}
