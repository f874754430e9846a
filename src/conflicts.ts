/**
 * @fileoverview Record-Level Conflict Resolution
 *
 * A conflict occurs when the remote rejects a write because its canonical
 * version moved past the precondition this device sent, or when a pull
 * delivers a remote version for a record that still has a pending local
 * change.
 *
 * Records are resolved as a whole with **last-writer-wins**:
 *   1. The version with the later `updatedAt` wins.
 *   2. On identical timestamps, the version written by the
 *      lexicographically lower device id wins.
 *   3. If the device ids are also equal, the remote version wins.
 *
 * Every device evaluates the same comparison from its own side, so two
 * devices resolving the same pair of versions in any order agree on the
 * winner without coordinating.
 *
 * Each resolution is appended to the `conflictHistory` table for review.
 *
 * @see {@link engine.ts} which applies the decision to the local record and outbox
 */

import type Dexie from 'dexie';
import { conflictHistoryTable } from './database';
import { debugError, debugLog } from './debug';
import type { CollectionName, ConflictHistoryEntry } from './types';

// =============================================================================
// Types
// =============================================================================

/** The two properties of a version that decide a conflict. */
export interface VersionStamp {
  updatedAt: string;
  deviceId: string;
}

export interface ConflictDecision {
  winner: 'local' | 'remote';
  reason: ConflictHistoryEntry['reason'];
}

/**
 * Payload of the `conflictResolved` event and source of a history row.
 */
export interface ConflictResolution extends ConflictDecision {
  collection: CollectionName;
  recordId: string;
  local: VersionStamp;
  remote: VersionStamp;
  origin: 'push' | 'pull';
  timestamp: string;
}

/** Conflict history rows older than this are removed by {@link cleanupConflictHistory}. */
export const CONFLICT_HISTORY_MAX_AGE_MS = 30 * 24 * 60 * 60 * 1000;

// =============================================================================
// Resolution
// =============================================================================

/**
 * Decide which of two versions of the same record survives.
 *
 * @example
 * resolveRecordConflict(
 *   { updatedAt: '2026-01-01T00:00:00.000Z', deviceId: 'device-b' },
 *   { updatedAt: '2026-01-01T00:00:00.000Z', deviceId: 'device-a' }
 * );
 * // { winner: 'remote', reason: 'device_tiebreak' }
 */
export function resolveRecordConflict(local: VersionStamp, remote: VersionStamp): ConflictDecision {
  const localTime = Date.parse(local.updatedAt);
  const remoteTime = Date.parse(remote.updatedAt);

  if (localTime > remoteTime) return { winner: 'local', reason: 'newer' };
  if (remoteTime > localTime) return { winner: 'remote', reason: 'newer' };

  if (local.deviceId < remote.deviceId) return { winner: 'local', reason: 'device_tiebreak' };
  if (remote.deviceId < local.deviceId) return { winner: 'remote', reason: 'device_tiebreak' };

  return { winner: 'remote', reason: 'remote_default' };
}

// =============================================================================
// History
// =============================================================================

/**
 * Append a resolution to the `conflictHistory` table.
 *
 * Failures are logged only; the resolution has already been applied.
 */
export async function storeConflictHistory(db: Dexie, resolution: ConflictResolution): Promise<void> {
  const entry: ConflictHistoryEntry = {
    collection: resolution.collection,
    recordId: resolution.recordId,
    localUpdatedAt: resolution.local.updatedAt,
    remoteUpdatedAt: resolution.remote.updatedAt,
    localDeviceId: resolution.local.deviceId,
    remoteDeviceId: resolution.remote.deviceId,
    winner: resolution.winner,
    reason: resolution.reason,
    origin: resolution.origin,
    timestamp: resolution.timestamp
  };

  try {
    await conflictHistoryTable(db).add(entry);
  } catch (error) {
    debugError('[CONFLICT] Failed to store conflict history:', error);
  }
}

export async function getConflictHistory(db: Dexie, recordId?: string): Promise<ConflictHistoryEntry[]> {
  const table = conflictHistoryTable(db);
  const rows = recordId ? await table.where('recordId').equals(recordId).toArray() : await table.toArray();
  return rows.sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));
}

/**
 * Delete history rows older than {@link CONFLICT_HISTORY_MAX_AGE_MS}.
 *
 * @returns Number of rows removed.
 */
export async function cleanupConflictHistory(db: Dexie, nowMs: number = Date.now()): Promise<number> {
  const cutoff = new Date(nowMs - CONFLICT_HISTORY_MAX_AGE_MS).toISOString();
  const removed = await conflictHistoryTable(db).where('timestamp').below(cutoff).delete();
  if (removed > 0) {
    debugLog(`[CONFLICT] Cleaned up ${removed} old conflict history entries`);
  }
  return removed;
}
