/**
 * @fileoverview Engine Configuration
 *
 * {@link SyncEngineConfig} is what hosts pass to
 * {@link runtime.ts#createSyncRuntime}. It describes:
 *   - Where the local database lives and which IndexedDB backend to use
 *   - How to reach the Supabase backend
 *   - Sync timing parameters (debounce, polling interval, backoff, deadlines)
 *   - Usage limits for the free tier
 *
 * There is no module-level config: {@link resolveConfig} fills in defaults
 * once and the resolved object is handed to every service that needs it.
 *
 * @see {@link runtime.ts} for the composition root that consumes this config
 */

import type { DexieOptions } from 'dexie';
import type { SupabaseClient } from '@supabase/supabase-js';
import { generateId } from './utils';
import type { CollectionName } from './types';

// =============================================================================
// Configuration Interfaces
// =============================================================================

/**
 * Top-level configuration for the sync runtime. Only `prefix` is required.
 *
 * @example
 * const runtime = await createSyncRuntime({
 *   config: {
 *     prefix: 'satchel',
 *     deviceId: 'laptop-01',
 *     supabaseUrl: process.env.SUPABASE_URL,
 *     supabaseAnonKey: process.env.SUPABASE_ANON_KEY,
 *     syncDebounceMs: 1000
 *   }
 * });
 */
export interface SyncEngineConfig {
  /** Application prefix: database name, debug flag, client headers. */
  prefix: string;
  /** Stable id of this installation. Generated on first run and kept in the database when omitted. */
  deviceId?: string;
  /** Enable debug logging for this process. */
  debug?: boolean;

  /** IndexedDB database name. Default: `<prefix>-db`. */
  databaseName?: string;
  /** Directory of the SQLite files behind the default IndexedDB backend. Default: `<prefix>-data`. */
  storageDir?: string;
  /** IndexedDB backend. Default: `indexeddbshim` persisted in `storageDir`. */
  indexedDB?: DexieOptions['indexedDB'];
  IDBKeyRange?: DexieOptions['IDBKeyRange'];

  /** Provide a pre-created Supabase client. Created from url/key otherwise. */
  supabase?: SupabaseClient;
  supabaseUrl?: string;
  supabaseAnonKey?: string;

  /** Entries handed out per drain batch. Default: 20. */
  batchSize?: number;
  /** Remote calls in flight at once during a drain. Default: 4. */
  concurrency?: number;
  /** First retry delay (ms); doubles per attempt. Default: 1000. */
  baseBackoffMs?: number;
  /** Upper bound for the retry delay (ms). Default: 300000 (5 min). */
  maxBackoffMs?: number;
  /** Attempts before a record is marked `failed`. Default: 5. */
  maxAttempts?: number;
  /** Local-wins resubmissions of one record within a drain. Default: 3. */
  maxConflictRounds?: number;
  /** Pending outbox entries before mutations are rejected. Default: 1000. */
  outboxCapacity?: number;
  /** Deadline for every remote call (ms). Default: 15000. */
  remoteTimeoutMs?: number;
  /** How long a connectivity change must persist before it counts (ms). Default: 1000. */
  reachabilityDebounceMs?: number;
  /** Delay (ms) after a local write before triggering a drain. Default: 2000. */
  syncDebounceMs?: number;
  /** Interval (ms) between background syncs. Default: 300000 (5 min). */
  syncIntervalMs?: number;
  /** Age (ms) after which the cached entitlement is refreshed. Default: 3600000 (1 h). */
  entitlementMaxAgeMs?: number;
  /** Free-tier limits per collection. Default: 50 bookmarks, 10 categories. */
  freeLimits?: Partial<Record<CollectionName, number>>;

  /** Clock used for timestamps and backoff. Default: `Date.now`. */
  clock?: () => number;
}

/** {@link SyncEngineConfig} with every default applied. */
export interface ResolvedConfig {
  prefix: string;
  deviceId: string;
  debug: boolean;
  databaseName: string;
  storageDir: string;
  indexedDB: DexieOptions['indexedDB'];
  IDBKeyRange: DexieOptions['IDBKeyRange'];
  supabase: SupabaseClient | undefined;
  supabaseUrl: string | undefined;
  supabaseAnonKey: string | undefined;
  batchSize: number;
  concurrency: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  maxAttempts: number;
  maxConflictRounds: number;
  outboxCapacity: number;
  remoteTimeoutMs: number;
  reachabilityDebounceMs: number;
  syncDebounceMs: number;
  syncIntervalMs: number;
  entitlementMaxAgeMs: number;
  freeLimits: Record<CollectionName, number>;
  clock: () => number;
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_FREE_LIMITS: Record<CollectionName, number> = {
  bookmarks: 50,
  categories: 10
};

function positive(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`Invalid config: ${name} must be a positive number (got ${value})`);
  }
  return value;
}

/**
 * Apply defaults and validate numeric settings.
 *
 * @throws {RangeError} If a numeric setting is zero, negative or not finite.
 */
export function resolveConfig(config: SyncEngineConfig): ResolvedConfig {
  if (!config.prefix) {
    throw new RangeError('Invalid config: prefix is required');
  }

  return {
    prefix: config.prefix,
    deviceId: config.deviceId ?? generateId(),
    debug: config.debug ?? false,
    databaseName: config.databaseName ?? `${config.prefix}-db`,
    storageDir: config.storageDir ?? `${config.prefix}-data`,
    indexedDB: config.indexedDB,
    IDBKeyRange: config.IDBKeyRange,
    supabase: config.supabase,
    supabaseUrl: config.supabaseUrl,
    supabaseAnonKey: config.supabaseAnonKey,
    batchSize: positive(config.batchSize, 20, 'batchSize'),
    concurrency: positive(config.concurrency, 4, 'concurrency'),
    baseBackoffMs: positive(config.baseBackoffMs, 1000, 'baseBackoffMs'),
    maxBackoffMs: positive(config.maxBackoffMs, 300_000, 'maxBackoffMs'),
    maxAttempts: positive(config.maxAttempts, 5, 'maxAttempts'),
    maxConflictRounds: positive(config.maxConflictRounds, 3, 'maxConflictRounds'),
    outboxCapacity: positive(config.outboxCapacity, 1000, 'outboxCapacity'),
    remoteTimeoutMs: positive(config.remoteTimeoutMs, 15_000, 'remoteTimeoutMs'),
    reachabilityDebounceMs: positive(config.reachabilityDebounceMs, 1000, 'reachabilityDebounceMs'),
    syncDebounceMs: positive(config.syncDebounceMs, 2000, 'syncDebounceMs'),
    syncIntervalMs: positive(config.syncIntervalMs, 300_000, 'syncIntervalMs'),
    entitlementMaxAgeMs: positive(config.entitlementMaxAgeMs, 3_600_000, 'entitlementMaxAgeMs'),
    freeLimits: { ...DEFAULT_FREE_LIMITS, ...config.freeLimits },
    clock: config.clock ?? Date.now
  };
}
