/**
 * @fileoverview Runtime Composition
 *
 * Builds one fully wired engine instance: database, outbox, usage gate,
 * synced repositories, reachability monitor and sync engine. Nothing here
 * is a module-level singleton; a host may run several runtimes side by
 * side (tests do).
 */

import type Dexie from 'dexie';
import { BookmarkCollection, BOOKMARKS } from './bookmarks';
import { CategoryCollection, CATEGORIES } from './categories';
import { resolveConfig, type ResolvedConfig, type SyncEngineConfig } from './config';
import { getConflictHistory } from './conflicts';
import { createDatabase, readMeta, writeMeta } from './database';
import { _setDebugPrefix, debugError, debugLog, setDebugMode } from './debug';
import { SyncEngine } from './engine';
import { extractErrorMessage, LocalStorageError, SyncEngineError } from './errors';
import { createSyncEvents, type SyncEvents } from './events';
import { InboxProcessor, type InboxSummary } from './inbox';
import { Outbox } from './queue';
import type { RemoteApi } from './remote';
import { LocalRepository } from './repository';
import {
  createReachabilityMonitor,
  ManualConnectivitySource,
  type ConnectivitySource,
  type ReachabilityMonitor
} from './stores/network';
import { createSyncStatusStore, type SyncStatusStore } from './stores/sync';
import { createLazySupabaseClient } from './supabase/client';
import { SupabaseEntitlementSource } from './supabase/entitlements';
import { SupabaseRemoteApi } from './supabase/remote';
import { SyncingRepository, type LocalChange } from './syncingRepository';
import type { BookmarkPayload, CategoryPayload, ConflictHistoryEntry } from './types';
import { EntitlementCache, UsageLimitGate, type EntitlementSource } from './usage';

const DEVICE_ID_META_KEY = 'deviceId';

function isDeviceId(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/** The device id stored by an earlier run, or `generated` stored for the next one. */
async function loadDeviceId(db: Dexie, generated: string): Promise<string> {
  const stored = await readMeta(db, DEVICE_ID_META_KEY, isDeviceId, '');
  if (stored) return stored;
  await writeMeta(db, DEVICE_ID_META_KEY, generated);
  debugLog(`[RUNTIME] New device id ${generated}`);
  return generated;
}

export interface SyncRuntimeOptions {
  config: SyncEngineConfig;
  /** Default: Supabase, built lazily from the config. */
  remote?: RemoteApi;
  /** Default: a {@link ManualConnectivitySource} starting offline. */
  connectivity?: ConnectivitySource;
  /** Default: Supabase when a remote is not injected, otherwise none (free tier). */
  entitlements?: EntitlementSource | null;
  /** Mailbox directory shared with producer processes. */
  inboxDir?: string;
}

export interface SyncRuntime {
  readonly config: ResolvedConfig;
  readonly db: Dexie;
  readonly bookmarks: BookmarkCollection;
  readonly categories: CategoryCollection;
  readonly engine: SyncEngine;
  readonly outbox: Outbox;
  readonly events: SyncEvents;
  readonly status: SyncStatusStore;
  readonly reachability: ReachabilityMonitor;
  readonly entitlements: EntitlementCache;
  readonly usage: UsageLimitGate;
  readonly inbox: InboxProcessor | null;

  /** Host came to the foreground: start syncing, import the inbox, sync once. */
  activate(): Promise<void>;
  /** Host is going to the background: cancel the running drain. */
  suspend(): void;
  getConflictHistory(recordId?: string): Promise<ConflictHistoryEntry[]>;
  /** Stop everything and close the database. */
  dispose(): Promise<void>;
}

/**
 * Create and wire a runtime.
 *
 * @throws {RangeError} On invalid configuration.
 * @throws {LocalStorageError} When the database cannot be opened.
 */
export async function createSyncRuntime(options: SyncRuntimeOptions): Promise<SyncRuntime> {
  const resolved = resolveConfig(options.config);
  _setDebugPrefix(resolved.prefix);
  if (resolved.debug) setDebugMode(true);

  let db: Dexie;
  let config: ResolvedConfig;
  try {
    db = await createDatabase({
      name: resolved.databaseName,
      storageDir: resolved.storageDir,
      indexedDB: resolved.indexedDB,
      IDBKeyRange: resolved.IDBKeyRange
    });
    config = { ...resolved, deviceId: options.config.deviceId ?? (await loadDeviceId(db, resolved.deviceId)) };
  } catch (error) {
    if (error instanceof LocalStorageError) throw error;
    throw new LocalStorageError(`Could not open ${resolved.databaseName}: ${extractErrorMessage(error)}`, {
      cause: error
    });
  }

  const getClient = createLazySupabaseClient(config);
  const remote = options.remote ?? new SupabaseRemoteApi(getClient);
  const entitlementSource =
    options.entitlements !== undefined
      ? options.entitlements
      : options.remote
        ? null
        : new SupabaseEntitlementSource(getClient);

  const entitlements = new EntitlementCache(db, entitlementSource, config);
  await entitlements.load();
  const usage = new UsageLimitGate(entitlements, config.freeLimits);

  const outbox = new Outbox(db, config);
  const events = createSyncEvents();
  const status = createSyncStatusStore();
  const reachability = createReachabilityMonitor(options.connectivity ?? new ManualConnectivitySource(), {
    debounceMs: config.reachabilityDebounceMs,
    events
  });

  const engine = new SyncEngine({
    db,
    outbox,
    remote,
    reachability,
    events,
    status,
    collections: [BOOKMARKS.name, CATEGORIES.name],
    config
  });

  const hooks = {
    clock: config.clock,
    onCommitted: (change: LocalChange) => engine.notifyLocalChange(change)
  };
  const repoOptions = { deviceId: config.deviceId, clock: config.clock, gate: usage };
  const bookmarkRepo = new SyncingRepository<BookmarkPayload>(
    new LocalRepository(db, BOOKMARKS, repoOptions),
    outbox,
    hooks
  );
  const categoryRepo = new SyncingRepository<CategoryPayload>(
    new LocalRepository(db, CATEGORIES, repoOptions),
    outbox,
    hooks
  );

  const bookmarks = new BookmarkCollection(bookmarkRepo);
  const categories = new CategoryCollection(categoryRepo, bookmarkRepo);
  const inbox = options.inboxDir ? new InboxProcessor(options.inboxDir, bookmarkRepo) : null;

  debugLog(`[RUNTIME] Ready (db ${config.databaseName}, device ${config.deviceId})`);

  async function importInbox(): Promise<InboxSummary | null> {
    if (!inbox) return null;
    try {
      return await inbox.process();
    } catch (error) {
      if (!(error instanceof SyncEngineError)) throw error;
      debugError('[RUNTIME] Inbox import failed:', error);
      return null;
    }
  }

  return {
    config,
    db,
    bookmarks,
    categories,
    engine,
    outbox,
    events,
    status,
    reachability,
    entitlements,
    usage,
    inbox,

    async activate() {
      reachability.start();
      engine.start();
      await entitlements.refreshIfStale();
      await importInbox();
      if (reachability.isReachable()) {
        await engine.sync('activation').catch((e) => debugError('[RUNTIME] Activation sync failed:', e));
      }
    },

    suspend() {
      engine.cancel();
    },

    getConflictHistory(recordId?: string) {
      return getConflictHistory(db, recordId);
    },

    async dispose() {
      reachability.stop();
      await engine.dispose();
      events.clear();
      db.close();
      debugLog('[RUNTIME] Disposed');
    }
  };
}
