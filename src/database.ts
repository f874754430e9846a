/**
 * @fileoverview IndexedDB Database Management via Dexie
 *
 * Creates and owns the Dexie (IndexedDB) database used by the sync engine.
 * System tables (outbox, conflictHistory, meta) are merged into every
 * schema version declaration alongside the record collections.
 *
 * Under Node there is no native IndexedDB: the default backend is
 * `indexeddbshim` over SQLite, one file per database in `storageDir`.
 * Hosts (and tests) may pass their own factory through `indexedDB` /
 * `IDBKeyRange`.
 *
 * Recovery strategy:
 *   A database that fails to open is reported as {@link LocalStorageError}
 *   and left untouched. Object stores missing after an interrupted upgrade
 *   are rebuilt only while the outbox holds no unsent change.
 *
 * @see {@link runtime.ts#createSyncRuntime} for the initialization entry point
 */

import Dexie, { type DexieOptions, type Table, type Transaction } from 'dexie';
import { mkdir } from 'fs/promises';
import { resolve, sep } from 'path';
import { debugError, debugLog } from './debug';
import { LocalStorageError, extractErrorMessage } from './errors';
import type { CollectionName, ConflictHistoryEntry, OutboxEntry, SyncRecord } from './types';

// =============================================================================
// Configuration Interfaces
// =============================================================================

/**
 * A single database version declaration.
 *
 * Maps to a Dexie `.version(n).stores({...}).upgrade(fn)` call.
 * System tables are automatically merged.
 */
export interface DatabaseVersionConfig {
  version: number;
  stores: Record<string, string>;
  upgrade?: (tx: Transaction) => Promise<void>;
}

export interface DatabaseConfig {
  /** IndexedDB database name (should be unique per host). */
  name: string;
  /** Defaults to {@link COLLECTION_VERSIONS}. */
  versions?: DatabaseVersionConfig[];
  /** Directory of the SQLite-backed default backend. Default: `./satchel-data`. */
  storageDir?: string;
  indexedDB?: DexieOptions['indexedDB'];
  IDBKeyRange?: DexieOptions['IDBKeyRange'];
}

// =============================================================================
// Schema
// =============================================================================

/** Record collections. `fingerprint` is indexed for inbox dedup. */
export const COLLECTION_VERSIONS: DatabaseVersionConfig[] = [
  {
    version: 1,
    stores: {
      bookmarks: 'id, syncState, updatedAt, fingerprint',
      categories: 'id, syncState, updatedAt, fingerprint'
    }
  }
];

/**
 * Internal tables automatically added to every schema version:
 * - `outbox`: Pending remote operations, one per record
 * - `conflictHistory`: Record-level conflict resolutions
 * - `meta`: Key/value state (pull cursors, cached entitlement)
 */
const SYSTEM_TABLES: Record<string, string> = {
  outbox: 'id, &recordKey, createdAt, state',
  conflictHistory: '++id, recordId, collection, timestamp',
  meta: 'key'
};

export const OUTBOX_TABLE = 'outbox';
export const CONFLICT_HISTORY_TABLE = 'conflictHistory';
export const META_TABLE = 'meta';

export interface MetaRow {
  key: string;
  value: unknown;
}

// =============================================================================
// Database Creation
// =============================================================================

export const DEFAULT_STORAGE_DIR = 'satchel-data';

interface Backend {
  indexedDB: DexieOptions['indexedDB'];
  IDBKeyRange: DexieOptions['IDBKeyRange'];
}

// indexeddbshim keeps its configuration module-wide: one setup per directory
const persistentBackends = new Map<string, Promise<Backend>>();

async function openPersistentBackend(storageDir: string): Promise<Backend> {
  const dir = resolve(storageDir) + sep;
  await mkdir(dir, { recursive: true });
  const { default: setGlobalVars } = await import('indexeddbshim');
  const shim = setGlobalVars({}, { checkOrigin: false, databaseBasePath: dir, sysDatabaseBasePath: dir });
  if (!shim.indexedDB || !shim.IDBKeyRange) {
    throw new Error('indexeddbshim did not provide an IndexedDB factory');
  }
  debugLog(`[DB] Persistent IndexedDB in ${dir}`);
  return { indexedDB: shim.indexedDB, IDBKeyRange: shim.IDBKeyRange };
}

function resolveBackend(config: DatabaseConfig): Promise<Backend> {
  if (config.indexedDB) {
    return Promise.resolve({ indexedDB: config.indexedDB, IDBKeyRange: config.IDBKeyRange });
  }
  const dir = config.storageDir ?? DEFAULT_STORAGE_DIR;
  let backend = persistentBackends.get(dir);
  if (!backend) {
    backend = openPersistentBackend(dir);
    persistentBackends.set(dir, backend);
    backend.catch(() => persistentBackends.delete(dir));
  }
  return backend;
}

/**
 * Create a Dexie database with system tables merged into every version.
 *
 * Opens the database eagerly so version upgrades run immediately, then
 * verifies that the actual object stores match the declared schema.
 *
 * Recovery flow:
 *   1. Try to open the database normally; failure is final.
 *   2. If open succeeds, verify object stores match expectations.
 *   3. On a mismatch with an empty outbox, delete the database and rebuild.
 *
 * @returns The opened Dexie instance, ready for use.
 * @throws {LocalStorageError} When the database cannot be opened or
 *         rebuilding it would drop unsent changes.
 */
export async function createDatabase(config: DatabaseConfig): Promise<Dexie> {
  let backend: Backend;
  try {
    backend = await resolveBackend(config);
  } catch (e) {
    throw new LocalStorageError(`No IndexedDB backend for ${config.name}: ${extractErrorMessage(e)}`, { cause: e });
  }

  let db = buildDexie(config, backend);
  try {
    await db.open();
  } catch (e) {
    debugError('[DB] Failed to open database:', e);
    throw new LocalStorageError(`Could not open ${config.name}: ${extractErrorMessage(e)}`, { cause: e });
  }

  const idb = db.backendDB();
  if (!idb) return db;
  const actualStores = Array.from(idb.objectStoreNames);
  const missing = db.tables.map((t) => t.name).filter((s) => !actualStores.includes(s));
  if (missing.length === 0) return db;

  const unsent = missing.includes(OUTBOX_TABLE) ? 0 : await outboxTable(db).count();
  if (unsent > 0) {
    db.close();
    throw new LocalStorageError(
      `${config.name} is missing object stores (${missing.join(', ')}) and holds ${unsent} unsent change(s)`
    );
  }

  debugError(
    `[DB] Object store mismatch after open! Missing: ${missing.join(', ')}. ` +
      `DB version: ${idb.version}, Dexie version: ${db.verno}. Deleting and recreating...`
  );
  await db.delete();
  db = buildDexie(config, backend);
  await db.open();
  return db;
}

/**
 * Build a Dexie instance with version declarations (does NOT open it).
 */
function buildDexie(config: DatabaseConfig, backend: Backend): Dexie {
  const db = new Dexie(config.name, backend);

  for (const ver of config.versions ?? COLLECTION_VERSIONS) {
    const mergedStores = { ...ver.stores, ...SYSTEM_TABLES };
    if (ver.upgrade) {
      db.version(ver.version).stores(mergedStores).upgrade(ver.upgrade);
    } else {
      db.version(ver.version).stores(mergedStores);
    }
  }

  return db;
}

// =============================================================================
// Typed Table Accessors
// =============================================================================

export function recordTable<TPayload>(db: Dexie, collection: CollectionName): Table<SyncRecord<TPayload>, string> {
  return db.table<SyncRecord<TPayload>, string>(collection);
}

export function outboxTable(db: Dexie): Table<OutboxEntry, string> {
  return db.table<OutboxEntry, string>(OUTBOX_TABLE);
}

export function conflictHistoryTable(db: Dexie): Table<ConflictHistoryEntry, number> {
  return db.table<ConflictHistoryEntry, number>(CONFLICT_HISTORY_TABLE);
}

export function metaTable(db: Dexie): Table<MetaRow, string> {
  return db.table<MetaRow, string>(META_TABLE);
}

// =============================================================================
// Meta Helpers
// =============================================================================

/**
 * Read a meta value, returning `fallback` when absent or when `guard`
 * rejects the stored shape.
 */
export async function readMeta<T>(
  db: Dexie,
  key: string,
  guard: (value: unknown) => value is T,
  fallback: T
): Promise<T> {
  const row = await metaTable(db).get(key);
  if (!row || !guard(row.value)) return fallback;
  return row.value;
}

export async function writeMeta(db: Dexie, key: string, value: unknown): Promise<void> {
  await metaTable(db).put({ key, value });
}
