/**
 * @fileoverview Local Store Gateway
 *
 * {@link Repository} is the single CRUD contract for a record collection.
 * Two implementations exist and are composed at construction time:
 *
 *   - {@link LocalRepository}: reads and writes the Dexie table directly.
 *   - `SyncingRepository`: wraps any repository
 *     and mirrors every committed mutation into the outbox.
 *
 * Callers cannot tell the two apart. All writes run inside a Dexie `rw`
 * transaction; any storage failure aborts the whole transaction and
 * surfaces as {@link LocalStorageError}.
 */

import type Dexie from 'dexie';
import { recordTable } from './database';
import { LocalStorageError, RecordNotFoundError, engineErrorOf, extractErrorMessage } from './errors';
import type { CollectionName, CreateOptions, SyncRecord } from './types';
import { generateId, nextTimestamp } from './utils';

// =============================================================================
// Contracts
// =============================================================================

/** Static description of a record collection. */
export interface CollectionDefinition<TPayload> {
  name: CollectionName;
  /** Text matched by {@link Repository.search} (case-insensitive). */
  searchText(payload: TPayload): string;
  /** Whether syncing this payload needs a full (unconstrained) connection. */
  isLarge(payload: TPayload): boolean;
}

/** Admission check run inside the create transaction. */
export interface CreateGate {
  /** @throws {QuotaExceededError} When another record is not allowed. */
  assertCanCreate(kind: CollectionName, currentCount: number): void;
}

export interface Repository<TPayload> {
  readonly definition: CollectionDefinition<TPayload>;

  /**
   * @throws {QuotaExceededError} When a usage limit denies the record.
   * @throws {LocalStorageError} On storage failure (nothing is written).
   */
  create(payload: TPayload, options?: CreateOptions): Promise<SyncRecord<TPayload>>;
  /** @throws {RecordNotFoundError} When `id` does not exist. */
  update(id: string, patch: Partial<TPayload>): Promise<SyncRecord<TPayload>>;
  /** @returns The deleted record. */
  delete(id: string): Promise<SyncRecord<TPayload>>;
  deleteMany(ids: readonly string[]): Promise<SyncRecord<TPayload>[]>;

  fetchAll(): Promise<SyncRecord<TPayload>[]>;
  fetchById(id: string): Promise<SyncRecord<TPayload> | undefined>;
  search(query: string): Promise<SyncRecord<TPayload>[]>;
  filter(predicate: (record: SyncRecord<TPayload>) => boolean): Promise<SyncRecord<TPayload>[]>;
  count(): Promise<number>;
  findByFingerprint(fingerprint: string): Promise<SyncRecord<TPayload> | undefined>;

  /**
   * Run `fn` in a `rw` transaction over this collection plus `extraTables`.
   * Mutations made through this repository inside `fn` join it.
   */
  transaction<T>(extraTables: readonly string[], fn: () => Promise<T>): Promise<T>;
}

// =============================================================================
// Dexie Implementation
// =============================================================================

export interface LocalRepositoryOptions {
  deviceId: string;
  clock?: () => number;
  gate?: CreateGate;
}

function newestFirst<T>(a: SyncRecord<T>, b: SyncRecord<T>): number {
  return a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0;
}

export class LocalRepository<TPayload> implements Repository<TPayload> {
  readonly definition: CollectionDefinition<TPayload>;
  private readonly db: Dexie;
  private readonly deviceId: string;
  private readonly clock: () => number;
  private readonly gate: CreateGate | undefined;

  constructor(db: Dexie, definition: CollectionDefinition<TPayload>, options: LocalRepositoryOptions) {
    this.db = db;
    this.definition = definition;
    this.deviceId = options.deviceId;
    this.clock = options.clock ?? Date.now;
    this.gate = options.gate;
  }

  private get table() {
    return recordTable<TPayload>(this.db, this.definition.name);
  }

  async transaction<T>(extraTables: readonly string[], fn: () => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction('rw', [this.definition.name, ...extraTables], fn);
    } catch (error) {
      const engineError = engineErrorOf(error);
      if (engineError) throw engineError;
      throw new LocalStorageError(
        `${this.definition.name} write failed: ${extractErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async create(payload: TPayload, options: CreateOptions = {}): Promise<SyncRecord<TPayload>> {
    return this.transaction([], async () => {
      const count = await this.table.count();
      this.gate?.assertCanCreate(this.definition.name, count);

      const timestamp = nextTimestamp(null, this.clock);
      const record: SyncRecord<TPayload> = {
        id: options.id ?? generateId(),
        remoteId: null,
        payload,
        createdAt: timestamp,
        updatedAt: timestamp,
        syncState: 'pending',
        baseUpdatedAt: null,
        deviceId: this.deviceId
      };
      if (options.fingerprint) record.fingerprint = options.fingerprint;

      await this.table.add(record);
      return record;
    });
  }

  async update(id: string, patch: Partial<TPayload>): Promise<SyncRecord<TPayload>> {
    return this.transaction([], async () => {
      const existing = await this.table.get(id);
      if (!existing) throw new RecordNotFoundError(this.definition.name, id);

      const record: SyncRecord<TPayload> = {
        ...existing,
        payload: { ...existing.payload, ...patch },
        updatedAt: nextTimestamp(existing.updatedAt, this.clock),
        syncState: 'pending',
        deviceId: this.deviceId
      };
      await this.table.put(record);
      return record;
    });
  }

  async delete(id: string): Promise<SyncRecord<TPayload>> {
    return this.transaction([], async () => {
      const existing = await this.table.get(id);
      if (!existing) throw new RecordNotFoundError(this.definition.name, id);
      await this.table.delete(id);
      return existing;
    });
  }

  async deleteMany(ids: readonly string[]): Promise<SyncRecord<TPayload>[]> {
    return this.transaction([], async () => {
      const deleted: SyncRecord<TPayload>[] = [];
      for (const id of ids) {
        deleted.push(await this.delete(id));
      }
      return deleted;
    });
  }

  async fetchAll(): Promise<SyncRecord<TPayload>[]> {
    const records = await this.table.toArray();
    return records.sort(newestFirst);
  }

  async fetchById(id: string): Promise<SyncRecord<TPayload> | undefined> {
    return this.table.get(id);
  }

  async search(query: string): Promise<SyncRecord<TPayload>[]> {
    const needle = query.trim().toLowerCase();
    if (!needle) return this.fetchAll();
    return this.filter((record) =>
      this.definition.searchText(record.payload).toLowerCase().includes(needle)
    );
  }

  async filter(predicate: (record: SyncRecord<TPayload>) => boolean): Promise<SyncRecord<TPayload>[]> {
    const records = await this.fetchAll();
    return records.filter(predicate);
  }

  async count(): Promise<number> {
    return this.table.count();
  }

  async findByFingerprint(fingerprint: string): Promise<SyncRecord<TPayload> | undefined> {
    return this.table.where('fingerprint').equals(fingerprint).first();
  }
}
