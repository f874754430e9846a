/**
 * @fileoverview Sync Decorator
 *
 * Wraps a {@link Repository} so every successful mutation also enqueues (or
 * coalesces) an outbox entry inside the same Dexie transaction. Either both
 * the record change and its entry commit, or neither does; a crash at any
 * point leaves no committed mutation without its entry.
 *
 * Remote propagation never happens on the caller's path: after the commit
 * the decorator only fires {@link SyncHooks.onCommitted}, which the runtime
 * wires to the engine's debounced drain scheduling.
 */

import { OUTBOX_TABLE } from './database';
import type { Outbox } from './queue';
import type { CollectionDefinition, Repository } from './repository';
import type { CollectionName, CreateOptions, OutboxOperation, SyncRecord } from './types';
import { nextTimestamp } from './utils';

export interface LocalChange {
  collection: CollectionName;
  recordId: string;
  operation: OutboxOperation;
}

export interface SyncHooks {
  /** Called after the mutation and its outbox entry have committed. */
  onCommitted?: (change: LocalChange) => void;
  /** Clock for delete timestamps. Default: `Date.now`. */
  clock?: () => number;
}

export class SyncingRepository<TPayload> implements Repository<TPayload> {
  readonly definition: CollectionDefinition<TPayload>;
  private readonly base: Repository<TPayload>;
  private readonly outbox: Outbox;
  private readonly hooks: SyncHooks;

  constructor(base: Repository<TPayload>, outbox: Outbox, hooks: SyncHooks = {}) {
    this.base = base;
    this.definition = base.definition;
    this.outbox = outbox;
    this.hooks = hooks;
  }

  private async enqueue(record: SyncRecord<TPayload>, operation: OutboxOperation): Promise<void> {
    await this.outbox.enqueue({
      collection: this.definition.name,
      recordId: record.id,
      operation,
      payload: operation === 'delete' ? null : record.payload,
      /* A delete is a new version of the record for last-writer-wins. */
      updatedAt: operation === 'delete' ? nextTimestamp(record.updatedAt, this.hooks.clock) : record.updatedAt,
      baseUpdatedAt: record.baseUpdatedAt,
      large: operation !== 'delete' && this.definition.isLarge(record.payload)
    });
  }

  private committed(recordId: string, operation: OutboxOperation): void {
    this.hooks.onCommitted?.({ collection: this.definition.name, recordId, operation });
  }

  async create(payload: TPayload, options?: CreateOptions): Promise<SyncRecord<TPayload>> {
    const record = await this.base.transaction([OUTBOX_TABLE], async () => {
      const created = await this.base.create(payload, options);
      await this.enqueue(created, 'create');
      return created;
    });
    this.committed(record.id, 'create');
    return record;
  }

  async update(id: string, patch: Partial<TPayload>): Promise<SyncRecord<TPayload>> {
    const record = await this.base.transaction([OUTBOX_TABLE], async () => {
      const updated = await this.base.update(id, patch);
      await this.enqueue(updated, 'update');
      return updated;
    });
    this.committed(record.id, 'update');
    return record;
  }

  async delete(id: string): Promise<SyncRecord<TPayload>> {
    const record = await this.base.transaction([OUTBOX_TABLE], async () => {
      const deleted = await this.base.delete(id);
      await this.enqueue(deleted, 'delete');
      return deleted;
    });
    this.committed(record.id, 'delete');
    return record;
  }

  async deleteMany(ids: readonly string[]): Promise<SyncRecord<TPayload>[]> {
    const records = await this.base.transaction([OUTBOX_TABLE], async () => {
      const deleted = await this.base.deleteMany(ids);
      for (const record of deleted) {
        await this.enqueue(record, 'delete');
      }
      return deleted;
    });
    for (const record of records) this.committed(record.id, 'delete');
    return records;
  }

  fetchAll(): Promise<SyncRecord<TPayload>[]> {
    return this.base.fetchAll();
  }

  fetchById(id: string): Promise<SyncRecord<TPayload> | undefined> {
    return this.base.fetchById(id);
  }

  search(query: string): Promise<SyncRecord<TPayload>[]> {
    return this.base.search(query);
  }

  filter(predicate: (record: SyncRecord<TPayload>) => boolean): Promise<SyncRecord<TPayload>[]> {
    return this.base.filter(predicate);
  }

  count(): Promise<number> {
    return this.base.count();
  }

  findByFingerprint(fingerprint: string): Promise<SyncRecord<TPayload> | undefined> {
    return this.base.findByFingerprint(fingerprint);
  }

  transaction<T>(extraTables: readonly string[], fn: () => Promise<T>): Promise<T> {
    return this.base.transaction([OUTBOX_TABLE, ...extraTables], fn);
  }
}
