/**
 * @fileoverview Remote Backend Contract
 *
 * The engine talks to the backend only through {@link RemoteApi}. Every
 * write carries the record's stable local id, the precondition
 * (`baseUpdatedAt`), the write timestamp and the writing device, which
 * makes replays safe:
 *
 *   - no remote row                                → insert, `applied`
 *   - row already at this `updatedAt` + `deviceId` → replay, `applied`
 *   - row `updatedAt` <= `baseUpdatedAt`           → write, `applied`
 *   - anything else                                → `conflict` with the canonical row
 *
 * Transient failures (timeouts, 5xx, dropped connections) are thrown;
 * conflicts are returned, never thrown.
 *
 * {@link InMemoryRemoteApi} implements the same rules in process. It backs
 * the test suite and local development without a backend.
 */

import type { CollectionName, RemoteRecord, RemoteWriteRequest, RemoteWriteResult } from './types';

export interface RemoteApi {
  upsert(collection: CollectionName, request: RemoteWriteRequest): Promise<RemoteWriteResult>;
  /** Writes a tombstone; same precondition rules as {@link RemoteApi.upsert}. */
  delete(collection: CollectionName, request: RemoteWriteRequest): Promise<RemoteWriteResult>;
  /** Rows changed after `sinceRevision`, ascending by revision. */
  fetchChanges(collection: CollectionName, sinceRevision: number, limit: number): Promise<RemoteRecord[]>;
}

export function sameInstant(a: string, b: string): boolean {
  return Date.parse(a) === Date.parse(b);
}

export class InMemoryRemoteApi implements RemoteApi {
  private readonly rows = new Map<string, RemoteRecord>();
  private revision = 0;
  private nextRemoteId = 0;
  /** Every write received, in arrival order. */
  readonly writes: Array<{ collection: CollectionName; request: RemoteWriteRequest; deleted: boolean }> = [];

  async upsert(collection: CollectionName, request: RemoteWriteRequest): Promise<RemoteWriteResult> {
    return this.write(collection, request, false);
  }

  async delete(collection: CollectionName, request: RemoteWriteRequest): Promise<RemoteWriteResult> {
    return this.write(collection, request, true);
  }

  async fetchChanges(collection: CollectionName, sinceRevision: number, limit: number): Promise<RemoteRecord[]> {
    return [...this.rows.entries()]
      .filter(([key, row]) => key.startsWith(`${collection}/`) && row.revision > sinceRevision)
      .map(([, row]) => structuredClone(row))
      .sort((a, b) => a.revision - b.revision)
      .slice(0, limit);
  }

  /** Canonical row for a record, if any. */
  get(collection: CollectionName, localId: string): RemoteRecord | undefined {
    const row = this.rows.get(`${collection}/${localId}`);
    return row ? structuredClone(row) : undefined;
  }

  /** Number of live (non-tombstone) rows in a collection. */
  size(collection: CollectionName): number {
    let count = 0;
    for (const [key, row] of this.rows) {
      if (key.startsWith(`${collection}/`) && !row.deleted) count++;
    }
    return count;
  }

  private write(collection: CollectionName, request: RemoteWriteRequest, deleted: boolean): RemoteWriteResult {
    this.writes.push({ collection, request: structuredClone(request), deleted });
    const key = `${collection}/${request.id}`;
    const current = this.rows.get(key);

    if (current) {
      if (sameInstant(current.updatedAt, request.updatedAt) && current.deviceId === request.deviceId) {
        return { status: 'applied', record: structuredClone(current) };
      }
      const stale =
        request.baseUpdatedAt === null || Date.parse(current.updatedAt) > Date.parse(request.baseUpdatedAt);
      if (stale) {
        return { status: 'conflict', record: structuredClone(current) };
      }
    }

    const next: RemoteRecord = {
      remoteId: current?.remoteId ?? `remote-${++this.nextRemoteId}`,
      localId: request.id,
      fields: deleted ? null : structuredClone(request.fields),
      updatedAt: request.updatedAt,
      deviceId: request.deviceId,
      deleted,
      revision: ++this.revision
    };
    this.rows.set(key, next);
    return { status: 'applied', record: structuredClone(next) };
  }
}
