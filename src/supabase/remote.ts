/**
 * Supabase implementation of {@link RemoteApi}.
 *
 * Writes go through two Postgres functions (`satchel_upsert_record`,
 * `satchel_delete_record`, see `supabase/migrations/`) that evaluate the
 * precondition and the replay check inside one statement, so concurrent
 * writers cannot interleave between check and write. Pulls read the
 * `satchel_records` table directly, ordered by its change sequence.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { debugError, debugLog } from '../debug';
import { PermanentRemoteError, TransientNetworkError, extractErrorMessage, isTransientError } from '../errors';
import type { RemoteApi } from '../remote';
import type { CollectionName, RemoteRecord, RemoteWriteRequest, RemoteWriteResult } from '../types';

export const RECORDS_TABLE = 'satchel_records';
const RECORD_COLUMNS = 'id,local_id,fields,updated_at,last_modified_device,deleted,revision';

// =============================================================================
// Row Parsing
// =============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Map a `satchel_records` row (snake_case) to a {@link RemoteRecord}.
 * Timestamps are normalized to `toISOString()` form.
 *
 * @throws {PermanentRemoteError} When the row does not have the expected shape.
 */
export function parseRemoteRow(row: unknown): RemoteRecord {
  if (
    !isObject(row) ||
    typeof row.id !== 'string' ||
    typeof row.local_id !== 'string' ||
    typeof row.updated_at !== 'string' ||
    typeof row.last_modified_device !== 'string' ||
    typeof row.deleted !== 'boolean' ||
    (typeof row.revision !== 'number' && typeof row.revision !== 'string')
  ) {
    throw new PermanentRemoteError(`Unexpected ${RECORDS_TABLE} row shape: ${JSON.stringify(row)}`);
  }

  const updatedAt = new Date(row.updated_at);
  if (Number.isNaN(updatedAt.getTime())) {
    throw new PermanentRemoteError(`Invalid updated_at in ${RECORDS_TABLE} row: ${row.updated_at}`);
  }

  return {
    remoteId: row.id,
    localId: row.local_id,
    fields: row.fields ?? null,
    updatedAt: updatedAt.toISOString(),
    deviceId: row.last_modified_device,
    deleted: row.deleted,
    revision: Number(row.revision)
  };
}

function parseWriteResult(data: unknown): RemoteWriteResult {
  if (!isObject(data) || (data.status !== 'applied' && data.status !== 'conflict')) {
    throw new PermanentRemoteError(`Unexpected write result: ${JSON.stringify(data)}`);
  }
  return { status: data.status, record: parseRemoteRow(data.record) };
}

/**
 * Turn a PostgREST error (or a thrown fetch error) into the engine's
 * taxonomy: retryable failures become {@link TransientNetworkError},
 * everything else {@link PermanentRemoteError}.
 */
function classifyFailure(label: string, error: unknown, status: number): Error {
  const message = `${label}: ${extractErrorMessage(error)}`;
  if (status === 0 || status === 408 || status === 429 || status >= 500 || isTransientError(error)) {
    return new TransientNetworkError(message, status || null, { cause: error });
  }
  return new PermanentRemoteError(message, status || null, { cause: error });
}

// =============================================================================
// RemoteApi
// =============================================================================

export class SupabaseRemoteApi implements RemoteApi {
  private readonly getClient: () => SupabaseClient;

  constructor(getClient: () => SupabaseClient) {
    this.getClient = getClient;
  }

  async upsert(collection: CollectionName, request: RemoteWriteRequest): Promise<RemoteWriteResult> {
    return this.callWrite('satchel_upsert_record', collection, request);
  }

  async delete(collection: CollectionName, request: RemoteWriteRequest): Promise<RemoteWriteResult> {
    return this.callWrite('satchel_delete_record', collection, request);
  }

  async fetchChanges(collection: CollectionName, sinceRevision: number, limit: number): Promise<RemoteRecord[]> {
    const label = `fetch ${collection} since ${sinceRevision}`;
    const response = await this.getClient()
      .from(RECORDS_TABLE)
      .select(RECORD_COLUMNS)
      .eq('collection', collection)
      .gt('revision', sinceRevision)
      .order('revision', { ascending: true })
      .limit(limit)
      .then(
        (result) => result,
        (error: unknown) => {
          throw classifyFailure(label, error, 0);
        }
      );

    if (response.error) {
      debugError(`[REMOTE] ${label} failed:`, response.error);
      throw classifyFailure(label, response.error, response.status);
    }
    const rows: unknown[] = response.data ?? [];
    debugLog(`[REMOTE] ${label}: ${rows.length} row(s)`);
    return rows.map(parseRemoteRow);
  }

  private async callWrite(
    fn: 'satchel_upsert_record' | 'satchel_delete_record',
    collection: CollectionName,
    request: RemoteWriteRequest
  ): Promise<RemoteWriteResult> {
    const label = `${fn} ${collection}/${request.id}`;
    const response = await this.getClient()
      .rpc(fn, {
        p_collection: collection,
        p_local_id: request.id,
        p_base_updated_at: request.baseUpdatedAt,
        p_updated_at: request.updatedAt,
        p_device_id: request.deviceId,
        p_fields: request.fields
      })
      .then(
        (result) => result,
        (error: unknown) => {
          throw classifyFailure(label, error, 0);
        }
      );

    if (response.error) {
      debugError(`[REMOTE] ${label} failed (${response.status}):`, response.error);
      throw classifyFailure(label, response.error, response.status);
    }
    const data: unknown = response.data;
    return parseWriteResult(data);
  }
}
