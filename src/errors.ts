/**
 * @fileoverview Sync Engine Error Taxonomy
 *
 * Every failure the engine can surface is one of the classes below, each
 * tagged with a stable `code` so callers can branch without `instanceof`
 * chains across package boundaries.
 *
 * Routing:
 *   - {@link LocalStorageError}, {@link OutboxCapacityError} and
 *     {@link QuotaExceededError} reject the caller's mutation directly.
 *   - {@link TransientNetworkError} is retried by the engine with backoff.
 *   - {@link ConflictError} is resolved inside a drain and only logged.
 *   - {@link PermanentRemoteError} marks the record `failed`.
 *   - {@link MailboxCorruptionError} skips one inbox document.
 */

import type { CollectionName } from './types';

export type SyncErrorCode =
  | 'LOCAL_STORAGE'
  | 'RECORD_NOT_FOUND'
  | 'OUTBOX_CAPACITY'
  | 'TRANSIENT_NETWORK'
  | 'PERMANENT_REMOTE'
  | 'CONFLICT'
  | 'QUOTA_EXCEEDED'
  | 'MAILBOX_CORRUPTION';

export class SyncEngineError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// =============================================================================
// Local
// =============================================================================

export class LocalStorageError extends SyncEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LOCAL_STORAGE', message, options);
  }
}

export class RecordNotFoundError extends SyncEngineError {
  readonly collection: CollectionName;
  readonly recordId: string;

  constructor(collection: CollectionName, recordId: string) {
    super('RECORD_NOT_FOUND', `No ${collection} record with id ${recordId}`);
    this.collection = collection;
    this.recordId = recordId;
  }
}

/** The outbox is full and the mutation could not be coalesced into an existing entry. */
export class OutboxCapacityError extends SyncEngineError {
  readonly capacity: number;

  constructor(capacity: number) {
    super('OUTBOX_CAPACITY', `Outbox is full (${capacity} pending operations)`);
    this.capacity = capacity;
  }
}

export class QuotaExceededError extends SyncEngineError {
  readonly kind: CollectionName;
  readonly limit: number;

  constructor(kind: CollectionName, limit: number) {
    super('QUOTA_EXCEEDED', `Usage limit reached for ${kind} (${limit})`);
    this.kind = kind;
    this.limit = limit;
  }
}

// =============================================================================
// Remote
// =============================================================================

export class TransientNetworkError extends SyncEngineError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('TRANSIENT_NETWORK', message, options);
    this.status = status;
  }
}

export class PermanentRemoteError extends SyncEngineError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('PERMANENT_REMOTE', message, options);
    this.status = status;
  }
}

export class ConflictError extends SyncEngineError {
  readonly collection: CollectionName;
  readonly recordId: string;

  constructor(collection: CollectionName, recordId: string) {
    super('CONFLICT', `Remote rejected ${collection}/${recordId}: precondition failed`);
    this.collection = collection;
    this.recordId = recordId;
  }
}

// =============================================================================
// Inbox
// =============================================================================

export class MailboxCorruptionError extends SyncEngineError {
  readonly document: string;

  constructor(document: string, reason: string, options?: { cause?: unknown }) {
    super('MAILBOX_CORRUPTION', `Malformed inbox document ${document}: ${reason}`, options);
    this.document = document;
  }
}

// =============================================================================
// Classification
// =============================================================================

function readStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) return null;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'string' && /^\d{3}$/.test(error.code)) {
    return Number(error.code);
  }
  return null;
}

/**
 * Classify an error as transient (will likely succeed on retry) or
 * persistent (won't improve without intervention).
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientNetworkError) return true;
  if (error instanceof SyncEngineError) return false;

  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();

  // Network/connectivity issues
  if (msg.includes('fetch') || msg.includes('network')) return true;
  if (msg.includes('timeout') || msg.includes('timed out')) return true;
  if (msg.includes('connection') || msg.includes('offline') || msg.includes('econn')) return true;

  const status = readStatus(error);
  if (status === 408 || status === 429) return true;
  if (status !== null && status >= 500 && status < 600) return true;

  if (msg.includes('unavailable') || msg.includes('temporarily') || msg.includes('too many')) {
    return true;
  }

  return false;
}

/**
 * The engine error carried by `error`, if any. Dexie rethrows errors whose
 * `name` matches a DOM exception (`QuotaExceededError`) as its own type and
 * keeps the original in `inner`.
 */
export function engineErrorOf(error: unknown): SyncEngineError | null {
  if (error instanceof SyncEngineError) return error;
  if (typeof error === 'object' && error !== null && 'inner' in error && error.inner instanceof SyncEngineError) {
    return error.inner;
  }
  return null;
}

/**
 * Extract a human-readable message from any thrown value.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
