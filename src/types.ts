/**
 * Record, Outbox and Inbox Types
 *
 * Records carry full-state snapshots rather than field-level intents: every
 * mutation replaces the payload as a whole and the outbox keeps only the
 * latest snapshot per record. Conflicts are therefore resolved per record
 * with last-writer-wins, not per field.
 */

// ============================================================
// RECORDS
// ============================================================

/** Names of the synced collections (also the Dexie table names). */
export type CollectionName = 'bookmarks' | 'categories';

/**
 * Sync lifecycle of a local record:
 * - 'pending': has a local mutation not yet confirmed by the remote
 * - 'synced': local state equals the last canonical remote state
 * - 'conflict': a remote rejection is being resolved inside a drain
 * - 'failed': retries exhausted or permanently rejected; waits for a manual retry
 */
export type SyncState = 'pending' | 'synced' | 'conflict' | 'failed';

export interface SyncRecord<TPayload> {
  id: string; // Local UUID, immutable
  remoteId: string | null; // Assigned once the remote accepts the record
  payload: TPayload;
  createdAt: string; // ISO timestamp
  updatedAt: string; // ISO timestamp, monotonic per record
  syncState: SyncState;
  baseUpdatedAt: string | null; // Last canonical remote updatedAt seen by this device
  deviceId: string; // Device that wrote the current version
  fingerprint?: string; // Content fingerprint (inbox dedup)
}

export interface CreateOptions {
  /** Reuse a known id instead of generating one. */
  id?: string;
  fingerprint?: string;
}

// ============================================================
// DOMAIN PAYLOADS
// ============================================================

export type BookmarkSource =
  | 'twitter'
  | 'reddit'
  | 'linkedin'
  | 'medium'
  | 'youtube'
  | 'instagram'
  | 'github'
  | 'article'
  | 'other';

export interface BookmarkPayload {
  title: string;
  url: string | null;
  note: string;
  source: BookmarkSource;
  isRead: boolean;
  isFavorite: boolean;
  categoryId: string | null;
  tags: string[];
  attachmentRefs: string[]; // File names relative to the inbox attachments directory
}

export interface CategoryPayload {
  name: string;
  icon: string;
  colorHex: string;
  order: number;
}

export type Bookmark = SyncRecord<BookmarkPayload>;
export type Category = SyncRecord<CategoryPayload>;

// ============================================================
// OUTBOX
// ============================================================

export type OutboxOperation = 'create' | 'update' | 'delete';

/**
 * 'queued' entries are handed to drains once `nextAttemptAt` has passed.
 * 'failed' entries are parked until a manual retry.
 */
export type OutboxEntryState = 'queued' | 'failed';

/**
 * One pending remote operation. At most one entry exists per record
 * (`recordKey` is a unique index); later mutations coalesce into it.
 */
export interface OutboxEntry {
  id: string;
  recordKey: string; // `${collection}/${recordId}`
  collection: CollectionName;
  recordId: string;
  operation: OutboxOperation;
  payloadSnapshot: unknown; // Latest committed payload, null for delete
  snapshotUpdatedAt: string; // updatedAt of the snapshot, sent as the write timestamp
  baseUpdatedAt: string | null; // Precondition sent with the remote call
  createdAt: string; // First edit in the current coalescing window
  attemptCount: number;
  lastError: string | null;
  nextAttemptAt: number; // Epoch ms
  revision: number; // Bumped on every coalesce
  dispatched: boolean; // Sent to the remote at least once
  large: boolean; // Needs a full (unconstrained) connection
  state: OutboxEntryState;
}

// ============================================================
// REMOTE
// ============================================================

/** Canonical record as stored by the remote backend. */
export interface RemoteRecord {
  remoteId: string;
  localId: string;
  fields: unknown;
  updatedAt: string;
  deviceId: string;
  deleted: boolean;
  revision: number; // Server-assigned change sequence, used as the pull cursor
}

/** Body of every remote write. `id` is the stable local id (idempotency key). */
export interface RemoteWriteRequest {
  id: string;
  baseUpdatedAt: string | null;
  updatedAt: string;
  deviceId: string;
  fields: unknown;
}

export type RemoteWriteResult =
  | { status: 'applied'; record: RemoteRecord }
  | { status: 'conflict'; record: RemoteRecord };

// ============================================================
// CONFLICT HISTORY
// ============================================================

export interface ConflictHistoryEntry {
  id?: number; // Auto-increment
  collection: CollectionName;
  recordId: string;
  localUpdatedAt: string;
  remoteUpdatedAt: string;
  localDeviceId: string;
  remoteDeviceId: string;
  winner: 'local' | 'remote';
  reason: 'newer' | 'device_tiebreak' | 'remote_default';
  origin: 'push' | 'pull';
  timestamp: string;
}

// ============================================================
// INBOX
// ============================================================

/** Document appended to the shared mailbox by a producer process. */
export interface InboxPayload {
  sourceId: string;
  createdAt: string;
  urls: string[];
  texts: string[];
  attachmentRefs: string[];
}

// ============================================================
// STATUS
// ============================================================

export type SyncStatus = 'idle' | 'syncing' | 'error' | 'offline';

export type DrainTrigger = 'reachable' | 'local_write' | 'interval' | 'retry' | 'activation' | 'manual';
