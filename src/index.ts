/**
 * @fileoverview Main entry point for `satchel-sync`
 *
 * Re-exports the public API surface:
 *
 * - **Runtime**: compose a fully wired engine instance.
 * - **Collections**: bookmark and category repositories and helpers.
 * - **Sync Engine**: outbox, drains, conflicts, manual retry.
 * - **Reactive Stores**: Svelte-compatible stores for sync status and
 *   reachability.
 * - **Inbox**: the cross-process share mailbox.
 * - **Usage Limits**: entitlement cache and create gate.
 * - **Errors, Debug & Utilities**
 * - **Type Definitions**
 */

// =============================================================================
//  Runtime & Configuration
// =============================================================================

export { createSyncRuntime } from './runtime';
export type { SyncRuntime, SyncRuntimeOptions } from './runtime';
export { resolveConfig, DEFAULT_FREE_LIMITS } from './config';
export type { SyncEngineConfig, ResolvedConfig } from './config';

// =============================================================================
//  Local Store
// =============================================================================

export { createDatabase, COLLECTION_VERSIONS } from './database';
export type { DatabaseConfig, DatabaseVersionConfig } from './database';
export { LocalRepository } from './repository';
export type { Repository, CollectionDefinition, CreateGate, LocalRepositoryOptions } from './repository';
export { SyncingRepository } from './syncingRepository';
export type { LocalChange, SyncHooks } from './syncingRepository';

// =============================================================================
//  Collections
// =============================================================================

export { BookmarkCollection, BOOKMARKS, detectSource, newBookmarkPayload } from './bookmarks';
export type { BookmarkInput } from './bookmarks';
export { CategoryCollection, CATEGORIES, DEFAULT_CATEGORIES } from './categories';

// =============================================================================
//  Sync Engine
// =============================================================================

export { SyncEngine } from './engine';
export type { SyncEngineDeps, EngineConfig, PullSummary, SyncSummary } from './engine';
export { Outbox, backoffDelay, coalesceEntry, toRecordKey } from './queue';
export type { EnqueueInput, EnqueueOutcome, FailureOutcome } from './queue';
export { resolveRecordConflict, getConflictHistory, cleanupConflictHistory } from './conflicts';
export type { ConflictDecision, ConflictResolution, VersionStamp } from './conflicts';
export { EventChannel, createSyncEvents } from './events';
export type { DrainSummary, SyncEventMap, SyncEventName, SyncEvents } from './events';

// =============================================================================
//  Remote
// =============================================================================

export { InMemoryRemoteApi } from './remote';
export type { RemoteApi } from './remote';
export { SupabaseRemoteApi, RECORDS_TABLE } from './supabase/remote';
export { SupabaseEntitlementSource } from './supabase/entitlements';
export { createLazySupabaseClient } from './supabase/client';

// =============================================================================
//  Reactive Stores
// =============================================================================

export { createSyncStatusStore } from './stores/sync';
export type { SyncError, SyncStatusState, SyncStatusStore } from './stores/sync';
export { createReachabilityMonitor, classifyConnectivity, ManualConnectivitySource } from './stores/network';
export type {
  ConnectivitySnapshot,
  ConnectivitySource,
  InterfaceType,
  Reachability,
  ReachabilityMonitor
} from './stores/network';

// =============================================================================
//  Inbox
// =============================================================================

export { appendToInbox, InboxProcessor, bookmarkFromPayload, validateInboxPayload } from './inbox';
export type { InboxSummary } from './inbox';

// =============================================================================
//  Usage Limits
// =============================================================================

export { decideUsage, EntitlementCache, UsageLimitGate } from './usage';
export type { Entitlement, EntitlementSource, Tier, UsageDecision } from './usage';

// =============================================================================
//  Errors, Debug & Utilities
// =============================================================================

export {
  SyncEngineError,
  LocalStorageError,
  RecordNotFoundError,
  OutboxCapacityError,
  QuotaExceededError,
  TransientNetworkError,
  PermanentRemoteError,
  ConflictError,
  MailboxCorruptionError,
  isTransientError
} from './errors';
export type { SyncErrorCode } from './errors';
export { debug, isDebugMode, setDebugMode } from './debug';
export { generateId, now, calculateNewOrder } from './utils';

// =============================================================================
//  Types
// =============================================================================

export type {
  Bookmark,
  BookmarkPayload,
  BookmarkSource,
  Category,
  CategoryPayload,
  CollectionName,
  ConflictHistoryEntry,
  CreateOptions,
  DrainTrigger,
  InboxPayload,
  OutboxEntry,
  OutboxOperation,
  RemoteRecord,
  RemoteWriteRequest,
  RemoteWriteResult,
  SyncRecord,
  SyncState,
  SyncStatus
} from './types';
