import { writable, type Readable } from 'svelte/store';
import type { CollectionName, SyncStatus } from '../types';

// Detailed sync error for debugging
export interface SyncError {
  collection: CollectionName;
  operation: string;
  recordId: string;
  message: string;
  timestamp: string;
}

export interface SyncStatusState {
  status: SyncStatus;
  pendingCount: number;
  failedCount: number;
  lastError: string | null; // Friendly error message
  lastErrorDetails: string | null; // Raw technical error
  syncErrors: SyncError[]; // Detailed errors for debugging
  lastSyncTime: string | null;
}

export interface SyncStatusStore extends Readable<SyncStatusState> {
  setStatus: (status: SyncStatus) => void;
  setPendingCount: (count: number) => void;
  setFailedCount: (count: number) => void;
  setError: (friendly: string | null, raw?: string | null) => void;
  addSyncError: (error: SyncError) => void;
  clearSyncErrors: () => void;
  setLastSyncTime: (time: string) => void;
  reset: () => void;
}

// Minimum time to show 'syncing' state to prevent flickering (ms)
const MIN_SYNCING_TIME = 500;

// Max errors to keep in history
const MAX_ERROR_HISTORY = 10;

function initialState(): SyncStatusState {
  return {
    status: 'idle',
    pendingCount: 0,
    failedCount: 0,
    lastError: null,
    lastErrorDetails: null,
    syncErrors: [],
    lastSyncTime: null
  };
}

export function createSyncStatusStore(): SyncStatusStore {
  const { subscribe, set, update } = writable<SyncStatusState>(initialState());

  let currentStatus: SyncStatus = 'idle';
  let syncingStartTime: number | null = null;
  let pendingStatusChange: { status: SyncStatus; timeout: ReturnType<typeof setTimeout> } | null =
    null;

  function applyStatus(status: SyncStatus) {
    currentStatus = status;
    update((state) => ({
      ...state,
      status,
      lastError: status === 'idle' ? null : state.lastError
    }));
  }

  return {
    subscribe,
    setStatus: (status: SyncStatus) => {
      // Ignore redundant status updates
      if (status === currentStatus && status !== 'syncing') {
        return;
      }

      if (pendingStatusChange) {
        clearTimeout(pendingStatusChange.timeout);
        pendingStatusChange = null;
      }

      if (status === 'syncing') {
        syncingStartTime = Date.now();
        currentStatus = status;
        update((state) => ({ ...state, status, lastError: null, syncErrors: [] }));
        return;
      }

      if (syncingStartTime === null) {
        applyStatus(status);
        return;
      }

      // Ending sync - ensure minimum display time
      const remaining = MIN_SYNCING_TIME - (Date.now() - syncingStartTime);
      if (remaining > 0) {
        pendingStatusChange = {
          status,
          timeout: setTimeout(() => {
            syncingStartTime = null;
            pendingStatusChange = null;
            applyStatus(status);
          }, remaining)
        };
      } else {
        syncingStartTime = null;
        applyStatus(status);
      }
    },
    setPendingCount: (count: number) => update((state) => ({ ...state, pendingCount: count })),
    setFailedCount: (count: number) => update((state) => ({ ...state, failedCount: count })),
    setError: (friendly: string | null, raw?: string | null) =>
      update((state) => ({
        ...state,
        lastError: friendly,
        lastErrorDetails: raw ?? null
      })),
    addSyncError: (error: SyncError) =>
      update((state) => ({
        ...state,
        syncErrors: [...state.syncErrors, error].slice(-MAX_ERROR_HISTORY)
      })),
    clearSyncErrors: () => update((state) => ({ ...state, syncErrors: [] })),
    setLastSyncTime: (time: string) => update((state) => ({ ...state, lastSyncTime: time })),
    reset: () => {
      if (pendingStatusChange) {
        clearTimeout(pendingStatusChange.timeout);
        pendingStatusChange = null;
      }
      syncingStartTime = null;
      currentStatus = 'idle';
      set(initialState());
    }
  };
}
