/**
 * @fileoverview Sync Event Channel
 *
 * Typed publish/subscribe channel for the engine's fixed event catalogue.
 * Listeners are plain callbacks held in per-event `Set`s; a throwing
 * listener is logged and never affects other listeners or the emitter.
 */

import type { ConflictResolution } from './conflicts';
import { debugError } from './debug';
import type { Reachability } from './stores/network';
import type { CollectionName, DrainTrigger, SyncState } from './types';

// =============================================================================
// Catalogue
// =============================================================================

export interface DrainSummary {
  trigger: DrainTrigger;
  sent: number;
  succeeded: number;
  conflicts: number;
  retried: number;
  failed: number;
  /** Drain stopped early (cancelled or lost reachability). */
  interrupted: boolean;
  remaining: number;
  durationMs: number;
}

export interface SyncEventMap {
  connectivityChanged: { previous: Reachability; current: Reachability };
  drainCompleted: DrainSummary;
  drainFailed: { trigger: DrainTrigger; error: unknown };
  conflictResolved: ConflictResolution;
  recordSyncStateChanged: { collection: CollectionName; recordId: string; syncState: SyncState | 'deleted' };
}

export type SyncEventName = keyof SyncEventMap;

// =============================================================================
// Channel
// =============================================================================

type Listener<T> = (payload: T) => void;

type ListenerTable<TMap> = { [K in keyof TMap]?: Set<Listener<TMap[K]>> };

export class EventChannel<TMap> {
  private listeners: ListenerTable<TMap> = {};

  /**
   * Subscribe to one event.
   *
   * @returns Unsubscribe function.
   */
  on<K extends keyof TMap>(event: K, listener: Listener<TMap[K]>): () => void {
    const set: Set<Listener<TMap[K]>> = this.listeners[event] ?? new Set();
    this.listeners[event] = set;
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  /** Subscribe for a single delivery. */
  once<K extends keyof TMap>(event: K, listener: Listener<TMap[K]>): () => void {
    const off = this.on(event, (payload) => {
      off();
      listener(payload);
    });
    return off;
  }

  emit<K extends keyof TMap>(event: K, payload: TMap[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(payload);
      } catch (e) {
        debugError(`[EVENTS] ${String(event)} listener error:`, e);
      }
    }
  }

  listenerCount(event: keyof TMap): number {
    return this.listeners[event]?.size ?? 0;
  }

  clear(): void {
    this.listeners = {};
  }
}

export type SyncEvents = EventChannel<SyncEventMap>;

export function createSyncEvents(): SyncEvents {
  return new EventChannel<SyncEventMap>();
}
