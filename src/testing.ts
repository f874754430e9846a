/**
 * Test fixtures: a controllable clock, throwaway databases, connectivity
 * snapshots and a scriptable remote. Imported by the test suites only.
 */

import type Dexie from 'dexie';
import { indexedDB as fakeIndexedDB, IDBKeyRange as FakeIDBKeyRange } from 'fake-indexeddb';
import { createDatabase } from './database';
import { TransientNetworkError } from './errors';
import { InMemoryRemoteApi, type RemoteApi } from './remote';
import type { ConnectivitySnapshot } from './stores/network';
import type { CollectionName, RemoteRecord, RemoteWriteRequest, RemoteWriteResult } from './types';
import { generateId } from './utils';

export const T0 = Date.parse('2026-03-01T09:00:00.000Z');

export const OFFLINE: ConnectivitySnapshot = { online: false, interfaceType: 'none' };
export const WIFI: ConnectivitySnapshot = { online: true, interfaceType: 'wifi' };
export const METERED: ConnectivitySnapshot = { online: true, expensive: true, interfaceType: 'cellular' };

export class TestClock {
  ms: number;

  constructor(start: number = T0) {
    this.ms = start;
  }

  readonly now = (): number => this.ms;

  advance(ms: number): void {
    this.ms += ms;
  }

  iso(offsetMs = 0): string {
    return new Date(this.ms + offsetMs).toISOString();
  }
}

export function uniqueDatabaseName(): string {
  return `test-${generateId()}`;
}

/** In-memory IndexedDB; spread into a database or runtime config. */
export const MEMORY_BACKEND = { indexedDB: fakeIndexedDB, IDBKeyRange: FakeIDBKeyRange };

export function openTestDatabase(name: string = uniqueDatabaseName()): Promise<Dexie> {
  return createDatabase({ name, ...MEMORY_BACKEND });
}

interface Hold {
  released: Promise<void>;
  markStarted: () => void;
}

/**
 * {@link InMemoryRemoteApi} with scripted failures, lost responses and
 * calls held open until released.
 */
export class ScriptedRemote implements RemoteApi {
  readonly inner: InMemoryRemoteApi;
  private readonly failures: unknown[] = [];
  private alwaysFail: unknown = null;
  private lostResponses = 0;
  private held: Hold | null = null;

  constructor(inner: InMemoryRemoteApi = new InMemoryRemoteApi()) {
    this.inner = inner;
  }

  /** Throw `error` from the next `times` writes without reaching the store. */
  failNext(error: unknown, times = 1): void {
    for (let i = 0; i < times; i++) this.failures.push(error);
  }

  /** Throw `error` from every write until `heal()`. */
  failAlways(error: unknown): void {
    this.alwaysFail = error;
  }

  heal(): void {
    this.alwaysFail = null;
    this.failures.length = 0;
  }

  /** Apply the next write, then throw as if the response was lost. */
  loseNextResponse(): void {
    this.lostResponses++;
  }

  /** Hold the next write open until `release()`. */
  hold(): { started: Promise<void>; release: () => void } {
    let release = (): void => undefined;
    let markStarted = (): void => undefined;
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    this.held = { released, markStarted };
    return { started, release };
  }

  upsert(collection: CollectionName, request: RemoteWriteRequest): Promise<RemoteWriteResult> {
    return this.write(() => this.inner.upsert(collection, request));
  }

  delete(collection: CollectionName, request: RemoteWriteRequest): Promise<RemoteWriteResult> {
    return this.write(() => this.inner.delete(collection, request));
  }

  fetchChanges(collection: CollectionName, sinceRevision: number, limit: number): Promise<RemoteRecord[]> {
    return this.inner.fetchChanges(collection, sinceRevision, limit);
  }

  private async write(fn: () => Promise<RemoteWriteResult>): Promise<RemoteWriteResult> {
    const held = this.held;
    this.held = null;
    if (held) {
      held.markStarted();
      await held.released;
    }

    if (this.alwaysFail !== null) throw this.alwaysFail;
    if (this.failures.length > 0) throw this.failures.shift();

    const result = await fn();
    if (this.lostResponses > 0) {
      this.lostResponses--;
      throw new TransientNetworkError('connection reset by peer');
    }
    return result;
  }
}
