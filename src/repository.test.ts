import type Dexie from 'dexie';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BOOKMARKS, newBookmarkPayload } from './bookmarks';
import { OutboxCapacityError, QuotaExceededError, RecordNotFoundError } from './errors';
import { Outbox } from './queue';
import { LocalRepository, type CreateGate } from './repository';
import { SyncingRepository, type LocalChange } from './syncingRepository';
import { openTestDatabase, TestClock } from './testing';
import type { BookmarkPayload } from './types';

const denyAll: CreateGate = {
  assertCanCreate(kind, count) {
    throw new QuotaExceededError(kind, count);
  }
};

describe('LocalRepository', () => {
  let db: Dexie;
  let clock: TestClock;
  let repo: LocalRepository<BookmarkPayload>;

  beforeEach(async () => {
    db = await openTestDatabase();
    clock = new TestClock();
    repo = new LocalRepository(db, BOOKMARKS, { deviceId: 'device-a', clock: clock.now });
  });

  afterEach(() => {
    db.close();
  });

  it('creates a pending record stamped with the clock', async () => {
    const record = await repo.create(newBookmarkPayload({ title: 'Notes on CRDTs' }), { id: 'b1' });

    expect(record).toMatchObject({
      id: 'b1',
      remoteId: null,
      createdAt: '2026-03-01T09:00:00.000Z',
      updatedAt: '2026-03-01T09:00:00.000Z',
      syncState: 'pending',
      baseUpdatedAt: null,
      deviceId: 'device-a'
    });
    expect(await repo.fetchById('b1')).toEqual(record);
  });

  it('merges updates and keeps timestamps strictly increasing', async () => {
    await repo.create(newBookmarkPayload({ title: 'draft' }), { id: 'b1' });
    const updated = await repo.update('b1', { title: 'final', isRead: true });

    expect(updated.payload.title).toBe('final');
    expect(updated.payload.isRead).toBe(true);
    expect(updated.payload.source).toBe('other');
    expect(updated.updatedAt).toBe('2026-03-01T09:00:00.001Z');
    expect(updated.createdAt).toBe('2026-03-01T09:00:00.000Z');
  });

  it('reports a missing record', async () => {
    await expect(repo.update('missing', { title: 'x' })).rejects.toBeInstanceOf(RecordNotFoundError);
    await expect(repo.delete('missing')).rejects.toBeInstanceOf(RecordNotFoundError);
  });

  it('searches title, url, note and tags case-insensitively', async () => {
    await repo.create(newBookmarkPayload({ title: 'Rust async book', tags: ['reading'] }), { id: 'b1' });
    await repo.create(newBookmarkPayload({ title: 'Cooking', url: 'https://example.com/RAMEN' }), { id: 'b2' });

    expect((await repo.search('ramen')).map((r) => r.id)).toEqual(['b2']);
    expect((await repo.search('READING')).map((r) => r.id)).toEqual(['b1']);
    expect(await repo.search('   ')).toHaveLength(2);
  });

  it('finds a record by fingerprint', async () => {
    await repo.create(newBookmarkPayload({ title: 'shared' }), { id: 'b1', fingerprint: 'fp-1' });
    expect((await repo.findByFingerprint('fp-1'))?.id).toBe('b1');
    expect(await repo.findByFingerprint('fp-2')).toBeUndefined();
  });

  it('writes nothing when the gate denies a create', async () => {
    repo = new LocalRepository(db, BOOKMARKS, { deviceId: 'device-a', clock: clock.now, gate: denyAll });
    await expect(repo.create(newBookmarkPayload({ title: 'x' }))).rejects.toBeInstanceOf(QuotaExceededError);
    expect(await repo.count()).toBe(0);
  });
});

describe('SyncingRepository', () => {
  let db: Dexie;
  let clock: TestClock;
  let outbox: Outbox;
  let changes: LocalChange[];

  function syncing(options: { gate?: CreateGate; capacity?: number } = {}) {
    outbox = new Outbox(db, {
      outboxCapacity: options.capacity ?? 100,
      maxAttempts: 3,
      baseBackoffMs: 1000,
      maxBackoffMs: 60_000,
      clock: clock.now
    });
    const base = new LocalRepository(db, BOOKMARKS, { deviceId: 'device-a', clock: clock.now, gate: options.gate });
    return new SyncingRepository(base, outbox, {
      clock: clock.now,
      onCommitted: (change) => changes.push(change)
    });
  }

  beforeEach(async () => {
    db = await openTestDatabase();
    clock = new TestClock();
    changes = [];
  });

  afterEach(() => {
    db.close();
  });

  it('enqueues a mutation together with the record', async () => {
    const repo = syncing();
    const record = await repo.create(newBookmarkPayload({ title: 'first' }), { id: 'b1' });

    const entry = await outbox.get('bookmarks', 'b1');
    expect(entry).toMatchObject({
      operation: 'create',
      payloadSnapshot: record.payload,
      snapshotUpdatedAt: record.updatedAt,
      baseUpdatedAt: null,
      large: false
    });
    expect(changes).toEqual([{ collection: 'bookmarks', recordId: 'b1', operation: 'create' }]);
  });

  it('marks payloads with attachments as large', async () => {
    const repo = syncing();
    await repo.create(newBookmarkPayload({ title: 'photo', attachmentRefs: ['a.jpg'] }), { id: 'b1' });
    expect((await outbox.get('bookmarks', 'b1'))?.large).toBe(true);
  });

  it('rolls the record back when the outbox is full', async () => {
    const repo = syncing({ capacity: 1 });
    await repo.create(newBookmarkPayload({ title: 'one' }), { id: 'b1' });

    await expect(repo.create(newBookmarkPayload({ title: 'two' }), { id: 'b2' })).rejects.toBeInstanceOf(
      OutboxCapacityError
    );
    expect(await repo.fetchById('b2')).toBeUndefined();
    expect(await repo.count()).toBe(1);
    expect(changes).toHaveLength(1);
  });

  it('enqueues nothing when the gate denies a create', async () => {
    const repo = syncing({ gate: denyAll });
    await expect(repo.create(newBookmarkPayload({ title: 'x' }))).rejects.toBeInstanceOf(QuotaExceededError);
    expect(await outbox.count()).toBe(0);
    expect(changes).toEqual([]);
  });

  it('sends a delete as a newer version of the record', async () => {
    const repo = syncing();
    const record = await repo.create(newBookmarkPayload({ title: 'gone soon' }), { id: 'b1' });
    const [entry] = await outbox.getEligible(10, { allowLarge: true });
    await outbox.claim(entry);
    outbox.clearInFlight(entry.recordKey);

    const deleted = await repo.delete('b1');
    expect(deleted.id).toBe('b1');
    expect(await repo.fetchById('b1')).toBeUndefined();
    expect(await outbox.get('bookmarks', 'b1')).toMatchObject({
      operation: 'delete',
      payloadSnapshot: null,
      snapshotUpdatedAt: '2026-03-01T09:00:00.001Z'
    });
    expect(record.updatedAt).toBe('2026-03-01T09:00:00.000Z');
  });

  it('deletes many in one transaction', async () => {
    const repo = syncing();
    await repo.create(newBookmarkPayload({ title: 'a' }), { id: 'b1' });
    await repo.create(newBookmarkPayload({ title: 'b' }), { id: 'b2' });

    await expect(repo.deleteMany(['b1', 'missing'])).rejects.toBeInstanceOf(RecordNotFoundError);
    expect(await repo.count()).toBe(2);

    const removed = await repo.deleteMany(['b1', 'b2']);
    expect(removed.map((r) => r.id)).toEqual(['b1', 'b2']);
    expect(await repo.count()).toBe(0);
    // Never sent, so both creates cancel out
    expect(await outbox.count()).toBe(0);
  });

  it('never calls the hook for a failed mutation', async () => {
    const repo = syncing();
    const hook = vi.fn();
    const quiet = new SyncingRepository(
      new LocalRepository(db, BOOKMARKS, { deviceId: 'device-a', clock: clock.now }),
      outbox,
      { onCommitted: hook }
    );
    await expect(quiet.update('missing', { title: 'x' })).rejects.toBeInstanceOf(RecordNotFoundError);
    expect(hook).not.toHaveBeenCalled();
    expect(await repo.count()).toBe(0);
  });
});
