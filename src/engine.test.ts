import { get } from 'svelte/store';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { SyncEngineConfig } from './config';
import type { ConflictResolution } from './conflicts';
import { PermanentRemoteError, TransientNetworkError } from './errors';
import type { DrainSummary } from './events';
import { createSyncRuntime, type SyncRuntime } from './runtime';
import { classifyConnectivity, ManualConnectivitySource, type ConnectivitySnapshot } from './stores/network';
import { MEMORY_BACKEND, METERED, OFFLINE, ScriptedRemote, TestClock, uniqueDatabaseName, WIFI } from './testing';

interface Device {
  rt: SyncRuntime;
  source: ManualConnectivitySource;
}

const running: SyncRuntime[] = [];

async function device(
  deviceId: string,
  remote: ScriptedRemote,
  clock: TestClock,
  connectivity: ConnectivitySnapshot,
  config: Partial<SyncEngineConfig> = {}
): Promise<Device> {
  const source = new ManualConnectivitySource(connectivity);
  const rt = await createSyncRuntime({
    config: {
      prefix: 'test',
      deviceId,
      databaseName: uniqueDatabaseName(),
      ...MEMORY_BACKEND,
      clock: clock.now,
      reachabilityDebounceMs: 5,
      ...config
    },
    remote,
    connectivity: source,
    entitlements: null
  });
  running.push(rt);
  return { rt, source };
}

async function connect(d: Device, snapshot: ConnectivitySnapshot): Promise<void> {
  d.rt.reachability.start();
  d.source.set(snapshot);
  await vi.waitFor(() => expect(d.rt.reachability.current()).toBe(classifyConnectivity(snapshot)));
}

async function title(d: Device, id: string): Promise<string | undefined> {
  return (await d.rt.bookmarks.repository.fetchById(id))?.payload.title;
}

afterEach(async () => {
  while (running.length > 0) {
    const rt = running.pop();
    if (rt) await rt.dispose();
  }
});

describe('SyncEngine drain', () => {
  it('sends one write for a record created and edited offline', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, OFFLINE);

    await a.rt.bookmarks.add({ title: 'draft' }, { id: 'b1' });
    for (const next of ['edit 1', 'edit 2', 'edit 3']) {
      clock.advance(1000);
      await a.rt.bookmarks.repository.update('b1', { title: next });
    }
    expect(await a.rt.outbox.count()).toBe(1);

    expect(await a.rt.engine.drain()).toMatchObject({ sent: 0, remaining: 1 });
    expect(remote.inner.writes).toHaveLength(0);

    await connect(a, WIFI);
    const summary = await a.rt.engine.drain();

    expect(summary).toMatchObject({ sent: 1, succeeded: 1, remaining: 0, interrupted: false });
    expect(remote.inner.writes).toHaveLength(1);
    expect(remote.inner.writes[0].request).toMatchObject({
      id: 'b1',
      baseUpdatedAt: null,
      updatedAt: clock.iso(),
      deviceId: 'device-a'
    });
    expect(remote.inner.get('bookmarks', 'b1')?.fields).toMatchObject({ title: 'edit 3' });
    expect(await a.rt.bookmarks.repository.fetchById('b1')).toMatchObject({
      syncState: 'synced',
      remoteId: 'remote-1',
      baseUpdatedAt: clock.iso()
    });
  });

  it('sends nothing for a record created and deleted offline', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, WIFI);

    await a.rt.bookmarks.add({ title: 'oops' }, { id: 'b1' });
    await a.rt.bookmarks.remove('b1');

    expect(await a.rt.engine.drain()).toMatchObject({ sent: 0, remaining: 0 });
    expect(remote.inner.writes).toHaveLength(0);
  });

  it('replays a write whose response was lost without duplicating it', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, WIFI);
    await a.rt.bookmarks.add({ title: 'once' }, { id: 'b1' });

    remote.loseNextResponse();
    expect(await a.rt.engine.drain()).toMatchObject({ sent: 1, retried: 1, succeeded: 0, remaining: 1 });

    clock.advance(1000);
    expect(await a.rt.engine.drain()).toMatchObject({ sent: 1, succeeded: 1, remaining: 0 });
    expect(remote.inner.writes).toHaveLength(2);
    expect(remote.inner.get('bookmarks', 'b1')?.revision).toBe(1);
    expect(remote.inner.size('bookmarks')).toBe(1);
  });

  it('marks a record failed after the last transient attempt and retries on demand', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, WIFI, { maxAttempts: 3 });
    await a.rt.bookmarks.add({ title: 'stuck' }, { id: 'b1' });
    remote.failAlways(new TransientNetworkError('HTTP 503', 503));

    expect((await a.rt.engine.drain()).retried).toBe(1);
    expect(await a.rt.engine.drain()).toMatchObject({ sent: 0, remaining: 1 });
    clock.advance(1000);
    expect((await a.rt.engine.drain()).retried).toBe(1);
    clock.advance(2000);
    expect(await a.rt.engine.drain()).toMatchObject({ sent: 1, failed: 1, remaining: 1 });

    expect((await a.rt.bookmarks.repository.fetchById('b1'))?.syncState).toBe('failed');
    expect(get(a.rt.status).failedCount).toBe(1);
    expect(get(a.rt.status).syncErrors[0]).toMatchObject({ recordId: 'b1', message: 'HTTP 503' });

    // Parked: later drains leave it alone
    clock.advance(60_000);
    expect(await a.rt.engine.drain()).toMatchObject({ sent: 0 });

    remote.heal();
    expect(await a.rt.engine.retry('bookmarks', 'b1')).toBe(true);
    expect((await a.rt.bookmarks.repository.fetchById('b1'))?.syncState).toBe('pending');
    expect(await a.rt.engine.retry('bookmarks', 'b1')).toBe(false);

    expect(await a.rt.engine.drain()).toMatchObject({ succeeded: 1, remaining: 0 });
    expect((await a.rt.bookmarks.repository.fetchById('b1'))?.syncState).toBe('synced');
  });

  it('fails a permanent rejection without retrying', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, WIFI);
    await a.rt.bookmarks.add({ title: 'rejected' }, { id: 'b1' });
    await a.rt.bookmarks.add({ title: 'fine' }, { id: 'b2' });
    remote.failNext(new PermanentRemoteError('HTTP 400: invalid payload', 400));

    expect(await a.rt.engine.drain()).toMatchObject({ sent: 2, succeeded: 1, failed: 1, retried: 0 });
    expect(await a.rt.outbox.listFailed()).toHaveLength(1);
    expect(await a.rt.engine.retryAllFailed()).toBe(1);
  });

  it('holds large payloads back until the connection is unconstrained', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, METERED);
    await a.rt.bookmarks.add({ title: 'photo', attachmentRefs: ['p.jpg'] }, { id: 'big' });
    clock.advance(10);
    await a.rt.bookmarks.add({ title: 'link' }, { id: 'small' });

    expect(await a.rt.engine.drain()).toMatchObject({ sent: 1, remaining: 1 });
    expect(remote.inner.get('bookmarks', 'big')).toBeUndefined();
    expect(remote.inner.get('bookmarks', 'small')).toBeDefined();

    await connect(a, WIFI);
    expect(await a.rt.engine.drain()).toMatchObject({ sent: 1, remaining: 0 });
    expect(remote.inner.get('bookmarks', 'big')).toBeDefined();
  });

  it('sends the newer snapshot after an edit made while in flight', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, WIFI);
    await a.rt.bookmarks.add({ title: 'v1' }, { id: 'b1' });

    const held = remote.hold();
    const draining = a.rt.engine.drain();
    await held.started;
    clock.advance(1000);
    await a.rt.bookmarks.repository.update('b1', { title: 'v2' });
    held.release();

    expect(await draining).toMatchObject({ sent: 2, succeeded: 2, remaining: 0 });
    expect(remote.inner.writes.map((w) => w.request.baseUpdatedAt)).toEqual([null, '2026-03-01T09:00:00.000Z']);
    expect(remote.inner.get('bookmarks', 'b1')?.fields).toMatchObject({ title: 'v2' });
    expect(await a.rt.bookmarks.repository.fetchById('b1')).toMatchObject({
      syncState: 'synced',
      baseUpdatedAt: '2026-03-01T09:00:01.000Z'
    });
  });

  it('stops taking entries once cancelled', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, WIFI, { concurrency: 1 });
    for (const id of ['b1', 'b2', 'b3']) {
      await a.rt.bookmarks.add({ title: id }, { id });
      clock.advance(10);
    }

    const held = remote.hold();
    const draining = a.rt.engine.drain();
    await held.started;
    a.rt.suspend();
    held.release();

    expect(await draining).toMatchObject({ sent: 1, succeeded: 1, interrupted: true, remaining: 2 });
  });

  it('joins concurrent triggers into one drain', async () => {
    const clock = new TestClock();
    const a = await device('device-a', new ScriptedRemote(), clock, WIFI);
    await a.rt.bookmarks.add({ title: 'x' }, { id: 'b1' });

    const first = a.rt.engine.drain('manual');
    const second = a.rt.engine.drain('local_write');
    expect(second).toBe(first);
    expect(await first).toMatchObject({ trigger: 'manual', sent: 1 });
  });

  it('reaches the same state whether changes sync one by one or after reconnecting', async () => {
    async function run(syncEachStep: boolean) {
      const clock = new TestClock();
      const remote = new ScriptedRemote();
      const a = await device('device-a', remote, clock, syncEachStep ? WIFI : OFFLINE);
      const steps: Array<() => Promise<unknown>> = [
        () => a.rt.bookmarks.add({ title: 'first' }, { id: 'r1' }),
        () => a.rt.bookmarks.add({ title: 'second' }, { id: 'r2' }),
        () => a.rt.bookmarks.repository.update('r1', { title: 'first, edited' }),
        () => a.rt.bookmarks.remove('r2'),
        () => a.rt.bookmarks.add({ title: 'third' }, { id: 'r3' })
      ];
      for (const step of steps) {
        clock.advance(1000);
        await step();
        if (syncEachStep) await a.rt.engine.drain();
      }
      if (!syncEachStep) {
        await connect(a, WIFI);
        await a.rt.engine.drain();
      }

      const local = await a.rt.bookmarks.repository.fetchAll();
      return {
        local: local
          .map((r) => ({ id: r.id, title: r.payload.title, updatedAt: r.updatedAt, syncState: r.syncState }))
          .sort((x, y) => x.id.localeCompare(y.id)),
        remote: ['r1', 'r2', 'r3'].flatMap((id) => {
          const row = remote.inner.get('bookmarks', id);
          return row && !row.deleted ? [{ id, fields: row.fields, updatedAt: row.updatedAt }] : [];
        }),
        live: remote.inner.size('bookmarks'),
        pending: await a.rt.outbox.count()
      };
    }

    const online = await run(true);
    expect(online.local).toEqual([
      { id: 'r1', title: 'first, edited', updatedAt: '2026-03-01T09:00:03.000Z', syncState: 'synced' },
      { id: 'r3', title: 'third', updatedAt: '2026-03-01T09:00:05.000Z', syncState: 'synced' }
    ]);
    expect(online.live).toBe(2);
    expect(online.pending).toBe(0);
    expect(await run(false)).toEqual(online);
  });

  it('pushes deletes as tombstones', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, WIFI);
    await a.rt.bookmarks.add({ title: 'x' }, { id: 'b1' });
    await a.rt.engine.drain();

    clock.advance(1000);
    await a.rt.bookmarks.remove('b1');
    expect(await a.rt.engine.drain()).toMatchObject({ succeeded: 1, remaining: 0 });
    expect(remote.inner.get('bookmarks', 'b1')).toMatchObject({
      deleted: true,
      updatedAt: '2026-03-01T09:00:01.000Z'
    });
  });
});

describe('SyncEngine conflicts', () => {
  it('keeps the later edit on both devices', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, WIFI);
    const b = await device('device-b', remote, clock, WIFI);

    await a.rt.bookmarks.add({ title: 'from a' }, { id: 'shared' });
    await a.rt.engine.drain();
    expect(await b.rt.engine.pull()).toEqual({ applied: 1, conflicts: 0 });
    expect(await b.rt.bookmarks.repository.fetchById('shared')).toMatchObject({
      syncState: 'synced',
      baseUpdatedAt: '2026-03-01T09:00:00.000Z'
    });

    clock.advance(1000);
    await a.rt.bookmarks.repository.update('shared', { title: 'a edit' });
    clock.advance(1000);
    await b.rt.bookmarks.repository.update('shared', { title: 'b edit' });

    await a.rt.engine.drain();
    const resolutions: ConflictResolution[] = [];
    b.rt.events.on('conflictResolved', (r) => resolutions.push(r));
    expect(await b.rt.engine.drain()).toMatchObject({ sent: 2, conflicts: 1, succeeded: 1, remaining: 0 });

    expect(resolutions).toEqual([
      expect.objectContaining({ recordId: 'shared', winner: 'local', reason: 'newer', origin: 'push' })
    ]);
    expect(await b.rt.getConflictHistory('shared')).toHaveLength(1);

    await a.rt.engine.pull();
    expect(await title(a, 'shared')).toBe('b edit');
    expect(await title(b, 'shared')).toBe('b edit');
    expect(remote.inner.get('bookmarks', 'shared')?.fields).toMatchObject({ title: 'b edit' });
  });

  it('agrees on a timestamp tie whichever device pushes first', async () => {
    async function run(firstToPush: 'a' | 'b') {
      const clock = new TestClock();
      const remote = new ScriptedRemote();
      const a = await device('device-a', remote, clock, WIFI);
      const b = await device('device-b', remote, clock, WIFI);

      await a.rt.bookmarks.add({ title: 'base' }, { id: 'tie' });
      await a.rt.engine.drain();
      await b.rt.engine.pull();

      clock.advance(1000);
      await a.rt.bookmarks.repository.update('tie', { title: 'a edit' });
      await b.rt.bookmarks.repository.update('tie', { title: 'b edit' });

      const [first, second] = firstToPush === 'a' ? [a, b] : [b, a];
      await first.rt.engine.drain();
      await second.rt.engine.drain();
      await a.rt.engine.pull();
      await b.rt.engine.pull();

      return {
        a: await title(a, 'tie'),
        b: await title(b, 'tie'),
        remote: remote.inner.get('bookmarks', 'tie')?.fields
      };
    }

    const expected = { a: 'a edit', b: 'a edit', remote: expect.objectContaining({ title: 'a edit' }) };
    expect(await run('a')).toEqual(expected);
    expect(await run('b')).toEqual(expected);
  });

  it('lets a newer remote version replace a pending local edit on pull', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, WIFI);
    const b = await device('device-b', remote, clock, WIFI);

    await a.rt.bookmarks.add({ title: 'base' }, { id: 'p1' });
    await a.rt.engine.drain();
    await b.rt.engine.pull();

    clock.advance(1000);
    await b.rt.bookmarks.repository.update('p1', { title: 'b offline edit' });
    clock.advance(1000);
    await a.rt.bookmarks.repository.update('p1', { title: 'a later edit' });
    await a.rt.engine.drain();

    expect(await b.rt.engine.pull()).toEqual({ applied: 0, conflicts: 1 });
    expect(await b.rt.bookmarks.repository.fetchById('p1')).toMatchObject({
      syncState: 'synced',
      payload: expect.objectContaining({ title: 'a later edit' })
    });
    expect(await b.rt.outbox.count()).toBe(0);
  });

  it('restores a record deleted locally when the remote holds a newer edit', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, WIFI);
    const b = await device('device-b', remote, clock, WIFI);

    await a.rt.bookmarks.add({ title: 'base' }, { id: 'd1' });
    await a.rt.engine.drain();
    await b.rt.engine.pull();

    clock.advance(1000);
    await b.rt.bookmarks.remove('d1');
    expect(await b.rt.bookmarks.repository.fetchById('d1')).toBeUndefined();
    clock.advance(1000);
    await a.rt.bookmarks.repository.update('d1', { title: 'a later edit' });
    await a.rt.engine.drain();

    const resolutions: ConflictResolution[] = [];
    b.rt.events.on('conflictResolved', (r) => resolutions.push(r));
    expect(await b.rt.engine.drain()).toMatchObject({ sent: 1, conflicts: 1, succeeded: 0, remaining: 0 });

    expect(resolutions).toEqual([
      expect.objectContaining({ recordId: 'd1', winner: 'remote', origin: 'push' })
    ]);
    expect(await b.rt.bookmarks.repository.fetchById('d1')).toMatchObject({
      syncState: 'synced',
      updatedAt: '2026-03-01T09:00:02.000Z',
      payload: expect.objectContaining({ title: 'a later edit' })
    });
    expect(await b.rt.outbox.count()).toBe(0);
    expect(remote.inner.get('bookmarks', 'd1')).toMatchObject({
      deleted: false,
      fields: expect.objectContaining({ title: 'a later edit' })
    });
  });

  it('applies remote deletes on pull and resumes from the cursor', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, WIFI);
    const b = await device('device-b', remote, clock, WIFI);

    await a.rt.bookmarks.add({ title: 'short lived' }, { id: 'gone' });
    await a.rt.engine.drain();
    await b.rt.engine.pull();
    expect(await b.rt.bookmarks.count()).toBe(1);

    clock.advance(1000);
    await a.rt.bookmarks.remove('gone');
    await a.rt.engine.drain();

    expect(await b.rt.engine.pull()).toEqual({ applied: 1, conflicts: 0 });
    expect(await b.rt.bookmarks.count()).toBe(0);
    expect(await b.rt.engine.pull()).toEqual({ applied: 0, conflicts: 0 });
  });
});

describe('SyncEngine triggers', () => {
  it('drains when the network comes back', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, OFFLINE);
    a.rt.engine.start();
    a.rt.reachability.start();
    await a.rt.bookmarks.add({ title: 'queued offline' }, { id: 'b1' });

    const completed: DrainSummary[] = [];
    a.rt.events.on('drainCompleted', (summary) => completed.push(summary));
    a.source.set(WIFI);

    await vi.waitFor(() => expect(remote.inner.get('bookmarks', 'b1')).toBeDefined());
    await a.rt.reachability.settled();
    expect(completed).toEqual([expect.objectContaining({ trigger: 'reachable', succeeded: 1 })]);
  });

  it('interrupts a drain when the network drops', async () => {
    const clock = new TestClock();
    const remote = new ScriptedRemote();
    const a = await device('device-a', remote, clock, WIFI, { concurrency: 1 });
    a.rt.engine.start();
    a.rt.reachability.start();
    await a.rt.bookmarks.add({ title: 'first' }, { id: 'b1' });
    clock.advance(10);
    await a.rt.bookmarks.add({ title: 'second' }, { id: 'b2' });

    const held = remote.hold();
    const draining = a.rt.engine.drain();
    await held.started;
    a.source.set(OFFLINE);
    await vi.waitFor(() => expect(a.rt.reachability.current()).toBe('unreachable'));
    await a.rt.reachability.settled();
    held.release();

    expect(await draining).toMatchObject({ sent: 1, succeeded: 1, interrupted: true, remaining: 1 });
  });
});
