import { afterEach, describe, expect, it, vi } from 'vitest';
import { calculateNewOrder, contentFingerprint, nextTimestamp, now, runPool, withTimeout } from './utils';

describe('nextTimestamp', () => {
  it('uses the clock for a first version', () => {
    expect(nextTimestamp(null, () => 1000)).toBe('1970-01-01T00:00:01.000Z');
  });

  it('moves at least one millisecond past the previous version', () => {
    expect(nextTimestamp('1970-01-01T00:00:01.000Z', () => 1000)).toBe('1970-01-01T00:00:01.001Z');
    expect(nextTimestamp('1970-01-01T00:00:01.000Z', () => 500)).toBe('1970-01-01T00:00:01.001Z');
  });

  it('follows the clock when it is ahead', () => {
    expect(nextTimestamp('1970-01-01T00:00:01.000Z', () => 5000)).toBe('1970-01-01T00:00:05.000Z');
  });
});

describe('now', () => {
  it('formats the clock reading as ISO', () => {
    expect(now(() => 0)).toBe('1970-01-01T00:00:00.000Z');
  });
});

describe('contentFingerprint', () => {
  it('is stable for equal parts', () => {
    const a = contentFingerprint('inbox', ['https://example.com'], []);
    const b = contentFingerprint('inbox', ['https://example.com'], []);
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it('changes with any part', () => {
    expect(contentFingerprint('inbox', ['a'])).not.toBe(contentFingerprint('inbox', ['b']));
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes through a result that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, 'op')).resolves.toBe(7);
  });

  it('rejects with a labelled error when the deadline passes', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 2000, 'upsert bookmarks/1');
    const assertion = expect(pending).rejects.toThrow('upsert bookmarks/1 timed out after 2s');
    await vi.advanceTimersByTimeAsync(2000);
    await assertion;
  });
});

describe('runPool', () => {
  const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

  it('never exceeds the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const done: number[] = [];

    await runPool([1, 2, 3, 4, 5, 6], 2, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      done.push(item);
      active--;
    });

    expect(peak).toBe(2);
    expect(done.sort()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('takes no new items after the signal aborts', async () => {
    const controller = new AbortController();
    const done: number[] = [];

    await runPool(
      [1, 2, 3],
      1,
      async (item) => {
        done.push(item);
        controller.abort();
      },
      controller.signal
    );

    expect(done).toEqual([1]);
  });

  it('rethrows a worker failure', async () => {
    const failure = new Error('boom');
    await expect(
      runPool([1, 2], 2, async (item) => {
        if (item === 2) throw failure;
      })
    ).rejects.toBe(failure);
  });
});

describe('calculateNewOrder', () => {
  const items = [{ order: 0 }, { order: 1 }, { order: 2 }, { order: 3 }];

  it('places an item between its new neighbours', () => {
    expect(calculateNewOrder(items, 0, 2)).toBe(2.5);
    expect(calculateNewOrder(items, 3, 1)).toBe(0.5);
  });

  it('moves past the ends', () => {
    expect(calculateNewOrder(items, 3, 0)).toBe(-1);
    expect(calculateNewOrder(items, 0, 3)).toBe(4);
  });
});
