import { describe, expect, it } from 'vitest';
import { resolveConfig } from './config';

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    const config = resolveConfig({ prefix: 'satchel', deviceId: 'device-a' });

    expect(config.databaseName).toBe('satchel-db');
    expect(config.storageDir).toBe('satchel-data');
    expect(config.deviceId).toBe('device-a');
    expect(config.batchSize).toBe(20);
    expect(config.concurrency).toBe(4);
    expect(config.maxAttempts).toBe(5);
    expect(config.outboxCapacity).toBe(1000);
    expect(config.freeLimits).toEqual({ bookmarks: 50, categories: 10 });
    expect(config.debug).toBe(false);
  });

  it('generates a device id when none is given', () => {
    expect(resolveConfig({ prefix: 'satchel' }).deviceId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('merges partial free limits', () => {
    expect(resolveConfig({ prefix: 'satchel', freeLimits: { bookmarks: 5 } }).freeLimits).toEqual({
      bookmarks: 5,
      categories: 10
    });
  });

  it('rejects non-positive numbers', () => {
    expect(() => resolveConfig({ prefix: 'satchel', batchSize: 0 })).toThrow(RangeError);
    expect(() => resolveConfig({ prefix: 'satchel', remoteTimeoutMs: -1 })).toThrow(
      'Invalid config: remoteTimeoutMs must be a positive number (got -1)'
    );
  });

  it('requires a prefix', () => {
    expect(() => resolveConfig({ prefix: '' })).toThrow('Invalid config: prefix is required');
  });
});
