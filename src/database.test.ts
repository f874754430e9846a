import { indexedDB as fakeIndexedDB, IDBKeyRange as FakeIDBKeyRange } from 'fake-indexeddb';
import { mkdtemp, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve, sep } from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createDatabase, metaTable, OUTBOX_TABLE, readMeta } from './database';
import { LocalStorageError } from './errors';
import { MEMORY_BACKEND, openTestDatabase, uniqueDatabaseName } from './testing';

const shim = vi.hoisted(() => {
  const configs: unknown[] = [];
  return { configs };
});

vi.mock('indexeddbshim', async () => {
  const fake = await import('fake-indexeddb');
  return {
    default: (target: Record<string, unknown>, config: unknown) => {
      shim.configs.push(config);
      target.indexedDB = fake.indexedDB;
      target.IDBKeyRange = fake.IDBKeyRange;
      return target;
    }
  };
});

function isNumber(value: unknown): value is number {
  return typeof value === 'number';
}

const dirs: string[] = [];

afterEach(async () => {
  while (dirs.length > 0) {
    const dir = dirs.pop();
    if (dir) await rm(dir, { recursive: true, force: true });
  }
});

describe('createDatabase', () => {
  it('stores data under the storage directory by default', async () => {
    const parent = await mkdtemp(join(tmpdir(), 'database-test-'));
    dirs.push(parent);
    const dir = join(parent, 'store');

    const db = await createDatabase({ name: uniqueDatabaseName(), storageDir: dir });
    const again = await createDatabase({ name: uniqueDatabaseName(), storageDir: dir });

    expect(db.isOpen()).toBe(true);
    expect((await stat(dir)).isDirectory()).toBe(true);
    expect(shim.configs).toEqual([
      { checkOrigin: false, databaseBasePath: resolve(dir) + sep, sysDatabaseBasePath: resolve(dir) + sep }
    ]);
    expect(db.tables.map((t) => t.name)).toContain(OUTBOX_TABLE);
    db.close();
    again.close();
  });

  it('uses an injected backend without touching the default one', async () => {
    const before = shim.configs.length;
    const db = await createDatabase({ name: uniqueDatabaseName(), ...MEMORY_BACKEND });
    expect(db.isOpen()).toBe(true);
    expect(shim.configs).toHaveLength(before);
    db.close();
  });

  it('reports a failed open without deleting the stored data', async () => {
    const name = uniqueDatabaseName();
    const existing = await openTestDatabase(name);
    await metaTable(existing).put({ key: 'counter', value: 7 });
    existing.close();

    const deleted: string[] = [];
    const failing = {
      open: () => {
        throw new Error('disk I/O error');
      },
      deleteDatabase: (dbName: string) => {
        deleted.push(dbName);
        return fakeIndexedDB.deleteDatabase(dbName);
      }
    };

    await expect(createDatabase({ name, indexedDB: failing, IDBKeyRange: FakeIDBKeyRange })).rejects.toBeInstanceOf(
      LocalStorageError
    );
    expect(deleted).toEqual([]);

    const reopened = await openTestDatabase(name);
    expect(await readMeta(reopened, 'counter', isNumber, 0)).toBe(7);
    reopened.close();
  });
});
