import type Dexie from 'dexie';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BookmarkCollection, BOOKMARKS } from './bookmarks';
import { CategoryCollection, CATEGORIES, DEFAULT_CATEGORIES } from './categories';
import { LocalStorageError } from './errors';
import { LocalRepository } from './repository';
import { openTestDatabase, TestClock } from './testing';
import type { BookmarkPayload } from './types';

describe('CategoryCollection', () => {
  let db: Dexie;
  let bookmarkRepo: LocalRepository<BookmarkPayload>;
  let categories: CategoryCollection;

  beforeEach(async () => {
    db = await openTestDatabase();
    const clock = new TestClock();
    bookmarkRepo = new LocalRepository(db, BOOKMARKS, { deviceId: 'device-a', clock: clock.now });
    categories = new CategoryCollection(
      new LocalRepository(db, CATEGORIES, { deviceId: 'device-a', clock: clock.now }),
      bookmarkRepo
    );
  });

  afterEach(() => {
    db.close();
  });

  it('seeds the defaults once', async () => {
    const created = await categories.createDefaultsIfNeeded();
    expect(created.map((c) => c.payload.name)).toEqual(DEFAULT_CATEGORIES.map((c) => c.name));
    expect(await categories.createDefaultsIfNeeded()).toEqual([]);
  });

  it('appends new categories after the last one', async () => {
    await categories.createDefaultsIfNeeded();
    const added = await categories.add({ name: 'Recipes', icon: 'fork.knife', colorHex: '#FF3B30' });
    expect(added.payload.order).toBe(6);
    expect((await categories.fetchAll()).at(-1)?.payload.name).toBe('Recipes');
  });

  it('reorders by moving a single category', async () => {
    await categories.createDefaultsIfNeeded();
    const moved = await categories.reorder(0, 2);

    expect(moved?.payload).toMatchObject({ name: 'Work', order: 2.5 });
    expect((await categories.fetchAll()).map((c) => c.payload.name)).toEqual([
      'Reading List',
      'Research',
      'Work',
      'Inspiration',
      'Technology',
      'Entertainment'
    ]);
    expect(await categories.reorder(0, 9)).toBeUndefined();
  });

  it('uncategorizes bookmarks of a removed category', async () => {
    const category = await categories.add({ name: 'Temp', icon: 'tray', colorHex: '#8E8E93' });
    const bookmarks = new BookmarkCollection(bookmarkRepo);
    await bookmarks.add({ title: 'kept', categoryId: category.id }, { id: 'b1' });
    expect(await categories.bookmarkCount(category.id)).toBe(1);

    await categories.remove(category.id);
    expect(await categories.fetchById(category.id)).toBeUndefined();
    expect((await bookmarks.fetchByCategory(null)).map((b) => b.id)).toEqual(['b1']);
  });

  it('keeps the category and its bookmarks when uncategorizing fails', async () => {
    const category = await categories.add({ name: 'Temp', icon: 'tray', colorHex: '#8E8E93' });
    const bookmarks = new BookmarkCollection(bookmarkRepo);
    await bookmarks.add({ title: 'first', categoryId: category.id }, { id: 'b1' });
    await bookmarks.add({ title: 'second', categoryId: category.id }, { id: 'b2' });

    const update = bookmarkRepo.update.bind(bookmarkRepo);
    let calls = 0;
    vi.spyOn(bookmarkRepo, 'update').mockImplementation(async (id, patch) => {
      calls++;
      if (calls === 2) throw new LocalStorageError('disk I/O error');
      return update(id, patch);
    });

    await expect(categories.remove(category.id)).rejects.toBeInstanceOf(LocalStorageError);
    expect(calls).toBe(2);
    expect(await categories.fetchById(category.id)).toBeDefined();
    expect((await bookmarks.fetchByCategory(category.id)).map((b) => b.id).sort()).toEqual(['b1', 'b2']);
  });

  it('renames', async () => {
    const category = await categories.add({ name: 'Tmp', icon: 'tray', colorHex: '#8E8E93' });
    expect((await categories.rename(category.id, 'Later')).payload.name).toBe('Later');
  });
});
