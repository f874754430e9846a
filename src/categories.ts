/**
 * @fileoverview Category Collection
 *
 * Categories are ordered by a fractional `order` value so a move updates
 * a single record (and therefore a single outbox entry).
 */

import { OUTBOX_TABLE } from './database';
import type { CollectionDefinition, Repository } from './repository';
import type { BookmarkPayload, Category, CategoryPayload } from './types';
import { calculateNewOrder } from './utils';

export const CATEGORIES: CollectionDefinition<CategoryPayload> = {
  name: 'categories',
  searchText: (payload) => payload.name,
  isLarge: () => false
};

export const DEFAULT_CATEGORIES: readonly CategoryPayload[] = [
  { name: 'Work', icon: 'briefcase.fill', colorHex: '#007AFF', order: 0 },
  { name: 'Reading List', icon: 'book.fill', colorHex: '#34C759', order: 1 },
  { name: 'Research', icon: 'magnifyingglass', colorHex: '#FF9500', order: 2 },
  { name: 'Inspiration', icon: 'lightbulb.fill', colorHex: '#FFD60A', order: 3 },
  { name: 'Technology', icon: 'laptopcomputer', colorHex: '#5856D6', order: 4 },
  { name: 'Entertainment', icon: 'play.circle.fill', colorHex: '#FF2D55', order: 5 }
];

function byOrder(a: Category, b: Category): number {
  return a.payload.order - b.payload.order;
}

export class CategoryCollection {
  readonly repository: Repository<CategoryPayload>;
  private readonly bookmarks: Repository<BookmarkPayload> | undefined;

  /**
   * @param bookmarks - When given, deleting a category uncategorizes its bookmarks.
   */
  constructor(repository: Repository<CategoryPayload>, bookmarks?: Repository<BookmarkPayload>) {
    this.repository = repository;
    this.bookmarks = bookmarks;
  }

  async fetchAll(): Promise<Category[]> {
    const all = await this.repository.fetchAll();
    return all.sort(byOrder);
  }

  fetchById(id: string): Promise<Category | undefined> {
    return this.repository.fetchById(id);
  }

  /** Appends after the last category unless `order` is given. */
  async add(input: Omit<CategoryPayload, 'order'> & { order?: number }): Promise<Category> {
    let order = input.order;
    if (order === undefined) {
      const all = await this.fetchAll();
      order = all.length > 0 ? all[all.length - 1].payload.order + 1 : 0;
    }
    return this.repository.create({ ...input, order });
  }

  rename(id: string, name: string): Promise<Category> {
    return this.repository.update(id, { name });
  }

  /** Deletes the category and uncategorizes its bookmarks in one transaction. */
  async remove(id: string): Promise<Category> {
    const bookmarks = this.bookmarks;
    if (!bookmarks) return this.repository.delete(id);
    return this.repository.transaction([bookmarks.definition.name, OUTBOX_TABLE], async () => {
      const members = await bookmarks.filter((b) => b.payload.categoryId === id);
      for (const bookmark of members) {
        await bookmarks.update(bookmark.id, { categoryId: null });
      }
      return this.repository.delete(id);
    });
  }

  async bookmarkCount(categoryId: string): Promise<number> {
    if (!this.bookmarks) return 0;
    const members = await this.bookmarks.filter((b) => b.payload.categoryId === categoryId);
    return members.length;
  }

  /**
   * Seed {@link DEFAULT_CATEGORIES} into an empty collection.
   *
   * @returns The created categories (empty when some already existed).
   */
  async createDefaultsIfNeeded(): Promise<Category[]> {
    if ((await this.repository.count()) > 0) return [];
    const created: Category[] = [];
    for (const payload of DEFAULT_CATEGORIES) {
      created.push(await this.repository.create({ ...payload }));
    }
    return created;
  }

  /**
   * Move the category at `fromIndex` (in display order) to `toIndex`.
   *
   * @returns The moved category, or `undefined` for an out-of-range index.
   */
  async reorder(fromIndex: number, toIndex: number): Promise<Category | undefined> {
    const all = await this.fetchAll();
    if (fromIndex < 0 || fromIndex >= all.length || toIndex < 0 || toIndex >= all.length) {
      return undefined;
    }
    if (fromIndex === toIndex) return all[fromIndex];
    const order = calculateNewOrder(
      all.map((c) => c.payload),
      fromIndex,
      toIndex
    );
    return this.repository.update(all[fromIndex].id, { order });
  }
}
