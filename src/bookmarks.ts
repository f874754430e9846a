/**
 * @fileoverview Bookmark Collection
 *
 * Collection definition, payload defaults and the query helpers the host
 * UI needs (unread, favourites, per-category, recent, per-source). Every
 * mutation goes through the injected {@link Repository}, so whether it is
 * synced depends only on how the runtime composed that repository.
 */

import type { CollectionDefinition, Repository } from './repository';
import type { Bookmark, BookmarkPayload, BookmarkSource, CreateOptions } from './types';

export const BOOKMARKS: CollectionDefinition<BookmarkPayload> = {
  name: 'bookmarks',
  searchText: (payload) => [payload.title, payload.url ?? '', payload.note, ...payload.tags].join('\n'),
  isLarge: (payload) => payload.attachmentRefs.length > 0
};

/** Host suffix → source. First match wins. */
const SOURCE_HOSTS: ReadonlyArray<[BookmarkSource, string[]]> = [
  ['twitter', ['twitter.com', 'x.com']],
  ['reddit', ['reddit.com']],
  ['linkedin', ['linkedin.com']],
  ['medium', ['medium.com']],
  ['youtube', ['youtube.com', 'youtu.be']],
  ['instagram', ['instagram.com']],
  ['github', ['github.com']]
];

const ARTICLE_HINTS = ['blog', 'news', 'article', 'post', 'dev.to', 'hashnode'];

/**
 * Guess where a URL was shared from.
 *
 * @example
 * detectSource('https://www.youtube.com/watch?v=abc'); // 'youtube'
 * detectSource('https://example.com/blog/hello');      // 'article'
 * detectSource(null);                                   // 'other'
 */
export function detectSource(url: string | null): BookmarkSource {
  if (!url) return 'other';

  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return 'other';
  }

  for (const [source, hosts] of SOURCE_HOSTS) {
    if (hosts.some((h) => host === h || host.endsWith(`.${h}`))) return source;
  }

  const lowered = url.toLowerCase();
  return ARTICLE_HINTS.some((hint) => lowered.includes(hint)) ? 'article' : 'other';
}

export type BookmarkInput = Pick<BookmarkPayload, 'title'> & Partial<BookmarkPayload>;

/** Fill in defaults; `source` is detected from `url` when not given. */
export function newBookmarkPayload(input: BookmarkInput): BookmarkPayload {
  const url = input.url ?? null;
  return {
    title: input.title,
    url,
    note: input.note ?? '',
    source: input.source ?? detectSource(url),
    isRead: input.isRead ?? false,
    isFavorite: input.isFavorite ?? false,
    categoryId: input.categoryId ?? null,
    tags: input.tags ?? [],
    attachmentRefs: input.attachmentRefs ?? []
  };
}

export class BookmarkCollection {
  readonly repository: Repository<BookmarkPayload>;

  constructor(repository: Repository<BookmarkPayload>) {
    this.repository = repository;
  }

  add(input: BookmarkInput, options?: CreateOptions): Promise<Bookmark> {
    return this.repository.create(newBookmarkPayload(input), options);
  }

  fetchAll(): Promise<Bookmark[]> {
    return this.repository.fetchAll();
  }

  search(query: string): Promise<Bookmark[]> {
    return this.repository.search(query);
  }

  fetchUnread(): Promise<Bookmark[]> {
    return this.repository.filter((b) => !b.payload.isRead);
  }

  fetchFavorites(): Promise<Bookmark[]> {
    return this.repository.filter((b) => b.payload.isFavorite);
  }

  /** `null` returns uncategorized bookmarks. */
  fetchByCategory(categoryId: string | null): Promise<Bookmark[]> {
    return this.repository.filter((b) => b.payload.categoryId === categoryId);
  }

  filterBySource(source: BookmarkSource): Promise<Bookmark[]> {
    return this.repository.filter((b) => b.payload.source === source);
  }

  async fetchRecent(limit: number): Promise<Bookmark[]> {
    const all = await this.repository.fetchAll();
    return all.slice(0, limit);
  }

  markAsRead(id: string, isRead = true): Promise<Bookmark> {
    return this.repository.update(id, { isRead });
  }

  async toggleFavorite(id: string): Promise<Bookmark | undefined> {
    const existing = await this.repository.fetchById(id);
    if (!existing) return undefined;
    return this.repository.update(id, { isFavorite: !existing.payload.isFavorite });
  }

  /** Move bookmarks to a category (`null` to uncategorize). */
  async moveToCategory(ids: readonly string[], categoryId: string | null): Promise<Bookmark[]> {
    const moved: Bookmark[] = [];
    for (const id of ids) {
      moved.push(await this.repository.update(id, { categoryId }));
    }
    return moved;
  }

  remove(id: string): Promise<Bookmark> {
    return this.repository.delete(id);
  }

  removeMany(ids: readonly string[]): Promise<Bookmark[]> {
    return this.repository.deleteMany(ids);
  }

  count(): Promise<number> {
    return this.repository.count();
  }
}
