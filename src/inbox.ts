/**
 * @fileoverview Cross-Process Inbox
 *
 * A producer process (the `share` CLI, a browser extension host, ...) that
 * cannot open the database appends {@link InboxPayload} documents to a
 * shared directory; the host process imports them as bookmarks.
 *
 * Layout:
 *
 *   <dir>/pending/<13-digit ms>-<sourceId>-<id>.json   one payload per file
 *   <dir>/attachments/<name>                           files named by attachmentRefs
 *
 * Producers write to a temporary name and rename into `pending/`, so the
 * consumer never sees a half-written document. Delivery is at-least-once:
 * a document is removed only after its bookmark committed, and a crash in
 * between replays it. Replays are absorbed by the content fingerprint.
 */

import { mkdir, readFile, readdir, rename, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { debugError, debugLog, debugWarn } from './debug';
import { LocalStorageError, MailboxCorruptionError, QuotaExceededError } from './errors';
import { newBookmarkPayload } from './bookmarks';
import type { Repository } from './repository';
import type { BookmarkPayload, InboxPayload } from './types';
import { contentFingerprint, generateId } from './utils';

export const PENDING_DIR = 'pending';
export const ATTACHMENTS_DIR = 'attachments';

export interface InboxSummary {
  processed: number;
  created: number;
  duplicates: number;
  /** Valid documents with neither a URL nor text. */
  empty: number;
  corrupted: number;
  /** Denied by the usage limit. */
  rejected: number;
}

// =============================================================================
// Validation
// =============================================================================

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/** Describe why `value` is not an {@link InboxPayload}, or `null` if it is. */
export function validateInboxPayload(value: unknown): string | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return 'not an object';
  if (!('sourceId' in value) || typeof value.sourceId !== 'string' || value.sourceId === '') {
    return 'missing sourceId';
  }
  if (!('createdAt' in value) || typeof value.createdAt !== 'string' || Number.isNaN(Date.parse(value.createdAt))) {
    return 'invalid createdAt';
  }
  if (!('urls' in value) || !isStringArray(value.urls)) return 'urls must be a string array';
  if (!('texts' in value) || !isStringArray(value.texts)) return 'texts must be a string array';
  if (!('attachmentRefs' in value) || !isStringArray(value.attachmentRefs)) {
    return 'attachmentRefs must be a string array';
  }
  return null;
}

function isInboxPayload(value: unknown): value is InboxPayload {
  return validateInboxPayload(value) === null;
}

/** Stable identity of a shared item, independent of when it was delivered. */
export function inboxFingerprint(payload: InboxPayload): string {
  return contentFingerprint('inbox', payload.sourceId, payload.urls, payload.texts);
}

/**
 * Map a payload to a bookmark: the first URL (or, without one, the first
 * text) becomes the title; the remaining URLs and the texts become the note.
 *
 * @returns `null` for a payload with nothing to save.
 */
export function bookmarkFromPayload(payload: InboxPayload): BookmarkPayload | null {
  const url = payload.urls.find((u) => u.trim() !== '') ?? null;
  const title = url ?? payload.texts.find((t) => t.trim() !== '') ?? null;
  if (title === null) return null;

  const rest = url ? payload.urls.filter((u) => u !== url) : [];
  return newBookmarkPayload({
    title,
    url,
    note: [...rest, ...payload.texts.filter((t) => t !== title)].join('\n'),
    attachmentRefs: [...payload.attachmentRefs]
  });
}

// =============================================================================
// Producer
// =============================================================================

/**
 * Append one payload to the mailbox at `dir`.
 *
 * @returns Path of the delivered document.
 */
export async function appendToInbox(dir: string, payload: InboxPayload): Promise<string> {
  const pending = join(dir, PENDING_DIR);
  await mkdir(pending, { recursive: true });
  await mkdir(join(dir, ATTACHMENTS_DIR), { recursive: true });

  const stamp = String(Date.parse(payload.createdAt)).padStart(13, '0');
  const safeSource = payload.sourceId.replace(/[^a-zA-Z0-9_-]/g, '_');
  const target = join(pending, `${stamp}-${safeSource}-${generateId().slice(0, 8)}.json`);
  const temp = join(dir, `.${generateId()}.tmp`);

  await writeFile(temp, JSON.stringify(payload), 'utf-8');
  await rename(temp, target);
  return target;
}

// =============================================================================
// Consumer
// =============================================================================

export class InboxProcessor {
  private readonly dir: string;
  private readonly bookmarks: Repository<BookmarkPayload>;
  private running: Promise<InboxSummary> | null = null;

  /**
   * @param bookmarks - Should be the synced repository so imports reach the outbox.
   */
  constructor(dir: string, bookmarks: Repository<BookmarkPayload>) {
    this.dir = dir;
    this.bookmarks = bookmarks;
  }

  /**
   * Import every pending document, oldest first. Concurrent calls share
   * one run.
   *
   * @throws {LocalStorageError} When a bookmark could not be written; the
   *         document stays in the mailbox for the next run.
   */
  process(): Promise<InboxSummary> {
    if (!this.running) {
      this.running = this.processPending().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private async listPending(): Promise<string[]> {
    try {
      const names = await readdir(join(this.dir, PENDING_DIR));
      return names.filter((name) => name.endsWith('.json')).sort();
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }
  }

  private async processPending(): Promise<InboxSummary> {
    const summary: InboxSummary = { processed: 0, created: 0, duplicates: 0, empty: 0, corrupted: 0, rejected: 0 };
    const names = await this.listPending();
    if (names.length === 0) return summary;

    debugLog(`[INBOX] Found ${names.length} pending document(s)`);
    for (const name of names) {
      const path = join(this.dir, PENDING_DIR, name);
      const handled = await this.processDocument(name, path, summary);
      if (handled) await unlink(path).catch((e) => debugWarn(`[INBOX] Could not remove ${name}:`, e));
      summary.processed++;
    }

    debugLog(
      `[INBOX] Done: created=${summary.created} duplicates=${summary.duplicates} ` +
        `empty=${summary.empty} corrupted=${summary.corrupted} rejected=${summary.rejected}`
    );
    return summary;
  }

  /**
   * @returns Whether the document can be removed. Shares denied by the
   *          usage limit stay pending until the limit is lifted.
   */
  private async processDocument(name: string, path: string, summary: InboxSummary): Promise<boolean> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(path, 'utf-8'));
    } catch (e) {
      summary.corrupted++;
      debugError('[INBOX]', new MailboxCorruptionError(name, 'invalid JSON', { cause: e }).message);
      return true;
    }

    if (!isInboxPayload(parsed)) {
      summary.corrupted++;
      debugError('[INBOX]', new MailboxCorruptionError(name, validateInboxPayload(parsed) ?? 'invalid').message);
      return true;
    }

    const bookmark = bookmarkFromPayload(parsed);
    if (!bookmark) {
      summary.empty++;
      debugWarn(`[INBOX] ${name} has nothing to save`);
      return true;
    }

    const fingerprint = inboxFingerprint(parsed);
    if (await this.bookmarks.findByFingerprint(fingerprint)) {
      summary.duplicates++;
      debugLog(`[INBOX] ${name} already imported`);
      return true;
    }

    try {
      await this.bookmarks.create(bookmark, { fingerprint });
      summary.created++;
      debugLog(`[INBOX] Saved bookmark from ${parsed.sourceId}: ${bookmark.title}`);
      return true;
    } catch (error) {
      if (error instanceof QuotaExceededError) {
        summary.rejected++;
        debugWarn(`[INBOX] ${name} kept for later: ${error.message}`);
        return false;
      }
      if (error instanceof LocalStorageError) throw error;
      throw new LocalStorageError(`Inbox import of ${name} failed`, { cause: error });
    }
  }
}
