#!/usr/bin/env node

/**
 * @fileoverview CLI producer for the share inbox.
 *
 * Usage:
 *   npm run share -- --inbox <dir> [--source <id>] [--url <url>]... [--text <text>]... [--attachment <file>]...
 *
 * Attachments are copied into `<dir>/attachments/` and referenced by file
 * name. The running host imports the document on its next activation.
 */

import { copyFile, mkdir } from 'fs/promises';
import { basename, join } from 'path';
import { appendToInbox, ATTACHMENTS_DIR } from '../inbox';
import type { InboxPayload } from '../types';
import { generateId } from '../utils';

// =============================================================================
//                                  TYPES
// =============================================================================

interface ShareOptions {
  inbox: string;
  source: string;
  urls: string[];
  texts: string[];
  attachments: string[];
}

// =============================================================================
//                              ARG PARSING
// =============================================================================

function usage(): never {
  console.error(
    'Usage: share --inbox <dir> [--source <id>] [--url <url>]... [--text <text>]... [--attachment <file>]...'
  );
  process.exit(1);
}

function parseArgs(args: readonly string[]): ShareOptions {
  const options: ShareOptions = { inbox: '', source: 'cli', urls: [], texts: [], attachments: [] };

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = args[i + 1];
    if (value === undefined) throw new Error(`Missing value for ${flag}`);
    switch (flag) {
      case '--inbox':
        options.inbox = value;
        break;
      case '--source':
        options.source = value;
        break;
      case '--url':
        options.urls.push(value);
        break;
      case '--text':
        options.texts.push(value);
        break;
      case '--attachment':
        options.attachments.push(value);
        break;
      default:
        throw new Error(`Unknown option ${flag}`);
    }
    i++;
  }

  if (!options.inbox) throw new Error('--inbox is required');
  if (options.urls.length === 0 && options.texts.length === 0) {
    throw new Error('Nothing to share: pass --url or --text');
  }
  return options;
}

// =============================================================================
//                                  MAIN
// =============================================================================

async function main(): Promise<void> {
  let options: ShareOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    usage();
  }

  const attachmentDir = join(options.inbox, ATTACHMENTS_DIR);
  await mkdir(attachmentDir, { recursive: true });
  const attachmentRefs: string[] = [];
  for (const file of options.attachments) {
    const ref = `${generateId().slice(0, 8)}-${basename(file)}`;
    await copyFile(file, join(attachmentDir, ref));
    attachmentRefs.push(ref);
  }

  const payload: InboxPayload = {
    sourceId: options.source,
    createdAt: new Date().toISOString(),
    urls: options.urls,
    texts: options.texts,
    attachmentRefs
  };
  const path = await appendToInbox(options.inbox, payload);
  console.log(`  [write] ${path}`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
