/**
 * Output tree layout:
 *
 *   index.html
 *   chat/<account>/<chat>.html
 *   gallery/<account>/<chat>.html
 *   media/full/<account>/<chat>/<archived files>
 *   media/thumb/<account>/<chat>/<thumbnails>
 *   res/<stylesheet and gallery script>
 *
 * Every segment derived from source data is sanitized. Links between files
 * are relative to the linking file's directory.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join, relative, sep } from 'node:path';

import type { ChatSummary, ExportPaths } from '../types/index.js';
import { sanitizeFileName } from './sanitize.js';

export const RESOURCE_DIR = 'res';

export class ExportLayout {
  readonly root: string;
  /** Chat file stems already taken per account bucket, lowercased. */
  private readonly taken = new Map<string, Set<string>>();

  constructor(root: string) {
    this.root = root;
  }

  get indexFile(): string {
    return join(this.root, 'index.html');
  }

  get resourceDir(): string {
    return join(this.root, RESOURCE_DIR);
  }

  accountDir(chat: Pick<ChatSummary, 'accountId'>): string {
    return sanitizeFileName(chat.accountId);
  }

  /**
   * Reserve a file stem for a chat within its account bucket. The first
   * chat with a given title gets the plain title; a later chat whose title
   * collides (case-insensitively) folds its id into the name.
   */
  allocateChatStem(chat: Pick<ChatSummary, 'id' | 'accountId'>, title: string): string {
    const bucketKey = this.accountDir(chat);
    let bucket = this.taken.get(bucketKey);
    if (!bucket) {
      bucket = new Set();
      this.taken.set(bucketKey, bucket);
    }

    let stem = sanitizeFileName(title);
    if (bucket.has(stem.toLowerCase())) {
      stem = sanitizeFileName(`${title} (${chat.id})`);
    }
    // Same title and id twice is a source defect; keep the names apart anyway
    for (let n = 2; bucket.has(stem.toLowerCase()); n++) {
      stem = sanitizeFileName(`${title} (${chat.id}) ${n}`);
    }
    bucket.add(stem.toLowerCase());
    return stem;
  }

  /** Fresh per-chat paths with empty reference maps. */
  pathsFor(chat: Pick<ChatSummary, 'accountId'>, stem: string): ExportPaths {
    const account = this.accountDir(chat);
    return {
      chatFile: join(this.root, 'chat', account, `${stem}.html`),
      galleryFile: join(this.root, 'gallery', account, `${stem}.html`),
      mediaDir: join(this.root, 'media', 'full', account, stem),
      thumbDir: join(this.root, 'media', 'thumb', account, stem),
      hydrated: new Map(),
      archived: new Map(),
      thumbnails: new Map(),
    };
  }
}

/**
 * URL of `target` as seen from the file `from`: relative to `from`'s
 * directory, forward slashes, each segment percent-encoded.
 */
export function relativeUrl(from: string, target: string): string {
  const rel = relative(dirname(from), target);
  return rel.split(sep).map(encodeURIComponent).join('/');
}

/**
 * Write a file through a temporary sibling so an interrupted run never
 * leaves a truncated page behind.
 */
export async function writeFileAtomic(path: string, contents: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const temp = `${path}.${process.pid}.tmp`;
  try {
    await writeFile(temp, contents, 'utf-8');
    await rename(temp, path);
  } catch (err) {
    await rm(temp, { force: true });
    throw err;
  }
}
