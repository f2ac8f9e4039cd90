/**
 * Media archiving: copy hydrated attachment bytes into the export's media
 * store under deterministic names, so a re-export finds its previous files
 * and leaves them untouched.
 */

import { access, copyFile, mkdir, utimes } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

import type pino from 'pino';

import { defaultLogger } from '../logger.js';
import type { ExportPaths, Message } from '../types/index.js';
import { sanitizeFileName } from './sanitize.js';
import { planThumbnail, type ThumbnailJob } from './thumbnails.js';
import { fileStamp } from './timestamps.js';

const RESERVED_CHARS = /["*/:<>?\\|]/g;

/** Where thumbnail jobs go; the pool in production, a recorder in tests. */
export interface ThumbnailSink {
  enqueue(job: ThumbnailJob): void;
}

/**
 * `{YYYY-MM-DD_HH-MM-SS}_{stem}{ext}` with the stem part sanitized. The
 * extension keeps its dot and case but loses reserved characters.
 */
export function archiveName(timestamp: Date, fileName: string): string {
  const ext = extname(fileName).replace(RESERVED_CHARS, '');
  const stem = basename(fileName, extname(fileName));
  return sanitizeFileName(`${fileStamp(timestamp)}_${stem}`) + ext;
}

/** Adds `_2`, `_3`, ... before the extension. */
function numbered(name: string, n: number): string {
  const ext = extname(name);
  return `${name.slice(0, name.length - ext.length)}_${n}${ext}`;
}

function stemKey(name: string): string {
  return basename(name, extname(name)).toLowerCase();
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export interface ArchiveStats {
  copied: number;
  existing: number;
  unresolved: number;
  thumbnailsQueued: number;
}

export interface MediaArchiverOptions {
  thumbnails: ThumbnailSink;
  logger?: pino.Logger;
}

export class MediaArchiver {
  private readonly thumbnails: ThumbnailSink;
  private readonly log: pino.Logger;

  constructor(options: MediaArchiverOptions) {
    this.thumbnails = options.thumbnails;
    this.log = options.logger ?? defaultLogger('archiver');
  }

  /**
   * Archive every attachment of a chat, filling `paths.archived` (and
   * `paths.thumbnails` for images that get one) from `paths.hydrated`.
   *
   * A reference archives once, under the name of its first occurrence in
   * message order. Two references that would share a name, or a stem
   * under different extensions, are numbered apart in that same order, so
   * names repeat across runs. Thumbnails are named by stem alone. Existing
   * targets are not copied again; fresh copies take the message time as
   * mtime.
   */
  async archiveChat(messages: readonly Message[], paths: ExportPaths): Promise<ArchiveStats> {
    const stats: ArchiveStats = { copied: 0, existing: 0, unresolved: 0, thumbnailsQueued: 0 };
    const claimed = new Set<string>();
    let dirReady = false;

    for (const message of messages) {
      for (const attachment of message.attachments) {
        const ref = attachment.remoteRef;
        if (paths.archived.has(ref)) continue;

        const source = paths.hydrated.get(ref) ?? null;
        if (source === null) {
          paths.archived.set(ref, null);
          stats.unresolved++;
          continue;
        }

        let name = archiveName(message.timestamp, attachment.fileName || basename(source));
        const base = name;
        for (let n = 2; claimed.has(stemKey(name)); n++) {
          name = numbered(base, n);
        }
        claimed.add(stemKey(name));

        const target = join(paths.mediaDir, name);
        if (await exists(target)) {
          stats.existing++;
        } else {
          if (!dirReady) {
            await mkdir(paths.mediaDir, { recursive: true });
            dirReady = true;
          }
          await copyFile(source, target);
          await utimes(target, message.timestamp, message.timestamp);
          stats.copied++;
        }
        paths.archived.set(ref, target);

        if (attachment.kind === 'image') {
          let job: ThumbnailJob | null = null;
          try {
            job = await planThumbnail(target, paths.thumbDir, {
              width: attachment.width,
              height: attachment.height,
            });
          } catch (err) {
            // Unreadable header: the page links the full image instead
            this.log.warn({ err, target }, 'Cannot read image dimensions, no thumbnail');
          }
          if (job) {
            paths.thumbnails.set(target, job.target);
            this.thumbnails.enqueue(job);
            stats.thumbnailsQueued++;
          }
        }
      }
    }

    this.log.info(stats, 'Media archived');
    return stats;
  }
}
