/**
 * Thumbnail generation on a fixed-size background pool.
 *
 * Archiving decides which images need a thumbnail and queues a job; page
 * rendering carries on without waiting. The orchestrator joins the pool
 * once, after every chat, so all thumbnails exist before the run reports
 * success. The first failing job stops the pool: queued jobs are dropped
 * unexecuted and the failure is raised from `join`.
 */

import { access, mkdir, rename, rm } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';

import type pino from 'pino';
import sharp from 'sharp';

import { ExportError } from '../errors.js';
import { defaultLogger } from '../logger.js';

export const THUMBNAIL_EXT = '.jpg';
export const THUMBNAIL_QUALITY = 75;

/**
 * Longest side, in pixels, above which an image gets a thumbnail. PNGs are
 * mostly screenshots and stay legible only at a larger size.
 */
const MAX_DIMENSION: Record<string, number> = {
  '.jpg': 640,
  '.jpeg': 640,
  '.png': 960,
};

export interface ThumbnailJob {
  source: string;
  target: string;
  maxDimension: number;
}

export interface Dimensions {
  width: number;
  height: number;
}

/** Threshold for an archived file, or null when its type is never thumbnailed. */
export function maxDimensionFor(path: string): number | null {
  return MAX_DIMENSION[extname(path).toLowerCase()] ?? null;
}

export function thumbnailPathFor(archivedPath: string, thumbDir: string): string {
  const name = basename(archivedPath, extname(archivedPath));
  return join(thumbDir, `${name}${THUMBNAIL_EXT}`);
}

/**
 * Decide whether an archived image needs a thumbnail. Dimensions come from
 * the source when it reported them, otherwise from the image header.
 */
export async function planThumbnail(
  archivedPath: string,
  thumbDir: string,
  known?: Partial<Dimensions>,
): Promise<ThumbnailJob | null> {
  const maxDimension = maxDimensionFor(archivedPath);
  if (maxDimension === null) return null;

  let width = known?.width;
  let height = known?.height;
  if (width === undefined || height === undefined) {
    const metadata = await sharp(archivedPath).metadata();
    width = metadata.width;
    height = metadata.height;
  }
  if (width === undefined || height === undefined) return null;
  if (width <= maxDimension && height <= maxDimension) return null;

  return { source: archivedPath, target: thumbnailPathFor(archivedPath, thumbDir), maxDimension };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Downsample to the threshold on the longer axis, keep the aspect ratio,
 * normalize to sRGB on a white background and encode as JPEG. Returns false
 * when the thumbnail already exists.
 */
export async function renderThumbnail(job: ThumbnailJob): Promise<boolean> {
  if (await exists(job.target)) return false;

  await mkdir(dirname(job.target), { recursive: true });
  const temp = `${job.target}.${process.pid}.tmp`;
  try {
    await sharp(job.source)
      .rotate()
      .resize({
        width: job.maxDimension,
        height: job.maxDimension,
        fit: 'inside',
        withoutEnlargement: true,
      })
      .flatten({ background: '#ffffff' })
      .toColourspace('srgb')
      .jpeg({ quality: THUMBNAIL_QUALITY })
      .toFile(temp);
    await rename(temp, job.target);
  } catch (err) {
    await rm(temp, { force: true });
    throw err;
  }
  return true;
}

export interface ThumbnailPoolOptions {
  workers: number;
  /** Job runner; resolves true when a file was written. */
  run?: (job: ThumbnailJob) => Promise<boolean>;
  logger?: pino.Logger;
}

export interface ThumbnailStats {
  written: number;
  skipped: number;
}

interface Waiter {
  resolve: (stats: ThumbnailStats) => void;
  reject: (err: unknown) => void;
}

/**
 * FIFO job queue consumed by a fixed number of concurrent workers.
 * `enqueue` never waits; `join` settles once the queue is empty and every
 * worker is idle.
 */
export class ThumbnailPool {
  readonly workers: number;
  private readonly run: (job: ThumbnailJob) => Promise<boolean>;
  private readonly log: pino.Logger;
  private readonly queue: ThumbnailJob[] = [];
  private active = 0;
  private failure: { error: unknown } | null = null;
  private discarded = 0;
  private readonly stats: ThumbnailStats = { written: 0, skipped: 0 };
  private waiters: Waiter[] = [];

  constructor(options: ThumbnailPoolOptions) {
    if (!Number.isInteger(options.workers) || options.workers < 1) {
      throw new RangeError(`Thumbnail pool needs at least one worker, got ${options.workers}`);
    }
    this.workers = options.workers;
    this.run = options.run ?? renderThumbnail;
    this.log = options.logger ?? defaultLogger('thumbnails');
  }

  /** Jobs waiting for a worker. */
  get pending(): number {
    return this.queue.length;
  }

  enqueue(job: ThumbnailJob): void {
    if (this.failure) {
      // The run is already failing; the job is done without executing
      this.discarded++;
      return;
    }
    this.queue.push(job);
    this.dispatch();
  }

  /**
   * Wait for every queued job. Rejects with THUMBNAIL_FAILED carrying the
   * first worker error; by then the queue is empty.
   */
  join(): Promise<ThumbnailStats> {
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
      this.settle();
    });
  }

  /**
   * Drop every queued job without running it. Jobs already on a worker
   * finish; `join` then settles as usual.
   */
  cancel(): void {
    this.discarded += this.queue.length;
    this.queue.length = 0;
    this.settle();
  }

  private dispatch(): void {
    while (this.active < this.workers && !this.failure) {
      const job = this.queue.shift();
      if (job === undefined) break;
      this.active++;
      void this.work(job);
    }
  }

  private async work(job: ThumbnailJob): Promise<void> {
    try {
      if (await this.run(job)) {
        this.stats.written++;
        this.log.debug({ target: job.target }, 'Thumbnail written');
      } else {
        this.stats.skipped++;
      }
    } catch (err) {
      this.fail(job, err);
    } finally {
      this.active--;
      this.dispatch();
      this.settle();
    }
  }

  private fail(job: ThumbnailJob, err: unknown): void {
    if (this.failure) return;
    this.failure = { error: err };
    this.discarded += this.queue.length;
    this.queue.length = 0;
    this.log.error({ err, source: job.source, discarded: this.discarded }, 'Thumbnail worker failed, draining queue');
  }

  private settle(): void {
    if (this.active > 0 || this.queue.length > 0 || this.waiters.length === 0) return;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (this.failure) {
        const { error } = this.failure;
        const message = error instanceof Error ? error.message : String(error);
        waiter.reject(new ExportError('THUMBNAIL_FAILED', `Thumbnail generation failed: ${message}`, { cause: error }));
      } else {
        waiter.resolve({ ...this.stats });
      }
    }
  }
}
