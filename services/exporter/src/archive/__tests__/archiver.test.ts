import { readFile, readdir, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import sharp from 'sharp';
import { beforeEach, describe, it, expect } from 'vitest';

import { archiveName, MediaArchiver } from '../services/archiver.js';
import { ExportLayout } from '../services/layout.js';
import { ThumbnailPool, type ThumbnailJob } from '../services/thumbnails.js';
import type { ExportPaths, Message } from '../types/index.js';
import { attachment, message, silentLogger, tempDir, writeImage } from './fixtures.js';

const AT = new Date(Date.UTC(2024, 2, 5, 7, 8, 9));

class RecordingSink {
  readonly jobs: ThumbnailJob[] = [];
  enqueue(job: ThumbnailJob): void {
    this.jobs.push(job);
  }
}

describe('archiver', () => {
  let dir: string;
  let layout: ExportLayout;
  let sink: RecordingSink;
  let archiver: MediaArchiver;

  beforeEach(async () => {
    dir = await tempDir();
    layout = new ExportLayout(join(dir, 'out'));
    sink = new RecordingSink();
    archiver = new MediaArchiver({ thumbnails: sink, logger: silentLogger });
  });

  async function source(name: string, contents = `bytes of ${name}`): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, contents);
    return path;
  }

  function pathsWith(hydrated: Record<string, string | null>): ExportPaths {
    const paths = layout.pathsFor({ accountId: 'acc-1' }, 'Chat');
    paths.hydrated = new Map(Object.entries(hydrated));
    return paths;
  }

  // ── Names ────────────────────────────────────────────────────────

  describe('archiveName', () => {
    it('should prefix the UTC timestamp and keep the extension', () => {
      expect(archiveName(AT, 'holiday photo.JPG')).toBe('2024-03-05_07-08-09_holiday photo.JPG');
    });

    it('should strip reserved characters from stem and extension', () => {
      expect(archiveName(AT, 'a:b?.p|ng')).toBe('2024-03-05_07-08-09_ab.png');
    });
  });

  // ── Copying ──────────────────────────────────────────────────────

  it('should copy each resolved reference once and stamp it with the message time', async () => {
    const src = await source('a.txt', 'report');
    const messages: Message[] = [
      message({ timestamp: AT, attachments: [attachment('mxc://a', 'notes.txt', { kind: 'other' })] }),
      message({ attachments: [attachment('mxc://a', 'notes.txt', { kind: 'other' })] }),
    ];
    const paths = pathsWith({ 'mxc://a': src });

    const stats = await archiver.archiveChat(messages, paths);

    const target = join(paths.mediaDir, '2024-03-05_07-08-09_notes.txt');
    expect(stats).toEqual({ copied: 1, existing: 0, unresolved: 0, thumbnailsQueued: 0 });
    expect(paths.archived.get('mxc://a')).toBe(target);
    expect(await readFile(target, 'utf-8')).toBe('report');
    expect((await stat(target)).mtime.getTime()).toBe(AT.getTime());
  });

  it('should fall back to the hydrated file name', async () => {
    const src = await source('from-disk.bin');
    const paths = pathsWith({ 'mxc://a': src });

    await archiver.archiveChat([message({ timestamp: AT, attachments: [attachment('mxc://a', '', { kind: 'other' })] })], paths);

    expect(paths.archived.get('mxc://a')).toBe(join(paths.mediaDir, '2024-03-05_07-08-09_from-disk.bin'));
  });

  it('should record unresolved references as null without copying', async () => {
    const paths = pathsWith({ 'mxc://gone': null });

    const stats = await archiver.archiveChat([message({ attachments: [attachment('mxc://gone', 'x.jpg')] })], paths);

    expect(stats.unresolved).toBe(1);
    expect(paths.archived.get('mxc://gone')).toBeNull();
    expect(sink.jobs).toEqual([]);
  });

  it('should number references that would share a name, ignoring case', async () => {
    const paths = pathsWith({
      'mxc://1': await source('1.txt'),
      'mxc://2': await source('2.txt'),
      'mxc://3': await source('3.txt'),
    });
    const messages = [
      message({ timestamp: AT, attachments: [attachment('mxc://1', 'a.txt', { kind: 'other' })] }),
      message({ timestamp: AT, attachments: [attachment('mxc://2', 'A.txt', { kind: 'other' })] }),
      message({ timestamp: AT, attachments: [attachment('mxc://3', 'a.txt', { kind: 'other' })] }),
    ];

    await archiver.archiveChat(messages, paths);

    expect([...paths.archived.values()]).toEqual([
      join(paths.mediaDir, '2024-03-05_07-08-09_a.txt'),
      join(paths.mediaDir, '2024-03-05_07-08-09_A_2.txt'),
      join(paths.mediaDir, '2024-03-05_07-08-09_a_3.txt'),
    ]);
  });

  it('should number a same-named file with another extension so thumbnails stay apart', async () => {
    const paths = pathsWith({
      'mxc://jpg': await writeImage(join(dir, 'photo.jpg'), 1000, 800),
      'mxc://png': await writeImage(join(dir, 'photo.png'), 2000, 500, 'png'),
    });
    const pool = new ThumbnailPool({ workers: 2, logger: silentLogger });
    const parallel = new MediaArchiver({ thumbnails: pool, logger: silentLogger });

    await parallel.archiveChat(
      [message({ timestamp: AT, attachments: [attachment('mxc://jpg', 'photo.jpg'), attachment('mxc://png', 'photo.png')] })],
      paths,
    );
    const stats = await pool.join();

    const jpg = join(paths.mediaDir, '2024-03-05_07-08-09_photo.jpg');
    const png = join(paths.mediaDir, '2024-03-05_07-08-09_photo_2.png');
    expect([...paths.archived.values()]).toEqual([jpg, png]);
    expect(paths.thumbnails.get(jpg)).toBe(join(paths.thumbDir, '2024-03-05_07-08-09_photo.jpg'));
    expect(paths.thumbnails.get(png)).toBe(join(paths.thumbDir, '2024-03-05_07-08-09_photo_2.jpg'));
    expect(stats).toEqual({ written: 2, skipped: 0 });

    const fromPng = await sharp(join(paths.thumbDir, '2024-03-05_07-08-09_photo_2.jpg')).metadata();
    expect([fromPng.width, fromPng.height]).toEqual([960, 240]);
  });

  it('should leave existing files untouched on a second run', async () => {
    const src = await source('a.txt', 'original');
    const messages = [message({ timestamp: AT, attachments: [attachment('mxc://a', 'a.txt', { kind: 'other' })] })];

    const first = pathsWith({ 'mxc://a': src });
    await archiver.archiveChat(messages, first);
    await writeFile(src, 'changed upstream');

    const second = pathsWith({ 'mxc://a': src });
    const stats = await archiver.archiveChat(messages, second);

    expect(stats).toEqual({ copied: 0, existing: 1, unresolved: 0, thumbnailsQueued: 0 });
    expect(second.archived).toEqual(first.archived);
    expect(await readFile(join(first.mediaDir, '2024-03-05_07-08-09_a.txt'), 'utf-8')).toBe('original');
    expect(await readdir(first.mediaDir)).toEqual(['2024-03-05_07-08-09_a.txt']);
  });

  // ── Thumbnails ───────────────────────────────────────────────────

  it('should queue a thumbnail for a large image using reported dimensions', async () => {
    const paths = pathsWith({ 'mxc://big': await source('big.jpg') });

    const stats = await archiver.archiveChat(
      [message({ timestamp: AT, attachments: [attachment('mxc://big', 'big.jpg', { width: 2000, height: 1500 })] })],
      paths,
    );

    const archived = join(paths.mediaDir, '2024-03-05_07-08-09_big.jpg');
    const thumb = join(paths.thumbDir, '2024-03-05_07-08-09_big.jpg');
    expect(stats.thumbnailsQueued).toBe(1);
    expect(sink.jobs).toEqual([{ source: archived, target: thumb, maxDimension: 640 }]);
    expect(paths.thumbnails.get(archived)).toBe(thumb);
  });

  it('should read dimensions from the file when the source has none', async () => {
    const big = await writeImage(join(dir, 'wide.png'), 1200, 300, 'png');
    const small = await writeImage(join(dir, 'small.png'), 900, 300, 'png');
    const paths = pathsWith({ 'mxc://wide': big, 'mxc://small': small });

    await archiver.archiveChat(
      [message({ timestamp: AT, attachments: [attachment('mxc://wide', 'wide.png'), attachment('mxc://small', 'small.png')] })],
      paths,
    );

    expect(sink.jobs.map((j) => j.target)).toEqual([join(paths.thumbDir, '2024-03-05_07-08-09_wide.jpg')]);
    expect(sink.jobs[0].maxDimension).toBe(960);
  });

  it('should link the full image when its header cannot be read', async () => {
    const paths = pathsWith({ 'mxc://broken': await source('broken.jpg', 'not really a jpeg') });

    const stats = await archiver.archiveChat(
      [message({ timestamp: AT, attachments: [attachment('mxc://broken', 'broken.jpg')] })],
      paths,
    );

    expect(stats.copied).toBe(1);
    expect(stats.thumbnailsQueued).toBe(0);
    expect(paths.thumbnails.size).toBe(0);
  });

  it('should not queue thumbnails for other kinds', async () => {
    const paths = pathsWith({ 'mxc://v': await source('clip.jpg') });

    await archiver.archiveChat(
      [message({ attachments: [attachment('mxc://v', 'clip.jpg', { kind: 'video', width: 4000, height: 3000 })] })],
      paths,
    );

    expect(sink.jobs).toEqual([]);
  });
});
