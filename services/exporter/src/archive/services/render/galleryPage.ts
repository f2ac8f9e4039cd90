import { basename, join } from 'node:path';

import type { ExportPaths, GalleryEntry, Message } from '../../types/index.js';
import { relativeUrl } from '../layout.js';
import { escapeHtml, renderPage, scriptJson } from './html.js';

/**
 * One `[fileName, messageId, hasThumbnail]` triple per distinct archived
 * reference, in message order. The first occurrence of a reference, or of
 * an archived file name, wins.
 */
export function galleryEntries(messages: readonly Message[], paths: ExportPaths): GalleryEntry[] {
  const entries: GalleryEntry[] = [];
  const seenRefs = new Set<string>();
  const seenFiles = new Set<string>();

  for (const message of messages) {
    for (const attachment of message.attachments) {
      const ref = attachment.remoteRef;
      if (seenRefs.has(ref)) continue;
      seenRefs.add(ref);

      const archived = paths.archived.get(ref) ?? null;
      if (archived === null) continue;
      const fileName = basename(archived);
      if (seenFiles.has(fileName)) continue;
      seenFiles.add(fileName);

      entries.push([fileName, message.id, paths.thumbnails.has(archived) ? 1 : 0]);
    }
  }
  return entries;
}

export interface GalleryPageContext {
  title: string;
  messages: readonly Message[];
  paths: ExportPaths;
  resourceDir: string;
}

/**
 * Static gallery shell. The tiles are built client side by the gallery
 * script from the embedded `MEDIA` triples and the three URL prefixes.
 */
export function renderGalleryPage(ctx: GalleryPageContext): string {
  const { paths } = ctx;
  const file = paths.galleryFile;
  const entries = galleryEntries(ctx.messages, paths);
  const chatUrl = relativeUrl(file, paths.chatFile);

  const body = [
    '<header>',
    `<h1>Media: ${escapeHtml(ctx.title)}</h1>`,
    `<nav><a href="${escapeHtml(chatUrl)}">Back to chat</a></nav>`,
    '<div class="gallery-search">',
    '<input id="search-text" type="search" placeholder="Filter by file name" autocomplete="off">',
    '<span id="search-count"></span>',
    '</div>',
    '</header>',
    '<main>',
    '<div id="gallery-grid" class="gallery-grid"></div>',
    '</main>',
  ].join('\n');

  const data = [
    `window.MEDIA = ${scriptJson(entries)};`,
    `window.MEDIA_PREFIX = ${scriptJson(relativeUrl(file, paths.mediaDir))};`,
    `window.THUMB_PREFIX = ${scriptJson(relativeUrl(file, paths.thumbDir))};`,
    `window.CHAT_FILE_URL = ${scriptJson(chatUrl)};`,
  ].join('\n');

  return renderPage({
    title: `Media: ${ctx.title}`,
    stylesheets: [relativeUrl(file, join(ctx.resourceDir, 'style.css'))],
    body,
    inlineScripts: [data],
    scripts: [relativeUrl(file, join(ctx.resourceDir, 'gallery.js'))],
  });
}
