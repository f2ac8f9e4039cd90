import { join } from 'node:path';

import type { IndexEntry } from '../../types/index.js';
import { relativeUrl } from '../layout.js';
import { formatZoned } from '../timestamps.js';
import { compareCaseless } from './chatPage.js';
import { escapeHtml, renderPage } from './html.js';

export interface RunInfo {
  hostname: string;
  startedAt: Date;
  durationMs: number;
  timeZone: string;
}

export interface IndexPageContext {
  indexFile: string;
  resourceDir: string;
  entries: readonly IndexEntry[];
  run: RunInfo;
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

/** Entries grouped by network, groups and titles both sorted case-insensitively. */
export function groupByNetwork(entries: readonly IndexEntry[]): [string, IndexEntry[]][] {
  const groups = new Map<string, IndexEntry[]>();
  for (const entry of entries) {
    const group = groups.get(entry.network) ?? [];
    group.push(entry);
    groups.set(entry.network, group);
  }
  return [...groups.entries()]
    .sort(([a], [b]) => compareCaseless(a, b))
    .map(([network, group]): [string, IndexEntry[]] => [network, [...group].sort((a, b) => compareCaseless(a.title, b.title))]);
}

export function renderIndexPage(ctx: IndexPageContext): string {
  const { run } = ctx;
  const lines = [
    '<header>',
    '<h1>Chats</h1>',
    '<div class="run-info">' +
      `Exported from <span class="hostname">${escapeHtml(run.hostname)}</span>` +
      ` on ${escapeHtml(formatZoned(run.startedAt, run.timeZone))}` +
      ` in ${formatDuration(run.durationMs)}` +
      '</div>',
    '</header>',
    '<main>',
    '<ul class="networks">',
  ];
  for (const [network, group] of groupByNetwork(ctx.entries)) {
    lines.push(`<li>${escapeHtml(network)}`, '<ul>');
    for (const entry of group) {
      const url = relativeUrl(ctx.indexFile, entry.chatFile);
      lines.push(`<li><a href="${escapeHtml(url)}">${escapeHtml(entry.title)}</a></li>`);
    }
    lines.push('</ul>', '</li>');
  }
  lines.push('</ul>', '</main>');

  return renderPage({
    title: 'Chats',
    stylesheets: [relativeUrl(ctx.indexFile, join(ctx.resourceDir, 'style.css'))],
    body: lines.join('\n'),
  });
}
