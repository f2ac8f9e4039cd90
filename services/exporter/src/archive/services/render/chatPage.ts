import { join } from 'node:path';

import { ExportError } from '../../errors.js';
import type { Attachment, ExportPaths, Message } from '../../types/index.js';
import { relativeUrl } from '../layout.js';
import type { Chat } from '../model.js';
import { formatUtc, formatZoned } from '../timestamps.js';
import { escapeHtml, formatText, renderPage } from './html.js';

export interface ChatPageContext {
  chat: Chat;
  paths: ExportPaths;
  resourceDir: string;
  /** IANA zone for the visible timestamp; UTC is always in the tooltip. */
  timeZone: string;
}

/** Case-insensitive ordering for names and titles shown to the reader. */
export function compareCaseless(a: string, b: string): number {
  const x = a.toLowerCase();
  const y = b.toLowerCase();
  return x < y ? -1 : x > y ? 1 : a < b ? -1 : a > b ? 1 : 0;
}

function fragment(messageId: string): string {
  return `#${encodeURIComponent(messageId)}`;
}

function renderHeader(ctx: ChatPageContext): string {
  const { chat, paths } = ctx;
  const participants = chat.participants.map((p) => p.displayName).sort(compareCaseless);
  const galleryUrl = relativeUrl(paths.chatFile, paths.galleryFile);
  const detail = (label: string, value: string | number) =>
    `<div><span class="chat-details-label">${label}: </span><span>${escapeHtml(String(value))}</span></div>`;

  return [
    '<header>',
    '<section class="chat-header">',
    `<h1>${escapeHtml(chat.title)}</h1>`,
    `<nav><a class="gallery-link" href="${escapeHtml(galleryUrl)}">Media gallery</a></nav>`,
    '<details>',
    '<summary>Chat details</summary>',
    detail('Network', chat.network),
    detail('Account ID', chat.accountId),
    detail('Chat ID', chat.id),
    detail('Messages', chat.messages.length),
    '<div><span class="chat-details-label">Participants:</span></div>',
    '<ul class="participants">',
    ...participants.map((name) => `<li>${escapeHtml(name)}</li>`),
    '</ul>',
    '</details>',
    '</section>',
    '</header>',
  ].join('\n');
}

function dimensionAttrs(attachment: Attachment): string {
  return attachment.width !== undefined && attachment.height !== undefined
    ? ` width="${attachment.width}" height="${attachment.height}"`
    : '';
}

/** One render rule per attachment kind; an unresolved attachment shows a warning. */
export function renderAttachment(ctx: ChatPageContext, attachment: Attachment): string {
  const { paths } = ctx;
  const label = escapeHtml(attachment.fileName || 'attachment');
  const archived = paths.archived.get(attachment.remoteRef) ?? null;
  if (archived === null) {
    return `<div class="attachment-missing" title="${escapeHtml(attachment.remoteRef)}">&#x26A0;&#xFE0E; Attachment unavailable: ${label}</div>`;
  }

  const url = escapeHtml(relativeUrl(paths.chatFile, archived));
  const kind = attachment.kind;
  switch (kind) {
    case 'image': {
      const thumb = paths.thumbnails.get(archived);
      const src = thumb ? escapeHtml(relativeUrl(paths.chatFile, thumb)) : url;
      return `<a class="attachment" href="${url}"><img loading="lazy"${dimensionAttrs(attachment)} src="${src}" alt="${label}"></a>`;
    }
    case 'video':
      return `<video controls playsinline preload="metadata"${dimensionAttrs(attachment)} src="${url}"></video>`;
    case 'audio':
      return `<audio controls preload="metadata" src="${url}"></audio>`;
    case 'other':
      return `<a class="attachment-file" href="${url}" download>&#x1F4CE;&#xFE0E; ${label}</a>`;
    default: {
      const unknown: never = kind;
      throw new ExportError('INVARIANT_VIOLATION', `No render rule for attachment kind "${String(unknown)}"`);
    }
  }
}

/** Reactions grouped by key, in first-seen order, with the sorted reactor names as tooltip. */
export function renderReactions(chat: Chat, message: Message): string {
  if (message.reactions.length === 0) return '';
  const byKey = new Map<string, string[]>();
  for (const reaction of message.reactions) {
    const names = byKey.get(reaction.key) ?? [];
    names.push(chat.nameOf(reaction.reactingUserId));
    byKey.set(reaction.key, names);
  }
  const items = [...byKey.entries()].map(([key, names]) => {
    const tooltip = escapeHtml([...names].sort(compareCaseless).join(', '));
    return `<span class="reaction" title="${tooltip}">${escapeHtml(key)}<span class="reaction-count">${names.length}</span></span>`;
  });
  return `<div class="msg-reactions">${items.join('')}</div>`;
}

export function renderMessage(ctx: ChatPageContext, message: Message): string {
  const id = escapeHtml(message.id);
  const sectionClass = message.isFromSelf ? 'msg msg-self' : 'msg msg-them';
  const parts = [
    `<section class="${sectionClass}" id="${id}">`,
    '<div class="msg-header">' +
      `<span class="msg-contact-name">${escapeHtml(message.senderDisplayName)}</span>` +
      `<span class="msg-datetime" title="${formatUtc(message.timestamp)}">${escapeHtml(formatZoned(message.timestamp, ctx.timeZone))}</span>` +
      `<a class="permalink" title="Message ${id}" href="${escapeHtml(fragment(message.id))}">&#x1F517;&#xFE0E;</a>` +
      '</div>',
  ];
  if (message.linkedMessageId) {
    parts.push(
      `<div class="msg-reply"><a href="${escapeHtml(fragment(message.linkedMessageId))}">&#x21A9;&#xFE0E; In reply to</a></div>`,
    );
  }
  if (message.text !== undefined) {
    parts.push(`<div class="msg-text">${formatText(message.text)}</div>`);
  }
  for (const attachment of message.attachments) {
    parts.push(renderAttachment(ctx, attachment));
  }
  const reactions = renderReactions(ctx.chat, message);
  if (reactions) parts.push(reactions);
  parts.push('</section>');
  return parts.join('\n');
}

/** Full chat page: header, then every message in chronological order. */
export function renderChatPage(ctx: ChatPageContext): string {
  const { chat, paths } = ctx;
  const body = [
    renderHeader(ctx),
    '<main>',
    ...chat.messages.map((message) => renderMessage(ctx, message)),
    '</main>',
  ].join('\n');

  return renderPage({
    title: `Chat: ${chat.title}`,
    stylesheets: [relativeUrl(paths.chatFile, join(ctx.resourceDir, 'style.css'))],
    body,
  });
}
