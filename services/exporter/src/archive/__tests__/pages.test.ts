import { describe, it, expect } from 'vitest';

import { ExportLayout } from '../services/layout.js';
import { Chat } from '../services/model.js';
import { renderAttachment, renderChatPage, renderMessage, renderReactions } from '../services/render/chatPage.js';
import { galleryEntries, renderGalleryPage } from '../services/render/galleryPage.js';
import { formatDuration, groupByNetwork, renderIndexPage } from '../services/render/indexPage.js';
import type { ExportPaths, Message } from '../types/index.js';
import { attachment, message, user } from './fixtures.js';

const AT = new Date(Date.UTC(2024, 2, 5, 7, 8, 9));
const layout = new ExportLayout('/out');

function setup(messages: Message[]) {
  const chat = new Chat(
    {
      id: 'chat-1',
      accountId: 'acc-1',
      network: 'Signal',
      rawTitle: 'Book club',
      participants: [user('me', 'Me', true), user('ann', 'Ann'), user('bob', 'bob')],
    },
    messages,
  );
  const paths: ExportPaths = layout.pathsFor(chat, 'Chat');
  const ctx = { chat, paths, resourceDir: layout.resourceDir, timeZone: 'UTC' };
  return { chat, paths, ctx };
}

describe('pages', () => {
  // ── Messages ─────────────────────────────────────────────────────

  describe('renderMessage', () => {
    it('should render header and text', () => {
      const msg = message({ id: 'm1', timestamp: AT, text: 'hi <there>' });
      const { ctx } = setup([msg]);

      expect(renderMessage(ctx, msg).split('\n')).toEqual([
        '<section class="msg msg-them" id="m1">',
        '<div class="msg-header"><span class="msg-contact-name">Ann</span>' +
          '<span class="msg-datetime" title="2024-03-05 07:08:09 UTC">2024-03-05 07:08:09 UTC</span>' +
          '<a class="permalink" title="Message m1" href="#m1">&#x1F517;&#xFE0E;</a></div>',
        '<div class="msg-text">hi &lt;there&gt;</div>',
        '</section>',
      ]);
    });

    it('should mark own messages and link replies', () => {
      const msg = message({ id: 'm2', isFromSelf: true, linkedMessageId: 'm 1', text: undefined, reactions: [{ id: 'r', reactingUserId: 'ann', key: '+' }] });
      const { ctx } = setup([msg]);

      const lines = renderMessage(ctx, msg).split('\n');

      expect(lines[0]).toBe('<section class="msg msg-self" id="m2">');
      expect(lines[2]).toBe('<div class="msg-reply"><a href="#m%201">&#x21A9;&#xFE0E; In reply to</a></div>');
      expect(lines).not.toContain('<div class="msg-text"></div>');
    });

    it('should keep an empty text body', () => {
      const msg = message({ id: 'm3', text: '' });
      const { ctx } = setup([msg]);
      expect(renderMessage(ctx, msg).split('\n')).toContain('<div class="msg-text"></div>');
    });
  });

  // ── Attachments ──────────────────────────────────────────────────

  describe('renderAttachment', () => {
    it('should show the thumbnail and link the full image', () => {
      const { ctx, paths } = setup([]);
      const full = '/out/media/full/acc-1/Chat/x.jpg';
      paths.archived.set('mxc://x', full);
      paths.thumbnails.set(full, '/out/media/thumb/acc-1/Chat/x.jpg');

      expect(renderAttachment(ctx, attachment('mxc://x', 'x.jpg', { width: 1000, height: 800 }))).toBe(
        '<a class="attachment" href="../../media/full/acc-1/Chat/x.jpg">' +
          '<img loading="lazy" width="1000" height="800" src="../../media/thumb/acc-1/Chat/x.jpg" alt="x.jpg"></a>',
      );
    });

    it('should use the full image when there is no thumbnail', () => {
      const { ctx, paths } = setup([]);
      paths.archived.set('mxc://x', '/out/media/full/acc-1/Chat/small pic.png');

      expect(renderAttachment(ctx, attachment('mxc://x', 'small pic.png'))).toBe(
        '<a class="attachment" href="../../media/full/acc-1/Chat/small%20pic.png">' +
          '<img loading="lazy" src="../../media/full/acc-1/Chat/small%20pic.png" alt="small pic.png"></a>',
      );
    });

    it('should render video, audio and files', () => {
      const { ctx, paths } = setup([]);
      paths.archived.set('mxc://v', '/out/media/full/acc-1/Chat/v.mp4');
      paths.archived.set('mxc://a', '/out/media/full/acc-1/Chat/a.ogg');
      paths.archived.set('mxc://f', '/out/media/full/acc-1/Chat/f.pdf');

      expect(renderAttachment(ctx, attachment('mxc://v', 'v.mp4', { kind: 'video' }))).toBe(
        '<video controls playsinline preload="metadata" src="../../media/full/acc-1/Chat/v.mp4"></video>',
      );
      expect(renderAttachment(ctx, attachment('mxc://a', 'a.ogg', { kind: 'audio' }))).toBe(
        '<audio controls preload="metadata" src="../../media/full/acc-1/Chat/a.ogg"></audio>',
      );
      expect(renderAttachment(ctx, attachment('mxc://f', 'f.pdf', { kind: 'other' }))).toBe(
        '<a class="attachment-file" href="../../media/full/acc-1/Chat/f.pdf" download>&#x1F4CE;&#xFE0E; f.pdf</a>',
      );
    });

    it('should warn about unresolved attachments', () => {
      const { ctx, paths } = setup([]);
      paths.archived.set('mxc://gone', null);

      expect(renderAttachment(ctx, attachment('mxc://gone', ''))).toBe(
        '<div class="attachment-missing" title="mxc://gone">&#x26A0;&#xFE0E; Attachment unavailable: attachment</div>',
      );
    });
  });

  it('should group reactions by key with sorted reactor names', () => {
    const msg = message({
      reactions: [
        { id: 'r1', reactingUserId: 'bob', key: '👍' },
        { id: 'r2', reactingUserId: 'ann', key: '👍' },
        { id: 'r3', reactingUserId: 'ann', key: '❤️' },
      ],
    });
    const { chat } = setup([msg]);

    expect(renderReactions(chat, msg)).toBe(
      '<div class="msg-reactions">' +
        '<span class="reaction" title="Ann, bob">👍<span class="reaction-count">2</span></span>' +
        '<span class="reaction" title="Ann">❤️<span class="reaction-count">1</span></span>' +
        '</div>',
    );
  });

  // ── Chat page ────────────────────────────────────────────────────

  it('should render the chat page with header and messages', () => {
    const messages = [message({ id: 'm1', text: 'one' }), message({ id: 'm2', text: 'two' })];
    const { ctx } = setup(messages);

    const lines = renderChatPage(ctx).split('\n');

    expect(lines).toContain('    <title>Chat: Book club</title>');
    expect(lines).toContain('    <link rel="stylesheet" href="../../res/style.css">');
    expect(lines).toContain('<nav><a class="gallery-link" href="../../gallery/acc-1/Chat.html">Media gallery</a></nav>');
    expect(lines).toContain('<div><span class="chat-details-label">Messages: </span><span>2</span></div>');
    expect(lines.filter((l) => l.startsWith('<li>'))).toEqual(['<li>Ann</li>', '<li>bob</li>', '<li>Me</li>']);
    expect(lines.filter((l) => l.startsWith('<section class="msg'))).toHaveLength(2);
  });

  // ── Gallery ──────────────────────────────────────────────────────

  describe('gallery', () => {
    it('should list each archived reference once with its thumbnail flag', () => {
      const messages = [
        message({ id: 'm1', attachments: [attachment('mxc://a', 'a.jpg'), attachment('mxc://gone', 'b.jpg')] }),
        message({ id: 'm2', attachments: [attachment('mxc://a', 'a.jpg'), attachment('mxc://c', 'c.pdf', { kind: 'other' })] }),
      ];
      const { paths } = setup(messages);
      paths.archived.set('mxc://a', '/out/media/full/acc-1/Chat/a.jpg');
      paths.archived.set('mxc://gone', null);
      paths.archived.set('mxc://c', '/out/media/full/acc-1/Chat/c.pdf');
      paths.thumbnails.set('/out/media/full/acc-1/Chat/a.jpg', '/out/media/thumb/acc-1/Chat/a.jpg');

      expect(galleryEntries(messages, paths)).toEqual([
        ['a.jpg', 'm1', 1],
        ['c.pdf', 'm2', 0],
      ]);
    });

    it('should embed the media data and prefixes', () => {
      const messages = [message({ id: 'm1', attachments: [attachment('mxc://a', 'a.jpg')] })];
      const { paths } = setup(messages);
      paths.archived.set('mxc://a', '/out/media/full/acc-1/Chat/a.jpg');

      const lines = renderGalleryPage({ title: 'Book club', messages, paths, resourceDir: layout.resourceDir }).split('\n');

      expect(lines).toContain('<h1>Media: Book club</h1>');
      expect(lines).toContain('window.MEDIA = [["a.jpg","m1",0]];');
      expect(lines).toContain('window.MEDIA_PREFIX = "../../media/full/acc-1/Chat";');
      expect(lines).toContain('window.THUMB_PREFIX = "../../media/thumb/acc-1/Chat";');
      expect(lines).toContain('window.CHAT_FILE_URL = "../../chat/acc-1/Chat.html";');
      expect(lines).toContain('<script src="../../res/gallery.js"></script>');
    });
  });

  // ── Index ────────────────────────────────────────────────────────

  describe('index', () => {
    const entries = [
      { network: 'whatsapp', title: 'zeta', chatFile: '/out/chat/acc-2/zeta.html' },
      { network: 'Signal', title: 'Family', chatFile: '/out/chat/acc-1/Family.html' },
      { network: 'whatsapp', title: 'Alpha', chatFile: '/out/chat/acc-2/Alpha.html' },
    ];

    it('should format durations', () => {
      expect(formatDuration(4_400)).toBe('4s');
      expect(formatDuration(65_000)).toBe('1m 5s');
    });

    it('should group by network, both levels sorted', () => {
      expect(groupByNetwork(entries).map(([network, group]) => [network, group.map((e) => e.title)])).toEqual([
        ['Signal', ['Family']],
        ['whatsapp', ['Alpha', 'zeta']],
      ]);
    });

    it('should render run information and chat links', () => {
      const lines = renderIndexPage({
        indexFile: layout.indexFile,
        resourceDir: layout.resourceDir,
        entries,
        run: { hostname: 'test-host', startedAt: AT, durationMs: 65_000, timeZone: 'UTC' },
      }).split('\n');

      expect(lines).toContain(
        '<div class="run-info">Exported from <span class="hostname">test-host</span> on 2024-03-05 07:08:09 UTC in 1m 5s</div>',
      );
      expect(lines).toContain('    <link rel="stylesheet" href="res/style.css">');
      expect(lines.filter((l) => l.startsWith('<li>'))).toEqual([
        '<li>Signal',
        '<li><a href="chat/acc-1/Family.html">Family</a></li>',
        '<li>whatsapp',
        '<li><a href="chat/acc-2/Alpha.html">Alpha</a></li>',
        '<li><a href="chat/acc-2/zeta.html">zeta</a></li>',
      ]);
    });
  });
});
