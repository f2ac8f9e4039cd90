/**
 * Export orchestration: runs the archival pipeline for every selected
 * chat and writes the root index.
 *
 * Per chat: full detail, every message page (dedup, blank filter, sort),
 * concurrent attachment hydration, media archiving (which queues thumbnail
 * jobs), chat and gallery pages, and the chat page's mtime set to its last
 * message. After all chats the thumbnail pool is joined once and the index
 * is written, so a run only reports success once every file exists.
 */

import { utimes } from 'node:fs/promises';
import { hostname } from 'node:os';

import type pino from 'pino';

import type { ExportConfig } from '../config.js';
import { ExportError, invariant } from '../errors.js';
import { defaultLogger } from '../logger.js';
import type { ChatSummary, ExportResult, IndexEntry } from '../types/index.js';
import { MediaArchiver } from './archiver.js';
import { copyResources } from './assets.js';
import { selectChats } from './chatFilter.js';
import { AttachmentHydrator, attachmentRefs } from './hydrator.js';
import { ExportLayout, writeFileAtomic } from './layout.js';
import { Chat, collectMessages, toChatSummary } from './model.js';
import { renderChatPage } from './render/chatPage.js';
import { renderGalleryPage } from './render/galleryPage.js';
import { renderIndexPage } from './render/indexPage.js';
import type { SourceClient } from './sourceClient.js';
import { ThumbnailPool } from './thumbnails.js';
import { checkDesktopVersion } from './version.js';
import type { MessageWire } from './wire.js';

export type OrchestratorConfig = Pick<
  ExportConfig,
  'outputDir' | 'filters' | 'hydrateConcurrency' | 'thumbnailWorkers' | 'timeZone' | 'checkVersion' | 'minVersion'
>;

export interface ExportOptions {
  client: SourceClient;
  config: OrchestratorConfig;
  logger?: pino.Logger;
  /** Aborts between chats with ABORTED. */
  signal?: AbortSignal;
  /** Replaces the sharp-backed pool, e.g. with a failing runner in tests. */
  thumbnailPool?: ThumbnailPool;
  /** Host name shown on the index page. */
  hostname?: string;
}

interface ChatOutcome {
  entry: IndexEntry;
  messages: number;
  archived: number;
  unresolved: number;
}

/** Every chat the source lists; a repeated id means the listing is unusable. */
export async function listAllChats(client: SourceClient): Promise<ChatSummary[]> {
  const chats: ChatSummary[] = [];
  const ids = new Set<string>();
  for await (const wire of client.listChats()) {
    invariant(!ids.has(wire.id), `Chat ${wire.id} is listed twice`);
    ids.add(wire.id);
    chats.push(toChatSummary(wire));
  }
  return chats;
}

async function fetchMessages(client: SourceClient, chatId: string): Promise<MessageWire[]> {
  const records: MessageWire[] = [];
  for await (const record of client.listMessages(chatId)) {
    records.push(record);
  }
  return records;
}

export class ExportOrchestrator {
  private readonly client: SourceClient;
  private readonly config: OrchestratorConfig;
  private readonly log: pino.Logger;
  private readonly signal?: AbortSignal;
  private readonly layout: ExportLayout;
  private readonly pool: ThumbnailPool;
  private readonly hydrator: AttachmentHydrator;
  private readonly archiver: MediaArchiver;
  private readonly hostname: string;

  constructor(options: ExportOptions) {
    this.client = options.client;
    this.config = options.config;
    this.log = options.logger ?? defaultLogger('export');
    this.signal = options.signal;
    this.layout = new ExportLayout(options.config.outputDir);
    this.pool = options.thumbnailPool ?? new ThumbnailPool({
      workers: options.config.thumbnailWorkers,
      logger: this.log.child({ component: 'thumbnails' }),
    });
    this.hydrator = new AttachmentHydrator(this.client, {
      concurrency: options.config.hydrateConcurrency,
      logger: this.log.child({ component: 'hydrator' }),
    });
    this.archiver = new MediaArchiver({
      thumbnails: this.pool,
      logger: this.log.child({ component: 'archiver' }),
    });
    this.hostname = options.hostname ?? hostname();
  }

  async run(): Promise<ExportResult> {
    const startedAt = new Date();

    if (this.config.checkVersion) {
      const version = await checkDesktopVersion(this.client, this.config.minVersion);
      this.log.info({ version }, 'Desktop version supported');
    }

    await copyResources(this.layout.resourceDir);

    const listed = await listAllChats(this.client);
    const selected = selectChats(listed, this.config.filters);
    this.log.info({ listed: listed.length, selected: selected.length }, 'Chats selected for export');

    const entries: IndexEntry[] = [];
    let messagesExported = 0;
    let attachmentsArchived = 0;
    let attachmentsUnresolved = 0;

    try {
      for (const summary of selected) {
        if (this.signal?.aborted) {
          throw new ExportError('ABORTED', 'Export aborted');
        }
        const outcome = await this.exportChat(summary.id);
        if (!outcome) continue;
        entries.push(outcome.entry);
        messagesExported += outcome.messages;
        attachmentsArchived += outcome.archived;
        attachmentsUnresolved += outcome.unresolved;
      }
    } catch (err) {
      // Let jobs already on a worker finish; nothing queued is left behind
      this.pool.cancel();
      await this.pool.join().catch((joinErr: unknown) => {
        this.log.error({ err: joinErr }, 'Thumbnail pool also failed while aborting');
      });
      throw err;
    }

    this.log.info({ pending: this.pool.pending }, 'Waiting for thumbnails');
    const thumbnails = await this.pool.join();

    const finishedAt = new Date();
    await writeFileAtomic(
      this.layout.indexFile,
      renderIndexPage({
        indexFile: this.layout.indexFile,
        resourceDir: this.layout.resourceDir,
        entries,
        run: {
          hostname: this.hostname,
          startedAt,
          durationMs: finishedAt.getTime() - startedAt.getTime(),
          timeZone: this.config.timeZone,
        },
      }),
    );

    return {
      chatsExported: entries.length,
      chatsSkipped: selected.length - entries.length,
      messagesExported,
      attachmentsArchived,
      attachmentsUnresolved,
      thumbnailsWritten: thumbnails.written,
      startedAt,
      finishedAt,
    };
  }

  /** Export one chat; null when it has no messages left to show. */
  async exportChat(chatId: string): Promise<ChatOutcome | null> {
    const log = this.log.child({ chatId });

    const summary = toChatSummary(await this.client.getChat(chatId));
    invariant(summary.id === chatId, `Requested chat ${chatId}, received ${summary.id}`);

    const records = await fetchMessages(this.client, chatId);
    const messages = collectMessages(chatId, records, log);
    if (messages.length === 0) {
      log.info('Chat has no messages to export, skipping');
      return null;
    }

    const chat = new Chat(summary, messages);
    const stem = this.layout.allocateChatStem(chat, chat.title);
    const paths = this.layout.pathsFor(chat, stem);
    log.info({ title: chat.title, messages: messages.length }, 'Exporting chat');

    paths.hydrated = await this.hydrator.hydrateAll(attachmentRefs(messages));
    const archive = await this.archiver.archiveChat(messages, paths);

    await writeFileAtomic(
      paths.chatFile,
      renderChatPage({ chat, paths, resourceDir: this.layout.resourceDir, timeZone: this.config.timeZone }),
    );
    await writeFileAtomic(
      paths.galleryFile,
      renderGalleryPage({ title: chat.title, messages, paths, resourceDir: this.layout.resourceDir }),
    );
    const last = messages[messages.length - 1];
    await utimes(paths.chatFile, last.timestamp, last.timestamp);

    return {
      entry: { network: chat.network, title: chat.title, chatFile: paths.chatFile },
      messages: messages.length,
      archived: archive.copied + archive.existing,
      unresolved: archive.unresolved,
    };
  }
}

/** Run a complete export. */
export async function exportChats(options: ExportOptions): Promise<ExportResult> {
  return new ExportOrchestrator(options).run();
}
