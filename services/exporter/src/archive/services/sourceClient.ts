import type pino from 'pino';
import type { z } from 'zod';

import { ExportError } from '../errors.js';
import {
  ChatPageSchema,
  ChatWireSchema,
  DownloadAssetSchema,
  MessagePageSchema,
  type ChatWire,
  type DownloadAsset,
  type MessageWire,
} from './wire.js';

/** Response header carrying the desktop application version. */
export const VERSION_HEADER = 'x-beeper-desktop-version';

/** The subset of `fetch` the client needs; tests inject an in-process one. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface SourceClientConfig {
  /** Base URL of the Desktop API (e.g. http://localhost:23373). */
  baseUrl: string;
  accessToken: string;
  /** Request timeout in milliseconds. */
  timeoutMs: number;
  fetch?: FetchLike;
  logger?: pino.Logger;
}

/**
 * What the exporter consumes from the chat source. Lists are async
 * iterables that walk every page; `downloadAsset` resolves a remote
 * reference to a local file URL or reports why it could not.
 */
export interface SourceClient {
  desktopVersion(): Promise<string | null>;
  listChats(): AsyncIterable<ChatWire>;
  getChat(chatId: string): Promise<ChatWire>;
  listMessages(chatId: string): AsyncIterable<MessageWire>;
  downloadAsset(url: string): Promise<DownloadAsset>;
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  query?: Record<string, string>;
  body?: unknown;
}

/**
 * HTTP client for the Desktop API.
 *
 * Every response body goes through its zod schema; a body that does not
 * match is INVALID_PAYLOAD. Transport failures map to SOURCE_UNAVAILABLE,
 * SOURCE_TIMEOUT or SOURCE_ERROR.
 */
export class DesktopApiClient implements SourceClient {
  private readonly config: SourceClientConfig;
  private readonly fetchImpl: FetchLike;

  constructor(config: SourceClientConfig) {
    this.config = config;
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
  }

  async desktopVersion(): Promise<string | null> {
    return this.request('/v1/accounts', {}, async (response) => response.headers.get(VERSION_HEADER));
  }

  listChats(): AsyncIterable<ChatWire> {
    return this.paginate('/v1/chats', ChatPageSchema);
  }

  async getChat(chatId: string): Promise<ChatWire> {
    return this.requestJson(`/v1/chats/${encodeURIComponent(chatId)}`, ChatWireSchema, {
      query: { maxParticipantCount: '-1' },
    });
  }

  listMessages(chatId: string): AsyncIterable<MessageWire> {
    return this.paginate(`/v1/chats/${encodeURIComponent(chatId)}/messages`, MessagePageSchema);
  }

  async downloadAsset(url: string): Promise<DownloadAsset> {
    return this.requestJson('/v1/assets/download', DownloadAssetSchema, {
      method: 'POST',
      body: { url },
    });
  }

  /**
   * Walk a cursor-paginated list from newest to oldest, requesting the page
   * before the oldest cursor until the source reports no more pages or
   * stops returning a cursor.
   */
  private async *paginate<T>(
    path: string,
    schema: z.ZodType<{ items: T[]; hasMore: boolean; oldestCursor?: string }, z.ZodTypeDef, unknown>,
  ): AsyncGenerator<T> {
    let cursor: string | undefined;
    let pages = 0;
    for (;;) {
      const query: Record<string, string> = cursor ? { cursor, direction: 'before' } : {};
      const page = await this.requestJson(path, schema, { query });
      pages++;
      yield* page.items;
      if (!page.hasMore || !page.oldestCursor) break;
      cursor = page.oldestCursor;
    }
    this.config.logger?.debug({ path, pages }, 'Pagination complete');
  }

  private async requestJson<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<T> {
    const body = await this.request(path, options, (response) => response.text());
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new ExportError('INVALID_PAYLOAD', `Response from ${path} is not JSON`, { cause: err });
    }
    const result = schema.safeParse(json);
    if (!result.success) {
      throw new ExportError(
        'INVALID_PAYLOAD',
        `Unexpected response from ${path}: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        { cause: result.error },
      );
    }
    return result.data;
  }

  /**
   * Send a request and read its response with `read`. The timeout covers
   * the body as well as the headers.
   */
  private async request<T>(
    path: string,
    options: RequestOptions,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    const method = options.method ?? 'GET';
    const url = new URL(path, this.config.baseUrl);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    this.config.logger?.debug({ url: url.toString(), method }, 'Desktop API request');

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const init: RequestInit = {
        method,
        signal: controller.signal,
        headers: {
          'Accept': 'application/json',
          'Authorization': `Bearer ${this.config.accessToken}`,
          ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
      };
      if (options.body !== undefined) {
        init.body = JSON.stringify(options.body);
      }

      const response = await this.fetchImpl(url.toString(), init);

      if (!response.ok) {
        const errorBody = await response.text().catch(() => 'No response body');
        throw new ExportError(
          'SOURCE_ERROR',
          `Desktop API returned ${response.status} for ${method} ${path}: ${errorBody}`,
          { status: response.status },
        );
      }

      return await read(response);
    } catch (err) {
      if (err instanceof ExportError) throw err;

      if (err instanceof Error && err.name === 'AbortError') {
        throw new ExportError(
          'SOURCE_TIMEOUT',
          `Desktop API request ${method} ${path} timed out after ${this.config.timeoutMs}ms`,
          { cause: err },
        );
      }

      // Connection refused or DNS failure
      if (err instanceof TypeError && err.cause) {
        throw new ExportError(
          'SOURCE_UNAVAILABLE',
          `Cannot reach the Desktop API at ${this.config.baseUrl}: ${err.message}. Make sure the Desktop API is enabled.`,
          { cause: err },
        );
      }

      throw err;
    } finally {
      clearTimeout(timeout);
    }
  }
}
