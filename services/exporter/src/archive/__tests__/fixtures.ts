import { mkdir, mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import pino from 'pino';
import sharp from 'sharp';

import type { Attachment, Message, User } from '../types/index.js';

/** Logger that drops everything, for components under test. */
export const silentLogger = pino({ level: 'silent' });

export function tempDir(prefix = 'chat-archive-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

/** Write a solid-colour image of the given size. */
export async function writeImage(
  path: string,
  width: number,
  height: number,
  format: 'jpeg' | 'png' = 'jpeg',
): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  const image = sharp({
    create: { width, height, channels: 3, background: { r: 40, g: 90, b: 160 } },
  });
  await (format === 'png' ? image.png() : image.jpeg()).toFile(path);
  return path;
}

export function user(id: string, displayName: string, isSelf = false): User {
  return { id, displayName, isSelf };
}

export function attachment(remoteRef: string, fileName: string, extra: Partial<Attachment> = {}): Attachment {
  return { kind: 'image', remoteRef, fileName, ...extra };
}

let messageCounter = 0;

/** Domain message with sensible defaults; ids and ordering keys increase per call. */
export function message(partial: Partial<Message> = {}): Message {
  messageCounter++;
  return {
    id: `msg-${messageCounter}`,
    chatId: 'chat-1',
    timestamp: new Date(Date.UTC(2024, 4, 1, 12, 0, messageCounter % 60)),
    orderingKey: String(1000 + messageCounter),
    isFromSelf: false,
    senderId: 'user-ann',
    senderDisplayName: 'Ann',
    text: 'hello',
    attachments: [],
    reactions: [],
    ...partial,
  };
}

/** Raw Desktop API message record, as it appears on the wire. */
export function messageRecord(fields: Record<string, unknown> & { id: string; chatID: string }): Record<string, unknown> {
  return {
    senderID: 'user-ann',
    senderName: 'Ann',
    timestamp: '2024-05-01T12:00:00.000Z',
    sortKey: '1000',
    isSender: false,
    ...fields,
  };
}

/** Raw Desktop API chat record. */
export function chatRecord(fields: Record<string, unknown> & { id: string }): Record<string, unknown> {
  return {
    accountID: 'acc-1',
    network: 'Signal',
    title: 'Chat',
    participants: { items: [], hasMore: false, total: 0 },
    ...fields,
  };
}
