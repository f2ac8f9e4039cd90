/**
 * Normalization from validated wire records to the domain entities the
 * pipeline works with, plus the per-chat message collection rules
 * (blank filtering, dedup by id, canonical ordering).
 */

import type pino from 'pino';

import { invariant } from '../errors.js';
import type { Attachment, AttachmentKind, ChatSummary, Message, Reaction, User } from '../types/index.js';
import { resolveTitle } from './title.js';
import type { AttachmentWire, ChatWire, MessageWire, UserWire } from './wire.js';

const ATTACHMENT_KINDS: Record<string, AttachmentKind> = {
  img: 'image',
  image: 'image',
  video: 'video',
  audio: 'audio',
};

/** Full name → username → email → phone → id. Never empty. */
export function displayNameOf(user: UserWire): string {
  for (const candidate of [user.fullName, user.username, user.email, user.phoneNumber]) {
    if (candidate && candidate.trim()) return candidate;
  }
  return user.id;
}

export function toUser(wire: UserWire): User {
  return { id: wire.id, displayName: displayNameOf(wire), isSelf: wire.isSelf };
}

export function toChatSummary(wire: ChatWire): ChatSummary {
  return {
    id: wire.id,
    accountId: wire.accountID,
    network: wire.network,
    rawTitle: wire.title,
    participants: wire.participants.map(toUser),
  };
}

/**
 * Attachments without a source reference cannot be archived and are
 * dropped here; unknown kinds become `other`.
 */
export function toAttachment(wire: AttachmentWire, log?: pino.Logger): Attachment | null {
  if (!wire.srcURL) {
    log?.warn({ fileName: wire.fileName }, 'Attachment has no source reference, skipping');
    return null;
  }
  const attachment: Attachment = {
    kind: ATTACHMENT_KINDS[wire.type] ?? 'other',
    remoteRef: wire.srcURL,
    fileName: wire.fileName ?? '',
  };
  if (wire.size?.width !== undefined && wire.size.height !== undefined) {
    attachment.width = wire.size.width;
    attachment.height = wire.size.height;
  }
  return attachment;
}

export function toMessage(wire: MessageWire, log?: pino.Logger): Message {
  const attachments: Attachment[] = [];
  for (const att of wire.attachments) {
    const attachment = toAttachment(att, log);
    if (attachment) attachments.push(attachment);
  }
  const reactions: Reaction[] = wire.reactions.map((r) => ({
    id: r.id,
    reactingUserId: r.participantID,
    key: r.reactionKey,
  }));

  const message: Message = {
    id: wire.id,
    chatId: wire.chatID,
    timestamp: new Date(wire.timestamp),
    orderingKey: wire.sortKey,
    isFromSelf: wire.isSender,
    senderId: wire.senderID,
    senderDisplayName: wire.senderName || wire.senderID,
    attachments,
    reactions,
  };
  if (wire.text !== undefined) message.text = wire.text;
  if (wire.linkedMessageID) message.linkedMessageId = wire.linkedMessageID;
  return message;
}

/** No text, no attachments and no reactions. Empty-but-present text is not blank. */
export function isBlank(message: Message): boolean {
  return message.text === undefined && message.attachments.length === 0 && message.reactions.length === 0;
}

const DIGITS = /^\d+$/;

/** Ordering keys are opaque, but digit strings compare numerically. */
export function compareOrderingKeys(a: string, b: string): number {
  if (DIGITS.test(a) && DIGITS.test(b) && a.length !== b.length) {
    return a.length - b.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Timestamp first, then the source ordering key, then id. */
export function compareMessages(a: Message, b: Message): number {
  return (
    a.timestamp.getTime() - b.timestamp.getTime() ||
    compareOrderingKeys(a.orderingKey, b.orderingKey) ||
    (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

/**
 * Build a chat's final message list from raw records in fetch order:
 * every record must belong to the chat, the first record per id wins,
 * blank messages are dropped and the rest are sorted chronologically.
 */
export function collectMessages(chatId: string, records: Iterable<MessageWire>, log?: pino.Logger): Message[] {
  const seen = new Set<string>();
  const messages: Message[] = [];
  let duplicates = 0;
  let blanks = 0;

  for (const record of records) {
    invariant(
      record.chatID === chatId,
      `Message ${record.id} belongs to chat ${record.chatID}, expected ${chatId}`,
    );
    if (seen.has(record.id)) {
      duplicates++;
      continue;
    }
    seen.add(record.id);
    const message = toMessage(record, log);
    if (isBlank(message)) {
      blanks++;
      continue;
    }
    messages.push(message);
  }

  messages.sort(compareMessages);
  log?.debug({ chatId, kept: messages.length, duplicates, blanks }, 'Messages collected');
  return messages;
}

/**
 * A chat with its complete, ordered message list. Participants and
 * messages are fixed at construction, so the title is computed once.
 */
export class Chat implements ChatSummary {
  readonly id: string;
  readonly accountId: string;
  readonly network: string;
  readonly rawTitle: string;
  readonly participants: User[];
  readonly messages: readonly Message[];
  private cachedTitle: string | undefined;

  constructor(summary: ChatSummary, messages: Message[]) {
    this.id = summary.id;
    this.accountId = summary.accountId;
    this.network = summary.network;
    this.rawTitle = summary.rawTitle;
    this.participants = summary.participants;
    this.messages = messages;
  }

  get title(): string {
    this.cachedTitle ??= resolveTitle(this);
    return this.cachedTitle;
  }

  get self(): User | undefined {
    return this.participants.find((p) => p.isSelf);
  }

  /** Display name for a user id: participant name, then any sender name seen, then the id. */
  nameOf(userId: string): string {
    const participant = this.participants.find((p) => p.id === userId);
    if (participant) return participant.displayName;
    const sender = this.messages.find((m) => m.senderId === userId);
    return sender?.senderDisplayName ?? userId;
  }
}
