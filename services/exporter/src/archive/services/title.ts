import type { Message, User } from '../types/index.js';

/** How many sender names a derived title lists. */
export const TITLE_SENDER_LIMIT = 4;

export interface TitleSource {
  id: string;
  rawTitle: string;
  participants: readonly User[];
  messages: readonly Message[];
}

/**
 * Derive a chat's display title.
 *
 * Sources name one-to-one and unnamed group chats after the account owner,
 * which makes every such chat look alike. When the raw title is the owner's
 * own name the title is rebuilt from the other senders instead: a message
 * count per sender (participants seeded at zero, senders missing from the
 * participant list included, the owner excluded), sorted ascending by count,
 * first four names joined with ", ".
 *
 * The ascending order lists the least active senders first. Existing
 * exports were named this way, so it is kept.
 */
export function resolveTitle(chat: TitleSource): string {
  const self = chat.participants.find((p) => p.isSelf);
  if (!self || chat.rawTitle !== self.displayName) {
    return chat.rawTitle || chat.id;
  }

  const counts = new Map<string, number>();
  for (const participant of chat.participants) {
    counts.set(participant.id, 0);
  }
  for (const message of chat.messages) {
    counts.set(message.senderId, (counts.get(message.senderId) ?? 0) + 1);
  }
  counts.delete(self.id);

  const names = new Map(chat.participants.map((p) => [p.id, p.displayName]));
  const senders = [...counts.entries()]
    .sort((a, b) => a[1] - b[1])
    .slice(0, TITLE_SENDER_LIMIT)
    .map(([id]) => names.get(id) ?? id);

  const title = senders.join(', ');
  return title || chat.rawTitle || chat.id;
}
