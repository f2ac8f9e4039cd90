import type { ChatSummary, FilterOp } from '../types/index.js';

function matches(op: FilterOp, chat: Pick<ChatSummary, 'id' | 'accountId'>): boolean {
  return op.scope === 'account' ? chat.accountId === op.value : chat.id === op.value;
}

/**
 * Apply an ordered sequence of include/exclude steps.
 *
 * The selection starts empty when the first step includes and full when it
 * excludes; every step then adds or removes the chats it matches, so later
 * steps can reverse earlier ones. No steps selects everything. Chat order
 * is preserved.
 */
export function selectChats<T extends Pick<ChatSummary, 'id' | 'accountId'>>(
  chats: readonly T[],
  ops: readonly FilterOp[],
): T[] {
  if (ops.length === 0) return [...chats];

  const selected = new Set<string>(ops[0].action === 'exclude' ? chats.map((c) => c.id) : []);
  for (const op of ops) {
    for (const chat of chats) {
      if (!matches(op, chat)) continue;
      if (op.action === 'include') selected.add(chat.id);
      else selected.delete(chat.id);
    }
  }
  return chats.filter((chat) => selected.has(chat.id));
}
