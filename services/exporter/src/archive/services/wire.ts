/**
 * Validation boundary for Desktop API payloads.
 *
 * Required identifiers reject the payload; everything else defaults so the
 * model layer never has to probe loosely structured records.
 */

import { z } from 'zod';

const optionalString = z.string().nullish().transform((v) => v ?? undefined);

export const UserWireSchema = z.object({
  id: z.string().min(1),
  fullName: optionalString,
  username: optionalString,
  email: optionalString,
  phoneNumber: optionalString,
  isSelf: z.boolean().nullish().transform((v) => v ?? false),
});
export type UserWire = z.infer<typeof UserWireSchema>;

export const ChatWireSchema = z.object({
  id: z.string().min(1),
  accountID: z.string().min(1),
  network: z.string().nullish().transform((v) => v || 'Unknown'),
  title: z.string().nullish().transform((v) => v ?? ''),
  participants: z
    .object({ items: z.array(UserWireSchema).default([]) })
    .nullish()
    .transform((v) => v?.items ?? []),
});
export type ChatWire = z.infer<typeof ChatWireSchema>;

const SizeWireSchema = z.object({
  width: z.number().positive().optional(),
  height: z.number().positive().optional(),
});

export const AttachmentWireSchema = z.object({
  type: z.string().nullish().transform((v) => v ?? 'unknown'),
  srcURL: optionalString,
  fileName: optionalString,
  size: SizeWireSchema.nullish().transform((v) => v ?? undefined),
});
export type AttachmentWire = z.infer<typeof AttachmentWireSchema>;

export const ReactionWireSchema = z.object({
  id: z.string().min(1),
  participantID: z.string().min(1),
  reactionKey: z.string().min(1),
});
export type ReactionWire = z.infer<typeof ReactionWireSchema>;

export const MessageWireSchema = z.object({
  id: z.string().min(1),
  chatID: z.string().min(1),
  senderID: z.string().min(1),
  senderName: optionalString,
  timestamp: z.string().datetime({ offset: true }),
  sortKey: z.union([z.string(), z.number()]).transform(String),
  isSender: z.boolean().nullish().transform((v) => v ?? false),
  text: optionalString,
  attachments: z.array(AttachmentWireSchema).nullish().transform((v) => v ?? []),
  reactions: z.array(ReactionWireSchema).nullish().transform((v) => v ?? []),
  linkedMessageID: optionalString,
});
export type MessageWire = z.infer<typeof MessageWireSchema>;

/** One page of a cursor-paginated list. */
export function pageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    items: z.array(item),
    hasMore: z.boolean().nullish().transform((v) => v ?? false),
    oldestCursor: optionalString,
  });
}

export const ChatPageSchema = pageSchema(ChatWireSchema);
export type ChatPage = z.infer<typeof ChatPageSchema>;

export const MessagePageSchema = pageSchema(MessageWireSchema);
export type MessagePage = z.infer<typeof MessagePageSchema>;

export const DownloadAssetSchema = z.object({
  srcURL: optionalString,
  error: optionalString,
});
export type DownloadAsset = z.infer<typeof DownloadAssetSchema>;
