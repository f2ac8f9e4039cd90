/** Core domain types for the chat archive exporter. */

/** A chat participant or message sender. */
export interface User {
  id: string;
  /** Never empty: full name, username, email, phone number, then id. */
  displayName: string;
  /** Whether this user is the account owner running the export. */
  isSelf: boolean;
}

/** Closed set of attachment kinds; each has exactly one render rule. */
export type AttachmentKind = 'image' | 'video' | 'audio' | 'other';

export interface Attachment {
  kind: AttachmentKind;
  /** Identifier returned by the source before hydration (mxc://, file://, ...). */
  remoteRef: string;
  /** Original file name as reported by the source. May be empty. */
  fileName: string;
  width?: number;
  height?: number;
}

export interface Reaction {
  id: string;
  reactingUserId: string;
  /** Emoji or shortcode. Several users may share one key. */
  key: string;
}

export interface Message {
  id: string;
  chatId: string;
  timestamp: Date;
  /** Source-supplied ordering key; opaque but usually a digit string. */
  orderingKey: string;
  isFromSelf: boolean;
  senderId: string;
  senderDisplayName: string;
  /** Absent when the message has no text. An empty string is still text. */
  text?: string;
  attachments: Attachment[];
  reactions: Reaction[];
  /** Id of the message this one replies to, when the source links one. */
  linkedMessageId?: string;
}

/** A chat as listed by the source, before messages are fetched. */
export interface ChatSummary {
  id: string;
  accountId: string;
  network: string;
  rawTitle: string;
  /** May be truncated in list responses; the detail call returns all of them. */
  participants: User[];
}

/** Hydrated local path for a remote reference, or null when unresolved. */
export type HydratedPath = string | null;

/** Archived media path for a remote reference, or null when unresolved. */
export type ArchivedPath = string | null;

/**
 * Output locations and per-reference path maps for one chat's export.
 * Maps are keyed by remote reference: several attachments may share one
 * reference and it must archive to exactly one file.
 */
export interface ExportPaths {
  chatFile: string;
  galleryFile: string;
  mediaDir: string;
  thumbDir: string;
  hydrated: Map<string, HydratedPath>;
  archived: Map<string, ArchivedPath>;
  /** Archived path → thumbnail path, for archived images that get one. */
  thumbnails: Map<string, string>;
}

/** One gallery entry: archived basename, owning message id, has-thumbnail flag. */
export type GalleryEntry = [fileName: string, messageId: string, hasThumbnail: 0 | 1];

export type FilterAction = 'include' | 'exclude';
export type FilterScope = 'account' | 'chat';

/** One step of the ordered chat selection. */
export interface FilterOp {
  action: FilterAction;
  scope: FilterScope;
  value: string;
}

/** A chat page entry for the root index. */
export interface IndexEntry {
  network: string;
  title: string;
  chatFile: string;
}

/** Summary returned after a successful export run. */
export interface ExportResult {
  chatsExported: number;
  chatsSkipped: number;
  messagesExported: number;
  attachmentsArchived: number;
  attachmentsUnresolved: number;
  thumbnailsWritten: number;
  startedAt: Date;
  finishedAt: Date;
}
