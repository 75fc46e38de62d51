import type { APIEmbed } from 'discord.js';
import type {
  DbMessage,
  DbReactionVotes,
  DbStarboard,
  DbStarboardMessage,
  DbUser,
} from './database.js';

/** Point-in-time view of a message that still exists on the platform. */
export interface LiveMessage {
  id: string;
  guildId: string;
  channelId: string;
  authorId: string;
  authorName: string;
  authorAvatarUrl: string | null;
  content: string;
  url: string;
  createdAt: Date;
  nsfw: boolean;
  attachments: LiveAttachment[];
}

export interface LiveAttachment {
  name: string;
  url: string;
  contentType: string | null;
  spoiler: boolean;
}

export interface StarboardStore {
  getStarboards(guildId: string): DbStarboard[];
  getMessage(id: string): DbMessage | undefined;
  getUser(id: string): DbUser | undefined;
  getReactions(messageId: string): DbReactionVotes[];
  getStarboardMessage(origId: string, starboardId: string): DbStarboardMessage | undefined;
  findStarboardMessage(mirrorId: string): DbStarboardMessage | undefined;
  createStarboardMessage(mirrorId: string, origId: string, starboardId: string): void;
  deleteStarboardMessage(mirrorId: string): void;
  setPoints(mirrorId: string, points: number): void;
}

/** Best-effort lookup; `null` is a normal answer for messages that cannot be resolved. */
export interface MessageCache {
  fetchMessage(guildId: string, channelId: string, messageId: string): Promise<LiveMessage | null>;
}

export interface MirrorTarget {
  guildId: string;
  channelId: string;
}

export interface MirrorPayload {
  content: string;
  embed?: APIEmbed;
}

/**
 * Remote operations on starboard channels. Every method may reject with
 * `PermissionDeniedError` or `RemoteNotFoundError`.
 */
export interface MirrorChannelGateway {
  send(target: MirrorTarget, payload: MirrorPayload): Promise<string>;
  edit(target: MirrorTarget, mirrorId: string, payload: MirrorPayload): Promise<void>;
  delete(target: MirrorTarget, mirrorId: string): Promise<void>;
  react(target: MirrorTarget, mirrorId: string, emoji: string): Promise<void>;
}

export type NotifySeverity = 'error' | 'info';

export type Notifier = (guildId: string, text: string, severity: NotifySeverity) => void;

export interface Decision {
  add: boolean;
  delete: boolean;
  forced: boolean;
  frozen: boolean;
}

export type StarboardEvent =
  | {
      type: 'reaction-added';
      guildId: string;
      channelId: string;
      messageId: string;
      authorId: string;
      authorIsBot: boolean;
      channelNsfw: boolean;
      emoji: string;
      userId: string;
    }
  | { type: 'reaction-removed'; guildId: string; messageId: string; emoji: string; userId: string }
  | { type: 'reactions-cleared'; guildId: string; messageId: string; emoji?: string }
  | { type: 'message-edited'; guildId: string; messageId: string }
  | { type: 'message-deleted'; guildId: string; messageId: string }
  | { type: 'resync'; guildId: string; messageId: string };
