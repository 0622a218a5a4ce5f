/**
 * Normalized message types - platform agnostic
 */

/**
 * Platform identifier
 */
export type Platform = 'discord' | 'test';

/**
 * User information
 */
export interface BotUser {
  id: string;
  name: string;
  displayName?: string;
  isBot: boolean;
}

/**
 * Channel information
 */
export interface BotChannel {
  id: string;
}

/**
 * Platform-agnostic message
 */
export interface BotMessage {
  id: string;
  content: string;
  author: BotUser;
  channel: BotChannel;
  /** Guild/server ID (undefined for DMs) */
  guildId?: string;
  /** Whether the bot was directly mentioned/highlighted */
  mentionedBot: boolean;
  platform: Platform;
}

/**
 * Outgoing message content
 */
export interface OutgoingMessage {
  content: string;
  /** Message ID to reply to (Discord: creates reply reference) */
  replyToId?: string;
}

/**
 * Message send request (includes target)
 */
export interface MessageSendRequest {
  channelId: string;
  message: OutgoingMessage;
  platform: Platform;
}

/**
 * Kind of a media file handed to a transport
 */
export type OutgoingMediaKind = 'video' | 'image';

/**
 * Request to upload a single local media file.
 *
 * Unlike `message:send`, the sender needs to know whether the upload
 * went through, so the adapter reports back through `done`.
 */
export interface MediaSendRequest {
  channelId: string;
  platform: Platform;
  kind: OutgoingMediaKind;
  /** Absolute path of the file; only valid until `done` is called */
  path: string;
  filename: string;
  caption?: string;
  replyToId?: string;
  /** Called exactly once: without arguments on success, with the error otherwise */
  done: (error?: Error) => void;
}
