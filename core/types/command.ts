/**
 * Command types - platform agnostic slash commands
 */

import type { BotChannel, BotUser, Platform } from './message';

/**
 * Command invocation (when user runs a command)
 */
export interface CommandInvocation {
  commandName: string;
  args: Record<string, unknown>;
  user: BotUser;
  channel: BotChannel;
  platform: Platform;
  /** Respond to this command */
  reply: (response: CommandResponse) => Promise<void>;
}

/**
 * Command response
 */
export interface CommandResponse {
  content?: string;
  ephemeral?: boolean;
  embeds?: BotEmbed[];
}

/**
 * Rich embed
 */
export interface BotEmbed {
  title?: string;
  description?: string;
  color?: number;
  fields?: Array<{ name: string; value: string; inline?: boolean }>;
}
