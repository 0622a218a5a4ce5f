/**
 * Slash Command Types - Platform-agnostic command definitions
 *
 * Platform adapters translate these to their native formats.
 */

import type { Platform } from './message';

/**
 * Full slash command definition
 */
export interface SlashCommandDefinition {
  /** Command name (lowercase, no spaces, 1-32 chars) */
  name: string;
  /** Description shown to users (1-100 chars) */
  description: string;
  /** Restrict to specific platforms */
  platforms?: Platform[];
}

/**
 * Registered command with metadata
 */
export interface RegisteredCommand extends SlashCommandDefinition {
  /** Plugin that registered this command */
  pluginId: string;
  registeredAt: Date;
}

/**
 * Command registry for tracking all registered commands
 */
export interface CommandRegistry {
  register(command: SlashCommandDefinition, pluginId: string): void;
  unregister(commandName: string): void;
  getAll(): RegisteredCommand[];
  getForPlatform(platform: Platform): RegisteredCommand[];
  get(commandName: string): RegisteredCommand | undefined;
  has(commandName: string): boolean;
}
