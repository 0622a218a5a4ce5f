/**
 * Plugin Types - Core plugin system interfaces
 *
 * Platform-agnostic plugin definitions; adapters translate to and from them.
 */

import type { BotConfig } from '../config';
import type { EventBus } from '../event-bus';
import type { CommandInvocation } from './command';
import type { BotMessage, Platform } from './message';
import type { CommandRegistry } from './slash-command';

/**
 * Logger interface for plugins
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Caption text shared by every plugin that posts one
 */
export interface CaptionSource {
  buildCaption(): string;
}

/**
 * Plugin type categories
 */
export type PluginType = 'message' | 'command';

/**
 * Base plugin interface that all plugins must implement
 */
export interface Plugin {
  /** Unique plugin identifier */
  readonly id: string;

  /** Plugin type for categorization */
  readonly type: PluginType;

  /**
   * Priority for execution order (higher = runs first)
   * Default: 0
   */
  readonly priority?: number;

  /** Initialize plugin with context */
  load(context: PluginContext): void | Promise<void>;

  /** Cleanup when plugin is unloaded */
  unload(): void | Promise<void>;
}

/**
 * Runtime context provided to plugins during load()
 *
 * Built once at startup; replaces process-wide config lookups.
 */
export interface PluginContext {
  /** EventBus for pub/sub communication */
  readonly eventBus: EventBus;

  /** Structured logger */
  readonly logger: Logger;

  /** Validated bot configuration */
  readonly config: BotConfig;

  /** Slash commands registered by plugins */
  readonly commands: CommandRegistry;

  /** Loaded once at startup and shared */
  readonly captions: CaptionSource;
}

// ============================================
// Specialized Plugin Interfaces
// ============================================

/**
 * Message handler trigger scope
 * - 'mention': Only trigger when bot is mentioned/highlighted (default)
 * - 'all': Trigger on all messages (useful for link handlers, etc.)
 */
export type MessageHandlerScope = 'mention' | 'all';

/**
 * Message handler plugin - reacts to chat messages
 */
export interface MessageHandlerPlugin extends Plugin {
  readonly type: 'message';

  readonly scope?: MessageHandlerScope;

  /**
   * Restrict to specific platforms (e.g., ['discord'])
   * If undefined, works on all platforms
   */
  readonly platforms?: readonly Platform[];

  /**
   * Restrict to specific guild/server IDs
   * If undefined, works in all guilds
   */
  readonly guildIds?: readonly string[];

  /**
   * Check if this handler should process the message
   * Note: This is called AFTER scope/platform/guild filtering
   */
  shouldHandle(message: BotMessage): boolean | Promise<boolean>;

  handle(message: BotMessage, context: PluginContext): void | Promise<void>;
}

/**
 * Command handler plugin - handles slash commands
 *
 * Commands subscribe to 'command:received' in load() and filter by name.
 */
export interface CommandHandlerPlugin extends Plugin {
  readonly type: 'command';

  handle?(invocation: CommandInvocation, context: PluginContext): void | Promise<void>;
}

// ============================================
// Type Guards
// ============================================

/**
 * Type guard to check if an object is a valid Plugin
 */
export function isPlugin(obj: unknown): obj is Plugin {
  return (
    obj !== null &&
    typeof obj === 'object' &&
    'id' in obj &&
    typeof obj.id === 'string' &&
    'type' in obj &&
    typeof obj.type === 'string' &&
    'load' in obj &&
    typeof obj.load === 'function' &&
    'unload' in obj &&
    typeof obj.unload === 'function'
  );
}

/**
 * Type guard for MessageHandlerPlugin
 */
export function isMessageHandler(plugin: Plugin): plugin is MessageHandlerPlugin {
  return (
    plugin.type === 'message' &&
    'shouldHandle' in plugin &&
    typeof plugin.shouldHandle === 'function' &&
    'handle' in plugin &&
    typeof plugin.handle === 'function'
  );
}
