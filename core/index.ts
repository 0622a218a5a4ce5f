/**
 * Core framework exports
 *
 * Import as: import { EventBus, loadPlugins } from "@core"
 */

// Command Registry (for slash commands)
export { createCommandRegistry, SlashCommandRegistry } from './command-registry';
// Config
export {
  type BotConfig,
  type BotConfigInput,
  botConfigSchema,
  DEFAULT_YOUTUBE_POSTPROCESSOR_ARGS,
  loadBotConfig,
  type MediaConfig,
  type PlatformsConfig,
  parseBotConfig,
} from './config';
// EventBus
export { createEventBus, EventBus, type EventBusOptions } from './event-bus';
// Logger
export { createLogger, formatLogLine, type LoggerOptions, type LogLevel } from './logger';
// Plugin Loader
export {
  discoverPluginFiles,
  type LoadedPlugins,
  loadPlugins,
  type PluginLoaderOptions,
  shouldHandlerProcess,
  unloadPlugins,
  wireMessageHandlers,
} from './plugin-loader';

// Types
export * from './types';
