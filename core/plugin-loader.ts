/**
 * Plugin Loader - Loads plugins based on configuration
 *
 * Plugins are discovered on the filesystem (`plugin.ts` and `*.plugin.ts`)
 * and loaded only if config.plugins lists them (all of them when it is absent).
 *
 * Message handlers are automatically wired to the eventbus.
 */

import { readdir } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import type { BotMessage, Logger, MessageHandlerPlugin, Plugin, PluginContext } from './types';
import { isMessageHandler, isPlugin } from './types';

export interface PluginLoaderOptions {
  /** Base directory to search for plugins */
  pluginsDir: string;
  /** Plugin context to pass to plugins */
  context: PluginContext;
  /** Logger */
  logger: Logger;
}

export interface LoadedPlugins {
  all: Plugin[];
  /** Sorted by priority, highest first */
  message: MessageHandlerPlugin[];
}

type PluginConstructor = new () => unknown;

function isConstructor(value: unknown): value is PluginConstructor {
  return typeof value === 'function' && value.prototype !== undefined;
}

function isPluginFile(file: string): boolean {
  const base = path.basename(file);
  return base === 'plugin.ts' || base.endsWith('.plugin.ts');
}

/**
 * Find plugin files below a directory, relative to it
 */
export async function discoverPluginFiles(pluginsDir: string): Promise<string[]> {
  const entries = await readdir(pluginsDir, { recursive: true });
  return entries.filter(isPluginFile).sort();
}

function moduleExports(mod: unknown): unknown[] {
  if (mod === null || typeof mod !== 'object') return [];
  if ('default' in mod && mod.default !== undefined) return [mod.default];
  return Object.values(mod);
}

/**
 * Load plugins based on configuration
 */
export async function loadPlugins(options: PluginLoaderOptions): Promise<LoadedPlugins> {
  const { pluginsDir, context, logger } = options;
  const wanted = context.config.plugins;

  const result: LoadedPlugins = { all: [], message: [] };
  const files = await discoverPluginFiles(pluginsDir);

  logger.info(`Found ${files.length} plugin files`);

  for (const file of files) {
    const fullPath = path.join(pluginsDir, file);

    let mod: unknown;
    try {
      mod = await import(pathToFileURL(fullPath).href);
    } catch (error) {
      logger.error(`Failed to load plugin from ${file}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    for (const exported of moduleExports(mod)) {
      if (!isConstructor(exported)) continue;

      let instance: unknown;
      try {
        instance = new exported();
      } catch (error) {
        // Not a plugin class
        logger.debug(`Skipping export in ${file} - not a valid plugin`, {
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      if (!isPlugin(instance)) continue;

      if (wanted !== undefined && !wanted.includes(instance.id)) {
        logger.debug(`Skipping plugin ${instance.id} - not in config`);
        continue;
      }

      try {
        await instance.load(context);
      } catch (error) {
        logger.error(`Plugin ${instance.id} failed to load`, {
          error: error instanceof Error ? error.message : String(error),
        });
        context.eventBus.fire('plugin:error', {
          pluginId: instance.id,
          error: error instanceof Error ? error : new Error(String(error)),
        });
        continue;
      }

      result.all.push(instance);
      if (isMessageHandler(instance)) {
        result.message.push(instance);
      }

      context.eventBus.fire('plugin:loaded', { pluginId: instance.id });
      logger.info(`Loaded plugin: ${instance.id} (${instance.type})`);
    }
  }

  if (wanted !== undefined) {
    const loadedIds = new Set(result.all.map((p) => p.id));
    for (const id of wanted) {
      if (!loadedIds.has(id)) {
        logger.warn(`Plugin ${id} is listed in config but was not found`);
      }
    }
  }

  // Sort message handlers by priority (higher first)
  result.message.sort((a, b) => (b.priority ?? 0) - (a.priority ?? 0));

  wireMessageHandlers(context, result.message, logger);

  return result;
}

/**
 * Wire message handlers to the eventbus
 *
 * Subscribes to 'message:received' and dispatches to all matching handlers
 * in priority order. A failing handler does not stop the ones after it.
 */
export function wireMessageHandlers(context: PluginContext, handlers: MessageHandlerPlugin[], logger: Logger): void {
  context.eventBus.on('message:received', async (message: BotMessage) => {
    for (const handler of handlers) {
      // Check all restrictions (scope, platform, guild)
      if (!shouldHandlerProcess(handler, message)) continue;

      try {
        // Check plugin's own shouldHandle logic
        if (!(await handler.shouldHandle(message))) continue;

        await handler.handle(message, context);
      } catch (error) {
        logger.error(`Plugin ${handler.id} error`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  });
}

/**
 * Check if a message handler should process a message based on its restrictions
 */
export function shouldHandlerProcess(handler: MessageHandlerPlugin, message: BotMessage): boolean {
  // Check scope (default to 'mention')
  if (handler.scope !== 'all' && !message.mentionedBot) {
    return false;
  }

  // Check platform restriction
  if (handler.platforms && !handler.platforms.includes(message.platform)) {
    return false;
  }

  // Check guild restriction
  if (handler.guildIds && message.guildId && !handler.guildIds.includes(message.guildId)) {
    return false;
  }

  return true;
}

/**
 * Unload all plugins
 */
export async function unloadPlugins(plugins: Plugin[], context: PluginContext, logger: Logger): Promise<void> {
  for (const plugin of plugins) {
    try {
      await plugin.unload();
      context.eventBus.fire('plugin:unloaded', { pluginId: plugin.id });
      logger.info(`Unloaded plugin: ${plugin.id}`);
    } catch (error) {
      logger.error(`Failed to unload plugin ${plugin.id}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
