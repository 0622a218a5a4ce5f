/**
 * Entry point: start the Discord bot
 *
 * Usage: tsx cli.ts [--config config/config.ts] [--debug]
 */

import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import {
  createCommandRegistry,
  createEventBus,
  createLogger,
  loadBotConfig,
  loadPlugins,
  type PluginContext,
  unloadPlugins,
} from '@core';
import { loadComments } from './app/helpers/comments';
import { DiscordAdapter } from './bot/discord/adapter';

const HELP = `Usage: tsx cli.ts [options]

Options:
  -c, --config <path>  Path to config file (default: config/config.ts)
  -d, --debug          Enable debug logging
  -h, --help           Show this help`;

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', short: 'c', default: 'config/config.ts' },
      debug: { type: 'boolean', short: 'd', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  const configPath = values.config ?? 'config/config.ts';
  const debug = values.debug ?? false;
  const logger = createLogger({ debug });

  logger.info(`Loading config from ${configPath}...`);
  const config = await loadBotConfig(configPath);

  const eventBus = createEventBus({ logger });
  const commands = createCommandRegistry();
  const captions = await loadComments(config, logger);
  const context: PluginContext = { eventBus, logger, config, commands, captions };

  // Load plugins from app/plugins (filtered by config.plugins)
  const pluginsDir = fileURLToPath(new URL('./app/plugins', import.meta.url));
  const plugins = await loadPlugins({ pluginsDir, context, logger });

  logger.info(`Loaded ${plugins.all.length} plugins (${plugins.message.length} message handlers)`);

  // Log slash command usage
  eventBus.on('command:received', (invocation) => {
    const user = invocation.user.displayName ?? invocation.user.name;
    const args = Object.keys(invocation.args).length > 0 ? ` ${JSON.stringify(invocation.args)}` : '';
    logger.info(`⚡ /${invocation.commandName}${args}`, { user, channelId: invocation.channel.id });
  });

  eventBus.on('plugin:error', ({ pluginId, error }) => {
    logger.error(`Plugin ${pluginId} error`, { error: error.message });
  });

  const adapter = new DiscordAdapter({ eventBus, logger, config, commands });

  // Register slash commands when bot is ready
  eventBus.once('bot:ready', async () => {
    await adapter.registerSlashCommands();
  });

  logger.info(`Connecting to Discord as ${config.bot.name}...`);
  await adapter.connect();

  logger.info('Bot is running. Press Ctrl+C to stop.');

  // Keep running until interrupted
  const reason = await new Promise<string>((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
  });

  logger.info(`Shutting down (${reason})...`);
  await eventBus.emit('bot:shutdown', { reason });
  await unloadPlugins(plugins.all, context, logger);
  await adapter.disconnect();

  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  },
);
