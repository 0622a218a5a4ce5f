/**
 * Help Command Plugin - Responds to /help
 *
 * Lists the registered slash commands and the platforms whose links
 * are relayed automatically.
 */

import type {
  BotConfig,
  BotEmbed,
  CommandHandlerPlugin,
  CommandInvocation,
  PluginContext,
  RegisteredCommand,
  SlashCommandDefinition,
} from '@core';
import { PLATFORM_ORDER } from '../../../helpers/media/handlers';

const COMMAND_DEFINITION: SlashCommandDefinition = {
  name: 'help',
  description: 'Show what this bot can do',
};

export function enabledPlatforms(config: BotConfig): string[] {
  return PLATFORM_ORDER.filter((platform) => config.media.platforms[platform].enabled);
}

export function buildHelpEmbed(botName: string, commands: RegisteredCommand[], platforms: string[]): BotEmbed {
  const commandLines = [...commands]
    .sort((a, b) => a.name.localeCompare(b.name))
    .map((cmd) => `\`/${cmd.name}\` ${cmd.description}`);

  return {
    title: `${botName} help`,
    description: 'Post a supported link and the media is uploaded here.',
    color: 0x5865f2,
    fields: [
      { name: 'Commands', value: commandLines.join('\n') || 'None', inline: false },
      { name: 'Links', value: platforms.join(', ') || 'None enabled', inline: false },
    ],
  };
}

export class HelpCommandPlugin implements CommandHandlerPlugin {
  readonly id = 'help';
  readonly type = 'command' as const;

  private context?: PluginContext;

  async load(context: PluginContext): Promise<void> {
    this.context = context;

    context.commands.register(COMMAND_DEFINITION, this.id);
    context.eventBus.on('command:received', this.handleCommand);

    context.logger.info('HelpCommandPlugin loaded');
  }

  async unload(): Promise<void> {
    if (this.context) {
      this.context.commands.unregister(COMMAND_DEFINITION.name);
      this.context.eventBus.off('command:received', this.handleCommand);
      this.context.logger.info('HelpCommandPlugin unloaded');
    }
    this.context = undefined;
  }

  /**
   * Filter - only handle /help commands
   */
  private handleCommand = async (invocation: CommandInvocation): Promise<void> => {
    if (invocation.commandName !== COMMAND_DEFINITION.name || !this.context) return;
    await this.handle(invocation, this.context);
  };

  async handle(invocation: CommandInvocation, context: PluginContext): Promise<void> {
    try {
      const embed = buildHelpEmbed(
        context.config.bot.name,
        context.commands.getForPlatform(invocation.platform),
        enabledPlatforms(context.config),
      );
      await invocation.reply({ embeds: [embed], ephemeral: true });
    } catch (error) {
      context.logger.error('Failed to handle help command', {
        plugin: this.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

export default HelpCommandPlugin;
