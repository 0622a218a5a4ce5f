/**
 * Curse Command Plugin - /curse replies with a random comment
 */

import type {
  CommandHandlerPlugin,
  CommandInvocation,
  PluginContext,
  SlashCommandDefinition,
} from '@core';

const COMMAND_DEFINITION: SlashCommandDefinition = {
  name: 'curse',
  description: 'Send a random comment',
};

export class CurseCommandPlugin implements CommandHandlerPlugin {
  readonly id = 'curse';
  readonly type = 'command' as const;

  private context?: PluginContext;

  async load(context: PluginContext): Promise<void> {
    this.context = context;

    context.commands.register(COMMAND_DEFINITION, this.id);
    context.eventBus.on('command:received', this.handleCommand);

    context.logger.info('CurseCommandPlugin loaded');
  }

  async unload(): Promise<void> {
    if (this.context) {
      this.context.commands.unregister(COMMAND_DEFINITION.name);
      this.context.eventBus.off('command:received', this.handleCommand);
    }
    this.context = undefined;
  }

  private handleCommand = async (invocation: CommandInvocation): Promise<void> => {
    if (invocation.commandName !== COMMAND_DEFINITION.name || !this.context) return;
    await this.handle(invocation, this.context);
  };

  async handle(invocation: CommandInvocation, context: PluginContext): Promise<void> {
    try {
      await invocation.reply({ content: context.captions.buildCaption() });
    } catch (error) {
      context.logger.error('Failed to handle curse command', {
        plugin: this.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

export default CurseCommandPlugin;
