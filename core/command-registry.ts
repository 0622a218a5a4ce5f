/**
 * Command Registry - Tracks registered slash commands
 *
 * One registry is created at startup and handed to plugins through their
 * context. Platform adapters query it to know what commands to register.
 */

import type { Platform } from './types/message';
import type { CommandRegistry, RegisteredCommand, SlashCommandDefinition } from './types/slash-command';

const COMMAND_NAME = /^[a-z0-9_-]{1,32}$/;

export class SlashCommandRegistry implements CommandRegistry {
  private commands = new Map<string, RegisteredCommand>();

  register(command: SlashCommandDefinition, pluginId: string): void {
    if (!COMMAND_NAME.test(command.name)) {
      throw new Error(`Invalid command name "${command.name}" (lowercase, 1-32 chars)`);
    }
    if (command.description.length === 0 || command.description.length > 100) {
      throw new Error(`Command "${command.name}" needs a 1-100 character description`);
    }
    const existing = this.commands.get(command.name);
    if (existing) {
      throw new Error(`Command "${command.name}" is already registered by ${existing.pluginId}`);
    }

    this.commands.set(command.name, {
      ...command,
      pluginId,
      registeredAt: new Date(),
    });
  }

  unregister(commandName: string): void {
    this.commands.delete(commandName);
  }

  getAll(): RegisteredCommand[] {
    return Array.from(this.commands.values());
  }

  getForPlatform(platform: Platform): RegisteredCommand[] {
    // No platform list means every platform
    return this.getAll().filter((cmd) => !cmd.platforms?.length || cmd.platforms.includes(platform));
  }

  get(commandName: string): RegisteredCommand | undefined {
    return this.commands.get(commandName);
  }

  has(commandName: string): boolean {
    return this.commands.has(commandName);
  }
}

export function createCommandRegistry(): CommandRegistry {
  return new SlashCommandRegistry();
}
