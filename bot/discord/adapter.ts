/**
 * Discord Adapter - Translates Discord events to platform-agnostic events
 */

import { stat } from 'node:fs/promises';
import { formatFileSize } from '@app/helpers/media/utils/fileUtils';
import type {
  BotConfig,
  BotEmbed,
  BotMessage,
  BotUser,
  CommandInvocation,
  CommandRegistry,
  CommandResponse,
  EventBus,
  Logger,
  MediaSendRequest,
  MessageSendRequest,
  RegisteredCommand,
} from '@core';
import {
  type APIEmbed,
  ApplicationCommandOptionType,
  type Channel,
  type ChatInputApplicationCommandData,
  type ChatInputCommandInteraction,
  Client,
  Events,
  GatewayIntentBits,
  GuildPremiumTier,
  type Interaction,
  type Message,
  type MessageCreateOptions,
  MessageFlags,
  Partials,
  type User,
} from 'discord.js';

/** Upload limit outside boosted guilds */
export const DEFAULT_UPLOAD_LIMIT = 10 * 1024 * 1024;

export interface DiscordAdapterOptions {
  eventBus: EventBus;
  logger: Logger;
  config: BotConfig;
  commands: CommandRegistry;
}

/**
 * Upload limit for a guild boost tier
 */
export function uploadLimitForTier(tier: GuildPremiumTier): number {
  switch (tier) {
    case GuildPremiumTier.Tier2:
      return 50 * 1024 * 1024;
    case GuildPremiumTier.Tier3:
      return 100 * 1024 * 1024;
    default:
      // Tier 1 doesn't increase the file limit
      return DEFAULT_UPLOAD_LIMIT;
  }
}

/**
 * Discord platform adapter
 *
 * Converts Discord.js events to normalized events and vice versa.
 */
export class DiscordAdapter {
  private client: Client;
  private eventBus: EventBus;
  private logger: Logger;
  private config: BotConfig;
  private commands: CommandRegistry;
  private guildUploadLimits: Map<string, number> = new Map();
  private typingState = new Map<string, { count: number; interval: NodeJS.Timeout }>();

  constructor(options: DiscordAdapterOptions) {
    this.eventBus = options.eventBus;
    this.logger = options.logger;
    this.config = options.config;
    this.commands = options.commands;

    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        GatewayIntentBits.DirectMessages,
      ],
      // DM channels arrive uncached
      partials: [Partials.Channel],
    });

    this.setupIncomingEvents();
    this.setupOutgoingEvents();
  }

  /**
   * Connect to Discord
   */
  async connect(): Promise<void> {
    this.logger.info('Discord adapter connecting...');

    await this.client.login(this.config.tokens.discord);
  }

  /**
   * Disconnect from Discord
   */
  async disconnect(): Promise<void> {
    this.logger.info('Discord adapter disconnecting...');
    for (const state of this.typingState.values()) {
      clearInterval(state.interval);
    }
    this.typingState.clear();
    await this.client.destroy();
  }

  /**
   * Get upload limit for a guild in bytes
   */
  getGuildUploadLimit(guildId: string): number {
    return this.guildUploadLimits.get(guildId) ?? DEFAULT_UPLOAD_LIMIT;
  }

  private cacheGuildUploadLimit(guildId: string, premiumTier: GuildPremiumTier): void {
    const limit = uploadLimitForTier(premiumTier);
    this.guildUploadLimits.set(guildId, limit);
    this.logger.debug(`Cached upload limit for guild ${guildId}: ${formatFileSize(limit)} (tier ${premiumTier})`);
  }

  // ============================================
  // Incoming Events (Discord → EventBus)
  // ============================================

  private setupIncomingEvents(): void {
    // Ready
    this.client.once(Events.ClientReady, (client) => {
      this.logger.info(`Discord connected as ${client.user.tag}`);

      for (const [guildId, guild] of client.guilds.cache) {
        this.cacheGuildUploadLimit(guildId, guild.premiumTier);
      }

      this.eventBus.fire('bot:ready', { platform: 'discord' });
    });

    // Guild joined
    this.client.on(Events.GuildCreate, (guild) => {
      this.cacheGuildUploadLimit(guild.id, guild.premiumTier);
      this.logger.info(`Joined guild: ${guild.name} (${guild.id})`);
    });

    // Boost tier changes move the upload limit
    this.client.on(Events.GuildUpdate, (_old, guild) => {
      this.cacheGuildUploadLimit(guild.id, guild.premiumTier);
    });

    this.client.on(Events.GuildDelete, (guild) => {
      this.guildUploadLimits.delete(guild.id);
    });

    // Message received
    this.client.on(Events.MessageCreate, (message) => {
      // Ignore own messages
      if (message.author.id === this.client.user?.id) return;

      this.eventBus.fire('message:received', this.transformMessage(message));
    });

    // Interaction events (slash commands)
    this.client.on(Events.InteractionCreate, (interaction) => {
      this.handleInteraction(interaction);
    });

    // Error handling
    this.client.on(Events.Error, (error) => {
      this.logger.error('Discord client error', { error: error.message });
      this.eventBus.fire('bot:error', { error, context: 'discord' });
    });
  }

  // ============================================
  // Outgoing Events (EventBus → Discord)
  // ============================================

  private setupOutgoingEvents(): void {
    // Send message
    this.eventBus.on('message:send', async (request) => {
      if (request.platform !== 'discord') return;

      try {
        await this.sendMessage(request);
      } catch (error) {
        this.logger.error('Failed to send message', {
          channelId: request.channelId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    // Upload a media file; the sender waits on done()
    this.eventBus.on('media:send', async (request) => {
      if (request.platform !== 'discord') return;

      try {
        await this.sendMedia(request);
        request.done();
      } catch (error) {
        this.logger.error('Failed to upload media', {
          channelId: request.channelId,
          filename: request.filename,
          error: error instanceof Error ? error.message : String(error),
        });
        request.done(error instanceof Error ? error : new Error(String(error)));
      }
    });

    // Suppress embeds on a message
    this.eventBus.on('message:suppress-embeds', async (request) => {
      if (request.platform !== 'discord') return;

      try {
        const channel = await this.client.channels.fetch(request.channelId);
        if (!channel?.isTextBased()) return;

        const message = await channel.messages.fetch(request.messageId);
        await message.suppressEmbeds(true);
      } catch (error) {
        // Needs Manage Messages; missing permission is common
        this.logger.debug('Failed to suppress embeds', {
          messageId: request.messageId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    // Start typing indicator (reference counted)
    this.eventBus.on('typing:start', async (request) => {
      if (request.platform !== 'discord') return;

      const existing = this.typingState.get(request.channelId);
      if (existing) {
        existing.count++;
        return;
      }

      try {
        const channel = await this.client.channels.fetch(request.channelId);
        if (!channel?.isTextBased() || !('sendTyping' in channel)) return;

        await channel.sendTyping();

        // Discord drops the indicator after ~10s
        const interval = setInterval(() => {
          channel.sendTyping().catch((error: unknown) => {
            this.logger.debug('Failed to refresh typing', {
              channelId: request.channelId,
              error: error instanceof Error ? error.message : String(error),
            });
          });
        }, 8000);

        this.typingState.set(request.channelId, { count: 1, interval });
      } catch (error) {
        this.logger.error('Failed to start typing', {
          channelId: request.channelId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    // Stop typing indicator (reference counted)
    this.eventBus.on('typing:stop', (request) => {
      if (request.platform !== 'discord') return;

      const state = this.typingState.get(request.channelId);
      if (!state) return;

      state.count--;

      if (state.count <= 0) {
        clearInterval(state.interval);
        this.typingState.delete(request.channelId);
      }
    });
  }

  private async fetchSendableChannel(channelId: string) {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel?.isTextBased() || !('send' in channel)) {
      throw new Error(`Channel ${channelId} is not a text channel`);
    }
    return channel;
  }

  private async sendMessage(request: MessageSendRequest): Promise<void> {
    const channel = await this.fetchSendableChannel(request.channelId);
    const { message } = request;

    const options: MessageCreateOptions = { content: message.content };

    if (message.replyToId) {
      options.reply = { messageReference: message.replyToId, failIfNotExists: false };
    }

    await channel.send(options);

    this.logOutgoingMessage(channel, message.content);
  }

  /**
   * Upload one local file, refusing anything over the channel's limit
   */
  private async sendMedia(request: MediaSendRequest): Promise<void> {
    const channel = await this.fetchSendableChannel(request.channelId);

    const guildId = 'guildId' in channel && typeof channel.guildId === 'string' ? channel.guildId : undefined;
    const limit = guildId ? this.getGuildUploadLimit(guildId) : DEFAULT_UPLOAD_LIMIT;
    const { size } = await stat(request.path);

    if (size > limit) {
      throw new Error(`${request.filename} is ${formatFileSize(size)}, over the ${formatFileSize(limit)} upload limit`);
    }

    const options: MessageCreateOptions = {
      files: [{ attachment: request.path, name: request.filename }],
    };

    if (request.caption) {
      options.content = request.caption;
    }

    if (request.replyToId) {
      options.reply = { messageReference: request.replyToId, failIfNotExists: false };
    }

    await channel.send(options);

    this.logOutgoingMessage(channel, request.caption, 1);
  }

  // ============================================
  // Transforms
  // ============================================

  private transformMessage(message: Message): BotMessage {
    const botId = this.client.user?.id;
    // In DMs (no guild), always respond. In channels, require @mention or reply to bot
    const isDM = !message.guildId;
    const isDirectMention = botId ? message.mentions.users.has(botId) : false;
    const isReplyToBot = Boolean(message.reference?.messageId) && message.mentions.repliedUser?.id === botId;

    return {
      id: message.id,
      content: message.content,
      author: this.transformUser(message.author),
      channel: { id: message.channelId },
      guildId: message.guildId ?? undefined,
      mentionedBot: isDM || isDirectMention || isReplyToBot,
      platform: 'discord',
    };
  }

  private transformUser(user: User): BotUser {
    return {
      id: user.id,
      name: user.username,
      displayName: user.displayName ?? user.username,
      isBot: user.bot,
    };
  }

  private transformEmbed(embed: BotEmbed): APIEmbed {
    return {
      title: embed.title,
      description: embed.description,
      color: embed.color,
      fields: embed.fields,
    };
  }

  /**
   * Log outgoing bot message to terminal
   */
  private logOutgoingMessage(channel: Channel, content?: string, attachmentCount?: number): void {
    const timestamp = new Date().toLocaleTimeString('en-US', { hour12: false });
    const guild = 'guild' in channel && channel.guild ? channel.guild.name : 'DM';
    const channelName = 'name' in channel && typeof channel.name === 'string' ? channel.name : channel.id;
    const botName = this.config.bot.name;

    // Truncate long messages for terminal display
    let displayContent = content ?? '';
    if (displayContent.length > 200) {
      displayContent = `${displayContent.substring(0, 200)}...`;
    }

    if (attachmentCount && attachmentCount > 0) {
      displayContent = displayContent
        ? `${displayContent} [${attachmentCount} attachment(s)]`
        : `[${attachmentCount} attachment(s)]`;
    }

    const dim = '\x1b[2m';
    const reset = '\x1b[0m';
    const yellow = '\x1b[33m';
    const blue = '\x1b[34m';
    const magenta = '\x1b[35m';
    const white = '\x1b[37m';

    // Format: [HH:MM:SS] Guild/#channel │ BotName [BOT]: message
    console.log(
      `${dim}[${timestamp}]${reset} ` +
        `${yellow}${guild}${reset}${dim}/${reset}${blue}#${channelName}${reset} ` +
        `${dim}│${reset} ${magenta}${botName}${reset} ${magenta}[BOT]${reset}` +
        `${dim}:${reset} ${white}${displayContent}${reset}`,
    );
  }

  // ============================================
  // Interaction Handling
  // ============================================

  private handleInteraction(interaction: Interaction): void {
    if (interaction.isChatInputCommand()) {
      this.handleSlashCommand(interaction);
    }
  }

  private handleSlashCommand(interaction: ChatInputCommandInteraction): void {
    const args: Record<string, unknown> = {};
    for (const option of interaction.options.data) {
      if (
        option.type === ApplicationCommandOptionType.Subcommand ||
        option.type === ApplicationCommandOptionType.SubcommandGroup
      ) {
        for (const subOption of option.options ?? []) {
          args[subOption.name] = subOption.value;
        }
      } else {
        args[option.name] = option.value;
      }
    }

    const invocation: CommandInvocation = {
      commandName: interaction.commandName,
      args,
      user: this.transformUser(interaction.user),
      channel: { id: interaction.channelId },
      platform: 'discord',
      reply: async (response: CommandResponse) => {
        await interaction.reply({
          content: response.content,
          embeds: response.embeds?.map((e) => this.transformEmbed(e)),
          flags: response.ephemeral ? MessageFlags.Ephemeral : undefined,
        });
      },
    };

    this.eventBus.fire('command:received', invocation);
  }

  // ============================================
  // Slash Command Registration
  // ============================================

  async registerSlashCommands(): Promise<void> {
    const commands = this.commands.getForPlatform('discord');

    if (commands.length === 0) {
      this.logger.info('No slash commands to register');
      return;
    }

    if (!this.client.application) {
      this.logger.warn('Cannot register slash commands before the client is ready');
      return;
    }

    try {
      await this.client.application.commands.set(commands.map((cmd) => this.transformCommand(cmd)));

      this.logger.info(`Registered ${commands.length} slash command(s)`, {
        commands: commands.map((c) => c.name),
      });
    } catch (error) {
      this.logger.error('Failed to register slash commands', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private transformCommand(cmd: RegisteredCommand): ChatInputApplicationCommandData {
    return {
      name: cmd.name,
      description: cmd.description,
    };
  }
}
