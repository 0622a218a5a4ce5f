/**
 * Auto Media Plugin - Relays media from social links
 *
 * Watches every message for a supported link and, for each one:
 * 1. Fetches it with yt-dlp into a private workspace
 * 2. Picks the best file (video over image)
 * 3. Uploads it to the channel as a reply, with a random caption
 * 4. Suppresses the original link preview
 *
 * Each message gets its own background run; a failure is reported to the
 * user and logged, and never reaches the message loop.
 *
 * Scope: 'all' - processes every message
 */

import path from 'node:path';
import type { BotMessage, MessageHandlerPlugin, PluginContext } from '@core';
import { toMediaError, TransportError, UnknownMediaKindError, userMessageFor } from '../../helpers/media/errors';
import { createMediaService, type MediaService } from '../../helpers/media/media.service';
import type { DispatchMatch, MediaDelivery, MediaKind } from '../../helpers/media/types';

export interface MediaAutoPluginOptions {
  /** Prebuilt pipeline; built from config on load when omitted */
  service?: MediaService;
}

export class MediaAutoPlugin implements MessageHandlerPlugin {
  readonly id = 'media';
  readonly type = 'message' as const;
  readonly scope = 'all' as const;
  readonly priority = 50;

  private context?: PluginContext;
  private service?: MediaService;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly options: MediaAutoPluginOptions = {}) {}

  async load(context: PluginContext): Promise<void> {
    this.context = context;
    this.service = this.options.service ?? createMediaService(context.config, context.logger);

    context.logger.info('MediaAutoPlugin loaded', { platforms: this.service.platforms });
  }

  async unload(): Promise<void> {
    await this.settled();
    this.context?.logger.info('MediaAutoPlugin unloaded');
    this.context = undefined;
  }

  shouldHandle(message: BotMessage): boolean {
    // Don't process bot messages
    if (message.author.isBot) return false;

    return this.service?.dispatch(message.content) != null;
  }

  /**
   * Start a pipeline run for the message and return without waiting for it
   */
  handle(message: BotMessage, context: PluginContext): void {
    const match = this.service?.dispatch(message.content);
    if (!match) return;

    const run = this.run(match, message, context).finally(() => {
      this.inFlight.delete(run);
    });
    this.inFlight.add(run);
  }

  /**
   * Resolves once every run started so far has finished
   */
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private async run(match: DispatchMatch, message: BotMessage, context: PluginContext): Promise<void> {
    const { eventBus, logger } = context;
    const platform = match.handler.name;
    const target = { channelId: message.channel.id, platform: message.platform };

    logger.info('Auto-processing media URL', {
      platform,
      url: match.target.substring(0, 80),
      messageId: message.id,
    });

    eventBus.fire('typing:start', target);

    try {
      if (!this.service) {
        throw new Error('MediaAutoPlugin used before load()');
      }

      const winner = await this.service.handle(match, this.createDelivery(message, context));

      logger.info('Media relayed', { platform, kind: winner.kind, messageId: message.id });

      eventBus.fire('message:suppress-embeds', { ...target, messageId: message.id });
    } catch (error) {
      const mediaError = toMediaError(error);

      logger.error('Failed to relay media', {
        platform,
        code: mediaError.code,
        error: mediaError.message,
        messageId: message.id,
      });

      eventBus.fire('message:send', {
        ...target,
        message: {
          content: `❌ ${userMessageFor(mediaError)}`,
          replyToId: message.id,
        },
      });
    } finally {
      eventBus.fire('typing:stop', target);
    }
  }

  /**
   * Delivery over the event bus: the adapter listening on `media:send`
   * uploads the file and acknowledges through `done`.
   */
  private createDelivery(message: BotMessage, context: PluginContext): MediaDelivery {
    return {
      deliver: async (kind: MediaKind, filePath: string): Promise<void> => {
        if (kind === 'unknown') {
          throw new UnknownMediaKindError(filePath);
        }

        const ack: { received: boolean; error?: Error } = { received: false };

        await context.eventBus.emit('media:send', {
          channelId: message.channel.id,
          platform: message.platform,
          kind,
          path: filePath,
          filename: path.basename(filePath),
          caption: context.config.comments.captionMedia ? context.captions.buildCaption() : undefined,
          replyToId: message.id,
          done: (error?: Error) => {
            if (ack.received) return;
            ack.received = true;
            ack.error = error;
          },
        });

        if (!ack.received) {
          throw new TransportError('no transport acknowledged the upload');
        }
        if (ack.error) {
          throw ack.error instanceof TransportError
            ? ack.error
            : new TransportError(ack.error.message, { cause: ack.error });
        }
      },
    };
  }
}

export default MediaAutoPlugin;
