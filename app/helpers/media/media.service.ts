/**
 * Media Service - the acquisition pipeline
 *
 * Lives in app/helpers/media/ so plugins can share it. One `handle()` call
 * is one pipeline run: fetch, select, deliver, clean up.
 */

import type { BotConfig, Logger } from '@core';
import { createHandlers, dispatch } from './handlers';
import { WorkspaceProcessRunner } from './process-runner';
import { selectMedia } from './selector';
import type { DispatchMatch, Handler, MediaCandidate, MediaDelivery } from './types';

export type { DispatchMatch, MediaCandidate, MediaDelivery } from './types';

export class MediaService {
  constructor(
    private readonly handlers: readonly Handler[],
    private readonly logger: Logger,
  ) {}

  /**
   * Platforms this service will act on, in dispatch order
   */
  get platforms(): string[] {
    return this.handlers.map((handler) => handler.name);
  }

  dispatch(text: string): DispatchMatch | null {
    return dispatch(this.handlers, text);
  }

  /**
   * Fetch the target, pick one file and hand it to `delivery`.
   *
   * Errors from any stage propagate unchanged. The workspace is gone by
   * the time this settles.
   */
  async handle(match: DispatchMatch, delivery: MediaDelivery): Promise<MediaCandidate> {
    const { handler, target } = match;
    this.logger.info(`Fetching ${handler.name} media`, { target });

    const result = await handler.fetch(target);
    try {
      const winner = await selectMedia(result.files);
      this.logger.debug('Selected media file', {
        platform: handler.name,
        path: winner.path,
        kind: winner.kind,
        candidates: result.files.length,
      });

      await delivery.deliver(winner.kind, winner.path);
      return winner;
    } finally {
      await result.workspace.release().catch((error: unknown) => {
        this.logger.warn('Failed to remove workspace', {
          workspace: result.workspace.path,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
  }
}

/**
 * Wire up the runner and the enabled platform handlers from config
 */
export function createMediaService(config: BotConfig, logger: Logger): MediaService {
  const runner = new WorkspaceProcessRunner({
    timeoutMs: config.media.fetchTimeoutMs,
    tempRoot: config.media.tempDir,
    logger,
  });
  const handlers = createHandlers(config.media.platforms, {
    runner,
    ytDlpPath: config.media.ytDlpPath,
    logger,
  });
  return new MediaService(handlers, logger);
}
