/**
 * Handler Registry
 *
 * A fixed table from platform to constructor, filtered by the `enabled`
 * flags in config. Order matters: the first matching handler wins.
 */

import type { PlatformsConfig } from '@core';
import type { DispatchMatch, Handler, PlatformName } from '../types';
import { createInstagramHandler } from './instagram.handler';
import { createTikTokHandler } from './tiktok.handler';
import { createTwitterHandler } from './twitter.handler';
import { createYouTubeHandler } from './youtube.handler';
import type { HandlerContext } from './yt-dlp';

export type { HandlerContext } from './yt-dlp';

export const PLATFORM_ORDER: readonly PlatformName[] = ['instagram', 'youtube', 'twitter', 'tiktok'];

type HandlerFactories = {
  [P in PlatformName]: (config: PlatformsConfig[P], ctx: HandlerContext) => Handler;
};

const HANDLER_FACTORIES: HandlerFactories = {
  instagram: createInstagramHandler,
  youtube: createYouTubeHandler,
  twitter: createTwitterHandler,
  tiktok: createTikTokHandler,
};

function createHandler(platform: PlatformName, platforms: PlatformsConfig, ctx: HandlerContext): Handler | null {
  switch (platform) {
    case 'instagram':
      return platforms.instagram.enabled ? HANDLER_FACTORIES.instagram(platforms.instagram, ctx) : null;
    case 'youtube':
      return platforms.youtube.enabled ? HANDLER_FACTORIES.youtube(platforms.youtube, ctx) : null;
    case 'twitter':
      return platforms.twitter.enabled ? HANDLER_FACTORIES.twitter(platforms.twitter, ctx) : null;
    case 'tiktok':
      return platforms.tiktok.enabled ? HANDLER_FACTORIES.tiktok(platforms.tiktok, ctx) : null;
  }
}

/**
 * Build the enabled handlers in registration order
 */
export function createHandlers(platforms: PlatformsConfig, ctx: HandlerContext): readonly Handler[] {
  const handlers: Handler[] = [];
  for (const platform of PLATFORM_ORDER) {
    const handler = createHandler(platform, platforms, ctx);
    if (handler) handlers.push(handler);
  }
  return Object.freeze(handlers);
}

/**
 * First handler whose pattern matches, with the text it should fetch
 */
export function dispatch(handlers: readonly Handler[], text: string): DispatchMatch | null {
  for (const handler of handlers) {
    const match = handler.pattern.exec(text);
    if (!match) continue;

    const target = match[handler.captureGroup];
    if (target === undefined) continue;

    return { handler, target };
  }
  return null;
}
