/**
 * Twitter / X handler - status links
 */

import type { PlatformsConfig } from '@core';
import type { Handler } from '../types';
import { type HandlerContext, runYtDlp } from './yt-dlp';

export const TWITTER_PATTERN = /https?:\/\/(?:www\.)?(?:twitter|x)\.com\/([A-Za-z0-9_]+(?:\/[A-Za-z0-9_]+)?)\/status\/(\d{1,20})/;

export const TWITTER_ARGS = ['-t', 'mp4'] as const;

export function createTwitterHandler(config: PlatformsConfig['twitter'], ctx: HandlerContext): Handler {
  return {
    name: 'twitter',
    pattern: TWITTER_PATTERN,
    captureGroup: 0,
    fetch: (target) => runYtDlp('twitter', TWITTER_ARGS, config.cookiesPath, target, ctx),
  };
}
