/**
 * Instagram handler - posts, reels and IGTV
 */

import type { PlatformsConfig } from '@core';
import type { Handler } from '../types';
import { type HandlerContext, runYtDlp } from './yt-dlp';

export const INSTAGRAM_PATTERN = /https?:\/\/(?:www\.)?(?:instagram\.com|instagr\.am)\/(?:p|reel|tv)\/([A-Za-z0-9_-]+)/;

export const INSTAGRAM_ARGS = ['-t', 'mp4'] as const;

export function createInstagramHandler(config: PlatformsConfig['instagram'], ctx: HandlerContext): Handler {
  return {
    name: 'instagram',
    pattern: INSTAGRAM_PATTERN,
    captureGroup: 0,
    fetch: (target) => runYtDlp('instagram', INSTAGRAM_ARGS, config.cookiesPath, target, ctx),
  };
}
