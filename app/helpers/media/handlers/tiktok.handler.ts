/**
 * TikTok handler
 *
 * Short share links (vm./vt.) and full `@user/video/<id>` links.
 */

import type { PlatformsConfig } from '@core';
import type { Handler } from '../types';
import { type HandlerContext, runYtDlp } from './yt-dlp';

export const TIKTOK_PATTERN =
  /https?:\/\/(?:www\.)?(?:vm|vt|tt|tik)\.tiktok\.com\/([A-Za-z0-9_-]+)[/?#]?|https?:\/\/(?:www\.|m\.)?tiktok\.com\/@[A-Za-z0-9_.-]+\/video\/\d+/;

export const TIKTOK_ARGS = ['-t', 'mp4'] as const;

export function createTikTokHandler(config: PlatformsConfig['tiktok'], ctx: HandlerContext): Handler {
  return {
    name: 'tiktok',
    pattern: TIKTOK_PATTERN,
    captureGroup: 0,
    fetch: (target) => runYtDlp('tiktok', TIKTOK_ARGS, config.cookiesPath, target, ctx),
  };
}
