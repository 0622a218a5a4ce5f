/**
 * YouTube handler - Shorts only
 *
 * Full-length videos are usually too large to upload, so plain watch
 * links are left alone.
 */

import type { PlatformsConfig } from '@core';
import type { Handler } from '../types';
import { type HandlerContext, runYtDlp } from './yt-dlp';

export const YOUTUBE_PATTERN = /https?:\/\/(?:www\.)?youtube\.com\/shorts\/[A-Za-z0-9_-]+(?:\?[^\s]*)?/;

/**
 * Prefer mp4/m4a streams and remux to mp4 so the result plays inline
 */
export function youtubeArgs(postprocessorArgs: string): string[] {
  const args = [
    '--no-playlist',
    '-f',
    'bestvideo[ext=mp4]+bestaudio[ext=m4a]/bestvideo+bestaudio/best',
    '--merge-output-format',
    'mp4',
  ];

  const extra = postprocessorArgs.trim();
  if (extra) {
    args.push('--postprocessor-args', extra);
  }
  return args;
}

export function createYouTubeHandler(config: PlatformsConfig['youtube'], ctx: HandlerContext): Handler {
  const baseArgs = youtubeArgs(config.postprocessorArgs);

  return {
    name: 'youtube',
    pattern: YOUTUBE_PATTERN,
    captureGroup: 0,
    fetch: (target) => runYtDlp('youtube', baseArgs, config.cookiesPath, target, ctx),
  };
}
