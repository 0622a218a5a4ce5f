/**
 * yt-dlp binding shared by every platform handler
 */

import type { Logger } from '@core';
import type { DownloadResult, PlatformName, ProcessRunner } from '../types';
import { fileExists } from '../utils/fileUtils';

/**
 * What a handler needs to turn a target into a download
 */
export interface HandlerContext {
  runner: ProcessRunner;
  /** yt-dlp executable (name on PATH or absolute path) */
  ytDlpPath: string;
  logger: Logger;
}

/**
 * Build the yt-dlp argument list: base flags, cookies if usable, target last
 */
export async function buildYtDlpArgs(
  platform: PlatformName,
  baseArgs: readonly string[],
  cookiesPath: string | undefined,
  target: string,
  logger: Logger,
): Promise<string[]> {
  const args = [...baseArgs];

  if (cookiesPath) {
    if (await fileExists(cookiesPath)) {
      args.push('--cookies', cookiesPath);
    } else {
      logger.warn(`Cookie file for ${platform} not found, continuing without it`, { cookiesPath });
    }
  }

  args.push(target);
  return args;
}

export async function runYtDlp(
  platform: PlatformName,
  baseArgs: readonly string[],
  cookiesPath: string | undefined,
  target: string,
  ctx: HandlerContext,
): Promise<DownloadResult> {
  const args = await buildYtDlpArgs(platform, baseArgs, cookiesPath, target, ctx.logger);
  return ctx.runner.run(ctx.ytDlpPath, args);
}
