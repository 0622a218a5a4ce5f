/**
 * Captions for relayed media, picked at random from a plaintext file
 */

import { readFile } from 'node:fs/promises';
import type { BotConfig, CaptionSource, Logger } from '@core';

/** Discord's message content limit */
export const CAPTION_LIMIT = 2000;

const FALLBACK_COMMENTS = [
  'Straight from the source, no extra commentary needed.',
  'Fresh off the internet. Handle with care.',
  'Someone thought this was worth sharing. Verdict pending.',
  'Here it is. Make of it what you will.',
] as const;

export type RandomSource = () => number;

export class Comments implements CaptionSource {
  private constructor(private readonly lines: readonly string[]) {}

  static fallback(): Comments {
    return new Comments(FALLBACK_COMMENTS);
  }

  static fromLines(lines: readonly string[]): Comments {
    return new Comments([...lines]);
  }

  /**
   * One caption per line; blank lines and `#` comments are skipped
   */
  static async loadFromFile(filePath: string): Promise<Comments> {
    const content = await readFile(filePath, 'utf8');
    const lines = content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#'));

    if (lines.length === 0) {
      throw new Error(`comments file ${filePath} contains no usable lines`);
    }
    return new Comments(lines);
  }

  get size(): number {
    return this.lines.length;
  }

  pick(random: RandomSource = Math.random): string {
    const index = Math.floor(random() * this.lines.length);
    return this.lines[index] ?? FALLBACK_COMMENTS[0];
  }

  /**
   * Random comment, cut to fit in a single message
   */
  buildCaption(random: RandomSource = Math.random): string {
    const chars = Array.from(this.pick(random));
    if (chars.length <= CAPTION_LIMIT) {
      return chars.join('');
    }
    return `${chars.slice(0, CAPTION_LIMIT - 3).join('')}...`;
  }
}

/**
 * Load the configured comments file, or the built-in lines when there is none
 */
export async function loadComments(config: BotConfig, logger: Logger): Promise<Comments> {
  const filePath = config.comments.path;
  if (!filePath) {
    return Comments.fallback();
  }

  try {
    const comments = await Comments.loadFromFile(filePath);
    logger.info(`Loaded ${comments.size} comments`, { path: filePath });
    return comments;
  } catch (error) {
    logger.warn('Could not load comments, using built-in lines', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return Comments.fallback();
  }
}
