/**
 * Config schema tests
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_YOUTUBE_POSTPROCESSOR_ARGS, loadBotConfig, parseBotConfig } from '@core';
import { describe, expect, test } from 'vitest';

const FIXTURE = fileURLToPath(new URL('./fixtures/bot.config.ts', import.meta.url));

describe('parseBotConfig()', () => {
  test('should fill in defaults', () => {
    const config = parseBotConfig({ tokens: { discord: 'test-secret' } });

    expect(config.bot.name).toBe('MediaRelay');
    expect(config.media.ytDlpPath).toBe('yt-dlp');
    expect(config.media.fetchTimeoutMs).toBe(300000);
    expect(config.media.tempDir).toBeUndefined();
    expect(config.media.platforms.instagram).toEqual({ enabled: true, cookiesPath: undefined });
    expect(config.media.platforms.youtube.postprocessorArgs).toBe(DEFAULT_YOUTUBE_POSTPROCESSOR_ARGS);
    expect(config.comments).toEqual({ captionMedia: true });
    expect(config.plugins).toBeUndefined();
  });

  test('should treat a blank cookie path as unset', () => {
    const config = parseBotConfig({
      tokens: { discord: 'test-secret' },
      media: { platforms: { twitter: { cookiesPath: '   ' }, tiktok: { cookiesPath: ' cookies/tt.txt ' } } },
    });

    expect(config.media.platforms.twitter.cookiesPath).toBeUndefined();
    expect(config.media.platforms.tiktok.cookiesPath).toBe('cookies/tt.txt');
  });

  test('should keep an explicitly empty postprocessor string', () => {
    const config = parseBotConfig({
      tokens: { discord: 'test-secret' },
      media: { platforms: { youtube: { postprocessorArgs: '' } } },
    });

    expect(config.media.platforms.youtube.postprocessorArgs).toBe('');
  });

  test('should list every problem in the error', () => {
    expect(() =>
      parseBotConfig({
        tokens: { discord: '' },
        media: { fetchTimeoutMs: -1 },
      }),
    ).toThrow(
      'Invalid configuration:\n  - tokens.discord: tokens.discord is required\n  - media.fetchTimeoutMs: Number must be greater than 0',
    );
  });

  test('should reject a missing tokens section', () => {
    expect(() => parseBotConfig({})).toThrow('Invalid configuration:\n  - tokens: Required');
  });
});

describe('loadBotConfig()', () => {
  test('should load the default export of a config module', async () => {
    const config = await loadBotConfig(FIXTURE);

    expect(config.tokens.discord).toBe('test-secret');
    expect(config.bot.name).toBe('FixtureBot');
    expect(config.plugins).toEqual(['media']);
  });

  test('should explain how to create a missing config', async () => {
    await expect(loadBotConfig(path.join(path.dirname(FIXTURE), 'missing.config.ts'))).rejects.toThrow(
      'Create a config file by copying config/config.example.ts to config/config.ts',
    );
  });
});
