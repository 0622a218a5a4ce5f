/**
 * Bot Configuration Example
 *
 * Copy this file to config.ts and fill in your values.
 * You can also create config-<name>.ts for multiple bot configurations.
 *
 * Run with: tsx cli.ts --config config/config-mybot.ts
 */

import type { BotConfigInput } from '@core';

const config: BotConfigInput = {
  // ============================================
  // API TOKENS (Required)
  // ============================================
  tokens: {
    /**
     * Discord bot token
     * Get from: https://discord.com/developers/applications
     */
    discord: process.env.DISCORD_TOKEN ?? 'YOUR_DISCORD_BOT_TOKEN',
  },

  // ============================================
  // BOT IDENTITY
  // ============================================
  bot: {
    name: 'MediaRelay',
  },

  // ============================================
  // MEDIA RELAY
  // ============================================
  media: {
    /** yt-dlp executable, on PATH or absolute */
    ytDlpPath: 'yt-dlp',

    /** Kill a fetch that runs longer than this */
    fetchTimeoutMs: 5 * 60 * 1000,

    /**
     * Per-platform switches. Cookie files (Netscape format) let yt-dlp
     * reach content that needs a logged-in session; a missing file is
     * skipped with a warning.
     */
    platforms: {
      instagram: {
        enabled: true,
        cookiesPath: process.env.IG_SESSION_COOKIE_PATH,
      },
      youtube: {
        enabled: true,
        cookiesPath: process.env.YOUTUBE_SESSION_COOKIE_PATH,
        // Empty string turns re-encoding off
        postprocessorArgs: process.env.YOUTUBE_POSTPROCESSOR_ARGS,
      },
      twitter: {
        enabled: true,
        cookiesPath: process.env.TWITTER_SESSION_COOKIE_PATH,
      },
      tiktok: {
        enabled: true,
        cookiesPath: process.env.TIKTOK_SESSION_COOKIE_PATH,
      },
    },
  },

  // ============================================
  // CAPTIONS
  // ============================================
  comments: {
    /** One caption per line; see comments.example.txt */
    path: 'config/comments.txt',
    captionMedia: true,
  },

  // ============================================
  // PLUGINS
  // ============================================
  // Omit to load every plugin found under app/plugins
  plugins: ['media', 'help', 'curse'],
};

export default config;
