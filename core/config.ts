/**
 * Bot Configuration Schema and Loader
 *
 * The config file default-exports a plain object; it is validated here and
 * defaults are filled in. Nothing is cached: callers pass the result along.
 */

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';

export const DEFAULT_YOUTUBE_POSTPROCESSOR_ARGS =
  'ffmpeg:-vf setsar=1 -c:v libx264 -crf 20 -preset ultrafast -c:a aac -b:a 128k -movflags +faststart';

const platformSchema = z.object({
  /** Disabled platforms are not registered at all */
  enabled: z.boolean().default(true),
  /** Netscape-format cookie file handed to yt-dlp; blank means none */
  cookiesPath: z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined),
});

const youtubeSchema = platformSchema.extend({
  /** Passed through as --postprocessor-args; empty string disables it */
  postprocessorArgs: z.string().default(DEFAULT_YOUTUBE_POSTPROCESSOR_ARGS),
});

const mediaSchema = z.object({
  ytDlpPath: z.string().min(1).default('yt-dlp'),
  fetchTimeoutMs: z.number().int().positive().default(5 * 60 * 1000),
  /** Parent of per-request workspaces (OS temp dir when unset) */
  tempDir: z.string().min(1).optional(),
  platforms: z
    .object({
      instagram: platformSchema.default({}),
      youtube: youtubeSchema.default({}),
      twitter: platformSchema.default({}),
      tiktok: platformSchema.default({}),
    })
    .default({}),
});

const commentsSchema = z.object({
  /** Plaintext file, one caption per line */
  path: z.string().min(1).optional(),
  /** Attach a random caption to delivered media */
  captionMedia: z.boolean().default(true),
});

export const botConfigSchema = z.object({
  tokens: z.object({
    discord: z.string().min(1, 'tokens.discord is required'),
  }),
  bot: z
    .object({
      name: z.string().min(1).default('MediaRelay'),
    })
    .default({}),
  media: mediaSchema.default({}),
  comments: commentsSchema.default({}),
  /** Plugin ids to load; every discovered plugin when omitted */
  plugins: z.array(z.string().min(1)).optional(),
});

/** Validated configuration with defaults applied */
export type BotConfig = z.infer<typeof botConfigSchema>;

/** Shape accepted from config files (defaults optional) */
export type BotConfigInput = z.input<typeof botConfigSchema>;

export type MediaConfig = BotConfig['media'];
export type PlatformsConfig = MediaConfig['platforms'];

/**
 * Validate raw config, throwing a readable error listing every problem
 */
export function parseBotConfig(raw: unknown): BotConfig {
  const result = botConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${issues}`);
  }
  return result.data;
}

/**
 * Load bot configuration from a config module
 * @param configPath Path to the module, resolved against the working directory
 */
export async function loadBotConfig(configPath: string): Promise<BotConfig> {
  const fullPath = path.resolve(process.cwd(), configPath);

  let configModule: unknown;
  try {
    configModule = await import(pathToFileURL(fullPath).href);
  } catch (error) {
    throw new Error(
      `Failed to load config from ${fullPath}: ${error instanceof Error ? error.message : String(error)}\n` +
        `Create a config file by copying config/config.example.ts to config/config.ts`,
    );
  }

  const raw =
    configModule !== null && typeof configModule === 'object' && 'default' in configModule
      ? configModule.default
      : configModule;

  return parseBotConfig(raw);
}
