import fs from 'fs';
import { z } from 'zod';
import { AppConfig } from '../types/config';
import { DownloadSettings } from '../download/core/types';
import { logger } from './logger';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    logger.warn(`Ignoring invalid value for ${name}`, { value: raw });
    return fallback;
  }
  return value;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): AppConfig {
  return {
    ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
    engine: {
      ytDlpPath: process.env.YTDLP_PATH || 'yt-dlp',
      retries: intFromEnv('ENGINE_RETRIES', 3),
      fragmentRetries: intFromEnv('FRAGMENT_RETRIES', 3),
      concurrentFragments: intFromEnv('CONCURRENT_FRAGMENTS', 5),
      socketTimeout: intFromEnv('SOCKET_TIMEOUT', 15),
    },
    ledgerFile: process.env.LEDGER_FILE || './downloaded_files.json',
    settingsFile: process.env.SETTINGS_FILE || './settings.json',
    cookiesFile: process.env.COOKIES_FILE || undefined,
    thumbnailTimeout: intFromEnv('THUMBNAIL_TIMEOUT', 10000),
    coolOffEvery: intFromEnv('COOL_OFF_EVERY', 10),
    coolOffMaxMs: intFromEnv('COOL_OFF_MAX_MS', 2000),
    resolveRetries: intFromEnv('RESOLVE_RETRIES', 2),
    watchUrlTemplate:
      process.env.WATCH_URL_TEMPLATE || 'https://www.youtube.com/watch?v={id}',
  };
}

const EmbedFlagsSchema = z.object({
  title: z.boolean().default(true),
  uploader: z.boolean().default(true),
  description: z.boolean().default(true),
  tags: z.boolean().default(true),
  license: z.boolean().default(true),
});

export const SettingsSchema = z.object({
  outputFormat: z.enum(['mp4', 'mkv', 'mp3']).default('mp4'),
  quality: z.string().min(1).default('best'),
  downloadSubtitles: z.boolean().default(false),
  embed: EmbedFlagsSchema.default({}),
  useYearSubfolders: z.boolean().default(false),
  cookiesFile: z.string().min(1).optional(),
});

export const DEFAULT_SETTINGS: DownloadSettings = SettingsSchema.parse({});

/**
 * Parse a settings object, falling back to defaults for missing keys
 */
export function parseSettings(raw: unknown): DownloadSettings {
  return SettingsSchema.parse(raw);
}

/**
 * Load the read-only download settings from a JSON file.
 * A missing file means defaults; a broken one is logged and replaced by defaults.
 */
export function loadSettings(filePath: string): DownloadSettings {
  if (!fs.existsSync(filePath)) {
    logger.info('No settings file found, using defaults', { path: filePath });
    return DEFAULT_SETTINGS;
  }

  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    return parseSettings(JSON.parse(content));
  } catch (error) {
    logger.error('Failed to load settings, using defaults', {
      path: filePath,
      error: (error as Error).message,
    });
    return DEFAULT_SETTINGS;
  }
}
