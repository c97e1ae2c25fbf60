import os from 'os';
import path from 'path';
import { z } from 'zod';
import { AppConfig } from '../types';

const DEFAULT_DAILY_LIMIT = 50;

const ConfigSchema = z
  .object({
    downloadRoot: z.string().min(1),
    binDirectory: z.string().min(1),
    bundledBinariesDir: z.string().min(1),
    audioFormat: z.enum(['mp3', 'm4a', 'opus']),
    filenamePattern: z.string().min(1),
    downloadTimeout: z.number().int().positive(),
    searchTimeout: z.number().int().positive(),
    metadataTimeout: z.number().int().positive(),
    quota: z.object({
      backend: z.enum(['supabase', 'rest', 'memory']),
      accountId: z.string().min(1),
      dailyLimit: z.number().int().positive(),
      supabaseUrl: z.string().url().optional(),
      supabaseKey: z.string().min(1).optional(),
      restUrl: z.string().url().optional(),
    }),
    sentryDsn: z.string().optional(),
  })
  .superRefine((config, ctx) => {
    const { quota } = config;
    if (quota.backend === 'supabase' && (!quota.supabaseUrl || !quota.supabaseKey)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Missing required environment variable: SUPABASE_URL / SUPABASE_KEY',
        path: ['quota'],
      });
    }
    if (quota.backend === 'rest' && !quota.restUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Missing required environment variable: QUOTA_REST_URL',
        path: ['quota'],
      });
    }
  });

function intFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = env.TRACKFETCH_HOME || path.join(os.homedir(), '.trackfetch');

  const result = ConfigSchema.safeParse({
    downloadRoot:
      env.DOWNLOAD_ROOT || path.join(os.homedir(), 'Downloads', 'TrackfetchDownloads', 'playlists'),
    binDirectory: env.BIN_DIRECTORY || path.join(dataDir, 'bin'),
    bundledBinariesDir: env.BUNDLED_BINARIES_DIR || path.join(process.cwd(), 'assets', 'binaries'),
    audioFormat: env.AUDIO_FORMAT || 'mp3',
    filenamePattern: env.FILENAME_PATTERN || '{playlist_index} - {artist} - {title}',
    downloadTimeout: intFromEnv(env.DOWNLOAD_TIMEOUT, 180000), // 3 min
    searchTimeout: intFromEnv(env.SEARCH_TIMEOUT, 25000),
    metadataTimeout: intFromEnv(env.METADATA_TIMEOUT, 20000),
    quota: {
      backend: env.QUOTA_BACKEND || 'memory',
      accountId: env.ACCOUNT_ID || 'local',
      dailyLimit: intFromEnv(env.DAILY_DOWNLOAD_LIMIT, DEFAULT_DAILY_LIMIT),
      supabaseUrl: env.SUPABASE_URL || undefined,
      supabaseKey: env.SUPABASE_SERVICE_ROLE_KEY || env.SUPABASE_KEY || undefined,
      restUrl: env.QUOTA_REST_URL || undefined,
    },
    sentryDsn: env.SENTRY_DSN || undefined,
  });

  if (!result.success) {
    const details = result.error.issues.map((issue) => issue.message).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  return result.data;
}
