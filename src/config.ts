import path from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import type { LevelWithSilent } from 'pino';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes' || value === 'on');

const envSchema = z
  .object({
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    // Binaries
    YTDLP_PATH: z.string().min(1).default('yt-dlp'),
    FFMPEG_PATH: z.string().default(''),

    // Storage
    DOWNLOADS_DIR: z.string().min(1).default('downloads'),

    // Runtime flag consulted by the orchestrator
    DIRECT_LINK_MODE: booleanFlag.default('false'),

    // Pacing and retries
    PACER_MIN_DELAY_MS: z.coerce.number().int().nonnegative().default(1500),
    PACER_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(3000),
    RESOLVE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    BACKOFF_SEED: z.coerce.number().int().nonnegative().default(1),
    BACKOFF_STEP_MS: z.coerce.number().int().nonnegative().default(1000),
    BACKOFF_JITTER_MS: z.coerce.number().int().nonnegative().default(500),

    // Timeouts
    SOCKET_TIMEOUT_SECONDS: z.coerce.number().int().min(15).max(30).default(15),
    DIRECT_URL_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

    // Workers
    DOWNLOAD_CONCURRENCY: z.coerce.number().int().positive().default(3),
    PLAYLIST_LIMIT: z.coerce.number().int().positive().default(25),
  })
  .refine((env) => env.PACER_MIN_DELAY_MS <= env.PACER_MAX_DELAY_MS, {
    message: 'PACER_MIN_DELAY_MS must not exceed PACER_MAX_DELAY_MS',
    path: ['PACER_MIN_DELAY_MS'],
  });

export interface PipelineConfig {
  readonly logLevel: LevelWithSilent;
  readonly binaries: {
    readonly ytDlp: string;
    readonly ffmpeg: string | null;
  };
  readonly downloadsDir: string;
  readonly directLinkMode: boolean;
  readonly pacer: {
    readonly minDelayMs: number;
    readonly maxDelayMs: number;
  };
  readonly retry: {
    readonly maxAttempts: number;
    readonly backoffSeed: number;
    readonly backoffStepMs: number;
    readonly backoffJitterMs: number;
  };
  readonly socketTimeoutSeconds: number;
  readonly directUrlTimeoutMs: number;
  readonly downloadConcurrency: number;
  readonly playlistLimit: number;
}

/**
 * Parses the environment into a typed configuration. Relative paths resolve
 * against `cwd`.
 */
export const loadConfig = (
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): PipelineConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid environment configuration', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const values = parsed.data;
  return {
    logLevel: values.LOG_LEVEL,
    binaries: {
      ytDlp: values.YTDLP_PATH,
      ffmpeg: values.FFMPEG_PATH.length > 0 ? values.FFMPEG_PATH : null,
    },
    downloadsDir: path.resolve(cwd, values.DOWNLOADS_DIR),
    directLinkMode: values.DIRECT_LINK_MODE,
    pacer: {
      minDelayMs: values.PACER_MIN_DELAY_MS,
      maxDelayMs: values.PACER_MAX_DELAY_MS,
    },
    retry: {
      maxAttempts: values.RESOLVE_MAX_ATTEMPTS,
      backoffSeed: values.BACKOFF_SEED,
      backoffStepMs: values.BACKOFF_STEP_MS,
      backoffJitterMs: values.BACKOFF_JITTER_MS,
    },
    socketTimeoutSeconds: values.SOCKET_TIMEOUT_SECONDS,
    directUrlTimeoutMs: values.DIRECT_URL_TIMEOUT_MS,
    downloadConcurrency: values.DOWNLOAD_CONCURRENCY,
    playlistLimit: values.PLAYLIST_LIMIT,
  };
};

/**
 * Loads `.env` from the working directory into `process.env` before parsing.
 */
export const loadConfigFromDotenv = (cwd: string = process.cwd()): PipelineConfig => {
  dotenvConfig({ path: path.resolve(cwd, '.env') });
  return loadConfig(process.env, cwd);
};

/**
 * Source of the "direct-link mode enabled" flag. The host process owns the
 * persisted value; the orchestrator only reads it.
 */
export interface LinkModeSettings {
  isDirectLinkEnabled(): Promise<boolean>;
}

export class StaticLinkModeSettings implements LinkModeSettings {
  private enabled: boolean;

  constructor(enabled: boolean) {
    this.enabled = enabled;
  }

  setDirectLinkEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  async isDirectLinkEnabled(): Promise<boolean> {
    return this.enabled;
  }
}
