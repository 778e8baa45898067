import dotenv from 'dotenv';

dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AppConfig {
  env: string;
  photoApi: {
    endpoint: string;
    timeoutMs: number;
    /** Longest edge a photo keeps once decoded. */
    decodeMaxDimension: number;
  };
  cache: {
    enabled: boolean;
    size: number;
    retryDelayMs: number;
    fullPollMs: number;
  };
  scheduler: {
    intervalMs: number;
  };
  display: {
    host: string;
    port: number;
    width: number;
    height: number;
  };
  overlay: {
    fontFamily: string;
  };
  logging: {
    level: LogLevel;
  };
}

type Env = Record<string, string | undefined>;

const DEFAULT_ENDPOINT = 'https://keatondalquist.com/api/random-photo-info';
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const intFrom = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const intAtLeast = (value: string | undefined, fallback: number, min: number): number =>
  Math.max(min, intFrom(value, fallback));

const boolFrom = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
};

const logLevelFrom = (value: string | undefined): LogLevel => {
  const level = LOG_LEVELS.find((l) => l === value?.trim().toLowerCase());
  return level ?? 'info';
};

/**
 * Build the app config from an environment map
 */
export function loadConfig(env: Env): AppConfig {
  const cacheEnabled = boolFrom(env.PHOTO_CACHE_ENABLED, true);

  return {
    env: env.NODE_ENV || 'development',

    photoApi: {
      endpoint: env.PHOTO_API_ENDPOINT || DEFAULT_ENDPOINT,
      timeoutMs: intAtLeast(env.REQUEST_TIMEOUT_MS, 10000, 1000),
      decodeMaxDimension: intAtLeast(env.DECODE_MAX_DIMENSION, 1920, 64),
    },

    cache: {
      enabled: cacheEnabled,
      size: intAtLeast(env.PHOTO_CACHE_SIZE, 15, 1),
      retryDelayMs: intAtLeast(env.CACHE_RETRY_DELAY_MS, 5000, 1000),
      fullPollMs: intAtLeast(env.CACHE_FULL_POLL_MS, 30000, 1000),
    },

    scheduler: {
      // 1 minute with the cache, 3 minutes fetching directly
      intervalMs: intAtLeast(env.UPDATE_INTERVAL_MS, cacheEnabled ? 60000 : 180000, 1000),
    },

    display: {
      host: env.DISPLAY_HOST || '0.0.0.0',
      port: intFrom(env.DISPLAY_PORT, 8080),
      width: intFrom(env.DISPLAY_WIDTH, 800),
      height: intFrom(env.DISPLAY_HEIGHT, 600),
    },

    overlay: {
      fontFamily: env.OVERLAY_FONT_FAMILY || 'DejaVu Sans, sans-serif',
    },

    logging: {
      level: logLevelFrom(env.LOG_LEVEL),
    },
  };
}

export const config = loadConfig(process.env);
