import dotenv from 'dotenv';
import { ConfigurationError, describeError } from '../errors';

dotenv.config();

export interface CrawlSettings {
  requestDelayMs: number;
  settleDelayMs: number;
  maxRetries: number;
  navigationTimeoutMs: number;
  headless: boolean;
  chromiumPath?: string;
  completeRowImpliesVacancy: boolean;
}

export interface Settings {
  nodeEnv: string;
  crawl: CrawlSettings;
  resultsDir: string;
  targetsFile?: string;
  targetUrlPattern: RegExp;
  ntfyServer: string;
  ntfyTopic?: string;
  redisUrl: string;
  checkCron: string;
  checkTimezone: string;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigurationError(`${key} must be a number >= ${min} (got "${raw}")`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['true', '1', 'yes'].includes(raw)) return true;
  if (['false', '0', 'no'].includes(raw)) return false;
  throw new ConfigurationError(`${key} must be true or false (got "${env[key]}")`);
}

function readPattern(env: Env, key: string, fallback: RegExp): RegExp {
  const raw = env[key];
  if (!raw) return fallback;
  try {
    return new RegExp(raw, 'g');
  } catch (error) {
    throw new ConfigurationError(`${key} is not a valid regular expression: ${describeError(error)}`);
  }
}

/**
 * Read settings from the environment (already populated from .env)
 */
export function loadSettings(env: Env = process.env): Settings {
  return {
    nodeEnv: env.NODE_ENV || 'development',
    crawl: {
      requestDelayMs: readNumber(env, 'REQUEST_DELAY_SECONDS', 2) * 1000,
      settleDelayMs: readNumber(env, 'SETTLE_DELAY_SECONDS', 2) * 1000,
      maxRetries: readNumber(env, 'MAX_RETRIES', 5, 1),
      navigationTimeoutMs: readNumber(env, 'NAVIGATION_TIMEOUT_MS', 30000, 1),
      headless: readBoolean(env, 'HEADLESS', true),
      chromiumPath: env.CHROMIUM_PATH || undefined,
      completeRowImpliesVacancy: readBoolean(env, 'COMPLETE_ROW_IMPLIES_VACANCY', true),
    },
    resultsDir: env.RESULTS_DIR || 'results',
    targetsFile: env.TARGETS_FILE || undefined,
    targetUrlPattern: readPattern(env, 'TARGET_URL_PATTERN', /https?:\/\/www\.ur-net\.go\.jp\/[^\s,"]+/g),
    ntfyServer: env.NTFY_SERVER || 'https://ntfy.sh',
    ntfyTopic: env.NTFY_TOPIC || undefined,
    redisUrl: env.REDIS_URL || 'redis://localhost:6379',
    checkCron: env.CHECK_CRON || '0 */2 * * *',
    checkTimezone: env.CHECK_TZ || 'Asia/Tokyo',
  };
}
