export const DEFAULT_REDIS_URL = 'redis://localhost:6379';
export const DEFAULT_FETCH_CRON = '0 */6 * * *';
export const DEFAULT_FETCH_KEYWORDS = ['support'];

type Env = Record<string, string | undefined>;

export interface FetchSettings {
  keywords: string[];
  pages: number;
  perPage: number;
  cron: string;
  bootstrapNow: boolean;
}

export interface WorkerConfig {
  databaseUrl: string;
  redisUrl: string;
  fetch: FetchSettings;
  findsgjobs: {
    timeoutMs: number;
    maxRetries: number;
  };
}

export function readRequiredEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`${name} environment variable is required`);
  }

  return value;
}

export function readIntEnv(env: Env, name: string, fallback: number, min = 1): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < min) {
    return fallback;
  }

  return Math.floor(parsed);
}

export function readBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }

  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  return fallback;
}

/**
 * Comma-separated list, trimmed, blanks and repeats dropped.
 */
export function readListEnv(env: Env, name: string, fallback: readonly string[]): string[] {
  const values = (env[name] ?? '')
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  return values.length > 0 ? [...new Set(values)] : [...fallback];
}

export function loadWorkerConfig(env: Env = process.env): WorkerConfig {
  return {
    databaseUrl: readRequiredEnv(env, 'DATABASE_URL'),
    redisUrl: env.REDIS_URL?.trim() || DEFAULT_REDIS_URL,
    fetch: {
      keywords: readListEnv(env, 'FETCH_KEYWORDS', DEFAULT_FETCH_KEYWORDS),
      pages: readIntEnv(env, 'FETCH_PAGES', 3),
      perPage: readIntEnv(env, 'FETCH_PER_PAGE', 50),
      cron: env.FETCH_CRON?.trim() || DEFAULT_FETCH_CRON,
      bootstrapNow: readBoolEnv(env, 'FETCH_BOOTSTRAP_NOW', false),
    },
    findsgjobs: {
      timeoutMs: readIntEnv(env, 'FINDSGJOBS_TIMEOUT_MS', 30_000),
      maxRetries: readIntEnv(env, 'FINDSGJOBS_MAX_RETRIES', 2, 0),
    },
  };
}
