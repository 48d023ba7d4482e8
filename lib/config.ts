import { z } from 'zod';
import { LOG_LEVELS, LogLevel } from './logger';

export const INGEST_DEFAULTS = {
  pollIntervalMs: 4000,
  backoffIntervalMs: 8000,
  backoffThreshold: 30,
  maxConsecutivePollFailures: 5,
  maxActiveJobs: 3,
} as const;

export const LIKE_DEFAULTS = {
  debounceMs: 500,
  maxAttempts: 3,
  retryBaseDelayMs: 1000,
} as const;

export const DEFAULT_API_URL = 'http://localhost:5050';

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  RECIPLAN_API_URL: z.string().url().default(DEFAULT_API_URL),
  RECIPLAN_POLL_INTERVAL_MS: positiveInt.default(INGEST_DEFAULTS.pollIntervalMs),
  RECIPLAN_POLL_BACKOFF_INTERVAL_MS: positiveInt.default(INGEST_DEFAULTS.backoffIntervalMs),
  RECIPLAN_POLL_BACKOFF_THRESHOLD: positiveInt.default(INGEST_DEFAULTS.backoffThreshold),
  RECIPLAN_MAX_POLL_FAILURES: positiveInt.default(INGEST_DEFAULTS.maxConsecutivePollFailures),
  RECIPLAN_MAX_ACTIVE_JOBS: positiveInt.default(INGEST_DEFAULTS.maxActiveJobs),
  RECIPLAN_LIKE_DEBOUNCE_MS: positiveInt.default(LIKE_DEFAULTS.debounceMs),
  RECIPLAN_LIKE_MAX_ATTEMPTS: positiveInt.default(LIKE_DEFAULTS.maxAttempts),
  RECIPLAN_LIKE_RETRY_BASE_MS: positiveInt.default(LIKE_DEFAULTS.retryBaseDelayMs),
  RECIPLAN_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  NODE_ENV: z.string().optional(),
});

export interface ReciplanConfig {
  readonly apiUrl: string;
  readonly logLevel: LogLevel;
  readonly ingest: {
    readonly pollIntervalMs: number;
    readonly backoffIntervalMs: number;
    readonly backoffThreshold: number;
    readonly maxConsecutivePollFailures: number;
    readonly maxActiveJobs: number;
  };
  readonly likes: {
    readonly debounceMs: number;
    readonly maxAttempts: number;
    readonly retryBaseDelayMs: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReciplanConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const keys = result.error.issues.map(issue => issue.path.join('.')).join(', ');
    throw new Error(`Invalid configuration: ${keys}`);
  }

  const parsed = result.data;
  return {
    apiUrl: parsed.RECIPLAN_API_URL.replace(/\/+$/, ''),
    logLevel: parsed.RECIPLAN_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'warn' : 'info'),
    ingest: {
      pollIntervalMs: parsed.RECIPLAN_POLL_INTERVAL_MS,
      backoffIntervalMs: parsed.RECIPLAN_POLL_BACKOFF_INTERVAL_MS,
      backoffThreshold: parsed.RECIPLAN_POLL_BACKOFF_THRESHOLD,
      maxConsecutivePollFailures: parsed.RECIPLAN_MAX_POLL_FAILURES,
      maxActiveJobs: parsed.RECIPLAN_MAX_ACTIVE_JOBS,
    },
    likes: {
      debounceMs: parsed.RECIPLAN_LIKE_DEBOUNCE_MS,
      maxAttempts: parsed.RECIPLAN_LIKE_MAX_ATTEMPTS,
      retryBaseDelayMs: parsed.RECIPLAN_LIKE_RETRY_BASE_MS,
    },
  };
}
