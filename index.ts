export * from './types/api';
export * from './types/gateways';
export * from './types/ingest';
export * from './types/like';
export * from './types/observable';

export { ApiClient, parseRetryAfter } from './lib/api';
export type { ApiClientOptions, FetchLike, ResponseSchema, TokenProvider } from './lib/api';
export { DEFAULT_API_URL, INGEST_DEFAULTS, LIKE_DEFAULTS, loadConfig } from './lib/config';
export type { ReciplanConfig } from './lib/config';
export {
  getErrorMessage,
  getErrorPolicy,
  getErrorSummary,
  getRetryLabel,
  isRecoverable,
} from './lib/error-policy';
export type { ErrorPolicy } from './lib/error-policy';
export { ApiError, errorMessage, isAbortError, isApiError, isNotFoundError } from './lib/errors';
export { formatLikesCount } from './lib/format';
export { HttpIngestGateway } from './lib/ingest-api';
export {
  IngestTracker,
  INVALID_URL_MESSAGE,
  JOB_NOT_FOUND_MESSAGE,
  jobLimitMessage,
  LOST_CONNECTION_MESSAGE,
} from './lib/ingest-tracker';
export type { IngestTrackerOptions } from './lib/ingest-tracker';
export {
  getJobStep,
  getStepIndicators,
  IDLE_PROGRESS,
  isErrorStatus,
  isTerminalStatus,
  mapJobStatus,
  MILESTONE_STEPS,
  progressFraction,
  TOTAL_STEPS,
} from './lib/job-status';
export type { JobStep } from './lib/job-status';
export { KeyedScheduler } from './lib/keyed-scheduler';
export { HttpLikeGateway } from './lib/like-api';
export type { HttpLikeGatewayOptions } from './lib/like-api';
export {
  DEFAULT_LIKE_STATE,
  LIKE_FAILED_MESSAGE,
  LikeCoordinator,
  LikeSession,
} from './lib/like-coordinator';
export type { LikeCoordinatorOptions } from './lib/like-coordinator';
export { createLogger, getLogLevel, LOG_LEVELS, setLogLevel } from './lib/logger';
export type { Logger, LogLevel } from './lib/logger';
export { isRetryableError, withRetry } from './lib/retry';
export type { RetryOptions } from './lib/retry';
export { TikTokService } from './lib/tiktok';
export { createReciplanClient } from './lib/client';
export type { ReciplanClient, ReciplanClientOptions } from './lib/client';
