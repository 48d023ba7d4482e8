import { ApiClient, FetchLike, TokenProvider } from './api';
import { loadConfig, ReciplanConfig } from './config';
import { HttpIngestGateway } from './ingest-api';
import { IngestTracker } from './ingest-tracker';
import { HttpLikeGateway } from './like-api';
import { LikeCoordinator } from './like-coordinator';
import { setLogLevel } from './logger';

export interface ReciplanClientOptions {
  config?: ReciplanConfig;
  getToken?: TokenProvider;
  fetch?: FetchLike;
}

export interface ReciplanClient {
  readonly config: ReciplanConfig;
  readonly api: ApiClient;
  readonly ingestGateway: HttpIngestGateway;
  readonly likeGateway: HttpLikeGateway;
  /** Shared by every screen that shows recipes. */
  readonly likes: LikeCoordinator;
  /** One tracker per ingest screen; the caller owns and cancels it. */
  createIngestTracker(): IngestTracker;
}

export function createReciplanClient(options: ReciplanClientOptions = {}): ReciplanClient {
  const config = options.config ?? loadConfig();
  setLogLevel(config.logLevel);

  const api = new ApiClient({
    baseUrl: config.apiUrl,
    getToken: options.getToken,
    fetch: options.fetch,
  });
  const ingestGateway = new HttpIngestGateway(api);
  const likeGateway = new HttpLikeGateway(api, {
    maxAttempts: config.likes.maxAttempts,
    retryBaseDelayMs: config.likes.retryBaseDelayMs,
  });

  return {
    config,
    api,
    ingestGateway,
    likeGateway,
    likes: new LikeCoordinator({ gateway: likeGateway, debounceMs: config.likes.debounceMs }),
    createIngestTracker: () =>
      new IngestTracker({
        gateway: ingestGateway,
        pollIntervalMs: config.ingest.pollIntervalMs,
        backoffIntervalMs: config.ingest.backoffIntervalMs,
        backoffThreshold: config.ingest.backoffThreshold,
        maxConsecutivePollFailures: config.ingest.maxConsecutivePollFailures,
        maxActiveJobs: config.ingest.maxActiveJobs,
      }),
  };
}
