import { JobRecord, LikeResult, RequestOptions, StartIngestResult } from './api';

/**
 * Ingest backend. Implementations throw on transport failure; an `ApiError`
 * with status 404 from `fetchJob` means the job no longer exists.
 */
export interface IngestGateway {
  submitJob(url: string, options?: RequestOptions): Promise<StartIngestResult>;
  fetchJob(jobId: string, options?: RequestOptions): Promise<JobRecord>;
  listActiveJobs(options?: RequestOptions): Promise<JobRecord[]>;
}

export interface LikeGateway {
  /** Sets the like state to `liked` and returns the server's resulting state. */
  toggleLike(recipeId: string, liked: boolean, options?: RequestOptions): Promise<LikeResult>;
  getLikeStatus(recipeId: string, options?: RequestOptions): Promise<LikeResult>;
}
