import { createStore, StoreApi } from 'zustand/vanilla';
import { JobRecord, StartIngestResult } from '../types/api';
import { IngestGateway } from '../types/gateways';
import { IngestSessionState, StepIndicator } from '../types/ingest';
import { Listener, Observable } from '../types/observable';
import { INGEST_DEFAULTS } from './config';
import { getErrorPolicy, isRecoverable } from './error-policy';
import { errorMessage, isNotFoundError } from './errors';
import {
  getStepIndicators,
  IDLE_PROGRESS,
  isTerminalStatus,
  mapJobStatus,
} from './job-status';
import { createLogger, Logger } from './logger';
import { TikTokService } from './tiktok';

export interface IngestTrackerOptions {
  gateway: IngestGateway;
  pollIntervalMs?: number;
  /** Interval used once `backoffThreshold` polls have been made. */
  backoffIntervalMs?: number;
  backoffThreshold?: number;
  maxConsecutivePollFailures?: number;
  maxActiveJobs?: number;
  logger?: Logger;
}

export const INVALID_URL_MESSAGE = 'Please enter a valid TikTok URL';
export const LOST_CONNECTION_MESSAGE =
  'Lost connection to the job. Please check your network and try again.';
export const JOB_NOT_FOUND_MESSAGE = 'This job no longer exists';

export function jobLimitMessage(maxActiveJobs: number): string {
  return `You can only process ${maxActiveJobs} videos at a time. Please wait for one to finish.`;
}

export function initialSessionState(): IngestSessionState {
  return {
    ...IDLE_PROGRESS,
    job: null,
    jobId: null,
    isSubmitting: false,
    isPolling: false,
    isValidUrl: false,
    activeJobCount: 0,
    isJobLimitReached: false,
    error: null,
    errorCode: null,
    showErrorSnackbar: false,
    canRetry: false,
    retryLabel: null,
    failedAtStep: null,
  };
}

const CLEARED_ERROR = {
  error: null,
  errorCode: null,
  showErrorSnackbar: false,
  canRetry: false,
  retryLabel: null,
  failedAtStep: null,
} satisfies Partial<IngestSessionState>;

/**
 * Drives one TikTok ingest job from submission to COMPLETED or FAILED.
 *
 * Every network result is tagged with the generation it was started under.
 * `clearCurrentJob`, `cancelSession` and a new submission bump the
 * generation, so late responses from earlier work are dropped instead of
 * applied. Public methods never throw; outcomes are published as state.
 */
export class IngestTracker implements Observable<IngestSessionState> {
  private readonly store: StoreApi<IngestSessionState>;
  private readonly gateway: IngestGateway;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly backoffIntervalMs: number;
  private readonly backoffThreshold: number;
  private readonly maxConsecutivePollFailures: number;
  private readonly maxActiveJobs: number;

  private generation = 0;
  private controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pollCount = 0;
  private consecutiveFailures = 0;
  private activeJobCountLoaded = false;
  private disposed = false;

  constructor(options: IngestTrackerOptions) {
    this.gateway = options.gateway;
    this.logger = options.logger ?? createLogger('IngestTracker');
    this.pollIntervalMs = options.pollIntervalMs ?? INGEST_DEFAULTS.pollIntervalMs;
    this.backoffIntervalMs = options.backoffIntervalMs ?? INGEST_DEFAULTS.backoffIntervalMs;
    this.backoffThreshold = options.backoffThreshold ?? INGEST_DEFAULTS.backoffThreshold;
    this.maxConsecutivePollFailures =
      options.maxConsecutivePollFailures ?? INGEST_DEFAULTS.maxConsecutivePollFailures;
    this.maxActiveJobs = options.maxActiveJobs ?? INGEST_DEFAULTS.maxActiveJobs;
    this.store = createStore<IngestSessionState>()(() => initialSessionState());
  }

  getState(): IngestSessionState {
    return this.store.getState();
  }

  subscribe(listener: Listener<IngestSessionState>): () => void {
    return this.store.subscribe(listener);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  getStepIndicators(): StepIndicator[] {
    const state = this.getState();
    return getStepIndicators(state, state.failedAtStep ?? 0);
  }

  validateUrl(candidate: string): boolean {
    const isValidUrl = TikTokService.validateTikTokUrl(candidate);
    if (!this.disposed) {
      this.store.setState({ isValidUrl });
    }
    return isValidUrl;
  }

  async submit(url: string): Promise<void> {
    if (this.disposed || this.getState().isSubmitting) return;

    const candidate = url.trim();
    if (!this.validateUrl(candidate)) {
      this.store.setState({ ...CLEARED_ERROR, error: INVALID_URL_MESSAGE });
      return;
    }
    if (!this.activeJobCountLoaded) {
      await this.refreshActiveJobCount();
      if (this.disposed || this.getState().isSubmitting) return;
    }
    if (this.getState().activeJobCount >= this.maxActiveJobs) {
      this.logger.warn('Job limit reached, not submitting');
      this.store.setState({
        ...CLEARED_ERROR,
        isJobLimitReached: true,
        error: jobLimitMessage(this.maxActiveJobs),
      });
      return;
    }

    const generation = this.restart(true);
    const { signal } = this.controller;
    this.store.setState({
      ...IDLE_PROGRESS,
      ...CLEARED_ERROR,
      job: null,
      jobId: null,
      isSubmitting: true,
      isPolling: false,
    });
    this.logger.info(
      '🚀 Submitting',
      TikTokService.isShortLink(candidate)
        ? 'short link'
        : `video ${TikTokService.extractVideoId(candidate) ?? candidate}`
    );

    let result: StartIngestResult;
    try {
      result = await this.gateway.submitJob(candidate, { signal });
    } catch (error) {
      if (generation !== this.generation) return;
      this.logger.error('❌ Submission failed:', errorMessage(error));
      this.store.setState({
        isSubmitting: false,
        error: errorMessage(error, 'Failed to start processing'),
      });
      return;
    }
    if (generation !== this.generation) return;

    this.logger.info('✅ Job created:', result.jobId);
    this.store.setState({ isSubmitting: false, jobId: result.jobId });
    const terminal = this.applyRecord({
      jobId: result.jobId,
      recipeId: result.recipeId,
      status: result.status,
      errorCode: result.status === 'FAILED' ? 'UNKNOWN_ERROR' : undefined,
      ingredientCandidates: [],
      parseErrors: [],
    });

    const firstPoll = terminal ? Promise.resolve() : this.startPolling(result.jobId, generation);
    await Promise.all([firstPoll, this.refreshActiveJobCount()]);
  }

  /**
   * Re-runs a FAILED job under the same id. Returns false, and changes
   * nothing, when the job is not FAILED or its error is not recoverable.
   */
  async retry(): Promise<boolean> {
    const state = this.getState();
    const { job, errorCode } = state;
    if (this.disposed || !job || job.status !== 'FAILED' || !errorCode || !isRecoverable(errorCode)) {
      this.logger.warn('Retry not permitted for', job?.jobId ?? 'empty session', errorCode ?? '');
      return false;
    }

    const generation = this.restart(true);
    const requeued: JobRecord = { ...job, status: 'QUEUED', errorCode: undefined };
    this.logger.info('🔄 Retrying job', job.jobId, 'after', errorCode);
    this.store.setState({ ...mapJobStatus('QUEUED'), ...CLEARED_ERROR, job: requeued });
    await this.startPolling(job.jobId, generation);
    return true;
  }

  dismissErrorSnackbar(): void {
    if (this.disposed) return;
    this.store.setState({ showErrorSnackbar: false });
  }

  /**
   * Counts the user's non-terminal jobs. A failed check lets the user
   * proceed; the server still enforces the limit.
   */
  async refreshActiveJobCount(): Promise<void> {
    if (this.disposed) return;
    try {
      const jobs = await this.gateway.listActiveJobs();
      if (this.disposed) return;
      const activeJobCount = jobs.filter(job => !isTerminalStatus(job.status)).length;
      this.logger.debug('Active jobs:', activeJobCount);
      this.activeJobCountLoaded = true;
      this.store.setState({
        activeJobCount,
        isJobLimitReached: activeJobCount >= this.maxActiveJobs,
      });
    } catch (error) {
      if (this.disposed) return;
      this.logger.warn('Could not check active jobs:', errorMessage(error));
      this.store.setState({ activeJobCount: 0, isJobLimitReached: false });
    }
  }

  /**
   * Resets the session for a fresh submission. Requests already sent are
   * left to finish; their results are ignored.
   */
  clearCurrentJob(): void {
    if (this.disposed) return;
    this.restart(false);
    const { activeJobCount, isJobLimitReached } = this.getState();
    this.store.setState({ ...initialSessionState(), activeJobCount, isJobLimitReached });
  }

  /** Stops all work for good. No state changes are published afterwards. */
  cancelSession(): void {
    if (this.disposed) return;
    this.restart(true);
    this.disposed = true;
    this.store.setState({ isSubmitting: false, isPolling: false });
    this.logger.debug('Session cancelled');
  }

  private restart(abortInFlight: boolean): number {
    this.generation += 1;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (abortInFlight) {
      this.controller.abort();
    }
    this.controller = new AbortController();
    return this.generation;
  }

  private startPolling(jobId: string, generation: number): Promise<void> {
    this.pollCount = 0;
    this.consecutiveFailures = 0;
    this.store.setState({ isPolling: true });
    return this.poll(jobId, generation);
  }

  private scheduleNextPoll(jobId: string, generation: number): void {
    const delayMs =
      this.pollCount >= this.backoffThreshold ? this.backoffIntervalMs : this.pollIntervalMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.poll(jobId, generation);
    }, delayMs);
  }

  private async poll(jobId: string, generation: number): Promise<void> {
    if (generation !== this.generation) return;
    this.pollCount += 1;

    let record: JobRecord;
    try {
      record = await this.gateway.fetchJob(jobId, { signal: this.controller.signal });
    } catch (error) {
      if (generation !== this.generation) return;
      this.handlePollFailure(jobId, generation, error);
      return;
    }

    if (generation !== this.generation) {
      this.logger.debug('Dropping stale poll response for', jobId);
      return;
    }
    this.consecutiveFailures = 0;
    this.logger.debug('📊 Job', jobId, 'status:', record.status);

    if (!this.applyRecord(record)) {
      this.scheduleNextPoll(jobId, generation);
    }
  }

  private handlePollFailure(jobId: string, generation: number, error: unknown): void {
    if (isNotFoundError(error)) {
      this.logger.error('❌ Job', jobId, 'not found, stopping');
      this.store.setState({ isPolling: false, error: JOB_NOT_FOUND_MESSAGE });
      return;
    }

    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= this.maxConsecutivePollFailures) {
      this.logger.error(
        '🔥 Lost connection to job',
        jobId,
        `after ${this.consecutiveFailures} failed polls:`,
        errorMessage(error)
      );
      this.store.setState({ isPolling: false, error: LOST_CONNECTION_MESSAGE });
      return;
    }

    this.logger.warn(
      `Poll failed (${this.consecutiveFailures}/${this.maxConsecutivePollFailures}):`,
      errorMessage(error)
    );
    this.scheduleNextPoll(jobId, generation);
  }

  /**
   * Publishes a snapshot and returns whether polling should stop. Older
   * snapshots of the same job that would move progress backwards are
   * skipped; FAILED is always applied.
   */
  private applyRecord(incoming: JobRecord): boolean {
    const state = this.getState();
    const previous = state.job?.jobId === incoming.jobId ? state.job : null;
    const progress = mapJobStatus(incoming.status);

    if (previous && incoming.status !== 'FAILED' && progress.currentStep < state.currentStep) {
      this.logger.debug('Skipping out-of-order', incoming.status, 'for', incoming.jobId);
      return false;
    }

    // A recipe id, once known, is kept
    const record =
      previous?.recipeId && !incoming.recipeId
        ? { ...incoming, recipeId: previous.recipeId }
        : incoming;

    if (record.status === 'FAILED') {
      const errorCode = record.errorCode ?? 'UNKNOWN_ERROR';
      const policy = getErrorPolicy(errorCode);
      this.logger.warn('Job', record.jobId, 'failed:', errorCode);
      this.store.setState({
        ...progress,
        job: record,
        jobId: record.jobId,
        isPolling: false,
        error: policy.message,
        errorCode,
        showErrorSnackbar: true,
        canRetry: policy.recoverable,
        retryLabel: policy.retryLabel ?? null,
        failedAtStep: state.currentStep,
      });
      return true;
    }

    const terminal = isTerminalStatus(record.status);
    if (terminal) {
      this.logger.info('🎉 Job', record.jobId, 'completed');
    }
    this.store.setState({
      ...progress,
      job: record,
      jobId: record.jobId,
      isPolling: terminal ? false : state.isPolling,
    });
    return terminal;
  }
}
