import { IngestErrorCode, JobRecord } from './api';

export interface JobProgress {
  currentStep: number;
  totalSteps: number;
  stepTitle: string;
  stepDescription: string;
  isComplete: boolean;
  hasError: boolean;
}

export type StepIndicatorStatus = 'waiting' | 'active' | 'completed' | 'error';

export interface StepIndicator {
  step: number;
  status: StepIndicatorStatus;
}

export interface IngestSessionState extends JobProgress {
  job: JobRecord | null;
  jobId: string | null;

  // Submission
  isSubmitting: boolean;
  isPolling: boolean;
  isValidUrl: boolean;
  activeJobCount: number;
  isJobLimitReached: boolean;

  // Transient UI signals
  error: string | null;
  errorCode: IngestErrorCode | null;
  showErrorSnackbar: boolean;
  canRetry: boolean;
  retryLabel: string | null;
  /** Step the job had reached when it failed. */
  failedAtStep: number | null;
}
