import { IngestErrorCode } from '../types/api';

interface PolicyText {
  message: string;
  /** Under 30 characters, for chips and snackbars. */
  shortSummary: string;
}

export type ErrorPolicy =
  | (PolicyText & { recoverable: true; retryLabel: string })
  | (PolicyText & { recoverable: false; retryLabel?: undefined });

const ERROR_POLICIES: Record<IngestErrorCode, ErrorPolicy> = {
  VIDEO_UNAVAILABLE: {
    message: 'This TikTok video is no longer available. It may have been deleted or made private.',
    shortSummary: 'Video unavailable',
    recoverable: false,
  },
  ASR_FAILED: {
    message: "We couldn't transcribe the audio from this video. It might be too quiet or too noisy.",
    shortSummary: 'Audio processing failed',
    recoverable: true,
    retryLabel: 'Retry Audio Processing',
  },
  OCR_FAILED: {
    message: "We couldn't read the text on screen. The video quality might be too low or the text too small.",
    shortSummary: 'Text reading failed',
    recoverable: true,
    retryLabel: 'Retry Text Reading',
  },
  LLM_FAILED: {
    message: "Our AI couldn't turn this video into a recipe. The content may be unclear.",
    shortSummary: 'AI processing failed',
    recoverable: true,
    retryLabel: 'Retry AI Processing',
  },
  PERSIST_FAILED: {
    message: "We couldn't save your recipe. Please try again in a moment.",
    shortSummary: 'Save failed',
    recoverable: true,
    retryLabel: 'Retry Save',
  },
  UNKNOWN_ERROR: {
    message: 'Something went wrong while processing your video. Please try again.',
    shortSummary: 'Processing failed',
    recoverable: true,
    retryLabel: 'Try Again',
  },
};

export function getErrorPolicy(code: IngestErrorCode): ErrorPolicy {
  return ERROR_POLICIES[code];
}

export function getErrorMessage(code: IngestErrorCode): string {
  return ERROR_POLICIES[code].message;
}

export function getErrorSummary(code: IngestErrorCode): string {
  return ERROR_POLICIES[code].shortSummary;
}

export function isRecoverable(code: IngestErrorCode): boolean {
  return ERROR_POLICIES[code].recoverable;
}

export function getRetryLabel(code: IngestErrorCode): string | null {
  return ERROR_POLICIES[code].retryLabel ?? null;
}
