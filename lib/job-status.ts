import { IngestStatus } from '../types/api';
import { JobProgress, StepIndicator } from '../types/ingest';

export const TOTAL_STEPS = 10;

// Steps shown by the progress stepper
export const MILESTONE_STEPS = [1, 3, 5, 7, 10] as const;

export interface JobStep {
  stepIndex: number;
  title: string;
  description: string;
}

const JOB_STEPS: Record<IngestStatus, JobStep> = {
  QUEUED: {
    stepIndex: 1,
    title: 'Queued',
    description: 'Your recipe is in the processing queue',
  },
  DOWNLOADING: {
    stepIndex: 2,
    title: 'Downloading',
    description: 'Downloading video from TikTok',
  },
  EXTRACTING: {
    stepIndex: 3,
    title: 'Extracting',
    description: 'Extracting audio and frames from the video',
  },
  TRANSCRIBING: {
    stepIndex: 4,
    title: 'Transcribing',
    description: 'Converting speech to text',
  },
  DRAFT_TRANSCRIBED: {
    stepIndex: 5,
    title: 'Transcription Complete',
    description: 'The audio has been transcribed',
  },
  OCRING: {
    stepIndex: 6,
    title: 'Reading Text',
    description: 'Reading the text shown on screen',
  },
  OCR_DONE: {
    stepIndex: 7,
    title: 'Text Extraction Complete',
    description: 'On-screen text has been captured',
  },
  LLM_REFINING: {
    stepIndex: 8,
    title: 'AI Processing',
    description: 'Creating your recipe with AI',
  },
  DRAFT_PARSED: {
    stepIndex: 9,
    title: 'Recipe Generated',
    description: 'Your recipe draft is ready for a final check',
  },
  DRAFT_PARSED_WITH_ERRORS: {
    stepIndex: 9,
    title: 'Recipe Generated (with warnings)',
    description: 'Recipe created but may need review',
  },
  COMPLETED: {
    stepIndex: 10,
    title: 'Complete',
    description: 'Your recipe is ready to view!',
  },
  FAILED: {
    stepIndex: 0,
    title: 'Failed',
    description: 'Something went wrong processing your video',
  },
};

export const IDLE_PROGRESS: Readonly<JobProgress> = {
  currentStep: 0,
  totalSteps: TOTAL_STEPS,
  stepTitle: 'Not started',
  stepDescription: 'Paste a TikTok link to get started',
  isComplete: false,
  hasError: false,
};

export function getJobStep(status: IngestStatus): JobStep {
  return JOB_STEPS[status];
}

export function isTerminalStatus(status: IngestStatus): boolean {
  return status === 'COMPLETED' || status === 'FAILED';
}

export function isErrorStatus(status: IngestStatus): boolean {
  return status === 'FAILED';
}

export function mapJobStatus(status: IngestStatus): JobProgress {
  const step = JOB_STEPS[status];
  return {
    currentStep: step.stepIndex,
    totalSteps: TOTAL_STEPS,
    stepTitle: step.title,
    stepDescription: step.description,
    isComplete: status === 'COMPLETED',
    hasError: isErrorStatus(status),
  };
}

export function progressFraction(progress: JobProgress): number {
  if (progress.totalSteps <= 0) return 0;
  return Math.min(1, Math.max(0, progress.currentStep / progress.totalSteps));
}

/**
 * Milestone view of the progress. A FAILED job reports step 0, so the step
 * it failed at is passed separately: milestones before it stay completed and
 * the first one at or after it is flagged.
 */
export function getStepIndicators(progress: JobProgress, failedAtStep = 0): StepIndicator[] {
  const failedMilestone = MILESTONE_STEPS.find(step => step >= failedAtStep) ?? TOTAL_STEPS;

  return MILESTONE_STEPS.map((step): StepIndicator => {
    if (progress.hasError) {
      if (step < failedMilestone) return { step, status: 'completed' };
      return { step, status: step === failedMilestone ? 'error' : 'waiting' };
    }
    if (progress.isComplete || progress.currentStep > step) {
      return { step, status: 'completed' };
    }
    if (progress.currentStep === step) {
      return { step, status: 'active' };
    }
    return { step, status: 'waiting' };
  });
}
