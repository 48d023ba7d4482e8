export const INGEST_STATUSES = [
  'QUEUED',
  'DOWNLOADING',
  'EXTRACTING',
  'TRANSCRIBING',
  'DRAFT_TRANSCRIBED',
  'OCRING',
  'OCR_DONE',
  'LLM_REFINING',
  'DRAFT_PARSED',
  'DRAFT_PARSED_WITH_ERRORS',
  'COMPLETED',
  'FAILED',
] as const;

export type IngestStatus = (typeof INGEST_STATUSES)[number];

export const INGEST_ERROR_CODES = [
  'UNKNOWN_ERROR',
  'VIDEO_UNAVAILABLE',
  'ASR_FAILED',
  'OCR_FAILED',
  'LLM_FAILED',
  'PERSIST_FAILED',
] as const;

export type IngestErrorCode = (typeof INGEST_ERROR_CODES)[number];

// Wire format of GET /ingest/jobs/{id}
export interface IngestJobDto {
  job_id?: string | null;
  recipe_id?: string | null;
  status: IngestStatus;
  title?: string | null;
  transcript?: string | null;
  error_code?: IngestErrorCode | null;
  recipe_json?: unknown;
  onscreen_text?: string | null;
  ingredient_candidates?: string[] | null;
  parse_errors?: string[] | null;
  llm_error_message?: string | null;
}

export interface StartIngestDto {
  job_id: string;
  recipe_id?: string | null;
  status: IngestStatus;
  message?: string | null;
}

export interface LikeDto {
  success?: boolean;
  liked: boolean;
  likes_count: number;
  recipe_id?: string | null;
}

/**
 * Immutable snapshot of one ingest job. `errorCode` is set exactly when
 * `status` is FAILED.
 */
export interface JobRecord {
  readonly jobId: string;
  readonly recipeId?: string;
  readonly status: IngestStatus;
  readonly title?: string;
  readonly transcript?: string;
  readonly errorCode?: IngestErrorCode;
  readonly recipeJson?: unknown;
  readonly onscreenText?: string;
  readonly ingredientCandidates: readonly string[];
  readonly parseErrors: readonly string[];
  readonly llmErrorMessage?: string;
}

export interface StartIngestResult {
  jobId: string;
  recipeId?: string;
  status: IngestStatus;
  message?: string;
}

export interface LikeResult {
  liked: boolean;
  likesCount: number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}
