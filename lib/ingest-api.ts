import { z } from 'zod';
import {
  INGEST_ERROR_CODES,
  INGEST_STATUSES,
  IngestJobDto,
  JobRecord,
  RequestOptions,
  StartIngestDto,
  StartIngestResult,
} from '../types/api';
import { IngestGateway } from '../types/gateways';
import { ApiClient, ResponseSchema } from './api';
import { StatusMessages, withFriendlyMessage } from './errors';
import { createLogger, Logger } from './logger';

const ingestStatusSchema = z.enum(INGEST_STATUSES);

export const ingestJobSchema: ResponseSchema<IngestJobDto> = z.object({
  job_id: z.string().nullish(),
  recipe_id: z.string().nullish(),
  status: ingestStatusSchema,
  title: z.string().nullish(),
  transcript: z.string().nullish(),
  // Codes this client does not know yet are reported as UNKNOWN_ERROR
  error_code: z.enum(INGEST_ERROR_CODES).nullish().catch('UNKNOWN_ERROR'),
  recipe_json: z.unknown().optional(),
  onscreen_text: z.string().nullish(),
  ingredient_candidates: z.array(z.string()).nullish(),
  parse_errors: z.array(z.string()).nullish(),
  llm_error_message: z.string().nullish(),
});

export const startIngestSchema: ResponseSchema<StartIngestDto> = z.object({
  job_id: z.string().min(1),
  recipe_id: z.string().nullish(),
  status: ingestStatusSchema,
  message: z.string().nullish(),
});

const activeJobsSchema = z.array(ingestJobSchema);

const INGEST_ERROR_MESSAGES: StatusMessages = {
  400: 'Invalid TikTok URL provided',
  401: 'Your session has expired. Please log in again',
  403: "You don't have permission to do that",
  404: 'Ingest job not found',
  409: 'A job for this URL already exists',
  422: 'Please check your TikTok URL',
  429: 'Too many requests. Please try again later',
};

/**
 * Maps the wire DTO to a JobRecord. An error code is kept only on FAILED
 * records, and a FAILED record without one gets UNKNOWN_ERROR.
 */
export function toJobRecord(dto: IngestJobDto, jobId: string): JobRecord {
  return {
    jobId,
    recipeId: dto.recipe_id ?? undefined,
    status: dto.status,
    title: dto.title ?? undefined,
    transcript: dto.transcript ?? undefined,
    errorCode: dto.status === 'FAILED' ? dto.error_code ?? 'UNKNOWN_ERROR' : undefined,
    recipeJson: dto.recipe_json ?? undefined,
    onscreenText: dto.onscreen_text ?? undefined,
    ingredientCandidates: dto.ingredient_candidates ?? [],
    parseErrors: dto.parse_errors ?? [],
    llmErrorMessage: dto.llm_error_message ?? undefined,
  };
}

export class HttpIngestGateway implements IngestGateway {
  private readonly logger: Logger;

  constructor(
    private readonly client: ApiClient,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('IngestApi');
  }

  async submitJob(url: string, options?: RequestOptions): Promise<StartIngestResult> {
    try {
      const dto = await this.client.post('/ingest/tiktok', { url }, startIngestSchema, options);
      this.logger.info('🚀 Started ingest job', dto.job_id);
      return {
        jobId: dto.job_id,
        recipeId: dto.recipe_id ?? undefined,
        status: dto.status,
        message: dto.message ?? undefined,
      };
    } catch (error) {
      throw withFriendlyMessage(error, INGEST_ERROR_MESSAGES);
    }
  }

  async fetchJob(jobId: string, options?: RequestOptions): Promise<JobRecord> {
    try {
      const dto = await this.client.get(
        `/ingest/jobs/${encodeURIComponent(jobId)}`,
        ingestJobSchema,
        options
      );
      this.logger.debug('Job', jobId, 'status:', dto.status);
      // Poll responses may omit the id they were requested by
      return toJobRecord(dto, dto.job_id ?? jobId);
    } catch (error) {
      throw withFriendlyMessage(error, INGEST_ERROR_MESSAGES);
    }
  }

  async listActiveJobs(options?: RequestOptions): Promise<JobRecord[]> {
    try {
      const dtos = await this.client.get('/ingest/jobs/active', activeJobsSchema, options);
      const records: JobRecord[] = [];
      for (const dto of dtos) {
        if (!dto.job_id) {
          this.logger.warn('Skipping active job without an id');
          continue;
        }
        records.push(toJobRecord(dto, dto.job_id));
      }
      return records;
    } catch (error) {
      throw withFriendlyMessage(error, INGEST_ERROR_MESSAGES);
    }
  }
}
