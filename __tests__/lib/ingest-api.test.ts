import { ApiClient } from '../../lib/api';
import { ApiError, isNotFoundError } from '../../lib/errors';
import { HttpIngestGateway, toJobRecord } from '../../lib/ingest-api';
import { Logger } from '../../lib/logger';

const silentLogger: Logger = {
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the request to fail');
}

describe('HttpIngestGateway', () => {
  const fetchMock = jest.fn<Promise<Response>, [string, RequestInit?]>();
  let gateway: HttpIngestGateway;

  beforeEach(() => {
    jest.clearAllMocks();
    const client = new ApiClient({
      baseUrl: 'http://api.test',
      getToken: async () => 'test-token',
      fetch: fetchMock,
      logger: silentLogger,
    });
    gateway = new HttpIngestGateway(client, silentLogger);
  });

  describe('submitJob', () => {
    it('should post the URL and map the response', async () => {
      fetchMock.mockResolvedValue(
        new Response(JSON.stringify({ job_id: 'job-1', status: 'QUEUED', message: 'Started' }))
      );

      const result = await gateway.submitJob('https://vm.tiktok.com/abc/');

      expect(result).toEqual({ jobId: 'job-1', status: 'QUEUED', message: 'Started' });
      expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/ingest/tiktok');
      expect(fetchMock.mock.calls[0][1]?.body).toBe('{"url":"https://vm.tiktok.com/abc/"}');
    });

    it('should replace HTTP errors with friendly messages', async () => {
      fetchMock.mockResolvedValue(new Response('{"detail":"bad"}', { status: 422 }));

      const error = await catchError(gateway.submitJob('https://vm.tiktok.com/abc/'));

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 422, message: 'Please check your TikTok URL' });
    });

    it('should use a generic message for server errors', async () => {
      fetchMock.mockResolvedValue(new Response('oops', { status: 500 }));

      const error = await catchError(gateway.submitJob('https://vm.tiktok.com/abc/'));

      expect(error).toMatchObject({ status: 500, message: 'Server error. Please try again later' });
    });
  });

  describe('fetchJob', () => {
    it('should map snake case fields and fill a missing job id', async () => {
      fetchMock.mockResolvedValue(
        new Response(
          JSON.stringify({
            status: 'DRAFT_PARSED',
            recipe_id: 'recipe-9',
            title: 'Garlic noodles',
            ingredient_candidates: ['noodles', 'garlic'],
            parse_errors: null,
          })
        )
      );

      const record = await gateway.fetchJob('job-1');

      expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/ingest/jobs/job-1');
      expect(record).toEqual({
        jobId: 'job-1',
        recipeId: 'recipe-9',
        status: 'DRAFT_PARSED',
        title: 'Garlic noodles',
        ingredientCandidates: ['noodles', 'garlic'],
        parseErrors: [],
      });
    });

    it('should report a missing job as not found', async () => {
      fetchMock.mockResolvedValue(new Response('missing', { status: 404 }));

      const error = await catchError(gateway.fetchJob('job-404'));

      expect(isNotFoundError(error)).toBe(true);
      expect(error).toMatchObject({ message: 'Ingest job not found' });
    });

    it('should treat an unknown error code on a failed job as UNKNOWN_ERROR', async () => {
      fetchMock.mockResolvedValue(
        new Response(JSON.stringify({ job_id: 'job-1', status: 'FAILED', error_code: 'DISK_FULL' }))
      );

      const record = await gateway.fetchJob('job-1');

      expect(record.errorCode).toBe('UNKNOWN_ERROR');
    });
  });

  describe('listActiveJobs', () => {
    it('should skip entries without an id', async () => {
      fetchMock.mockResolvedValue(
        new Response(
          JSON.stringify([
            { job_id: 'job-1', status: 'OCRING' },
            { status: 'QUEUED' },
            { job_id: 'job-2', status: 'COMPLETED' },
          ])
        )
      );

      const jobs = await gateway.listActiveJobs();

      expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/ingest/jobs/active');
      expect(jobs.map(job => [job.jobId, job.status])).toEqual([
        ['job-1', 'OCRING'],
        ['job-2', 'COMPLETED'],
      ]);
    });
  });
});

describe('toJobRecord', () => {
  it('should give a failed job without a code UNKNOWN_ERROR', () => {
    expect(toJobRecord({ status: 'FAILED' }, 'job-1').errorCode).toBe('UNKNOWN_ERROR');
  });

  it('should drop an error code from a job that has not failed', () => {
    expect(toJobRecord({ status: 'OCR_DONE', error_code: 'OCR_FAILED' }, 'job-1').errorCode).toBeUndefined();
  });

  it('should keep the code of a failed job', () => {
    expect(toJobRecord({ status: 'FAILED', error_code: 'ASR_FAILED' }, 'job-1').errorCode).toBe('ASR_FAILED');
  });
});
