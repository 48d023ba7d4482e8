import { z } from 'zod';
import { RequestOptions } from '../types/api';
import { ApiError, errorMessage, isAbortError } from './errors';
import { createLogger, Logger } from './logger';

export type TokenProvider = () => Promise<string | null>;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ApiClientOptions {
  baseUrl: string;
  getToken?: TokenProvider;
  fetch?: FetchLike;
  logger?: Logger;
}

type Method = 'GET' | 'POST' | 'DELETE';

export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;

  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;

  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export class ApiClient {
  private readonly baseUrl: string;
  private readonly getToken?: TokenProvider;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.getToken = options.getToken;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createLogger('ApiClient');
  }

  get<T>(endpoint: string, schema: ResponseSchema<T>, options?: RequestOptions): Promise<T> {
    return this.request('GET', endpoint, schema, undefined, options);
  }

  post<T>(
    endpoint: string,
    data: unknown,
    schema: ResponseSchema<T>,
    options?: RequestOptions
  ): Promise<T> {
    return this.request('POST', endpoint, schema, data, options);
  }

  delete<T>(endpoint: string, schema: ResponseSchema<T>, options?: RequestOptions): Promise<T> {
    return this.request('DELETE', endpoint, schema, undefined, options);
  }

  private async getHeaders(withBody: boolean): Promise<Record<string, string>> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
    };
    if (withBody) {
      headers['Content-Type'] = 'application/json';
    }

    const token = this.getToken ? await this.getToken() : null;
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    this.logger.debug('🔑 Authorization header', token ? 'set' : 'omitted');
    return headers;
  }

  private async request<T>(
    method: Method,
    endpoint: string,
    schema: ResponseSchema<T>,
    data: unknown,
    options?: RequestOptions
  ): Promise<T> {
    const url = `${this.baseUrl}${endpoint}`;
    const headers = await this.getHeaders(data !== undefined);

    this.logger.debug('📡', method, url);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: data === undefined ? undefined : JSON.stringify(data),
        signal: options?.signal,
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      this.logger.warn('🔥', method, url, 'failed:', errorMessage(error));
      throw new ApiError(`Network error: ${errorMessage(error)}`, 0, { cause: error });
    }

    const text = await response.text();
    this.logger.debug('📨', method, url, response.status);

    if (!response.ok) {
      throw new ApiError(text || `HTTP error! status: ${response.status}`, response.status, {
        body: text,
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
      });
    }

    let json: unknown = null;
    if (text) {
      try {
        json = JSON.parse(text);
      } catch (error) {
        throw new ApiError('Unexpected response from server', response.status, {
          body: text,
          cause: error,
        });
      }
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn('❌ Invalid response body for', method, url, parsed.error.issues);
      throw new ApiError('Unexpected response from server', response.status, {
        body: text,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
