import { z } from 'zod';
import { LikeDto, LikeResult, RequestOptions } from '../types/api';
import { LikeGateway } from '../types/gateways';
import { ApiClient, ResponseSchema } from './api';
import { LIKE_DEFAULTS } from './config';
import { errorMessage, StatusMessages, withFriendlyMessage } from './errors';
import { createLogger, Logger } from './logger';
import { withRetry } from './retry';

export const likeSchema: ResponseSchema<LikeDto> = z.object({
  success: z.boolean().optional(),
  liked: z.boolean(),
  likes_count: z.number().int(),
  recipe_id: z.string().nullish(),
});

const LIKE_ERROR_MESSAGES: StatusMessages = {
  400: 'Invalid request',
  401: 'Authentication required',
  403: 'Permission denied',
  404: 'Recipe not found',
  409: 'Conflict - like state may have changed',
  429: 'Too many requests - please wait',
};

export interface HttpLikeGatewayOptions {
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  logger?: Logger;
}

function toLikeResult(dto: LikeDto): LikeResult {
  return { liked: dto.liked, likesCount: Math.max(0, dto.likes_count) };
}

export class HttpLikeGateway implements LikeGateway {
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly client: ApiClient,
    options: HttpLikeGatewayOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? LIKE_DEFAULTS.maxAttempts;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? LIKE_DEFAULTS.retryBaseDelayMs;
    this.logger = options.logger ?? createLogger('LikeApi');
  }

  async toggleLike(recipeId: string, liked: boolean, options?: RequestOptions): Promise<LikeResult> {
    const endpoint = `/api/recipes/${encodeURIComponent(recipeId)}/like`;
    try {
      const dto = await withRetry(
        () =>
          liked
            ? this.client.post(endpoint, {}, likeSchema, options)
            : this.client.delete(endpoint, likeSchema, options),
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.retryBaseDelayMs,
          signal: options?.signal,
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn(
              `${liked ? 'Like' : 'Unlike'} of ${recipeId} failed (attempt ${attempt}), retrying in ${delayMs}ms:`,
              errorMessage(error)
            );
          },
        }
      );
      return toLikeResult(dto);
    } catch (error) {
      throw withFriendlyMessage(error, LIKE_ERROR_MESSAGES);
    }
  }

  async getLikeStatus(recipeId: string, options?: RequestOptions): Promise<LikeResult> {
    try {
      const dto = await this.client.get(
        `/api/recipes/${encodeURIComponent(recipeId)}/liked`,
        likeSchema,
        options
      );
      return toLikeResult(dto);
    } catch (error) {
      throw withFriendlyMessage(error, LIKE_ERROR_MESSAGES);
    }
  }
}
