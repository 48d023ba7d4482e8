import { ApiClient } from '../../lib/api';
import { ApiError } from '../../lib/errors';
import { HttpLikeGateway } from '../../lib/like-api';
import { Logger } from '../../lib/logger';

const logger: Logger = {
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

function likeResponse(liked: boolean, likesCount: number): Response {
  return new Response(JSON.stringify({ success: true, liked, likes_count: likesCount }));
}

describe('HttpLikeGateway', () => {
  const fetchMock = jest.fn<Promise<Response>, [string, RequestInit?]>();
  let gateway: HttpLikeGateway;

  beforeEach(() => {
    jest.clearAllMocks();
    const client = new ApiClient({
      baseUrl: 'http://api.test',
      getToken: async () => 'test-token',
      fetch: fetchMock,
      logger,
    });
    gateway = new HttpLikeGateway(client, { maxAttempts: 3, retryBaseDelayMs: 1, logger });
  });

  describe('toggleLike', () => {
    it('should POST to like a recipe', async () => {
      fetchMock.mockResolvedValue(likeResponse(true, 5));

      const result = await gateway.toggleLike('recipe-1', true);

      expect(result).toEqual({ liked: true, likesCount: 5 });
      expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/api/recipes/recipe-1/like');
      expect(fetchMock.mock.calls[0][1]?.method).toBe('POST');
      expect(fetchMock.mock.calls[0][1]?.body).toBe('{}');
    });

    it('should DELETE to unlike a recipe', async () => {
      fetchMock.mockResolvedValue(likeResponse(false, 4));

      const result = await gateway.toggleLike('recipe-1', false);

      expect(result).toEqual({ liked: false, likesCount: 4 });
      expect(fetchMock.mock.calls[0][1]?.method).toBe('DELETE');
    });

    it('should retry a server error and log the retry', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('busy', { status: 503 }))
        .mockResolvedValueOnce(likeResponse(true, 12));

      const result = await gateway.toggleLike('recipe-1', true);

      expect(result).toEqual({ liked: true, likesCount: 12 });
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenCalledWith(
        'Like of recipe-1 failed (attempt 1), retrying in 1ms:',
        'busy'
      );
    });

    it('should not retry a conflict', async () => {
      fetchMock.mockResolvedValue(new Response('conflict', { status: 409 }));

      await expect(gateway.toggleLike('recipe-1', true)).rejects.toMatchObject({
        status: 409,
        message: 'Conflict - like state may have changed',
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should fail with a friendly message once retries run out', async () => {
      fetchMock.mockImplementation(async () => new Response('down', { status: 500 }));

      const failure = gateway.toggleLike('recipe-1', false);

      await expect(failure).rejects.toBeInstanceOf(ApiError);
      await expect(failure).rejects.toMatchObject({ message: 'Server error. Please try again later' });
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });
  });

  describe('getLikeStatus', () => {
    it('should read the like status and clamp the count', async () => {
      fetchMock.mockResolvedValue(likeResponse(false, -2));

      const result = await gateway.getLikeStatus('recipe-7');

      expect(result).toEqual({ liked: false, likesCount: 0 });
      expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/api/recipes/recipe-7/liked');
      expect(fetchMock.mock.calls[0][1]?.method).toBe('GET');
    });

    it('should map a missing recipe to a friendly message', async () => {
      fetchMock.mockResolvedValue(new Response('nope', { status: 404 }));

      await expect(gateway.getLikeStatus('recipe-7')).rejects.toMatchObject({
        status: 404,
        message: 'Recipe not found',
      });
    });
  });
});
