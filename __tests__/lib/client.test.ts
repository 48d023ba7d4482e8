import { createReciplanClient } from '../../lib/client';
import { loadConfig } from '../../lib/config';
import { getLogLevel, setLogLevel } from '../../lib/logger';

describe('createReciplanClient', () => {
  const initialLevel = getLogLevel();
  const fetchMock = jest.fn<Promise<Response>, [string, RequestInit?]>();

  beforeEach(() => {
    jest.clearAllMocks();
  });

  afterEach(() => {
    setLogLevel(initialLevel);
  });

  it('should wire the gateways to the configured API', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ job_id: 'job-1', status: 'QUEUED' })));
    const client = createReciplanClient({
      config: loadConfig({ RECIPLAN_API_URL: 'http://api.test/', RECIPLAN_LOG_LEVEL: 'silent' }),
      getToken: async () => 'test-token',
      fetch: fetchMock,
    });

    const result = await client.ingestGateway.submitJob('https://vm.tiktok.com/abc/');

    expect(result.jobId).toBe('job-1');
    expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/ingest/tiktok');
    expect(fetchMock.mock.calls[0][1]?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
  });

  it('should apply the configured log level', () => {
    createReciplanClient({ config: loadConfig({ RECIPLAN_LOG_LEVEL: 'error' }), fetch: fetchMock });

    expect(getLogLevel()).toBe('error');
  });

  it('should hand out a separate tracker per call', () => {
    const client = createReciplanClient({ config: loadConfig({ RECIPLAN_LOG_LEVEL: 'silent' }) });

    const first = client.createIngestTracker();
    const second = client.createIngestTracker();

    expect(first).not.toBe(second);
    expect(first.getState().jobId).toBeNull();
    expect(client.likes.getSnapshot('recipe-1').liked).toBe(false);
  });
});
