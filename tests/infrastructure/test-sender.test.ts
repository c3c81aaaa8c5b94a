import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { sendTestEvents } from '../../src/infrastructure/webhook/test-sender.js';
import { UnknownScenarioError } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

describe('sendTestEvents', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts every event of the scenario as JSON to /webhook', async () => {
    const mockFetch = vi.fn().mockImplementation(async () => new Response('{"message":"OK"}', { status: 200 }));
    vi.stubGlobal('fetch', mockFetch);

    const result = await sendTestEvents(
      { serverUrl: 'http://localhost:3000/', eventType: 'all', delaySeconds: 0, buildNumber: 9 },
      log,
    );

    expect(result).toEqual({ sent: 4, failed: 0 });
    expect(mockFetch).toHaveBeenCalledTimes(4);

    const [url, init] = mockFetch.mock.calls[0] as [string, RequestInit];
    expect(url).toBe('http://localhost:3000/webhook');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
    const body: unknown = JSON.parse(String(init.body));
    expect(body).toMatchObject({ event: 'build.started', build: { number: 9 } });
  });

  it('counts and logs rejected events', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValueOnce(new Response('boom', { status: 500 })));

    const result = await sendTestEvents(
      { serverUrl: 'http://localhost:3000', eventType: 'job-failed', delaySeconds: 0, buildNumber: 1 },
      log,
    );

    expect(result).toEqual({ sent: 0, failed: 1 });
    expect(log.error).toHaveBeenCalledWith(
      { event: 'job.finished', status: 500, body: 'boom' },
      'Test event rejected',
    );
  });

  it('rejects unknown scenarios before sending anything', async () => {
    const mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);

    await expect(sendTestEvents(
      { serverUrl: 'http://localhost:3000', eventType: 'nope', delaySeconds: 0, buildNumber: 1 },
      log,
    )).rejects.toBeInstanceOf(UnknownScenarioError);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
