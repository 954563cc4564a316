import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FetchError } from '../errors.js';
import {
  RateLimitedClient,
  type ApiRequest,
  type ApiResponse,
  type CallEvent,
  type RateLimitedClientOptions
} from '../ingest/rate-limited-client.js';
import { setLogLevel } from '../logger.js';
import { captureLogs, ManualClock } from './helpers.js';

function scripted(responses: Array<ApiResponse | Error>) {
  const requests: ApiRequest[] = [];
  const transport = async (request: ApiRequest): Promise<ApiResponse> => {
    requests.push(request);
    const next = responses.shift();
    if (!next) throw new Error('no scripted response left');
    if (next instanceof Error) throw next;
    return next;
  };
  return { transport, requests };
}

function options(clock: ManualClock, overrides: Partial<RateLimitedClientOptions> = {}): RateLimitedClientOptions {
  return {
    maxConcurrent: 5,
    apiDelayMs: 0,
    retry: { maxRetries: 3, baseDelayMs: 1000, backoffFactor: 2 },
    clock,
    ...overrides
  };
}

describe('RateLimitedClient', () => {
  let logs: ReturnType<typeof captureLogs>;
  beforeEach(() => {
    logs = captureLogs();
  });
  afterEach(() => {
    logs.restore();
  });

  it('backs off 1s, 2s, 4s on repeated 429 and succeeds on the fourth attempt', async () => {
    const clock = new ManualClock();
    const { transport, requests } = scripted([
      { status: 429, body: {} },
      { status: 429, body: {} },
      { status: 429, body: {} },
      { status: 200, body: { object: 'page' } }
    ]);
    const events: CallEvent[] = [];
    const client = new RateLimitedClient(transport, options(clock, { onCall: e => events.push(e) }));

    const result = await client.fetch({ method: 'GET', path: '/v1/pages/x', label: 'pages.retrieve' });

    expect(result).toEqual({ ok: true, value: { object: 'page' } });
    expect(clock.sleeps).toEqual([1000, 2000, 4000]);
    expect(requests).toHaveLength(4);
    expect(events.map(e => e.outcome)).toEqual(['retry', 'retry', 'retry', 'ok']);
    expect(events.map(e => e.delayMs)).toEqual([1000, 2000, 4000, undefined]);
  });

  it('waits for Retry-After when the server sends one', async () => {
    const clock = new ManualClock();
    const { transport } = scripted([
      { status: 429, retryAfter: '7', body: {} },
      { status: 200, body: {} }
    ]);
    const client = new RateLimitedClient(transport, options(clock, { onCall: () => undefined }));

    await client.fetch({ method: 'GET', path: '/v1/x' });

    expect(clock.sleeps).toEqual([7000]);
  });

  it('fails a 404 at once with not_found', async () => {
    const clock = new ManualClock();
    const { transport, requests } = scripted([{ status: 404, body: { message: 'Could not find page' } }]);
    const client = new RateLimitedClient(transport, options(clock, { onCall: () => undefined }));

    const result = await client.fetch({ method: 'GET', path: '/v1/pages/x', label: 'pages.retrieve' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(FetchError);
    expect(result.error.kind).toBe('not_found');
    expect(result.error.status).toBe(404);
    expect(result.error.attempts).toBe(1);
    expect(result.error.message).toBe('pages.retrieve: HTTP 404: Could not find page');
    expect(requests).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('gives up after max retries on 5xx', async () => {
    const clock = new ManualClock();
    const { transport, requests } = scripted([
      { status: 500, body: '' },
      { status: 502, body: '' },
      { status: 503, body: '' }
    ]);
    const client = new RateLimitedClient(
      transport,
      options(clock, { retry: { maxRetries: 2, baseDelayMs: 1000, backoffFactor: 2 }, onCall: () => undefined })
    );

    const result = await client.fetch({ method: 'GET', path: '/v1/x', label: 'x' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('transport');
    expect(result.error.status).toBe(503);
    expect(result.error.attempts).toBe(3);
    expect(requests).toHaveLength(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('retries a transport rejection', async () => {
    const clock = new ManualClock();
    const { transport } = scripted([new Error('ECONNRESET'), { status: 200, body: { ok: 1 } }]);
    const client = new RateLimitedClient(transport, options(clock, { onCall: () => undefined }));

    const result = await client.fetch({ method: 'GET', path: '/v1/x' });

    expect(result).toEqual({ ok: true, value: { ok: 1 } });
    expect(clock.sleeps).toEqual([1000]);
  });

  it('spaces call starts by the pacing delay', async () => {
    const clock = new ManualClock();
    const { transport } = scripted([
      { status: 200, body: {} },
      { status: 200, body: {} },
      { status: 200, body: {} }
    ]);
    const client = new RateLimitedClient(transport, options(clock, { apiDelayMs: 1000, onCall: () => undefined }));

    await client.fetch({ method: 'GET', path: '/1' });
    await client.fetch({ method: 'GET', path: '/2' });
    await client.fetch({ method: 'GET', path: '/3' });

    expect(clock.sleeps).toEqual([1000, 1000]);
  });

  it('never runs more than maxConcurrent exchanges at once', async () => {
    let active = 0;
    let maxActive = 0;
    const transport = async (): Promise<ApiResponse> => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active--;
      return { status: 200, body: {} };
    };
    const client = new RateLimitedClient(transport, options(new ManualClock(), { maxConcurrent: 2, onCall: () => undefined }));

    const results = await Promise.all(Array.from({ length: 6 }, (_, i) => client.fetch({ method: 'GET', path: `/${i}` })));

    expect(results.every(r => r.ok)).toBe(true);
    expect(maxActive).toBe(2);
  });

  it('aborts a backoff wait when the signal fires', async () => {
    const clock = new ManualClock();
    const controller = new AbortController();
    const { transport } = scripted([{ status: 429, body: {} }]);
    const client = new RateLimitedClient(
      transport,
      options(clock, {
        onCall: e => {
          if (e.outcome === 'retry') controller.abort();
        }
      })
    );

    await expect(client.fetch({ method: 'GET', path: '/v1/x', signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError'
    });
    expect(clock.sleeps).toEqual([]);
  });

  it('logs retries by default and keeps successful calls at debug level', async () => {
    const clock = new ManualClock();
    const { transport } = scripted([
      { status: 500, body: '' },
      { status: 200, body: {} }
    ]);
    const client = new RateLimitedClient(transport, options(clock));
    setLogLevel('info');

    await client.fetch({ method: 'GET', path: '/v1/x', label: 'x' });

    const msgs = logs.lines.map(line => JSON.parse(line).msg);
    expect(msgs).toEqual(['api.call.retry']);
  });
});
