import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { embed, EmbeddingError, HttpEmbedder, normalizeVectors } from '../llm/embeddings.js';
import { captureLogs, ManualClock } from './helpers.js';

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json', ...headers } });
}

describe('embed', () => {
  let logs: ReturnType<typeof captureLogs>;
  beforeEach(() => {
    logs = captureLogs();
  });
  afterEach(() => {
    logs.restore();
    vi.unstubAllGlobals();
  });

  it('posts the inputs and returns one vector per text', async () => {
    const fetchMock = vi.fn(async () => json({ data: [{ embedding: [1, 0] }, { embedding: [0, 1] }] }));
    vi.stubGlobal('fetch', fetchMock);

    const vectors = await embed(['a', 'b'], { baseUrl: 'http://embed.test', model: 'test-model' });

    expect(vectors).toEqual([
      [1, 0],
      [0, 1]
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]).toEqual([
      'http://embed.test/v1/embeddings',
      expect.objectContaining({ method: 'POST', body: JSON.stringify({ model: 'test-model', input: ['a', 'b'] }) })
    ]);
  });

  it('skips the call for an empty batch', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    expect(await embed([], { baseUrl: 'http://embed.test', model: 'm' })).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('retries 5xx and 429 with backoff, preferring a longer Retry-After', async () => {
    const responses = [
      new Response('busy', { status: 503 }),
      new Response('slow down', { status: 429, headers: { 'retry-after': '2' } }),
      json({ data: [{ embedding: [1] }] })
    ];
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        const next = responses.shift();
        if (!next) throw new Error('no response left');
        return next;
      })
    );
    const clock = new ManualClock();

    const vectors = await embed(['a'], { baseUrl: 'http://embed.test', model: 'm', backoffBaseMs: 100, clock });

    expect(vectors).toEqual([[1]]);
    expect(clock.sleeps).toEqual([100, 2000]);
  });

  it('times out a response whose body never arrives', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (_url: string, init?: RequestInit) => {
        const body = new ReadableStream<Uint8Array>({
          start(stream) {
            init?.signal?.addEventListener('abort', () => stream.error(new Error('body read aborted')), { once: true });
          }
        });
        return new Response(body, { status: 200, headers: { 'content-type': 'application/json' } });
      })
    );

    await expect(embed(['a'], { baseUrl: 'http://embed.test', model: 'm', timeoutMs: 20 })).rejects.toBeInstanceOf(Error);
  });

  it('gives up on a client error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('bad model', { status: 400 })));

    const err = await embed(['a'], { baseUrl: 'http://embed.test', model: 'm' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EmbeddingError);
    expect(err).toMatchObject({ status: 400, message: 'embeddings HTTP 400: bad model' });
  });

  it('rejects a response with the wrong number of vectors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => json({ data: [{ embedding: [1] }] })));

    await expect(embed(['a', 'b'], { baseUrl: 'http://embed.test', model: 'm' })).rejects.toThrow(
      'embeddings response has 1 vectors for 2 inputs'
    );
  });

  it('normalizes vectors when asked to', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => json({ data: [{ embedding: [3, 4] }] })));

    const embedder = new HttpEmbedder({ baseUrl: 'http://embed.test', model: 'm', normalize: true });

    expect(await embedder.embed(['a'])).toEqual([[0.6, 0.8]]);
  });
});

describe('normalizeVectors', () => {
  it('leaves zero vectors alone', () => {
    expect(normalizeVectors([[0, 0]])).toEqual([[0, 0]]);
  });
});
