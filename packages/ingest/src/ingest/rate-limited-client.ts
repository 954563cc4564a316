import { FetchError } from '../errors.js';
import { logEvent } from '../logger.js';
import { planNextAttempt, parseRetryAfter, type AttemptOutcome, type RetryPolicy } from './retry-policy.js';
import { RateLimiter, Semaphore, abortError, systemClock, type Clock } from './utils.js';

export interface ApiRequest {
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, string>;
  body?: unknown;
  label?: string; // short name for logs, e.g. "blocks.children"
  signal?: AbortSignal;
}

export interface ApiResponse {
  status: number;
  retryAfter?: string | null;
  body: unknown;
}

/** Performs one HTTP exchange. Rejects only on transport failure, never on a status code. */
export type ApiTransport = (request: ApiRequest) => Promise<ApiResponse>;

export type FetchResult<T> = { ok: true; value: T } | { ok: false; error: FetchError };

export interface CallEvent {
  label: string;
  attempt: number;
  status?: number;
  outcome: 'ok' | 'retry' | 'fail';
  durationMs: number;
  delayMs?: number;
  error?: string;
}

export type CallObserver = (event: CallEvent) => void;

export interface RateLimitedClientOptions {
  maxConcurrent: number;
  apiDelayMs: number;
  retry: RetryPolicy;
  clock?: Clock;
  onCall?: CallObserver;
}

interface AttemptResult {
  outcome: AttemptOutcome;
  body: unknown;
  status?: number;
  durationMs: number;
}

export const logCall: CallObserver = event => {
  const level = event.outcome === 'ok' ? 'debug' : event.outcome === 'retry' ? 'warn' : 'error';
  logEvent(level, `api.call.${event.outcome}`, { ...event });
};

/**
 * Single choke point for remote calls: bounded concurrency, paced call starts
 * and exponential backoff on transient failures.
 */
export class RateLimitedClient {
  private readonly semaphore: Semaphore;
  private readonly limiter: RateLimiter;
  private readonly clock: Clock;
  private readonly onCall: CallObserver;

  constructor(private readonly transport: ApiTransport, private readonly options: RateLimitedClientOptions) {
    this.clock = options.clock ?? systemClock;
    this.semaphore = new Semaphore(Math.max(1, options.maxConcurrent));
    this.limiter = new RateLimiter(options.apiDelayMs, this.clock);
    this.onCall = options.onCall ?? logCall;
  }

  async fetch(request: ApiRequest): Promise<FetchResult<unknown>> {
    const label = request.label ?? `${request.method} ${request.path}`;
    let attempt = 0;

    for (;;) {
      const { outcome, body, status, durationMs } = await this.attempt(request);
      const step = planNextAttempt(this.options.retry, attempt, outcome);

      if (step.type === 'done') {
        this.onCall({ label, attempt, status, outcome: 'ok', durationMs });
        return { ok: true, value: body };
      }

      const message = outcome.type === 'ok' ? '' : outcome.message;
      if (step.type === 'fail') {
        this.onCall({ label, attempt, status, outcome: 'fail', durationMs, error: message });
        return { ok: false, error: new FetchError(step.kind, `${label}: ${step.message}`, step.status, attempt + 1) };
      }

      this.onCall({ label, attempt, status, outcome: 'retry', durationMs, delayMs: step.delayMs, error: message });
      await this.clock.sleep(step.delayMs, request.signal);
      attempt = step.nextAttempt;
    }
  }

  private async attempt(request: ApiRequest): Promise<AttemptResult> {
    if (request.signal?.aborted) throw abortError();
    const release = await this.semaphore.acquire();
    try {
      if (request.signal?.aborted) throw abortError();
      await this.limiter.waitTurn(request.signal);
      const startedAt = this.clock.now();
      let response: ApiResponse;
      try {
        response = await this.transport(request);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { outcome: { type: 'transport', message }, body: undefined, durationMs: this.clock.now() - startedAt };
      }
      const durationMs = this.clock.now() - startedAt;
      if (response.status >= 200 && response.status < 300) {
        return { outcome: { type: 'ok' }, body: response.body, status: response.status, durationMs };
      }
      return {
        outcome: {
          type: 'http',
          status: response.status,
          retryAfterMs: parseRetryAfter(response.retryAfter, this.clock.now()),
          message: `HTTP ${response.status}${describeBody(response.body)}`
        },
        body: response.body,
        status: response.status,
        durationMs
      };
    } finally {
      release();
    }
  }
}

function describeBody(body: unknown): string {
  if (body && typeof body === 'object' && 'message' in body && typeof body.message === 'string') {
    return `: ${body.message}`;
  }
  return '';
}

export interface FetchTransportConfig {
  baseUrl: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

/**
 * Transport over the global fetch with a per-request timeout. The request's
 * cancellation signal is not forwarded: an exchange already on the wire runs
 * to completion or timeout, only waits before and between attempts abort.
 */
export function createFetchTransport(config: FetchTransportConfig): ApiTransport {
  return async request => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), config.timeoutMs);
    try {
      const qs = request.query ? `?${new URLSearchParams(request.query)}` : '';
      const res = await fetch(`${config.baseUrl}${request.path}${qs}`, {
        method: request.method,
        headers: {
          accept: 'application/json',
          ...(request.body === undefined ? {} : { 'content-type': 'application/json' }),
          ...config.headers
        },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal
      });
      const body = parseBody(await res.text());
      return { status: res.status, retryAfter: res.headers.get('retry-after'), body };
    } finally {
      clearTimeout(timer);
    }
  };
}

// Non-JSON bodies (proxies, HTML error pages) are kept as text
function parseBody(text: string): unknown {
  if (!text) return text;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
