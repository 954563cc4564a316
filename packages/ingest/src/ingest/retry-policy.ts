import type { FetchErrorKind } from '../errors.js';

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  backoffFactor: number;
}

/** What one attempt produced, as seen by the retry state machine. */
export type AttemptOutcome =
  | { type: 'ok' }
  | { type: 'http'; status: number; retryAfterMs?: number; message: string }
  | { type: 'transport'; message: string };

export type NextStep =
  | { type: 'done' }
  | { type: 'retry'; delayMs: number; nextAttempt: number }
  | { type: 'fail'; kind: FetchErrorKind; status?: number; message: string };

export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * Math.pow(policy.backoffFactor, attempt);
}

export function classifyStatus(status: number): { transient: boolean; kind: FetchErrorKind } {
  if (status === 429) return { transient: true, kind: 'rate_limited' };
  if (status >= 500) return { transient: true, kind: 'transport' };
  if (status === 401 || status === 403) return { transient: false, kind: 'unauthorized' };
  if (status === 404) return { transient: false, kind: 'not_found' };
  return { transient: false, kind: 'invalid_request' };
}

/**
 * Decides what follows attempt number `attempt` (0-based).
 * A transient failure is retried while attempt < maxRetries, so a call makes
 * at most maxRetries + 1 attempts. The wait before the next attempt is
 * baseDelay * factor^attempt, or the server's Retry-After hint on a 429.
 */
export function planNextAttempt(policy: RetryPolicy, attempt: number, outcome: AttemptOutcome): NextStep {
  if (outcome.type === 'ok') return { type: 'done' };

  let kind: FetchErrorKind = 'transport';
  let status: number | undefined;
  let transient = true;
  let delayMs = backoffDelayMs(policy, attempt);

  if (outcome.type === 'http') {
    status = outcome.status;
    ({ kind, transient } = classifyStatus(outcome.status));
    if (outcome.status === 429 && outcome.retryAfterMs !== undefined) {
      delayMs = outcome.retryAfterMs;
    }
  }

  if (!transient || attempt >= policy.maxRetries) {
    return { type: 'fail', kind, status, message: outcome.message };
  }
  return { type: 'retry', delayMs: Math.max(0, delayMs), nextAttempt: attempt + 1 };
}

/** Parses a Retry-After header given in seconds or as an HTTP date. */
export function parseRetryAfter(value: string | null | undefined, nowMs: number): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) return Math.round(Number(trimmed) * 1000);
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - nowMs);
}
