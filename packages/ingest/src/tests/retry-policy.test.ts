import { describe, expect, it } from 'vitest';
import { backoffDelayMs, classifyStatus, parseRetryAfter, planNextAttempt, type RetryPolicy } from '../ingest/retry-policy.js';

const policy: RetryPolicy = { maxRetries: 3, baseDelayMs: 1000, backoffFactor: 2 };

describe('retry policy', () => {
  it('doubles the delay per attempt', () => {
    expect([0, 1, 2].map(a => backoffDelayMs(policy, a))).toEqual([1000, 2000, 4000]);
  });

  it('classifies statuses', () => {
    expect(classifyStatus(429)).toEqual({ transient: true, kind: 'rate_limited' });
    expect(classifyStatus(503)).toEqual({ transient: true, kind: 'transport' });
    expect(classifyStatus(401)).toEqual({ transient: false, kind: 'unauthorized' });
    expect(classifyStatus(403)).toEqual({ transient: false, kind: 'unauthorized' });
    expect(classifyStatus(404)).toEqual({ transient: false, kind: 'not_found' });
    expect(classifyStatus(400)).toEqual({ transient: false, kind: 'invalid_request' });
  });

  it('retries transient failures until the budget is spent', () => {
    const outcome = { type: 'http' as const, status: 503, message: 'HTTP 503' };
    expect(planNextAttempt(policy, 0, outcome)).toEqual({ type: 'retry', delayMs: 1000, nextAttempt: 1 });
    expect(planNextAttempt(policy, 2, outcome)).toEqual({ type: 'retry', delayMs: 4000, nextAttempt: 3 });
    expect(planNextAttempt(policy, 3, outcome)).toEqual({ type: 'fail', kind: 'transport', status: 503, message: 'HTTP 503' });
  });

  it('fails permanent errors on the first attempt', () => {
    expect(planNextAttempt(policy, 0, { type: 'http', status: 404, message: 'HTTP 404' })).toEqual({
      type: 'fail',
      kind: 'not_found',
      status: 404,
      message: 'HTTP 404'
    });
  });

  it('lets Retry-After override the computed delay on 429', () => {
    const step = planNextAttempt(policy, 1, { type: 'http', status: 429, retryAfterMs: 7000, message: 'HTTP 429' });
    expect(step).toEqual({ type: 'retry', delayMs: 7000, nextAttempt: 2 });
  });

  it('treats transport errors as transient', () => {
    expect(planNextAttempt(policy, 0, { type: 'transport', message: 'ECONNRESET' })).toEqual({
      type: 'retry',
      delayMs: 1000,
      nextAttempt: 1
    });
    expect(planNextAttempt(policy, 3, { type: 'transport', message: 'ECONNRESET' })).toEqual({
      type: 'fail',
      kind: 'transport',
      status: undefined,
      message: 'ECONNRESET'
    });
  });

  it('parses Retry-After seconds and dates', () => {
    expect(parseRetryAfter('3', 0)).toBe(3000);
    expect(parseRetryAfter('0.5', 0)).toBe(500);
    expect(parseRetryAfter(null, 0)).toBeUndefined();
    expect(parseRetryAfter('soon', 0)).toBeUndefined();
    const now = Date.parse('2024-01-01T00:00:00Z');
    expect(parseRetryAfter('Mon, 01 Jan 2024 00:00:05 GMT', now)).toBe(5000);
  });
});
