export type Validated<T> = { ok: true; value: T } | { ok: false; error: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

export function getRecord(obj: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = obj[key];
  return isRecord(value) ? value : undefined;
}

export function getArray(obj: Record<string, unknown>, key: string): unknown[] {
  const value = obj[key];
  return Array.isArray(value) ? value : [];
}

export interface ValidPullRequest {
  reset: boolean;
  retryFailed: boolean;
}

export function validatePullRequest(input: unknown): Validated<ValidPullRequest> {
  const obj = isRecord(input) ? input : {};
  const reset = obj.reset ?? false;
  const retryFailed = obj.retryFailed ?? false;
  if (typeof reset !== 'boolean') return { ok: false, error: 'invalid request: reset must be a boolean' };
  if (typeof retryFailed !== 'boolean') return { ok: false, error: 'invalid request: retryFailed must be a boolean' };
  if (reset && retryFailed) return { ok: false, error: 'invalid request: reset and retryFailed are exclusive' };
  return { ok: true, value: { reset, retryFailed } };
}

export interface ValidParseRequest {
  partial: boolean;
}

export function validateParseRequest(input: unknown): Validated<ValidParseRequest> {
  const obj = isRecord(input) ? input : {};
  const partial = obj.partial ?? false;
  if (typeof partial !== 'boolean') return { ok: false, error: 'invalid request: partial must be a boolean' };
  return { ok: true, value: { partial } };
}
