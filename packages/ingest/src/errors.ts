/**
 * Error types shared by the pull, parse and index stages.
 */

export type ErrorDetails = Record<string, unknown>;

export class IngestError extends Error {
  public readonly code: string;
  public readonly details?: ErrorDetails;

  constructor(message: string, code: string, details?: ErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Outcome kinds of a remote call that did not produce a payload. */
export type FetchErrorKind = 'rate_limited' | 'unauthorized' | 'not_found' | 'transport' | 'invalid_request';

export class FetchError extends IngestError {
  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    public readonly status: number | undefined,
    public readonly attempts: number
  ) {
    super(message, `FETCH_${kind.toUpperCase()}`, { status, attempts });
  }
}

export class CorruptStateError extends IngestError {
  constructor(public readonly file: string, reason: string) {
    super(`Pull state at ${file} cannot be read: ${reason}`, 'CORRUPT_STATE', { file });
  }
}

export class PrerequisiteMissingError extends IngestError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'PREREQUISITE_MISSING', details);
  }
}

export class ConfigError extends IngestError {
  constructor(message: string, details?: ErrorDetails) {
    super(`Invalid configuration: ${message}`, 'CONFIG_ERROR', details);
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
