import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

/** Time source used by pacing and backoff, swapped for a manual one in tests. */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export function abortError(): Error {
  const err = new Error('The operation was aborted');
  err.name = 'AbortError';
  return err;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(abortError());
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(abortError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
};

// Simple semaphore to limit concurrency without extra deps
export class Semaphore {
  private queue: Array<() => void> = [];
  private current = 0;
  constructor(private readonly limit: number) {}

  async acquire(): Promise<() => void> {
    if (this.current < this.limit) {
      this.current++;
      return this.releaser();
    }
    return new Promise(resolve => {
      this.queue.push(() => {
        this.current++;
        resolve(this.releaser());
      });
    });
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release() {
    this.current--;
    const next = this.queue.shift();
    if (next) next();
  }
}

/** Enforces a minimum spacing between the starts of consecutive calls. */
export class RateLimiter {
  private nextAllowed = 0;
  constructor(private readonly minIntervalMs: number, private readonly clock: Clock = systemClock) {}

  async waitTurn(signal?: AbortSignal): Promise<void> {
    const now = this.clock.now();
    const start = Math.max(now, this.nextAllowed);
    // Reserve the slot before sleeping so concurrent callers queue up behind it
    this.nextAllowed = start + Math.max(0, this.minIntervalMs);
    const wait = start - now;
    if (wait > 0) await this.clock.sleep(wait, signal);
  }
}

/** Writes through a temp file and a rename so readers never see a torn file. */
export async function writeFileAtomic(file: string, data: string | Uint8Array): Promise<void> {
  const dir = path.dirname(file);
  await fs.mkdir(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(file)}.${process.pid}.${crypto.randomUUID()}.tmp`);
  try {
    await fs.writeFile(tmp, data);
    await fs.rename(tmp, file);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

export async function writeJsonAtomic(file: string, data: unknown): Promise<void> {
  await writeFileAtomic(file, JSON.stringify(data, null, 2));
}
