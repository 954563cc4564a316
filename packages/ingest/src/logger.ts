import { randomUUID } from 'node:crypto';

export type Level = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<Level, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export type LogFields = Record<string, unknown>;

interface BaseLog extends LogFields {
  level: Level;
  ts: string;
  msg: string;
  err?: { name?: string; message?: string; stack?: string };
}

export type LogSink = (line: string) => void;

let threshold: Level = parseLevel(process.env.LOG_LEVEL) ?? 'info';
let sink: LogSink = line => {
  console.log(line);
};

export function parseLevel(raw: string | undefined): Level | undefined {
  const value = (raw || '').trim().toLowerCase();
  if (value === 'warning') return 'warn';
  return value === 'error' || value === 'warn' || value === 'info' || value === 'debug' ? value : undefined;
}

export function setLogLevel(level: Level): void {
  threshold = level;
}

/** Redirects log output; returns the previous sink so tests can restore it. */
export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

export function generateRequestId(): string {
  return randomUUID();
}

export function serializeError(err: unknown): BaseLog['err'] {
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}

function write(log: BaseLog) {
  if (LEVEL_RANK[log.level] > LEVEL_RANK[threshold]) return;
  sink(JSON.stringify(log));
}

export function logEvent(level: Level, msg: string, fields: LogFields = {}): void {
  write({ ...fields, level, ts: new Date().toISOString(), msg });
}

export function logRequestStart({ reqId, method, url }: { reqId: string; method: string; url: string }) {
  write({ level: 'info', ts: new Date().toISOString(), msg: 'request.start', reqId, method, url });
}

export function logRequestEnd({
  reqId,
  method,
  url,
  status,
  startedAt,
}: {
  reqId: string;
  method: string;
  url: string;
  status: number;
  startedAt: number;
}) {
  const durationMs = Date.now() - startedAt;
  write({ level: 'info', ts: new Date().toISOString(), msg: 'request.end', reqId, method, url, status, durationMs });
}

export function logError({ reqId, method, url, err, msg = 'error' }: { reqId?: string; method?: string; url?: string; err: unknown; msg?: string }) {
  write({
    level: 'error',
    ts: new Date().toISOString(),
    msg,
    reqId,
    method,
    url,
    err: serializeError(err),
  });
}
