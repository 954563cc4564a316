import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import { ConfigError, CorruptStateError, PrerequisiteMissingError } from './errors.js';
import { generateRequestId, logError, logEvent, logRequestEnd, logRequestStart } from './logger.js';
import type { Pipeline } from './pipeline.js';
import { normalizeNotionId } from './sources/notion.js';
import { validateParseRequest, validatePullRequest } from './validation.js';

export interface ServerOptions {
  pipeline: Pipeline;
  adminApiKey?: string; // unset: endpoints are public
}

interface RunningPull {
  controller: AbortController;
  done: Promise<void>;
}

type EntityParams = { Params: { rootId: string } };

function isAuthorized(req: FastifyRequest, key: string | undefined): boolean {
  if (!key) return true;
  const hdr = req.headers['x-api-key'] || req.headers['authorization'];
  if (!hdr) return false;
  if (typeof hdr === 'string' && hdr.startsWith('Bearer ')) {
    return hdr.slice(7).trim() === key;
  }
  return hdr === key;
}

function statusFor(err: unknown): number {
  if (err instanceof ConfigError) return 400;
  if (err instanceof PrerequisiteMissingError || err instanceof CorruptStateError) return 409;
  if (err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number' && err.statusCode < 500) {
    return err.statusCode;
  }
  return 500;
}

/**
 * Admin API over the pipeline. Pulls run in the background, one per root;
 * closing the server cancels them and waits for their final checkpoint.
 */
export function buildServer({ pipeline, adminApiKey }: ServerOptions): FastifyInstance {
  const app = Fastify({
    logger: false,
    genReqId: req => {
      const incoming = req.headers['x-request-id'];
      return typeof incoming === 'string' && incoming ? incoming : generateRequestId();
    }
  });
  const startedAt = new WeakMap<FastifyRequest, number>();
  const running = new Map<string, RunningPull>();

  // Request ID + basic logging hooks
  app.addHook('onRequest', async (req, reply) => {
    startedAt.set(req, Date.now());
    reply.header('x-request-id', req.id);
    logRequestStart({ reqId: req.id, method: req.method, url: req.url });
  });

  app.addHook('onResponse', async (req, reply) => {
    logRequestEnd({
      reqId: req.id,
      method: req.method,
      url: req.url,
      status: reply.statusCode,
      startedAt: startedAt.get(req) ?? Date.now()
    });
  });

  app.addHook('onClose', async () => {
    const pulls = [...running.values()];
    for (const pull of pulls) pull.controller.abort();
    await Promise.all(pulls.map(p => p.done));
  });

  app.setErrorHandler(async (err, req, reply) => {
    const status = statusFor(err);
    if (status >= 500) logError({ reqId: req.id, method: req.method, url: req.url, err });
    return reply.code(status).send({ error: err.message });
  });

  app.get('/health', async () => ({ status: 'ok', runningPulls: [...running.keys()] }));

  app.get<EntityParams>('/entities/:rootId/pull', async (req, reply) => {
    if (!isAuthorized(req, adminApiKey)) return reply.code(401).send({ error: 'unauthorized' });
    const rootId = normalizeNotionId(req.params.rootId);
    const summary = await pipeline.status(rootId);
    if (!summary) return reply.code(404).send({ error: `no pull state for ${rootId}`, running: running.has(rootId) });
    return reply.send({ ...summary, running: running.has(rootId) });
  });

  app.post<EntityParams>('/entities/:rootId/pull', async (req, reply) => {
    if (!isAuthorized(req, adminApiKey)) return reply.code(401).send({ error: 'unauthorized' });
    const rootId = normalizeNotionId(req.params.rootId);
    const v = validatePullRequest(req.body);
    if (!v.ok) return reply.code(400).send({ error: v.error });
    if (running.has(rootId)) return reply.code(409).send({ error: `a pull for ${rootId} is already running` });

    const controller = new AbortController();
    const done = pipeline
      .pull(rootId, { ...v.value, signal: controller.signal })
      .then(
        result => {
          logEvent('info', 'admin.pull.finished', { rootId, runStatus: result.runStatus, fetched: result.fetched.length });
        },
        err => {
          logError({ reqId: req.id, err, msg: 'admin.pull.failed' });
        }
      )
      .finally(() => {
        running.delete(rootId);
      });
    running.set(rootId, { controller, done });
    return reply.code(202).send({ started: true, rootId, ...v.value });
  });

  app.post<EntityParams>('/entities/:rootId/parse', async (req, reply) => {
    if (!isAuthorized(req, adminApiKey)) return reply.code(401).send({ error: 'unauthorized' });
    const rootId = normalizeNotionId(req.params.rootId);
    const v = validateParseRequest(req.body);
    if (!v.ok) return reply.code(400).send({ error: v.error });
    if (running.has(rootId)) return reply.code(409).send({ error: `a pull for ${rootId} is still running` });

    const result = await pipeline.parse(rootId, { partial: v.value.partial });
    return reply.send({
      rootId,
      records: result.records.length,
      skipped: result.skipped,
      propertyConflicts: result.schema.conflicts,
      outputFile: result.outputFile
    });
  });

  return app;
}
