import { parseArgs } from 'node:util';
import type { NodeType, PullSummary } from '@notion-rag/shared';
import { CorruptStateError, IngestError } from './errors.js';
import { IngestConfigStore, type IngestConfig } from './ingest/config-store.js';
import { logError, setLogLevel } from './logger.js';
import { createPipeline, type Pipeline } from './pipeline.js';
import { buildServer } from './server.js';

export const USAGE = `Usage: notion-rag <command> [options]

Commands:
  pull <rootId>    Fetch the content tree under rootId
      --reset          discard saved progress and raw data first
      --retry-failed   refetch only nodes whose fetch failed
      --type <type>    root node type when starting fresh: page (default), database, block
  parse <rootId>   Flatten pulled content into parsed_records.json
      --partial        flatten what succeeded even if the pull is incomplete
  index <rootId>   Embed parsed records into the LanceDB index
      --recreate       drop the existing table first
  status <rootId>  Print the saved pull summary
  serve            Start the admin HTTP server
      --port <n>       default $NOTION_RAG_PORT or 8787
      --host <addr>    default $NOTION_RAG_HOST or 127.0.0.1`;

export class UsageError extends IngestError {
  constructor(message: string) {
    super(message, 'USAGE');
  }
}

export type CliCommand =
  | { name: 'pull'; rootId: string; reset: boolean; retryFailed: boolean; rootType: NodeType }
  | { name: 'parse'; rootId: string; partial: boolean }
  | { name: 'index'; rootId: string; recreate: boolean }
  | { name: 'status'; rootId: string }
  | { name: 'serve'; port: number; host: string }
  | { name: 'help' };

const OPTIONS_BY_COMMAND: Record<string, string[]> = {
  pull: ['reset', 'retry-failed', 'type'],
  parse: ['partial'],
  index: ['recreate'],
  status: [],
  serve: ['port', 'host']
};

const ROOT_TYPES: readonly NodeType[] = ['page', 'database', 'block'];

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        reset: { type: 'boolean' },
        'retry-failed': { type: 'boolean' },
        type: { type: 'string' },
        partial: { type: 'boolean' },
        recreate: { type: 'boolean' },
        port: { type: 'string' },
        host: { type: 'string' },
        help: { type: 'boolean', short: 'h' }
      }
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCommand(argv: string[], env: NodeJS.ProcessEnv = process.env): CliCommand {
  const { values, positionals } = readArgs(argv);
  const [name, rootId, ...extra] = positionals;
  if (values.help || !name || name === 'help') return { name: 'help' };

  const allowed = OPTIONS_BY_COMMAND[name];
  if (!allowed) throw new UsageError(`Unknown command ${JSON.stringify(name)}`);
  const given = Object.keys(values).filter(key => key !== 'help');
  const misplaced = given.find(key => !allowed.includes(key));
  if (misplaced) throw new UsageError(`--${misplaced} does not apply to ${name}`);

  if (name === 'serve') {
    if (rootId !== undefined) throw new UsageError('serve takes no arguments');
    const port = Number(values.port ?? env.NOTION_RAG_PORT ?? 8787);
    if (!Number.isInteger(port) || port < 0 || port > 65535) throw new UsageError(`Invalid port ${JSON.stringify(values.port)}`);
    return { name: 'serve', port, host: values.host ?? env.NOTION_RAG_HOST ?? '127.0.0.1' };
  }

  if (!rootId) throw new UsageError(`${name} needs a root entity id`);
  if (extra.length > 0) throw new UsageError(`Unexpected arguments: ${extra.join(' ')}`);

  switch (name) {
    case 'pull': {
      const reset = values.reset === true;
      const retryFailed = values['retry-failed'] === true;
      if (reset && retryFailed) throw new UsageError('--reset and --retry-failed cannot be combined');
      const rootType = ROOT_TYPES.find(t => t === (values.type ?? 'page'));
      if (!rootType) throw new UsageError(`--type must be one of ${ROOT_TYPES.join(', ')}`);
      return { name: 'pull', rootId, reset, retryFailed, rootType };
    }
    case 'parse':
      return { name: 'parse', rootId, partial: values.partial === true };
    case 'index':
      return { name: 'index', rootId, recreate: values.recreate === true };
    default:
      return { name: 'status', rootId };
  }
}

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const consoleIo: CliIo = {
  out: line => process.stdout.write(`${line}\n`),
  err: line => process.stderr.write(`${line}\n`)
};

export interface CliDeps {
  io?: CliIo;
  loadConfig?: () => Promise<IngestConfig>;
  pipeline?: (config: IngestConfig) => Pipeline;
  env?: NodeJS.ProcessEnv;
}

export const EXIT_INTERRUPTED = 130;

export function formatSummary(summary: PullSummary): string[] {
  const { counts } = summary;
  const lines = [
    `Pull of ${summary.rootId}: ${summary.runStatus} (root ${summary.rootStatus})`,
    `  success: ${counts.success}  partial: ${counts.partial}  failed: ${counts.failed}  pending: ${counts.pending + counts.in_progress}`
  ];
  if (summary.failed.length > 0) {
    lines.push('Failed nodes:');
    for (const f of summary.failed) lines.push(`  - ${f.id} (${f.nodeType}): ${f.error}`);
  }
  return lines;
}

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIo;
  const env = deps.env ?? process.env;
  try {
    const command = parseCommand(argv, env);
    if (command.name === 'help') {
      io.out(USAGE);
      return 0;
    }

    const config = await (deps.loadConfig ?? (() => new IngestConfigStore().load(env)))();
    setLogLevel(config.logLevel);
    const pipeline = (deps.pipeline ?? createPipeline)(config);

    switch (command.name) {
      case 'pull': {
        const controller = new AbortController();
        const onSignal = () => controller.abort();
        process.once('SIGINT', onSignal);
        process.once('SIGTERM', onSignal);
        try {
          const result = await pipeline.pull(command.rootId, {
            rootType: command.rootType,
            reset: command.reset,
            retryFailed: command.retryFailed,
            signal: controller.signal
          });
          formatSummary(result.summary).forEach(line => io.out(line));
          io.out(`  fetched this run: ${result.fetched.length}`);
          if (result.interrupted) {
            io.err('Interrupted; progress was saved. Run pull again to resume.');
            return EXIT_INTERRUPTED;
          }
          return 0;
        } finally {
          process.off('SIGINT', onSignal);
          process.off('SIGTERM', onSignal);
        }
      }
      case 'parse': {
        const result = await pipeline.parse(command.rootId, { partial: command.partial });
        io.out(`Parsed ${result.records.length} records into ${result.outputFile}`);
        if (result.skipped.length > 0) io.out(`Skipped ${result.skipped.length} nodes that were not fetched completely`);
        if (result.schema.conflicts.length > 0) {
          io.out(`Properties with differing types across records: ${result.schema.conflicts.join(', ')}`);
        }
        return 0;
      }
      case 'index': {
        const result = await pipeline.index(command.rootId, { recreate: command.recreate });
        io.out(`Indexed ${result.chunks} chunks from ${result.records} records (${result.total} rows in table)`);
        return 0;
      }
      case 'status': {
        const summary = await pipeline.status(command.rootId);
        if (!summary) {
          io.err(`No pull state for ${command.rootId}`);
          return 1;
        }
        formatSummary(summary).forEach(line => io.out(line));
        return 0;
      }
      case 'serve': {
        const app = buildServer({ pipeline, adminApiKey: env.ADMIN_API_KEY });
        await app.listen({ port: command.port, host: command.host });
        io.out(`notion-rag admin server listening on ${command.host}:${command.port}`);
        await new Promise<void>(resolve => {
          process.once('SIGINT', resolve);
          process.once('SIGTERM', resolve);
        });
        await app.close();
        return 0;
      }
    }
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(`Error: ${err.message}`);
      io.err(USAGE);
      return 1;
    }
    if (err instanceof CorruptStateError) {
      io.err(`Error: ${err.message}`);
      io.err('Pass --reset to discard it and start over.');
      return 1;
    }
    if (err instanceof IngestError) {
      io.err(`Error: ${err.message}`);
      return 1;
    }
    logError({ err, msg: 'cli.failed' });
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
