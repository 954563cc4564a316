import fs from 'node:fs/promises';
import path from 'node:path';
import { ConfigError } from '../errors.js';
import { parseLevel, type Level } from '../logger.js';

export interface IngestConfig {
  notionToken: string;
  notionBaseUrl: string;
  notionVersion: string;
  dataDir: string;
  apiDelay: number; // seconds between call starts
  retryBaseDelay: number; // seconds, first backoff step
  maxRetries: number; // 0..20
  backoffFactor: number; // 1..10
  maxConcurrent: number; // 1..64
  checkpointEvery: number; // state transitions per save, 1..10000
  requestTimeout: number; // seconds
  logLevel: Level;
  llmBaseUrl: string;
  llmEmbedModel: string;
  embedBatchSize: number;
  downloadAttachments: boolean; // save Notion-hosted files under raw/files
  normalizeEmbeddings: boolean; // scale vectors to unit length before storing
}

// Keys as they appear in the JSON file; env names are the same, uppercased.
const FILE_KEYS = {
  notion_token: 'notionToken',
  notion_base_url: 'notionBaseUrl',
  notion_version: 'notionVersion',
  data_dir: 'dataDir',
  api_delay: 'apiDelay',
  retry_base_delay: 'retryBaseDelay',
  max_retries: 'maxRetries',
  backoff_factor: 'backoffFactor',
  max_concurrent: 'maxConcurrent',
  checkpoint_every: 'checkpointEvery',
  request_timeout: 'requestTimeout',
  log_level: 'logLevel',
  llm_base_url: 'llmBaseUrl',
  llm_embed_model: 'llmEmbedModel',
  embed_batch_size: 'embedBatchSize',
  download_attachments: 'downloadAttachments',
  normalize_embeddings: 'normalizeEmbeddings'
} as const satisfies Record<string, keyof IngestConfig>;

type FileKey = keyof typeof FILE_KEYS;

export const DEFAULTS: Readonly<IngestConfig> = {
  notionToken: '',
  notionBaseUrl: 'https://api.notion.com',
  notionVersion: '2022-06-28',
  dataDir: 'data',
  apiDelay: 1.0,
  retryBaseDelay: 1.0,
  maxRetries: 3,
  backoffFactor: 2.0,
  maxConcurrent: 5,
  checkpointEvery: 1,
  requestTimeout: 30,
  logLevel: 'info',
  llmBaseUrl: 'http://127.0.0.1:1234',
  llmEmbedModel: 'text-embedding-3-small',
  embedBatchSize: 16,
  downloadAttachments: true,
  normalizeEmbeddings: false
};

export type RawConfig = Partial<Record<FileKey, unknown>>;

/**
 * JSON config file with environment overrides. Later sources win:
 * defaults, then the file, then `API_DELAY`, `MAX_RETRIES`, ... from the env.
 */
export class IngestConfigStore {
  private file: string;

  constructor(baseDir: string = process.cwd(), filename = process.env.NOTION_RAG_CONFIG || 'notion-rag.config.json') {
    this.file = path.isAbsolute(filename) ? filename : path.resolve(baseDir, filename);
  }

  get filePath(): string {
    return this.file;
  }

  async load(env: NodeJS.ProcessEnv = process.env): Promise<IngestConfig> {
    let fromFile: RawConfig = {};
    try {
      const txt = await fs.readFile(this.file, 'utf8');
      fromFile = parseConfigFile(txt, this.file);
    } catch (err: unknown) {
      if (!isNotFound(err)) throw err;
    }
    return validate({ ...fromFile, ...readEnv(env) });
  }
}

function parseConfigFile(txt: string, file: string): RawConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(txt);
  } catch (err) {
    throw new ConfigError(`${file} is not valid JSON`, { cause: String(err) });
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`${file} must contain a JSON object`);
  }
  const out: RawConfig = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isFileKey(key)) out[key] = value;
  }
  return out;
}

function readEnv(env: NodeJS.ProcessEnv): RawConfig {
  const out: RawConfig = {};
  for (const key of Object.keys(FILE_KEYS)) {
    if (!isFileKey(key)) continue;
    const value = env[key.toUpperCase()];
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

function isFileKey(key: string): key is FileKey {
  return Object.prototype.hasOwnProperty.call(FILE_KEYS, key);
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export function validate(raw: RawConfig): IngestConfig {
  const num = (key: FileKey, fallback: number, lo: number, hi: number, integer: boolean): number => {
    const value = raw[key];
    if (value === undefined || value === null || value === '') return fallback;
    const n = Number(value);
    if (!Number.isFinite(n)) throw new ConfigError(`${key} must be a number, got ${JSON.stringify(value)}`);
    const clamped = Math.max(lo, Math.min(hi, n));
    return integer ? Math.floor(clamped) : clamped;
  };
  const str = (key: FileKey, fallback: string): string => {
    const value = raw[key];
    return value === undefined || value === null ? fallback : String(value).trim() || fallback;
  };

  const bool = (key: FileKey, fallback: boolean): boolean => {
    const value = raw[key];
    if (value === undefined || value === null || value === '') return fallback;
    if (typeof value === 'boolean') return value;
    const text = String(value).trim().toLowerCase();
    if (text === 'true' || text === '1') return true;
    if (text === 'false' || text === '0') return false;
    throw new ConfigError(`${key} must be true or false, got ${JSON.stringify(value)}`);
  };

  const apiDelay = num('api_delay', DEFAULTS.apiDelay, 0, 60, false);
  const rawLevel = raw.log_level;
  const logLevel = rawLevel === undefined ? DEFAULTS.logLevel : parseLevel(String(rawLevel));
  if (!logLevel) throw new ConfigError(`log_level must be one of error, warn, info, debug`);

  return {
    notionToken: str('notion_token', DEFAULTS.notionToken),
    notionBaseUrl: str('notion_base_url', DEFAULTS.notionBaseUrl).replace(/\/+$/, ''),
    notionVersion: str('notion_version', DEFAULTS.notionVersion),
    dataDir: str('data_dir', DEFAULTS.dataDir),
    apiDelay,
    // Backoff starts from the pacing delay unless set on its own
    retryBaseDelay: num('retry_base_delay', apiDelay, 0, 600, false),
    maxRetries: num('max_retries', DEFAULTS.maxRetries, 0, 20, true),
    backoffFactor: num('backoff_factor', DEFAULTS.backoffFactor, 1, 10, false),
    maxConcurrent: num('max_concurrent', DEFAULTS.maxConcurrent, 1, 64, true),
    checkpointEvery: num('checkpoint_every', DEFAULTS.checkpointEvery, 1, 10000, true),
    requestTimeout: num('request_timeout', DEFAULTS.requestTimeout, 1, 600, false),
    logLevel,
    llmBaseUrl: str('llm_base_url', DEFAULTS.llmBaseUrl).replace(/\/+$/, ''),
    llmEmbedModel: str('llm_embed_model', DEFAULTS.llmEmbedModel),
    embedBatchSize: num('embed_batch_size', DEFAULTS.embedBatchSize, 1, 256, true),
    downloadAttachments: bool('download_attachments', DEFAULTS.downloadAttachments),
    normalizeEmbeddings: bool('normalize_embeddings', DEFAULTS.normalizeEmbeddings)
  };
}

export function requireNotionToken(cfg: IngestConfig): string {
  if (!cfg.notionToken) throw new ConfigError('NOTION_TOKEN is not set');
  return cfg.notionToken;
}
