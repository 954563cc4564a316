import { config as dotenvConfig } from 'dotenv';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import fs from 'node:fs';
import { ConfigError } from './errors.js';

/**
 * Where `.env` is looked for, first match wins: `NOTION_RAG_ENV_FILE` when set
 * (it must exist), then the workspace root, then the working directory.
 * Sources sit in packages/ingest/src and builds in dist/ingest/src, so the
 * workspace root is three levels above either.
 */
export function resolveEnvFile(
  moduleDir: string,
  cwd: string,
  env: NodeJS.ProcessEnv,
  exists: (file: string) => boolean = fs.existsSync
): string | undefined {
  const explicit = env.NOTION_RAG_ENV_FILE?.trim();
  if (explicit) {
    const file = path.resolve(cwd, explicit);
    if (!exists(file)) throw new ConfigError(`NOTION_RAG_ENV_FILE points at ${file}, which does not exist`);
    return file;
  }
  return [path.resolve(moduleDir, '../../../.env'), path.resolve(cwd, '.env')].find(file => exists(file));
}

const envFile = resolveEnvFile(path.dirname(fileURLToPath(import.meta.url)), process.cwd(), process.env);
if (envFile) dotenvConfig({ path: envFile });
