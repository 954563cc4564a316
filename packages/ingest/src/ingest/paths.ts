import path from 'node:path';
import type { NodeRef } from '@notion-rag/shared';

// Every artifact of one root entity lives under {dataDir}/{rootId}/
export interface EntityPaths {
  entityDir: string;
  rawDir: string;
  filesDir: string; // downloaded attachments
  stateFile: string;
  parsedDir: string;
  parsedFile: string;
  schemaFile: string;
  indexDir: string;
}

const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export function assertSafeId(id: string): string {
  if (!SAFE_ID.test(id)) {
    throw new Error(`Unsafe entity id for storage: ${JSON.stringify(id)}`);
  }
  return id;
}

export function entityPaths(dataDir: string, rootId: string): EntityPaths {
  const entityDir = path.resolve(dataDir, assertSafeId(rootId));
  const rawDir = path.join(entityDir, 'raw');
  const parsedDir = path.join(entityDir, 'parsed');
  return {
    entityDir,
    rawDir,
    filesDir: path.join(rawDir, 'files'),
    stateFile: path.join(rawDir, 'pull_state.json'),
    parsedDir,
    parsedFile: path.join(parsedDir, 'parsed_records.json'),
    schemaFile: path.join(parsedDir, 'property_schema.json'),
    indexDir: path.join(entityDir, 'index.lancedb')
  };
}

export function rawFileName(ref: NodeRef): string {
  return `${ref.nodeType}_${assertSafeId(ref.id)}.json`;
}
