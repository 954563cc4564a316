import fs from 'node:fs/promises';
import path from 'node:path';
import type { NodeRef, NodeType, RawRecord } from '@notion-rag/shared';
import type { RemoteNode } from '../sources/interfaces.js';
import { entityPaths, rawFileName } from './paths.js';
import { writeJsonAtomic } from './utils.js';

/**
 * Stores fetched nodes under {dataDir}/{rootId}/raw/, one file per node.
 * The body is derived from the node alone, so rewriting the same node after a
 * crash leaves the same bytes on disk.
 */
export class RawRecordWriter {
  constructor(private readonly dataDir: string) {}

  rawDir(rootId: string): string {
    return entityPaths(this.dataDir, rootId).rawDir;
  }

  /** Returns the file name relative to the raw dir. */
  async write(rootId: string, node: RemoteNode): Promise<string> {
    const name = rawFileName(node);
    const record: RawRecord = {
      id: node.id,
      nodeType: node.nodeType,
      parentId: node.parentId,
      childIds: node.children.map(c => c.id),
      content: node.content
    };
    await writeJsonAtomic(path.join(this.rawDir(rootId), name), record);
    return name;
  }

  async read(rootId: string, ref: NodeRef): Promise<RawRecord | undefined> {
    const file = path.join(this.rawDir(rootId), rawFileName(ref));
    let txt: string;
    try {
      txt = await fs.readFile(file, 'utf8');
    } catch (err: unknown) {
      if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') return undefined;
      throw err;
    }
    const parsed: unknown = JSON.parse(txt);
    if (!isRawRecord(parsed) || parsed.id !== ref.id) {
      throw new Error(`Raw record ${file} does not describe node ${ref.id}`);
    }
    return parsed;
  }
}

const NODE_TYPES: readonly string[] = ['page', 'block', 'database', 'database_row'] satisfies NodeType[];

function isRawRecord(value: unknown): value is RawRecord {
  if (typeof value !== 'object' || value === null) return false;
  const rec: Record<string, unknown> = { ...value };
  return (
    typeof rec.id === 'string' &&
    typeof rec.nodeType === 'string' &&
    NODE_TYPES.includes(rec.nodeType) &&
    Array.isArray(rec.childIds) &&
    'content' in rec
  );
}
