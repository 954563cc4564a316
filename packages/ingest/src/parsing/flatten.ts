import fs from 'node:fs/promises';
import type { FlatRecord, NodeState, NodeStatus, NodeType, RawRecord } from '@notion-rag/shared';
import { PrerequisiteMissingError } from '../errors.js';
import { entityPaths } from '../ingest/paths.js';
import { RawRecordWriter } from '../ingest/record-writer.js';
import { PullStateStore } from '../ingest/state.js';
import { writeJsonAtomic } from '../ingest/utils.js';
import { logEvent } from '../logger.js';
import { getRecord, getString, isRecord } from '../validation.js';
import { blockText, blocksOf, isNestedBlockNode } from './blocks.js';
import {
  collectPropertySchema,
  databaseTitle,
  pagePropertiesOf,
  parseProperties,
  propertyText,
  titleOf,
  type PropertySchema
} from './properties.js';

export interface FlattenOptions {
  /** Flatten whatever succeeded even when the pull did not complete. */
  allowPartial?: boolean;
}

export interface SkippedNode {
  id: string;
  nodeType: NodeType;
  status: NodeStatus;
}

export interface FlattenResult {
  records: FlatRecord[];
  skipped: SkippedNode[];
  schema: PropertySchema;
  outputFile: string;
}

type IndexableType = FlatRecord['nodeType'];

function isIndexable(nodeType: NodeType): nodeType is IndexableType {
  return nodeType === 'page' || nodeType === 'database_row';
}

/**
 * Turns the raw tree of one entity into flat records, one per page or
 * database row, in depth-first pre-order from the root.
 */
export class FlattenStage {
  private readonly reader: RawRecordWriter;

  constructor(private readonly dataDir: string) {
    this.reader = new RawRecordWriter(dataDir);
  }

  async flatten(rootId: string, options: FlattenOptions = {}): Promise<FlattenResult> {
    const paths = entityPaths(this.dataDir, rootId);
    const state = await new PullStateStore(paths.stateFile).load();
    if (!state) {
      throw new PrerequisiteMissingError(`No pull state for ${rootId}; run pull first`, { rootId });
    }
    if (!(await exists(paths.rawDir))) {
      throw new PrerequisiteMissingError(`No raw data for ${rootId}; run pull first`, { rootId });
    }
    if (state.rootStatus !== 'success' && !options.allowPartial) {
      throw new PrerequisiteMissingError(
        `Pull of ${rootId} is ${state.rootStatus}; finish it or flatten with partial results allowed`,
        { rootId, rootStatus: state.rootStatus }
      );
    }

    const records: FlatRecord[] = [];
    const skipped: SkippedNode[] = [];
    const visited = new Set<string>();

    const visit = async (id: string, ancestry: string[]): Promise<void> => {
      if (visited.has(id)) return;
      visited.add(id);
      const node = state.get(id);
      if (!node) return;

      // Own fetch never succeeded: nothing of it is on disk and nothing below it is known
      if (!node.childrenIds) {
        if (isIndexable(node.nodeType)) skipped.push({ id, nodeType: node.nodeType, status: node.status });
        return;
      }

      const raw = await this.readRaw(rootId, node);
      let childAncestry = ancestry;
      if (isIndexable(node.nodeType)) {
        const record = await this.toRecord(rootId, node, node.nodeType, raw, ancestry);
        if (node.status === 'success') records.push(record);
        else skipped.push({ id, nodeType: node.nodeType, status: node.status });
        childAncestry = [...ancestry, record.title];
      } else if (node.nodeType === 'database') {
        const database = isRecord(raw.content) ? getRecord(raw.content, 'database') : undefined;
        childAncestry = [...ancestry, database ? databaseTitle(database) : ''];
      }

      for (const childId of node.childrenIds ?? []) {
        await visit(childId, childAncestry);
      }
    };

    await visit(state.rootId, []);
    // Nodes never reached through a fetched parent (none on a complete pull)
    for (const node of state.nodes()) {
      if (!visited.has(node.id) && isIndexable(node.nodeType)) {
        skipped.push({ id: node.id, nodeType: node.nodeType, status: node.status });
      }
    }

    const schema = collectPropertySchema(records.map(r => r.propertyBag));
    await writeJsonAtomic(paths.parsedFile, records);
    await writeJsonAtomic(paths.schemaFile, schema);

    logEvent(skipped.length > 0 ? 'warn' : 'info', 'parse.done', {
      rootId,
      rootStatus: state.rootStatus,
      records: records.length,
      skipped: skipped.length,
      propertyConflicts: schema.conflicts
    });
    return { records, skipped, schema, outputFile: paths.parsedFile };
  }

  private async readRaw(rootId: string, node: NodeState): Promise<RawRecord> {
    const raw = await this.reader.read(rootId, node);
    if (!raw) {
      throw new PrerequisiteMissingError(`Raw record for ${node.nodeType} ${node.id} is missing; pull again with reset`, {
        rootId,
        id: node.id
      });
    }
    return raw;
  }

  private async toRecord(
    rootId: string,
    node: NodeState,
    nodeType: IndexableType,
    raw: RawRecord,
    ancestry: string[]
  ): Promise<FlatRecord> {
    const page = isRecord(raw.content) ? getRecord(raw.content, 'page') ?? {} : {};
    const propertyBag = parseProperties(pagePropertiesOf(page));
    const title = titleOf(propertyBag);
    const lines = [title, ...propertyText(propertyBag), ...(await this.blockLines(rootId, blocksOf(raw.content)))];
    return {
      sourceId: node.id,
      nodeType,
      title,
      textContent: lines.filter(line => line.trim() !== '').join('\n'),
      url: getString(page, 'url') ?? '',
      propertyBag,
      ancestryPath: ancestry,
      parentId: node.parentId,
      lastEditedTime: getString(page, 'last_edited_time')
    };
  }

  // Block text in document order, descending into blocks stored as nodes of their own
  private async blockLines(rootId: string, blocks: Record<string, unknown>[]): Promise<string[]> {
    const lines: string[] = [];
    for (const block of blocks) {
      lines.push(blockText(block));
      const id = getString(block, 'id');
      if (!id || !isNestedBlockNode(block)) continue;
      const nested = await this.reader.read(rootId, { id, nodeType: 'block' });
      if (nested) lines.push(...(await this.blockLines(rootId, blocksOf(nested.content))));
    }
    return lines;
  }
}

async function exists(dir: string): Promise<boolean> {
  try {
    await fs.stat(dir);
    return true;
  } catch (err: unknown) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') return false;
    throw err;
  }
}

/** Reads the flat records a previous parse wrote. */
export async function readParsedRecords(dataDir: string, rootId: string): Promise<FlatRecord[] | undefined> {
  const file = entityPaths(dataDir, rootId).parsedFile;
  let txt: string;
  try {
    txt = await fs.readFile(file, 'utf8');
  } catch (err: unknown) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
  const parsed: unknown = JSON.parse(txt);
  if (!Array.isArray(parsed)) throw new Error(`${file} does not contain a record list`);
  return parsed.filter(isFlatRecord);
}

function isFlatRecord(value: unknown): value is FlatRecord {
  return (
    isRecord(value) &&
    typeof value.sourceId === 'string' &&
    typeof value.title === 'string' &&
    typeof value.textContent === 'string' &&
    isRecord(value.propertyBag) &&
    Array.isArray(value.ancestryPath)
  );
}
