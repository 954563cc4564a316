import type { NodeRef } from '@notion-rag/shared';
import { ConfigError, FetchError } from '../errors.js';
import type { ApiRequest, RateLimitedClient } from '../ingest/rate-limited-client.js';
import { getArray, getRecord, getString, isRecord } from '../validation.js';
import type { ContentSource, RemoteNode, RetrieveRequest } from './interfaces.js';

const PAGE_SIZE = 100;

/** Accepts a dashed or compact UUID and returns the dashed lowercase form the API returns. */
export function normalizeNotionId(raw: string): string {
  const compact = raw.trim().toLowerCase().replace(/-/g, '');
  if (!/^[0-9a-f]{32}$/.test(compact)) {
    throw new ConfigError(`expected a UUID entity id, got ${JSON.stringify(raw)}`);
  }
  return [
    compact.slice(0, 8),
    compact.slice(8, 12),
    compact.slice(12, 16),
    compact.slice(16, 20),
    compact.slice(20)
  ].join('-');
}

/**
 * Maps `{id, nodeType}` requests onto the Notion REST API. Every HTTP call
 * goes through the shared RateLimitedClient.
 *
 * Stored content per node type:
 *  - page / database_row: `{ page, blocks }`
 *  - block: `{ block, blocks }`
 *  - database: `{ database, rows }`
 */
export class NotionSource implements ContentSource {
  constructor(private readonly client: RateLimitedClient) {}

  getName(): string {
    return 'notion';
  }

  async retrieve(request: RetrieveRequest): Promise<RemoteNode> {
    const { id, nodeType, signal } = request;
    switch (nodeType) {
      case 'page':
      case 'database_row': {
        const page = await this.call({ method: 'GET', path: `/v1/pages/${id}`, label: 'pages.retrieve', signal });
        const blocks = await this.listBlockChildren(id, signal);
        return { id, nodeType, parentId: parentIdOf(page), children: childRefs(blocks), content: { page, blocks } };
      }
      case 'block': {
        const block = await this.call({ method: 'GET', path: `/v1/blocks/${id}`, label: 'blocks.retrieve', signal });
        const blocks = block.has_children === true ? await this.listBlockChildren(id, signal) : [];
        return { id, nodeType, parentId: parentIdOf(block), children: childRefs(blocks), content: { block, blocks } };
      }
      case 'database': {
        const database = await this.call({ method: 'GET', path: `/v1/databases/${id}`, label: 'databases.retrieve', signal });
        const rows = await this.queryDatabase(id, signal);
        const children: NodeRef[] = rows.flatMap(r => {
          const rowId = getString(r, 'id');
          return rowId ? [{ id: rowId, nodeType: 'database_row' as const }] : [];
        });
        return { id, nodeType, parentId: parentIdOf(database), children, content: { database, rows } };
      }
    }
  }

  private async listBlockChildren(blockId: string, signal?: AbortSignal): Promise<Record<string, unknown>[]> {
    const all: Record<string, unknown>[] = [];
    let cursor: string | undefined;
    do {
      const query: Record<string, string> = { page_size: String(PAGE_SIZE) };
      if (cursor) query.start_cursor = cursor;
      const page = await this.call({
        method: 'GET',
        path: `/v1/blocks/${blockId}/children`,
        query,
        label: 'blocks.children.list',
        signal
      });
      all.push(...getArray(page, 'results').filter(isRecord));
      cursor = nextCursor(page);
    } while (cursor);
    return all;
  }

  private async queryDatabase(databaseId: string, signal?: AbortSignal): Promise<Record<string, unknown>[]> {
    const all: Record<string, unknown>[] = [];
    let cursor: string | undefined;
    do {
      const body: Record<string, unknown> = { page_size: PAGE_SIZE };
      if (cursor) body.start_cursor = cursor;
      const page = await this.call({
        method: 'POST',
        path: `/v1/databases/${databaseId}/query`,
        body,
        label: 'databases.query',
        signal
      });
      all.push(...getArray(page, 'results').filter(isRecord));
      cursor = nextCursor(page);
    } while (cursor);
    return all;
  }

  private async call(request: ApiRequest): Promise<Record<string, unknown>> {
    const result = await this.client.fetch(request);
    if (!result.ok) throw result.error;
    if (!isRecord(result.value)) {
      throw new FetchError('invalid_request', `${request.label ?? request.path}: response is not a JSON object`, 200, 1);
    }
    return result.value;
  }
}

function nextCursor(list: Record<string, unknown>): string | undefined {
  return list.has_more === true ? getString(list, 'next_cursor') || undefined : undefined;
}

function parentIdOf(entity: Record<string, unknown>): string | undefined {
  const parent = getRecord(entity, 'parent');
  if (!parent) return undefined;
  return getString(parent, 'page_id') ?? getString(parent, 'database_id') ?? getString(parent, 'block_id');
}

/** Blocks that are nodes of their own; leaf blocks stay inside the parent's payload. */
export function childRefs(blocks: Record<string, unknown>[]): NodeRef[] {
  const refs: NodeRef[] = [];
  for (const block of blocks) {
    const id = getString(block, 'id');
    if (!id) continue;
    const type = getString(block, 'type');
    if (type === 'child_page') refs.push({ id, nodeType: 'page' });
    else if (type === 'child_database') refs.push({ id, nodeType: 'database' });
    else if (block.has_children === true) refs.push({ id, nodeType: 'block' });
  }
  return refs;
}

export interface NotionClientSettings {
  baseUrl: string;
  token: string;
  version: string;
}

export function notionHeaders(settings: NotionClientSettings): Record<string, string> {
  return {
    authorization: `Bearer ${settings.token}`,
    'notion-version': settings.version,
    'user-agent': 'notion-rag/0.1'
  };
}
