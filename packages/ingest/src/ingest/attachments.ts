import fs from 'node:fs/promises';
import path from 'node:path';
import { IngestError, describeError } from '../errors.js';
import { logEvent } from '../logger.js';
import { blocksOf } from '../parsing/blocks.js';
import type { RemoteNode } from '../sources/interfaces.js';
import { getRecord, getString } from '../validation.js';
import { entityPaths } from './paths.js';
import { abortError, writeFileAtomic } from './utils.js';

export const ATTACHMENT_BLOCK_TYPES: readonly string[] = ['file', 'image', 'video', 'audio', 'pdf'];

export interface Attachment {
  blockId: string;
  url: string;
  fileName: string;
}

/** Reads a file's bytes; rejects on HTTP errors and timeouts. */
export type FileFetcher = (url: string) => Promise<Uint8Array>;

/**
 * Notion-hosted files in a node's blocks. External links are left alone, and
 * so are blocks without an id, which cannot be named uniquely on disk.
 */
export function attachmentsOf(content: unknown): Attachment[] {
  const out: Attachment[] = [];
  for (const block of blocksOf(content)) {
    const type = getString(block, 'type');
    const blockId = getString(block, 'id');
    if (!type || !blockId || !ATTACHMENT_BLOCK_TYPES.includes(type)) continue;
    const data = getRecord(block, type);
    if (!data || getString(data, 'type') !== 'file') continue;
    const hosted = getRecord(data, 'file');
    const url = hosted && getString(hosted, 'url');
    if (!url) continue;
    out.push({ blockId, url, fileName: attachmentFileName(blockId, type, url) });
  }
  return out;
}

// {blockId}_{name from the URL path}, or {blockId}.{blockType} when the path has none
export function attachmentFileName(blockId: string, blockType: string, url: string): string {
  const safeId = blockId.replace(/[^A-Za-z0-9-]/g, '');
  let base = '';
  try {
    const last = new URL(url).pathname.split('/').pop() ?? '';
    base = decodeURIComponent(last);
  } catch {
    base = '';
  }
  base = base.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '');
  return base ? `${safeId}_${base}` : `${safeId}.${blockType}`;
}

export function createFileFetcher(timeoutMs: number): FileFetcher {
  return async url => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetch(url, { signal: controller.signal });
      if (!res.ok) throw new IngestError(`HTTP ${res.status} downloading attachment`, 'ATTACHMENT_FAILED', { status: res.status });
      return new Uint8Array(await res.arrayBuffer());
    } finally {
      clearTimeout(timer);
    }
  };
}

export interface DownloadResult {
  saved: string[];
  skipped: string[]; // already on disk
  failed: string[];
}

/**
 * Saves the Notion-hosted attachments of fetched nodes under
 * {dataDir}/{rootId}/raw/files/. Files already on disk are kept, since the
 * signed URLs in older payloads expire. A failed download is logged and does
 * not fail the node.
 */
export class AttachmentDownloader {
  constructor(private readonly dataDir: string, private readonly fetchFile: FileFetcher) {}

  async download(rootId: string, node: RemoteNode, signal?: AbortSignal): Promise<DownloadResult> {
    const dir = entityPaths(this.dataDir, rootId).filesDir;
    const result: DownloadResult = { saved: [], skipped: [], failed: [] };

    for (const attachment of attachmentsOf(node.content)) {
      // Leaves the node unsettled so the next run fetches it again
      if (signal?.aborted) throw abortError();
      const file = path.join(dir, attachment.fileName);
      if (await hasContent(file)) {
        result.skipped.push(attachment.fileName);
        continue;
      }
      try {
        const bytes = await this.fetchFile(attachment.url);
        if (bytes.byteLength === 0) throw new IngestError('Downloaded attachment is empty', 'ATTACHMENT_FAILED');
        await writeFileAtomic(file, bytes);
        result.saved.push(attachment.fileName);
        logEvent('debug', 'pull.attachment.saved', { id: node.id, blockId: attachment.blockId, file: attachment.fileName, bytes: bytes.byteLength });
      } catch (err) {
        result.failed.push(attachment.fileName);
        logEvent('warn', 'pull.attachment.failed', { id: node.id, blockId: attachment.blockId, error: describeError(err) });
      }
    }
    return result;
  }
}

async function hasContent(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).size > 0;
  } catch (err: unknown) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') return false;
    throw err;
  }
}
