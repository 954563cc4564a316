import type { FlatRecord } from '@notion-rag/shared';
import { describe, expect, it } from 'vitest';
import { SimpleChunker } from '../retrieval/chunker.js';

function record(textContent: string): FlatRecord {
  return {
    sourceId: 'r1',
    nodeType: 'database_row',
    title: 'Task one',
    textContent,
    url: 'https://www.notion.so/r1',
    propertyBag: { Score: { type: 'number', value: 5 } },
    ancestryPath: ['Root page', 'Tasks']
  };
}

describe('SimpleChunker', () => {
  it('keeps a short record in one chunk', () => {
    const chunks = new SimpleChunker().chunkRecord(record('Task one\nPriority: High'));
    expect(chunks).toEqual([
      {
        id: 'r1#0',
        sourceId: 'r1',
        title: 'Task one',
        text: 'Task one\nPriority: High',
        url: 'https://www.notion.so/r1',
        ancestry: 'Root page / Tasks',
        properties: '{"Score":{"type":"number","value":5}}'
      }
    ]);
  });

  it('splits long text into overlapping windows', () => {
    const words = Array.from({ length: 12 }, (_, i) => `w${i + 1}`).join(' ');
    const chunks = new SimpleChunker({ targetChunkSize: 8, overlap: 4 }).chunkRecord(record(words));
    expect(chunks.map(c => c.id)).toEqual(['r1#0', 'r1#1', 'r1#2']);
    expect(chunks.map(c => c.text)).toEqual(['w1 w2 w3 w4 w5 w6', 'w4 w5 w6 w7 w8 w9', 'w7 w8 w9 w10 w11 w12']);
  });

  it('skips records without text', () => {
    expect(new SimpleChunker().chunkRecord(record('  \n '))).toEqual([]);
  });
});
