import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { PullStateSnapshot } from '@notion-rag/shared';
import { CorruptStateError } from '../errors.js';
import { PullState, PullStateStore } from '../ingest/state.js';
import { makeTempDir, page, removeDir } from './helpers.js';

function statuses(state: PullState): Record<string, string> {
  return Object.fromEntries(state.nodes().map(n => [n.id, n.status]));
}

describe('PullState', () => {
  it('promotes a parent once every child succeeded', () => {
    const state = PullState.create(page('root'));
    const first = state.mark('root', { status: 'success', children: [page('a'), page('b')] });
    expect(first.enqueue).toEqual(['a', 'b']);
    expect(state.get('root')?.status).toBe('in_progress');
    expect(state.get('root')?.childrenIds).toEqual(['a', 'b']);

    expect(state.mark('a', { status: 'success', children: [] }).settled).toEqual(['a']);
    expect(state.get('root')?.status).toBe('in_progress');
    expect(state.mark('b', { status: 'success', children: [] }).settled).toEqual(['b', 'root']);
    expect(state.rootStatus).toBe('success');
  });

  it('marks ancestors partial when a descendant fails, whatever the completion order', () => {
    const orders = [
      ['a', 'c', 'b'],
      ['b', 'c', 'a'],
      ['c', 'b', 'a']
    ];
    for (const order of orders) {
      const state = PullState.create(page('root'));
      state.mark('root', { status: 'success', children: [page('a'), page('b')] });
      state.mark('a', { status: 'success', children: [page('c')] });
      for (const id of order) {
        if (id === 'b') state.mark('b', { status: 'failed', error: 'FetchError: boom' });
        else if (id !== 'a') state.mark(id, { status: 'success', children: [] });
      }
      expect(statuses(state)).toEqual({ root: 'partial', a: 'success', b: 'failed', c: 'success' });
    }
  });

  it('leaves a leaf with no children success immediately', () => {
    const state = PullState.create(page('root'));
    const result = state.mark('root', { status: 'success', children: [] });
    expect(result).toEqual({ enqueue: [], settled: ['root'] });
    expect(state.rootStatus).toBe('success');
  });

  it('registers a shared child once and settles every parent with it', () => {
    const state = PullState.create(page('root'));
    state.mark('root', { status: 'success', children: [page('a'), page('b')] });
    expect(state.mark('a', { status: 'success', children: [page('s')] }).enqueue).toEqual(['s']);
    // Still pending: handed out again, the crawler's queue drops the duplicate
    expect(state.mark('b', { status: 'success', children: [page('s')] }).enqueue).toEqual(['s']);
    expect(state.rootStatus).toBe('in_progress');

    state.mark('s', { status: 'success', children: [] });
    expect(statuses(state)).toEqual({ root: 'success', a: 'success', b: 'success', s: 'success' });
  });

  it('counts an already terminal child immediately', () => {
    const state = PullState.create(page('root'));
    state.mark('root', { status: 'success', children: [page('a'), page('b')] });
    state.mark('a', { status: 'success', children: [] });
    const result = state.mark('b', { status: 'success', children: [page('a')] });
    expect(result.enqueue).toEqual([]);
    expect(statuses(state)).toEqual({ root: 'success', a: 'success', b: 'success' });
  });

  it('ignores edges that would close a cycle', () => {
    const state = PullState.create(page('root'));
    state.mark('root', { status: 'success', children: [page('a')] });
    const result = state.mark('a', { status: 'success', children: [page('root'), page('a')] });
    expect(result.enqueue).toEqual([]);
    expect(state.get('a')?.childrenIds).toEqual([]);
    expect(state.rootStatus).toBe('success');
  });

  it('selects resumable and failed nodes', () => {
    const state = PullState.create(page('root'));
    state.mark('root', { status: 'success', children: [page('a'), page('b'), page('c')] });
    state.mark('a', { status: 'failed', error: 'x' });
    state.mark('b', { status: 'in_progress' });
    expect(state.selectResumable()).toEqual(['a', 'c']);
    expect(state.selectFailed()).toEqual(['a']);
  });

  it('reopens failed nodes and their partial ancestors', () => {
    const state = PullState.create(page('root'));
    state.mark('root', { status: 'success', children: [page('a')] });
    state.mark('a', { status: 'success', children: [page('b')] });
    state.mark('b', { status: 'failed', error: 'x', errorKind: 'transport' });
    expect(statuses(state)).toEqual({ root: 'partial', a: 'partial', b: 'failed' });

    expect(state.reopen(['b', 'a'])).toEqual(['b']);
    expect(statuses(state)).toEqual({ root: 'in_progress', a: 'in_progress', b: 'pending' });
    expect(state.get('b')?.error).toBeUndefined();

    state.mark('b', { status: 'success', children: [] });
    expect(statuses(state)).toEqual({ root: 'success', a: 'success', b: 'success' });
  });

  it('refuses to move a terminal node back to pending', () => {
    const state = PullState.create(page('root'));
    state.mark('root', { status: 'success', children: [] });
    expect(() => state.mark('root', { status: 'pending' })).toThrow('Node root is already success');
  });

  it('summarises counts and failures', () => {
    const state = PullState.create(page('root'));
    state.mark('root', { status: 'success', children: [page('b'), page('a'), page('c')] });
    state.mark('b', { status: 'failed', error: 'FetchError: boom b' });
    state.mark('a', { status: 'failed', error: 'FetchError: boom a' });
    expect(state.summary()).toEqual({
      rootId: 'root',
      rootStatus: 'in_progress',
      runStatus: 'running',
      counts: { pending: 1, in_progress: 1, success: 0, partial: 0, failed: 2 },
      failed: [
        { id: 'a', nodeType: 'page', error: 'FetchError: boom a' },
        { id: 'b', nodeType: 'page', error: 'FetchError: boom b' }
      ]
    });
  });

  it('treats a node saved in flight as pending again', () => {
    const snapshot: PullStateSnapshot = {
      version: 1,
      rootId: 'root',
      rootType: 'page',
      status: 'running',
      startedAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-01-01T00:00:00.000Z',
      nodes: {
        root: { id: 'root', nodeType: 'page', status: 'in_progress', childrenIds: ['a', 'b'] },
        a: { id: 'a', nodeType: 'page', status: 'success', childrenIds: [], parentId: 'root' },
        b: { id: 'b', nodeType: 'page', status: 'in_progress', parentId: 'root' }
      }
    };
    const state = PullState.fromSnapshot(snapshot);
    expect(state.get('b')?.status).toBe('pending');
    expect(state.selectResumable()).toEqual(['b']);

    state.mark('b', { status: 'in_progress' });
    state.mark('b', { status: 'success', children: [] });
    expect(state.rootStatus).toBe('success');
  });

  it('settles a parent whose children all finished before the snapshot was taken', () => {
    const state = PullState.fromSnapshot({
      version: 1,
      rootId: 'root',
      rootType: 'page',
      status: 'interrupted',
      startedAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-01-01T00:00:00.000Z',
      nodes: {
        root: { id: 'root', nodeType: 'page', status: 'in_progress', childrenIds: ['a'] },
        a: { id: 'a', nodeType: 'page', status: 'failed', error: 'x' }
      }
    });
    expect(state.rootStatus).toBe('partial');
  });
});

describe('PullStateStore', () => {
  let dir: string;
  beforeEach(async () => {
    dir = await makeTempDir();
  });
  afterEach(async () => {
    await removeDir(dir);
  });

  it('returns undefined when no state was saved', async () => {
    const store = new PullStateStore(path.join(dir, 'raw', 'pull_state.json'));
    expect(await store.load()).toBeUndefined();
  });

  it('saves and loads the same assignment', async () => {
    const file = path.join(dir, 'raw', 'pull_state.json');
    const store = new PullStateStore(file);
    const state = PullState.create(page('root'), '2024-01-01T00:00:00.000Z');
    state.mark('root', { status: 'success', children: [page('a')], rawPath: 'page_root.json' });
    state.mark('a', { status: 'failed', error: 'boom', errorKind: 'not_found' });
    await store.save(state);

    const loaded = await store.load();
    expect(loaded?.toSnapshot()).toEqual(state.toSnapshot());
    expect(loaded?.rootStatus).toBe('partial');
    // No temp files left behind
    expect(await fs.readdir(path.dirname(file))).toEqual(['pull_state.json']);
  });

  it('rejects a file that is not JSON', async () => {
    const file = path.join(dir, 'pull_state.json');
    await fs.writeFile(file, '{"version": 1, ', 'utf8');
    await expect(new PullStateStore(file).load()).rejects.toBeInstanceOf(CorruptStateError);
  });

  it('rejects a structurally invalid file', async () => {
    const file = path.join(dir, 'pull_state.json');
    const snapshot = {
      version: 1,
      rootId: 'root',
      rootType: 'page',
      status: 'running',
      startedAt: 'x',
      updatedAt: 'x',
      nodes: { root: { id: 'root', nodeType: 'page', status: 'in_progress', childrenIds: ['ghost'] } }
    };
    await fs.writeFile(file, JSON.stringify(snapshot), 'utf8');
    await expect(new PullStateStore(file).load()).rejects.toThrow(
      `Pull state at ${file} cannot be read: node "root" lists unknown child "ghost"`
    );
  });

  it('rejects an unknown version', async () => {
    const file = path.join(dir, 'pull_state.json');
    await fs.writeFile(file, JSON.stringify({ version: 2 }), 'utf8');
    await expect(new PullStateStore(file).load()).rejects.toThrow('unsupported version 2');
  });

  it('reset removes the file', async () => {
    const file = path.join(dir, 'pull_state.json');
    const store = new PullStateStore(file);
    await store.save(PullState.create(page('root')));
    await store.reset();
    expect(await store.load()).toBeUndefined();
  });
});
