import fs from 'node:fs/promises';
import type {
  NodeRef,
  NodeState,
  NodeStatus,
  NodeType,
  PullStateSnapshot,
  PullSummary,
  RunStatus,
  TerminalStatus
} from '@notion-rag/shared';
import { CorruptStateError } from '../errors.js';
import { writeJsonAtomic } from './utils.js';

export type MarkDetail =
  | { status: 'pending' }
  | { status: 'in_progress' }
  | { status: 'success'; children: NodeRef[]; rawPath?: string; at?: string }
  | { status: 'failed'; error: string; errorKind?: string; at?: string };

export interface MarkResult {
  /** Child ids that still need a fetch (unknown before, or pending). */
  enqueue: string[];
  /** Ids that entered a terminal status through this call, promotions included. */
  settled: string[];
}

export function isTerminal(status: NodeStatus): status is TerminalStatus {
  return status === 'success' || status === 'partial' || status === 'failed';
}

const NODE_TYPES: readonly NodeType[] = ['page', 'block', 'database', 'database_row'];
const NODE_STATUSES: readonly NodeStatus[] = ['pending', 'in_progress', 'success', 'partial', 'failed'];
const RUN_STATUSES: readonly RunStatus[] = ['running', 'completed', 'completed_with_failures', 'interrupted', 'incomplete'];

/**
 * Crawl progress for one root entity.
 *
 * A node reaches `success` only when its own fetch succeeded and every child
 * is `success`; any failure below leaves it `partial`. Each node waiting on
 * children keeps a counter of non-terminal children, decremented as children
 * settle, so promotion does not depend on the order fetches complete in.
 */
export class PullState {
  private readonly parents = new Map<string, Set<string>>();
  private readonly pendingChildren = new Map<string, number>();

  private constructor(private readonly data: PullStateSnapshot) {}

  static create(root: NodeRef, now = new Date().toISOString()): PullState {
    return new PullState({
      version: 1,
      rootId: root.id,
      rootType: root.nodeType,
      status: 'running',
      startedAt: now,
      updatedAt: now,
      nodes: { [root.id]: { id: root.id, nodeType: root.nodeType, status: 'pending' } }
    });
  }

  /**
   * Rebuilds the in-memory indexes from a persisted snapshot. A node saved as
   * in flight (in_progress without known children) was interrupted by a crash
   * and is treated as pending again.
   */
  static fromSnapshot(snapshot: PullStateSnapshot): PullState {
    const state = new PullState(snapshot);
    for (const node of Object.values(snapshot.nodes)) {
      if (node.status === 'in_progress' && !node.childrenIds) node.status = 'pending';
    }
    for (const node of Object.values(snapshot.nodes)) {
      for (const childId of node.childrenIds ?? []) state.link(node.id, childId);
    }
    state.recount();
    state.settleReady();
    return state;
  }

  get rootId(): string {
    return this.data.rootId;
  }

  get rootType(): NodeType {
    return this.data.rootType;
  }

  get runStatus(): RunStatus {
    return this.data.status;
  }

  get rootStatus(): NodeStatus {
    return this.get(this.data.rootId)?.status ?? 'pending';
  }

  get(id: string): NodeState | undefined {
    return this.data.nodes[id];
  }

  nodes(): NodeState[] {
    return Object.values(this.data.nodes);
  }

  setRunStatus(status: RunStatus, now = new Date().toISOString()): void {
    this.data.status = status;
    this.data.updatedAt = now;
  }

  /** Nodes the crawler must (re)visit: never attempted, interrupted or failed. */
  selectResumable(): string[] {
    return this.nodes()
      .filter(n => n.status === 'pending' || n.status === 'failed')
      .map(n => n.id);
  }

  /** Nodes whose own fetch failed. Pending nodes are left out on purpose. */
  selectFailed(): string[] {
    return this.nodes()
      .filter(n => n.status === 'failed')
      .map(n => n.id);
  }

  mark(id: string, detail: MarkDetail): MarkResult {
    const node = this.data.nodes[id];
    if (!node) throw new Error(`Unknown node ${id}`);
    const result: MarkResult = { enqueue: [], settled: [] };
    this.data.updatedAt = new Date().toISOString();

    switch (detail.status) {
      case 'pending':
      case 'in_progress':
        if (isTerminal(node.status)) throw new Error(`Node ${id} is already ${node.status}`);
        node.status = detail.status;
        return result;

      case 'failed':
        if (isTerminal(node.status)) return result;
        node.status = 'failed';
        node.error = detail.error;
        node.errorKind = detail.errorKind;
        node.fetchedAt = detail.at ?? this.data.updatedAt;
        delete node.childrenIds;
        result.settled.push(id);
        this.propagate(id, result);
        return result;

      case 'success': {
        if (isTerminal(node.status)) return result;
        node.fetchedAt = detail.at ?? this.data.updatedAt;
        node.rawPath = detail.rawPath;
        delete node.error;
        delete node.errorKind;
        const childrenIds = this.registerChildren(node, detail.children, result);
        node.childrenIds = childrenIds;
        node.status = 'in_progress';
        const waiting = childrenIds.filter(c => !isTerminal(this.statusOf(c))).length;
        this.pendingChildren.set(id, waiting);
        if (waiting === 0) this.resolve(id, result);
        return result;
      }
    }
  }

  /**
   * Sends failed nodes back to pending and re-opens every `partial` ancestor,
   * so a successful retry can promote the chain again.
   */
  reopen(ids: Iterable<string>): string[] {
    const reopened: string[] = [];
    const stack: string[] = [];
    for (const id of ids) {
      const node = this.data.nodes[id];
      if (!node || node.status !== 'failed') continue;
      node.status = 'pending';
      delete node.error;
      delete node.errorKind;
      delete node.fetchedAt;
      reopened.push(id);
      stack.push(id);
    }
    const seen = new Set<string>();
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      for (const parentId of this.parents.get(id) ?? []) {
        const parent = this.data.nodes[parentId];
        if (parent && parent.status === 'partial') {
          parent.status = 'in_progress';
          stack.push(parentId);
        }
      }
    }
    if (reopened.length > 0) this.recount();
    return reopened;
  }

  summary(): PullSummary {
    const counts: Record<NodeStatus, number> = { pending: 0, in_progress: 0, success: 0, partial: 0, failed: 0 };
    const failed: PullSummary['failed'] = [];
    for (const node of this.nodes()) {
      counts[node.status]++;
      if (node.status === 'failed') {
        failed.push({ id: node.id, nodeType: node.nodeType, error: node.error ?? 'unknown error' });
      }
    }
    failed.sort((a, b) => a.id.localeCompare(b.id));
    return { rootId: this.rootId, rootStatus: this.rootStatus, runStatus: this.runStatus, counts, failed };
  }

  toSnapshot(): PullStateSnapshot {
    return this.data;
  }

  private statusOf(id: string): NodeStatus {
    return this.data.nodes[id]?.status ?? 'pending';
  }

  private registerChildren(node: NodeState, children: NodeRef[], result: MarkResult): string[] {
    const ids: string[] = [];
    for (const child of children) {
      if (ids.includes(child.id)) continue;
      // An edge back to the node itself or one of its ancestors would never settle
      if (child.id === node.id || this.isAncestor(child.id, node.id)) continue;
      let existing = this.data.nodes[child.id];
      if (!existing) {
        existing = { id: child.id, nodeType: child.nodeType, status: 'pending', parentId: node.id };
        this.data.nodes[child.id] = existing;
      }
      this.link(node.id, child.id);
      ids.push(child.id);
      if (existing.status === 'pending') result.enqueue.push(child.id);
    }
    return ids;
  }

  private link(parentId: string, childId: string): void {
    let set = this.parents.get(childId);
    if (!set) {
      set = new Set();
      this.parents.set(childId, set);
    }
    set.add(parentId);
  }

  private isAncestor(candidate: string, of: string): boolean {
    const seen = new Set<string>();
    const stack = [of];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      for (const parentId of this.parents.get(id) ?? []) {
        if (parentId === candidate) return true;
        stack.push(parentId);
      }
    }
    return false;
  }

  private isWaiting(node: NodeState): boolean {
    return node.status === 'in_progress' && node.childrenIds !== undefined;
  }

  private recount(): void {
    this.pendingChildren.clear();
    for (const node of this.nodes()) {
      if (!this.isWaiting(node)) continue;
      const waiting = (node.childrenIds ?? []).filter(c => !isTerminal(this.statusOf(c))).length;
      this.pendingChildren.set(node.id, waiting);
    }
  }

  private settleReady(): void {
    const result: MarkResult = { enqueue: [], settled: [] };
    for (const [id, waiting] of [...this.pendingChildren]) {
      const node = this.data.nodes[id];
      if (waiting === 0 && node && this.isWaiting(node)) this.resolve(id, result);
    }
  }

  private resolve(id: string, result: MarkResult): void {
    const node = this.data.nodes[id];
    if (!node || !this.isWaiting(node)) return;
    const allSucceeded = (node.childrenIds ?? []).every(c => this.statusOf(c) === 'success');
    node.status = allSucceeded ? 'success' : 'partial';
    this.pendingChildren.delete(id);
    result.settled.push(id);
    this.propagate(id, result);
  }

  // Called once per child entering a terminal status
  private propagate(childId: string, result: MarkResult): void {
    for (const parentId of this.parents.get(childId) ?? []) {
      const waiting = this.pendingChildren.get(parentId);
      if (waiting === undefined) continue;
      const next = waiting - 1;
      this.pendingChildren.set(parentId, next);
      if (next <= 0) this.resolve(parentId, result);
    }
  }
}

/** Load/save of the pull state file for one entity. */
export class PullStateStore {
  constructor(private readonly file: string) {}

  get filePath(): string {
    return this.file;
  }

  async load(): Promise<PullState | undefined> {
    let txt: string;
    try {
      txt = await fs.readFile(this.file, 'utf8');
    } catch (err: unknown) {
      if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') return undefined;
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(txt);
    } catch (err) {
      throw new CorruptStateError(this.file, err instanceof Error ? err.message : String(err));
    }
    if (!isSnapshot(parsed)) {
      throw new CorruptStateError(this.file, checkSnapshot(parsed) ?? 'unexpected shape');
    }
    return PullState.fromSnapshot(parsed);
  }

  async save(state: PullState): Promise<void> {
    await writeJsonAtomic(this.file, state.toSnapshot());
  }

  async reset(): Promise<void> {
    await fs.rm(this.file, { force: true });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(value: unknown, allowed: readonly T[]): value is T {
  return typeof value === 'string' && allowed.some(a => a === value);
}

function isNodeState(value: unknown): value is NodeState {
  if (!isRecord(value)) return false;
  if (typeof value.id !== 'string' || !isOneOf(value.nodeType, NODE_TYPES) || !isOneOf(value.status, NODE_STATUSES)) {
    return false;
  }
  const children = value.childrenIds;
  return children === undefined || (Array.isArray(children) && children.every(c => typeof c === 'string'));
}

function isSnapshot(value: unknown): value is PullStateSnapshot {
  return checkSnapshot(value) === undefined;
}

function checkSnapshot(value: unknown): string | undefined {
  if (!isRecord(value)) return 'not a JSON object';
  if (value.version !== 1) return `unsupported version ${JSON.stringify(value.version)}`;
  if (typeof value.rootId !== 'string' || !value.rootId) return 'missing rootId';
  if (!isOneOf(value.rootType, NODE_TYPES)) return 'invalid rootType';
  if (!isOneOf(value.status, RUN_STATUSES)) return 'invalid run status';
  if (typeof value.startedAt !== 'string' || typeof value.updatedAt !== 'string') return 'missing timestamps';
  if (!isRecord(value.nodes)) return 'missing nodes';
  const nodes = value.nodes;
  for (const [id, node] of Object.entries(nodes)) {
    if (!isNodeState(node) || node.id !== id) return `invalid node entry ${JSON.stringify(id)}`;
    const dangling = (node.childrenIds ?? []).find(c => !(c in nodes));
    if (dangling !== undefined) return `node ${JSON.stringify(id)} lists unknown child ${JSON.stringify(dangling)}`;
  }
  if (!(value.rootId in nodes)) return 'root node missing';
  return undefined;
}
