export type NodeType = 'page' | 'block' | 'database' | 'database_row';

export interface NodeRef {
  id: string;
  nodeType: NodeType;
}

export type NodeStatus = 'pending' | 'in_progress' | 'success' | 'partial' | 'failed';

export type TerminalStatus = Extract<NodeStatus, 'success' | 'partial' | 'failed'>;

export interface NodeState {
  id: string;
  nodeType: NodeType;
  status: NodeStatus;
  parentId?: string;
  childrenIds?: string[]; // set once the node's own fetch succeeded
  fetchedAt?: string; // ISO8601, when the node's own fetch finished
  error?: string;
  errorKind?: string;
  rawPath?: string; // relative to the entity raw dir
}

// incomplete: the run stopped with never-attempted nodes left (retry-failed mode)
export type RunStatus = 'running' | 'completed' | 'completed_with_failures' | 'interrupted' | 'incomplete';

export interface PullStateSnapshot {
  version: 1;
  rootId: string;
  rootType: NodeType;
  status: RunStatus;
  startedAt: string;
  updatedAt: string;
  nodes: Record<string, NodeState>; // key = node id
}

export interface PullSummary {
  rootId: string;
  rootStatus: NodeStatus;
  runStatus: RunStatus;
  counts: Record<NodeStatus, number>;
  failed: Array<{ id: string; nodeType: NodeType; error: string }>;
}

export interface RawRecord {
  id: string;
  nodeType: NodeType;
  parentId?: string;
  childIds: string[];
  content: unknown;
}

// Tagged property values; the tag travels with the value per record
export type PropertyValue =
  | { type: 'title'; text: string }
  | { type: 'rich_text'; text: string }
  | { type: 'number'; value: number | null }
  | { type: 'checkbox'; value: boolean }
  | { type: 'select'; name: string | null }
  | { type: 'status'; name: string | null }
  | { type: 'multi_select'; names: string[] }
  | { type: 'date'; start: string | null; end: string | null }
  | { type: 'url'; value: string | null }
  | { type: 'email'; value: string | null }
  | { type: 'phone_number'; value: string | null }
  | { type: 'people'; names: string[] }
  | { type: 'relation'; ids: string[] }
  | { type: 'created_time'; value: string }
  | { type: 'last_edited_time'; value: string }
  | { type: 'unsupported'; rawType: string };

export type PropertyType = PropertyValue['type'];

export interface FlatRecord {
  sourceId: string;
  nodeType: Extract<NodeType, 'page' | 'database_row'>;
  title: string;
  textContent: string;
  url: string;
  propertyBag: Record<string, PropertyValue>;
  ancestryPath: string[]; // titles from the root down to the direct parent
  parentId?: string;
  lastEditedTime?: string;
}

export interface IndexChunk {
  id: string;
  sourceId: string;
  title: string;
  text: string;
  url: string;
  ancestry: string;
  properties: string; // JSON-encoded property bag
  vector?: number[];
  indexedAt?: string;
}
