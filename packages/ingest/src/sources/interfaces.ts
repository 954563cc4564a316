import type { NodeRef, NodeType } from '@notion-rag/shared';

export interface RemoteNode {
  id: string;
  nodeType: NodeType;
  parentId?: string;
  children: NodeRef[]; // only children that are nodes of their own
  content: unknown; // raw payload, stored as-is
}

export interface RetrieveRequest extends NodeRef {
  signal?: AbortSignal;
}

/**
 * Remote content tree. Implementations throw FetchError for failures the
 * client gave up on; any other rejection is treated as a failed fetch too.
 */
export interface ContentSource {
  retrieve(request: RetrieveRequest): Promise<RemoteNode>;
  getName(): string;
}
