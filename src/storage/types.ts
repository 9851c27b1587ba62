import type { CanvasDocument, Edge, EdgeId, Node, NodeId } from '../types';

/** Everything one flush writes; committed in a single transaction. */
export type StorageBatch = {
  upsertNodes: Node[];
  upsertEdges: Edge[];
  deleteNodeIds: NodeId[];
  deleteEdgeIds: EdgeId[];
  /** Replaces the stored document when present. */
  document?: CanvasDocument;
};

/**
 * Transactional record store with `nodes` and `edges` collections keyed by id,
 * plus a single document record for canvas-level state. Loads return raw
 * records; callers validate them.
 */
export interface GraphStorage {
  loadNodes(): Promise<unknown[]>;
  loadEdges(): Promise<unknown[]>;
  /** Resolves with undefined when no document was ever saved. */
  loadDocument(): Promise<unknown>;
  commit(batch: StorageBatch): Promise<void>;
  close(): Promise<void>;
}
