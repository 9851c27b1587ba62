import * as E from 'fp-ts/lib/Either.js';
import { createStore, type StoreApi } from 'zustand/vanilla';
import type { Edge, EdgeId, EntityRef, GraphSnapshot, Node, NodeId } from '../types';
import type { SizeBounds } from '../core/config';
import { graphError, type GraphError } from '../core/errors';
import { edgeRef, nodeRef, refKey, sameEdge, sameNode } from '../core/entities';
import { scopedLogger, type Logger } from '../core/logger';

// A change carries the full entity (or before/after pair) so it can be inverted exactly.
export type GraphChange =
  | { kind: 'addNode'; node: Node }
  | { kind: 'removeNode'; node: Node }
  | { kind: 'updateNode'; before: Node; after: Node }
  | { kind: 'addEdge'; edge: Edge }
  | { kind: 'removeEdge'; edge: Edge }
  | { kind: 'updateEdge'; before: Edge; after: Edge };

export type Applied = {
  readonly version: number;
  readonly changes: readonly GraphChange[];
  /** Entities touched by the change set, deduplicated, in first-touch order. */
  readonly refs: readonly EntityRef[];
};

export type GraphState = {
  readonly snapshot: GraphSnapshot;
  /** node id -> ids of edges that start or end at it */
  readonly incidence: Readonly<Record<NodeId, readonly EdgeId[]>>;
};

export type ApplyListener = (applied: Applied) => void;

export function invertChange(change: GraphChange): GraphChange {
  switch (change.kind) {
    case 'addNode':
      return { kind: 'removeNode', node: change.node };
    case 'removeNode':
      return { kind: 'addNode', node: change.node };
    case 'updateNode':
      return { kind: 'updateNode', before: change.after, after: change.before };
    case 'addEdge':
      return { kind: 'removeEdge', edge: change.edge };
    case 'removeEdge':
      return { kind: 'addEdge', edge: change.edge };
    case 'updateEdge':
      return { kind: 'updateEdge', before: change.after, after: change.before };
  }
}

/** Inverse of a whole change list: each change inverted, applied last-to-first. */
export function invertChanges(changes: readonly GraphChange[]): GraphChange[] {
  const out: GraphChange[] = [];
  for (let i = changes.length - 1; i >= 0; i--) out.push(invertChange(changes[i]));
  return out;
}

function changeRef(change: GraphChange): EntityRef {
  switch (change.kind) {
    case 'addNode':
    case 'removeNode':
      return nodeRef(change.node.id);
    case 'updateNode':
      return nodeRef(change.after.id);
    case 'addEdge':
    case 'removeEdge':
      return edgeRef(change.edge.id);
    case 'updateEdge':
      return edgeRef(change.after.id);
  }
}

type WorkingCopy = {
  nodes: Record<NodeId, Node>;
  edges: Record<EdgeId, Edge>;
  incidence: Record<NodeId, readonly EdgeId[]>;
};

const emptySnapshot: GraphSnapshot = { nodes: {}, edges: {}, version: 0 };

/**
 * Authoritative graph state. All mutation goes through `apply`, which validates
 * the whole change list against a working copy and either commits all of it
 * with one version bump or nothing.
 */
export class GraphStore {
  readonly api: StoreApi<GraphState>;
  private readonly bounds: Pick<SizeBounds, 'min' | 'max'>;
  private readonly listeners = new Set<ApplyListener>();
  private readonly log: Logger;

  constructor(options: { bounds: Pick<SizeBounds, 'min' | 'max'>; logger?: Logger }) {
    this.bounds = options.bounds;
    this.log = scopedLogger('GraphStore', options.logger);
    this.api = createStore<GraphState>()(() => ({ snapshot: emptySnapshot, incidence: {} }));
  }

  read(): GraphSnapshot {
    return this.api.getState().snapshot;
  }

  get version(): number {
    return this.read().version;
  }

  getNode(id: NodeId): Node | undefined {
    return this.read().nodes[id];
  }

  getEdge(id: EdgeId): Edge | undefined {
    return this.read().edges[id];
  }

  /** Edges that start or end at `id`, in insertion order. */
  incidentEdges(id: NodeId): Edge[] {
    const { snapshot, incidence } = this.api.getState();
    const ids = incidence[id] ?? [];
    const out: Edge[] = [];
    for (const eid of ids) {
      const e = snapshot.edges[eid];
      if (e) out.push(e);
    }
    return out;
  }

  onApply(listener: ApplyListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  apply(changes: readonly GraphChange[]): E.Either<GraphError, Applied> {
    const state = this.api.getState();
    if (changes.length === 0) {
      return E.right({ version: state.snapshot.version, changes, refs: [] });
    }
    const work: WorkingCopy = {
      nodes: { ...state.snapshot.nodes },
      edges: { ...state.snapshot.edges },
      incidence: { ...state.incidence },
    };
    const refs = new Map<string, EntityRef>();
    for (const change of changes) {
      const err = this.applyToWorkingCopy(work, change);
      if (err) return E.left(err);
      const ref = changeRef(change);
      const key = refKey(ref);
      if (!refs.has(key)) refs.set(key, ref);
    }
    const version = state.snapshot.version + 1;
    this.api.setState({
      snapshot: { nodes: work.nodes, edges: work.edges, version },
      incidence: work.incidence,
    });
    const applied: Applied = { version, changes, refs: [...refs.values()] };
    this.notify(applied);
    return E.right(applied);
  }

  /**
   * Replace the whole graph with loaded records. Validated like a single apply
   * onto an empty graph; bumps the version but notifies no apply listeners.
   */
  hydrate(nodes: readonly Node[], edges: readonly Edge[]): E.Either<GraphError, GraphSnapshot> {
    const work: WorkingCopy = { nodes: {}, edges: {}, incidence: {} };
    for (const node of nodes) {
      const err = this.applyToWorkingCopy(work, { kind: 'addNode', node });
      if (err) return E.left(err);
    }
    for (const edge of edges) {
      const err = this.applyToWorkingCopy(work, { kind: 'addEdge', edge });
      if (err) return E.left(err);
    }
    const snapshot: GraphSnapshot = {
      nodes: work.nodes,
      edges: work.edges,
      version: this.read().version + 1,
    };
    this.api.setState({ snapshot, incidence: work.incidence });
    return E.right(snapshot);
  }

  private notify(applied: Applied): void {
    for (const listener of this.listeners) {
      try {
        listener(applied);
      } catch (err) {
        this.log.error('apply listener failed', err);
      }
    }
  }

  private checkGeometry(node: Node): GraphError | null {
    if (!Number.isFinite(node.x) || !Number.isFinite(node.y)) {
      return graphError('invalid-position', `Node ${node.id} has a non-finite position`, node.id);
    }
    const { min, max } = this.bounds;
    if (
      !(node.width >= min.width && node.width <= max.width) ||
      !(node.height >= min.height && node.height <= max.height)
    ) {
      return graphError(
        'invalid-size',
        `Node ${node.id} size ${node.width}x${node.height} is outside ${min.width}x${min.height}..${max.width}x${max.height}`,
        node.id,
      );
    }
    return null;
  }

  private applyToWorkingCopy(work: WorkingCopy, change: GraphChange): GraphError | null {
    switch (change.kind) {
      case 'addNode': {
        const { node } = change;
        if (work.nodes[node.id]) return graphError('duplicate-id', `Node ${node.id} already exists`, node.id);
        const geo = this.checkGeometry(node);
        if (geo) return geo;
        work.nodes[node.id] = node;
        work.incidence[node.id] = [];
        return null;
      }
      case 'removeNode': {
        const { node } = change;
        const current = work.nodes[node.id];
        if (!current) return graphError('missing-node', `Node ${node.id} does not exist`, node.id);
        if (!sameNode(current, node)) {
          return graphError('stale-state', `Node ${node.id} changed since it was captured`, node.id);
        }
        const incident = work.incidence[node.id] ?? [];
        if (incident.length > 0) {
          return graphError(
            'dangling-edge',
            `Node ${node.id} still has ${incident.length} incident edge(s)`,
            node.id,
          );
        }
        delete work.nodes[node.id];
        delete work.incidence[node.id];
        return null;
      }
      case 'updateNode': {
        const { before, after } = change;
        if (before.id !== after.id || before.createdAt !== after.createdAt) {
          return graphError('stale-state', `Node update must keep id and createdAt`, before.id);
        }
        const current = work.nodes[before.id];
        if (!current) return graphError('missing-node', `Node ${before.id} does not exist`, before.id);
        if (!sameNode(current, before)) {
          return graphError('stale-state', `Node ${before.id} changed since it was captured`, before.id);
        }
        const geo = this.checkGeometry(after);
        if (geo) return geo;
        work.nodes[after.id] = after;
        return null;
      }
      case 'addEdge': {
        const { edge } = change;
        if (work.edges[edge.id]) return graphError('duplicate-id', `Edge ${edge.id} already exists`, edge.id);
        if (edge.source === edge.target) {
          return graphError('invalid-edge', `Edge ${edge.id} connects node ${edge.source} to itself`, edge.id);
        }
        if (!work.nodes[edge.source] || !work.nodes[edge.target]) {
          return graphError('dangling-edge', `Edge ${edge.id} references a missing node`, edge.id);
        }
        work.edges[edge.id] = edge;
        work.incidence[edge.source] = [...(work.incidence[edge.source] ?? []), edge.id];
        work.incidence[edge.target] = [...(work.incidence[edge.target] ?? []), edge.id];
        return null;
      }
      case 'removeEdge': {
        const { edge } = change;
        const current = work.edges[edge.id];
        if (!current) return graphError('missing-edge', `Edge ${edge.id} does not exist`, edge.id);
        if (!sameEdge(current, edge)) {
          return graphError('stale-state', `Edge ${edge.id} changed since it was captured`, edge.id);
        }
        delete work.edges[edge.id];
        for (const end of [edge.source, edge.target]) {
          const ids = work.incidence[end];
          if (ids) work.incidence[end] = ids.filter((id) => id !== edge.id);
        }
        return null;
      }
      case 'updateEdge': {
        const { before, after } = change;
        if (
          before.id !== after.id ||
          before.source !== after.source ||
          before.target !== after.target ||
          before.createdAt !== after.createdAt
        ) {
          return graphError('invalid-edge', `Edge update must keep id, endpoints and createdAt`, before.id);
        }
        const current = work.edges[before.id];
        if (!current) return graphError('missing-edge', `Edge ${before.id} does not exist`, before.id);
        if (!sameEdge(current, before)) {
          return graphError('stale-state', `Edge ${before.id} changed since it was captured`, before.id);
        }
        work.edges[after.id] = after;
        return null;
      }
    }
  }
}
