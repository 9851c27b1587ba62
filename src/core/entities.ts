import type { Edge, EntityRef, Node, NodeId, GraphSnapshot, ColorToken } from '../types';

export function nodeRef(id: NodeId): EntityRef {
  return { kind: 'node', id };
}

export function edgeRef(id: string): EntityRef {
  return { kind: 'edge', id };
}

/** Stable string key for sets and maps, e.g. `node:abc`. */
export function refKey(ref: EntityRef): string {
  return `${ref.kind}:${ref.id}`;
}

/** Field-by-field equality; content payload is compared by identity. */
export function sameNode(a: Node, b: Node): boolean {
  return (
    a.id === b.id &&
    a.x === b.x &&
    a.y === b.y &&
    a.width === b.width &&
    a.height === b.height &&
    a.color === b.color &&
    a.createdAt === b.createdAt &&
    a.updatedAt === b.updatedAt &&
    a.content.kind === b.content.kind &&
    Object.is(a.content.payload, b.content.payload)
  );
}

export function sameEdge(a: Edge, b: Edge): boolean {
  return (
    a.id === b.id &&
    a.source === b.source &&
    a.target === b.target &&
    a.color === b.color &&
    a.createdAt === b.createdAt
  );
}

/** Edge color, falling back to the source node's color when the edge has none. */
export function resolveEdgeColor(edge: Edge, snapshot: GraphSnapshot): ColorToken | undefined {
  return edge.color ?? snapshot.nodes[edge.source]?.color;
}
