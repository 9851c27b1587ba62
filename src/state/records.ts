import type { Edge, Node } from '../types';
import type { GraphChange } from './graphStore';
import { sameEdge, sameNode } from '../core/entities';

/** One user-visible mutation, with enough captured state to replay it both ways. */
export type MutationRecord =
  | { kind: 'createNode'; node: Node }
  /** `edges` are the incident edges removed with the node; undo restores them together. */
  | { kind: 'deleteNode'; node: Node; edges: readonly Edge[] }
  | { kind: 'updateNode'; before: Node; after: Node }
  | { kind: 'moveNode'; before: Node; after: Node }
  | { kind: 'createEdge'; edge: Edge }
  | { kind: 'deleteEdge'; edge: Edge }
  | { kind: 'updateEdge'; before: Edge; after: Edge };

export type CoalescableRecord = Extract<
  MutationRecord,
  { kind: 'updateNode' | 'moveNode' | 'updateEdge' }
>;

export function recordToChanges(record: MutationRecord): GraphChange[] {
  switch (record.kind) {
    case 'createNode':
      return [{ kind: 'addNode', node: record.node }];
    case 'deleteNode':
      return [
        ...record.edges.map((edge): GraphChange => ({ kind: 'removeEdge', edge })),
        { kind: 'removeNode', node: record.node },
      ];
    case 'updateNode':
    case 'moveNode':
      return [{ kind: 'updateNode', before: record.before, after: record.after }];
    case 'createEdge':
      return [{ kind: 'addEdge', edge: record.edge }];
    case 'deleteEdge':
      return [{ kind: 'removeEdge', edge: record.edge }];
    case 'updateEdge':
      return [{ kind: 'updateEdge', before: record.before, after: record.after }];
  }
}

export function recordsToChanges(records: readonly MutationRecord[]): GraphChange[] {
  return records.flatMap(recordToChanges);
}

export function isCoalescable(record: MutationRecord): record is CoalescableRecord {
  return record.kind === 'updateNode' || record.kind === 'moveNode' || record.kind === 'updateEdge';
}

/** Which of size, color and content an update touches, e.g. `size` or `color+content`. */
function updatedAspects(before: Node, after: Node): string {
  const aspects: string[] = [];
  if (before.width !== after.width || before.height !== after.height) aspects.push('size');
  if (before.color !== after.color) aspects.push('color');
  if (before.content.kind !== after.content.kind || !Object.is(before.content.payload, after.content.payload)) {
    aspects.push('content');
  }
  return aspects.join('+');
}

/**
 * Merge `next` into `prev` when both target the same entity with the same kind
 * and `next` continues exactly where `prev` left off. Node updates merge only
 * when they touch the same fields, so a resize drag is one step but a resize
 * followed by a recolor is two. Returns null otherwise.
 */
export function coalesceRecords(
  prev: MutationRecord,
  next: MutationRecord,
): CoalescableRecord | null {
  if (!isCoalescable(prev) || !isCoalescable(next)) return null;
  if (prev.kind === 'updateEdge' && next.kind === 'updateEdge') {
    if (prev.after.id !== next.before.id || !sameEdge(prev.after, next.before)) return null;
    return { kind: 'updateEdge', before: prev.before, after: next.after };
  }
  if (prev.kind === 'moveNode' && next.kind === 'moveNode') {
    if (prev.after.id !== next.before.id || !sameNode(prev.after, next.before)) return null;
    return { kind: 'moveNode', before: prev.before, after: next.after };
  }
  if (prev.kind === 'updateNode' && next.kind === 'updateNode') {
    if (prev.after.id !== next.before.id || !sameNode(prev.after, next.before)) return null;
    if (updatedAspects(prev.before, prev.after) !== updatedAspects(next.before, next.after)) return null;
    return { kind: 'updateNode', before: prev.before, after: next.after };
  }
  return null;
}
