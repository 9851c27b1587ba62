import { describe, it, expect, vi } from 'vitest';
import * as E from 'fp-ts/lib/Either.js';
import { GraphStore, invertChanges, type GraphChange } from './graphStore';
import { silentLogger } from '../core/logger';
import type { Edge, Node } from '../types';

const bounds = { min: { width: 120, height: 80 }, max: { width: 1600, height: 1200 } };

function node(id: string, extra?: Partial<Node>): Node {
  return {
    id,
    x: 0,
    y: 0,
    width: 400,
    height: 160,
    content: { kind: 'note' },
    createdAt: 1,
    updatedAt: 1,
    ...extra,
  };
}

function edge(id: string, source: string, target: string): Edge {
  return { id, source, target, createdAt: 2 };
}

function createGraph() {
  return new GraphStore({ bounds, logger: silentLogger });
}

function errorCode(result: E.Either<{ code: string }, unknown>): string | null {
  return E.isLeft(result) ? result.left.code : null;
}

describe('GraphStore.apply', () => {
  it('commits a change set with exactly one version bump and reports touched refs', () => {
    const graph = createGraph();
    const result = graph.apply([
      { kind: 'addNode', node: node('a') },
      { kind: 'addNode', node: node('b') },
      { kind: 'addEdge', edge: edge('e1', 'a', 'b') },
    ]);

    expect(E.isRight(result)).toBe(true);
    expect(graph.version).toBe(1);
    if (E.isRight(result)) {
      expect(result.right.version).toBe(1);
      expect(result.right.refs).toEqual([
        { kind: 'node', id: 'a' },
        { kind: 'node', id: 'b' },
        { kind: 'edge', id: 'e1' },
      ]);
    }
    expect(graph.incidentEdges('a').map((e) => e.id)).toEqual(['e1']);
    expect(graph.incidentEdges('b').map((e) => e.id)).toEqual(['e1']);
  });

  it('applies nothing when any change in the set is invalid', () => {
    const graph = createGraph();
    graph.apply([{ kind: 'addNode', node: node('a') }]);

    const result = graph.apply([
      { kind: 'addNode', node: node('b') },
      { kind: 'addNode', node: node('a') },
    ]);

    expect(errorCode(result)).toBe('duplicate-id');
    expect(graph.getNode('b')).toBeUndefined();
    expect(graph.version).toBe(1);
  });

  it('treats an empty change list as a no-op', () => {
    const graph = createGraph();
    const result = graph.apply([]);
    expect(E.isRight(result)).toBe(true);
    expect(graph.version).toBe(0);
  });

  it('rejects removing a node that still has incident edges', () => {
    const graph = createGraph();
    graph.apply([
      { kind: 'addNode', node: node('a') },
      { kind: 'addNode', node: node('b') },
      { kind: 'addEdge', edge: edge('e1', 'a', 'b') },
    ]);

    expect(errorCode(graph.apply([{ kind: 'removeNode', node: node('a') }]))).toBe('dangling-edge');

    const cascade = graph.apply([
      { kind: 'removeEdge', edge: edge('e1', 'a', 'b') },
      { kind: 'removeNode', node: node('a') },
    ]);
    expect(E.isRight(cascade)).toBe(true);
    expect(graph.getNode('a')).toBeUndefined();
    expect(graph.getEdge('e1')).toBeUndefined();
    expect(graph.incidentEdges('b')).toEqual([]);
  });

  it('rejects an update whose before-state no longer matches', () => {
    const graph = createGraph();
    graph.apply([{ kind: 'addNode', node: node('a', { x: 10 }) }]);

    const result = graph.apply([
      { kind: 'updateNode', before: node('a', { x: 0 }), after: node('a', { x: 50 }) },
    ]);

    expect(errorCode(result)).toBe('stale-state');
    expect(graph.getNode('a')?.x).toBe(10);
  });

  it('validates geometry and edge endpoints', () => {
    const graph = createGraph();
    graph.apply([{ kind: 'addNode', node: node('a') }]);

    expect(errorCode(graph.apply([{ kind: 'addNode', node: node('tiny', { width: 50 }) }]))).toBe('invalid-size');
    expect(errorCode(graph.apply([{ kind: 'addNode', node: node('far', { x: Number.NaN }) }]))).toBe(
      'invalid-position',
    );
    expect(errorCode(graph.apply([{ kind: 'addEdge', edge: edge('loop', 'a', 'a') }]))).toBe('invalid-edge');
    expect(errorCode(graph.apply([{ kind: 'addEdge', edge: edge('e', 'a', 'ghost') }]))).toBe('dangling-edge');
    expect(errorCode(graph.apply([{ kind: 'removeEdge', edge: edge('e', 'a', 'ghost') }]))).toBe('missing-edge');
    expect(graph.version).toBe(1);
  });

  it('restores the previous graph when the inverse change list is applied', () => {
    const graph = createGraph();
    graph.apply([
      { kind: 'addNode', node: node('a') },
      { kind: 'addNode', node: node('b') },
    ]);
    const before = graph.read();

    const changes: GraphChange[] = [
      { kind: 'addEdge', edge: edge('e1', 'a', 'b') },
      { kind: 'updateNode', before: node('b'), after: node('b', { x: 30, updatedAt: 5 }) },
      { kind: 'removeEdge', edge: edge('e1', 'a', 'b') },
      { kind: 'removeNode', node: node('a') },
    ];
    expect(E.isRight(graph.apply(changes))).toBe(true);
    expect(E.isRight(graph.apply(invertChanges(changes)))).toBe(true);

    const after = graph.read();
    expect(after.nodes).toEqual(before.nodes);
    expect(after.edges).toEqual(before.edges);
    expect(after.version).toBe(before.version + 2);
  });

  it('never mutates a snapshot that was already handed out', () => {
    const graph = createGraph();
    graph.apply([{ kind: 'addNode', node: node('a') }]);
    const first = graph.read();

    graph.apply([{ kind: 'addNode', node: node('b') }]);

    expect(Object.keys(first.nodes)).toEqual(['a']);
    expect(first.version).toBe(1);
    expect(Object.keys(graph.read().nodes)).toEqual(['a', 'b']);
  });
});

describe('GraphStore listeners and hydrate', () => {
  it('notifies apply listeners and keeps going when one throws', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const graph = new GraphStore({ bounds, logger });
    const seen: number[] = [];
    graph.onApply(() => {
      throw new Error('listener exploded');
    });
    const off = graph.onApply((applied) => seen.push(applied.version));

    graph.apply([{ kind: 'addNode', node: node('a') }]);
    off();
    graph.apply([{ kind: 'addNode', node: node('b') }]);

    expect(seen).toEqual([1]);
    expect(graph.getNode('b')).toBeDefined();
    expect(logger.error).toHaveBeenCalledTimes(2);
    expect(logger.error.mock.calls[0][0]).toBe('[GraphStore]');
  });

  it('hydrate replaces the graph, bumps the version and notifies nobody', () => {
    const graph = createGraph();
    graph.apply([{ kind: 'addNode', node: node('old') }]);
    const listener = vi.fn();
    graph.onApply(listener);

    const result = graph.hydrate([node('a'), node('b')], [edge('e1', 'a', 'b')]);

    expect(E.isRight(result)).toBe(true);
    expect(Object.keys(graph.read().nodes)).toEqual(['a', 'b']);
    expect(graph.version).toBe(2);
    expect(graph.incidentEdges('a').map((e) => e.id)).toEqual(['e1']);
    expect(listener).not.toHaveBeenCalled();
  });

  it('hydrate leaves the graph untouched when the records are inconsistent', () => {
    const graph = createGraph();
    graph.apply([{ kind: 'addNode', node: node('keep') }]);

    const result = graph.hydrate([node('a')], [edge('e1', 'a', 'missing')]);

    expect(errorCode(result)).toBe('dangling-edge');
    expect(Object.keys(graph.read().nodes)).toEqual(['keep']);
  });
});
