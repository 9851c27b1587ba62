import type { CanvasDocument, Edge, EdgeId, Node, NodeId } from '../types';
import type { GraphStorage, StorageBatch } from './types';

/**
 * In-process storage with the same transactional contract as the IndexedDB
 * adapter. Records are deep-copied on the way in and out, as a real store would.
 */
export class MemoryGraphStorage implements GraphStorage {
  private readonly nodes = new Map<NodeId, Node>();
  private readonly edges = new Map<EdgeId, Edge>();
  private document: CanvasDocument | undefined;
  private closed = false;
  private commits = 0;

  async loadNodes(): Promise<unknown[]> {
    this.assertOpen();
    return [...this.nodes.values()].map((n) => structuredClone(n));
  }

  async loadEdges(): Promise<unknown[]> {
    this.assertOpen();
    return [...this.edges.values()].map((e) => structuredClone(e));
  }

  async loadDocument(): Promise<unknown> {
    this.assertOpen();
    return this.document === undefined ? undefined : structuredClone(this.document);
  }

  async commit(batch: StorageBatch): Promise<void> {
    this.assertOpen();
    // clone first so a bad record leaves the store untouched
    const nodes = batch.upsertNodes.map((n) => structuredClone(n));
    const edges = batch.upsertEdges.map((e) => structuredClone(e));
    const document = batch.document === undefined ? undefined : structuredClone(batch.document);
    for (const n of nodes) this.nodes.set(n.id, n);
    for (const e of edges) this.edges.set(e.id, e);
    for (const id of batch.deleteNodeIds) this.nodes.delete(id);
    for (const id of batch.deleteEdgeIds) this.edges.delete(id);
    if (document) this.document = document;
    this.commits++;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Number of committed transactions. */
  get commitCount(): number {
    return this.commits;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('MemoryGraphStorage is closed.');
  }
}
