import * as E from 'fp-ts/lib/Either.js';
import { createStore, type StoreApi } from 'zustand/vanilla';
import type { CanvasDocument, Edge, EntityRef, Node } from '../types';
import type { EditorConfig, SizeBounds } from '../core/config';
import { clampSize } from '../core/config';
import { edgeRef, nodeRef, refKey } from '../core/entities';
import { describeCause, ioError, type GraphError, type IOError } from '../core/errors';
import { scopedLogger, type Logger } from '../core/logger';
import type { GraphStore } from '../state/graphStore';
import { DocumentRecordSchema, EdgeRecordSchema, NodeRecordSchema, RecordIdSchema } from '../storage/schema';
import type { GraphStorage, StorageBatch } from '../storage/types';

export type PersistenceStatus = {
  readonly pendingCount: number;
  readonly flushing: boolean;
  readonly lastError: IOError | null;
  readonly lastFlushAt: number | null;
};

export type FlushReport = {
  readonly upserted: number;
  readonly deleted: number;
  readonly refs: readonly EntityRef[];
  /** Whether the canvas document was part of the commit. */
  readonly document: boolean;
};

export type LoadReport = {
  readonly nodes: number;
  readonly edges: number;
  /** Records that failed validation and were left out. */
  readonly skipped: number;
  /** Edges dropped because an endpoint was missing; their deletes are scheduled. */
  readonly prunedEdges: number;
  /**
   * Edges left out because an endpoint record exists but failed validation.
   * They stay in storage untouched.
   */
  readonly detachedEdges: number;
  /** Nodes whose stored size was outside bounds; the clamped size is scheduled. */
  readonly clampedNodes: number;
  /** Stored canvas document, or null when none was saved or it failed validation. */
  readonly document: CanvasDocument | null;
};

export type PersistenceCoordinatorOptions = {
  graph: GraphStore;
  storage: GraphStorage;
  config: EditorConfig['persistence'];
  bounds: Pick<SizeBounds, 'min' | 'max'>;
  logger?: Logger;
  now?: () => number;
};

type Timer = ReturnType<typeof setTimeout>;

const emptyReport: FlushReport = { upserted: 0, deleted: 0, refs: [], document: false };

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Write path from GraphStore to storage. Every successful apply lands in a
 * pending set keyed by entity; a trailing debounce turns bursts into one
 * transaction that writes each entity's latest state.
 */
export class PersistenceCoordinator {
  readonly status: StoreApi<PersistenceStatus>;
  private readonly graph: GraphStore;
  private readonly storage: GraphStorage;
  private readonly config: EditorConfig['persistence'];
  private readonly bounds: Pick<SizeBounds, 'min' | 'max'>;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly unsubscribe: () => void;

  private readonly pending = new Map<string, EntityRef>();
  private pendingDocument: CanvasDocument | null = null;
  private debounceTimer: Timer | null = null;
  private retryTimer: Timer | null = null;
  /** Start of the current burst; bounds the debounce by maxWaitMs. */
  private burstStartedAt: number | null = null;
  private retryDelay: number;
  private draining = false;
  private closed = false;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: PersistenceCoordinatorOptions) {
    this.graph = options.graph;
    this.storage = options.storage;
    this.config = options.config;
    this.bounds = options.bounds;
    this.log = scopedLogger('Persistence', options.logger);
    this.now = options.now ?? Date.now;
    this.retryDelay = options.config.retryInitialMs;
    this.status = createStore<PersistenceStatus>()(() => ({
      pendingCount: 0,
      flushing: false,
      lastError: null,
      lastFlushAt: null,
    }));
    this.unsubscribe = this.graph.onApply((applied) => {
      for (const ref of applied.refs) this.scheduleWrite(ref);
    });
  }

  get pendingCount(): number {
    return this.pending.size + (this.pendingDocument ? 1 : 0);
  }

  isClosed(): boolean {
    return this.closed;
  }

  scheduleWrite(ref: EntityRef): void {
    if (this.closed) {
      this.log.warn(`write for ${refKey(ref)} scheduled after close; dropped`);
      return;
    }
    this.pending.set(refKey(ref), ref);
    this.schedule();
  }

  /** Queue the canvas document; the latest one wins and goes out with the next flush. */
  scheduleDocument(document: CanvasDocument): void {
    if (this.closed) {
      this.log.warn('document write scheduled after close; dropped');
      return;
    }
    this.pendingDocument = document;
    this.schedule();
  }

  /** Commit everything pending in one transaction. Resolves with the outcome; never rejects. */
  flush(): Promise<E.Either<IOError, FlushReport>> {
    const run = this.tail.then(() => this.runFlush());
    this.tail = run;
    return run;
  }

  /**
   * Shutdown drain: flush until nothing is pending, sleeping through the
   * backoff between failed attempts. Has no timeout.
   */
  async flushAndWait(): Promise<void> {
    this.draining = true;
    try {
      for (;;) {
        this.clearTimers();
        const result = await this.flush();
        if (E.isLeft(result)) {
          await delay(this.nextBackoff());
          continue;
        }
        if (this.pendingCount === 0) return;
      }
    } finally {
      this.draining = false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await this.flushAndWait();
    this.closed = true;
    this.unsubscribe();
    this.clearTimers();
    await this.storage.close();
  }

  /**
   * Replace the graph with what storage holds. Invalid records are skipped,
   * out-of-bounds sizes clamped and edges with a missing endpoint pruned; the
   * repairs are scheduled so storage converges on the loaded graph. Edges
   * whose endpoint record is present but invalid are left out of the graph
   * and left alone in storage. Pending writes survive a failed load.
   */
  async load(): Promise<E.Either<IOError | GraphError, LoadReport>> {
    let rawNodes: unknown[];
    let rawEdges: unknown[];
    let rawDocument: unknown;
    try {
      rawNodes = await this.storage.loadNodes();
      rawEdges = await this.storage.loadEdges();
      rawDocument = await this.storage.loadDocument();
    } catch (err) {
      const e = ioError(`load failed: ${describeCause(err)}`, err, []);
      this.log.error(e.message);
      return E.left(e);
    }

    let skipped = 0;
    const nodes: Node[] = [];
    const clamped: EntityRef[] = [];
    // every id with a stored record, valid or not
    const storedNodeIds = new Set<string>();
    for (const raw of rawNodes) {
      const id = RecordIdSchema.safeParse(raw);
      if (id.success) storedNodeIds.add(id.data.id);
      const parsed = NodeRecordSchema.safeParse(raw);
      if (!parsed.success) {
        skipped++;
        this.log.warn('skipping invalid node record', parsed.error.issues[0]?.message);
        continue;
      }
      const node: Node = parsed.data;
      const size = clampSize(node, this.bounds);
      if (size.width !== node.width || size.height !== node.height) {
        nodes.push({ ...node, ...size });
        clamped.push(nodeRef(node.id));
      } else {
        nodes.push(node);
      }
    }

    const nodeIds = new Set(nodes.map((n) => n.id));
    const edges: Edge[] = [];
    const pruned: EntityRef[] = [];
    let detached = 0;
    for (const raw of rawEdges) {
      const parsed = EdgeRecordSchema.safeParse(raw);
      if (!parsed.success) {
        skipped++;
        this.log.warn('skipping invalid edge record', parsed.error.issues[0]?.message);
        continue;
      }
      const edge: Edge = parsed.data;
      if (edge.source === edge.target || !storedNodeIds.has(edge.source) || !storedNodeIds.has(edge.target)) {
        pruned.push(edgeRef(edge.id));
        continue;
      }
      if (!nodeIds.has(edge.source) || !nodeIds.has(edge.target)) {
        detached++;
        continue;
      }
      edges.push(edge);
    }

    let document: CanvasDocument | null = null;
    if (rawDocument !== undefined) {
      const parsed = DocumentRecordSchema.safeParse(rawDocument);
      if (parsed.success) document = parsed.data;
      else this.log.warn('ignoring invalid canvas document', parsed.error.issues[0]?.message);
    }

    const hydrated = this.graph.hydrate(nodes, edges);
    if (E.isLeft(hydrated)) {
      this.log.error('stored graph rejected:', hydrated.left.message);
      return hydrated;
    }

    if (this.pendingCount > 0) {
      this.log.warn(`discarding ${this.pendingCount} pending write(s) for the replaced graph`);
      this.pending.clear();
      this.pendingDocument = null;
    }
    this.clearTimers();
    this.status.setState({ pendingCount: this.pendingCount });

    if (pruned.length > 0) this.log.info(`pruned ${pruned.length} orphaned edge(s)`);
    if (detached > 0) this.log.warn(`left out ${detached} edge(s) attached to invalid node records`);
    for (const ref of [...clamped, ...pruned]) this.scheduleWrite(ref);

    return E.right({
      nodes: nodes.length,
      edges: edges.length,
      skipped,
      prunedEdges: pruned.length,
      detachedEdges: detached,
      clampedNodes: clamped.length,
      document,
    });
  }

  private async runFlush(): Promise<E.Either<IOError, FlushReport>> {
    this.clearTimers();
    if (this.pendingCount === 0) return E.right(emptyReport);

    const refs = [...this.pending.values()];
    const document = this.pendingDocument;
    this.pending.clear();
    this.pendingDocument = null;
    const batch = this.buildBatch(refs);
    if (document) batch.document = document;
    this.status.setState({ flushing: true, pendingCount: 0 });

    try {
      await this.storage.commit(batch);
    } catch (err) {
      // newer schedules for the same ref already sit in `pending`; keep them
      for (const ref of refs) {
        const key = refKey(ref);
        if (!this.pending.has(key)) this.pending.set(key, ref);
      }
      if (document && !this.pendingDocument) this.pendingDocument = document;
      const count = refs.length + (document ? 1 : 0);
      const e = ioError(`commit of ${count} record(s) failed: ${describeCause(err)}`, err, refs);
      this.log.error(e.message);
      this.status.setState({ flushing: false, lastError: e, pendingCount: this.pendingCount });
      if (!this.draining && !this.closed) this.armRetry();
      return E.left(e);
    }

    this.retryDelay = this.config.retryInitialMs;
    this.status.setState({
      flushing: false,
      lastError: null,
      lastFlushAt: this.now(),
      pendingCount: this.pendingCount,
    });
    // writes scheduled while the commit was in flight
    if (this.pendingCount > 0 && !this.draining) this.armDebounce();
    return E.right({
      upserted: batch.upsertNodes.length + batch.upsertEdges.length,
      deleted: batch.deleteNodeIds.length + batch.deleteEdgeIds.length,
      refs,
      document: document !== null,
    });
  }

  private buildBatch(refs: readonly EntityRef[]): StorageBatch {
    const snapshot = this.graph.read();
    const batch: StorageBatch = { upsertNodes: [], upsertEdges: [], deleteNodeIds: [], deleteEdgeIds: [] };
    for (const ref of refs) {
      if (ref.kind === 'node') {
        const node = snapshot.nodes[ref.id];
        if (node) batch.upsertNodes.push(node);
        else batch.deleteNodeIds.push(ref.id);
      } else {
        const edge = snapshot.edges[ref.id];
        if (edge) batch.upsertEdges.push(edge);
        else batch.deleteEdgeIds.push(ref.id);
      }
    }
    return batch;
  }

  private schedule(): void {
    this.status.setState({ pendingCount: this.pendingCount });
    // a failing store is retried on its own backoff schedule
    if (this.retryTimer) return;
    this.armDebounce();
  }

  private armDebounce(): void {
    const now = this.now();
    if (this.burstStartedAt === null) this.burstStartedAt = now;
    const untilMaxWait = Math.max(0, this.burstStartedAt + this.config.maxWaitMs - now);
    if (this.debounceTimer) clearTimeout(this.debounceTimer);
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      void this.flush();
    }, Math.min(this.config.debounceMs, untilMaxWait));
  }

  private armRetry(): void {
    const wait = this.nextBackoff();
    this.log.info(`retrying in ${wait}ms`);
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      void this.flush();
    }, wait);
  }

  private nextBackoff(): number {
    const wait = this.retryDelay;
    this.retryDelay = Math.min(wait * 2, this.config.retryMaxMs);
    return wait;
  }

  private clearTimers(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    this.burstStartedAt = null;
  }
}
