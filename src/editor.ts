import * as E from 'fp-ts/lib/Either.js';
import { nanoid } from 'nanoid';
import type { StoreApi } from 'zustand/vanilla';
import type {
  CanvasDocument,
  ColorToken,
  Edge,
  EdgeId,
  EdgePatch,
  GraphSnapshot,
  Node,
  NodeId,
  NodePatch,
  Point,
  Size,
} from './types';
import { clampSize, resolveConfig, type EditorConfig, type EditorConfigInput } from './core/config';
import { sameEdge, sameNode } from './core/entities';
import { graphError, type GraphError, type IOError } from './core/errors';
import { scopedLogger, type Logger } from './core/logger';
import { createCameraStore, type CameraStore } from './state/camera';
import type { Camera } from './core/coords';
import { GraphStore, type Applied } from './state/graphStore';
import { createMutationLog, type MutationLog } from './state/mutationLog';
import { recordsToChanges, type MutationRecord } from './state/records';
import { createSelectionStore, type SelectionState } from './state/selection';
import { PersistenceCoordinator, type FlushReport, type LoadReport } from './persistence/coordinator';
import { MemoryGraphStorage } from './storage/memory';
import type { GraphStorage } from './storage/types';
import { EventRouter } from './input/eventRouter';
import { InputController } from './input/inputController';
import { SurfaceRegistry } from './input/surfaces';

export type CanvasEditorOptions = {
  /** Defaults to an in-memory store. */
  storage?: GraphStorage;
  config?: EditorConfigInput;
  logger?: Logger;
  now?: () => number;
  createId?: () => string;
};

export type CreateNodeOptions = {
  /** Caller-chosen id; rejected with `duplicate-id` if taken. */
  id?: NodeId;
  size?: Partial<Size>;
  color?: ColorToken;
  payload?: unknown;
};

export type CreateEdgeOptions = {
  id?: EdgeId;
  /** Defaults to the source node's color. */
  color?: ColorToken;
};

/** Where a child lands relative to its parent: right of it, a little lower. */
const CHILD_GAP_X = 50;
const CHILD_OFFSET_Y = 100;

/**
 * Editing surface over the graph. Each mutation is applied, then recorded for
 * undo; persistence picks up every successful apply on its own.
 *
 * ```ts
 * const editor = new CanvasEditor({ storage: new IndexedDbGraphStorage({ name: 'board-1' }) });
 * await editor.load();
 * const id = editor.createNode({ x: 0, y: 0 }, 'note');
 * ```
 */
export class CanvasEditor {
  readonly config: EditorConfig;
  readonly graph: GraphStore;
  readonly history: MutationLog;
  readonly selection: SelectionState;
  readonly persistence: PersistenceCoordinator;
  readonly surfaces: SurfaceRegistry;
  readonly router: EventRouter;
  readonly camera: StoreApi<CameraStore>;
  readonly input: InputController;
  private readonly storage: GraphStorage;
  private readonly now: () => number;
  private readonly createId: () => string;
  private readonly log: Logger;
  private readonly unsubscribe: () => void;
  private clipboard: Node | null = null;

  constructor(options: CanvasEditorOptions = {}) {
    this.config = resolveConfig(options.config);
    this.now = options.now ?? Date.now;
    this.createId = options.createId ?? nanoid;
    this.storage = options.storage ?? new MemoryGraphStorage();
    const logger = options.logger;
    this.log = scopedLogger('CanvasEditor', logger);

    this.graph = new GraphStore({ bounds: this.config.nodeSize, logger });
    this.history = createMutationLog({ graph: this.graph, config: this.config.history, now: this.now, logger });
    this.selection = createSelectionStore({ logger });
    this.persistence = new PersistenceCoordinator({
      graph: this.graph,
      storage: this.storage,
      config: this.config.persistence,
      bounds: this.config.nodeSize,
      now: this.now,
      logger,
    });
    this.surfaces = new SurfaceRegistry();
    this.router = new EventRouter({
      selection: this.selection,
      surfaces: this.surfaces,
      config: this.config.routing,
      logger,
    });
    this.camera = createCameraStore(this.config.camera);
    this.input = new InputController({
      router: this.router,
      surfaces: this.surfaces,
      camera: this.camera,
      zoomSensitivity: this.config.camera.wheelZoomSensitivity,
      logger,
    });

    // a selected node that disappears (delete, undo of create) drops the selection
    this.unsubscribe = this.graph.onApply(() => {
      const selected = this.selection.getState().selectedNodeId;
      if (selected !== null && !this.graph.getNode(selected)) this.selection.getState().select(null);
    });
  }

  snapshot(): GraphSnapshot {
    return this.graph.read();
  }

  // ─── Nodes ───────────────────────────────────────────

  createNode(position: Point, kind: string, options?: CreateNodeOptions): E.Either<GraphError, NodeId> {
    const node = this.buildNode(position, kind, options);
    return E.map(() => node.id)(this.commit({ kind: 'createNode', node }));
  }

  /**
   * Create a node beside `parentId`, linked from it by an edge in the parent's
   * color, and select it. One undo step removes both.
   */
  createChildNode(parentId: NodeId, kind?: string, options?: CreateNodeOptions): E.Either<GraphError, NodeId> {
    const parent = this.graph.getNode(parentId);
    if (!parent) return E.left(graphError('missing-node', `Node ${parentId} does not exist`, parentId));
    const child = this.buildNode(
      { x: parent.x + parent.width + CHILD_GAP_X, y: parent.y + CHILD_OFFSET_Y },
      kind ?? parent.content.kind,
      options,
    );
    const edge = this.buildEdge(parentId, child.id, { color: parent.color });
    const result = this.commitAll(
      [
        { kind: 'createNode', node: child },
        { kind: 'createEdge', edge },
      ],
      'create child',
    );
    if (E.isLeft(result)) return result;
    this.selection.getState().select(child.id);
    return E.right(child.id);
  }

  /** Resize, recolor or replace content. Sizes are clamped to the configured bounds. */
  updateNode(id: NodeId, patch: NodePatch): E.Either<GraphError, Node> {
    const before = this.graph.getNode(id);
    if (!before) return E.left(graphError('missing-node', `Node ${id} does not exist`, id));
    const size = clampSize(
      { width: patch.width ?? before.width, height: patch.height ?? before.height },
      this.config.nodeSize,
    );
    const candidate: Node = { ...before, ...patch, ...size };
    if (sameNode(candidate, before)) return E.right(before);
    const after: Node = { ...candidate, updatedAt: this.now() };
    return E.map(() => after)(this.commit({ kind: 'updateNode', before, after }));
  }

  /** Successive moves of one node within the coalesce window are one undo step. */
  moveNode(id: NodeId, position: Point): E.Either<GraphError, Node> {
    const before = this.graph.getNode(id);
    if (!before) return E.left(graphError('missing-node', `Node ${id} does not exist`, id));
    if (!Number.isFinite(position.x) || !Number.isFinite(position.y)) {
      return E.left(graphError('invalid-position', `Node ${id} cannot move to a non-finite position`, id));
    }
    if (before.x === position.x && before.y === position.y) return E.right(before);
    const after: Node = { ...before, x: position.x, y: position.y, updatedAt: this.now() };
    return E.map(() => after)(this.commit({ kind: 'moveNode', before, after }));
  }

  /** Removes the node and every edge touching it as one undo step. */
  deleteNode(id: NodeId): E.Either<GraphError, Node> {
    const node = this.graph.getNode(id);
    if (!node) return E.left(graphError('missing-node', `Node ${id} does not exist`, id));
    const edges = this.graph.incidentEdges(id);
    return E.map(() => node)(this.commit({ kind: 'deleteNode', node, edges }));
  }

  // ─── Edges ───────────────────────────────────────────

  createEdge(source: NodeId, target: NodeId, options?: CreateEdgeOptions): E.Either<GraphError, EdgeId> {
    const edge = this.buildEdge(source, target, options);
    return E.map(() => edge.id)(this.commit({ kind: 'createEdge', edge }));
  }

  updateEdge(id: EdgeId, patch: EdgePatch): E.Either<GraphError, Edge> {
    const before = this.graph.getEdge(id);
    if (!before) return E.left(graphError('missing-edge', `Edge ${id} does not exist`, id));
    const after: Edge = { ...before, ...patch };
    if (sameEdge(after, before)) return E.right(before);
    return E.map(() => after)(this.commit({ kind: 'updateEdge', before, after }));
  }

  deleteEdge(id: EdgeId): E.Either<GraphError, Edge> {
    const edge = this.graph.getEdge(id);
    if (!edge) return E.left(graphError('missing-edge', `Edge ${id} does not exist`, id));
    return E.map(() => edge)(this.commit({ kind: 'deleteEdge', edge }));
  }

  // ─── Clipboard ───────────────────────────────────────

  /** Remember the node's current state for `pasteNode`. */
  copyNode(id: NodeId): E.Either<GraphError, Node> {
    const node = this.graph.getNode(id);
    if (!node) return E.left(graphError('missing-node', `Node ${id} does not exist`, id));
    this.clipboard = node;
    return E.right(node);
  }

  /** Duplicate the copied node at `position` under a fresh id, without its edges. */
  pasteNode(position: Point): E.Either<GraphError, NodeId> {
    const source = this.clipboard;
    if (!source) return E.left(graphError('empty-clipboard', 'Nothing has been copied'));
    const at = this.now();
    const node: Node = { ...source, id: this.createId(), x: position.x, y: position.y, createdAt: at, updatedAt: at };
    return E.map(() => node.id)(this.commitAll([{ kind: 'createNode', node }], 'paste'));
  }

  // ─── History ─────────────────────────────────────────

  undo(): boolean {
    return this.history.getState().undo();
  }

  redo(): boolean {
    return this.history.getState().redo();
  }

  /** Group the mutations until `endBatch` into one undo step (paste, multi-delete). */
  beginBatch(label?: string): void {
    this.history.getState().beginBatch(label);
  }

  endBatch(): void {
    this.history.getState().endBatch();
  }

  // ─── Selection & modals ──────────────────────────────

  select(id: NodeId | null): void {
    if (id !== null && !this.graph.getNode(id)) {
      this.log.warn(`cannot select missing node ${id}`);
      return;
    }
    this.selection.getState().select(id);
  }

  /** Select the node and center it in a viewport of `viewportSize` screen px at zoom 1. */
  navigateToNode(id: NodeId, viewportSize: Size): E.Either<GraphError, Camera> {
    const node = this.graph.getNode(id);
    if (!node) return E.left(graphError('missing-node', `Node ${id} does not exist`, id));
    this.selection.getState().select(id);
    const zoom = 1;
    this.camera.getState().setCamera({
      zoom,
      offsetX: node.x + node.width / 2 - viewportSize.width / 2 / zoom,
      offsetY: node.y + node.height / 2 - viewportSize.height / 2 / zoom,
    });
    return E.right(this.camera.getState().camera);
  }

  beginModal(): void {
    this.selection.getState().beginModal();
    this.router.reset();
  }

  endModal(): void {
    this.selection.getState().endModal();
  }

  // ─── Persistence ─────────────────────────────────────

  /** Write pending graph changes and the current viewport now. */
  save(): Promise<E.Either<IOError, FlushReport>> {
    this.persistence.scheduleDocument(this.document());
    return this.persistence.flush();
  }

  /**
   * Replace the graph with the stored one and restore the saved viewport.
   * History and selection start empty.
   */
  async load(): Promise<E.Either<IOError | GraphError, LoadReport>> {
    const result = await this.persistence.load();
    if (E.isRight(result)) {
      this.history.getState().clear();
      this.selection.getState().select(null);
      this.router.reset();
      const doc = result.right.document;
      if (doc) this.camera.getState().setCamera(doc.viewport);
    }
    return result;
  }

  /** Saves the viewport, drains pending writes (waiting out storage failures) and closes storage. */
  async close(): Promise<void> {
    this.unsubscribe();
    if (!this.persistence.isClosed()) this.persistence.scheduleDocument(this.document());
    await this.persistence.close();
  }

  private document(): CanvasDocument {
    return { viewport: this.camera.getState().camera, savedAt: this.now() };
  }

  private buildNode(position: Point, kind: string, options?: CreateNodeOptions): Node {
    const def = this.config.nodeSize.default;
    const size = clampSize(
      { width: options?.size?.width ?? def.width, height: options?.size?.height ?? def.height },
      this.config.nodeSize,
    );
    const at = this.now();
    return {
      id: options?.id ?? this.createId(),
      x: position.x,
      y: position.y,
      ...size,
      content: options?.payload === undefined ? { kind } : { kind, payload: options.payload },
      ...(options?.color === undefined ? {} : { color: options.color }),
      createdAt: at,
      updatedAt: at,
    };
  }

  private buildEdge(source: NodeId, target: NodeId, options?: CreateEdgeOptions): Edge {
    const color = options?.color ?? this.graph.getNode(source)?.color;
    return {
      id: options?.id ?? this.createId(),
      source,
      target,
      ...(color === undefined ? {} : { color }),
      createdAt: this.now(),
    };
  }

  private commit(record: MutationRecord): E.Either<GraphError, Applied> {
    const result = this.graph.apply(recordsToChanges([record]));
    if (E.isRight(result)) this.history.getState().record(record);
    return result;
  }

  /**
   * Apply several records as one change set and record them as one undo step,
   * or into the batch the caller already has open.
   */
  private commitAll(records: readonly MutationRecord[], label: string): E.Either<GraphError, Applied> {
    const result = this.graph.apply(recordsToChanges(records));
    if (E.isLeft(result)) return result;
    const history = this.history.getState();
    const ownBatch = history.historyBatch === null;
    if (ownBatch) history.beginBatch(label);
    for (const record of records) history.record(record);
    if (ownBatch) history.endBatch();
    return result;
  }
}
