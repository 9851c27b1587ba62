export type NodeId = string;
export type EdgeId = string;

/** Named color token; the rendering layer maps tokens to actual colors. */
export type ColorToken = string;

export type Point = { x: number; y: number };
export type Size = { width: number; height: number };

/**
 * Opaque node content. The core only carries `kind` and `payload` through
 * history and storage; rendering collaborators decide what they mean.
 */
export type NodeContent = {
  kind: string;
  payload?: unknown;
};

export type Node = {
  id: NodeId;
  x: number;
  y: number;
  width: number;
  height: number;
  content: NodeContent;
  color?: ColorToken;
  /** Epoch ms. Set once on creation and carried verbatim through history and storage. */
  createdAt: number;
  /** Epoch ms of the last update or move. */
  updatedAt: number;
};

export type Edge = {
  id: EdgeId;
  source: NodeId;
  target: NodeId;
  color?: ColorToken;
  /** Epoch ms. Never regenerated. */
  createdAt: number;
};

/** Camera transform as stored: screen = (world - offset) * zoom. */
export type Viewport = { zoom: number; offsetX: number; offsetY: number };

/** Document-level state stored beside the graph, one record per canvas. */
export type CanvasDocument = {
  viewport: Viewport;
  /** Epoch ms of the save that wrote it. */
  savedAt: number;
};

export type EntityRef = { kind: 'node'; id: NodeId } | { kind: 'edge'; id: EdgeId };

/** Fields a caller may change through `updateNode`. Position goes through `moveNode`. */
export type NodePatch = Partial<Pick<Node, 'width' | 'height' | 'content' | 'color'>>;

export type EdgePatch = Partial<Pick<Edge, 'color'>>;

export type GraphSnapshot = {
  readonly nodes: Readonly<Record<NodeId, Node>>;
  readonly edges: Readonly<Record<EdgeId, Edge>>;
  /** Incremented once per successful apply; renderers re-render only when it changes. */
  readonly version: number;
};
