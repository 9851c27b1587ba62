import * as E from 'fp-ts/lib/Either.js';
import type { NodeId, Point } from '../types';
import { rectContains, type Rect } from '../core/coords';
import { routingAmbiguity, type RoutingAmbiguity } from '../core/errors';

export type ScrollMetrics = {
  scrollLeft: number;
  scrollTop: number;
  scrollWidth: number;
  scrollHeight: number;
  clientWidth: number;
  clientHeight: number;
};

/** A scrollable area inside a node, as the rendering layer reports it. Bounds are in client px. */
export type ScrollRegion = {
  id: string;
  nodeId: NodeId;
  getBounds: () => Rect;
  getMetrics: () => ScrollMetrics;
  scrollBy: (dx: number, dy: number) => void;
  /** Higher wins when regions overlap. Default 0. */
  zIndex?: number;
};

export interface SurfaceTree {
  hitTest(point: Point): ScrollRegion | null;
  get(id: string): ScrollRegion | undefined;
}

// sub-pixel scroll positions never quite reach the end
const SCROLL_EPSILON = 1;

/**
 * Whether the region can move in the direction of the delta on any axis that
 * has one. Non-finite metrics make the answer undecidable.
 */
export function scrollCapacity(
  metrics: ScrollMetrics,
  dx: number,
  dy: number,
): E.Either<RoutingAmbiguity, boolean> {
  const values = [
    metrics.scrollLeft,
    metrics.scrollTop,
    metrics.scrollWidth,
    metrics.scrollHeight,
    metrics.clientWidth,
    metrics.clientHeight,
    dx,
    dy,
  ];
  if (!values.every(Number.isFinite)) {
    return E.left(routingAmbiguity('scroll region reported non-finite metrics'));
  }
  const maxLeft = metrics.scrollWidth - metrics.clientWidth;
  const maxTop = metrics.scrollHeight - metrics.clientHeight;
  const canX =
    (dx > 0 && metrics.scrollLeft < maxLeft - SCROLL_EPSILON) ||
    (dx < 0 && metrics.scrollLeft > SCROLL_EPSILON);
  const canY =
    (dy > 0 && metrics.scrollTop < maxTop - SCROLL_EPSILON) ||
    (dy < 0 && metrics.scrollTop > SCROLL_EPSILON);
  return E.right(canX || canY);
}

export class SurfaceRegistry implements SurfaceTree {
  private readonly regions = new Map<string, ScrollRegion>();

  /** Returns the unregister function. Re-registering an id replaces the region. */
  register(region: ScrollRegion): () => void {
    this.regions.delete(region.id);
    this.regions.set(region.id, region);
    return () => {
      if (this.regions.get(region.id) === region) this.regions.delete(region.id);
    };
  }

  get(id: string): ScrollRegion | undefined {
    return this.regions.get(id);
  }

  regionsForNode(nodeId: NodeId): ScrollRegion[] {
    return [...this.regions.values()].filter((r) => r.nodeId === nodeId);
  }

  get size(): number {
    return this.regions.size;
  }

  /** Topmost region containing the point; among equal zIndex the latest registered. */
  hitTest(point: Point): ScrollRegion | null {
    let best: ScrollRegion | null = null;
    for (const region of this.regions.values()) {
      if (!rectContains(region.getBounds(), point)) continue;
      if (!best || (region.zIndex ?? 0) >= (best.zIndex ?? 0)) best = region;
    }
    return best;
  }
}
