import * as E from 'fp-ts/lib/Either.js';
import * as O from 'fp-ts/lib/Option.js';
import type { NodeId, Point } from '../types';
import type { EditorConfig } from '../core/config';
import { describeCause, routingAmbiguity, type RoutingAmbiguity } from '../core/errors';
import { scopedLogger, type Logger } from '../core/logger';
import type { SelectionState } from '../state/selection';
import { scrollCapacity, type ScrollRegion, type SurfaceTree } from './surfaces';

/** A wheel/trackpad scroll or zoom event. `point` is in client px. */
export type ScrollInput = {
  point: Point;
  deltaX: number;
  deltaY: number;
  /** ctrl/meta wheel or pinch */
  zoom: boolean;
  /** ms, monotonic within one event stream */
  timeStamp: number;
};

export type RouteTarget =
  | { kind: 'modal' }
  | { kind: 'canvas' }
  | { kind: 'node'; nodeId: NodeId; regionId: string };

export type RouteReason =
  | 'modal'
  | 'gesture-hold'
  | 'zoom'
  | 'no-region'
  | 'not-selected'
  | 'no-overflow'
  | 'node-scroll'
  | 'ambiguous';

export type RouteDecision = {
  readonly target: RouteTarget;
  readonly reason: RouteReason;
  readonly intent: 'scroll' | 'zoom';
};

export type RouterMode =
  | { kind: 'idle' }
  | { kind: 'canvas-locked' }
  | { kind: 'node-locked'; nodeId: NodeId; regionId: string };

export type EventRouterOptions = {
  selection: SelectionState;
  surfaces: SurfaceTree;
  config: EditorConfig['routing'];
  logger?: Logger;
};

const IDLE: RouterMode = { kind: 'idle' };
const CANVAS: RouteTarget = { kind: 'canvas' };

function lockFor(target: RouteTarget): RouterMode {
  switch (target.kind) {
    case 'canvas':
      return { kind: 'canvas-locked' };
    case 'node':
      return { kind: 'node-locked', nodeId: target.nodeId, regionId: target.regionId };
    case 'modal':
      return IDLE;
  }
}

/**
 * Decides per event who consumes a scroll: the modal layer, a node's scroll
 * region, or the canvas. Once a gesture starts on a target it stays there
 * until the event stream pauses, so a region scrolled to its end does not
 * hand the rest of the gesture to the canvas.
 */
export class EventRouter {
  private readonly selection: SelectionState;
  private readonly surfaces: SurfaceTree;
  private readonly releaseMs: number;
  private readonly log: Logger;
  private mode: RouterMode = IDLE;
  private lastEventAt: number | null = null;

  constructor(options: EventRouterOptions) {
    this.selection = options.selection;
    this.surfaces = options.surfaces;
    this.releaseMs = options.config.gestureReleaseMs;
    this.log = scopedLogger('EventRouter', options.logger);
  }

  route(input: ScrollInput): RouteDecision {
    const intent = input.zoom ? 'zoom' : 'scroll';

    if (this.selection.getState().isModalActive()) {
      this.reset();
      return { target: { kind: 'modal' }, reason: 'modal', intent };
    }

    const gap = this.lastEventAt === null ? Infinity : input.timeStamp - this.lastEventAt;
    this.lastEventAt = input.timeStamp;
    if (gap >= this.releaseMs) this.mode = IDLE;

    if (this.mode.kind !== 'idle') {
      const held = this.heldTarget(intent);
      if (held) return { target: held, reason: 'gesture-hold', intent };
      // a zoom inside a node gesture is answered by the canvas without ending the gesture
      if (intent === 'zoom' && this.lockValid()) return this.resolve(input, intent);
      this.log.debug(`${this.mode.kind} lost its target; releasing`);
      this.mode = IDLE;
    }

    const resolved = this.resolve(input, intent);
    this.mode = lockFor(resolved.target);
    return resolved;
  }

  /** Mode as it stands at `now`: a lock older than the release gap reads as idle. */
  modeAt(now: number): RouterMode {
    if (this.lastEventAt === null || now - this.lastEventAt >= this.releaseMs) return IDLE;
    return this.mode;
  }

  reset(): void {
    this.mode = IDLE;
    this.lastEventAt = null;
  }

  private heldTarget(intent: 'scroll' | 'zoom'): RouteTarget | null {
    const mode = this.mode;
    if (mode.kind === 'canvas-locked') return CANVAS;
    if (mode.kind !== 'node-locked') return null;
    // zoom always belongs to the canvas
    if (intent === 'zoom' || !this.lockValid()) return null;
    return { kind: 'node', nodeId: mode.nodeId, regionId: mode.regionId };
  }

  /** A node lock lasts only while its node stays selected and its region registered. */
  private lockValid(): boolean {
    const mode = this.mode;
    if (mode.kind !== 'node-locked') return mode.kind === 'canvas-locked';
    const stillSelected = O.exists((id: NodeId) => id === mode.nodeId)(this.selection.getState().routingSelection());
    return stillSelected && this.surfaces.get(mode.regionId) !== undefined;
  }

  private resolve(input: ScrollInput, intent: 'scroll' | 'zoom'): RouteDecision {
    if (intent === 'zoom') return { target: CANVAS, reason: 'zoom', intent };

    const hit = this.hitTest(input.point);
    if (E.isLeft(hit)) return this.ambiguous(hit.left, intent);
    const region = hit.right;
    if (!region) return { target: CANVAS, reason: 'no-region', intent };

    const selected = this.selection.getState().routingSelection();
    if (O.isNone(selected) || selected.value !== region.nodeId) {
      return { target: CANVAS, reason: 'not-selected', intent };
    }

    const capacity = this.capacity(region, input.deltaX, input.deltaY);
    if (E.isLeft(capacity)) return this.ambiguous(capacity.left, intent);
    if (!capacity.right) return { target: CANVAS, reason: 'no-overflow', intent };

    return { target: { kind: 'node', nodeId: region.nodeId, regionId: region.id }, reason: 'node-scroll', intent };
  }

  private hitTest(point: Point): E.Either<RoutingAmbiguity, ScrollRegion | null> {
    if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
      return E.left(routingAmbiguity(`non-finite event point (${point.x}, ${point.y})`));
    }
    try {
      return E.right(this.surfaces.hitTest(point));
    } catch (err) {
      return E.left(routingAmbiguity(`hit test failed: ${describeCause(err)}`, err));
    }
  }

  private capacity(region: ScrollRegion, dx: number, dy: number): E.Either<RoutingAmbiguity, boolean> {
    try {
      return scrollCapacity(region.getMetrics(), dx, dy);
    } catch (err) {
      return E.left(routingAmbiguity(`metrics of region ${region.id} unavailable: ${describeCause(err)}`, err));
    }
  }

  private ambiguous(reason: RoutingAmbiguity, intent: 'scroll' | 'zoom'): RouteDecision {
    this.log.warn(`${reason.message}; routing to canvas`);
    return { target: CANVAS, reason: 'ambiguous', intent };
  }
}
