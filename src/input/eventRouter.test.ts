import { describe, it, expect, vi } from 'vitest';
import { EventRouter, type ScrollInput } from './eventRouter';
import { SurfaceRegistry, type ScrollMetrics, type SurfaceTree } from './surfaces';
import { createSelectionStore } from '../state/selection';
import { silentLogger, type Logger } from '../core/logger';

const routing = { gestureReleaseMs: 500 };

const inside = { x: 150, y: 150 };
const outside = { x: 600, y: 600 };

function setup(metrics?: Partial<ScrollMetrics>, logger: Logger = silentLogger) {
  const selection = createSelectionStore({ logger: silentLogger });
  const surfaces = new SurfaceRegistry();
  const unregister = surfaces.register({
    id: 'r1',
    nodeId: 'n1',
    getBounds: () => ({ left: 100, top: 100, width: 200, height: 200 }),
    getMetrics: () => ({
      scrollLeft: 0,
      scrollTop: 0,
      scrollWidth: 200,
      scrollHeight: 1000,
      clientWidth: 200,
      clientHeight: 200,
      ...metrics,
    }),
    scrollBy: () => undefined,
  });
  const router = new EventRouter({ selection, surfaces, config: routing, logger });
  return { selection, surfaces, router, unregister };
}

function scroll(point: { x: number; y: number }, timeStamp: number, deltaY = 20): ScrollInput {
  return { point, deltaX: 0, deltaY, zoom: false, timeStamp };
}

describe('EventRouter hit-test resolution', () => {
  it('sends events outside any region to the canvas', () => {
    const { router } = setup();
    expect(router.route(scroll(outside, 0))).toEqual({
      target: { kind: 'canvas' },
      reason: 'no-region',
      intent: 'scroll',
    });
  });

  it('sends events over an unselected node to the canvas', () => {
    const { router } = setup();
    expect(router.route(scroll(inside, 0)).reason).toBe('not-selected');
  });

  it('sends events over the selected node with room to scroll to that node', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');
    expect(router.route(scroll(inside, 0))).toEqual({
      target: { kind: 'node', nodeId: 'n1', regionId: 'r1' },
      reason: 'node-scroll',
      intent: 'scroll',
    });
  });

  it('falls back to the canvas when the region cannot move that way', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');
    const decision = router.route(scroll(inside, 0, -20));
    expect(decision.target).toEqual({ kind: 'canvas' });
    expect(decision.reason).toBe('no-overflow');
  });

  it('sends a fresh zoom to the canvas even over the selected node', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');
    const decision = router.route({ ...scroll(inside, 0), zoom: true });
    expect(decision).toEqual({ target: { kind: 'canvas' }, reason: 'zoom', intent: 'zoom' });
  });
});

describe('EventRouter modal exclusivity', () => {
  it('routes every event to the modal while one is open and resumes hit-testing after', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');
    selection.getState().beginModal();

    expect(router.route(scroll(inside, 0)).target).toEqual({ kind: 'modal' });
    expect(router.route(scroll(outside, 10)).target).toEqual({ kind: 'modal' });
    expect(router.route({ ...scroll(outside, 20), zoom: true }).target).toEqual({ kind: 'modal' });

    selection.getState().endModal();
    expect(router.route(scroll(inside, 30)).target).toEqual({ kind: 'node', nodeId: 'n1', regionId: 'r1' });
  });

  it('breaks an active gesture lock when a modal opens', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');
    router.route(scroll(inside, 0));

    selection.getState().beginModal();
    expect(router.route(scroll(inside, 50)).reason).toBe('modal');
    selection.getState().endModal();

    expect(router.route(scroll(outside, 100)).reason).toBe('no-region');
  });
});

describe('EventRouter gesture hold', () => {
  it('keeps scrolling the node after the pointer leaves, until the stream pauses', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');

    expect(router.route(scroll(inside, 0)).reason).toBe('node-scroll');
    const held = router.route(scroll(outside, 100));
    expect(held.target).toEqual({ kind: 'node', nodeId: 'n1', regionId: 'r1' });
    expect(held.reason).toBe('gesture-hold');
    expect(router.route(scroll(outside, 250)).reason).toBe('gesture-hold');

    expect(router.modeAt(300)).toEqual({ kind: 'node-locked', nodeId: 'n1', regionId: 'r1' });
    expect(router.modeAt(750)).toEqual({ kind: 'idle' });

    expect(router.route(scroll(outside, 1000)).reason).toBe('no-region');
  });

  it('keeps the node lock once the region reaches its end', () => {
    const metrics: Partial<ScrollMetrics> = { scrollTop: 700 };
    const { router, selection } = setup(metrics);
    selection.getState().select('n1');

    expect(router.route(scroll(inside, 0)).reason).toBe('node-scroll');
    metrics.scrollTop = 800;
    const decision = router.route(scroll(inside, 16));
    expect(decision.target).toEqual({ kind: 'node', nodeId: 'n1', regionId: 'r1' });
    expect(decision.reason).toBe('gesture-hold');
  });

  it('does not let a region steal a gesture that started on the canvas', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');

    expect(router.route(scroll(outside, 0)).target).toEqual({ kind: 'canvas' });
    const decision = router.route(scroll(inside, 50));
    expect(decision.target).toEqual({ kind: 'canvas' });
    expect(decision.reason).toBe('gesture-hold');
  });

  it('holds the node lock across pauses shorter than the release gap', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');

    expect(router.route(scroll(inside, 0)).reason).toBe('node-scroll');
    const decision = router.route(scroll(outside, 250));
    expect(decision.target).toEqual({ kind: 'node', nodeId: 'n1', regionId: 'r1' });
    expect(decision.reason).toBe('gesture-hold');
    expect(router.route(scroll(outside, 700)).reason).toBe('gesture-hold');
    expect(router.modeAt(1100)).toEqual({ kind: 'node-locked', nodeId: 'n1', regionId: 'r1' });
  });

  it('holds the canvas lock across a pause over a scrollable node', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');

    router.route(scroll(outside, 0));
    const decision = router.route(scroll(inside, 300));

    expect(decision).toEqual({ target: { kind: 'canvas' }, reason: 'gesture-hold', intent: 'scroll' });
    expect(router.modeAt(300)).toEqual({ kind: 'canvas-locked' });
  });

  it('re-resolves from idle once the release gap has passed', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');

    router.route(scroll(outside, 0));
    expect(router.route(scroll(inside, 500)).reason).toBe('node-scroll');
    expect(router.modeAt(500)).toEqual({ kind: 'node-locked', nodeId: 'n1', regionId: 'r1' });
  });

  it('drops a node lock when its region is unregistered mid-gesture', () => {
    const { router, selection, unregister } = setup();
    selection.getState().select('n1');
    router.route(scroll(inside, 0));

    unregister();
    expect(router.route(scroll(inside, 50))).toEqual({
      target: { kind: 'canvas' },
      reason: 'no-region',
      intent: 'scroll',
    });
    expect(router.modeAt(50)).toEqual({ kind: 'canvas-locked' });
  });

  it('drops a node lock when the node is deselected mid-gesture', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');
    router.route(scroll(inside, 0));

    selection.getState().select(null);
    expect(router.route(scroll(outside, 50)).reason).toBe('no-region');
  });

  it('hands a pinch during a node gesture to the canvas', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');
    router.route(scroll(inside, 0));

    expect(router.route({ ...scroll(inside, 20), zoom: true })).toEqual({
      target: { kind: 'canvas' },
      reason: 'zoom',
      intent: 'zoom',
    });
  });

  it('keeps the node lock after a pinch answered by the canvas', () => {
    const { router, selection } = setup();
    selection.getState().select('n1');
    router.route(scroll(inside, 0));
    router.route({ ...scroll(inside, 20), zoom: true });

    expect(router.route(scroll(outside, 40)).reason).toBe('gesture-hold');
  });
});

describe('EventRouter ambiguity', () => {
  it('logs and routes to the canvas when the hit test throws', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const selection = createSelectionStore({ logger: silentLogger });
    const surfaces: SurfaceTree = {
      hitTest: () => {
        throw new Error('layout pending');
      },
      get: () => undefined,
    };
    const router = new EventRouter({ selection, surfaces, config: routing, logger });

    const decision = router.route(scroll(inside, 0));

    expect(decision).toEqual({ target: { kind: 'canvas' }, reason: 'ambiguous', intent: 'scroll' });
    expect(logger.warn).toHaveBeenCalledWith('[EventRouter]', 'hit test failed: layout pending; routing to canvas');
  });

  it('treats non-finite region metrics as ambiguous', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const { router, selection } = setup({ scrollHeight: Number.POSITIVE_INFINITY }, logger);
    selection.getState().select('n1');

    expect(router.route(scroll(inside, 0)).reason).toBe('ambiguous');
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
