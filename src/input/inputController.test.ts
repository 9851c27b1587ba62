import { describe, it, expect, vi } from 'vitest';
import { InputController } from './inputController';
import { EventRouter, type ScrollInput } from './eventRouter';
import { SurfaceRegistry } from './surfaces';
import { createSelectionStore } from '../state/selection';
import { createCameraStore } from '../state/camera';
import { silentLogger } from '../core/logger';

function setup() {
  const selection = createSelectionStore({ logger: silentLogger });
  const surfaces = new SurfaceRegistry();
  const scrollBy = vi.fn();
  surfaces.register({
    id: 'r1',
    nodeId: 'n1',
    getBounds: () => ({ left: 0, top: 0, width: 100, height: 100 }),
    getMetrics: () => ({
      scrollLeft: 0,
      scrollTop: 0,
      scrollWidth: 100,
      scrollHeight: 400,
      clientWidth: 100,
      clientHeight: 100,
    }),
    scrollBy,
  });
  const router = new EventRouter({
    selection,
    surfaces,
    config: { gestureReleaseMs: 500 },
    logger: silentLogger,
  });
  const camera = createCameraStore({ minZoom: 0.1, maxZoom: 3 });
  const controller = new InputController({
    router,
    surfaces,
    camera,
    zoomSensitivity: 0.0015,
    logger: silentLogger,
  });
  return { selection, camera, controller, scrollBy };
}

function input(extra?: Partial<ScrollInput>): ScrollInput {
  return { point: { x: 500, y: 500 }, deltaX: 0, deltaY: 100, zoom: false, timeStamp: 0, ...extra };
}

describe('InputController', () => {
  it('pans the camera for canvas scrolls', () => {
    const { camera, controller } = setup();
    controller.handleScroll(input({ deltaX: 30 }));
    expect(camera.getState().camera).toEqual({ zoom: 1, offsetX: 30, offsetY: 100 });
  });

  it('zooms the camera around the canvas-relative pointer', () => {
    const { camera, controller } = setup();
    controller.handleScroll(input({ point: { x: 510, y: 520 }, deltaY: -100, zoom: true }), { x: 10, y: 20 });

    const { zoom, offsetX, offsetY } = camera.getState().camera;
    const z = Math.exp(0.15);
    expect(zoom).toBeCloseTo(z);
    // world point under the anchor (500, 500) stays put
    expect(offsetX).toBeCloseTo(500 - 500 / z);
    expect(offsetY).toBeCloseTo(500 - 500 / z);
  });

  it('scrolls the node region the router picked', () => {
    const { selection, camera, controller, scrollBy } = setup();
    selection.getState().select('n1');

    const decision = controller.handleScroll(input({ point: { x: 50, y: 50 }, deltaY: 40 }));

    expect(decision.target).toEqual({ kind: 'node', nodeId: 'n1', regionId: 'r1' });
    expect(scrollBy).toHaveBeenCalledWith(0, 40);
    expect(camera.getState().camera).toEqual({ zoom: 1, offsetX: 0, offsetY: 0 });
  });

  it('gives modal input to the most recently attached sink only', () => {
    const { selection, camera, controller } = setup();
    const outer = vi.fn();
    const inner = vi.fn();
    controller.attachModalSink(outer);
    const detachInner = controller.attachModalSink(inner);
    selection.getState().beginModal();

    const event = input();
    controller.handleScroll(event);
    expect(inner).toHaveBeenCalledWith(event);
    expect(outer).not.toHaveBeenCalled();

    detachInner();
    controller.handleScroll(input({ timeStamp: 10 }));
    expect(outer).toHaveBeenCalledTimes(1);
    expect(camera.getState().camera).toEqual({ zoom: 1, offsetX: 0, offsetY: 0 });
  });
});
