import type { Point } from '../types';

/** Screen = (world - offset) * zoom. */
export type Camera = { zoom: number; offsetX: number; offsetY: number };

export type Rect = { left: number; top: number; width: number; height: number };

export function worldToScreen(p: Point, camera: Camera): Point {
  return {
    x: (p.x - camera.offsetX) * camera.zoom,
    y: (p.y - camera.offsetY) * camera.zoom,
  };
}

export function screenToWorld(p: Point, camera: Camera): Point {
  return {
    x: p.x / camera.zoom + camera.offsetX,
    y: p.y / camera.zoom + camera.offsetY,
  };
}

export function clampZoom(zoom: number, min: number, max: number): number {
  if (!Number.isFinite(zoom)) return min;
  if (zoom < min) return min;
  if (zoom > max) return max;
  return zoom;
}

/**
 * Pan by a SCREEN-space delta (e.g. a wheel delta). Content follows the gesture,
 * so the camera moves by the delta converted to world units.
 */
export function panByScreenDelta(camera: Camera, dx: number, dy: number): Camera {
  const invZoom = 1 / camera.zoom;
  return {
    zoom: camera.zoom,
    offsetX: camera.offsetX + dx * invZoom,
    offsetY: camera.offsetY + dy * invZoom,
  };
}

/**
 * Zoom at a specific SCREEN point, keeping that point visually stationary.
 * factor > 1 zooms in; factor < 1 zooms out.
 */
export function zoomAtPoint(
  camera: Camera,
  screenPoint: Point,
  factor: number,
  min: number,
  max: number,
): Camera {
  const targetWorld = screenToWorld(screenPoint, camera);
  const nextZoom = clampZoom(camera.zoom * factor, min, max);
  return {
    zoom: nextZoom,
    offsetX: targetWorld.x - screenPoint.x / nextZoom,
    offsetY: targetWorld.y - screenPoint.y / nextZoom,
  };
}

/** Wheel deltaY to a multiplicative zoom factor; negative deltas (scroll up / pinch out) zoom in. */
export function wheelZoomFactor(deltaY: number, sensitivity: number): number {
  return Math.exp(-deltaY * sensitivity);
}

export function rectContains(rect: Rect, p: Point): boolean {
  return (
    p.x >= rect.left &&
    p.y >= rect.top &&
    p.x < rect.left + rect.width &&
    p.y < rect.top + rect.height
  );
}
