import { createStore, type StoreApi } from 'zustand/vanilla';
import type { Point } from '../types';
import type { EditorConfig } from '../core/config';
import { clampZoom, panByScreenDelta, zoomAtPoint, type Camera } from '../core/coords';

export type CameraState = {
  readonly camera: Camera;
};

export type CameraActions = {
  setCamera: (camera: Camera) => void;
  /** Pan by a SCREEN-space delta. */
  panByScreen: (dx: number, dy: number) => void;
  zoomTo: (zoom: number) => void;
  /** Zoom by factor centered at screenPoint (canvas-relative px). */
  zoomByAt: (screenPoint: Point, factor: number) => void;
};

export type CameraStore = CameraState & CameraActions;

const initialCamera: Camera = { zoom: 1, offsetX: 0, offsetY: 0 };

/** Canvas transform; the consumer of canvas-routed scroll and zoom input. */
export function createCameraStore(bounds: Pick<EditorConfig['camera'], 'minZoom' | 'maxZoom'>): StoreApi<CameraStore> {
  const { minZoom, maxZoom } = bounds;
  return createStore<CameraStore>()((set) => ({
    camera: initialCamera,

    setCamera: (camera) => set({ camera: { ...camera, zoom: clampZoom(camera.zoom, minZoom, maxZoom) } }),

    panByScreen: (dx, dy) => set((s) => ({ camera: panByScreenDelta(s.camera, dx, dy) })),

    zoomTo: (zoom) => set((s) => ({ camera: { ...s.camera, zoom: clampZoom(zoom, minZoom, maxZoom) } })),

    zoomByAt: (screenPoint, factor) =>
      set((s) => ({ camera: zoomAtPoint(s.camera, screenPoint, factor, minZoom, maxZoom) })),
  }));
}
