import type { StoreApi } from 'zustand/vanilla';
import type { Point } from '../types';
import { wheelZoomFactor } from '../core/coords';
import { scopedLogger, type Logger } from '../core/logger';
import type { CameraStore } from '../state/camera';
import type { EventRouter, RouteDecision, ScrollInput } from './eventRouter';
import type { SurfaceTree } from './surfaces';

export type ModalSink = (input: ScrollInput) => void;

export type InputControllerOptions = {
  router: EventRouter;
  surfaces: SurfaceTree;
  camera: StoreApi<CameraStore>;
  zoomSensitivity: number;
  logger?: Logger;
};

/** Routes an event and hands it to the consumer the router picked. */
export class InputController {
  private readonly router: EventRouter;
  private readonly surfaces: SurfaceTree;
  private readonly camera: StoreApi<CameraStore>;
  private readonly zoomSensitivity: number;
  private readonly log: Logger;
  private modalSinks: ModalSink[] = [];

  constructor(options: InputControllerOptions) {
    this.router = options.router;
    this.surfaces = options.surfaces;
    this.camera = options.camera;
    this.zoomSensitivity = options.zoomSensitivity;
    this.log = scopedLogger('Input', options.logger);
  }

  /** The most recently attached sink receives modal input. */
  attachModalSink(sink: ModalSink): () => void {
    this.modalSinks = [...this.modalSinks, sink];
    return () => {
      this.modalSinks = this.modalSinks.filter((s) => s !== sink);
    };
  }

  /**
   * @param origin client position of the canvas root; zoom anchors are
   * canvas-relative.
   */
  handleScroll(input: ScrollInput, origin: Point = { x: 0, y: 0 }): RouteDecision {
    const decision = this.router.route(input);
    const { target } = decision;

    switch (target.kind) {
      case 'modal': {
        const sink = this.modalSinks[this.modalSinks.length - 1];
        if (sink) sink(input);
        else this.log.debug('modal input with no sink attached');
        break;
      }
      case 'canvas': {
        const { panByScreen, zoomByAt } = this.camera.getState();
        if (decision.intent === 'zoom') {
          const anchor = { x: input.point.x - origin.x, y: input.point.y - origin.y };
          zoomByAt(anchor, wheelZoomFactor(input.deltaY, this.zoomSensitivity));
        } else if (input.deltaX !== 0 || input.deltaY !== 0) {
          panByScreen(input.deltaX, input.deltaY);
        }
        break;
      }
      case 'node': {
        const region = this.surfaces.get(target.regionId);
        if (region) region.scrollBy(input.deltaX, input.deltaY);
        else this.log.warn(`region ${target.regionId} vanished before dispatch`);
        break;
      }
    }
    return decision;
  }
}
