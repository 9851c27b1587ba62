import { useEffect, useId } from 'react';
import type { RefObject } from 'react';
import type { NodeId } from '../types';
import type { CanvasEditor } from '../editor';

/**
 * Register the element as a scrollable region of `nodeId` so the router can
 * hand it wheel input while the node is selected.
 */
export function useScrollRegion(
  ref: RefObject<HTMLElement>,
  editor: CanvasEditor,
  nodeId: NodeId,
  options?: { zIndex?: number },
): void {
  const regionId = useId();
  const zIndex = options?.zIndex;

  useEffect(() => {
    const el = ref.current;
    if (!el) return;
    return editor.surfaces.register({
      id: regionId,
      nodeId,
      zIndex,
      getBounds: () => {
        const r = el.getBoundingClientRect();
        return { left: r.left, top: r.top, width: r.width, height: r.height };
      },
      getMetrics: () => ({
        scrollLeft: el.scrollLeft,
        scrollTop: el.scrollTop,
        scrollWidth: el.scrollWidth,
        scrollHeight: el.scrollHeight,
        clientWidth: el.clientWidth,
        clientHeight: el.clientHeight,
      }),
      scrollBy: (dx, dy) => {
        el.scrollLeft += dx;
        el.scrollTop += dy;
      },
    });
  }, [ref, editor, nodeId, regionId, zIndex]);
}
