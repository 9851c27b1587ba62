import type { ScrollInput } from './eventRouter';

export type WheelLike = Pick<
  WheelEvent,
  'deltaX' | 'deltaY' | 'deltaMode' | 'ctrlKey' | 'metaKey' | 'shiftKey' | 'clientX' | 'clientY' | 'timeStamp'
>;

const LINE_HEIGHT_PX = 16;
const PAGE_HEIGHT_PX = 800;

/**
 * Normalize a wheel event to pixel deltas. Ctrl/Meta (including trackpad
 * pinch, which browsers report as ctrl+wheel) means zoom; Shift on a mouse
 * wheel scrolls horizontally.
 */
export function scrollInputFromWheel(e: WheelLike): ScrollInput {
  const scale = e.deltaMode === 1 ? LINE_HEIGHT_PX : e.deltaMode === 2 ? PAGE_HEIGHT_PX : 1;
  let deltaX = e.deltaX * scale;
  let deltaY = e.deltaY * scale;
  const zoom = e.ctrlKey || e.metaKey;
  if (!zoom && e.shiftKey && deltaX === 0) {
    deltaX = deltaY;
    deltaY = 0;
  }
  return {
    point: { x: e.clientX, y: e.clientY },
    deltaX,
    deltaY,
    zoom,
    timeStamp: e.timeStamp,
  };
}
