import { useEffect } from 'react';
import type { RefObject } from 'react';
import type { CanvasEditor } from '../editor';
import { scrollInputFromWheel } from '../input/wheel';

/**
 * Attach the canvas root's wheel stream to the editor's router. Every wheel
 * event is consumed here: the router's pick (camera, node region or modal)
 * moves, never the browser's default scroll.
 */
export function useInputRouting(ref: RefObject<HTMLElement>, editor: CanvasEditor): void {
  useEffect(() => {
    const el = ref.current;
    if (!el) return;

    function onWheel(e: WheelEvent) {
      const currentEl = ref.current;
      if (!currentEl) return;
      const rect = currentEl.getBoundingClientRect();
      e.preventDefault();
      editor.input.handleScroll(scrollInputFromWheel(e), { x: rect.left, y: rect.top });
    }

    // passive:false so preventDefault stops page scroll and browser pinch-zoom
    el.addEventListener('wheel', onWheel, { passive: false });
    return () => {
      el.removeEventListener('wheel', onWheel);
    };
  }, [ref, editor]);
}
