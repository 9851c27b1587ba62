import { useEffect, useRef } from 'react';
import type { CanvasEditor } from '../editor';
import type { ScrollInput } from '../input/eventRouter';

/**
 * Hold modal exclusivity while `open` is true. Scroll input routed to the modal
 * layer goes to `onScroll` of the most recently opened modal.
 */
export function useModal(editor: CanvasEditor, open: boolean, onScroll?: (input: ScrollInput) => void): void {
  const onScrollRef = useRef(onScroll);
  onScrollRef.current = onScroll;

  useEffect(() => {
    if (!open) return;
    editor.beginModal();
    const detach = editor.input.attachModalSink((input) => onScrollRef.current?.(input));
    return () => {
      detach();
      editor.endModal();
    };
  }, [editor, open]);
}
