import * as O from 'fp-ts/lib/Option.js';
import { createStore, type StoreApi } from 'zustand/vanilla';
import type { NodeId } from '../types';
import { scopedLogger, type Logger } from '../core/logger';

export type SelectionSnapshot = {
  readonly selectedNodeId: NodeId | null;
  /** Number of open modals; input belongs to the modal layer while > 0. */
  readonly modalDepth: number;
};

export type SelectionActions = {
  select: (id: NodeId | null) => void;
  beginModal: () => void;
  /** No-op with a warning when no modal is open. */
  endModal: () => void;
  currentSelection: () => O.Option<NodeId>;
  isModalActive: () => boolean;
  /** Selection as routing sees it: empty while a modal is open, whatever is selected underneath. */
  routingSelection: () => O.Option<NodeId>;
};

export type SelectionStore = SelectionSnapshot & SelectionActions;

/**
 * The only authority the input router consults for focus. It changes on
 * explicit calls only; platform focus never feeds into it.
 */
export type SelectionState = StoreApi<SelectionStore>;

export function createSelectionStore(options?: { logger?: Logger }): SelectionState {
  const log = scopedLogger('Selection', options?.logger);
  return createStore<SelectionStore>()((set, get) => ({
    selectedNodeId: null,
    modalDepth: 0,

    select: (id) => {
      if (get().selectedNodeId === id) return;
      set({ selectedNodeId: id });
    },

    beginModal: () => set((s) => ({ modalDepth: s.modalDepth + 1 })),

    endModal: () => {
      const depth = get().modalDepth;
      if (depth === 0) {
        log.warn('endModal called with no open modal');
        return;
      }
      set({ modalDepth: depth - 1 });
    },

    currentSelection: () => O.fromNullable(get().selectedNodeId),

    isModalActive: () => get().modalDepth > 0,

    routingSelection: () => (get().isModalActive() ? O.none : get().currentSelection()),
  }));
}
