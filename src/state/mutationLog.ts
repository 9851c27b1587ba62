import * as E from 'fp-ts/lib/Either.js';
import { createStore, type StoreApi } from 'zustand/vanilla';
import type { EditorConfig } from '../core/config';
import { scopedLogger, type Logger } from '../core/logger';
import { invertChanges, type GraphStore } from './graphStore';
import { coalesceRecords, recordsToChanges, type MutationRecord } from './records';

export type HistoryEntry = {
  readonly label?: string;
  readonly records: readonly MutationRecord[];
  /** Time of the latest record merged into this entry (epoch ms). */
  readonly recordedAt: number;
};

export type HistoryBatch = {
  readonly label?: string;
  readonly records: readonly MutationRecord[];
};

export type HistoryState = {
  readonly historyPast: readonly HistoryEntry[];
  readonly historyFuture: readonly HistoryEntry[];
  /** Open composite entry; records go here until `endBatch`. */
  readonly historyBatch: HistoryBatch | null;
  /** When true the top entry takes no more coalesced records (set after undo/redo/endBatch). */
  readonly historySealed: boolean;
};

export type HistoryActions = {
  /** Record a mutation that has already been applied to the graph. */
  record: (record: MutationRecord) => void;
  beginBatch: (label?: string) => void;
  endBatch: () => void;
  /** False when there is nothing to undo, a batch is open, or the graph rejects the inverse. */
  undo: () => boolean;
  redo: () => boolean;
  canUndo: () => boolean;
  canRedo: () => boolean;
  clear: () => void;
};

export type HistoryStore = HistoryState & HistoryActions;

export type MutationLog = StoreApi<HistoryStore>;

export type MutationLogOptions = {
  graph: GraphStore;
  config: EditorConfig['history'];
  now?: () => number;
  logger?: Logger;
};

function targetOf(record: MutationRecord): string {
  switch (record.kind) {
    case 'createNode':
    case 'deleteNode':
      return `node:${record.node.id}`;
    case 'updateNode':
    case 'moveNode':
      return `node:${record.after.id}`;
    case 'createEdge':
    case 'deleteEdge':
      return `edge:${record.edge.id}`;
    case 'updateEdge':
      return `edge:${record.after.id}`;
  }
}

/**
 * Undo/redo over GraphStore. Entries are composite: undoing one applies the
 * inverse of all its records as a single GraphStore apply, so a node and its
 * cascaded edges always come back together.
 */
export function createMutationLog(options: MutationLogOptions): MutationLog {
  const { graph } = options;
  const { capacity, coalesceWindowMs } = options.config;
  const now = options.now ?? Date.now;
  const log = scopedLogger('MutationLog', options.logger);

  return createStore<HistoryStore>()((set, get) => {
    const push = (entry: HistoryEntry) => {
      const past = [...get().historyPast, entry];
      // whole entries only, oldest first
      while (past.length > capacity) past.shift();
      set({ historyPast: past, historyFuture: [], historySealed: false });
    };

    return {
      historyPast: [],
      historyFuture: [],
      historyBatch: null,
      historySealed: false,

      canUndo: () => {
        const s = get();
        return s.historyBatch === null && s.historyPast.length > 0;
      },

      canRedo: () => {
        const s = get();
        return s.historyBatch === null && s.historyFuture.length > 0;
      },

      record: (record) => {
        const s = get();
        const at = now();

        if (s.historyBatch) {
          set({ historyBatch: addToBatch(s.historyBatch, record) });
          return;
        }

        const top = s.historyPast[s.historyPast.length - 1];
        if (
          top &&
          !s.historySealed &&
          top.records.length === 1 &&
          targetOf(top.records[0]) === targetOf(record) &&
          at - top.recordedAt <= coalesceWindowMs
        ) {
          const merged = coalesceRecords(top.records[0], record);
          if (merged) {
            const past = s.historyPast.slice(0, -1);
            past.push({ label: top.label, records: [merged], recordedAt: at });
            set({ historyPast: past, historyFuture: [] });
            return;
          }
        }

        push({ records: [record], recordedAt: at });
      },

      beginBatch: (label) => {
        if (get().historyBatch) return;
        set({ historyBatch: { label, records: [] } });
      },

      endBatch: () => {
        const batch = get().historyBatch;
        if (!batch) return;
        set({ historyBatch: null });
        if (batch.records.length === 0) return;
        push({ label: batch.label, records: batch.records, recordedAt: now() });
        set({ historySealed: true });
      },

      undo: () => {
        const s = get();
        if (s.historyBatch) {
          log.warn('undo ignored while a batch is open');
          return false;
        }
        const entry = s.historyPast[s.historyPast.length - 1];
        if (!entry) return false;
        const result = graph.apply(invertChanges(recordsToChanges(entry.records)));
        if (E.isLeft(result)) {
          log.error(`undo of "${entry.label ?? entry.records[0].kind}" rejected:`, result.left.message);
          return false;
        }
        set({
          historyPast: s.historyPast.slice(0, -1),
          historyFuture: [entry, ...s.historyFuture],
          historySealed: true,
        });
        return true;
      },

      redo: () => {
        const s = get();
        if (s.historyBatch) {
          log.warn('redo ignored while a batch is open');
          return false;
        }
        const entry = s.historyFuture[0];
        if (!entry) return false;
        const result = graph.apply(recordsToChanges(entry.records));
        if (E.isLeft(result)) {
          log.error(`redo of "${entry.label ?? entry.records[0].kind}" rejected:`, result.left.message);
          return false;
        }
        set({
          historyPast: [...s.historyPast, entry],
          historyFuture: s.historyFuture.slice(1),
          historySealed: true,
        });
        return true;
      },

      clear: () =>
        set({
          historyPast: [],
          historyFuture: [],
          historyBatch: null,
          historySealed: false,
        }),
    };
  });
}

function addToBatch(batch: HistoryBatch, record: MutationRecord): HistoryBatch {
  const target = targetOf(record);
  for (let i = batch.records.length - 1; i >= 0; i--) {
    const prev = batch.records[i];
    if (targetOf(prev) !== target) continue;
    const merged = coalesceRecords(prev, record);
    if (!merged) break;
    const records = batch.records.slice();
    records[i] = merged;
    return { ...batch, records };
  }
  return { ...batch, records: [...batch.records, record] };
}
