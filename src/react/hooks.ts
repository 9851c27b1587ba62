import { useStore } from 'zustand';
import type { GraphSnapshot, Node, NodeId } from '../types';
import type { Camera } from '../core/coords';
import type { CanvasEditor } from '../editor';
import type { PersistenceStatus } from '../persistence/coordinator';

export function useGraphSnapshot(editor: CanvasEditor): GraphSnapshot {
  return useStore(editor.graph.api, (s) => s.snapshot);
}

/** Re-renders once per applied change set. */
export function useGraphVersion(editor: CanvasEditor): number {
  return useStore(editor.graph.api, (s) => s.snapshot.version);
}

export function useNode(editor: CanvasEditor, id: NodeId): Node | undefined {
  return useStore(editor.graph.api, (s) => s.snapshot.nodes[id]);
}

export function useSelection(editor: CanvasEditor): NodeId | null {
  return useStore(editor.selection, (s) => s.selectedNodeId);
}

export function useModalActive(editor: CanvasEditor): boolean {
  return useStore(editor.selection, (s) => s.modalDepth > 0);
}

export function useHistoryState(editor: CanvasEditor): { canUndo: boolean; canRedo: boolean } {
  const canUndo = useStore(editor.history, (s) => s.historyBatch === null && s.historyPast.length > 0);
  const canRedo = useStore(editor.history, (s) => s.historyBatch === null && s.historyFuture.length > 0);
  return { canUndo, canRedo };
}

export function usePersistenceStatus(editor: CanvasEditor): PersistenceStatus {
  return useStore(editor.persistence.status);
}

export function useCamera(editor: CanvasEditor): Camera {
  return useStore(editor.camera, (s) => s.camera);
}
