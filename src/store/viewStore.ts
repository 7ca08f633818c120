import { createStore } from 'zustand/vanilla';
import type { DeferredActionKind, ViewState } from '@/engine/presentation/types';

/**
 * View Store
 * Read-only mirror of the view coordinator for UI consumers. Only the
 * coordinator writes here; toggling views goes through its commands.
 */
export interface ViewSnapshot {
  currentView: ViewState;
  overlayLoaded: boolean;
  transitionInProgress: boolean;
  pendingDeferredAction: DeferredActionKind | null;
  // Name of the sink that won the last arbitration pass
  activeAudioSink: string | null;
}

export interface ViewStoreState extends ViewSnapshot {
  applySnapshot: (snapshot: Partial<ViewSnapshot>) => void;
  reset: () => void;
}

const initialSnapshot: ViewSnapshot = {
  currentView: 'primary',
  overlayLoaded: false,
  transitionInProgress: false,
  pendingDeferredAction: null,
  activeAudioSink: null,
};

export const viewStore = createStore<ViewStoreState>()((set) => ({
  ...initialSnapshot,

  applySnapshot: (snapshot) => set(snapshot),

  reset: () => set({ ...initialSnapshot }),
}));
