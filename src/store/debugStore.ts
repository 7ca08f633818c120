import { createStore } from 'zustand/vanilla';

// Debug output toggles. The master switch gates every category.
export interface DebugSettings {
  debugEnabled: boolean;
  debugViews: boolean;
  debugAudio: boolean;
  debugInput: boolean;
  debugPersistence: boolean;
  debugPerformance: boolean;
}

export interface DebugState {
  debugSettings: DebugSettings;

  setDebugSetting: <K extends keyof DebugSettings>(key: K, value: DebugSettings[K]) => void;
  toggleDebugSetting: (key: keyof DebugSettings) => void;
  setDebugSettings: (settings: Partial<DebugSettings>) => void;
  reset: () => void;
}

export const DEFAULT_DEBUG_SETTINGS: DebugSettings = {
  debugEnabled: true,
  debugViews: true,
  debugAudio: false,
  debugInput: false,
  debugPersistence: true,
  debugPerformance: false,
};

export const debugStore = createStore<DebugState>()((set) => ({
  debugSettings: { ...DEFAULT_DEBUG_SETTINGS },

  setDebugSetting: (key, value) =>
    set((state) => ({
      debugSettings: { ...state.debugSettings, [key]: value },
    })),

  toggleDebugSetting: (key) =>
    set((state) => ({
      debugSettings: { ...state.debugSettings, [key]: !state.debugSettings[key] },
    })),

  setDebugSettings: (settings) =>
    set((state) => ({
      debugSettings: { ...state.debugSettings, ...settings },
    })),

  reset: () => set({ debugSettings: { ...DEFAULT_DEBUG_SETTINGS } }),
}));
