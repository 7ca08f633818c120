import { debugStore, type DebugSettings } from '@/store/debugStore';

export type DebugCategory =
  | 'views'
  | 'audio'
  | 'input'
  | 'persistence'
  | 'performance';

// Map category names to debug settings keys
const categoryToSettingKey: Record<DebugCategory, keyof DebugSettings> = {
  views: 'debugViews',
  audio: 'debugAudio',
  input: 'debugInput',
  persistence: 'debugPersistence',
  performance: 'debugPerformance',
};

/**
 * Check if informational output is enabled for a specific category
 */
function isEnabled(category: DebugCategory): boolean {
  const debugSettings = debugStore.getState().debugSettings;

  // Check master toggle first
  if (!debugSettings.debugEnabled) {
    return false;
  }

  return debugSettings[categoryToSettingKey[category]];
}

/**
 * Debug logger backed by the debug store.
 *
 * `log` only writes when both the master toggle and the category are on.
 * Warnings and errors always reach the console: they report configuration
 * problems and missing collaborators, which must not be silenced by a
 * debug switch.
 */
export const debugLog = {
  log(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      // eslint-disable-next-line no-console -- Debug logger intentionally uses console.log
      console.log(...args);
    }
  },

  warn(_category: DebugCategory, ...args: unknown[]): void {
    console.warn(...args);
  },

  error(_category: DebugCategory, ...args: unknown[]): void {
    console.error(...args);
  },

  /**
   * Check if a category is enabled (useful for expensive debug formatting)
   */
  isEnabled,
};

// Category-specific logger interface
export interface CategoryLogger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  isEnabled: () => boolean;
}

function createCategoryLogger(category: DebugCategory): CategoryLogger {
  return {
    log: (...args: unknown[]) => debugLog.log(category, ...args),
    warn: (...args: unknown[]) => debugLog.warn(category, ...args),
    error: (...args: unknown[]) => debugLog.error(category, ...args),
    isEnabled: () => isEnabled(category),
  };
}

export const debugViews = createCategoryLogger('views');
export const debugAudio = createCategoryLogger('audio');
export const debugInput = createCategoryLogger('input');
export const debugPersistence = createCategoryLogger('persistence');
export const debugPerformance = createCategoryLogger('performance');
