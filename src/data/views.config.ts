/**
 * Views Config - Presentation coordinator configuration
 *
 * Context names, audio arbitration cadence and key bindings used by the
 * view coordinator and the view runtime. Callers override individual
 * fields through resolveViewsConfig().
 */

// =============================================================================
// PRESENTATION CONTEXTS
// =============================================================================

/**
 * Name of the always-loaded operator presentation.
 */
export const PRIMARY_CONTEXT_NAME = 'operator-screens';

/**
 * Name of the on-demand diagnostic presentation, loaded additively.
 */
export const OVERLAY_CONTEXT_NAME = 'diagnostics';

/**
 * Name reported for nodes living under the coordinator's persistent root.
 */
export const PERSISTENT_CONTEXT_NAME = 'persistent';

// =============================================================================
// AUDIO ARBITRATION
// =============================================================================

/**
 * How often the audio sink arbiter re-runs while the coordinator is active.
 * Units of: milliseconds
 */
export const AUDIO_ARBITRATION_INTERVAL_MS = 1000;

/**
 * Create a dedicated sink under the persistent root when no context has one.
 */
export const ALLOW_FALLBACK_AUDIO_SINK = true;

export const FALLBACK_AUDIO_SINK_NAME = 'FallbackAudioSink';

// =============================================================================
// VIEW RUNTIME
// =============================================================================

/**
 * Input dispatch rate of the view runtime.
 * Units of: ticks per second
 */
export const VIEW_FRAME_RATE = 60;

// =============================================================================
// KEY BINDINGS
// =============================================================================

export interface ViewKeyBindings {
  /** Keys that load the diagnostic overlay from the operator view */
  switchToOverlay: readonly string[];
  /** Keys that open or close the overlay's selector, from either view */
  toggleSelector: readonly string[];
  /** Keys that return from the overlay to the operator view */
  returnToPrimary: readonly string[];
}

export const VIEW_KEY_BINDINGS: ViewKeyBindings = {
  switchToOverlay: ['KeyV'],
  toggleSelector: ['F2'],
  // Screen-number keys and Tab select operator screens; Escape backs out
  returnToPrimary: [
    'Digit1',
    'Digit2',
    'Digit3',
    'Digit4',
    'Digit5',
    'Digit6',
    'Digit7',
    'Digit8',
    'Tab',
    'Escape',
  ],
};

// =============================================================================
// AGGREGATED CONFIG
// =============================================================================

export interface ViewsConfig {
  primaryContextName: string;
  overlayContextName: string;
  persistentContextName: string;
  audioArbitrationIntervalMs: number;
  allowFallbackAudioSink: boolean;
  fallbackAudioSinkName: string;
  frameRate: number;
  keyBindings: ViewKeyBindings;
}

export const VIEWS_CONFIG: ViewsConfig = {
  primaryContextName: PRIMARY_CONTEXT_NAME,
  overlayContextName: OVERLAY_CONTEXT_NAME,
  persistentContextName: PERSISTENT_CONTEXT_NAME,
  audioArbitrationIntervalMs: AUDIO_ARBITRATION_INTERVAL_MS,
  allowFallbackAudioSink: ALLOW_FALLBACK_AUDIO_SINK,
  fallbackAudioSinkName: FALLBACK_AUDIO_SINK_NAME,
  frameRate: VIEW_FRAME_RATE,
  keyBindings: VIEW_KEY_BINDINGS,
};

/**
 * Merge overrides onto the defaults. Context names must differ, and the
 * interval and frame rate must be positive.
 */
export function resolveViewsConfig(overrides: Partial<ViewsConfig> = {}): ViewsConfig {
  const config: ViewsConfig = {
    ...VIEWS_CONFIG,
    ...overrides,
    keyBindings: { ...VIEWS_CONFIG.keyBindings, ...overrides.keyBindings },
  };

  const names = new Set([
    config.primaryContextName,
    config.overlayContextName,
    config.persistentContextName,
  ]);
  if (names.size !== 3) {
    throw new Error(
      `Context names must be distinct (primary "${config.primaryContextName}", ` +
        `overlay "${config.overlayContextName}", persistent "${config.persistentContextName}")`
    );
  }
  if (!(config.audioArbitrationIntervalMs > 0)) {
    throw new Error(`audioArbitrationIntervalMs must be positive, got ${config.audioArbitrationIntervalMs}`);
  }
  if (!(config.frameRate > 0)) {
    throw new Error(`frameRate must be positive, got ${config.frameRate}`);
  }

  return config;
}
