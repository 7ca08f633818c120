/**
 * Presentation Types
 *
 * Collaborator contracts consumed by the view coordinator. Presentation
 * contexts are three.js object trees; the coordinator never renders them,
 * it only toggles visibility and enumerates what they contain.
 */

import type * as THREE from 'three';

// =============================================================================
// VIEW STATE
// =============================================================================

/**
 * Which presentation is current. Exactly one at any instant.
 */
export type ViewState = 'primary' | 'overlay';

/**
 * Commands the coordinator accepts, at most one per tick.
 */
export type ViewCommand = 'switchToOverlay' | 'switchToPrimary' | 'toggleSelector';

/**
 * Actions that may wait for the overlay to become ready.
 */
export type DeferredActionKind = 'openSelector';

// =============================================================================
// COLLABORATORS
// =============================================================================

/**
 * The overlay's own control surface. Registered by the overlay's
 * initialization code, or carried on the loaded context.
 */
export interface OverlayControlSurface {
  toggleSelector(): void;
}

/**
 * Widget data bridge. Asked to re-discover its sources after the overlay
 * loads so it finds the persistent simulation process.
 */
export interface DataBridge {
  resolveSources(): void;
}

/**
 * The long-lived simulation. Opaque to the coordinator: it is only
 * located and kept alive, never driven.
 */
export interface SimulationProcess {
  readonly id: string;
}

/**
 * An independently loadable unit of scene content.
 */
export interface PresentationContext {
  readonly name: string;
  readonly root: THREE.Object3D;
  readonly controlSurface?: OverlayControlSurface | null;
}

/**
 * Performs the actual asynchronous load/unload of a presentation.
 *
 * A `null` return means the request failed immediately (unknown name for a
 * load, nothing to unload for an unload). Otherwise the returned promise
 * settles on a later tick.
 */
export interface PresentationLoader {
  loadOverlay(name: string): Promise<PresentationContext> | null;
  unloadOverlay(name: string): Promise<void> | null;
}

/**
 * Enumerates the presentation contexts that are currently resident.
 */
export interface PresentationContextProvider {
  getLoadedContexts(): readonly PresentationContext[];
  getContext(name: string): PresentationContext | null;
  isLoaded(name: string): boolean;
}
