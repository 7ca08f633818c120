/**
 * Presentation Pipeline - View switching and audio sink arbitration
 *
 * Usage:
 * 1. Build a PresentationRegistry, add the resident operator context and
 *    register the diagnostic overlay factory
 * 2. Construct one ViewCoordinator with the registry as loader and provider
 * 3. Register the operator container; the overlay registers its control
 *    surface from its own initialization
 * 4. Start a ViewRuntime (or call handleCommand() from your own loop)
 */

export {
  ViewCoordinator,
  type ViewCoordinatorEvents,
  type ViewCoordinatorOptions,
} from './ViewCoordinator';
export { ViewRuntime } from './ViewRuntime';
export { DeferredActionQueue } from './DeferredActionQueue';
export {
  PersistentProcessAnchor,
  SimulationHostNode,
  type PersistentProcessHandle,
  type PersistenceOrigin,
} from './PersistentProcessAnchor';
export {
  PresentationRegistry,
  type PresentationContent,
  type PresentationFactory,
} from './PresentationRegistry';
export { CoordinatorConfigurationError } from './errors';
export type {
  DataBridge,
  DeferredActionKind,
  OverlayControlSurface,
  PresentationContext,
  PresentationContextProvider,
  PresentationLoader,
  SimulationProcess,
  ViewCommand,
  ViewState,
} from './types';
