/**
 * ViewCoordinator - Switches between the operator view and the diagnostic
 * overlay while the simulation keeps running underneath.
 *
 * Owns:
 * - the current view and the transition lock
 * - the primary view container's visibility
 * - the overlay's control surface handle
 * - one deferred "open selector" request
 * - periodic audio sink arbitration
 *
 * State machine:
 *   [primary] -- switchToOverlay / toggleSelector --> [overlay]
 *       ^                                                |
 *       +------------------ switchToPrimary -------------+
 *
 * Loads and unloads are asynchronous. While one is in flight the lock is
 * held and every transition request or command is dropped, not queued.
 */

import * as THREE from 'three';
import { AudioSinkArbiter, type ArbitrationResult } from '@/audio/AudioSinkArbiter';
import type { AudioSinkNode } from '@/audio/AudioSinkNode';
import { EventBus } from '@/engine/core/EventBus';
import { resolveViewsConfig, type ViewsConfig } from '@/data/views.config';
import { viewStore } from '@/store/viewStore';
import { debugViews } from '@/utils/debugLogger';
import { DeferredActionQueue } from './DeferredActionQueue';
import { CoordinatorConfigurationError, describeError } from './errors';
import {
  PersistentProcessAnchor,
  type PersistentProcessHandle,
  type SimulationHostNode,
} from './PersistentProcessAnchor';
import type {
  DataBridge,
  DeferredActionKind,
  OverlayControlSurface,
  PresentationContext,
  PresentationContextProvider,
  PresentationLoader,
  ViewCommand,
  ViewState,
} from './types';

export type ViewCoordinatorEvents = {
  'view:changed': { view: ViewState; previous: ViewState };
  'view:transitionFailed': { target: ViewState; reason: string };
  'audio:arbitrated': ArbitrationResult;
};

export interface ViewCoordinatorOptions {
  loader: PresentationLoader;
  contexts: PresentationContextProvider;
  config?: Partial<ViewsConfig>;
  eventBus?: EventBus<ViewCoordinatorEvents>;
  /** Container of the operator view; hidden while the overlay is current */
  primaryContainer?: THREE.Object3D | null;
  /** Simulation host living alongside the coordinator */
  simulation?: SimulationHostNode | null;
  dataBridge?: DataBridge | null;
  /** Node whose sink wins arbitration outright, e.g. the main camera */
  mainOutputNode?: THREE.Object3D | null;
  /** Builds the fallback sink; defaults to a bare AudioSinkNode */
  createAudioSink?: (name: string) => AudioSinkNode;
}

export class ViewCoordinator {
  private static active: ViewCoordinator | null = null;

  public readonly config: ViewsConfig;
  public readonly eventBus: EventBus<ViewCoordinatorEvents>;
  /** Root no presentation owns; everything under it survives every transition */
  public readonly persistentRoot: THREE.Object3D;

  private readonly loader: PresentationLoader;
  private readonly contexts: PresentationContextProvider;
  private readonly persistentContext: PresentationContext;
  private readonly dataBridge: DataBridge | null;
  private readonly colocatedSimulation: SimulationHostNode | null;
  private readonly anchor: PersistentProcessAnchor;
  private readonly arbiter: AudioSinkArbiter;
  private readonly deferred: DeferredActionQueue<DeferredActionKind>;

  private view: ViewState = 'primary';
  private transitionInProgress = false;
  private overlayLoaded = false;

  private primaryContainer: THREE.Object3D | null;
  private missingContainerReported = false;
  private mainOutputNode: THREE.Object3D | null;

  private overlayContext: PresentationContext | null = null;
  private registeredSurface: OverlayControlSurface | null = null;
  private controlSurface: OverlayControlSurface | null = null;

  private pendingTransition: Promise<void> | null = null;
  private arbitrationTimer: ReturnType<typeof setInterval> | null = null;
  private started = false;
  private disposed = false;

  constructor(options: ViewCoordinatorOptions) {
    if (ViewCoordinator.active !== null) {
      const message =
        '[ViewCoordinator] Another coordinator is already active. Dispose it before constructing a new one.';
      debugViews.error(message);
      throw new CoordinatorConfigurationError(message);
    }

    this.config = resolveViewsConfig(options.config);
    this.loader = options.loader;
    this.contexts = options.contexts;
    this.eventBus = options.eventBus ?? new EventBus<ViewCoordinatorEvents>();
    this.dataBridge = options.dataBridge ?? null;
    this.colocatedSimulation = options.simulation ?? null;
    this.primaryContainer = options.primaryContainer ?? null;
    this.mainOutputNode = options.mainOutputNode ?? null;

    this.persistentRoot = new THREE.Object3D();
    this.persistentRoot.name = 'PersistentRoot';
    this.persistentContext = { name: this.config.persistentContextName, root: this.persistentRoot };

    // Co-located simulation shares the coordinator's lifetime from the start
    if (this.colocatedSimulation && !this.colocatedSimulation.parent) {
      this.persistentRoot.add(this.colocatedSimulation);
    }

    this.anchor = new PersistentProcessAnchor(this.persistentRoot);
    this.arbiter = new AudioSinkArbiter({
      getContexts: () => [...this.contexts.getLoadedContexts(), this.persistentContext],
      fallbackParent: this.persistentRoot,
      fallbackContextName: this.config.persistentContextName,
      allowFallback: this.config.allowFallbackAudioSink,
      fallbackName: this.config.fallbackAudioSinkName,
      getMainOutputNode: () => this.mainOutputNode,
      createSink: options.createAudioSink,
    });
    this.deferred = new DeferredActionQueue<DeferredActionKind>({
      openSelector: () => this.toggleOverlaySelector(),
    });

    ViewCoordinator.active = this;
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  /**
   * Anchor the simulation, run the first arbitration pass and start the
   * arbitration timer. Safe to call more than once.
   */
  public start(): void {
    if (this.started || this.disposed) return;
    this.started = true;

    this.anchor.establish(
      this.contexts.getContext(this.config.primaryContextName),
      this.colocatedSimulation
    );

    // An overlay can already be resident if something loaded it before us
    this.overlayLoaded = this.contexts.isLoaded(this.config.overlayContextName);
    if (this.overlayLoaded) {
      this.overlayContext = this.contexts.getContext(this.config.overlayContextName);
    }

    if (!this.primaryContainer) {
      this.reportMissingContainer();
    }

    this.arbitrateAudio();
    this.arbitrationTimer = setInterval(() => {
      this.arbitrateAudio();
    }, this.config.audioArbitrationIntervalMs);

    this.syncStore();
    debugViews.log('[ViewCoordinator] Initialized, persistent root active');
  }

  /**
   * Stop the arbitration timer and release the active-coordinator slot.
   * A transition still in flight settles without touching state.
   */
  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    if (this.arbitrationTimer !== null) {
      clearInterval(this.arbitrationTimer);
      this.arbitrationTimer = null;
    }

    if (ViewCoordinator.active === this) {
      ViewCoordinator.active = null;
    }
  }

  // ==========================================================================
  // REGISTRATION
  // ==========================================================================

  public registerPrimaryContainer(container: THREE.Object3D): void {
    this.primaryContainer = container;
    this.missingContainerReported = false;
    // Shown in the operator view, and while unloading back to it
    container.visible = (this.view === 'primary') !== this.transitionInProgress;
  }

  /**
   * Called by the overlay's own initialization code.
   * @returns Unregister function
   */
  public registerControlSurface(surface: OverlayControlSurface): () => void {
    this.registeredSurface = surface;
    if (this.view === 'overlay') {
      this.controlSurface = surface;
    }

    return () => {
      if (this.registeredSurface === surface) {
        this.registeredSurface = null;
      }
      if (this.controlSurface === surface) {
        this.controlSurface = null;
      }
    };
  }

  public setMainOutputNode(node: THREE.Object3D | null): void {
    this.mainOutputNode = node;
  }

  // ==========================================================================
  // VIEW SWITCHING
  // ==========================================================================

  /**
   * Load the overlay additively and hide the operator view.
   * No-op when the overlay is current or a transition is in flight.
   */
  public switchToOverlay(): void {
    if (this.view === 'overlay' || this.transitionInProgress || this.disposed) return;

    debugViews.log('[ViewCoordinator] Switching to overlay view...');
    this.setTransitionInProgress(true);
    this.setPrimaryContainerVisible(false);

    if (this.overlayLoaded) {
      // Already resident: no async round-trip
      if (!this.overlayContext) {
        this.overlayContext = this.contexts.getContext(this.config.overlayContextName);
      }
      this.controlSurface = this.resolveControlSurface();
      this.setView('overlay');
      this.setTransitionInProgress(false);
      this.arbitrateAudio();
      this.drainDeferredAction();
      debugViews.log('[ViewCoordinator] Overlay already loaded, view active');
      return;
    }

    const name = this.config.overlayContextName;
    const operation = this.loader.loadOverlay(name);
    if (!operation) {
      this.handleLoadFailure(`Presentation "${name}" is not registered`);
      return;
    }

    this.track(
      operation.then(
        (context) => this.handleLoadComplete(context),
        (error: unknown) => this.handleLoadFailure(describeError(error))
      )
    );
  }

  /**
   * Unload the overlay and show the operator view.
   * No-op when the operator view is current or a transition is in flight.
   */
  public switchToPrimary(): void {
    if (this.view === 'primary' || this.transitionInProgress || this.disposed) return;

    debugViews.log('[ViewCoordinator] Switching to primary view...');
    this.setTransitionInProgress(true);
    this.setPrimaryContainerVisible(true);

    if (!this.overlayLoaded) {
      this.handleUnloadComplete();
      return;
    }

    const operation = this.loader.unloadOverlay(this.config.overlayContextName);
    if (!operation) {
      debugViews.log('[ViewCoordinator] Overlay was not loaded, primary view active');
      this.handleUnloadComplete();
      return;
    }

    this.track(
      operation.then(
        () => this.handleUnloadComplete(),
        (error: unknown) => this.handleUnloadFailure(describeError(error))
      )
    );
  }

  /**
   * Resolves once the in-flight transition, if any, has settled.
   */
  public whenSettled(): Promise<void> {
    return this.pendingTransition ?? Promise.resolve();
  }

  private track(operation: Promise<void>): void {
    const settled: Promise<void> = operation
      .catch((error: unknown) => {
        debugViews.error('[ViewCoordinator] Transition completion failed:', error);
      })
      .finally(() => {
        if (this.pendingTransition === settled) {
          this.pendingTransition = null;
        }
      });
    this.pendingTransition = settled;
  }

  private handleLoadComplete(context: PresentationContext): void {
    if (this.disposed) return;

    this.overlayLoaded = true;
    this.overlayContext = context;
    this.setView('overlay');
    this.setTransitionInProgress(false);

    this.controlSurface = this.resolveControlSurface();
    if (!this.controlSurface) {
      debugViews.warn(
        `[ViewCoordinator] No control surface for "${context.name}"; selector commands ignored until one registers`
      );
    }

    this.resolveDataBridgeSources();
    this.arbitrateAudio();
    this.drainDeferredAction();

    debugViews.log(`[ViewCoordinator] "${context.name}" loaded, overlay view active`);
  }

  private handleLoadFailure(reason: string): void {
    if (this.disposed) return;

    debugViews.error(
      `[ViewCoordinator] Failed to load presentation "${this.config.overlayContextName}": ${reason}`
    );

    this.setPrimaryContainerVisible(true);
    this.setTransitionInProgress(false);
    this.deferred.clear();
    this.syncStore();

    this.eventBus.emit('view:transitionFailed', { target: 'overlay', reason });
  }

  private handleUnloadComplete(): void {
    if (this.disposed) return;

    this.overlayLoaded = false;
    this.dropControlSurface();
    this.setView('primary');
    this.setTransitionInProgress(false);
    this.arbitrateAudio();

    debugViews.log('[ViewCoordinator] Overlay unloaded, primary view active');
  }

  private handleUnloadFailure(reason: string): void {
    if (this.disposed) return;

    // The overlay is still resident; a later switch takes the synchronous path
    // and finds its context and registered surface again
    debugViews.error(
      `[ViewCoordinator] Failed to unload presentation "${this.config.overlayContextName}": ${reason}`
    );

    this.controlSurface = null;
    this.setView('primary');
    this.setTransitionInProgress(false);
    this.arbitrateAudio();

    this.eventBus.emit('view:transitionFailed', { target: 'primary', reason });
  }

  // ==========================================================================
  // INPUT ROUTING
  // ==========================================================================

  /**
   * Dispatch this tick's command. Dropped while a transition is in flight.
   */
  public handleCommand(command: ViewCommand | null): void {
    if (command === null || this.transitionInProgress || this.disposed) return;

    switch (this.view) {
      case 'primary':
        if (command === 'toggleSelector') {
          this.requestSelector();
        } else if (command === 'switchToOverlay') {
          this.switchToOverlay();
        }
        break;

      case 'overlay':
        if (command === 'toggleSelector') {
          this.toggleOverlaySelector();
        } else if (command === 'switchToPrimary') {
          this.switchToPrimary();
        }
        break;
    }
  }

  /**
   * Toggle the overlay's selector from either view. From the operator view
   * the request is deferred until the overlay has loaded.
   */
  public requestSelector(): void {
    if (this.view === 'overlay') {
      this.toggleOverlaySelector();
      return;
    }

    this.deferred.set('openSelector');
    this.syncStore();
    this.switchToOverlay();
  }

  private toggleOverlaySelector(): void {
    if (!this.controlSurface) {
      this.controlSurface = this.resolveControlSurface();
    }

    if (!this.controlSurface) {
      debugViews.warn('[ViewCoordinator] Selector toggle ignored: overlay control surface not found.');
      return;
    }

    try {
      this.controlSurface.toggleSelector();
    } catch (error) {
      debugViews.error('[ViewCoordinator] Selector toggle failed:', error);
    }
  }

  private drainDeferredAction(): void {
    this.deferred.drainIfPending();
    this.syncStore();
  }

  // ==========================================================================
  // COLLABORATORS
  // ==========================================================================

  private resolveControlSurface(): OverlayControlSurface | null {
    return this.registeredSurface ?? this.overlayContext?.controlSurface ?? null;
  }

  private dropControlSurface(): void {
    this.controlSurface = null;
    this.registeredSurface = null;
    this.overlayContext = null;
  }

  private resolveDataBridgeSources(): void {
    if (!this.dataBridge) return;

    try {
      this.dataBridge.resolveSources();
      debugViews.log('[ViewCoordinator] Data bridge sources re-resolved');
    } catch (error) {
      debugViews.error('[ViewCoordinator] Data bridge failed to resolve sources:', error);
    }
  }

  private setPrimaryContainerVisible(visible: boolean): void {
    if (!this.primaryContainer) {
      this.reportMissingContainer();
      return;
    }

    this.primaryContainer.visible = visible;
    debugViews.log(`[ViewCoordinator] Primary container ${visible ? 'SHOWN' : 'HIDDEN'}`);
  }

  private reportMissingContainer(): void {
    if (this.missingContainerReported) return;
    this.missingContainerReported = true;
    debugViews.warn(
      '[ViewCoordinator] No primary container registered! View switching will not hide/show the operator view.'
    );
  }

  // ==========================================================================
  // AUDIO
  // ==========================================================================

  /**
   * Run an arbitration pass, preferring the overlay's sinks while it is current.
   */
  public arbitrateAudio(): ArbitrationResult {
    const preferred =
      this.view === 'overlay' && this.overlayLoaded
        ? this.config.overlayContextName
        : this.config.primaryContextName;

    const result = this.arbiter.arbitrate(preferred);
    if (result.changed) {
      viewStore.getState().applySnapshot({ activeAudioSink: result.winner?.name ?? null });
      this.eventBus.emit('audio:arbitrated', result);
    }
    return result;
  }

  // ==========================================================================
  // STATE
  // ==========================================================================

  private setView(next: ViewState): void {
    const previous = this.view;
    if (previous === next) return;

    this.view = next;
    this.syncStore();
    this.eventBus.emit('view:changed', { view: next, previous });
  }

  private setTransitionInProgress(value: boolean): void {
    this.transitionInProgress = value;
    this.syncStore();
  }

  private syncStore(): void {
    viewStore.getState().applySnapshot({
      currentView: this.view,
      overlayLoaded: this.overlayLoaded,
      transitionInProgress: this.transitionInProgress,
      pendingDeferredAction: this.deferred.pendingAction,
    });
  }

  public get currentView(): ViewState {
    return this.view;
  }

  public get isOverlayLoaded(): boolean {
    return this.overlayLoaded;
  }

  public get isTransitionInProgress(): boolean {
    return this.transitionInProgress;
  }

  public get pendingDeferredAction(): DeferredActionKind | null {
    return this.deferred.pendingAction;
  }

  public get hasControlSurface(): boolean {
    return this.controlSurface !== null;
  }

  public get persistentProcess(): PersistentProcessHandle | null {
    return this.anchor.current;
  }

  public get fallbackAudioSink(): AudioSinkNode | null {
    return this.arbiter.getFallbackSink();
  }
}
