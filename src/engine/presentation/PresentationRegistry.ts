import * as THREE from 'three';
import { debugViews } from '@/utils/debugLogger';
import type {
  OverlayControlSurface,
  PresentationContext,
  PresentationContextProvider,
  PresentationLoader,
} from './types';

/**
 * What a registered presentation builds when loaded.
 */
export interface PresentationContent {
  root: THREE.Object3D;
  controlSurface?: OverlayControlSurface | null;
}

export type PresentationFactory = (name: string) => PresentationContent | Promise<PresentationContent>;

/**
 * PresentationRegistry - In-process presentation loader
 *
 * Presentations are registered by name with a factory. Loading runs the
 * factory on a later tick and records the context as resident; unloading
 * detaches and clears its root. The registry is also the coordinator's
 * source for "which contexts are loaded right now".
 */
export class PresentationRegistry implements PresentationLoader, PresentationContextProvider {
  private factories: Map<string, PresentationFactory> = new Map();
  // Insertion order is load order
  private loaded: Map<string, PresentationContext> = new Map();
  private loading: Map<string, Promise<PresentationContext>> = new Map();

  /**
   * Register an additively loadable presentation.
   * @throws Error if the name is already registered
   */
  public register(name: string, factory: PresentationFactory): void {
    if (this.factories.has(name)) {
      throw new Error(`Presentation "${name}" is already registered`);
    }
    this.factories.set(name, factory);
  }

  /**
   * Record a context that is already resident, such as the primary view.
   */
  public addLoaded(context: PresentationContext): void {
    this.loaded.set(context.name, context);
  }

  /**
   * Convenience for building a resident context around a fresh scene.
   */
  public createLoaded(name: string): PresentationContext {
    const root = new THREE.Scene();
    root.name = name;
    const context: PresentationContext = { name, root };
    this.addLoaded(context);
    return context;
  }

  public isRegistered(name: string): boolean {
    return this.factories.has(name);
  }

  public isLoaded(name: string): boolean {
    return this.loaded.has(name);
  }

  public getContext(name: string): PresentationContext | null {
    return this.loaded.get(name) ?? null;
  }

  public getLoadedContexts(): readonly PresentationContext[] {
    return Array.from(this.loaded.values());
  }

  public loadOverlay(name: string): Promise<PresentationContext> | null {
    const factory = this.factories.get(name);
    if (!factory) {
      return null;
    }

    const resident = this.loaded.get(name);
    if (resident) {
      return Promise.resolve(resident);
    }

    const inFlight = this.loading.get(name);
    if (inFlight) {
      return inFlight;
    }

    const operation = this.build(name, factory).finally(() => {
      this.loading.delete(name);
    });
    this.loading.set(name, operation);
    return operation;
  }

  public unloadOverlay(name: string): Promise<void> | null {
    const context = this.loaded.get(name);
    if (!context) {
      return null;
    }

    return Promise.resolve().then(() => {
      // A reload may have replaced the context while this was queued
      if (this.loaded.get(name) !== context) return;

      this.loaded.delete(name);
      context.root.removeFromParent();
      context.root.clear();
      debugViews.log(`[PresentationRegistry] Unloaded "${name}"`);
    });
  }

  private async build(name: string, factory: PresentationFactory): Promise<PresentationContext> {
    // Yield so completion always lands on a later tick than the request
    await Promise.resolve();

    const content = await factory(name);
    if (!content.root.name) {
      content.root.name = name;
    }

    const context: PresentationContext = {
      name,
      root: content.root,
      controlSurface: content.controlSurface ?? null,
    };
    this.loaded.set(name, context);
    debugViews.log(`[PresentationRegistry] Loaded "${name}"`);
    return context;
  }
}
