import * as THREE from 'three';
import type {
  OverlayControlSurface,
  PresentationContext,
  PresentationContextProvider,
  PresentationLoader,
} from '../types';

interface PendingOperation<T> {
  name: string;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

/**
 * Presentation loader for unit tests. Requests are recorded and stay
 * pending until the test settles them with completeLoad()/failLoad() or
 * completeUnload()/failUnload().
 */
export class ManualPresentationLoader implements PresentationLoader, PresentationContextProvider {
  public readonly loadRequests: string[] = [];
  public readonly unloadRequests: string[] = [];

  private registered: Set<string> = new Set();
  private contexts: Map<string, PresentationContext> = new Map();
  private pendingLoads: PendingOperation<PresentationContext>[] = [];
  private pendingUnloads: PendingOperation<void>[] = [];

  register(name: string): void {
    this.registered.add(name);
  }

  addLoaded(name: string, controlSurface: OverlayControlSurface | null = null): PresentationContext {
    const root = new THREE.Scene();
    root.name = name;
    const context: PresentationContext = { name, root, controlSurface };
    this.contexts.set(name, context);
    return context;
  }

  /** Drop a context without going through unloadOverlay() */
  forget(name: string): void {
    this.contexts.delete(name);
  }

  loadOverlay(name: string): Promise<PresentationContext> | null {
    this.loadRequests.push(name);
    if (!this.registered.has(name)) {
      return null;
    }

    return new Promise<PresentationContext>((resolve, reject) => {
      this.pendingLoads.push({ name, resolve, reject });
    });
  }

  unloadOverlay(name: string): Promise<void> | null {
    this.unloadRequests.push(name);
    if (!this.contexts.has(name)) {
      return null;
    }

    return new Promise<void>((resolve, reject) => {
      this.pendingUnloads.push({ name, resolve, reject });
    });
  }

  /**
   * Settle the oldest pending load. The context is resident before the
   * completion is delivered, as with a real loader.
   */
  completeLoad(
    populate?: (root: THREE.Object3D) => void,
    controlSurface: OverlayControlSurface | null = null
  ): PresentationContext {
    const pending = this.takeOldest(this.pendingLoads, 'load');
    const context = this.addLoaded(pending.name, controlSurface);
    populate?.(context.root);
    pending.resolve(context);
    return context;
  }

  failLoad(error: unknown): void {
    this.takeOldest(this.pendingLoads, 'load').reject(error);
  }

  completeUnload(): void {
    const pending = this.takeOldest(this.pendingUnloads, 'unload');
    this.contexts.delete(pending.name);
    pending.resolve();
  }

  failUnload(error: unknown): void {
    this.takeOldest(this.pendingUnloads, 'unload').reject(error);
  }

  get pendingLoadCount(): number {
    return this.pendingLoads.length;
  }

  get pendingUnloadCount(): number {
    return this.pendingUnloads.length;
  }

  getLoadedContexts(): readonly PresentationContext[] {
    return Array.from(this.contexts.values());
  }

  getContext(name: string): PresentationContext | null {
    return this.contexts.get(name) ?? null;
  }

  isLoaded(name: string): boolean {
    return this.contexts.has(name);
  }

  private takeOldest<T>(queue: PendingOperation<T>[], kind: string): PendingOperation<T> {
    const pending = queue.shift();
    if (!pending) {
      throw new Error(`No pending ${kind} to settle`);
    }
    return pending;
  }
}
