import * as THREE from 'three';
import { debugPersistence } from '@/utils/debugLogger';
import type { PresentationContext, SimulationProcess } from './types';

/**
 * Scene node hosting the simulation process. Whatever tree it sits in when
 * the anchor runs, it ends up under the coordinator's persistent root.
 */
export class SimulationHostNode extends THREE.Object3D {
  public readonly isSimulationHostNode = true;

  constructor(public readonly process: SimulationProcess) {
    super();
    this.name = `SimulationHost:${process.id}`;
  }
}

export type PersistenceOrigin = 'colocated' | 'primaryContext';

export interface PersistentProcessHandle {
  readonly process: SimulationProcess;
  readonly host: SimulationHostNode;
  readonly origin: PersistenceOrigin;
}

function findSimulationHost(root: THREE.Object3D): SimulationHostNode | null {
  let found: SimulationHostNode | null = null;
  root.traverse((node) => {
    if (found === null && node instanceof SimulationHostNode) {
      found = node;
    }
  });
  return found;
}

function isDescendantOf(node: THREE.Object3D, ancestor: THREE.Object3D): boolean {
  let current: THREE.Object3D | null = node;
  while (current) {
    if (current === ancestor) return true;
    current = current.parent;
  }
  return false;
}

/**
 * Keeps the simulation process alive across every presentation load and
 * unload by moving its host under a root no loadable context owns.
 *
 * Runs once. After a handle is established it is never re-evaluated, and
 * a missing process is only warned about: view switching works without it.
 */
export class PersistentProcessAnchor {
  private handle: PersistentProcessHandle | null = null;
  private attempted = false;

  constructor(private readonly persistentRoot: THREE.Object3D) {}

  /**
   * Locate the simulation, preferring one co-located with the coordinator,
   * and mark its host persistent.
   */
  public establish(
    primaryContext: PresentationContext | null,
    colocated: SimulationHostNode | null = null
  ): PersistentProcessHandle | null {
    if (this.attempted) {
      return this.handle;
    }
    this.attempted = true;

    if (colocated) {
      this.handle = this.anchor(colocated, 'colocated');
      return this.handle;
    }

    const host = primaryContext ? findSimulationHost(primaryContext.root) : null;
    if (!host) {
      debugPersistence.warn(
        '[PersistentProcessAnchor] No simulation process found! ' +
          'Overlay widgets will have no data.'
      );
      return null;
    }

    this.handle = this.anchor(host, 'primaryContext');
    return this.handle;
  }

  private anchor(host: SimulationHostNode, origin: PersistenceOrigin): PersistentProcessHandle {
    if (isDescendantOf(host, this.persistentRoot)) {
      debugPersistence.log(`[PersistentProcessAnchor] ${host.name} already under persistent root`);
    } else {
      // attach() keeps the world transform while re-parenting
      this.persistentRoot.attach(host);
      debugPersistence.log(`[PersistentProcessAnchor] ${host.name} (${origin}) marked persistent`);
    }

    return { process: host.process, host, origin };
  }

  public get current(): PersistentProcessHandle | null {
    return this.handle;
  }

  public get hasRun(): boolean {
    return this.attempted;
  }
}
