import { describe, it, expect, afterEach, vi } from 'vitest';
import * as THREE from 'three';
import { PresentationRegistry } from '@/engine/presentation/PresentationRegistry';
import { ViewCoordinator } from '@/engine/presentation/ViewCoordinator';

describe('PresentationRegistry', () => {
  it('rejects a duplicate registration', () => {
    const registry = new PresentationRegistry();
    registry.register('diagnostics', () => ({ root: new THREE.Group() }));

    expect(() => registry.register('diagnostics', () => ({ root: new THREE.Group() }))).toThrow(
      'Presentation "diagnostics" is already registered'
    );
  });

  it('fails a load for an unknown name immediately', () => {
    const registry = new PresentationRegistry();

    expect(registry.isRegistered('diagnostics')).toBe(false);
    expect(registry.loadOverlay('diagnostics')).toBeNull();
  });

  it('tells registered names from resident ones', async () => {
    const registry = new PresentationRegistry();
    registry.createLoaded('operator-screens');
    registry.register('diagnostics', () => ({ root: new THREE.Group() }));

    expect(registry.isRegistered('diagnostics')).toBe(true);
    expect(registry.isLoaded('diagnostics')).toBe(false);
    expect(registry.isRegistered('operator-screens')).toBe(false);

    await registry.loadOverlay('diagnostics');
    expect(registry.isRegistered('diagnostics')).toBe(true);
    expect(registry.isLoaded('diagnostics')).toBe(true);
  });

  it('completes a load on a later tick', async () => {
    const registry = new PresentationRegistry();
    const root = new THREE.Group();
    registry.register('diagnostics', () => ({ root }));

    const operation = registry.loadOverlay('diagnostics');
    expect(registry.isLoaded('diagnostics')).toBe(false);

    const context = await operation;

    expect(context).toEqual({ name: 'diagnostics', root, controlSurface: null });
    expect(root.name).toBe('diagnostics');
    expect(registry.isLoaded('diagnostics')).toBe(true);
    expect(registry.getContext('diagnostics')).toBe(context);
  });

  it('shares one in-flight load between callers', async () => {
    const registry = new PresentationRegistry();
    const factory = vi.fn(async () => ({ root: new THREE.Group() }));
    registry.register('diagnostics', factory);

    const first = registry.loadOverlay('diagnostics');
    const second = registry.loadOverlay('diagnostics');

    expect(second).toBe(first);
    await first;
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('resolves with the resident context when already loaded', async () => {
    const registry = new PresentationRegistry();
    const factory = vi.fn(() => ({ root: new THREE.Group() }));
    registry.register('diagnostics', factory);

    const loaded = await registry.loadOverlay('diagnostics');
    const again = await registry.loadOverlay('diagnostics');

    expect(again).toBe(loaded);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('allows a retry after the factory rejects', async () => {
    const registry = new PresentationRegistry();
    const factory = vi
      .fn<(name: string) => Promise<{ root: THREE.Object3D }>>()
      .mockRejectedValueOnce(new Error('bundle missing'))
      .mockResolvedValueOnce({ root: new THREE.Group() });
    registry.register('diagnostics', factory);

    await expect(registry.loadOverlay('diagnostics')).rejects.toThrow('bundle missing');
    expect(registry.isLoaded('diagnostics')).toBe(false);

    await registry.loadOverlay('diagnostics');
    expect(registry.isLoaded('diagnostics')).toBe(true);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('unloads by detaching and clearing the root', async () => {
    const registry = new PresentationRegistry();
    const scene = new THREE.Scene();
    const root = new THREE.Group();
    root.add(new THREE.Object3D());
    registry.register('diagnostics', () => ({ root }));
    await registry.loadOverlay('diagnostics');
    scene.add(root);

    const operation = registry.unloadOverlay('diagnostics');
    expect(registry.isLoaded('diagnostics')).toBe(true);
    await operation;

    expect(registry.isLoaded('diagnostics')).toBe(false);
    expect(root.parent).toBeNull();
    expect(root.children).toHaveLength(0);
  });

  it('has nothing to unload for a context that is not resident', () => {
    const registry = new PresentationRegistry();
    registry.register('diagnostics', () => ({ root: new THREE.Group() }));

    expect(registry.unloadOverlay('diagnostics')).toBeNull();
  });

  it('lists resident contexts in load order', async () => {
    const registry = new PresentationRegistry();
    registry.createLoaded('operator-screens');
    registry.register('diagnostics', () => ({ root: new THREE.Group() }));
    await registry.loadOverlay('diagnostics');

    expect(registry.getLoadedContexts().map((c) => c.name)).toEqual(['operator-screens', 'diagnostics']);
  });

  describe('driving a coordinator', () => {
    let coordinator: ViewCoordinator | null = null;

    afterEach(() => {
      coordinator?.dispose();
      coordinator = null;
      vi.restoreAllMocks();
    });

    it('loads and unloads the overlay through a full round trip', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const registry = new PresentationRegistry();
      const primary = registry.createLoaded('operator-screens');
      const container = new THREE.Group();
      primary.root.add(container);
      const surface = { toggleSelector: vi.fn() };
      registry.register('diagnostics', () => ({ root: new THREE.Group(), controlSurface: surface }));

      coordinator = new ViewCoordinator({ loader: registry, contexts: registry, primaryContainer: container });
      coordinator.start();

      coordinator.requestSelector();
      await coordinator.whenSettled();

      expect(coordinator.currentView).toBe('overlay');
      expect(surface.toggleSelector).toHaveBeenCalledTimes(1);
      expect(container.visible).toBe(false);

      coordinator.switchToPrimary();
      await coordinator.whenSettled();

      expect(coordinator.currentView).toBe('primary');
      expect(registry.isLoaded('diagnostics')).toBe(false);
      expect(container.visible).toBe(true);
    });
  });
});
