import { FrameLoop } from '@/engine/core/FrameLoop';
import { KeyboardCommandSource } from '@/engine/input/KeyboardCommandSource';
import type { ViewCoordinator } from './ViewCoordinator';

/**
 * Drives a coordinator from a fixed-rate frame loop: every frame the
 * keys pressed since the previous one become at most one command.
 *
 * Usage:
 * ```typescript
 * const runtime = new ViewRuntime(coordinator);
 * runtime.keyboard.attach(window);
 * runtime.start();
 * // ...
 * runtime.dispose();
 * ```
 */
export class ViewRuntime {
  public readonly keyboard: KeyboardCommandSource;
  private readonly loop: FrameLoop;

  constructor(
    public readonly coordinator: ViewCoordinator,
    keyboard?: KeyboardCommandSource
  ) {
    this.keyboard = keyboard ?? new KeyboardCommandSource(coordinator.config.keyBindings);
    this.loop = new FrameLoop(coordinator.config.frameRate, () => this.tick());
  }

  public start(): void {
    this.coordinator.start();
    this.loop.start();
  }

  public stop(): void {
    this.loop.stop();
  }

  /**
   * One frame of input dispatch. Exposed for hosts that own their own loop.
   */
  public tick(): void {
    const command = this.keyboard.consumeFrame(this.coordinator.currentView);
    this.coordinator.handleCommand(command);
  }

  public get frameCount(): number {
    return this.loop.getFrameCount();
  }

  public get running(): boolean {
    return this.loop.running;
  }

  public dispose(): void {
    this.loop.dispose();
    this.coordinator.dispose();
  }
}
