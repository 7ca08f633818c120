import { debugPerformance } from '@/utils/debugLogger';

export type FrameCallback = (deltaTime: number) => void;

// Cap delta so a stalled event loop does not trigger a long catch-up burst
const MAX_FRAME_DELTA_MS = 250;
const MAX_ITERATIONS_PER_WAKE = 10;

/**
 * Fixed-timestep frame loop driven by setInterval.
 *
 * Each wake adds elapsed wall time to an accumulator and runs the callback
 * once per whole frame it holds, so callers always see a constant delta.
 */
export class FrameLoop {
  private frameRate: number;
  private frameMs: number;
  private isRunning = false;
  private lastTime = 0;
  private accumulator = 0;
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private frames = 0;

  private readonly frameCallback: FrameCallback;

  constructor(frameRate: number, frameCallback: FrameCallback) {
    this.frameRate = frameRate;
    this.frameMs = 1000 / frameRate;
    this.frameCallback = frameCallback;
  }

  public start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    this.lastTime = performance.now();
    this.accumulator = 0;
    this.intervalId = setInterval(() => this.wake(), this.frameMs);
  }

  public stop(): void {
    this.isRunning = false;

    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  private wake(): void {
    if (!this.isRunning) return;

    const currentTime = performance.now();
    const deltaTime = currentTime - this.lastTime;
    this.lastTime = currentTime;

    this.accumulator += Math.min(deltaTime, MAX_FRAME_DELTA_MS);

    let iterations = 0;
    while (this.accumulator >= this.frameMs && iterations < MAX_ITERATIONS_PER_WAKE) {
      this.frameCallback(this.frameMs);
      this.accumulator -= this.frameMs;
      this.frames++;
      iterations++;

      // The callback may have stopped the loop
      if (!this.isRunning) return;
    }

    if (iterations > 1) {
      debugPerformance.log(
        `[FrameLoop] wake ran ${iterations} frames, accumulator=${this.accumulator.toFixed(1)}ms`
      );
    }
  }

  public setFrameRate(frameRate: number): void {
    this.frameRate = frameRate;
    this.frameMs = 1000 / frameRate;

    if (this.isRunning && this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = setInterval(() => this.wake(), this.frameMs);
    }
  }

  public getFrameRate(): number {
    return this.frameRate;
  }

  public getFrameCount(): number {
    return this.frames;
  }

  public get running(): boolean {
    return this.isRunning;
  }

  public dispose(): void {
    this.stop();
  }
}
