import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { FrameLoop } from '@/engine/core/FrameLoop';

/**
 * FrameLoop timing tests
 *
 * performance.now() is faked alongside the interval timers so each wake
 * sees exactly the time advanced by the test.
 */

describe('FrameLoop', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval', 'performance', 'Date'] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs at the configured rate with a fixed delta', () => {
    const updates: number[] = [];
    const loop = new FrameLoop(20, (delta) => updates.push(delta)); // 50ms frames

    loop.start();
    vi.advanceTimersByTime(250);
    loop.stop();

    expect(updates).toEqual([50, 50, 50, 50, 50]);
    expect(loop.getFrameCount()).toBe(5);
  });

  it('respects frame rate changes while running', () => {
    const updates: number[] = [];
    const loop = new FrameLoop(10, (delta) => updates.push(delta));

    loop.start();
    vi.advanceTimersByTime(300);
    expect(updates).toEqual([100, 100, 100]);

    loop.setFrameRate(5);
    vi.advanceTimersByTime(600);
    loop.stop();

    expect(loop.getFrameRate()).toBe(5);
    expect(updates).toEqual([100, 100, 100, 200, 200, 200]);
  });

  it('stops cleanly without additional frames', () => {
    const updates: number[] = [];
    const loop = new FrameLoop(10, (delta) => updates.push(delta));

    loop.start();
    vi.advanceTimersByTime(200);
    loop.stop();

    vi.advanceTimersByTime(500);

    expect(updates).toHaveLength(2);
    expect(loop.running).toBe(false);
  });

  it('can restart after being stopped', () => {
    const updates: number[] = [];
    const loop = new FrameLoop(10, (delta) => updates.push(delta));

    loop.start();
    vi.advanceTimersByTime(200);
    loop.stop();

    loop.start();
    vi.advanceTimersByTime(300);
    loop.dispose();

    expect(updates).toHaveLength(5);
  });

  it('stops mid-wake when the callback stops the loop', () => {
    const updates: number[] = [];
    const loop = new FrameLoop(10, (delta) => {
      updates.push(delta);
      if (updates.length === 2) loop.stop();
    });

    loop.start();
    vi.advanceTimersByTime(1000);

    expect(updates).toHaveLength(2);
  });

  it('ignores a second start while running', () => {
    const updates: number[] = [];
    const loop = new FrameLoop(10, (delta) => updates.push(delta));

    loop.start();
    loop.start();
    vi.advanceTimersByTime(300);
    loop.stop();

    expect(updates).toHaveLength(3);
  });
});
