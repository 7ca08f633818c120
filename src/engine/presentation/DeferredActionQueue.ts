import { debugViews } from '@/utils/debugLogger';

/**
 * Single-slot queue for an action that has to wait for its target.
 *
 * Setting again before a drain overwrites the slot rather than growing a
 * list. The slot is cleared before the action runs, so an action that
 * re-sets it does not fire twice in the same drain.
 */
export class DeferredActionQueue<K extends string> {
  private pending: K | null = null;

  constructor(private readonly handlers: Readonly<Record<K, () => void>>) {}

  public set(kind: K): void {
    if (this.pending !== kind) {
      debugViews.log(`[DeferredActionQueue] Deferred "${kind}"`);
    }
    this.pending = kind;
  }

  /**
   * Drop the pending action without running it.
   * @returns The action that was discarded, if any
   */
  public clear(): K | null {
    const discarded = this.pending;
    this.pending = null;
    if (discarded !== null) {
      debugViews.log(`[DeferredActionQueue] Discarded "${discarded}"`);
    }
    return discarded;
  }

  public get pendingAction(): K | null {
    return this.pending;
  }

  public hasPending(): boolean {
    return this.pending !== null;
  }

  /**
   * Run the pending action, if any.
   * @returns true if an action ran
   */
  public drainIfPending(): boolean {
    const kind = this.pending;
    if (kind === null) {
      return false;
    }

    this.pending = null;
    this.handlers[kind]();
    return true;
  }
}
