/**
 * KeyboardCommandSource - Per-tick key collection and view command translation
 *
 * Key codes pressed since the last tick are collected, then translated into
 * at most one command for the tick. Which keys mean what depends on the
 * current view:
 * - either view: selector key toggles the overlay's selector
 * - operator view: overlay key loads the diagnostic overlay
 * - overlay view: screen keys, Tab or Escape return to the operator view
 */

import { VIEW_KEY_BINDINGS, type ViewKeyBindings } from '@/data/views.config';
import type { ViewCommand, ViewState } from '@/engine/presentation/types';
import { debugInput } from '@/utils/debugLogger';

export interface KeyDownEvent {
  readonly code: string;
  readonly repeat?: boolean;
}

/**
 * Minimal keydown source (a window, document or test double).
 */
export interface KeyEventTarget {
  addEventListener(type: 'keydown', listener: (event: KeyDownEvent) => void): void;
  removeEventListener(type: 'keydown', listener: (event: KeyDownEvent) => void): void;
}

export class KeyboardCommandSource {
  private pressedThisFrame: Set<string> = new Set();

  constructor(private readonly bindings: ViewKeyBindings = VIEW_KEY_BINDINGS) {}

  /**
   * Record a key press for the current frame.
   */
  public press(code: string): void {
    this.pressedThisFrame.add(code);
  }

  public wasPressed(code: string): boolean {
    return this.pressedThisFrame.has(code);
  }

  /**
   * Listen for keydown on a target. Auto-repeat is ignored.
   * @returns Detach function
   */
  public attach(target: KeyEventTarget): () => void {
    const listener = (event: KeyDownEvent): void => {
      if (event.repeat) return;
      this.press(event.code);
    };

    target.addEventListener('keydown', listener);
    return () => target.removeEventListener('keydown', listener);
  }

  /**
   * Translate this frame's presses without consuming them.
   */
  public translate(view: ViewState): ViewCommand | null {
    if (this.anyPressed(this.bindings.toggleSelector)) {
      return 'toggleSelector';
    }

    if (view === 'primary') {
      return this.anyPressed(this.bindings.switchToOverlay) ? 'switchToOverlay' : null;
    }

    return this.anyPressed(this.bindings.returnToPrimary) ? 'switchToPrimary' : null;
  }

  /**
   * Translate and clear. Presses never carry over to the next frame.
   */
  public consumeFrame(view: ViewState): ViewCommand | null {
    const command = this.translate(view);
    if (command !== null) {
      debugInput.log(`[KeyboardCommandSource] ${Array.from(this.pressedThisFrame).join('+')} -> ${command}`);
    }
    this.pressedThisFrame.clear();
    return command;
  }

  private anyPressed(codes: readonly string[]): boolean {
    return codes.some((code) => this.pressedThisFrame.has(code));
  }
}
