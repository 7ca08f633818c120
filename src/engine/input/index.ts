/**
 * Input Module
 *
 * Keyboard collection and translation into view commands.
 */

export { KeyboardCommandSource } from './KeyboardCommandSource';
export type { KeyDownEvent, KeyEventTarget } from './KeyboardCommandSource';
