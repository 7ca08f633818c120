import * as THREE from 'three';

/**
 * Anything the sink can mute. THREE.AudioListener satisfies this.
 */
export interface AudioOutput {
  setMasterVolume(volume: number): unknown;
}

export interface AudioSinkNodeOptions {
  name?: string;
  enabled?: boolean;
  output?: AudioOutput | null;
  /** Master volume restored when the sink is enabled (0-1) */
  volume?: number;
}

/**
 * AudioSinkNode - Scene node marking an audio output endpoint
 *
 * Presentations may each bring their own sink. Only one may be live at a
 * time, which the arbiter enforces by flipping `enabled`. A bound output
 * plays at the configured volume only while the sink is enabled and active
 * in the hierarchy; otherwise it is muted.
 *
 * Ancestor visibility changes are not observed. `refreshOutput()` picks them
 * up, and the arbiter calls it for every sink on each pass.
 */
export class AudioSinkNode extends THREE.Object3D {
  public readonly isAudioSinkNode = true;

  private _enabled: boolean;
  private output: AudioOutput | null;
  private volume: number;

  constructor(options: AudioSinkNodeOptions = {}) {
    super();
    this.name = options.name ?? 'AudioSink';
    this._enabled = options.enabled ?? true;
    this.output = options.output ?? null;
    this.volume = Math.max(0, Math.min(1, options.volume ?? 1));
    this.applyOutputVolume();
  }

  public get enabled(): boolean {
    return this._enabled;
  }

  public set enabled(value: boolean) {
    if (this._enabled === value) return;
    this._enabled = value;
    this.applyOutputVolume();
  }

  public setVolume(volume: number): void {
    this.volume = Math.max(0, Math.min(1, volume));
    this.applyOutputVolume();
  }

  public getVolume(): number {
    return this.volume;
  }

  public bindOutput(output: AudioOutput | null): void {
    this.output = output;
    this.applyOutputVolume();
  }

  /**
   * Re-apply the output volume after the node or an ancestor was shown or hidden.
   */
  public refreshOutput(): void {
    this.applyOutputVolume();
  }

  public get audible(): boolean {
    return this._enabled && isActiveInHierarchy(this);
  }

  private applyOutputVolume(): void {
    this.output?.setMasterVolume(this.audible ? this.volume : 0);
  }
}

/**
 * True when the node and every ancestor is visible.
 */
export function isActiveInHierarchy(node: THREE.Object3D): boolean {
  let current: THREE.Object3D | null = node;
  while (current) {
    if (!current.visible) return false;
    current = current.parent;
  }
  return true;
}
