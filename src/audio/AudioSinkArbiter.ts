import type * as THREE from 'three';
import type { PresentationContext } from '@/engine/presentation/types';
import { debugAudio } from '@/utils/debugLogger';
import { AudioSinkNode, isActiveInHierarchy } from './AudioSinkNode';

export interface AudioSinkCandidate {
  readonly sink: AudioSinkNode;
  readonly contextName: string;
  readonly isActiveInHierarchy: boolean;
  readonly enabled: boolean;
}

export type ArbitrationRule =
  | 'mainOutput'        // Sink on the designated main output node
  | 'preferredContext'  // Live sink in the context matching the current view
  | 'anyContext'        // Live sink anywhere
  | 'fallback'          // Dedicated sink under the persistent root
  | 'none';             // Nothing selectable and fallback disabled

export interface ArbitrationResult {
  readonly winner: AudioSinkNode | null;
  readonly winnerContext: string | null;
  readonly rule: ArbitrationRule;
  readonly disabled: readonly AudioSinkNode[];
  readonly createdFallback: boolean;
  /** True when this pass enabled, disabled or created anything, or the winner moved */
  readonly changed: boolean;
  readonly candidateCount: number;
}

export interface AudioSinkArbiterOptions {
  /** Contexts to scan, in scan order. Called fresh on every pass. */
  getContexts: () => readonly PresentationContext[];
  /** Parent for the fallback sink; should outlive every presentation */
  fallbackParent: THREE.Object3D;
  fallbackContextName: string;
  allowFallback?: boolean;
  fallbackName?: string;
  getMainOutputNode?: () => THREE.Object3D | null;
  createSink?: (name: string) => AudioSinkNode;
}

function isAttachedTo(sink: AudioSinkNode, node: THREE.Object3D): boolean {
  return sink === node || sink.parent === node;
}

/**
 * AudioSinkArbiter - Keeps exactly one audio sink live across all loaded
 * presentation contexts.
 *
 * Selection, first match wins:
 * 1. a reachable sink on the main output node
 * 2. a live sink in the preferred context
 * 3. a live sink in any context, in scan order
 * 4. the fallback sink, created once and reused
 *
 * The winner is enabled, every other reachable sink that is enabled gets
 * disabled, and unreachable sinks keep their flag. Every sink's output is
 * re-applied on each pass, so an unreachable sink is muted while hidden.
 * Passes are idempotent.
 */
export class AudioSinkArbiter {
  private readonly getContexts: () => readonly PresentationContext[];
  private readonly fallbackParent: THREE.Object3D;
  private readonly fallbackContextName: string;
  private readonly fallbackName: string;
  private readonly getMainOutputNode: () => THREE.Object3D | null;
  private readonly createSink: (name: string) => AudioSinkNode;

  private allowFallback: boolean;
  private fallbackSink: AudioSinkNode | null = null;
  private lastWinner: AudioSinkNode | null = null;

  constructor(options: AudioSinkArbiterOptions) {
    this.getContexts = options.getContexts;
    this.fallbackParent = options.fallbackParent;
    this.fallbackContextName = options.fallbackContextName;
    this.allowFallback = options.allowFallback ?? true;
    this.fallbackName = options.fallbackName ?? 'FallbackAudioSink';
    this.getMainOutputNode = options.getMainOutputNode ?? (() => null);
    this.createSink = options.createSink ?? ((name) => new AudioSinkNode({ name }));
  }

  /**
   * Enumerate every sink in every context. Nothing is cached between passes.
   */
  public enumerateCandidates(): AudioSinkCandidate[] {
    const candidates: AudioSinkCandidate[] = [];
    const seen = new Set<AudioSinkNode>();

    for (const context of this.getContexts()) {
      context.root.traverse((node) => {
        if (!(node instanceof AudioSinkNode) || seen.has(node)) return;
        seen.add(node);
        candidates.push({
          sink: node,
          contextName: context.name,
          isActiveInHierarchy: isActiveInHierarchy(node),
          enabled: node.enabled,
        });
      });
    }

    return candidates;
  }

  public arbitrate(preferredContextName: string): ArbitrationResult {
    const candidates = this.enumerateCandidates();

    const mainNode = this.getMainOutputNode();
    const live = (c: AudioSinkCandidate): boolean => c.enabled && c.isActiveInHierarchy;

    const rules: Array<[ArbitrationRule, (c: AudioSinkCandidate) => boolean]> = [
      ['mainOutput', (c) => mainNode !== null && c.isActiveInHierarchy && isAttachedTo(c.sink, mainNode)],
      ['preferredContext', (c) => live(c) && c.contextName === preferredContextName],
      ['anyContext', live],
    ];

    let selected: AudioSinkCandidate | null = null;
    let rule: ArbitrationRule = 'none';
    for (const [candidateRule, matches] of rules) {
      const match = candidates.find(matches);
      if (match) {
        selected = match;
        rule = candidateRule;
        break;
      }
    }

    let createdFallback = false;
    let winningSink: AudioSinkNode | null = selected?.sink ?? null;
    let winnerContext: string | null = selected?.contextName ?? null;
    if (winningSink === null && this.allowFallback) {
      createdFallback = this.fallbackSink === null;
      winningSink = this.ensureFallbackSink();
      winnerContext = this.fallbackContextName;
      rule = 'fallback';
    }

    let changed = createdFallback || winningSink !== this.lastWinner;

    if (winningSink && !winningSink.enabled) {
      winningSink.enabled = true;
      changed = true;
    }

    const disabled: AudioSinkNode[] = [];
    for (const candidate of candidates) {
      const sink = candidate.sink;
      if (sink === winningSink || !candidate.isActiveInHierarchy || !sink.enabled) continue;
      sink.enabled = false;
      disabled.push(sink);
    }
    if (disabled.length > 0) {
      changed = true;
    }

    // Hidden sinks keep their flag but must not play
    for (const candidate of candidates) {
      candidate.sink.refreshOutput();
    }

    this.lastWinner = winningSink;

    if (changed) {
      debugAudio.log(
        `[AudioSinkArbiter] ${rule}: ${winningSink ? `${winningSink.name} (${winnerContext})` : 'no sink'}` +
          (disabled.length > 0 ? `, disabled ${disabled.map((s) => s.name).join(', ')}` : '')
      );
    }

    return {
      winner: winningSink,
      winnerContext,
      rule,
      disabled,
      createdFallback,
      changed,
      candidateCount: candidates.length,
    };
  }

  private ensureFallbackSink(): AudioSinkNode {
    if (!this.fallbackSink) {
      this.fallbackSink = this.createSink(this.fallbackName);
      debugAudio.log(`[AudioSinkArbiter] No audio sink in any context, created ${this.fallbackName}`);
    }

    // Re-parent if something moved it out of the persistent root
    if (this.fallbackSink.parent !== this.fallbackParent) {
      this.fallbackParent.add(this.fallbackSink);
    }

    return this.fallbackSink;
  }

  public setAllowFallback(allow: boolean): void {
    this.allowFallback = allow;
  }

  public getFallbackSink(): AudioSinkNode | null {
    return this.fallbackSink;
  }

  public getLastWinner(): AudioSinkNode | null {
    return this.lastWinner;
  }
}
