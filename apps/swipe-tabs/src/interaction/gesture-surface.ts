/**
 * Gesture Surface
 *
 * The seam between the swipe interactor and whatever recognizes pointer
 * input. A surface is a page's content view; it hands out edge pan
 * recognizers that report classified samples.
 */

import type { GestureSample, ScreenEdge, Vector } from '@swipeable-tabs/shared-types/gesture';

export interface EdgePanRecognizer {
  readonly edge: ScreenEdge;
  enabled: boolean;
  /** Translation of the gesture in progress, zero when idle */
  translation(): Vector;
  /** Stop recognizing and release any listeners */
  detach(): void;
}

export type PanHandler = (sample: GestureSample, recognizer: EdgePanRecognizer) => void;

/**
 * Decides whether `recognizer` may keep recognizing while `other` does too
 */
export interface SimultaneousRecognitionGuard {
  shouldRecognizeSimultaneously(recognizer: EdgePanRecognizer, other: EdgePanRecognizer): boolean;
}

export interface GestureSurface {
  /** Stable identity of the page this surface belongs to */
  readonly id: string;
  addEdgePan(edge: ScreenEdge, handler: PanHandler, guard: SimultaneousRecognitionGuard): EdgePanRecognizer;
}

export interface RecognizerPair {
  left: EdgePanRecognizer;
  right: EdgePanRecognizer;
}

/**
 * Page id -> registered recognizer pair. Binding a surface again detaches
 * the previous pair before the new one is stored.
 */
export class RecognizerRegistry {
  private pairs: Map<string, RecognizerPair> = new Map();

  bind(surface: GestureSurface, create: (surface: GestureSurface) => RecognizerPair): RecognizerPair {
    this.release(surface.id);
    const pair = create(surface);
    this.pairs.set(surface.id, pair);
    return pair;
  }

  get(id: string): RecognizerPair | undefined {
    return this.pairs.get(id);
  }

  release(id: string): void {
    const existing = this.pairs.get(id);
    if (!existing) return;
    existing.left.detach();
    existing.right.detach();
    this.pairs.delete(id);
  }

  forEach(callback: (pair: RecognizerPair, id: string) => void): void {
    this.pairs.forEach(callback);
  }

  get size(): number {
    return this.pairs.size;
  }

  clear(): void {
    for (const id of [...this.pairs.keys()]) {
      this.release(id);
    }
  }
}
