/**
 * In-memory gesture surface: tests push classified samples straight into
 * the handler the interactor registered.
 */

import type { GesturePhase, ScreenEdge, Vector } from '@swipeable-tabs/shared-types/gesture';
import type {
  EdgePanRecognizer,
  GestureSurface,
  PanHandler,
  SimultaneousRecognitionGuard,
} from '../../interaction/gesture-surface';

export class FakeEdgePan implements EdgePanRecognizer {
  enabled = true;
  detached = false;
  current: Vector = { x: 0, y: 0 };

  constructor(
    readonly edge: ScreenEdge,
    private readonly handler: PanHandler,
    readonly guard: SimultaneousRecognitionGuard
  ) {}

  translation(): Vector {
    return { ...this.current };
  }

  detach(): void {
    this.detached = true;
  }

  /** Delivers a sample unless the recognizer is disabled or detached */
  send(phase: GesturePhase, translation: Vector = { x: 0, y: 0 }, velocity: Vector = { x: 0, y: 0 }): void {
    if (this.detached || !this.enabled) return;
    this.current = { ...translation };
    this.handler({ phase, translation, velocity }, this);
  }
}

export class FakeGestureSurface implements GestureSurface {
  readonly recognizers: FakeEdgePan[] = [];

  constructor(readonly id: string) {}

  addEdgePan(edge: ScreenEdge, handler: PanHandler, guard: SimultaneousRecognitionGuard): EdgePanRecognizer {
    const recognizer = new FakeEdgePan(edge, handler, guard);
    this.recognizers.push(recognizer);
    return recognizer;
  }

  /** Latest attached recognizer for an edge */
  edge(edge: ScreenEdge): FakeEdgePan {
    const live = this.recognizers.filter(r => r.edge === edge && !r.detached);
    const recognizer = live[live.length - 1];
    if (!recognizer) {
      throw new Error(`No ${edge} recognizer attached to ${this.id}`);
    }
    return recognizer;
  }

  get attachedCount(): number {
    return this.recognizers.filter(r => !r.detached).length;
  }
}
