/**
 * Gesture vocabulary
 *
 * Classified pointer samples as delivered by a gesture recognizer.
 * Translation and velocity are in view coordinates; velocity is px/s.
 *
 * @module gesture
 */

export type GesturePhase = 'began' | 'changed' | 'ended' | 'cancelled';

export interface Vector {
  x: number;
  y: number;
}

/**
 * One pointer update. Ephemeral: a recognizer emits a fresh sample per update.
 */
export interface GestureSample {
  phase: GesturePhase;
  /** Offset from the point where the gesture started */
  translation: Vector;
  /** Instantaneous velocity in px/s */
  velocity: Vector;
}

/**
 * Screen edge a recognizer is bound to
 */
export type ScreenEdge = 'left' | 'right';

export const ZERO_VECTOR: Readonly<Vector> = Object.freeze({ x: 0, y: 0 });
