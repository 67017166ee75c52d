/**
 * Transition vocabulary
 *
 * Interaction bookkeeping held by the swipe interactor and the intent record
 * produced for every tab transition.
 *
 * @module transition
 */

/**
 * Live state of a single drag interaction (single-touch)
 */
export interface InteractionState {
  inProgress: boolean;
  /** Locked in at `began` from the sign of the horizontal velocity */
  rightToLeft: boolean;
  shouldComplete: boolean;
  /** Set when a vertical or diagonal start suspended the gesture */
  diagonalSuspended: boolean;
}

export const IDLE_INTERACTION: Readonly<InteractionState> = Object.freeze({
  inProgress: false,
  rightToLeft: false,
  shouldComplete: false,
  diagonalSuspended: false,
});

/**
 * One tab transition, from the index being left to the index being shown
 */
export interface TransitionIntent {
  /** uuid v4, shared by the start and finish notifications of one transition */
  id: string;
  fromIndex: number;
  toIndex: number;
  isSwipeOriginated: boolean;
}

/**
 * Outcome of a finished interaction
 */
export type InteractionOutcome = 'committed' | 'cancelled';
