/**
 * Swipe Interactor
 *
 * Turns the edge pan gestures of the selected page into an interactive tab
 * transition:
 * - `began` picks a direction, checks eligibility and advances the selection
 * - `changed` reports the drag as a progress fraction
 * - `ended` / `cancelled` commits or rolls the transition back
 *
 * A drag that starts with vertical movement is suspended until the next
 * `began` unless diagonal swipes are enabled.
 */

import type { GestureSample } from '@swipeable-tabs/shared-types/gesture';
import {
  IDLE_INTERACTION,
  type InteractionOutcome,
  type InteractionState,
} from '@swipeable-tabs/shared-types/transition';
import { DEFAULT_INTERACTION_THRESHOLDS, type InteractionThresholds } from '../settings/settings';
import { createLogger } from '../utils/logger';
import {
  RecognizerRegistry,
  type EdgePanRecognizer,
  type GestureSurface,
  type RecognizerPair,
  type SimultaneousRecognitionGuard,
} from './gesture-surface';
import { PercentDrivenTransition } from './percent-driven-transition';

const logger = createLogger('SwipeInteractor');

/**
 * Selection slot of the tab container, as the interactor sees it
 */
export interface TabSelection {
  readonly pageCount: number;
  readonly selectedIndex: number;
  /** Advance the selection; the host starts the (interactive) transition */
  select(index: number): void;
  /** Put back the pre-gesture selection after a rollback, without a transition */
  restore(index: number): void;
}

export interface SwipeInteractorDelegate {
  panGestureDidStart(): void;
  panGestureDidFinish(): void;
  interactionDidBegin(fromIndex: number, toIndex: number): void;
  interactionDidUpdate(fraction: number): void;
  interactionDidEnd(outcome: InteractionOutcome, selectedIndex: number): void;
}

export interface SwipeInteractorOptions {
  selection: TabSelection;
  /** Width the horizontal translation is normalized against */
  viewportWidth: () => number;
  thresholds?: InteractionThresholds;
  isEnabled?: boolean;
  isDiagonalSwipeEnabled?: boolean;
  delegate?: Partial<SwipeInteractorDelegate>;
}

const noop = () => {};

function withDelegateDefaults(delegate: Partial<SwipeInteractorDelegate> = {}): SwipeInteractorDelegate {
  return {
    panGestureDidStart: delegate.panGestureDidStart ?? noop,
    panGestureDidFinish: delegate.panGestureDidFinish ?? noop,
    interactionDidBegin: delegate.interactionDidBegin ?? noop,
    interactionDidUpdate: delegate.interactionDidUpdate ?? noop,
    interactionDidEnd: delegate.interactionDidEnd ?? noop,
  };
}

export class SwipeInteractor extends PercentDrivenTransition implements SimultaneousRecognitionGuard {
  private readonly selection: TabSelection;
  private readonly viewportWidth: () => number;
  private readonly delegate: SwipeInteractorDelegate;
  private readonly registry = new RecognizerRegistry();
  private thresholds: InteractionThresholds;

  private state: InteractionState = { ...IDLE_INTERACTION };
  private originIndex = 0;
  private boundPair: RecognizerPair | null = null;
  private enabled: boolean;

  isDiagonalSwipeEnabled: boolean;

  /** Fired after a committed interaction, once the selection is final */
  onFinishTransition: (() => void) | null = null;

  constructor(options: SwipeInteractorOptions) {
    super();
    this.selection = options.selection;
    this.viewportWidth = options.viewportWidth;
    this.thresholds = options.thresholds ?? DEFAULT_INTERACTION_THRESHOLDS;
    this.enabled = options.isEnabled ?? true;
    this.isDiagonalSwipeEnabled = options.isDiagonalSwipeEnabled ?? false;
    this.delegate = withDelegateDefaults(options.delegate);
  }

  get interactionInProgress(): boolean {
    return this.state.inProgress;
  }

  get interactionState(): Readonly<InteractionState> {
    return { ...this.state };
  }

  /** The progress driver handed to the host for interactive transitions */
  get driver(): PercentDrivenTransition {
    return this;
  }

  /**
   * Enables/disables recognition. Interaction state is left untouched.
   */
  get isEnabled(): boolean {
    return this.enabled;
  }

  set isEnabled(value: boolean) {
    this.enabled = value;
    this.registry.forEach(pair => {
      pair.left.enabled = value;
      pair.right.enabled = value;
    });
  }

  setThresholds(thresholds: InteractionThresholds): void {
    this.thresholds = thresholds;
  }

  /**
   * Binds the left and right edge recognizers to the selected page's surface.
   * A pair already registered for that page is detached first.
   */
  wireTo(surface: GestureSurface): void {
    this.boundPair = this.registry.bind(surface, target => ({
      left: target.addEdgePan('left', this.handlePan, this),
      right: target.addEdgePan('right', this.handlePan, this),
    }));
    this.boundPair.left.enabled = this.enabled;
    this.boundPair.right.enabled = this.enabled;
  }

  /**
   * Drops the recognizers registered for a page that left the container
   */
  unwire(surfaceId: string): void {
    const pair = this.registry.get(surfaceId);
    if (pair && pair === this.boundPair) {
      this.boundPair = null;
    }
    this.registry.release(surfaceId);
  }

  dispose(): void {
    this.registry.clear();
    this.boundPair = null;
    this.onFinishTransition = null;
  }

  /**
   * The opposite edge may only recognize alongside a bound recognizer while
   * that recognizer has barely moved horizontally.
   */
  shouldRecognizeSimultaneously(recognizer: EdgePanRecognizer, _other: EdgePanRecognizer): boolean {
    const pair = this.boundPair;
    if (pair && (recognizer === pair.left || recognizer === pair.right)) {
      return Math.abs(recognizer.translation().x) < this.thresholds.xTranslationForRecognition;
    }
    return true;
  }

  handlePan = (sample: GestureSample, _recognizer?: EdgePanRecognizer): void => {
    if (!this.enabled) return;

    switch (sample.phase) {
      case 'began':
        this.handleBegan(sample);
        break;
      case 'changed':
        this.handleChanged(sample);
        break;
      case 'ended':
      case 'cancelled':
        this.handleEnded(sample);
        break;
    }
  };

  private handleBegan(sample: GestureSample): void {
    this.delegate.panGestureDidStart();
    this.state = { ...IDLE_INTERACTION };

    if (this.shouldSuspendInteraction(sample)) {
      this.state.diagonalSuspended = true;
      logger.log('Suspended vertical drag', { translationY: sample.translation.y, velocityY: sample.velocity.y });
      return;
    }

    const rightToLeft = sample.velocity.x < 0;
    this.state.rightToLeft = rightToLeft;

    const { selectedIndex, pageCount } = this.selection;

    // Swipes only ever run between the first two pages.
    if ((rightToLeft && selectedIndex !== 0) || (!rightToLeft && selectedIndex !== 1)) {
      logger.log('Ignored drag', { selectedIndex, rightToLeft });
      return;
    }

    const targetIndex = rightToLeft ? selectedIndex + 1 : selectedIndex - 1;
    if (targetIndex < 0 || targetIndex > pageCount - 1) {
      logger.log('Ignored drag at boundary', { selectedIndex, pageCount });
      return;
    }

    // Must be set before the selection moves: the host asks for the
    // interaction controller while handling `select`.
    this.state.inProgress = true;
    this.originIndex = selectedIndex;
    this.selection.select(targetIndex);

    logger.log('Interaction began', { fromIndex: selectedIndex, toIndex: targetIndex });
    this.delegate.interactionDidBegin(selectedIndex, targetIndex);
  }

  private handleChanged(sample: GestureSample): void {
    if (!this.state.inProgress) return;

    const translationValue = sample.translation.x / this.viewportWidth();
    const { rightToLeft } = this.state;

    // No support for reversing past the start in one drag.
    if ((rightToLeft && translationValue > 0) || (!rightToLeft && translationValue < 0)) {
      this.report(0);
      return;
    }

    const fraction = Math.min(Math.max(Math.abs(translationValue), 0.0), this.thresholds.maxFraction);
    this.state.shouldComplete = fraction > this.thresholds.completionFraction;
    this.report(fraction);
  }

  private handleEnded(sample: GestureSample): void {
    if (!this.state.inProgress) return;

    this.state.inProgress = false;
    this.delegate.panGestureDidFinish();

    const { rightToLeft } = this.state;
    const flickVelocity = this.thresholds.xVelocityForComplete;
    if (!this.state.shouldComplete) {
      if (rightToLeft && sample.velocity.x < -flickVelocity) {
        this.state.shouldComplete = true;
      } else if (!rightToLeft && sample.velocity.x > flickVelocity) {
        this.state.shouldComplete = true;
      }
    }

    if (!this.state.shouldComplete || sample.phase === 'cancelled') {
      this.cancel();
      this.selection.restore(this.originIndex);
      logger.log('Interaction rolled back', { selectedIndex: this.originIndex, phase: sample.phase });
      this.delegate.interactionDidEnd('cancelled', this.originIndex);
      return;
    }

    this.finish();
    const { selectedIndex } = this.selection;
    logger.log('Interaction committed', { selectedIndex });
    this.delegate.interactionDidEnd('committed', selectedIndex);
    this.onFinishTransition?.();
  }

  private report(fraction: number): void {
    this.update(fraction);
    this.delegate.interactionDidUpdate(fraction);
  }

  private shouldSuspendInteraction(sample: GestureSample): boolean {
    if (this.isDiagonalSwipeEnabled) return false;

    const isTranslatingOnYAxis = Math.abs(sample.translation.y) > this.thresholds.yTranslationForSuspend;
    const hasVelocityOnYAxis = Math.abs(sample.velocity.y) > this.thresholds.yVelocityForSuspend;
    return isTranslatingOnYAxis || hasVelocityOnYAxis;
  }
}
