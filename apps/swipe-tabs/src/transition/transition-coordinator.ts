/**
 * Transition Coordinator
 *
 * Answers the host's transition queries and keeps one "current" style per
 * transition: the swipe style for drags, the tap style for direct selection.
 *
 * Ordering contract for the current style: `shouldSelect` and `didSelect`
 * are its only writers, and the host always calls `provideAnimationController`
 * after one of them within the same event. Dispatch is single-threaded, so
 * the read never interleaves with a write.
 */

import { v4 as uuidv4 } from 'uuid';
import type { TransitionIntent } from '@swipeable-tabs/shared-types/transition';
import type { Disposable } from '../api/types';
import { createDisposable } from '../api/disposable';
import type { PercentDrivenTransition } from '../interaction/percent-driven-transition';
import { createLogger } from '../utils/logger';
import { SwipeAnimation, type SwipeAnimationType, type SwipeTransitioning } from './swipe-animation';

const logger = createLogger('TransitionCoordinator');

export interface TransitionHooks {
  onStart?: (intent: TransitionIntent) => void;
  onFinish?: (intent: TransitionIntent) => void;
}

/**
 * The interactive driver as far as the coordinator is concerned
 */
export interface InteractionSource {
  readonly interactionInProgress: boolean;
  readonly driver: PercentDrivenTransition;
}

export interface TransitionCoordinatorOptions<P> {
  pages: () => readonly P[];
  interaction: InteractionSource;
  swipeStyle?: SwipeTransitioning;
  tapStyle?: SwipeTransitioning;
}

export class TransitionCoordinator<P> {
  private readonly pages: () => readonly P[];
  private readonly interaction: InteractionSource;
  private swipeStyle: SwipeTransitioning;
  private tapStyle: SwipeTransitioning;
  private currentStyle: SwipeTransitioning;

  private touchesFirst = false;
  private pendingIntent: TransitionIntent | null = null;
  private activeIntent: TransitionIntent | null = null;
  private hooks: Set<TransitionHooks> = new Set();

  constructor(options: TransitionCoordinatorOptions<P>) {
    this.pages = options.pages;
    this.interaction = options.interaction;
    this.swipeStyle = options.swipeStyle ?? new SwipeAnimation();
    this.tapStyle = options.tapStyle ?? new SwipeAnimation();
    this.currentStyle = this.swipeStyle;
    this.attachHooks(this.swipeStyle);
    this.attachHooks(this.tapStyle);
  }

  get currentTransitionStyle(): SwipeTransitioning {
    return this.currentStyle;
  }

  get swipeTransitionStyle(): SwipeTransitioning {
    return this.swipeStyle;
  }

  get tapTransitionStyle(): SwipeTransitioning {
    return this.tapStyle;
  }

  /**
   * Whether the last resolved transition starts or ends on the first page.
   * Only such transitions hide the tab bar.
   */
  get touchesFirstPage(): boolean {
    return this.touchesFirst;
  }

  /** Intent of the transition currently between its start and finish hooks */
  get currentIntent(): TransitionIntent | null {
    return this.activeIntent;
  }

  selectTransitionStyle(originatedBySwipe: boolean): void {
    this.currentStyle = originatedBySwipe ? this.swipeStyle : this.tapStyle;
  }

  /**
   * Style to animate `from` -> `to` with, or null when either page is not in
   * the container (the host then switches without animation).
   */
  provideAnimationController(from: P, to: P): SwipeTransitioning | null {
    const pages = this.pages();
    const fromIndex = pages.indexOf(from);
    const toIndex = pages.indexOf(to);
    if (fromIndex < 0 || toIndex < 0) {
      logger.log('No animation for unknown page', { fromIndex, toIndex });
      return null;
    }

    this.touchesFirst = fromIndex === 0 || toIndex === 0;
    this.currentStyle.fromLeft = fromIndex > toIndex;
    this.pendingIntent = {
      id: uuidv4(),
      fromIndex,
      toIndex,
      isSwipeOriginated: this.currentStyle === this.swipeStyle,
    };

    return this.currentStyle;
  }

  /**
   * The progress driver while a drag is in progress, otherwise null so that
   * tap transitions never run interactively.
   */
  provideInteractionController(_animation: SwipeTransitioning): PercentDrivenTransition | null {
    return this.interaction.interactionInProgress ? this.interaction.driver : null;
  }

  /** Transition committed: assume the next one comes from a drag */
  didSelect(_page: P): void {
    this.selectTransitionStyle(true);
  }

  /** The host is about to switch tabs without a drag */
  shouldSelect(_page: P): boolean {
    this.selectTransitionStyle(false);
    return true;
  }

  setSwipeAnimation(type: SwipeAnimationType): void {
    this.swipeStyle.animationType = type;
  }

  setTapAnimation(type: SwipeAnimationType): void {
    this.tapStyle.animationType = type;
  }

  /**
   * Replaces the swipe style object. Its hooks are wired to this coordinator.
   */
  setAnimationTransitioning(style: SwipeTransitioning): void {
    const previous = this.swipeStyle;
    if (previous !== this.tapStyle) {
      this.detachHooks(previous);
    }
    this.swipeStyle = style;
    this.attachHooks(style);
    if (this.currentStyle === previous) {
      this.currentStyle = style;
    }
  }

  addHooks(hooks: TransitionHooks): Disposable {
    this.hooks.add(hooks);
    return createDisposable(() => {
      this.hooks.delete(hooks);
    });
  }

  private attachHooks(style: SwipeTransitioning): void {
    style.start = () => this.handleStart();
    style.finish = () => this.handleFinish();
  }

  private detachHooks(style: SwipeTransitioning): void {
    style.start = null;
    style.finish = null;
  }

  private handleStart(): void {
    const intent = this.pendingIntent;
    if (!intent || this.activeIntent) {
      logger.warn('Ignored start hook outside a transition');
      return;
    }
    this.pendingIntent = null;
    this.activeIntent = intent;
    this.hooks.forEach(hooks => hooks.onStart?.(intent));
  }

  private handleFinish(): void {
    const intent = this.activeIntent;
    if (!intent) {
      logger.warn('Ignored finish hook outside a transition');
      return;
    }
    this.activeIntent = null;
    this.hooks.forEach(hooks => hooks.onFinish?.(intent));
  }
}
