/**
 * Host container contract
 *
 * The container owns the pages and the selection and runs the actual
 * transitions; it asks its delegate which style to animate with and whether
 * the transition is interactive.
 */

import type { Disposable } from '../api/types';
import type { BarView, ContentFrame, ViewAnimator } from '../bar/tab-bar-visibility';
import type { PercentDrivenTransition } from '../interaction/percent-driven-transition';
import type { SwipeTransitioning } from '../transition/swipe-animation';
import type { TabPage } from './pages';

export interface TabTransitionDelegate<P = TabPage> {
  /** Null means: switch without animation */
  animationControllerFor(from: P, to: P): SwipeTransitioning | null;
  /** Null means: run the animation on its own */
  interactionControllerFor(animation: SwipeTransitioning): PercentDrivenTransition | null;
  /** Asked before a tap switches tabs; false vetoes the switch */
  willSelect(page: P): boolean;
  /** After a switch has been committed */
  didSelect(page: P): void;
}

/**
 * Optional selection callbacks a caller can layer over the built-in delegate
 */
export type TabSelectionObserver<P = TabPage> = Partial<Pick<TabTransitionDelegate<P>, 'willSelect' | 'didSelect'>>;

/**
 * Fills the methods a delegate leaves out: no animation, not interactive,
 * allow every selection, ignore commits.
 */
export function withTabDelegateDefaults<P>(delegate: Partial<TabTransitionDelegate<P>> = {}): TabTransitionDelegate<P> {
  return {
    animationControllerFor: delegate.animationControllerFor ?? (() => null),
    interactionControllerFor: delegate.interactionControllerFor ?? (() => null),
    willSelect: delegate.willSelect ?? (() => true),
    didSelect: delegate.didSelect ?? (() => {}),
  };
}

export interface TabContainerHost {
  readonly pages: readonly TabPage[];
  /** Writing runs a transition to the new index */
  selectedIndex: number;
  /** Put the selection back without running a transition */
  restoreSelection(index: number): void;
  delegate: TabTransitionDelegate | null;
  onSelectionChange(listener: (selectedIndex: number) => void): Disposable;
  /** Width drags are normalized against */
  readonly viewportWidth: number;
}

/**
 * The tab bar and the pieces needed to animate it
 */
export interface TabBarBinding {
  view: BarView;
  container: ContentFrame;
  animator: ViewAnimator;
}
