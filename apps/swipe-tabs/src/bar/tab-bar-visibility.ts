/**
 * Tab Bar Visibility
 *
 * Slides the fixed tab bar out of (and back into) the container by its own
 * height. Transitions that touch the first page hide it on start; every
 * transition shows it again on finish.
 */

import {
  offsetRect,
  rectsIntersect,
  type BarVisibility,
  type Insets,
  type Rect,
} from '@swipeable-tabs/shared-types/geometry';
import type { Disposable } from '../api/types';
import type { TransitionCoordinator } from '../transition/transition-coordinator';
import { createLogger } from '../utils/logger';

const logger = createLogger('TabBarVisibility');

export interface BarView {
  frame: Rect;
  /** False once the view has been torn down */
  readonly isConnected: boolean;
}

export interface ContentFrame {
  readonly frame: Rect;
}

/**
 * Page whose layout reserves room for the bar
 */
export interface InsetTarget {
  additionalInsets: Insets;
}

export interface ViewAnimator {
  /** `completion` receives false when the animation was interrupted */
  animate(duration: number, animations: () => void, completion: (finished: boolean) => void): void;
}

export interface TransitionAnimationContext {
  readonly isCancelled: boolean;
}

/**
 * A running container transition that other animations can join
 */
export interface AlongsideTransitionCoordinator {
  animateAlongside(animations: () => void, completion: (context: TransitionAnimationContext) => void): void;
}

export interface TabBarVisibilityOptions {
  bar: BarView;
  container: ContentFrame;
  animator: ViewAnimator;
  /** Page whose insets follow the bar, looked up at each change */
  insetTarget?: () => InsetTarget | null;
  /** Standalone animation duration in seconds. Default: 0.3 */
  duration?: number;
  onChange?: (visibility: BarVisibility) => void;
}

function measureVisibility(bar: BarView, container: ContentFrame, shownY: number): BarVisibility {
  const { frame } = bar;
  return { hidden: !rectsIntersect(frame, container.frame), frameOffset: frame.y - shownY };
}

export class TabBarVisibilityController {
  private readonly bar: BarView;
  private readonly container: ContentFrame;
  private readonly animator: ViewAnimator;
  private readonly insetTarget: () => InsetTarget | null;
  private readonly duration: number;
  private readonly onChange: (visibility: BarVisibility) => void;
  private readonly shownY: number;

  constructor(options: TabBarVisibilityOptions) {
    this.bar = options.bar;
    this.container = options.container;
    this.animator = options.animator;
    this.insetTarget = options.insetTarget ?? (() => null);
    this.duration = options.duration ?? 0.3;
    this.onChange = options.onChange ?? (() => {});

    const { frame } = this.bar;
    this.shownY = this.isHidden ? frame.y - frame.height : frame.y;
  }

  /** True when the bar no longer overlaps the container's content */
  get isHidden(): boolean {
    return !rectsIntersect(this.bar.frame, this.container.frame);
  }

  get visibility(): BarVisibility {
    return measureVisibility(this.bar, this.container, this.shownY);
  }

  /**
   * Show or hide the bar. No-op when it is already in the requested state.
   *
   * @param along - running container transition to animate in lockstep with
   */
  setHidden(hidden: boolean, animated = true, along?: AlongsideTransitionCoordinator): void {
    if (this.isHidden === hidden) return;

    const { frame } = this.bar;
    const offsetY = hidden ? frame.height : -frame.height;
    const endFrame = offsetRect(frame, 0, offsetY);

    const target = this.insetTarget();
    const originalInsets = target ? { ...target.additionalInsets } : null;
    const newInsets = originalInsets ? { ...originalInsets, bottom: originalInsets.bottom - offsetY } : null;

    logger.log(hidden ? 'Hiding tab bar' : 'Showing tab bar', { animated, alongside: along !== undefined });

    if (!animated) {
      this.bar.frame = endFrame;
      this.onChange(this.visibility);
      return;
    }

    // Completions may outlive the bar and this controller, so they capture
    // no `this` and reach the bar only through a weak reference.
    const { container, onChange, shownY } = this;
    const barRef = new WeakRef(this.bar);
    const liveBar = (): BarView | null => {
      const bar = barRef.deref();
      if (!bar || !bar.isConnected) {
        logger.log('Skipped update for a detached tab bar');
        return null;
      }
      return bar;
    };
    const applyFrame = () => {
      const bar = liveBar();
      if (!bar) return;
      bar.frame = endFrame;
      onChange(measureVisibility(bar, container, shownY));
    };
    const applyInsets = (insets: Insets | null) => {
      if (!target || !insets || !liveBar()) return;
      target.additionalInsets = insets;
    };

    if (along) {
      along.animateAlongside(applyFrame, context => {
        if (!hidden) {
          applyInsets(context.isCancelled ? originalInsets : newInsets);
        }
      });
    } else {
      this.animator.animate(this.duration, applyFrame, finished => {
        if (!hidden && finished) {
          applyInsets(newInsets);
        }
      });
    }
  }

  /**
   * Drives the bar from a coordinator's start/finish hooks
   */
  choreograph<P>(coordinator: TransitionCoordinator<P>): Disposable {
    return coordinator.addHooks({
      onStart: () => {
        if (coordinator.touchesFirstPage) {
          this.setHidden(true);
        }
      },
      onFinish: () => {
        if (this.isHidden) {
          this.setHidden(false);
        }
      },
    });
  }
}
