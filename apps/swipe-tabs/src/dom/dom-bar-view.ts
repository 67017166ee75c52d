/**
 * DOM tab bar
 *
 * `DomBarView` keeps the bar's frame as a model value and mirrors its
 * vertical offset into `style.transform`. `CssTransitionAnimator` animates
 * those style changes with a CSS transition.
 */

import type { Rect } from '@swipeable-tabs/shared-types/geometry';
import type { BarView, ContentFrame, ViewAnimator } from '../bar/tab-bar-visibility';

export class DomBarView implements BarView {
  private readonly element: HTMLElement;
  private readonly restY: number;
  private current: Rect;

  /**
   * @param frame - frame of the bar at rest, in container coordinates
   */
  constructor(element: HTMLElement, frame: Rect) {
    this.element = element;
    this.restY = frame.y;
    this.current = { ...frame };
  }

  get frame(): Rect {
    return { ...this.current };
  }

  set frame(rect: Rect) {
    this.current = { ...rect };
    this.element.style.transform = `translate3d(0, ${rect.y - this.restY}px, 0)`;
  }

  get isConnected(): boolean {
    return this.element.isConnected;
  }
}

/**
 * Fixed content frame, e.g. the container's size at layout time
 */
export class StaticContentFrame implements ContentFrame {
  constructor(public frame: Rect) {}
}

export class CssTransitionAnimator implements ViewAnimator {
  private interrupt: (() => void) | null = null;

  constructor(
    private readonly element: HTMLElement,
    private readonly easing = 'ease-out'
  ) {}

  animate(duration: number, animations: () => void, completion: (finished: boolean) => void): void {
    // A new animation supersedes one still running.
    this.interrupt?.();

    const ms = Math.round(duration * 1000);
    let settled = false;
    let fallback: ReturnType<typeof setTimeout> | null = null;

    const settle = (finished: boolean) => {
      if (settled) return;
      settled = true;
      if (fallback !== null) clearTimeout(fallback);
      this.element.removeEventListener('transitionend', handleTransitionEnd);
      if (this.interrupt === interrupt) {
        this.interrupt = null;
        this.element.style.transition = '';
      }
      completion(finished);
    };
    const handleTransitionEnd = () => settle(true);
    const interrupt = () => settle(false);

    this.interrupt = interrupt;
    this.element.style.transition = `transform ${ms}ms ${this.easing}`;
    this.element.addEventListener('transitionend', handleTransitionEnd, { once: true });
    animations();

    // Fallback in case transitionend doesn't fire
    fallback = setTimeout(() => settle(true), ms + 100);
  }
}
