/**
 * Percent-driven interactive transition
 *
 * Feeds a progress fraction to the animation the host's engine runs for the
 * current tab transition, then finishes or cancels it. Updates made before
 * the engine attaches its animation are replayed on attach.
 */

/**
 * Animation run by the host's rendering engine for one interactive transition
 */
export interface InteractiveAnimation {
  update(fraction: number): void;
  /** Run the remainder of the animation to the end state */
  finish(): void;
  /** Run the animation back to the start state */
  cancel(): void;
}

export class PercentDrivenTransition {
  private animation: InteractiveAnimation | null = null;
  private fraction = 0;

  get percentComplete(): number {
    return this.fraction;
  }

  get isDrivingAnimation(): boolean {
    return this.animation !== null;
  }

  /**
   * Called by the host engine once it has set up the transition's animation
   */
  startInteractiveTransition(animation: InteractiveAnimation): void {
    this.animation = animation;
    if (this.fraction > 0) {
      animation.update(this.fraction);
    }
  }

  update(fraction: number): void {
    this.fraction = fraction;
    this.animation?.update(fraction);
  }

  finish(): void {
    const animation = this.release();
    animation?.finish();
  }

  cancel(): void {
    const animation = this.release();
    animation?.cancel();
  }

  private release(): InteractiveAnimation | null {
    const animation = this.animation;
    this.animation = null;
    this.fraction = 0;
    return animation;
  }
}
