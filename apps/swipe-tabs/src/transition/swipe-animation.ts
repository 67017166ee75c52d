/**
 * Swipe animation styles
 *
 * A style object is what the coordinator hands the host's engine for one
 * transition: the direction, the lifecycle hooks the engine must call, and
 * the geometry of the animation.
 */

export interface FrameOffsets {
  /** Horizontal offset of the view being left, in px */
  from: number;
  /** Horizontal offset of the view being shown, in px */
  to: number;
}

/**
 * Geometry of a tab transition
 */
export interface SwipeAnimationType {
  readonly name: string;
  /**
   * Offsets at `progress` (0 = start, 1 = end) for a viewport `width` px wide.
   * `fromLeft` means the incoming view enters from the left edge.
   */
  offsets(progress: number, width: number, fromLeft: boolean): FrameOffsets;
}

export interface SwipeTransitioning {
  /** Direction of the animation; set by the coordinator before each transition */
  fromLeft: boolean;
  /** Must be called by the engine when the animation starts */
  start: (() => void) | null;
  /** Must be called by the engine when the animation ends, whatever the outcome */
  finish: (() => void) | null;
  animationType: SwipeAnimationType;
  /** Seconds */
  duration: number;
}

// Sign of the motion: content travels right when the incoming view enters from the left.
function travel(fromLeft: boolean): number {
  return fromLeft ? 1 : -1;
}

/** Both views move together, edge to edge */
const sideBySide: SwipeAnimationType = {
  name: 'sideBySide',
  offsets(progress, width, fromLeft) {
    const sign = travel(fromLeft);
    return {
      from: sign * width * progress,
      to: sign * width * (progress - 1),
    };
  },
};

/** The incoming view slides over a stationary outgoing view */
const overlap: SwipeAnimationType = {
  name: 'overlap',
  offsets(progress, width, fromLeft) {
    return {
      from: 0,
      to: travel(fromLeft) * width * (progress - 1),
    };
  },
};

/** The outgoing view trails at a third of the incoming view's speed */
const push: SwipeAnimationType = {
  name: 'push',
  offsets(progress, width, fromLeft) {
    const sign = travel(fromLeft);
    return {
      from: sign * (width / 3) * progress,
      to: sign * width * (progress - 1),
    };
  },
};

export const SwipeAnimationTypes = {
  sideBySide,
  overlap,
  push,
} as const satisfies Record<string, SwipeAnimationType>;

export const DEFAULT_TRANSITION_DURATION = 0.33;

/**
 * Default style object
 */
export class SwipeAnimation implements SwipeTransitioning {
  fromLeft = false;
  start: (() => void) | null = null;
  finish: (() => void) | null = null;

  constructor(
    public animationType: SwipeAnimationType = SwipeAnimationTypes.sideBySide,
    public duration: number = DEFAULT_TRANSITION_DURATION
  ) {}

  frameOffsets(progress: number, width: number): FrameOffsets {
    return this.animationType.offsets(progress, width, this.fromLeft);
  }
}
