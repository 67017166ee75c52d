/**
 * Swipeable tabs settings
 */

/**
 * Thresholds that turn a drag into a tab transition
 */
export interface InteractionThresholds {
  /** |translation.y| above which a starting drag is treated as vertical. Default: 5 px */
  yTranslationForSuspend: number;
  /** |velocity.y| above which a starting drag is treated as vertical. Default: 100 px/s */
  yVelocityForSuspend: number;
  /** Release velocity that completes a short drag. Default: 200 px/s */
  xVelocityForComplete: number;
  /** Horizontal travel under which the opposite edge may still recognize. Default: 5 px */
  xTranslationForRecognition: number;
  /** Fraction past which a release completes the transition. Default: 0.5 */
  completionFraction: number;
  /** Upper bound of a reported fraction. Default: 0.99 */
  maxFraction: number;
}

export interface SwipeTabsSettings {
  /** Recognize drags at all. Default: true */
  isSwipeEnabled: boolean;
  /** Let drags that start with vertical movement switch tabs. Default: false */
  isDiagonalSwipeEnabled: boolean;
  thresholds: InteractionThresholds;
  /** Standalone bar show/hide animation, in seconds. Default: 0.3 */
  barAnimationDuration: number;
  /**
   * Verbose console logging. Default: false
   *
   * The switch is module-wide: each `SwipeableTabs` applies its value when
   * constructed, so the most recently created instance decides for all.
   */
  debug: boolean;
}

export type SwipeTabsSettingsInput = Partial<Omit<SwipeTabsSettings, 'thresholds'>> & {
  thresholds?: Partial<InteractionThresholds>;
};

export const DEFAULT_INTERACTION_THRESHOLDS: InteractionThresholds = {
  yTranslationForSuspend: 5.0,
  yVelocityForSuspend: 100.0,
  xVelocityForComplete: 200.0,
  xTranslationForRecognition: 5.0,
  completionFraction: 0.5,
  maxFraction: 0.99,
};

export const DEFAULT_SWIPE_TABS_SETTINGS: SwipeTabsSettings = {
  isSwipeEnabled: true,
  isDiagonalSwipeEnabled: false,
  thresholds: DEFAULT_INTERACTION_THRESHOLDS,
  barAnimationDuration: 0.3,
  debug: false,
};

export function resolveSwipeTabsSettings(input: SwipeTabsSettingsInput = {}): SwipeTabsSettings {
  return {
    ...DEFAULT_SWIPE_TABS_SETTINGS,
    ...input,
    thresholds: {
      ...DEFAULT_INTERACTION_THRESHOLDS,
      ...input.thresholds,
    },
  };
}
