/**
 * Swipeable Tabs
 *
 * Exports the facade, the pieces it is built from, and the DOM adapters.
 */

export { SwipeableTabs, type SwipeableTabsOptions } from './tabs/swipeable-tabs';

export {
  withTabDelegateDefaults,
  type TabContainerHost,
  type TabTransitionDelegate,
  type TabSelectionObserver,
  type TabBarBinding,
} from './tabs/host';

export { resolveContentPage, type TabPage } from './tabs/pages';

export {
  SwipeInteractor,
  type SwipeInteractorDelegate,
  type SwipeInteractorOptions,
  type TabSelection,
} from './interaction/swipe-interactor';

export { PercentDrivenTransition, type InteractiveAnimation } from './interaction/percent-driven-transition';

export {
  RecognizerRegistry,
  type EdgePanRecognizer,
  type GestureSurface,
  type PanHandler,
  type RecognizerPair,
  type SimultaneousRecognitionGuard,
} from './interaction/gesture-surface';

export {
  TransitionCoordinator,
  type InteractionSource,
  type TransitionCoordinatorOptions,
  type TransitionHooks,
} from './transition/transition-coordinator';

export {
  SwipeAnimation,
  SwipeAnimationTypes,
  DEFAULT_TRANSITION_DURATION,
  type FrameOffsets,
  type SwipeAnimationType,
  type SwipeTransitioning,
} from './transition/swipe-animation';

export {
  TabBarVisibilityController,
  type AlongsideTransitionCoordinator,
  type BarView,
  type ContentFrame,
  type InsetTarget,
  type TabBarVisibilityOptions,
  type TransitionAnimationContext,
  type ViewAnimator,
} from './bar/tab-bar-visibility';

export {
  DEFAULT_INTERACTION_THRESHOLDS,
  DEFAULT_SWIPE_TABS_SETTINGS,
  resolveSwipeTabsSettings,
  type InteractionThresholds,
  type SwipeTabsSettings,
  type SwipeTabsSettingsInput,
} from './settings/settings';

export { PageSetError, type Disposable, type SwipeTabsEventMap } from './api/types';
export { createDisposable, DisposableStore } from './api/disposable';
export { TypedEventEmitter } from './api/events/emitter';
export { createLogger, setSwipeTabsDebug, isSwipeTabsDebug, type Logger } from './utils/logger';

export { DomGestureSurface, type DomGestureSurfaceConfig } from './dom/dom-gesture-surface';
export { DomBarView, StaticContentFrame, CssTransitionAnimator } from './dom/dom-bar-view';
