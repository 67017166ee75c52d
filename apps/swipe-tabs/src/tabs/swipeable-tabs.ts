/**
 * Swipeable Tabs
 *
 * Attaches swipe-between-tabs behaviour to a tab container host. Installs
 * itself as the host's transition delegate, keeps the edge pans bound to the
 * selected page and hides the tab bar during transitions that touch the
 * first page.
 *
 * @example
 * ```ts
 * const tabs = new SwipeableTabs({ host, tabBar: { view, container, animator } });
 * tabs.setSwipeAnimation(SwipeAnimationTypes.push);
 * tabs.on('interactionCommitted', ({ selectedIndex }) => render(selectedIndex));
 * ```
 */

import type { AlongsideTransitionCoordinator } from '../bar/tab-bar-visibility';
import { TabBarVisibilityController } from '../bar/tab-bar-visibility';
import { DisposableStore } from '../api/disposable';
import { TypedEventEmitter } from '../api/events/emitter';
import { PageSetError, type Disposable, type SwipeTabsEventMap } from '../api/types';
import type { PercentDrivenTransition } from '../interaction/percent-driven-transition';
import { SwipeInteractor } from '../interaction/swipe-interactor';
import {
  resolveSwipeTabsSettings,
  type SwipeTabsSettings,
  type SwipeTabsSettingsInput,
} from '../settings/settings';
import type { SwipeAnimationType, SwipeTransitioning } from '../transition/swipe-animation';
import { TransitionCoordinator } from '../transition/transition-coordinator';
import { createLogger, setSwipeTabsDebug } from '../utils/logger';
import {
  withTabDelegateDefaults,
  type TabBarBinding,
  type TabContainerHost,
  type TabSelectionObserver,
  type TabTransitionDelegate,
} from './host';
import { resolveContentPage, type TabPage } from './pages';

const logger = createLogger('SwipeTabs');

export interface SwipeableTabsOptions {
  host: TabContainerHost;
  settings?: SwipeTabsSettingsInput;
  /** Selection callbacks run after the built-in handling */
  observer?: TabSelectionObserver;
  tabBar?: TabBarBinding;
  swipeAnimation?: SwipeTransitioning;
  tapAnimation?: SwipeTransitioning;
}

export class SwipeableTabs implements TabTransitionDelegate {
  private readonly host: TabContainerHost;
  private readonly settings: SwipeTabsSettings;
  private readonly observer: TabTransitionDelegate;
  private readonly interactor: SwipeInteractor;
  private readonly coordinator: TransitionCoordinator<TabPage>;
  private readonly tabBar: TabBarVisibilityController | null;
  private readonly events = new TypedEventEmitter();
  private readonly disposables = new DisposableStore();

  constructor(options: SwipeableTabsOptions) {
    const { host } = options;
    if (host.pages.length === 0) {
      throw new PageSetError('Tab container has no pages', 0, host.selectedIndex);
    }
    if (!Number.isInteger(host.selectedIndex) || host.selectedIndex < 0 || host.selectedIndex >= host.pages.length) {
      throw new PageSetError(
        `Selected index ${host.selectedIndex} is outside 0..${host.pages.length - 1}`,
        host.pages.length,
        host.selectedIndex
      );
    }

    this.host = host;
    this.settings = resolveSwipeTabsSettings(options.settings);
    this.observer = withTabDelegateDefaults(options.observer);
    setSwipeTabsDebug(this.settings.debug);

    this.interactor = new SwipeInteractor({
      selection: {
        get pageCount() {
          return host.pages.length;
        },
        get selectedIndex() {
          return host.selectedIndex;
        },
        select: index => {
          host.selectedIndex = index;
        },
        restore: index => host.restoreSelection(index),
      },
      viewportWidth: () => host.viewportWidth,
      thresholds: this.settings.thresholds,
      isEnabled: this.settings.isSwipeEnabled,
      isDiagonalSwipeEnabled: this.settings.isDiagonalSwipeEnabled,
      delegate: {
        interactionDidBegin: (fromIndex, toIndex) => this.events.emit('interactionBegan', { fromIndex, toIndex }),
        interactionDidUpdate: fraction => this.events.emit('interactionProgress', { fraction }),
        interactionDidEnd: (outcome, selectedIndex) =>
          this.events.emit(outcome === 'committed' ? 'interactionCommitted' : 'interactionCancelled', { selectedIndex }),
      },
    });

    this.interactor.onFinishTransition = () => {
      const page = this.host.pages[this.host.selectedIndex];
      if (page) {
        this.host.delegate?.didSelect(page);
      }
    };

    this.coordinator = new TransitionCoordinator<TabPage>({
      pages: () => this.host.pages,
      interaction: this.interactor,
      swipeStyle: options.swipeAnimation,
      tapStyle: options.tapAnimation,
    });

    this.disposables.add(
      this.coordinator.addHooks({
        onStart: intent => this.events.emit('transitionStart', intent),
        onFinish: intent => this.events.emit('transitionFinish', intent),
      })
    );

    this.tabBar = options.tabBar ? this.createTabBar(options.tabBar) : null;

    host.delegate = this;
    this.disposables.add(host.onSelectionChange(() => this.wireSelectedPage()));
    this.wireSelectedPage();
  }

  // ==========================================================================
  // TabTransitionDelegate
  // ==========================================================================

  animationControllerFor(from: TabPage, to: TabPage): SwipeTransitioning | null {
    return this.coordinator.provideAnimationController(from, to);
  }

  interactionControllerFor(animation: SwipeTransitioning): PercentDrivenTransition | null {
    return this.coordinator.provideInteractionController(animation);
  }

  willSelect(page: TabPage): boolean {
    // A vetoed tap must leave the swipe style current.
    if (!this.observer.willSelect(page)) return false;
    return this.coordinator.shouldSelect(page);
  }

  didSelect(page: TabPage): void {
    this.coordinator.didSelect(page);
    this.observer.didSelect(page);
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  get isSwipeEnabled(): boolean {
    return this.interactor.isEnabled;
  }

  set isSwipeEnabled(value: boolean) {
    this.interactor.isEnabled = value;
  }

  get isDiagonalSwipeEnabled(): boolean {
    return this.interactor.isDiagonalSwipeEnabled;
  }

  setDiagonalSwipe(enabled: boolean): void {
    this.interactor.isDiagonalSwipeEnabled = enabled;
  }

  setSwipeAnimation(type: SwipeAnimationType): void {
    this.coordinator.setSwipeAnimation(type);
  }

  setTapAnimation(type: SwipeAnimationType): void {
    this.coordinator.setTapAnimation(type);
  }

  setAnimationTransitioning(style: SwipeTransitioning): void {
    this.coordinator.setAnimationTransitioning(style);
  }

  // ==========================================================================
  // Tab bar
  // ==========================================================================

  get isTabBarHidden(): boolean {
    return this.tabBar?.isHidden ?? false;
  }

  setTabBarHidden(hidden: boolean, animated = true, along?: AlongsideTransitionCoordinator): void {
    if (!this.tabBar) {
      logger.warn('setTabBarHidden called without a tab bar binding');
      return;
    }
    this.tabBar.setHidden(hidden, animated, along);
  }

  // ==========================================================================
  // Events & lifecycle
  // ==========================================================================

  get interactionInProgress(): boolean {
    return this.interactor.interactionInProgress;
  }

  on<K extends keyof SwipeTabsEventMap>(event: K, handler: (data: SwipeTabsEventMap[K]) => void): Disposable {
    return this.events.on(event, handler);
  }

  dispose(): void {
    this.disposables.dispose();
    this.interactor.dispose();
    this.events.removeAllListeners();
    if (this.host.delegate === this) {
      this.host.delegate = null;
    }
  }

  private createTabBar(binding: TabBarBinding): TabBarVisibilityController {
    const controller = new TabBarVisibilityController({
      bar: binding.view,
      container: binding.container,
      animator: binding.animator,
      duration: this.settings.barAnimationDuration,
      insetTarget: () => this.host.pages[this.host.selectedIndex]?.safeArea ?? null,
      onChange: visibility => this.events.emit('barVisibilityChanged', visibility),
    });
    this.disposables.add(controller.choreograph(this.coordinator));
    return controller;
  }

  private wireSelectedPage(): void {
    const page = this.host.pages[this.host.selectedIndex];
    if (!page) return;
    this.interactor.wireTo(resolveContentPage(page).surface);
  }
}
