/**
 * Unit tests for TransitionCoordinator
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import type { TransitionIntent } from '@swipeable-tabs/shared-types/transition';
import { PercentDrivenTransition } from '../../interaction/percent-driven-transition';
import { SwipeAnimation, SwipeAnimationTypes } from '../../transition/swipe-animation';
import { TransitionCoordinator } from '../../transition/transition-coordinator';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function setup() {
  const pages = ['home', 'feed', 'profile'];
  const interaction = { interactionInProgress: false, driver: new PercentDrivenTransition() };
  const coordinator = new TransitionCoordinator<string>({ pages: () => pages, interaction });
  return { pages, interaction, coordinator };
}

describe('TransitionCoordinator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('style selection', () => {
    it('should animate a forward swipe with the incoming page from the right', () => {
      const { coordinator } = setup();

      const style = coordinator.provideAnimationController('home', 'feed');

      expect(style).toBe(coordinator.swipeTransitionStyle);
      expect(style?.fromLeft).toBe(false);
    });

    it('should animate a backward swipe with the incoming page from the left', () => {
      const { coordinator } = setup();

      const style = coordinator.provideAnimationController('feed', 'home');

      expect(style).toBe(coordinator.swipeTransitionStyle);
      expect(style?.fromLeft).toBe(true);
    });

    it('should use the tap style between a tap and the next commit', () => {
      const { coordinator } = setup();

      expect(coordinator.shouldSelect('profile')).toBe(true);
      const style = coordinator.provideAnimationController('home', 'profile');

      expect(style).toBe(coordinator.tapTransitionStyle);
      expect(style).not.toBe(coordinator.swipeTransitionStyle);
      expect(style?.fromLeft).toBe(false);

      coordinator.didSelect('profile');
      expect(coordinator.currentTransitionStyle).toBe(coordinator.swipeTransitionStyle);
    });

    it('should keep separate style objects for swipes and taps', () => {
      const { coordinator } = setup();

      coordinator.setSwipeAnimation(SwipeAnimationTypes.push);

      expect(coordinator.swipeTransitionStyle.animationType).toBe(SwipeAnimationTypes.push);
      expect(coordinator.tapTransitionStyle.animationType).toBe(SwipeAnimationTypes.sideBySide);

      coordinator.setTapAnimation(SwipeAnimationTypes.overlap);
      expect(coordinator.tapTransitionStyle.animationType).toBe(SwipeAnimationTypes.overlap);
    });

    it('should return null for a page outside the container', () => {
      const { coordinator } = setup();
      coordinator.provideAnimationController('feed', 'profile');

      expect(coordinator.provideAnimationController('feed', 'settings')).toBeNull();
      expect(coordinator.touchesFirstPage).toBe(false);
    });
  });

  describe('touchesFirstPage', () => {
    it('should be set for transitions that start or end on the first page', () => {
      const { coordinator } = setup();

      coordinator.provideAnimationController('home', 'feed');
      expect(coordinator.touchesFirstPage).toBe(true);

      coordinator.provideAnimationController('profile', 'home');
      expect(coordinator.touchesFirstPage).toBe(true);

      coordinator.provideAnimationController('feed', 'profile');
      expect(coordinator.touchesFirstPage).toBe(false);
    });
  });

  describe('interaction controller', () => {
    it('should hand out the driver only while a drag is in progress', () => {
      const { coordinator, interaction } = setup();
      const style = coordinator.swipeTransitionStyle;

      expect(coordinator.provideInteractionController(style)).toBeNull();

      interaction.interactionInProgress = true;
      expect(coordinator.provideInteractionController(style)).toBe(interaction.driver);
    });
  });

  describe('hooks', () => {
    it('should report one start and one finish per transition', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const { coordinator } = setup();
      const starts: TransitionIntent[] = [];
      const finishes: TransitionIntent[] = [];
      coordinator.addHooks({ onStart: i => starts.push(i), onFinish: i => finishes.push(i) });

      const style = coordinator.provideAnimationController('home', 'feed');
      style?.start?.();
      style?.start?.();
      expect(coordinator.currentIntent).toBe(starts[0]);
      style?.finish?.();
      style?.finish?.();

      expect(starts).toHaveLength(1);
      expect(finishes).toHaveLength(1);
      expect(finishes[0]).toBe(starts[0]);
      expect(coordinator.currentIntent).toBeNull();
    });

    it('should describe the transition in the intent', () => {
      const { coordinator } = setup();
      const starts: TransitionIntent[] = [];
      coordinator.addHooks({ onStart: i => starts.push(i) });

      coordinator.shouldSelect('profile');
      coordinator.provideAnimationController('home', 'profile')?.start?.();

      expect(starts).toHaveLength(1);
      expect(starts[0]).toMatchObject({ fromIndex: 0, toIndex: 2, isSwipeOriginated: false });
      expect(starts[0].id).toMatch(UUID_V4);
    });

    it('should give each transition its own id', () => {
      const { coordinator } = setup();
      const ids: string[] = [];
      coordinator.addHooks({ onStart: i => ids.push(i.id) });

      const first = coordinator.provideAnimationController('home', 'feed');
      first?.start?.();
      first?.finish?.();
      const second = coordinator.provideAnimationController('feed', 'home');
      second?.start?.();

      expect(ids).toHaveLength(2);
      expect(ids[0]).not.toBe(ids[1]);
    });

    it('should warn and ignore a start hook with no transition resolved', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const { coordinator } = setup();
      const onStart = vi.fn();
      coordinator.addHooks({ onStart });

      coordinator.swipeTransitionStyle.start?.();

      expect(onStart).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith('[TransitionCoordinator] Ignored start hook outside a transition');
    });

    it('should stop calling disposed hooks', () => {
      const { coordinator } = setup();
      const onStart = vi.fn();
      const hooks = coordinator.addHooks({ onStart });

      hooks.dispose();
      coordinator.provideAnimationController('home', 'feed')?.start?.();

      expect(onStart).not.toHaveBeenCalled();
    });
  });

  describe('setAnimationTransitioning', () => {
    it('should wire a replacement swipe style and release the old one', () => {
      const { coordinator } = setup();
      const previous = coordinator.swipeTransitionStyle;
      const custom = new SwipeAnimation(SwipeAnimationTypes.overlap, 0.5);
      const onStart = vi.fn();
      coordinator.addHooks({ onStart });

      coordinator.setAnimationTransitioning(custom);

      expect(previous.start).toBeNull();
      expect(previous.finish).toBeNull();
      expect(coordinator.swipeTransitionStyle).toBe(custom);
      expect(coordinator.currentTransitionStyle).toBe(custom);

      const style = coordinator.provideAnimationController('feed', 'home');
      expect(style).toBe(custom);
      expect(custom.fromLeft).toBe(true);
      style?.start?.();
      expect(onStart).toHaveBeenCalledTimes(1);
    });

    it('should keep the tap style current when a tap is pending', () => {
      const { coordinator } = setup();
      coordinator.shouldSelect('profile');

      coordinator.setAnimationTransitioning(new SwipeAnimation());

      expect(coordinator.currentTransitionStyle).toBe(coordinator.tapTransitionStyle);
    });
  });
});
