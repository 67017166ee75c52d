/**
 * Unit tests for swipe animation styles
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_TRANSITION_DURATION,
  SwipeAnimation,
  SwipeAnimationTypes,
} from '../../transition/swipe-animation';

describe('SwipeAnimationTypes', () => {
  describe('sideBySide', () => {
    it('should move both views edge to edge towards the left', () => {
      const { from, to } = SwipeAnimationTypes.sideBySide.offsets(0.25, 400, false);

      expect(from).toBeCloseTo(-100);
      expect(to).toBeCloseTo(300);
    });

    it('should move both views edge to edge towards the right', () => {
      const { from, to } = SwipeAnimationTypes.sideBySide.offsets(0.25, 400, true);

      expect(from).toBeCloseTo(100);
      expect(to).toBeCloseTo(-300);
    });
  });

  describe('overlap', () => {
    it('should keep the outgoing view in place', () => {
      const { from, to } = SwipeAnimationTypes.overlap.offsets(0.5, 400, false);

      expect(from).toBeCloseTo(0);
      expect(to).toBeCloseTo(200);
    });
  });

  describe('push', () => {
    it('should move the outgoing view at a third of the width', () => {
      const { from, to } = SwipeAnimationTypes.push.offsets(0.75, 300, true);

      expect(from).toBeCloseTo(75);
      expect(to).toBeCloseTo(-75);
    });
  });

  it('should start with the incoming view a full width away and end in place', () => {
    for (const type of Object.values(SwipeAnimationTypes)) {
      expect(Math.abs(type.offsets(0, 400, false).to)).toBeCloseTo(400);
      expect(type.offsets(1, 400, false).to).toBeCloseTo(0);
    }
  });
});

describe('SwipeAnimation', () => {
  it('should default to side-by-side with the standard duration', () => {
    const animation = new SwipeAnimation();

    expect(animation.animationType).toBe(SwipeAnimationTypes.sideBySide);
    expect(animation.duration).toBe(DEFAULT_TRANSITION_DURATION);
    expect(animation.fromLeft).toBe(false);
    expect(animation.start).toBeNull();
    expect(animation.finish).toBeNull();
  });

  it('should compute offsets in its current direction', () => {
    const animation = new SwipeAnimation(SwipeAnimationTypes.overlap);
    animation.fromLeft = true;

    const { from, to } = animation.frameOffsets(0.5, 400);

    expect(from).toBeCloseTo(0);
    expect(to).toBeCloseTo(-200);
  });
});
