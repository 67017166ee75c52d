/**
 * Unit tests for the shared geometry helpers
 */

import { describe, it, expect } from 'vitest';
import { offsetRect, rectsIntersect } from '@swipeable-tabs/shared-types/geometry';

describe('geometry', () => {
  describe('offsetRect', () => {
    it('should move a rect without resizing it', () => {
      expect(offsetRect({ x: 10, y: 20, width: 30, height: 40 }, 5, -20)).toEqual({ x: 15, y: 0, width: 30, height: 40 });
    });
  });

  describe('rectsIntersect', () => {
    const container = { x: 0, y: 0, width: 400, height: 800 };

    it('should detect an overlap', () => {
      expect(rectsIntersect({ x: 0, y: 751, width: 400, height: 49 }, container)).toBe(true);
    });

    it('should not count touching edges', () => {
      expect(rectsIntersect({ x: 0, y: 800, width: 400, height: 49 }, container)).toBe(false);
    });

    it('should treat empty rects as disjoint', () => {
      expect(rectsIntersect({ x: 10, y: 10, width: 0, height: 49 }, container)).toBe(false);
    });
  });
});
