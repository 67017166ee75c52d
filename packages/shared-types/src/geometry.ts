/**
 * Geometry helpers for frames and insets
 *
 * @module geometry
 */

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Insets {
  top: number;
  left: number;
  bottom: number;
  right: number;
}

/**
 * Visibility of the fixed overlay bar
 */
export interface BarVisibility {
  hidden: boolean;
  /** Vertical offset of the bar frame relative to its shown position */
  frameOffset: number;
}

export function offsetRect(rect: Rect, dx: number, dy: number): Rect {
  return { ...rect, x: rect.x + dx, y: rect.y + dy };
}

/**
 * True when the two rects share a non-empty area. Edge contact does not count.
 */
export function rectsIntersect(a: Rect, b: Rect): boolean {
  if (a.width <= 0 || a.height <= 0 || b.width <= 0 || b.height <= 0) {
    return false;
  }
  return (
    a.x < b.x + b.width &&
    b.x < a.x + a.width &&
    a.y < b.y + b.height &&
    b.y < a.y + a.height
  );
}
