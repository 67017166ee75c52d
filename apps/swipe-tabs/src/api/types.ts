/**
 * Public API types
 * @module api/types
 */

import type { BarVisibility } from '@swipeable-tabs/shared-types/geometry';
import type { TransitionIntent } from '@swipeable-tabs/shared-types/transition';

export interface Disposable {
  dispose(): void;
}

// ============================================================================
// Events
// ============================================================================

/**
 * Events emitted by a `SwipeableTabs` instance
 */
export interface SwipeTabsEventMap {
  /** Start hook of a transition fired (swipe or tap) */
  transitionStart: TransitionIntent;
  /** Finish hook of a transition fired */
  transitionFinish: TransitionIntent;
  /** A drag became interactive and advanced the selection */
  interactionBegan: { fromIndex: number; toIndex: number };
  /** Progress fraction reported to the animation */
  interactionProgress: { fraction: number };
  /** Drag released past the completion point, or flicked */
  interactionCommitted: { selectedIndex: number };
  /** Drag released short, or cancelled by the system */
  interactionCancelled: { selectedIndex: number };
  barVisibilityChanged: BarVisibility;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * The host handed over a page list the tabs cannot work with
 */
export class PageSetError extends Error {
  constructor(
    message: string,
    public readonly pageCount: number,
    public readonly selectedIndex: number
  ) {
    super(message);
    this.name = 'PageSetError';
  }
}
