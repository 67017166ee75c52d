/**
 * Tab pages
 */

import type { GestureSurface } from '../interaction/gesture-surface';
import type { InsetTarget } from '../bar/tab-bar-visibility';

export interface TabPage {
  readonly id: string;
  /** Content view the edge pans attach to */
  readonly surface: GestureSurface;
  /**
   * Set on navigation-style wrappers: the first child holds the content that
   * gestures belong to.
   */
  readonly children?: readonly TabPage[];
  /** Layout insets that follow the tab bar */
  readonly safeArea?: InsetTarget;
}

/**
 * Descends through wrapping containers to the first real content page
 */
export function resolveContentPage(page: TabPage): TabPage {
  let current = page;
  while (current.children && current.children.length > 0) {
    current = current.children[0];
  }
  return current;
}
