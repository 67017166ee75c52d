/**
 * Tab container stand-in with a minimal transition engine: it consults the
 * delegate the way a real container does and records every run.
 */

import type { Disposable } from '../../api/types';
import { createDisposable } from '../../api/disposable';
import type { TabContainerHost, TabTransitionDelegate } from '../../tabs/host';
import type { TabPage } from '../../tabs/pages';
import type { SwipeTransitioning } from '../../transition/swipe-animation';

export interface EngineRun {
  fromIndex: number;
  toIndex: number;
  style: SwipeTransitioning | null;
  interactive: boolean;
  updates: number[];
  outcome: 'finished' | 'cancelled' | null;
}

export class FakeTabHost implements TabContainerHost {
  delegate: TabTransitionDelegate | null = null;
  viewportWidth = 400;
  readonly runs: EngineRun[] = [];
  readonly restoredTo: number[] = [];
  private index: number;
  private listeners: Set<(selectedIndex: number) => void> = new Set();

  constructor(
    public pages: TabPage[],
    selectedIndex = 0
  ) {
    this.index = selectedIndex;
  }

  get selectedIndex(): number {
    return this.index;
  }

  set selectedIndex(value: number) {
    this.transition(value);
  }

  /** A tap on the tab bar */
  tap(index: number): boolean {
    const page = this.pages[index];
    if (this.delegate && !this.delegate.willSelect(page)) {
      return false;
    }
    this.transition(index);
    this.delegate?.didSelect(page);
    return true;
  }

  restoreSelection(index: number): void {
    this.restoredTo.push(index);
    this.index = index;
    this.notify();
  }

  onSelectionChange(listener: (selectedIndex: number) => void): Disposable {
    this.listeners.add(listener);
    return createDisposable(() => {
      this.listeners.delete(listener);
    });
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  private transition(toIndex: number): void {
    const fromIndex = this.index;
    if (toIndex === fromIndex) return;

    const style = this.delegate?.animationControllerFor(this.pages[fromIndex], this.pages[toIndex]) ?? null;
    const driver = style ? this.delegate?.interactionControllerFor(style) ?? null : null;

    const run: EngineRun = { fromIndex, toIndex, style, interactive: driver !== null, updates: [], outcome: null };
    this.runs.push(run);
    this.index = toIndex;
    this.notify();

    if (!style) {
      run.outcome = 'finished';
      return;
    }

    style.start?.();
    if (driver) {
      driver.startInteractiveTransition({
        update: fraction => run.updates.push(fraction),
        finish: () => {
          run.outcome = 'finished';
          style.finish?.();
        },
        cancel: () => {
          run.outcome = 'cancelled';
          style.finish?.();
        },
      });
    } else {
      run.outcome = 'finished';
      style.finish?.();
    }
  }

  private notify(): void {
    this.listeners.forEach(listener => listener(this.index));
  }
}
