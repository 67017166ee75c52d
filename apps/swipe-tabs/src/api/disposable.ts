/**
 * Disposable pattern implementation
 * @module api/disposable
 */

import type { Disposable } from './types';

/**
 * Create a disposable from a cleanup function
 */
export function createDisposable(dispose: () => void): Disposable {
  let disposed = false;
  return {
    dispose: () => {
      if (!disposed) {
        disposed = true;
        dispose();
      }
    }
  };
}

/**
 * A container that manages multiple disposables
 */
export class DisposableStore implements Disposable {
  private disposables: Set<Disposable> = new Set();
  private disposed = false;

  /**
   * Add a disposable to the store. Disposed immediately if the store already is.
   */
  add<T extends Disposable>(disposable: T): T {
    if (this.disposed) {
      disposable.dispose();
      return disposable;
    }
    this.disposables.add(disposable);
    return disposable;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.disposables.forEach(d => d.dispose());
    this.disposables.clear();
  }

  get isDisposed(): boolean {
    return this.disposed;
  }
}
