/**
 * Typed Event Emitter
 * @module api/events/emitter
 */

import type { Disposable, SwipeTabsEventMap } from '../types';
import { createDisposable } from '../disposable';
import { createLogger } from '../../utils/logger';

type EventHandler<T> = (data: T) => void;

type HandlerSets = {
  [K in keyof SwipeTabsEventMap]: Set<EventHandler<SwipeTabsEventMap[K]>>;
};

const logger = createLogger('SwipeTabs');

function createHandlerSets(): HandlerSets {
  return {
    transitionStart: new Set(),
    transitionFinish: new Set(),
    interactionBegan: new Set(),
    interactionProgress: new Set(),
    interactionCommitted: new Set(),
    interactionCancelled: new Set(),
    barVisibilityChanged: new Set(),
  };
}

export class TypedEventEmitter {
  // One set per event, created up front so lookups never write through a generic key.
  private readonly handlers: HandlerSets = createHandlerSets();

  /**
   * Subscribe to an event
   * @returns Disposable to unsubscribe
   */
  on<K extends keyof SwipeTabsEventMap>(
    event: K,
    handler: EventHandler<SwipeTabsEventMap[K]>
  ): Disposable {
    this.handlers[event].add(handler);

    return createDisposable(() => {
      this.off(event, handler);
    });
  }

  off<K extends keyof SwipeTabsEventMap>(
    event: K,
    handler: EventHandler<SwipeTabsEventMap[K]>
  ): void {
    this.handlers[event].delete(handler);
  }

  /**
   * Emit an event. A throwing handler is reported and does not stop the others.
   */
  emit<K extends keyof SwipeTabsEventMap>(event: K, data: SwipeTabsEventMap[K]): void {
    const eventHandlers: Set<EventHandler<SwipeTabsEventMap[K]>> = this.handlers[event];

    [...eventHandlers].forEach(handler => {
      try {
        handler(data);
      } catch (error) {
        logger.error(`Error in event handler for '${String(event)}':`, error);
      }
    });
  }

  listenerCount<K extends keyof SwipeTabsEventMap>(event: K): number {
    return this.handlers[event].size;
  }

  removeAllListeners(): void {
    Object.values(this.handlers).forEach(set => set.clear());
  }
}
