/**
 * Typed, ordered observer registry
 *
 * Handlers for an event run synchronously in registration order. While a
 * dispatch is in progress `isDispatching` is true; owners use it to refuse
 * re-entrant mutations. A fatal error thrown by a handler stops delivery and
 * propagates to the emitter; any other handler error is logged and the
 * remaining handlers still run.
 */

import { logger } from '../../utils/logger.js';
import { isFatalError } from '../../utils/errors.js';

export type EventHandler<T> = (payload: T) => void;

export type Unsubscribe = () => void;

type HandlerLists<Events> = { [K in keyof Events]?: ReadonlyArray<EventHandler<Events[K]>> };

export class EventHub<Events extends object> {
  private handlers: HandlerLists<Events> = {};
  private dispatching: Array<keyof Events> = [];

  get isDispatching(): boolean {
    return this.dispatching.length > 0;
  }

  /**
   * Name of the event currently being delivered (innermost), if any
   */
  get currentEvent(): string | undefined {
    const event = this.dispatching[this.dispatching.length - 1];
    return event === undefined ? undefined : String(event);
  }

  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): Unsubscribe {
    const list = this.handlers[event] ?? [];
    if (!list.includes(handler)) {
      // Copy on write: a dispatch in progress keeps iterating its own snapshot
      this.handlers[event] = [...list, handler];
    }
    return () => this.off(event, handler);
  }

  /**
   * Remove a handler. Removing one that is not registered is a no-op.
   */
  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    const list = this.handlers[event];
    if (!list) return;

    const remaining = list.filter((h) => h !== handler);
    if (remaining.length > 0) {
      this.handlers[event] = remaining;
    } else {
      delete this.handlers[event];
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.handlers[event]?.length ?? 0;
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const list = this.handlers[event];
    if (!list || list.length === 0) return;

    this.dispatching.push(event);
    try {
      for (const handler of list) {
        try {
          handler(payload);
        } catch (error) {
          if (isFatalError(error)) {
            throw error;
          }
          logger.error(`Error in handler for '${String(event)}'`, error);
        }
      }
    } finally {
      this.dispatching.pop();
    }
  }

  clear(): void {
    this.handlers = {};
  }
}
