/**
 * @fileoverview EventEmitter with generic type safety for event names and payloads.
 *
 * The event map interface lists event names as keys and listener parameter tuples as
 * values, so `on` infers listener arguments and `emit` checks them at compile time.
 * Listener exceptions are caught and logged without affecting other listeners, and
 * emit iterates over a copy so listeners may unsubscribe while being called.
 */

// Default event map allows any string key with unknown array values
export type DefaultEventMap = Record<string, unknown[]>;

// Generic event listener type that extracts correct parameter types
export type EventListener<TEventMap extends Record<string, unknown[]>, TEventName extends keyof TEventMap> = (
  ...args: TEventMap[TEventName]
) => void;

type ListenerStore<TEventMap extends Record<string, unknown[]>> = {
  [TEventName in keyof TEventMap]?: Array<EventListener<TEventMap, TEventName>>;
};

// Generic EventEmitter class that accepts an event map interface
export class EventEmitter<TEventMap extends Record<string, unknown[]> = DefaultEventMap> {
  private events: ListenerStore<TEventMap> = {};

  on<TEventName extends keyof TEventMap>(
    event: TEventName,
    listener: EventListener<TEventMap, TEventName>
  ): this {
    const listeners = this.events[event] ?? [];
    listeners.push(listener);
    this.events[event] = listeners;
    return this;
  }

  once<TEventName extends keyof TEventMap>(
    event: TEventName,
    listener: EventListener<TEventMap, TEventName>
  ): this {
    const onceWrapper: EventListener<TEventMap, TEventName> = (...args) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  off<TEventName extends keyof TEventMap>(
    event: TEventName,
    listener: EventListener<TEventMap, TEventName>
  ): this {
    const listeners = this.events[event];
    if (listeners) {
      const index = listeners.indexOf(listener);
      if (index !== -1) {
        listeners.splice(index, 1);
      }
      if (listeners.length === 0) {
        delete this.events[event];
      }
    }
    return this;
  }

  emit<TEventName extends keyof TEventMap>(
    event: TEventName,
    ...args: TEventMap[TEventName]
  ): boolean {
    const listeners = this.events[event];
    if (listeners && listeners.length > 0) {
      // Copy so listeners can unsubscribe during emit
      const listenersCopy = [...listeners];
      listenersCopy.forEach(listener => {
        try {
          listener(...args);
        } catch (error) {
          console.error(`Error in event listener for "${String(event)}":`, error);
        }
      });
      return true;
    }
    return false;
  }

  removeAllListeners<TEventName extends keyof TEventMap>(event?: TEventName): this {
    if (event !== undefined) {
      delete this.events[event];
    } else {
      this.events = {};
    }
    return this;
  }

  listenerCount<TEventName extends keyof TEventMap>(event: TEventName): number {
    return this.events[event]?.length ?? 0;
  }
}
