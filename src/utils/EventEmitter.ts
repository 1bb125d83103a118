/**
 * @fileoverview Generic EventEmitter with compile-time checked event names and payloads.
 *
 * The event map interface lists event names as keys and listener argument tuples as
 * values; `on`, `once`, `off` and `emit` infer their parameter types from it.
 * A listener that throws is logged and does not stop the remaining listeners.
 * Listeners are iterated over a copy, so a listener may unsubscribe itself.
 */

import { logError } from './logging';

export type DefaultEventMap = Record<string, unknown[]>;

export type EventListener<TEventMap extends Record<string, unknown[]>, TEventName extends keyof TEventMap> = (
  ...args: TEventMap[TEventName]
) => void;

type ListenerTable<TEventMap extends Record<string, unknown[]>> = {
  [TEventName in keyof TEventMap]?: Array<EventListener<TEventMap, TEventName>>;
};

export class EventEmitter<TEventMap extends Record<string, unknown[]> = DefaultEventMap> {
  private listeners: ListenerTable<TEventMap> = {};

  on<TEventName extends keyof TEventMap>(
    event: TEventName,
    listener: EventListener<TEventMap, TEventName>
  ): this {
    const existing = this.listeners[event];
    this.listeners[event] = existing ? [...existing, listener] : [listener];
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
    const existing = this.listeners[event];
    if (existing) {
      const index = existing.indexOf(listener);
      if (index !== -1) {
        const remaining = [...existing.slice(0, index), ...existing.slice(index + 1)];
        if (remaining.length === 0) {
          delete this.listeners[event];
        } else {
          this.listeners[event] = remaining;
        }
      }
    }
    return this;
  }

  emit<TEventName extends keyof TEventMap>(
    event: TEventName,
    ...args: TEventMap[TEventName]
  ): boolean {
    const existing = this.listeners[event];
    if (!existing || existing.length === 0) {
      return false;
    }
    for (const listener of [...existing]) {
      try {
        listener(...args);
      } catch (error) {
        logError('EventEmitter', `Error in event listener for "${String(event)}":`, error);
      }
    }
    return true;
  }

  removeAllListeners<TEventName extends keyof TEventMap>(event?: TEventName): this {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
    return this;
  }

  listenerCount<TEventName extends keyof TEventMap>(event: TEventName): number {
    return this.listeners[event]?.length ?? 0;
  }

  eventNames(): string[] {
    return Object.keys(this.listeners);
  }
}
