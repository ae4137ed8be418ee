/**
 * EventEmitter
 * Typed emitter used by the client, monitors and pollers.
 * Listeners are held only until their unsubscribe function runs.
 */

import { createLogger } from '../../utils/logger';

const log = createLogger('emitter');

type EventCallback<T = unknown> = (data: T) => void;

export class EventEmitter<TEventMap extends Record<string, unknown> = Record<string, unknown>> {
  private listeners = new Map<keyof TEventMap, Set<EventCallback<never>>>();

  /**
   * Subscribe to an event; returns the unsubscribe function
   */
  on<K extends keyof TEventMap>(event: K, callback: EventCallback<TEventMap[K]>): () => void {
    let callbacks = this.listeners.get(event);
    if (!callbacks) {
      callbacks = new Set();
      this.listeners.set(event, callbacks);
    }
    callbacks.add(callback);

    return () => {
      this.off(event, callback);
    };
  }

  /**
   * Subscribe to an event once (automatically unsubscribes after first emission)
   */
  once<K extends keyof TEventMap>(event: K, callback: EventCallback<TEventMap[K]>): () => void {
    const onceCallback: EventCallback<TEventMap[K]> = (data) => {
      this.off(event, onceCallback);
      callback(data);
    };
    return this.on(event, onceCallback);
  }

  off<K extends keyof TEventMap>(event: K, callback: EventCallback<TEventMap[K]>): void {
    const callbacks = this.listeners.get(event);
    if (callbacks) {
      callbacks.delete(callback);
      if (callbacks.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  /**
   * Emit an event. A throwing listener is logged and does not stop the others.
   */
  emit<K extends keyof TEventMap>(event: K, data: TEventMap[K]): void {
    const callbacks = this.listeners.get(event);
    if (!callbacks) {
      return;
    }
    // Snapshot so listeners may unsubscribe while being called
    for (const callback of [...callbacks]) {
      try {
        (callback as EventCallback<TEventMap[K]>)(data);
      } catch (error) {
        log.error(`Error in event listener for ${String(event)}`, error, { event: String(event) });
      }
    }
  }

  removeAllListeners<K extends keyof TEventMap>(event?: K): void {
    if (event) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }

  listenerCount<K extends keyof TEventMap>(event: K): number {
    return this.listeners.get(event)?.size ?? 0;
  }
}
