/**
 * HandlerRegistry
 * Event handler registration and routing.
 *
 * Payloads of catalogued events are validated once per frame; an invalid
 * payload drops that one event. Each handler runs in isolation, so a failing
 * handler does not keep the others from seeing the event.
 */

import { createLogger } from '../../utils/logger';
import {
  isInboundEventName,
  validateInboundPayload,
  type InboundEventName,
  type InboundEventPayloads,
} from '../protocol/game-events';
import type { JsonObject } from '../protocol/frame-codec';
import type { EventSink } from '../client/socket-client';

const log = createLogger('dispatch');

export type EventHandler<T> = (payload: T) => void | Promise<void>;

export class HandlerRegistry implements EventSink {
  private handlers = new Map<string, Set<EventHandler<never>>>();

  /**
   * Register a handler for an event name; returns the matching unregister function
   */
  register<K extends InboundEventName>(eventName: K, handler: EventHandler<InboundEventPayloads[K]>): () => void;
  register(eventName: string, handler: EventHandler<JsonObject>): () => void;
  register(eventName: string, handler: EventHandler<never>): () => void {
    let handlers = this.handlers.get(eventName);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventName, handlers);
    }
    handlers.add(handler);

    return () => {
      this.unregister(eventName, handler);
    };
  }

  /**
   * Remove one handler, or every handler for the event when none is given
   */
  unregister(eventName: string, handler?: EventHandler<never>): void {
    if (!handler) {
      this.handlers.delete(eventName);
      return;
    }
    const handlers = this.handlers.get(eventName);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(eventName);
      }
    }
  }

  async dispatch(eventName: string, payload: JsonObject): Promise<void> {
    await this.routeEvent(eventName, payload);
  }

  /**
   * Route one decoded event. Resolves to the number of handlers that completed.
   */
  async routeEvent(eventName: string, payload: JsonObject): Promise<number> {
    const handlers = this.handlers.get(eventName);
    if (!handlers || handlers.size === 0) {
      log.debug('No handlers registered for event', { eventName });
      return 0;
    }

    let data: unknown = payload;
    if (isInboundEventName(eventName)) {
      const result = validateInboundPayload(eventName, payload);
      if (!result.success) {
        log.warn('Dropping event with invalid payload', { eventName, issues: result.issues });
        return 0;
      }
      data = result.data;
    }

    let completed = 0;
    // Snapshot so a handler may unregister itself mid-dispatch
    for (const handler of [...handlers]) {
      try {
        await (handler as EventHandler<unknown>)(data);
        completed += 1;
      } catch (error) {
        log.error(`Error in handler for ${eventName}`, error, { eventName });
      }
    }
    return completed;
  }

  hasHandlers(eventName: string): boolean {
    return (this.handlers.get(eventName)?.size ?? 0) > 0;
  }

  clear(): void {
    this.handlers.clear();
  }

  getRegisteredEventTypes(): string[] {
    return Array.from(this.handlers.keys());
  }
}
