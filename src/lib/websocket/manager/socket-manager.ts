/**
 * SocketManager
 * High-level game sync API: one long-lived connection, typed event handlers,
 * and the built-in reply to admin diagnostic pings.
 */

import { SocketClient, type SocketClientOptions } from '../client/socket-client';
import { HealthPoller, createHttpHealthCheck, type HealthCheck } from '../client/health-poller';
import { HandlerRegistry, type EventHandler } from './handler-registry';
import {
  GAME_EVENTS,
  OUTBOUND_EVENTS,
  type AdminDiagnosticPingPayload,
  type InboundEventName,
  type InboundEventPayloads,
  type OutboundEventName,
  type OutboundEventPayloads,
} from '../protocol/game-events';
import type { JsonObject } from '../protocol/frame-codec';
import { createLogger } from '../../utils/logger';
import { wsConfig } from '../config/websocket-config';
import type { ConnectionState, DegradedConnectionInfo, HandshakeState } from '../client/types';

const log = createLogger('manager');

export interface SocketManagerOptions extends Omit<SocketClientOptions, 'dispatcher'> {
  // Defaults to GET <baseUrl>/health
  healthCheck?: HealthCheck;
  // Reply to admin_diagnostic_ping automatically (default true)
  answerDiagnosticPings?: boolean;
}

export type ObjectCollectedHandler = (objectId: string, foundBy: string, foundAt: string) => void | Promise<void>;

export class SocketManager {
  private readonly client: SocketClient;
  private readonly handlerRegistry: HandlerRegistry;
  private readonly healthPoller: HealthPoller;
  private readonly now: () => number;

  constructor(options: SocketManagerOptions = {}) {
    const { healthCheck, answerDiagnosticPings = true, ...clientOptions } = options;
    this.handlerRegistry = new HandlerRegistry();
    this.client = new SocketClient({ ...clientOptions, dispatcher: this.handlerRegistry });
    this.now = options.now ?? (() => Date.now());

    const baseUrl = options.baseUrl ?? options.config?.baseUrl ?? wsConfig.baseUrl;
    const check = healthCheck ?? createHttpHealthCheck(baseUrl, options.config?.healthPoll?.requestTimeout);
    this.healthPoller = new HealthPoller(this.client, check, {
      interval: options.config?.healthPoll?.interval,
    });

    if (answerDiagnosticPings) {
      this.handlerRegistry.register(GAME_EVENTS.ADMIN_DIAGNOSTIC_PING, (payload) => {
        this.answerDiagnosticPing(payload);
      });
    }
  }

  connect(): void {
    this.client.connect();
  }

  disconnect(): void {
    this.client.disconnect();
  }

  /**
   * Start the periodic health check that reconnects when the server comes back
   */
  startHealthPolling(): void {
    this.healthPoller.start();
  }

  stopHealthPolling(): void {
    this.healthPoller.stop();
  }

  /**
   * Run one health check now
   */
  checkHealth(): Promise<boolean | null> {
    return this.healthPoller.pollNow();
  }

  /**
   * Register a handler for a catalogued event; the payload arrives validated
   */
  on<K extends InboundEventName>(eventName: K, handler: EventHandler<InboundEventPayloads[K]>): () => void {
    return this.handlerRegistry.register(eventName, handler);
  }

  /**
   * Register a handler for an event outside the catalog; the payload arrives as sent
   */
  onEvent(eventName: string, handler: EventHandler<JsonObject>): () => void {
    return this.handlerRegistry.register(eventName, handler);
  }

  off(eventName: string, handler?: EventHandler<never>): void {
    this.handlerRegistry.unregister(eventName, handler);
  }

  onObjectCollected(handler: ObjectCollectedHandler): () => void {
    return this.on(GAME_EVENTS.OBJECT_COLLECTED, (payload) =>
      handler(payload.object_id, payload.found_by, payload.found_at)
    );
  }

  /**
   * Send a catalogued outbound event
   */
  emit<K extends OutboundEventName>(eventName: K, payload: OutboundEventPayloads[K]): boolean {
    return this.client.sendEvent(eventName, payload);
  }

  /**
   * Send an arbitrary event
   */
  sendEvent(eventName: string, payload: JsonObject): boolean {
    return this.client.sendEvent(eventName, payload);
  }

  private answerDiagnosticPing(payload: AdminDiagnosticPingPayload): void {
    const sent = this.emit(OUTBOUND_EVENTS.CLIENT_DIAGNOSTIC_PONG, {
      ping_id: payload.ping_id,
      client_timestamp: new Date(this.now()).toISOString(),
      admin_session_id: payload.admin_session_id,
    });
    log.debug('Answered admin diagnostic ping', { pingId: payload.ping_id, sent });
  }

  onStateChange(callback: (state: ConnectionState) => void): () => void {
    return this.client.on('state', callback);
  }

  onHandshakeChange(callback: (state: HandshakeState) => void): () => void {
    return this.client.on('handshake', callback);
  }

  onDegraded(callback: (info: DegradedConnectionInfo) => void): () => void {
    return this.client.on('degraded', callback);
  }

  onHealthChange(callback: (change: { healthy: boolean }) => void): () => void {
    return this.healthPoller.on('change', callback);
  }

  getState(): ConnectionState {
    return this.client.getState();
  }

  getHandshakeState(): HandshakeState {
    return this.client.getHandshakeState();
  }

  getSessionId(): string | undefined {
    return this.client.getSessionId();
  }

  isConnected(): boolean {
    return this.client.isConnected();
  }

  getRegisteredEventTypes(): string[] {
    return this.handlerRegistry.getRegisteredEventTypes();
  }

  /**
   * Low-level client, for diagnostics views and advanced use
   */
  getClient(): SocketClient {
    return this.client;
  }

  /**
   * Cleanup
   */
  destroy(): void {
    this.healthPoller.destroy();
    this.client.destroy();
    this.handlerRegistry.clear();
  }
}
