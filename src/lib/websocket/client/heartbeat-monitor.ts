/**
 * HeartbeatMonitor
 * Passive liveness tracking over both ping directions.
 *
 * Servers have used both a server-driven (`2` → `3`) and a client-driven
 * (`2` ← `3`) keepalive over time, so either signal counts. Staleness is
 * advisory: it raises `degraded` and never closes the connection.
 */

import { EventEmitter } from '../events/event-emitter';
import { encodePing, encodePong } from '../protocol/frame-codec';
import { createLogger } from '../../utils/logger';
import type { WebSocketConfig } from '../config/websocket-config';
import type { DegradedConnectionInfo, HeartbeatLedger } from './types';

const log = createLogger('heartbeat');

export interface HeartbeatMonitorEvents extends Record<string, unknown> {
  degraded: DegradedConnectionInfo;
}

export interface HeartbeatMonitorOptions {
  config: WebSocketConfig['heartbeat'];
  // Returns false when the frame could not be written
  send: (frame: string) => boolean;
  now?: () => number;
}

function emptyLedger(): HeartbeatLedger {
  return {
    lastOutboundPingAt: null,
    lastInboundPongAt: null,
    lastInboundServerPingAt: null,
    consecutiveFailures: 0,
  };
}

export class HeartbeatMonitor extends EventEmitter<HeartbeatMonitorEvents> {
  private ledger: HeartbeatLedger = emptyLedger();
  private readonly config: WebSocketConfig['heartbeat'];
  private readonly send: (frame: string) => boolean;
  private readonly now: () => number;

  private graceTimer: ReturnType<typeof setTimeout> | null = null;
  private checkTimer: ReturnType<typeof setInterval> | null = null;
  private pingTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: HeartbeatMonitorOptions) {
    super();
    this.config = options.config;
    this.send = options.send;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Begin periodic checks after the grace period
   */
  start(): void {
    this.stop();
    this.graceTimer = setTimeout(() => {
      this.graceTimer = null;
      this.startTimers();
    }, this.config.gracePeriod);
  }

  private startTimers(): void {
    this.checkTimer = setInterval(() => {
      this.checkStaleness();
    }, this.config.checkInterval);

    if (this.config.clientPingInterval > 0) {
      this.pingTimer = setInterval(() => {
        this.sendClientPing();
      }, this.config.clientPingInterval);
    }

    log.debug('Heartbeat monitoring started', {
      checkInterval: this.config.checkInterval,
      clientPingInterval: this.config.clientPingInterval,
    });
  }

  stop(): void {
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
    if (this.checkTimer) {
      clearInterval(this.checkTimer);
      this.checkTimer = null;
    }
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  /**
   * Stop timers and forget all recorded signals
   */
  reset(): void {
    this.stop();
    this.ledger = emptyLedger();
  }

  get isRunning(): boolean {
    return this.graceTimer !== null || this.checkTimer !== null;
  }

  /**
   * Answer a server probe with a pong and record it as proof of liveness
   */
  handleServerPing(): void {
    this.send(encodePong());
    this.ledger.lastInboundServerPingAt = this.now();
    this.ledger.consecutiveFailures = 0;
  }

  handlePong(): void {
    this.ledger.lastInboundPongAt = this.now();
    this.ledger.consecutiveFailures = 0;
  }

  sendClientPing(): boolean {
    const sent = this.send(encodePing());
    if (sent) {
      this.ledger.lastOutboundPingAt = this.now();
    }
    return sent;
  }

  /**
   * One staleness evaluation; runs on the check interval
   */
  checkStaleness(): void {
    const lastServerPing = this.ledger.lastInboundServerPingAt;
    const stale = lastServerPing === null || this.now() - lastServerPing > this.config.staleThreshold;
    if (!stale) {
      return;
    }

    this.ledger.consecutiveFailures += 1;
    log.debug('Heartbeat stale', { consecutiveFailures: this.ledger.consecutiveFailures });

    if (this.ledger.consecutiveFailures >= this.config.maxFailures) {
      const info: DegradedConnectionInfo = {
        consecutiveFailures: this.ledger.consecutiveFailures,
        lastInboundServerPingAt: this.ledger.lastInboundServerPingAt,
        lastInboundPongAt: this.ledger.lastInboundPongAt,
      };
      log.warn('Connection degraded: no recent heartbeat from server', { ...info });
      this.emit('degraded', info);
    }
  }

  getLedger(): Readonly<HeartbeatLedger> {
    return { ...this.ledger };
  }

  destroy(): void {
    this.reset();
    this.removeAllListeners();
  }
}
