/**
 * HealthPoller
 * Periodic out-of-band server check that drives connect / disconnect decisions.
 * A socket can look open while the game server behind it is down; the HTTP
 * health endpoint is the authority here.
 */

import { EventEmitter } from '../events/event-emitter';
import { WEBSOCKET_CONSTANTS, wsConfig } from '../config/websocket-config';
import { createLogger } from '../../utils/logger';
import type { ConnectionState } from './types';

const log = createLogger('health');

export type HealthCheck = () => Promise<boolean>;

/**
 * The part of the connection the poller is allowed to steer
 */
export interface HealthPollerTarget {
  getState(): ConnectionState;
  connect(): void;
  forceDisconnected(reason: string): void;
}

export interface HealthPollerEvents extends Record<string, unknown> {
  change: { healthy: boolean };
}

export interface HealthPollerOptions {
  interval?: number;
}

/**
 * GET <baseUrl>/health; any 2xx answer counts as healthy
 */
export function createHttpHealthCheck(
  baseUrl: string,
  timeoutMs: number = wsConfig.healthPoll.requestTimeout
): HealthCheck {
  const url = `${baseUrl.trim().replace(/\/+$/, '')}${WEBSOCKET_CONSTANTS.HEALTH_PATH}`;
  return async () => {
    const response = await fetch(url, { method: 'GET', signal: AbortSignal.timeout(timeoutMs) });
    return response.ok;
  };
}

export class HealthPoller extends EventEmitter<HealthPollerEvents> {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight = false;
  private lastHealthy: boolean | null = null;
  private readonly interval: number;

  constructor(
    private readonly target: HealthPollerTarget,
    private readonly check: HealthCheck,
    options: HealthPollerOptions = {}
  ) {
    super();
    this.interval = options.interval ?? wsConfig.healthPoll.interval;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.pollNow().catch((error: unknown) => {
        log.error('Health poll failed', error);
      });
    }, this.interval);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Run one check and apply its outcome. Resolves to null when a previous
   * check is still in flight.
   */
  async pollNow(): Promise<boolean | null> {
    if (this.inFlight) {
      return null;
    }

    this.inFlight = true;
    let healthy: boolean;
    try {
      healthy = await this.check();
    } catch (error) {
      log.debug('Health check request failed', { error: error instanceof Error ? error.message : String(error) });
      healthy = false;
    } finally {
      this.inFlight = false;
    }

    if (healthy) {
      if (this.target.getState().status === 'disconnected') {
        log.info('Server healthy while disconnected, connecting');
        this.target.connect();
      }
    } else {
      this.target.forceDisconnected('Health check failed');
    }

    if (this.lastHealthy !== healthy) {
      this.lastHealthy = healthy;
      this.emit('change', { healthy });
    }
    return healthy;
  }

  getLastResult(): boolean | null {
    return this.lastHealthy;
  }

  destroy(): void {
    this.stop();
    this.removeAllListeners();
  }
}
