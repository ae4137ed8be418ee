/**
 * WebSocket Configuration
 * Centralized timing and endpoint configuration for the sync client
 */

export interface WebSocketConfig {
  // Server base URL (http, https, ws or wss)
  baseUrl: string;

  // Connection settings
  handshakeTimeout: number;
  reconnectDelay: number;

  // Liveness tracking
  heartbeat: {
    checkInterval: number;
    staleThreshold: number;
    maxFailures: number;
    gracePeriod: number;
    // 0 disables client-initiated pings
    clientPingInterval: number;
  };

  // Out-of-band health polling
  healthPoll: {
    interval: number;
    requestTimeout: number;
  };

  // Throwaway diagnostic connections
  diagnostics: {
    connectionTimeout: number;
    portScanTimeout: number;
    httpTimeout: number;
  };
}

export const defaultConfig: WebSocketConfig = {
  baseUrl: 'http://localhost:5000',

  handshakeTimeout: 30000, // 30 seconds
  reconnectDelay: 5000, // 5 seconds

  heartbeat: {
    checkInterval: 60000, // 1 minute
    staleThreshold: 60000, // 1 minute
    maxFailures: 3,
    gracePeriod: 1000, // 1 second
    clientPingInterval: 30000, // 30 seconds
  },

  healthPoll: {
    interval: 10000, // 10 seconds
    requestTimeout: 5000, // 5 seconds
  },

  diagnostics: {
    connectionTimeout: 5000, // 5 seconds
    portScanTimeout: 3000, // 3 seconds
    httpTimeout: 10000, // 10 seconds
  },
};

/**
 * Positive number from an env value, or the fallback
 */
function envNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/**
 * Like envNumber, but 0 is a meaningful value
 */
function envNonNegative(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

/**
 * Get WebSocket configuration
 * Can be overridden via environment variables
 */
export function getWebSocketConfig(env: NodeJS.ProcessEnv = process.env): WebSocketConfig {
  return {
    baseUrl: env.GAME_SERVER_URL?.trim() || defaultConfig.baseUrl,

    handshakeTimeout: envNumber(env.WS_HANDSHAKE_TIMEOUT, defaultConfig.handshakeTimeout),
    reconnectDelay: envNumber(env.WS_RECONNECT_DELAY, defaultConfig.reconnectDelay),

    heartbeat: {
      checkInterval: envNumber(env.WS_HEARTBEAT_CHECK_INTERVAL, defaultConfig.heartbeat.checkInterval),
      staleThreshold: envNumber(env.WS_HEARTBEAT_STALE_THRESHOLD, defaultConfig.heartbeat.staleThreshold),
      maxFailures: envNumber(env.WS_HEARTBEAT_MAX_FAILURES, defaultConfig.heartbeat.maxFailures),
      gracePeriod: envNonNegative(env.WS_HEARTBEAT_GRACE_PERIOD, defaultConfig.heartbeat.gracePeriod),
      clientPingInterval: envNonNegative(env.WS_CLIENT_PING_INTERVAL, defaultConfig.heartbeat.clientPingInterval),
    },

    healthPoll: {
      interval: envNumber(env.WS_HEALTH_POLL_INTERVAL, defaultConfig.healthPoll.interval),
      requestTimeout: envNumber(env.WS_HEALTH_CHECK_TIMEOUT, defaultConfig.healthPoll.requestTimeout),
    },

    diagnostics: {
      connectionTimeout: envNumber(env.WS_DIAGNOSTIC_TIMEOUT, defaultConfig.diagnostics.connectionTimeout),
      portScanTimeout: envNumber(env.WS_PORT_SCAN_TIMEOUT, defaultConfig.diagnostics.portScanTimeout),
      httpTimeout: envNumber(env.WS_HTTP_PROBE_TIMEOUT, defaultConfig.diagnostics.httpTimeout),
    },
  };
}

export type WebSocketConfigOverrides = Partial<Omit<WebSocketConfig, 'heartbeat' | 'healthPoll' | 'diagnostics'>> & {
  heartbeat?: Partial<WebSocketConfig['heartbeat']>;
  healthPoll?: Partial<WebSocketConfig['healthPoll']>;
  diagnostics?: Partial<WebSocketConfig['diagnostics']>;
};

/**
 * Layer per-instance overrides on top of a base configuration
 */
export function mergeConfig(base: WebSocketConfig, overrides: WebSocketConfigOverrides = {}): WebSocketConfig {
  return {
    ...base,
    ...overrides,
    heartbeat: { ...base.heartbeat, ...overrides.heartbeat },
    healthPoll: { ...base.healthPoll, ...overrides.healthPoll },
    diagnostics: { ...base.diagnostics, ...overrides.diagnostics },
  };
}

export const wsConfig = getWebSocketConfig();

// Re-export constants for convenience
export { WEBSOCKET_CONSTANTS } from '../constants';
