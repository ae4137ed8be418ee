/**
 * WebSocket Constants
 * Engine.IO v4 / Socket.IO wire constants and close codes
 */

export const WEBSOCKET_CONSTANTS = {
  // Appended to the ws:// or wss:// form of the server base URL
  HANDSHAKE_PATH: '/socket.io/?EIO=4&transport=websocket',

  // Connection close codes
  CLOSE_CODES: {
    NORMAL: 1000,
    GOING_AWAY: 1001,
    ABNORMAL: 1006,
  },

  // Text frame prefixes
  FRAME_PREFIX: {
    OPEN: '0',
    PING: '2',
    PONG: '3',
    NAMESPACE: '40',
    EVENT: '42',
  },

  // Legacy servers announce readiness with an event of this name instead of a namespace ack
  LEGACY_CONNECTED_EVENT: 'connected',

  HEALTH_PATH: '/health',

  // Ports tried by the full diagnostic run besides the configured one
  COMMON_PORTS: [5001, 5000, 8080, 3000, 8000, 80, 443],
} as const;
