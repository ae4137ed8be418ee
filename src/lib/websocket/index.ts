/**
 * WebSocket Library
 * Public API exports
 */

// Manager (High-Level API)
export { SocketManager } from './manager/socket-manager';
export type { SocketManagerOptions, ObjectCollectedHandler } from './manager/socket-manager';

// Client (Low-Level API - for advanced use cases)
export { SocketClient, buildSocketUrl } from './client/socket-client';
export type { SocketClientOptions, EventSink } from './client/socket-client';
export { HandshakeMachine } from './client/handshake';
export type { HandshakeAction } from './client/handshake';
export { HeartbeatMonitor } from './client/heartbeat-monitor';
export { HealthPoller, createHttpHealthCheck } from './client/health-poller';
export type { HealthCheck, HealthPollerTarget } from './client/health-poller';
export { FrameReader } from './client/frame-reader';
export { createWsTransport } from './client/transport';
export type { TransportSocket, SocketFactory } from './client/transport';
export { ConnectionError, describeTransportError } from './client/errors';
export type { ConnectionErrorKind } from './client/errors';

// Manager utilities
export { HandlerRegistry } from './manager/handler-registry';
export type { EventHandler } from './manager/handler-registry';

// Diagnostics
export { ConnectionDiagnostics, formatDiagnosticReport } from './diagnostics/connection-diagnostics';
export type {
  DiagnosticResult,
  DiagnosticReport,
  HttpProbeResult,
  MultiPortResult,
  PortOutcome,
} from './diagnostics/connection-diagnostics';

// Events
export { EventEmitter } from './events/event-emitter';

// Protocol
export * from './protocol/frame-codec';
export * from './protocol/game-events';

// Configuration
export { getWebSocketConfig, mergeConfig, defaultConfig, wsConfig, WEBSOCKET_CONSTANTS } from './config/websocket-config';
export type { WebSocketConfig, WebSocketConfigOverrides } from './config/websocket-config';

// Types
export * from './types';
