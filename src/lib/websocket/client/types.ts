/**
 * SocketClient Types
 * Types specific to the low-level SocketClient
 */

import type { Frame, JsonObject } from '../protocol/frame-codec';
import type { ConnectionError } from './errors';

export type ConnectionState =
  | { status: 'disconnected' }
  | { status: 'connecting' }
  | { status: 'connected' }
  | { status: 'error'; message: string };

export type ConnectionStatus = ConnectionState['status'];

export type HandshakeState = 'not_started' | 'awaiting_session' | 'awaiting_namespace_ack' | 'ready';

export interface HeartbeatLedger {
  lastOutboundPingAt: number | null;
  lastInboundPongAt: number | null;
  lastInboundServerPingAt: number | null;
  consecutiveFailures: number;
}

export interface DegradedConnectionInfo {
  consecutiveFailures: number;
  lastInboundServerPingAt: number | null;
  lastInboundPongAt: number | null;
}

export interface ReadyInfo {
  sessionId?: string;
  latencyMs: number;
}

export interface ClientEvents extends Record<string, unknown> {
  state: ConnectionState;
  handshake: HandshakeState;
  ready: ReadyInfo;
  frame: Frame;
  event: { name: string; payload: JsonObject };
  degraded: DegradedConnectionInfo;
  error: ConnectionError;
}

export function isSameState(a: ConnectionState, b: ConnectionState): boolean {
  if (a.status === 'error' && b.status === 'error') {
    return a.message === b.message;
  }
  return a.status === b.status;
}

/**
 * Human-readable label for status displays
 */
export function describeConnectionState(state: ConnectionState): string {
  switch (state.status) {
    case 'disconnected':
      return 'Disconnected';
    case 'connecting':
      return 'Connecting...';
    case 'connected':
      return 'Connected';
    case 'error':
      return `Error: ${state.message}`;
  }
}
