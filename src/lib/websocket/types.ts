/**
 * WebSocket Types
 * Connection-level types shared by the client and its consumers
 */

export type {
  ConnectionState,
  ConnectionStatus,
  HandshakeState,
  HeartbeatLedger,
  DegradedConnectionInfo,
  ReadyInfo,
  ClientEvents,
} from './client/types';

export { describeConnectionState } from './client/types';
