/**
 * SocketClient
 * Connection lifecycle for the Engine.IO v4 / Socket.IO sync protocol:
 * handshake, heartbeat, reconnection, and an ordered receive loop.
 */

import { v4 as uuidv4 } from 'uuid';
import { EventEmitter } from '../events/event-emitter';
import { FrameReader } from './frame-reader';
import { HandshakeMachine, type HandshakeAction } from './handshake';
import { HeartbeatMonitor } from './heartbeat-monitor';
import { createWsTransport, type SocketFactory, type TransportSocket } from './transport';
import {
  ConnectionError,
  abnormalCloseError,
  closedBeforeReadyError,
  describeTransportError,
  handshakeTimeoutError,
  invalidUrlError,
} from './errors';
import { decodeFrame, encodeEvent, encodeNamespaceJoin, previewFrame, type Frame, type JsonObject } from '../protocol/frame-codec';
import { OUTBOUND_EVENTS } from '../protocol/game-events';
import { mergeConfig, wsConfig, WEBSOCKET_CONSTANTS, type WebSocketConfig, type WebSocketConfigOverrides } from '../config/websocket-config';
import { createLogger, type Logger } from '../../utils/logger';
import { isSameState, type ClientEvents, type ConnectionState, type HandshakeState, type HeartbeatLedger } from './types';

/**
 * Receives application events once the handshake is complete
 */
export interface EventSink {
  dispatch(name: string, payload: JsonObject): Promise<void> | void;
}

export interface SocketClientOptions {
  baseUrl?: string;
  deviceUuid?: string;
  config?: WebSocketConfigOverrides;
  createSocket?: SocketFactory;
  dispatcher?: EventSink;
  // Throwaway clients turn these off
  reconnect?: boolean;
  registerDevice?: boolean;
  now?: () => number;
  // Log scope, e.g. "diagnostics:5001"
  label?: string;
}

/**
 * ws:// or wss:// handshake URL for a server base URL
 */
export function buildSocketUrl(baseUrl: string): string {
  const trimmed = baseUrl.trim().replace(/\/+$/, '');
  const wsBase = trimmed.replace(/^http:\/\//i, 'ws://').replace(/^https:\/\//i, 'wss://');

  let url: URL;
  try {
    url = new URL(`${wsBase}${WEBSOCKET_CONSTANTS.HANDSHAKE_PATH}`);
  } catch {
    throw invalidUrlError(baseUrl);
  }
  if (url.protocol !== 'ws:' && url.protocol !== 'wss:') {
    throw invalidUrlError(baseUrl, `unsupported scheme "${url.protocol.replace(/:$/, '')}"`);
  }
  return url.toString();
}

export class SocketClient extends EventEmitter<ClientEvents> {
  private ws: TransportSocket | null = null;
  private reader: FrameReader | null = null;
  private currentUrl: string | null = null;
  private state: ConnectionState = { status: 'disconnected' };
  private readonly handshake = new HandshakeMachine();
  private readonly heartbeat: HeartbeatMonitor;

  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private handshakeTimer: ReturnType<typeof setTimeout> | null = null;
  private connectStartedAt = 0;

  private readonly config: WebSocketConfig;
  private readonly baseUrl: string;
  private readonly deviceUuid: string;
  private readonly createSocket: SocketFactory;
  private readonly dispatcher: EventSink | undefined;
  private readonly shouldReconnect: boolean;
  private readonly shouldRegisterDevice: boolean;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: SocketClientOptions = {}) {
    super();
    this.config = mergeConfig(wsConfig, options.config);
    this.baseUrl = options.baseUrl ?? this.config.baseUrl;
    this.deviceUuid = options.deviceUuid ?? uuidv4();
    this.createSocket = options.createSocket ?? createWsTransport;
    this.dispatcher = options.dispatcher;
    this.shouldReconnect = options.reconnect ?? true;
    this.shouldRegisterDevice = options.registerDevice ?? true;
    this.now = options.now ?? (() => Date.now());
    this.log = createLogger(options.label ?? 'socket');

    this.heartbeat = new HeartbeatMonitor({
      config: this.config.heartbeat,
      send: (frame) => this.sendRaw(frame),
      now: this.now,
    });
    this.heartbeat.on('degraded', (info) => this.emit('degraded', info));
  }

  /**
   * Open the connection and start the handshake.
   * No-op while connecting or connected.
   */
  connect(): void {
    if (this.state.status === 'connected') {
      this.log.debug('Already connected');
      return;
    }
    if (this.state.status === 'connecting') {
      this.log.debug('Connection already in progress');
      return;
    }

    let url: string;
    try {
      url = buildSocketUrl(this.baseUrl);
    } catch (error) {
      this.handleFailure(error instanceof ConnectionError ? error : invalidUrlError(this.baseUrl));
      return;
    }

    this.currentUrl = url;
    this.connectStartedAt = this.now();
    this.handshake.begin();
    this.setState({ status: 'connecting' });
    this.emit('handshake', this.handshake.getState());
    this.armHandshakeTimer();

    this.log.info('Opening WebSocket connection', { url });

    let ws: TransportSocket;
    try {
      ws = this.createSocket(url);
    } catch (error) {
      this.handleFailure(describeTransportError(error, url));
      return;
    }

    const reader = new FrameReader({ log: this.log });
    this.ws = ws;
    this.reader = reader;

    ws.onopen = () => {
      this.log.debug('Transport open, awaiting session', { url });
    };
    ws.onmessage = (data) => {
      reader.push(data);
    };
    ws.onerror = (error) => {
      this.handleFailure(describeTransportError(error, url));
    };
    ws.onclose = (code, reason) => {
      this.handleServerClose(code, reason);
    };

    this.receiveLoop(reader).catch((error: unknown) => {
      this.log.error('Receive loop failed', error, { url });
    });
  }

  /**
   * Close the connection and cancel every timer. Safe to call repeatedly.
   */
  disconnect(): void {
    this.clearReconnectTimer();
    const hadSocket = this.ws !== null;
    const handshakeChanged = this.handshake.getState() !== 'not_started';

    this.teardown(WEBSOCKET_CONSTANTS.CLOSE_CODES.NORMAL, 'Client disconnect');
    this.publishReset({ status: 'disconnected' }, handshakeChanged);

    if (hadSocket) {
      this.log.info('WebSocket disconnected');
    }
  }

  /**
   * Drop to disconnected because an out-of-band check says the server is down
   */
  forceDisconnected(reason: string): void {
    if (this.state.status !== 'disconnected') {
      this.log.warn('Forcing disconnected state', { reason });
    }
    this.disconnect();
  }

  /**
   * Send an application event. Only allowed once the handshake is complete;
   * returns false when nothing was written.
   */
  sendEvent(name: string, payload: JsonObject): boolean {
    if (this.state.status !== 'connected') {
      this.log.warn('Cannot send event while not connected', { eventName: name, status: this.state.status });
      return false;
    }
    return this.sendRaw(encodeEvent(name, payload));
  }

  /**
   * Send a client-initiated liveness probe
   */
  ping(): boolean {
    if (this.state.status !== 'connected') {
      return false;
    }
    return this.heartbeat.sendClientPing();
  }

  private sendRaw(frame: string): boolean {
    if (!this.ws || !this.ws.isOpen) {
      this.log.debug('Dropping outbound frame, socket not open', { frame: previewFrame(frame) });
      return false;
    }
    try {
      this.ws.send(frame);
      return true;
    } catch (error) {
      this.log.error('Failed to send frame', error, { frame: previewFrame(frame) });
      return false;
    }
  }

  /**
   * Pull one frame, process it completely, then issue the next read
   */
  private async receiveLoop(reader: FrameReader): Promise<void> {
    for (;;) {
      const raw = await reader.read();
      if (raw === null) {
        return;
      }
      await this.processFrame(raw);
    }
  }

  private async processFrame(raw: string): Promise<void> {
    const frame = decodeFrame(raw);
    this.emit('frame', frame);

    switch (frame.type) {
      case 'unknown':
        this.log.warn('Ignoring unrecognized frame', { frame: previewFrame(raw) });
        return;
      case 'ping':
        this.heartbeat.handleServerPing();
        return;
      case 'pong':
        this.heartbeat.handlePong();
        return;
      default:
        break;
    }

    const action = this.handshake.handleFrame(frame);
    if (action.type !== 'none') {
      this.applyHandshakeAction(action);
      return;
    }

    if (frame.type === 'event') {
      await this.deliverEvent(frame);
      return;
    }

    this.log.debug('Ignoring out-of-sequence frame', { type: frame.type, handshake: this.handshake.getState() });
  }

  private applyHandshakeAction(action: Exclude<HandshakeAction, { type: 'none' }>): void {
    this.emit('handshake', this.handshake.getState());

    if (action.type === 'send_namespace_join') {
      this.log.debug('Session opened, joining namespace', { sessionId: action.sessionId });
      this.sendRaw(encodeNamespaceJoin());
      return;
    }

    this.clearHandshakeTimer();
    this.clearReconnectTimer();
    this.setState({ status: 'connected' });

    const latencyMs = this.now() - this.connectStartedAt;
    this.log.info('WebSocket connected', { sessionId: action.sessionId, via: action.via, latencyMs });
    this.emit('ready', { sessionId: action.sessionId, latencyMs });
    // A ready listener may have torn the connection down already
    if (this.state.status !== 'connected') {
      return;
    }

    if (this.shouldRegisterDevice) {
      this.sendEvent(OUTBOUND_EVENTS.REGISTER_DEVICE, { device_uuid: this.deviceUuid });
    }
    this.heartbeat.start();
  }

  private async deliverEvent(frame: Extract<Frame, { type: 'event' }>): Promise<void> {
    if (!this.handshake.isReady()) {
      this.log.warn('Dropping event received before handshake completed', { eventName: frame.name });
      return;
    }
    if (frame.name === WEBSOCKET_CONSTANTS.LEGACY_CONNECTED_EVENT) {
      this.log.debug('Ignoring repeated connected event');
      return;
    }
    this.emit('event', { name: frame.name, payload: frame.payload });
    if (this.dispatcher) {
      await this.dispatcher.dispatch(frame.name, frame.payload);
    }
  }

  /**
   * Transport failure or handshake timeout: error state plus one reconnect
   */
  private handleFailure(error: ConnectionError): void {
    this.log.error('WebSocket connection failed', error, { url: this.currentUrl ?? this.baseUrl, kind: error.kind });

    const handshakeChanged = this.handshake.getState() !== 'not_started';
    this.teardown(WEBSOCKET_CONSTANTS.CLOSE_CODES.GOING_AWAY, error.kind);
    this.publishReset({ status: 'error', message: error.message }, handshakeChanged);
    this.emit('error', error);

    if (error.retryable) {
      this.scheduleReconnect();
    }
  }

  private handleServerClose(code: number, reason: string): void {
    if (!this.handshake.isReady()) {
      this.handleFailure(closedBeforeReadyError(code, reason));
      return;
    }
    if (code !== WEBSOCKET_CONSTANTS.CLOSE_CODES.NORMAL) {
      this.handleFailure(abnormalCloseError(code, reason));
      return;
    }

    this.log.info('WebSocket closed by server', { code, reason });
    this.teardown(code, reason);
    this.publishReset({ status: 'disconnected' }, true);
    this.scheduleReconnect();
  }

  /**
   * Publish a teardown: the connection state is assigned before any listener
   * runs, so handshake listeners never see `connected` with a reset handshake
   */
  private publishReset(newState: ConnectionState, handshakeChanged: boolean): void {
    const stateChanged = !isSameState(this.state, newState);
    this.state = newState;

    if (handshakeChanged) {
      this.emit('handshake', this.handshake.getState());
    }
    if (stateChanged) {
      this.emit('state', { ...newState });
    }
  }

  /**
   * Release the socket, reader and connection timers and reset the handshake.
   * Emits nothing; callers publish the resulting state.
   */
  private teardown(code: number, reason: string): void {
    this.clearHandshakeTimer();
    this.heartbeat.reset();
    this.handshake.reset();

    if (this.reader) {
      this.reader.close();
      this.reader = null;
    }

    const ws = this.ws;
    this.ws = null;
    if (ws) {
      ws.onopen = null;
      ws.onmessage = null;
      ws.onerror = null;
      ws.onclose = null;
      try {
        ws.close(code, reason);
      } catch (error) {
        this.log.debug('Error while closing socket', { error: error instanceof Error ? error.message : String(error) });
      }
    }
  }

  private armHandshakeTimer(): void {
    this.clearHandshakeTimer();
    const timeout = this.config.handshakeTimeout;
    this.handshakeTimer = setTimeout(() => {
      this.handshakeTimer = null;
      if (!this.handshake.isReady()) {
        this.handleFailure(handshakeTimeoutError(timeout));
      }
    }, timeout);
  }

  private clearHandshakeTimer(): void {
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = null;
    }
  }

  /**
   * Arm the single reconnect timer, replacing any armed one
   */
  private scheduleReconnect(): void {
    if (!this.shouldReconnect) {
      return;
    }
    this.clearReconnectTimer();

    const delay = this.config.reconnectDelay;
    this.log.info('Scheduling reconnect attempt', { delayMs: delay });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  getState(): ConnectionState {
    return { ...this.state };
  }

  getHandshakeState(): HandshakeState {
    return this.handshake.getState();
  }

  getSessionId(): string | undefined {
    return this.handshake.getSessionId();
  }

  getHeartbeatLedger(): Readonly<HeartbeatLedger> {
    return this.heartbeat.getLedger();
  }

  getDeviceUuid(): string {
    return this.deviceUuid;
  }

  getUrl(): string | null {
    return this.currentUrl;
  }

  hasPendingReconnect(): boolean {
    return this.reconnectTimer !== null;
  }

  isConnected(): boolean {
    return this.state.status === 'connected' && this.ws?.isOpen === true;
  }

  private setState(newState: ConnectionState): void {
    if (!isSameState(this.state, newState)) {
      this.state = newState;
      this.emit('state', { ...newState });
    }
  }

  /**
   * Cleanup
   */
  destroy(): void {
    this.disconnect();
    this.heartbeat.destroy();
    this.removeAllListeners();
  }
}
