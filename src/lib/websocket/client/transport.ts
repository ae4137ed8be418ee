/**
 * Transport
 * Minimal socket surface the SocketClient drives, with a `ws` implementation
 */

import WebSocket from 'ws';
import { WEBSOCKET_CONSTANTS } from '../constants';

export interface TransportSocket {
  onopen: (() => void) | null;
  onmessage: ((data: string) => void) | null;
  onerror: ((error: Error) => void) | null;
  onclose: ((code: number, reason: string) => void) | null;
  readonly isOpen: boolean;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type SocketFactory = (url: string) => TransportSocket;

function toText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

class WsTransport implements TransportSocket {
  onopen: (() => void) | null = null;
  onmessage: ((data: string) => void) | null = null;
  onerror: ((error: Error) => void) | null = null;
  onclose: ((code: number, reason: string) => void) | null = null;

  private readonly ws: WebSocket;

  constructor(url: string) {
    // Throws SyntaxError synchronously for malformed URLs
    this.ws = new WebSocket(url);

    this.ws.on('open', () => this.onopen?.());
    // Engine.IO text frames may arrive as binary when proxied; decode both
    this.ws.on('message', (data) => this.onmessage?.(toText(data)));
    this.ws.on('error', (error) => this.onerror?.(error));
    this.ws.on('close', (code, reason) => this.onclose?.(code, reason.toString('utf8')));
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(data: string): void {
    this.ws.send(data);
  }

  close(code: number = WEBSOCKET_CONSTANTS.CLOSE_CODES.NORMAL, reason?: string): void {
    if (this.ws.readyState === WebSocket.CLOSING || this.ws.readyState === WebSocket.CLOSED) {
      return;
    }
    // On a connecting socket this aborts the upgrade and ws reports it through 'error'
    this.ws.close(code, reason);
  }
}

export const createWsTransport: SocketFactory = (url) => new WsTransport(url);
