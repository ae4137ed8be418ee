/**
 * In-process transport stand-in for tests.
 * Records outbound frames and lets a test play the server side.
 */

import type { SocketFactory, TransportSocket } from './transport';

export class FakeSocket implements TransportSocket {
  onopen: (() => void) | null = null;
  onmessage: ((data: string) => void) | null = null;
  onerror: ((error: Error) => void) | null = null;
  onclose: ((code: number, reason: string) => void) | null = null;

  readonly sent: string[] = [];
  closedWith: { code?: number; reason?: string } | null = null;
  private open = false;

  constructor(readonly url: string) {}

  get isOpen(): boolean {
    return this.open;
  }

  send(data: string): void {
    if (!this.open) {
      throw new Error('FakeSocket is not open');
    }
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.open = false;
    this.closedWith = { code, reason };
  }

  // Server-side controls

  serverOpen(): void {
    this.open = true;
    this.onopen?.();
  }

  serverSend(frame: string): void {
    this.onmessage?.(frame);
  }

  /**
   * Open the transport and run the full Engine.IO + namespace handshake
   */
  completeHandshake(sid = 'session-1'): void {
    this.serverOpen();
    this.serverSend(`0{"sid":"${sid}","upgrades":[],"pingInterval":25000,"pingTimeout":20000}`);
    this.serverSend(`40{"sid":"ns-${sid}"}`);
  }

  serverError(error: Error): void {
    this.open = false;
    this.onerror?.(error);
  }

  serverClose(code: number, reason = ''): void {
    this.open = false;
    this.onclose?.(code, reason);
  }
}

export interface FakeSocketFactory {
  factory: SocketFactory;
  sockets: FakeSocket[];
  latest(): FakeSocket;
}

export function createFakeSocketFactory(): FakeSocketFactory {
  const sockets: FakeSocket[] = [];
  return {
    sockets,
    factory: (url) => {
      const socket = new FakeSocket(url);
      sockets.push(socket);
      return socket;
    },
    latest() {
      const socket = sockets[sockets.length - 1];
      if (!socket) {
        throw new Error('No socket has been created');
      }
      return socket;
    },
  };
}

/**
 * Let the receive loop drain queued frames
 */
export async function flushFrames(rounds = 100): Promise<void> {
  for (let i = 0; i < rounds; i += 1) {
    await Promise.resolve();
  }
}
