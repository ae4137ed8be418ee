/**
 * FrameReader
 * Buffers pushed socket messages so the receive loop can pull them one at a time
 */

import { createLogger, type Logger } from '../../utils/logger';

export const DEFAULT_FRAME_HIGH_WATER_MARK = 1000;

export interface FrameReaderOptions {
  // Backlog size that triggers a warning; rearmed once the backlog drains to half
  highWaterMark?: number;
  log?: Logger;
}

export class FrameReader {
  private buffer: string[] = [];
  private waiter: ((frame: string | null) => void) | null = null;
  private closed = false;
  private overHighWater = false;
  private readonly highWaterMark: number;
  private readonly log: Logger;

  constructor(options: FrameReaderOptions = {}) {
    this.highWaterMark = options.highWaterMark ?? DEFAULT_FRAME_HIGH_WATER_MARK;
    this.log = options.log ?? createLogger('frames');
  }

  /**
   * Called from the socket's message callback
   */
  push(frame: string): void {
    if (this.closed) {
      return;
    }
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(frame);
      return;
    }
    this.buffer.push(frame);

    if (!this.overHighWater && this.buffer.length >= this.highWaterMark) {
      this.overHighWater = true;
      this.log.warn('Inbound frame backlog passed high-water mark; a handler may be stalled', {
        pending: this.buffer.length,
        highWaterMark: this.highWaterMark,
      });
    }
  }

  /**
   * Next frame in arrival order, or null once the reader is closed.
   * Only one read may be pending at a time.
   */
  read(): Promise<string | null> {
    if (this.waiter) {
      return Promise.reject(new Error('FrameReader already has a pending read'));
    }
    const next = this.buffer.shift();
    if (next !== undefined) {
      if (this.overHighWater && this.buffer.length <= this.highWaterMark / 2) {
        this.overHighWater = false;
      }
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Drop buffered frames and release a pending read
   */
  close(): void {
    this.closed = true;
    this.buffer = [];
    this.overHighWater = false;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.buffer.length;
  }
}
