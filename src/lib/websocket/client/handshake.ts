/**
 * HandshakeMachine
 * Tracks progress from transport open to namespace join.
 *
 *   not_started ──connect──► awaiting_session ──open──► awaiting_namespace_ack ──ack──► ready
 *
 * `ready` is also reached from awaiting_namespace_ack by a legacy `42["connected",...]`
 * event. Only `reset()` leaves `ready`.
 */

import { WEBSOCKET_CONSTANTS } from '../constants';
import { getOpenSessionId, type Frame } from '../protocol/frame-codec';
import type { HandshakeState } from './types';

export type HandshakeAction =
  | { type: 'none' }
  | { type: 'send_namespace_join'; sessionId?: string }
  | { type: 'ready'; sessionId?: string; via: 'namespace_ack' | 'legacy_event' };

const NO_ACTION: HandshakeAction = { type: 'none' };

export class HandshakeMachine {
  private state: HandshakeState = 'not_started';
  private sessionId: string | undefined;

  getState(): HandshakeState {
    return this.state;
  }

  getSessionId(): string | undefined {
    return this.sessionId;
  }

  isReady(): boolean {
    return this.state === 'ready';
  }

  /**
   * Called by connect(); restarts the machine from any state
   */
  begin(): void {
    this.state = 'awaiting_session';
    this.sessionId = undefined;
  }

  reset(): void {
    this.state = 'not_started';
    this.sessionId = undefined;
  }

  /**
   * Feed one decoded frame and get the action the connection must take
   */
  handleFrame(frame: Frame): HandshakeAction {
    switch (this.state) {
      case 'awaiting_session':
        if (frame.type === 'open') {
          this.sessionId = getOpenSessionId(frame);
          this.state = 'awaiting_namespace_ack';
          return { type: 'send_namespace_join', sessionId: this.sessionId };
        }
        return NO_ACTION;

      case 'awaiting_namespace_ack':
        if (frame.type === 'namespace_ack') {
          this.sessionId = frame.sessionId ?? this.sessionId;
          this.state = 'ready';
          return { type: 'ready', sessionId: this.sessionId, via: 'namespace_ack' };
        }
        if (frame.type === 'event' && frame.name === WEBSOCKET_CONSTANTS.LEGACY_CONNECTED_EVENT) {
          this.state = 'ready';
          return { type: 'ready', sessionId: this.sessionId, via: 'legacy_event' };
        }
        return NO_ACTION;

      case 'not_started':
      case 'ready':
        return NO_ACTION;
    }
  }
}
