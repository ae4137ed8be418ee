import { describe, it, expect, beforeEach } from 'vitest';
import { HandshakeMachine } from './handshake';
import { decodeFrame } from '../protocol/frame-codec';

describe('HandshakeMachine', () => {
  let machine: HandshakeMachine;

  beforeEach(() => {
    machine = new HandshakeMachine();
  });

  it('starts in not_started and ignores frames there', () => {
    expect(machine.getState()).toBe('not_started');
    expect(machine.handleFrame(decodeFrame('0{"sid":"s"}'))).toEqual({ type: 'none' });
    expect(machine.getState()).toBe('not_started');
  });

  it('asks for a namespace join after the open frame', () => {
    machine.begin();
    expect(machine.getState()).toBe('awaiting_session');

    const action = machine.handleFrame(decodeFrame('0{"sid":"s-1"}'));

    expect(action).toEqual({ type: 'send_namespace_join', sessionId: 's-1' });
    expect(machine.getState()).toBe('awaiting_namespace_ack');
  });

  it('becomes ready on a namespace ack and prefers the namespace session id', () => {
    machine.begin();
    machine.handleFrame(decodeFrame('0{"sid":"s-1"}'));

    const action = machine.handleFrame(decodeFrame('40{"sid":"ns-1"}'));

    expect(action).toEqual({ type: 'ready', sessionId: 'ns-1', via: 'namespace_ack' });
    expect(machine.isReady()).toBe(true);
    expect(machine.getSessionId()).toBe('ns-1');
  });

  it('keeps the transport session id when the ack carries none', () => {
    machine.begin();
    machine.handleFrame(decodeFrame('0{"sid":"s-1"}'));

    expect(machine.handleFrame(decodeFrame('40'))).toEqual({ type: 'ready', sessionId: 's-1', via: 'namespace_ack' });
  });

  it('accepts the legacy connected event in place of the ack', () => {
    machine.begin();
    machine.handleFrame(decodeFrame('0{"sid":"s-1"}'));

    const action = machine.handleFrame(decodeFrame('42["connected",{"message":"hi"}]'));

    expect(action).toEqual({ type: 'ready', sessionId: 's-1', via: 'legacy_event' });
    expect(machine.getState()).toBe('ready');
  });

  it('does not skip the open frame', () => {
    machine.begin();
    expect(machine.handleFrame(decodeFrame('40'))).toEqual({ type: 'none' });
    expect(machine.getState()).toBe('awaiting_session');
  });

  it('stays ready until reset', () => {
    machine.begin();
    machine.handleFrame(decodeFrame('0{"sid":"s-1"}'));
    machine.handleFrame(decodeFrame('40'));

    expect(machine.handleFrame(decodeFrame('0{"sid":"s-2"}'))).toEqual({ type: 'none' });
    expect(machine.handleFrame(decodeFrame('40'))).toEqual({ type: 'none' });
    expect(machine.getState()).toBe('ready');

    machine.reset();
    expect(machine.getState()).toBe('not_started');
    expect(machine.getSessionId()).toBeUndefined();
  });
});
