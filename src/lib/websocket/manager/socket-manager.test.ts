import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SocketManager } from './socket-manager';
import { createFakeSocketFactory, flushFrames, type FakeSocketFactory } from '../client/test-utils';

describe('SocketManager', () => {
  let sockets: FakeSocketFactory;
  let healthy: boolean;
  let manager: SocketManager;

  beforeEach(() => {
    sockets = createFakeSocketFactory();
    healthy = true;
    manager = new SocketManager({
      baseUrl: 'http://game.test:5000',
      deviceUuid: 'device-1',
      createSocket: sockets.factory,
      config: { heartbeat: { clientPingInterval: 0 } },
      healthCheck: async () => healthy,
      now: () => Date.parse('2024-01-01T00:00:05.000Z'),
    });
  });

  afterEach(() => {
    manager.destroy();
  });

  async function connect(): Promise<void> {
    manager.connect();
    sockets.latest().completeHandshake();
    await flushFrames();
  }

  it('hands object_collected fields to the handler in order', async () => {
    const handler = vi.fn();
    manager.onObjectCollected(handler);
    await connect();

    sockets
      .latest()
      .serverSend('42["object_collected",{"object_id":"abc","found_by":"user123","found_at":"2024-01-01T00:00:00Z"}]');
    await flushFrames();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith('abc', 'user123', '2024-01-01T00:00:00Z');
  });

  it('does not call the object_collected handler when a field is missing', async () => {
    const handler = vi.fn();
    manager.onObjectCollected(handler);
    await connect();

    sockets.latest().serverSend('42["object_collected",{"object_id":"abc","found_by":"user123"}]');
    await flushFrames();

    expect(handler).not.toHaveBeenCalled();
    expect(manager.getState()).toEqual({ status: 'connected' });
  });

  it('answers an admin diagnostic ping with a pong', async () => {
    await connect();
    const socket = sockets.latest();

    socket.serverSend('42["admin_diagnostic_ping",{"ping_id":"p-1","admin_session_id":"admin-9"}]');
    await flushFrames();

    expect(socket.sent.at(-1)).toBe(
      '42["client_diagnostic_pong",{"ping_id":"p-1","client_timestamp":"2024-01-01T00:00:05.000Z","admin_session_id":"admin-9"}]'
    );
  });

  it('sends catalogued outbound events', async () => {
    await connect();

    expect(manager.emit('register_device', { device_uuid: 'device-2' })).toBe(true);
    expect(sockets.latest().sent.at(-1)).toBe('42["register_device",{"device_uuid":"device-2"}]');
  });

  it('reports state and handshake changes to subscribers', async () => {
    const states: string[] = [];
    const handshakes: string[] = [];
    manager.onStateChange((state) => states.push(state.status));
    manager.onHandshakeChange((state) => handshakes.push(state));

    await connect();
    manager.disconnect();

    expect(states).toEqual(['connecting', 'connected', 'disconnected']);
    expect(handshakes).toEqual(['awaiting_session', 'awaiting_namespace_ack', 'ready', 'not_started']);
    expect(manager.isConnected()).toBe(false);
  });

  it('lists the built-in and registered handlers', () => {
    const off = manager.onEvent('custom', () => undefined);

    expect(manager.getRegisteredEventTypes()).toEqual(['admin_diagnostic_ping', 'custom']);
    off();
    expect(manager.getRegisteredEventTypes()).toEqual(['admin_diagnostic_ping']);
  });

  it('connects from a health check while disconnected', async () => {
    expect(await manager.checkHealth()).toBe(true);
    expect(sockets.sockets).toHaveLength(1);
    expect(manager.getState()).toEqual({ status: 'connecting' });
  });

  it('drops the connection when the health check fails', async () => {
    const changes: boolean[] = [];
    manager.onHealthChange(({ healthy: value }) => changes.push(value));
    await connect();

    healthy = false;
    expect(await manager.checkHealth()).toBe(false);

    expect(manager.getState()).toEqual({ status: 'disconnected' });
    expect(sockets.latest().closedWith).toEqual({ code: 1000, reason: 'Client disconnect' });
    expect(changes).toEqual([false]);
  });
});
