import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HealthPoller, createHttpHealthCheck, type HealthPollerTarget } from './health-poller';
import type { ConnectionState } from './types';

function createTarget(initial: ConnectionState = { status: 'disconnected' }) {
  let state = initial;
  const target = {
    getState: () => state,
    connect: vi.fn(() => {
      state = { status: 'connecting' };
    }),
    forceDisconnected: vi.fn(() => {
      state = { status: 'disconnected' };
    }),
  } satisfies HealthPollerTarget;
  return {
    target,
    setState: (next: ConnectionState) => {
      state = next;
    },
  };
}

describe('HealthPoller', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('connects when the server is healthy and the client is disconnected', async () => {
    const { target } = createTarget();
    const poller = new HealthPoller(target, async () => true);

    expect(await poller.pollNow()).toBe(true);
    expect(target.connect).toHaveBeenCalledTimes(1);
    expect(target.forceDisconnected).not.toHaveBeenCalled();
  });

  it('leaves a connecting or connected client alone while healthy', async () => {
    const { target, setState } = createTarget({ status: 'connected' });
    const poller = new HealthPoller(target, async () => true);

    await poller.pollNow();
    setState({ status: 'connecting' });
    await poller.pollNow();

    expect(target.connect).not.toHaveBeenCalled();
    expect(target.forceDisconnected).not.toHaveBeenCalled();
  });

  it('forces the client to disconnected when the check fails', async () => {
    const { target } = createTarget({ status: 'connected' });
    const poller = new HealthPoller(target, async () => false);

    expect(await poller.pollNow()).toBe(false);
    expect(target.forceDisconnected).toHaveBeenCalledWith('Health check failed');
  });

  it('treats a rejected check as unhealthy', async () => {
    const { target } = createTarget({ status: 'connected' });
    const poller = new HealthPoller(target, async () => {
      throw new Error('ECONNREFUSED');
    });

    expect(await poller.pollNow()).toBe(false);
    expect(target.forceDisconnected).toHaveBeenCalledTimes(1);
  });

  it('skips a poll while the previous check is still running', async () => {
    const { target } = createTarget({ status: 'connected' });
    let resolveCheck: (healthy: boolean) => void = () => undefined;
    const check = vi.fn(
      () =>
        new Promise<boolean>((resolve) => {
          resolveCheck = resolve;
        })
    );
    const poller = new HealthPoller(target, check);

    const first = poller.pollNow();
    expect(await poller.pollNow()).toBeNull();

    resolveCheck(true);
    expect(await first).toBe(true);
    expect(check).toHaveBeenCalledTimes(1);
  });

  it('emits change only when the result flips', async () => {
    const { target } = createTarget({ status: 'connected' });
    const results = [true, true, false, false, true];
    const poller = new HealthPoller(target, async () => results.shift() ?? false);
    const changes: boolean[] = [];
    poller.on('change', ({ healthy }) => changes.push(healthy));

    for (let i = 0; i < 5; i += 1) {
      await poller.pollNow();
    }

    expect(changes).toEqual([true, false, true]);
    expect(poller.getLastResult()).toBe(true);
  });

  it('polls on its interval until stopped', async () => {
    vi.useFakeTimers();
    const { target } = createTarget({ status: 'connected' });
    const check = vi.fn(async () => true);
    const poller = new HealthPoller(target, check, { interval: 10_000 });

    poller.start();
    poller.start();
    await vi.advanceTimersByTimeAsync(30_000);
    expect(check).toHaveBeenCalledTimes(3);

    poller.stop();
    await vi.advanceTimersByTimeAsync(30_000);
    expect(check).toHaveBeenCalledTimes(3);
    expect(poller.isRunning).toBe(false);
  });
});

describe('createHttpHealthCheck', () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requests the health endpoint beside the base URL', async () => {
    fetchMock.mockResolvedValue(new Response('ok', { status: 200 }));

    const check = createHttpHealthCheck('http://game.test:5000/', 1_000);

    expect(await check()).toBe(true);
    expect(fetchMock).toHaveBeenCalledWith('http://game.test:5000/health', expect.objectContaining({ method: 'GET' }));
  });

  it('reports a non-2xx answer as unhealthy', async () => {
    fetchMock.mockResolvedValue(new Response('down', { status: 503 }));

    expect(await createHttpHealthCheck('http://game.test:5000', 1_000)()).toBe(false);
  });
});
