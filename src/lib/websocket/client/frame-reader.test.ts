import { describe, it, expect, vi } from 'vitest';
import { FrameReader } from './frame-reader';
import { Logger, LogLevel } from '../../utils/logger';

describe('FrameReader', () => {
  it('returns buffered frames in arrival order', async () => {
    const reader = new FrameReader();
    reader.push('a');
    reader.push('b');

    expect(await reader.read()).toBe('a');
    expect(await reader.read()).toBe('b');
  });

  it('resolves a pending read with the next pushed frame', async () => {
    const reader = new FrameReader();
    const pending = reader.read();

    reader.push('later');

    expect(await pending).toBe('later');
    expect(reader.pending).toBe(0);
  });

  it('rejects a second concurrent read', async () => {
    const reader = new FrameReader();
    const first = reader.read();

    await expect(reader.read()).rejects.toThrow('FrameReader already has a pending read');

    reader.close();
    expect(await first).toBeNull();
  });

  it('drops buffered frames and ignores pushes once closed', async () => {
    const reader = new FrameReader();
    reader.push('a');
    reader.close();
    reader.push('b');

    expect(reader.isClosed).toBe(true);
    expect(await reader.read()).toBeNull();
  });

  it('warns once when the backlog passes the high-water mark and rearms after draining', async () => {
    const log = new Logger({ level: LogLevel.DEBUG, enabled: true });
    const warn = vi.spyOn(log, 'warn');
    const reader = new FrameReader({ highWaterMark: 3, log });

    reader.push('a');
    reader.push('b');
    expect(warn).not.toHaveBeenCalled();

    reader.push('c');
    reader.push('d');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Inbound frame backlog passed high-water mark; a handler may be stalled', {
      pending: 3,
      highWaterMark: 3,
    });

    await reader.read();
    await reader.read();
    await reader.read();
    reader.push('e');
    reader.push('f');

    expect(reader.pending).toBe(3);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});
