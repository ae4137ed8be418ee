import { describe, it, expect } from 'vitest';
import { isInboundEventName, validateInboundPayload } from './game-events';
import { describeConnectionState } from '../client/types';

describe('isInboundEventName', () => {
  it('recognizes catalogued events only', () => {
    expect(isInboundEventName('object_collected')).toBe(true);
    expect(isInboundEventName('admin_diagnostic_ping')).toBe(true);
    expect(isInboundEventName('toString')).toBe(false);
    expect(isInboundEventName('custom')).toBe(false);
  });
});

describe('validateInboundPayload', () => {
  it('accepts a complete payload and keeps extra fields', () => {
    const result = validateInboundPayload('location_update_interval_changed', { interval_seconds: 30, source: 'admin' });

    expect(result).toEqual({ success: true, data: { interval_seconds: 30, source: 'admin' } });
  });

  it('lists every missing or mistyped field', () => {
    const result = validateInboundPayload('object_collected', { object_id: '', found_at: 5 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues).toEqual([
        'object_id: String must contain at least 1 character(s)',
        'found_by: Required',
        'found_at: Expected string, received number',
      ]);
    }
  });

  it('rejects a non-positive interval', () => {
    expect(validateInboundPayload('location_update_interval_changed', { interval_seconds: 0 }).success).toBe(false);
  });
});

describe('describeConnectionState', () => {
  it('renders each state as a short label', () => {
    expect(describeConnectionState({ status: 'disconnected' })).toBe('Disconnected');
    expect(describeConnectionState({ status: 'connecting' })).toBe('Connecting...');
    expect(describeConnectionState({ status: 'connected' })).toBe('Connected');
    expect(describeConnectionState({ status: 'error', message: 'Host unreachable: x' })).toBe('Error: Host unreachable: x');
  });
});
