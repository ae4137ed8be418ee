import { describe, it, expect } from 'vitest';
import {
  ConnectionError,
  abnormalCloseError,
  closedBeforeReadyError,
  describeTransportError,
  handshakeTimeoutError,
  invalidUrlError,
} from './errors';

function systemError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('describeTransportError', () => {
  it('distinguishes a refused connection', () => {
    const error = describeTransportError(systemError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:5000'), 'ws://127.0.0.1:5000');

    expect(error.kind).toBe('connection_refused');
    expect(error.code).toBe('ECONNREFUSED');
    expect(error.message).toBe(
      'Connection refused (ws://127.0.0.1:5000): the server is not accepting connections on this port'
    );
  });

  it('reports DNS and routing failures as host unreachable', () => {
    expect(describeTransportError(systemError('ENOTFOUND', 'getaddrinfo ENOTFOUND game.local')).message).toBe(
      'Host unreachable: getaddrinfo ENOTFOUND game.local'
    );
    expect(describeTransportError(systemError('EHOSTUNREACH', 'no route')).kind).toBe('host_unreachable');
  });

  it('reports ETIMEDOUT as a timeout', () => {
    const error = describeTransportError(systemError('ETIMEDOUT', 'connect ETIMEDOUT'));
    expect(error.kind).toBe('timeout');
    expect(error.message).toBe('Timed out reaching the server');
  });

  it('recognizes certificate failures', () => {
    expect(describeTransportError(systemError('DEPTH_ZERO_SELF_SIGNED_CERT', 'self-signed certificate')).kind).toBe('tls');
    expect(describeTransportError(systemError('CERT_HAS_EXPIRED', 'certificate has expired')).kind).toBe('tls');
    expect(describeTransportError(systemError('ERR_TLS_CERT_ALTNAME_INVALID', 'altname')).kind).toBe('tls');
  });

  it('falls back to a generic transport error', () => {
    const error = describeTransportError(new Error('Unexpected server response: 404'));
    expect(error.kind).toBe('transport');
    expect(error.message).toBe('WebSocket error: Unexpected server response: 404');
  });

  it('passes ConnectionErrors through unchanged', () => {
    const original = new ConnectionError('closed', 'gone');
    expect(describeTransportError(original)).toBe(original);
  });
});

describe('error factories', () => {
  it('builds non-retryable invalid URL errors', () => {
    const error = invalidUrlError('::bad', 'unsupported scheme "ftp"');
    expect(error.message).toBe('Invalid server URL "::bad": unsupported scheme "ftp"');
    expect(error.retryable).toBe(false);
  });

  it('builds a handshake timeout message in seconds', () => {
    const error = handshakeTimeoutError(30_000);
    expect(error.kind).toBe('timeout');
    expect(error.message).toBe('Timed out after 30s waiting for the server to complete the handshake');
    expect(error.retryable).toBe(true);
  });

  it('describes abnormal closes with their code', () => {
    expect(abnormalCloseError(1006, '').message).toBe('Connection closed unexpectedly (code 1006)');
    expect(abnormalCloseError(1011, 'server error').message).toBe('Connection closed unexpectedly (code 1011): server error');
  });

  it('describes a close before the handshake completed', () => {
    const error = closedBeforeReadyError(1000, '');
    expect(error.kind).toBe('closed');
    expect(error.message).toBe('Connection closed by server before the handshake completed (code 1000)');
    expect(error.retryable).toBe(true);
  });
});
