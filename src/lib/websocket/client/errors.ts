/**
 * Connection errors
 * Maps transport failures onto cause-specific, human-readable messages
 */

export type ConnectionErrorKind =
  | 'invalid_url'
  | 'host_unreachable'
  | 'connection_refused'
  | 'tls'
  | 'timeout'
  | 'closed'
  | 'transport';

export class ConnectionError extends Error {
  readonly kind: ConnectionErrorKind;
  readonly code: string | undefined;

  constructor(kind: ConnectionErrorKind, message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ConnectionError';
    this.kind = kind;
    this.code = options.code;
  }

  /**
   * Whether a reconnect timer can help with this failure
   */
  get retryable(): boolean {
    return this.kind !== 'invalid_url';
  }
}

const UNREACHABLE_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ENETUNREACH', 'EHOSTDOWN']);
const TLS_CODES = new Set([
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isTlsCode(code: string): boolean {
  return TLS_CODES.has(code) || code.startsWith('CERT_') || code.startsWith('ERR_TLS_') || code.startsWith('ERR_SSL_');
}

/**
 * Classify a socket-level error
 */
export function describeTransportError(error: unknown, target?: string): ConnectionError {
  if (error instanceof ConnectionError) {
    return error;
  }

  const code = errorCode(error);
  const where = target ? ` (${target})` : '';
  const detail = error instanceof Error && error.message ? error.message : String(error);

  if (code === 'ECONNREFUSED') {
    return new ConnectionError(
      'connection_refused',
      `Connection refused${where}: the server is not accepting connections on this port`,
      { code, cause: error }
    );
  }
  if (code && UNREACHABLE_CODES.has(code)) {
    return new ConnectionError('host_unreachable', `Host unreachable${where}: ${detail}`, { code, cause: error });
  }
  if (code === 'ETIMEDOUT') {
    return new ConnectionError('timeout', `Timed out reaching the server${where}`, { code, cause: error });
  }
  if (code && isTlsCode(code)) {
    return new ConnectionError('tls', `TLS handshake failed${where}: ${detail}`, { code, cause: error });
  }
  return new ConnectionError('transport', `WebSocket error${where}: ${detail || 'unknown failure'}`, {
    code,
    cause: error,
  });
}

export function invalidUrlError(baseUrl: string, detail?: string): ConnectionError {
  return new ConnectionError(
    'invalid_url',
    `Invalid server URL "${baseUrl}"${detail ? `: ${detail}` : ''}`
  );
}

export function handshakeTimeoutError(timeoutMs: number): ConnectionError {
  return new ConnectionError(
    'timeout',
    `Timed out after ${Math.round(timeoutMs / 1000)}s waiting for the server to complete the handshake`
  );
}

export function abnormalCloseError(code: number, reason: string): ConnectionError {
  const suffix = reason ? `: ${reason}` : '';
  return new ConnectionError('closed', `Connection closed unexpectedly (code ${code})${suffix}`);
}

export function closedBeforeReadyError(code: number, reason: string): ConnectionError {
  const suffix = reason ? `: ${reason}` : '';
  return new ConnectionError('closed', `Connection closed by server before the handshake completed (code ${code})${suffix}`);
}
