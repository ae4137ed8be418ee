/**
 * ConnectionDiagnostics
 * Reachability probes built on throwaway SocketClient instances.
 *
 * Each probe owns its client, timers and socket, and never touches the
 * primary connection. Failures are reported in the returned values only.
 */

import { v4 as uuidv4 } from 'uuid';
import { SocketClient } from '../client/socket-client';
import { describeTransportError, handshakeTimeoutError } from '../client/errors';
import type { SocketFactory } from '../client/transport';
import {
  mergeConfig,
  wsConfig,
  WEBSOCKET_CONSTANTS,
  type WebSocketConfig,
  type WebSocketConfigOverrides,
} from '../config/websocket-config';
import { createLogger } from '../../utils/logger';

const log = createLogger('diagnostics');

export interface DiagnosticResult {
  url: string;
  connected: boolean;
  handshakeLatencyMs: number | null;
  // A pong, or a server ping, seen after the handshake
  pongReceived: boolean;
  sessionId: string | null;
  error: string | null;
}

export interface PortOutcome {
  port: number;
  url: string;
  connected: boolean;
  latencyMs: number | null;
  error: string | null;
}

export interface MultiPortResult {
  host: string;
  winner: PortOutcome | null;
  failures: PortOutcome[];
}

export interface HttpProbeResult {
  url: string;
  reachable: boolean;
  statusCode: number | null;
  latencyMs: number | null;
  error: string | null;
}

export interface DiagnosticReport {
  serverUrl: string;
  host: string | null;
  port: number | null;
  http: HttpProbeResult | null;
  connection: DiagnosticResult | null;
  portScan: MultiPortResult | null;
  error: string | null;
}

export interface ConnectionDiagnosticsOptions {
  createSocket?: SocketFactory;
  fetch?: typeof fetch;
  config?: WebSocketConfigOverrides;
  now?: () => number;
}

interface ProbeOutcome {
  connected: boolean;
  latencyMs: number | null;
  sessionId: string | null;
  pongReceived: boolean;
  error: string | null;
}

function formatHost(host: string): string {
  return host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port > 0 && port <= 65535;
}

function describeFetchError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return `Timed out after ${Math.round(timeoutMs / 1000)}s`;
  }
  // fetch wraps socket failures as TypeError("fetch failed") with the system error as cause
  const cause = error instanceof Error && error.cause !== undefined ? error.cause : error;
  return describeTransportError(cause).message;
}

export class ConnectionDiagnostics {
  private readonly config: WebSocketConfig;
  private readonly configOverrides: WebSocketConfigOverrides;
  private readonly createSocket: SocketFactory | undefined;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;

  constructor(options: ConnectionDiagnosticsOptions = {}) {
    this.configOverrides = options.config ?? {};
    this.config = mergeConfig(wsConfig, options.config);
    this.createSocket = options.createSocket;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Open one throwaway connection, complete the handshake, and look for one pong
   */
  async testConnection(baseUrl: string, options: { timeoutMs?: number } = {}): Promise<DiagnosticResult> {
    const timeoutMs = options.timeoutMs ?? this.config.diagnostics.connectionTimeout;
    log.info('Testing connection', { url: baseUrl, timeoutMs });

    const outcome = await this.probe(baseUrl, timeoutMs, true);
    return {
      url: baseUrl,
      connected: outcome.connected,
      handshakeLatencyMs: outcome.latencyMs,
      pongReceived: outcome.pongReceived,
      sessionId: outcome.sessionId,
      error: outcome.error,
    };
  }

  /**
   * Try every port at once; the first to finish the handshake wins
   */
  async scanPorts(
    host: string,
    ports: readonly number[],
    options: { timeoutMs?: number; scheme?: 'http' | 'https' } = {}
  ): Promise<MultiPortResult> {
    const timeoutMs = options.timeoutMs ?? this.config.diagnostics.portScanTimeout;
    const scheme = options.scheme ?? 'http';
    const uniquePorts = [...new Set(ports)];
    const result: MultiPortResult = { host, winner: null, failures: [] };

    log.info('Scanning ports', { host, ports: uniquePorts, timeoutMs });

    await Promise.all(uniquePorts.map(async (port) => {
      const url = `${scheme}://${formatHost(host)}:${port}`;
      if (!isValidPort(port)) {
        result.failures.push({ port, url, connected: false, latencyMs: null, error: `Invalid port number: ${port}` });
        return;
      }

      const outcome = await this.probe(url, timeoutMs, false);
      const portOutcome: PortOutcome = {
        port,
        url,
        connected: outcome.connected,
        latencyMs: outcome.latencyMs,
        error: outcome.error,
      };

      // Outcomes land here in completion order
      if (portOutcome.connected && result.winner === null) {
        result.winner = portOutcome;
        return;
      }
      if (portOutcome.connected && result.winner !== null) {
        portOutcome.error = `Superseded by port ${result.winner.port}`;
      }
      result.failures.push(portOutcome);
    }));

    log.info('Port scan complete', { host, winner: result.winner?.port ?? null, failures: result.failures.length });
    return result;
  }

  /**
   * Plain HTTP GET reachability check
   */
  async probeHttp(url: string, options: { timeoutMs?: number } = {}): Promise<HttpProbeResult> {
    const timeoutMs = options.timeoutMs ?? this.config.diagnostics.httpTimeout;
    const startedAt = this.now();

    try {
      new URL(url);
    } catch {
      return { url, reachable: false, statusCode: null, latencyMs: null, error: `Invalid URL: ${url}` };
    }

    try {
      const response = await this.fetchFn(url, { method: 'GET', signal: AbortSignal.timeout(timeoutMs) });
      return { url, reachable: true, statusCode: response.status, latencyMs: this.now() - startedAt, error: null };
    } catch (error) {
      return {
        url,
        reachable: false,
        statusCode: null,
        latencyMs: this.now() - startedAt,
        error: describeFetchError(error, timeoutMs),
      };
    }
  }

  /**
   * HTTP probe, connection test and common-port scan for one server URL
   */
  async runFullDiagnostics(serverUrl: string): Promise<DiagnosticReport> {
    const report: DiagnosticReport = {
      serverUrl,
      host: null,
      port: null,
      http: null,
      connection: null,
      portScan: null,
      error: null,
    };

    const normalizedUrl = serverUrl.includes('://') ? serverUrl.trim() : `http://${serverUrl.trim()}`;
    let parsed: URL;
    try {
      parsed = new URL(normalizedUrl);
    } catch {
      report.error = `Invalid server URL: ${serverUrl}. Expected a form like http://192.168.1.20:5001`;
      return report;
    }

    const secure = parsed.protocol === 'https:' || parsed.protocol === 'wss:';
    const host = parsed.hostname;
    const port = parsed.port ? Number(parsed.port) : secure ? 443 : 80;
    report.host = host;
    report.port = port;

    log.info('Running full diagnostics', { url: normalizedUrl, host, port });

    report.http = await this.probeHttp(normalizedUrl);
    report.connection = await this.testConnection(normalizedUrl);
    report.portScan = await this.scanPorts(host, [port, ...WEBSOCKET_CONSTANTS.COMMON_PORTS], {
      scheme: secure ? 'https' : 'http',
    });

    return report;
  }

  private probe(baseUrl: string, timeoutMs: number, waitForPong: boolean): Promise<ProbeOutcome> {
    const client = new SocketClient({
      baseUrl,
      createSocket: this.createSocket,
      reconnect: false,
      registerDevice: false,
      now: this.now,
      label: `diagnostics:${uuidv4().slice(0, 8)}`,
      config: {
        ...this.configOverrides,
        // The probe deadline below is authoritative
        handshakeTimeout: timeoutMs * 2,
        heartbeat: { ...this.configOverrides.heartbeat, clientPingInterval: 0 },
      },
    });

    return new Promise<ProbeOutcome>((resolve) => {
      const outcome: ProbeOutcome = {
        connected: false,
        latencyMs: null,
        sessionId: null,
        pongReceived: false,
        error: null,
      };
      let settled = false;

      const finish = (error: string | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(deadline);
        outcome.error = error;
        client.destroy();
        resolve(outcome);
      };

      const deadline = setTimeout(() => {
        finish(outcome.connected ? null : handshakeTimeoutError(timeoutMs).message);
      }, timeoutMs);

      client.on('ready', (info) => {
        outcome.connected = true;
        outcome.latencyMs = info.latencyMs;
        outcome.sessionId = info.sessionId ?? null;
        if (!waitForPong) {
          finish(null);
          return;
        }
        client.ping();
      });

      client.on('frame', (frame) => {
        if (outcome.connected && (frame.type === 'pong' || frame.type === 'ping')) {
          outcome.pongReceived = true;
          finish(null);
        }
      });

      client.on('error', (error) => {
        finish(error.message);
      });

      client.connect();
    });
  }
}

/**
 * Plain-text summary of a full diagnostic run
 */
export function formatDiagnosticReport(report: DiagnosticReport): string {
  const lines: string[] = [`Network diagnostics for ${report.serverUrl}`];

  if (report.http) {
    const { http } = report;
    lines.push('', 'HTTP:');
    lines.push(http.reachable
      ? `  OK   reachable in ${http.latencyMs ?? 0}ms${http.statusCode !== null ? ` (HTTP ${http.statusCode})` : ''}`
      : `  FAIL ${http.error ?? 'unknown error'}`);
  }

  if (report.connection) {
    const { connection } = report;
    lines.push('', 'WebSocket handshake:');
    lines.push(connection.connected
      ? `  OK   handshake in ${connection.handshakeLatencyMs ?? 0}ms, pong ${connection.pongReceived ? 'received' : 'not received'}`
      : `  FAIL ${connection.error ?? 'unknown error'}`);
  }

  if (report.portScan) {
    const { portScan } = report;
    lines.push('', `Port scan on ${portScan.host}:`);
    lines.push(portScan.winner
      ? `  OK   port ${portScan.winner.port} (${portScan.winner.latencyMs ?? 0}ms)`
      : '  FAIL no port completed the handshake');
    const failures = [...portScan.failures].sort((a, b) => a.port - b.port);
    for (const failure of failures) {
      lines.push(`  --   port ${failure.port}: ${failure.error ?? 'unknown error'}`);
    }
  }

  if (report.error) {
    lines.push('', `Error: ${report.error}`);
  }

  return lines.join('\n');
}
