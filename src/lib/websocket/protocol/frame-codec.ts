/**
 * Frame Codec
 * Classifies raw Engine.IO / Socket.IO text frames and builds outbound ones
 */

import { WEBSOCKET_CONSTANTS } from '../constants';

const { FRAME_PREFIX } = WEBSOCKET_CONSTANTS;

export type JsonObject = Record<string, unknown>;

export type Frame =
  | { readonly type: 'open'; readonly session: JsonObject }
  | { readonly type: 'ping' }
  | { readonly type: 'pong' }
  | { readonly type: 'namespace_ack'; readonly sessionId?: string }
  | { readonly type: 'event'; readonly name: string; readonly payload: JsonObject }
  | { readonly type: 'unknown'; readonly raw: string };

export type FrameType = Frame['type'];

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function unknownFrame(raw: string): Frame {
  return Object.freeze({ type: 'unknown', raw });
}

function decodeNamespaceAck(raw: string): Frame {
  const body = raw.slice(FRAME_PREFIX.NAMESPACE.length);
  const parsed = body ? parseJson(body) : undefined;
  // The sid is informational; an unreadable body still acknowledges the join
  const sid = isJsonObject(parsed) && typeof parsed.sid === 'string' ? parsed.sid : undefined;
  return Object.freeze(sid === undefined ? { type: 'namespace_ack' } : { type: 'namespace_ack', sessionId: sid });
}

function decodeEvent(raw: string): Frame {
  const parsed = parseJson(raw.slice(FRAME_PREFIX.EVENT.length));
  if (!Array.isArray(parsed) || parsed.length < 2) {
    return unknownFrame(raw);
  }
  const [name, payload] = parsed;
  if (typeof name !== 'string' || !isJsonObject(payload)) {
    return unknownFrame(raw);
  }
  return Object.freeze({ type: 'event', name, payload });
}

/**
 * Decode a raw text frame. Never throws: anything unrecognized is an `unknown` frame.
 */
export function decodeFrame(raw: string): Frame {
  if (raw === FRAME_PREFIX.PING) {
    return Object.freeze({ type: 'ping' });
  }
  if (raw === FRAME_PREFIX.PONG) {
    return Object.freeze({ type: 'pong' });
  }
  if (raw.startsWith(`${FRAME_PREFIX.OPEN}{`)) {
    const session = parseJson(raw.slice(FRAME_PREFIX.OPEN.length));
    return isJsonObject(session) ? Object.freeze({ type: 'open', session }) : unknownFrame(raw);
  }
  if (raw === FRAME_PREFIX.NAMESPACE || raw.startsWith(`${FRAME_PREFIX.NAMESPACE}{`)) {
    return decodeNamespaceAck(raw);
  }
  if (raw.startsWith(`${FRAME_PREFIX.EVENT}[`)) {
    return decodeEvent(raw);
  }
  return unknownFrame(raw);
}

export function encodePing(): string {
  return FRAME_PREFIX.PING;
}

export function encodePong(): string {
  return FRAME_PREFIX.PONG;
}

export function encodeNamespaceJoin(): string {
  return FRAME_PREFIX.NAMESPACE;
}

export function encodeEvent(name: string, payload: JsonObject): string {
  return `${FRAME_PREFIX.EVENT}${JSON.stringify([name, payload])}`;
}

/**
 * Session id from an open frame's metadata, when the server sent one
 */
export function getOpenSessionId(frame: Frame): string | undefined {
  if (frame.type !== 'open') {
    return undefined;
  }
  return typeof frame.session.sid === 'string' ? frame.session.sid : undefined;
}

/**
 * Shortened frame text for log lines
 */
export function previewFrame(raw: string, maxLength = 120): string {
  return raw.length > maxLength ? `${raw.slice(0, maxLength)}…` : raw;
}
