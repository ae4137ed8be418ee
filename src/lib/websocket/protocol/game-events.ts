/**
 * Game Event Catalog
 * Payload schemas for the application events carried in `42[...]` frames.
 * Required fields are enforced here once per frame; unknown fields pass through.
 */

import { z } from 'zod';

export const GAME_EVENTS = {
  OBJECT_COLLECTED: 'object_collected',
  OBJECT_UNCOLLECTED: 'object_uncollected',
  ALL_FINDS_RESET: 'all_finds_reset',
  OBJECT_CREATED: 'object_created',
  OBJECT_DELETED: 'object_deleted',
  NPC_CREATED: 'npc_created',
  NPC_UPDATED: 'npc_updated',
  NPC_DELETED: 'npc_deleted',
  LOCATION_UPDATE_INTERVAL_CHANGED: 'location_update_interval_changed',
  GAME_MODE_CHANGED: 'game_mode_changed',
  ADMIN_DIAGNOSTIC_PING: 'admin_diagnostic_ping',
} as const;

export const OUTBOUND_EVENTS = {
  REGISTER_DEVICE: 'register_device',
  CLIENT_DIAGNOSTIC_PONG: 'client_diagnostic_pong',
} as const;

const entityId = z.string().min(1);

export const inboundEventSchemas = {
  object_collected: z.object({
    object_id: entityId,
    found_by: z.string(),
    found_at: z.string(),
  }).passthrough(),
  object_uncollected: z.object({ object_id: entityId }).passthrough(),
  all_finds_reset: z.object({}).passthrough(),
  object_created: z.object({ id: entityId }).passthrough(),
  object_deleted: z.object({ object_id: entityId }).passthrough(),
  npc_created: z.object({ id: entityId }).passthrough(),
  npc_updated: z.object({ id: entityId }).passthrough(),
  npc_deleted: z.object({ npc_id: entityId }).passthrough(),
  location_update_interval_changed: z.object({
    interval_seconds: z.number().positive(),
    interval_ms: z.number().positive().optional(),
  }).passthrough(),
  game_mode_changed: z.object({ game_mode: z.string().min(1) }).passthrough(),
  admin_diagnostic_ping: z.object({
    ping_id: z.string().min(1),
    admin_session_id: z.string().min(1),
  }).passthrough(),
} satisfies Record<InboundEventName, z.ZodTypeAny>;

export const outboundEventSchemas = {
  register_device: z.object({ device_uuid: z.string().min(1) }),
  client_diagnostic_pong: z.object({
    ping_id: z.string().min(1),
    client_timestamp: z.string(),
    admin_session_id: z.string().min(1),
  }),
} satisfies Record<OutboundEventName, z.ZodTypeAny>;

export type InboundEventName = typeof GAME_EVENTS[keyof typeof GAME_EVENTS];
export type OutboundEventName = typeof OUTBOUND_EVENTS[keyof typeof OUTBOUND_EVENTS];

export type InboundEventPayloads = {
  [K in InboundEventName]: z.infer<typeof inboundEventSchemas[K]>;
};

export type OutboundEventPayloads = {
  [K in OutboundEventName]: z.infer<typeof outboundEventSchemas[K]>;
};

export type ObjectCollectedPayload = InboundEventPayloads['object_collected'];
export type AdminDiagnosticPingPayload = InboundEventPayloads['admin_diagnostic_ping'];
export type ClientDiagnosticPongPayload = OutboundEventPayloads['client_diagnostic_pong'];

type InboundSchemaTable = {
  [K in InboundEventName]: z.ZodType<InboundEventPayloads[K], z.ZodTypeDef, unknown>;
};

const schemaTable: InboundSchemaTable = inboundEventSchemas;

export function isInboundEventName(name: string): name is InboundEventName {
  return Object.prototype.hasOwnProperty.call(inboundEventSchemas, name);
}

export type PayloadValidation<T> =
  | { success: true; data: T }
  | { success: false; issues: string[] };

/**
 * Validate an inbound payload against the catalog schema for its event
 */
export function validateInboundPayload<K extends InboundEventName>(
  name: K,
  payload: Record<string, unknown>
): PayloadValidation<InboundEventPayloads[K]> {
  const result = schemaTable[name].safeParse(payload);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
  };
}
