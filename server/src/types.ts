import type WebSocket from 'ws';

export const CLIENT_TYPES = [
  'controller',
  'visualiser',
  'mobile',
  'display',
  'api',
  'unknown',
] as const;

export type ClientType = (typeof CLIENT_TYPES)[number];

export function isClientType(value: unknown): value is ClientType {
  return CLIENT_TYPES.some((type) => type === value);
}

export interface ClientRecord {
  id: string;
  deviceId: string | null;
  name: string;
  /** `null` until the client sets a type; listed as `unknown`. */
  type: ClientType | null;
  ip: string;
  connectedAt: number;
}

export interface ClientConnection {
  ip: string;
}

export interface ClientInfo {
  name?: string;
  /** Validated against {@link CLIENT_TYPES} by the registry. */
  type?: string;
  deviceId?: string | null;
}

export interface ReservationResult {
  record: ClientRecord;
  nameConflict: boolean;
}

/** Field contents are checked by the resolver, which owns the error messages. */
export type TargetSpec =
  | { mode: 'all' }
  | { mode: 'type'; value?: unknown }
  | { mode: 'names'; names?: unknown }
  | { mode: 'uuids'; uuids?: unknown };

export interface BroadcastRequest {
  broadcast_type: string;
  target: TargetSpec;
  payload: Record<string, unknown>;
}

/**
 * Published to every `client_broadcast` subscriber. `target_uuids` is advisory:
 * the bus does not filter, so every subscriber sees every payload and receivers
 * are expected to drop envelopes that do not list their own id.
 */
export interface BroadcastEnvelope {
  broadcast_id: string;
  broadcast_type: string;
  sender_uuid: string;
  sender_name: string;
  sender_type: ClientType;
  target_uuids: string[];
  payload: Record<string, unknown>;
}

export interface RouteResult {
  broadcastId: string;
  targetsMatched: number;
  targetUuids: string[];
}

export interface HubEvents {
  clients_updated: Record<never, never>;
  client_connected: { client_id: string; client_ip: string };
  client_disconnected: { client_id: string; client_ip: string };
  client_broadcast: BroadcastEnvelope;
}

export type HubEventType = keyof HubEvents;

export const HUB_EVENT_TYPES = [
  'clients_updated',
  'client_connected',
  'client_disconnected',
  'client_broadcast',
] as const satisfies readonly HubEventType[];

export type HubEvent = {
  [K in HubEventType]: { event_type: K } & HubEvents[K];
}[HubEventType];

export interface SocketContext {
  clientId: string;
  ip: string;
  socket: WebSocket;
  isAlive: boolean;
  subscriptions: Map<string, () => void>;
}
