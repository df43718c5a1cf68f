import type { ClientRecord, ClientType } from '../types.js';

export interface ClientListing {
  ip: string;
  device_id: string | null;
  name: string;
  type: ClientType;
  /** Seconds since the epoch. */
  connected_at: number;
}

export function toClientListing(record: ClientRecord): ClientListing {
  return {
    ip: record.ip,
    device_id: record.deviceId,
    name: record.name,
    type: record.type ?? 'unknown',
    connected_at: record.connectedAt / 1000,
  };
}

export function listClients(records: readonly ClientRecord[]): Record<string, ClientListing> {
  return Object.fromEntries(records.map((record) => [record.id, toClientListing(record)]));
}
