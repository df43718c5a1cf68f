import { v4 as uuid } from 'uuid';
import {
  isClientType,
  type ClientConnection,
  type ClientInfo,
  type ClientRecord,
  type ClientType,
  type ReservationResult,
} from '../types.js';
import {
  ClientNotFoundError,
  InvalidClientTypeError,
  NameConflictError,
  ValidationError,
} from './errors.js';
import type { EventBus } from './eventBus.js';

export function defaultClientName(id: string): string {
  return `Client-${id.slice(0, 8)}`;
}

function copyRecord(record: ClientRecord): ClientRecord {
  return { ...record };
}

function assertName(name: string): void {
  if (name.length === 0) {
    throw new ValidationError('Client name must be a non-empty string');
  }
}

function assertType(type: string): ClientType {
  if (!isClientType(type)) {
    throw new InvalidClientTypeError(type);
  }
  return type;
}

/**
 * Owns every connected client's metadata. Each public method runs to completion
 * without yielding to the event loop, so a name check and its reservation can
 * never interleave with another mutation.
 */
export class ClientRegistry {
  private clients = new Map<string, ClientRecord>();
  private nameIndex = new Map<string, string>();

  constructor(
    private readonly bus: EventBus,
    private readonly generateId: () => string = () => uuid(),
  ) {}

  register(connection: ClientConnection, info: ClientInfo = {}): ReservationResult {
    if (info.name !== undefined) assertName(info.name);
    const type = info.type === undefined ? null : assertType(info.type);

    // Uniqueness across the process lifetime rests on uuid v4.
    let id = this.generateId();
    while (this.clients.has(id)) {
      id = this.generateId();
    }

    const { name, nameConflict } = this.reserveName(info.name ?? defaultClientName(id), id);
    const record: ClientRecord = {
      id,
      deviceId: info.deviceId ?? null,
      name,
      type,
      ip: connection.ip,
      connectedAt: Date.now(),
    };
    this.commit(record, null);

    this.bus.publish({ event_type: 'client_connected', client_id: id, client_ip: record.ip });
    this.bus.publish({ event_type: 'clients_updated' });
    return { record: copyRecord(record), nameConflict };
  }

  /**
   * Initialises a client's metadata. A requested name that is already held by
   * another client is suffixed with ` (2)`, ` (3)`, … until it is free.
   */
  setInfo(id: string, info: ClientInfo): ReservationResult {
    const current = this.require(id);
    if (info.name !== undefined) assertName(info.name);
    const type = info.type === undefined ? current.type : assertType(info.type);

    const { name, nameConflict } = this.reserveName(info.name ?? defaultClientName(id), id);
    const next: ClientRecord = {
      ...current,
      name,
      type,
      deviceId: info.deviceId === undefined ? current.deviceId : info.deviceId,
    };
    this.commit(next, current);

    this.bus.publish({ event_type: 'clients_updated' });
    return { record: copyRecord(next), nameConflict };
  }

  /** Explicit rename and/or retype. Never auto-suffixes; a taken name is an error. */
  update(id: string, changes: Pick<ClientInfo, 'name' | 'type'>): ClientRecord {
    const current = this.require(id);
    if (changes.name === undefined && changes.type === undefined) {
      throw new ValidationError('No valid updates provided');
    }
    if (changes.name !== undefined) assertName(changes.name);
    const type = changes.type === undefined ? current.type : assertType(changes.type);

    const name = changes.name ?? current.name;
    if (this.isNameTaken(name, id)) {
      throw new NameConflictError(name);
    }

    const next: ClientRecord = { ...current, name, type };
    this.commit(next, current);

    this.bus.publish({ event_type: 'clients_updated' });
    return copyRecord(next);
  }

  unregister(id: string): boolean {
    const record = this.clients.get(id);
    if (!record) {
      return false;
    }
    this.clients.delete(id);
    if (this.nameIndex.get(record.name) === id) {
      this.nameIndex.delete(record.name);
    }

    this.bus.publish({ event_type: 'client_disconnected', client_id: id, client_ip: record.ip });
    this.bus.publish({ event_type: 'clients_updated' });
    return true;
  }

  get(id: string): ClientRecord | undefined {
    const record = this.clients.get(id);
    return record ? copyRecord(record) : undefined;
  }

  list(): ClientRecord[] {
    return Array.from(this.clients.values(), copyRecord);
  }

  get size(): number {
    return this.clients.size;
  }

  private require(id: string): ClientRecord {
    const record = this.clients.get(id);
    if (!record) {
      throw new ClientNotFoundError(id);
    }
    return record;
  }

  private isNameTaken(name: string, ownerId: string): boolean {
    const holder = this.nameIndex.get(name);
    return holder !== undefined && holder !== ownerId;
  }

  private reserveName(desired: string, ownerId: string): { name: string; nameConflict: boolean } {
    let name = desired;
    let counter = 1;
    while (this.isNameTaken(name, ownerId)) {
      counter += 1;
      name = `${desired} (${counter})`;
    }
    return { name, nameConflict: counter > 1 };
  }

  // Records are replaced, never edited in place.
  private commit(next: ClientRecord, previous: ClientRecord | null): void {
    if (previous && this.nameIndex.get(previous.name) === previous.id) {
      this.nameIndex.delete(previous.name);
    }
    this.nameIndex.set(next.name, next.id);
    this.clients.set(next.id, next);
  }
}
