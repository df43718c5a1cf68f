import { beforeEach, describe, expect, it } from 'vitest';
import { ClientRegistry } from '../src/lib/clientRegistry.js';
import {
  ClientNotFoundError,
  InvalidClientTypeError,
  NameConflictError,
  ValidationError,
} from '../src/lib/errors.js';
import { EventBus } from '../src/lib/eventBus.js';
import type { HubEvent } from '../src/types.js';
import { sequentialIds } from './helpers.js';

const conn = { ip: '10.0.0.5' };

describe('ClientRegistry', () => {
  let bus: EventBus;
  let registry: ClientRegistry;
  let events: HubEvent[];

  beforeEach(() => {
    bus = new EventBus();
    registry = new ClientRegistry(bus, sequentialIds());
    events = [];
    bus.subscribe('clients_updated', (event) => events.push(event));
    bus.subscribe('client_connected', (event) => events.push(event));
    bus.subscribe('client_disconnected', (event) => events.push(event));
  });

  // ==========================================================================
  // register
  // ==========================================================================

  describe('register', () => {
    it('creates a record with a generated name and no type', () => {
      const { record, nameConflict } = registry.register(conn);

      expect(nameConflict).toBe(false);
      expect(record).toEqual({
        id: '00000001-0000-4000-8000-000000000000',
        deviceId: null,
        name: 'Client-00000001',
        type: null,
        ip: '10.0.0.5',
        connectedAt: expect.any(Number),
      });
    });

    it('accepts a requested name, type and device id', () => {
      const { record } = registry.register(conn, {
        name: 'Living Room',
        type: 'visualiser',
        deviceId: 'tablet-1',
      });

      expect(record.name).toBe('Living Room');
      expect(record.type).toBe('visualiser');
      expect(record.deviceId).toBe('tablet-1');
    });

    it('suffixes colliding names with an increasing counter', () => {
      const first = registry.register(conn, { name: 'Panel' });
      const second = registry.register(conn, { name: 'Panel' });
      const third = registry.register(conn, { name: 'Panel' });

      expect([first.record.name, second.record.name, third.record.name]).toEqual([
        'Panel',
        'Panel (2)',
        'Panel (3)',
      ]);
      expect([first.nameConflict, second.nameConflict, third.nameConflict]).toEqual([
        false,
        true,
        true,
      ]);
    });

    it('rejects an empty name and an unknown type', () => {
      expect(() => registry.register(conn, { name: '' })).toThrow(ValidationError);
      expect(() => registry.register(conn, { type: 'projector' })).toThrow(
        InvalidClientTypeError,
      );
      expect(registry.size).toBe(0);
    });

    it('regenerates an id that a live client already holds', () => {
      const ids = ['dup-id', 'dup-id', 'fresh-id'];
      const reg = new ClientRegistry(bus, () => ids.shift() ?? 'exhausted');

      const first = reg.register(conn).record;
      const second = reg.register(conn).record;

      expect(first.id).toBe('dup-id');
      expect(second.id).toBe('fresh-id');
      expect(reg.size).toBe(2);
    });

    it('publishes only after the record can be read back', () => {
      const seen: Array<string | undefined> = [];
      bus.subscribe('client_connected', (event) => {
        if (event.event_type === 'client_connected') {
          seen.push(registry.get(event.client_id)?.name);
        }
      });

      registry.register(conn, { name: 'Desk' });

      expect(seen).toEqual(['Desk']);
      expect(events.map((event) => event.event_type)).toEqual([
        'client_connected',
        'clients_updated',
      ]);
    });

    it('gives concurrent callers asking for the same name distinct names', async () => {
      const results = await Promise.all(
        Array.from({ length: 20 }, () =>
          Promise.resolve().then(() => registry.register(conn, { name: 'Stage' })),
        ),
      );

      const names = results.map((result) => result.record.name);
      expect(new Set(names).size).toBe(20);
      expect(names).toContain('Stage');
      expect(names).toContain('Stage (20)');
      expect(results.filter((result) => !result.nameConflict)).toHaveLength(1);
    });
  });

  // ==========================================================================
  // setInfo
  // ==========================================================================

  describe('setInfo', () => {
    it('resolves a taken name with a suffix and reports the conflict', () => {
      registry.register(conn, { name: 'Desk' });
      const { record } = registry.register(conn);

      const result = registry.setInfo(record.id, { name: 'Desk', type: 'mobile' });

      expect(result.record.name).toBe('Desk (2)');
      expect(result.record.type).toBe('mobile');
      expect(result.nameConflict).toBe(true);
    });

    it('lets a client keep its own name without a conflict', () => {
      const { record } = registry.register(conn, { name: 'Desk' });

      const result = registry.setInfo(record.id, { name: 'Desk' });

      expect(result).toEqual({ record: expect.objectContaining({ name: 'Desk' }), nameConflict: false });
    });

    it('falls back to the generated name and keeps an unset type', () => {
      const { record } = registry.register(conn, { name: 'Temporary' });

      const result = registry.setInfo(record.id, { deviceId: 'phone-7' });

      expect(result.record.name).toBe('Client-00000001');
      expect(result.record.type).toBeNull();
      expect(result.record.deviceId).toBe('phone-7');
    });

    it('frees the previous name', () => {
      const { record } = registry.register(conn, { name: 'Old' });
      registry.setInfo(record.id, { name: 'New' });

      const other = registry.register(conn, { name: 'Old' });

      expect(other.nameConflict).toBe(false);
      expect(other.record.name).toBe('Old');
    });

    it('fails for a client that is not connected', () => {
      expect(() => registry.setInfo('missing', { name: 'X' })).toThrow(ClientNotFoundError);
    });
  });

  // ==========================================================================
  // update
  // ==========================================================================

  describe('update', () => {
    it('renames and retypes a client', () => {
      const { record } = registry.register(conn);
      events.length = 0;

      const updated = registry.update(record.id, { name: 'Kitchen', type: 'display' });

      expect(updated.name).toBe('Kitchen');
      expect(updated.type).toBe('display');
      expect(registry.get(record.id)).toEqual(updated);
      expect(events.map((event) => event.event_type)).toEqual(['clients_updated']);
    });

    it("refuses another client's name and leaves every record unchanged", () => {
      registry.register(conn, { name: 'Desk' });
      const { record } = registry.register(conn, { name: 'Sofa', type: 'mobile' });
      const before = registry.list();
      events.length = 0;

      expect(() => registry.update(record.id, { name: 'Desk', type: 'display' })).toThrow(
        new NameConflictError('Desk'),
      );

      expect(registry.list()).toEqual(before);
      expect(events).toEqual([]);
    });

    it('reports the conflict message', () => {
      registry.register(conn, { name: 'Desk' });
      const { record } = registry.register(conn);

      expect(() => registry.update(record.id, { name: 'Desk' })).toThrow(
        "Name 'Desk' is already taken by another client",
      );
    });

    it('rejects an invalid type without touching the name', () => {
      const { record } = registry.register(conn, { name: 'Desk' });

      expect(() => registry.update(record.id, { name: 'Bench', type: 'toaster' })).toThrow(
        "Invalid client type 'toaster'",
      );
      expect(registry.get(record.id)?.name).toBe('Desk');
    });

    it('rejects an empty update', () => {
      const { record } = registry.register(conn);

      expect(() => registry.update(record.id, {})).toThrow('No valid updates provided');
    });
  });

  // ==========================================================================
  // unregister / reads
  // ==========================================================================

  describe('unregister', () => {
    it('frees the name for the next registration', () => {
      const { record } = registry.register(conn, { name: 'Desk' });
      registry.unregister(record.id);

      const next = registry.register(conn, { name: 'Desk' });

      expect(next.nameConflict).toBe(false);
      expect(next.record.name).toBe('Desk');
    });

    it('is idempotent', () => {
      const { record } = registry.register(conn);
      events.length = 0;

      expect(registry.unregister(record.id)).toBe(true);
      expect(registry.unregister(record.id)).toBe(false);
      expect(events).toEqual([
        { event_type: 'client_disconnected', client_id: record.id, client_ip: '10.0.0.5' },
        { event_type: 'clients_updated' },
      ]);
    });
  });

  describe('reads', () => {
    it('hands out copies', () => {
      const { record } = registry.register(conn, { name: 'Desk' });

      const copy = registry.get(record.id);
      if (!copy) throw new Error('record missing');
      copy.name = 'Hacked';
      registry.list()[0].name = 'Also hacked';

      expect(registry.get(record.id)?.name).toBe('Desk');
    });

    it('lists records in connection order', () => {
      registry.register(conn, { name: 'A' });
      registry.register(conn, { name: 'B' });

      expect(registry.list().map((record) => record.name)).toEqual(['A', 'B']);
    });
  });
});
