import type { ClientRecord, ClientType } from '../src/types.js';

/** Ids shaped like uuids whose first 8 characters differ: `00000001-…`, `00000002-…`. */
export function sequentialIds(): () => string {
  let counter = 0;
  return () => {
    counter += 1;
    return `${counter.toString(16).padStart(8, '0')}-0000-4000-8000-000000000000`;
  };
}

export function makeRecord(
  id: string,
  name: string,
  type: ClientType | null,
): ClientRecord {
  return {
    id,
    name,
    type,
    deviceId: null,
    ip: '127.0.0.1',
    connectedAt: 1_700_000_000_000,
  };
}
