import { isClientType, type ClientRecord, type TargetSpec } from '../types.js';
import { NoTargetsMatchedError, ValidationError } from './errors.js';

function isNonEmptyStringList(value: unknown): value is string[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((entry) => typeof entry === 'string' && entry.length > 0)
  );
}

/**
 * Computes the recipients of a broadcast from one registry snapshot.
 *
 * List entries that name no live client are dropped, but an empty result is
 * always an error: a broadcast never goes out to nobody, and a narrow target is
 * never widened.
 *
 * `all` excludes the sender. For `type`, `names` and `uuids` the sender is a
 * recipient exactly when its own type, name or id matches.
 */
export function resolveTargets(
  target: TargetSpec,
  clients: readonly ClientRecord[],
  senderId: string,
): string[] {
  let matched: string[];

  switch (target.mode) {
    case 'all':
      matched = clients.filter((client) => client.id !== senderId).map((client) => client.id);
      break;
    case 'type': {
      const { value } = target;
      if (typeof value !== 'string' || !isClientType(value)) {
        throw new ValidationError("Target mode 'type' requires a non-empty 'value' field");
      }
      // A client that never set a type has `null` and matches nothing.
      matched = clients.filter((client) => client.type === value).map((client) => client.id);
      break;
    }
    case 'names': {
      const { names } = target;
      if (!isNonEmptyStringList(names)) {
        throw new ValidationError("Target mode 'names' requires a non-empty 'names' list");
      }
      const wanted = new Set(names);
      matched = clients.filter((client) => wanted.has(client.name)).map((client) => client.id);
      break;
    }
    case 'uuids': {
      const { uuids } = target;
      if (!isNonEmptyStringList(uuids)) {
        throw new ValidationError("Target mode 'uuids' requires a non-empty 'uuids' list");
      }
      const wanted = new Set(uuids);
      matched = clients.filter((client) => wanted.has(client.id)).map((client) => client.id);
      break;
    }
    default:
      target satisfies never;
      throw new ValidationError('Invalid target mode');
  }

  if (matched.length === 0) {
    throw new NoTargetsMatchedError();
  }
  return matched;
}
