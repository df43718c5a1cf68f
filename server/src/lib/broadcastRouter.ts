import { v4 as uuid } from 'uuid';
import { config } from '../config.js';
import type { BroadcastEnvelope, BroadcastRequest, RouteResult } from '../types.js';
import { broadcastSchema, describeIssues } from '../ws/schemas.js';
import type { ClientRegistry } from './clientRegistry.js';
import {
  ClientError,
  ClientNotFoundError,
  SecurityViolationError,
  ValidationError,
} from './errors.js';
import type { EventBus } from './eventBus.js';
import { logger } from './logger.js';
import { resolveTargets } from './targetResolver.js';

export const SENDER_FIELDS = [
  'sender',
  'sender_id',
  'sender_uuid',
  'sender_name',
  'sender_type',
] as const;

function findSenderField(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  return SENDER_FIELDS.find((field) => Object.hasOwn(value, field));
}

// Spaced separators (`", "` and `": "`), the layout the LedFx API measures.
function serializeSpaced(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(serializeSpaced).join(', ')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const members = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .map(([key, member]) => `${JSON.stringify(key)}: ${serializeSpaced(member)}`);
    return `{${members.join(', ')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function payloadSize(payload: Record<string, unknown>): number {
  return Buffer.byteLength(serializeSpaced(payload), 'utf8');
}

export interface BroadcastRouterOptions {
  maxPayloadBytes?: number;
  generateId?: () => string;
}

export class BroadcastRouter {
  private readonly maxPayloadBytes: number;
  private readonly generateId: () => string;

  constructor(
    private readonly registry: ClientRegistry,
    private readonly bus: EventBus,
    options: BroadcastRouterOptions = {},
  ) {
    this.maxPayloadBytes = options.maxPayloadBytes ?? config.maxPayloadBytes;
    this.generateId = options.generateId ?? (() => `b-${uuid()}`);
  }

  /**
   * Validates a broadcast from `senderId`, stamps the sender's identity from the
   * registry and publishes it as `client_broadcast`. Nothing is published when
   * any step fails.
   */
  route(senderId: string, data: unknown): RouteResult {
    try {
      return this.dispatch(senderId, data);
    } catch (error) {
      if (error instanceof SecurityViolationError) {
        logger.warn({ clientId: senderId, err: error }, 'broadcast_sender_spoofed');
      } else if (error instanceof ClientError) {
        logger.info({ clientId: senderId, reason: error.message }, 'broadcast_rejected');
      }
      throw error;
    }
  }

  private dispatch(senderId: string, data: unknown): RouteResult {
    const spoofed =
      findSenderField(data) ??
      (typeof data === 'object' && data !== null && 'payload' in data
        ? findSenderField(data.payload)
        : undefined);
    if (spoofed) {
      throw new SecurityViolationError(
        `Sender identity fields are assigned by the server ('${spoofed}' is not allowed)`,
      );
    }

    const parsed = broadcastSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError(`Invalid broadcast data: ${describeIssues(parsed.error)}`);
    }
    const request: BroadcastRequest = parsed.data;

    const size = payloadSize(request.payload);
    if (size > this.maxPayloadBytes) {
      throw new ValidationError(
        `Payload size (${size} bytes) exceeds maximum (${this.maxPayloadBytes} bytes)`,
      );
    }

    // One snapshot serves both the sender lookup and target resolution.
    const snapshot = this.registry.list();
    const sender = snapshot.find((client) => client.id === senderId);
    if (!sender) {
      throw new ClientNotFoundError(senderId);
    }
    const targetUuids = resolveTargets(request.target, snapshot, senderId);

    const envelope: BroadcastEnvelope = {
      broadcast_id: this.generateId(),
      broadcast_type: request.broadcast_type,
      sender_uuid: sender.id,
      sender_name: sender.name,
      sender_type: sender.type ?? 'unknown',
      target_uuids: targetUuids,
      payload: request.payload,
    };
    this.bus.publish({ event_type: 'client_broadcast', ...envelope });

    logger.info(
      {
        broadcastId: envelope.broadcast_id,
        broadcastType: envelope.broadcast_type,
        sender: sender.id.slice(0, 8),
        senderName: sender.name,
        targets: targetUuids.length,
      },
      'broadcast_sent',
    );

    return {
      broadcastId: envelope.broadcast_id,
      targetsMatched: targetUuids.length,
      targetUuids,
    };
  }
}
