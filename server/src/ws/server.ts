import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer } from 'ws';
import type WebSocket from 'ws';
import type { z } from 'zod';
import { config } from '../config.js';
import type { BroadcastRouter } from '../lib/broadcastRouter.js';
import { listClients } from '../lib/clientListing.js';
import type { ClientRegistry } from '../lib/clientRegistry.js';
import { ClientError, ValidationError } from '../lib/errors.js';
import type { EventBus } from '../lib/eventBus.js';
import { logger } from '../lib/logger.js';
import { isClientType, type SocketContext } from '../types.js';
import {
  describeIssues,
  envelopeSchema,
  setClientInfoSchema,
  subscribeEventSchema,
  unsubscribeEventSchema,
  updateClientInfoSchema,
  type MessageRef,
} from './schemas.js';
import { reply, send, sendError } from './utils.js';

export interface Hub {
  registry: ClientRegistry;
  bus: EventBus;
  router: BroadcastRouter;
}

export interface GatewayOptions {
  path?: string;
  token?: string;
  heartbeatMs?: number;
}

type Envelope = z.infer<typeof envelopeSchema>;

function rejectUpgrade(socket: Duplex, status: string): void {
  socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

export function registerWebSocketServer(
  httpServer: Server,
  hub: Hub,
  options: GatewayOptions = {},
): WebSocketServer {
  const path = options.path ?? config.wsPath;
  const token = options.token ?? config.wsToken;
  const heartbeatMs = options.heartbeatMs ?? config.heartbeatMs;

  const wss = new WebSocketServer({ noServer: true });
  const contexts = new Map<WebSocket, SocketContext>();

  httpServer.on('upgrade', (request, socket, head) => {
    const url = new URL(request.url ?? '/', 'http://localhost');
    if (url.pathname !== path) {
      socket.destroy();
      return;
    }
    if (token && url.searchParams.get('token') !== token) {
      logger.warn({ ip: request.socket.remoteAddress }, 'ws_unauthorized');
      rejectUpgrade(socket, '401 Unauthorized');
      return;
    }
    wss.handleUpgrade(request, socket, head, (client) => {
      wss.emit('connection', client, request);
    });
  });

  wss.on('connection', (socket: WebSocket, request: IncomingMessage) => {
    const ip = request.socket.remoteAddress ?? 'unknown';
    const { record } = hub.registry.register({ ip });
    const ctx: SocketContext = {
      clientId: record.id,
      ip,
      socket,
      isAlive: true,
      subscriptions: new Map(),
    };
    contexts.set(socket, ctx);

    logger.info({ clientId: ctx.clientId, ip }, 'ws_connected');
    send(socket, { type: 'client_id', payload: { client_id: ctx.clientId } });

    socket.on('pong', () => {
      ctx.isAlive = true;
    });

    socket.on('message', (raw) => {
      handleMessage(raw.toString(), ctx, hub);
    });

    socket.on('close', () => {
      contexts.delete(socket);
      cleanupClient(ctx, hub);
    });

    socket.on('error', (err) => {
      logger.error({ err, clientId: ctx.clientId }, 'ws_error');
      socket.close();
    });
  });

  const heartbeatInterval = setInterval(() => {
    for (const ctx of contexts.values()) {
      if (!ctx.isAlive) {
        logger.info({ clientId: ctx.clientId }, 'ws_heartbeat_timeout');
        ctx.socket.terminate();
        continue;
      }
      ctx.isAlive = false;
      ctx.socket.ping();
    }
  }, heartbeatMs);

  wss.on('close', () => clearInterval(heartbeatInterval));

  return wss;
}

function cleanupClient(ctx: SocketContext, hub: Hub): void {
  for (const unsubscribe of ctx.subscriptions.values()) {
    unsubscribe();
  }
  ctx.subscriptions.clear();
  hub.registry.unregister(ctx.clientId);
  logger.info({ clientId: ctx.clientId, ip: ctx.ip }, 'ws_disconnected');
}

function handleMessage(raw: string, ctx: SocketContext, hub: Hub): void {
  let envelope: Envelope;
  try {
    envelope = envelopeSchema.parse(JSON.parse(raw));
  } catch (error) {
    logger.warn({ error, clientId: ctx.clientId }, 'ws_invalid_message');
    sendError(ctx.socket, undefined, 'Invalid message format');
    return;
  }

  const { ref } = envelope;
  try {
    switch (envelope.type) {
      case 'set_client_info':
        handleSetClientInfo(envelope.payload, ref, ctx, hub);
        break;
      case 'update_client_info':
        handleUpdateClientInfo(envelope.payload, ref, ctx, hub);
        break;
      case 'broadcast':
        handleBroadcast(envelope.payload, ref, ctx, hub);
        break;
      case 'subscribe_event':
        handleSubscribe(envelope.payload, ref, ctx, hub);
        break;
      case 'unsubscribe_event':
        handleUnsubscribe(envelope.payload, ref, ctx);
        break;
      case 'list_clients':
        reply(ctx.socket, 'clients', ref, { clients: listClients(hub.registry.list()) });
        break;
      default:
        logger.debug({ type: envelope.type }, 'ws_unhandled_type');
        sendError(ctx.socket, ref, 'Unknown command type');
    }
  } catch (error) {
    if (error instanceof ClientError) {
      sendError(ctx.socket, ref, error.message);
      return;
    }
    logger.error({ err: error, clientId: ctx.clientId, type: envelope.type }, 'ws_handler_failed');
    sendError(ctx.socket, ref, 'Internal server error');
  }
}

function handleSetClientInfo(
  payload: unknown,
  ref: MessageRef | undefined,
  ctx: SocketContext,
  hub: Hub,
): void {
  const data = setClientInfoSchema.safeParse(payload);
  if (!data.success) {
    throw new ValidationError(`Invalid client info: ${describeIssues(data.error)}`);
  }

  let type = data.data.type;
  if (type !== undefined && !isClientType(type)) {
    logger.warn({ clientId: ctx.clientId, type }, 'client_type_invalid_defaulted');
    type = 'unknown';
  }

  const { record, nameConflict } = hub.registry.setInfo(ctx.clientId, {
    name: data.data.name || undefined,
    type,
    deviceId: data.data.device_id,
  });

  reply(ctx.socket, 'client_info_updated', ref, {
    client_id: record.id,
    name: record.name,
    type: record.type ?? 'unknown',
    name_conflict: nameConflict,
  });
  logger.info(
    { clientId: record.id, name: record.name, type: record.type, nameConflict },
    'client_info_set',
  );
}

function handleUpdateClientInfo(
  payload: unknown,
  ref: MessageRef | undefined,
  ctx: SocketContext,
  hub: Hub,
): void {
  const data = updateClientInfoSchema.safeParse(payload);
  if (!data.success) {
    throw new ValidationError(`Invalid client info: ${describeIssues(data.error)}`);
  }

  const record = hub.registry.update(ctx.clientId, data.data);
  reply(ctx.socket, 'client_info_updated', ref, {
    client_id: record.id,
    name: record.name,
    type: record.type ?? 'unknown',
  });
  logger.info({ clientId: record.id, ...data.data }, 'client_info_updated');
}

function handleBroadcast(
  payload: unknown,
  ref: MessageRef | undefined,
  ctx: SocketContext,
  hub: Hub,
): void {
  const result = hub.router.route(ctx.clientId, payload);
  reply(ctx.socket, 'broadcast_sent', ref, {
    broadcast_id: result.broadcastId,
    targets_matched: result.targetsMatched,
    target_uuids: result.targetUuids,
  });
}

function handleSubscribe(
  payload: unknown,
  ref: MessageRef | undefined,
  ctx: SocketContext,
  hub: Hub,
): void {
  if (ref === undefined) {
    throw new ValidationError('subscribe_event requires a ref');
  }
  const data = subscribeEventSchema.safeParse(payload);
  if (!data.success) {
    throw new ValidationError(`Invalid subscription: ${describeIssues(data.error)}`);
  }

  const key = String(ref);
  ctx.subscriptions.get(key)?.();
  const unsubscribe = hub.bus.subscribe(
    data.data.event_type,
    (event) => send(ctx.socket, { type: 'event', ref, payload: event }),
    data.data.event_filter,
  );
  ctx.subscriptions.set(key, unsubscribe);

  logger.debug({ clientId: ctx.clientId, eventType: data.data.event_type, ref }, 'ws_subscribed');
  reply(ctx.socket, 'subscribed', ref, { event_type: data.data.event_type });
}

function handleUnsubscribe(
  payload: unknown,
  ref: MessageRef | undefined,
  ctx: SocketContext,
): void {
  const data = unsubscribeEventSchema.safeParse(payload);
  if (!data.success) {
    throw new ValidationError(`Invalid unsubscribe request: ${describeIssues(data.error)}`);
  }

  const key = String(data.data.ref);
  const unsubscribe = ctx.subscriptions.get(key);
  if (!unsubscribe) {
    logger.warn({ clientId: ctx.clientId, ref: data.data.ref }, 'ws_unknown_subscription');
    throw new ValidationError(`Unknown subscription '${key}'`);
  }
  unsubscribe();
  ctx.subscriptions.delete(key);
  reply(ctx.socket, 'unsubscribed', ref, { ref: data.data.ref });
}
