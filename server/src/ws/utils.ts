import type WebSocket from 'ws';
import { config } from '../config.js';
import { logger } from '../lib/logger.js';
import type { MessageRef } from './schemas.js';

export type OutboundSocket = Pick<WebSocket, 'readyState' | 'OPEN' | 'bufferedAmount' | 'send'>;

/**
 * Sends one JSON frame. Frames to a closed socket, or to one whose unsent
 * backlog is already over `maxBufferedBytes`, are dropped; returns whether the
 * frame was queued.
 */
export function send(
  socket: OutboundSocket,
  message: Record<string, unknown>,
  maxBufferedBytes: number = config.maxBufferedBytes,
): boolean {
  if (socket.readyState !== socket.OPEN) return false;
  if (socket.bufferedAmount > maxBufferedBytes) {
    logger.warn(
      { bufferedAmount: socket.bufferedAmount, maxBufferedBytes, type: message.type },
      'ws_send_dropped',
    );
    return false;
  }
  socket.send(JSON.stringify(message));
  return true;
}

export function reply(
  socket: OutboundSocket,
  type: string,
  ref: MessageRef | undefined,
  payload: Record<string, unknown>,
): void {
  send(socket, ref === undefined ? { type, payload } : { type, ref, payload });
}

export function sendError(socket: OutboundSocket, ref: MessageRef | undefined, message: string): void {
  reply(socket, 'error', ref, { message });
}
