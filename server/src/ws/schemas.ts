import { z } from 'zod';
import { HUB_EVENT_TYPES } from '../types.js';

export const messageRefSchema = z.union([z.string().min(1), z.number().int()]);

export type MessageRef = z.infer<typeof messageRefSchema>;

export const envelopeSchema = z.object({
  type: z.string(),
  payload: z.unknown(),
  ref: messageRefSchema.optional(),
});

export const setClientInfoSchema = z
  .object({
    device_id: z.string().nullable().optional(),
    name: z.string().optional(),
    type: z.string().optional(),
  })
  .default({});

export const updateClientInfoSchema = z
  .object({
    name: z.string().optional(),
    type: z.string().optional(),
  })
  .default({});

export const targetSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('all') }).strict(),
  z.object({ mode: z.literal('type'), value: z.unknown().optional() }).strict(),
  z.object({ mode: z.literal('names'), names: z.unknown().optional() }).strict(),
  z.object({ mode: z.literal('uuids'), uuids: z.unknown().optional() }).strict(),
]);

// broadcast_type is an open tag: any non-empty string is accepted.
export const broadcastSchema = z
  .object({
    broadcast_type: z.string().min(1, 'broadcast_type must be a non-empty string'),
    target: targetSchema,
    payload: z.record(z.unknown()),
  })
  .strict();

export const subscribeEventSchema = z.object({
  event_type: z.enum(HUB_EVENT_TYPES),
  event_filter: z.record(z.unknown()).optional(),
});

export const unsubscribeEventSchema = z.object({
  ref: messageRefSchema,
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
