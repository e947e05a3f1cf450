import { z } from 'zod';

/** Ids are `SERIAL` columns, so nothing past the int4 range can name a row. */
export const MAX_ROW_ID = 2147483647;

const UserIdSchema = z.number().int().positive();

// Clients written against loosely typed runtimes send ids as strings.
export const MessageIdSchema = z.union([
  z.number(),
  z.string().trim().regex(/^[1-9]\d*$/).transform((value) => Number(value)),
]).pipe(z.number().int().positive().max(MAX_ROW_ID));

export const HeartbeatFrameSchema = z.object({
  type: z.literal('heartbeat'),
}).passthrough();

export type HeartbeatFrame = z.infer<typeof HeartbeatFrameSchema>;

export const AckReadFrameSchema = z.object({
  type: z.literal('ack_read'),
  msg_id: MessageIdSchema,
}).passthrough();

export type AckReadFrame = z.infer<typeof AckReadFrameSchema>;

export const InboundFrameSchema = z.discriminatedUnion('type', [
  HeartbeatFrameSchema,
  AckReadFrameSchema,
]);

export type InboundFrame = z.infer<typeof InboundFrameSchema>;
export type InboundFrameType = InboundFrame['type'];

export const ChatFrameSchema = z.object({
  type: z.literal('chat'),
  from: UserIdSchema,
  to: UserIdSchema,
  content: z.string(),
  msg_id: z.number().int().positive(),
  timestamp: z.number().int().min(0),
}).strict();

export type ChatFrame = z.infer<typeof ChatFrameSchema>;

export const OfflineMessageFrameSchema = z.object({
  type: z.literal('offline_message'),
  id: z.number().int().positive(),
  sender_id: UserIdSchema,
  content: z.string(),
  created_at: z.string(),
}).strict();

export type OfflineMessageFrame = z.infer<typeof OfflineMessageFrameSchema>;

export const OutboundFrameSchema = z.discriminatedUnion('type', [
  ChatFrameSchema,
  OfflineMessageFrameSchema,
]);

export type OutboundFrame = z.infer<typeof OutboundFrameSchema>;

/**
 * Parses one inbound frame. Accepts the decoded object or its JSON text.
 * Returns null for malformed payloads and for frame types this server does not handle,
 * both of which the connection ignores.
 */
export function parseInboundFrame(payload: unknown): InboundFrame | null {
  let value: unknown = payload;
  if (typeof payload === 'string') {
    try {
      value = JSON.parse(payload);
    } catch {
      return null;
    }
  }
  const parsed = InboundFrameSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
