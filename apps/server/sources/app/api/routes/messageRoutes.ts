import { MAX_ROW_ID } from "@parley/protocol";
import { z } from "zod";
import { CachedConversationSummarySchema, CachedMessageSchema } from "@/app/cache/messageCache";
import type { ReadReceiptService } from "@/app/messages/readReceipts";
import { MAX_CONTENT_LENGTH, toCachedMessage, type MessageService } from "@/app/messages/messageService";
import { debug } from "@/utils/log";
import { type Fastify } from "../types";

const IdParam = z.coerce.number().int().positive().max(MAX_ROW_ID);

// Validation failures reach clients through the error handler with the same shape.
const BadRequest = z.object({ error: z.string(), message: z.string().optional() });

export function messageRoutes(app: Fastify, deps: { messageService: MessageService; receipts: ReadReceiptService }) {
    const { messageService, receipts } = deps;

    app.post('/v1/messages', {
        schema: {
            body: z.object({
                receiverId: z.number().int().positive().max(MAX_ROW_ID),
                content: z.string().min(1).max(MAX_CONTENT_LENGTH),
            }),
            response: {
                200: z.object({ message: CachedMessageSchema, delivery: z.enum(['live-sent', 'live-dropped', 'queued']) }),
                400: BadRequest,
                404: z.object({ error: z.literal('receiver-not-found') }),
            },
        },
    }, async (request, reply) => {
        const result = await messageService.sendMessage(request.userId, request.body.receiverId, request.body.content);
        if (!result.ok) {
            if (result.error === 'receiver-not-found') {
                return reply.code(404).send({ error: result.error });
            }
            return reply.code(400).send({ error: result.error });
        }
        debug({ module: 'messages', userId: request.userId, messageId: result.message.id, delivery: result.delivery }, 'Message submitted');
        return reply.send({ message: toCachedMessage(result.message), delivery: result.delivery });
    });

    app.get('/v1/messages/unread', {
        schema: {
            response: {
                200: z.object({ messages: z.array(CachedMessageSchema) }),
            },
        },
    }, async (request, reply) => {
        const messages = await messageService.getUnreadMessages(request.userId);
        return reply.send({ messages: messages.map(toCachedMessage) });
    });

    app.get('/v1/messages/unread/count', {
        schema: {
            response: {
                200: z.object({ count: z.number().int().min(0) }),
            },
        },
    }, async (request, reply) => {
        return reply.send({ count: await messageService.getUnreadCount(request.userId) });
    });

    app.post('/v1/messages/read-all', {
        schema: {
            response: {
                200: z.object({ updated: z.number().int().min(0) }),
            },
        },
    }, async (request, reply) => {
        return reply.send({ updated: await receipts.markAllAsRead(request.userId) });
    });

    app.get('/v1/messages/:userId', {
        schema: {
            params: z.object({ userId: IdParam }),
            querystring: z.object({
                page: z.coerce.number().int().min(1).default(1),
                pageSize: z.coerce.number().int().min(1).max(100).default(20),
            }).optional(),
            response: {
                200: z.object({ messages: z.array(CachedMessageSchema), source: z.enum(['cache', 'store']) }),
                404: z.object({ error: z.literal('user-not-found') }),
            },
        },
    }, async (request, reply) => {
        const page = request.query?.page ?? 1;
        const pageSize = request.query?.pageSize ?? 20;
        const result = await messageService.getPrivateMessages(request.userId, request.params.userId, page, pageSize);
        if (!result.ok) {
            return reply.code(404).send({ error: result.error });
        }
        return reply.send({ messages: result.messages, source: result.source });
    });

    app.post('/v1/messages/:id/read', {
        schema: {
            params: z.object({ id: IdParam }),
            response: {
                200: z.object({ changed: z.boolean() }),
                403: z.object({ error: z.literal('forbidden') }),
                404: z.object({ error: z.literal('message-not-found') }),
            },
        },
    }, async (request, reply) => {
        const result = await receipts.markAsRead(request.userId, request.params.id);
        if (!result.ok) {
            return result.error === 'forbidden'
                ? reply.code(403).send({ error: result.error })
                : reply.code(404).send({ error: result.error });
        }
        return reply.send({ changed: result.changed });
    });

    app.delete('/v1/messages/:id', {
        schema: {
            params: z.object({ id: IdParam }),
            response: {
                200: z.object({ success: z.literal(true) }),
                403: z.object({ error: z.literal('forbidden') }),
                404: z.object({ error: z.literal('message-not-found') }),
            },
        },
    }, async (request, reply) => {
        const result = await messageService.deleteMessage(request.userId, request.params.id);
        if (!result.ok) {
            return result.error === 'forbidden'
                ? reply.code(403).send({ error: result.error })
                : reply.code(404).send({ error: result.error });
        }
        return reply.send({ success: true });
    });

    app.get('/v1/conversations', {
        schema: {
            querystring: z.object({
                limit: z.coerce.number().int().min(1).max(100).optional(),
            }).optional(),
            response: {
                200: z.object({ conversations: z.array(CachedConversationSummarySchema) }),
            },
        },
    }, async (request, reply) => {
        const limit = request.query?.limit ?? 0;
        return reply.send({ conversations: await messageService.getConversationList(request.userId, limit) });
    });

    app.post('/v1/conversations/:userId/read', {
        schema: {
            params: z.object({ userId: IdParam }),
            response: {
                200: z.object({ updated: z.number().int().min(0) }),
            },
        },
    }, async (request, reply) => {
        return reply.send({ updated: await receipts.markConversationAsRead(request.userId, request.params.userId) });
    });
}
