import { MAX_ROW_ID } from "@parley/protocol";
import { z } from "zod";
import { PresenceRecordSchema, type PresenceTracker } from "@/app/presence/presenceTracker";
import { type Fastify } from "../types";

export function presenceRoutes(app: Fastify, deps: { presence: PresenceTracker }) {
    const { presence } = deps;

    app.get('/v1/presence/online', {
        schema: {
            response: {
                200: z.object({ users: z.array(PresenceRecordSchema) }),
            },
        },
    }, async (_request, reply) => {
        return reply.send({ users: await presence.listOnlineWithDetails() });
    });

    app.get('/v1/presence/:userId', {
        schema: {
            params: z.object({ userId: z.coerce.number().int().positive().max(MAX_ROW_ID) }),
            response: {
                200: z.object({ userId: z.number(), online: z.boolean(), presence: PresenceRecordSchema.nullable() }),
            },
        },
    }, async (request, reply) => {
        const record = await presence.get(request.params.userId);
        return reply.send({
            userId: request.params.userId,
            online: record?.status === 'online',
            presence: record,
        });
    });
}
