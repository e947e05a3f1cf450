import { z } from "zod";

const emptyToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());
const positiveInt = (fallback: number) => z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));
const flag = (fallback: boolean) =>
    z.preprocess(emptyToUndefined, z.enum(["1", "0", "true", "false"]).optional())
        .transform((value) => (value === undefined ? fallback : value === "1" || value === "true"));

const EnvSchema = z.object({
    PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(65535).default(3005)),
    REDIS_URL: optionalString,
    PARLEY_DB_DIR: optionalString,
    PARLEY_HEARTBEAT_INTERVAL_MS: positiveInt(30_000),
    PARLEY_READ_TIMEOUT_MS: positiveInt(90_000),
    PARLEY_OUTBOUND_QUEUE_SIZE: positiveInt(256),
    PARLEY_INBOUND_QUEUE_SIZE: positiveInt(64),
    PARLEY_OFFLINE_DRAIN_LIMIT: positiveInt(50),
    PARLEY_OFFLINE_CAPACITY: positiveInt(100),
    PARLEY_OFFLINE_TTL_MS: positiveInt(7 * 24 * 60 * 60 * 1000),
    PARLEY_MESSAGE_CACHE_SIZE: positiveInt(30),
    PARLEY_CONVERSATION_CACHE_SIZE: positiveInt(10),
    PARLEY_CACHE_TTL_MS: positiveInt(60 * 60 * 1000),
    PARLEY_UNREAD_TTL_MS: positiveInt(24 * 60 * 60 * 1000),
    PARLEY_PUSH_UNREAD_ON_CONNECT: flag(false),
    PARLEY_PRESENCE_SWEEP_INTERVAL_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).default(60_000)),
    PARLEY_JOB_CONCURRENCY: positiveInt(8),
    PARLEY_JOB_MAX_PENDING: positiveInt(10_000),
});

export type ParleyConfig = {
    port: number;
    redisUrl: string | null;
    dbDir: string | null;
    connection: {
        heartbeatIntervalMs: number;
        readTimeoutMs: number;
        outboundQueueSize: number;
        inboundQueueSize: number;
        offlineDrainLimit: number;
        pushUnreadOnConnect: boolean;
    };
    presence: {
        ttlMs: number;
        /** 0 disables the sweep. */
        sweepIntervalMs: number;
    };
    offline: {
        capacity: number;
        ttlMs: number;
    };
    cache: {
        messageCapacity: number;
        conversationCapacity: number;
        ttlMs: number;
    };
    unread: {
        ttlMs: number;
    };
    jobs: {
        concurrency: number;
        maxPending: number;
    };
};

export function loadConfig(env: NodeJS.ProcessEnv): ParleyConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new Error(`Invalid configuration: ${details}`);
    }
    const e = parsed.data;
    return {
        port: e.PORT,
        redisUrl: e.REDIS_URL ?? null,
        dbDir: e.PARLEY_DB_DIR ?? null,
        connection: {
            heartbeatIntervalMs: e.PARLEY_HEARTBEAT_INTERVAL_MS,
            readTimeoutMs: e.PARLEY_READ_TIMEOUT_MS,
            outboundQueueSize: e.PARLEY_OUTBOUND_QUEUE_SIZE,
            inboundQueueSize: e.PARLEY_INBOUND_QUEUE_SIZE,
            offlineDrainLimit: e.PARLEY_OFFLINE_DRAIN_LIMIT,
            pushUnreadOnConnect: e.PARLEY_PUSH_UNREAD_ON_CONNECT,
        },
        presence: {
            ttlMs: e.PARLEY_HEARTBEAT_INTERVAL_MS * 2,
            sweepIntervalMs: e.PARLEY_PRESENCE_SWEEP_INTERVAL_MS,
        },
        offline: {
            capacity: e.PARLEY_OFFLINE_CAPACITY,
            ttlMs: e.PARLEY_OFFLINE_TTL_MS,
        },
        cache: {
            messageCapacity: e.PARLEY_MESSAGE_CACHE_SIZE,
            conversationCapacity: e.PARLEY_CONVERSATION_CACHE_SIZE,
            ttlMs: e.PARLEY_CACHE_TTL_MS,
        },
        unread: {
            ttlMs: e.PARLEY_UNREAD_TTL_MS,
        },
        jobs: {
            concurrency: e.PARLEY_JOB_CONCURRENCY,
            maxPending: e.PARLEY_JOB_MAX_PENDING,
        },
    };
}
