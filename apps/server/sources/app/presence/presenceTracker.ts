import { z } from "zod";
import type { FastStore } from "@/storage/fastStore";
import { bestEffort } from "@/utils/bestEffort";
import { log } from "@/utils/log";

const PRESENCE_KEY_PREFIX = "presence:user:";
const ONLINE_USERS_KEY = "presence:online";
const COMPONENT = "presence";

export const PresenceRecordSchema = z.object({
    user_id: z.number().int(),
    username: z.string(),
    status: z.enum(["online", "offline"]),
    last_seen: z.string(),
    connected: z.boolean(),
});

export type PresenceRecord = z.infer<typeof PresenceRecordSchema>;

export type PresenceTrackerOptions = {
    /** Lifetime of a record without refresh; twice the heartbeat interval. */
    ttlMs: number;
};

function presenceKey(userId: number): string {
    return `${PRESENCE_KEY_PREFIX}${userId}`;
}

function parseRecord(raw: string | null): PresenceRecord | null {
    if (raw === null) {
        return null;
    }
    try {
        const parsed = PresenceRecordSchema.safeParse(JSON.parse(raw));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

/**
 * Online/offline status per user. A user id sits in the online set only while its
 * record exists, has not expired and says `online`; readers prune ids that drifted.
 */
export class PresenceTracker {
    constructor(
        private readonly store: FastStore,
        private readonly options: PresenceTrackerOptions,
        private readonly now: () => Date = () => new Date(),
    ) {}

    setOnline(userId: number, username: string): Promise<boolean> {
        return bestEffort(COMPONENT, "setOnline", async () => {
            await this.store.set(presenceKey(userId), this.record(userId, username, "online"), this.options.ttlMs);
            await this.store.sadd(ONLINE_USERS_KEY, String(userId));
            return true;
        }, false);
    }

    setOffline(userId: number, username: string): Promise<boolean> {
        return bestEffort(COMPONENT, "setOffline", async () => {
            await this.store.set(presenceKey(userId), this.record(userId, username, "offline"), this.options.ttlMs);
            await this.store.srem(ONLINE_USERS_KEY, String(userId));
            return true;
        }, false);
    }

    /** Extends the record's lifetime. False when there is no record to extend. */
    refresh(userId: number): Promise<boolean> {
        return bestEffort(COMPONENT, "refresh", async () => {
            const record = parseRecord(await this.store.get(presenceKey(userId)));
            if (!record || record.status !== "online") {
                return false;
            }
            record.last_seen = this.now().toISOString();
            await this.store.set(presenceKey(userId), JSON.stringify(record), this.options.ttlMs);
            return true;
        }, false);
    }

    async isOnline(userId: number): Promise<boolean> {
        const record = await this.get(userId);
        return record?.status === "online";
    }

    get(userId: number): Promise<PresenceRecord | null> {
        return bestEffort(COMPONENT, "get", async () => parseRecord(await this.store.get(presenceKey(userId))), null);
    }

    listOnlineWithDetails(): Promise<PresenceRecord[]> {
        return bestEffort(COMPONENT, "listOnline", async () => {
            const ids = await this.store.smembers(ONLINE_USERS_KEY);
            const online: PresenceRecord[] = [];
            const stale: string[] = [];
            for (const id of ids) {
                const record = parseRecord(await this.store.get(`${PRESENCE_KEY_PREFIX}${id}`));
                if (record && record.status === "online") {
                    online.push(record);
                } else {
                    stale.push(id);
                }
            }
            if (stale.length > 0) {
                await this.store.srem(ONLINE_USERS_KEY, ...stale);
            }
            return online.sort((a, b) => a.user_id - b.user_id);
        }, []);
    }

    remove(userId: number): Promise<boolean> {
        return bestEffort(COMPONENT, "remove", async () => {
            await this.store.del(presenceKey(userId));
            await this.store.srem(ONLINE_USERS_KEY, String(userId));
            return true;
        }, false);
    }

    /** Drops ids from the online set whose record expired or was written without a TTL. */
    sweep(): Promise<number> {
        return bestEffort(COMPONENT, "sweep", async () => {
            const ids = await this.store.smembers(ONLINE_USERS_KEY);
            const stale: string[] = [];
            for (const id of ids) {
                const ttl = await this.store.pttl(`${PRESENCE_KEY_PREFIX}${id}`);
                if (ttl < 0) {
                    stale.push(id);
                }
            }
            if (stale.length > 0) {
                await this.store.srem(ONLINE_USERS_KEY, ...stale);
            }
            return stale.length;
        }, 0);
    }

    private record(userId: number, username: string, status: PresenceRecord["status"]): string {
        const record: PresenceRecord = {
            user_id: userId,
            username,
            status,
            last_seen: this.now().toISOString(),
            connected: status === "online",
        };
        return JSON.stringify(record);
    }
}

export function startPresenceSweep(tracker: PresenceTracker, intervalMs: number): { stop: () => void } | null {
    if (intervalMs <= 0) {
        return null;
    }

    let stopped = false;
    const run = async () => {
        const pruned = await tracker.sweep();
        if (pruned > 0) {
            log({ module: COMPONENT, pruned }, `Presence sweep pruned ${pruned} stale ids`);
        }
    };

    const timer = setInterval(() => {
        if (stopped) return;
        void run();
    }, intervalMs);
    timer.unref?.();

    return {
        stop: () => {
            stopped = true;
            clearInterval(timer);
        },
    };
}
