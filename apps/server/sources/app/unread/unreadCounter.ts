import type { FastStore, FastStoreCommand } from "@/storage/fastStore";
import { bestEffort } from "@/utils/bestEffort";

const UNREAD_KEY_PREFIX = "unread:";
const COMPONENT = "unread-counter";

function unreadKey(userId: number): string {
    return `${UNREAD_KEY_PREFIX}${userId}`;
}

/**
 * Fast mirror of each user's unread total. A missing record means "unknown":
 * callers recompute from the durable store and `set` the result.
 */
export class UnreadCounter {
    constructor(
        private readonly store: FastStore,
        private readonly options: { ttlMs: number },
    ) {}

    /** New value, or null when the store could not be updated. */
    increment(userId: number): Promise<number | null> {
        const key = unreadKey(userId);
        return bestEffort(COMPONENT, "increment", async () => {
            const [value] = await this.store.batch([
                { op: "incrBy", key, delta: 1 },
                { op: "pexpire", key, ttlMs: this.options.ttlMs },
            ]);
            return value;
        }, null);
    }

    /** A record that reaches zero or below is deleted. */
    decrement(userId: number): Promise<number | null> {
        const key = unreadKey(userId);
        return bestEffort(COMPONENT, "decrement", async () => {
            const value = await this.store.incrBy(key, -1);
            if (value <= 0) {
                await this.store.del(key);
                return 0;
            }
            return value;
        }, null);
    }

    get(userId: number): Promise<number | null> {
        return bestEffort(COMPONENT, "get", async () => {
            const raw = await this.store.get(unreadKey(userId));
            if (raw === null) {
                return null;
            }
            const value = Number(raw);
            return Number.isSafeInteger(value) && value >= 0 ? value : null;
        }, null);
    }

    set(userId: number, count: number): Promise<boolean> {
        return bestEffort(COMPONENT, "set", async () => {
            await this.store.set(unreadKey(userId), String(Math.max(0, Math.floor(count))), this.options.ttlMs);
            return true;
        }, false);
    }

    reset(userId: number): Promise<boolean> {
        return bestEffort(COMPONENT, "reset", async () => {
            await this.store.del(unreadKey(userId));
            return true;
        }, false);
    }

    batchIncrement(userIds: number[], delta: number): Promise<boolean> {
        return this.applyBatch("batchIncrement", userIds, delta, true);
    }

    batchDecrement(userIds: number[], delta: number): Promise<boolean> {
        return this.applyBatch("batchDecrement", userIds, -delta, false);
    }

    private applyBatch(operation: string, userIds: number[], delta: number, refreshTtl: boolean): Promise<boolean> {
        if (userIds.length === 0) {
            return Promise.resolve(true);
        }
        return bestEffort(COMPONENT, operation, async () => {
            const commands: FastStoreCommand[] = [];
            for (const userId of userIds) {
                commands.push({ op: "incrBy", key: unreadKey(userId), delta });
                if (refreshTtl) {
                    commands.push({ op: "pexpire", key: unreadKey(userId), ttlMs: this.options.ttlMs });
                }
            }
            const replies = await this.store.batch(commands);
            const step = refreshTtl ? 2 : 1;
            const exhausted = userIds
                .filter((_, index) => {
                    const value = replies[index * step];
                    return value !== null && value <= 0;
                })
                .map(unreadKey);
            if (exhausted.length > 0) {
                await this.store.del(...exhausted);
            }
            return true;
        }, false);
    }
}
