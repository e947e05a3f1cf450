import { z } from "zod";
import type { FastStore, FastStoreCommand } from "@/storage/fastStore";
import { bestEffort } from "@/utils/bestEffort";

const OFFLINE_KEY_PREFIX = "offline:";
const COMPONENT = "offline-queue";

export const OfflineMessageEntrySchema = z.object({
    id: z.number().int().positive(),
    sender_id: z.number().int().positive(),
    receiver_id: z.number().int().positive(),
    content: z.string(),
    type: z.string(),
    created_at: z.string(),
});

export type OfflineMessageEntry = z.infer<typeof OfflineMessageEntrySchema>;

export type OfflineQueueOptions = {
    capacity: number;
    ttlMs: number;
};

function offlineKey(recipientId: number): string {
    return `${OFFLINE_KEY_PREFIX}${recipientId}`;
}

function parseEntry(raw: string): OfflineMessageEntry | null {
    try {
        const parsed = OfflineMessageEntrySchema.safeParse(JSON.parse(raw));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

/**
 * Per-recipient buffer of messages that arrived while the recipient had no live connection.
 * Newest first, capped at `capacity` (the oldest entries fall off), expires `ttlMs` after the last push.
 */
export class OfflineMessageQueue {
    constructor(
        private readonly store: FastStore,
        private readonly options: OfflineQueueOptions,
    ) {}

    enqueue(recipientId: number, entry: OfflineMessageEntry): Promise<boolean> {
        return this.enqueueMany(recipientId, [entry]);
    }

    /** Entries are given oldest first; the last one ends up at the head. */
    enqueueMany(recipientId: number, entries: OfflineMessageEntry[]): Promise<boolean> {
        if (entries.length === 0) {
            return Promise.resolve(true);
        }
        const key = offlineKey(recipientId);
        return bestEffort(COMPONENT, "enqueue", async () => {
            await this.store.batch(this.pushCommands(key, entries));
            return true;
        }, false);
    }

    /** Up to `limit` entries, newest first. Entries stay queued until `clear`. */
    drain(recipientId: number, limit: number): Promise<OfflineMessageEntry[]> {
        if (limit <= 0) {
            return Promise.resolve([]);
        }
        return bestEffort(COMPONENT, "drain", async () => {
            const raw = await this.store.lrange(offlineKey(recipientId), 0, limit - 1);
            const entries: OfflineMessageEntry[] = [];
            for (const item of raw) {
                const entry = parseEntry(item);
                if (entry) {
                    entries.push(entry);
                }
            }
            return entries;
        }, []);
    }

    clear(recipientId: number): Promise<boolean> {
        return bestEffort(COMPONENT, "clear", async () => {
            await this.store.del(offlineKey(recipientId));
            return true;
        }, false);
    }

    /** Drops the `count` newest entries, the ones a drain just handed out. */
    discard(recipientId: number, count: number): Promise<boolean> {
        if (count <= 0) {
            return Promise.resolve(true);
        }
        return bestEffort(COMPONENT, "discard", async () => {
            await this.store.ltrim(offlineKey(recipientId), count, -1);
            return true;
        }, false);
    }

    count(recipientId: number): Promise<number> {
        return bestEffort(COMPONENT, "count", () => this.store.llen(offlineKey(recipientId)), 0);
    }

    /** Removes one message by id, keeping the order of the rest. */
    remove(recipientId: number, messageId: number): Promise<boolean> {
        const key = offlineKey(recipientId);
        return bestEffort(COMPONENT, "remove", async () => {
            const raw = await this.store.lrange(key, 0, -1);
            const kept = raw.filter((item) => parseEntry(item)?.id !== messageId);
            if (kept.length === raw.length) {
                return false;
            }
            const commands: FastStoreCommand[] = [{ op: "del", keys: [key] }];
            if (kept.length > 0) {
                // lpush reverses its arguments, so push oldest first to keep newest at the head.
                commands.push(
                    { op: "lpush", key, values: [...kept].reverse() },
                    { op: "pexpire", key, ttlMs: this.options.ttlMs },
                );
            }
            await this.store.batch(commands);
            return true;
        }, false);
    }

    private pushCommands(key: string, entries: OfflineMessageEntry[]): FastStoreCommand[] {
        return [
            { op: "lpush", key, values: entries.map((entry) => JSON.stringify(entry)) },
            { op: "pexpire", key, ttlMs: this.options.ttlMs },
            { op: "ltrim", key, start: 0, stop: this.options.capacity - 1 },
        ];
    }
}
