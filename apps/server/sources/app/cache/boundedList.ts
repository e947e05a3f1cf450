import { z } from "zod";
import type { FastStore } from "@/storage/fastStore";

export type BoundedListOptions<T> = {
    schema: z.ZodType<T>;
    capacity: number;
    ttlMs: number;
};

/**
 * An ordered sequence of at most `capacity` items stored as one JSON value.
 * Every write truncates and refreshes the TTL. A payload that fails validation reads as absent.
 * Read-modify-write is not atomic; concurrent writers may lose an update within the TTL.
 */
export class BoundedList<T> {
    private readonly listSchema: z.ZodType<T[]>;

    constructor(
        private readonly store: FastStore,
        private readonly options: BoundedListOptions<T>,
    ) {
        this.listSchema = z.array(options.schema);
    }

    get capacity(): number {
        return this.options.capacity;
    }

    async read(key: string): Promise<T[] | null> {
        const raw = await this.store.get(key);
        if (raw === null) {
            return null;
        }
        let decoded: unknown;
        try {
            decoded = JSON.parse(raw);
        } catch {
            return null;
        }
        const parsed = this.listSchema.safeParse(decoded);
        return parsed.success ? parsed.data : null;
    }

    async write(key: string, items: T[]): Promise<T[]> {
        const kept = items.slice(0, this.options.capacity);
        await this.store.set(key, JSON.stringify(kept), this.options.ttlMs);
        return kept;
    }

    async update(key: string, change: (items: T[]) => T[]): Promise<T[]> {
        const current = (await this.read(key)) ?? [];
        return await this.write(key, change(current));
    }

    async pushFront(key: string, item: T): Promise<T[]> {
        return await this.update(key, (items) => [item, ...items]);
    }

    async clear(key: string): Promise<void> {
        await this.store.del(key);
    }
}
