import type { FastStore, FastStoreCommand, FastStoreReply } from "./fastStore";

type Value =
    | { kind: "string"; value: string }
    | { kind: "list"; items: string[] }
    | { kind: "set"; members: Set<string> };

type Entry = {
    value: Value;
    expiresAt: number | null;
};

const WRONG_TYPE = "WRONGTYPE Operation against a key holding the wrong kind of value";

// Redis range semantics: negative indexes count from the end, stop is inclusive.
function normalizeRange(length: number, start: number, stop: number): [number, number] {
    const from = Math.max(start < 0 ? length + start : start, 0);
    const to = Math.min(stop < 0 ? length + stop : stop, length - 1);
    return [from, to];
}

/**
 * In-process fast store with the Redis semantics the server relies on.
 * Used by the light flavor and by tests. Expiry is checked lazily on access.
 */
export class MemoryFastStore implements FastStore {
    private readonly entries = new Map<string, Entry>();

    constructor(private readonly now: () => number = Date.now) {}

    private read(key: string): Entry | null {
        const entry = this.entries.get(key);
        if (!entry) {
            return null;
        }
        if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return null;
        }
        return entry;
    }

    private readList(key: string): string[] | null {
        const entry = this.read(key);
        if (!entry) {
            return null;
        }
        if (entry.value.kind !== "list") {
            throw new Error(WRONG_TYPE);
        }
        return entry.value.items;
    }

    private readSet(key: string): Set<string> | null {
        const entry = this.read(key);
        if (!entry) {
            return null;
        }
        if (entry.value.kind !== "set") {
            throw new Error(WRONG_TYPE);
        }
        return entry.value.members;
    }

    async get(key: string): Promise<string | null> {
        return this.getSync(key);
    }

    private getSync(key: string): string | null {
        const entry = this.read(key);
        if (!entry) {
            return null;
        }
        if (entry.value.kind !== "string") {
            throw new Error(WRONG_TYPE);
        }
        return entry.value.value;
    }

    async set(key: string, value: string, ttlMs?: number): Promise<void> {
        this.setSync(key, value, ttlMs);
    }

    private setSync(key: string, value: string, ttlMs?: number): void {
        this.entries.set(key, {
            value: { kind: "string", value },
            expiresAt: ttlMs !== undefined ? this.now() + ttlMs : null,
        });
    }

    async del(...keys: string[]): Promise<number> {
        return this.delSync(keys);
    }

    private delSync(keys: string[]): number {
        let removed = 0;
        for (const key of keys) {
            if (this.read(key)) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    async exists(key: string): Promise<boolean> {
        return this.read(key) !== null;
    }

    async pexpire(key: string, ttlMs: number): Promise<boolean> {
        return this.pexpireSync(key, ttlMs);
    }

    private pexpireSync(key: string, ttlMs: number): boolean {
        const entry = this.read(key);
        if (!entry) {
            return false;
        }
        if (ttlMs <= 0) {
            this.entries.delete(key);
            return true;
        }
        entry.expiresAt = this.now() + ttlMs;
        return true;
    }

    async pttl(key: string): Promise<number> {
        const entry = this.read(key);
        if (!entry) {
            return -2;
        }
        if (entry.expiresAt === null) {
            return -1;
        }
        return entry.expiresAt - this.now();
    }

    async incrBy(key: string, delta: number): Promise<number> {
        return this.incrBySync(key, delta);
    }

    private incrBySync(key: string, delta: number): number {
        const entry = this.read(key);
        if (!entry) {
            this.entries.set(key, { value: { kind: "string", value: String(delta) }, expiresAt: null });
            return delta;
        }
        if (entry.value.kind !== "string") {
            throw new Error(WRONG_TYPE);
        }
        const current = Number(entry.value.value);
        if (!/^-?\d+$/.test(entry.value.value) || !Number.isSafeInteger(current)) {
            throw new Error("ERR value is not an integer or out of range");
        }
        const next = current + delta;
        // INCR keeps the existing TTL
        entry.value = { kind: "string", value: String(next) };
        return next;
    }

    async lpush(key: string, ...values: string[]): Promise<number> {
        return this.lpushSync(key, values);
    }

    private lpushSync(key: string, values: string[]): number {
        let items = this.readList(key);
        if (!items) {
            if (values.length === 0) {
                return 0;
            }
            items = [];
            this.entries.set(key, { value: { kind: "list", items }, expiresAt: null });
        }
        for (const value of values) {
            items.unshift(value);
        }
        return items.length;
    }

    async ltrim(key: string, start: number, stop: number): Promise<void> {
        this.ltrimSync(key, start, stop);
    }

    private ltrimSync(key: string, start: number, stop: number): void {
        const items = this.readList(key);
        if (!items) {
            return;
        }
        const [from, to] = normalizeRange(items.length, start, stop);
        const kept = from > to ? [] : items.slice(from, to + 1);
        if (kept.length === 0) {
            this.entries.delete(key);
            return;
        }
        items.splice(0, items.length, ...kept);
    }

    async lrange(key: string, start: number, stop: number): Promise<string[]> {
        const items = this.readList(key);
        if (!items) {
            return [];
        }
        const [from, to] = normalizeRange(items.length, start, stop);
        return from > to ? [] : items.slice(from, to + 1);
    }

    async llen(key: string): Promise<number> {
        return this.readList(key)?.length ?? 0;
    }

    async sadd(key: string, ...members: string[]): Promise<number> {
        let set = this.readSet(key);
        if (!set) {
            if (members.length === 0) {
                return 0;
            }
            set = new Set();
            this.entries.set(key, { value: { kind: "set", members: set }, expiresAt: null });
        }
        let added = 0;
        for (const member of members) {
            if (!set.has(member)) {
                set.add(member);
                added++;
            }
        }
        return added;
    }

    async srem(key: string, ...members: string[]): Promise<number> {
        const set = this.readSet(key);
        if (!set) {
            return 0;
        }
        let removed = 0;
        for (const member of members) {
            if (set.delete(member)) {
                removed++;
            }
        }
        if (set.size === 0) {
            this.entries.delete(key);
        }
        return removed;
    }

    async smembers(key: string): Promise<string[]> {
        return [...(this.readSet(key) ?? [])];
    }

    async batch(commands: FastStoreCommand[]): Promise<FastStoreReply[]> {
        // Runs synchronously, so no other caller observes a partial batch.
        return commands.map((command) => {
            switch (command.op) {
                case "incrBy":
                    return this.incrBySync(command.key, command.delta);
                case "pexpire":
                    return this.pexpireSync(command.key, command.ttlMs) ? 1 : 0;
                case "lpush":
                    return this.lpushSync(command.key, command.values);
                case "ltrim":
                    this.ltrimSync(command.key, command.start, command.stop);
                    return null;
                case "set":
                    this.setSync(command.key, command.value, command.ttlMs);
                    return null;
                case "del":
                    return this.delSync(command.keys);
            }
        });
    }
}
