/**
 * Commands that can be sent to the fast store as one atomic batch.
 * Each command yields a number (or null when the command has no numeric reply).
 */
export type FastStoreCommand =
    | { op: "incrBy"; key: string; delta: number }
    | { op: "pexpire"; key: string; ttlMs: number }
    | { op: "lpush"; key: string; values: string[] }
    | { op: "ltrim"; key: string; start: number; stop: number }
    | { op: "set"; key: string; value: string; ttlMs?: number }
    | { op: "del"; keys: string[] };

export type FastStoreReply = number | null;

/**
 * Key/value store with per-key TTL, counters, lists and sets.
 * TTLs are milliseconds. `pttl` follows the Redis convention: -2 for a missing key, -1 for no expiry.
 */
export interface FastStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlMs?: number): Promise<void>;
    del(...keys: string[]): Promise<number>;
    exists(key: string): Promise<boolean>;
    pexpire(key: string, ttlMs: number): Promise<boolean>;
    pttl(key: string): Promise<number>;
    incrBy(key: string, delta: number): Promise<number>;
    lpush(key: string, ...values: string[]): Promise<number>;
    ltrim(key: string, start: number, stop: number): Promise<void>;
    lrange(key: string, start: number, stop: number): Promise<string[]>;
    llen(key: string): Promise<number>;
    sadd(key: string, ...members: string[]): Promise<number>;
    srem(key: string, ...members: string[]): Promise<number>;
    smembers(key: string): Promise<string[]>;
    batch(commands: FastStoreCommand[]): Promise<FastStoreReply[]>;
}
