import { Redis } from "ioredis";
import type { FastStore, FastStoreCommand, FastStoreReply } from "./fastStore";

let _redis: Redis | null = null;

export function getRedisClient(): Redis {
    const url = process.env.REDIS_URL?.trim();
    if (!url) {
        throw new Error("REDIS_URL is not set");
    }
    if (!_redis) {
        _redis = new Redis(url, {
            keyPrefix: process.env.PARLEY_REDIS_KEY_PREFIX?.trim() || "parley:",
            maxRetriesPerRequest: 2,
        });
    }
    return _redis;
}

export async function shutdownRedisClient(): Promise<void> {
    if (!_redis) {
        return;
    }
    const client = _redis;
    _redis = null;
    await client.quit();
}

function toReply(value: unknown): FastStoreReply {
    return typeof value === "number" ? value : null;
}

export class RedisFastStore implements FastStore {
    constructor(private readonly redis: Redis) {}

    async get(key: string): Promise<string | null> {
        return await this.redis.get(key);
    }

    async set(key: string, value: string, ttlMs?: number): Promise<void> {
        if (ttlMs !== undefined) {
            await this.redis.set(key, value, "PX", ttlMs);
        } else {
            await this.redis.set(key, value);
        }
    }

    async del(...keys: string[]): Promise<number> {
        if (keys.length === 0) {
            return 0;
        }
        return await this.redis.del(...keys);
    }

    async exists(key: string): Promise<boolean> {
        return (await this.redis.exists(key)) === 1;
    }

    async pexpire(key: string, ttlMs: number): Promise<boolean> {
        return (await this.redis.pexpire(key, ttlMs)) === 1;
    }

    async pttl(key: string): Promise<number> {
        return await this.redis.pttl(key);
    }

    async incrBy(key: string, delta: number): Promise<number> {
        return await this.redis.incrby(key, delta);
    }

    async lpush(key: string, ...values: string[]): Promise<number> {
        if (values.length === 0) {
            return await this.redis.llen(key);
        }
        return await this.redis.lpush(key, ...values);
    }

    async ltrim(key: string, start: number, stop: number): Promise<void> {
        await this.redis.ltrim(key, start, stop);
    }

    async lrange(key: string, start: number, stop: number): Promise<string[]> {
        return await this.redis.lrange(key, start, stop);
    }

    async llen(key: string): Promise<number> {
        return await this.redis.llen(key);
    }

    async sadd(key: string, ...members: string[]): Promise<number> {
        if (members.length === 0) {
            return 0;
        }
        return await this.redis.sadd(key, ...members);
    }

    async srem(key: string, ...members: string[]): Promise<number> {
        if (members.length === 0) {
            return 0;
        }
        return await this.redis.srem(key, ...members);
    }

    async smembers(key: string): Promise<string[]> {
        return await this.redis.smembers(key);
    }

    async batch(commands: FastStoreCommand[]): Promise<FastStoreReply[]> {
        if (commands.length === 0) {
            return [];
        }
        const multi = this.redis.multi();
        for (const command of commands) {
            switch (command.op) {
                case "incrBy":
                    multi.incrby(command.key, command.delta);
                    break;
                case "pexpire":
                    multi.pexpire(command.key, command.ttlMs);
                    break;
                case "lpush":
                    multi.lpush(command.key, ...command.values);
                    break;
                case "ltrim":
                    multi.ltrim(command.key, command.start, command.stop);
                    break;
                case "set":
                    if (command.ttlMs !== undefined) {
                        multi.set(command.key, command.value, "PX", command.ttlMs);
                    } else {
                        multi.set(command.key, command.value);
                    }
                    break;
                case "del":
                    multi.del(...command.keys);
                    break;
            }
        }
        const results = await multi.exec();
        if (!results) {
            throw new Error("Redis transaction was aborted");
        }
        return results.map(([error, value]) => {
            if (error) {
                throw error;
            }
            return toReply(value);
        });
    }
}
