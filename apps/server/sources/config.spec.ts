import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
    it("applies defaults for an empty environment", () => {
        const config = loadConfig({});
        expect(config.port).toBe(3005);
        expect(config.redisUrl).toBeNull();
        expect(config.dbDir).toBeNull();
        expect(config.connection).toEqual({
            heartbeatIntervalMs: 30_000,
            readTimeoutMs: 90_000,
            outboundQueueSize: 256,
            inboundQueueSize: 64,
            offlineDrainLimit: 50,
            pushUnreadOnConnect: false,
        });
        expect(config.presence.ttlMs).toBe(60_000);
        expect(config.offline).toEqual({ capacity: 100, ttlMs: 604_800_000 });
        expect(config.cache).toEqual({ messageCapacity: 30, conversationCapacity: 10, ttlMs: 3_600_000 });
        expect(config.unread.ttlMs).toBe(86_400_000);
    });

    it("derives the presence TTL from the heartbeat interval", () => {
        const config = loadConfig({ PARLEY_HEARTBEAT_INTERVAL_MS: "5000" });
        expect(config.connection.heartbeatIntervalMs).toBe(5_000);
        expect(config.presence.ttlMs).toBe(10_000);
    });

    it("treats blank values as unset", () => {
        const config = loadConfig({ REDIS_URL: "  ", PORT: "", PARLEY_PUSH_UNREAD_ON_CONNECT: "" });
        expect(config.redisUrl).toBeNull();
        expect(config.port).toBe(3005);
        expect(config.connection.pushUnreadOnConnect).toBe(false);
    });

    it("parses flags", () => {
        expect(loadConfig({ PARLEY_PUSH_UNREAD_ON_CONNECT: "true" }).connection.pushUnreadOnConnect).toBe(true);
        expect(loadConfig({ PARLEY_PUSH_UNREAD_ON_CONNECT: "0" }).connection.pushUnreadOnConnect).toBe(false);
    });

    it("rejects invalid numbers", () => {
        expect(() => loadConfig({ PARLEY_READ_TIMEOUT_MS: "-5" })).toThrow("Invalid configuration: PARLEY_READ_TIMEOUT_MS");
        expect(() => loadConfig({ PORT: "http" })).toThrow("Invalid configuration: PORT");
    });
});
