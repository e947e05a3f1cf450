import type { PGlite } from "@electric-sql/pglite";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@/utils/log", () => ({ log: vi.fn(), errorMessage: (e: unknown) => String(e) }));

import { createTestDatabase, resetDatabase } from "@/testkit/database";
import { FakeSocket } from "@/testkit/fakeSocket";
import { createTestCore } from "@/testkit/testCore";
import { handleSocketConnection, resolveHandshakeToken } from "./socket";

type ConnectionSocket = Parameters<typeof handleSocketConnection>[0];

function asSocket(socket: FakeSocket): ConnectionSocket {
    return socket as unknown as ConnectionSocket;
}

describe("resolveHandshakeToken", () => {
    it("prefers the auth payload, then the query, then the subprotocol header", () => {
        expect(resolveHandshakeToken({ auth: { token: " a " }, query: { token: "b" }, headers: {} })).toBe("a");
        expect(resolveHandshakeToken({ auth: {}, query: { token: "b" }, headers: {} })).toBe("b");
        expect(resolveHandshakeToken({ auth: {}, query: {}, headers: { "sec-websocket-protocol": "chat, Bearer c" } })).toBe("c");
        expect(resolveHandshakeToken({ auth: { token: 42 }, query: {}, headers: {} })).toBeNull();
    });
});

describe("handleSocketConnection", () => {
    let db: PGlite;
    let core: ReturnType<typeof createTestCore>;

    beforeAll(async () => {
        db = await createTestDatabase();
    });

    afterAll(async () => {
        await db.close();
    });

    beforeEach(async () => {
        await resetDatabase(db);
        core = createTestCore(db);
        await core.users.create("alice", "Alice");
        await core.auth.issueToken(1, "test-token-alice");
    });

    afterEach(async () => {
        await core.registry.closeAll();
    });

    it("rejects a handshake without a token", async () => {
        const socket = new FakeSocket();
        await handleSocketConnection(asSocket(socket), core);

        expect(socket.emitted).toEqual([["error", { message: "Missing authentication token" }]]);
        expect(socket.connected).toBe(false);
        expect(core.registry.connectionCount()).toBe(0);
    });

    it("rejects an unknown token without touching presence", async () => {
        const socket = new FakeSocket({ auth: { token: "test-token-nobody" } });
        await handleSocketConnection(asSocket(socket), core);

        expect(socket.emitted).toEqual([["error", { message: "Invalid authentication token" }]]);
        expect(socket.connected).toBe(false);
        expect(await core.presence.listOnlineWithDetails()).toEqual([]);
    });

    it("admits a verified user and delivers chat frames over the socket", async () => {
        const socket = new FakeSocket({ query: { token: "test-token-alice" } });
        await handleSocketConnection(asSocket(socket), core);

        expect(core.registry.isConnected(1)).toBe(true);
        expect(await core.presence.isOnline(1)).toBe(true);

        const outcome = await core.registry.deliver(1, {
            id: 7,
            senderId: 2,
            receiverId: 1,
            content: "yo",
            msgType: "text",
            createdAt: new Date("2024-01-01T12:00:00Z"),
        });
        expect(outcome).toBe("live-sent");
        await vi.waitFor(() => expect(socket.emitted).toContainEqual([
            "message",
            { type: "chat", from: 2, to: 1, content: "yo", msg_id: 7, timestamp: 1704110400 },
        ]));
    });

    it("releases the user when the client goes away", async () => {
        const socket = new FakeSocket({ auth: { token: "test-token-alice" } });
        await handleSocketConnection(asSocket(socket), core);

        socket.drop();

        await vi.waitFor(async () => expect((await core.users.getById(1))?.status).toBe("offline"));
        expect(core.registry.isConnected(1)).toBe(false);
        expect(await core.presence.isOnline(1)).toBe(false);
    });

    it("queues offline when the client leaves while its token is checked", async () => {
        const socket = new FakeSocket({ auth: { token: "test-token-alice" } });
        await handleSocketConnection(asSocket(socket), {
            auth: {
                verifyToken: async () => {
                    socket.drop();
                    return { userId: 1, username: "Alice" };
                },
            },
            registry: core.registry,
        });

        expect(core.registry.isConnected(1)).toBe(false);
        expect(await core.presence.isOnline(1)).toBe(false);

        const outcome = await core.registry.deliver(1, {
            id: 8,
            senderId: 2,
            receiverId: 1,
            content: "later",
            msgType: "text",
            createdAt: new Date("2024-01-01T12:00:00Z"),
        });
        expect(outcome).toBe("queued");
        await vi.waitFor(async () => expect(await core.offline.count(1)).toBe(1));
        expect(socket.emitted).toEqual([]);
    });
});
