import type { PGlite } from "@electric-sql/pglite";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@/utils/log", () => ({
    log: vi.fn(),
    debug: vi.fn(),
    errorMessage: (e: unknown) => String(e),
}));

import { createTestDatabase, resetDatabase } from "@/testkit/database";
import { createTestCore } from "@/testkit/testCore";
import { buildApi } from "./api";
import type { Fastify } from "./types";

const ALICE = { authorization: "Bearer test-token-alice" };
const BOB = { authorization: "Bearer test-token-bob" };

describe("HTTP API", () => {
    let db: PGlite;
    let core: ReturnType<typeof createTestCore>;
    let app: Fastify;

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
        await core.users.create("bob", "Bob");
        await core.auth.issueToken(1, "test-token-alice");
        await core.auth.issueToken(2, "test-token-bob");
        app = await buildApi(core);
        await app.ready();
    });

    afterEach(async () => {
        await app.close();
        await core.jobs.onIdle();
    });

    async function send(headers: Record<string, string>, receiverId: number, content: string) {
        return await app.inject({ method: "POST", url: "/v1/messages", headers, payload: { receiverId, content } });
    }

    it("reports health without authentication", async () => {
        const res = await app.inject({ method: "GET", url: "/health" });
        expect(res.statusCode).toBe(200);
        expect(res.json()).toMatchObject({ status: "ok", service: "parley-server", connections: 0 });
    });

    it("rejects requests without a valid bearer token", async () => {
        const missing = await send({}, 2, "hi");
        expect(missing.statusCode).toBe(401);
        expect(missing.json()).toEqual({ error: "missing-authorization" });

        const invalid = await send({ authorization: "Bearer not-a-token" }, 2, "hi");
        expect(invalid.statusCode).toBe(401);
        expect(invalid.json()).toEqual({ error: "invalid-token" });
    });

    it("sends a message and reports the delivery outcome", async () => {
        const res = await send(ALICE, 2, "hi");
        expect(res.statusCode).toBe(200);
        const body = res.json();
        expect(body.delivery).toBe("queued");
        expect(body.message).toMatchObject({ sender_id: 1, receiver_id: 2, content: "hi", is_read: false });
    });

    it("maps send failures to status codes", async () => {
        const unknown = await send(ALICE, 99, "hi");
        expect(unknown.statusCode).toBe(404);
        expect(unknown.json()).toEqual({ error: "receiver-not-found" });

        const self = await send(ALICE, 1, "hi");
        expect(self.statusCode).toBe(400);
        expect(self.json()).toEqual({ error: "self-send" });

        const invalid = await app.inject({ method: "POST", url: "/v1/messages", headers: ALICE, payload: { receiverId: 2 } });
        expect(invalid.statusCode).toBe(400);
        expect(invalid.json().error).toBe("invalid-request");
    });

    it("serves unread counts, conversations and pages", async () => {
        await send(ALICE, 2, "hi");
        await core.jobs.onIdle();

        const count = await app.inject({ method: "GET", url: "/v1/messages/unread/count", headers: BOB });
        expect(count.json()).toEqual({ count: 1 });

        const unread = await app.inject({ method: "GET", url: "/v1/messages/unread", headers: BOB });
        expect(unread.json().messages.map((m: { content: string }) => m.content)).toEqual(["hi"]);

        const conversations = await app.inject({ method: "GET", url: "/v1/conversations", headers: BOB });
        expect(conversations.json().conversations).toEqual([
            expect.objectContaining({ user_id: 1, username: "Alice", last_message: "hi", unread_count: 1 }),
        ]);

        const page = await app.inject({ method: "GET", url: "/v1/messages/1?page=1&pageSize=10", headers: BOB });
        expect(page.statusCode).toBe(200);
        expect(page.json().messages.map((m: { content: string }) => m.content)).toEqual(["hi"]);

        const missing = await app.inject({ method: "GET", url: "/v1/messages/42", headers: BOB });
        expect(missing.statusCode).toBe(404);
    });

    it("lets only the receiver mark a message read", async () => {
        const sent = (await send(ALICE, 2, "hi")).json();

        const forbidden = await app.inject({ method: "POST", url: `/v1/messages/${sent.message.id}/read`, headers: ALICE });
        expect(forbidden.statusCode).toBe(403);

        const read = await app.inject({ method: "POST", url: `/v1/messages/${sent.message.id}/read`, headers: BOB });
        expect(read.json()).toEqual({ changed: true });

        const all = await app.inject({ method: "POST", url: "/v1/messages/read-all", headers: BOB });
        expect(all.json()).toEqual({ updated: 0 });
    });

    it("marks a whole conversation read", async () => {
        await send(ALICE, 2, "one");
        await send(ALICE, 2, "two");

        const res = await app.inject({ method: "POST", url: "/v1/conversations/1/read", headers: BOB });
        expect(res.json()).toEqual({ updated: 2 });
    });

    it("lets only the sender delete a message", async () => {
        const sent = (await send(ALICE, 2, "oops")).json();

        const forbidden = await app.inject({ method: "DELETE", url: `/v1/messages/${sent.message.id}`, headers: BOB });
        expect(forbidden.statusCode).toBe(403);
        expect(forbidden.json()).toEqual({ error: "forbidden" });

        const deleted = await app.inject({ method: "DELETE", url: `/v1/messages/${sent.message.id}`, headers: ALICE });
        expect(deleted.json()).toEqual({ success: true });

        const again = await app.inject({ method: "DELETE", url: `/v1/messages/${sent.message.id}`, headers: ALICE });
        expect(again.statusCode).toBe(404);
    });

    it("reports presence of users without a connection", async () => {
        const one = await app.inject({ method: "GET", url: "/v1/presence/2", headers: ALICE });
        expect(one.json()).toEqual({ userId: 2, online: false, presence: null });

        const online = await app.inject({ method: "GET", url: "/v1/presence/online", headers: ALICE });
        expect(online.json()).toEqual({ users: [] });
    });

    it("rejects malformed ids and unknown routes", async () => {
        const badId = await app.inject({ method: "GET", url: "/v1/messages/abc", headers: ALICE });
        expect(badId.statusCode).toBe(400);
        expect(badId.json().error).toBe("invalid-request");

        const hugeId = await app.inject({ method: "GET", url: "/v1/messages/99999999999999999999", headers: ALICE });
        expect(hugeId.statusCode).toBe(400);
        expect(hugeId.json().error).toBe("invalid-request");

        const hugeRead = await app.inject({ method: "POST", url: "/v1/messages/2147483648/read", headers: ALICE });
        expect(hugeRead.statusCode).toBe(400);

        const hugePresence = await app.inject({ method: "GET", url: "/v1/presence/2147483648", headers: ALICE });
        expect(hugePresence.statusCode).toBe(400);

        const unknown = await app.inject({ method: "GET", url: "/v1/nothing-here" });
        expect(unknown.statusCode).toBe(404);
        expect(unknown.json()).toEqual({ error: "not-found" });
    });
});
