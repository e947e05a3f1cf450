import type { PGlite } from "@electric-sql/pglite";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";

import { createTestDatabase, resetDatabase } from "@/testkit/database";
import { PgUserRepository } from "@/app/users/userRepository";
import { PgMessageRepository } from "./messageRepository";

describe("PgMessageRepository", () => {
    let db: PGlite;
    let users: PgUserRepository;
    let messages: PgMessageRepository;

    beforeAll(async () => {
        db = await createTestDatabase();
        users = new PgUserRepository(db);
        messages = new PgMessageRepository(db);
    });

    afterAll(async () => {
        await db.close();
    });

    beforeEach(async () => {
        await resetDatabase(db);
        await users.create("alice");
        await users.create("bob");
        await users.create("carol");
    });

    it("pages a conversation newest first in both directions", async () => {
        await messages.create({ senderId: 1, receiverId: 2, content: "one", createdAt: new Date("2024-01-01T10:00:00Z") });
        await messages.create({ senderId: 2, receiverId: 1, content: "two", createdAt: new Date("2024-01-01T10:01:00Z") });
        await messages.create({ senderId: 1, receiverId: 3, content: "other", createdAt: new Date("2024-01-01T10:02:00Z") });
        await messages.create({ senderId: 1, receiverId: 2, content: "three", createdAt: new Date("2024-01-01T10:03:00Z") });

        const page = await messages.getConversationPage(2, 1, 2, 0);
        expect(page.map((m) => m.content)).toEqual(["three", "two"]);
        const next = await messages.getConversationPage(1, 2, 2, 2);
        expect(next.map((m) => m.content)).toEqual(["one"]);
    });

    it("counts unread messages per sender and marks them read", async () => {
        await messages.create({ senderId: 1, receiverId: 2, content: "a" });
        await messages.create({ senderId: 1, receiverId: 2, content: "b" });
        await messages.create({ senderId: 3, receiverId: 2, content: "c" });

        expect(await messages.countUnread(2)).toBe(3);
        expect(await messages.countUnreadFrom(2, 1)).toBe(2);
        expect(await messages.countUnreadBySender(2)).toEqual(new Map([[1, 2], [3, 1]]));

        expect(await messages.markConversationAsRead(2, 1)).toBe(2);
        expect(await messages.countUnread(2)).toBe(1);
        expect((await messages.getUnread(2)).map((m) => m.content)).toEqual(["c"]);

        expect(await messages.markAllAsRead(2)).toBe(1);
        expect(await messages.countUnread(2)).toBe(0);
    });

    it("marks a single message read only once", async () => {
        const message = await messages.create({ senderId: 1, receiverId: 2, content: "hi" });

        expect(await messages.markAsRead(message.id)).toBe(true);
        expect(await messages.markAsRead(message.id)).toBe(false);
        const stored = await messages.getById(message.id);
        expect(stored?.isRead).toBe(true);
        expect(stored?.status).toBe("read");
    });

    it("hides soft-deleted messages", async () => {
        const message = await messages.create({ senderId: 1, receiverId: 2, content: "oops" });

        expect(await messages.softDelete(message.id)).toBe(true);
        expect(await messages.softDelete(message.id)).toBe(false);
        expect(await messages.getById(message.id)).toBeNull();
        expect(await messages.countUnread(2)).toBe(0);
        expect(await messages.getConversationPage(1, 2, 10, 0)).toEqual([]);
    });

    it("lists recent messages involving a user", async () => {
        await messages.create({ senderId: 1, receiverId: 2, content: "x", createdAt: new Date("2024-01-01T10:00:00Z") });
        await messages.create({ senderId: 3, receiverId: 1, content: "y", createdAt: new Date("2024-01-01T10:01:00Z") });
        await messages.create({ senderId: 2, receiverId: 3, content: "z", createdAt: new Date("2024-01-01T10:02:00Z") });

        const recent = await messages.getRecentInvolving(1, 10);
        expect(recent.map((m) => m.content)).toEqual(["y", "x"]);
        expect(recent[0].createdAt.toISOString()).toBe("2024-01-01T10:01:00.000Z");
    });
});
