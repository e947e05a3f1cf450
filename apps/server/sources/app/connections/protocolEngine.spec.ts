import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";

vi.mock("@/utils/log", () => ({ log: vi.fn(), errorMessage: (e: unknown) => String(e) }));

import { PresenceTracker } from "@/app/presence/presenceTracker";
import type { MarkReadResult } from "@/app/messages/readReceipts";
import type { UserStatus } from "@/app/users/userRepository";
import { MemoryFastStore } from "@/storage/memoryFastStore";
import { ProtocolEngine } from "./protocolEngine";

const ALICE = { userId: 1, displayName: "Alice" };

describe("ProtocolEngine", () => {
    let clock: Date;
    let presence: PresenceTracker;
    let updateStatus: Mock<(id: number, status: UserStatus) => Promise<void>>;
    let markAsRead: Mock<(userId: number, messageId: number) => Promise<MarkReadResult>>;
    let engine: ProtocolEngine;

    beforeEach(() => {
        clock = new Date("2024-01-01T00:00:00.000Z");
        presence = new PresenceTracker(new MemoryFastStore(), { ttlMs: 60_000 }, () => clock);
        updateStatus = vi.fn<(id: number, status: UserStatus) => Promise<void>>(async () => {});
        markAsRead = vi.fn<(userId: number, messageId: number) => Promise<MarkReadResult>>(async () => ({ ok: true, changed: true }));
        engine = new ProtocolEngine({ presence, users: { updateStatus }, receipts: { markAsRead } });
    });

    it("refreshes presence and the stored status on heartbeat", async () => {
        await presence.setOnline(1, "Alice");
        clock = new Date("2024-01-01T00:00:20.000Z");

        await engine.handleFrame(ALICE, { type: "heartbeat" });

        expect((await presence.get(1))?.last_seen).toBe("2024-01-01T00:00:20.000Z");
        expect(updateStatus).toHaveBeenCalledWith(1, "online");
    });

    it("marks the user online again when the record has lapsed", async () => {
        expect(await presence.isOnline(1)).toBe(false);

        await engine.handleFrame(ALICE, { type: "heartbeat" });

        expect(await presence.get(1)).toMatchObject({ user_id: 1, username: "Alice", status: "online" });
    });

    it("keeps going when the status update fails", async () => {
        updateStatus.mockRejectedValueOnce(new Error("db down"));
        await expect(engine.handleFrame(ALICE, { type: "heartbeat" })).resolves.toBeUndefined();
        expect(await presence.isOnline(1)).toBe(true);
    });

    it("passes read acknowledgements on for the connection's own user", async () => {
        await engine.handleFrame(ALICE, { type: "ack_read", msg_id: 5 });
        expect(markAsRead).toHaveBeenCalledWith(1, 5);
    });

    it("ignores rejected read acknowledgements", async () => {
        markAsRead.mockResolvedValueOnce({ ok: false, error: "forbidden" });
        await expect(engine.handleFrame(ALICE, { type: "ack_read", msg_id: 9 })).resolves.toBeUndefined();
    });

    it("treats a pong as proof of life", async () => {
        await presence.setOnline(1, "Alice");
        clock = new Date("2024-01-01T00:00:45.000Z");

        await engine.handlePong(ALICE);

        expect((await presence.get(1))?.last_seen).toBe("2024-01-01T00:00:45.000Z");
        expect(updateStatus).not.toHaveBeenCalled();
    });
});
