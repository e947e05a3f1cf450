import { afterEach, describe, expect, it, vi } from "vitest";

vi.mock("@/utils/log", () => ({ log: vi.fn() }));

import { FakeTransport } from "@/testkit/fakeTransport";
import { LiveConnection, type ConnectionHooks, type LiveConnectionOptions } from "./liveConnection";

const OPTIONS: LiveConnectionOptions = {
    heartbeatIntervalMs: 30_000,
    readTimeoutMs: 90_000,
    outboundQueueSize: 4,
    inboundQueueSize: 8,
};

function hooks() {
    return {
        onFrame: vi.fn<ConnectionHooks["onFrame"]>(async () => {}),
        onPong: vi.fn<ConnectionHooks["onPong"]>(async () => {}),
        onClosed: vi.fn<ConnectionHooks["onClosed"]>(async () => {}),
    };
}

function chat(id: number) {
    return { type: "chat" as const, from: 1, to: 2, content: `m${id}`, msg_id: id, timestamp: 1_700_000_000 };
}

describe("LiveConnection", () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it("writes enqueued frames in order", async () => {
        const transport = new FakeTransport();
        const connection = new LiveConnection(2, "Bob", transport, OPTIONS, hooks());
        connection.start();

        expect(connection.enqueue(chat(1))).toBe(true);
        expect(connection.enqueue(chat(2))).toBe(true);
        expect(connection.enqueue(chat(3))).toBe(true);

        await vi.waitFor(() => expect(transport.sent.map((f) => f.type === "chat" && f.msg_id)).toEqual([1, 2, 3]));
        transport.disconnect();
        await connection.closed();
    });

    it("refuses frames before start and after close", async () => {
        const transport = new FakeTransport();
        const connection = new LiveConnection(2, "Bob", transport, OPTIONS, hooks());
        expect(connection.enqueue(chat(1))).toBe(false);

        connection.start();
        connection.close("bye");
        expect(connection.enqueue(chat(2))).toBe(false);
        await connection.closed();
        expect(connection.state).toBe("closed");
    });

    it("reports a full outbound queue without blocking", async () => {
        const transport = new FakeTransport();
        const connection = new LiveConnection(2, "Bob", transport, { ...OPTIONS, outboundQueueSize: 1 }, hooks());
        connection.start();

        // The first frame goes straight to the waiting writer, the second fills the queue.
        expect(connection.enqueue(chat(1))).toBe(true);
        expect(connection.enqueue(chat(2))).toBe(true);
        expect(connection.enqueue(chat(3))).toBe(false);
        connection.close("done");
        await connection.closed();
    });

    it("passes parsed frames to the handler and ignores unknown ones", async () => {
        const transport = new FakeTransport();
        const h = hooks();
        const connection = new LiveConnection(2, "Bob", transport, OPTIONS, h);
        connection.start();

        transport.receive({ type: "typing" });
        transport.receive("{\"type\":\"ack_read\",\"msg_id\":\"9\"}");
        transport.receive({ type: "heartbeat" });

        await vi.waitFor(() => expect(h.onFrame).toHaveBeenCalledTimes(2));
        expect(h.onFrame.mock.calls[0][1]).toEqual({ type: "ack_read", msg_id: 9 });
        expect(h.onFrame.mock.calls[1][1]).toEqual({ type: "heartbeat" });
        connection.close("done");
        await connection.closed();
    });

    it("keeps reading after a handler error", async () => {
        const transport = new FakeTransport();
        const h = hooks();
        h.onFrame.mockRejectedValueOnce(new Error("boom"));
        const connection = new LiveConnection(2, "Bob", transport, OPTIONS, h);
        connection.start();

        transport.receive({ type: "heartbeat" });
        transport.receive({ type: "heartbeat" });

        await vi.waitFor(() => expect(h.onFrame).toHaveBeenCalledTimes(2));
        expect(connection.state).toBe("active");
        connection.close("done");
        await connection.closed();
    });

    it("pings on the heartbeat period", async () => {
        vi.useFakeTimers();
        const transport = new FakeTransport();
        const connection = new LiveConnection(2, "Bob", transport, OPTIONS, hooks());
        connection.start();

        await vi.advanceTimersByTimeAsync(30_000);
        expect(transport.pings).toBe(1);
        transport.pong();
        await vi.advanceTimersByTimeAsync(30_000);
        expect(transport.pings).toBe(2);

        connection.close("done");
        await connection.closed();
    });

    it("closes after the read timeout without inbound traffic", async () => {
        vi.useFakeTimers();
        const transport = new FakeTransport();
        const h = hooks();
        const connection = new LiveConnection(2, "Bob", transport, OPTIONS, h);
        connection.start();

        await vi.advanceTimersByTimeAsync(60_000);
        transport.pong();
        await vi.advanceTimersByTimeAsync(89_999);
        expect(connection.state).toBe("active");

        await vi.advanceTimersByTimeAsync(1);
        await connection.closed();
        expect(transport.closedWith).toBe("read timeout");
        expect(h.onClosed).toHaveBeenCalledWith(connection, "read timeout");
    });

    it("closes when a write fails", async () => {
        const transport = new FakeTransport();
        transport.failWrites = true;
        const h = hooks();
        const connection = new LiveConnection(2, "Bob", transport, OPTIONS, h);
        connection.start();

        connection.enqueue(chat(1));
        await connection.closed();
        expect(transport.closedWith).toBe("write error");
        expect(h.onClosed).toHaveBeenCalledWith(connection, "write error");
    });

    it("closes when the peer disconnects", async () => {
        const transport = new FakeTransport();
        const h = hooks();
        const connection = new LiveConnection(2, "Bob", transport, OPTIONS, h);
        connection.start();

        transport.disconnect("client namespace disconnect");
        await connection.closed();
        expect(connection.state).toBe("closed");
        expect(h.onClosed).toHaveBeenCalledWith(connection, "client namespace disconnect");
    });
});
