import { SOCKET_EVENTS, type OutboundFrame } from "@parley/protocol";
import type { Socket } from "socket.io";
import type { ConnectionTransport, InboundEvent } from "./transport";

export type TransportSocket = Pick<Socket, "id" | "connected" | "emit" | "on" | "disconnect"> & {
    conn: { on(event: "packet", listener: (packet: { type: string }) => void): unknown };
};

/**
 * Carries frames as `message` events. Pongs arrive either as an explicit `pong`
 * event or as an engine-level pong packet.
 */
export class SocketTransport implements ConnectionTransport {
    readonly id: string;

    constructor(private readonly socket: TransportSocket) {
        this.id = socket.id;
    }

    send(frame: OutboundFrame): void {
        if (!this.socket.connected) {
            throw new Error("socket disconnected");
        }
        this.socket.emit(SOCKET_EVENTS.message, frame);
    }

    ping(): void {
        if (!this.socket.connected) {
            throw new Error("socket disconnected");
        }
        this.socket.emit(SOCKET_EVENTS.ping, { at: Date.now() });
    }

    close(_reason: string): void {
        this.socket.disconnect(true);
    }

    onInbound(listener: (event: InboundEvent) => void): void {
        this.socket.on(SOCKET_EVENTS.message, (payload: unknown) => listener({ kind: "frame", payload }));
        this.socket.on(SOCKET_EVENTS.pong, () => listener({ kind: "pong" }));
        this.socket.conn.on("packet", (packet) => {
            if (packet.type === "pong") {
                listener({ kind: "pong" });
            }
        });
    }

    onClose(listener: (reason: string) => void): void {
        // socket.io does not replay `disconnect` to late subscribers.
        if (!this.socket.connected) {
            listener("transport close");
            return;
        }
        this.socket.on("disconnect", (reason: string) => listener(reason));
    }
}
