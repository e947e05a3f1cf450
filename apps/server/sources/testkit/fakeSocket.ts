import type { SocketHandshake } from "@/app/api/socket";

type Listener = (...args: unknown[]) => void;

let nextId = 1;

/** Stands in for a server-side socket.io socket. */
export class FakeSocket {
    readonly id = `socket-${nextId++}`;
    connected = true;
    readonly emitted: Array<[string, unknown]> = [];
    readonly handshake: SocketHandshake;
    private readonly listeners = new Map<string, Listener[]>();
    private readonly packetListeners: Array<(packet: { type: string }) => void> = [];

    readonly conn = {
        on: (_event: "packet", listener: (packet: { type: string }) => void) => {
            this.packetListeners.push(listener);
        },
    };

    constructor(handshake: Partial<SocketHandshake> = {}) {
        this.handshake = { auth: {}, query: {}, headers: {}, ...handshake };
    }

    emit(event: string, payload: unknown): boolean {
        this.emitted.push([event, payload]);
        return true;
    }

    on(event: string, listener: Listener): this {
        const list = this.listeners.get(event) ?? [];
        list.push(listener);
        this.listeners.set(event, list);
        return this;
    }

    disconnect(_close?: boolean): this {
        if (!this.connected) {
            return this;
        }
        this.connected = false;
        this.trigger("disconnect", "server namespace disconnect");
        return this;
    }

    /** Simulates an event sent by the client. */
    trigger(event: string, ...args: unknown[]): void {
        for (const listener of this.listeners.get(event) ?? []) {
            listener(...args);
        }
    }

    packet(type: string): void {
        for (const listener of this.packetListeners) {
            listener({ type });
        }
    }

    /** Simulates the client going away. */
    drop(): void {
        if (!this.connected) {
            return;
        }
        this.connected = false;
        this.trigger("disconnect", "transport close");
    }
}
