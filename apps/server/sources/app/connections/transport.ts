import type { OutboundFrame } from "@parley/protocol";

export type InboundEvent =
    | { kind: "frame"; payload: unknown }
    | { kind: "pong" };

/** The wire under one live connection. Closing it is the only way to stop the connection. */
export interface ConnectionTransport {
    readonly id: string;
    send(frame: OutboundFrame): void | Promise<void>;
    ping(): void | Promise<void>;
    close(reason: string): void;
    onInbound(listener: (event: InboundEvent) => void): void;
    onClose(listener: (reason: string) => void): void;
}
