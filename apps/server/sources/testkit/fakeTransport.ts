import type { OutboundFrame } from "@parley/protocol";
import type { ConnectionTransport, InboundEvent } from "@/app/connections/transport";

let nextId = 1;

/** In-process transport: records what the server writes and lets tests push inbound events. */
export class FakeTransport implements ConnectionTransport {
    readonly id = `fake-${nextId++}`;
    readonly sent: OutboundFrame[] = [];
    pings = 0;
    closedWith: string | null = null;
    failWrites = false;
    private writeGate: Promise<void> | null = null;
    private inboundListener: ((event: InboundEvent) => void) | null = null;
    private closeListener: ((reason: string) => void) | null = null;

    async send(frame: OutboundFrame): Promise<void> {
        if (this.failWrites) {
            throw new Error("write failed");
        }
        if (this.writeGate) {
            await this.writeGate;
        }
        this.sent.push(frame);
    }

    /** Stalls every write until the returned function is called. */
    holdWrites(): () => void {
        let release: () => void = () => {};
        this.writeGate = new Promise<void>((resolve) => {
            release = () => {
                this.writeGate = null;
                resolve();
            };
        });
        return release;
    }

    ping(): void {
        if (this.failWrites) {
            throw new Error("write failed");
        }
        this.pings++;
    }

    close(reason: string): void {
        if (this.closedWith !== null) {
            return;
        }
        this.closedWith = reason;
        this.closeListener?.(reason);
    }

    onInbound(listener: (event: InboundEvent) => void): void {
        this.inboundListener = listener;
    }

    onClose(listener: (reason: string) => void): void {
        this.closeListener = listener;
    }

    receive(payload: unknown): void {
        this.inboundListener?.({ kind: "frame", payload });
    }

    pong(): void {
        this.inboundListener?.({ kind: "pong" });
    }

    /** Simulates the peer going away. */
    disconnect(reason = "transport close"): void {
        this.close(reason);
    }
}
