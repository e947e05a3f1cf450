import { parseInboundFrame, type InboundFrame, type OutboundFrame } from "@parley/protocol";
import { BoundedQueue } from "@/utils/boundedQueue";
import { log } from "@/utils/log";
import type { ConnectionTransport, InboundEvent } from "./transport";

export type ConnectionState = "handshaking" | "active" | "closing" | "closed";

export type LiveConnectionOptions = {
    heartbeatIntervalMs: number;
    readTimeoutMs: number;
    outboundQueueSize: number;
    inboundQueueSize: number;
};

export interface ConnectionHooks {
    onFrame(connection: LiveConnection, frame: InboundFrame): Promise<void>;
    onPong(connection: LiveConnection): Promise<void>;
    onClosed(connection: LiveConnection, reason: string): Promise<void>;
}

/** Opaque token handed out by the registry for one admitted connection. */
export interface RegistryHandle {
    readonly userId: number;
    readonly connectionId: string;
    readonly state: ConnectionState;
    closed(): Promise<void>;
}

export class LiveConnection implements RegistryHandle {
    readonly connectionId: string;
    private currentState: ConnectionState = "handshaking";
    private closeReason: string | null = null;
    private lastReadAt: number = Date.now();
    private readonly outbound: BoundedQueue<OutboundFrame>;
    private readonly inbound: BoundedQueue<InboundEvent>;
    private finished: Promise<void> | null = null;

    constructor(
        readonly userId: number,
        readonly displayName: string,
        private readonly transport: ConnectionTransport,
        private readonly options: LiveConnectionOptions,
        private readonly hooks: ConnectionHooks,
    ) {
        this.connectionId = transport.id;
        this.outbound = new BoundedQueue(options.outboundQueueSize);
        this.inbound = new BoundedQueue(options.inboundQueueSize);
    }

    get state(): ConnectionState {
        return this.currentState;
    }

    get lastRead(): number {
        return this.lastReadAt;
    }

    get isActive(): boolean {
        return this.currentState === "active";
    }

    start(): void {
        if (this.currentState !== "handshaking") {
            return;
        }
        this.currentState = "active";
        this.lastReadAt = Date.now();

        this.transport.onInbound((event) => {
            if (!this.inbound.offer(event) && !this.inbound.isClosed) {
                log({ module: "connection", level: "warn", userId: this.userId }, "Inbound queue full, dropping event");
            }
        });
        this.transport.onClose((reason) => {
            this.closeReason ??= reason;
            this.inbound.close();
        });

        this.finished = Promise.all([this.readLoop(), this.writeLoop()]).then(() => this.finish());
    }

    /** Non-blocking. False when the connection is not active or its outbound queue is full. */
    enqueue(frame: OutboundFrame): boolean {
        if (this.currentState !== "active") {
            return false;
        }
        return this.outbound.offer(frame);
    }

    close(reason: string): void {
        if (this.currentState === "handshaking") {
            this.currentState = "closed";
            this.transport.close(reason);
            return;
        }
        this.beginClosing(reason);
    }

    closed(): Promise<void> {
        return this.finished ?? Promise.resolve();
    }

    private beginClosing(reason: string): void {
        if (this.currentState !== "active") {
            return;
        }
        this.currentState = "closing";
        this.closeReason ??= reason;
        this.outbound.close();
        this.inbound.close();
        this.transport.close(reason);
    }

    private async readLoop(): Promise<void> {
        while (this.currentState === "active") {
            const next = await this.inbound.take(this.options.readTimeoutMs);
            if (this.currentState !== "active") {
                break;
            }
            if (next.kind === "closed") {
                this.beginClosing(this.closeReason ?? "transport closed");
                break;
            }
            if (next.kind === "timeout") {
                this.beginClosing("read timeout");
                break;
            }

            this.lastReadAt = Date.now();
            try {
                if (next.value.kind === "pong") {
                    await this.hooks.onPong(this);
                    continue;
                }
                const frame = parseInboundFrame(next.value.payload);
                if (frame) {
                    await this.hooks.onFrame(this, frame);
                }
            } catch (error) {
                log({ module: "connection", level: "warn", userId: this.userId }, "Error handling inbound event:", error);
            }
        }
    }

    private async writeLoop(): Promise<void> {
        let nextPingAt = Date.now() + this.options.heartbeatIntervalMs;
        while (this.currentState === "active") {
            const next = await this.outbound.take(Math.max(0, nextPingAt - Date.now()));
            if (this.currentState !== "active" || next.kind === "closed") {
                break;
            }
            try {
                if (next.kind === "timeout") {
                    await this.transport.ping();
                    nextPingAt = Date.now() + this.options.heartbeatIntervalMs;
                } else {
                    await this.transport.send(next.value);
                }
            } catch (error) {
                log({ module: "connection", level: "warn", userId: this.userId }, "Write failed, closing connection:", error);
                this.beginClosing("write error");
                break;
            }
        }
    }

    private async finish(): Promise<void> {
        this.currentState = "closed";
        try {
            await this.hooks.onClosed(this, this.closeReason ?? "closed");
        } catch (error) {
            log({ module: "connection", level: "warn", userId: this.userId }, "Error in close handler:", error);
        }
    }
}
