import type { ChatFrame, OfflineMessageFrame } from "@parley/protocol";
import type { Message, MessageRepository } from "@/app/messages/messageRepository";
import type { OfflineMessageEntry, OfflineMessageQueue } from "@/app/offline/offlineQueue";
import type { PresenceTracker } from "@/app/presence/presenceTracker";
import type { UserRepository, UserStatus } from "@/app/users/userRepository";
import { deliveriesCounter, websocketConnectionsGauge } from "@/app/monitoring/metrics";
import { log } from "@/utils/log";
import { LiveConnection, type LiveConnectionOptions, type RegistryHandle } from "./liveConnection";
import type { ProtocolEngine } from "./protocolEngine";
import type { ConnectionTransport } from "./transport";

export type DeliveryOutcome = "live-sent" | "live-dropped" | "queued";

export type DeliverableMessage = Pick<Message, "id" | "senderId" | "receiverId" | "content" | "msgType" | "createdAt">;

export type ConnectionRegistryOptions = LiveConnectionOptions & {
    offlineDrainLimit: number;
    pushUnreadOnConnect: boolean;
};

export type ConnectionRegistryDeps = {
    presence: PresenceTracker;
    offline: OfflineMessageQueue;
    protocol: Pick<ProtocolEngine, "handleFrame" | "handlePong">;
    users: Pick<UserRepository, "updateStatus">;
    messages: Pick<MessageRepository, "getUnread">;
    options: ConnectionRegistryOptions;
};

export function toChatFrame(message: DeliverableMessage): ChatFrame {
    return {
        type: "chat",
        from: message.senderId,
        to: message.receiverId,
        content: message.content,
        msg_id: message.id,
        timestamp: Math.floor(message.createdAt.getTime() / 1000),
    };
}

export function toOfflineEntry(message: DeliverableMessage): OfflineMessageEntry {
    return {
        id: message.id,
        sender_id: message.senderId,
        receiver_id: message.receiverId,
        content: message.content,
        type: message.msgType,
        created_at: message.createdAt.toISOString(),
    };
}

function toOfflineFrame(entry: OfflineMessageEntry): OfflineMessageFrame {
    return {
        type: "offline_message",
        id: entry.id,
        sender_id: entry.sender_id,
        content: entry.content,
        created_at: entry.created_at,
    };
}

/**
 * At most one live connection per user. Admitting a second connection for a user
 * closes the first; a connection only removes its own entry on the way out.
 * Every map mutation happens synchronously, so no caller sees a half-applied change.
 */
export class ConnectionRegistry {
    private readonly connections = new Map<number, LiveConnection>();

    constructor(private readonly deps: ConnectionRegistryDeps) {}

    async admit(userId: number, displayName: string, transport: ConnectionTransport): Promise<RegistryHandle> {
        const connection = new LiveConnection(userId, displayName, transport, this.deps.options, {
            onFrame: (conn, frame) => this.deps.protocol.handleFrame(conn, frame),
            onPong: (conn) => this.deps.protocol.handlePong(conn),
            onClosed: (conn, reason) => this.handleClosed(conn, reason),
        });

        const previous = this.connections.get(userId);
        this.connections.set(userId, connection);
        websocketConnectionsGauge.set(this.connections.size);
        connection.start();
        if (previous) {
            log({ module: "registry", userId }, `Replacing connection ${previous.connectionId} with ${connection.connectionId}`);
            previous.close("replaced by a newer connection");
        }
        log({ module: "registry", userId }, `Connection ${connection.connectionId} admitted`);

        await this.deps.presence.setOnline(userId, displayName);
        await this.updateStatus(userId, "online");
        await this.drainOffline(connection);
        if (this.deps.options.pushUnreadOnConnect) {
            await this.pushUnread(connection);
        }
        return connection;
    }

    /** Never throws. Live delivery never falls back to the offline queue. */
    async deliver(userId: number, message: DeliverableMessage): Promise<DeliveryOutcome> {
        const connection = this.connections.get(userId);
        if (connection?.isActive) {
            if (connection.enqueue(toChatFrame(message))) {
                deliveriesCounter.inc({ outcome: "live-sent" });
                return "live-sent";
            }
            deliveriesCounter.inc({ outcome: "live-dropped" });
            log({ module: "registry", level: "warn", userId, messageId: message.id }, "Outbound queue full, dropping chat frame");
            return "live-dropped";
        }

        const queued = await this.deps.offline.enqueue(userId, toOfflineEntry(message));
        if (!queued) {
            log({ module: "registry", level: "warn", userId, messageId: message.id }, "Offline enqueue failed; message stays unread in the durable store");
        }
        deliveriesCounter.inc({ outcome: "queued" });
        return "queued";
    }

    /** Removes the entry only if it still belongs to `handle`. */
    release(userId: number, handle: RegistryHandle): boolean {
        const current = this.connections.get(userId);
        if (!current || current !== handle) {
            return false;
        }
        this.connections.delete(userId);
        websocketConnectionsGauge.set(this.connections.size);
        return true;
    }

    isConnected(userId: number): boolean {
        return this.connections.get(userId)?.isActive ?? false;
    }

    connectionCount(): number {
        return this.connections.size;
    }

    async closeAll(reason = "server shutting down"): Promise<void> {
        const open = [...this.connections.values()];
        for (const connection of open) {
            connection.close(reason);
        }
        await Promise.all(open.map((connection) => connection.closed()));
    }

    private async handleClosed(connection: LiveConnection, reason: string): Promise<void> {
        const released = this.release(connection.userId, connection);
        log({ module: "registry", userId: connection.userId, released }, `Connection ${connection.connectionId} closed: ${reason}`);
        if (!released) {
            return;
        }
        await this.deps.presence.setOffline(connection.userId, connection.displayName);
        await this.updateStatus(connection.userId, "offline");
    }

    private async drainOffline(connection: LiveConnection): Promise<void> {
        const limit = this.deps.options.offlineDrainLimit;
        for (;;) {
            const entries = await this.deps.offline.drain(connection.userId, limit);
            if (entries.length === 0) {
                return;
            }
            for (const entry of entries) {
                if (!connection.enqueue(toOfflineFrame(entry))) {
                    log({ module: "registry", level: "warn", userId: connection.userId }, "Could not hand offline messages to the connection; keeping them queued");
                    return;
                }
            }
            const discarded = await this.deps.offline.discard(connection.userId, entries.length);
            if (!discarded || entries.length < limit) {
                return;
            }
        }
    }

    private async pushUnread(connection: LiveConnection): Promise<void> {
        let unread: Message[];
        try {
            unread = await this.deps.messages.getUnread(connection.userId);
        } catch (error) {
            log({ module: "registry", level: "warn", userId: connection.userId }, "Failed to load unread messages:", error);
            return;
        }
        for (const message of unread) {
            if (!connection.enqueue(toChatFrame(message))) {
                return;
            }
        }
    }

    private async updateStatus(userId: number, status: UserStatus): Promise<void> {
        try {
            await this.deps.users.updateStatus(userId, status);
        } catch (error) {
            log({ module: "registry", level: "warn", userId }, `Failed to mark user ${status}:`, error);
        }
    }
}
