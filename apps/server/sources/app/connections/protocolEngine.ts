import type { InboundFrame } from "@parley/protocol";
import type { PresenceTracker } from "@/app/presence/presenceTracker";
import type { ReadReceiptService } from "@/app/messages/readReceipts";
import type { UserRepository } from "@/app/users/userRepository";
import { websocketEventsCounter } from "@/app/monitoring/metrics";
import { log } from "@/utils/log";

export type ConnectionIdentity = {
    readonly userId: number;
    readonly displayName: string;
};

export type ProtocolEngineDeps = {
    presence: PresenceTracker;
    users: Pick<UserRepository, "updateStatus">;
    receipts: Pick<ReadReceiptService, "markAsRead">;
};

/** Interprets inbound frames of an active connection. */
export class ProtocolEngine {
    constructor(private readonly deps: ProtocolEngineDeps) {}

    async handleFrame(connection: ConnectionIdentity, frame: InboundFrame): Promise<void> {
        websocketEventsCounter.inc({ event_type: frame.type });
        switch (frame.type) {
            case "heartbeat":
                await this.keepAlive(connection);
                await this.touchStatus(connection.userId);
                return;
            case "ack_read": {
                const result = await this.deps.receipts.markAsRead(connection.userId, frame.msg_id);
                if (!result.ok) {
                    log({ module: "protocol", level: "debug", userId: connection.userId, messageId: frame.msg_id }, `ack_read ignored: ${result.error}`);
                }
                return;
            }
        }
    }

    async handlePong(connection: ConnectionIdentity): Promise<void> {
        websocketEventsCounter.inc({ event_type: "pong" });
        await this.keepAlive(connection);
    }

    private async keepAlive(connection: ConnectionIdentity): Promise<void> {
        const refreshed = await this.deps.presence.refresh(connection.userId);
        if (!refreshed) {
            // Record expired while the connection stayed up
            await this.deps.presence.setOnline(connection.userId, connection.displayName);
        }
    }

    private async touchStatus(userId: number): Promise<void> {
        try {
            await this.deps.users.updateStatus(userId, "online");
        } catch (error) {
            log({ module: "protocol", level: "warn", userId }, "Failed to update user status:", error);
        }
    }
}
