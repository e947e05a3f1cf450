import type { MessageCache } from "@/app/cache/messageCache";
import type { UnreadCounter } from "@/app/unread/unreadCounter";
import type { MessageRepository } from "./messageRepository";

export type MarkReadResult =
    | { ok: true; changed: boolean }
    | { ok: false; error: "message-not-found" | "forbidden" };

export type ReadReceiptDeps = {
    messages: MessageRepository;
    unread: UnreadCounter;
    cache: MessageCache;
};

/** Read state changes. Only the receiver of a message may mark it read. */
export class ReadReceiptService {
    constructor(private readonly deps: ReadReceiptDeps) {}

    async markAsRead(userId: number, messageId: number): Promise<MarkReadResult> {
        const message = await this.deps.messages.getById(messageId);
        if (!message) {
            return { ok: false, error: "message-not-found" };
        }
        if (message.receiverId !== userId) {
            return { ok: false, error: "forbidden" };
        }
        if (message.isRead) {
            return { ok: true, changed: false };
        }
        const changed = await this.deps.messages.markAsRead(messageId);
        if (changed) {
            await this.deps.unread.decrement(userId);
        }
        return { ok: true, changed };
    }

    async markConversationAsRead(userId: number, otherId: number): Promise<number> {
        const updated = await this.deps.messages.markConversationAsRead(userId, otherId);
        if (updated > 0) {
            const remaining = await this.deps.messages.countUnread(userId);
            await this.deps.unread.set(userId, remaining);
            await this.deps.cache.clearSummaries(userId);
        }
        return updated;
    }

    async markAllAsRead(userId: number): Promise<number> {
        const updated = await this.deps.messages.markAllAsRead(userId);
        await this.deps.unread.reset(userId);
        if (updated > 0) {
            await this.deps.cache.clearSummaries(userId);
        }
        return updated;
    }
}
