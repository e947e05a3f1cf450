import type { CachedConversationSummary, CachedMessage, MessageCache } from "@/app/cache/messageCache";
import { byLatestActivity } from "@/app/cache/messageCache";
import type { DeliveryOutcome } from "@/app/connections/connectionRegistry";
import type { UnreadCounter } from "@/app/unread/unreadCounter";
import { displayName, type User, type UserRepository } from "@/app/users/userRepository";
import type { BackgroundJobs } from "@/utils/backgroundJobs";
import type { Message, MessageRepository } from "./messageRepository";
import type { ReadReceiptService } from "./readReceipts";

export const MAX_CONTENT_LENGTH = 4000;
const DEFAULT_PAGE_SIZE = 20;
const MAX_PAGE_SIZE = 100;

export type SendMessageResult =
    | { ok: true; message: Message; delivery: DeliveryOutcome }
    | { ok: false; error: "receiver-not-found" | "self-send" | "invalid-content" };

export type DeleteMessageResult =
    | { ok: true }
    | { ok: false; error: "message-not-found" | "forbidden" };

export type ConversationPageResult =
    | { ok: true; messages: CachedMessage[]; source: "cache" | "store" }
    | { ok: false; error: "user-not-found" };

export interface MessageDelivery {
    deliver(userId: number, message: Message): Promise<DeliveryOutcome>;
}

export type MessageServiceDeps = {
    messages: MessageRepository;
    users: UserRepository;
    cache: MessageCache;
    unread: UnreadCounter;
    receipts: ReadReceiptService;
    delivery: MessageDelivery;
    jobs: BackgroundJobs;
};

export function toCachedMessage(message: Message): CachedMessage {
    return {
        id: message.id,
        sender_id: message.senderId,
        receiver_id: message.receiverId,
        content: message.content,
        is_read: message.isRead,
        created_at: message.createdAt.toISOString(),
        updated_at: message.updatedAt.toISOString(),
    };
}

function normalizePageSize(pageSize: number): number {
    return Number.isInteger(pageSize) && pageSize > 0 && pageSize <= MAX_PAGE_SIZE ? pageSize : DEFAULT_PAGE_SIZE;
}

/**
 * Message submission and the read paths around it. The durable store is authoritative;
 * cache and counter updates after a send are dispatched as best-effort jobs.
 */
export class MessageService {
    constructor(private readonly deps: MessageServiceDeps) {}

    async sendMessage(senderId: number, receiverId: number, content: string): Promise<SendMessageResult> {
        if (content.trim().length === 0 || content.length > MAX_CONTENT_LENGTH) {
            return { ok: false, error: "invalid-content" };
        }
        const receiver = await this.deps.users.getById(receiverId);
        if (!receiver) {
            return { ok: false, error: "receiver-not-found" };
        }
        if (senderId === receiverId) {
            return { ok: false, error: "self-send" };
        }

        const message = await this.deps.messages.create({ senderId, receiverId, content });
        const delivery = await this.deps.delivery.deliver(receiverId, message);
        this.deps.jobs.dispatch("message-sent", () => this.afterSend(message, receiver));
        return { ok: true, message, delivery };
    }

    async getPrivateMessages(userId: number, otherId: number, page: number, pageSize: number): Promise<ConversationPageResult> {
        const other = await this.deps.users.getById(otherId);
        if (!other) {
            return { ok: false, error: "user-not-found" };
        }
        const size = normalizePageSize(pageSize);
        const pageNumber = Number.isInteger(page) && page > 0 ? page : 1;

        this.deps.jobs.dispatch("conversation-opened", async () => {
            await this.deps.receipts.markConversationAsRead(userId, otherId);
        });

        const capacity = this.deps.cache.messageCapacity;
        if (pageNumber === 1 && size <= capacity) {
            const cached = await this.deps.cache.readMessages(userId, otherId);
            if (cached.hit) {
                return { ok: true, messages: cached.messages.slice(0, size), source: "cache" };
            }
            const newest = (await this.deps.messages.getConversationPage(userId, otherId, capacity, 0)).map(toCachedMessage);
            if (newest.length > 0) {
                this.deps.jobs.dispatch("populate-messages", async () => {
                    await this.deps.cache.populateMessages(userId, otherId, newest);
                });
            }
            return { ok: true, messages: newest.slice(0, size), source: "store" };
        }

        const messages = await this.deps.messages.getConversationPage(userId, otherId, size, (pageNumber - 1) * size);
        return { ok: true, messages: messages.map(toCachedMessage), source: "store" };
    }

    async getConversationList(userId: number, limit: number): Promise<CachedConversationSummary[]> {
        const capacity = this.deps.cache.conversationCapacity;
        const size = Number.isInteger(limit) && limit > 0 && limit <= capacity ? limit : capacity;

        const cached = await this.deps.cache.readSummaries(userId);
        if (cached.hit) {
            return cached.summaries.slice(0, size);
        }

        const summaries = await this.rebuildSummaries(userId, size);
        if (summaries.length > 0) {
            this.deps.jobs.dispatch("populate-summaries", async () => {
                await this.deps.cache.populateSummaries(userId, summaries);
            });
        }
        return summaries;
    }

    async getUnreadCount(userId: number): Promise<number> {
        const cached = await this.deps.unread.get(userId);
        if (cached !== null) {
            return cached;
        }
        const count = await this.deps.messages.countUnread(userId);
        await this.deps.unread.set(userId, count);
        return count;
    }

    async getUnreadMessages(userId: number): Promise<Message[]> {
        return await this.deps.messages.getUnread(userId);
    }

    async deleteMessage(userId: number, messageId: number): Promise<DeleteMessageResult> {
        const message = await this.deps.messages.getById(messageId);
        if (!message) {
            return { ok: false, error: "message-not-found" };
        }
        if (message.senderId !== userId) {
            return { ok: false, error: "forbidden" };
        }
        const deleted = await this.deps.messages.softDelete(messageId);
        if (!deleted) {
            return { ok: false, error: "message-not-found" };
        }
        this.deps.jobs.dispatch("message-deleted", async () => {
            await this.deps.cache.clearMessages(message.senderId, message.receiverId);
            await this.deps.cache.clearSummaries(message.senderId);
            await this.deps.cache.clearSummaries(message.receiverId);
            if (!message.isRead) {
                await this.deps.unread.reset(message.receiverId);
            }
        });
        return { ok: true };
    }

    private async afterSend(message: Message, receiver: User): Promise<void> {
        const { cache, unread, messages, users } = this.deps;
        await cache.appendMessage(message.senderId, message.receiverId, toCachedMessage(message));
        await unread.increment(message.receiverId);

        const sender = await users.getById(message.senderId);
        const [senderUnread, receiverUnread] = await Promise.all([
            messages.countUnreadFrom(message.senderId, message.receiverId),
            messages.countUnreadFrom(message.receiverId, message.senderId),
        ]);
        await cache.upsertConversationSummary(message.senderId, {
            counterpartId: receiver.id,
            counterpartName: displayName(receiver),
            lastMessage: message.content,
            lastMessageId: message.id,
            unreadCount: senderUnread,
            at: message.createdAt,
        });
        await cache.upsertConversationSummary(message.receiverId, {
            counterpartId: message.senderId,
            counterpartName: sender ? displayName(sender) : "",
            lastMessage: message.content,
            lastMessageId: message.id,
            unreadCount: receiverUnread,
            at: message.createdAt,
        });
    }

    private async rebuildSummaries(userId: number, limit: number): Promise<CachedConversationSummary[]> {
        const recent = await this.deps.messages.getRecentInvolving(userId, limit * 2);
        const latestByCounterpart = new Map<number, Message>();
        for (const message of recent) {
            const counterpart = message.senderId === userId ? message.receiverId : message.senderId;
            if (!latestByCounterpart.has(counterpart)) {
                latestByCounterpart.set(counterpart, message);
            }
        }
        if (latestByCounterpart.size === 0) {
            return [];
        }

        const [people, unreadBySender] = await Promise.all([
            this.deps.users.getByIds([...latestByCounterpart.keys()]),
            this.deps.messages.countUnreadBySender(userId),
        ]);

        const summaries: CachedConversationSummary[] = [];
        for (const [counterpart, message] of latestByCounterpart) {
            const person = people.get(counterpart);
            summaries.push({
                user_id: counterpart,
                username: person ? displayName(person) : "",
                last_message: message.content,
                last_message_id: message.id,
                last_time: message.createdAt.toISOString(),
                unread_count: unreadBySender.get(counterpart) ?? 0,
            });
        }
        return summaries.sort(byLatestActivity).slice(0, limit);
    }
}
