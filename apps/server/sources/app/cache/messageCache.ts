import { z } from "zod";
import type { FastStore } from "@/storage/fastStore";
import { bestEffort } from "@/utils/bestEffort";
import { cacheLookupsCounter } from "@/app/monitoring/metrics";
import { BoundedList } from "./boundedList";

const COMPONENT = "message-cache";

export const CachedMessageSchema = z.object({
    id: z.number().int().positive(),
    sender_id: z.number().int().positive(),
    receiver_id: z.number().int().positive(),
    content: z.string(),
    is_read: z.boolean(),
    created_at: z.string(),
    updated_at: z.string(),
});

export type CachedMessage = z.infer<typeof CachedMessageSchema>;

export const CachedConversationSummarySchema = z.object({
    user_id: z.number().int().positive(),
    username: z.string(),
    last_message: z.string(),
    last_message_id: z.number().int().positive(),
    last_time: z.string(),
    unread_count: z.number().int().min(0),
});

export type CachedConversationSummary = z.infer<typeof CachedConversationSummarySchema>;

export type SummaryUpdate = {
    counterpartId: number;
    /** Empty keeps the cached name. */
    counterpartName: string;
    lastMessage: string;
    lastMessageId: number;
    unreadCount: number;
    at: Date;
};

export type MessageCacheOptions = {
    messageCapacity: number;
    conversationCapacity: number;
    ttlMs: number;
};

/** The same key for (a, b) and (b, a). */
export function conversationKey(a: number, b: number): string {
    return a < b ? `chat:${a}:${b}` : `chat:${b}:${a}`;
}

function summariesKey(ownerId: number): string {
    return `conversations:${ownerId}`;
}

function byNewestMessage(a: CachedMessage, b: CachedMessage): number {
    return Date.parse(b.created_at) - Date.parse(a.created_at) || b.id - a.id;
}

export function byLatestActivity(a: CachedConversationSummary, b: CachedConversationSummary): number {
    return Date.parse(b.last_time) - Date.parse(a.last_time) || b.last_message_id - a.last_message_id;
}

/**
 * Cache-aside layer over the durable store: the newest messages of each pair and the
 * newest conversation summaries of each user. Failures degrade to misses.
 */
export class MessageCache {
    private readonly messages: BoundedList<CachedMessage>;
    private readonly summaries: BoundedList<CachedConversationSummary>;

    constructor(store: FastStore, options: MessageCacheOptions) {
        this.messages = new BoundedList(store, { schema: CachedMessageSchema, capacity: options.messageCapacity, ttlMs: options.ttlMs });
        this.summaries = new BoundedList(store, { schema: CachedConversationSummarySchema, capacity: options.conversationCapacity, ttlMs: options.ttlMs });
    }

    get messageCapacity(): number {
        return this.messages.capacity;
    }

    get conversationCapacity(): number {
        return this.summaries.capacity;
    }

    appendMessage(a: number, b: number, message: CachedMessage): Promise<boolean> {
        return bestEffort(COMPONENT, "appendMessage", async () => {
            await this.messages.pushFront(conversationKey(a, b), message);
            return true;
        }, false);
    }

    async readMessages(a: number, b: number): Promise<{ messages: CachedMessage[]; hit: boolean }> {
        const messages = await bestEffort(COMPONENT, "readMessages", () => this.messages.read(conversationKey(a, b)), null);
        const hit = messages !== null && messages.length > 0;
        cacheLookupsCounter.inc({ cache: "messages", result: hit ? "hit" : "miss" });
        return { messages: messages ?? [], hit };
    }

    populateMessages(a: number, b: number, messages: CachedMessage[]): Promise<boolean> {
        return bestEffort(COMPONENT, "populateMessages", async () => {
            await this.messages.write(conversationKey(a, b), [...messages].sort(byNewestMessage));
            return true;
        }, false);
    }

    clearMessages(a: number, b: number): Promise<boolean> {
        return bestEffort(COMPONENT, "clearMessages", async () => {
            await this.messages.clear(conversationKey(a, b));
            return true;
        }, false);
    }

    /** Replaces the owner's summary for the counterpart, or inserts it, then re-sorts. */
    upsertConversationSummary(ownerId: number, update: SummaryUpdate): Promise<boolean> {
        return bestEffort(COMPONENT, "upsertSummary", async () => {
            await this.summaries.update(summariesKey(ownerId), (current) => {
                const existing = current.find((summary) => summary.user_id === update.counterpartId);
                const next: CachedConversationSummary = {
                    user_id: update.counterpartId,
                    username: update.counterpartName || existing?.username || "",
                    last_message: update.lastMessage,
                    last_message_id: update.lastMessageId,
                    last_time: update.at.toISOString(),
                    unread_count: Math.max(0, update.unreadCount),
                };
                return [next, ...current.filter((summary) => summary.user_id !== update.counterpartId)].sort(byLatestActivity);
            });
            return true;
        }, false);
    }

    async readSummaries(ownerId: number): Promise<{ summaries: CachedConversationSummary[]; hit: boolean }> {
        const summaries = await bestEffort(COMPONENT, "readSummaries", () => this.summaries.read(summariesKey(ownerId)), null);
        const hit = summaries !== null && summaries.length > 0;
        cacheLookupsCounter.inc({ cache: "conversations", result: hit ? "hit" : "miss" });
        return { summaries: summaries ?? [], hit };
    }

    populateSummaries(ownerId: number, summaries: CachedConversationSummary[]): Promise<boolean> {
        return bestEffort(COMPONENT, "populateSummaries", async () => {
            await this.summaries.write(summariesKey(ownerId), [...summaries].sort(byLatestActivity));
            return true;
        }, false);
    }

    clearSummaries(ownerId: number): Promise<boolean> {
        return bestEffort(COMPONENT, "clearSummaries", async () => {
            await this.summaries.clear(summariesKey(ownerId));
            return true;
        }, false);
    }
}
