import type { PGlite } from "@electric-sql/pglite";
import type { ParleyConfig } from "@/config";
import type { FastStore } from "@/storage/fastStore";
import { BackgroundJobs } from "@/utils/backgroundJobs";
import { DatabaseTokenVerifier } from "./auth/auth";
import { MessageCache } from "./cache/messageCache";
import { ConnectionRegistry } from "./connections/connectionRegistry";
import { ProtocolEngine } from "./connections/protocolEngine";
import { PgMessageRepository } from "./messages/messageRepository";
import { MessageService } from "./messages/messageService";
import { ReadReceiptService } from "./messages/readReceipts";
import { OfflineMessageQueue } from "./offline/offlineQueue";
import { PresenceTracker } from "./presence/presenceTracker";
import { UnreadCounter } from "./unread/unreadCounter";
import { PgUserRepository } from "./users/userRepository";

export type CoreConfig = Pick<ParleyConfig, "connection" | "presence" | "offline" | "cache" | "unread" | "jobs">;

export type Core = ReturnType<typeof createCore>;

/** Wires the delivery core over one fast store and one database. */
export function createCore(params: { store: FastStore; db: PGlite; config: CoreConfig }) {
    const { store, db, config } = params;

    const users = new PgUserRepository(db);
    const messages = new PgMessageRepository(db);
    const auth = new DatabaseTokenVerifier(db);
    const jobs = new BackgroundJobs(config.jobs);

    const presence = new PresenceTracker(store, { ttlMs: config.presence.ttlMs });
    const offline = new OfflineMessageQueue(store, config.offline);
    const cache = new MessageCache(store, config.cache);
    const unread = new UnreadCounter(store, config.unread);

    const receipts = new ReadReceiptService({ messages, unread, cache });
    const protocol = new ProtocolEngine({ presence, users, receipts });
    const registry = new ConnectionRegistry({
        presence,
        offline,
        protocol,
        users,
        messages,
        options: config.connection,
    });
    const messageService = new MessageService({
        messages,
        users,
        cache,
        unread,
        receipts,
        delivery: registry,
        jobs,
    });

    return {
        users,
        messages,
        auth,
        jobs,
        presence,
        offline,
        cache,
        unread,
        receipts,
        protocol,
        registry,
        messageService,
    };
}
