import type { PGlite } from "@electric-sql/pglite";
import { toDate } from "@/storage/db";

export type Message = {
    id: number;
    senderId: number;
    receiverId: number;
    content: string;
    msgType: string;
    status: string;
    isRead: boolean;
    createdAt: Date;
    updatedAt: Date;
};

export type NewMessage = {
    senderId: number;
    receiverId: number;
    content: string;
    msgType?: string;
    createdAt?: Date;
};

export interface MessageRepository {
    create(message: NewMessage): Promise<Message>;
    getById(id: number): Promise<Message | null>;
    /** Newest first. */
    getConversationPage(userId: number, otherId: number, limit: number, offset: number): Promise<Message[]>;
    /** Oldest first. */
    getUnread(userId: number): Promise<Message[]>;
    markAsRead(id: number): Promise<boolean>;
    markConversationAsRead(userId: number, otherId: number): Promise<number>;
    markAllAsRead(userId: number): Promise<number>;
    countUnread(userId: number): Promise<number>;
    countUnreadFrom(userId: number, senderId: number): Promise<number>;
    countUnreadBySender(userId: number): Promise<Map<number, number>>;
    /** Newest messages sent or received by the user, newest first. */
    getRecentInvolving(userId: number, limit: number): Promise<Message[]>;
    softDelete(id: number): Promise<boolean>;
}

type MessageRow = {
    id: number;
    sender_id: number;
    receiver_id: number;
    content: string;
    msg_type: string;
    status: string;
    is_read: boolean;
    created_at: unknown;
    updated_at: unknown;
};

const MESSAGE_COLUMNS = "id, sender_id, receiver_id, content, msg_type, status, is_read, created_at, updated_at";

function mapMessage(row: MessageRow): Message {
    return {
        id: row.id,
        senderId: row.sender_id,
        receiverId: row.receiver_id,
        content: row.content,
        msgType: row.msg_type,
        status: row.status,
        isRead: row.is_read,
        createdAt: toDate(row.created_at),
        updatedAt: toDate(row.updated_at),
    };
}

export class PgMessageRepository implements MessageRepository {
    constructor(private readonly db: PGlite) {}

    async create(message: NewMessage): Promise<Message> {
        const result = await this.db.query<MessageRow>(
            `INSERT INTO message (sender_id, receiver_id, content, msg_type, created_at, updated_at)
             VALUES ($1, $2, $3, $4, COALESCE($5::timestamptz, now()), COALESCE($5::timestamptz, now()))
             RETURNING ${MESSAGE_COLUMNS}`,
            [message.senderId, message.receiverId, message.content, message.msgType ?? "text", message.createdAt?.toISOString() ?? null],
        );
        return mapMessage(result.rows[0]);
    }

    async getById(id: number): Promise<Message | null> {
        const result = await this.db.query<MessageRow>(
            `SELECT ${MESSAGE_COLUMNS} FROM message WHERE id = $1 AND deleted_at IS NULL`,
            [id],
        );
        return result.rows.length > 0 ? mapMessage(result.rows[0]) : null;
    }

    async getConversationPage(userId: number, otherId: number, limit: number, offset: number): Promise<Message[]> {
        const result = await this.db.query<MessageRow>(
            `SELECT ${MESSAGE_COLUMNS} FROM message
             WHERE deleted_at IS NULL
               AND ((sender_id = $1 AND receiver_id = $2) OR (sender_id = $2 AND receiver_id = $1))
             ORDER BY created_at DESC, id DESC
             LIMIT $3 OFFSET $4`,
            [userId, otherId, limit, offset],
        );
        return result.rows.map(mapMessage);
    }

    async getUnread(userId: number): Promise<Message[]> {
        const result = await this.db.query<MessageRow>(
            `SELECT ${MESSAGE_COLUMNS} FROM message
             WHERE receiver_id = $1 AND is_read = false AND deleted_at IS NULL
             ORDER BY created_at ASC, id ASC`,
            [userId],
        );
        return result.rows.map(mapMessage);
    }

    async markAsRead(id: number): Promise<boolean> {
        const result = await this.db.query(
            `UPDATE message SET is_read = true, status = 'read', updated_at = now()
             WHERE id = $1 AND is_read = false AND deleted_at IS NULL`,
            [id],
        );
        return (result.affectedRows ?? 0) > 0;
    }

    async markConversationAsRead(userId: number, otherId: number): Promise<number> {
        const result = await this.db.query(
            `UPDATE message SET is_read = true, status = 'read', updated_at = now()
             WHERE receiver_id = $1 AND sender_id = $2 AND is_read = false AND deleted_at IS NULL`,
            [userId, otherId],
        );
        return result.affectedRows ?? 0;
    }

    async markAllAsRead(userId: number): Promise<number> {
        const result = await this.db.query(
            `UPDATE message SET is_read = true, status = 'read', updated_at = now()
             WHERE receiver_id = $1 AND is_read = false AND deleted_at IS NULL`,
            [userId],
        );
        return result.affectedRows ?? 0;
    }

    async countUnread(userId: number): Promise<number> {
        const result = await this.db.query<{ count: number }>(
            "SELECT count(*)::int AS count FROM message WHERE receiver_id = $1 AND is_read = false AND deleted_at IS NULL",
            [userId],
        );
        return result.rows[0]?.count ?? 0;
    }

    async countUnreadFrom(userId: number, senderId: number): Promise<number> {
        const result = await this.db.query<{ count: number }>(
            `SELECT count(*)::int AS count FROM message
             WHERE receiver_id = $1 AND sender_id = $2 AND is_read = false AND deleted_at IS NULL`,
            [userId, senderId],
        );
        return result.rows[0]?.count ?? 0;
    }

    async countUnreadBySender(userId: number): Promise<Map<number, number>> {
        const result = await this.db.query<{ sender_id: number; count: number }>(
            `SELECT sender_id, count(*)::int AS count FROM message
             WHERE receiver_id = $1 AND is_read = false AND deleted_at IS NULL
             GROUP BY sender_id`,
            [userId],
        );
        return new Map(result.rows.map((row) => [row.sender_id, row.count]));
    }

    async getRecentInvolving(userId: number, limit: number): Promise<Message[]> {
        const result = await this.db.query<MessageRow>(
            `SELECT ${MESSAGE_COLUMNS} FROM message
             WHERE deleted_at IS NULL AND (sender_id = $1 OR receiver_id = $1)
             ORDER BY created_at DESC, id DESC
             LIMIT $2`,
            [userId, limit],
        );
        return result.rows.map(mapMessage);
    }

    async softDelete(id: number): Promise<boolean> {
        const result = await this.db.query(
            "UPDATE message SET deleted_at = now(), updated_at = now() WHERE id = $1 AND deleted_at IS NULL",
            [id],
        );
        return (result.affectedRows ?? 0) > 0;
    }
}
