import type { PGlite } from "@electric-sql/pglite";
import { toDate } from "@/storage/db";

export type UserStatus = "online" | "offline";

export type User = {
    id: number;
    username: string;
    nickname: string | null;
    status: string;
    lastSeen: Date | null;
    createdAt: Date;
};

export interface UserRepository {
    create(username: string, nickname?: string | null): Promise<User>;
    getById(id: number): Promise<User | null>;
    getByIds(ids: number[]): Promise<Map<number, User>>;
    updateStatus(id: number, status: UserStatus): Promise<void>;
}

export function displayName(user: Pick<User, "username" | "nickname">): string {
    const nickname = user.nickname?.trim();
    return nickname ? nickname : user.username;
}

type UserRow = {
    id: number;
    username: string;
    nickname: string | null;
    status: string;
    last_seen: unknown;
    created_at: unknown;
};

const USER_COLUMNS = "id, username, nickname, status, last_seen, created_at";

function mapUser(row: UserRow): User {
    return {
        id: row.id,
        username: row.username,
        nickname: row.nickname,
        status: row.status,
        lastSeen: row.last_seen === null ? null : toDate(row.last_seen),
        createdAt: toDate(row.created_at),
    };
}

export class PgUserRepository implements UserRepository {
    constructor(private readonly db: PGlite) {}

    async create(username: string, nickname: string | null = null): Promise<User> {
        const result = await this.db.query<UserRow>(
            `INSERT INTO app_user (username, nickname) VALUES ($1, $2) RETURNING ${USER_COLUMNS}`,
            [username, nickname],
        );
        return mapUser(result.rows[0]);
    }

    async getById(id: number): Promise<User | null> {
        const result = await this.db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM app_user WHERE id = $1`, [id]);
        return result.rows.length > 0 ? mapUser(result.rows[0]) : null;
    }

    async getByIds(ids: number[]): Promise<Map<number, User>> {
        const users = new Map<number, User>();
        if (ids.length === 0) {
            return users;
        }
        const placeholders = ids.map((_, index) => `$${index + 1}`).join(", ");
        const result = await this.db.query<UserRow>(`SELECT ${USER_COLUMNS} FROM app_user WHERE id IN (${placeholders})`, ids);
        for (const row of result.rows) {
            users.set(row.id, mapUser(row));
        }
        return users;
    }

    async updateStatus(id: number, status: UserStatus): Promise<void> {
        await this.db.query(
            "UPDATE app_user SET status = $2, last_seen = now(), updated_at = now() WHERE id = $1",
            [id, status],
        );
    }
}
