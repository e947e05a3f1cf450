import type { PGlite } from "@electric-sql/pglite";
import { displayName } from "@/app/users/userRepository";

export type VerifiedUser = {
    userId: number;
    username: string;
};

export interface TokenVerifier {
    verifyToken(token: string): Promise<VerifiedUser | null>;
}

/** Bearer tokens issued elsewhere and stored in `auth_token`. */
export class DatabaseTokenVerifier implements TokenVerifier {
    constructor(private readonly db: PGlite) {}

    async verifyToken(token: string): Promise<VerifiedUser | null> {
        const trimmed = token.trim();
        if (!trimmed) {
            return null;
        }
        const result = await this.db.query<{ id: number; username: string; nickname: string | null }>(
            `SELECT u.id, u.username, u.nickname
             FROM auth_token t JOIN app_user u ON u.id = t.user_id
             WHERE t.token = $1 AND (t.expires_at IS NULL OR t.expires_at > now())`,
            [trimmed],
        );
        const row = result.rows[0];
        if (!row) {
            return null;
        }
        return { userId: row.id, username: displayName(row) };
    }

    async issueToken(userId: number, token: string, expiresAt: Date | null = null): Promise<void> {
        await this.db.query(
            "INSERT INTO auth_token (token, user_id, expires_at) VALUES ($1, $2, $3::timestamptz)",
            [token, userId, expiresAt?.toISOString() ?? null],
        );
    }
}

/** Accepts `Bearer <token>` or a bare token. */
export function extractBearerToken(value: string | undefined | null): string | null {
    if (!value) {
        return null;
    }
    const match = /^Bearer\s+(.+)$/i.exec(value.trim());
    const token = (match ? match[1] : value).trim();
    return token.length > 0 ? token : null;
}
