import type { PGlite } from "@electric-sql/pglite";
import { openDatabase } from "@/storage/db";

export async function createTestDatabase(): Promise<PGlite> {
    return await openDatabase(null);
}

export async function resetDatabase(db: PGlite): Promise<void> {
    await db.exec("TRUNCATE message, auth_token, app_user RESTART IDENTITY CASCADE");
}
