import { PGlite } from "@electric-sql/pglite";
import { readFile } from "node:fs/promises";
import { log } from "@/utils/log";

export type Database = PGlite;

let _db: PGlite | null = null;

export async function migrate(db: PGlite): Promise<void> {
    const schema = await readFile(new URL("./schema.sql", import.meta.url), "utf8");
    await db.exec(schema);
}

/** Opens an embedded Postgres. A null `dataDir` keeps everything in memory. */
export async function openDatabase(dataDir: string | null): Promise<PGlite> {
    const db = dataDir ? await PGlite.create(dataDir) : await PGlite.create();
    await migrate(db);
    return db;
}

export async function initDb(dataDir: string | null): Promise<PGlite> {
    if (_db) {
        return _db;
    }
    _db = await openDatabase(dataDir);
    log({ module: "db" }, dataDir ? `Database opened at ${dataDir}` : "Database opened in memory");
    return _db;
}

export async function shutdownDb(): Promise<void> {
    if (!_db) {
        return;
    }
    const db = _db;
    _db = null;
    await db.close();
}

export function toDate(value: unknown): Date {
    if (value instanceof Date) {
        return value;
    }
    if (typeof value === "string" || typeof value === "number") {
        return new Date(value);
    }
    throw new Error(`Expected a timestamp, got ${typeof value}`);
}
