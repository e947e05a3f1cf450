import type { PGlite } from "@electric-sql/pglite";
import { loadConfig } from "@/config";
import { createCore } from "@/app/core";
import { MemoryFastStore } from "@/storage/memoryFastStore";

/** Core over an in-process fast store with default configuration plus overrides. */
export function createTestCore(db: PGlite, overrides: Partial<ReturnType<typeof loadConfig>["connection"]> = {}) {
    const config = loadConfig({});
    const store = new MemoryFastStore();
    const core = createCore({
        store,
        db,
        config: { ...config, connection: { ...config.connection, ...overrides } },
    });
    return { ...core, store, config };
}
