import { startApi } from '@/app/api/api';
import { createCore } from '@/app/core';
import { enableDefaultMetrics } from '@/app/monitoring/metrics';
import { startPresenceSweep } from '@/app/presence/presenceTracker';
import { loadConfig } from '@/config';
import { initDb, shutdownDb } from '@/storage/db';
import type { FastStore } from '@/storage/fastStore';
import { MemoryFastStore } from '@/storage/memoryFastStore';
import { getRedisClient, RedisFastStore, shutdownRedisClient } from '@/storage/redis';
import { log } from '@/utils/log';
import { awaitShutdown, onShutdown } from '@/utils/shutdown';

export type ServerFlavor = 'full' | 'light';

/** Full flavor needs Redis; light keeps the fast store in process. */
export function getServerFlavor(redisUrl: string | null): ServerFlavor {
    return redisUrl ? 'full' : 'light';
}

async function openFastStore(flavor: ServerFlavor): Promise<FastStore> {
    if (flavor === 'light') {
        log({ module: 'fast-store' }, 'REDIS_URL not set, using the in-process fast store');
        return new MemoryFastStore();
    }
    const redis = getRedisClient();
    await redis.ping();
    return new RedisFastStore(redis);
}

export async function startServer(env: NodeJS.ProcessEnv = process.env): Promise<void> {
    const config = loadConfig(env);
    const flavor = getServerFlavor(config.redisUrl);
    enableDefaultMetrics();

    // Storage
    const db = await initDb(config.dbDir);
    const store = await openFastStore(flavor);
    const core = createCore({ store, db, config });

    //
    // Start
    //

    const { app, io } = await startApi(core, config.port);
    const sweep = startPresenceSweep(core.presence, config.presence.sweepIntervalMs);

    // One handler so teardown runs in order: connections, then listeners, then storage.
    onShutdown('server', async () => {
        sweep?.stop();
        await core.registry.closeAll();
        await io.close();
        await app.close();
        await core.jobs.onIdle();
        await shutdownDb();
        if (flavor === 'full') {
            await shutdownRedisClient();
        }
    });

    //
    // Ready
    //

    log({ module: 'server', flavor }, 'Ready');
    await awaitShutdown();
    log('Shutting down...');
}
