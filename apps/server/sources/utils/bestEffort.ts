import { fastStoreFailuresCounter } from "@/app/monitoring/metrics";
import { errorMessage, log } from "@/utils/log";

/**
 * Runs a fast-store operation whose failure must not reach the caller.
 * The failure is logged at warn level and `fallback` is returned instead.
 */
export async function bestEffort<T>(component: string, operation: string, fn: () => Promise<T>, fallback: T): Promise<T> {
    try {
        return await fn();
    } catch (error) {
        fastStoreFailuresCounter.inc({ component, operation });
        log({ module: component, level: "warn", operation }, `${operation} failed: ${errorMessage(error)}`);
        return fallback;
    }
}
