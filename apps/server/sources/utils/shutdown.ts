import { log } from "./log";

const shutdownHandlers = new Map<string, Array<() => Promise<void>>>();
const shutdownController = new AbortController();
let shutdownPromise: Promise<void> | null = null;

export const shutdownSignal = shutdownController.signal;

function runDetached(name: string, callback: () => Promise<void>): void {
    callback().catch((error: unknown) => log({ module: "shutdown", level: "error" }, `Error in shutdown handler ${name}:`, error));
}

export function onShutdown(name: string, callback: () => Promise<void>): () => void {
    if (shutdownSignal.aborted) {
        // Already shutting down: run right away
        runDetached(name, callback);
        return () => {};
    }

    let handlers = shutdownHandlers.get(name);
    if (!handlers) {
        handlers = [];
        shutdownHandlers.set(name, handlers);
    }
    const list = handlers;
    list.push(callback);

    return () => {
        const index = list.indexOf(callback);
        if (index !== -1) {
            list.splice(index, 1);
            if (list.length === 0) {
                shutdownHandlers.delete(name);
            }
        }
    };
}

export function isShutdown(): boolean {
    return shutdownSignal.aborted;
}

async function runShutdownHandlers(trigger: string): Promise<void> {
    if (shutdownPromise) {
        return await shutdownPromise;
    }

    shutdownPromise = (async () => {
        if (!shutdownSignal.aborted) {
            log(`Shutdown initiated: ${trigger}`);
            shutdownController.abort();
        }

        const snapshot = [...shutdownHandlers].map(([name, handlers]) => [name, [...handlers]] as const);
        const pending: Promise<void>[] = [];
        for (const [name, handlers] of snapshot) {
            log(`Starting ${handlers.length} shutdown handlers for: ${name}`);
            handlers.forEach((handler, index) => {
                pending.push(handler().then(
                    () => {},
                    (error: unknown) => log({ module: "shutdown", level: "error" }, `Error in shutdown handler ${name}[${index}]:`, error),
                ));
            });
        }

        if (pending.length > 0) {
            const startedAt = Date.now();
            await Promise.all(pending);
            log(`All ${pending.length} shutdown handlers completed in ${Date.now() - startedAt}ms`);
        }
    })();

    return await shutdownPromise;
}

export async function initiateShutdown(trigger: string): Promise<void> {
    return await runShutdownHandlers(trigger);
}

export async function awaitShutdown(): Promise<void> {
    await new Promise<void>((resolve) => {
        if (shutdownSignal.aborted) {
            resolve();
            return;
        }

        const finish = (reason?: string) => {
            if (reason) {
                log(`Received ${reason} signal. Exiting...`);
            }
            shutdownSignal.removeEventListener("abort", onAbort);
            process.removeListener("SIGINT", onSigint);
            process.removeListener("SIGTERM", onSigterm);
            resolve();
        };
        const onAbort = () => finish();
        const onSigint = () => finish("SIGINT");
        const onSigterm = () => finish("SIGTERM");

        shutdownSignal.addEventListener("abort", onAbort, { once: true });
        process.on("SIGINT", onSigint);
        process.on("SIGTERM", onSigterm);
    });
    await runShutdownHandlers("awaitShutdown");
}
