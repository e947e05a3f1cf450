import { log } from "@/utils/log";
import { initiateShutdown } from "./shutdown";

let installed = false;

export function registerProcessHandlers(): void {
    if (installed) {
        return;
    }
    installed = true;

    process.on("uncaughtException", (error) => {
        void handleFatal("uncaughtException", error);
    });

    process.on("unhandledRejection", (reason) => {
        void handleFatal("unhandledRejection", reason);
    });

    process.on("warning", (warning) => {
        log({ module: "process-warning", level: "warn", name: warning.name, stack: warning.stack }, `Process Warning: ${warning.message}`);
    });

    process.on("exit", (code) => {
        log(
            { module: "process-exit", level: code === 0 ? "info" : "error", exitCode: code },
            code === 0 ? "Process exiting normally" : `Process exiting with code: ${code}`,
        );
    });
}

export function shouldExitOnFatal(env: NodeJS.ProcessEnv): boolean {
    const flag = env.PARLEY_EXIT_ON_FATAL?.trim().toLowerCase();
    return flag !== "0" && flag !== "false" && env.NODE_ENV !== "test";
}

let fatalInProgress = false;

export async function handleFatal(type: "uncaughtException" | "unhandledRejection", reason: unknown): Promise<void> {
    if (fatalInProgress) {
        log({ module: "process-error", level: "warn", suppressed: true, fatalType: type, reason: String(reason) }, "Suppressed fatal event (already handling a fatal)");
        return;
    }
    fatalInProgress = true;

    const message = reason instanceof Error ? reason.message : String(reason);
    log(
        {
            module: "process-error",
            level: "error",
            name: reason instanceof Error ? reason.name : undefined,
            stack: reason instanceof Error ? reason.stack : undefined,
        },
        type === "uncaughtException" ? `Uncaught Exception: ${message}` : `Unhandled Rejection: ${message}`,
    );

    process.exitCode = 1;
    try {
        await initiateShutdown(`fatal:${type}`);
    } catch (error) {
        log({ module: "process-error", level: "error" }, "Fatal shutdown handler failure:", error);
    }

    if (shouldExitOnFatal(process.env)) {
        process.exit(1);
    }

    fatalInProgress = false;
}
