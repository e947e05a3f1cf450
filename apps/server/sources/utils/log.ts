import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = {
    module?: string;
    level?: LogLevel;
    [key: string]: unknown;
};

function resolveLevel(env: NodeJS.ProcessEnv): string {
    const explicit = env.PARLEY_LOG_LEVEL?.trim();
    if (explicit) {
        return explicit;
    }
    return env.NODE_ENV === "test" ? "silent" : "info";
}

const logger = pino({
    level: resolveLevel(process.env),
    base: { service: "parley-server" },
    ...(process.env.NODE_ENV === "development"
        ? { transport: { target: "pino-pretty", options: { colorize: true, translateTime: "SYS:HH:MM:ss.l" } } }
        : {}),
});

function formatPart(part: unknown): string {
    if (typeof part === "string") {
        return part;
    }
    if (part instanceof Error) {
        return part.stack ?? part.message;
    }
    try {
        return JSON.stringify(part);
    } catch {
        return String(part);
    }
}

export function log(context: LogContext | string, ...message: unknown[]): void {
    if (typeof context === "string") {
        logger.info([context, ...message].map(formatPart).join(" "));
        return;
    }
    const { level = "info", ...fields } = context;
    logger[level](fields, message.map(formatPart).join(" "));
}

export function debug(context: Omit<LogContext, "level">, ...message: unknown[]): void {
    log({ ...context, level: "debug" }, ...message);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
