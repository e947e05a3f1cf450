import type { FastifyError } from "fastify";
import { httpRequestsCounter } from "@/app/monitoring/metrics";
import { errorMessage, log } from "@/utils/log";
import type { Fastify } from "../types";

export function enableErrorHandlers(app: Fastify) {
    app.setNotFoundHandler((request, reply) => {
        log({ module: "http", level: "warn", method: request.method }, `Route not found: ${request.url.split("?")[0]}`);
        return reply.code(404).send({ error: "not-found" });
    });

    app.setErrorHandler((error: FastifyError, request, reply) => {
        if (error.validation || error.code === "FST_ERR_VALIDATION") {
            return reply.code(400).send({ error: "invalid-request", message: error.message });
        }
        const statusCode = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
        if (statusCode >= 500) {
            log(
                { module: "http", level: "error", method: request.method, route: request.routeOptions.url ?? "unknown" },
                `Unhandled error: ${errorMessage(error)}`,
            );
            return reply.code(statusCode).send({ error: "internal-error" });
        }
        return reply.code(statusCode).send({ error: error.code || "request-error", message: error.message });
    });

    app.addHook("onResponse", async (request, reply) => {
        httpRequestsCounter.inc({
            method: request.method,
            route: request.routeOptions.url ?? "unknown",
            status: String(reply.statusCode),
        });
    });
}
