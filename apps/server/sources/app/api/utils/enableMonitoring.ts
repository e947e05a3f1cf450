import { metricsRegistry } from "@/app/monitoring/metrics";
import type { Fastify } from "../types";

export function enableMonitoring(app: Fastify, status: { connections: () => number }) {
    app.get("/health", async (_request, reply) => {
        return reply.send({
            status: "ok",
            service: "parley-server",
            timestamp: new Date().toISOString(),
            connections: status.connections(),
        });
    });

    app.get("/metrics", async (_request, reply) => {
        const body = await metricsRegistry.metrics();
        return reply.header("content-type", metricsRegistry.contentType).send(body);
    });
}
