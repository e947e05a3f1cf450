import fastify from "fastify";
import { serializerCompiler, validatorCompiler, type ZodTypeProvider } from "fastify-type-provider-zod";
import type { Server } from "socket.io";
import type { Core } from "@/app/core";
import { log } from "@/utils/log";
import { messageRoutes } from "./routes/messageRoutes";
import { presenceRoutes } from "./routes/presenceRoutes";
import { startSocket } from "./socket";
import type { Fastify } from "./types";
import { enableAuthentication } from "./utils/enableAuthentication";
import { enableErrorHandlers } from "./utils/enableErrorHandlers";
import { enableMonitoring } from "./utils/enableMonitoring";

export type ApiDeps = Pick<Core, "auth" | "registry" | "messageService" | "receipts" | "presence">;

/** Builds the HTTP app without listening. */
export async function buildApi(deps: ApiDeps): Promise<Fastify> {
    const app = fastify({
        logger: false,
        bodyLimit: 1024 * 1024,
    }).withTypeProvider<ZodTypeProvider>();
    app.setValidatorCompiler(validatorCompiler);
    app.setSerializerCompiler(serializerCompiler);

    enableErrorHandlers(app);
    enableMonitoring(app, { connections: () => deps.registry.connectionCount() });

    await app.register(async (scope) => {
        const api = scope.withTypeProvider<ZodTypeProvider>();
        enableAuthentication(api, deps.auth);
        messageRoutes(api, deps);
        presenceRoutes(api, deps);
    });

    return app;
}

export type RunningApi = {
    app: Fastify;
    io: Server;
};

/** Listens on `port` with the updates socket attached. The caller owns shutdown ordering. */
export async function startApi(deps: ApiDeps, port: number): Promise<RunningApi> {
    const app = await buildApi(deps);
    const io = startSocket(app, deps);

    await app.listen({ port, host: "0.0.0.0" });
    log({ module: "api" }, `Listening on port ${port}`);
    return { app, io };
}
