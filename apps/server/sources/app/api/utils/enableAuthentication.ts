import type { TokenVerifier } from "@/app/auth/auth";
import { extractBearerToken } from "@/app/auth/auth";
import { log } from "@/utils/log";
import type { Fastify } from "../types";

/**
 * Requires a valid bearer token on every route registered in this scope and
 * exposes the caller as `request.userId` / `request.username`.
 */
export function enableAuthentication(app: Fastify, verifier: TokenVerifier) {
    app.decorateRequest("userId", 0);
    app.decorateRequest("username", "");

    app.addHook("preHandler", async (request, reply) => {
        const token = extractBearerToken(request.headers.authorization);
        if (!token) {
            log({ module: "auth-decorator" }, `Auth failed - missing or invalid header on ${request.method} ${request.routeOptions.url ?? "unknown"}`);
            return reply.code(401).send({ error: "missing-authorization" });
        }

        const verified = await verifier.verifyToken(token);
        if (!verified) {
            log({ module: "auth-decorator" }, `Auth failed - invalid token on ${request.method} ${request.routeOptions.url ?? "unknown"}`);
            return reply.code(401).send({ error: "invalid-token" });
        }

        request.userId = verified.userId;
        request.username = verified.username;
    });
}
