import { HANDSHAKE_ERRORS, SOCKET_EVENTS, UPDATES_SOCKET_PATH } from "@parley/protocol";
import { Server } from "socket.io";
import type { TokenVerifier } from "@/app/auth/auth";
import { extractBearerToken } from "@/app/auth/auth";
import type { ConnectionRegistry } from "@/app/connections/connectionRegistry";
import { SocketTransport, type TransportSocket } from "@/app/connections/socketTransport";
import { websocketEventsCounter } from "@/app/monitoring/metrics";
import { errorMessage, log } from "@/utils/log";
import type { Fastify } from "./types";

export type SocketHandshake = {
    auth: Record<string, unknown>;
    query: Record<string, unknown>;
    headers: Record<string, string | string[] | undefined>;
};

/** The token may come from the socket.io auth payload, the `token` query parameter or a Bearer subprotocol header. */
export function resolveHandshakeToken(handshake: SocketHandshake): string | null {
    const fromAuth = handshake.auth.token;
    if (typeof fromAuth === "string" && fromAuth.trim()) {
        return fromAuth.trim();
    }
    const fromQuery = handshake.query.token;
    if (typeof fromQuery === "string" && fromQuery.trim()) {
        return fromQuery.trim();
    }
    const protocolHeader = handshake.headers["sec-websocket-protocol"];
    const protocols = (Array.isArray(protocolHeader) ? protocolHeader.join(",") : protocolHeader ?? "")
        .split(",")
        .map((part) => part.trim());
    for (const protocol of protocols) {
        if (/^Bearer\s+/i.test(protocol)) {
            return extractBearerToken(protocol);
        }
    }
    return null;
}

export type SocketDeps = {
    auth: TokenVerifier;
    registry: ConnectionRegistry;
};

/** Authenticates the handshake and admits the connection. Failures emit `error` and disconnect. */
export async function handleSocketConnection(socket: TransportSocket & { handshake: SocketHandshake }, deps: SocketDeps): Promise<void> {
    log({ module: "websocket" }, `New connection attempt from socket: ${socket.id}`);
    websocketEventsCounter.inc({ event_type: "connect" });

    const token = resolveHandshakeToken(socket.handshake);
    if (!token) {
        log({ module: "websocket" }, "No token provided");
        socket.emit(SOCKET_EVENTS.error, { message: HANDSHAKE_ERRORS.missingToken });
        socket.disconnect();
        return;
    }

    const verified = await deps.auth.verifyToken(token);
    if (!verified) {
        log({ module: "websocket" }, "Invalid token provided");
        socket.emit(SOCKET_EVENTS.error, { message: HANDSHAKE_ERRORS.invalidToken });
        socket.disconnect();
        return;
    }
    if (!socket.connected) {
        log({ module: "websocket" }, `Socket ${socket.id} left during authentication`);
        return;
    }

    socket.on("disconnect", () => {
        websocketEventsCounter.inc({ event_type: "disconnect" });
    });

    await deps.registry.admit(verified.userId, verified.username, new SocketTransport(socket));
    log({ module: "websocket" }, `User connected: ${verified.userId}, socketId: ${socket.id}`);
}

export function startSocket(app: Fastify, deps: SocketDeps): Server {
    const io = new Server(app.server, {
        cors: {
            origin: "*",
            methods: ["GET", "POST", "OPTIONS"],
            credentials: true,
            allowedHeaders: ["*"],
        },
        transports: ["websocket", "polling"],
        pingTimeout: 45000,
        pingInterval: 15000,
        path: UPDATES_SOCKET_PATH,
        allowUpgrades: true,
        upgradeTimeout: 10000,
        connectTimeout: 20000,
        serveClient: false,
    });

    io.on("connection", (socket) => {
        handleSocketConnection(socket, deps).catch((error: unknown) => {
            log({ module: "websocket", level: "error" }, `Connection setup failed: ${errorMessage(error)}`);
            socket.disconnect(true);
        });
    });

    return io;
}
