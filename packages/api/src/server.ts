// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/server.ts
// The MeshGate REST API server. Every route lives under api.prefix (default /api/mesh).
//
// Endpoints:
//   GET|POST send_message?message=&node_id=   ← send text, broadcast without node_id
//   GET      get_device_telemetry             ← latest device metrics per node
//   GET      get_environment_telemetry        ← latest environment metrics per node
//   GET      get_last_messages                ← cached inbound messages, oldest first
//   GET|POST delete_message?message_id=       ← drop a cached message
//   GET      nodes                            ← nodes heard since start
//   GET      status                           ← radio connection state
//   GET      /docs                            ← Swagger UI (if enabled)

import Fastify from "fastify";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { VERSION } from "@meshgate/core";

import type { ApiServerOptions } from "./types.js";
import errorsPlugin from "./middleware/errors.js";
import messagesRoute from "./routes/messages.js";
import telemetryRoute from "./routes/telemetry.js";
import nodesRoute from "./routes/nodes.js";
import statusRoute from "./routes/status.js";

export async function createServer(opts: ApiServerOptions) {
    const { facade, config, logger } = opts;

    const fastify = Fastify(logger ? { loggerInstance: logger } : {});

    // ── Swagger / OpenAPI docs ──────────────────────────────────────────────────
    if (config.swagger) {
        await fastify.register(swagger, {
            openapi: {
                openapi: "3.0.0",
                info: {
                    title: "MeshGate REST API",
                    description:
                        "Query telemetry, messages and nodes from a mesh radio network, " +
                        "and send text messages through the connected gateway radio.",
                    version: VERSION,
                },
                servers: [{ url: `http://${config.host}:${config.port}`, description: "MeshGate" }],
                tags: [
                    { name: "Messages", description: "Send, list and delete text messages" },
                    { name: "Telemetry", description: "Latest device and environment readings" },
                    { name: "Nodes", description: "Nodes heard on the mesh" },
                    { name: "System", description: "Connection status" },
                ],
            },
        });

        await fastify.register(swaggerUi, {
            routePrefix: "/docs",
            uiConfig: { docExpansion: "list" },
        });

        // Root redirect
        fastify.get("/", { schema: { hide: true } }, async (_req, reply) => {
            return reply.redirect("/docs");
        });
    }

    await fastify.register(errorsPlugin);

    // ── Register routes ──────────────────────────────────────────────────────────
    await fastify.register(messagesRoute, { prefix: config.prefix, facade });
    await fastify.register(telemetryRoute, { prefix: config.prefix, facade });
    await fastify.register(nodesRoute, { prefix: config.prefix, facade });
    await fastify.register(statusRoute, { prefix: config.prefix, facade });

    return fastify;
}
