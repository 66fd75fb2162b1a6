// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/status.ts
// GET status — radio connection state

import type { FastifyPluginAsync } from "fastify";
import type { QueryFacade } from "@meshgate/mesh";
import type { StatusResponse } from "../types.js";

interface StatusRouteOptions {
    facade: QueryFacade;
}

const statusRoute: FastifyPluginAsync<StatusRouteOptions> = async (fastify, opts) => {
    fastify.get(
        "/status",
        {
            schema: {
                summary: "Connection status",
                description: "Whether the gateway radio is connected, its node id, and how often the bridge has connected.",
                tags: ["System"],
            },
        },
        async (): Promise<StatusResponse> => {
            const status = opts.facade.getStatus();
            return {
                connected: status.isConnected,
                state: status.state,
                nodeid: status.localNodeId === null ? null : String(status.localNodeId),
                last_connection_time: status.lastConnectedAt ? status.lastConnectedAt.getTime() / 1000 : null,
                total_connection_attempts: status.connectionAttempts,
            };
        },
    );
};

export default statusRoute;
