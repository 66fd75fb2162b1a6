// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/nodes.ts
// GET nodes — every node heard since start

import type { FastifyPluginAsync } from "fastify";
import type { QueryFacade } from "@meshgate/mesh";
import type { NodeEntry } from "../types.js";

interface NodesRouteOptions {
    facade: QueryFacade;
}

const nodesRoute: FastifyPluginAsync<NodesRouteOptions> = async (fastify, opts) => {
    fastify.get(
        "/nodes",
        {
            schema: {
                summary: "Seen nodes",
                tags: ["Nodes"],
            },
        },
        async (): Promise<Record<string, NodeEntry>> =>
            Object.fromEntries(
                [...opts.facade.listNodes()].map(([nodeId, n]) => [String(nodeId), { long_id: n.longId }]),
            ),
    );
};

export default nodesRoute;
