// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/messages.ts
// send_message, get_last_messages, delete_message.
// Parameters come from the query string; POST also accepts a JSON body.

import type { FastifyPluginAsync } from "fastify";
import type { Ack, QueryFacade } from "@meshgate/mesh";
import type { MessageEntry } from "../types.js";

interface MessagesRouteOptions {
    facade: QueryFacade;
}

interface SendParams {
    message?: string;
    node_id?: string;
}

interface DeleteParams {
    message_id?: string;
}

const ackSchema = {
    type: "object",
    properties: {
        status: { type: "string" },
        message: { type: "string" },
    },
} as const;

const sendParamsSchema = {
    type: "object",
    properties: {
        message: { type: "string", description: "Text to send" },
        node_id: { type: "string", description: "Destination node id; broadcast when omitted" },
    },
} as const;

const deleteParamsSchema = {
    type: "object",
    properties: {
        message_id: { type: "string" },
    },
} as const;

const messagesRoute: FastifyPluginAsync<MessagesRouteOptions> = async (fastify, opts) => {
    const { facade } = opts;

    fastify.get<{ Querystring: SendParams }>(
        "/send_message",
        {
            schema: {
                summary: "Send a text message",
                tags: ["Messages"],
                querystring: sendParamsSchema,
                response: { 200: ackSchema },
            },
        },
        async (request): Promise<Ack> => facade.sendMessage(request.query.message, request.query.node_id),
    );

    fastify.post<{ Querystring: SendParams; Body: SendParams | undefined }>(
        "/send_message",
        {
            schema: {
                summary: "Send a text message",
                tags: ["Messages"],
                querystring: sendParamsSchema,
                response: { 200: ackSchema },
            },
        },
        async (request): Promise<Ack> =>
            facade.sendMessage(
                request.body?.message ?? request.query.message,
                request.body?.node_id ?? request.query.node_id,
            ),
    );

    fastify.get(
        "/get_last_messages",
        {
            schema: {
                summary: "Cached inbound text messages",
                description: "Most recent messages, oldest first. The cache keeps a fixed number of messages.",
                tags: ["Messages"],
            },
        },
        async (): Promise<MessageEntry[]> =>
            [...facade.getLastMessages().values()].map((m) => ({
                id: m.id,
                node_id: m.nodeId,
                message: m.text,
            })),
    );

    fastify.get<{ Querystring: DeleteParams }>(
        "/delete_message",
        {
            schema: {
                summary: "Delete a cached message",
                tags: ["Messages"],
                querystring: deleteParamsSchema,
                response: { 200: ackSchema },
            },
        },
        async (request): Promise<Ack> => facade.deleteMessage(request.query.message_id),
    );

    fastify.post<{ Querystring: DeleteParams; Body: DeleteParams | undefined }>(
        "/delete_message",
        {
            schema: {
                summary: "Delete a cached message",
                tags: ["Messages"],
                querystring: deleteParamsSchema,
                response: { 200: ackSchema },
            },
        },
        async (request): Promise<Ack> =>
            facade.deleteMessage(request.body?.message_id ?? request.query.message_id),
    );
};

export default messagesRoute;
