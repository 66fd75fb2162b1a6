// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/middleware/errors.ts
// Maps thrown MeshGate errors to HTTP answers. Registered with fastify-plugin
// so the handler applies to routes in every encapsulated context.

import type { FastifyError, FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import { MeshGateError } from "@meshgate/core";
import type { ErrorResponse } from "../types.js";

const errorsPlugin: FastifyPluginAsync = async (fastify) => {
    fastify.setErrorHandler<FastifyError | MeshGateError>((error, request, reply) => {
        if (error instanceof MeshGateError) {
            if (error.statusCode >= 500) {
                request.log.warn({ code: error.code }, error.message);
            }
            return reply.code(error.statusCode).send({
                error: { code: error.code, message: error.message },
            } satisfies ErrorResponse);
        }

        if (error.validation) {
            return reply.code(400).send({
                error: { code: "bad_request", message: error.message },
            } satisfies ErrorResponse);
        }

        request.log.error({ err: error }, "Unhandled error");
        return reply.code(500).send({
            error: { code: "internal_error", message: "Internal server error" },
        } satisfies ErrorResponse);
    });
};

export default fp(errorsPlugin, { name: "meshgate-errors" });
