// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/middleware/identity.ts
// Caller identity for the GreenProof REST API.
// The host's gateway authenticates users and forwards the principal in
// `x-greenproof-principal`; this plugin never derives identity itself.
// An optional shared API key keeps anything but that gateway out.

import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import fp from "fastify-plugin";

import type { ApiErrorBody } from "../types.js";

export const PRINCIPAL_HEADER = "x-greenproof-principal";

declare module "fastify" {
    interface FastifyRequest {
        caller: string | null;
    }
}

export interface IdentityOptions {
    /** Required API key — if undefined, key checks are disabled */
    apiKey?: string;
}

const identityPlugin: FastifyPluginAsync<IdentityOptions> = async (fastify, opts) => {
    fastify.decorateRequest("caller", null);

    fastify.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
        if (opts.apiKey && request.url !== "/v1/health") {
            const authHeader = request.headers["authorization"];
            const keyHeader = request.headers["x-api-key"];
            const token = authHeader?.startsWith("Bearer ")
                ? authHeader.slice(7)
                : typeof keyHeader === "string"
                  ? keyHeader
                  : undefined;

            if (token !== opts.apiKey) {
                return reply.code(401).send({
                    error: {
                        code: "InvalidApiKey",
                        message: "Invalid API key. Pass it via 'Authorization: Bearer <key>' or 'x-api-key: <key>'.",
                    },
                } satisfies ApiErrorBody);
            }
        }

        const principal = request.headers[PRINCIPAL_HEADER];
        request.caller = typeof principal === "string" && principal.length > 0 ? principal : null;
    });
};

/** The authenticated caller, or a 401 reply when the gateway sent none. */
export function requireCaller(request: FastifyRequest, reply: FastifyReply): string | null {
    if (request.caller) return request.caller;
    void reply.code(401).send({
        error: {
            code: "Unauthenticated",
            message: `Missing caller principal. The gateway must set '${PRINCIPAL_HEADER}'.`,
        },
    } satisfies ApiErrorBody);
    return null;
}

export default fp(identityPlugin, { name: "greenproof-identity" });
