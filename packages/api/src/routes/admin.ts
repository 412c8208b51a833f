// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/admin.ts
// Owner-only controls: contract toggle, token URI and the verifier set.
// Authorization is left to the ledger, which answers OwnerOnly (403).

import type { FastifyPluginAsync } from "fastify";
import type { RewardContract } from "@greenproof/core";

import { requireCaller } from "../middleware/identity.js";
import { sendResult } from "../reply.js";
import type { TokenUriBody, ToggleBody, VerifierBody } from "../types.js";

interface AdminRouteOptions {
    contract: RewardContract;
}

const adminRoute: FastifyPluginAsync<AdminRouteOptions> = async (fastify, opts) => {
    const { contract } = opts;

    fastify.put<{ Body: ToggleBody }>(
        "/v1/admin/contract",
        {
            schema: {
                summary: "Enable or disable action submissions",
                tags: ["Admin"],
                body: { type: "object", required: ["enabled"], properties: { enabled: { type: "boolean" } } },
            },
        },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            return sendResult(reply, contract.toggleContract(caller, request.body.enabled));
        },
    );

    fastify.put<{ Body: TokenUriBody }>(
        "/v1/admin/token-uri",
        {
            schema: {
                summary: "Update the token metadata URI",
                tags: ["Admin"],
                body: {
                    type: "object",
                    required: ["uri"],
                    properties: { uri: { type: ["string", "null"], maxLength: 256 } },
                },
            },
        },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            return sendResult(reply, contract.updateTokenUri(caller, request.body.uri));
        },
    );

    fastify.get("/v1/admin/verifiers", { schema: { summary: "Registered verifiers", tags: ["Admin"] } }, async (_request, reply) => {
        return reply.send({ owner: contract.owner, verifiers: contract.listVerifiers() });
    });

    fastify.post<{ Body: VerifierBody }>(
        "/v1/admin/verifiers",
        {
            schema: {
                summary: "Authorize a verifier",
                tags: ["Admin"],
                body: { type: "object", required: ["principal"], properties: { principal: { type: "string", minLength: 1 } } },
            },
        },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            return sendResult(reply, contract.addVerifier(caller, request.body.principal), 201);
        },
    );

    fastify.delete<{ Params: { principal: string } }>(
        "/v1/admin/verifiers/:principal",
        { schema: { summary: "Revoke a verifier", tags: ["Admin"] } },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            return sendResult(reply, contract.removeVerifier(caller, request.params.principal));
        },
    );
};

export default adminRoute;
