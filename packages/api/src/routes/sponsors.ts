// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/sponsors.ts
// Sponsor registration and contributions to the reward pool.

import type { FastifyPluginAsync } from "fastify";
import type { RewardContract } from "@greenproof/core";

import { requireCaller } from "../middleware/identity.js";
import { sendNotFound, sendResult } from "../reply.js";
import type { ContributeBody, RegisterSponsorBody } from "../types.js";

interface SponsorsRouteOptions {
    contract: RewardContract;
}

const sponsorsRoute: FastifyPluginAsync<SponsorsRouteOptions> = async (fastify, opts) => {
    const { contract } = opts;

    fastify.post<{ Body: RegisterSponsorBody }>(
        "/v1/sponsors",
        {
            schema: {
                summary: "Register (or re-register) the caller as a sponsor",
                tags: ["Sponsors"],
                body: {
                    type: "object",
                    required: ["name"],
                    properties: { name: { type: "string", minLength: 1, maxLength: 50 } },
                },
            },
        },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            return sendResult(reply, contract.registerSponsor(caller, request.body.name), 201);
        },
    );

    fastify.post<{ Body: ContributeBody }>(
        "/v1/sponsors/contributions",
        {
            schema: {
                summary: "Contribute native currency to the reward pool",
                tags: ["Sponsors"],
                body: {
                    type: "object",
                    required: ["amount"],
                    properties: { amount: { type: "integer", minimum: 0 } },
                },
            },
        },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            return sendResult(reply, contract.sponsorContribute(caller, request.body.amount));
        },
    );

    fastify.get<{ Params: { principal: string } }>(
        "/v1/sponsors/:principal",
        { schema: { summary: "Sponsor record and recent contributions", tags: ["Sponsors"] } },
        async (request, reply) => {
            const { principal } = request.params;
            const sponsor = contract.getSponsorInfo(principal);
            if (!sponsor) return sendNotFound(reply, `No sponsor registered for ${principal}`);
            return reply.send({ ...sponsor, contributions: contract.getSponsorContributions(principal) });
        },
    );
};

export default sponsorsRoute;
