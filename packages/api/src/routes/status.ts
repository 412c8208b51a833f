// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/status.ts
// GET /v1/health, /v1/status, user statistics, leaderboard and audit.

import type { FastifyPluginAsync } from "fastify";
import { VERSION, type RewardContract } from "@greenproof/core";

import type { StatusResponse } from "../types.js";

interface StatusRouteOptions {
    contract: RewardContract;
}

const statusRoute: FastifyPluginAsync<StatusRouteOptions> = async (fastify, opts) => {
    const { contract } = opts;

    fastify.get("/v1/health", { schema: { summary: "Liveness", tags: ["System"] } }, async (_request, reply) => {
        return reply.send({ status: "ok", version: VERSION });
    });

    fastify.get("/v1/status", { schema: { summary: "Contract status and global totals", tags: ["System"] } }, async (_request, reply) => {
        return reply.send({ status: "ok", version: VERSION, ...contract.getTotals() } satisfies StatusResponse);
    });

    fastify.get("/v1/audit", { schema: { summary: "Ledger invariant audit", tags: ["System"] } }, async (_request, reply) => {
        const result = contract.audit();
        return reply.code(result.passed ? 200 : 500).send(result);
    });

    fastify.get<{ Params: { principal: string } }>(
        "/v1/users/:principal/stats",
        { schema: { summary: "Per-user statistics (zero when unknown)", tags: ["Users"] } },
        async (request, reply) => {
            return reply.send(contract.getUserStats(request.params.principal));
        },
    );

    fastify.get<{ Querystring: { limit?: number } }>(
        "/v1/leaderboard",
        {
            schema: {
                summary: "Top contributors by reputation",
                tags: ["Users"],
                querystring: {
                    type: "object",
                    properties: { limit: { type: "integer", minimum: 1, maximum: 100, default: 10 } },
                },
            },
        },
        async (request, reply) => {
            return reply.send({ entries: contract.getLeaderboard(request.query.limit) });
        },
    );
};

export default statusRoute;
