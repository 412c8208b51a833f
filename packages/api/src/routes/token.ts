// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/token.ts
// Token reads, transfers, trades and delegate approvals.

import type { FastifyPluginAsync } from "fastify";
import type { RewardContract } from "@greenproof/core";

import { requireCaller } from "../middleware/identity.js";
import { sendResult } from "../reply.js";
import type { DelegateBody, TradeBody, TransferBody } from "../types.js";

interface TokenRouteOptions {
    contract: RewardContract;
}

const amountSchema = { type: "integer", minimum: 0 } as const;
const principalSchema = { type: "string", minLength: 1, maxLength: 128 } as const;

const tokenRoute: FastifyPluginAsync<TokenRouteOptions> = async (fastify, opts) => {
    const { contract } = opts;

    fastify.get("/v1/token", { schema: { summary: "Token metadata and supply", tags: ["Token"] } }, async (_request, reply) => {
        return reply.send({ ...contract.getTokenMetadata(), totalSupply: contract.getTotalSupply() });
    });

    fastify.get<{ Params: { principal: string } }>(
        "/v1/balances/:principal",
        { schema: { summary: "Token balance of a principal", tags: ["Token"] } },
        async (request, reply) => {
            const { principal } = request.params;
            return reply.send({ principal, balance: contract.getBalance(principal) });
        },
    );

    fastify.get<{ Params: { principal: string }; Querystring: { limit?: number } }>(
        "/v1/balances/:principal/history",
        {
            schema: {
                summary: "Mints and transfers touching a principal, newest first",
                tags: ["Token"],
                querystring: {
                    type: "object",
                    properties: { limit: { type: "integer", minimum: 1, maximum: 500, default: 50 } },
                },
            },
        },
        async (request, reply) => {
            return reply.send({ entries: contract.getTokenHistory(request.params.principal, request.query.limit) });
        },
    );

    fastify.post<{ Body: TransferBody }>(
        "/v1/transfers",
        {
            schema: {
                summary: "Transfer tokens (caller must be the sender or an approved delegate)",
                tags: ["Token"],
                body: {
                    type: "object",
                    required: ["amount", "from", "to"],
                    properties: {
                        amount: amountSchema,
                        from: principalSchema,
                        to: principalSchema,
                        memo: { type: "string", maxLength: 34 },
                    },
                },
            },
        },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            const { amount, from, to, memo } = request.body;
            return sendResult(reply, contract.transfer(caller, amount, from, to, memo));
        },
    );

    fastify.post<{ Body: TradeBody }>(
        "/v1/trades",
        {
            schema: {
                summary: "Send the caller's own tokens",
                tags: ["Token"],
                body: {
                    type: "object",
                    required: ["amount", "to"],
                    properties: { amount: amountSchema, to: principalSchema },
                },
            },
        },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            return sendResult(reply, contract.tradeTokens(caller, request.body.amount, request.body.to));
        },
    );

    fastify.post<{ Body: DelegateBody }>(
        "/v1/delegates",
        {
            schema: {
                summary: "Approve a delegate to transfer the caller's tokens",
                tags: ["Token"],
                body: { type: "object", required: ["delegate"], properties: { delegate: principalSchema } },
            },
        },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            return sendResult(reply, contract.approveDelegate(caller, request.body.delegate));
        },
    );

    fastify.delete<{ Params: { delegate: string } }>(
        "/v1/delegates/:delegate",
        { schema: { summary: "Revoke a delegate", tags: ["Token"] } },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            return sendResult(reply, contract.revokeDelegate(caller, request.params.delegate));
        },
    );
};

export default tokenRoute;
