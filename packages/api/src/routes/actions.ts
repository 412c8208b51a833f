// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/actions.ts
// Action submission, verification and the pending-verification queue.

import type { FastifyPluginAsync } from "fastify";
import { ACTION_TYPES, type RewardContract } from "@greenproof/core";

import { requireCaller } from "../middleware/identity.js";
import { sendNotFound, sendResult } from "../reply.js";
import type { AssignVerifierBody, SubmitActionBody } from "../types.js";

interface ActionsRouteOptions {
    contract: RewardContract;
}

const digestSchema = { type: "string", pattern: "^[0-9a-fA-F]{64}$" } as const;
const actionParamsSchema = {
    type: "object",
    required: ["user", "id"],
    properties: { user: { type: "string" }, id: { type: "integer", minimum: 1 } },
} as const;

const actionsRoute: FastifyPluginAsync<ActionsRouteOptions> = async (fastify, opts) => {
    const { contract } = opts;

    fastify.post<{ Body: SubmitActionBody }>(
        "/v1/actions",
        {
            schema: {
                summary: "Submit an environmental action for verification",
                description: `Known action types: ${ACTION_TYPES.join(", ")}. Unknown types are rejected as InvalidAction.`,
                tags: ["Actions"],
                body: {
                    type: "object",
                    required: ["actionType", "locationHash", "proofHash"],
                    properties: {
                        actionType: { type: "string", maxLength: 32 },
                        locationHash: digestSchema,
                        proofHash: digestSchema,
                    },
                },
            },
        },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            const { actionType, locationHash, proofHash } = request.body;
            return sendResult(reply, contract.submitAction(caller, actionType, locationHash, proofHash), 201);
        },
    );

    fastify.get<{ Params: { user: string; id: number } }>(
        "/v1/actions/:user/:id",
        { schema: { summary: "One action of a user", tags: ["Actions"], params: actionParamsSchema } },
        async (request, reply) => {
            const action = contract.getUserAction(request.params.user, request.params.id);
            if (!action) return sendNotFound(reply, `No action ${request.params.id} for ${request.params.user}`);
            return reply.send(action);
        },
    );

    fastify.get<{ Params: { user: string } }>(
        "/v1/actions/:user",
        { schema: { summary: "Every action of a user", tags: ["Actions"] } },
        async (request, reply) => {
            return reply.send({ actions: contract.listUserActions(request.params.user) });
        },
    );

    fastify.post<{ Params: { user: string; id: number } }>(
        "/v1/actions/:user/:id/verify",
        { schema: { summary: "Verify an action and mint its reward", tags: ["Actions"], params: actionParamsSchema } },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            return sendResult(reply, contract.verifyAction(caller, request.params.user, request.params.id));
        },
    );

    fastify.get<{ Querystring: { limit?: number } }>(
        "/v1/pending",
        {
            schema: {
                summary: "Outstanding verifications, oldest first",
                tags: ["Actions"],
                querystring: {
                    type: "object",
                    properties: { limit: { type: "integer", minimum: 1, maximum: 500, default: 100 } },
                },
            },
        },
        async (request, reply) => {
            return reply.send({ pending: contract.listPendingVerifications(request.query.limit) });
        },
    );

    fastify.get<{ Params: { id: number } }>(
        "/v1/pending/:id",
        {
            schema: {
                summary: "Pending verification of an action",
                tags: ["Actions"],
                params: { type: "object", properties: { id: { type: "integer", minimum: 1 } } },
            },
        },
        async (request, reply) => {
            const pending = contract.getPendingVerification(request.params.id);
            if (!pending) return sendNotFound(reply, `No pending action ${request.params.id}`);
            return reply.send(pending);
        },
    );

    fastify.put<{ Params: { id: number }; Body: AssignVerifierBody }>(
        "/v1/pending/:id/verifier",
        {
            schema: {
                summary: "Assign a verifier to a pending action (owner only)",
                tags: ["Actions"],
                params: { type: "object", properties: { id: { type: "integer", minimum: 1 } } },
                body: { type: "object", required: ["verifier"], properties: { verifier: { type: "string", minLength: 1 } } },
            },
        },
        async (request, reply) => {
            const caller = requireCaller(request, reply);
            if (!caller) return reply;
            return sendResult(reply, contract.assignVerifier(caller, request.params.id, request.body.verifier));
        },
    );
};

export default actionsRoute;
