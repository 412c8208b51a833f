// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/reply.ts
// Maps ledger results onto HTTP responses.

import type { FastifyReply } from "fastify";
import type { LedgerErrorCode, LedgerResult } from "@greenproof/core";

import type { ApiErrorBody } from "./types.js";

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
    OwnerOnly: 403,
    NotTokenOwner: 403,
    InsufficientBalance: 400,
    InvalidAction: 400,
    AlreadyVerified: 409,
    VerificationFailed: 400,
    SponsorNotFound: 404,
    InsufficientSponsorBalance: 400,
    InvalidAmount: 400,
    ActionNotFound: 404,
};

export function statusFor(code: LedgerErrorCode): number {
    return STATUS_BY_CODE[code];
}

/** Sends `{ result }` on success, or the typed ledger error with its HTTP status. */
export function sendResult<T>(reply: FastifyReply, result: LedgerResult<T>, successCode = 200): FastifyReply {
    if (result.ok) {
        return reply.code(successCode).send({ result: result.value });
    }
    const body: ApiErrorBody = { error: result.error };
    return reply.code(statusFor(result.error.code)).send(body);
}

export function sendNotFound(reply: FastifyReply, message: string): FastifyReply {
    return reply.code(404).send({ error: { code: "NotFound", message } } satisfies ApiErrorBody);
}
