// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { RewardContract, openLedgerDatabase, parseConfig, type GreenProofConfig } from "@greenproof/core";
import { createServer } from "../../src/server.js";

const LOC = "ab".repeat(32);
const PROOF = "cd".repeat(32);

function buildConfig(apiKey?: string): GreenProofConfig {
    return parseConfig({ contract: { owner: "owner" }, api: { pretty_logs: false, api_key: apiKey } });
}

async function buildApp(config: GreenProofConfig): Promise<FastifyInstance> {
    const contract = new RewardContract({ db: openLedgerDatabase(":memory:"), config });
    return createServer({ contract, config, logger: false });
}

function as(principal: string): Record<string, string> {
    return { "x-greenproof-principal": principal };
}

describe("GreenProof API", () => {
    let app: FastifyInstance;

    beforeEach(async () => {
        app = await buildApp(buildConfig());
    });

    afterEach(async () => {
        await app.close();
    });

    it("answers health checks", async () => {
        const res = await app.inject({ method: "GET", url: "/v1/health" });

        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({ status: "ok", version: "0.1.0" });
    });

    it("requires a caller principal for state changes", async () => {
        const res = await app.inject({
            method: "POST",
            url: "/v1/actions",
            payload: { actionType: "cleanup", locationHash: LOC, proofHash: PROOF },
        });

        expect(res.statusCode).toBe(401);
        expect(res.json().error.code).toBe("Unauthenticated");
    });

    it("rejects malformed digests before they reach the ledger", async () => {
        const res = await app.inject({
            method: "POST",
            url: "/v1/actions",
            headers: as("alice"),
            payload: { actionType: "cleanup", locationHash: "not-a-digest", proofHash: PROOF },
        });

        expect(res.statusCode).toBe(400);
    });

    it("runs the submit → verify → trade flow", async () => {
        const submitted = await app.inject({
            method: "POST",
            url: "/v1/actions",
            headers: as("alice"),
            payload: { actionType: "cleanup", locationHash: LOC, proofHash: PROOF },
        });
        expect(submitted.statusCode).toBe(201);
        expect(submitted.json()).toEqual({ result: 1 });

        const pending = await app.inject({ method: "GET", url: "/v1/pending/1" });
        expect(pending.json()).toEqual({ actionId: 1, submitter: "alice", verifier: null, submittedAt: 0 });

        const forbidden = await app.inject({ method: "POST", url: "/v1/actions/alice/1/verify", headers: as("mallory") });
        expect(forbidden.statusCode).toBe(403);
        expect(forbidden.json()).toEqual({
            error: { code: "OwnerOnly", numericCode: 100, message: "'verify-action' is restricted to the contract owner" },
        });

        const verified = await app.inject({ method: "POST", url: "/v1/actions/alice/1/verify", headers: as("owner") });
        expect(verified.statusCode).toBe(200);
        expect(verified.json()).toEqual({ result: true });

        const again = await app.inject({ method: "POST", url: "/v1/actions/alice/1/verify", headers: as("owner") });
        expect(again.statusCode).toBe(409);
        expect(again.json().error.code).toBe("AlreadyVerified");

        expect((await app.inject({ method: "GET", url: "/v1/pending/1" })).statusCode).toBe(404);

        const trade = await app.inject({
            method: "POST",
            url: "/v1/trades",
            headers: as("alice"),
            payload: { amount: 30, to: "bob" },
        });
        expect(trade.json()).toEqual({ result: true });

        const balance = await app.inject({ method: "GET", url: "/v1/balances/alice" });
        expect(balance.json()).toEqual({ principal: "alice", balance: 70 });

        const stats = await app.inject({ method: "GET", url: "/v1/users/alice/stats" });
        expect(stats.json().reputationScore).toBe(10);

        const status = await app.inject({ method: "GET", url: "/v1/status" });
        expect(status.json()).toEqual({
            status: "ok",
            version: "0.1.0",
            nextActionId: 2,
            currentTimestamp: 1,
            totalActionsCompleted: 1,
            totalSupply: 100,
            contractEnabled: true,
        });
    });

    it("answers unknown sponsors with a typed 404 body", async () => {
        const res = await app.inject({ method: "GET", url: "/v1/sponsors/nobody" });

        expect(res.statusCode).toBe(404);
        expect(res.json()).toEqual({ error: { code: "NotFound", message: "No sponsor registered for nobody" } });
    });

    it("publishes the OpenAPI document with route summaries", async () => {
        const res = await app.inject({ method: "GET", url: "/docs/json" });

        expect(res.statusCode).toBe(200);
        const doc = res.json();
        expect(doc.info.title).toBe("GreenProof REST API");
        expect(doc.paths["/v1/status"].get.summary).toBe("Contract status and global totals");
    });

    it("maps ledger errors to HTTP statuses", async () => {
        const invalid = await app.inject({
            method: "POST",
            url: "/v1/actions",
            headers: as("alice"),
            payload: { actionType: "planting", locationHash: LOC, proofHash: PROOF },
        });
        expect(invalid.statusCode).toBe(400);
        expect(invalid.json().error.code).toBe("InvalidAction");

        const sponsor = await app.inject({
            method: "POST",
            url: "/v1/sponsors/contributions",
            headers: as("acme"),
            payload: { amount: 5 },
        });
        expect(sponsor.statusCode).toBe(404);
        expect(sponsor.json().error.code).toBe("SponsorNotFound");

        const toggle = await app.inject({
            method: "PUT",
            url: "/v1/admin/contract",
            headers: as("alice"),
            payload: { enabled: false },
        });
        expect(toggle.statusCode).toBe(403);
    });
});

describe("API key", () => {
    let app: FastifyInstance;

    beforeEach(async () => {
        app = await buildApp(buildConfig("test-key"));
    });

    afterEach(async () => {
        await app.close();
    });

    it("rejects requests without the shared key", async () => {
        const res = await app.inject({ method: "GET", url: "/v1/status" });

        expect(res.statusCode).toBe(401);
        expect(res.json().error.code).toBe("InvalidApiKey");
    });

    it("accepts a bearer key and keeps health public", async () => {
        const ok = await app.inject({
            method: "GET",
            url: "/v1/status",
            headers: { authorization: "Bearer test-key" },
        });
        expect(ok.statusCode).toBe(200);

        expect((await app.inject({ method: "GET", url: "/v1/health" })).statusCode).toBe(200);
    });
});
