// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { RewardContract } from "../../../src/contract.js";
import { parseConfig } from "../../../src/config/config.js";
import { openLedgerDatabase } from "../../../src/store/database.js";
import { OwnerOnlyPolicy } from "../../../src/actions/verifiers.js";
import type { VerifierPolicy } from "../../../src/actions/verifiers.js";

const LOC = "1".repeat(64);
const PROOF = "2".repeat(64);

describe("verifier authority", () => {
    let contract: RewardContract;

    function setup(opts: { verifiers?: string[]; policy?: VerifierPolicy } = {}): RewardContract {
        contract = new RewardContract({
            db: openLedgerDatabase(":memory:"),
            config: parseConfig({ contract: { owner: "owner" }, verifiers: opts.verifiers ?? [] }),
            verifierPolicy: opts.policy,
        });
        contract.submitAction("alice", "cleanup", LOC, PROOF);
        contract.submitAction("bob", "recycling", LOC, PROOF);
        return contract;
    }

    afterEach(() => {
        contract.close();
    });

    it("lets a registered verifier confirm actions", () => {
        setup();
        expect(contract.addVerifier("owner", "oracle-1")).toEqual({ ok: true, value: true });

        expect(contract.verifyAction("oracle-1", "alice", 1)).toEqual({ ok: true, value: true });
        expect(contract.getBalance("alice")).toBe(100);
    });

    it("only the owner manages the verifier set", () => {
        setup();

        const result = contract.addVerifier("alice", "alice");

        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.code).toBe("OwnerOnly");
        expect(contract.listVerifiers()).toEqual([]);
    });

    it("seeds verifiers from configuration", () => {
        setup({ verifiers: ["auditor"] });

        expect(contract.listVerifiers()).toEqual(["auditor"]);
        expect(contract.verifyAction("auditor", "bob", 2).ok).toBe(true);
    });

    it("revokes verification rights on removal", () => {
        setup({ verifiers: ["auditor"] });
        contract.removeVerifier("owner", "auditor");

        const result = contract.verifyAction("auditor", "alice", 1);

        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.code).toBe("OwnerOnly");
    });

    it("restricts an assigned action to its verifier and the owner", () => {
        setup({ verifiers: ["oracle-1"] });

        expect(contract.assignVerifier("owner", 2, "oracle-2")).toEqual({
            ok: true,
            value: { actionId: 2, submitter: "bob", verifier: "oracle-2", submittedAt: 1 },
        });
        expect(contract.getPendingVerification(2)?.verifier).toBe("oracle-2");

        expect(contract.verifyAction("oracle-1", "bob", 2).ok).toBe(false);
        expect(contract.verifyAction("oracle-2", "bob", 2).ok).toBe(true);
        // unassigned actions are still open to the registered set
        expect(contract.verifyAction("oracle-1", "alice", 1).ok).toBe(true);
    });

    it("cannot assign a verifier to an action that is not pending", () => {
        setup();

        expect(contract.assignVerifier("owner", 99, "oracle-1")).toEqual({
            ok: false,
            error: { code: "ActionNotFound", numericCode: 109, message: "No pending action 99" },
        });
    });

    it("honours an injected owner-only policy", () => {
        setup({ verifiers: ["auditor"], policy: new OwnerOnlyPolicy("owner") });

        expect(contract.verifyAction("auditor", "alice", 1).ok).toBe(false);
        expect(contract.verifyAction("owner", "alice", 1).ok).toBe(true);
    });
});

describe("configured verifiers across reopen", () => {
    it("keeps a removed verifier removed when the ledger is reopened", () => {
        const dir = mkdtempSync(join(tmpdir(), "greenproof-verifiers-"));
        const dbPath = join(dir, "ledger.db");
        const config = parseConfig({ contract: { owner: "owner" }, verifiers: ["auditor"] });

        try {
            const first = RewardContract.open(config, dbPath);
            expect(first.listVerifiers()).toEqual(["auditor"]);
            expect(first.removeVerifier("owner", "auditor")).toEqual({ ok: true, value: true });
            first.close();

            const second = RewardContract.open(config, dbPath);
            try {
                expect(second.listVerifiers()).toEqual([]);
                second.submitAction("alice", "cleanup", LOC, PROOF);

                const result = second.verifyAction("auditor", "alice", 1);
                expect(result.ok).toBe(false);
                if (!result.ok) expect(result.error.code).toBe("OwnerOnly");
            } finally {
                second.close();
            }
        } finally {
            rmSync(dir, { recursive: true, force: true });
        }
    });
});
