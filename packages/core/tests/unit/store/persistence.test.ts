// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { RewardContract } from "../../../src/contract.js";
import { parseConfig } from "../../../src/config/config.js";

function tmpDb(testName: string): string {
    const dir = join(tmpdir(), "greenproof-test", testName.replace(/\s+/g, "-"));
    mkdirSync(dir, { recursive: true });
    return join(dir, "ledger.db");
}

describe("ledger persistence", () => {
    let dbPath: string;

    beforeEach(() => {
        dbPath = tmpDb(`persistence-${Date.now()}`);
    });

    afterEach(() => {
        rmSync(dbPath, { force: true });
        rmSync(`${dbPath}-wal`, { force: true });
        rmSync(`${dbPath}-shm`, { force: true });
    });

    it("keeps balances, counters and the clock across reopen", () => {
        const config = parseConfig({ contract: { owner: "owner" } });
        const first = RewardContract.open(config, dbPath);
        first.submitAction("alice", "cleanup", "e".repeat(64), "f".repeat(64));
        first.verifyAction("owner", "alice", 1);
        first.updateTokenUri("owner", "https://example.com/grn.json");
        first.toggleContract("owner", false);
        first.close();

        const second = RewardContract.open(parseConfig({ contract: { owner: "owner", enabled: true } }), dbPath);
        try {
            expect(second.getBalance("alice")).toBe(100);
            expect(second.getTotals()).toEqual({
                nextActionId: 2,
                currentTimestamp: 1,
                totalActionsCompleted: 1,
                totalSupply: 100,
                contractEnabled: false,
            });
            expect(second.getTokenUri()).toBe("https://example.com/grn.json");
        } finally {
            second.close();
        }
    });
});
