// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RewardContract } from "../../../src/contract.js";
import { parseConfig } from "../../../src/config/config.js";
import { openLedgerDatabase, type LedgerDatabase } from "../../../src/store/database.js";
import { SqliteNativeCurrency } from "../../../src/sponsors/native-currency.js";
import { InvalidAmountError } from "../../../src/exceptions.js";

describe("SponsorPool", () => {
    let db: LedgerDatabase;
    let native: SqliteNativeCurrency;
    let contract: RewardContract;

    beforeEach(() => {
        db = openLedgerDatabase(":memory:");
        native = new SqliteNativeCurrency(db);
        contract = new RewardContract({
            db,
            config: parseConfig({ contract: { owner: "owner", pool_principal: "pool" } }),
            nativeCurrency: native,
        });
    });

    afterEach(() => {
        contract.close();
    });

    it("refuses contributions from unregistered sponsors", () => {
        native.deposit("acme", 1000);

        expect(contract.sponsorContribute("acme", 10)).toEqual({
            ok: false,
            error: { code: "SponsorNotFound", numericCode: 106, message: "No active sponsor registered for acme" },
        });
        expect(native.balanceOf("acme")).toBe(1000);
    });

    it("registers a sponsor with zero balances", () => {
        expect(contract.registerSponsor("acme", "Acme Corp")).toEqual({ ok: true, value: true });

        expect(contract.getSponsorInfo("acme")).toEqual({
            name: "Acme Corp",
            totalContributed: 0,
            availableBalance: 0,
            active: true,
        });
        expect(contract.getSponsorInfo("globex")).toBeNull();
    });

    it("rejects a zero contribution", () => {
        contract.registerSponsor("acme", "Acme Corp");

        const result = contract.sponsorContribute("acme", 0);

        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.code).toBe("InvalidAmount");
    });

    it("rejects negative and fractional contributions without moving funds", () => {
        native.deposit("acme", 100);
        contract.registerSponsor("acme", "Acme Corp");

        expect(contract.sponsorContribute("acme", -10)).toEqual({
            ok: false,
            error: { code: "InvalidAmount", numericCode: 108, message: "Amount must be a positive integer, got -10" },
        });
        expect(contract.sponsorContribute("acme", 0.5)).toEqual({
            ok: false,
            error: { code: "InvalidAmount", numericCode: 108, message: "Amount must be a positive integer, got 0.5" },
        });
        expect(native.balanceOf("acme")).toBe(100);
        expect(contract.getSponsorInfo("acme")?.totalContributed).toBe(0);
    });

    it("rejects invalid deposit amounts", () => {
        expect(() => native.deposit("acme", -1)).toThrow(InvalidAmountError);
        expect(() => native.deposit("acme", 1.5)).toThrow("Amount must be a positive integer, got 1.5");
        expect(native.balanceOf("acme")).toBe(0);
    });

    it("fails with InsufficientBalance when the value transfer fails", () => {
        contract.registerSponsor("acme", "Acme Corp");

        expect(contract.sponsorContribute("acme", 500)).toEqual({
            ok: false,
            error: {
                code: "InsufficientBalance",
                numericCode: 102,
                message: "Insufficient balance. Balance: 0, Required: 500",
            },
        });
        expect(contract.getSponsorInfo("acme")?.totalContributed).toBe(0);
        expect(contract.getSponsorContributions("acme")).toEqual([]);
    });

    it("moves funds to the pool and grows both balances", () => {
        contract.registerSponsor("acme", "Acme Corp");
        native.deposit("acme", 1000);

        expect(contract.sponsorContribute("acme", 400)).toEqual({ ok: true, value: true });
        expect(contract.sponsorContribute("acme", 100)).toEqual({ ok: true, value: true });

        expect(contract.getSponsorInfo("acme")).toEqual({
            name: "Acme Corp",
            totalContributed: 500,
            availableBalance: 500,
            active: true,
        });
        expect(native.balanceOf("acme")).toBe(500);
        expect(native.balanceOf("pool")).toBe(500);
        expect(contract.getSponsorContributions("acme").map((c) => c.amount)).toEqual([100, 400]);
    });

    it("does not fund reward mints from the pool", () => {
        contract.registerSponsor("acme", "Acme Corp");
        native.deposit("acme", 1000);
        contract.sponsorContribute("acme", 300);

        contract.submitAction("alice", "biodiversity", "c".repeat(64), "d".repeat(64));
        contract.verifyAction("owner", "alice", 1);

        expect(contract.getBalance("alice")).toBe(150);
        expect(contract.getSponsorInfo("acme")?.availableBalance).toBe(300);
    });

    it("re-registration overwrites the record", () => {
        contract.registerSponsor("acme", "Acme Corp");
        native.deposit("acme", 1000);
        contract.sponsorContribute("acme", 300);

        contract.registerSponsor("acme", "Acme Holdings");

        expect(contract.getSponsorInfo("acme")).toEqual({
            name: "Acme Holdings",
            totalContributed: 0,
            availableBalance: 0,
            active: true,
        });
    });
});
