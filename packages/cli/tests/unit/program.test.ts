import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildProgram } from "../../src/program.js";

const LOC = "ab".repeat(32);
const PROOF = "cd".repeat(32);

describe("greenproof CLI", () => {
    let dir: string;
    let configPath: string;
    let log: MockInstance<typeof console.log>;
    let error: MockInstance<typeof console.error>;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "greenproof-cli-"));
        configPath = join(dir, "greenproof.yaml");
        writeFileSync(
            configPath,
            ["contract:", "  owner: owner", "storage:", `  db_path: ${join(dir, "ledger.db")}`, "logging:", "  level: INFO", ""].join("\n"),
        );
        log = vi.spyOn(console, "log").mockImplementation(() => undefined);
        error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        process.exitCode = undefined;
        rmSync(dir, { recursive: true, force: true });
    });

    async function run(...args: string[]): Promise<void> {
        await buildProgram().parseAsync(["--config", configPath, ...args], { from: "user" });
    }

    function lastLogged(): string {
        return String(log.mock.calls[log.mock.calls.length - 1]?.[0]);
    }

    it("submits and verifies an action", async () => {
        await run("submit", "cleanup", LOC, PROOF, "--as", "alice");
        expect(lastLogged()).toContain("✓ Submitted action 1 for alice");

        await run("verify", "alice", "1", "--as", "owner");
        expect(lastLogged()).toContain("✓ Verified action 1; alice earned 100 GRN");

        await run("balance", "alice");
        expect(lastLogged()).toBe("alice: 100 GRN");
        expect(process.exitCode).toBeUndefined();
    });

    it("reports ledger failures with their code and a non-zero exit code", async () => {
        await run("submit", "recycling", LOC, PROOF, "--as", "alice");
        await run("verify", "alice", "1", "--as", "owner");
        await run("verify", "alice", "1", "--as", "owner");

        expect(error).toHaveBeenCalledTimes(1);
        expect(String(error.mock.calls[0]?.[0])).toContain("✗ AlreadyVerified (104): Action 1 of alice is already verified");
        expect(process.exitCode).toBe(1);
    });

    it("rejects verification by an unauthorized principal", async () => {
        await run("submit", "cleanup", LOC, PROOF, "--as", "alice");
        await run("verify", "alice", "1", "--as", "mallory");

        expect(String(error.mock.calls[0]?.[0])).toContain("OwnerOnly (100)");
        await run("balance", "alice");
        expect(lastLogged()).toBe("alice: 0 GRN");
    });

    it("moves tokens with trade", async () => {
        await run("submit", "biodiversity", LOC, PROOF, "--as", "alice");
        await run("verify", "alice", "1", "--as", "owner");
        await run("trade", "40", "bob", "--as", "alice");
        expect(lastLogged()).toContain("✓ Sent 40 GRN to bob");

        await run("balance", "bob");
        expect(lastLogged()).toBe("bob: 40 GRN");
    });

    it("funds a sponsor and records its contribution", async () => {
        await run("fund", "acme", "50");
        expect(lastLogged()).toContain("✓ acme now holds 50 native");

        await run("sponsor", "register", "Acme", "--as", "acme");
        await run("sponsor", "contribute", "20", "--as", "acme");
        expect(lastLogged()).toContain("✓ acme contributed 20");

        await run("sponsor", "contribute", "100", "--as", "acme");
        expect(String(error.mock.calls[0]?.[0])).toContain("InsufficientBalance (102)");

        log.mockClear();
        await run("sponsor", "info", "acme");
        const lines = log.mock.calls.map((call) => String(call[0]));
        expect(lines[1]).toBe("  Contributed : 20");
        expect(lines[2]).toBe("  Available   : 20");
    });

    it("lets only the owner disable submissions", async () => {
        await run("toggle", "off", "--as", "alice");
        expect(String(error.mock.calls[0]?.[0])).toContain("OwnerOnly (100)");

        await run("toggle", "off", "--as", "owner");
        expect(lastLogged()).toContain("✓ Submissions disabled");

        await run("submit", "cleanup", LOC, PROOF, "--as", "alice");
        expect(String(error.mock.calls[1]?.[0])).toContain("InvalidAction (103): Action submissions are disabled");
    });

    it("passes the audit on a consistent ledger", async () => {
        await run("submit", "cleanup", LOC, PROOF, "--as", "alice");
        await run("verify", "alice", "1", "--as", "owner");
        await run("audit");

        expect(lastLogged()).toContain("✓ Ledger audit passed");
    });
});
