// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, describe, expect, it } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, parseConfig } from "../../../src/config/config.js";
import { ConfigurationError } from "../../../src/exceptions.js";

describe("config", () => {
    const dir = join(tmpdir(), "greenproof-test", `config-${Date.now()}`);

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it("fills every default", () => {
        const config = parseConfig({});

        expect(config.contract).toEqual({ owner: "deployer", poolPrincipal: "reward-pool", enabled: true });
        expect(config.token).toEqual({ name: "GreenProof Token", symbol: "GRN", decimals: 6, uri: null });
        expect(config.verifiers).toEqual([]);
        expect(config.api.port).toBe(4242);
        expect(config.logging.level).toBe("INFO");
    });

    it("maps snake_case keys onto the schema", () => {
        const config = parseConfig({ contract: { pool_principal: "vault" }, api: { api_key: "test-key" } });

        expect(config.contract.poolPrincipal).toBe("vault");
        expect(config.api.apiKey).toBe("test-key");
    });

    it("reports every invalid field", () => {
        expect(() => parseConfig({ token: { decimals: 40 } })).toThrow(ConfigurationError);
        expect(() => parseConfig({ token: { decimals: 40 } })).toThrow(/token\.decimals/);
    });

    it("loads a YAML file", () => {
        mkdirSync(dir, { recursive: true });
        const path = join(dir, "greenproof.yaml");
        writeFileSync(
            path,
            ["contract:", "  owner: steward", "  enabled: false", "verifiers:", "  - oracle-1", ""].join("\n"),
        );

        const config = loadConfig(path);

        expect(config.contract.owner).toBe("steward");
        expect(config.contract.enabled).toBe(false);
        expect(config.verifiers).toEqual(["oracle-1"]);
    });

    it("fails when an explicit config path does not exist", () => {
        expect(() => loadConfig(join(dir, "missing.yaml"))).toThrow(ConfigurationError);
    });
});
