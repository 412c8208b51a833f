// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Configuration loader for GreenProof.
 * Reads greenproof.yaml from the project directory or ~/.greenproof/config.yaml.
 * Validates with Zod and provides typed defaults.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigurationError } from "../exceptions.js";
import type { GreenProofConfig } from "../types.js";

// ── Zod schema ───────────────────────────────────────────────────────────────

const PrincipalSchema = z.string().min(1).max(128);

const ContractSchema = z.object({
  owner: PrincipalSchema.default("deployer"),
  poolPrincipal: PrincipalSchema.default("reward-pool"),
  enabled: z.boolean().default(true),
});

const TokenSchema = z.object({
  name: z.string().min(1).max(32).default("GreenProof Token"),
  symbol: z.string().min(1).max(10).default("GRN"),
  decimals: z.number().int().min(0).max(18).default(6),
  uri: z.string().url().nullable().default(null),
});

const StorageSchema = z.object({
  dbPath: z.string().min(1).default(join(homedir(), ".greenproof", "ledger.db")),
});

const ApiSchema = z.object({
  host: z.string().default("127.0.0.1"),
  port: z.number().int().min(1).max(65535).default(4242),
  apiKey: z.string().min(1).optional(),
  prettyLogs: z.boolean().default(true),
});

const LoggingSchema = z.object({
  level: z.enum(["DEBUG", "INFO", "WARNING", "ERROR"]).default("INFO"),
});

const ConfigSchema = z.object({
  contract: ContractSchema.default({}),
  token: TokenSchema.default({}),
  verifiers: z.array(PrincipalSchema).default([]),
  storage: StorageSchema.default({}),
  api: ApiSchema.default({}),
  logging: LoggingSchema.default({}),
});

// ── YAML key → camelCase mapping ─────────────────────────────────────────────

/** Convert snake_case YAML keys to camelCase for Zod schema. */
function toCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(toCamel);
  if (obj !== null && typeof obj === "object") {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => [
        k.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()),
        toCamel(v),
      ]),
    );
  }
  return obj;
}

// ── Loader ───────────────────────────────────────────────────────────────────

const SEARCH_PATHS = [
  "greenproof.yaml",
  "config/greenproof.yaml",
  join(homedir(), ".greenproof", "config.yaml"),
];

/** Validate an already-parsed config object (snake_case or camelCase keys). */
export function parseConfig(raw: unknown, source = "<inline>"): GreenProofConfig {
  const result = ConfigSchema.safeParse(toCamel(raw ?? {}));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new ConfigurationError(`Invalid configuration in '${source}':\n${issues}`);
  }
  return result.data;
}

export function loadConfig(configPath?: string): GreenProofConfig {
  const paths = configPath ? [configPath] : SEARCH_PATHS;
  const found = paths.find((p) => existsSync(p));

  if (!found) {
    if (configPath) {
      throw new ConfigurationError(`Config file '${configPath}' does not exist`);
    }
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(found, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Failed to read config at '${found}': ${String(err)}`);
  }

  return parseConfig(raw, found);
}

export const defaultConfig: GreenProofConfig = parseConfig({});
