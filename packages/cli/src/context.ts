// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { InvalidArgumentError, type Command } from "commander";
import {
    loadConfig,
    openLedgerDatabase,
    RewardContract,
    SqliteNativeCurrency,
    type GreenProofConfig,
    type LedgerResult,
} from "@greenproof/core";

import { CliLogger } from "./logger.js";

export interface GlobalOptions {
    config?: string;
    db?: string;
}

export interface PrincipalOption {
    as: string;
}

export interface CliContext {
    config: GreenProofConfig;
    contract: RewardContract;
    native: SqliteNativeCurrency;
    log: CliLogger;
}

/** Resolves config (with `--db` overriding storage.dbPath) for any subcommand. */
export function resolveConfig(command: Command): GreenProofConfig {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const config = loadConfig(globals.config);
    return globals.db ? { ...config, storage: { dbPath: globals.db } } : config;
}

/** Opens the ledger for the duration of one command and always closes it. */
export function withContract(command: Command, fn: (ctx: CliContext) => void): void {
    const config = resolveConfig(command);
    const db = openLedgerDatabase(config.storage.dbPath);
    const native = new SqliteNativeCurrency(db);
    const contract = new RewardContract({ db, config, nativeCurrency: native });
    const log = new CliLogger(config.logging.level);

    log.debug(`ledger ${config.storage.dbPath}, owner ${contract.owner}`);
    try {
        fn({ config, contract, native, log });
    } finally {
        contract.close();
    }
}

/** Prints a ledger result; failures set a non-zero exit code. */
export function report<T>(log: CliLogger, result: LedgerResult<T>, describe: (value: T) => string): void {
    if (result.ok) {
        log.success(describe(result.value));
        return;
    }
    log.error(`✗ ${result.error.code} (${result.error.numericCode}): ${result.error.message}`);
    process.exitCode = 1;
}

export function parseInteger(value: string): number {
    const parsed = /^-?\d+$/.test(value) ? Number(value) : Number.NaN;
    if (!Number.isSafeInteger(parsed)) {
        throw new InvalidArgumentError("Expected an integer.");
    }
    return parsed;
}
