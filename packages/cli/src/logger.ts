// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import chalk from "chalk";
import type { LogLevel } from "@greenproof/core";

const RANK: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARNING: 30, ERROR: 40 };

/** Console output for the CLI, filtered by the configured `logging.level`. */
export class CliLogger {
    constructor(private level: LogLevel = "INFO") {}

    debug(message: string): void {
        if (this.enabled("DEBUG")) console.log(chalk.gray(`[GreenProof] ${message}`));
    }

    info(message: string): void {
        if (this.enabled("INFO")) console.log(message);
    }

    success(message: string): void {
        if (this.enabled("INFO")) console.log(chalk.green(message));
    }

    warn(message: string): void {
        if (this.enabled("WARNING")) console.warn(chalk.yellow(message));
    }

    // Errors always print
    error(message: string): void {
        console.error(chalk.red(message));
    }

    private enabled(level: LogLevel): boolean {
        return RANK[level] >= RANK[this.level];
    }
}
