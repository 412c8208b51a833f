#!/usr/bin/env node

import chalk from "chalk";

import { buildProgram } from "./program.js";

buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
        console.error(chalk.red(`\nFatal error: ${err instanceof Error ? err.message : String(err)}`));
        process.exit(1);
    });
