import { Command } from "commander";
import { VERSION } from "@greenproof/core";

import { actionCommands } from "./actions.js";
import { toggleCommand, tokenUriCommand, verifiersCommand } from "./admin.js";
import { serveCommand } from "./serve.js";
import { fundCommand, sponsorCommand } from "./sponsors.js";
import { auditCommand, leaderboardCommand, statsCommand, statusCommand } from "./status.js";
import { tokenCommands } from "./token.js";

/** Builds a fresh command tree; tests parse against their own instance. */
export function buildProgram(): Command {
    const program = new Command();

    program
        .name("greenproof")
        .description("Verified environmental actions, rewarded with tokens")
        .version(VERSION)
        .option("-c, --config <path>", "Path to greenproof.yaml")
        .option("--db <path>", "Ledger database path (overrides storage.db_path)");

    const commands = [
        ...actionCommands(),
        ...tokenCommands(),
        sponsorCommand(),
        fundCommand(),
        statusCommand(),
        statsCommand(),
        leaderboardCommand(),
        auditCommand(),
        toggleCommand(),
        tokenUriCommand(),
        verifiersCommand(),
        serveCommand(),
    ];
    for (const command of commands) program.addCommand(command);

    return program;
}
