import { Command } from "commander";
import chalk from "chalk";
import { VERSION } from "@greenproof/core";

import { parseInteger, withContract } from "./context.js";

export function statusCommand(): Command {
    return new Command("status")
        .description("Show contract status and global totals")
        .action((_options: object, command: Command) => {
            withContract(command, ({ contract, log }) => {
                const totals = contract.getTotals();
                log.info(chalk.bold(`GreenProof v${VERSION}`));
                log.info(`  Submissions      : ${totals.contractEnabled ? chalk.green("enabled") : chalk.red("disabled")}`);
                log.info(`  Next action id   : ${totals.nextActionId}`);
                log.info(`  Logical clock    : ${totals.currentTimestamp}`);
                log.info(`  Actions verified : ${totals.totalActionsCompleted}`);
                log.info(`  Token supply     : ${totals.totalSupply} ${contract.getSymbol()}`);
            });
        });
}

export function statsCommand(): Command {
    return new Command("stats")
        .description("Show a user's verified-action statistics")
        .argument("<principal>", "User")
        .action((principal: string, _options: object, command: Command) => {
            withContract(command, ({ contract, log }) => {
                const stats = contract.getUserStats(principal);
                log.info(chalk.bold(principal));
                log.info(`  Actions    : ${stats.totalActions}`);
                log.info(`  Tokens     : ${stats.totalTokensEarned}`);
                log.info(`  Reputation : ${stats.reputationScore}`);
                for (const [type, count] of Object.entries(stats.actionCounts)) {
                    if (count > 0) log.info(chalk.gray(`    ${type}: ${count}`));
                }
            });
        });
}

export function leaderboardCommand(): Command {
    return new Command("leaderboard")
        .description("Top contributors by reputation")
        .option("-n, --limit <count>", "Maximum rows", parseInteger, 10)
        .action((options: { limit: number }, command: Command) => {
            withContract(command, ({ contract, log }) => {
                contract.getLeaderboard(options.limit).forEach((entry, i) => {
                    log.info(`${i + 1}. ${entry.principal}  rep=${entry.reputationScore}  tokens=${entry.totalTokensEarned}`);
                });
            });
        });
}

export function auditCommand(): Command {
    return new Command("audit")
        .description("Check ledger invariants")
        .action((_options: object, command: Command) => {
            withContract(command, ({ contract, log }) => {
                const result = contract.audit();
                if (result.passed) {
                    log.success("✓ Ledger audit passed");
                    return;
                }
                for (const issue of result.issues) log.error(`✗ ${issue}`);
                process.exitCode = 1;
            });
        });
}
