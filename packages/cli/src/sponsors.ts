import { Command } from "commander";
import chalk from "chalk";
import { LedgerError } from "@greenproof/core";

import { parseInteger, report, withContract, type PrincipalOption } from "./context.js";

export function sponsorCommand(): Command {
    const sponsor = new Command("sponsor").description("Reward-pool sponsorship");

    sponsor
        .command("register")
        .description("Register (or re-register) the caller as a sponsor")
        .argument("<name>", "Display name")
        .requiredOption("--as <principal>", "Sponsoring principal")
        .action((name: string, options: PrincipalOption, command: Command) => {
            withContract(command, ({ contract, log }) => {
                report(log, contract.registerSponsor(options.as, name), () => `✓ ${options.as} registered as sponsor "${name}"`);
            });
        });

    sponsor
        .command("contribute")
        .description("Move native currency from the caller into the reward pool")
        .argument("<amount>", "Native amount", parseInteger)
        .requiredOption("--as <principal>", "Sponsoring principal")
        .action((amount: number, options: PrincipalOption, command: Command) => {
            withContract(command, ({ contract, log }) => {
                report(log, contract.sponsorContribute(options.as, amount), () => `✓ ${options.as} contributed ${amount}`);
            });
        });

    sponsor
        .command("info")
        .description("Show a sponsor record and recent contributions")
        .argument("<principal>", "Sponsor")
        .action((principal: string, _options: object, command: Command) => {
            withContract(command, ({ contract, log }) => {
                const info = contract.getSponsorInfo(principal);
                if (!info) {
                    log.warn(`No sponsor registered for ${principal}`);
                    process.exitCode = 1;
                    return;
                }
                log.info(chalk.bold(info.name) + (info.active ? "" : chalk.gray(" (inactive)")));
                log.info(`  Contributed : ${info.totalContributed}`);
                log.info(`  Available   : ${info.availableBalance}`);
                for (const c of contract.getSponsorContributions(principal, 5)) {
                    log.info(chalk.gray(`  #${c.seq}  +${c.amount}  t=${c.clock}`));
                }
            });
        });

    return sponsor;
}

export function fundCommand(): Command {
    return new Command("fund")
        .description("Credit native currency to a principal (host-side deposit)")
        .argument("<principal>", "Recipient")
        .argument("<amount>", "Native amount", parseInteger)
        .action((principal: string, amount: number, _options: object, command: Command) => {
            withContract(command, ({ native, log }) => {
                try {
                    const balance = native.deposit(principal, amount);
                    log.success(`✓ ${principal} now holds ${balance} native`);
                } catch (err) {
                    if (!(err instanceof LedgerError)) throw err;
                    log.error(`✗ ${err.code} (${err.numericCode}): ${err.message}`);
                    process.exitCode = 1;
                }
            });
        });
}
