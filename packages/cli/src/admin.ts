import { Command } from "commander";
import chalk from "chalk";

import { report, withContract, type PrincipalOption } from "./context.js";

export function toggleCommand(): Command {
    return new Command("toggle")
        .description("Enable or disable action submissions (owner only)")
        .argument("<state>", "on | off")
        .requiredOption("--as <principal>", "Calling principal")
        .action((state: string, options: PrincipalOption, command: Command) => {
            if (state !== "on" && state !== "off") {
                command.error(`state must be "on" or "off", got "${state}"`);
            }
            withContract(command, ({ contract, log }) => {
                report(log, contract.toggleContract(options.as, state === "on"), () => `✓ Submissions ${state === "on" ? "enabled" : "disabled"}`);
            });
        });
}

export function tokenUriCommand(): Command {
    return new Command("token-uri")
        .description("Set or clear the token metadata URI (owner only)")
        .argument("[uri]", "New URI; omit to clear")
        .requiredOption("--as <principal>", "Calling principal")
        .action((uri: string | undefined, options: PrincipalOption, command: Command) => {
            withContract(command, ({ contract, log }) => {
                report(log, contract.updateTokenUri(options.as, uri ?? null), () => `✓ Token URI ${uri ? `set to ${uri}` : "cleared"}`);
            });
        });
}

export function verifiersCommand(): Command {
    const verifiers = new Command("verifiers").description("Manage who may verify actions");

    verifiers
        .command("list")
        .description("Show the owner and registered verifiers")
        .action((_options: object, command: Command) => {
            withContract(command, ({ contract, log }) => {
                log.info(`${contract.owner} ${chalk.gray("(owner)")}`);
                for (const verifier of contract.listVerifiers()) log.info(verifier);
            });
        });

    verifiers
        .command("add")
        .description("Authorize a verifier (owner only)")
        .argument("<principal>", "Verifier")
        .requiredOption("--as <principal>", "Calling principal")
        .action((principal: string, options: PrincipalOption, command: Command) => {
            withContract(command, ({ contract, log }) => {
                report(log, contract.addVerifier(options.as, principal), () => `✓ ${principal} may verify actions`);
            });
        });

    verifiers
        .command("remove")
        .description("Revoke a verifier (owner only)")
        .argument("<principal>", "Verifier")
        .requiredOption("--as <principal>", "Calling principal")
        .action((principal: string, options: PrincipalOption, command: Command) => {
            withContract(command, ({ contract, log }) => {
                report(log, contract.removeVerifier(options.as, principal), () => `✓ ${principal} removed`);
            });
        });

    return verifiers;
}
