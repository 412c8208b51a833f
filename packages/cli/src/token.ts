import { Command } from "commander";
import chalk from "chalk";

import { parseInteger, report, withContract, type PrincipalOption } from "./context.js";

interface TransferOptions extends PrincipalOption {
    memo?: string;
}

export function tokenCommands(): Command[] {
    const transfer = new Command("transfer")
        .description("Move tokens between principals (holder or approved delegate)")
        .argument("<amount>", "Token amount", parseInteger)
        .argument("<from>", "Holder")
        .argument("<to>", "Recipient")
        .option("-m, --memo <text>", "Memo recorded in the token journal")
        .requiredOption("--as <principal>", "Calling principal")
        .action((amount: number, from: string, to: string, options: TransferOptions, command: Command) => {
            withContract(command, ({ contract, log }) => {
                report(log, contract.transfer(options.as, amount, from, to, options.memo), () => `✓ Moved ${amount} ${contract.getSymbol()} from ${from} to ${to}`);
            });
        });

    const trade = new Command("trade")
        .description("Send the caller's own tokens")
        .argument("<amount>", "Token amount", parseInteger)
        .argument("<to>", "Recipient")
        .requiredOption("--as <principal>", "Sending principal")
        .action((amount: number, to: string, options: PrincipalOption, command: Command) => {
            withContract(command, ({ contract, log }) => {
                report(log, contract.tradeTokens(options.as, amount, to), () => `✓ Sent ${amount} ${contract.getSymbol()} to ${to}`);
            });
        });

    const approve = new Command("approve")
        .description("Allow a delegate to move the caller's tokens")
        .argument("<delegate>", "Delegate principal")
        .requiredOption("--as <principal>", "Token holder")
        .action((delegate: string, options: PrincipalOption, command: Command) => {
            withContract(command, ({ contract, log }) => {
                report(log, contract.approveDelegate(options.as, delegate), () => `✓ ${delegate} may now move tokens of ${options.as}`);
            });
        });

    const revoke = new Command("revoke")
        .description("Withdraw a delegate approval")
        .argument("<delegate>", "Delegate principal")
        .requiredOption("--as <principal>", "Token holder")
        .action((delegate: string, options: PrincipalOption, command: Command) => {
            withContract(command, ({ contract, log }) => {
                report(log, contract.revokeDelegate(options.as, delegate), () => `✓ Revoked ${delegate}`);
            });
        });

    const balance = new Command("balance")
        .description("Show a principal's token balance")
        .argument("<principal>", "Holder")
        .action((principal: string, _options: object, command: Command) => {
            withContract(command, ({ contract, log }) => {
                log.info(`${principal}: ${contract.getBalance(principal)} ${contract.getSymbol()}`);
            });
        });

    const history = new Command("history")
        .description("Show a principal's token journal, newest first")
        .argument("<principal>", "Holder")
        .option("-n, --limit <count>", "Maximum rows", parseInteger)
        .action((principal: string, options: { limit?: number }, command: Command) => {
            withContract(command, ({ contract, log }) => {
                const entries = contract.getTokenHistory(principal, options.limit);
                if (entries.length === 0) {
                    log.info(chalk.gray(`No token movements for ${principal}.`));
                    return;
                }
                for (const entry of entries) {
                    const memo = entry.memo ? `  "${entry.memo}"` : "";
                    log.info(`${entry.seq}  ${entry.kind}  ${entry.sender ?? "-"} → ${entry.recipient}  ${entry.amount}${memo}`);
                }
            });
        });

    const token = new Command("token")
        .description("Show token metadata and supply")
        .action((_options: object, command: Command) => {
            withContract(command, ({ contract, log }) => {
                const meta = contract.getTokenMetadata();
                log.info(chalk.bold(`${meta.name} (${meta.symbol})`));
                log.info(`  Decimals : ${meta.decimals}`);
                log.info(`  URI      : ${meta.uri ?? "-"}`);
                log.info(`  Supply   : ${contract.getTotalSupply()}`);
            });
        });

    return [transfer, trade, approve, revoke, balance, history, token];
}
