import { Command } from "commander";
import chalk from "chalk";
import { ACTION_TYPES } from "@greenproof/core";

import { parseInteger, report, withContract, type PrincipalOption } from "./context.js";

export function actionCommands(): Command[] {
    const submit = new Command("submit")
        .description(`Submit an environmental action (${ACTION_TYPES.join(", ")})`)
        .argument("<actionType>", "Kind of action performed")
        .argument("<locationHash>", "Hex digest of the location evidence")
        .argument("<proofHash>", "Hex digest of the proof evidence")
        .requiredOption("--as <principal>", "Submitting principal")
        .action((actionType: string, locationHash: string, proofHash: string, options: PrincipalOption, command: Command) => {
            withContract(command, ({ contract, log }) => {
                report(log, contract.submitAction(options.as, actionType, locationHash, proofHash), (id) => `✓ Submitted action ${id} for ${options.as}`);
            });
        });

    const verify = new Command("verify")
        .description("Verify a pending action and mint its reward")
        .argument("<user>", "Submitter of the action")
        .argument("<actionId>", "Action id", parseInteger)
        .requiredOption("--as <principal>", "Verifying principal")
        .action((user: string, actionId: number, options: PrincipalOption, command: Command) => {
            withContract(command, ({ contract, log }) => {
                report(log, contract.verifyAction(options.as, user, actionId), () => {
                    const action = contract.getUserAction(user, actionId);
                    return `✓ Verified action ${actionId}; ${user} earned ${action?.rewardAmount ?? 0} ${contract.getSymbol()}`;
                });
            });
        });

    const assign = new Command("assign")
        .description("Assign a verifier to a pending action (owner only)")
        .argument("<actionId>", "Action id", parseInteger)
        .argument("<verifier>", "Principal allowed to verify it")
        .requiredOption("--as <principal>", "Calling principal")
        .action((actionId: number, verifier: string, options: PrincipalOption, command: Command) => {
            withContract(command, ({ contract, log }) => {
                report(log, contract.assignVerifier(options.as, actionId, verifier), (pending) => `✓ Action ${pending.actionId} assigned to ${verifier}`);
            });
        });

    const pending = new Command("pending")
        .description("List actions awaiting verification, oldest first")
        .option("-n, --limit <count>", "Maximum rows", parseInteger)
        .action((options: { limit?: number }, command: Command) => {
            withContract(command, ({ contract, log }) => {
                const rows = contract.listPendingVerifications(options.limit);
                if (rows.length === 0) {
                    log.info(chalk.gray("No pending verifications."));
                    return;
                }
                for (const row of rows) {
                    log.info(`#${row.actionId}  ${row.submitter}  t=${row.submittedAt}  verifier=${row.verifier ?? "-"}`);
                }
            });
        });

    const actions = new Command("actions")
        .description("List a user's actions")
        .argument("<user>", "Submitter")
        .action((user: string, _options: object, command: Command) => {
            withContract(command, ({ contract, log }) => {
                const rows = contract.listUserActions(user);
                if (rows.length === 0) {
                    log.info(chalk.gray(`No actions for ${user}.`));
                    return;
                }
                for (const action of rows) {
                    const state = action.verified ? chalk.green("verified") : chalk.yellow("pending");
                    log.info(`#${action.id}  ${action.actionType}  reward=${action.rewardAmount}  ${state}`);
                }
            });
        });

    return [submit, verify, assign, pending, actions];
}
