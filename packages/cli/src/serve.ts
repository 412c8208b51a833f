import { Command } from "commander";
import chalk from "chalk";
import { RewardContract } from "@greenproof/core";
import { startServer } from "@greenproof/api";

import { parseInteger, resolveConfig } from "./context.js";

interface ServeOptions {
    port?: number;
    host?: string;
}

export function serveCommand(): Command {
    return new Command("serve")
        .description("Start the GreenProof REST API")
        .option("-p, --port <number>", "Port to bind to (default from config)", parseInteger)
        .option("--host <address>", "Address to bind to (default from config)")
        .action(async (options: ServeOptions, command: Command) => {
            const base = resolveConfig(command);
            const config = {
                ...base,
                api: { ...base.api, port: options.port ?? base.api.port, host: options.host ?? base.api.host },
            };
            console.log(chalk.green(`[GreenProof API] Booting on ${config.api.host}:${config.api.port}...`));

            // The server's onClose hook closes the contract
            const contract = RewardContract.open(config);
            try {
                await startServer({ contract, config });
            } catch (e) {
                contract.close();
                console.error(chalk.red("Failed to start the REST API"));
                throw e;
            }
        });
}
