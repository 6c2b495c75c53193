import chalk from "chalk";
import type { Command } from "commander";
import { type ConfigOptions, reportError, sessionFromConfig, shutdownSignal } from "./shared.js";

/**
 * Register `status`: open the channel and print its last committed offset.
 */
export function registerStatusCommand(program: Command): void {
	program
		.command("status")
		.description("Show the last committed offset token of the channel")
		.action(async (_options: unknown, command: Command) => {
			const options = command.optsWithGlobals<ConfigOptions>();
			const { signal, dispose } = shutdownSignal();
			try {
				const session = await sessionFromConfig(options.config);
				await session.connect({ signal });
				const committed = await session.status({ signal });

				console.log(chalk.blue("Channel:"), session.identity.channel);
				const { database, schema, pipe } = session.identity;
				console.log(chalk.gray("  Pipe:"), `${database}.${schema}.${pipe}`);
				console.log(chalk.gray("  Host:"), session.host);
				console.log(
					chalk.gray("  Last committed offset:"),
					committed === undefined ? chalk.yellow("<none>") : chalk.green(committed),
				);
			} catch (error) {
				reportError(error);
			} finally {
				dispose();
			}
		});
}
