import chalk from "chalk";
import type { Command } from "commander";
import { type ConfigOptions, reportError, sessionFromConfig, shutdownSignal } from "./shared.js";

/**
 * Register `drop`: open the channel, then delete it on the ingest host.
 */
export function registerDropCommand(program: Command): void {
	program
		.command("drop")
		.description("Drop the channel")
		.action(async (_options: unknown, command: Command) => {
			const options = command.optsWithGlobals<ConfigOptions>();
			const { signal, dispose } = shutdownSignal();
			try {
				const session = await sessionFromConfig(options.config);
				await session.connect({ signal });
				await session.drop({ signal });
				console.log(chalk.green("Dropped channel:"), session.identity.channel);
			} catch (error) {
				reportError(error);
			} finally {
				dispose();
			}
		});
}
