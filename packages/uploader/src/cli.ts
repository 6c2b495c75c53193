#!/usr/bin/env node
/**
 * @summary Entry point for the `edge-uplink` command.
 *
 * - edge-uplink upload [file]  append NDJSON rows in batches
 * - edge-uplink status         print the last committed offset
 * - edge-uplink drop           drop the channel
 */

import chalk from "chalk";
import { Command } from "commander";
import createDebug from "debug";
import { registerDropCommand, registerStatusCommand, registerUploadCommand } from "./commands/index.js";
import { DEFAULT_CONFIG_PATH } from "./config.js";

const VERSION = "0.1.0";

function createProgram(): Command {
	const program = new Command();

	program
		.name("edge-uplink")
		.description("Stream NDJSON rows from edge devices into a pipe channel")
		.version(VERSION)
		.option("-c, --config <path>", "Uploader config file", DEFAULT_CONFIG_PATH)
		.option("--debug", "Log protocol activity to stderr", false)
		.hook("preAction", (thisCommand) => {
			if (thisCommand.opts<{ debug: boolean }>().debug) {
				createDebug.enable("edge-uplink:*");
			}
		});

	registerUploadCommand(program);
	registerStatusCommand(program);
	registerDropCommand(program);

	return program;
}

async function main(): Promise<void> {
	const program = createProgram();
	if (process.argv.length <= 2) {
		program.outputHelp();
		return;
	}
	await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
	console.error(chalk.red("Fatal error:"), error instanceof Error ? error.message : String(error));
	process.exit(1);
});
