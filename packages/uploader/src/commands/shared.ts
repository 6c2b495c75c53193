import { type ChannelSession, StreamingClient, StreamingError } from "@edge-uplink/streaming";
import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import { loadUploaderConfig } from "../config.js";

/** Options every command accepts. */
export type ConfigOptions = {
	config: string;
};

/**
 * Load the config file and create a session for its channel. The session is
 * not connected yet.
 */
export async function sessionFromConfig(path: string): Promise<ChannelSession> {
	const config = await loadUploaderConfig(path);
	return new StreamingClient(config.client).channel(config.channel);
}

/**
 * An AbortSignal that fires on SIGINT or SIGTERM. Call `dispose` once the
 * command is done to remove the handlers.
 */
export function shutdownSignal(): { signal: AbortSignal; dispose: () => void } {
	const controller = new AbortController();
	const onSignal = (name: NodeJS.Signals) => {
		console.error(chalk.yellow(`\nReceived ${name}, stopping...`));
		controller.abort();
	};
	process.once("SIGINT", onSignal);
	process.once("SIGTERM", onSignal);
	return {
		signal: controller.signal,
		dispose: () => {
			process.off("SIGINT", onSignal);
			process.off("SIGTERM", onSignal);
		},
	};
}

export function parsePositiveInteger(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new InvalidArgumentError("Expected a positive integer.");
	}
	return parsed;
}

export function parseNonNegativeNumber(value: string): number {
	const parsed = Number(value);
	if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
		throw new InvalidArgumentError("Expected a non-negative number.");
	}
	return parsed;
}

/** Print an error with its status and code, then set a failing exit code. */
export function reportError(error: unknown): void {
	if (error instanceof StreamingError) {
		const detail = [error.code, error.status].filter((part) => part !== undefined).join(" ");
		console.error(chalk.red(`Error${detail ? ` (${detail})` : ""}:`), error.message);
	} else {
		console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
	}
	process.exitCode = 1;
}
