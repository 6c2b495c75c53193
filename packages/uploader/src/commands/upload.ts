/**
 * @summary `upload [file]`: append NDJSON rows to the configured channel.
 *
 * Rows are read from `file`, or from stdin when it is omitted or `-`, and
 * sent in batches with increasing offset tokens.
 */

import chalk from "chalk";
import type { Command } from "commander";
import { ndjsonProducer } from "../producer.js";
import { type BatchReport, DEFAULT_BATCH_SIZE, isAbortError, runUploader } from "../uploader.js";
import {
	type ConfigOptions,
	parseNonNegativeNumber,
	parsePositiveInteger,
	reportError,
	sessionFromConfig,
	shutdownSignal,
} from "./shared.js";

type UploadOptions = ConfigOptions & {
	batchSize: number;
	verifyCommit: boolean;
	commitTimeout: number;
	interval: number;
};

/**
 * @example
 * ```bash
 * edge-uplink upload metrics.ndjson --batch-size 50 --verify-commit
 * tail -f metrics.ndjson | edge-uplink upload --interval 5
 * ```
 */
export function registerUploadCommand(program: Command): void {
	program
		.command("upload [file]")
		.description("Append NDJSON rows from a file or stdin to the channel")
		.option("-b, --batch-size <rows>", "Rows per append", parsePositiveInteger, DEFAULT_BATCH_SIZE)
		.option("--verify-commit", "Wait for each batch to be committed", false)
		.option("--commit-timeout <seconds>", "How long to wait for a commit", parsePositiveInteger, 60)
		.option("--interval <seconds>", "Pause between batches", parseNonNegativeNumber, 0)
		.action(async (file: string | undefined, _options: unknown, command: Command) => {
			const options = command.optsWithGlobals<UploadOptions>();
			const { signal, dispose } = shutdownSignal();
			if (file === undefined || file === "-") {
				signal.addEventListener("abort", () => process.stdin.destroy(), { once: true });
			}
			try {
				const session = await sessionFromConfig(options.config);
				const opened = await session.connect({ signal });
				console.log(chalk.blue("Channel open:"), session.identity.channel);
				console.log(chalk.gray("  Host:"), session.host);
				console.log(
					chalk.gray("  Last committed offset:"),
					opened.lastCommittedOffsetToken ?? "<none>",
				);

				const summary = await runUploader({
					session,
					producer: ndjsonProducer(file, signal),
					batchSize: options.batchSize,
					verifyCommit: options.verifyCommit,
					commitTimeoutMillis: options.commitTimeout * 1000,
					intervalMillis: options.interval * 1000,
					signal,
					onBatch: printBatch,
				});

				const done = summary.aborted ? chalk.yellow("\nStopped:") : chalk.green("\nDone:");
				console.log(done, `${summary.batches} batches, ${summary.rows} rows`);
				if (summary.lastOffsetToken !== undefined) {
					console.log(chalk.gray("  Last offset:"), summary.lastOffsetToken);
				}
			} catch (error) {
				if (isAbortError(error, signal)) {
					console.log(chalk.yellow("\nStopped:"), "before the channel opened");
				} else {
					reportError(error);
				}
			} finally {
				dispose();
			}
		});
}

function printBatch(report: BatchReport): void {
	console.log(
		chalk.green("[OK]"),
		`Batch ${report.batchNumber} sent: rows=${report.rowCount} offset=${report.offsetToken} next_token=${report.nextContinuationToken}`,
	);
	if (report.committed !== undefined) {
		console.log(
			chalk.gray("  commit status:"),
			report.committed ? chalk.green("committed") : chalk.yellow("pending"),
		);
	}
}
