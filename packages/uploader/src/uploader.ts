import { setTimeout as delay } from "node:timers/promises";
import {
	type AppendResult,
	type ChannelSession,
	CommitWaiter,
	DEFAULT_COMMIT_TIMEOUT_MILLIS,
	nextOffsetToken,
	StreamingError,
} from "@edge-uplink/streaming";
import createDebug from "debug";
import { batchRows, type RowProducer } from "./producer.js";

const debug = createDebug("edge-uplink:uploader");

export const DEFAULT_BATCH_SIZE = 10;

/** Outcome of one appended batch. */
export type BatchReport = {
	batchNumber: number;
	rowCount: number;
	offsetToken: string;
	nextContinuationToken: string;
	/** `undefined` unless commit verification is on */
	committed?: boolean;
};

export type UploadSummary = {
	batches: number;
	rows: number;
	lastOffsetToken?: string;
	/** True when the signal stopped the loop before the producer ran dry */
	aborted: boolean;
};

export type UploaderOptions = {
	session: ChannelSession;
	producer: RowProducer;
	batchSize?: number;
	verifyCommit?: boolean;
	commitTimeoutMillis?: number;
	/** Pause between batches */
	intervalMillis?: number;
	signal?: AbortSignal;
	onBatch?: (report: BatchReport) => void;
	/** Defaults to a waiter polling `session` */
	commitWaiter?: CommitWaiter;
	now?: () => number;
};

/**
 * Append rows from `producer` to the session's channel until it is exhausted
 * or `signal` aborts.
 *
 * Opens the session first if needed. Each batch carries the offset token
 * after the previous one, starting after the channel's last committed
 * offset. A commit that is still pending after `commitTimeoutMillis` is
 * reported in the batch, not thrown. An append cut off by `signal` ends the
 * run with `aborted` set; the batch it carried is not counted.
 */
export async function runUploader(options: UploaderOptions): Promise<UploadSummary> {
	const { session, producer, signal } = options;
	const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
	const commitTimeoutMillis = options.commitTimeoutMillis ?? DEFAULT_COMMIT_TIMEOUT_MILLIS;
	const now = options.now ?? Date.now;

	const summary: UploadSummary = { batches: 0, rows: 0, aborted: false };
	if (session.phase !== "open") {
		try {
			await session.connect({ signal });
		} catch (error) {
			if (isAbortError(error, signal)) {
				summary.aborted = true;
				return summary;
			}
			throw error;
		}
	}
	const waiter = options.verifyCommit ? (options.commitWaiter ?? new CommitWaiter(session)) : undefined;

	let previous = session.lastCommittedOffsetToken;
	debug("starting after offset %s", previous ?? "<none>");

	for await (const rows of batchRows(producer, batchSize)) {
		if (signal?.aborted) {
			summary.aborted = true;
			break;
		}
		const offsetToken = nextOffsetToken(previous, now);
		let result: AppendResult;
		try {
			result = await session.append(rows, offsetToken, { signal });
		} catch (error) {
			if (isAbortError(error, signal)) {
				debug("append of offset %s aborted", offsetToken);
				break;
			}
			throw error;
		}
		previous = offsetToken;
		summary.batches++;
		summary.rows += result.rowCount;
		summary.lastOffsetToken = offsetToken;

		const report: BatchReport = {
			batchNumber: summary.batches,
			rowCount: result.rowCount,
			offsetToken,
			nextContinuationToken: result.nextContinuationToken,
		};
		if (waiter) {
			report.committed = await waiter.waitForCommit(offsetToken, {
				timeoutMillis: commitTimeoutMillis,
				signal,
			});
			if (!report.committed) {
				debug("batch %d offset %s not committed yet", report.batchNumber, offsetToken);
			}
		}
		options.onBatch?.(report);

		if (options.intervalMillis && options.intervalMillis > 0 && !signal?.aborted) {
			await pause(options.intervalMillis, signal);
		}
	}

	if (signal?.aborted) {
		summary.aborted = true;
	}
	debug("done: %d batches, %d rows", summary.batches, summary.rows);
	return summary;
}

/** True when `error` is the cancellation caused by `signal`. */
export function isAbortError(error: unknown, signal: AbortSignal | undefined): boolean {
	return signal?.aborted === true && error instanceof StreamingError && error.code === "ABORTED";
}

async function pause(millis: number, signal?: AbortSignal): Promise<void> {
	try {
		await delay(millis, undefined, { signal });
	} catch (error) {
		if (!signal?.aborted) {
			throw error;
		}
	}
}
