import createDebug from "debug";
import type { RequestOptions } from "./common.js";
import { streamingError } from "./error.js";
import { sleep } from "./lib/retry.js";
import { isCommitted, type OffsetOrdering } from "./offset.js";

const debug = createDebug("edge-uplink:commit");

export const DEFAULT_POLL_INTERVAL_MILLIS = 1000;
export const DEFAULT_COMMIT_TIMEOUT_MILLIS = 60_000;

/** Anything that can report the last committed offset token. */
export interface CommitStatusSource {
	status(options?: RequestOptions): Promise<string | undefined>;
}

export type CommitWaiterOptions = {
	/** @default 1000 */
	pollIntervalMillis?: number;
	/** @default "numeric" */
	ordering?: OffsetOrdering;
};

export type WaitForCommitOptions = {
	/** @default 60000 */
	timeoutMillis?: number;
	/** Aborting ends the wait early with `false`. */
	signal?: AbortSignal;
};

/**
 * Polls channel status until an offset token is committed.
 *
 * Never rejects: a timeout, an abort, or a status query that keeps failing
 * all resolve to `false`, so a batch loop can treat the commit as pending
 * and check again on a later cycle. A poll still in flight at the deadline
 * is cancelled and its answer ignored.
 */
export class CommitWaiter {
	private readonly source: CommitStatusSource;
	private readonly pollIntervalMillis: number;
	private readonly ordering: OffsetOrdering;

	constructor(source: CommitStatusSource, options?: CommitWaiterOptions) {
		this.source = source;
		this.pollIntervalMillis = options?.pollIntervalMillis ?? DEFAULT_POLL_INTERVAL_MILLIS;
		this.ordering = options?.ordering ?? "numeric";
	}

	async waitForCommit(
		expectedOffset: string | undefined,
		options?: WaitForCommitOptions,
	): Promise<boolean> {
		if (expectedOffset === undefined) {
			return true;
		}
		const timeoutMillis = options?.timeoutMillis ?? DEFAULT_COMMIT_TIMEOUT_MILLIS;
		const signal = options?.signal;

		// One signal bounds the polls and the sleeps between them
		const deadline = new AbortController();
		const timer = setTimeout(() => deadline.abort(), timeoutMillis);
		const onAbort = () => deadline.abort();
		signal?.addEventListener("abort", onAbort, { once: true });
		if (signal?.aborted) {
			deadline.abort();
		}

		try {
			while (!deadline.signal.aborted) {
				try {
					const committed = await untilAborted(
						this.source.status({ signal: deadline.signal }),
						deadline.signal,
					);
					debug("expected=%s committed=%s", expectedOffset, committed ?? "none");
					if (isCommitted(committed, expectedOffset, this.ordering)) {
						return true;
					}
				} catch (error) {
					if (deadline.signal.aborted) {
						break;
					}
					debug("status poll failed: %s", streamingError(error).message);
				}
				try {
					await sleep(this.pollIntervalMillis, deadline.signal);
				} catch {
					break;
				}
			}
		} finally {
			clearTimeout(timer);
			signal?.removeEventListener("abort", onAbort);
		}

		if (signal?.aborted) {
			debug("wait for %s aborted", expectedOffset);
		} else {
			debug("timed out after %dms waiting for %s", timeoutMillis, expectedOffset);
		}
		return false;
	}
}

/** Settle with `promise`, or reject as soon as `signal` aborts. */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(signal.reason);
		if (signal.aborted) {
			onAbort();
			return;
		}
		signal.addEventListener("abort", onAbort, { once: true });
		promise.then(
			(value) => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(error);
			},
		);
	});
}
