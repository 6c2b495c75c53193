import createDebug from "debug";
import type { RetryConfig } from "../common.js";
import { ConfigError, isRetryable, streamingError } from "../error.js";

const debug = createDebug("edge-uplink:retry");

export const DEFAULT_RETRY_CONFIG = {
	maxAttempts: 1,
	minBaseDelayMillis: 100,
	maxBaseDelayMillis: 1000,
	appendRetryPolicy: "noSideEffects",
} as const satisfies Required<RetryConfig>;

export type ResolvedRetryConfig = Required<RetryConfig>;

export function resolveRetryConfig(config?: RetryConfig): ResolvedRetryConfig {
	const maxAttempts = config?.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts;
	if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
		throw new ConfigError(`retry.maxAttempts must be an integer >= 1, got ${maxAttempts}`);
	}
	const minBaseDelayMillis =
		config?.minBaseDelayMillis ?? DEFAULT_RETRY_CONFIG.minBaseDelayMillis;
	const maxBaseDelayMillis = Math.max(
		minBaseDelayMillis,
		config?.maxBaseDelayMillis ?? DEFAULT_RETRY_CONFIG.maxBaseDelayMillis,
	);
	return {
		maxAttempts,
		minBaseDelayMillis,
		maxBaseDelayMillis,
		appendRetryPolicy: config?.appendRetryPolicy ?? DEFAULT_RETRY_CONFIG.appendRetryPolicy,
	};
}

/**
 * Delay before retry number `attempt` (1-based): exponential base capped at
 * `maxBaseDelayMillis`, plus up to one extra base of jitter.
 */
export function computeBackoffMillis(
	attempt: number,
	config: Pick<ResolvedRetryConfig, "minBaseDelayMillis" | "maxBaseDelayMillis">,
	random: () => number = Math.random,
): number {
	const base = Math.min(
		config.maxBaseDelayMillis,
		config.minBaseDelayMillis * 2 ** (attempt - 1),
	);
	return Math.floor(base + random() * base);
}

/**
 * Resolves after `ms`, or rejects with an AbortError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(abortReason(signal));
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			reject(abortReason(signal));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

function abortReason(signal: AbortSignal | undefined): Error {
	const reason: unknown = signal?.reason;
	if (reason instanceof Error) {
		return reason;
	}
	const error = new Error("The operation was aborted");
	error.name = "AbortError";
	return error;
}

export type RetryOptions = {
	/** Operation name for debug output */
	label: string;
	/** When false only the first attempt is made */
	retryable?: boolean;
	signal?: AbortSignal;
};

/**
 * Run `operation`, repeating it on transient failures (network, timeouts,
 * 408/429/5xx) up to `maxAttempts` times. The last error is rethrown as a
 * {@link StreamingError}.
 */
export async function withRetries<T>(
	operation: (attempt: number) => Promise<T>,
	config: ResolvedRetryConfig,
	options: RetryOptions,
): Promise<T> {
	const maxAttempts = options.retryable === false ? 1 : config.maxAttempts;
	let attempt = 1;
	while (true) {
		try {
			return await operation(attempt);
		} catch (error) {
			const err = streamingError(error);
			if (attempt >= maxAttempts || !isRetryable(err)) {
				if (attempt > 1) {
					debug("%s: giving up after %d attempts: %s", options.label, attempt, err.message);
				}
				throw err;
			}
			const delay = computeBackoffMillis(attempt, config);
			debug(
				"%s: attempt %d/%d failed (status=%s code=%s), retrying in %dms",
				options.label,
				attempt,
				maxAttempts,
				err.status ?? "none",
				err.code ?? "none",
				delay,
			);
			await sleep(delay, options.signal);
			attempt++;
		}
	}
}
