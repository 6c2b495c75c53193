import type { KeyPairAuthConfig, PatAuthConfig } from "./auth/index.js";

/**
 * Policy for retrying append operations.
 *
 * - `all`: Retry appends on transient failures. A retried append reuses the same
 *   continuation token, so the service may reject it if the first attempt landed.
 * - `noSideEffects`: Never retry appends (default)
 */
export type AppendRetryPolicy = "all" | "noSideEffects";

/**
 * Retry configuration for handling transient failures.
 */
export type RetryConfig = {
	/**
	 * Total number of attempts, including the initial try.
	 * Must be >= 1. A value of 1 means no retries.
	 * @default 1
	 */
	maxAttempts?: number;

	/**
	 * Minimum delay in milliseconds for exponential backoff.
	 * The first retry will have a delay in the range [minBaseDelayMillis, 2*minBaseDelayMillis).
	 * @default 100
	 */
	minBaseDelayMillis?: number;

	/**
	 * Maximum base delay in milliseconds for exponential backoff.
	 * Once the exponential backoff reaches this value, it stays capped here.
	 * Note: actual delay with jitter can be up to 2*maxBaseDelayMillis.
	 * @default 1000
	 */
	maxBaseDelayMillis?: number;

	/**
	 * Policy for retrying append operations.
	 * @default "noSideEffects"
	 */
	appendRetryPolicy?: AppendRetryPolicy;
};

export type AuthConfig = PatAuthConfig | KeyPairAuthConfig;

/** Function compatible with the global `fetch`. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Configuration for constructing a {@link StreamingClient}.
 */
export type StreamingClientOptions = {
	/** Account identifier, e.g. `XY12345` or `myorg-myaccount`. */
	account: string;
	/** User the credential belongs to. */
	user: string;
	/** Authentication method and its material. */
	auth: AuthConfig;
	/**
	 * Control plane URL. Scheme and trailing slash are stripped.
	 *
	 * Defaults to `https://{account}.snowflakecomputing.com`.
	 */
	controlUrl?: string;
	/**
	 * Per-request timeout for discovery, token exchange, open, status and drop.
	 * @default 30000
	 */
	requestTimeoutMillis?: number;
	/**
	 * Per-request timeout for row appends.
	 * @default 60000
	 */
	appendTimeoutMillis?: number;
	/**
	 * Retry configuration for transient failures.
	 * @default { maxAttempts: 1, minBaseDelayMillis: 100, maxBaseDelayMillis: 1000, appendRetryPolicy: "noSideEffects" }
	 */
	retry?: RetryConfig;
	/** Override the fetch implementation (tests, proxies). */
	fetch?: FetchLike;
};

/**
 * Per-request options that apply to all client operations.
 */
export type RequestOptions = {
	/**
	 * Optional abort signal to cancel the underlying HTTP request.
	 */
	signal?: AbortSignal;
};

export type StreamingEnvironmentConfig = {
	account?: string;
	user?: string;
	controlUrl?: string;
	auth?: AuthConfig;
};

export class StreamingEnvironment {
	public static parse(
		env: Record<string, string | undefined> = process.env,
	): StreamingEnvironmentConfig {
		const config: StreamingEnvironmentConfig = {};

		const account = env.EDGE_UPLINK_ACCOUNT;
		if (account) {
			config.account = account;
		}

		const user = env.EDGE_UPLINK_USER;
		if (user) {
			config.user = user;
		}

		const controlUrl = env.EDGE_UPLINK_CONTROL_URL;
		if (controlUrl) {
			config.controlUrl = controlUrl;
		}

		const token = env.EDGE_UPLINK_PAT;
		const privateKeyPath = env.EDGE_UPLINK_PRIVATE_KEY_PATH;
		if (token) {
			config.auth = { method: "pat", token };
		} else if (privateKeyPath) {
			config.auth = {
				method: "keypair",
				privateKeyPath,
				privateKeyPassphrase: env.EDGE_UPLINK_PRIVATE_KEY_PASSPHRASE || undefined,
			};
		}

		return config;
	}
}
