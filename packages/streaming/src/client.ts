import { type AuthProvider, createAuthProvider } from "./auth/index.js";
import { ChannelSession } from "./channel.js";
import type { StreamingClientOptions } from "./common.js";
import { resolveControlHost } from "./endpoints.js";
import { ConfigError } from "./error.js";
import { HttpClient } from "./lib/http.js";
import { type ResolvedRetryConfig, resolveRetryConfig } from "./lib/retry.js";
import { TokenExchanger } from "./token-exchange.js";
import type { ChannelIdentity } from "./types.js";

export const DEFAULT_REQUEST_TIMEOUT_MILLIS = 30_000;
export const DEFAULT_APPEND_TIMEOUT_MILLIS = 60_000;

/**
 * Identifiers are used as URL path segments and may not be empty.
 */
const CHANNEL_FIELDS = ["database", "schema", "pipe", "channel"] as const;

/**
 * Top-level streaming ingestion client.
 *
 * - Authenticates with a programmatic access token or a key-pair JWT.
 * - Hands out channel sessions bound to a database/schema/pipe/channel.
 */
export class StreamingClient {
	private readonly authProvider: AuthProvider;
	private readonly http: HttpClient;
	private readonly retryConfig: ResolvedRetryConfig;
	private readonly requestTimeoutMillis: number;
	private readonly appendTimeoutMillis: number;

	/** Control plane host, without scheme. */
	public readonly controlHost: string;
	/** Host discovery and scoped token exchange. */
	public readonly exchanger: TokenExchanger;

	/**
	 * Create a new client.
	 *
	 * @throws {ConfigError} If credentials are missing for the chosen method.
	 */
	constructor(options: StreamingClientOptions) {
		this.authProvider = createAuthProvider({
			account: options.account,
			user: options.user,
			auth: options.auth,
		});
		this.retryConfig = resolveRetryConfig(options.retry);
		this.requestTimeoutMillis = options.requestTimeoutMillis ?? DEFAULT_REQUEST_TIMEOUT_MILLIS;
		this.appendTimeoutMillis = options.appendTimeoutMillis ?? DEFAULT_APPEND_TIMEOUT_MILLIS;
		this.http = new HttpClient(options.fetch);
		this.controlHost = resolveControlHost(options.account, options.controlUrl);
		this.exchanger = new TokenExchanger({
			authProvider: this.authProvider,
			controlHost: this.controlHost,
			http: this.http,
			retry: this.retryConfig,
			requestTimeoutMillis: this.requestTimeoutMillis,
		});
	}

	/**
	 * Create a session bound to a channel. Nothing is sent until
	 * {@link ChannelSession.connect} is called.
	 *
	 * @throws {ConfigError} If any part of the identity is empty.
	 */
	public channel(identity: ChannelIdentity): ChannelSession {
		for (const field of CHANNEL_FIELDS) {
			if (!identity[field]) {
				throw new ConfigError(`Channel ${field} is required`);
			}
		}
		return new ChannelSession({
			identity: { ...identity },
			exchanger: this.exchanger,
			http: this.http,
			retry: this.retryConfig,
			requestTimeoutMillis: this.requestTimeoutMillis,
			appendTimeoutMillis: this.appendTimeoutMillis,
		});
	}
}
