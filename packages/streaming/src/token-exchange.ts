import createDebug from "debug";
import type { AuthProvider } from "./auth/index.js";
import type { RequestOptions } from "./common.js";
import { Endpoints, normalizeIngestHost } from "./endpoints.js";
import { ProtocolError } from "./error.js";
import { HttpClient, parseJsonObject, stringField } from "./lib/http.js";
import { type ResolvedRetryConfig, withRetries } from "./lib/retry.js";
import { API, type ScopedToken, TokenType } from "./types.js";

const debug = createDebug("edge-uplink:exchange");

export type TokenExchangerOptions = {
	authProvider: AuthProvider;
	controlHost: string;
	http: HttpClient;
	retry: ResolvedRetryConfig;
	requestTimeoutMillis: number;
};

/**
 * Turns control-plane credentials into an ingest host and a token scoped to it.
 */
export class TokenExchanger {
	private readonly authProvider: AuthProvider;
	private readonly endpoints: Endpoints;
	private readonly http: HttpClient;
	private readonly retry: ResolvedRetryConfig;
	private readonly requestTimeoutMillis: number;

	constructor(options: TokenExchangerOptions) {
		this.authProvider = options.authProvider;
		this.endpoints = new Endpoints(options.controlHost);
		this.http = options.http;
		this.retry = options.retry;
		this.requestTimeoutMillis = options.requestTimeoutMillis;
	}

	/**
	 * Discover the ingest host for this account.
	 *
	 * The body is either `{"hostname": "..."}` or the bare hostname as text.
	 *
	 * @throws {ProtocolError} If no hostname is present.
	 */
	async resolveHost(options?: RequestOptions): Promise<string> {
		const url = this.endpoints.hostname();
		const { text, status } = await withRetries(
			async () => {
				const credential = await this.authProvider.issue();
				const response = await this.http.send({
					method: "GET",
					url,
					credential,
					timeoutMillis: this.requestTimeoutMillis,
					signal: options?.signal,
				});
				return { text: await response.text(), status: response.status };
			},
			this.retry,
			{ label: "resolveHost", signal: options?.signal },
		);

		const json = parseJsonObject(text);
		const hostname = json ? stringField(json, "hostname") : text.trim() || undefined;
		if (!hostname) {
			throw new ProtocolError(
				`Missing hostname in response from ${url}: ${text.trim().slice(0, 500)}`,
				status,
			);
		}
		const host = normalizeIngestHost(hostname);
		debug("resolved ingest host %s", host);
		return host;
	}

	/**
	 * Obtain a token valid for `host`.
	 *
	 * A programmatic access token is accepted by the ingest host as is, so no
	 * request is made for it. Key-pair credentials are exchanged through the
	 * OAuth JWT-bearer grant.
	 *
	 * @throws {HttpError} On a non-2xx answer.
	 * @throws {ProtocolError} If the answer carries no token.
	 */
	async exchangeScopedToken(host: string, options?: RequestOptions): Promise<ScopedToken> {
		if (this.authProvider.method === "pat") {
			const credential = await this.authProvider.issue();
			debug("reusing programmatic access token for %s", host);
			return {
				token: credential.token,
				tokenType: TokenType.ProgrammaticAccessToken,
				host,
			};
		}

		const url = this.endpoints.oauthToken();
		const { text, status } = await withRetries(
			async () => {
				// Fresh JWT per attempt so a retry never presents an expired one
				const credential = await this.authProvider.issue();
				const response = await this.http.send({
					method: "POST",
					url,
					credential,
					form: {
						grant_type: API.JWT_BEARER_GRANT_TYPE,
						scope: host,
					},
					timeoutMillis: this.requestTimeoutMillis,
					signal: options?.signal,
				});
				return { text: await response.text(), status: response.status };
			},
			this.retry,
			{ label: "exchangeScopedToken", signal: options?.signal },
		);

		const json = parseJsonObject(text);
		const token = json
			? (stringField(json, "token") ?? stringField(json, "access_token"))
			: text.trim() || undefined;
		if (!token) {
			throw new ProtocolError(`Missing token in response from ${url}`, status);
		}
		debug("obtained scoped token for %s", host);
		return { token, tokenType: TokenType.OAuth, host };
	}
}
