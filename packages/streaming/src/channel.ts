import { randomUUID } from "node:crypto";
import createDebug from "debug";
import {
	type AuthorizedState,
	appended,
	type ChannelPhase,
	type ChannelState,
	closed,
	committedOffsetObserved,
	hostResolved,
	initialState,
	opened,
	requireAuthorized,
	requireOpen,
	requireOpenable,
	tokenAcquired,
} from "./channel-state.js";
import type { RequestOptions } from "./common.js";
import { Endpoints } from "./endpoints.js";
import { HttpError, ProtocolError, StreamingError } from "./error.js";
import {
	type HttpClient,
	type JsonObject,
	objectField,
	readJsonObject,
	stringField,
} from "./lib/http.js";
import { serializeRows, utf8ByteLength } from "./lib/ndjson.js";
import { type ResolvedRetryConfig, withRetries } from "./lib/retry.js";
import type { TokenExchanger } from "./token-exchange.js";
import type {
	API,
	AppendResult,
	ChannelIdentity,
	OpenChannelResult,
	Row,
	ScopedToken,
} from "./types.js";

const debug = createDebug("edge-uplink:channel");

export type ChannelSessionOptions = {
	identity: ChannelIdentity;
	exchanger: TokenExchanger;
	http: HttpClient;
	retry: ResolvedRetryConfig;
	requestTimeoutMillis: number;
	appendTimeoutMillis: number;
	/** Request id source for open/drop; defaults to random UUIDs */
	requestId?: () => string;
};

/**
 * A single channel on the ingest host.
 *
 * Owns the ingest host, the scoped token, the continuation token chain and
 * the last committed offset observed. Not safe for concurrent use: the
 * caller must wait for each `append` before starting the next.
 *
 * @example
 * ```ts
 * const session = client.channel({ database, schema, pipe, channel });
 * await session.connect();
 * await session.append([{ ts: Date.now(), cpu: 0.42 }], "1");
 * await session.drop();
 * ```
 */
export class ChannelSession {
	public readonly identity: ChannelIdentity;
	private readonly exchanger: TokenExchanger;
	private readonly http: HttpClient;
	private readonly retry: ResolvedRetryConfig;
	private readonly requestTimeoutMillis: number;
	private readonly appendTimeoutMillis: number;
	private readonly requestId: () => string;
	private state: ChannelState = initialState;
	private appendInFlight = false;

	constructor(options: ChannelSessionOptions) {
		this.identity = options.identity;
		this.exchanger = options.exchanger;
		this.http = options.http;
		this.retry = options.retry;
		this.requestTimeoutMillis = options.requestTimeoutMillis;
		this.appendTimeoutMillis = options.appendTimeoutMillis;
		this.requestId = options.requestId ?? randomUUID;
	}

	/** Current state value. */
	snapshot(): ChannelState {
		return this.state;
	}

	get phase(): ChannelPhase {
		return this.state.phase;
	}

	get host(): string | undefined {
		return this.state.phase === "disconnected" ? undefined : this.state.host;
	}

	get continuationToken(): string | undefined {
		return this.state.phase === "open" ? this.state.continuationToken : undefined;
	}

	get lastCommittedOffsetToken(): string | undefined {
		return "lastCommittedOffsetToken" in this.state
			? this.state.lastCommittedOffsetToken
			: undefined;
	}

	/**
	 * Resolve the ingest host, exchange a scoped token and open the channel.
	 *
	 * Resumes from the current phase: after a failed attempt, the steps that
	 * already succeeded are not repeated. Connecting an open session re-opens it.
	 */
	async connect(options?: RequestOptions): Promise<OpenChannelResult> {
		debug("[%s] connecting from %s", this.identity.channel, this.state.phase);
		if (this.state.phase === "disconnected" || this.state.phase === "closed") {
			await this.resolveHost(options);
		}
		if (this.state.phase === "host-resolved") {
			await this.acquireToken(options);
		}
		const result = await this.open(undefined, options);
		debug("[%s] connected via %s", this.identity.channel, this.host);
		return result;
	}

	async resolveHost(options?: RequestOptions): Promise<string> {
		const host = await this.exchanger.resolveHost(options);
		this.state = hostResolved(this.state, host);
		return host;
	}

	async acquireToken(options?: RequestOptions): Promise<ScopedToken> {
		if (this.state.phase === "disconnected") {
			throw new StreamingError({
				message: "Cannot acquire token while session is disconnected",
				code: "INVALID_STATE",
			});
		}
		const scopedToken = await this.exchanger.exchangeScopedToken(this.state.host, options);
		this.state = tokenAcquired(this.state, scopedToken);
		return scopedToken;
	}

	/**
	 * Create the channel, or attach to it if it exists. Re-opening an open
	 * channel is allowed and restarts the continuation chain.
	 *
	 * @param offsetToken Offset token to record as the channel's starting point
	 * @throws {HttpError} On a non-2xx answer.
	 * @throws {ProtocolError} If the answer has no continuation token.
	 */
	async open(offsetToken?: string, options?: RequestOptions): Promise<OpenChannelResult> {
		requireOpenable(this.state);
		const requestId = this.requestId();
		const body: API.OpenChannelRequest = offsetToken !== undefined ? { offset_token: offsetToken } : {};

		const json = await this.authorizedRequest(
			"openChannel",
			(state) =>
				this.http.send({
					method: "PUT",
					url: Endpoints.channel(state.host, this.identity),
					credential: state.scopedToken,
					query: { requestId },
					json: body,
					timeoutMillis: this.requestTimeoutMillis,
					signal: options?.signal,
				}),
			true,
			options,
		);

		const continuationToken = stringField(json, "next_continuation_token");
		if (!continuationToken) {
			throw new ProtocolError(
				`Missing next_continuation_token in open response for channel ${this.identity.channel}`,
			);
		}
		const lastCommittedOffsetToken = stringField(
			objectField(json, "channel_status"),
			"last_committed_offset_token",
		);
		this.state = opened(this.state, continuationToken, lastCommittedOffsetToken);
		debug(
			"[%s] opened requestId=%s committed=%s",
			this.identity.channel,
			requestId,
			lastCommittedOffsetToken ?? "none",
		);
		return { continuationToken, lastCommittedOffsetToken };
	}

	/**
	 * Append rows as newline-delimited JSON.
	 *
	 * The continuation token is single use: the token returned here replaces
	 * the stored one and is sent with the next append.
	 *
	 * @param offsetToken Caller's monotonic marker for this batch, used to confirm commit later
	 * @throws {ChannelNotOpenError} If the channel has not been opened.
	 */
	async append(
		rows: ReadonlyArray<Row>,
		offsetToken?: string,
		options?: RequestOptions,
	): Promise<AppendResult> {
		requireOpen(this.state, this.identity.channel);
		if (rows.length === 0) {
			throw new StreamingError({
				message: "Cannot append an empty batch",
				code: "INVALID_ARGUMENT",
			});
		}
		if (this.appendInFlight) {
			throw new StreamingError({
				message: `Another append is in flight on channel ${this.identity.channel}`,
				code: "CONCURRENT_APPEND",
			});
		}
		const payload = serializeRows(rows);

		this.appendInFlight = true;
		try {
			const json = await this.authorizedRequest(
				"appendRows",
				(state) => {
					const open = requireOpen(state, this.identity.channel);
					debug(
						"[%s] append rows=%d bytes=%d continuationToken=%s offsetToken=%s",
						this.identity.channel,
						rows.length,
						utf8ByteLength(payload),
						open.continuationToken,
						offsetToken ?? "none",
					);
					return this.http.send({
						method: "POST",
						url: Endpoints.rows(open.host, this.identity),
						credential: open.scopedToken,
						query: {
							continuationToken: open.continuationToken,
							offsetToken,
						},
						body: payload,
						contentType: "application/x-ndjson",
						timeoutMillis: this.appendTimeoutMillis,
						signal: options?.signal,
					});
				},
				this.retry.appendRetryPolicy === "all",
				options,
			);

			const nextContinuationToken = stringField(json, "next_continuation_token");
			if (!nextContinuationToken) {
				throw new ProtocolError(
					`Missing next_continuation_token in append response for channel ${this.identity.channel}`,
				);
			}
			this.state = appended(requireOpen(this.state, this.identity.channel), nextContinuationToken);
			return { nextContinuationToken, rowCount: rows.length, offsetToken };
		} finally {
			this.appendInFlight = false;
		}
	}

	/**
	 * Offset token the service has durably committed for this channel, or
	 * undefined if nothing was committed yet.
	 */
	async status(options?: RequestOptions): Promise<string | undefined> {
		requireAuthorized(this.state, "query channel status");
		const body: API.BulkChannelStatusRequest = { channel_names: [this.identity.channel] };
		const json = await this.authorizedRequest(
			"channelStatus",
			(state) =>
				this.http.send({
					method: "POST",
					url: Endpoints.bulkChannelStatus(state.host, this.identity),
					credential: state.scopedToken,
					json: body,
					timeoutMillis: this.requestTimeoutMillis,
					signal: options?.signal,
				}),
			true,
			options,
		);
		const channelStatus = objectField(objectField(json, "channel_statuses"), this.identity.channel);
		const committed = stringField(channelStatus, "last_committed_offset_token");
		this.state = committedOffsetObserved(
			requireAuthorized(this.state, "query channel status"),
			committed,
		);
		return committed;
	}

	/**
	 * Delete the channel. Dropping an already dropped channel is not an error
	 * on the service side.
	 */
	async drop(options?: RequestOptions): Promise<void> {
		requireAuthorized(this.state, "drop channel");
		const requestId = this.requestId();
		await this.authorizedRequest(
			"dropChannel",
			(state) =>
				this.http.send({
					method: "DELETE",
					url: Endpoints.channel(state.host, this.identity),
					credential: state.scopedToken,
					query: { requestId },
					timeoutMillis: this.requestTimeoutMillis,
					signal: options?.signal,
				}),
			true,
			options,
			false,
		);
		this.state = closed(requireAuthorized(this.state, "drop channel"));
		debug("[%s] dropped requestId=%s", this.identity.channel, requestId);
	}

	/**
	 * Send a request with the current scoped token. A 401 means the token
	 * expired: it is exchanged once more and the request repeated, which is
	 * safe because the service rejected it before acting on it.
	 */
	private async authorizedRequest(
		label: string,
		send: (state: AuthorizedState) => Promise<Response>,
		retryable: boolean,
		options: RequestOptions | undefined,
		parseBody = true,
	): Promise<JsonObject> {
		const attempt = async () => {
			const response = await withRetries(
				() => send(requireAuthorized(this.state, label)),
				this.retry,
				{ label, retryable, signal: options?.signal },
			);
			return parseBody ? readJsonObject(response, label) : {};
		};

		try {
			return await attempt();
		} catch (error) {
			if (!(error instanceof HttpError) || error.status !== 401) {
				throw error;
			}
			debug("[%s] %s unauthorized, refreshing scoped token", this.identity.channel, label);
			await this.acquireToken(options);
			return attempt();
		}
	}
}
