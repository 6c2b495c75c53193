import createDebug from "debug";
import type { FetchLike } from "../common.js";
import { HttpError, ProtocolError } from "../error.js";
import type { Credential } from "../types.js";

const debug = createDebug("edge-uplink:http");

export const DEFAULT_USER_AGENT = "edge-uplink-streaming/0.1.0";

export const TOKEN_TYPE_HEADER = "X-Snowflake-Authorization-Token-Type";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type HttpRequest = {
	method: HttpMethod;
	url: string;
	credential: Credential;
	query?: Record<string, string | undefined>;
	/** Serialized as JSON with `content-type: application/json` */
	json?: unknown;
	/** Serialized as `application/x-www-form-urlencoded` */
	form?: Record<string, string>;
	/** Raw body; `contentType` is required alongside it */
	body?: string;
	contentType?: string;
	timeoutMillis: number;
	signal?: AbortSignal;
};

export function authHeaders(credential: Credential): Record<string, string> {
	return {
		authorization: `Bearer ${credential.token}`,
		[TOKEN_TYPE_HEADER]: credential.tokenType,
	};
}

export function buildUrl(
	base: string,
	query?: Record<string, string | undefined>,
): string {
	if (!query) {
		return base;
	}
	const params = new URLSearchParams();
	for (const [key, value] of Object.entries(query)) {
		if (value !== undefined) {
			params.append(key, value);
		}
	}
	const encoded = params.toString();
	return encoded ? `${base}?${encoded}` : base;
}

/**
 * Thin fetch wrapper: sets auth headers, applies the per-request timeout,
 * and turns non-2xx answers into {@link HttpError}.
 */
export class HttpClient {
	private readonly fetchImpl: FetchLike;

	constructor(fetchImpl?: FetchLike) {
		this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
	}

	async send(request: HttpRequest): Promise<Response> {
		const headers: Record<string, string> = {
			...authHeaders(request.credential),
			accept: "application/json",
			"user-agent": DEFAULT_USER_AGENT,
		};
		let body: string | undefined;
		if (request.json !== undefined) {
			headers["content-type"] = "application/json";
			body = JSON.stringify(request.json);
		} else if (request.form) {
			headers["content-type"] = "application/x-www-form-urlencoded";
			body = new URLSearchParams(request.form).toString();
		} else if (request.body !== undefined) {
			headers["content-type"] = request.contentType ?? "text/plain";
			body = request.body;
		}

		const timeout = AbortSignal.timeout(request.timeoutMillis);
		const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;
		const url = buildUrl(request.url, request.query);

		debug("%s %s", request.method, url);
		const response = await this.fetchImpl(url, {
			method: request.method,
			headers,
			body,
			signal,
		});
		debug("%s %s -> %d", request.method, url, response.status);

		if (!response.ok) {
			throw new HttpError({
				status: response.status,
				statusText: response.statusText,
				body: await response.text(),
				url: `${request.method} ${request.url}`,
			});
		}
		return response;
	}
}

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse `text` as a JSON object, returning undefined for anything else.
 */
export function parseJsonObject(text: string): JsonObject | undefined {
	let value: unknown;
	try {
		value = JSON.parse(text);
	} catch {
		return undefined;
	}
	return isJsonObject(value) ? value : undefined;
}

/**
 * Read a 2xx body as a JSON object.
 *
 * @throws {ProtocolError} If the body is not a JSON object.
 */
export async function readJsonObject(response: Response, what: string): Promise<JsonObject> {
	const text = await response.text();
	const parsed = parseJsonObject(text);
	if (!parsed) {
		throw new ProtocolError(
			`Expected a JSON object in ${what} response, got: ${text.trim().slice(0, 200)}`,
			response.status,
		);
	}
	return parsed;
}

/**
 * Non-empty string field. Numbers are accepted and stringified since some
 * offset tokens come back as JSON numbers.
 */
export function stringField(object: JsonObject | undefined, key: string): string | undefined {
	const value = object?.[key];
	if (typeof value === "string") {
		return value.length > 0 ? value : undefined;
	}
	if (typeof value === "number" || typeof value === "bigint") {
		return String(value);
	}
	return undefined;
}

export function objectField(object: JsonObject | undefined, key: string): JsonObject | undefined {
	const value = object?.[key];
	return isJsonObject(value) ? value : undefined;
}
