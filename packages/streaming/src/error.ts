/**
 * Where an error was produced.
 *
 * - `server`: the ingestion service answered with an error
 * - `sdk`: raised locally (configuration, crypto, protocol validation)
 */
export type ErrorOrigin = "server" | "sdk";

export type StreamingErrorInit = {
	message: string;
	status?: number;
	code?: string;
	origin?: ErrorOrigin;
	cause?: unknown;
};

/**
 * Base class for every error surfaced by the streaming client.
 */
export class StreamingError extends Error {
	public readonly status?: number;
	public readonly code?: string;
	public readonly origin: ErrorOrigin;

	constructor(init: StreamingErrorInit) {
		super(init.message, init.cause !== undefined ? { cause: init.cause } : undefined);
		this.name = "StreamingError";
		this.status = init.status;
		this.code = init.code;
		this.origin = init.origin ?? "sdk";
	}
}

/** Missing or invalid credential / client configuration. */
export class ConfigError extends StreamingError {
	constructor(message: string) {
		super({ message, code: "CONFIG", origin: "sdk" });
		this.name = "ConfigError";
	}
}

/** Private key could not be loaded, or signing failed. */
export class CryptoError extends StreamingError {
	constructor(message: string, cause?: unknown) {
		super({ message, code: "CRYPTO", origin: "sdk", cause });
		this.name = "CryptoError";
	}
}

const BODY_SNIPPET_LENGTH = 500;

/** Non-2xx response from the control plane or ingest host. */
export class HttpError extends StreamingError {
	public readonly body: string;

	constructor(init: { status: number; statusText?: string; body: string; url?: string }) {
		const body = init.body.trim().slice(0, BODY_SNIPPET_LENGTH);
		const target = init.url ? ` ${init.url}` : "";
		super({
			message: `HTTP ${init.status}${init.statusText ? ` ${init.statusText}` : ""}${target}${body ? `: ${body}` : ""}`,
			status: init.status,
			code: "HTTP",
			origin: "server",
		});
		this.name = "HttpError";
		this.body = body;
	}
}

/** A 2xx response that lacks a field the protocol requires. */
export class ProtocolError extends StreamingError {
	constructor(message: string, status?: number) {
		super({ message, status, code: "PROTOCOL", origin: "sdk" });
		this.name = "ProtocolError";
	}
}

/** Append or status attempted before the channel was opened. */
export class ChannelNotOpenError extends StreamingError {
	constructor(channel: string, phase: string) {
		super({
			message: `Channel "${channel}" is not open (session is ${phase})`,
			code: "CHANNEL_NOT_OPEN",
			origin: "sdk",
		});
		this.name = "ChannelNotOpenError";
	}
}

/**
 * Normalize anything thrown by fetch or our own code into a StreamingError.
 * Timeouts and aborts map to 408 / 499 so the retry layer can classify them.
 */
export function streamingError(error: unknown): StreamingError {
	if (error instanceof StreamingError) {
		return error;
	}
	if (error instanceof Error) {
		if (error.name === "TimeoutError") {
			return new StreamingError({
				message: `Request timed out: ${error.message}`,
				status: 408,
				code: "TIMEOUT",
				cause: error,
			});
		}
		if (error.name === "AbortError") {
			return new StreamingError({
				message: "Request aborted",
				status: 499,
				code: "ABORTED",
				cause: error,
			});
		}
		return new StreamingError({
			message: error.message,
			code: "NETWORK",
			cause: error,
		});
	}
	return new StreamingError({ message: String(error), code: "UNKNOWN" });
}

/**
 * Whether a failed attempt may be repeated without changing the outcome
 * of a previously delivered request.
 */
export function isRetryable(error: StreamingError): boolean {
	if (
		error instanceof ConfigError ||
		error instanceof CryptoError ||
		error instanceof ProtocolError ||
		error instanceof ChannelNotOpenError
	) {
		return false;
	}
	if (error.code === "ABORTED") {
		return false;
	}
	if (error.code === "NETWORK" || error.code === "TIMEOUT") {
		return true;
	}
	const status = error.status;
	if (status === undefined) {
		return false;
	}
	return status === 408 || status === 429 || status >= 500;
}
