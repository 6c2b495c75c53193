/**
 * Public types of the streaming client.
 *
 * Types use camelCase field names. Wire payloads (snake_case) are declared
 * in the `API` namespace at the bottom of this file.
 */

// =============================================================================
// Credentials
// =============================================================================

/**
 * Value of the `X-Snowflake-Authorization-Token-Type` header.
 */
export type TokenType = "KEYPAIR_JWT" | "PROGRAMMATIC_ACCESS_TOKEN" | "OAUTH";

export const TokenType = {
	KeyPairJwt: "KEYPAIR_JWT",
	ProgrammaticAccessToken: "PROGRAMMATIC_ACCESS_TOKEN",
	OAuth: "OAUTH",
} as const satisfies Record<string, TokenType>;

/**
 * A bearer credential together with the type the service must interpret it as.
 */
export interface Credential {
	readonly token: string;
	readonly tokenType: TokenType;
}

/**
 * Credential valid for a single ingest host, obtained by token exchange.
 */
export interface ScopedToken extends Credential {
	/** Ingest host the token was scoped to. */
	readonly host: string;
}

// =============================================================================
// Channels
// =============================================================================

/**
 * Fully qualified name of a channel. Immutable once configured.
 */
export interface ChannelIdentity {
	readonly database: string;
	readonly schema: string;
	readonly pipe: string;
	readonly channel: string;
}

/**
 * An opaque record. The client only serializes it.
 */
export type Row = Record<string, unknown>;

export interface OpenChannelResult {
	readonly continuationToken: string;
	/** Offset token the service has durably committed, if any. */
	readonly lastCommittedOffsetToken?: string;
}

export interface AppendResult {
	readonly nextContinuationToken: string;
	readonly rowCount: number;
	readonly offsetToken?: string;
}

// =============================================================================
// API Types (Wire Format)
// =============================================================================

/**
 * Request payloads as sent on the wire. Responses are read field by field
 * since the service omits or nulls fields freely.
 */
export namespace API {
	export interface OpenChannelRequest {
		offset_token?: string;
	}

	export interface BulkChannelStatusRequest {
		channel_names: string[];
	}

	export const JWT_BEARER_GRANT_TYPE = "urn:ietf:params:oauth:grant-type:jwt-bearer";
}
