// =============================================================================
// Core Client
// =============================================================================

/** Top-level entrypoint for the SDK. */
export {
	DEFAULT_APPEND_TIMEOUT_MILLIS,
	DEFAULT_REQUEST_TIMEOUT_MILLIS,
	StreamingClient,
} from "./client.js";
export { StreamingEnvironment } from "./common.js";
export { ChannelSession } from "./channel.js";
export { TokenExchanger } from "./token-exchange.js";
export {
	CommitWaiter,
	DEFAULT_COMMIT_TIMEOUT_MILLIS,
	DEFAULT_POLL_INTERVAL_MILLIS,
} from "./commit-waiter.js";

// =============================================================================
// Authentication
// =============================================================================

export {
	type AuthMethod,
	type AuthProvider,
	type AuthProviderConfig,
	buildClaims,
	createAuthProvider,
	DEFAULT_JWT_LIFETIME_SECONDS,
	type KeyPairAuthConfig,
	type KeyPairClaims,
	normalizeIdentifier,
	type PatAuthConfig,
	SigningKey,
	signJwt,
} from "./auth/index.js";

// =============================================================================
// Session State
// =============================================================================

export type { ChannelPhase, ChannelState } from "./channel-state.js";

// =============================================================================
// SDK Types
// =============================================================================

export type {
	AppendResult,
	ChannelIdentity,
	Credential,
	OpenChannelResult,
	Row,
	ScopedToken,
} from "./types.js";
export { API, TokenType } from "./types.js";

// =============================================================================
// Client Configuration
// =============================================================================

export type {
	AppendRetryPolicy,
	AuthConfig,
	FetchLike,
	RequestOptions,
	RetryConfig,
	StreamingClientOptions,
	StreamingEnvironmentConfig,
} from "./common.js";
export type { CommitStatusSource, CommitWaiterOptions, WaitForCommitOptions } from "./commit-waiter.js";

// =============================================================================
// Error Types
// =============================================================================

export {
	ChannelNotOpenError,
	ConfigError,
	CryptoError,
	HttpError,
	ProtocolError,
	StreamingError,
} from "./error.js";
export type { ErrorOrigin } from "./error.js";

// =============================================================================
// Utilities
// =============================================================================

export { normalizeIngestHost, resolveControlHost } from "./endpoints.js";
export { compareOffsetTokens, isCommitted, nextOffsetToken } from "./offset.js";
export type { OffsetOrdering } from "./offset.js";
export { serializeRows } from "./lib/ndjson.js";
