import { ChannelNotOpenError, StreamingError } from "./error.js";
import type { ScopedToken } from "./types.js";

/**
 * Session lifecycle: `disconnected → host-resolved → token-acquired → open → closed`.
 *
 * Every transition returns a new value; a failed step leaves the previous
 * value in place.
 */
export type ChannelState =
	| { readonly phase: "disconnected" }
	| { readonly phase: "host-resolved"; readonly host: string }
	| {
			readonly phase: "token-acquired";
			readonly host: string;
			readonly scopedToken: ScopedToken;
			readonly lastCommittedOffsetToken?: string;
	  }
	| {
			readonly phase: "open";
			readonly host: string;
			readonly scopedToken: ScopedToken;
			readonly continuationToken: string;
			readonly lastCommittedOffsetToken?: string;
	  }
	| {
			readonly phase: "closed";
			readonly host: string;
			readonly scopedToken: ScopedToken;
			readonly lastCommittedOffsetToken?: string;
	  };

export type ChannelPhase = ChannelState["phase"];

/** States that hold a scoped token and can talk to the ingest host. */
export type AuthorizedState = Extract<ChannelState, { scopedToken: ScopedToken }>;

export type OpenState = Extract<ChannelState, { phase: "open" }>;

export const initialState: ChannelState = { phase: "disconnected" };

function invalidTransition(state: ChannelState, action: string): StreamingError {
	return new StreamingError({
		message: `Cannot ${action} while session is ${state.phase}`,
		code: "INVALID_STATE",
	});
}

/**
 * Record a discovered ingest host. Allowed from every phase but `open`; a
 * session that held a token for an earlier host starts over from here.
 */
export function hostResolved(state: ChannelState, host: string): ChannelState {
	if (state.phase === "open") {
		throw invalidTransition(state, "resolve host");
	}
	return { phase: "host-resolved", host };
}

export function tokenAcquired(state: ChannelState, scopedToken: ScopedToken): ChannelState {
	if (state.phase === "disconnected") {
		throw invalidTransition(state, "acquire token");
	}
	if (scopedToken.host !== state.host) {
		throw new StreamingError({
			message: `Scoped token is for ${scopedToken.host}, session host is ${state.host}`,
			code: "INVALID_STATE",
		});
	}
	if (state.phase === "host-resolved") {
		return { phase: "token-acquired", host: state.host, scopedToken };
	}
	// Token refresh keeps the rest of the state
	return { ...state, scopedToken };
}

export function requireAuthorized(state: ChannelState, action: string): AuthorizedState {
	if (
		state.phase === "token-acquired" ||
		state.phase === "open" ||
		state.phase === "closed"
	) {
		return state;
	}
	throw invalidTransition(state, action);
}

export function requireOpen(state: ChannelState, channel: string): OpenState {
	if (state.phase !== "open") {
		throw new ChannelNotOpenError(channel, state.phase);
	}
	return state;
}

export function requireOpenable(
	state: ChannelState,
): Extract<ChannelState, { phase: "token-acquired" | "open" }> {
	if (state.phase !== "token-acquired" && state.phase !== "open") {
		throw invalidTransition(state, "open channel");
	}
	return state;
}

export function opened(
	previous: ChannelState,
	continuationToken: string,
	lastCommittedOffsetToken: string | undefined,
): OpenState {
	const state = requireOpenable(previous);
	return {
		phase: "open",
		host: state.host,
		scopedToken: state.scopedToken,
		continuationToken,
		lastCommittedOffsetToken,
	};
}

export function appended(state: OpenState, nextContinuationToken: string): OpenState {
	return { ...state, continuationToken: nextContinuationToken };
}

export function committedOffsetObserved(
	state: AuthorizedState,
	lastCommittedOffsetToken: string | undefined,
): AuthorizedState {
	return { ...state, lastCommittedOffsetToken };
}

export function closed(state: AuthorizedState): ChannelState {
	return {
		phase: "closed",
		host: state.host,
		scopedToken: state.scopedToken,
		lastCommittedOffsetToken: state.lastCommittedOffsetToken,
	};
}
