import { base64urlnopad } from "@scure/base";
import type { SigningKey } from "./signing-key.js";

export type KeyPairClaims = {
	iss: string;
	sub: string;
	iat: number;
	exp: number;
};

export type BuildClaimsOptions = {
	account: string;
	user: string;
	/** `SHA256:<base64>` fingerprint of the public key */
	fingerprint: string;
	/** Token lifetime in seconds */
	lifetimeSeconds: number;
	/** Issued-at, seconds since epoch */
	issuedAt: number;
};

/**
 * Account and user names are case-insensitive on the service side but the
 * issuer/subject comparison is not, so both are uppercased.
 */
export function normalizeIdentifier(value: string): string {
	return value.toUpperCase();
}

export function buildClaims(options: BuildClaimsOptions): KeyPairClaims {
	const account = normalizeIdentifier(options.account);
	const user = normalizeIdentifier(options.user);
	return {
		iss: `${account}.${user}.${options.fingerprint}`,
		sub: `${account}.${user}`,
		iat: options.issuedAt,
		exp: options.issuedAt + options.lifetimeSeconds,
	};
}

const textEncoder = new TextEncoder();

function encodeSegment(value: object): string {
	return base64urlnopad.encode(textEncoder.encode(JSON.stringify(value)));
}

/**
 * Produce a compact JWS (`header.payload.signature`) signed with RS256.
 */
export function signJwt(claims: KeyPairClaims, signingKey: SigningKey): string {
	const signingInput = `${encodeSegment({ alg: "RS256", typ: "JWT" })}.${encodeSegment(claims)}`;
	const signature = signingKey.signRs256(textEncoder.encode(signingInput));
	return `${signingInput}.${base64urlnopad.encode(signature)}`;
}
