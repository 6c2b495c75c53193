import createDebug from "debug";
import { ConfigError } from "../error.js";
import { type Credential, TokenType } from "../types.js";
import { buildClaims, signJwt } from "./sign.js";
import { SigningKey } from "./signing-key.js";

const debug = createDebug("edge-uplink:auth");

/**
 * Authenticate with a pre-issued programmatic access token.
 */
export type PatAuthConfig = {
	method: "pat";
	token: string;
};

/**
 * Authenticate with a JWT signed by an RSA key registered on the user.
 */
export type KeyPairAuthConfig = {
	method: "keypair";
	/** Path to a PEM encoded private key */
	privateKeyPath: string;
	/** Passphrase for an encrypted private key */
	privateKeyPassphrase?: string;
	/** Pre-computed `SHA256:<base64>` fingerprint; derived from the key when absent */
	publicKeyFingerprint?: string;
	/** JWT lifetime in seconds (default: 3600 = 1 hour) */
	lifetimeSeconds?: number;
};

export type AuthProviderConfig = {
	account: string;
	user: string;
	auth: PatAuthConfig | KeyPairAuthConfig;
	/** Clock in epoch millis, overridable for tests */
	now?: () => number;
};

export type AuthMethod = (PatAuthConfig | KeyPairAuthConfig)["method"];

/**
 * Produces bearer credentials for the control plane.
 */
export type AuthProvider = {
	readonly method: AuthMethod;
	/** Issue a credential. Key-pair providers sign a fresh JWT on every call. */
	issue(): Promise<Credential>;
};

export const DEFAULT_JWT_LIFETIME_SECONDS = 3600;

/**
 * Creates an auth provider, validating the configuration eagerly.
 *
 * @throws {ConfigError} If the material required by the method is missing.
 *
 * @example Programmatic access token
 * ```typescript
 * const auth = createAuthProvider({ account, user, auth: { method: "pat", token } });
 * ```
 *
 * @example Key-pair JWT
 * ```typescript
 * const auth = createAuthProvider({
 *   account,
 *   user,
 *   auth: { method: "keypair", privateKeyPath: "./rsa_key.p8" },
 * });
 * ```
 */
export function createAuthProvider(config: AuthProviderConfig): AuthProvider {
	if (!config.account) {
		throw new ConfigError("account is required");
	}
	if (!config.user) {
		throw new ConfigError("user is required");
	}

	const { auth } = config;
	if (auth.method === "pat") {
		if (!auth.token) {
			throw new ConfigError("token is required for auth method pat");
		}
		return createPatAuth(auth.token);
	}
	if (!auth.privateKeyPath) {
		throw new ConfigError("privateKeyPath is required for auth method keypair");
	}
	const lifetimeSeconds = auth.lifetimeSeconds ?? DEFAULT_JWT_LIFETIME_SECONDS;
	if (!Number.isInteger(lifetimeSeconds) || lifetimeSeconds <= 0) {
		throw new ConfigError(
			`lifetimeSeconds must be a positive integer, got ${lifetimeSeconds}`,
		);
	}
	return createKeyPairAuth(config.account, config.user, auth, lifetimeSeconds, config.now ?? Date.now);
}

function createPatAuth(token: string): AuthProvider {
	return {
		method: "pat",
		async issue(): Promise<Credential> {
			return { token, tokenType: TokenType.ProgrammaticAccessToken };
		},
	};
}

function createKeyPairAuth(
	account: string,
	user: string,
	auth: KeyPairAuthConfig,
	lifetimeSeconds: number,
	now: () => number,
): AuthProvider {
	let keyPromise: Promise<SigningKey> | null = null;

	function loadKey(): Promise<SigningKey> {
		if (!keyPromise) {
			keyPromise = SigningKey.fromFile(auth.privateKeyPath, auth.privateKeyPassphrase);
			// A failed load must not poison later attempts
			keyPromise.catch(() => {
				keyPromise = null;
			});
		}
		return keyPromise;
	}

	return {
		method: "keypair",
		async issue(): Promise<Credential> {
			const signingKey = await loadKey();
			const fingerprint = auth.publicKeyFingerprint || signingKey.publicKeyFingerprint();
			const claims = buildClaims({
				account,
				user,
				fingerprint,
				lifetimeSeconds,
				issuedAt: Math.floor(now() / 1000),
			});
			debug("issuing key-pair jwt iss=%s exp=%d", claims.iss, claims.exp);
			return {
				token: signJwt(claims, signingKey),
				tokenType: TokenType.KeyPairJwt,
			};
		},
	};
}
