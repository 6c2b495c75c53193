import { createPublicKey, verify } from "node:crypto";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { createAuthProvider } from "../auth/auth-provider.js";
import { buildClaims, signJwt } from "../auth/sign.js";
import { SigningKey } from "../auth/signing-key.js";
import { ConfigError, CryptoError } from "../error.js";

const KEY_PATH = fileURLToPath(new URL("./fixtures/rsa_key.p8", import.meta.url));
const ENCRYPTED_KEY_PATH = fileURLToPath(
	new URL("./fixtures/rsa_key_encrypted.p8", import.meta.url),
);
const KEY_PASSPHRASE = "test-passphrase";
// openssl pkey -in rsa_key.p8 -pubout -outform DER | openssl dgst -sha256 -binary | base64
const KEY_FINGERPRINT = "SHA256:kMOvuHGSz72PhSr3+KRu6Z4IDQyUrmbBzuMmUu9ImNY=";

const FIXED_NOW = 1_700_000_000_000;

function decodeJwt(token: string) {
	const [header, payload, signature] = token.split(".");
	return {
		header: JSON.parse(Buffer.from(header ?? "", "base64url").toString("utf8")),
		payload: JSON.parse(Buffer.from(payload ?? "", "base64url").toString("utf8")),
		signingInput: `${header}.${payload}`,
		signature: Buffer.from(signature ?? "", "base64url"),
	};
}

describe("SigningKey", () => {
	it("computes the SHA-256 fingerprint of the DER public key", async () => {
		const key = await SigningKey.fromFile(KEY_PATH);
		expect(key.publicKeyFingerprint()).toBe(KEY_FINGERPRINT);
	});

	it("is deterministic across loads of the same key material", async () => {
		const first = await SigningKey.fromFile(KEY_PATH);
		const second = SigningKey.fromPem(readFileSync(KEY_PATH, "utf8"));
		expect(second.publicKeyFingerprint()).toBe(first.publicKeyFingerprint());
	});

	it("loads an encrypted key with its passphrase", async () => {
		const key = await SigningKey.fromFile(ENCRYPTED_KEY_PATH, KEY_PASSPHRASE);
		expect(key.publicKeyFingerprint()).toBe(KEY_FINGERPRINT);
	});

	it("fails with CryptoError on a wrong passphrase", async () => {
		await expect(
			SigningKey.fromFile(ENCRYPTED_KEY_PATH, "not-the-passphrase"),
		).rejects.toBeInstanceOf(CryptoError);
	});

	it("fails with CryptoError when the file cannot be read", async () => {
		await expect(SigningKey.fromFile("/nonexistent/rsa_key.p8")).rejects.toThrow(
			"Unable to read private key file /nonexistent/rsa_key.p8",
		);
	});

	it("rejects material that is not a private key", () => {
		expect(() => SigningKey.fromPem("not a pem")).toThrow(CryptoError);
	});
});

describe("buildClaims", () => {
	it("uppercases account and user in issuer and subject", () => {
		const claims = buildClaims({
			account: "XY12345",
			user: "svc_user",
			fingerprint: KEY_FINGERPRINT,
			lifetimeSeconds: 3600,
			issuedAt: 1_700_000_000,
		});

		expect(claims).toEqual({
			iss: `XY12345.SVC_USER.${KEY_FINGERPRINT}`,
			sub: "XY12345.SVC_USER",
			iat: 1_700_000_000,
			exp: 1_700_003_600,
		});
	});

	it.each([1, 60, 3600, 86_400])("exp - iat equals a lifetime of %d", (lifetimeSeconds) => {
		const claims = buildClaims({
			account: "a",
			user: "u",
			fingerprint: KEY_FINGERPRINT,
			lifetimeSeconds,
			issuedAt: 1_234_567,
		});
		expect(claims.exp - claims.iat).toBe(lifetimeSeconds);
	});
});

describe("signJwt", () => {
	it("produces an RS256 JWS that verifies against the public key", async () => {
		const key = await SigningKey.fromFile(KEY_PATH);
		const claims = buildClaims({
			account: "xy12345",
			user: "svc_user",
			fingerprint: key.publicKeyFingerprint(),
			lifetimeSeconds: 60,
			issuedAt: 1_700_000_000,
		});

		const jwt = decodeJwt(signJwt(claims, key));

		expect(jwt.header).toEqual({ alg: "RS256", typ: "JWT" });
		expect(jwt.payload).toEqual(claims);
		const publicKey = createPublicKey(readFileSync(KEY_PATH));
		expect(
			verify("sha256", Buffer.from(jwt.signingInput), publicKey, jwt.signature),
		).toBe(true);
	});
});

describe("createAuthProvider", () => {
	it("returns a pre-issued token unchanged", async () => {
		const auth = createAuthProvider({
			account: "XY12345",
			user: "svc_user",
			auth: { method: "pat", token: "abc" },
		});

		await expect(auth.issue()).resolves.toEqual({
			token: "abc",
			tokenType: "PROGRAMMATIC_ACCESS_TOKEN",
		});
	});

	it("signs a key-pair JWT with the derived fingerprint", async () => {
		const auth = createAuthProvider({
			account: "XY12345",
			user: "svc_user",
			auth: { method: "keypair", privateKeyPath: KEY_PATH, lifetimeSeconds: 3600 },
			now: () => FIXED_NOW,
		});

		const credential = await auth.issue();

		expect(credential.tokenType).toBe("KEYPAIR_JWT");
		const { payload } = decodeJwt(credential.token);
		expect(payload.iss).toBe(`XY12345.SVC_USER.${KEY_FINGERPRINT}`);
		expect(payload.sub).toBe("XY12345.SVC_USER");
		expect(payload.iat).toBe(1_700_000_000);
		expect(payload.exp - payload.iat).toBe(3600);
	});

	it("prefers a pre-supplied fingerprint", async () => {
		const auth = createAuthProvider({
			account: "acct",
			user: "user",
			auth: {
				method: "keypair",
				privateKeyPath: ENCRYPTED_KEY_PATH,
				privateKeyPassphrase: KEY_PASSPHRASE,
				publicKeyFingerprint: "SHA256:precomputed",
			},
			now: () => FIXED_NOW,
		});

		const { payload } = decodeJwt((await auth.issue()).token);

		expect(payload.iss).toBe("ACCT.USER.SHA256:precomputed");
		expect(payload.exp - payload.iat).toBe(3600);
	});

	it("surfaces a CryptoError for a wrong passphrase on issue", async () => {
		const auth = createAuthProvider({
			account: "acct",
			user: "user",
			auth: {
				method: "keypair",
				privateKeyPath: ENCRYPTED_KEY_PATH,
				privateKeyPassphrase: "wrong-passphrase",
			},
		});

		await expect(auth.issue()).rejects.toBeInstanceOf(CryptoError);
	});

	it("fails fast without a token for the pat method", () => {
		expect(() =>
			createAuthProvider({ account: "acct", user: "user", auth: { method: "pat", token: "" } }),
		).toThrow(ConfigError);
	});

	it("fails fast without a key path for the keypair method", () => {
		expect(() =>
			createAuthProvider({
				account: "acct",
				user: "user",
				auth: { method: "keypair", privateKeyPath: "" },
			}),
		).toThrow("privateKeyPath is required for auth method keypair");
	});

	it("rejects a non-positive lifetime", () => {
		expect(() =>
			createAuthProvider({
				account: "acct",
				user: "user",
				auth: { method: "keypair", privateKeyPath: KEY_PATH, lifetimeSeconds: 0 },
			}),
		).toThrow(ConfigError);
	});
});
