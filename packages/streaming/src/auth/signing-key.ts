import { createPrivateKey, createPublicKey, type KeyObject, sign } from "node:crypto";
import { readFile } from "node:fs/promises";
import { sha256 } from "@noble/hashes/sha256";
import { base64 } from "@scure/base";
import { CryptoError } from "../error.js";

/**
 * RSA private key used to sign key-pair JWTs.
 *
 * @example
 * ```typescript
 * const key = await SigningKey.fromFile("./rsa_key.p8", process.env.KEY_PASSPHRASE);
 * console.log("Fingerprint:", key.publicKeyFingerprint());
 * ```
 */
export class SigningKey {
	private readonly privateKey: KeyObject;
	private fingerprint: string | undefined;

	private constructor(privateKey: KeyObject) {
		this.privateKey = privateKey;
	}

	/**
	 * Load a PEM encoded private key (PKCS#8 or PKCS#1), optionally encrypted.
	 *
	 * @throws {CryptoError} If the file cannot be read, the passphrase is wrong, or the key is not RSA.
	 */
	static async fromFile(path: string, passphrase?: string): Promise<SigningKey> {
		let pem: Buffer;
		try {
			pem = await readFile(path);
		} catch (error) {
			throw new CryptoError(`Unable to read private key file ${path}`, error);
		}
		return SigningKey.fromPem(pem, passphrase);
	}

	static fromPem(pem: string | Buffer, passphrase?: string): SigningKey {
		let key: KeyObject;
		try {
			key = createPrivateKey({ key: pem, format: "pem", passphrase });
		} catch (error) {
			const detail = error instanceof Error ? error.message : String(error);
			throw new CryptoError(
				passphrase === undefined
					? `Unable to load private key: ${detail}`
					: `Unable to load private key (check the passphrase): ${detail}`,
				error,
			);
		}
		if (key.asymmetricKeyType !== "rsa") {
			throw new CryptoError(
				`Expected an RSA private key, got ${key.asymmetricKeyType ?? "unknown"}`,
			);
		}
		return new SigningKey(key);
	}

	/**
	 * `SHA256:` followed by the base64 SHA-256 digest of the DER encoded
	 * SubjectPublicKeyInfo. This is the value registered on the user as
	 * its public key fingerprint.
	 */
	publicKeyFingerprint(): string {
		if (this.fingerprint === undefined) {
			const der = createPublicKey(this.privateKey).export({
				type: "spki",
				format: "der",
			});
			this.fingerprint = `SHA256:${base64.encode(sha256(new Uint8Array(der)))}`;
		}
		return this.fingerprint;
	}

	/**
	 * RSASSA-PKCS1-v1_5 with SHA-256 (JWS `RS256`).
	 */
	signRs256(data: Uint8Array): Uint8Array {
		try {
			return new Uint8Array(sign("sha256", data, this.privateKey));
		} catch (error) {
			throw new CryptoError("Failed to sign token", error);
		}
	}
}
