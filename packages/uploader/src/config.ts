/**
 * Uploader configuration file.
 *
 * The file is a flat JSON object:
 *
 * ```json
 * {
 *   "account_identifier": "XY12345",
 *   "user": "svc_user",
 *   "database": "EDGE_DB",
 *   "schema": "PUBLIC",
 *   "pipe": "METRICS_PIPE",
 *   "channel_name": "device-01",
 *   "private_key_path": "./rsa_key.p8"
 * }
 * ```
 *
 * `auth_method` defaults to `pat` when a PAT is present and to key-pair JWT
 * otherwise. `max_attempts` turns on retries of transient failures. Values from `EDGE_UPLINK_*` environment variables fill in
 * whatever the file leaves out.
 */

import { readFile } from "node:fs/promises";
import {
	type AuthConfig,
	type ChannelIdentity,
	ConfigError,
	type StreamingClientOptions,
	StreamingEnvironment,
	type StreamingEnvironmentConfig,
} from "@edge-uplink/streaming";

export const DEFAULT_CONFIG_PATH = "edge_uplink_config.json";

export type UploaderConfig = {
	client: StreamingClientOptions;
	channel: ChannelIdentity;
};

const PAT_METHODS = new Set(["pat", "programmatic_access_token", "programmatic"]);
const KEYPAIR_METHODS = new Set(["keypair", "keypair_jwt", "jwt"]);

type RawConfig = Record<string, unknown>;

function optionalString(raw: RawConfig, ...keys: string[]): string | undefined {
	for (const key of keys) {
		const value = raw[key];
		if (typeof value === "string" && value.length > 0) {
			return value;
		}
		if (value !== undefined && value !== null && value !== "" && typeof value !== "string") {
			throw new ConfigError(`${key} must be a string`);
		}
	}
	return undefined;
}

function requiredString(raw: RawConfig, ...keys: string[]): string {
	const value = optionalString(raw, ...keys);
	if (value === undefined) {
		throw new ConfigError(`Missing ${keys.join(" (or ")}${keys.length > 1 ? ")" : ""} in config`);
	}
	return value;
}

function optionalPositiveInteger(raw: RawConfig, key: string): number | undefined {
	const value = raw[key];
	if (value === undefined || value === null || value === "") {
		return undefined;
	}
	const parsed = typeof value === "number" ? value : Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new ConfigError(`${key} must be a positive integer`);
	}
	return parsed;
}

function parseAuth(raw: RawConfig, env: StreamingEnvironmentConfig): AuthConfig {
	const pat = optionalString(raw, "pat_token", "pat");
	const method = (optionalString(raw, "auth_method") ?? (pat ? "pat" : undefined))?.toLowerCase();

	if (method !== undefined && PAT_METHODS.has(method)) {
		const token = pat ?? (env.auth?.method === "pat" ? env.auth.token : undefined);
		if (!token) {
			throw new ConfigError("pat_token is required for auth_method=pat");
		}
		return { method: "pat", token };
	}

	if (method !== undefined && !KEYPAIR_METHODS.has(method)) {
		throw new ConfigError(`Unknown auth_method "${method}"`);
	}

	const privateKeyPath = optionalString(raw, "private_key_path");
	if (!privateKeyPath) {
		if (env.auth) {
			return env.auth;
		}
		throw new ConfigError("private_key_path is required for key-pair authentication");
	}
	return {
		method: "keypair",
		privateKeyPath,
		privateKeyPassphrase: optionalString(raw, "private_key_passphrase"),
		publicKeyFingerprint: optionalString(raw, "public_key_fp"),
		lifetimeSeconds: optionalPositiveInteger(raw, "jwt_lifetime_seconds"),
	};
}

/**
 * Validate a parsed config object.
 *
 * @throws {ConfigError} On missing or mistyped fields.
 */
export function parseUploaderConfig(
	raw: unknown,
	env: StreamingEnvironmentConfig = {},
): UploaderConfig {
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		throw new ConfigError("Config must be a JSON object");
	}
	const config: RawConfig = { ...raw };

	const account = optionalString(config, "account_identifier", "account") ?? env.account;
	if (!account) {
		throw new ConfigError("Missing account_identifier (or account) in config");
	}
	const user = optionalString(config, "user") ?? env.user;
	if (!user) {
		throw new ConfigError("Missing user in config");
	}

	const maxAttempts = optionalPositiveInteger(config, "max_attempts");
	return {
		client: {
			account,
			user,
			auth: parseAuth(config, env),
			controlUrl: optionalString(config, "url") ?? env.controlUrl,
			...(maxAttempts !== undefined ? { retry: { maxAttempts } } : {}),
		},
		channel: {
			database: requiredString(config, "database"),
			schema: requiredString(config, "schema"),
			pipe: requiredString(config, "pipe"),
			channel: requiredString(config, "channel_name"),
		},
	};
}

/**
 * Read and validate the config file at `path`.
 */
export async function loadUploaderConfig(
	path: string,
	env: Record<string, string | undefined> = process.env,
): Promise<UploaderConfig> {
	let text: string;
	try {
		text = await readFile(path, "utf8");
	} catch (error) {
		throw new ConfigError(
			`Unable to read config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
		);
	}
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		throw new ConfigError(
			`Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
		);
	}
	return parseUploaderConfig(raw, StreamingEnvironment.parse(env));
}
