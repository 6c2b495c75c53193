import type { ChannelIdentity } from "./types.js";

/**
 * Control plane host: the configured URL without scheme or trailing slash,
 * or `{account}.snowflakecomputing.com`.
 */
export function resolveControlHost(account: string, controlUrl?: string): string {
	if (controlUrl) {
		return controlUrl.replace(/^https?:\/\//i, "").replace(/\/+$/, "");
	}
	return `${account}.snowflakecomputing.com`;
}

/**
 * Underscores are not valid in the DNS label of the ingest endpoint, though
 * account locators may contain them.
 */
export function normalizeIngestHost(hostname: string): string {
	return hostname.replaceAll("_", "-");
}

const seg = encodeURIComponent;

export class Endpoints {
	constructor(private readonly controlHost: string) {}

	hostname(): string {
		return `https://${this.controlHost}/v2/streaming/hostname`;
	}

	oauthToken(): string {
		return `https://${this.controlHost}/oauth/token`;
	}

	static channel(host: string, id: ChannelIdentity): string {
		return `https://${host}/v2/streaming/databases/${seg(id.database)}/schemas/${seg(id.schema)}/pipes/${seg(id.pipe)}/channels/${seg(id.channel)}`;
	}

	static rows(host: string, id: ChannelIdentity): string {
		return `https://${host}/v2/streaming/data/databases/${seg(id.database)}/schemas/${seg(id.schema)}/pipes/${seg(id.pipe)}/channels/${seg(id.channel)}/rows`;
	}

	static bulkChannelStatus(host: string, id: ChannelIdentity): string {
		return `https://${host}/v2/streaming/databases/${seg(id.database)}/schemas/${seg(id.schema)}/pipes/${seg(id.pipe)}:bulk-channel-status`;
	}
}
