import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { StreamingClient } from "../client.js";
import type { StreamingClientOptions } from "../common.js";
import { normalizeIngestHost, resolveControlHost } from "../endpoints.js";
import { HttpError, ProtocolError } from "../error.js";
import { FakeIngestService } from "./helpers/fake-service.js";

const KEY_PATH = fileURLToPath(new URL("./fixtures/rsa_key.p8", import.meta.url));

const makeClient = (
	service: FakeIngestService,
	auth: StreamingClientOptions["auth"] = { method: "pat", token: "abc" },
) =>
	new StreamingClient({
		account: "XY12345",
		user: "svc_user",
		auth,
		controlUrl: "https://control.example.com/",
		retry: { maxAttempts: 1 },
		fetch: service.fetch,
	});

describe("normalizeIngestHost", () => {
	it("replaces every underscore with a hyphen and nothing else", () => {
		expect(normalizeIngestHost("abc_def-123")).toBe("abc-def-123");
		expect(normalizeIngestHost("a_b_c.region_1.example.com")).toBe("a-b-c.region-1.example.com");
		expect(normalizeIngestHost("plain-host.example.com")).toBe("plain-host.example.com");
	});
});

describe("resolveControlHost", () => {
	it("strips scheme and trailing slash from a configured URL", () => {
		expect(resolveControlHost("acct", "https://myorg-acct.snowflakecomputing.com/")).toBe(
			"myorg-acct.snowflakecomputing.com",
		);
		expect(resolveControlHost("acct", "http://localhost:8080")).toBe("localhost:8080");
	});

	it("derives the host from the account by default", () => {
		expect(resolveControlHost("XY12345")).toBe("XY12345.snowflakecomputing.com");
	});
});

describe("TokenExchanger.resolveHost", () => {
	it("reads the hostname from a JSON body and normalizes it", async () => {
		const service = new FakeIngestService();
		const client = makeClient(service);

		await expect(client.exchanger.resolveHost()).resolves.toBe("ingest-host.example.com");

		const [request] = service.requests;
		expect(request?.method).toBe("GET");
		expect(request?.url.toString()).toBe("https://control.example.com/v2/streaming/hostname");
		expect(request?.headers.get("authorization")).toBe("Bearer abc");
		expect(request?.headers.get("x-snowflake-authorization-token-type")).toBe(
			"PROGRAMMATIC_ACCESS_TOKEN",
		);
	});

	it("accepts a raw text body", async () => {
		const service = new FakeIngestService({ hostnameBody: "  abc_def-123\n" });

		await expect(makeClient(service).exchanger.resolveHost()).resolves.toBe("abc-def-123");
	});

	it("fails with ProtocolError when the JSON has no hostname", async () => {
		const service = new FakeIngestService({ hostnameBody: JSON.stringify({ other: 1 }) });

		await expect(makeClient(service).exchanger.resolveHost()).rejects.toBeInstanceOf(
			ProtocolError,
		);
	});

	it("fails with ProtocolError on an empty body", async () => {
		const service = new FakeIngestService({ hostnameBody: "" });

		await expect(makeClient(service).exchanger.resolveHost()).rejects.toThrow(
			"Missing hostname in response",
		);
	});

	it("surfaces non-2xx answers as HttpError", async () => {
		const service = new FakeIngestService();
		service.failNext(/hostname$/, 403, 1, "forbidden");

		const error = await makeClient(service).exchanger.resolveHost().catch((e: unknown) => e);

		expect(error).toBeInstanceOf(HttpError);
		expect(error).toMatchObject({ status: 403, body: "forbidden" });
	});
});

describe("TokenExchanger.exchangeScopedToken", () => {
	it("reuses a programmatic access token without a network call", async () => {
		const service = new FakeIngestService();

		const scoped = await makeClient(service).exchanger.exchangeScopedToken("ingest.example.com");

		expect(scoped).toMatchObject({
			token: "abc",
			tokenType: "PROGRAMMATIC_ACCESS_TOKEN",
			host: "ingest.example.com",
		});
		expect(service.requests).toHaveLength(0);
	});

	it("exchanges a key-pair JWT through the jwt-bearer grant", async () => {
		const service = new FakeIngestService({ scopedToken: "scoped-oauth-token" });
		const client = makeClient(service, { method: "keypair", privateKeyPath: KEY_PATH });

		const scoped = await client.exchanger.exchangeScopedToken("ingest-host.example.com");

		expect(scoped).toMatchObject({
			token: "scoped-oauth-token",
			tokenType: "OAUTH",
			host: "ingest-host.example.com",
		});
		const [request] = service.requestsTo("POST", "/oauth/token");
		expect(request?.url.toString()).toBe("https://control.example.com/oauth/token");
		expect(request?.headers.get("content-type")).toBe("application/x-www-form-urlencoded");
		expect(request?.headers.get("x-snowflake-authorization-token-type")).toBe("KEYPAIR_JWT");
		expect(request?.headers.get("authorization")).toMatch(/^Bearer [\w-]+\.[\w-]+\.[\w-]+$/);
		const form = new URLSearchParams(request?.body);
		expect(form.get("grant_type")).toBe("urn:ietf:params:oauth:grant-type:jwt-bearer");
		expect(form.get("scope")).toBe("ingest-host.example.com");
	});

	it("fails with ProtocolError when the response has no token", async () => {
		const fetchImpl = async () => new Response(JSON.stringify({ expires_in: 3600 }), { status: 200 });
		const client = new StreamingClient({
			account: "acct",
			user: "user",
			auth: { method: "keypair", privateKeyPath: KEY_PATH },
			fetch: fetchImpl,
		});

		await expect(client.exchanger.exchangeScopedToken("ingest.example.com")).rejects.toBeInstanceOf(
			ProtocolError,
		);
	});

	it("fails with HttpError on a non-2xx answer", async () => {
		const service = new FakeIngestService();
		service.failNext(/oauth\/token$/, 400, 1, "invalid_grant");
		const client = makeClient(service, { method: "keypair", privateKeyPath: KEY_PATH });

		await expect(client.exchanger.exchangeScopedToken("ingest.example.com")).rejects.toMatchObject({
			name: "HttpError",
			status: 400,
		});
	});
});
