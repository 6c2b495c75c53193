import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError, CryptoError, HttpError, isRetryable, StreamingError, streamingError } from "../error.js";
import { computeBackoffMillis, resolveRetryConfig, withRetries } from "../lib/retry.js";

describe("computeBackoffMillis", () => {
	const config = { minBaseDelayMillis: 100, maxBaseDelayMillis: 1000 };

	it("doubles the base per attempt up to the cap", () => {
		const noJitter = () => 0;
		expect(computeBackoffMillis(1, config, noJitter)).toBe(100);
		expect(computeBackoffMillis(2, config, noJitter)).toBe(200);
		expect(computeBackoffMillis(4, config, noJitter)).toBe(800);
		expect(computeBackoffMillis(5, config, noJitter)).toBe(1000);
		expect(computeBackoffMillis(9, config, noJitter)).toBe(1000);
	});

	it("adds up to one base of jitter", () => {
		expect(computeBackoffMillis(1, config, () => 0.5)).toBe(150);
		expect(computeBackoffMillis(5, config, () => 0.999)).toBe(1999);
	});
});

describe("resolveRetryConfig", () => {
	it("fills defaults", () => {
		expect(resolveRetryConfig()).toEqual({
			maxAttempts: 1,
			minBaseDelayMillis: 100,
			maxBaseDelayMillis: 1000,
			appendRetryPolicy: "noSideEffects",
		});
	});

	it("rejects fewer than one attempt", () => {
		expect(() => resolveRetryConfig({ maxAttempts: 0 })).toThrow(ConfigError);
	});
});

describe("isRetryable", () => {
	it("retries throttling, timeouts and server errors", () => {
		expect(isRetryable(new HttpError({ status: 503, body: "" }))).toBe(true);
		expect(isRetryable(new HttpError({ status: 429, body: "" }))).toBe(true);
		expect(isRetryable(new HttpError({ status: 408, body: "" }))).toBe(true);
		expect(isRetryable(streamingError(new TypeError("fetch failed")))).toBe(true);
	});

	it("does not retry client errors or local failures", () => {
		expect(isRetryable(new HttpError({ status: 400, body: "" }))).toBe(false);
		expect(isRetryable(new HttpError({ status: 401, body: "" }))).toBe(false);
		expect(isRetryable(new ConfigError("missing"))).toBe(false);
		expect(isRetryable(new CryptoError("bad key"))).toBe(false);
	});
});

describe("withRetries", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	const config = resolveRetryConfig({ maxAttempts: 3, minBaseDelayMillis: 100, maxBaseDelayMillis: 100 });

	it("retries transient failures until success", async () => {
		const operation = vi
			.fn<(attempt: number) => Promise<string>>()
			.mockRejectedValueOnce(new HttpError({ status: 502, body: "bad gateway" }))
			.mockResolvedValueOnce("ok");

		const result = withRetries(operation, config, { label: "test" });
		await vi.advanceTimersByTimeAsync(200);

		await expect(result).resolves.toBe("ok");
		expect(operation).toHaveBeenCalledTimes(2);
		expect(operation).toHaveBeenLastCalledWith(2);
	});

	it("gives up after maxAttempts with the last error", async () => {
		const operation = vi.fn(async (attempt: number): Promise<string> => {
			throw new HttpError({ status: 500, body: `attempt ${attempt}` });
		});

		const result = withRetries(operation, config, { label: "test" });
		const settled = result.catch((e: unknown) => e);
		await vi.advanceTimersByTimeAsync(1000);

		const error = await settled;
		expect(error).toBeInstanceOf(HttpError);
		expect(error).toMatchObject({ body: "attempt 3" });
		expect(operation).toHaveBeenCalledTimes(3);
	});

	it("does not retry when the call is marked non-retryable", async () => {
		const operation = vi.fn(async (): Promise<string> => {
			throw new HttpError({ status: 503, body: "" });
		});

		await expect(
			withRetries(operation, config, { label: "test", retryable: false }),
		).rejects.toBeInstanceOf(HttpError);
		expect(operation).toHaveBeenCalledTimes(1);
	});

	it("wraps unknown failures in StreamingError", async () => {
		const operation = vi.fn(async (): Promise<string> => {
			throw "boom";
		});

		await expect(withRetries(operation, config, { label: "test" })).rejects.toBeInstanceOf(
			StreamingError,
		);
		expect(operation).toHaveBeenCalledTimes(1);
	});
});
