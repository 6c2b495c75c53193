import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { type Row, StreamingError } from "@edge-uplink/streaming";

/** Source of rows for the uploader loop. */
export type RowProducer = AsyncIterable<Row>;

/**
 * Parse newline-delimited JSON objects from `input`. Blank lines are skipped.
 * Reading stops when `signal` aborts.
 *
 * @throws {StreamingError} `INVALID_ROW` when a line is not a JSON object.
 */
export async function* readNdjsonRows(input: Readable, signal?: AbortSignal): AsyncGenerator<Row> {
	const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
	const stop = () => lines.close();
	signal?.addEventListener("abort", stop, { once: true });
	let lineNumber = 0;
	try {
		if (signal?.aborted) {
			return;
		}
		for await (const line of lines) {
			lineNumber++;
			if (line.trim() === "") {
				continue;
			}
			yield parseRow(line, lineNumber);
		}
	} finally {
		signal?.removeEventListener("abort", stop);
		lines.close();
	}
}

function parseRow(line: string, lineNumber: number): Row {
	let value: unknown;
	try {
		value = JSON.parse(line);
	} catch (error) {
		throw new StreamingError({
			message: `Line ${lineNumber} is not valid JSON`,
			code: "INVALID_ROW",
			origin: "sdk",
			cause: error,
		});
	}
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		throw new StreamingError({
			message: `Line ${lineNumber} is not a JSON object`,
			code: "INVALID_ROW",
			origin: "sdk",
		});
	}
	return { ...value };
}

/** Rows from an NDJSON file, or from stdin when `path` is omitted or `-`. */
export function ndjsonProducer(path?: string, signal?: AbortSignal): RowProducer {
	if (path === undefined || path === "-") {
		return readNdjsonRows(process.stdin, signal);
	}
	return readNdjsonRows(createReadStream(path, { encoding: "utf8" }), signal);
}

/**
 * Group rows into arrays of at most `size`. The last batch may be short;
 * an exhausted producer yields nothing more.
 */
export async function* batchRows(rows: RowProducer, size: number): AsyncGenerator<Row[]> {
	if (!Number.isInteger(size) || size < 1) {
		throw new StreamingError({
			message: `Batch size must be a positive integer, got ${size}`,
			code: "INVALID_ARGUMENT",
			origin: "sdk",
		});
	}
	let batch: Row[] = [];
	for await (const row of rows) {
		batch.push(row);
		if (batch.length >= size) {
			yield batch;
			batch = [];
		}
	}
	if (batch.length > 0) {
		yield batch;
	}
}
