import { StreamingError } from "../error.js";
import type { Row } from "../types.js";

/**
 * One JSON object per line, every line terminated by `\n`.
 *
 * @throws {StreamingError} If a row cannot be serialized (cycles, bigint values).
 */
export function serializeRows(rows: ReadonlyArray<Row>): string {
	let out = "";
	for (const [index, row] of rows.entries()) {
		try {
			out += `${JSON.stringify(row)}\n`;
		} catch (error) {
			throw new StreamingError({
				message: `Row ${index} is not JSON serializable: ${error instanceof Error ? error.message : String(error)}`,
				code: "INVALID_ROW",
				cause: error,
			});
		}
	}
	return out;
}

export function utf8ByteLength(value: string): number {
	return new TextEncoder().encode(value).byteLength;
}
