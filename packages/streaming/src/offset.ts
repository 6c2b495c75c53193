/**
 * How two offset tokens are ordered.
 *
 * - `numeric`: tokens made only of digits compare as integers, so `"10" > "9"`.
 *   Any other pair falls back to `lexical`.
 * - `lexical`: plain string comparison. Only correct when every token has the
 *   same length.
 */
export type OffsetOrdering = "numeric" | "lexical";

const DIGITS = /^\d+$/;

/**
 * Negative if `a` sorts before `b`, zero if equal, positive otherwise.
 */
export function compareOffsetTokens(
	a: string,
	b: string,
	ordering: OffsetOrdering = "numeric",
): number {
	if (ordering === "numeric" && DIGITS.test(a) && DIGITS.test(b)) {
		const x = BigInt(a);
		const y = BigInt(b);
		return x === y ? 0 : x < y ? -1 : 1;
	}
	return a === b ? 0 : a < b ? -1 : 1;
}

export function isCommitted(
	committed: string | undefined,
	expected: string,
	ordering: OffsetOrdering = "numeric",
): boolean {
	return committed !== undefined && compareOffsetTokens(committed, expected, ordering) >= 0;
}

/**
 * Offset token for the batch after `previous`: `"1"` when there is none,
 * `previous + 1` for numeric tokens, else the current epoch millis.
 */
export function nextOffsetToken(previous: string | undefined, now: () => number = Date.now): string {
	if (previous === undefined) {
		return "1";
	}
	if (DIGITS.test(previous)) {
		return (BigInt(previous) + 1n).toString();
	}
	return String(now());
}
