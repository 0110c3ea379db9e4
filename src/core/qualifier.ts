// Build qualifier derivation: fixed-width UTC timestamp followed by the branch
// FORMAT THEOREM: ∀d1 < d2, ∀b: makeQualifier(d1, b) <lex makeQualifier(d2, b)
// PURITY: CORE
// INVARIANT: Output depends only on (date, branch); no clock access
// COMPLEXITY: O(|branch|)

/**
 * Branch name used when the root repository is on a detached HEAD.
 */
export const DETACHED_BRANCH = "detached";

const pad = (value: number, width: number): string =>
	String(value).padStart(width, "0");

/**
 * Formats a date as `YYYYMMDD-HHMMSS` in UTC.
 *
 * @pure true
 * @invariant result.length === 15
 *
 * @example
 * ```ts
 * formatQualifierTimestamp(new Date("2023-01-03T04:05:06Z")); // "20230103-040506"
 * ```
 */
export function formatQualifierTimestamp(date: Date): string {
	return [
		pad(date.getUTCFullYear(), 4),
		pad(date.getUTCMonth() + 1, 2),
		pad(date.getUTCDate(), 2),
		"-",
		pad(date.getUTCHours(), 2),
		pad(date.getUTCMinutes(), 2),
		pad(date.getUTCSeconds(), 2),
	].join("");
}

/**
 * Branch names may contain `/`, which is not allowed in a version qualifier.
 *
 * @pure true
 */
export const sanitizeBranch = (branch: string): string =>
	branch.replace(/\//gu, "_");

/**
 * @pure true
 *
 * @example
 * ```ts
 * makeQualifier(new Date("2023-01-03T00:00:00Z"), "feature/x");
 * // "20230103-000000-feature_x"
 * ```
 */
export function makeQualifier(date: Date, branch: string): string {
	return `${formatQualifierTimestamp(date)}-${sanitizeBranch(branch)}`;
}

/**
 * Latest of a set of dates; null for an empty set.
 *
 * @pure true
 * @invariant result === null ↔ dates.length === 0
 */
export function latestDate(dates: readonly Date[]): Date | null {
	let latest: Date | null = null;
	for (const date of dates) {
		if (latest === null || date.getTime() > latest.getTime()) latest = date;
	}
	return latest;
}
