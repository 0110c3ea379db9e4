// Aggregation over per-repository outcomes of a fleet operation
// PURITY: CORE
// COMPLEXITY: O(n) where n = |report|

import { FleetOperationFailed } from "../errors.js";
import type { FleetReport, RepositoryOutcome } from "../types/index.js";

export interface ReportSummary {
	readonly applied: number;
	readonly failed: number;
}

/**
 * @pure true
 * @invariant applied + failed = report.size
 */
export function summarizeReport(report: FleetReport): ReportSummary {
	let applied = 0;
	let failed = 0;
	for (const outcome of report.values()) {
		if (outcome._tag === "Applied") applied += 1;
		else failed += 1;
	}
	return { applied, failed };
}

export const reportSucceeded = (report: FleetReport): boolean =>
	summarizeReport(report).failed === 0;

/**
 * Entries whose outcome is Failed, in processing order.
 *
 * @pure true
 */
export function failedEntries(
	report: FleetReport,
): readonly (readonly [string, Extract<RepositoryOutcome, { _tag: "Failed" }>])[] {
	const failures: [string, Extract<RepositoryOutcome, { _tag: "Failed" }>][] = [];
	for (const [repository, outcome] of report) {
		if (outcome._tag === "Failed") failures.push([repository, outcome]);
	}
	return failures;
}

/**
 * Converts a report with failures into a typed error; null when all succeeded.
 *
 * @pure true
 */
export function reportFailure(
	operation: string,
	report: FleetReport,
): FleetOperationFailed | null {
	const failures = failedEntries(report);
	if (failures.length === 0) return null;
	return new FleetOperationFailed({
		operation,
		failures: failures.map(([repository, outcome]) => ({
			repository,
			diagnostic: outcome.error.diagnostic,
		})),
	});
}
