// Human readable rendering of errors and fleet reports
// PURITY: CORE
// INVARIANT: Backend diagnostics are reproduced verbatim

import { match } from "ts-pattern";

import type { AppError } from "../errors.js";
import { summarizeReport } from "../fleet/report.js";
import type { FleetReport } from "../types/index.js";

/**
 * @pure true
 */
export const formatAppError = (error: AppError): string =>
	match(error)
		.with({ _tag: "ValidationError" }, (e) => `Validation failed (${e.reason}): ${e.detail}`)
		.with(
			{ _tag: "BackendError" },
			(e) => `${e.backend} failed in ${e.location}: ${e.command}\n${e.diagnostic}`,
		)
		.with({ _tag: "StateMismatchError" }, (e) => `State mismatch: ${e.detail}`)
		.with({ _tag: "FleetOperationFailed" }, (e) =>
			[
				`${e.operation} failed in ${e.failures.length} repositor${e.failures.length === 1 ? "y" : "ies"}:`,
				...e.failures.map((failure) => `  ${failure.repository}: ${failure.diagnostic}`),
			].join("\n"),
		)
		.with({ _tag: "FS" }, (e) =>
			e.path === undefined ? `Filesystem error: ${e.detail}` : `Filesystem error at ${e.path}: ${e.detail}`,
		)
		.with({ _tag: "InvariantViolation" }, (e) => `Internal error in ${e.where}: ${e.detail}`)
		.exhaustive();

/**
 * One line per repository followed by a summary line.
 *
 * @param displayName Maps an absolute repository path to the name shown
 * @pure true
 *
 * @example
 * ```ts
 * formatFleetReport(new Map([["/f/a", { _tag: "Applied", detail: "pushed" }]]), (p) => p);
 * // "✅ /f/a: pushed\n1 applied, 0 failed"
 * ```
 */
export function formatFleetReport(
	report: FleetReport,
	displayName: (repositoryPath: string) => string,
): string {
	const lines: string[] = [];
	for (const [repository, outcome] of report) {
		lines.push(
			match(outcome)
				.with({ _tag: "Applied" }, ({ detail }) => `✅ ${displayName(repository)}: ${detail}`)
				.with(
					{ _tag: "Failed" },
					({ error }) => `❌ ${displayName(repository)}: ${error.diagnostic}`,
				)
				.exhaustive(),
		);
	}
	const { applied, failed } = summarizeReport(report);
	lines.push(`${applied} applied, ${failed} failed`);
	return lines.join("\n");
}
