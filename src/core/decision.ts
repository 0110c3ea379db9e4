// Pure decision functions mapping outcomes to exit codes
// FORMAT THEOREM: ∀o ∈ CommandOutcome: computeExitCode(o) = 0 ↔ o = "Succeeded"
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping Outcome → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Effect, pipe } from "effect";
import { match } from "ts-pattern";

import type { CommandOutcome, ExitCode } from "./models.js";
import { reportSucceeded } from "./fleet/report.js";
import type { FleetReport } from "./types/index.js";
import type { WorkflowOutcome } from "./types/workflow.js";

/**
 * Computes process exit code from a command outcome (pure function).
 *
 * @returns 0 only for a command that ran to completion
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 *
 * @example
 * ```ts
 * computeExitCode("Aborted"); // => 1
 * ```
 */
export const computeExitCode = (outcome: CommandOutcome): ExitCode =>
	outcome === "Succeeded" ? 0 : 1;

/**
 * A fleet operation succeeds only when every repository succeeded.
 *
 * @pure true
 */
export const fleetReportOutcome = (report: FleetReport): CommandOutcome =>
	reportSucceeded(report) ? "Succeeded" : "Failed";

/**
 * Maps a workflow's terminal outcome onto the command outcome vocabulary.
 *
 * @pure true
 */
export const workflowCommandOutcome = (
	outcome: WorkflowOutcome,
): CommandOutcome =>
	match(outcome)
		.with({ _tag: "Completed" }, (): CommandOutcome => "Succeeded")
		.with({ _tag: "Aborted" }, (): CommandOutcome => "Aborted")
		.with({ _tag: "Failed" }, (): CommandOutcome => "Failed")
		.exhaustive();

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @effect Effect<ExitCode, never, never>
 * @invariant Result is Effect.succeed(exitCode) where exitCode ∈ {0,1}
 */
export const computeExitCodeEffect = (
	outcome: CommandOutcome,
): Effect.Effect<ExitCode> => pipe(outcome, computeExitCode, Effect.succeed);
