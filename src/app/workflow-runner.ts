// Drives a linear state machine through gated steps
// PURITY: APP
// INVARIANT: The record moves one state per step; failure keeps the state it happened in
// INVARIANT: A declined gate aborts, except on optional steps, which are skipped

import { Effect, Either } from "effect";

import type { AppError } from "../core/errors.js";
import { advance, type MachineDefinition, startMachine } from "../core/workflow/machine.js";
import type { Confirmer, MachineRecord, WorkflowOutcome, WorkflowResult } from "../core/types/index.js";
import type { Logger } from "../shell/output/logger.js";

/**
 * Work done on entering `state`.
 *
 * @property confirm Question asked before running; null runs without asking
 * @property optional Declining skips the step instead of aborting
 */
export interface WorkflowStep<S extends string> {
	readonly state: S;
	readonly confirm: string | null;
	readonly optional?: boolean;
	readonly run: Effect.Effect<void, AppError>;
}

const result = <S extends string>(
	outcome: WorkflowOutcome,
	record: MachineRecord<S>,
): WorkflowResult<S> => ({ outcome, state: record.state, history: record.history });

/**
 * Runs `steps` in order, then moves to the final state of the sequence.
 *
 * @effect Effect<WorkflowResult<S>, never>
 */
export function runWorkflow<S extends string>(
	definition: MachineDefinition<S>,
	steps: readonly WorkflowStep<S>[],
	confirmer: Confirmer,
	logger: Logger,
): Effect.Effect<WorkflowResult<S>> {
	const done = definition.sequence[definition.sequence.length - 1];
	return Effect.suspend(() => {
		let record = startMachine(definition);
		return Effect.gen(function* () {
			for (const step of steps) {
				record = yield* advance(definition, record, step.state);
				logger.step(`${definition.name}: ${step.state}`);
				if (step.confirm !== null) {
					const confirmed = yield* confirmer.confirm({ message: step.confirm, level: "once" });
					if (!confirmed && step.optional === true) {
						logger.info(`Skipped ${step.state}`);
						continue;
					}
					if (!confirmed) {
						record = yield* advance(definition, record, definition.aborted);
						return result<S>({ _tag: "Aborted" }, record);
					}
				}
				const outcome = yield* Effect.either(step.run);
				if (Either.isLeft(outcome)) return result<S>({ _tag: "Failed", error: outcome.left }, record);
			}
			if (done !== undefined) record = yield* advance(definition, record, done);
			return result<S>({ _tag: "Completed" }, record);
		}).pipe(
			Effect.catchAll((error) => Effect.succeed(result<S>({ _tag: "Failed", error }, record))),
		);
	});
}
