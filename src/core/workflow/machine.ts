// Linear workflow state machine with an abort state
// PURITY: CORE
// INVARIANT: A record only moves to the next state of its sequence or to the abort state
// INVARIANT: Terminal states (last of sequence, abort) have no transitions
// COMPLEXITY: O(|sequence|) per transition

import { Effect } from "effect";

import { InvariantViolation } from "../errors.js";
import type { MachineRecord } from "../types/index.js";

/**
 * @property sequence States from start to done, in order
 */
export interface MachineDefinition<S extends string> {
	readonly name: string;
	readonly sequence: readonly S[];
	readonly aborted: S;
}

export function startMachine<S extends string>(
	definition: MachineDefinition<S>,
): MachineRecord<S> {
	const [first] = definition.sequence;
	const state = first ?? definition.aborted;
	return { state, history: [state] };
}

/**
 * The state after `state` on the happy path, or null at the end.
 *
 * @pure true
 */
export function nextState<S extends string>(
	definition: MachineDefinition<S>,
	state: S,
): S | null {
	const index = definition.sequence.indexOf(state);
	if (index < 0) return null;
	return definition.sequence[index + 1] ?? null;
}

/**
 * Legal successors of a state.
 *
 * @pure true
 */
export function transitionsFrom<S extends string>(
	definition: MachineDefinition<S>,
	state: S,
): readonly S[] {
	const next = nextState(definition, state);
	return next === null ? [] : [next, definition.aborted];
}

export const isTerminal = <S extends string>(
	definition: MachineDefinition<S>,
	state: S,
): boolean => transitionsFrom(definition, state).length === 0;

/**
 * Moves a record to `to`, rejecting transitions the definition does not allow.
 *
 * @pure true
 * @effect Effect<MachineRecord<S>, InvariantViolation>
 */
export function advance<S extends string>(
	definition: MachineDefinition<S>,
	record: MachineRecord<S>,
	to: S,
): Effect.Effect<MachineRecord<S>, InvariantViolation> {
	if (!transitionsFrom(definition, record.state).includes(to)) {
		return Effect.fail(
			new InvariantViolation({
				where: `${definition.name} workflow`,
				detail: `Illegal transition ${record.state} -> ${to}`,
			}),
		);
	}
	return Effect.succeed({ state: to, history: [...record.history, to] });
}
