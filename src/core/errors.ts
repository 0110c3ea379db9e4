// Typed domain error ADT for the functional core, built on Effect.Data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Why a request was rejected before anything was mutated.
 */
export type ValidationReason =
	| "cyclic-dependency"
	| "unknown-target"
	| "missing-parameter"
	| "invalid-argument"
	| "snapshot-dependency"
	| "invalid-config"
	| "precondition";

/**
 * A request is malformed or violates a precondition.
 *
 * Always reported before any repository, descriptor or build is touched.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ValidationError extends Data.TaggedError("ValidationError")<{
	readonly reason: ValidationReason;
	readonly detail: string;
}> {}

/**
 * External processes the orchestrator drives.
 */
export type BackendKind = "git" | "maven" | "gradle" | "script" | "process";

/**
 * An external process returned non-zero or could not be started.
 *
 * @pure true (Data class)
 * @invariant command.length > 0; diagnostic is the tool's own output, verbatim
 */
export class BackendError extends Data.TaggedError("BackendError")<{
	readonly backend: BackendKind;
	readonly command: string;
	readonly diagnostic: string;
	readonly location: string;
}> {}

/**
 * The fleet is in a state that forbids the requested operation.
 *
 * @pure true (Data class)
 */
export class StateMismatchError extends Data.TaggedError(
	"StateMismatchError",
)<{
	readonly detail: string;
}> {}

/**
 * A fleet-wide git operation left at least one repository failed.
 *
 * @pure true (Data class)
 * @invariant failures.length > 0
 */
export class FleetOperationFailed extends Data.TaggedError(
	"FleetOperationFailed",
)<{
	readonly operation: string;
	readonly failures: readonly {
		readonly repository: string;
		readonly diagnostic: string;
	}[];
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Invariant violation - an internal guarantee was broken
 *
 * @pure true (Data class)
 * @invariant where.length > 0 ∧ detail.length > 0
 */
export class InvariantViolation extends Data.TaggedError("InvariantViolation")<{
	readonly where: string;
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| ValidationError
	| BackendError
	| StateMismatchError
	| FleetOperationFailed
	| FSError
	| InvariantViolation;
