// Release and bootstrap workflow model
// PURITY: CORE

import type { Effect } from "effect";

import type { AppError } from "../errors.js";
import type { ConfirmationLevel } from "./fleet.js";

export interface ReleaseInputs {
	readonly releaseBranch: string;
	readonly developBranch: string;
	readonly currentDevelopVersion: string;
	readonly nextReleaseVersion: string;
	readonly nextDevelopVersion: string;
	/** Tag name; null means `release-<nextReleaseVersion>`. */
	readonly tagName: string | null;
}

export interface BootstrapInputs {
	readonly currentVersion: string;
	readonly currentBaselineVersion: string;
	/** Null means the current baseline with its trailing number incremented. */
	readonly nextBaselineVersion: string | null;
}

/**
 * Recorded position of a state machine.
 *
 * @invariant history[history.length - 1] === state
 */
export interface MachineRecord<S extends string> {
	readonly state: S;
	readonly history: readonly S[];
}

export type WorkflowOutcome =
	| { readonly _tag: "Completed" }
	| { readonly _tag: "Aborted" }
	| { readonly _tag: "Failed"; readonly error: AppError };

/**
 * Terminal result of a workflow run.
 *
 * @property state State the workflow stopped in (Done, or where it aborted/failed)
 */
export interface WorkflowResult<S extends string> {
	readonly outcome: WorkflowOutcome;
	readonly state: S;
	readonly history: readonly S[];
}

export interface ConfirmRequest {
	readonly message: string;
	readonly level: ConfirmationLevel;
}

/**
 * Capability that asks a human. Injected so the core never touches a terminal.
 *
 * @invariant A request with level "none" resolves to true without asking
 */
export interface Confirmer {
	readonly confirm: (request: ConfirmRequest) => Effect.Effect<boolean>;
}
