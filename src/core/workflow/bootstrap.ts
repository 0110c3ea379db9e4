// Bootstrap workflow states, baseline arithmetic and preconditions
// PURITY: CORE

import { Effect } from "effect";

import { ValidationError } from "../errors.js";
import type { BootstrapInputs } from "../types/index.js";
import { isSnapshotVersion } from "../versions/eclipse.js";
import type { MachineDefinition } from "./machine.js";
import { nextState } from "./machine.js";

export type BootstrapState =
	| "Start"
	| "ValidateBaseline"
	| "VersionBumpFromBaseline"
	| "Build"
	| "UpdateBaselineReferences"
	| "Done"
	| "Aborted";

export const BOOTSTRAP_MACHINE: MachineDefinition<BootstrapState> = {
	name: "bootstrap",
	sequence: [
		"Start",
		"ValidateBaseline",
		"VersionBumpFromBaseline",
		"Build",
		"UpdateBaselineReferences",
		"Done",
	],
	aborted: "Aborted",
};

export const nextBootstrapState = (state: BootstrapState): BootstrapState | null =>
	nextState(BOOTSTRAP_MACHINE, state);

const TRAILING_NUMBER = /^(.*?)(\d+)$/u;

/**
 * Increments the trailing number of a baseline version.
 *
 * @pure true
 * @returns null when the version does not end in a number
 *
 * @example
 * ```ts
 * nextBaselineVersion("2.1.0-baseline1"); // "2.1.0-baseline2"
 * nextBaselineVersion("2.1.0-baseline"); // null
 * ```
 */
export function nextBaselineVersion(current: string): string | null {
	const parsed = TRAILING_NUMBER.exec(current);
	if (parsed === null) return null;
	const [, prefix = "", digits = ""] = parsed;
	const next = String(Number.parseInt(digits, 10) + 1).padStart(digits.length, "0");
	return `${prefix}${next}`;
}

export interface ResolvedBootstrapInputs extends BootstrapInputs {
	readonly nextBaselineVersion: string;
}

/**
 * Input-only part of baseline validation; descriptor checks need the fleet.
 *
 * @pure true
 */
export function validateBootstrapInputs(
	inputs: BootstrapInputs,
): Effect.Effect<ResolvedBootstrapInputs, ValidationError> {
	const fail = (reason: "missing-parameter" | "precondition", detail: string) =>
		Effect.fail(new ValidationError({ reason, detail }));

	if (inputs.currentVersion.trim().length === 0) {
		return fail("missing-parameter", "Missing bootstrap parameter: current version");
	}
	if (inputs.currentBaselineVersion.trim().length === 0) {
		return fail("missing-parameter", "Missing bootstrap parameter: current baseline version");
	}
	const next = inputs.nextBaselineVersion ?? nextBaselineVersion(inputs.currentBaselineVersion);
	if (next === null) {
		return fail(
			"missing-parameter",
			`Cannot derive the next baseline version from '${inputs.currentBaselineVersion}'; pass --next-base-ver`,
		);
	}
	const snapshot = [inputs.currentBaselineVersion, next].find(isSnapshotVersion);
	if (snapshot !== undefined) {
		return fail("precondition", `Baseline version '${snapshot}' is a snapshot version`);
	}
	const versions = new Set([inputs.currentVersion, inputs.currentBaselineVersion, next]);
	if (versions.size !== 3) {
		return fail(
			"precondition",
			`Current version, current baseline and next baseline must be distinct (${inputs.currentVersion}, ${inputs.currentBaselineVersion}, ${next})`,
		);
	}
	return Effect.succeed({ ...inputs, nextBaselineVersion: next });
}
