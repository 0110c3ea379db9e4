// Release workflow states and preconditions
// PURITY: CORE

import * as path from "node:path";

import { Effect } from "effect";

import { StateMismatchError, ValidationError } from "../errors.js";
import type { ReleaseInputs } from "../types/index.js";
import { isSnapshotVersion } from "../versions/eclipse.js";
import type { MachineDefinition } from "./machine.js";
import { nextState } from "./machine.js";

export type ReleaseState =
	| "Start"
	| "PrepareReleaseBranch"
	| "VersionBumpRelease"
	| "BuildReleaseBranch"
	| "TagRelease"
	| "MergeBackToDevelop"
	| "VersionBumpDevelop"
	| "Push"
	| "Done"
	| "Aborted";

export const RELEASE_MACHINE: MachineDefinition<ReleaseState> = {
	name: "release",
	sequence: [
		"Start",
		"PrepareReleaseBranch",
		"VersionBumpRelease",
		"BuildReleaseBranch",
		"TagRelease",
		"MergeBackToDevelop",
		"VersionBumpDevelop",
		"Push",
		"Done",
	],
	aborted: "Aborted",
};

export const nextReleaseState = (state: ReleaseState): ReleaseState | null =>
	nextState(RELEASE_MACHINE, state);

/**
 * Release inputs with the tag name resolved.
 */
export interface ResolvedReleaseInputs extends ReleaseInputs {
	readonly tagName: string;
}

/**
 * @pure true
 */
export const defaultTagName = (releaseVersion: string): string =>
	`release-${releaseVersion}`;

/**
 * Checks the inputs of a release before anything is touched.
 *
 * @pure true
 * @effect Effect<ResolvedReleaseInputs, ValidationError>
 */
export function validateReleaseInputs(
	inputs: ReleaseInputs,
): Effect.Effect<ResolvedReleaseInputs, ValidationError> {
	const required: readonly (readonly [string, string])[] = [
		["release branch", inputs.releaseBranch],
		["develop branch", inputs.developBranch],
		["current develop version", inputs.currentDevelopVersion],
		["next release version", inputs.nextReleaseVersion],
		["next develop version", inputs.nextDevelopVersion],
	];
	const missing = required
		.filter(([, value]) => value.trim().length === 0)
		.map(([label]) => label);
	if (missing.length > 0) {
		return Effect.fail(
			new ValidationError({
				reason: "missing-parameter",
				detail: `Missing release parameter(s): ${missing.join(", ")}`,
			}),
		);
	}
	if (inputs.releaseBranch === inputs.developBranch) {
		return Effect.fail(
			new ValidationError({
				reason: "precondition",
				detail: `Release branch and develop branch must differ (both are '${inputs.releaseBranch}')`,
			}),
		);
	}
	if (isSnapshotVersion(inputs.nextReleaseVersion)) {
		return Effect.fail(
			new ValidationError({
				reason: "precondition",
				detail: `Release version '${inputs.nextReleaseVersion}' is a snapshot version`,
			}),
		);
	}
	return Effect.succeed({
		...inputs,
		tagName: inputs.tagName ?? defaultTagName(inputs.nextReleaseVersion),
	});
}

/**
 * True when `directory` is `host` or lies beneath it.
 *
 * @pure true
 */
export function isInside(directory: string, host: string): boolean {
	const relative = path.relative(host, directory);
	return relative.length === 0 || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/**
 * Refuses to release the repository that hosts this tool: the tool's directory
 * is the fleet root or lies inside the fleet.
 *
 * @pure true
 */
export function checkNotHostRepository(
	fleetRoot: string,
	toolDirectory: string,
): Effect.Effect<void, StateMismatchError> {
	return isInside(toolDirectory, fleetRoot)
		? Effect.fail(
				new StateMismatchError({
					detail: `Refusing to release ${fleetRoot}: it hosts the release tool itself (${toolDirectory})`,
				}),
			)
		: Effect.void;
}
