// Release workflow: release branch, version bumps, tag, merge back, push
// PURITY: APP
// INVARIANT: Preconditions are checked before the first state transition
// INVARIANT: No resumption; a failed run reports the state it stopped in

import { Effect, Either } from "effect";

import { defaultBuildProfile } from "../core/build/profile.js";
import type { AppError } from "../core/errors.js";
import { FleetOperations } from "../core/fleet/operations.js";
import type {
	Fleet,
	ReleaseInputs,
	TargetsConfig,
	WorkflowResult,
} from "../core/types/index.js";
import {
	checkNotHostRepository,
	RELEASE_MACHINE,
	type ReleaseState,
	type ResolvedReleaseInputs,
	validateReleaseInputs,
} from "../core/workflow/release.js";
import { build } from "../shell/build/orchestrator.js";
import { loadTargetsConfig, resolveTargetsFile } from "../shell/config/targets.js";
import { rewriteVersions } from "../shell/versions/rewriter.js";
import type { AppContext } from "./context.js";
import { fleetStep } from "./fleet-step.js";
import { runWorkflow, type WorkflowStep } from "./workflow-runner.js";

function bumpVersions(
	context: AppContext,
	fleet: Fleet,
	fromVersion: string,
	toVersion: string,
): Effect.Effect<void, AppError> {
	return rewriteVersions(
		context.git,
		fleet,
		{ fromVersion, toVersion, commit: true, dryRun: false },
		context.logger,
	).pipe(
		Effect.map((changes) => {
			context.logger.info(`${changes.length} version reference(s) changed`);
		}),
	);
}

/**
 * Steps of a release, one per state after Start.
 *
 * @pure true (builds descriptions; nothing runs until the workflow does)
 */
export function releaseSteps(
	context: AppContext,
	fleet: Fleet,
	inputs: ResolvedReleaseInputs,
	config: TargetsConfig,
): readonly WorkflowStep<ReleaseState>[] {
	const { releaseBranch, developBranch } = inputs;
	return [
		{
			state: "PrepareReleaseBranch",
			confirm: `Switch every repository to ${releaseBranch} and merge ${developBranch} into it?`,
			run: Effect.asVoid(Effect.all([
				fleetStep(context, fleet, FleetOperations.switchTo(releaseBranch)),
				fleetStep(context, fleet, FleetOperations.merge(developBranch)),
			])),
		},
		{
			state: "VersionBumpRelease",
			confirm: `Set versions from ${inputs.currentDevelopVersion} to ${inputs.nextReleaseVersion} and commit?`,
			run: bumpVersions(context, fleet, inputs.currentDevelopVersion, inputs.nextReleaseVersion),
		},
		{
			state: "BuildReleaseBranch",
			confirm: `Build and deploy ${config.releaseTargets.join(", ")} from ${releaseBranch}?`,
			optional: true,
			run: Effect.asVoid(
				build(
					context.runner,
					{
						fleetRoot: fleet.root.path,
						config,
						profile: defaultBuildProfile({
							deploy: true,
							release: true,
							verbosity: context.logger.verbosity,
						}),
						requested: config.releaseTargets,
						home: context.home,
					},
					context.logger,
				),
			),
		},
		{
			state: "TagRelease",
			confirm: `Tag every repository with ${inputs.tagName}?`,
			run: fleetStep(
				context,
				fleet,
				FleetOperations.tag(inputs.tagName, `Release ${inputs.nextReleaseVersion}`),
			),
		},
		{
			state: "MergeBackToDevelop",
			confirm: `Switch every repository to ${developBranch} and merge ${releaseBranch} into it?`,
			run: Effect.asVoid(Effect.all([
				fleetStep(context, fleet, FleetOperations.switchTo(developBranch)),
				fleetStep(context, fleet, FleetOperations.merge(releaseBranch)),
			])),
		},
		{
			state: "VersionBumpDevelop",
			confirm: `Set versions from ${inputs.nextReleaseVersion} to ${inputs.nextDevelopVersion} and commit?`,
			run: bumpVersions(context, fleet, inputs.nextReleaseVersion, inputs.nextDevelopVersion),
		},
		{
			state: "Push",
			confirm: `Push ${developBranch} and ${releaseBranch} (with tags) to the remote repositories?`,
			run: Effect.asVoid(Effect.all([
				fleetStep(context, fleet, FleetOperations.push(false)),
				fleetStep(context, fleet, FleetOperations.switchTo(releaseBranch)),
				fleetStep(context, fleet, FleetOperations.push(true)),
				fleetStep(context, fleet, FleetOperations.switchTo(developBranch)),
			])),
		},
	];
}

/**
 * Validates, then runs the release state machine.
 *
 * @effect Effect<WorkflowResult<ReleaseState>, never>
 */
export function runRelease(
	context: AppContext,
	fleet: Fleet,
	inputs: ReleaseInputs,
	targetsFile: string | null,
): Effect.Effect<WorkflowResult<ReleaseState>> {
	return Effect.gen(function* () {
		const prepared = yield* Effect.either(
			Effect.gen(function* () {
				const resolved = yield* validateReleaseInputs(inputs);
				yield* checkNotHostRepository(fleet.root.path, context.toolDirectory);
				const config = yield* loadTargetsConfig(resolveTargetsFile(targetsFile, fleet.root.path));
				return { resolved, config };
			}),
		);
		if (Either.isLeft(prepared)) {
			const failed: WorkflowResult<ReleaseState> = {
				outcome: { _tag: "Failed", error: prepared.left },
				state: "Start",
				history: ["Start"],
			};
			return failed;
		}
		const { resolved, config } = prepared.right;
		return yield* runWorkflow(
			RELEASE_MACHINE,
			releaseSteps(context, fleet, resolved, config),
			context.confirmer,
			context.logger,
		);
	});
}
