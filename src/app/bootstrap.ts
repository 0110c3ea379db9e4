// Bootstrap workflow: build a new baseline of the self-hosting toolchain
// PURITY: APP
// INVARIANT: Baseline validation happens before any descriptor is written

import { Effect, Either } from "effect";

import { defaultBuildProfile } from "../core/build/profile.js";
import { type AppError, ValidationError } from "../core/errors.js";
import type {
	BootstrapInputs,
	Fleet,
	TargetsConfig,
	VersionRewriteSpec,
	WorkflowResult,
} from "../core/types/index.js";
import {
	BOOTSTRAP_MACHINE,
	type BootstrapState,
	type ResolvedBootstrapInputs,
	validateBootstrapInputs,
} from "../core/workflow/bootstrap.js";
import { build } from "../shell/build/orchestrator.js";
import { loadTargetsConfig, resolveTargetsFile } from "../shell/config/targets.js";
import { computeNowQualifier } from "../shell/qualifier/qualifier.js";
import { rewriteVersions } from "../shell/versions/rewriter.js";
import type { AppContext } from "./context.js";
import { runWorkflow, type WorkflowStep } from "./workflow-runner.js";

const rewrite = (fromVersion: string, toVersion: string, commit: boolean): VersionRewriteSpec => ({
	fromVersion,
	toVersion,
	commit,
	dryRun: false,
});

/**
 * Dry runs proving that both the current version and the current baseline
 * are referenced somewhere in the fleet.
 */
function checkReferences(
	context: AppContext,
	fleet: Fleet,
	inputs: ResolvedBootstrapInputs,
): Effect.Effect<void, AppError> {
	return Effect.gen(function* () {
		const checks = [
			[inputs.currentVersion, "declares the current version"],
			[inputs.currentBaselineVersion, "references the current baseline version"],
		] as const;
		for (const [version, role] of checks) {
			const changes = yield* rewriteVersions(context.git, fleet, {
				...rewrite(version, inputs.nextBaselineVersion, false),
				dryRun: true,
			});
			if (changes.length === 0) {
				return yield* Effect.fail(
					new ValidationError({
						reason: "precondition",
						detail: `No descriptor ${role} (${version})`,
					}),
				);
			}
			context.logger.debug(`${changes.length} descriptor reference(s) to ${version}`);
		}
	});
}

function applyRewrite(
	context: AppContext,
	fleet: Fleet,
	spec: VersionRewriteSpec,
): Effect.Effect<void, AppError> {
	return rewriteVersions(context.git, fleet, spec, context.logger).pipe(
		Effect.map((changes) => {
			context.logger.info(
				`${changes.length} reference(s) set from ${spec.fromVersion} to ${spec.toVersion}`,
			);
		}),
	);
}

/**
 * @pure true (builds descriptions; nothing runs until the workflow does)
 */
export function bootstrapSteps(
	context: AppContext,
	fleet: Fleet,
	inputs: ResolvedBootstrapInputs,
	config: TargetsConfig,
): readonly WorkflowStep<BootstrapState>[] {
	const next = inputs.nextBaselineVersion;
	return [
		{
			state: "ValidateBaseline",
			confirm: null,
			run: checkReferences(context, fleet, inputs),
		},
		{
			state: "VersionBumpFromBaseline",
			confirm: `Set versions from ${inputs.currentVersion} to ${next}?`,
			run: applyRewrite(context, fleet, rewrite(inputs.currentVersion, next, false)),
		},
		{
			state: "Build",
			confirm: `Bootstrap and deploy ${config.bootstrapTargets.join(", ")} as ${next}?`,
			run: Effect.gen(function* () {
				const qualifier = yield* computeNowQualifier(context.git, fleet, context.now());
				yield* build(
					context.runner,
					{
						fleetRoot: fleet.root.path,
						config,
						profile: defaultBuildProfile({
							qualifier,
							deploy: true,
							bootstrapMode: "bootstrap",
							verbosity: context.logger.verbosity,
						}),
						requested: config.bootstrapTargets,
						home: context.home,
					},
					context.logger,
				);
			}),
		},
		{
			state: "UpdateBaselineReferences",
			confirm: `Restore ${inputs.currentVersion} and move baseline references from ${inputs.currentBaselineVersion} to ${next} with a commit?`,
			run: Effect.all([
				applyRewrite(context, fleet, rewrite(next, inputs.currentVersion, false)),
				applyRewrite(context, fleet, rewrite(inputs.currentBaselineVersion, next, true)),
			]).pipe(Effect.asVoid),
		},
	];
}

/**
 * Runs the bootstrap state machine. Input problems fail in ValidateBaseline.
 *
 * @effect Effect<WorkflowResult<BootstrapState>, never>
 */
export function runBootstrap(
	context: AppContext,
	fleet: Fleet,
	inputs: BootstrapInputs,
	targetsFile: string | null,
): Effect.Effect<WorkflowResult<BootstrapState>> {
	return Effect.gen(function* () {
		const prepared = yield* Effect.either(
			Effect.gen(function* () {
				const resolved = yield* validateBootstrapInputs(inputs);
				const config = yield* loadTargetsConfig(resolveTargetsFile(targetsFile, fleet.root.path));
				return { resolved, config };
			}),
		);
		const steps: readonly WorkflowStep<BootstrapState>[] = Either.isLeft(prepared)
			? [{ state: "ValidateBaseline", confirm: null, run: Effect.fail(prepared.left) }]
			: bootstrapSteps(context, fleet, prepared.right.resolved, prepared.right.config);
		return yield* runWorkflow(BOOTSTRAP_MACHINE, steps, context.confirmer, context.logger);
	});
}
