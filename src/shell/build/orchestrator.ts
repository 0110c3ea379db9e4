// Build Graph Orchestrator: plan, validate, then run targets fail-fast
// PURITY: SHELL
// INVARIANT: Nothing runs before graph validation and (in release mode) version validation pass
// INVARIANT: The first BackendError stops the run and is surfaced unchanged
// INVARIANT: Artifacts are copied only for targets that ran

import { Effect } from "effect";
import { match } from "ts-pattern";

import type { BackendError, FSError, ValidationError } from "../../core/errors.js";
import { planBuildOrder } from "../../core/build/graph.js";
import { planInvocation, renderInvocation } from "../../core/build/invocation.js";
import { checkReleaseVersions } from "../../core/build/release-check.js";
import type { BuildProfile, TargetsConfig } from "../../core/types/index.js";
import type { Logger } from "../output/logger.js";
import type { ProcessRunner } from "./runner.js";
import {
	cleanLocalRepository,
	copyArtifacts,
	defaultLocalRepository,
	readDeclaredVersions,
} from "./workspace.js";

export interface BuildRequest {
	readonly fleetRoot: string;
	readonly config: TargetsConfig;
	readonly profile: BuildProfile;
	readonly requested: readonly string[];
	/** Home directory used to locate the default local Maven repository. */
	readonly home: string;
}

export interface BuildSummary {
	readonly built: readonly string[];
	readonly skipped: readonly string[];
}

export type BuildError = ValidationError | BackendError | FSError;

/**
 * Builds the requested targets (and their dependencies) in dependency order.
 *
 * @pure false
 * @effect Effect<BuildSummary, ValidationError | BackendError | FSError>
 */
export function build(
	runner: ProcessRunner,
	request: BuildRequest,
	logger: Logger,
): Effect.Effect<BuildSummary, BuildError> {
	const { config, fleetRoot, profile } = request;
	return Effect.gen(function* () {
		const order = yield* planBuildOrder(config.targets, request.requested, profile.buildDependencies);
		logger.debug(`Build order: ${order.map((target) => target.name).join(", ")}`);

		if (profile.release) {
			const declared = yield* readDeclaredVersions(fleetRoot, order);
			yield* checkReleaseVersions(declared);
		}

		if (profile.maven.cleanLocalRepository) {
			const repository = profile.maven.localRepository ?? defaultLocalRepository(request.home);
			const removed = yield* cleanLocalRepository(repository, config.localRepositoryGroups);
			for (const directory of removed) logger.info(`Removed ${directory}`);
		}

		const built: string[] = [];
		const skipped: string[] = [];
		for (const target of order) {
			const step = planInvocation(target, profile, { fleetRoot });
			yield* match(step)
				.with({ _tag: "Skip" }, ({ reason }): Effect.Effect<void, BuildError> =>
					Effect.sync(() => {
						logger.warn(`Skipping ${target.name}: ${reason}`);
						skipped.push(target.name);
					}),
				)
				.with({ _tag: "Run" }, ({ invocation }): Effect.Effect<void, BuildError> =>
					Effect.gen(function* () {
						logger.step(`Building ${target.name}`);
						logger.debug(renderInvocation(invocation));
						yield* runner.run(invocation, (chunk) => {
							logger.stream(chunk);
						});
						built.push(target.name);
						logger.success(`Built ${target.name}`);
						if (profile.copyArtifactsTo !== null) {
							const copied = yield* copyArtifacts(fleetRoot, target, profile.copyArtifactsTo);
							for (const copy of copied) logger.info(`Copied artifact to ${copy}`);
						}
					}),
				)
				.exhaustive();
		}
		return { built, skipped };
	});
}
