// `build` command: qualifier resolution, configuration lookup, orchestration
// PURITY: APP

import { Effect } from "effect";

import type { AppError, BackendError } from "../core/errors.js";
import type { CommandOutcome } from "../core/models.js";
import type { BuildCommandOptions, BuildProfile, Fleet } from "../core/types/index.js";
import { build } from "../shell/build/orchestrator.js";
import { loadTargetsConfig, resolveTargetsFile } from "../shell/config/targets.js";
import { computeNowQualifier, computeQualifier } from "../shell/qualifier/qualifier.js";
import { path } from "../shell/utils/node-mods.js";
import type { AppContext } from "./context.js";

const resolveOptional = (value: string | null): string | null =>
	value === null ? null : path.resolve(value);

/**
 * Makes user-supplied paths absolute against the working directory.
 *
 * @pure false (reads process.cwd)
 */
export function resolveProfilePaths(profile: BuildProfile): BuildProfile {
	return {
		...profile,
		copyArtifactsTo: resolveOptional(profile.copyArtifactsTo),
		maven: {
			...profile.maven,
			settingsFile: resolveOptional(profile.maven.settingsFile),
			globalSettingsFile: resolveOptional(profile.maven.globalSettingsFile),
			localRepository: resolveOptional(profile.maven.localRepository),
		},
	};
}

function resolveQualifier(
	context: AppContext,
	fleet: Fleet,
	options: BuildCommandOptions,
): Effect.Effect<string, BackendError> {
	if (options.qualifier !== null) return Effect.succeed(options.qualifier);
	return options.nowQualifier
		? computeNowQualifier(context.git, fleet, context.now())
		: computeQualifier(context.git, fleet);
}

export function runBuild(
	context: AppContext,
	fleet: Fleet,
	options: BuildCommandOptions,
	components: readonly string[],
): Effect.Effect<CommandOutcome, AppError> {
	return Effect.gen(function* () {
		const config = yield* loadTargetsConfig(resolveTargetsFile(options.targetsFile, fleet.root.path));
		if (components.length === 0) {
			context.logger.print("No components specified, pass one or more of the following components to build:");
			context.logger.print(config.targets.map((target) => target.name).join(", "));
			return "Failed" as const;
		}
		const qualifier = yield* resolveQualifier(context, fleet, options);
		context.logger.info(`Qualifier: ${qualifier}`);
		const summary = yield* build(
			context.runner,
			{
				fleetRoot: fleet.root.path,
				config,
				profile: resolveProfilePaths({ ...options.profile, qualifier }),
				requested: components,
				home: context.home,
			},
			context.logger,
		);
		context.logger.success(
			`Built ${summary.built.length} target(s)${summary.skipped.length > 0 ? `, skipped ${summary.skipped.join(", ")}` : ""}`,
		);
		return "Succeeded" as const;
	});
}
