// Command dispatch: fleet discovery, command execution, error reporting
// PURITY: APP (no process.exit)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Every AppError is reported once and mapped to exit code 1

import { Effect } from "effect";
import { match } from "ts-pattern";

import { computeExitCodeEffect, workflowCommandOutcome } from "../core/decision.js";
import type { AppError } from "../core/errors.js";
import { FleetOperations } from "../core/fleet/operations.js";
import { formatAppError } from "../core/format/messages.js";
import type { CommandOutcome, ExitCode } from "../core/models.js";
import type {
	CLIOptions,
	Command,
	Fleet,
	FleetOperation,
	WorkflowResult,
} from "../core/types/index.js";
import { loadFleet } from "../shell/fleet/discover.js";
import type { Logger } from "../shell/output/logger.js";
import { runBootstrap } from "./bootstrap.js";
import { runBuild } from "./build-command.js";
import type { AppContext } from "./context.js";
import { runCleanUpdate, runFleetOperation } from "./fleet-commands.js";
import { runChanged, runQualifier } from "./qualifier-commands.js";
import { runRelease } from "./release.js";
import { runSetVersions } from "./versions-command.js";

function reportWorkflow<S extends string>(
	name: string,
	logger: Logger,
	result: WorkflowResult<S>,
): CommandOutcome {
	const trail = result.history.join(" -> ");
	match(result.outcome)
		.with({ _tag: "Completed" }, () => {
			logger.success(`${name} completed: ${trail}`);
		})
		.with({ _tag: "Aborted" }, () => {
			logger.warn(`${name} aborted: ${trail}`);
		})
		.with({ _tag: "Failed" }, ({ error }) => {
			logger.error(`${name} failed in state ${result.state}: ${formatAppError(error)}`);
		})
		.exhaustive();
	return workflowCommandOutcome(result.outcome);
}

/**
 * Runs a parsed command against a discovered fleet.
 */
export function executeCommand(
	context: AppContext,
	fleet: Fleet,
	command: Command,
): Effect.Effect<CommandOutcome, AppError> {
	const fleetOp = (operation: FleetOperation, yes: boolean) =>
		runFleetOperation(context, fleet, operation, yes);
	return match<Command, Effect.Effect<CommandOutcome, AppError>>(command)
		.with({ _tag: "Update" }, ({ depth }) => fleetOp(FleetOperations.update(depth), true))
		.with({ _tag: "SetRemote" }, ({ kind }) => fleetOp(FleetOperations.setRemote(kind), true))
		.with({ _tag: "CleanUpdate" }, ({ yes, depth }) => runCleanUpdate(context, fleet, yes, depth))
		.with({ _tag: "Track" }, () => fleetOp(FleetOperations.track(), true))
		.with({ _tag: "Merge" }, ({ branch, yes }) => fleetOp(FleetOperations.merge(branch), yes))
		.with({ _tag: "Tag" }, ({ name, description, yes }) =>
			fleetOp(FleetOperations.tag(name, description), yes),
		)
		.with({ _tag: "Push" }, ({ yes }) => fleetOp(FleetOperations.push(false), yes))
		.with({ _tag: "Checkout" }, ({ yes }) => fleetOp(FleetOperations.checkout(), yes))
		.with({ _tag: "Clean" }, ({ yes }) => fleetOp(FleetOperations.clean(), yes))
		.with({ _tag: "Reset" }, ({ toRemote, yes }) => fleetOp(FleetOperations.reset(toRemote), yes))
		.with({ _tag: "SetVersions" }, ({ fromVersion, toVersion, commit, dryRun, yes }) =>
			runSetVersions(context, fleet, { fromVersion, toVersion, commit, dryRun }, yes),
		)
		.with({ _tag: "Build" }, ({ options, components }) =>
			runBuild(context, fleet, options, components),
		)
		.with({ _tag: "Release" }, ({ inputs, targetsFile }) =>
			runRelease(context, fleet, inputs, targetsFile).pipe(
				Effect.map((result) => reportWorkflow("Release", context.logger, result)),
			),
		)
		.with({ _tag: "Bootstrap" }, ({ inputs, targetsFile }) =>
			runBootstrap(context, fleet, inputs, targetsFile).pipe(
				Effect.map((result) => reportWorkflow("Bootstrap", context.logger, result)),
			),
		)
		.with({ _tag: "Qualifier" }, ({ now, branch }) => runQualifier(context, fleet, now, branch))
		.with({ _tag: "Changed" }, ({ destination, force }) =>
			runChanged(context, fleet, destination, force),
		)
		.exhaustive();
}

/**
 * Discovers the fleet and runs the command, returning the exit code as a value.
 *
 * @effect Effect<ExitCode, never>
 * @invariant ExitCode ∈ {0,1}
 */
export function runCommand(options: CLIOptions, context: AppContext): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const fleet = yield* loadFleet(context.git, options.repoDirectory, context.logger);
		return yield* executeCommand(context, fleet, options.command);
	}).pipe(
		Effect.catchAll((error) => {
			context.logger.error(formatAppError(error));
			return Effect.succeed<CommandOutcome>("Failed");
		}),
		Effect.flatMap(computeExitCodeEffect),
	);
}
