// Fleet-wide git commands with their confirmation gates
// PURITY: APP
// INVARIANT: Nothing runs when a required confirmation is declined

import { Effect } from "effect";

import { fleetReportOutcome } from "../core/decision.js";
import { confirmationRequest, describeOperation, FleetOperations } from "../core/fleet/operations.js";
import { formatFleetReport } from "../core/format/messages.js";
import type { CommandOutcome } from "../core/models.js";
import type { Fleet, FleetOperation } from "../core/types/index.js";
import { displayName } from "../shell/fleet/discover.js";
import { applyFleet } from "../shell/fleet/operator.js";
import type { AppContext } from "./context.js";

export const CLEAN_UPDATE_WARNING =
	"WARNING: This will DELETE UNCOMMITTED CHANGES, DELETE UNPUSHED COMMITS and DELETE UNTRACKED FILES, do you want to continue?";

/**
 * Runs one operation over the members of a fleet.
 *
 * @param yes Skip the confirmation the operation would otherwise need
 */
export function runFleetOperation(
	context: AppContext,
	fleet: Fleet,
	operation: FleetOperation,
	yes: boolean,
): Effect.Effect<CommandOutcome> {
	return Effect.gen(function* () {
		const request = yes ? null : confirmationRequest(operation);
		if (request !== null && !(yield* context.confirmer.confirm(request))) {
			context.logger.warn(`Aborted: ${describeOperation(operation)}`);
			return "Aborted" as const;
		}
		context.logger.step(`${describeOperation(operation)} (${fleet.members.length} repositories)`);
		const report = yield* applyFleet(context.git, fleet, operation, { logger: context.logger });
		context.logger.info(formatFleetReport(report, (repo) => displayName(fleet, repo)));
		return fleetReportOutcome(report);
	});
}

/**
 * Checkout, reset to remote, checkout, clean, update; one confirmation up front.
 *
 * @invariant Stops after the first step that leaves a repository failed
 */
export function runCleanUpdate(
	context: AppContext,
	fleet: Fleet,
	yes: boolean,
	depth: number | null,
): Effect.Effect<CommandOutcome> {
	return Effect.gen(function* () {
		if (!yes) {
			const confirmed = yield* context.confirmer.confirm({
				message: CLEAN_UPDATE_WARNING,
				level: "thrice",
			});
			if (!confirmed) {
				context.logger.warn("Aborted: clean-update");
				return "Aborted" as const;
			}
		}
		const steps = [
			FleetOperations.checkout(),
			FleetOperations.reset(true),
			FleetOperations.checkout(),
			FleetOperations.clean(),
			FleetOperations.update(depth),
		];
		for (const step of steps) {
			const outcome = yield* runFleetOperation(context, fleet, step, true);
			if (outcome !== "Succeeded") return outcome;
		}
		return "Succeeded" as const;
	});
}
