// Fleet operations as fallible workflow steps
// PURITY: APP

import { Effect } from "effect";

import type { FleetOperationFailed } from "../core/errors.js";
import { describeOperation } from "../core/fleet/operations.js";
import { reportFailure } from "../core/fleet/report.js";
import { formatFleetReport } from "../core/format/messages.js";
import type { Fleet, FleetOperation } from "../core/types/index.js";
import { displayName } from "../shell/fleet/discover.js";
import { applyFleet } from "../shell/fleet/operator.js";
import type { AppContext } from "./context.js";

/**
 * Applies `operation` to the root and every member; any failed repository
 * fails the step.
 */
export function fleetStep(
	context: AppContext,
	fleet: Fleet,
	operation: FleetOperation,
): Effect.Effect<void, FleetOperationFailed> {
	return Effect.gen(function* () {
		const report = yield* applyFleet(context.git, fleet, operation, {
			includeRoot: true,
			logger: context.logger,
		});
		context.logger.info(formatFleetReport(report, (repo) => displayName(fleet, repo)));
		const failure = reportFailure(describeOperation(operation), report);
		if (failure !== null) return yield* Effect.fail(failure);
	});
}
