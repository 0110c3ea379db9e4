// `qualifier` and `changed` commands
// PURITY: APP

import { Effect } from "effect";

import type { BackendError, FSError } from "../core/errors.js";
import type { CommandOutcome } from "../core/models.js";
import type { Fleet } from "../core/types/index.js";
import { computeNowQualifier, computeQualifier, hasChanged } from "../shell/qualifier/qualifier.js";
import { path } from "../shell/utils/node-mods.js";
import type { AppContext } from "./context.js";

export function runQualifier(
	context: AppContext,
	fleet: Fleet,
	now: boolean,
	branch: string | null,
): Effect.Effect<CommandOutcome, BackendError> {
	const qualifier = now
		? computeNowQualifier(context.git, fleet, context.now(), { branch })
		: computeQualifier(context.git, fleet, { branch });
	return qualifier.pipe(
		Effect.map((value) => {
			context.logger.print(value);
			return "Succeeded" as const;
		}),
	);
}

/**
 * Prints the qualifier and succeeds when it changed (or when forced).
 *
 * @param destination Record path, relative to the fleet root unless absolute
 */
export function runChanged(
	context: AppContext,
	fleet: Fleet,
	destination: string,
	force: boolean,
): Effect.Effect<CommandOutcome, BackendError | FSError> {
	const recordPath = path.resolve(fleet.root.path, destination);
	return hasChanged(context.git, fleet, recordPath).pipe(
		Effect.map(({ changed, qualifier }): CommandOutcome => {
			if (!changed && !force) {
				context.logger.debug(`Qualifier unchanged: ${qualifier}`);
				return "Failed";
			}
			context.logger.print(qualifier);
			return "Succeeded";
		}),
	);
}
