// `set-versions` command
// PURITY: APP

import { Effect } from "effect";

import type { BackendError, FSError } from "../core/errors.js";
import { formatChangeSet } from "../core/versions/dialects.js";
import type { CommandOutcome } from "../core/models.js";
import type { Fleet, VersionRewriteSpec } from "../core/types/index.js";
import { rewriteVersions } from "../shell/versions/rewriter.js";
import type { AppContext } from "./context.js";

export const setVersionsWarning = (spec: VersionRewriteSpec): string =>
	`This will set versions from ${spec.fromVersion} to ${spec.toVersion} in every repository${spec.commit ? " and commit the changes" : ""}, do you want to continue?`;

/**
 * Dry runs never ask: they do not write.
 */
export function runSetVersions(
	context: AppContext,
	fleet: Fleet,
	spec: VersionRewriteSpec,
	yes: boolean,
): Effect.Effect<CommandOutcome, FSError | BackendError> {
	return Effect.gen(function* () {
		if (!yes && !spec.dryRun) {
			const confirmed = yield* context.confirmer.confirm({
				message: setVersionsWarning(spec),
				level: "once",
			});
			if (!confirmed) {
				context.logger.warn("Aborted: set-versions");
				return "Aborted" as const;
			}
		}
		const changes = yield* rewriteVersions(context.git, fleet, spec, context.logger);
		context.logger.info(formatChangeSet(changes));
		if (spec.dryRun) context.logger.info("Dry run: no files were written");
		return "Succeeded" as const;
	});
}
