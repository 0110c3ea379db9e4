// Qualifier Engine: build identity from fleet state, plus change detection
// PURITY: SHELL (reads git state; hasChanged writes the record file)
// INVARIANT: computeQualifier has no side effects; equal fleet state gives equal output
// INVARIANT: hasChanged writes the record iff the comparison reports a change

import { Effect } from "effect";

import { type BackendError, FSError } from "../../core/errors.js";
import { DETACHED_BRANCH, latestDate, makeQualifier } from "../../core/qualifier.js";
import type { Fleet, GitBackend } from "../../core/types/index.js";
import { fleetRepositories } from "../fleet/discover.js";
import { fsp } from "../utils/node-mods.js";

export interface QualifierOptions {
	/** Branch to use instead of the root's current branch. */
	readonly branch?: string | null;
}

export interface ChangeCheck {
	readonly changed: boolean;
	readonly qualifier: string;
}

function qualifierBranch(
	git: GitBackend,
	fleet: Fleet,
	options: QualifierOptions,
): Effect.Effect<string, BackendError> {
	if (options.branch !== undefined && options.branch !== null) {
		return Effect.succeed(options.branch);
	}
	return git
		.currentBranch(fleet.root.path)
		.pipe(Effect.map((branch) => branch ?? DETACHED_BRANCH));
}

/**
 * Qualifier stamped with the latest HEAD author date across the fleet.
 *
 * @effect Effect<string, BackendError>
 */
export function computeQualifier(
	git: GitBackend,
	fleet: Fleet,
	options: QualifierOptions = {},
): Effect.Effect<string, BackendError> {
	return Effect.gen(function* () {
		const branch = yield* qualifierBranch(git, fleet, options);
		const dates: Date[] = [];
		for (const repo of fleetRepositories(fleet)) {
			dates.push((yield* git.headCommit(repo.path)).authorDate);
		}
		return makeQualifier(latestDate(dates) ?? new Date(0), branch);
	});
}

/**
 * Qualifier stamped with the given wall-clock instant.
 *
 * @effect Effect<string, BackendError>
 */
export function computeNowQualifier(
	git: GitBackend,
	fleet: Fleet,
	now: Date,
	options: QualifierOptions = {},
): Effect.Effect<string, BackendError> {
	return qualifierBranch(git, fleet, options).pipe(
		Effect.map((branch) => makeQualifier(now, branch)),
	);
}

const isMissingFile = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Contents of a qualifier record, or null when the file does not exist.
 */
export function readQualifierRecord(recordPath: string): Effect.Effect<string | null, FSError> {
	return Effect.tryPromise({
		try: async () => {
			try {
				return await fsp.readFile(recordPath, "utf8");
			} catch (error) {
				if (isMissingFile(error)) return null;
				throw error;
			}
		},
		catch: (error) =>
			new FSError({
				detail: error instanceof Error ? error.message : String(error),
				path: recordPath,
			}),
	});
}

export function writeQualifierRecord(
	recordPath: string,
	qualifier: string,
): Effect.Effect<void, FSError> {
	return Effect.tryPromise({
		try: () => fsp.writeFile(recordPath, qualifier, "utf8"),
		catch: (error) =>
			new FSError({
				detail: error instanceof Error ? error.message : String(error),
				path: recordPath,
			}),
	});
}

/**
 * Compares the current qualifier with the stored record and stores it when it differs.
 *
 * A missing record counts as changed. Comparison is exact string equality.
 *
 * @effect Effect<ChangeCheck, BackendError | FSError>
 */
export function hasChanged(
	git: GitBackend,
	fleet: Fleet,
	recordPath: string,
	options: QualifierOptions = {},
): Effect.Effect<ChangeCheck, BackendError | FSError> {
	return Effect.gen(function* () {
		const qualifier = yield* computeQualifier(git, fleet, options);
		const previous = yield* readQualifierRecord(recordPath);
		const changed = previous !== qualifier;
		if (changed) yield* writeQualifierRecord(recordPath, qualifier);
		return { changed, qualifier };
	});
}
