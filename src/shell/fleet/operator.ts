// Fleet Operator: one git operation applied to every repository of a fleet
// PURITY: SHELL
// INVARIANT: Repositories are processed sequentially in fleet order
// INVARIANT: A failing repository is recorded and never stops the remaining ones
// COMPLEXITY: O(n) git invocations where n = |repositories|

import { Effect } from "effect";
import { match } from "ts-pattern";

import { BackendError } from "../../core/errors.js";
import { convertRemoteUrl } from "../../core/fleet/remote.js";
import type {
	Fleet,
	FleetOperation,
	FleetReport,
	GitBackend,
	Repository,
	RepositoryOutcome,
} from "../../core/types/index.js";
import type { Logger } from "../output/logger.js";

export interface ApplyOptions {
	/** Also apply to the root repository, before the members. */
	readonly includeRoot?: boolean;
	readonly logger?: Logger;
}

const ORIGIN = "origin";

function pushCurrentBranch(
	git: GitBackend,
	repo: Repository,
	tags: boolean,
): Effect.Effect<string, BackendError> {
	return Effect.gen(function* () {
		const branch = yield* git.currentBranch(repo.path);
		if (branch === null) {
			return yield* Effect.fail(
				new BackendError({
					backend: "git",
					command: "git push",
					diagnostic: "HEAD is detached; there is no branch to push",
					location: repo.path,
				}),
			);
		}
		yield* git.push(repo.path, ORIGIN, branch, { followTags: tags });
		return tags ? `pushed ${branch} with tags` : `pushed ${branch}`;
	});
}

function setRemote(
	git: GitBackend,
	repo: Repository,
	kind: "ssh" | "http",
): Effect.Effect<string, BackendError> {
	return Effect.gen(function* () {
		const current = yield* git.remoteUrl(repo.path, ORIGIN);
		const converted = convertRemoteUrl(current, kind);
		if (converted === null) {
			return yield* Effect.fail(
				new BackendError({
					backend: "git",
					command: `git remote set-url ${ORIGIN}`,
					diagnostic: `Cannot convert remote URL '${current}' to ${kind}`,
					location: repo.path,
				}),
			);
		}
		if (converted === current) return `${ORIGIN} already uses ${kind}: ${current}`;
		yield* git.setRemoteUrl(repo.path, ORIGIN, converted);
		return `${ORIGIN} set to ${converted}`;
	});
}

/**
 * Runs one operation against one repository.
 *
 * @returns A short description of what was done
 */
export function applyToRepository(
	git: GitBackend,
	repo: Repository,
	operation: FleetOperation,
): Effect.Effect<string, BackendError> {
	const tracked = repo.trackedBranch;
	return match(operation)
		.with({ _tag: "Checkout" }, () =>
			git.checkout(repo.path, tracked).pipe(Effect.as(`checked out ${tracked}`)),
		)
		.with({ _tag: "Reset" }, ({ toRemote }) => {
			const target = toRemote ? `${ORIGIN}/${tracked}` : "HEAD";
			return git.reset(repo.path, "hard", target).pipe(Effect.as(`reset to ${target}`));
		})
		.with({ _tag: "Clean" }, () =>
			git
				.clean(repo.path, { force: true, directories: true })
				.pipe(Effect.as("removed untracked files")),
		)
		.with({ _tag: "Update" }, ({ depth }) =>
			Effect.gen(function* () {
				yield* git.fetch(repo.path, ORIGIN, tracked, depth);
				yield* git.checkout(repo.path, tracked);
				yield* git.merge(repo.path, `${ORIGIN}/${tracked}`, { fastForwardOnly: true });
				return `updated ${tracked}`;
			}),
		)
		.with({ _tag: "Track" }, () =>
			git
				.setUpstream(repo.path, tracked, `${ORIGIN}/${tracked}`)
				.pipe(Effect.as(`${tracked} tracks ${ORIGIN}/${tracked}`)),
		)
		.with({ _tag: "Merge" }, ({ branch }) =>
			git
				.merge(repo.path, branch, { fastForwardOnly: false })
				.pipe(Effect.as(`merged ${branch}`)),
		)
		.with({ _tag: "Tag" }, ({ name, description }) =>
			git.tag(repo.path, name, description ?? name).pipe(Effect.as(`tagged ${name}`)),
		)
		.with({ _tag: "Push" }, ({ tags }) => pushCurrentBranch(git, repo, tags))
		.with({ _tag: "SetRemote" }, ({ kind }) => setRemote(git, repo, kind))
		.with({ _tag: "Switch" }, ({ branch }) =>
			git.checkout(repo.path, branch).pipe(Effect.as(`switched to ${branch}`)),
		)
		.exhaustive();
}

/**
 * Applies `operation` to every member (and optionally the root) of a fleet.
 *
 * Never fails: each repository's BackendError becomes a Failed outcome.
 *
 * @pure false
 * @effect Effect<FleetReport, never>
 * @postcondition report.size = |members| (+1 with includeRoot)
 */
export function applyFleet(
	git: GitBackend,
	fleet: Fleet,
	operation: FleetOperation,
	options: ApplyOptions = {},
): Effect.Effect<FleetReport> {
	const repositories = options.includeRoot === true ? [fleet.root, ...fleet.members] : fleet.members;
	return Effect.gen(function* () {
		const report = new Map<string, RepositoryOutcome>();
		for (const repo of repositories) {
			const outcome = yield* applyToRepository(git, repo, operation).pipe(
				Effect.map((detail): RepositoryOutcome => ({ _tag: "Applied", detail })),
				Effect.catchAll((error) => Effect.succeed<RepositoryOutcome>({ _tag: "Failed", error })),
			);
			options.logger?.debug(`${repo.relativePath || repo.name}: ${outcome._tag}`);
			report.set(repo.path, outcome);
		}
		return report;
	});
}
