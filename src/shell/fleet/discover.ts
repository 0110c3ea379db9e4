// Fleet discovery: root repository plus initialised submodules, recursively
// PURITY: SHELL
// INVARIANT: Members are depth-first in .gitmodules declaration order
// INVARIANT: Discovery runs on every call; nothing is cached

import { Effect, Option } from "effect";

import type { BackendError } from "../../core/errors.js";
import { resolveTrackedBranch } from "../../core/fleet/gitmodules.js";
import type { Fleet, GitBackend, Repository } from "../../core/types/index.js";
import type { Logger } from "../output/logger.js";
import { path } from "../utils/node-mods.js";

const toPosix = (value: string): string => value.split(path.sep).join("/");

function discoverMembers(
	git: GitBackend,
	root: string,
	parent: Repository,
	logger: Logger | null,
): Effect.Effect<readonly Repository[], BackendError> {
	return Effect.gen(function* () {
		const entries = yield* git.listSubmodules(parent.path);
		const superBranch = yield* git.currentBranch(parent.path);
		const members: Repository[] = [];
		for (const entry of entries) {
			const memberPath = path.resolve(parent.path, entry.path);
			const topLevel = yield* Effect.option(git.topLevel(memberPath));
			if (Option.isNone(topLevel) || path.resolve(topLevel.value) !== memberPath) {
				logger?.warn(`Skipping submodule '${entry.name}': not checked out at ${memberPath}`);
				continue;
			}
			const member: Repository = {
				path: memberPath,
				relativePath: toPosix(path.relative(root, memberPath)),
				name: entry.name,
				trackedBranch: resolveTrackedBranch(entry.branch, superBranch),
				depth: parent.depth + 1,
				parentPath: parent.path,
			};
			members.push(member, ...(yield* discoverMembers(git, root, member, logger)));
		}
		return members;
	});
}

/**
 * Resolves the repository containing `directory` and walks its submodules.
 *
 * @pure false
 * @effect Effect<Fleet, BackendError>
 */
export function loadFleet(
	git: GitBackend,
	directory: string,
	logger: Logger | null = null,
): Effect.Effect<Fleet, BackendError> {
	return Effect.gen(function* () {
		const rootPath = path.resolve(yield* git.topLevel(path.resolve(directory)));
		const branch = yield* git.currentBranch(rootPath);
		const root: Repository = {
			path: rootPath,
			relativePath: "",
			name: path.basename(rootPath),
			trackedBranch: branch ?? "master",
			depth: 0,
			parentPath: null,
		};
		const members = yield* discoverMembers(git, rootPath, root, logger);
		logger?.debug(`Discovered ${members.length} submodule(s) under ${rootPath}`);
		return { root, members };
	});
}

/**
 * Root followed by members, the order qualifier and version passes use.
 *
 * @pure true
 */
export const fleetRepositories = (fleet: Fleet): readonly Repository[] => [
	fleet.root,
	...fleet.members,
];

/**
 * Relative path for display; the root shows as its directory name.
 *
 * @pure true
 */
export function displayName(fleet: Fleet, repositoryPath: string): string {
	const relative = toPosix(path.relative(fleet.root.path, repositoryPath));
	return relative.length === 0 ? fleet.root.name : relative;
}
