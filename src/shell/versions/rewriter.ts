// Version Rewriter: descriptor discovery, span rewriting and per-repository commits
// PURITY: SHELL
// INVARIANT: The returned ChangeSet does not depend on dryRun
// INVARIANT: Each repository's commit holds only its own files and the gitlinks of committed children
// COMPLEXITY: O(total size of descriptor files)

import { Effect } from "effect";

import { type BackendError, FSError } from "../../core/errors.js";
import { applyEdits, dialectOf, versionEdits } from "../../core/versions/dialects.js";
import type {
	ChangeSet,
	DescriptorDialect,
	Fleet,
	GitBackend,
	Repository,
	VersionChange,
	VersionRewriteSpec,
} from "../../core/types/index.js";
import { fleetRepositories } from "../fleet/discover.js";
import type { Logger } from "../output/logger.js";
import { fsp, path } from "../utils/node-mods.js";

const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set([
	".git",
	"target",
	"node_modules",
	"bin",
]);

export interface DescriptorFile {
	/** POSIX path relative to the repository. */
	readonly file: string;
	readonly absolutePath: string;
	readonly dialect: DescriptorDialect;
}

const fsError = (target: string) => (error: unknown) =>
	new FSError({
		detail: error instanceof Error ? error.message : String(error),
		path: target,
	});

/**
 * Descriptor files of one repository, sorted by path. Directories of other
 * fleet repositories are not entered.
 *
 * @effect Effect<readonly DescriptorFile[], FSError>
 */
export function scanDescriptors(
	repo: Repository,
	otherRepositories: ReadonlySet<string>,
): Effect.Effect<readonly DescriptorFile[], FSError> {
	const walk = (directory: string): Effect.Effect<readonly DescriptorFile[], FSError> =>
		Effect.gen(function* () {
			const entries = yield* Effect.tryPromise({
				try: () => fsp.readdir(directory, { withFileTypes: true }),
				catch: fsError(directory),
			});
			const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
			const found: DescriptorFile[] = [];
			for (const entry of sorted) {
				const absolutePath = path.join(directory, entry.name);
				if (entry.isDirectory()) {
					if (SKIPPED_DIRECTORIES.has(entry.name) || otherRepositories.has(absolutePath)) continue;
					found.push(...(yield* walk(absolutePath)));
				} else if (entry.isFile()) {
					const file = path.relative(repo.path, absolutePath).split(path.sep).join("/");
					const dialect = dialectOf(file);
					if (dialect !== null) found.push({ file, absolutePath, dialect });
				}
			}
			return found;
		});
	return walk(repo.path);
}

export const commitMessage = (spec: VersionRewriteSpec): string =>
	`Set version from ${spec.fromVersion} to ${spec.toVersion}`;

function rewriteRepository(
	repo: Repository,
	fleet: Fleet,
	spec: VersionRewriteSpec,
): Effect.Effect<readonly VersionChange[], FSError> {
	const others = new Set(
		fleetRepositories(fleet)
			.map((candidate) => candidate.path)
			.filter((candidatePath) => candidatePath !== repo.path),
	);
	return Effect.gen(function* () {
		const changes: VersionChange[] = [];
		for (const descriptor of yield* scanDescriptors(repo, others)) {
			const text = yield* Effect.tryPromise({
				try: () => fsp.readFile(descriptor.absolutePath, "utf8"),
				catch: fsError(descriptor.absolutePath),
			});
			const edits = [...versionEdits(descriptor.dialect, text, spec.fromVersion, spec.toVersion)].sort(
				(a, b) => a.start - b.start,
			);
			if (edits.length === 0) continue;
			for (const edit of edits) {
				changes.push({
					repository: repo.relativePath,
					file: descriptor.file,
					dialect: descriptor.dialect,
					line: edit.line,
					oldValue: edit.oldValue,
					newValue: edit.newValue,
				});
			}
			if (!spec.dryRun) {
				yield* Effect.tryPromise({
					try: () => fsp.writeFile(descriptor.absolutePath, applyEdits(text, edits), "utf8"),
					catch: fsError(descriptor.absolutePath),
				});
			}
		}
		return changes;
	});
}

/**
 * Commits changed repositories deepest first, staging child gitlinks.
 *
 * @returns Paths of the repositories that received a commit
 */
function commitChanges(
	git: GitBackend,
	fleet: Fleet,
	changes: ChangeSet,
	spec: VersionRewriteSpec,
	logger: Logger | null,
): Effect.Effect<ReadonlySet<string>, BackendError> {
	const repositories = [...fleetRepositories(fleet)].sort((a, b) => b.depth - a.depth);
	return Effect.gen(function* () {
		const committed = new Set<string>();
		for (const repo of repositories) {
			const files = [
				...new Set(
					changes
						.filter((change) => change.repository === repo.relativePath)
						.map((change) => change.file),
				),
			];
			const gitlinks = fleet.members
				.filter((child) => child.parentPath === repo.path && committed.has(child.path))
				.map((child) => path.relative(repo.path, child.path).split(path.sep).join("/"));
			const paths = [...files, ...gitlinks];
			if (paths.length === 0) continue;
			const hash = yield* git.commit(repo.path, paths, commitMessage(spec));
			logger?.debug(`Committed ${paths.length} path(s) in ${repo.relativePath || repo.name}: ${hash}`);
			committed.add(repo.path);
		}
		return committed;
	});
}

/**
 * Rewrites every descriptor version equal to `spec.fromVersion` across the fleet.
 *
 * @pure false
 * @effect Effect<ChangeSet, FSError | BackendError>
 */
export function rewriteVersions(
	git: GitBackend,
	fleet: Fleet,
	spec: VersionRewriteSpec,
	logger: Logger | null = null,
): Effect.Effect<ChangeSet, FSError | BackendError> {
	return Effect.gen(function* () {
		const changes: VersionChange[] = [];
		for (const repo of fleetRepositories(fleet)) {
			changes.push(...(yield* rewriteRepository(repo, fleet, spec)));
		}
		if (spec.commit && !spec.dryRun && changes.length > 0) {
			yield* commitChanges(git, fleet, changes, spec, logger);
		}
		return changes;
	});
}
