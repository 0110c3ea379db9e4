// GitBackend implemented with the git executable
// PURITY: SHELL
// EFFECT: every method spawns one or more `git` processes
// INVARIANT: Commands never prompt (GIT_TERMINAL_PROMPT=0); failures become BackendError

import { Effect } from "effect";

import { BackendError } from "../../core/errors.js";
import { parseGitmodules } from "../../core/fleet/gitmodules.js";
import type { CommitInfo, GitBackend } from "../../core/types/index.js";
import { execCommand } from "../utils/exec.js";
import { fs, path } from "../utils/node-mods.js";

const NO_PROMPT = { GIT_TERMINAL_PROMPT: "0" } as const;

const git = (repo: string, args: readonly string[]): Effect.Effect<string, BackendError> =>
	execCommand({ backend: "git", command: "git", args, cwd: repo, env: NO_PROMPT });

const gitUnit = (repo: string, args: readonly string[]): Effect.Effect<void, BackendError> =>
	Effect.asVoid(git(repo, args));

function parseHeadCommit(
	repo: string,
	output: string,
): Effect.Effect<CommitInfo, BackendError> {
	const [hash = "", seconds = ""] = output.trim().split(" ");
	const epoch = Number.parseInt(seconds, 10);
	if (hash.length === 0 || Number.isNaN(epoch)) {
		return Effect.fail(
			new BackendError({
				backend: "git",
				command: "git log -1 --format=%H %at",
				diagnostic: `Unexpected output: ${output.trim()}`,
				location: repo,
			}),
		);
	}
	return Effect.succeed({ hash, authorDate: new Date(epoch * 1000) });
}

/**
 * Creates the process-backed GitBackend.
 *
 * @pure false
 */
export function createNodeGit(): GitBackend {
	return {
		topLevel: (directory) =>
			git(directory, ["rev-parse", "--show-toplevel"]).pipe(
				Effect.map((out) => path.resolve(out.trim())),
			),
		isRepository: (directory) =>
			git(directory, ["rev-parse", "--is-inside-work-tree"]).pipe(
				Effect.map((out) => out.trim() === "true"),
				Effect.orElseSucceed(() => false),
			),
		currentBranch: (repo) =>
			git(repo, ["rev-parse", "--abbrev-ref", "HEAD"]).pipe(
				Effect.map((out) => {
					const branch = out.trim();
					return branch === "HEAD" ? null : branch;
				}),
			),
		headCommit: (repo) =>
			git(repo, ["log", "-1", "--format=%H %at"]).pipe(
				Effect.flatMap((out) => parseHeadCommit(repo, out)),
			),
		listSubmodules: (repo) =>
			fs.existsSync(path.join(repo, ".gitmodules"))
				? git(repo, ["config", "--file", ".gitmodules", "--list"]).pipe(
						Effect.map(parseGitmodules),
					)
				: Effect.succeed([]),
		remoteUrl: (repo, remote) =>
			git(repo, ["remote", "get-url", remote]).pipe(Effect.map((out) => out.trim())),
		setRemoteUrl: (repo, remote, url) => gitUnit(repo, ["remote", "set-url", remote, url]),
		fetch: (repo, remote, branch, depth) =>
			gitUnit(repo, [
				"fetch",
				remote,
				branch,
				...(depth === null ? [] : ["--depth", String(depth)]),
			]),
		checkout: (repo, ref) => gitUnit(repo, ["checkout", ref]),
		reset: (repo, mode, target) => gitUnit(repo, ["reset", `--${mode}`, target]),
		clean: (repo, options) =>
			gitUnit(repo, [
				"clean",
				...(options.force ? ["-f"] : []),
				...(options.directories ? ["-d"] : []),
			]),
		merge: (repo, ref, options) =>
			gitUnit(repo, ["merge", options.fastForwardOnly ? "--ff-only" : "--no-edit", ref]),
		tag: (repo, name, message) => gitUnit(repo, ["tag", "-a", name, "-m", message]),
		push: (repo, remote, branch, options) =>
			gitUnit(repo, [
				"push",
				...(options.followTags ? ["--follow-tags"] : []),
				remote,
				branch,
			]),
		setUpstream: (repo, branch, upstream) =>
			gitUnit(repo, ["branch", `--set-upstream-to=${upstream}`, branch]),
		commit: (repo, paths, message) =>
			Effect.gen(function* () {
				yield* gitUnit(repo, ["add", "--", ...paths]);
				yield* gitUnit(repo, ["commit", "-m", message, "--", ...paths]);
				const hash = yield* git(repo, ["rev-parse", "HEAD"]);
				return hash.trim();
			}),
	};
}
