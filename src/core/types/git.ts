// Port to the version-control backend. The shell provides a git process
// implementation; tests provide an in-memory one.
// PURITY: CORE (interface only)

import type { Effect } from "effect";

import type { BackendError } from "../errors.js";
import type { CommitInfo, SubmoduleEntry } from "./fleet.js";

export type ResetMode = "hard" | "mixed" | "soft";

export interface CleanOptions {
	readonly force: boolean;
	readonly directories: boolean;
}

export interface MergeOptions {
	readonly fastForwardOnly: boolean;
}

export interface PushOptions {
	readonly followTags: boolean;
}

/**
 * Version-control primitives required per repository.
 *
 * Every `repo` argument is an absolute working tree path.
 *
 * @invariant No method prompts or retries; failures surface as BackendError
 */
export interface GitBackend {
	readonly topLevel: (directory: string) => Effect.Effect<string, BackendError>;
	readonly isRepository: (directory: string) => Effect.Effect<boolean>;
	/** Current branch name, or null on a detached HEAD. */
	readonly currentBranch: (
		repo: string,
	) => Effect.Effect<string | null, BackendError>;
	readonly headCommit: (repo: string) => Effect.Effect<CommitInfo, BackendError>;
	/** Direct submodules in .gitmodules declaration order. */
	readonly listSubmodules: (
		repo: string,
	) => Effect.Effect<readonly SubmoduleEntry[], BackendError>;
	readonly remoteUrl: (
		repo: string,
		remote: string,
	) => Effect.Effect<string, BackendError>;
	readonly setRemoteUrl: (
		repo: string,
		remote: string,
		url: string,
	) => Effect.Effect<void, BackendError>;
	readonly fetch: (
		repo: string,
		remote: string,
		branch: string,
		depth: number | null,
	) => Effect.Effect<void, BackendError>;
	readonly checkout: (
		repo: string,
		ref: string,
	) => Effect.Effect<void, BackendError>;
	readonly reset: (
		repo: string,
		mode: ResetMode,
		target: string,
	) => Effect.Effect<void, BackendError>;
	readonly clean: (
		repo: string,
		options: CleanOptions,
	) => Effect.Effect<void, BackendError>;
	readonly merge: (
		repo: string,
		ref: string,
		options: MergeOptions,
	) => Effect.Effect<void, BackendError>;
	readonly tag: (
		repo: string,
		name: string,
		message: string,
	) => Effect.Effect<void, BackendError>;
	readonly push: (
		repo: string,
		remote: string,
		branch: string,
		options: PushOptions,
	) => Effect.Effect<void, BackendError>;
	readonly setUpstream: (
		repo: string,
		branch: string,
		upstream: string,
	) => Effect.Effect<void, BackendError>;
	/** Stages and commits exactly `paths`; returns the new commit hash. */
	readonly commit: (
		repo: string,
		paths: readonly string[],
		message: string,
	) => Effect.Effect<string, BackendError>;
}
