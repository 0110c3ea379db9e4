// Fleet domain model: repositories, fleet operations and their outcomes
// PURITY: CORE
// INVARIANT: All structures are immutable; fleet order is declaration order

import type { BackendError } from "../errors.js";

/**
 * One checked-out repository of the fleet.
 *
 * @property path Absolute working tree path
 * @property relativePath POSIX path from the fleet root ("" for the root itself)
 * @property name Submodule name from .gitmodules (root uses its directory name)
 * @property trackedBranch Branch the submodule follows (`branch` key, default "master")
 * @property depth 0 for the root, 1 for its submodules, and so on
 * @property parentPath Absolute path of the containing repository, null for the root
 */
export interface Repository {
	readonly path: string;
	readonly relativePath: string;
	readonly name: string;
	readonly trackedBranch: string;
	readonly depth: number;
	readonly parentPath: string | null;
}

/**
 * The root repository plus every nested submodule, depth-first in declaration order.
 *
 * @invariant members never contains root
 * @invariant ∀ m ∈ members: m.parentPath ∈ {root.path} ∪ paths(members before m)
 */
export interface Fleet {
	readonly root: Repository;
	readonly members: readonly Repository[];
}

export type RemoteKind = "ssh" | "http";

export interface CommitInfo {
	readonly hash: string;
	readonly authorDate: Date;
}

/**
 * One `submodule.<name>` section of a .gitmodules file.
 */
export interface SubmoduleEntry {
	readonly name: string;
	readonly path: string;
	readonly url: string | null;
	readonly branch: string | null;
}

/**
 * A git-level operation the Fleet Operator applies to every member.
 */
export type FleetOperation =
	| { readonly _tag: "Checkout" }
	| { readonly _tag: "Reset"; readonly toRemote: boolean }
	| { readonly _tag: "Clean" }
	| { readonly _tag: "Update"; readonly depth: number | null }
	| { readonly _tag: "Track" }
	| { readonly _tag: "Merge"; readonly branch: string }
	| {
			readonly _tag: "Tag";
			readonly name: string;
			readonly description: string | null;
	  }
	| { readonly _tag: "Push"; readonly tags: boolean }
	| { readonly _tag: "SetRemote"; readonly kind: RemoteKind }
	| { readonly _tag: "Switch"; readonly branch: string };

export type RepositoryOutcome =
	| { readonly _tag: "Applied"; readonly detail: string }
	| { readonly _tag: "Failed"; readonly error: BackendError };

/**
 * Per-repository outcomes keyed by absolute repository path.
 *
 * @invariant Iteration order equals the order repositories were processed
 */
export type FleetReport = ReadonlyMap<string, RepositoryOutcome>;

/**
 * How many times a human must say "yes" before an operation runs.
 */
export type ConfirmationLevel = "none" | "once" | "twice" | "thrice";
