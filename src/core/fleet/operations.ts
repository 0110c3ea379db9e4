// Fleet operation constructors, labels and confirmation policy
// PURITY: CORE
// INVARIANT: Destructiveness is a property of the operation value alone

import { match } from "ts-pattern";

import type {
	ConfirmationLevel,
	ConfirmRequest,
	FleetOperation,
	RemoteKind,
} from "../types/index.js";

export const FleetOperations = {
	checkout: (): FleetOperation => ({ _tag: "Checkout" }),
	reset: (toRemote: boolean): FleetOperation => ({ _tag: "Reset", toRemote }),
	clean: (): FleetOperation => ({ _tag: "Clean" }),
	update: (depth: number | null): FleetOperation => ({ _tag: "Update", depth }),
	track: (): FleetOperation => ({ _tag: "Track" }),
	merge: (branch: string): FleetOperation => ({ _tag: "Merge", branch }),
	tag: (name: string, description: string | null): FleetOperation => ({
		_tag: "Tag",
		name,
		description,
	}),
	push: (tags: boolean): FleetOperation => ({ _tag: "Push", tags }),
	setRemote: (kind: RemoteKind): FleetOperation => ({ _tag: "SetRemote", kind }),
	switchTo: (branch: string): FleetOperation => ({ _tag: "Switch", branch }),
} as const;

/**
 * Short human label, used in logs and failure summaries.
 *
 * @pure true
 */
export const describeOperation = (operation: FleetOperation): string =>
	match(operation)
		.with({ _tag: "Checkout" }, () => "checkout tracked branch")
		.with({ _tag: "Reset" }, ({ toRemote }) =>
			toRemote ? "reset to remote branch" : "reset to HEAD",
		)
		.with({ _tag: "Clean" }, () => "clean untracked files")
		.with({ _tag: "Update" }, ({ depth }) =>
			depth === null ? "update" : `update (depth ${depth})`,
		)
		.with({ _tag: "Track" }, () => "track remote branch")
		.with({ _tag: "Merge" }, ({ branch }) => `merge ${branch}`)
		.with({ _tag: "Tag" }, ({ name }) => `tag ${name}`)
		.with({ _tag: "Push" }, ({ tags }) => (tags ? "push with tags" : "push"))
		.with({ _tag: "SetRemote" }, ({ kind }) => `set ${kind} remote`)
		.with({ _tag: "Switch" }, ({ branch }) => `switch to ${branch}`)
		.exhaustive();

/**
 * Decides how much confirmation an operation needs.
 *
 * @pure true
 * @invariant Reset{toRemote:true} is the only "thrice" operation
 * @invariant Operations that only add or re-point state never need confirmation
 */
export const confirmationLevel = (
	operation: FleetOperation,
): ConfirmationLevel =>
	match(operation)
		.with({ _tag: "Track" }, { _tag: "SetRemote" }, { _tag: "Update" }, () => "none" as const)
		.with(
			{ _tag: "Checkout" },
			{ _tag: "Merge" },
			{ _tag: "Tag" },
			{ _tag: "Push" },
			{ _tag: "Switch" },
			() => "once" as const,
		)
		.with({ _tag: "Clean" }, { _tag: "Reset", toRemote: false }, () => "twice" as const)
		.with({ _tag: "Reset", toRemote: true }, () => "thrice" as const)
		.exhaustive();

/**
 * Warning shown before an operation; null when no confirmation is needed.
 *
 * @pure true
 */
export const confirmationRequest = (
	operation: FleetOperation,
): ConfirmRequest | null => {
	const level = confirmationLevel(operation);
	if (level === "none") return null;
	const message = match(operation)
		.with(
			{ _tag: "Checkout" },
			() =>
				"WARNING: This will get rid of detached heads, including any commits you have made to detached heads, do you want to continue?",
		)
		.with({ _tag: "Reset", toRemote: true }, () =>
			"WARNING: This will DELETE UNCOMMITTED CHANGES and DELETE UNPUSHED COMMITS, do you want to continue?",
		)
		.with({ _tag: "Reset", toRemote: false }, () =>
			"WARNING: This will DELETE UNCOMMITTED CHANGES, do you want to continue?",
		)
		.with(
			{ _tag: "Clean" },
			() => "WARNING: This will DELETE UNTRACKED FILES, do you want to continue?",
		)
		.with(
			{ _tag: "Merge" },
			{ _tag: "Switch" },
			(op) =>
				`This will ${describeOperation(op)} in every repository, changing the state of your repositories, do you want to continue?`,
		)
		.with(
			{ _tag: "Tag" },
			() => "This creates tags, changing the state of your repositories, do you want to continue?",
		)
		.with(
			{ _tag: "Push" },
			() => "This pushes commits to the remote repository, do you want to continue?",
		)
		.with({ _tag: "Track" }, { _tag: "SetRemote" }, { _tag: "Update" }, (op) =>
			describeOperation(op),
		)
		.exhaustive();
	return { message, level };
};

/**
 * Number of consecutive "yes" answers a level demands.
 *
 * @pure true
 */
export const requiredAnswers = (level: ConfirmationLevel): number =>
	match(level)
		.with("none", () => 0)
		.with("once", () => 1)
		.with("twice", () => 2)
		.with("thrice", () => 3)
		.exhaustive();
