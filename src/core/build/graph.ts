// Dependency graph over build targets: validation, closure, deterministic order
// FORMAT THEOREM: ∀t ∈ order, ∀d ∈ deps(t) ∩ selection: index(d) < index(t)
// PURITY: CORE
// INVARIANT: Among ready targets, declaration order decides; each target appears once
// COMPLEXITY: O(n² + e) where n = |targets|, e = |dependency edges|

import { Effect } from "effect";

import { ValidationError } from "../errors.js";
import type { BuildTarget } from "../types/index.js";

type Color = "visiting" | "done";

function indexTargets(
	targets: readonly BuildTarget[],
): ReadonlyMap<string, BuildTarget> {
	return new Map(targets.map((target) => [target.name, target]));
}

/**
 * Finds the first dependency cycle, walking targets in declaration order.
 *
 * @returns Cycle path with the repeated name at both ends, or null
 *
 * @pure true
 *
 * @example
 * ```ts
 * findCycle([{ name: "a", dependencies: ["b"] }, { name: "b", dependencies: ["a"] }]);
 * // => ["a", "b", "a"]
 * ```
 */
export function findCycle(
	targets: readonly BuildTarget[],
): readonly string[] | null {
	const byName = indexTargets(targets);
	const color = new Map<string, Color>();
	const stack: string[] = [];

	const visit = (name: string): readonly string[] | null => {
		const state = color.get(name);
		if (state === "done") return null;
		if (state === "visiting") {
			return [...stack.slice(stack.indexOf(name)), name];
		}
		color.set(name, "visiting");
		stack.push(name);
		for (const dependency of byName.get(name)?.dependencies ?? []) {
			const cycle = visit(dependency);
			if (cycle !== null) return cycle;
		}
		stack.pop();
		color.set(name, "done");
		return null;
	};

	for (const target of targets) {
		const cycle = visit(target.name);
		if (cycle !== null) return cycle;
	}
	return null;
}

/**
 * Rejects duplicate names, dangling dependency names and cycles.
 *
 * A cycle is a configuration error, never something to recover from.
 *
 * @pure true
 * @effect Effect<readonly BuildTarget[], ValidationError>
 */
export function validateGraph(
	targets: readonly BuildTarget[],
): Effect.Effect<readonly BuildTarget[], ValidationError> {
	const seen = new Set<string>();
	for (const target of targets) {
		if (seen.has(target.name)) {
			return Effect.fail(
				new ValidationError({
					reason: "invalid-config",
					detail: `Build target '${target.name}' is declared more than once`,
				}),
			);
		}
		seen.add(target.name);
	}
	for (const target of targets) {
		const missing = target.dependencies.filter((dep) => !seen.has(dep));
		if (missing.length > 0) {
			return Effect.fail(
				new ValidationError({
					reason: "unknown-target",
					detail: `Build target '${target.name}' depends on unknown target(s): ${missing.join(", ")}`,
				}),
			);
		}
	}
	const cycle = findCycle(targets);
	if (cycle !== null) {
		return Effect.fail(
			new ValidationError({
				reason: "cyclic-dependency",
				detail: `Cyclic build dependency: ${cycle.join(" -> ")}`,
			}),
		);
	}
	return Effect.succeed(targets);
}

/**
 * Names to build: the transitive dependency closure of `requested`, or exactly
 * `requested` when dependency building is off.
 *
 * @pure true
 * @precondition validateGraph(targets) succeeded
 */
export function resolveTargets(
	targets: readonly BuildTarget[],
	requested: readonly string[],
	buildDependencies: boolean,
): Effect.Effect<ReadonlySet<string>, ValidationError> {
	const byName = indexTargets(targets);
	const unknown = requested.filter((name) => !byName.has(name));
	if (unknown.length > 0) {
		return Effect.fail(
			new ValidationError({
				reason: "unknown-target",
				detail: `Unknown build target(s): ${unknown.join(", ")}. Available: ${targets.map((t) => t.name).join(", ")}`,
			}),
		);
	}
	if (!buildDependencies) return Effect.succeed(new Set(requested));

	const selected = new Set<string>();
	const pending = [...requested];
	while (pending.length > 0) {
		const name = pending.pop();
		if (name === undefined || selected.has(name)) continue;
		selected.add(name);
		pending.push(...(byName.get(name)?.dependencies ?? []));
	}
	return Effect.succeed(selected);
}

/**
 * Kahn's algorithm with a declaration-order tie-break.
 *
 * Dependencies outside `selection` are ignored, which is what building without
 * dependencies means.
 *
 * @pure true
 * @precondition the graph restricted to selection is acyclic
 * @postcondition result contains every selected target exactly once
 */
export function orderTargets(
	targets: readonly BuildTarget[],
	selection: ReadonlySet<string>,
): readonly BuildTarget[] {
	const remaining = targets.filter((target) => selection.has(target.name));
	const emitted = new Set<string>();
	const order: BuildTarget[] = [];

	while (remaining.length > 0) {
		const readyIndex = remaining.findIndex((target) =>
			target.dependencies.every(
				(dep) => !selection.has(dep) || emitted.has(dep),
			),
		);
		// Unreachable for validated graphs; stop instead of spinning.
		if (readyIndex < 0) break;
		const [ready] = remaining.splice(readyIndex, 1);
		if (ready === undefined) break;
		emitted.add(ready.name);
		order.push(ready);
	}
	return order;
}

/**
 * Validation, resolution and ordering in one step.
 *
 * @pure true
 * @effect Effect<readonly BuildTarget[], ValidationError>
 */
export function planBuildOrder(
	targets: readonly BuildTarget[],
	requested: readonly string[],
	buildDependencies: boolean,
): Effect.Effect<readonly BuildTarget[], ValidationError> {
	return validateGraph(targets).pipe(
		Effect.flatMap((valid) =>
			resolveTargets(valid, requested, buildDependencies),
		),
		Effect.map((selection) => orderTargets(targets, selection)),
	);
}
