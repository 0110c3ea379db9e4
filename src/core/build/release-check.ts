// Release-mode validation: no resolved target may declare a snapshot version
// PURITY: CORE
// INVARIANT: Runs before any backend; a violation lists every offending declaration

import * as path from "node:path";

import { Effect } from "effect";
import { match } from "ts-pattern";

import { ValidationError } from "../errors.js";
import type { BuildTarget, DeclaredVersion } from "../types/index.js";
import { isSnapshotVersion } from "../versions/eclipse.js";

/**
 * A descriptor whose declared version release mode inspects.
 *
 * @property file Path relative to the fleet root
 */
export interface VersionSource {
	readonly target: string;
	readonly file: string;
	readonly format: "pom" | "gradle-properties";
}

/**
 * Files that declare the version of a target. Source builds declare none.
 *
 * @pure true
 */
export const versionSources = (target: BuildTarget): readonly VersionSource[] =>
	match(target.backend)
		.with({ kind: "tool", tool: "maven" }, { kind: "bootstrap-script" }, (backend) => [
			{ target: target.name, file: backend.descriptor, format: "pom" as const },
		])
		.with({ kind: "tool", tool: "gradle" }, (backend) => [
			{
				target: target.name,
				file: path.posix.join(path.posix.dirname(backend.descriptor), "gradle.properties"),
				format: "gradle-properties" as const,
			},
		])
		.with({ kind: "source-build" }, (): VersionSource[] => [])
		.exhaustive();

/**
 * Fails with a ValidationError naming every snapshot declaration.
 *
 * @pure true
 * @effect Effect<void, ValidationError>
 */
export function checkReleaseVersions(
	declared: readonly DeclaredVersion[],
): Effect.Effect<void, ValidationError> {
	const snapshots = declared.filter((entry) => isSnapshotVersion(entry.version));
	if (snapshots.length === 0) return Effect.void;
	const listing = snapshots
		.map((entry) => `${entry.target}: ${entry.file} ${entry.element} = ${entry.version}`)
		.join("; ");
	return Effect.fail(
		new ValidationError({
			reason: "snapshot-dependency",
			detail: `Release build depends on snapshot versions: ${listing}`,
		}),
	);
}
