// Dialect dispatch, span application and change-set rendering
// FORMAT THEOREM: applyEdits(t, edits(t, a, b)) then edits(·, b, a) restores t byte for byte
// PURITY: CORE
// INVARIANT: Edits never overlap; text outside edit spans is preserved exactly
// COMPLEXITY: O(n + k·log k) where n = |text|, k = |edits|

import * as path from "node:path";

import { match } from "ts-pattern";

import type { ChangeSet, DescriptorDialect, TextEdit } from "../types/index.js";
import { featureEdits } from "./feature.js";
import { gradlePropertiesEdits } from "./gradle-properties.js";
import { manifestEdits } from "./manifest.js";
import { pomEdits } from "./pom.js";

/**
 * Dialect of a descriptor, from its repository-relative POSIX path.
 *
 * @pure true
 * @returns null for files that are not build descriptors
 */
export function dialectOf(file: string): DescriptorDialect | null {
	const base = path.posix.basename(file);
	if (base === "pom.xml") return "pom";
	if (base === "feature.xml") return "feature";
	if (base === "gradle.properties") return "gradle-properties";
	if (base === "MANIFEST.MF" && path.posix.basename(path.posix.dirname(file)) === "META-INF") {
		return "manifest";
	}
	return null;
}

/**
 * @pure true
 */
export const versionEdits = (
	dialect: DescriptorDialect,
	text: string,
	from: string,
	to: string,
): readonly TextEdit[] =>
	match(dialect)
		.with("pom", () => pomEdits(text, from, to))
		.with("feature", () => featureEdits(text, from, to))
		.with("manifest", () => manifestEdits(text, from, to))
		.with("gradle-properties", () => gradlePropertiesEdits(text, from, to))
		.exhaustive();

/**
 * Applies span edits from the end of the text towards the start, so earlier
 * offsets stay valid.
 *
 * @pure true
 * @precondition ∀e: text.slice(e.start, e.end) === e.oldValue
 */
export function applyEdits(text: string, edits: readonly TextEdit[]): string {
	const ordered = [...edits].sort((a, b) => b.start - a.start);
	let result = text;
	for (const edit of ordered) {
		result = result.slice(0, edit.start) + edit.newValue + result.slice(edit.end);
	}
	return result;
}

/**
 * Diff-like rendering of a change set, grouped by file.
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatChangeSet([{ repository: "lang", file: "pom.xml", dialect: "pom", line: 4, oldValue: "1.0", newValue: "1.1" }]);
 * // "lang/pom.xml\n  4: - 1.0\n  4: + 1.1"
 * ```
 */
export function formatChangeSet(changes: ChangeSet): string {
	if (changes.length === 0) return "No version changes";
	const lines: string[] = [];
	let current: string | null = null;
	for (const change of changes) {
		const file =
			change.repository.length === 0
				? change.file
				: `${change.repository}/${change.file}`;
		if (file !== current) {
			lines.push(file);
			current = file;
		}
		lines.push(`  ${change.line}: - ${change.oldValue}`);
		lines.push(`  ${change.line}: + ${change.newValue}`);
	}
	return lines.join("\n");
}
