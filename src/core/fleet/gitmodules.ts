// Parser for `git config --file .gitmodules --list` output
// PURITY: CORE
// INVARIANT: Entries keep the order in which their section first appears
// COMPLEXITY: O(n) where n = number of lines

import type { SubmoduleEntry } from "../types/index.js";

interface MutableEntry {
	name: string;
	path: string | null;
	url: string | null;
	branch: string | null;
}

/**
 * Splits `submodule.<name>.<key>=<value>`; submodule names may contain dots.
 */
function splitLine(
	line: string,
): { readonly name: string; readonly key: string; readonly value: string } | null {
	const eq = line.indexOf("=");
	if (eq <= 0) return null;
	const fullKey = line.slice(0, eq);
	const value = line.slice(eq + 1);
	if (!fullKey.startsWith("submodule.")) return null;
	const rest = fullKey.slice("submodule.".length);
	const dot = rest.lastIndexOf(".");
	if (dot <= 0) return null;
	return { name: rest.slice(0, dot), key: rest.slice(dot + 1), value };
}

/**
 * Parses .gitmodules listings into submodule entries.
 *
 * Sections without a `path` are dropped: git ignores them as well.
 *
 * @pure true
 *
 * @example
 * ```ts
 * parseGitmodules("submodule.core.path=core\nsubmodule.core.branch=develop\n");
 * // => [{ name: "core", path: "core", url: null, branch: "develop" }]
 * ```
 */
export function parseGitmodules(listing: string): readonly SubmoduleEntry[] {
	const byName = new Map<string, MutableEntry>();
	for (const raw of listing.split(/\r?\n/u)) {
		const line = raw.trim();
		if (line.length === 0) continue;
		const parts = splitLine(line);
		if (parts === null) continue;
		const entry = byName.get(parts.name) ?? {
			name: parts.name,
			path: null,
			url: null,
			branch: null,
		};
		byName.set(parts.name, entry);
		if (parts.key === "path") entry.path = parts.value;
		else if (parts.key === "url") entry.url = parts.value;
		else if (parts.key === "branch") entry.branch = parts.value;
	}
	const entries: SubmoduleEntry[] = [];
	for (const entry of byName.values()) {
		if (entry.path === null) continue;
		entries.push({
			name: entry.name,
			path: entry.path,
			url: entry.url,
			branch: entry.branch,
		});
	}
	return entries;
}

/**
 * `branch = .` in .gitmodules means "same name as the superproject's branch".
 *
 * @pure true
 */
export function resolveTrackedBranch(
	declared: string | null,
	superprojectBranch: string | null,
): string {
	if (declared === null || declared.length === 0) return "master";
	if (declared === ".") return superprojectBranch ?? "master";
	return declared;
}
