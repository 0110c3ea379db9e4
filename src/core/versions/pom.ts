// pom.xml dialect: text of <version> elements
// PURITY: CORE
// INVARIANT: Only leaf <version> elements are considered; comments never match

import type { TextEdit } from "../types/index.js";
import { lineAt, scanXml } from "./xml-scanner.js";

/**
 * Every `<version>` leaf whose text equals `from`, at any depth
 * (project, parent, dependency, plugin, dependencyManagement).
 *
 * @pure true
 */
export function pomEdits(text: string, from: string, to: string): readonly TextEdit[] {
	return scanXml(text)
		.texts.filter(
			(node) => node.path[node.path.length - 1] === "version" && node.value === from,
		)
		.map((node) => ({
			start: node.start,
			end: node.end,
			line: lineAt(text, node.start),
			oldValue: node.value,
			newValue: to,
		}));
}

/**
 * Declared versions of the project and its parent.
 *
 * Property references (`${...}`) are not versions and are left out.
 *
 * @pure true
 */
export function pomDeclaredVersions(
	text: string,
): readonly { readonly element: string; readonly version: string }[] {
	return scanXml(text)
		.texts.filter((node) => {
			const [root, parent, leaf, ...rest] = node.path;
			if (root !== "project" || rest.length > 0) return false;
			if (parent === "version" && leaf === undefined) return true;
			return parent === "parent" && leaf === "version";
		})
		.filter((node) => !node.value.includes("${"))
		.map((node) => ({ element: node.path.join("/"), version: node.value }));
}
