// feature.xml dialect: version attributes of feature, plugin, includes and import
// PURITY: CORE

import type { TextEdit } from "../types/index.js";
import { toEclipseVersion } from "./eclipse.js";
import { lineAt, scanXml } from "./xml-scanner.js";

const VERSIONED_ELEMENTS: ReadonlySet<string> = new Set([
	"feature",
	"plugin",
	"includes",
	"import",
]);

/**
 * @pure true
 * @invariant Matching compares against the Eclipse forms of from and to
 */
export function featureEdits(
	text: string,
	from: string,
	to: string,
): readonly TextEdit[] {
	const eclipseFrom = toEclipseVersion(from);
	const eclipseTo = toEclipseVersion(to);
	return scanXml(text)
		.attributes.filter((attribute) => {
			const element = attribute.path[attribute.path.length - 1];
			return (
				attribute.name === "version" &&
				element !== undefined &&
				VERSIONED_ELEMENTS.has(element) &&
				attribute.value === eclipseFrom
			);
		})
		.map((attribute) => ({
			start: attribute.start,
			end: attribute.end,
			line: lineAt(text, attribute.start),
			oldValue: attribute.value,
			newValue: eclipseTo,
		}));
}
