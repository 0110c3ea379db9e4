// gradle.properties dialect: the `version` property
// PURITY: CORE

import type { TextEdit } from "../types/index.js";

const VERSION_PROPERTY = /^(\s*version\s*[=:]\s*)(\S.*?)\s*$/u;

interface PropertyValue {
	readonly start: number;
	readonly line: number;
	readonly value: string;
}

function versionProperties(text: string): readonly PropertyValue[] {
	const found: PropertyValue[] = [];
	let offset = 0;
	text.split("\n").forEach((raw, index) => {
		const line = raw.replace(/\r$/u, "");
		const parsed = VERSION_PROPERTY.exec(line);
		if (parsed !== null) {
			const prefix = parsed[1] ?? "";
			found.push({
				start: offset + prefix.length,
				line: index + 1,
				value: parsed[2] ?? "",
			});
		}
		offset += raw.length + 1;
	});
	return found;
}

/**
 * @pure true
 */
export function gradlePropertiesEdits(
	text: string,
	from: string,
	to: string,
): readonly TextEdit[] {
	return versionProperties(text)
		.filter((property) => property.value === from)
		.map((property) => ({
			start: property.start,
			end: property.start + property.value.length,
			line: property.line,
			oldValue: property.value,
			newValue: to,
		}));
}

/**
 * The declared `version`, or null when the file declares none.
 *
 * @pure true
 */
export function gradleDeclaredVersion(text: string): string | null {
	return versionProperties(text)[0]?.value ?? null;
}
