// MANIFEST.MF dialect: Bundle-Version and bundle-version attributes
// PURITY: CORE
// INVARIANT: Continuation lines (leading space) belong to the previous header

import type { TextEdit } from "../types/index.js";
import { toEclipseVersion } from "./eclipse.js";

const REFERENCE_HEADERS: ReadonlySet<string> = new Set([
	"Require-Bundle",
	"Fragment-Host",
]);

const BUNDLE_VERSION_ATTRIBUTE = /bundle-version="([^"]*)"/gu;

interface PhysicalLine {
	readonly text: string;
	readonly offset: number;
	readonly number: number;
}

function physicalLines(text: string): readonly PhysicalLine[] {
	const lines: PhysicalLine[] = [];
	let offset = 0;
	let number = 1;
	for (const raw of text.split("\n")) {
		lines.push({ text: raw.replace(/\r$/u, ""), offset, number });
		offset += raw.length + 1;
		number += 1;
	}
	return lines;
}

/**
 * @pure true
 *
 * @example
 * ```ts
 * manifestEdits("Bundle-Version: 1.0.0.qualifier\n", "1.0.0-SNAPSHOT", "1.0.0");
 * // => [{ start: 16, end: 31, line: 1, oldValue: "1.0.0.qualifier", newValue: "1.0.0" }]
 * ```
 */
export function manifestEdits(
	text: string,
	from: string,
	to: string,
): readonly TextEdit[] {
	const eclipseFrom = toEclipseVersion(from);
	const eclipseTo = toEclipseVersion(to);
	const edits: TextEdit[] = [];
	let header: string | null = null;

	for (const line of physicalLines(text)) {
		if (!line.text.startsWith(" ")) {
			const colon = line.text.indexOf(":");
			header = colon > 0 ? line.text.slice(0, colon) : null;
			if (header === "Bundle-Version") {
				const raw = line.text.slice(colon + 1);
				const value = raw.trim();
				if (value === eclipseFrom) {
					const start = line.offset + colon + 1 + raw.indexOf(value);
					edits.push({
						start,
						end: start + value.length,
						line: line.number,
						oldValue: value,
						newValue: eclipseTo,
					});
				}
				continue;
			}
		}
		if (header === null || !REFERENCE_HEADERS.has(header)) continue;
		for (const found of line.text.matchAll(BUNDLE_VERSION_ATTRIBUTE)) {
			const value = found[1];
			if (value !== eclipseFrom || found.index === undefined) continue;
			const start = line.offset + found.index + 'bundle-version="'.length;
			edits.push({
				start,
				end: start + value.length,
				line: line.number,
				oldValue: value,
				newValue: eclipseTo,
			});
		}
	}
	return edits;
}
