// Maven to Eclipse/OSGi version form
// PURITY: CORE
// COMPLEXITY: O(|version|)

/**
 * Converts a Maven version to the form used in feature.xml and MANIFEST.MF.
 *
 * @pure true
 *
 * @example
 * ```ts
 * toEclipseVersion("2.5.1-SNAPSHOT"); // "2.5.1.qualifier"
 * toEclipseVersion("2.5.1-baseline3"); // "2.5.1.baseline3"
 * toEclipseVersion("2.5.1"); // "2.5.1"
 * ```
 */
export function toEclipseVersion(version: string): string {
	const dash = version.indexOf("-");
	if (dash < 0) return version;
	const base = version.slice(0, dash);
	const suffix = version.slice(dash + 1);
	return suffix === "SNAPSHOT" ? `${base}.qualifier` : `${base}.${suffix}`;
}

/**
 * Snapshot in either notation.
 *
 * @pure true
 */
export const isSnapshotVersion = (version: string): boolean =>
	version.endsWith("-SNAPSHOT") || version.endsWith(".qualifier");
