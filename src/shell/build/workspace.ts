// Filesystem side of a build: declared versions, artifact copies, local repository cleaning
// PURITY: SHELL

import { Effect } from "effect";
import { match } from "ts-pattern";

import { FSError, ValidationError } from "../../core/errors.js";
import { type VersionSource, versionSources } from "../../core/build/release-check.js";
import { gradleDeclaredVersion } from "../../core/versions/gradle-properties.js";
import { pomDeclaredVersions } from "../../core/versions/pom.js";
import type { BuildTarget, DeclaredVersion } from "../../core/types/index.js";
import { fs, fsp, path } from "../utils/node-mods.js";

const fsError = (target: string) => (error: unknown) =>
	new FSError({
		detail: error instanceof Error ? error.message : String(error),
		path: target,
	});

function readSource(
	fleetRoot: string,
	source: VersionSource,
): Effect.Effect<readonly DeclaredVersion[], FSError | ValidationError> {
	const absolute = path.join(fleetRoot, source.file);
	if (!fs.existsSync(absolute)) {
		return Effect.fail(
			new ValidationError({
				reason: "invalid-config",
				detail: `Cannot read the version of ${source.target}: ${source.file} does not exist`,
			}),
		);
	}
	return Effect.tryPromise({
		try: () => fsp.readFile(absolute, "utf8"),
		catch: fsError(absolute),
	}).pipe(
		Effect.map((text): readonly DeclaredVersion[] =>
			match(source.format)
				.with("pom", () =>
					pomDeclaredVersions(text).map((declared) => ({
						target: source.target,
						file: source.file,
						element: declared.element,
						version: declared.version,
					})),
				)
				.with("gradle-properties", () => {
					const version = gradleDeclaredVersion(text);
					return version === null
						? []
						: [{ target: source.target, file: source.file, element: "version", version }];
				})
				.exhaustive(),
		),
	);
}

/**
 * Versions declared by the descriptors of `targets`.
 *
 * A missing descriptor is a configuration error: it cannot vouch for a release.
 *
 * @effect Effect<readonly DeclaredVersion[], FSError | ValidationError>
 */
export function readDeclaredVersions(
	fleetRoot: string,
	targets: readonly BuildTarget[],
): Effect.Effect<readonly DeclaredVersion[], FSError | ValidationError> {
	return Effect.gen(function* () {
		const declared: DeclaredVersion[] = [];
		for (const target of targets) {
			for (const source of versionSources(target)) {
				declared.push(...(yield* readSource(fleetRoot, source)));
			}
		}
		return declared;
	});
}

/**
 * Copies the artifacts of a target that exist into `destination`.
 *
 * @returns Destination paths written
 */
export function copyArtifacts(
	fleetRoot: string,
	target: BuildTarget,
	destination: string,
): Effect.Effect<readonly string[], FSError> {
	return Effect.gen(function* () {
		const existing = target.backend.artifacts
			.map((artifact) => path.join(fleetRoot, artifact))
			.filter((artifact) => fs.existsSync(artifact));
		if (existing.length === 0) return [];
		yield* Effect.tryPromise({
			try: () => fsp.mkdir(destination, { recursive: true }),
			catch: fsError(destination),
		});
		const written: string[] = [];
		for (const source of existing) {
			const copy = path.join(destination, path.basename(source));
			yield* Effect.tryPromise({
				try: () => fsp.cp(source, copy, { recursive: true, force: true }),
				catch: fsError(source),
			});
			written.push(copy);
		}
		return written;
	});
}

/**
 * Deletes the configured group directories from a local Maven repository.
 *
 * @returns Directories that existed and were removed
 */
export function cleanLocalRepository(
	localRepository: string,
	groups: readonly string[],
): Effect.Effect<readonly string[], FSError> {
	return Effect.gen(function* () {
		const removed: string[] = [];
		for (const group of groups) {
			const directory = path.join(localRepository, ...group.split("/"));
			if (!fs.existsSync(directory)) continue;
			yield* Effect.tryPromise({
				try: () => fsp.rm(directory, { recursive: true, force: true }),
				catch: fsError(directory),
			});
			removed.push(directory);
		}
		return removed;
	});
}

/**
 * `~/.m2/repository` unless the profile names another location.
 */
export const defaultLocalRepository = (home: string): string =>
	path.join(home, ".m2", "repository");
