import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { checkReleaseVersions, versionSources } from "../../../src/core/build/release-check.js";
import type { BuildTarget } from "../../../src/core/types/index.js";
import { mavenTarget } from "../../utils/builders.js";

describe("versionSources", () => {
	it("reads maven targets from their descriptor", () => {
		expect(versionSources(mavenTarget("java"))).toEqual([
			{ target: "java", file: "build/java/pom.xml", format: "pom" },
		]);
	});

	it("reads gradle targets from gradle.properties beside the build file", () => {
		const target: BuildTarget = {
			name: "intellij",
			dependencies: [],
			backend: { kind: "tool", tool: "gradle", descriptor: "ij/build.gradle", expensive: false, artifacts: [] },
		};
		expect(versionSources(target)).toEqual([
			{ target: "intellij", file: "ij/gradle.properties", format: "gradle-properties" },
		]);
	});

	it("has nothing to read for source builds", () => {
		const target: BuildTarget = {
			name: "docs",
			dependencies: [],
			backend: { kind: "source-build", directory: "docs", command: ["make"], artifacts: [] },
		};
		expect(versionSources(target)).toEqual([]);
	});
});

describe("checkReleaseVersions", () => {
	it("accepts release versions", () => {
		const declared = [{ target: "java", file: "build/java/pom.xml", element: "project/version", version: "2.5.1" }];
		expect(Either.isRight(Effect.runSync(Effect.either(checkReleaseVersions(declared))))).toBe(true);
	});

	it("lists every snapshot declaration", () => {
		const declared = [
			{ target: "java", file: "build/java/pom.xml", element: "project/version", version: "2.6.0-SNAPSHOT" },
			{ target: "java", file: "build/java/pom.xml", element: "project/parent/version", version: "2.5.1" },
			{ target: "intellij", file: "ij/gradle.properties", element: "version", version: "2.6.0.qualifier" },
		];
		const result = Effect.runSync(Effect.either(checkReleaseVersions(declared)));
		expect(Either.isLeft(result) && result.left.reason).toBe("snapshot-dependency");
		expect(Either.isLeft(result) && result.left.detail).toBe(
			"Release build depends on snapshot versions: java: build/java/pom.xml project/version = 2.6.0-SNAPSHOT; intellij: ij/gradle.properties version = 2.6.0.qualifier",
		);
	});
});
