import * as fs from "node:fs";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { BuildProfile, TargetsConfig } from "../../../src/core/types/index.js";
import { build } from "../../../src/shell/build/orchestrator.js";
import { Logger } from "../../../src/shell/output/logger.js";
import { mavenTarget, profile } from "../../utils/builders.js";
import { createRecordingRunner, createRecordingSink } from "../../utils/fakes.js";
import { createTempFleet, type TempFleet } from "../../utils/temp-fleet.js";

const config = (targets: TargetsConfig["targets"]): TargetsConfig => ({
	targets,
	releaseTargets: [],
	bootstrapTargets: [],
	localRepositoryGroups: ["org/metaborg"],
});

const chain = config([mavenTarget("a"), mavenTarget("b", ["a"])]);

describe("build", () => {
	let temp: TempFleet;

	beforeEach(() => {
		temp = createTempFleet();
	});

	afterEach(() => {
		temp.cleanup();
	});

	const request = (overrides: Partial<BuildProfile> = {}, targets = chain, requested = ["b"]) => ({
		fleetRoot: temp.root,
		config: targets,
		profile: profile(overrides),
		requested,
		home: "/home/tester",
	});

	it("builds dependencies first and streams output", async () => {
		const sink = createRecordingSink();
		const recording = createRecordingRunner(() => null, "[INFO] ok\n");
		const summary = await Effect.runPromise(build(recording.runner, request(), new Logger("normal", sink)));

		expect(summary).toEqual({ built: ["a", "b"], skipped: [] });
		expect(recording.invocations.map((invocation) => invocation.args[1])).toEqual([
			`${temp.root}/build/a/pom.xml`,
			`${temp.root}/build/b/pom.xml`,
		]);
		expect(sink.outLines).toEqual(["🔍 Building a", "✅ Built a", "🔍 Building b", "✅ Built b"]);
		expect(sink.written).toEqual(["[INFO] ok\n", "[INFO] ok\n"]);
	});

	it("stops at the first failing target", async () => {
		const recording = createRecordingRunner((invocation) =>
			invocation.args.includes(`${temp.root}/build/a/pom.xml`) ? "BUILD FAILURE" : null,
		);
		const result = await Effect.runPromise(
			Effect.either(build(recording.runner, request(), new Logger("normal", createRecordingSink()))),
		);

		expect(recording.invocations).toHaveLength(1);
		expect(Either.isLeft(result) && result.left._tag === "BackendError" && result.left.diagnostic).toBe(
			"BUILD FAILURE",
		);
	});

	it("refuses a release build over snapshot versions before running anything", async () => {
		temp.write("build/a/pom.xml", "<project><version>1.0.0-SNAPSHOT</version></project>");
		temp.write("build/b/pom.xml", "<project><version>1.0.0</version></project>");
		const recording = createRecordingRunner();
		const result = await Effect.runPromise(
			Effect.either(
				build(recording.runner, request({ release: true }), new Logger("normal", createRecordingSink())),
			),
		);

		expect(recording.invocations).toEqual([]);
		expect(Either.isLeft(result) && result.left._tag === "ValidationError" && result.left.detail).toBe(
			"Release build depends on snapshot versions: a: build/a/pom.xml project/version = 1.0.0-SNAPSHOT",
		);
	});

	it("refuses a release build whose descriptor is missing", async () => {
		temp.write("build/a/pom.xml", "<project><version>1.0.0</version></project>");
		const recording = createRecordingRunner();
		const result = await Effect.runPromise(
			Effect.either(
				build(recording.runner, request({ release: true }), new Logger("normal", createRecordingSink())),
			),
		);

		expect(recording.invocations).toEqual([]);
		expect(Either.isLeft(result) && result.left._tag === "ValidationError" && result.left.detail).toBe(
			"Cannot read the version of b: build/b/pom.xml does not exist",
		);
	});

	it("rejects unknown targets before running anything", async () => {
		const recording = createRecordingRunner();
		const result = await Effect.runPromise(
			Effect.either(
				build(recording.runner, request({}, chain, ["zzz"]), new Logger("normal", createRecordingSink())),
			),
		);
		expect(Either.isLeft(result) && result.left._tag).toBe("ValidationError");
		expect(recording.invocations).toEqual([]);
	});

	it("skips expensive gradle targets", async () => {
		const sink = createRecordingSink();
		const targets = config([
			mavenTarget("a"),
			mavenTarget("g", ["a"], { tool: "gradle", descriptor: "g/build.gradle", expensive: true }),
		]);
		const recording = createRecordingRunner();
		const summary = await Effect.runPromise(
			build(
				recording.runner,
				request({ skipExpensive: true, clean: false }, targets, ["g"]),
				new Logger("normal", sink),
			),
		);

		expect(summary).toEqual({ built: ["a"], skipped: ["g"] });
		expect(sink.errLines).toEqual(["⚠️ Skipping g: expensive build step skipped"]);
	});

	it("cleans the local repository groups first", async () => {
		temp.write("m2/org/metaborg/lib/1.0/lib.jar", "jar");
		temp.write("m2/org/other/keep.jar", "jar");
		const sink = createRecordingSink();
		await Effect.runPromise(
			build(
				createRecordingRunner().runner,
				request({
					maven: {
						settingsFile: null,
						globalSettingsFile: null,
						localRepository: `${temp.root}/m2`,
						cleanLocalRepository: true,
						offline: false,
					},
				}),
				new Logger("normal", sink),
			),
		);

		expect(sink.outLines[0]).toBe(`Removed ${temp.root}/m2/org/metaborg`);
		expect(fs.existsSync(`${temp.root}/m2/org/metaborg`)).toBe(false);
		expect(fs.existsSync(`${temp.root}/m2/org/other/keep.jar`)).toBe(true);
	});

	it("copies artifacts that exist", async () => {
		temp.write("build/a/out.zip", "zip");
		const targets = config([mavenTarget("a", [], { artifacts: ["build/a/out.zip", "build/a/absent.zip"] })]);
		const sink = createRecordingSink();
		await Effect.runPromise(
			build(
				createRecordingRunner().runner,
				request({ copyArtifactsTo: `${temp.root}/dist` }, targets, ["a"]),
				new Logger("normal", sink),
			),
		);

		expect(sink.outLines).toEqual(["🔍 Building a", "✅ Built a", `Copied artifact to ${temp.root}/dist/out.zip`]);
		expect(temp.read("dist/out.zip")).toBe("zip");
	});

	it("does not copy artifacts of a skipped target", async () => {
		temp.write("g/out.zip", "stale");
		const targets = config([
			mavenTarget("g", [], {
				tool: "gradle",
				descriptor: "g/build.gradle",
				expensive: true,
				artifacts: ["g/out.zip"],
			}),
		]);
		const sink = createRecordingSink();
		const summary = await Effect.runPromise(
			build(
				createRecordingRunner().runner,
				request({ skipExpensive: true, clean: false, copyArtifactsTo: `${temp.root}/dist` }, targets, ["g"]),
				new Logger("normal", sink),
			),
		);

		expect(summary).toEqual({ built: [], skipped: ["g"] });
		expect(sink.outLines).toEqual([]);
		expect(fs.existsSync(`${temp.root}/dist/out.zip`)).toBe(false);
	});
});
