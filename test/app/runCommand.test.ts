import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { runCommand } from "../../src/app/runCommand.js";
import type { CLIOptions, Command } from "../../src/core/types/index.js";
import { profile } from "../utils/builders.js";
import { createFakeGit, type FakeGit } from "../utils/fake-git.js";
import { createTestContext, type TestContext } from "../utils/fakes.js";
import { createTempFleet, type TempFleet } from "../utils/temp-fleet.js";

const options = (command: Command, repoDirectory = "/fleet"): CLIOptions => ({
	repoDirectory,
	verbosity: "normal",
	command,
});

const fleetGit = (): FakeGit =>
	createFakeGit({
		"/fleet": {
			submodules: [
				{ name: "a", path: "a", url: null, branch: null },
				{ name: "b", path: "b", url: null, branch: null },
			],
		},
		"/fleet/a": {},
		"/fleet/b": {},
	});

const run = (test: TestContext, command: Command, repoDirectory?: string) =>
	Effect.runPromise(runCommand(options(command, repoDirectory), test.context));

describe("runCommand: fleet operations", () => {
	it("updates every member and exits 0", async () => {
		const fake = fleetGit();
		const test = createTestContext(fake);
		expect(await run(test, { _tag: "Update", depth: null })).toBe(0);
		expect(fake.calls).toEqual([
			"fetch /fleet/a origin master",
			"checkout /fleet/a master",
			"merge /fleet/a origin/master --ff-only",
			"fetch /fleet/b origin master",
			"checkout /fleet/b master",
			"merge /fleet/b origin/master --ff-only",
		]);
		expect(test.sink.outLines).toEqual([
			"🔍 update (2 repositories)",
			"✅ a: updated master\n✅ b: updated master\n2 applied, 0 failed",
		]);
	});

	it("exits 1 when any repository fails", async () => {
		const fake = fleetGit();
		fake.fail("push", "/fleet/a", "rejected");
		const test = createTestContext(fake);
		expect(await run(test, { _tag: "Push", yes: true })).toBe(1);
		expect(fake.calls).toEqual(["push /fleet/a origin master", "push /fleet/b origin master"]);
		expect(test.sink.outLines[1]).toBe("❌ a: rejected\n✅ b: pushed master\n1 applied, 1 failed");
	});

	it("does nothing when a confirmation is declined", async () => {
		const fake = fleetGit();
		const test = createTestContext(fake, { answers: [false] });
		expect(await run(test, { _tag: "Reset", toRemote: true, yes: false })).toBe(1);
		expect(fake.calls).toEqual([]);
		expect(test.confirmer.requests.map((request) => request.level)).toEqual(["thrice"]);
		expect(test.sink.errLines).toEqual(["⚠️ Aborted: reset to remote branch"]);
	});

	it("skips confirmation with yes", async () => {
		const fake = fleetGit();
		const test = createTestContext(fake, { answers: [false] });
		expect(await run(test, { _tag: "Clean", yes: true })).toBe(0);
		expect(test.confirmer.requests).toEqual([]);
		expect(fake.calls).toEqual(["clean /fleet/a", "clean /fleet/b"]);
	});

	it("runs clean-update as a sequence after one confirmation", async () => {
		const fake = fleetGit();
		const test = createTestContext(fake);
		expect(await run(test, { _tag: "CleanUpdate", yes: false, depth: 1 })).toBe(0);
		expect(test.confirmer.requests.map((request) => request.level)).toEqual(["thrice"]);
		expect(fake.calls.slice(0, 8)).toEqual([
			"checkout /fleet/a master",
			"checkout /fleet/b master",
			"reset /fleet/a --hard origin/master",
			"reset /fleet/b --hard origin/master",
			"checkout /fleet/a master",
			"checkout /fleet/b master",
			"clean /fleet/a",
			"clean /fleet/b",
		]);
		expect(fake.calls).toHaveLength(14);
	});

	it("stops clean-update at the first failing step", async () => {
		const fake = fleetGit();
		fake.fail("reset", "/fleet/b", "fatal: ambiguous argument 'origin/master'");
		const test = createTestContext(fake);
		expect(await run(test, { _tag: "CleanUpdate", yes: true, depth: null })).toBe(1);
		expect(fake.calls).toEqual([
			"checkout /fleet/a master",
			"checkout /fleet/b master",
			"reset /fleet/a --hard origin/master",
			"reset /fleet/b --hard origin/master",
		]);
	});
});

describe("runCommand: errors", () => {
	it("reports a directory outside any repository", async () => {
		const test = createTestContext(fleetGit());
		expect(await run(test, { _tag: "Track" }, "/nowhere")).toBe(1);
		expect(test.sink.errLines).toEqual([
			"❌ git failed in /nowhere: git rev-parse --show-toplevel\nfatal: not a git repository (or any of the parent directories): .git",
		]);
	});

	it("reports a release that fails validation", async () => {
		const test = createTestContext(fleetGit());
		const code = await run(test, {
			_tag: "Release",
			inputs: {
				releaseBranch: "master",
				developBranch: "develop",
				currentDevelopVersion: "1.0.0-SNAPSHOT",
				nextReleaseVersion: "1.0.0-SNAPSHOT",
				nextDevelopVersion: "1.0.1-SNAPSHOT",
				tagName: null,
			},
			targetsFile: null,
		});
		expect(code).toBe(1);
		expect(test.sink.errLines).toEqual([
			"❌ Release failed in state Start: Validation failed (precondition): Release version '1.0.0-SNAPSHOT' is a snapshot version",
		]);
	});
});

describe("runCommand: qualifier and build", () => {
	it("prints the qualifier", async () => {
		const test = createTestContext(fleetGit());
		expect(await run(test, { _tag: "Qualifier", now: false, branch: null })).toBe(0);
		expect(test.sink.outLines).toEqual(["20240101-000000-master"]);
	});

	it("lists the components when none are given", async () => {
		const test = createTestContext(fleetGit());
		const code = await run(test, {
			_tag: "Build",
			options: { qualifier: null, nowQualifier: false, targetsFile: null, profile: profile() },
			components: [],
		});
		expect(code).toBe(1);
		expect(test.sink.outLines).toEqual([
			"No components specified, pass one or more of the following components to build:",
			"strategoxt, java, language, eclipse, intellij",
		]);
	});

	it("builds with an explicit qualifier", async () => {
		const test = createTestContext(fleetGit());
		const code = await run(test, {
			_tag: "Build",
			options: { qualifier: "Q1", nowQualifier: false, targetsFile: null, profile: profile() },
			components: ["java"],
		});
		expect(code).toBe(0);
		expect(test.runner.invocations.map((invocation) => invocation.args)).toEqual([
			["-f", "/fleet/strategoxt/strategoxt/buildpom.xml", "clean", "install", "-DforceContextQualifier=Q1"],
			["-f", "/fleet/build/java/pom.xml", "clean", "install", "-DforceContextQualifier=Q1"],
		]);
		expect(test.sink.outLines).toEqual([
			"Qualifier: Q1",
			"🔍 Building strategoxt",
			"✅ Built strategoxt",
			"🔍 Building java",
			"✅ Built java",
			"✅ Built 2 target(s)",
		]);
	});
});

describe("runCommand: files", () => {
	let temp: TempFleet;
	let fake: FakeGit;

	beforeEach(() => {
		temp = createTempFleet();
		temp.write("pom.xml", "<project>\n  <version>1.0.0-SNAPSHOT</version>\n</project>\n");
		fake = createFakeGit({ [temp.root]: {} });
	});

	afterEach(() => {
		temp.cleanup();
	});

	const setVersions = (dryRun: boolean): Command => ({
		_tag: "SetVersions",
		fromVersion: "1.0.0-SNAPSHOT",
		toVersion: "1.0.0",
		commit: false,
		dryRun,
		yes: false,
	});

	it("previews set-versions without asking", async () => {
		const test = createTestContext(fake, { answers: [false] });
		expect(await run(test, setVersions(true), temp.root)).toBe(0);
		expect(test.confirmer.requests).toEqual([]);
		expect(test.sink.outLines).toEqual([
			"pom.xml\n  2: - 1.0.0-SNAPSHOT\n  2: + 1.0.0",
			"Dry run: no files were written",
		]);
		expect(temp.read("pom.xml")).toContain("<version>1.0.0-SNAPSHOT</version>");
	});

	it("asks before writing versions", async () => {
		const test = createTestContext(fake, { answers: [false] });
		expect(await run(test, setVersions(false), temp.root)).toBe(1);
		expect(test.confirmer.requests[0]?.message).toBe(
			"This will set versions from 1.0.0-SNAPSHOT to 1.0.0 in every repository, do you want to continue?",
		);
		expect(temp.read("pom.xml")).toContain("<version>1.0.0-SNAPSHOT</version>");
	});

	it("exits 0 only while the qualifier changes", async () => {
		const first = createTestContext(fake);
		expect(await run(first, { _tag: "Changed", destination: ".qualifier", force: false }, temp.root)).toBe(0);
		expect(first.sink.outLines).toEqual(["20240101-000000-master"]);

		const second = createTestContext(fake);
		expect(await run(second, { _tag: "Changed", destination: ".qualifier", force: false }, temp.root)).toBe(1);
		expect(second.sink.outLines).toEqual([]);

		const forced = createTestContext(fake);
		expect(await run(forced, { _tag: "Changed", destination: ".qualifier", force: true }, temp.root)).toBe(0);
		expect(forced.sink.outLines).toEqual(["20240101-000000-master"]);
	});
});
