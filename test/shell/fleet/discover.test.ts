import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { displayName, fleetRepositories, loadFleet } from "../../../src/shell/fleet/discover.js";
import { Logger } from "../../../src/shell/output/logger.js";
import { createFakeGit } from "../../utils/fake-git.js";
import { createRecordingSink } from "../../utils/fakes.js";

const seedFleet = () =>
	createFakeGit({
		"/fleet": {
			branch: "develop",
			submodules: [
				{ name: "core", path: "core", url: null, branch: "." },
				{ name: "missing", path: "missing", url: null, branch: null },
				{ name: "language", path: "lang", url: null, branch: "develop" },
			],
		},
		"/fleet/core": {
			submodules: [{ name: "sub", path: "sub", url: null, branch: null }],
		},
		"/fleet/core/sub": {},
		"/fleet/lang": {},
	});

describe("loadFleet", () => {
	it("walks checked-out submodules depth-first", async () => {
		const sink = createRecordingSink();
		const fleet = await Effect.runPromise(loadFleet(seedFleet().git, "/fleet", new Logger("normal", sink)));

		expect(fleet.root).toEqual({
			path: "/fleet",
			relativePath: "",
			name: "fleet",
			trackedBranch: "develop",
			depth: 0,
			parentPath: null,
		});
		expect(fleet.members).toEqual([
			{
				path: "/fleet/core",
				relativePath: "core",
				name: "core",
				trackedBranch: "develop",
				depth: 1,
				parentPath: "/fleet",
			},
			{
				path: "/fleet/core/sub",
				relativePath: "core/sub",
				name: "sub",
				trackedBranch: "master",
				depth: 2,
				parentPath: "/fleet/core",
			},
			{
				path: "/fleet/lang",
				relativePath: "lang",
				name: "language",
				trackedBranch: "develop",
				depth: 1,
				parentPath: "/fleet",
			},
		]);
		expect(sink.errLines).toEqual(["⚠️ Skipping submodule 'missing': not checked out at /fleet/missing"]);
	});

	it("starts from the innermost repository containing the directory", async () => {
		const fleet = await Effect.runPromise(loadFleet(seedFleet().git, "/fleet/core/src/main"));
		expect(fleet.root.path).toBe("/fleet/core");
		expect(fleet.root.trackedBranch).toBe("master");
		expect(fleet.members.map((member) => member.relativePath)).toEqual(["sub"]);
	});

	it("resolves a directory inside the root's own tree to the root", async () => {
		const fleet = await Effect.runPromise(loadFleet(seedFleet().git, "/fleet/build/java"));
		expect(fleet.root.path).toBe("/fleet");
	});

	it("treats a detached root as master", async () => {
		const fake = createFakeGit({ "/solo": { branch: null } });
		const fleet = await Effect.runPromise(loadFleet(fake.git, "/solo"));
		expect(fleet.root.trackedBranch).toBe("master");
		expect(fleet.members).toEqual([]);
	});

	it("fails outside a repository", async () => {
		const fake = createFakeGit({ "/fleet": {} });
		const result = await Effect.runPromise(Effect.either(loadFleet(fake.git, "/elsewhere")));
		expect(Either.isLeft(result) && result.left.diagnostic).toBe(
			"fatal: not a git repository (or any of the parent directories): .git",
		);
	});
});

describe("fleetRepositories / displayName", () => {
	it("lists the root first and names it by directory", async () => {
		const fleet = await Effect.runPromise(loadFleet(seedFleet().git, "/fleet"));
		expect(fleetRepositories(fleet).map((repository) => repository.path)).toEqual([
			"/fleet",
			"/fleet/core",
			"/fleet/core/sub",
			"/fleet/lang",
		]);
		expect(displayName(fleet, "/fleet")).toBe("fleet");
		expect(displayName(fleet, "/fleet/core/sub")).toBe("core/sub");
	});
});
