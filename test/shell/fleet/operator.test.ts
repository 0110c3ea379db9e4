import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { FleetOperations } from "../../../src/core/fleet/operations.js";
import type { FleetReport, RepositoryOutcome } from "../../../src/core/types/index.js";
import { applyFleet } from "../../../src/shell/fleet/operator.js";
import { flatFleet } from "../../utils/builders.js";
import { createFakeGit, type FakeRepoSeed } from "../../utils/fake-git.js";

const seeds = (overrides: Readonly<Record<string, FakeRepoSeed>> = {}): Record<string, FakeRepoSeed> => ({
	"/fleet": {},
	"/fleet/a": {},
	"/fleet/b": {},
	"/fleet/c": {},
	...overrides,
});

const details = (report: FleetReport): Record<string, string> =>
	Object.fromEntries(
		[...report.entries()].map(([repo, outcome]: [string, RepositoryOutcome]) => [
			repo,
			outcome._tag === "Applied" ? outcome.detail : `FAILED ${outcome.error.diagnostic}`,
		]),
	);

describe("applyFleet", () => {
	it("keeps going after a repository fails", async () => {
		const fake = createFakeGit(seeds());
		fake.fail("push", "/fleet/b", "rejected: non-fast-forward");
		const report = await Effect.runPromise(
			applyFleet(fake.git, flatFleet("/fleet", ["a", "b", "c"]), FleetOperations.push(false)),
		);

		expect(details(report)).toEqual({
			"/fleet/a": "pushed master",
			"/fleet/b": "FAILED rejected: non-fast-forward",
			"/fleet/c": "pushed master",
		});
		expect(fake.calls).toEqual([
			"push /fleet/a origin master",
			"push /fleet/b origin master",
			"push /fleet/c origin master",
		]);
		const failed = report.get("/fleet/b");
		expect(failed?._tag === "Failed" && failed.error.command).toBe("push /fleet/b origin master");
	});

	it("refuses to push a detached HEAD", async () => {
		const fake = createFakeGit(seeds({ "/fleet/a": { branch: null } }));
		const report = await Effect.runPromise(
			applyFleet(fake.git, flatFleet("/fleet", ["a"]), FleetOperations.push(true)),
		);
		expect(details(report)).toEqual({ "/fleet/a": "FAILED HEAD is detached; there is no branch to push" });
		expect(fake.calls).toEqual([]);
	});

	it("updates by fetch, checkout and fast-forward", async () => {
		const fake = createFakeGit(seeds());
		const report = await Effect.runPromise(
			applyFleet(fake.git, flatFleet("/fleet", ["a"], "develop"), FleetOperations.update(2)),
		);
		expect(details(report)).toEqual({ "/fleet/a": "updated develop" });
		expect(fake.calls).toEqual([
			"fetch /fleet/a origin develop --depth 2",
			"checkout /fleet/a develop",
			"merge /fleet/a origin/develop --ff-only",
		]);
	});

	it("converts remotes and leaves converted ones alone", async () => {
		const fake = createFakeGit(
			seeds({
				"/fleet/b": { remote: "git@example.org:fleet/b.git" },
				"/fleet/c": { remote: "/srv/mirror/c" },
			}),
		);
		const report = await Effect.runPromise(
			applyFleet(fake.git, flatFleet("/fleet", ["a", "b", "c"]), FleetOperations.setRemote("ssh")),
		);
		expect(details(report)).toEqual({
			"/fleet/a": "origin set to git@example.org:fleet/repo.git",
			"/fleet/b": "origin already uses ssh: git@example.org:fleet/b.git",
			"/fleet/c": "FAILED Cannot convert remote URL '/srv/mirror/c' to ssh",
		});
		expect(fake.calls).toEqual(["set-url /fleet/a origin git@example.org:fleet/repo.git"]);
	});

	it("includes the root first when asked", async () => {
		const fake = createFakeGit(seeds());
		const report = await Effect.runPromise(
			applyFleet(fake.git, flatFleet("/fleet", ["a", "b"]), FleetOperations.tag("v1", null), {
				includeRoot: true,
			}),
		);
		expect([...report.keys()]).toEqual(["/fleet", "/fleet/a", "/fleet/b"]);
		expect(fake.calls).toEqual(["tag /fleet v1 v1", "tag /fleet/a v1 v1", "tag /fleet/b v1 v1"]);
	});

	it("resets to the remote tracked branch", async () => {
		const fake = createFakeGit(seeds());
		await Effect.runPromise(
			applyFleet(fake.git, flatFleet("/fleet", ["a"], "develop"), FleetOperations.reset(true)),
		);
		expect(fake.calls).toEqual(["reset /fleet/a --hard origin/develop"]);
	});
});
