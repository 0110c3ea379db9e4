import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { BOOTSTRAP_MACHINE, nextBootstrapState } from "../../../src/core/workflow/bootstrap.js";
import { advance, isTerminal, startMachine, transitionsFrom } from "../../../src/core/workflow/machine.js";
import { nextReleaseState, RELEASE_MACHINE } from "../../../src/core/workflow/release.js";

describe("release machine", () => {
	it("walks the happy path in order", () => {
		const visited: string[] = [];
		let state = nextReleaseState("Start");
		while (state !== null) {
			visited.push(state);
			state = nextReleaseState(state);
		}
		expect(visited).toEqual([
			"PrepareReleaseBranch",
			"VersionBumpRelease",
			"BuildReleaseBranch",
			"TagRelease",
			"MergeBackToDevelop",
			"VersionBumpDevelop",
			"Push",
			"Done",
		]);
	});

	it("allows the next state or abort from every non-terminal state", () => {
		expect(transitionsFrom(RELEASE_MACHINE, "TagRelease")).toEqual(["MergeBackToDevelop", "Aborted"]);
	});

	it("has no transitions out of Done or Aborted", () => {
		expect(isTerminal(RELEASE_MACHINE, "Done")).toBe(true);
		expect(isTerminal(RELEASE_MACHINE, "Aborted")).toBe(true);
		expect(isTerminal(RELEASE_MACHINE, "Start")).toBe(false);
	});
});

describe("advance", () => {
	it("records the history of a legal move", () => {
		const start = startMachine(BOOTSTRAP_MACHINE);
		const moved = Effect.runSync(advance(BOOTSTRAP_MACHINE, start, "ValidateBaseline"));
		expect(moved).toEqual({ state: "ValidateBaseline", history: ["Start", "ValidateBaseline"] });
	});

	it("rejects skipping a state", () => {
		const result = Effect.runSync(Effect.either(advance(BOOTSTRAP_MACHINE, startMachine(BOOTSTRAP_MACHINE), "Build")));
		expect(Either.isLeft(result) && result.left.detail).toBe("Illegal transition Start -> Build");
		expect(Either.isLeft(result) && result.left.where).toBe("bootstrap workflow");
	});

	it("rejects leaving a terminal state", () => {
		const aborted = { state: "Aborted" as const, history: ["Start" as const, "Aborted" as const] };
		const result = Effect.runSync(Effect.either(advance(BOOTSTRAP_MACHINE, aborted, "ValidateBaseline")));
		expect(Either.isLeft(result)).toBe(true);
	});

	it("ends the bootstrap sequence in Done", () => {
		expect(nextBootstrapState("UpdateBaselineReferences")).toBe("Done");
		expect(nextBootstrapState("Done")).toBeNull();
	});
});
