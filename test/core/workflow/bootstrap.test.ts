import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import type { BootstrapInputs } from "../../../src/core/types/index.js";
import { nextBaselineVersion, validateBootstrapInputs } from "../../../src/core/workflow/bootstrap.js";

const inputs: BootstrapInputs = {
	currentVersion: "2.6.0-SNAPSHOT",
	currentBaselineVersion: "2.6.0-baseline1",
	nextBaselineVersion: null,
};

const validate = (overrides: Partial<BootstrapInputs>) =>
	Effect.runSync(Effect.either(validateBootstrapInputs({ ...inputs, ...overrides })));

describe("nextBaselineVersion", () => {
	it("increments the trailing number", () => {
		expect(nextBaselineVersion("2.1.0-baseline1")).toBe("2.1.0-baseline2");
		expect(nextBaselineVersion("2.1.0-baseline9")).toBe("2.1.0-baseline10");
	});

	it("keeps zero padding", () => {
		expect(nextBaselineVersion("1.0.0-b007")).toBe("1.0.0-b008");
	});

	it("returns null without a trailing number", () => {
		expect(nextBaselineVersion("2.1.0-baseline")).toBeNull();
	});
});

describe("validateBootstrapInputs", () => {
	it("derives the next baseline", () => {
		const result = validate({});
		expect(Either.isRight(result) && result.right.nextBaselineVersion).toBe("2.6.0-baseline2");
	});

	it("requires the current version", () => {
		const result = validate({ currentVersion: "" });
		expect(Either.isLeft(result) && result.left.detail).toBe("Missing bootstrap parameter: current version");
	});

	it("asks for an explicit next baseline when none can be derived", () => {
		const result = validate({ currentBaselineVersion: "2.6.0-baseline" });
		expect(Either.isLeft(result) && result.left.detail).toBe(
			"Cannot derive the next baseline version from '2.6.0-baseline'; pass --next-base-ver",
		);
	});

	it("rejects snapshot baselines", () => {
		const result = validate({ nextBaselineVersion: "2.6.0-SNAPSHOT" });
		expect(Either.isLeft(result) && result.left.detail).toBe("Baseline version '2.6.0-SNAPSHOT' is a snapshot version");
	});

	it("requires three distinct versions", () => {
		const result = validate({ nextBaselineVersion: "2.6.0-baseline1" });
		expect(Either.isLeft(result) && result.left.reason).toBe("precondition");
		expect(Either.isLeft(result) && result.left.detail).toBe(
			"Current version, current baseline and next baseline must be distinct (2.6.0-SNAPSHOT, 2.6.0-baseline1, 2.6.0-baseline1)",
		);
	});
});
