// Build process runner: streams output, keeps a bounded tail for diagnostics
// PURITY: SHELL
// EFFECT: spawns the invocation's command
// INVARIANT: Exit code 0 succeeds; anything else fails with the captured tail as diagnostic

import { Effect } from "effect";

import { BackendError } from "../../core/errors.js";
import { renderInvocation } from "../../core/build/invocation.js";
import type { Invocation } from "../../core/types/index.js";
import { spawn } from "../utils/node-mods.js";

export const DIAGNOSTIC_TAIL_BYTES = 64 * 1024;

/**
 * Port to whatever executes build invocations. Tests record instead of running.
 */
export interface ProcessRunner {
	readonly run: (
		invocation: Invocation,
		onOutput: (chunk: string) => void,
	) => Effect.Effect<void, BackendError>;
}

/**
 * Keeps only the last `limit` characters appended.
 */
export class OutputTail {
	private buffer = "";

	constructor(private readonly limit: number = DIAGNOSTIC_TAIL_BYTES) {}

	append(chunk: string): void {
		const joined = this.buffer + chunk;
		this.buffer = joined.length > this.limit ? joined.slice(joined.length - this.limit) : joined;
	}

	toString(): string {
		return this.buffer;
	}
}

/**
 * ProcessRunner backed by child_process.spawn.
 *
 * @pure false
 */
export const nodeProcessRunner: ProcessRunner = {
	run: (invocation, onOutput) =>
		Effect.async<void, BackendError>((resume) => {
			const tail = new OutputTail();
			let settled = false;
			const settle = (result: Effect.Effect<void, BackendError>): void => {
				if (settled) return;
				settled = true;
				resume(result);
			};
			const fail = (diagnostic: string): void => {
				settle(
					Effect.fail(
						new BackendError({
							backend: invocation.backend,
							command: renderInvocation(invocation),
							diagnostic,
							location: invocation.cwd,
						}),
					),
				);
			};
			const child = spawn(invocation.command, [...invocation.args], {
				cwd: invocation.cwd,
				env: { ...process.env, ...invocation.env },
				stdio: ["ignore", "pipe", "pipe"],
			});
			const collect = (data: Buffer): void => {
				const chunk = data.toString("utf8");
				tail.append(chunk);
				onOutput(chunk);
			};
			child.stdout.on("data", collect);
			child.stderr.on("data", collect);
			child.on("error", (error) => {
				fail(error.message);
			});
			child.on("close", (code, signal) => {
				if (code === 0) {
					settle(Effect.void);
					return;
				}
				const status = signal === null ? `exit code ${String(code)}` : `signal ${signal}`;
				const output = tail.toString();
				fail(output.trim().length > 0 ? output : `Process ended with ${status}`);
			});
			return Effect.sync(() => {
				child.kill();
			});
		}),
};
