// Process execution wrapped in Effect
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<string, BackendError, never>
// INVARIANT: ∀ call: stdout on exit code 0, BackendError carrying the tool's own output otherwise

import { Effect } from "effect";

import { BackendError, type BackendKind } from "../../core/errors.js";
import { extractOutputFromError } from "../../core/types/index.js";
import { execFile, promisify } from "./node-mods.js";

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 16 * 1024 * 1024;

export interface ExecRequest {
	readonly backend: BackendKind;
	readonly command: string;
	readonly args: readonly string[];
	readonly cwd: string;
	readonly env?: Readonly<Record<string, string>>;
}

/**
 * Runs a command without a shell and captures its stdout.
 *
 * @pure false
 * @effect Effect<string, BackendError>
 * @complexity O(n) where n = output size
 */
export function execCommand(request: ExecRequest): Effect.Effect<string, BackendError> {
	const rendered = [request.command, ...request.args].join(" ");
	return Effect.tryPromise({
		try: () =>
			execFileAsync(request.command, [...request.args], {
				cwd: request.cwd,
				env: request.env === undefined ? process.env : { ...process.env, ...request.env },
				maxBuffer: MAX_BUFFER,
			}),
		catch: (error) =>
			new BackendError({
				backend: request.backend,
				command: rendered,
				diagnostic:
					(error instanceof Error ? extractOutputFromError(error) : null) ??
					(error instanceof Error ? error.message : String(error)),
				location: request.cwd,
			}),
	}).pipe(Effect.map(({ stdout }) => String(stdout)));
}
