// Common exec error handling helper

import type { ExecError } from "./config.js";

/**
 * Picks the diagnostic text a failed process left behind.
 *
 * stderr wins over stdout; whitespace-only streams count as absent.
 *
 * @param error Error raised by child_process
 * @returns Captured output or null
 *
 * @pure true
 * @invariant result === null ∨ result.trim().length > 0
 */
export function extractOutputFromError(
	error: ExecError | { readonly stdout?: string; readonly stderr?: string },
): string | null {
	const { stderr, stdout } = error;
	if (stderr !== undefined && stderr.trim().length > 0) {
		return stderr;
	}
	if (stdout !== undefined && stdout.trim().length > 0) {
		return stdout;
	}
	return null;
}
