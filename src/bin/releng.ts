#!/usr/bin/env node

// Thin CLI shell wrapper - single point of process.exit
// FORMAT THEOREM: ∀run ∈ App: returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE

import { main } from "../main.js";

/**
 * CLI entry point for releng.
 *
 * @remarks
 * - @invariant exit code is 0 on success, 1 on abort, validation or backend failure
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await main();
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
