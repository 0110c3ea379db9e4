// Functional Core domain models (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable

/**
 * Exit code for the releng process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * How a command ended, independent of how it is reported.
 *
 * `Aborted` is a user decision at a confirmation gate, not an error, but it
 * still terminates with a non-zero status.
 */
export type CommandOutcome = "Succeeded" | "Aborted" | "Failed";
