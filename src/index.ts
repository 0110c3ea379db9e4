// Public API for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: Exports are APP entry points, CORE functions and types, and the shell ports' default implementations

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runs the CLI programmatically.
 *
 * @example
 * ```typescript
 * import { main } from "fleet-releng";
 *
 * const exitCode = await main(["-r", "/work/fleet", "qualifier"]);
 * ```
 */
export { main } from "./main.js";
export type { AppContext } from "./app/context.js";
export { executeCommand, runCommand } from "./app/runCommand.js";
export { runBootstrap } from "./app/bootstrap.js";
export { runRelease } from "./app/release.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type { CommandOutcome, ExitCode } from "./core/models.js";
export type {
	BuildProfile,
	BuildTarget,
	ChangeSet,
	CLIOptions,
	Command,
	Confirmer,
	Fleet,
	FleetOperation,
	FleetReport,
	GitBackend,
	Repository,
	RepositoryOutcome,
	TargetsConfig,
	VersionChange,
	VersionRewriteSpec,
	WorkflowResult,
} from "./core/types/index.js";
export {
	BackendError,
	FleetOperationFailed,
	FSError,
	InvariantViolation,
	StateMismatchError,
	ValidationError,
} from "./core/errors.js";
export type { AppError } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode } from "./core/decision.js";
export { makeQualifier, formatQualifierTimestamp } from "./core/qualifier.js";
export { planBuildOrder, orderTargets, resolveTargets, validateGraph } from "./core/build/graph.js";
export { planInvocation } from "./core/build/invocation.js";
export { confirmationLevel, FleetOperations } from "./core/fleet/operations.js";
export { convertRemoteUrl } from "./core/fleet/remote.js";
export { toEclipseVersion } from "./core/versions/eclipse.js";
export { formatChangeSet } from "./core/versions/dialects.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

export { loadFleet } from "./shell/fleet/discover.js";
export { applyFleet } from "./shell/fleet/operator.js";
export { computeNowQualifier, computeQualifier, hasChanged } from "./shell/qualifier/qualifier.js";
export { rewriteVersions } from "./shell/versions/rewriter.js";
export { build } from "./shell/build/orchestrator.js";
export { createNodeGit } from "./shell/git/node-git.js";
export { nodeProcessRunner, type ProcessRunner } from "./shell/build/runner.js";
export { Logger } from "./shell/output/logger.js";
