// CLI command model
// PURITY: CORE

import type { BuildProfile, Verbosity } from "./build.js";
import type { RemoteKind } from "./fleet.js";
import type { BootstrapInputs, ReleaseInputs } from "./workflow.js";

/**
 * Switches of the `build` command that are not part of the BuildProfile itself.
 *
 * @property qualifier Explicit qualifier (`-q`)
 * @property nowQualifier Stamp with the wall clock instead of the latest commit (`-n`)
 */
export interface BuildCommandOptions {
	readonly qualifier: string | null;
	readonly nowQualifier: boolean;
	readonly targetsFile: string | null;
	/** Profile without the qualifier, which is resolved against the fleet. */
	readonly profile: Omit<BuildProfile, "qualifier">;
}

export type Command =
	| { readonly _tag: "Update"; readonly depth: number | null }
	| { readonly _tag: "SetRemote"; readonly kind: RemoteKind }
	| {
			readonly _tag: "CleanUpdate";
			readonly yes: boolean;
			readonly depth: number | null;
	  }
	| { readonly _tag: "Track" }
	| { readonly _tag: "Merge"; readonly branch: string; readonly yes: boolean }
	| {
			readonly _tag: "Tag";
			readonly name: string;
			readonly description: string | null;
			readonly yes: boolean;
	  }
	| { readonly _tag: "Push"; readonly yes: boolean }
	| { readonly _tag: "Checkout"; readonly yes: boolean }
	| { readonly _tag: "Clean"; readonly yes: boolean }
	| { readonly _tag: "Reset"; readonly toRemote: boolean; readonly yes: boolean }
	| {
			readonly _tag: "SetVersions";
			readonly fromVersion: string;
			readonly toVersion: string;
			readonly commit: boolean;
			readonly dryRun: boolean;
			readonly yes: boolean;
	  }
	| {
			readonly _tag: "Build";
			readonly options: BuildCommandOptions;
			readonly components: readonly string[];
	  }
	| {
			readonly _tag: "Release";
			readonly inputs: ReleaseInputs;
			readonly targetsFile: string | null;
	  }
	| {
			readonly _tag: "Bootstrap";
			readonly inputs: BootstrapInputs;
			readonly targetsFile: string | null;
	  }
	| {
			readonly _tag: "Qualifier";
			readonly now: boolean;
			readonly branch: string | null;
	  }
	| {
			readonly _tag: "Changed";
			readonly destination: string;
			readonly force: boolean;
	  };

/**
 * Parsed command line.
 *
 * @property repoDirectory Directory of the fleet root (`-r/--repo`, default ".")
 */
export interface CLIOptions {
	readonly repoDirectory: string;
	readonly verbosity: Verbosity;
	readonly command: Command;
}

/**
 * Error of a spawned process with access to its captured output.
 */
export interface ExecError extends Error {
	readonly stdout?: string;
	readonly stderr?: string;
}
