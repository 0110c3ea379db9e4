// Build domain model: targets, backends, profiles and planned invocations
// PURITY: CORE
// INVARIANT: BuildProfile is constructed once per invocation and never mutated

/**
 * How a target is realised. Closed variant, matched exhaustively.
 *
 * - `tool`: a Maven or Gradle build driven by a descriptor file
 * - `bootstrap-script`: a self-hosting toolchain; runs `script` in bootstrap
 *   mode, otherwise builds `descriptor` (source) or `prebuiltDescriptor`
 * - `source-build`: an arbitrary command run in `directory`
 */
export type BuildBackend =
	| {
			readonly kind: "tool";
			readonly tool: "maven" | "gradle";
			readonly descriptor: string;
			readonly expensive: boolean;
			readonly artifacts: readonly string[];
	  }
	| {
			readonly kind: "bootstrap-script";
			readonly directory: string;
			readonly script: string;
			readonly descriptor: string;
			readonly prebuiltDescriptor: string | null;
			readonly artifacts: readonly string[];
	  }
	| {
			readonly kind: "source-build";
			readonly directory: string;
			readonly command: readonly string[];
			readonly artifacts: readonly string[];
	  };

/**
 * A named, independently buildable component.
 *
 * Paths inside `backend` are relative to the fleet root.
 */
export interface BuildTarget {
	readonly name: string;
	readonly dependencies: readonly string[];
	readonly backend: BuildBackend;
}

/**
 * Parsed targets configuration.
 *
 * @invariant targets order is the declaration order used as topological tie-break
 */
export interface TargetsConfig {
	readonly targets: readonly BuildTarget[];
	readonly releaseTargets: readonly string[];
	readonly bootstrapTargets: readonly string[];
	readonly localRepositoryGroups: readonly string[];
}

export type BootstrapMode = "prebuilt" | "source" | "bootstrap";

export type Verbosity = "quiet" | "normal" | "debug";

export interface MavenSettings {
	readonly settingsFile: string | null;
	readonly globalSettingsFile: string | null;
	readonly localRepository: string | null;
	readonly cleanLocalRepository: boolean;
	readonly offline: boolean;
}

export interface JvmSettings {
	readonly stack: string;
	readonly minHeap: string;
	readonly maxHeap: string;
}

/**
 * Configuration threaded through a whole build run.
 */
export interface BuildProfile {
	readonly qualifier: string | null;
	readonly deploy: boolean;
	readonly release: boolean;
	readonly skipTests: boolean;
	readonly skipExpensive: boolean;
	readonly clean: boolean;
	readonly generateJavaDoc: boolean;
	readonly buildDependencies: boolean;
	readonly bootstrapMode: BootstrapMode;
	readonly testBootstrap: boolean;
	readonly copyArtifactsTo: string | null;
	readonly maven: MavenSettings;
	readonly gradle: { readonly noNative: boolean };
	readonly jvm: JvmSettings;
	readonly verbosity: Verbosity;
}

/**
 * A fully resolved external process call.
 */
export interface Invocation {
	readonly backend: "maven" | "gradle" | "script";
	readonly command: string;
	readonly args: readonly string[];
	readonly cwd: string;
	readonly env: Readonly<Record<string, string>>;
}

export type BuildStep =
	| {
			readonly _tag: "Run";
			readonly target: string;
			readonly invocation: Invocation;
	  }
	| { readonly _tag: "Skip"; readonly target: string; readonly reason: string };

/**
 * A version string found in a target's build descriptor.
 */
export interface DeclaredVersion {
	readonly target: string;
	readonly file: string;
	readonly element: string;
	readonly version: string;
}
