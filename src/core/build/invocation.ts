// Translation of a BuildProfile into concrete backend invocations
// PURITY: CORE
// INVARIANT: planInvocation is total over BuildBackend (exhaustive match)
// COMPLEXITY: O(1) per target

import * as path from "node:path";

import { match } from "ts-pattern";

import type {
	BuildBackend,
	BuildProfile,
	BuildStep,
	BuildTarget,
	Invocation,
} from "../types/index.js";

export interface PlanContext {
	readonly fleetRoot: string;
}

/**
 * `-Xss.. -Xms.. -Xmx..` for MAVEN_OPTS / GRADLE_OPTS.
 *
 * @pure true
 */
export const jvmOptions = (profile: BuildProfile): string =>
	`-Xss${profile.jvm.stack} -Xms${profile.jvm.minHeap} -Xmx${profile.jvm.maxHeap}`;

/**
 * The profile serialised as environment variables for scripts and commands.
 *
 * @pure true
 */
export function profileEnvironment(
	profile: BuildProfile,
): Readonly<Record<string, string>> {
	const flag = (value: boolean): string => (value ? "true" : "false");
	const env: Record<string, string> = {
		RELENG_DEPLOY: flag(profile.deploy),
		RELENG_RELEASE: flag(profile.release),
		RELENG_SKIP_TESTS: flag(profile.skipTests),
		RELENG_SKIP_EXPENSIVE: flag(profile.skipExpensive),
		RELENG_CLEAN: flag(profile.clean),
		RELENG_OFFLINE: flag(profile.maven.offline),
		RELENG_VERBOSITY: profile.verbosity,
		RELENG_JVM_OPTS: jvmOptions(profile),
	};
	if (profile.qualifier !== null) env["RELENG_QUALIFIER"] = profile.qualifier;
	return env;
}

/**
 * Maven command line for one descriptor.
 *
 * @pure true
 *
 * @example
 * ```ts
 * mavenArgs("/fleet/build/java/pom.xml", profile, false);
 * // ["-f", "/fleet/build/java/pom.xml", "clean", "install", "-DforceContextQualifier=..."]
 * ```
 */
export function mavenArgs(
	descriptor: string,
	profile: BuildProfile,
	expensive: boolean,
): readonly string[] {
	const args: string[] = ["-f", descriptor];
	if (profile.clean) args.push("clean");
	args.push(profile.deploy ? "deploy" : "install");
	if (profile.qualifier !== null) {
		args.push(`-DforceContextQualifier=${profile.qualifier}`);
	}
	if (profile.skipTests) args.push("-DskipTests", "-Dmaven.test.skip=true");
	if (expensive && profile.skipExpensive) args.push("-Dskip-expensive=true");
	if (profile.release) args.push("-Drelease=true");
	if (profile.generateJavaDoc) args.push("-Dgenerate-javadoc=true");
	if (profile.maven.offline) args.push("--offline");
	args.push(
		...match(profile.verbosity)
			.with("debug", () => ["--debug", "--errors"])
			.with("quiet", () => ["--quiet"])
			.with("normal", (): string[] => [])
			.exhaustive(),
	);
	if (profile.maven.settingsFile !== null) {
		args.push("-s", profile.maven.settingsFile);
	}
	if (profile.maven.globalSettingsFile !== null) {
		args.push("-gs", profile.maven.globalSettingsFile);
	}
	if (profile.maven.localRepository !== null) {
		args.push(`-Dmaven.repo.local=${profile.maven.localRepository}`);
	}
	return args;
}

/**
 * Gradle wrapper command line.
 *
 * @pure true
 */
export function gradleArgs(profile: BuildProfile): readonly string[] {
	const args: string[] = ["--no-daemon"];
	if (profile.clean) args.push("clean");
	args.push("build");
	if (profile.deploy) args.push("publish");
	if (profile.qualifier !== null) args.push(`-Pqualifier=${profile.qualifier}`);
	if (profile.skipTests) args.push("-x", "test");
	if (profile.maven.offline) args.push("--offline");
	if (profile.gradle.noNative) args.push("-Dorg.gradle.native=false");
	args.push(
		...match(profile.verbosity)
			.with("debug", () => ["--debug"])
			.with("quiet", () => ["--quiet"])
			.with("normal", (): string[] => [])
			.exhaustive(),
	);
	return args;
}

function mavenInvocation(
	descriptor: string,
	profile: BuildProfile,
	expensive: boolean,
	context: PlanContext,
): Invocation {
	return {
		backend: "maven",
		command: "mvn",
		args: mavenArgs(path.join(context.fleetRoot, descriptor), profile, expensive),
		cwd: context.fleetRoot,
		env: { MAVEN_OPTS: jvmOptions(profile) },
	};
}

function run(target: string, invocation: Invocation): BuildStep {
	return { _tag: "Run", target, invocation };
}

function planBackend(
	name: string,
	backend: BuildBackend,
	profile: BuildProfile,
	context: PlanContext,
): BuildStep {
	return match(backend)
		.with({ kind: "tool", tool: "maven" }, (tool) =>
			run(name, mavenInvocation(tool.descriptor, profile, tool.expensive, context)),
		)
		.with({ kind: "tool", tool: "gradle" }, (tool): BuildStep => {
			if (tool.expensive && profile.skipExpensive) {
				return { _tag: "Skip", target: name, reason: "expensive build step skipped" };
			}
			return run(name, {
				backend: "gradle",
				command: "./gradlew",
				args: gradleArgs(profile),
				cwd: path.dirname(path.join(context.fleetRoot, tool.descriptor)),
				env: { GRADLE_OPTS: jvmOptions(profile) },
			});
		})
		.with({ kind: "bootstrap-script" }, (script): BuildStep =>
			match(profile.bootstrapMode)
				.with("bootstrap", () =>
					run(name, {
						backend: "script",
						command: script.script,
						args: [],
						cwd: path.join(context.fleetRoot, script.directory),
						env: {
							...profileEnvironment(profile),
							RELENG_TEST_BOOTSTRAP: profile.testBootstrap ? "true" : "false",
						},
					}),
				)
				.with("source", () =>
					run(
						name,
						mavenInvocation(
							script.descriptor,
							{ ...profile, skipTests: profile.skipTests || !profile.testBootstrap },
							false,
							context,
						),
					),
				)
				.with("prebuilt", (): BuildStep =>
					script.prebuiltDescriptor === null
						? { _tag: "Skip", target: name, reason: "no prebuilt descriptor configured" }
						: run(name, mavenInvocation(script.prebuiltDescriptor, profile, false, context)),
				)
				.exhaustive(),
		)
		.with({ kind: "source-build" }, (source) => {
			const [command, ...args] = source.command;
			return run(name, {
				backend: "script",
				command: command ?? "true",
				args,
				cwd: path.join(context.fleetRoot, source.directory),
				env: profileEnvironment(profile),
			});
		})
		.exhaustive();
}

/**
 * Decides what running one target means under a profile.
 *
 * @pure true
 * @invariant Result target === target.name
 */
export function planInvocation(
	target: BuildTarget,
	profile: BuildProfile,
	context: PlanContext,
): BuildStep {
	return planBackend(target.name, target.backend, profile, context);
}

/**
 * Human readable command line, used in logs and BackendError.command.
 *
 * @pure true
 */
export function renderInvocation(invocation: Invocation): string {
	return [invocation.command, ...invocation.args].join(" ");
}
