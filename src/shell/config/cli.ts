// Command line parsing: global switches, then a command with its own switches
// PURITY: SHELL (pure over argv; kept beside the other configuration readers)
// INVARIANT: Every failure is a ValidationError raised before any command runs
// COMPLEXITY: O(n) where n = |argv|

import { Effect } from "effect";

import { DEFAULT_JVM } from "../../core/build/profile.js";
import { ValidationError } from "../../core/errors.js";
import type {
	BootstrapMode,
	BuildCommandOptions,
	CLIOptions,
	Command,
	Verbosity,
} from "../../core/types/index.js";

/**
 * One switch of a command. `name` is the long form without dashes and the key
 * the parsed value is stored under.
 */
interface SwitchSpec {
	readonly name: string;
	readonly short?: string;
	readonly value?: string;
	readonly help: string;
	readonly excludes?: readonly string[];
	readonly requires?: readonly string[];
}

interface ParsedSwitches {
	readonly values: ReadonlyMap<string, string | true>;
	readonly positionals: readonly string[];
}

interface CommandSpec {
	readonly summary: string;
	readonly switches: readonly SwitchSpec[];
	readonly positionals?: string;
	readonly build: (parsed: ParsedSwitches, verbosity: Verbosity) => Command | ValidationError;
}

export type ParsedArgs =
	| { readonly _tag: "Help"; readonly text: string }
	| { readonly _tag: "Run"; readonly options: CLIOptions };

const invalid = (detail: string): ValidationError =>
	new ValidationError({ reason: "invalid-argument", detail });

const missing = (command: string, name: string): ValidationError =>
	new ValidationError({
		reason: "missing-parameter",
		detail: `${command}: missing required switch --${name}`,
	});

const YES: SwitchSpec = { name: "yes", short: "y", help: "Answer yes to all confirmation prompts" };
const DEPTH: SwitchSpec = {
	name: "depth",
	short: "d",
	value: "N",
	help: "Fetch at most N commits of history",
};

const flag = (parsed: ParsedSwitches, name: string): boolean => parsed.values.has(name);

function text(parsed: ParsedSwitches, name: string): string | null {
	const value = parsed.values.get(name);
	return typeof value === "string" ? value : null;
}

function required(parsed: ParsedSwitches, command: string, name: string): string | ValidationError {
	return text(parsed, name) ?? missing(command, name);
}

function positiveInt(parsed: ParsedSwitches, name: string): number | null | ValidationError {
	const raw = text(parsed, name);
	if (raw === null) return null;
	const value = Number.parseInt(raw, 10);
	return Number.isInteger(value) && value > 0 && String(value) === raw
		? value
		: invalid(`--${name} expects a positive integer, got '${raw}'`);
}

const yesOnly =
	(tag: "Push" | "Checkout" | "Clean") =>
	(parsed: ParsedSwitches): Command => ({ _tag: tag, yes: flag(parsed, "yes") });

function buildOptions(parsed: ParsedSwitches, globalVerbosity: Verbosity): BuildCommandOptions {
	const verbosity: Verbosity = flag(parsed, "debug")
		? "debug"
		: flag(parsed, "quiet")
			? "quiet"
			: globalVerbosity;
	const bootstrapMode: BootstrapMode = flag(parsed, "bootstrap-stratego")
		? "bootstrap"
		: flag(parsed, "build-stratego")
			? "source"
			: "prebuilt";
	return {
		qualifier: text(parsed, "qualifier"),
		nowQualifier: flag(parsed, "now-qualifier"),
		targetsFile: text(parsed, "targets"),
		profile: {
			deploy: flag(parsed, "deploy"),
			release: flag(parsed, "release"),
			skipTests: flag(parsed, "skip-tests"),
			skipExpensive: flag(parsed, "skip-expensive"),
			clean: !flag(parsed, "no-clean"),
			generateJavaDoc: flag(parsed, "generate-javadoc"),
			buildDependencies: !flag(parsed, "no-deps"),
			bootstrapMode,
			testBootstrap: !flag(parsed, "no-stratego-test"),
			copyArtifactsTo: text(parsed, "copy-artifacts"),
			maven: {
				settingsFile: text(parsed, "settings"),
				globalSettingsFile: text(parsed, "global-settings"),
				localRepository: text(parsed, "local-repository"),
				cleanLocalRepository: flag(parsed, "clean-repo"),
				offline: flag(parsed, "offline"),
			},
			gradle: { noNative: flag(parsed, "no-native") },
			jvm: {
				stack: text(parsed, "stack") ?? DEFAULT_JVM.stack,
				minHeap: text(parsed, "min-heap") ?? DEFAULT_JVM.minHeap,
				maxHeap: text(parsed, "max-heap") ?? DEFAULT_JVM.maxHeap,
			},
			verbosity,
		},
	};
}

const COMMANDS: Readonly<Record<string, CommandSpec>> = {
	update: {
		summary: "Update every submodule to the latest commit of its tracked branch",
		switches: [DEPTH],
		build: (parsed) => {
			const depth = positiveInt(parsed, "depth");
			return depth instanceof ValidationError ? depth : { _tag: "Update", depth };
		},
	},
	"set-remote": {
		summary: "Rewrite submodule remotes to SSH or HTTP",
		switches: [
			{ name: "ssh", short: "s", help: "Use SSH remotes", excludes: ["http"] },
			{ name: "http", short: "h", help: "Use HTTP remotes", excludes: ["ssh"] },
		],
		build: (parsed) => {
			if (flag(parsed, "ssh")) return { _tag: "SetRemote", kind: "ssh" };
			if (flag(parsed, "http")) return { _tag: "SetRemote", kind: "http" };
			return new ValidationError({
				reason: "missing-parameter",
				detail: "set-remote: pass --ssh or --http",
			});
		},
	},
	"clean-update": {
		summary: "Reset, clean and update every submodule",
		switches: [YES, DEPTH],
		build: (parsed) => {
			const depth = positiveInt(parsed, "depth");
			return depth instanceof ValidationError
				? depth
				: { _tag: "CleanUpdate", yes: flag(parsed, "yes"), depth };
		},
	},
	track: {
		summary: "Make each submodule branch track its remote branch",
		switches: [],
		build: () => ({ _tag: "Track" }),
	},
	merge: {
		summary: "Merge a branch into the current branch of every submodule",
		switches: [{ name: "branch", short: "b", value: "BRANCH", help: "Branch to merge" }, YES],
		build: (parsed) => {
			const branch = required(parsed, "merge", "branch");
			return branch instanceof ValidationError
				? branch
				: { _tag: "Merge", branch, yes: flag(parsed, "yes") };
		},
	},
	tag: {
		summary: "Create an annotated tag in every submodule",
		switches: [
			{ name: "name", short: "n", value: "NAME", help: "Tag name" },
			{ name: "description", short: "d", value: "TEXT", help: "Tag message (defaults to the name)" },
			YES,
		],
		build: (parsed) => {
			const name = required(parsed, "tag", "name");
			return name instanceof ValidationError
				? name
				: {
						_tag: "Tag",
						name,
						description: text(parsed, "description"),
						yes: flag(parsed, "yes"),
					};
		},
	},
	push: {
		summary: "Push the current branch of every submodule",
		switches: [YES],
		build: yesOnly("Push"),
	},
	checkout: {
		summary: "Check out the tracked branch of every submodule",
		switches: [YES],
		build: yesOnly("Checkout"),
	},
	clean: {
		summary: "Remove untracked files from every submodule",
		switches: [YES],
		build: yesOnly("Clean"),
	},
	reset: {
		summary: "Hard reset every submodule",
		switches: [
			{ name: "remote", short: "r", help: "Reset to the remote branch, dropping unpushed commits" },
			YES,
		],
		build: (parsed) => ({
			_tag: "Reset",
			toRemote: flag(parsed, "remote"),
			yes: flag(parsed, "yes"),
		}),
	},
	"set-versions": {
		summary: "Rewrite descriptor versions across the fleet",
		switches: [
			{ name: "from", short: "f", value: "VERSION", help: "Version to replace" },
			{ name: "to", short: "t", value: "VERSION", help: "Replacement version" },
			{ name: "commit", short: "c", help: "Commit the changes per repository" },
			{ name: "dry-run", short: "d", help: "Report changes without writing files" },
			YES,
		],
		build: (parsed) => {
			const fromVersion = required(parsed, "set-versions", "from");
			if (fromVersion instanceof ValidationError) return fromVersion;
			const toVersion = required(parsed, "set-versions", "to");
			if (toVersion instanceof ValidationError) return toVersion;
			return {
				_tag: "SetVersions",
				fromVersion,
				toVersion,
				commit: flag(parsed, "commit"),
				dryRun: flag(parsed, "dry-run"),
				yes: flag(parsed, "yes"),
			};
		},
	},
	build: {
		summary: "Build components and their dependencies",
		positionals: "COMPONENT...",
		switches: [
			{ name: "qualifier", short: "q", value: "QUALIFIER", help: "Explicit qualifier", excludes: ["now-qualifier"] },
			{ name: "now-qualifier", short: "n", help: "Qualifier from the current time", excludes: ["qualifier"] },
			{ name: "clean-repo", short: "c", help: "Delete built artifacts from the local repository first" },
			{ name: "no-deps", short: "e", help: "Build only the given components", excludes: ["clean-repo"] },
			{ name: "deploy", short: "d", help: "Deploy artifacts" },
			{ name: "release", short: "r", help: "Release build; fails on snapshot versions" },
			{
				name: "skip-expensive",
				short: "k",
				help: "Skip expensive build steps",
				requires: ["no-clean"],
				excludes: ["clean-repo"],
			},
			{ name: "copy-artifacts", short: "a", value: "DIR", help: "Copy artifacts to DIR" },
			{ name: "generate-javadoc", short: "j", help: "Generate Javadoc" },
			{ name: "build-stratego", short: "s", help: "Build the bootstrap toolchain from source" },
			{ name: "bootstrap-stratego", short: "b", help: "Bootstrap the toolchain" },
			{ name: "no-stratego-test", short: "t", help: "Skip toolchain tests" },
			{ name: "no-clean", short: "u", help: "Do not clean before building" },
			{ name: "skip-tests", short: "y", help: "Skip tests" },
			{ name: "settings", short: "i", value: "FILE", help: "Maven settings file" },
			{ name: "global-settings", short: "g", value: "FILE", help: "Maven global settings file" },
			{ name: "local-repository", short: "l", value: "DIR", help: "Maven local repository" },
			{ name: "offline", short: "O", help: "Build offline" },
			{ name: "debug", short: "D", help: "Debug output", excludes: ["quiet"] },
			{ name: "quiet", short: "Q", help: "Quiet output", excludes: ["debug"] },
			{ name: "no-native", short: "N", help: "Disable Gradle native integration" },
			{ name: "stack", value: "SIZE", help: "JVM stack size (default 16M)" },
			{ name: "min-heap", value: "SIZE", help: "JVM minimum heap (default 512M)" },
			{ name: "max-heap", value: "SIZE", help: "JVM maximum heap (default 1024M)" },
			{ name: "targets", value: "FILE", help: "Targets configuration file" },
		],
		build: (parsed, verbosity) => ({
			_tag: "Build",
			options: buildOptions(parsed, verbosity),
			components: parsed.positionals,
		}),
	},
	release: {
		summary: "Run the release workflow",
		switches: [
			{ name: "rel-branch", value: "BRANCH", help: "Release branch" },
			{ name: "dev-branch", value: "BRANCH", help: "Development branch" },
			{ name: "cur-dev-ver", value: "VERSION", help: "Current development version" },
			{ name: "next-rel-ver", value: "VERSION", help: "Version to release" },
			{ name: "next-dev-ver", value: "VERSION", help: "Next development version" },
			{ name: "tag", value: "NAME", help: "Release tag (default release-<version>)" },
			{ name: "targets", value: "FILE", help: "Targets configuration file" },
		],
		build: (parsed) => {
			const names = ["rel-branch", "dev-branch", "cur-dev-ver", "next-rel-ver", "next-dev-ver"] as const;
			const absent = names.filter((name) => text(parsed, name) === null);
			if (absent.length > 0) {
				return new ValidationError({
					reason: "missing-parameter",
					detail: `release: missing required switch(es) ${absent.map((name) => `--${name}`).join(", ")}`,
				});
			}
			return {
				_tag: "Release",
				inputs: {
					releaseBranch: text(parsed, "rel-branch") ?? "",
					developBranch: text(parsed, "dev-branch") ?? "",
					currentDevelopVersion: text(parsed, "cur-dev-ver") ?? "",
					nextReleaseVersion: text(parsed, "next-rel-ver") ?? "",
					nextDevelopVersion: text(parsed, "next-dev-ver") ?? "",
					tagName: text(parsed, "tag"),
				},
				targetsFile: text(parsed, "targets"),
			};
		},
	},
	bootstrap: {
		summary: "Run the bootstrap workflow",
		switches: [
			{ name: "cur-ver", value: "VERSION", help: "Current version" },
			{ name: "cur-base-ver", value: "VERSION", help: "Current baseline version" },
			{ name: "next-base-ver", value: "VERSION", help: "Next baseline version" },
			{ name: "targets", value: "FILE", help: "Targets configuration file" },
		],
		build: (parsed) => {
			const currentVersion = required(parsed, "bootstrap", "cur-ver");
			if (currentVersion instanceof ValidationError) return currentVersion;
			const currentBaselineVersion = required(parsed, "bootstrap", "cur-base-ver");
			if (currentBaselineVersion instanceof ValidationError) return currentBaselineVersion;
			return {
				_tag: "Bootstrap",
				inputs: {
					currentVersion,
					currentBaselineVersion,
					nextBaselineVersion: text(parsed, "next-base-ver"),
				},
				targetsFile: text(parsed, "targets"),
			};
		},
	},
	qualifier: {
		summary: "Print the qualifier of the fleet",
		switches: [
			{ name: "now", help: "Use the current time instead of the latest commit" },
			{ name: "branch", value: "BRANCH", help: "Branch name to use" },
		],
		build: (parsed) => ({
			_tag: "Qualifier",
			now: flag(parsed, "now"),
			branch: text(parsed, "branch"),
		}),
	},
	changed: {
		summary: "Exit 0 and print the qualifier when it changed since the last check",
		switches: [
			{ name: "destination", short: "d", value: "FILE", help: "Qualifier record (default .qualifier)" },
			{ name: "force-change", short: "f", help: "Report a change regardless" },
		],
		build: (parsed) => ({
			_tag: "Changed",
			destination: text(parsed, "destination") ?? ".qualifier",
			force: flag(parsed, "force-change"),
		}),
	},
};

function findSwitch(specs: readonly SwitchSpec[], arg: string): SwitchSpec | undefined {
	if (arg.startsWith("--")) return specs.find((spec) => spec.name === arg.slice(2));
	return specs.find((spec) => spec.short !== undefined && arg === `-${spec.short}`);
}

function checkRelations(
	command: string,
	specs: readonly SwitchSpec[],
	values: ReadonlyMap<string, string | true>,
): ValidationError | null {
	for (const spec of specs) {
		if (!values.has(spec.name)) continue;
		const clash = spec.excludes?.find((other) => values.has(other));
		if (clash !== undefined) return invalid(`${command}: --${spec.name} cannot be combined with --${clash}`);
		const absent = spec.requires?.find((other) => !values.has(other));
		if (absent !== undefined) return invalid(`${command}: --${spec.name} requires --${absent}`);
	}
	return null;
}

/**
 * Splits command arguments into switches and positionals.
 *
 * @pure true
 */
function parseSwitches(
	command: string,
	spec: CommandSpec,
	args: readonly string[],
): ParsedSwitches | ValidationError {
	const values = new Map<string, string | true>();
	const positionals: string[] = [];
	for (let index = 0; index < args.length; index += 1) {
		const arg = args[index] ?? "";
		if (!arg.startsWith("-") || arg === "-") {
			positionals.push(arg);
			continue;
		}
		const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
		const name = eq < 0 ? arg : arg.slice(0, eq);
		const inline = eq < 0 ? null : arg.slice(eq + 1);
		const found = findSwitch(spec.switches, name);
		if (found === undefined) return invalid(`${command}: unknown switch ${name}`);
		if (found.value === undefined) {
			values.set(found.name, true);
			continue;
		}
		const value = inline ?? args[index + 1];
		if (value === undefined) return invalid(`${command}: --${found.name} expects ${found.value}`);
		if (inline === null) index += 1;
		values.set(found.name, value);
	}
	if (positionals.length > 0 && spec.positionals === undefined) {
		return invalid(`${command}: unexpected argument ${positionals[0] ?? ""}`);
	}
	return checkRelations(command, spec.switches, values) ?? { values, positionals };
}

const renderSwitch = (spec: SwitchSpec): string => {
	const names = spec.short === undefined ? `--${spec.name}` : `-${spec.short}, --${spec.name}`;
	const label = spec.value === undefined ? names : `${names} ${spec.value}`;
	return `    ${label.padEnd(34)} ${spec.help}`;
};

/** Own entries only: `toString` and friends are not commands. */
const commandSpec = (name: string): CommandSpec | undefined =>
	Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;

/**
 * Help text for one command, or the overview when `command` is null.
 *
 * @pure true
 */
export function usage(command: string | null = null): string {
	const spec = command === null ? undefined : commandSpec(command);
	if (command !== null && spec !== undefined) {
		const positional = spec.positionals === undefined ? "" : ` ${spec.positionals}`;
		return [
			`Usage: releng [global switches] ${command} [switches]${positional}`,
			"",
			spec.summary,
			...(spec.switches.length > 0 ? ["", "Switches:", ...spec.switches.map(renderSwitch)] : []),
		].join("\n");
	}
	return [
		"Usage: releng [-r DIR] [-v|-q] <command> [switches]",
		"",
		"Global switches:",
		renderSwitch({ name: "repo", short: "r", value: "DIR", help: "Fleet root (default .)" }),
		renderSwitch({ name: "verbose", short: "v", help: "Debug output" }),
		renderSwitch({ name: "quiet", short: "q", help: "Only warnings and errors" }),
		"",
		"Commands:",
		...Object.entries(COMMANDS).map(([name, entry]) => `    ${name.padEnd(34)} ${entry.summary}`),
	].join("\n");
}

/**
 * Parses `process.argv.slice(2)`.
 *
 * @pure true
 * @effect Effect<ParsedArgs, ValidationError>
 */
export function parseCLIArgs(argv: readonly string[]): Effect.Effect<ParsedArgs, ValidationError> {
	let repoDirectory = ".";
	let verbosity: Verbosity = "normal";
	let index = 0;
	for (; index < argv.length; index += 1) {
		const arg = argv[index] ?? "";
		if (!arg.startsWith("-")) break;
		if (arg === "-h" || arg === "--help") return Effect.succeed({ _tag: "Help", text: usage() });
		if (arg === "-v" || arg === "--verbose") verbosity = "debug";
		else if (arg === "-q" || arg === "--quiet") verbosity = "quiet";
		else if (arg === "-r" || arg === "--repo") {
			const value = argv[index + 1];
			if (value === undefined) return Effect.fail(invalid("--repo expects DIR"));
			repoDirectory = value;
			index += 1;
		} else return Effect.fail(invalid(`unknown global switch ${arg}`));
	}
	const name = argv[index];
	if (name === undefined) {
		return Effect.fail(
			new ValidationError({ reason: "missing-parameter", detail: `no command given\n\n${usage()}` }),
		);
	}
	const spec = commandSpec(name);
	if (spec === undefined) return Effect.fail(invalid(`unknown command '${name}'`));
	const rest = argv.slice(index + 1);
	if (rest.includes("--help")) return Effect.succeed({ _tag: "Help", text: usage(name) });
	const parsed = parseSwitches(name, spec, rest);
	if (parsed instanceof ValidationError) return Effect.fail(parsed);
	const command = spec.build(parsed, verbosity);
	if (command instanceof ValidationError) return Effect.fail(command);
	return Effect.succeed({ _tag: "Run", options: { repoDirectory, verbosity, command } });
}
