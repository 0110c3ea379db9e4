// Build targets configuration: lookup, JSON validation, defaults
// PURITY: SHELL (reads files)
// INVARIANT: Array order of `targets` is preserved; it is the topological tie-break

import { Effect } from "effect";

import { FSError, ValidationError } from "../../core/errors.js";
import type { BuildBackend, BuildTarget, TargetsConfig } from "../../core/types/index.js";
import { fileURLToPath, fs, fsp, path } from "../utils/node-mods.js";

export const FLEET_TARGETS_FILE = "releng.targets.json";
export const DEFAULT_LOCAL_REPOSITORY_GROUPS: readonly string[] = ["org/metaborg"];

/**
 * Type representing any valid JSON value.
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue | undefined): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isString(value: JSONValue | undefined): value is string {
	return typeof value === "string";
}

function isStringArray(value: JSONValue | undefined): value is readonly string[] {
	return Array.isArray(value) && value.every((item) => typeof item === "string");
}

const invalid = (detail: string): ValidationError =>
	new ValidationError({ reason: "invalid-config", detail });

/**
 * Optional string array field; absent means empty.
 */
function optionalStrings(
	object: JSONObject,
	key: string,
	where: string,
): readonly string[] | ValidationError {
	const value = object[key];
	if (value === undefined) return [];
	return isStringArray(value) ? value : invalid(`${where}: '${key}' must be an array of strings`);
}

function requiredString(object: JSONObject, key: string, where: string): string | ValidationError {
	const value = object[key];
	return isString(value) && value.length > 0
		? value
		: invalid(`${where}: '${key}' must be a non-empty string`);
}

function parseBackend(value: JSONValue | undefined, where: string): BuildBackend | ValidationError {
	if (!isJSONObject(value)) return invalid(`${where}: 'backend' must be an object`);
	const artifacts = optionalStrings(value, "artifacts", where);
	if (artifacts instanceof ValidationError) return artifacts;
	const kind = value["kind"];

	if (kind === "tool") {
		const tool = value["tool"];
		if (tool !== "maven" && tool !== "gradle") {
			return invalid(`${where}: 'tool' must be "maven" or "gradle"`);
		}
		const descriptor = requiredString(value, "descriptor", where);
		if (descriptor instanceof ValidationError) return descriptor;
		const expensive = value["expensive"];
		if (expensive !== undefined && typeof expensive !== "boolean") {
			return invalid(`${where}: 'expensive' must be a boolean`);
		}
		return { kind, tool, descriptor, expensive: expensive === true, artifacts };
	}
	if (kind === "bootstrap-script") {
		const directory = requiredString(value, "directory", where);
		if (directory instanceof ValidationError) return directory;
		const script = requiredString(value, "script", where);
		if (script instanceof ValidationError) return script;
		const descriptor = requiredString(value, "descriptor", where);
		if (descriptor instanceof ValidationError) return descriptor;
		const prebuilt = value["prebuiltDescriptor"];
		if (prebuilt !== undefined && !isString(prebuilt)) {
			return invalid(`${where}: 'prebuiltDescriptor' must be a string`);
		}
		return {
			kind,
			directory,
			script,
			descriptor,
			prebuiltDescriptor: prebuilt ?? null,
			artifacts,
		};
	}
	if (kind === "source-build") {
		const directory = requiredString(value, "directory", where);
		if (directory instanceof ValidationError) return directory;
		const command = value["command"];
		if (!isStringArray(command) || command.length === 0) {
			return invalid(`${where}: 'command' must be a non-empty array of strings`);
		}
		return { kind, directory, command, artifacts };
	}
	return invalid(`${where}: unknown backend kind ${JSON.stringify(kind ?? null)}`);
}

function parseTarget(value: JSONValue, index: number): BuildTarget | ValidationError {
	const where = `targets[${index}]`;
	if (!isJSONObject(value)) return invalid(`${where} must be an object`);
	const name = requiredString(value, "name", where);
	if (name instanceof ValidationError) return name;
	const dependencies = optionalStrings(value, "dependencies", `target '${name}'`);
	if (dependencies instanceof ValidationError) return dependencies;
	const backend = parseBackend(value["backend"], `target '${name}'`);
	if (backend instanceof ValidationError) return backend;
	return { name, dependencies, backend };
}

/**
 * Validates parsed JSON as a targets configuration.
 *
 * @pure true
 * @effect Effect<TargetsConfig, ValidationError>
 */
export function parseTargetsConfig(value: JSONValue): Effect.Effect<TargetsConfig, ValidationError> {
	if (!isJSONObject(value)) return Effect.fail(invalid("Targets configuration must be a JSON object"));
	const rawTargets = value["targets"];
	if (!Array.isArray(rawTargets)) return Effect.fail(invalid("'targets' must be an array"));
	const targets: BuildTarget[] = [];
	for (const [index, raw] of rawTargets.entries()) {
		const target = parseTarget(raw, index);
		if (target instanceof ValidationError) return Effect.fail(target);
		targets.push(target);
	}
	const releaseTargets = optionalStrings(value, "releaseTargets", "configuration");
	if (releaseTargets instanceof ValidationError) return Effect.fail(releaseTargets);
	const bootstrapTargets = optionalStrings(value, "bootstrapTargets", "configuration");
	if (bootstrapTargets instanceof ValidationError) return Effect.fail(bootstrapTargets);
	const groups =
		value["localRepositoryGroups"] === undefined
			? DEFAULT_LOCAL_REPOSITORY_GROUPS
			: optionalStrings(value, "localRepositoryGroups", "configuration");
	if (groups instanceof ValidationError) return Effect.fail(groups);
	return Effect.succeed({
		targets,
		releaseTargets,
		bootstrapTargets,
		localRepositoryGroups: groups,
	});
}

/**
 * The configuration bundled with the tool.
 */
export const bundledTargetsFile = (): string =>
	path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../../config/targets.json");

/**
 * First existing of: explicit file, the fleet's own file, the bundled default.
 *
 * @pure false (checks the filesystem)
 */
export function resolveTargetsFile(explicit: string | null, fleetRoot: string): string {
	if (explicit !== null) return path.resolve(explicit);
	const fleetFile = path.join(fleetRoot, FLEET_TARGETS_FILE);
	return fs.existsSync(fleetFile) ? fleetFile : bundledTargetsFile();
}

/**
 * Reads and validates a targets file.
 *
 * @effect Effect<TargetsConfig, FSError | ValidationError>
 */
export function loadTargetsConfig(file: string): Effect.Effect<TargetsConfig, FSError | ValidationError> {
	return Effect.gen(function* () {
		const raw = yield* Effect.tryPromise({
			try: () => fsp.readFile(file, "utf8"),
			catch: (error) =>
				new FSError({ detail: error instanceof Error ? error.message : String(error), path: file }),
		});
		const parsed = yield* Effect.try({
			try: (): JSONValue => JSON.parse(raw),
			catch: (error) =>
				invalid(`${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`),
		});
		return yield* parseTargetsConfig(parsed);
	});
}
