// Programmatic entry: argv in, exit code out
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value

import * as os from "node:os";

import { Effect } from "effect";

import type { AppContext } from "./app/context.js";
import { runCommand } from "./app/runCommand.js";
import { formatAppError } from "./core/format/messages.js";
import type { ExitCode } from "./core/models.js";
import { nodeProcessRunner } from "./shell/build/runner.js";
import { parseCLIArgs } from "./shell/config/cli.js";
import { createNodeGit } from "./shell/git/node-git.js";
import { Logger } from "./shell/output/logger.js";
import { terminalConfirmer } from "./shell/prompt/confirm.js";
import { fileURLToPath, path } from "./shell/utils/node-mods.js";

/**
 * Directory of this package (one level above src/ or dist/).
 */
export const packageDirectory = (): string =>
	path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param overrides Replaces individual capabilities, e.g. a fake git backend
 * @returns ExitCode (0 | 1)
 */
export async function main(
	argv: readonly string[] = process.argv.slice(2),
	overrides: Partial<AppContext> = {},
): Promise<ExitCode> {
	const parsed = await Effect.runPromise(Effect.either(parseCLIArgs(argv)));
	if (parsed._tag === "Left") {
		(overrides.logger ?? new Logger("normal")).error(formatAppError(parsed.left));
		return 1;
	}
	if (parsed.right._tag === "Help") {
		(overrides.logger ?? new Logger("normal")).print(parsed.right.text);
		return 0;
	}
	const { options } = parsed.right;
	const context: AppContext = {
		git: createNodeGit(),
		runner: nodeProcessRunner,
		confirmer: terminalConfirmer(),
		logger: new Logger(options.verbosity),
		now: () => new Date(),
		toolDirectory: packageDirectory(),
		home: os.homedir(),
		...overrides,
	};
	return Effect.runPromise(runCommand(options, context));
}
