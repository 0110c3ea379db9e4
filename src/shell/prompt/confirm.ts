// Confirmation mechanisms: interactive terminal and unconditional yes
// PURITY: SHELL

import * as readline from "node:readline/promises";

import { Effect } from "effect";

import { requiredAnswers } from "../../core/fleet/operations.js";
import type { Confirmer, ConfirmRequest } from "../../core/types/index.js";

const isYes = (answer: string): boolean => /^y(es)?$/iu.test(answer.trim());

const QUESTIONS = ["", "Are you sure? ", "Are you really sure? "] as const;

/**
 * Asks on stdin/stdout; every required answer must be yes.
 *
 * An interrupted or closed input counts as "no".
 */
export function terminalConfirmer(
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stdout,
): Confirmer {
	return {
		confirm: (request: ConfirmRequest) => {
			const answers = requiredAnswers(request.level);
			if (answers === 0) return Effect.succeed(true);
			return Effect.promise(async () => {
				const rl = readline.createInterface({ input, output });
				// A pending question does not settle when the input ends.
				const closed = new AbortController();
				rl.once("close", () => {
					closed.abort();
				});
				try {
					for (let round = 0; round < answers; round += 1) {
						const prefix = QUESTIONS[round] ?? "";
						const answer = await rl.question(`${prefix}${request.message} [y/N] `, {
							signal: closed.signal,
						});
						if (!isYes(answer)) return false;
					}
					return true;
				} catch {
					return false;
				} finally {
					rl.close();
				}
			});
		},
	};
}

export const autoConfirmer: Confirmer = {
	confirm: () => Effect.succeed(true),
};
