// Capabilities a command runs with
// PURITY: APP

import type { Confirmer, GitBackend } from "../core/types/index.js";
import type { ProcessRunner } from "../shell/build/runner.js";
import type { Logger } from "../shell/output/logger.js";

/**
 * Everything with an effect outside the process, passed explicitly.
 *
 * @property toolDirectory Directory holding this tool's own checkout or install
 * @property home Home directory, used to find the local Maven repository
 */
export interface AppContext {
	readonly git: GitBackend;
	readonly runner: ProcessRunner;
	readonly confirmer: Confirmer;
	readonly logger: Logger;
	readonly now: () => Date;
	readonly toolDirectory: string;
	readonly home: string;
}
