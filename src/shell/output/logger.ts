// Console logging with verbosity control
// PURITY: SHELL
// INVARIANT: debug lines print only at "debug"; "quiet" keeps warnings and errors

import type { Verbosity } from "../../core/types/index.js";

/**
 * Where log lines go. Tests pass a recording sink.
 */
export interface LogSink {
	readonly out: (line: string) => void;
	readonly err: (line: string) => void;
	readonly write: (chunk: string) => void;
}

export const consoleSink: LogSink = {
	out: (line) => {
		console.log(line);
	},
	err: (line) => {
		console.error(line);
	},
	write: (chunk) => {
		process.stdout.write(chunk);
	},
};

/** Thin logging wrapper for centralized output control. */
export class Logger {
	constructor(
		readonly verbosity: Verbosity,
		private readonly sink: LogSink = consoleSink,
	) {}

	private get quiet(): boolean {
		return this.verbosity === "quiet";
	}

	/** Command output; printed at every verbosity. */
	print(message: string): void {
		this.sink.out(message);
	}

	info(message: string): void {
		if (!this.quiet) this.sink.out(message);
	}

	step(message: string): void {
		if (!this.quiet) this.sink.out(`🔍 ${message}`);
	}

	success(message: string): void {
		if (!this.quiet) this.sink.out(`✅ ${message}`);
	}

	warn(message: string): void {
		this.sink.err(`⚠️ ${message}`);
	}

	error(message: string): void {
		this.sink.err(`❌ ${message}`);
	}

	/** Log only at debug verbosity. */
	debug(message: string): void {
		if (this.verbosity === "debug") this.sink.out(message);
	}

	/** Raw process output, streamed while a build runs. */
	stream(chunk: string): void {
		if (!this.quiet) this.sink.write(chunk);
	}
}
