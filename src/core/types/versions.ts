// Version rewriting model
// PURITY: CORE

export type DescriptorDialect = "pom" | "feature" | "manifest" | "gradle-properties";

export interface VersionRewriteSpec {
	readonly fromVersion: string;
	readonly toVersion: string;
	readonly commit: boolean;
	readonly dryRun: boolean;
}

/**
 * One replacement inside one descriptor, as offsets into the original text.
 *
 * @invariant 0 <= start <= end <= text.length ∧ text.slice(start, end) = oldValue
 */
export interface TextEdit {
	readonly start: number;
	readonly end: number;
	readonly line: number;
	readonly oldValue: string;
	readonly newValue: string;
}

/**
 * One (repository, file, old, new) tuple of a rewrite pass.
 *
 * @property repository Repository path relative to the fleet root ("" for root)
 * @property file File path relative to its repository, POSIX separators
 */
export interface VersionChange {
	readonly repository: string;
	readonly file: string;
	readonly dialect: DescriptorDialect;
	readonly line: number;
	readonly oldValue: string;
	readonly newValue: string;
}

export type ChangeSet = readonly VersionChange[];
