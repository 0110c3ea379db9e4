// Convention mapping between SSH and HTTP remote URLs
// FORMAT THEOREM: ∀u recognised: convert(convert(u, k), kind(u)) = normalize(u)
// PURITY: CORE
// COMPLEXITY: O(|url|)

import type { RemoteKind } from "../types/index.js";

interface ParsedRemote {
	readonly kind: RemoteKind;
	readonly host: string;
	readonly path: string;
}

const SCP_LIKE = /^(?:[\w.-]+@)?([\w.-]+):(?!\/\/)(.+)$/u;
const SSH_URL = /^ssh:\/\/(?:[\w.-]+@)?([\w.-]+)(?::\d+)?\/(.+)$/u;
const HTTP_URL = /^https?:\/\/(?:[^@/]+@)?([\w.-]+)(?::\d+)?\/(.+)$/u;

/**
 * Splits a remote URL into host and repository path.
 *
 * Recognises `git@host:org/repo.git`, `ssh://git@host/org/repo.git` and
 * `http(s)://host/org/repo.git`.
 *
 * @pure true
 * @returns null for local paths and unknown schemes
 */
export function parseRemoteUrl(url: string): ParsedRemote | null {
	const trimmed = url.trim();
	const http = HTTP_URL.exec(trimmed);
	if (http !== null) {
		return { kind: "http", host: http[1] ?? "", path: http[2] ?? "" };
	}
	const ssh = SSH_URL.exec(trimmed);
	if (ssh !== null) {
		return { kind: "ssh", host: ssh[1] ?? "", path: ssh[2] ?? "" };
	}
	if (trimmed.startsWith("/") || trimmed.startsWith(".")) return null;
	const scp = SCP_LIKE.exec(trimmed);
	if (scp !== null) {
		return { kind: "ssh", host: scp[1] ?? "", path: scp[2] ?? "" };
	}
	return null;
}

export function remoteKindOf(url: string): RemoteKind | null {
	return parseRemoteUrl(url)?.kind ?? null;
}

/**
 * Rewrites a remote URL to the requested scheme.
 *
 * @pure true
 * @returns The converted URL, or null when the URL is not recognised
 *
 * @example
 * ```ts
 * convertRemoteUrl("https://github.com/acme/tools.git", "ssh");
 * // => "git@github.com:acme/tools.git"
 * ```
 */
export function convertRemoteUrl(url: string, kind: RemoteKind): string | null {
	const parsed = parseRemoteUrl(url);
	if (parsed === null) return null;
	if (parsed.kind === kind) return url.trim();
	return kind === "ssh"
		? `git@${parsed.host}:${parsed.path}`
		: `https://${parsed.host}/${parsed.path}`;
}
