// Default build profile
// PURITY: CORE

import type { BuildProfile, JvmSettings } from "../types/index.js";

export const DEFAULT_JVM: JvmSettings = {
	stack: "16M",
	minHeap: "512M",
	maxHeap: "1024M",
};

/**
 * Profile of a plain `build` without switches, with `overrides` applied.
 *
 * @pure true
 */
export function defaultBuildProfile(overrides: Partial<BuildProfile> = {}): BuildProfile {
	return {
		qualifier: null,
		deploy: false,
		release: false,
		skipTests: false,
		skipExpensive: false,
		clean: true,
		generateJavaDoc: false,
		buildDependencies: true,
		bootstrapMode: "prebuilt",
		testBootstrap: true,
		copyArtifactsTo: null,
		maven: {
			settingsFile: null,
			globalSettingsFile: null,
			localRepository: null,
			cleanLocalRepository: false,
			offline: false,
		},
		gradle: { noNative: false },
		jvm: DEFAULT_JVM,
		verbosity: "normal",
		...overrides,
	};
}
