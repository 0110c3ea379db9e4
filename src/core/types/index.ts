// Central export file for all type definitions

export type {
	BootstrapMode,
	BuildBackend,
	BuildProfile,
	BuildStep,
	BuildTarget,
	DeclaredVersion,
	Invocation,
	JvmSettings,
	MavenSettings,
	TargetsConfig,
	Verbosity,
} from "./build.js";
export type {
	BuildCommandOptions,
	CLIOptions,
	Command,
	ExecError,
} from "./config.js";
export { extractOutputFromError } from "./exec-helpers.js";
export type {
	CommitInfo,
	ConfirmationLevel,
	Fleet,
	FleetOperation,
	FleetReport,
	RemoteKind,
	Repository,
	RepositoryOutcome,
	SubmoduleEntry,
} from "./fleet.js";
export type {
	CleanOptions,
	GitBackend,
	MergeOptions,
	PushOptions,
	ResetMode,
} from "./git.js";
export type {
	ChangeSet,
	DescriptorDialect,
	TextEdit,
	VersionChange,
	VersionRewriteSpec,
} from "./versions.js";
export type {
	BootstrapInputs,
	Confirmer,
	ConfirmRequest,
	MachineRecord,
	ReleaseInputs,
	WorkflowOutcome,
	WorkflowResult,
} from "./workflow.js";
