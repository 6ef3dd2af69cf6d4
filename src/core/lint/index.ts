// CHANGE: Central export for the lint core
// WHY: Single import point for types, suppression, registry and orchestrator
// PURITY: Re-exports only

export { buildCliIgnoreConfig, type IgnoreRule, parseIgnoreRule } from "./ignore-rules.js";
export { fnmatch } from "./fnmatch.js";
export { AbstractLinter, type LinterClass, validateLinterClass } from "./linter.js";
export {
	type FilterIssues,
	LinterOrchestrator,
	type OrchestratorOptions,
	type ProjectIgnores,
	type SelectLinters,
} from "./orchestrator.js";
export { LinterRegistry, type RegistrySnapshot } from "./registry.js";
export {
	formatIssue,
	formatReport,
	formatVerdict,
	type LintProcessExitCode,
	processExitCode,
} from "./report.js";
export {
	cloneIgnoreConfig,
	emptyIgnoreSpec,
	mergeIgnoreConfig,
	normalizeIgnoreConfig,
	shouldIgnore,
} from "./suppression.js";
export {
	ExitCode,
	type IgnoreConfig,
	type IgnoreSpec,
	isStage,
	type LintContext,
	type LinterIssue,
	type LinterIssueInit,
	makeIssue,
	makeLintContext,
	maxSeverity,
	type ProjectModel,
	Severity,
	severityRank,
	Stage,
	STAGES,
	WILDCARD,
	type Wildcard,
} from "./types.js";
