// CHANGE: Public API entry point for library consumers
// WHY: Craft applications import the engine, the linter contract and the lint command from one place
// PURITY: Re-exports only (meta-module)
// INVARIANT: SHELL internals stay private except the loaders an app needs for wiring
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Linter orchestrator and its class-level registry.
 *
 * @example
 * ```typescript
 * import { LinterOrchestrator, Stage, makeLintContext } from "craft-linter";
 *
 * LinterOrchestrator.register(MyLinter);
 * const orchestrator = new LinterOrchestrator();
 * orchestrator.loadIgnoreConfig(projectDir);
 * for (const issue of orchestrator.run(Stage.PRE, makeLintContext({ projectDir }))) {
 *   console.log(issue.id);
 * }
 * ```
 */
export {
	AbstractLinter,
	buildCliIgnoreConfig,
	cloneIgnoreConfig,
	emptyIgnoreSpec,
	ExitCode,
	type FilterIssues,
	fnmatch,
	formatIssue,
	formatReport,
	formatVerdict,
	type IgnoreConfig,
	type IgnoreRule,
	type IgnoreSpec,
	isStage,
	type LintContext,
	type LinterClass,
	type LinterIssue,
	type LinterIssueInit,
	LinterOrchestrator,
	LinterRegistry,
	type LintProcessExitCode,
	makeIssue,
	makeLintContext,
	maxSeverity,
	mergeIgnoreConfig,
	normalizeIgnoreConfig,
	type OrchestratorOptions,
	parseIgnoreRule,
	processExitCode,
	type ProjectIgnores,
	type ProjectModel,
	type RegistrySnapshot,
	type SelectLinters,
	Severity,
	severityRank,
	shouldIgnore,
	Stage,
	STAGES,
	validateLinterClass,
	WILDCARD,
} from "./core/lint/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS AND TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type AppError,
	ArtifactError,
	describeAppError,
	ExecError,
	FSError,
	InvalidIgnoreRule,
	isAppError,
	LinterConfigurationError,
	ProjectNotFound,
	UsageError,
} from "./core/errors.js";
export type { AppMetadata, LintCLIOptions } from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// COMMAND AND APPLICATION WIRING
// ═══════════════════════════════════════════════════════════════════════════════

export { type LintDependencies, runLint } from "./app/runLint.js";
export {
	createTestcraftOrchestrator,
	selectTestcraftLinters,
	TESTCRAFT,
} from "./app/testcraft.js";
export {
	loadExtraIgnoreFiles,
	loadProjectIgnoreConfig,
} from "./shell/config/ignore-file.js";
export { parseCLIArgs } from "./shell/config/cli.js";
export {
	EmptyArtifactLinter,
	MissingVersionLinter,
} from "./shell/linters/testcraft.js";
export {
	createConsoleLogger,
	createMemoryLogger,
	type Logger,
} from "./shell/utils/logger.js";
