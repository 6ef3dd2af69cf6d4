// CHANGE: Lint command orchestration (APP) composing CORE engine with SHELL integrations
// WHY: Resolve directories, layer ignore rules, run one stage and turn the result into an exit code
// REF: craft-lint CLI; LinterOrchestrator
// PURITY: APP (no process.exit; console output goes through Logger)
// EFFECT: Effect<LintProcessExitCode, AppError>
// INVARIANT: Returns 2 iff an ERROR issue survived suppression, else 0
// INVARIANT: Linter exceptions are not caught here; they surface as defects with the original error
// COMPLEXITY: O(n) in issues plus linter and unpack cost

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";

import type { AppError } from "../core/errors.js";
import {
	buildCliIgnoreConfig,
	formatReport,
	formatVerdict,
	type IgnoreConfig,
	type LinterOrchestrator,
	type LintProcessExitCode,
	makeLintContext,
	mergeIgnoreConfig,
	type ProjectModel,
	processExitCode,
	Stage,
} from "../core/lint/index.js";
import type { AppMetadata, LintCLIOptions } from "../core/types/index.js";
import { withUnpackedArtifact } from "../shell/artifact/unpack.js";
import { loadExtraIgnoreFiles } from "../shell/config/ignore-file.js";
import {
	loadProjectModel,
	resolveProjectFile,
} from "../shell/project/project-file.js";
import type { Logger } from "../shell/utils/logger.js";

/** Directory holding primed output when linting `--stage post` without an artifact. */
export const PRIME_DIR = "prime";

export interface LintDependencies {
	readonly app: AppMetadata;
	readonly orchestrator: LinterOrchestrator;
	readonly logger: Logger;
}

interface StageRequest {
	readonly stage: Stage;
	readonly projectDir: string;
	readonly artifactDirs: readonly string[];
	readonly project: ProjectModel | undefined;
	readonly label: string;
	readonly cliIgnores: IgnoreConfig;
}

/**
 * Run one stage and print its report.
 *
 * @pure false (linters read the filesystem; output through logger)
 */
function runStage(
	request: StageRequest,
	deps: LintDependencies,
): Effect.Effect<LintProcessExitCode> {
	return Effect.sync(() => {
		const { orchestrator, logger } = deps;
		const ctx = makeLintContext(
			request.project === undefined
				? { projectDir: request.projectDir, artifactDirs: request.artifactDirs }
				: {
						projectDir: request.projectDir,
						artifactDirs: request.artifactDirs,
						project: request.project,
					},
		);
		orchestrator.loadIgnoreConfig(request.projectDir, request.cliIgnores);

		let count = 0;
		for (const issue of orchestrator.run(request.stage, ctx)) {
			count += 1;
			logger.debug(`issue ${issue.id} (${issue.severity})`);
		}
		logger.debug(`${count} issue(s) after suppression`);

		for (const line of formatReport(orchestrator.issuesByLinter)) {
			logger.message(line);
		}
		const highest = orchestrator.getHighestSeverity();
		logger.message(formatVerdict(highest, request.label));
		return processExitCode(highest);
	});
}

/**
 * Ignore rules given on the command line: extra files first, then `--lint-ignore` rules.
 */
function cliIgnoreConfig(options: LintCLIOptions, logger: Logger): IgnoreConfig {
	return mergeIgnoreConfig(
		loadExtraIgnoreFiles(options.lintIgnoreFiles, logger),
		buildCliIgnoreConfig(options.lintIgnores),
	);
}

function primeDirs(projectDir: string): string[] {
	const prime = path.join(projectDir, PRIME_DIR);
	return fs.existsSync(prime) ? [prime] : [];
}

/**
 * Execute the lint command.
 *
 * @param options - Parsed CLI options
 * @param deps - Application identity, orchestrator and logger
 * @returns Effect<LintProcessExitCode, AppError>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @postcondition result = 2 ⇔ orchestrator.getHighestSeverity() = ERROR
 *
 * @example
 * ```ts
 * const code = await Effect.runPromise(
 *   runLint(options, { app: TESTCRAFT, orchestrator, logger }),
 * );
 * ```
 */
export function runLint(
	options: LintCLIOptions,
	deps: LintDependencies,
): Effect.Effect<LintProcessExitCode, AppError> {
	return Effect.gen(function* (_) {
		const projectFile = yield* _(
			resolveProjectFile(options.projectPath, deps.app.name),
		);
		const projectDir = path.dirname(projectFile);
		const base = {
			projectDir,
			project: loadProjectModel(projectFile),
			cliIgnores: cliIgnoreConfig(options, deps.logger),
		};

		const artifact = options.postArtifact;
		if (artifact !== undefined) {
			return yield* _(
				withUnpackedArtifact(artifact, `${deps.app.name}-lint-`, deps.logger, (dir) =>
					runStage(
						{ ...base, stage: Stage.POST, artifactDirs: [dir], label: "artifacts" },
						deps,
					),
				),
			);
		}

		const label = path.basename(projectFile);
		const artifactDirs = options.stage === Stage.POST ? primeDirs(projectDir) : [];
		return yield* _(
			runStage({ ...base, stage: options.stage, artifactDirs, label }, deps),
		);
	});
}
