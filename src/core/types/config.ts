// CHANGE: Command-line and application configuration types for the lint command
// WHY: APP and SHELL share one immutable description of what the user asked for
// REF: craft-lint CLI
// PURITY: CORE

import type { IgnoreRule } from "../lint/ignore-rules.js";
import type { Stage } from "../lint/types.js";

/**
 * Options of the `lint` command.
 *
 * @property projectPath Project directory, or the project file itself
 * @property stage Requested stage; `post` when postArtifact is set
 * @property postArtifact Packed artifact (tarball) to unpack and lint with post-linters
 * @property lintIgnores Parsed `--lint-ignore` rules, in command-line order
 * @property lintIgnoreFiles Extra YAML ignore files, merged before lintIgnores
 * @property help `--help` was given
 */
export interface LintCLIOptions {
	readonly projectPath: string;
	readonly stage: Stage;
	readonly postArtifact?: string;
	readonly lintIgnores: readonly IgnoreRule[];
	readonly lintIgnoreFiles: readonly string[];
	readonly help: boolean;
}

/**
 * Identity of a craft application built on the linter.
 *
 * @property name Application name; the project file is `<name>.yaml`
 */
export interface AppMetadata {
	readonly name: string;
}

/**
 * Failed child process as produced by node:child_process.
 *
 * @property stdout Standard output captured before the failure
 * @property stderr Standard error captured before the failure
 */
export interface ChildProcessFailure extends Error {
	readonly stdout?: string;
	readonly stderr?: string;
}
