// CHANGE: Central export file for shared type definitions
// WHY: Provides a single import point for types used across APP and SHELL
// SOURCE: n/a

export type { AppMetadata, ChildProcessFailure, LintCLIOptions } from "./config.js";
export { describeExecFailure } from "./exec-helpers.js";
