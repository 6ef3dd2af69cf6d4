// CHANGE: Pure rendering of lint results and exit-code policy
// WHY: Shell prints lines; the wording and the exit policy stay testable without a console
// REF: lint command output
// PURITY: CORE
// INVARIANT: processExitCode(s) = 2 ⇔ s = ERROR
// COMPLEXITY: O(n) in issues

import { match } from "ts-pattern";

import type { LinterIssue, Severity } from "./types.js";

/** Process exit status of the lint command. */
export type LintProcessExitCode = 0 | 2;

/**
 * One issue line: `  - [SEVERITY] id: message (filename)`.
 *
 * @pure true
 */
export function formatIssue(issue: LinterIssue): string {
	const location = issue.filename.length > 0 ? ` (${issue.filename})` : "";
	const link = issue.url.length > 0 ? ` <${issue.url}>` : "";
	return `  - [${issue.severity}] ${issue.id}: ${issue.message}${location}${link}`;
}

/**
 * Report lines grouped by linter; empty when nothing was found.
 *
 * @pure true
 * @complexity O(n)
 */
export function formatReport(
	issuesByLinter: ReadonlyMap<string, readonly LinterIssue[]>,
): string[] {
	if (issuesByLinter.size === 0) return [];
	const lines = ["lint results:"];
	for (const [linterName, issues] of issuesByLinter) {
		lines.push(`${linterName}:`);
		for (const issue of issues) lines.push(formatIssue(issue));
	}
	return lines;
}

/**
 * Closing line for a lint pass over `label` (project file name or "artifacts").
 *
 * @pure true
 */
export function formatVerdict(
	highest: Severity | undefined,
	label: string,
): string {
	return match(highest)
		.with(undefined, () => `Linted ${label} successfully.`)
		.with("ERROR", () => `Errors found in ${label}`)
		.with("WARNING", "INFO", () => `Possible issues found in ${label}`)
		.exhaustive();
}

/**
 * Exit status policy: only ERROR fails the command.
 *
 * @pure true
 * @invariant warnings and infos exit 0
 */
export function processExitCode(
	highest: Severity | undefined,
): LintProcessExitCode {
	return highest === "ERROR" ? 2 : 0;
}
