// CHANGE: Testcraft's own pre- and post-stage linters
// WHY: Reference application showing how a craft tool contributes linters to the shared engine
// REF: testcraft.yaml, packed testcraft artifacts
// PURITY: SHELL (filesystem reads)
// INVARIANT: Linters never mutate the LintContext
// COMPLEXITY: O(|project file|) pre, O(entries) post

import * as fs from "node:fs";
import * as path from "node:path";
import { parse } from "yaml";

import {
	AbstractLinter,
	type LintContext,
	type LinterIssue,
	makeIssue,
	Severity,
	Stage,
} from "../../core/lint/index.js";

export const PROJECT_FILE = "testcraft.yaml";
export const ARTIFACT_METADATA = "metadata.yaml";

function readYaml(file: string): unknown {
	return parse(fs.readFileSync(file, "utf8"));
}

/**
 * Warn when the project is missing the recommended version field.
 */
export class MissingVersionLinter extends AbstractLinter {
	static readonly linterName = "testcraft.missing_version";
	static readonly stage = Stage.PRE;

	*run(ctx: LintContext): Iterable<LinterIssue> {
		const projectFile = path.join(ctx.projectDir, PROJECT_FILE);
		if (!fs.existsSync(projectFile)) return;

		const data = readYaml(projectFile);
		if (data === null || typeof data !== "object" || Array.isArray(data)) return;
		if (Boolean(Reflect.get(data, "version"))) return;

		yield makeIssue({
			id: "TC001",
			message: "project is missing the recommended 'version' field",
			severity: Severity.WARNING,
			filename: projectFile,
		});
	}
}

/**
 * Error when a packed artifact holds nothing but its metadata.
 *
 * Dot-files are not counted as content.
 */
export class EmptyArtifactLinter extends AbstractLinter {
	static readonly linterName = "testcraft.empty_artifact";
	static readonly stage = Stage.POST;

	*run(ctx: LintContext): Iterable<LinterIssue> {
		for (const artifactDir of ctx.artifactDirs) {
			if (!fs.existsSync(artifactDir)) continue;

			const content = fs
				.readdirSync(artifactDir)
				.filter((entry) => entry !== ARTIFACT_METADATA && !entry.startsWith("."));
			if (content.length > 0) continue;

			yield makeIssue({
				id: "TC100",
				message: `artifact is empty other than ${ARTIFACT_METADATA}`,
				severity: Severity.ERROR,
				filename: path.join(artifactDir, ARTIFACT_METADATA),
			});
		}
	}
}
