// CHANGE: Locate the application's project file and read its model
// WHY: The project directory (parent of the project file) is the root every pre-linter inspects
// REF: <app>.yaml project files
// PURITY: SHELL (filesystem reads)
// EFFECT: Effect<string, ProjectNotFound>
// COMPLEXITY: O(1) lookups, O(|file|) parse

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";
import { parse } from "yaml";

import { ProjectNotFound } from "../../core/errors.js";
import type { ProjectModel } from "../../core/lint/index.js";

export function projectFileName(appName: string): string {
	return `${appName}.yaml`;
}

/**
 * Resolve the project file from a directory or a direct path to the file.
 *
 * @returns Absolute path of `<appName>.yaml`
 *
 * @pure false (stat calls)
 * @effect Effect<string, ProjectNotFound>
 */
export function resolveProjectFile(
	projectPath: string,
	appName: string,
): Effect.Effect<string, ProjectNotFound> {
	return Effect.suspend(() => {
		const absolute = path.resolve(projectPath);
		const stat = fs.statSync(absolute, { throwIfNoEntry: false });
		if (stat?.isFile() === true) return Effect.succeed(absolute);
		const candidate = path.join(absolute, projectFileName(appName));
		if (fs.existsSync(candidate)) return Effect.succeed(candidate);
		return Effect.fail(
			new ProjectNotFound({
				path: candidate,
				detail: `Could not find ${projectFileName(appName)}`,
			}),
		);
	});
}

/**
 * Parsed project mapping, or undefined when the file is not a YAML mapping.
 *
 * @pure false (reads the file)
 * @postcondition never throws
 */
export function loadProjectModel(projectFile: string): ProjectModel | undefined {
	let document: unknown;
	try {
		document = parse(fs.readFileSync(projectFile, "utf8"));
	} catch {
		return undefined;
	}
	if (document === null || typeof document !== "object" || Array.isArray(document)) {
		return undefined;
	}
	return Object.fromEntries(Object.entries(document));
}
