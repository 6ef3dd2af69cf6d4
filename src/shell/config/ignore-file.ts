// CHANGE: Discover and read YAML ignore files for the linter
// WHY: Projects persist suppressions next to their sources; broken files must not abort linting
// REF: craft-lint.yaml, .craft-lint.yaml, .craft/lintignore.yaml
// PURITY: SHELL (filesystem reads)
// INVARIANT: Unreadable, unparsable or non-mapping files yield an empty IgnoreConfig
// COMPLEXITY: O(|file|)

import * as fs from "node:fs";
import * as path from "node:path";
import { parse } from "yaml";

import {
	type IgnoreConfig,
	mergeIgnoreConfig,
	normalizeIgnoreConfig,
} from "../../core/lint/index.js";
import type { Logger } from "../utils/logger.js";

/** Candidate locations, first existing wins. */
export const IGNORE_FILE_CANDIDATES: readonly string[] = [
	"craft-lint.yaml",
	".craft-lint.yaml",
	path.join(".craft", "lintignore.yaml"),
];

export function findIgnoreFile(projectDir: string): string | undefined {
	return IGNORE_FILE_CANDIDATES.map((candidate) =>
		path.join(projectDir, candidate),
	).find((file) => fs.existsSync(file));
}

/**
 * Read and normalize one ignore file.
 *
 * @pure false (reads the file)
 * @postcondition never throws
 */
export function readIgnoreFile(file: string, logger: Logger): IgnoreConfig {
	let document: unknown;
	try {
		document = parse(fs.readFileSync(file, "utf8"));
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		logger.debug(`Cannot read lint ignore file ${file}: ${reason}`);
		return new Map();
	}
	if (document === null || typeof document !== "object" || Array.isArray(document)) {
		logger.debug(`Lint ignore config ${file} is not a mapping; ignoring this file.`);
		return new Map();
	}
	return normalizeIgnoreConfig(document);
}

/**
 * Ignore rules stored in the project directory, if any.
 */
export function loadProjectIgnoreConfig(
	projectDir: string,
	logger: Logger,
): IgnoreConfig {
	const file = findIgnoreFile(projectDir);
	if (file === undefined) return new Map();
	logger.debug(`Loading linter ignore config from ${file}`);
	return readIgnoreFile(file, logger);
}

/**
 * Merge extra ignore files in the given order; missing files are skipped.
 */
export function loadExtraIgnoreFiles(
	files: readonly string[],
	logger: Logger,
): IgnoreConfig {
	let config: IgnoreConfig = new Map();
	for (const file of files) {
		if (!fs.existsSync(file)) {
			logger.debug(`Lint ignore file ${file} does not exist; skipping.`);
			continue;
		}
		config = mergeIgnoreConfig(config, readIgnoreFile(file, logger));
	}
	return config;
}
