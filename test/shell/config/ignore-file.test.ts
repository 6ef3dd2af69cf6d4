// CHANGE: Specs for YAML ignore file discovery and reading
// WHY: A broken ignore file must degrade to "no rules", never abort the lint pass

import * as path from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { WILDCARD } from "../../../src/core/lint/index.js";
import {
	findIgnoreFile,
	loadExtraIgnoreFiles,
	loadProjectIgnoreConfig,
	readIgnoreFile,
} from "../../../src/shell/config/ignore-file.js";
import { createMemoryLogger } from "../../../src/shell/utils/logger.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

let project: TempProject | undefined;

function temp(files: Readonly<Record<string, string>>): string {
	project = createTempProject(files);
	return project.cwd;
}

afterEach(() => {
	project?.cleanup();
	project = undefined;
});

describe("findIgnoreFile", () => {
	it("prefers craft-lint.yaml over the hidden variants", () => {
		const cwd = temp({
			"craft-lint.yaml": "{}\n",
			".craft-lint.yaml": "{}\n",
			".craft/lintignore.yaml": "{}\n",
		});
		expect(findIgnoreFile(cwd)).toBe(path.join(cwd, "craft-lint.yaml"));
	});

	it("falls back to .craft/lintignore.yaml", () => {
		const cwd = temp({ ".craft/lintignore.yaml": "{}\n" });
		expect(findIgnoreFile(cwd)).toBe(path.join(cwd, ".craft", "lintignore.yaml"));
	});

	it("returns undefined when no file exists", () => {
		expect(findIgnoreFile(temp({}))).toBeUndefined();
	});
});

describe("loadProjectIgnoreConfig", () => {
	it("normalizes the project file", () => {
		const cwd = temp({
			"craft-lint.yaml": [
				"testcraft.missing_version:",
				"  ids: TC001",
				"other:",
				"  ids: '*'",
				"docs:",
				"  by_filename:",
				"    DOC1: '*/README.*'",
				"",
			].join("\n"),
		});
		const logger = createMemoryLogger();
		const config = loadProjectIgnoreConfig(cwd, logger);
		expect(config.get("testcraft.missing_version")?.ids).toEqual(new Set(["TC001"]));
		expect(config.get("other")?.ids).toBe(WILDCARD);
		expect(config.get("docs")?.byFilename).toEqual(
			new Map([["DOC1", new Set(["*/README.*"])]]),
		);
		expect(logger.lines.debug).toEqual([
			`Loading linter ignore config from ${path.join(cwd, "craft-lint.yaml")}`,
		]);
	});

	it("is empty without an ignore file", () => {
		expect(loadProjectIgnoreConfig(temp({}), createMemoryLogger()).size).toBe(0);
	});
});

describe("readIgnoreFile", () => {
	it("treats unparsable YAML as no rules", () => {
		const cwd = temp({ "craft-lint.yaml": "a: b: c\n" });
		const logger = createMemoryLogger();
		const file = path.join(cwd, "craft-lint.yaml");
		expect(readIgnoreFile(file, logger).size).toBe(0);
		expect(logger.lines.debug).toHaveLength(1);
		expect(logger.lines.debug[0]).toMatch(/^Cannot read lint ignore file /);
	});

	it("treats a non-mapping document as no rules", () => {
		const cwd = temp({ "craft-lint.yaml": "- a\n- b\n" });
		const logger = createMemoryLogger();
		const file = path.join(cwd, "craft-lint.yaml");
		expect(readIgnoreFile(file, logger).size).toBe(0);
		expect(logger.lines.debug).toEqual([
			`Lint ignore config ${file} is not a mapping; ignoring this file.`,
		]);
	});

	it("treats an empty file as no rules", () => {
		const cwd = temp({ "craft-lint.yaml": "" });
		expect(readIgnoreFile(path.join(cwd, "craft-lint.yaml"), createMemoryLogger()).size).toBe(0);
	});
});

describe("loadExtraIgnoreFiles", () => {
	it("merges files in order and skips missing ones", () => {
		const cwd = temp({
			"a.yaml": "lint.a:\n  ids: [X]\n",
			"b.yaml": "lint.a:\n  ids: [Y]\n",
		});
		const missing = path.join(cwd, "missing.yaml");
		const logger = createMemoryLogger();
		const config = loadExtraIgnoreFiles(
			[path.join(cwd, "a.yaml"), missing, path.join(cwd, "b.yaml")],
			logger,
		);
		expect(config.get("lint.a")?.ids).toEqual(new Set(["X", "Y"]));
		expect(logger.lines.debug).toEqual([
			`Lint ignore file ${missing} does not exist; skipping.`,
		]);
	});
});
