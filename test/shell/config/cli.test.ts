// CHANGE: Unit tests for lint command-line parsing
// WHY: Flags, positional project path and ignore rules are parsed deterministically; bad input is a value

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { InvalidIgnoreRule, UsageError } from "../../../src/core/errors.js";
import type { LintCLIOptions } from "../../../src/core/types/index.js";
import { parseCLIArgs } from "../../../src/shell/config/cli.js";

/**
 * Safely set process.argv for the duration of a test and restore afterwards.
 *
 * Invariants:
 * - Always restore original argv to avoid cross-test contamination.
 */
function withArgv<T>(args: readonly string[], fn: () => T): T {
	const original = process.argv.slice();
	try {
		// First two entries are node and script placeholders
		process.argv = [original[0] ?? "node", original[1] ?? "script.js", ...args];
		return fn();
	} finally {
		process.argv = original;
	}
}

function parsed(args: readonly string[]): LintCLIOptions {
	const result = parseCLIArgs(args);
	if (Either.isLeft(result)) throw result.left;
	return result.right;
}

function failure(args: readonly string[]): UsageError | InvalidIgnoreRule {
	const result = parseCLIArgs(args);
	if (Either.isRight(result)) throw new Error("expected a parse failure");
	return result.left;
}

describe("parseCLIArgs: defaults and positional", () => {
	it("returns defaults when no args provided", (): void => {
		const result = withArgv([], () => parseCLIArgs());
		expect(result).toEqual(
			Either.right({
				projectPath: ".",
				stage: "pre",
				lintIgnores: [],
				lintIgnoreFiles: [],
				help: false,
			}),
		);
	});

	it("parses a single positional as projectPath", (): void => {
		const result = withArgv(["proj/"], () => parseCLIArgs());
		expect(Either.map(result, (o) => o.projectPath)).toEqual(Either.right("proj/"));
	});

	it("ignores empty string arguments", (): void => {
		expect(parsed(["", "proj"]).projectPath).toBe("proj");
	});

	it("rejects a second positional", (): void => {
		const error = failure(["a", "b"]);
		expect(error).toBeInstanceOf(UsageError);
		expect(error).toMatchObject({ detail: "Unexpected argument 'b'" });
	});
});

describe("parseCLIArgs: stage selection", () => {
	it("--stage post selects the post stage", (): void => {
		expect(parsed(["--stage", "post"]).stage).toBe("post");
	});

	it("accepts --stage=post", (): void => {
		expect(parsed(["--stage=post"]).stage).toBe("post");
	});

	it("rejects an unknown stage", (): void => {
		expect(failure(["--stage", "later"])).toMatchObject({
			detail: "Invalid stage 'later': expected 'pre' or 'post'",
		});
	});

	it("--post ARTIFACT implies the post stage", (): void => {
		const options = parsed(["--post", "demo.testcraft", "proj"]);
		expect(options.postArtifact).toBe("demo.testcraft");
		expect(options.stage).toBe("post");
		expect(options.projectPath).toBe("proj");
	});

	it("value flags consume the next token instead of treating it as positional", (): void => {
		expect(parsed(["--lint-ignore-file", "extra.yaml"]).projectPath).toBe(".");
	});
});

describe("parseCLIArgs: ignore rules", () => {
	it("collects repeated --lint-ignore rules in order", (): void => {
		expect(
			parsed(["--lint-ignore", "dummy.pre:D001", "--lint-ignore=dummy.pre:D002=*.foo"])
				.lintIgnores,
		).toEqual([
			{ linter: "dummy.pre", id: "D001" },
			{ linter: "dummy.pre", id: "D002", glob: "*.foo" },
		]);
	});

	it("collects --lint-ignore-file paths", (): void => {
		expect(
			parsed(["--lint-ignore-file", "a.yaml", "--lint-ignore-file", "b.yaml"])
				.lintIgnoreFiles,
		).toEqual(["a.yaml", "b.yaml"]);
	});

	it("fails on a malformed rule", (): void => {
		const error = failure(["--lint-ignore", "no-colon"]);
		expect(error).toBeInstanceOf(InvalidIgnoreRule);
		expect(error).toMatchObject({ rule: "no-colon" });
	});
});

describe("parseCLIArgs: usage errors and help", () => {
	it("rejects unknown options", (): void => {
		expect(failure(["--fix"])).toMatchObject({ detail: "Unknown option '--fix'" });
	});

	it("requires a value for value flags", (): void => {
		expect(failure(["--lint-ignore"])).toMatchObject({
			detail: "Option '--lint-ignore' requires a value",
		});
		expect(failure(["--post="])).toMatchObject({
			detail: "Option '--post' requires a value",
		});
	});

	it("-h and --help set help", (): void => {
		expect(parsed(["-h"]).help).toBe(true);
		expect(parsed(["--help"]).help).toBe(true);
	});
});
