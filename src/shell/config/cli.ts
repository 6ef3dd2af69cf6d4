// CHANGE: Command-line parsing for the lint command
// WHY: Ignore rules are validated while parsing arguments, so a malformed rule never reaches the run
// REF: --stage, --post, --lint-ignore, --lint-ignore-file
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Right(options) ⇒ options.postArtifact ≠ undefined → options.stage = "post"
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { type InvalidIgnoreRule, UsageError } from "../../core/errors.js";
import { type IgnoreRule, isStage, parseIgnoreRule, Stage } from "../../core/lint/index.js";
import type { LintCLIOptions } from "../../core/types/index.js";

type ParseFailure = UsageError | InvalidIgnoreRule;

interface ParseState {
	readonly projectPath: string;
	readonly stage: Stage;
	readonly postArtifact: string | undefined;
	readonly lintIgnores: readonly IgnoreRule[];
	readonly lintIgnoreFiles: readonly string[];
	readonly help: boolean;
}

type ValueFlagHandler = (
	value: string,
	current: ParseState,
) => Either.Either<ParseState, ParseFailure>;

// Flags that consume a value, either as the next token or after "="
const valueHandlers: Readonly<Record<string, ValueFlagHandler>> = {
	"--stage": (value, current) =>
		isStage(value)
			? Either.right({ ...current, stage: value })
			: Either.left(
					new UsageError({
						detail: `Invalid stage '${value}': expected '${Stage.PRE}' or '${Stage.POST}'`,
					}),
				),
	"--post": (value, current) =>
		Either.right({ ...current, postArtifact: value, stage: Stage.POST }),
	"--lint-ignore": (value, current) =>
		Either.map(parseIgnoreRule(value), (rule) => ({
			...current,
			lintIgnores: [...current.lintIgnores, rule],
		})),
	"--lint-ignore-file": (value, current) =>
		Either.right({
			...current,
			lintIgnoreFiles: [...current.lintIgnoreFiles, value],
		}),
};

function handlerFor(flag: string): ValueFlagHandler | undefined {
	return Object.hasOwn(valueHandlers, flag) ? valueHandlers[flag] : undefined;
}

function splitFlag(arg: string): { readonly flag: string; readonly inline?: string } {
	const equals = arg.indexOf("=");
	return equals === -1
		? { flag: arg }
		: { flag: arg.slice(0, equals), inline: arg.slice(equals + 1) };
}

export const USAGE = [
	"Usage: craft-lint [PROJECT] [options]",
	"",
	"Options:",
	"  --stage pre|post          When to lint: 'pre' = source tree, 'post' = built artifacts",
	"  --post ARTIFACT           Packed artifact to lint with post-linters",
	"  --lint-ignore RULE        'linter:id' or 'linter:id=glob'; may repeat",
	"  --lint-ignore-file PATH   YAML ignore file; may repeat (CLI rules take precedence)",
	"  -h, --help                Show this help",
].join("\n");

/**
 * Parse command-line arguments of the lint command.
 *
 * @param args - Arguments without node and script (defaults to process.argv)
 * @returns Either the options or the first usage problem
 *
 * @example
 * ```ts
 * // Command: craft-lint ./proj --lint-ignore "dummy.pre:D002=*.foo"
 * const options = parseCLIArgs();
 * // Right({ projectPath: "./proj", stage: "pre", lintIgnores: [{ linter: "dummy.pre", id: "D002", glob: "*.foo" }], ... })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<LintCLIOptions, ParseFailure> {
	let state: ParseState = {
		projectPath: ".",
		stage: Stage.PRE,
		postArtifact: undefined,
		lintIgnores: [],
		lintIgnoreFiles: [],
		help: false,
	};
	let positional = false;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		if (arg.length === 0) continue;

		if (arg === "-h" || arg === "--help") {
			state = { ...state, help: true };
			continue;
		}

		if (!arg.startsWith("-")) {
			if (positional) {
				return Either.left(
					new UsageError({ detail: `Unexpected argument '${arg}'` }),
				);
			}
			positional = true;
			state = { ...state, projectPath: arg };
			continue;
		}

		const { flag, inline } = splitFlag(arg);
		const handler = handlerFor(flag);
		if (handler === undefined) {
			return Either.left(new UsageError({ detail: `Unknown option '${flag}'` }));
		}
		let value = inline;
		if (value === undefined) {
			value = args[i + 1];
			i++;
		}
		if (value === undefined || value.length === 0) {
			return Either.left(
				new UsageError({ detail: `Option '${flag}' requires a value` }),
			);
		}
		const next = handler(value, state);
		if (Either.isLeft(next)) return Either.left(next.left);
		state = next.right;
	}

	// exactOptionalPropertyTypes: absent postArtifact is modelled by omitting the key
	const { postArtifact, ...rest } = state;
	return Either.right(postArtifact === undefined ? rest : { ...rest, postArtifact });
}
