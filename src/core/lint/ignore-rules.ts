// CHANGE: Parse `--lint-ignore` rules and fold them into an IgnoreConfig
// WHY: Malformed rules must be rejected while parsing arguments, not discovered mid-run
// REF: --lint-ignore linter:id | linter:id=glob | linter:*
// PURITY: CORE
// INVARIANT: parseIgnoreRule(r) = Right ⇒ linter ≠ "" ∧ id ≠ "" ∧ (glob = undefined ∨ glob ≠ "")
// COMPLEXITY: O(|rule|) parse, O(n) fold

import { Either } from "effect";

import { InvalidIgnoreRule } from "../errors.js";
import { emptyIgnoreSpec } from "./suppression.js";
import { type IgnoreConfig, WILDCARD } from "./types.js";

export interface IgnoreRule {
	readonly linter: string;
	readonly id: string;
	readonly glob?: string;
}

/**
 * Parse one command-line ignore rule.
 *
 * @param value - `linter:id` or `linter:id=glob` (`linter:*` ignores the whole linter)
 * @returns Either the rule or an InvalidIgnoreRule describing the problem
 *
 * @pure true
 * @complexity O(|value|)
 *
 * @example
 * ```ts
 * parseIgnoreRule("dummy.pre:D002=*.foo");
 * // Right({ linter: "dummy.pre", id: "D002", glob: "*.foo" })
 * ```
 */
export function parseIgnoreRule(
	value: string,
): Either.Either<IgnoreRule, InvalidIgnoreRule> {
	const colon = value.indexOf(":");
	if (colon === -1) {
		return Either.left(
			new InvalidIgnoreRule({
				rule: value,
				reason: "rules must be in the form 'linter:id' or 'linter:id=glob'",
			}),
		);
	}
	const linter = value.slice(0, colon);
	const remainder = value.slice(colon + 1);
	if (linter.length === 0 || remainder.length === 0) {
		return Either.left(
			new InvalidIgnoreRule({
				rule: value,
				reason: "rules must provide a linter name and issue id",
			}),
		);
	}

	const equals = remainder.indexOf("=");
	if (equals === -1) {
		return Either.right({ linter, id: remainder });
	}
	const id = remainder.slice(0, equals);
	const glob = remainder.slice(equals + 1);
	if (id.length === 0 || glob.length === 0) {
		return Either.left(
			new InvalidIgnoreRule({
				rule: value,
				reason: "glob rules must be in the form 'linter:id=glob'",
			}),
		);
	}
	return Either.right({ linter, id, glob });
}

/**
 * Fold parsed rules into a CLI-scoped IgnoreConfig.
 *
 * A rule with id "*" turns the linter into a wildcard and drops its filename rules;
 * once wildcard, later rules for that linter change nothing.
 *
 * @pure true
 * @complexity O(n)
 */
export function buildCliIgnoreConfig(
	rules: readonly IgnoreRule[],
): IgnoreConfig {
	const config: IgnoreConfig = new Map();
	for (const rule of rules) {
		let spec = config.get(rule.linter);
		if (spec === undefined) {
			spec = emptyIgnoreSpec();
			config.set(rule.linter, spec);
		}
		if (rule.id === WILDCARD) {
			spec.ids = WILDCARD;
			spec.byFilename.clear();
			continue;
		}
		if (spec.ids === WILDCARD) continue;
		if (rule.glob === undefined) {
			spec.ids.add(rule.id);
		} else {
			const globs = spec.byFilename.get(rule.id);
			if (globs === undefined) {
				spec.byFilename.set(rule.id, new Set([rule.glob]));
			} else {
				globs.add(rule.glob);
			}
		}
	}
	return config;
}
