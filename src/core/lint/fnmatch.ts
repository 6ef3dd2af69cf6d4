// CHANGE: Shell-style filename matching for ignore globs
// WHY: Ignore rules such as "*/README.*" are matched against the full filename recorded on the issue
// REF: craft-lint.yaml by_filename globs
// PURITY: CORE
// INVARIANT: `*` crosses "/" (full-string match, no basename normalization); result is total
// INVARIANT: `?` and bracket sets consume one code point, not one UTF-16 unit
// COMPLEXITY: O(|pattern|) to compile (cached), O(|name|) to match

const compiled = new Map<string, RegExp>();

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;
const CLASS_SPECIAL = /[\\\]\[^-]/;

function escapeLiteral(text: string): string {
	return text.replace(REGEX_SPECIAL, "\\$&");
}

function escapeClassChar(char: string): string {
	return CLASS_SPECIAL.test(char) ? `\\${char}` : char;
}

/**
 * Translate the inside of a bracket expression into a regex fragment.
 * Reversed ranges ("z-a") are dropped instead of producing an invalid class.
 */
function translateClass(body: string): string {
	const negated = body.startsWith("!");
	const chars = Array.from(negated ? body.slice(1) : body);
	let items = "";
	let i = 0;
	while (i < chars.length) {
		const lo = chars[i] ?? "";
		const dash = chars[i + 1];
		const hi = chars[i + 2];
		if (dash === "-" && hi !== undefined) {
			if (lo <= hi) items += `${escapeClassChar(lo)}-${escapeClassChar(hi)}`;
			i += 3;
			continue;
		}
		items += escapeClassChar(lo);
		i += 1;
	}
	if (items.length === 0) {
		// Empty set never matches; its negation matches any single character
		return negated ? "[\\s\\S]" : "(?!)";
	}
	return negated ? `[^${items}]` : `[${items}]`;
}

/**
 * Convert a shell-style pattern into an anchored regular expression source.
 *
 * @pure true
 * @invariant Unterminated "[" is treated as a literal character
 */
export function translate(pattern: string): string {
	let out = "";
	let i = 0;
	const n = pattern.length;
	while (i < n) {
		const c = pattern.charAt(i);
		i += 1;
		if (c === "*") {
			// Collapse runs of "*" into one wildcard
			while (pattern.charAt(i) === "*") i += 1;
			out += "[\\s\\S]*";
		} else if (c === "?") {
			out += "[\\s\\S]";
		} else if (c === "[") {
			let j = i;
			if (pattern.charAt(j) === "!") j += 1;
			if (pattern.charAt(j) === "]") j += 1;
			while (j < n && pattern.charAt(j) !== "]") j += 1;
			if (j >= n) {
				out += "\\[";
			} else {
				out += translateClass(pattern.slice(i, j));
				i = j + 1;
			}
		} else {
			out += escapeLiteral(c);
		}
	}
	return `^(?:${out})$`;
}

/**
 * Test `name` against a shell-style glob (`*`, `?`, `[seq]`, `[!seq]`).
 *
 * @param name - Full string to test (not reduced to a basename)
 * @param pattern - Glob pattern
 * @returns true iff the whole name matches
 *
 * @pure true (module-level cache is an optimization only)
 * @complexity O(|name|) after first compilation of pattern
 *
 * @example
 * ```ts
 * fnmatch("/x/README.md", "*\/README.*"); // true
 * fnmatch("/x/README.md", "*.txt"); // false
 * ```
 */
export function fnmatch(name: string, pattern: string): boolean {
	let regex = compiled.get(pattern);
	if (regex === undefined) {
		regex = new RegExp(translate(pattern), "u");
		compiled.set(pattern, regex);
	}
	return regex.test(name);
}
