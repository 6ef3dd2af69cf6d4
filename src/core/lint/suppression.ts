// CHANGE: Pure suppression engine (decide, normalize, merge)
// WHY: "Is this issue visible?" must be decidable without IO so CLI, file and app layers can share it
// REF: craft-lint.yaml ignore format; --lint-ignore rules
// PURITY: CORE
// INVARIANT: shouldIgnore/normalize/merge are total; merge never mutates its inputs; wildcard is sticky
// COMPLEXITY: O(g·|filename|) per issue where g = globs for the issue id

import { fnmatch } from "./fnmatch.js";
import {
	type IgnoreConfig,
	type IgnoreSpec,
	type LinterIssue,
	WILDCARD,
} from "./types.js";

export function emptyIgnoreSpec(): IgnoreSpec {
	return { ids: new Set(), byFilename: new Map() };
}

function cloneSpec(spec: IgnoreSpec): IgnoreSpec {
	if (spec.ids === WILDCARD) {
		return { ids: WILDCARD, byFilename: new Map() };
	}
	const byFilename = new Map<string, Set<string>>();
	for (const [issueId, globs] of spec.byFilename) {
		byFilename.set(issueId, new Set(globs));
	}
	return { ids: new Set(spec.ids), byFilename };
}

/**
 * Deep copy of a config; the copy shares no sets or maps with the source.
 *
 * @pure true
 */
export function cloneIgnoreConfig(config: IgnoreConfig): IgnoreConfig {
	const copy: IgnoreConfig = new Map();
	for (const [linterName, spec] of config) {
		copy.set(linterName, cloneSpec(spec));
	}
	return copy;
}

/**
 * Decide whether an issue is hidden by the ignore rules of its linter.
 *
 * @param linterName - Declared name of the linter that produced the issue
 * @param issue - Issue to test
 * @param config - Effective ignore config
 * @returns true when suppressed
 *
 * @pure true
 * @invariant Never throws
 * @postcondition config has no entry for linterName → false
 * @postcondition ids = "*" → true
 * @complexity O(g·|filename|)
 */
export function shouldIgnore(
	linterName: string,
	issue: LinterIssue,
	config: IgnoreConfig,
): boolean {
	const spec = config.get(linterName);
	if (spec === undefined) return false;
	if (spec.ids === WILDCARD) return true;
	if (spec.ids.has(issue.id)) return true;
	const globs = spec.byFilename.get(issue.id);
	if (globs === undefined) return false;
	for (const glob of globs) {
		if (fnmatch(issue.filename, glob)) return true;
	}
	return false;
}

// ─── Normalization of loosely typed input (YAML / JSON) ──────────────────────

type RawMapping = Readonly<Record<string, unknown>>;

function isMapping(value: unknown): value is RawMapping {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toStringSet(value: unknown): Set<string> {
	if (typeof value === "string") return new Set([value]);
	if (Array.isArray(value) || value instanceof Set) {
		const result = new Set<string>();
		for (const item of value) {
			if (typeof item === "string") result.add(item);
		}
		return result;
	}
	return new Set();
}

function normalizeSpec(raw: RawMapping): IgnoreSpec {
	const idsRaw = raw["ids"];
	const ids = idsRaw === WILDCARD ? WILDCARD : toStringSet(idsRaw);
	const byFilename = new Map<string, Set<string>>();
	const byFilenameRaw = raw["by_filename"];
	if (isMapping(byFilenameRaw)) {
		for (const [issueId, globs] of Object.entries(byFilenameRaw)) {
			byFilename.set(issueId, toStringSet(globs));
		}
	}
	return ids === WILDCARD ? { ids, byFilename: new Map() } : { ids, byFilename };
}

/**
 * Normalize raw ignore data into the canonical in-memory shape.
 *
 * Accepted per-linter shapes:
 * ```yaml
 * some.linter:
 *   ids: "*"            # or "ID" or [ID, ...]
 *   by_filename:
 *     ID: "*.md"        # or ["*.md", "docs/*"]
 * ```
 *
 * @param raw - Parsed document of unknown shape
 * @returns IgnoreConfig; entries that are not mappings are dropped
 *
 * @pure true
 * @invariant Never throws for any input
 * @complexity O(total entries)
 */
export function normalizeIgnoreConfig(raw: unknown): IgnoreConfig {
	const config: IgnoreConfig = new Map();
	if (!isMapping(raw)) return config;
	for (const [linterName, spec] of Object.entries(raw)) {
		if (!isMapping(spec)) continue;
		config.set(linterName, normalizeSpec(spec));
	}
	return config;
}

// ─── Merge ───────────────────────────────────────────────────────────────────

function mergeSpecInto(base: IgnoreSpec, overlay: IgnoreSpec): void {
	if (overlay.ids === WILDCARD) {
		base.ids = WILDCARD;
		base.byFilename.clear();
		return;
	}
	if (base.ids === WILDCARD) return;
	for (const issueId of overlay.ids) base.ids.add(issueId);
	for (const [issueId, globs] of overlay.byFilename) {
		const existing = base.byFilename.get(issueId);
		if (existing === undefined) {
			base.byFilename.set(issueId, new Set(globs));
		} else {
			for (const glob of globs) existing.add(glob);
		}
	}
}

/**
 * Layer `overlay` on top of `base`.
 *
 * Overlay only ever adds suppressions: id sets and glob sets are unioned, and a
 * wildcard on either side leaves the linter fully ignored with no filename rules.
 *
 * @returns A new config; neither argument is modified
 *
 * @pure true
 * @invariant base[l].ids = "*" ⇒ merge(base, o)[l].ids = "*"
 * @invariant overlay[l].ids = "*" ⇒ merge(b, overlay)[l].ids = "*"
 * @complexity O(|base| + |overlay|)
 *
 * @example
 * ```ts
 * merge({A: {ids: {x}}}, {A: {ids: {y}}}); // {A: {ids: {x, y}}}
 * merge({A: {ids: {x}}}, {A: {ids: "*"}}); // {A: {ids: "*"}}
 * ```
 */
export function mergeIgnoreConfig(
	base: IgnoreConfig,
	overlay: IgnoreConfig,
): IgnoreConfig {
	const result = cloneIgnoreConfig(base);
	for (const [linterName, overSpec] of overlay) {
		const baseSpec = result.get(linterName);
		if (baseSpec === undefined) {
			result.set(linterName, cloneSpec(overSpec));
		} else {
			mergeSpecInto(baseSpec, overSpec);
		}
	}
	return result;
}
