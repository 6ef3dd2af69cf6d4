// CHANGE: Domain model for craft linting (issues, stages, severities, ignore rules)
// WHY: Every layer (linters, suppression, orchestrator, CLI) speaks the same immutable vocabulary
// REF: craft-lint issue model
// PURITY: CORE
// INVARIANT: Severity is totally ordered INFO < WARNING < ERROR; issues are frozen values
// COMPLEXITY: O(1) per constructor, O(n) for maxSeverity

/**
 * Severity of a single issue, also used as the aggregate "highest seen".
 *
 * @pure true
 * @invariant rank(INFO) < rank(WARNING) < rank(ERROR)
 */
export const Severity = {
	INFO: "INFO",
	WARNING: "WARNING",
	ERROR: "ERROR",
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
	INFO: 1,
	WARNING: 2,
	ERROR: 3,
};

export function severityRank(severity: Severity): number {
	return SEVERITY_RANK[severity];
}

/**
 * Highest severity of a collection.
 *
 * @returns undefined for an empty collection
 *
 * @pure true
 * @postcondition ∀s ∈ input: rank(s) ≤ rank(result)
 * @complexity O(n)
 */
export function maxSeverity(
	severities: Iterable<Severity>,
): Severity | undefined {
	let highest: Severity | undefined;
	for (const severity of severities) {
		if (highest === undefined || severityRank(severity) > severityRank(highest)) {
			highest = severity;
		}
	}
	return highest;
}

/**
 * Lint stage: "pre" inspects the unbuilt source tree, "post" a built artifact tree.
 */
export const Stage = {
	PRE: "pre",
	POST: "post",
} as const;

export type Stage = (typeof Stage)[keyof typeof Stage];

export const STAGES: readonly Stage[] = [Stage.PRE, Stage.POST];

export function isStage(value: unknown): value is Stage {
	return value === Stage.PRE || value === Stage.POST;
}

/**
 * Tri-state summary of a lint pass.
 *
 * @invariant OK = 0, WARN = 1, ERROR = 2
 */
export const ExitCode = {
	OK: 0,
	WARN: 1,
	ERROR: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * A single finding reported by a linter.
 *
 * @remarks
 * - `id` is a short code unique within the linter (e.g. "TC001")
 * - `filename` is "" when the issue is not tied to a file
 * - no global uniqueness: the same id may be reported for several files
 */
export interface LinterIssue {
	readonly id: string;
	readonly message: string;
	readonly severity: Severity;
	readonly filename: string;
	readonly url: string;
}

export interface LinterIssueInit {
	readonly id: string;
	readonly message: string;
	readonly severity: Severity;
	readonly filename?: string;
	readonly url?: string;
}

/**
 * Build a frozen issue with defaults for filename and url.
 *
 * @pure true
 * @complexity O(1)
 */
export function makeIssue(init: LinterIssueInit): LinterIssue {
	return Object.freeze({
		id: init.id,
		message: init.message,
		severity: init.severity,
		filename: init.filename ?? "",
		url: init.url ?? "",
	});
}

/** Marker meaning "ignore every issue of this linter". */
export const WILDCARD = "*";
export type Wildcard = typeof WILDCARD;

/**
 * Suppression state for one linter.
 *
 * @invariant ids === WILDCARD ⇒ byFilename is irrelevant (and kept empty by merge)
 */
export interface IgnoreSpec {
	ids: Wildcard | Set<string>;
	readonly byFilename: Map<string, Set<string>>;
}

/** Linter name (the declared `linterName`, not a class name) -> suppression state. */
export type IgnoreConfig = Map<string, IgnoreSpec>;

/**
 * Parsed project metadata passed through to linters that want it.
 */
export type ProjectModel = Readonly<Record<string, unknown>>;

/**
 * Input bundle for a single lint pass.
 *
 * @invariant Frozen; linters read it and never write back into it
 */
export interface LintContext {
	readonly projectDir: string;
	readonly artifactDirs: readonly string[];
	readonly project?: ProjectModel;
}

export function makeLintContext(init: {
	readonly projectDir: string;
	readonly artifactDirs?: readonly string[];
	readonly project?: ProjectModel;
}): LintContext {
	const artifactDirs = Object.freeze([...(init.artifactDirs ?? [])]);
	return init.project === undefined
		? Object.freeze({ projectDir: init.projectDir, artifactDirs })
		: Object.freeze({
				projectDir: init.projectDir,
				artifactDirs,
				project: init.project,
			});
}
