// CHANGE: Linter orchestrator (registry, ignore config, streaming run, severity summary)
// WHY: One engine runs every application's linters; apps extend it with strategies instead of editing it
// REF: LinterRegistry, suppression engine
// PURITY: CORE (in-memory state only; linters themselves may read the filesystem)
// INVARIANT: Issues are yielded in registry order (as selected), linter by linter, in the order each linter emits them
// INVARIANT: Suppressed or post-filtered issues never reach aggregation nor the caller
// COMPLEXITY: O(n·g) where n = issues produced, g = globs per issue id

import { type AbstractLinter, type LinterClass, validateLinterClass } from "./linter.js";
import { LinterRegistry } from "./registry.js";
import {
	mergeIgnoreConfig,
	shouldIgnore,
} from "./suppression.js";
import {
	ExitCode,
	type IgnoreConfig,
	type LintContext,
	type LinterIssue,
	maxSeverity,
	Severity,
	type Stage,
} from "./types.js";

/**
 * Selection strategy: receives registered candidates for the stage, returns the
 * classes to run (may add, drop or reorder).
 */
export type SelectLinters = (
	stage: Stage,
	ctx: LintContext,
	candidates: readonly LinterClass[],
) => LinterClass[];

/**
 * Post-filter strategy: receives the issues that survived suppression for one linter.
 */
export type FilterIssues = (
	linter: AbstractLinter,
	issues: Iterable<LinterIssue>,
	ctx: LintContext,
) => Iterable<LinterIssue>;

/** Ignore rules owned by the application/project, discovered from the project directory. */
export type ProjectIgnores = (projectDir: string) => IgnoreConfig;

export interface OrchestratorOptions {
	readonly selectLinters?: SelectLinters;
	readonly filterIssues?: FilterIssues;
	readonly projectIgnores?: ProjectIgnores;
	readonly debug?: (message: string) => void;
}

const selectAll: SelectLinters = (_stage, _ctx, candidates) => [...candidates];
const keepAll: FilterIssues = (_linter, issues) => issues;
const noProjectIgnores: ProjectIgnores = () => new Map();
const silent = (): void => undefined;

function* withoutSuppressed(
	linterName: string,
	issues: Iterable<LinterIssue>,
	config: IgnoreConfig,
): Generator<LinterIssue, void, undefined> {
	for (const issue of issues) {
		if (!shouldIgnore(linterName, issue, config)) yield issue;
	}
}

/**
 * Runs registered linters for a stage and aggregates what they report.
 *
 * Extension points, without subclassing:
 * - `selectLinters` (default: all registered candidates)
 * - `filterIssues` (default: pass-through)
 * - `projectIgnores` (default: none)
 *
 * Subclasses may instead override `preFilterLinters` / `postFilterIssues`, and may
 * declare their own `static registry` to stop sharing the base one.
 *
 * @remarks
 * - Not safe for concurrent `run()` calls on one instance
 * - A linter that throws aborts the pass; the error reaches the caller unchanged
 */
export class LinterOrchestrator {
	/** Class-level registry shared by every subclass that does not replace it. */
	static registry: LinterRegistry = new LinterRegistry();

	/**
	 * Register a linter class on this orchestrator type's registry.
	 *
	 * @throws LinterConfigurationError for abstract or malformed classes
	 */
	static register(cls: LinterClass): void {
		this.registry.register(cls);
	}

	private ignoreConfig: IgnoreConfig = new Map();
	private collected: LinterIssue[] = [];
	private grouped = new Map<string, LinterIssue[]>();
	private readonly selectLinters: SelectLinters;
	private readonly filterIssues: FilterIssues;
	private readonly projectIgnores: ProjectIgnores;
	private readonly debug: (message: string) => void;

	constructor(options: OrchestratorOptions = {}) {
		this.selectLinters = options.selectLinters ?? selectAll;
		this.filterIssues = options.filterIssues ?? keepAll;
		this.projectIgnores = options.projectIgnores ?? noProjectIgnores;
		this.debug = options.debug ?? silent;
	}

	/**
	 * Compute and store the effective ignore config: project rules, then CLI rules on top.
	 *
	 * @postcondition subsequent run() calls suppress according to the result
	 */
	loadIgnoreConfig(projectDir: string, cliIgnores?: IgnoreConfig): IgnoreConfig {
		let config = mergeIgnoreConfig(new Map(), this.projectIgnores(projectDir));
		if (cliIgnores !== undefined) {
			config = mergeIgnoreConfig(config, cliIgnores);
		}
		this.ignoreConfig = config;
		this.debug(`Loaded ignore rules for ${config.size} linter(s)`);
		return config;
	}

	/** The effective ignore config used by run(). */
	get currentIgnoreConfig(): IgnoreConfig {
		return this.ignoreConfig;
	}

	protected preFilterLinters(
		stage: Stage,
		ctx: LintContext,
		candidates: readonly LinterClass[],
	): LinterClass[] {
		return this.selectLinters(stage, ctx, candidates);
	}

	protected postFilterIssues(
		linter: AbstractLinter,
		issues: Iterable<LinterIssue>,
		ctx: LintContext,
	): Iterable<LinterIssue> {
		return this.filterIssues(linter, issues, ctx);
	}

	/**
	 * Run the linters of a stage, streaming each surviving issue as it is produced.
	 *
	 * @pure false (mutates run-scoped aggregation; linters may touch the filesystem)
	 * @invariant aggregation is reset when iteration starts
	 * @complexity O(n) in produced issues, plus linter cost
	 *
	 * @example
	 * ```ts
	 * for (const issue of orchestrator.run(Stage.PRE, ctx)) render(issue);
	 * const code = orchestrator.summary();
	 * ```
	 */
	*run(stage: Stage, ctx: LintContext): Generator<LinterIssue, void, undefined> {
		this.collected = [];
		this.grouped = new Map();
		const selected = this.preFilterLinters(
			stage,
			ctx,
			this.registryOf().forStage(stage),
		);
		for (const cls of selected) {
			validateLinterClass(cls);
			const linterName = cls.linterName;
			this.debug(`Running linter ${linterName} (${stage})`);
			const linter = new cls();
			const visible = withoutSuppressed(
				linterName,
				linter.run(ctx),
				this.ignoreConfig,
			);
			for (const issue of this.postFilterIssues(linter, visible, ctx)) {
				this.collected.push(issue);
				const group = this.grouped.get(linterName);
				if (group === undefined) {
					this.grouped.set(linterName, [issue]);
				} else {
					group.push(issue);
				}
				yield issue;
			}
		}
	}

	/** Issues of the most recent run, in yield order (copy). */
	get issues(): LinterIssue[] {
		return [...this.collected];
	}

	/** Issues of the most recent run grouped by linter name; linters without issues are absent (copy). */
	get issuesByLinter(): Map<string, LinterIssue[]> {
		return new Map(
			Array.from(this.grouped, ([name, list]) => [name, [...list]] as const),
		);
	}

	getHighestSeverity(): Severity | undefined {
		return maxSeverity(this.collected.map((issue) => issue.severity));
	}

	/**
	 * Exit status of the most recent run.
	 *
	 * @invariant result = ERROR ⇔ highest severity = ERROR; warnings alone stay OK
	 */
	summary(): ExitCode {
		return this.getHighestSeverity() === Severity.ERROR
			? ExitCode.ERROR
			: ExitCode.OK;
	}

	private registryOf(): LinterRegistry {
		const own: unknown = Reflect.get(this.constructor, "registry");
		return own instanceof LinterRegistry ? own : LinterOrchestrator.registry;
	}
}
