// CHANGE: Linter contract (abstract base + constructor type + validation)
// WHY: Applications contribute linters as classes; the orchestrator instantiates them per run
// REF: LinterOrchestrator.register
// PURITY: CORE
// INVARIANT: A registrable class implements run, declares a non-empty linterName and a Stage
// COMPLEXITY: O(depth of prototype chain) for validation

import { LinterConfigurationError } from "../errors.js";
import {
	isStage,
	type LintContext,
	type LinterIssue,
	type Stage,
} from "./types.js";

/**
 * Base class for all linters.
 *
 * Subclasses declare two statics:
 * - `linterName`: stable identifier, used as ignore-config key and report group
 * - `stage`: `Stage.PRE` or `Stage.POST`
 *
 * (`name` is not used: it collides with the built-in `Function.name`.)
 *
 * @example
 * ```ts
 * class ReadmeLinter extends AbstractLinter {
 *   static readonly linterName = "docs.readme";
 *   static readonly stage = Stage.PRE;
 *
 *   *run(ctx: LintContext): Iterable<LinterIssue> {
 *     if (!existsSync(join(ctx.projectDir, "README.md"))) {
 *       yield makeIssue({ id: "DOC001", message: "missing README", severity: Severity.INFO });
 *     }
 *   }
 * }
 * ```
 */
export abstract class AbstractLinter {
	/**
	 * Inspect the context and report issues, lazily or eagerly.
	 *
	 * Must not mutate `ctx`. The returned sequence is consumed once, in order.
	 */
	abstract run(ctx: LintContext): Iterable<LinterIssue>;

	/** Declared name of the concrete class of this instance. */
	get linterName(): string {
		return readStatic(this.constructor, "linterName") ?? "";
	}
}

/**
 * Concrete linter class as accepted by the registry.
 *
 * @invariant Abstract classes are not assignable (no public `new`)
 */
export interface LinterClass {
	readonly linterName: string;
	readonly stage: Stage;
	new (): AbstractLinter;
}

function readStatic(target: object, key: string): string | undefined {
	const value: unknown = Reflect.get(target, key);
	return typeof value === "string" ? value : undefined;
}

function implementsRun(cls: LinterClass): boolean {
	let proto: unknown = cls.prototype;
	while (proto !== null && typeof proto === "object") {
		if (proto === AbstractLinter.prototype) return false;
		if (typeof Reflect.getOwnPropertyDescriptor(proto, "run")?.value === "function") {
			return true;
		}
		proto = Reflect.getPrototypeOf(proto);
	}
	return false;
}

/**
 * Reject classes that must never reach the registry.
 *
 * @throws LinterConfigurationError when the class is abstract (no `run` anywhere
 *   below AbstractLinter), or `linterName` / `stage` are missing or invalid
 *
 * @pure true (throws, no other effects)
 */
export function validateLinterClass(cls: LinterClass): void {
	const label = cls.name.length > 0 ? cls.name : "<anonymous>";
	if (!implementsRun(cls)) {
		throw new LinterConfigurationError({
			linter: label,
			message: `Invalid linter class ${label}: abstract classes cannot be registered`,
		});
	}
	const linterName: unknown = cls.linterName;
	const stage: unknown = cls.stage;
	if (typeof linterName !== "string" || linterName.length === 0 || !isStage(stage)) {
		throw new LinterConfigurationError({
			linter: label,
			message: `Invalid linter class ${label}: missing/invalid name or stage`,
		});
	}
}
