// CHANGE: Explicit linter registry partitioned by stage
// WHY: Applications register their linters once at startup; tests snapshot/restore around each case
// REF: LinterOrchestrator.registry (class-level, shared by subclasses)
// PURITY: CORE (owns mutable state, performs no IO)
// INVARIANT: Each stage list keeps registration order; duplicates are kept
// COMPLEXITY: O(1) register, O(n) snapshot/restore

import { type LinterClass, validateLinterClass } from "./linter.js";
import { STAGES, type Stage } from "./types.js";

/** Frozen copy of the registry contents. */
export type RegistrySnapshot = ReadonlyMap<Stage, readonly LinterClass[]>;

export class LinterRegistry {
	private readonly byStage = new Map<Stage, LinterClass[]>(
		STAGES.map((stage) => [stage, []]),
	);

	/**
	 * Validate and append a linter class to the list of its stage.
	 *
	 * @throws LinterConfigurationError for abstract or malformed classes
	 */
	register(cls: LinterClass): void {
		validateLinterClass(cls);
		this.listFor(cls.stage).push(cls);
	}

	/** Registered classes for a stage, in registration order (copy). */
	forStage(stage: Stage): LinterClass[] {
		return [...this.listFor(stage)];
	}

	snapshot(): RegistrySnapshot {
		return new Map(
			STAGES.map((stage) => [stage, Object.freeze(this.forStage(stage))]),
		);
	}

	/**
	 * Replace all stage lists with the contents of a snapshot.
	 *
	 * @postcondition ∀stage: forStage(stage) equals snapshot.get(stage) element-wise
	 */
	restore(snapshot: RegistrySnapshot): void {
		for (const stage of STAGES) {
			this.byStage.set(stage, [...(snapshot.get(stage) ?? [])]);
		}
	}

	clear(): void {
		for (const stage of STAGES) this.byStage.set(stage, []);
	}

	private listFor(stage: Stage): LinterClass[] {
		let list = this.byStage.get(stage);
		if (list === undefined) {
			list = [];
			this.byStage.set(stage, list);
		}
		return list;
	}
}
