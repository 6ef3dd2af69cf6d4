// CHANGE: Testcraft application wiring on top of the generic orchestrator
// WHY: Apps add their linters through the selection strategy instead of editing the engine
// REF: shell/linters/testcraft.ts
// PURITY: APP (composition only)
// INVARIANT: Injected linters are appended after registered ones and never duplicated
// COMPLEXITY: O(k) per selection where k = candidates

import {
	type LinterClass,
	LinterOrchestrator,
	type SelectLinters,
	Stage,
} from "../core/lint/index.js";
import type { AppMetadata } from "../core/types/index.js";
import { loadProjectIgnoreConfig } from "../shell/config/ignore-file.js";
import {
	EmptyArtifactLinter,
	MissingVersionLinter,
} from "../shell/linters/testcraft.js";
import { createConsoleLogger, type Logger } from "../shell/utils/logger.js";

export const TESTCRAFT: AppMetadata = { name: "testcraft" };

const EXTRA_LINTERS: ReadonlyMap<Stage, readonly LinterClass[]> = new Map<
	Stage,
	readonly LinterClass[]
>([
	[Stage.PRE, [MissingVersionLinter]],
	[Stage.POST, [EmptyArtifactLinter]],
]);

/** Selection strategy appending testcraft's linters for the stage. */
export const selectTestcraftLinters: SelectLinters = (stage, _ctx, candidates) => {
	const selected = [...candidates];
	for (const extra of EXTRA_LINTERS.get(stage) ?? []) {
		if (!selected.includes(extra)) selected.push(extra);
	}
	return selected;
};

/**
 * Orchestrator for testcraft: registered linters plus testcraft's own, and
 * project ignore files discovered in the project directory.
 */
export function createTestcraftOrchestrator(
	logger: Logger = createConsoleLogger(),
): LinterOrchestrator {
	return new LinterOrchestrator({
		selectLinters: selectTestcraftLinters,
		projectIgnores: (projectDir) => loadProjectIgnoreConfig(projectDir, logger),
		debug: logger.debug,
	});
}
