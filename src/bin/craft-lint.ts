#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns an exit code as a value; BIN decides how the process ends
// FORMAT THEOREM: ∀run: exactly one process.exit(code) with code ∈ {0, 1, 2, 64}
// PURITY: SHELL (BIN layer)
// INVARIANT: Lint ERROR → 2; usage error → 64; other failures (including linter crashes) → 1
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Cause, Effect, Either, Exit } from "effect";

import { runLint } from "../app/runLint.js";
import { createTestcraftOrchestrator, TESTCRAFT } from "../app/testcraft.js";
import { describeAppError, isAppError } from "../core/errors.js";
import { parseCLIArgs, USAGE } from "../shell/config/cli.js";
import { createConsoleLogger } from "../shell/utils/logger.js";

const EX_USAGE = 64;

/**
 * Parse arguments, run the lint command and map the outcome to a process exit code.
 *
 * @pure false (console I/O)
 */
async function main(): Promise<number> {
	const parsed = parseCLIArgs();
	if (Either.isLeft(parsed)) {
		console.error(describeAppError(parsed.left));
		console.error(USAGE);
		return EX_USAGE;
	}
	const options = parsed.right;
	if (options.help) {
		console.log(USAGE);
		return 0;
	}

	const logger = createConsoleLogger();
	const exit = await Effect.runPromiseExit(
		runLint(options, {
			app: TESTCRAFT,
			orchestrator: createTestcraftOrchestrator(logger),
			logger,
		}),
	);
	if (Exit.isSuccess(exit)) return exit.value;

	// Typed failures get one line, crashes (linter exceptions) get the original stack
	const error = Cause.squash(exit.cause);
	if (isAppError(error)) {
		console.error(`Error: ${describeAppError(error)}`);
	} else {
		console.error(error instanceof Error ? (error.stack ?? String(error)) : String(error));
	}
	return 1;
}

void main().then((code) => {
	// Shell boundary: single process exit
	process.exit(code);
});
