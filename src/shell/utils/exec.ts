// CHANGE: Common execFile + Effect pattern for external commands
// WHY: External tools (tar) run without a shell; failures surface as typed ExecError values
// REF: shell/artifact/unpack.ts
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<string, ExecError, never>
// INVARIANT: ∀ command: execCommand(command, args) → stdout ∨ ExecError
// COMPLEXITY: O(1) time, O(n) space where n = stdout length

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";
import { describeExecFailure } from "../../core/types/index.js";

const execFileAsync = promisify(execFile);

/**
 * Execute a command with arguments (no shell interpolation).
 *
 * @param command - Executable name or path
 * @param args - Arguments passed verbatim
 * @returns Effect with stdout or ExecError
 *
 * @pure false (executes external command)
 * @effect Effect<string, ExecError, never>
 * @complexity O(n) where n = command execution time
 */
export function execCommand(
	command: string,
	args: readonly string[],
): Effect.Effect<string, ExecError> {
	return Effect.tryPromise({
		try: () =>
			execFileAsync(command, [...args], {
				encoding: "utf8",
				maxBuffer: 10 * 1024 * 1024,
			}),
		catch: (error) =>
			new ExecError({
				command: [command, ...args].join(" "),
				detail: error instanceof Error ? describeExecFailure(error) : String(error),
			}),
	}).pipe(Effect.map(({ stdout }) => stdout));
}
