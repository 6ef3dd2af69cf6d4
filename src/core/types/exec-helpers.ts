// CHANGE: Common exec error handling helper
// WHY: Child-process failures carry their useful text on stderr/stdout, not in the message
// REF: shell/utils/exec.ts
// SOURCE: n/a

import type { ChildProcessFailure } from "./config.js";

/**
 * Best description of a failed command: stderr, then stdout, then the error message.
 *
 * @param error Error raised by execFile
 * @returns Non-empty trimmed text
 *
 * @pure true
 * @invariant result.length > 0 whenever error.message.length > 0
 */
export function describeExecFailure(error: ChildProcessFailure): string {
	for (const stream of [error.stderr, error.stdout]) {
		if (stream !== undefined && stream.trim().length > 0) {
			return stream.trim();
		}
	}
	return error.message;
}
