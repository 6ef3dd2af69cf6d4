// CHANGE: Console logger for the shell with an env-gated debug channel
// WHY: Keep console access in SHELL; debug output only when CRAFT_LINT_DEBUG=1
// REF: lint command output, orchestrator debug sink
// PURITY: SHELL
// INVARIANT: debug() writes nothing unless the flag is set
// COMPLEXITY: O(1)

export interface Logger {
	readonly message: (text: string) => void;
	readonly debug: (text: string) => void;
}

const ENV: NodeJS.ProcessEnv & { CRAFT_LINT_DEBUG?: string } = process.env;

export function isDebugEnabled(env: NodeJS.ProcessEnv = ENV): boolean {
	return env["CRAFT_LINT_DEBUG"] === "1";
}

/**
 * Logger writing messages to stdout and debug lines to stderr.
 *
 * @param debugEnabled - defaults to the CRAFT_LINT_DEBUG flag
 */
export function createConsoleLogger(
	debugEnabled: boolean = isDebugEnabled(),
): Logger {
	return {
		message: (text) => {
			console.log(text);
		},
		debug: (text) => {
			if (debugEnabled) console.error("[craft-lint]", text);
		},
	};
}

/** Logger that records every line; for tests and programmatic callers. */
export interface MemoryLogger extends Logger {
	readonly lines: {
		readonly message: string[];
		readonly debug: string[];
	};
}

export function createMemoryLogger(): MemoryLogger {
	const lines: MemoryLogger["lines"] = { message: [], debug: [] };
	return {
		lines,
		message: (text) => {
			lines.message.push(text);
		},
		debug: (text) => {
			lines.debug.push(text);
		},
	};
}
