// CHANGE: Typed domain error ADT for the linter using Effect.Data
// WHY: Shell operations fail with values discriminated by `_tag`; the core throws only configuration errors
// REF: Effect Data API
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (Effect failures), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * A linter class cannot be registered: abstract, or missing a valid name/stage.
 *
 * Thrown (not returned) by registration so a malformed linter never enters the registry.
 *
 * @pure true (Data class)
 * @invariant message.length > 0
 */
export class LinterConfigurationError extends Data.TaggedError(
	"LinterConfigurationError",
)<{
	readonly linter: string;
	readonly message: string;
}> {}

/**
 * Malformed `linter:id` / `linter:id=glob` rule.
 *
 * @invariant rule is the raw text as typed by the user
 */
export class InvalidIgnoreRule extends Data.TaggedError("InvalidIgnoreRule")<{
	readonly rule: string;
	readonly reason: string;
}> {}

/**
 * Command line could not be understood.
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Project file could not be located.
 */
export class ProjectNotFound extends Data.TaggedError("ProjectNotFound")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Packed artifact missing or not extractable.
 */
export class ArtifactError extends Data.TaggedError("ArtifactError")<{
	readonly artifact: string;
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 * @complexity O(1)
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Command execution error
 *
 * @pure true (Data class)
 * @invariant command.length > 0 ∧ detail.length > 0
 * @complexity O(1)
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 */
export type AppError =
	| InvalidIgnoreRule
	| UsageError
	| ProjectNotFound
	| ArtifactError
	| FSError
	| ExecError;

/**
 * Narrow an unknown failure (e.g. a squashed Effect cause) to AppError.
 *
 * @pure true
 */
export function isAppError(value: unknown): value is AppError {
	return (
		value instanceof InvalidIgnoreRule ||
		value instanceof UsageError ||
		value instanceof ProjectNotFound ||
		value instanceof ArtifactError ||
		value instanceof FSError ||
		value instanceof ExecError
	);
}

/**
 * Human readable one-liner for an application error.
 *
 * @pure true
 */
export function describeAppError(error: AppError): string {
	return match(error)
		.with(
			{ _tag: "InvalidIgnoreRule" },
			(e) => `Invalid lint ignore rule '${e.rule}': ${e.reason}`,
		)
		.with({ _tag: "UsageError" }, (e) => e.detail)
		.with({ _tag: "ProjectNotFound" }, (e) => `${e.detail} (${e.path})`)
		.with({ _tag: "ArtifactError" }, (e) => `Artifact ${e.artifact}: ${e.detail}`)
		.with({ _tag: "FS" }, (e) =>
			e.path === undefined ? e.detail : `${e.detail} (${e.path})`,
		)
		.with({ _tag: "Exec" }, (e) => `Command failed: ${e.command}: ${e.detail}`)
		.exhaustive();
}
