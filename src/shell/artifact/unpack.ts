// CHANGE: Unpack a packed artifact into a temporary directory for post-linting
// WHY: Post-linters inspect a directory tree; the temp directory must not outlive the lint pass
// REF: --post ARTIFACT
// PURITY: SHELL (filesystem, external tar)
// EFFECT: Effect<A, ArtifactError | FSError | E>
// INVARIANT: The temporary directory is removed whether `use` succeeds, fails or is interrupted
// COMPLEXITY: O(|artifact|)

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Effect } from "effect";

import { ArtifactError, FSError } from "../../core/errors.js";
import { execCommand } from "../utils/exec.js";
import type { Logger } from "../utils/logger.js";

function makeTempDir(prefix: string): Effect.Effect<string, FSError> {
	const template = path.join(os.tmpdir(), prefix);
	return Effect.try({
		try: () => fs.mkdtempSync(template),
		catch: (error) =>
			new FSError({
				detail: `Cannot create temporary directory: ${error instanceof Error ? error.message : String(error)}`,
				path: template,
			}),
	});
}

function removeDir(dir: string, logger: Logger): Effect.Effect<void> {
	return Effect.sync(() => {
		fs.rmSync(dir, { recursive: true, force: true });
		logger.debug(`Removed ${dir}`);
	});
}

/**
 * Extract a tarball into `dir` with the system tar (compression auto-detected).
 */
export function extractArtifact(
	artifact: string,
	dir: string,
): Effect.Effect<void, ArtifactError> {
	return execCommand("tar", ["-xf", artifact, "-C", dir]).pipe(
		Effect.mapError(
			(error) =>
				new ArtifactError({
					artifact,
					detail: `is not a supported tarball: ${error.detail}`,
				}),
		),
		Effect.asVoid,
	);
}

/**
 * Run `use` against the unpacked contents of `artifact`.
 *
 * @param artifact - Path to the packed artifact
 * @param prefix - Temporary directory prefix, e.g. "testcraft-lint-"
 * @param use - Consumer of the unpacked directory
 *
 * @pure false
 * @effect Effect<A, ArtifactError | FSError | E>
 */
export function withUnpackedArtifact<A, E>(
	artifact: string,
	prefix: string,
	logger: Logger,
	use: (dir: string) => Effect.Effect<A, E>,
): Effect.Effect<A, ArtifactError | FSError | E> {
	const checked = Effect.suspend(() =>
		fs.statSync(artifact, { throwIfNoEntry: false })?.isFile() === true
			? Effect.void
			: Effect.fail(new ArtifactError({ artifact, detail: "does not exist" })),
	);
	return checked.pipe(
		Effect.zipRight(
			Effect.acquireUseRelease(
				makeTempDir(prefix),
				(dir) =>
					Effect.sync(() => logger.debug(`Unpacking ${artifact} into ${dir}`)).pipe(
						Effect.zipRight(extractArtifact(artifact, dir)),
						Effect.zipRight(use(dir)),
					),
				(dir) => removeDir(dir, logger),
			),
		),
	);
}
