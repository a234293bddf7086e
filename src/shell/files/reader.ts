// CHANGE: Effect-wrapped file reading for the tally stage
// WHY: File IO is a SHELL effect; failures surface as typed FileAccessError values
// PURITY: SHELL
// EFFECT: Effect<readonly string[], FileAccessError>
// INVARIANT: Files are read one at a time, in listed order; first failure aborts the rest
// COMPLEXITY: O(n) where n = total bytes read

import { readFile } from "node:fs/promises";

import { Effect } from "effect";

import { FileAccessError } from "../../core/errors.js";
import { splitLinesKeepEnds } from "../../core/tally.js";

// Invalid byte sequences throw instead of decoding to U+FFFD; a BOM is kept as a character.
const dec = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

const reasonOf = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Read one file as strict UTF-8 text, split into lines that keep their terminators.
 *
 * Undecodable bytes fail the read like a missing file would.
 *
 * @pure false (file system I/O)
 * @effect Effect<readonly string[], FileAccessError>
 */
export function readInputLines(
	path: string,
): Effect.Effect<readonly string[], FileAccessError> {
	return Effect.tryPromise({
		try: async () => dec.decode(await readFile(path)),
		catch: (error) => new FileAccessError({ path, reason: reasonOf(error) }),
	}).pipe(Effect.map(splitLinesKeepEnds));
}

/**
 * Read every file sequentially and concatenate their lines.
 *
 * @effect Effect<readonly string[], FileAccessError>
 * @postcondition failure on file k ⇒ files k+1.. are never opened
 */
export function readAllInputs(
	paths: readonly string[],
): Effect.Effect<readonly string[], FileAccessError> {
	return Effect.forEach(paths, readInputLines).pipe(
		Effect.map((perFile) => perFile.flat()),
	);
}
