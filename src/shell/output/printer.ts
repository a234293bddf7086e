// CHANGE: Console output isolated in the shell
// WHY: CORE builds lines; only this module writes them to stdout
// PURITY: SHELL
// EFFECT: Effect<void, never>

import { Effect } from "effect";

/**
 * Print each line to standard output.
 *
 * @pure false (console output)
 */
export const printLines = (lines: readonly string[]): Effect.Effect<void> =>
	Effect.sync(() => {
		for (const line of lines) console.log(line);
	});

/**
 * Print a single diagnostic line to standard output.
 */
export const printDiagnostic = (message: string): Effect.Effect<void> =>
	printLines([message]);
