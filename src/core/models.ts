// CHANGE: Introduce Functional Core domain models (pure, immutable)
// WHY: CORE holds only pure types and invariants; SHELL and APP build on them
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Character (single code point, already lowercased) → occurrence count.
 *
 * @remarks
 * - @invariant ∀ (ch, n) ∈ table: n > 0
 * - @invariant Σ n = number of characters read, line terminators included
 */
export type FrequencyTable = ReadonlyMap<string, number>;

/**
 * Named predefined character class.
 */
export type CharClassName = "symbols" | "digits" | "letters";

/**
 * Parsed `--chars` option.
 *
 * `observed` is the dynamic `all` filter: its members are whatever keys the
 * tally ends up holding, never a static alphabet.
 */
export type CharFilter =
	| { readonly kind: "observed" }
	| {
			readonly kind: "classes";
			readonly classes: readonly CharClassName[];
			readonly chars: ReadonlySet<string>;
	  };

/**
 * One row of the report.
 *
 * @remarks
 * - @invariant rank ≥ 1, count > 0
 * - @invariant percent = (100 / total) * count
 */
export interface RankedEntry {
	readonly rank: number;
	readonly char: string;
	readonly count: number;
	readonly percent: number;
}

/**
 * Run configuration, built once at the entry point and passed by value.
 */
export interface CountOptions {
	readonly chars: string;
	readonly inputFiles: readonly string[];
}

/**
 * Final state of a run, used to derive the exit code.
 */
export type RunOutcome =
	| { readonly _tag: "Reported"; readonly totalChars: number }
	| { readonly _tag: "Help" }
	| { readonly _tag: "Failed"; readonly errorTag: string };
