// CHANGE: Ranking and table formatting for the frequency report
// WHY: Output must be deterministic; keep it pure so it can be asserted line by line
// FORMAT THEOREM: ∀c1,c2: count(c1) = count(c2) ∧ cp(c1) < cp(c2) → rank(c1) < rank(c2)
// PURITY: CORE
// INVARIANT: Percentages use the full tally total, not the filtered subtotal
// COMPLEXITY: O(k log k) where k = |filter|

import { pipe } from "effect";

import { reprChar } from "./format/repr.js";
import type { FrequencyTable, RankedEntry } from "./models.js";
import { totalChars } from "./tally.js";

export const REPORT_HEADER = "Rank  char    count        %";

/**
 * Ascending code point order (UTF-16 unit order differs for astral characters).
 */
export const compareCodePoints = (a: string, b: string): number =>
	(a.codePointAt(0) ?? 0) - (b.codePointAt(0) ?? 0);

/**
 * Rank filtered characters by descending count, ties by ascending code point.
 *
 * Zero-count characters are dropped; ranks are 1..n without gaps. An empty
 * table yields no rows, so no percentage is ever divided by zero.
 *
 * @pure true
 * @complexity O(k log k)
 */
export const rankEntries = (
	table: FrequencyTable,
	chars: ReadonlySet<string>,
): readonly RankedEntry[] => {
	const total = totalChars(table);
	return pipe(
		[...chars],
		// Stable sort: equal counts keep the code point order of the first pass.
		(list) => list.sort(compareCodePoints),
		(list) => list.sort((a, b) => (table.get(b) ?? 0) - (table.get(a) ?? 0)),
		(list) => list.filter((ch) => (table.get(ch) ?? 0) > 0),
		(list) =>
			list.map((ch, index): RankedEntry => {
				const count = table.get(ch) ?? 0;
				return {
					rank: index + 1,
					char: ch,
					count,
					percent: (100.0 / total) * count,
				};
			}),
	);
};

const padStartCodePoints = (text: string, width: number): string =>
	" ".repeat(Math.max(0, width - [...text].length)) + text;

/**
 * Percent with 3 decimals, rounding exact binary halves to the even digit.
 *
 * `toFixed` rounds such ties up (0.0625 → "0.063"); printf-style `%.3f` gives "0.062".
 *
 * @pure true
 * @precondition value ≥ 0 and finite
 */
export function formatPercent(value: number): string {
	const fixed = value.toFixed(3);
	// A tie at the 4th decimal is exactly an odd multiple of 1/16.
	const sixteenths = value * 16;
	if (!Number.isInteger(sixteenths) || sixteenths % 2 === 0) return fixed;
	const down = Math.floor(value * 1000);
	const even = down % 2 === 0 ? down : down + 1;
	return (even / 1000).toFixed(3);
}

/**
 * One table row: `#1     '!'        1   50.000`.
 *
 * @pure true
 */
export function formatRow(entry: RankedEntry): string {
	const rank = `#${String(entry.rank).padEnd(3)}`;
	const char = padStartCodePoints(reprChar(entry.char), 5);
	const count = String(entry.count).padStart(8);
	const percent = formatPercent(entry.percent).padStart(8);
	return `${rank} ${char} ${count} ${percent}`;
}

/**
 * Full report: header, ranked rows, blank line, total, blank line.
 *
 * @pure true
 * @invariant result[0] = REPORT_HEADER
 */
export function formatReport(
	table: FrequencyTable,
	chars: ReadonlySet<string>,
): readonly string[] {
	return [
		REPORT_HEADER,
		...rankEntries(table, chars).map(formatRow),
		"",
		`total chars: ${totalChars(table)}`,
		"",
	];
}
