// CHANGE: Pure character tally over lines of text
// WHY: Counting is deterministic and belongs to CORE; SHELL only supplies the lines
// FORMAT THEOREM: ∀lines: Σ tallyLines(lines).values() = Σ |lower(line)| (in code points)
// PURITY: CORE
// INVARIANT: Input table is never mutated; every stored count is > 0
// COMPLEXITY: O(n) where n = total characters

import type { FrequencyTable } from "./models.js";

/**
 * Split text into lines the way text-mode line iteration yields them.
 *
 * `\r\n` and a lone `\r` are both read as `\n`. Each line keeps its terminator;
 * the last line has none when the text does not end with a newline.
 *
 * @pure true
 * @invariant splitLinesKeepEnds(t).join("") = t with CRLF/CR normalized to LF
 * @complexity O(n)
 *
 * @example
 * ```ts
 * splitLinesKeepEnds("a\r\nb"); // ["a\n", "b"]
 * splitLinesKeepEnds("");       // []
 * ```
 */
export function splitLinesKeepEnds(text: string): readonly string[] {
	const normalized = text.replace(/\r\n?/g, "\n");
	if (normalized.length === 0) return [];
	const lines = normalized.split("\n").map((line) => `${line}\n`);
	// The element after the last "\n" is either "" (trailing newline) or an unterminated line.
	const last = lines.pop() ?? "\n";
	const tail = last.slice(0, -1);
	return tail.length > 0 ? [...lines, tail] : lines;
}

/**
 * Count every character of every lowercased line.
 *
 * @param base - Existing table to extend (left untouched)
 *
 * @pure true
 * @invariant 'A' and 'a' both increment the entry for 'a'
 * @complexity O(n)
 */
export function tallyLines(
	lines: Iterable<string>,
	base: FrequencyTable = new Map(),
): FrequencyTable {
	const table = new Map(base);
	for (const line of lines) {
		for (const ch of line.toLowerCase()) {
			table.set(ch, (table.get(ch) ?? 0) + 1);
		}
	}
	return table;
}

/**
 * Tally a whole text as if it were read line by line.
 */
export const tallyText = (text: string): FrequencyTable =>
	tallyLines(splitLinesKeepEnds(text));

/**
 * Total number of characters recorded in the table.
 *
 * @pure true
 * @invariant totalChars(new Map()) = 0
 */
export function totalChars(table: FrequencyTable): number {
	let total = 0;
	for (const count of table.values()) total += count;
	return total;
}
