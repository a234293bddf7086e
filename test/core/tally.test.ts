// CHANGE: Deterministic and property-based tests for the tally stage
// FORMAT THEOREM: ∀t ∈ String: Σ tallyText(t) = |normalize(t)| in code points
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	splitLinesKeepEnds,
	tallyLines,
	tallyText,
	totalChars,
} from "../../src/core/tally.js";

describe("splitLinesKeepEnds", () => {
	it("keeps the terminator on every terminated line", () => {
		expect(splitLinesKeepEnds("ab\ncd\n")).toEqual(["ab\n", "cd\n"]);
	});

	it("leaves the last line bare when the text has no trailing newline", () => {
		expect(splitLinesKeepEnds("ab\ncd")).toEqual(["ab\n", "cd"]);
	});

	it("normalizes CRLF and lone CR to LF", () => {
		expect(splitLinesKeepEnds("a\r\nb\rc")).toEqual(["a\n", "b\n", "c"]);
	});

	it("yields empty lines as a lone terminator", () => {
		expect(splitLinesKeepEnds("\n\nx")).toEqual(["\n", "\n", "x"]);
	});

	it("returns no lines for empty text", () => {
		expect(splitLinesKeepEnds("")).toEqual([]);
	});
});

describe("tallyLines", () => {
	it("counts lowercased characters", () => {
		const table = tallyText("aA1!");
		expect([...table.entries()].sort()).toEqual([
			["!", 1],
			["1", 1],
			["a", 2],
		]);
	});

	it("counts whitespace and line terminators", () => {
		const table = tallyText("a b\n");
		expect(table.get(" ")).toBe(1);
		expect(table.get("\n")).toBe(1);
		expect(totalChars(table)).toBe(4);
	});

	it("counts astral characters as one entry each", () => {
		const table = tallyText("😀😀");
		expect(table.get("😀")).toBe(2);
		expect(table.size).toBe(1);
	});

	it("extends a base table without mutating it", () => {
		const base = tallyText("aa");
		const extended = tallyLines(["ab"], base);
		expect(base.get("a")).toBe(2);
		expect(extended.get("a")).toBe(3);
		expect(extended.get("b")).toBe(1);
	});

	it("produces an empty table for no input", () => {
		const table = tallyLines([]);
		expect(table.size).toBe(0);
		expect(totalChars(table)).toBe(0);
	});

	it("sums to the number of characters read", () => {
		fc.assert(
			fc.property(fc.array(fc.string({ unit: "grapheme-ascii" })), (lines) => {
				const read = lines.reduce((acc, line) => acc + [...line].length, 0);
				expect(totalChars(tallyLines(lines))).toBe(read);
			}),
		);
	});

	it("is idempotent over the same input", () => {
		fc.assert(
			fc.property(fc.string(), (text) => {
				expect(tallyText(text)).toEqual(tallyText(text));
			}),
		);
	});
});
