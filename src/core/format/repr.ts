// CHANGE: Quoted/escaped display form of a single character
// WHY: Whitespace and control characters must stay visible in the table
// PURITY: CORE
// INVARIANT: Output is printable and contains no line breaks
// COMPLEXITY: O(1)

const NAMED_ESCAPES: Readonly<Record<string, string>> = {
	"\\": "\\\\",
	"\n": "\\n",
	"\r": "\\r",
	"\t": "\\t",
};

// Control, format, surrogate, private-use, unassigned and separator code points.
const NON_PRINTABLE = /^[\p{C}\p{Z}]$/u;

const hex = (code: number, width: number): string =>
	code.toString(16).padStart(width, "0");

function escapeCodePoint(code: number): string {
	if (code <= 0xff) return `\\x${hex(code, 2)}`;
	if (code <= 0xffff) return `\\u${hex(code, 4)}`;
	return `\\U${hex(code, 8)}`;
}

function escapeChar(ch: string): string {
	const named = NAMED_ESCAPES[ch];
	if (named !== undefined) return named;
	if (ch !== " " && NON_PRINTABLE.test(ch)) {
		return escapeCodePoint(ch.codePointAt(0) ?? 0);
	}
	return ch;
}

/**
 * Quote a character for display: `'a'`, `'\n'`, `"'"`, `'\x00'`.
 *
 * @pure true
 *
 * @example
 * ```ts
 * reprChar("a");  // "'a'"
 * reprChar("'");  // "\"'\""
 * reprChar("\t"); // "'\\t'"
 * ```
 */
export function reprChar(ch: string): string {
	const quote = ch === "'" ? '"' : "'";
	return `${quote}${escapeChar(ch)}${quote}`;
}
