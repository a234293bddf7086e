// CHANGE: Parse and resolve the `--chars` filter in the Functional Core
// WHY: Class names are user input; an unknown name is a typed error value, not a throw
// FORMAT THEOREM: ∀a,b ∈ Classes: chars(a+b) = chars(a) ∪ chars(b)
// PURITY: CORE
// INVARIANT: `all` stays dynamic — resolved against observed keys only
// COMPLEXITY: O(k) where k = |spec| + |alphabet|

import { Either } from "effect";

import { InvalidFilterError } from "./errors.js";
import type {
	CharClassName,
	CharFilter,
	FrequencyTable,
} from "./models.js";

/**
 * Literal membership of each named class.
 */
export const CHAR_CLASSES: Readonly<Record<CharClassName, string>> = {
	symbols: "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~",
	digits: "0123456789",
	letters: "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz",
};

/** Filter used when `--chars` is not given. */
export const DEFAULT_CHARS = "symbols+digits";

const isCharClassName = (name: string): name is CharClassName =>
	Object.prototype.hasOwnProperty.call(CHAR_CLASSES, name);

/**
 * Parse a `--chars` spec such as `symbols+digits` or `all`.
 *
 * Names are case-insensitive; the error carries the name as written.
 *
 * @pure true
 * @returns Right(filter) or Left(InvalidFilterError) for the first unknown name
 *
 * @example
 * ```ts
 * parseCharsOption("DIGITS");  // Right({ kind: "classes", classes: ["digits"], ... })
 * parseCharsOption("bogus");   // Left(InvalidFilterError { name: "bogus" })
 * ```
 */
export function parseCharsOption(
	spec: string,
): Either.Either<CharFilter, InvalidFilterError> {
	if (spec.toLowerCase() === "all") {
		return Either.right<CharFilter>({ kind: "observed" });
	}

	const classes: CharClassName[] = [];
	const chars = new Set<string>();
	for (const name of spec.split("+")) {
		const key = name.toLowerCase();
		if (!isCharClassName(key)) {
			return Either.left(new InvalidFilterError({ name }));
		}
		classes.push(key);
		for (const ch of CHAR_CLASSES[key]) chars.add(ch);
	}
	return Either.right<CharFilter>({ kind: "classes", classes, chars });
}

/**
 * Concrete set of characters eligible for display.
 *
 * @pure true
 * @invariant filter.kind = "observed" → result = keys(table)
 */
export function resolveFilter(
	filter: CharFilter,
	table: FrequencyTable,
): ReadonlySet<string> {
	return filter.kind === "observed" ? new Set(table.keys()) : filter.chars;
}
