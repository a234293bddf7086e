// CHANGE: Typed domain error ADT for the Functional Core using Effect.Data
// WHY: Errors are explicit values in signatures, not runtime exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * A listed input file could not be opened or read.
 *
 * @pure true (Data class)
 * @invariant path.length > 0
 */
export class FileAccessError extends Data.TaggedError("FileAccessError")<{
	readonly path: string;
	readonly reason: string;
}> {}

/**
 * Unrecognized `--`-prefixed command line token.
 *
 * @pure true (Data class)
 * @invariant option.startsWith("--")
 */
export class InvalidOptionError extends Data.TaggedError("InvalidOptionError")<{
	readonly option: string;
}> {}

/**
 * Unrecognized class name inside a `--chars` spec.
 *
 * @pure true (Data class)
 */
export class InvalidFilterError extends Data.TaggedError("InvalidFilterError")<{
	readonly name: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError = FileAccessError | InvalidOptionError | InvalidFilterError;
