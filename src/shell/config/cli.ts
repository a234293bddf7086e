// CHANGE: CLI argument parsing returning a typed result instead of exiting
// WHY: Only BIN terminates the process; the parser reports bad flags as values
// PURITY: SHELL (input boundary; pure over the given argv)
// INVARIANT: Input file order is preserved; `--chars` keeps its last value
// COMPLEXITY: O(n) where n = |argv|

import { Either } from "effect";

import { InvalidOptionError } from "../../core/errors.js";
import { DEFAULT_CHARS } from "../../core/filter.js";
import type { CountOptions } from "../../core/models.js";

/**
 * Parsed command: either count the given files, or show usage.
 */
export type CliCommand =
	| { readonly _tag: "Count"; readonly options: CountOptions }
	| { readonly _tag: "Help" };

interface ArgState {
	readonly chars: string;
	readonly inputFiles: readonly string[];
}

// CHANGE: Handler map keyed by option name
// WHY: Adding a flag means adding an entry, not another branch
type OptionHandler = (value: string, current: ArgState) => ArgState;

const optionHandlers: ReadonlyMap<string, OptionHandler> = new Map<
	string,
	OptionHandler
>([
	["--chars", (value, current) => ({ ...current, chars: value })],
]);

function processArgument(
	arg: string,
	current: ArgState,
): Either.Either<ArgState, InvalidOptionError> {
	if (!arg.startsWith("--")) {
		return Either.right({
			...current,
			inputFiles: [...current.inputFiles, arg],
		});
	}

	const eq = arg.indexOf("=");
	if (eq < 0) return Either.left(new InvalidOptionError({ option: arg }));

	const handler = optionHandlers.get(arg.slice(0, eq));
	if (handler === undefined) {
		return Either.left(new InvalidOptionError({ option: arg }));
	}
	return Either.right(handler(arg.slice(eq + 1), current));
}

/**
 * Parse command line arguments (without the node/script prefix).
 *
 * @returns Right(Count | Help) or Left(InvalidOptionError) for the first bad flag
 *
 * @example
 * ```ts
 * // Command: char-freq --chars=digits notes.txt
 * parseCliArgs(["--chars=digits", "notes.txt"]);
 * // Right({ _tag: "Count", options: { chars: "digits", inputFiles: ["notes.txt"] } })
 * ```
 */
export function parseCliArgs(
	argv: readonly string[],
): Either.Either<CliCommand, InvalidOptionError> {
	let state: ArgState = { chars: DEFAULT_CHARS, inputFiles: [] };

	for (const arg of argv) {
		const result = processArgument(arg, state);
		if (Either.isLeft(result)) return Either.left(result.left);
		state = result.right;
	}

	if (state.inputFiles.length === 0) {
		return Either.right<CliCommand>({ _tag: "Help" });
	}
	return Either.right<CliCommand>({
		_tag: "Count",
		options: { chars: state.chars, inputFiles: state.inputFiles },
	});
}
