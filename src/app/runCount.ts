// CHANGE: Application layer orchestration (APP) separated from SHELL and CORE
// WHY: APP composes pure CORE logic with SHELL reads/prints and returns an ExitCode value
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Filter is validated before any file is opened; no partial report on failure
// COMPLEXITY: O(n + k log k) where n = characters read, k = |filter|

import { Effect, Either } from "effect";

import { computeExitCode, describeError } from "../core/decision.js";
import type { AppError } from "../core/errors.js";
import { parseCharsOption, resolveFilter } from "../core/filter.js";
import type { CountOptions, ExitCode, RunOutcome } from "../core/models.js";
import { formatReport } from "../core/report.js";
import { tallyLines, totalChars } from "../core/tally.js";
import { HELP_TEXT, parseCliArgs } from "../shell/config/index.js";
import { readAllInputs } from "../shell/files/reader.js";
import { printDiagnostic, printLines } from "../shell/output/printer.js";

/**
 * Resolve filter, tally every file, print the report.
 *
 * @effect Effect<RunOutcome, AppError>
 */
function countAndReport(
	options: CountOptions,
): Effect.Effect<RunOutcome, AppError> {
	return Effect.gen(function* (_) {
		const filter = yield* _(parseCharsOption(options.chars));
		const lines = yield* _(readAllInputs(options.inputFiles));
		const table = tallyLines(lines);

		yield* _(printLines(formatReport(table, resolveFilter(filter, table))));
		return { _tag: "Reported", totalChars: totalChars(table) } as const;
	});
}

/**
 * Print the diagnostic for a failed run and turn it into an outcome.
 */
const reportFailure = (error: AppError): Effect.Effect<RunOutcome> =>
	printDiagnostic(describeError(error)).pipe(
		Effect.as({ _tag: "Failed", errorTag: error._tag } as const),
	);

/**
 * Orchestrates a counting run and returns ExitCode as value (no process.exit).
 *
 * @param options - Configuration built once at the entry point
 * @returns Effect<ExitCode, never> — errors are reported and mapped to 1
 *
 * @example
 * ```ts
 * const code = await Effect.runPromise(
 *   runCount({ chars: "digits", inputFiles: ["notes.txt"] }),
 * );
 * ```
 */
export function runCount(options: CountOptions): Effect.Effect<ExitCode> {
	return countAndReport(options).pipe(
		Effect.catchAll(reportFailure),
		Effect.map(computeExitCode),
	);
}

/**
 * Parse argv and run: help and bad flags print a message and yield 1.
 *
 * @param argv - Arguments without the node/script prefix
 * @pure false (coordinates effects)
 */
export function runCli(argv: readonly string[]): Effect.Effect<ExitCode> {
	const parsed = parseCliArgs(argv);
	if (Either.isLeft(parsed)) {
		return reportFailure(parsed.left).pipe(Effect.map(computeExitCode));
	}

	const command = parsed.right;
	if (command._tag === "Help") {
		return printLines([HELP_TEXT]).pipe(
			Effect.as(computeExitCode({ _tag: "Help" })),
		);
	}
	return runCount(command.options);
}
