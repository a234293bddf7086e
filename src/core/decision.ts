// CHANGE: Pure decision functions for exit code and diagnostics
// WHY: Termination logic stays in the Functional Core; BIN only applies the result
// FORMAT THEOREM: ∀o ∈ Outcome: o._tag = "Reported" ↔ computeExitCode(o) = 0
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping Outcome → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { match } from "ts-pattern";

import type { AppError } from "./errors.js";
import type { ExitCode, RunOutcome } from "./models.js";

/**
 * Computes process exit code from the run outcome (pure function).
 *
 * @returns 0 when a report was printed; 1 for help and every failure
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 *
 * @example
 * ```ts
 * computeExitCode({ _tag: "Help" }); // 1
 * computeExitCode({ _tag: "Reported", totalChars: 0 }); // 0
 * ```
 */
export const computeExitCode = (outcome: RunOutcome): ExitCode =>
	match(outcome)
		.with({ _tag: "Reported" }, (): ExitCode => 0)
		.with({ _tag: "Help" }, (): ExitCode => 1)
		.with({ _tag: "Failed" }, (): ExitCode => 1)
		.exhaustive();

/**
 * Single-line diagnostic for a typed application error.
 *
 * @pure true
 * @invariant result contains no newline
 */
export const describeError = (error: AppError): string =>
	match(error)
		.with({ _tag: "InvalidOptionError" }, (e) => `Invalid option: ${e.option}`)
		.with({ _tag: "InvalidFilterError" }, (e) => `Invalid char set: ${e.name}`)
		.with(
			{ _tag: "FileAccessError" },
			(e) => `Cannot read file: ${e.path} (${e.reason})`,
		)
		.exhaustive();
