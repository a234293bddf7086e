// CHANGE: Make main.ts a thin APP delegator
// WHY: Programmatic runs get the exit code without terminating the process
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runCli } from "./app/runCount.js";
import type { ExitCode } from "./core/models.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param argv - Arguments without the node/script prefix
 * @returns ExitCode (0 | 1)
 */
export async function main(argv: readonly string[]): Promise<ExitCode> {
	return Effect.runPromise(runCli(argv));
}
