#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// FORMAT THEOREM: ∀run ∈ App: returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { runCli } from "../app/runCount.js";

/**
 * CLI entry point for char-freq.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(runCli(process.argv.slice(2)));
		// Shell boundary: single process exit
		process.exit(code);
	} catch (error) {
		// Defects only: typed errors were already reported by APP
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
