// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration and CORE utilities, hide SHELL internals
// PURITY: Re-exports only (meta-module)

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Counting run for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runCount } from "char-freq";
 *
 * const exitCode = await Effect.runPromise(
 *   runCount({ chars: "symbols", inputFiles: ["src/index.ts"] }),
 * );
 * ```
 */
export { runCli, runCount } from "./app/runCount.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	CharClassName,
	CharFilter,
	CountOptions,
	ExitCode,
	FrequencyTable,
	RankedEntry,
	RunOutcome,
} from "./core/models.js";
export type { AppError } from "./core/errors.js";
export {
	FileAccessError,
	InvalidFilterError,
	InvalidOptionError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS (Pure)
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode, describeError } from "./core/decision.js";
export {
	CHAR_CLASSES,
	DEFAULT_CHARS,
	parseCharsOption,
	resolveFilter,
} from "./core/filter.js";
export { reprChar } from "./core/format/repr.js";
export {
	formatPercent,
	formatReport,
	formatRow,
	rankEntries,
	REPORT_HEADER,
} from "./core/report.js";
export {
	splitLinesKeepEnds,
	tallyLines,
	tallyText,
	totalChars,
} from "./core/tally.js";
