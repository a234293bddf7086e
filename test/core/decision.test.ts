// CHANGE: Tests for exit-code decision and diagnostics
// FORMAT THEOREM: computeExitCode(o) = 0 ↔ o._tag = "Reported"
// PURITY: CORE

import { describe, expect, it } from "vitest";

import { computeExitCode, describeError } from "../../src/core/decision.js";
import {
	FileAccessError,
	InvalidFilterError,
	InvalidOptionError,
} from "../../src/core/errors.js";

describe("computeExitCode", () => {
	it("returns 0 after a report, even for empty input", () => {
		expect(computeExitCode({ _tag: "Reported", totalChars: 0 })).toBe(0);
	});

	it("returns 1 for help", () => {
		expect(computeExitCode({ _tag: "Help" })).toBe(1);
	});

	it("returns 1 for any failure", () => {
		expect(
			computeExitCode({ _tag: "Failed", errorTag: "FileAccessError" }),
		).toBe(1);
	});
});

describe("describeError", () => {
	it("names the offending option", () => {
		expect(describeError(new InvalidOptionError({ option: "--width=3" }))).toBe(
			"Invalid option: --width=3",
		);
	});

	it("names the offending char set", () => {
		expect(describeError(new InvalidFilterError({ name: "bogus" }))).toBe(
			"Invalid char set: bogus",
		);
	});

	it("names the unreadable file and the reason", () => {
		expect(
			describeError(
				new FileAccessError({ path: "missing.txt", reason: "not found" }),
			),
		).toBe("Cannot read file: missing.txt (not found)");
	});
});
