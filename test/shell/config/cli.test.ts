// CHANGE: Unit tests for CLI argument parsing
// WHY: Flags and positional arguments must parse deterministically into typed results
// PURITY: SHELL boundary, pure over argv

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { InvalidOptionError } from "../../../src/core/errors.js";
import { type CliCommand, parseCliArgs } from "../../../src/shell/config/index.js";

const parseOrFail = (argv: readonly string[]): CliCommand =>
	Either.getOrThrowWith(parseCliArgs(argv), (e) => e);

const optionError = (argv: readonly string[]): string | undefined => {
	const result = parseCliArgs(argv);
	return Either.isLeft(result) ? result.left.option : undefined;
};

describe("parseCliArgs: help", () => {
	it("asks for help when no arguments are given", () => {
		expect(parseOrFail([])).toEqual({ _tag: "Help" });
	});

	it("asks for help when only --chars is given", () => {
		expect(parseOrFail(["--chars=all"])).toEqual({ _tag: "Help" });
	});

	it("keeps empty string arguments as input files", () => {
		expect(parseOrFail(["", "a.txt"])).toEqual({
			_tag: "Count",
			options: { chars: "symbols+digits", inputFiles: ["", "a.txt"] },
		});
	});
});

describe("parseCliArgs: files and --chars", () => {
	it("uses the default filter and keeps file order", () => {
		expect(parseOrFail(["b.txt", "a.txt"])).toEqual({
			_tag: "Count",
			options: { chars: "symbols+digits", inputFiles: ["b.txt", "a.txt"] },
		});
	});

	it("takes --chars anywhere on the line", () => {
		expect(parseOrFail(["a.txt", "--chars=letters", "b.txt"])).toEqual({
			_tag: "Count",
			options: { chars: "letters", inputFiles: ["a.txt", "b.txt"] },
		});
	});

	it("lets the last --chars win", () => {
		const command = parseOrFail(["--chars=digits", "--chars=all", "x"]);
		expect(command._tag === "Count" ? command.options.chars : "").toBe("all");
	});

	it("keeps everything after the first '=' as the value", () => {
		const command = parseOrFail(["--chars=a=b", "x"]);
		expect(command._tag === "Count" ? command.options.chars : "").toBe("a=b");
	});

	it("does not validate class names itself", () => {
		const command = parseOrFail(["--chars=bogus", "x"]);
		expect(command._tag === "Count" ? command.options.chars : "").toBe("bogus");
	});
});

describe("parseCliArgs: invalid options", () => {
	it("rejects an unknown option with its full token", () => {
		expect(optionError(["--width=80", "a.txt"])).toBe("--width=80");
	});

	it("rejects --chars without a value", () => {
		expect(optionError(["--chars", "a.txt"])).toBe("--chars");
	});

	it("rejects bare flags", () => {
		expect(optionError(["--help"])).toBe("--help");
	});

	it("returns a typed InvalidOptionError", () => {
		const result = parseCliArgs(["--nope=1"]);
		expect(Either.isLeft(result) && result.left).toBeInstanceOf(
			InvalidOptionError,
		);
	});
});
