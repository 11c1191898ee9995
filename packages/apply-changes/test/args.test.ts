import { describe, expect, it } from "vitest";
import { getApplyChangesHelpText, parseApplyCommandArgs } from "../src/args.js";

describe("apply-changes args parsing", () => {
	it("parses the input path and every option", () => {
		const parsed = parseApplyCommandArgs(
			"changes.json --base-dir 'my dir' --dry-run --non-ascii-action ignore --no-allow-file-deletion -c cfg.yaml",
		);

		expect(parsed).toEqual({
			ok: true,
			value: {
				inputPath: "changes.json",
				baseDir: "my dir",
				configPath: "cfg.yaml",
				nonAsciiAction: "ignore",
				noAllowFileDeletion: true,
				dryRun: true,
				help: false,
			},
		});
	});

	it("keeps escaped spaces and joins quoted text inside a word", () => {
		const parsed = parseApplyCommandArgs(String.raw`my\ changes.json -b "a b"'c'`);

		expect(parsed.ok).toBe(true);
		if (!parsed.ok) return;
		expect(parsed.value.inputPath).toBe("my changes.json");
		expect(parsed.value.baseDir).toBe("a bc");
	});

	it("allows --help without an input file", () => {
		const parsed = parseApplyCommandArgs("-h");
		expect(parsed.ok).toBe(true);
		if (!parsed.ok) return;
		expect(parsed.value.help).toBe(true);
	});

	it.each([
		["", "Missing input file. Usage: /apply-changes <input.json> [options]"],
		["a.json --bogus", "Unknown flag: --bogus"],
		["a.json b.json", "Unexpected argument: b.json"],
		["a.json --non-ascii-action loud", "--non-ascii-action must be one of: error, warning, ignore"],
		["a.json --base-dir", "--base-dir requires a value"],
		["'a.json", "Unterminated quote: '"],
	])("rejects %j", (raw, error) => {
		expect(parseApplyCommandArgs(raw)).toEqual({ ok: false, error });
	});

	it("documents every flag in the help text", () => {
		const help = getApplyChangesHelpText();
		for (const flag of ["--base-dir", "--config", "--non-ascii-action", "--no-allow-file-deletion", "--dry-run", "--help"]) {
			expect(help).toContain(flag);
		}
	});
});
