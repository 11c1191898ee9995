import { describe, expect, it } from "vitest";
import { DEFAULT_APPLY_CONFIG } from "../src/config/defaults.js";
import { hasNonAscii, validateChange } from "../src/engine/validator.js";

describe("validateChange", () => {
	it("requires empty original_lines and content for create_file", () => {
		const records = validateChange(
			"create_file",
			{ originalLines: ["x"], changedLines: [] },
			"new.txt",
			DEFAULT_APPLY_CONFIG,
		);
		expect(records.map((record) => record.errorType)).toEqual(["orig_lines_not_empty", "empty_changed_lines"]);
		expect(records[0]).toEqual({
			errorType: "orig_lines_not_empty",
			severity: "error",
			message: "original_lines must be empty for create_file",
			details: { file: "new.txt" },
			ref: { file: "new.txt" },
		});
	});

	it("requires both line lists for replace_lines", () => {
		const records = validateChange("replace_lines", { originalLines: [], changedLines: [] }, "a.txt", DEFAULT_APPLY_CONFIG);
		expect(records.map((record) => record.message)).toEqual([
			"original_lines cannot be empty for replace_lines",
			"changed_lines cannot be empty for replace_lines",
		]);
	});

	it("rejects line content on delete_file changes", () => {
		const records = validateChange(
			"delete_file",
			{ originalLines: [], changedLines: ["x"] },
			"old.txt",
			DEFAULT_APPLY_CONFIG,
		);
		expect(records.map((record) => record.errorType)).toEqual(["changed_lines_not_empty"]);
	});

	it("emits one non-ASCII record per offending line at the resolved severity", () => {
		const change = { originalLines: ["x"], changedLines: ["print('héllo')", "ok", "naïve"] };
		const records = validateChange("replace_lines", change, "src/main.py", DEFAULT_APPLY_CONFIG, {
			file: "src/main.py",
			changeIndex: 2,
		});
		expect(records).toEqual([
			{
				errorType: "non_ascii_chars",
				severity: "error",
				message: "Non-ASCII characters found in changed_lines",
				details: { line: "print('héllo')", line_number: 1 },
				ref: { file: "src/main.py", changeIndex: 2 },
			},
			{
				errorType: "non_ascii_chars",
				severity: "error",
				message: "Non-ASCII characters found in changed_lines",
				details: { line: "naïve", line_number: 3 },
				ref: { file: "src/main.py", changeIndex: 2 },
			},
		]);
	});

	it("downgrades or skips non-ASCII checks by extension", () => {
		const change = { originalLines: ["x"], changedLines: ["café"] };
		expect(validateChange("replace_lines", change, "README.md", DEFAULT_APPLY_CONFIG)).toEqual([]);
		const records = validateChange("replace_lines", change, "notes.txt", DEFAULT_APPLY_CONFIG);
		expect(records.map((record) => record.severity)).toEqual(["warning"]);
	});

	it("accepts a valid change", () => {
		expect(
			validateChange("replace_lines", { originalLines: ["a"], changedLines: ["b"] }, "a.py", DEFAULT_APPLY_CONFIG),
		).toEqual([]);
	});
});

describe("hasNonAscii", () => {
	it("flags characters above code point 127", () => {
		expect(hasNonAscii("plain ascii ~")).toBe(false);
		expect(hasNonAscii("tab\tand\u007f")).toBe(false);
		expect(hasNonAscii("emoji 🎉")).toBe(true);
	});
});
