import type { ApplyErrorRecord, ApplyResult, ApplyRunResult } from "./types.js";

const EXAMPLE_CHANGE_SET = {
	message: "Greet the whole world",
	file_entries: [
		{
			file: "src/main.py",
			action: "replace_lines",
			changes: [
				{
					original_lines: ["def greet():", "    print('Hello')"],
					changed_lines: ["def greet():", "    print('Hello World')"],
				},
			],
		},
		{
			file: "src/new.py",
			action: "create_file",
			changes: [{ original_lines: [], changed_lines: ["def new_func():", "    pass"] }],
		},
		{ file: "src/old.py", action: "delete_file", changes: [] },
	],
};

/** Prompt text describing the change-set JSON accepted by `apply_changes` */
export function getChangeFormatDescription(): string {
	return [
		"Describe code edits as a JSON object with these keys:",
		"",
		"- `message` (optional): a short commit message for the whole change set.",
		"- `file_entries` (required, non-empty): one object per file with:",
		"  - `file`: path relative to the project directory. It must stay inside the project.",
		"  - `action`: one of `replace_lines`, `create_file`, `delete_file`.",
		"  - `changes`: a list of `{ original_lines, changed_lines }` objects (string arrays).",
		"",
		"Rules per action:",
		"- `replace_lines`: `original_lines` must be non-empty and copied from the current file with enough",
		"  surrounding lines to match exactly one place. `changed_lines` replaces them and must be non-empty.",
		"  Changes apply in order, each against the file as left by the previous one.",
		"- `create_file`: exactly one change with empty `original_lines`; `changed_lines` is the full content.",
		"  The file must not exist yet.",
		"- `delete_file`: `changes` must be `[]`. The file must exist.",
		"",
		"Matching tolerates whitespace drift and, when enabled, small wording differences, but a location that",
		"matches nowhere or in several places is rejected with `no_match` or `multiple_matches`.",
		"Non-ASCII characters in `changed_lines` may be rejected depending on the file type (for example `.py`,",
		"`.js` and `.ts` files).",
		"",
		"Example:",
		"```json",
		JSON.stringify(EXAMPLE_CHANGE_SET, null, 2),
		"```",
	].join("\n");
}

function formatDetails(record: ApplyErrorRecord): string {
	const parts = Object.entries(record.details)
		.filter(([key]) => key !== "file")
		.map(([key, value]) => `${key}=${Array.isArray(value) ? value.join(",") : String(value)}`);
	return parts.length > 0 ? ` (${parts.join("; ")})` : "";
}

export function formatErrorRecord(record: ApplyErrorRecord): string {
	const position = record.ref?.changeIndex !== undefined ? ` [change ${record.ref.changeIndex + 1}]` : "";
	return `${record.severity} ${record.errorType}${position}: ${record.message}${formatDetails(record)}`;
}

function formatResult(result: ApplyResult): string[] {
	if (result.ok) {
		const noun = result.changeCount === 1 ? "change" : "changes";
		const lines = [`✓ ${result.file}: ${result.action} (${result.changeCount} ${noun})`];
		for (const warning of result.warnings) {
			lines.push(`  ${formatErrorRecord(warning)}`);
		}
		return lines;
	}
	return [`✗ ${result.file}: ${result.action} failed`, ...result.errors.map((error) => `  ${formatErrorRecord(error)}`)];
}

/** Human-readable summary of a run, one block per entry */
export function formatApplyReport(run: ApplyRunResult, options: { message?: string; dryRun?: boolean } = {}): string {
	const succeeded = run.results.filter((result) => result.ok).length;
	const header = `${options.dryRun ? "Dry run: " : ""}${succeeded}/${run.results.length} file entr${run.results.length === 1 ? "y" : "ies"} applied`;
	const lines = [header, ...run.results.flatMap(formatResult)];
	if (options.message) {
		lines.push("", `Message: ${options.message}`);
	}
	return lines.join("\n");
}
