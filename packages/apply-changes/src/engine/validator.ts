import { createErrorRecord } from "../errors.js";
import { resolveRule } from "../config/rules.js";
import type { Action, ApplyConfig, ApplyErrorRecord, ChangeRef, LineChange } from "../types.js";

const NON_ASCII_RE = /[^\x00-\x7F]/;

export function hasNonAscii(line: string): boolean {
	return NON_ASCII_RE.test(line);
}

function checkStructure(action: Action, change: LineChange, ref: ChangeRef): ApplyErrorRecord[] {
	const errors: ApplyErrorRecord[] = [];
	const details = { file: ref.file };

	switch (action) {
		case "create_file":
			if (change.originalLines.length > 0) {
				errors.push(
					createErrorRecord("orig_lines_not_empty", "original_lines must be empty for create_file", { details, ref }),
				);
			}
			if (change.changedLines.length === 0) {
				errors.push(
					createErrorRecord("empty_changed_lines", "changed_lines cannot be empty for create_file", { details, ref }),
				);
			}
			break;
		case "replace_lines":
			if (change.originalLines.length === 0) {
				errors.push(
					createErrorRecord("orig_lines_empty", "original_lines cannot be empty for replace_lines", { details, ref }),
				);
			}
			if (change.changedLines.length === 0) {
				errors.push(
					createErrorRecord("empty_changed_lines", "changed_lines cannot be empty for replace_lines", {
						details,
						ref,
					}),
				);
			}
			break;
		case "delete_file":
			if (change.originalLines.length > 0) {
				errors.push(
					createErrorRecord("orig_lines_not_empty", "original_lines must be empty for delete_file", { details, ref }),
				);
			}
			if (change.changedLines.length > 0) {
				errors.push(
					createErrorRecord("changed_lines_not_empty", "changed_lines must be empty for delete_file", {
						details,
						ref,
					}),
				);
			}
			break;
	}

	return errors;
}

function checkNonAscii(change: LineChange, filePath: string, config: ApplyConfig, ref: ChangeRef): ApplyErrorRecord[] {
	const policy = resolveRule("non_ascii", filePath, config);
	if (policy === "ignore") {
		return [];
	}

	const errors: ApplyErrorRecord[] = [];
	change.changedLines.forEach((line, index) => {
		if (hasNonAscii(line)) {
			errors.push(
				createErrorRecord("non_ascii_chars", "Non-ASCII characters found in changed_lines", {
					severity: policy,
					details: { line, line_number: index + 1 },
					ref,
				}),
			);
		}
	});
	return errors;
}

/**
 * Structural and content checks for one change. Checks are independent, so a
 * change can produce several records; an empty list means the change is valid.
 */
export function validateChange(
	action: Action,
	change: LineChange,
	filePath: string,
	config: ApplyConfig,
	ref: ChangeRef = { file: filePath },
): ApplyErrorRecord[] {
	return [...checkStructure(action, change, ref), ...checkNonAscii(change, filePath, config, ref)];
}
