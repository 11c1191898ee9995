import { Value } from "@sinclair/typebox/value";
import { ChangeSetInputError, createErrorRecord, describeCause } from "../errors.js";
import type { ApplyErrorRecord, FileEntry, LineChange } from "../types.js";
import { isAction } from "../types.js";
import { KNOWN_CHANGE_KEYS, KNOWN_ENTRY_KEYS, KNOWN_ENVELOPE_KEYS, LINES_SCHEMA } from "./schema.js";

export interface ChangeSet {
	message?: string;
	entries: FileEntry[];
}

export type ParseChangeSetResult =
	| { ok: true; changeSet: ChangeSet; warnings: ApplyErrorRecord[] }
	| { ok: false; errors: ApplyErrorRecord[] };

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLines(value: unknown): value is string[] {
	return Value.Check(LINES_SCHEMA, value);
}

function structureError(message: string, details: ApplyErrorRecord["details"] = {}, file?: string): ApplyErrorRecord {
	return createErrorRecord("json_structure", message, {
		details,
		ref: file !== undefined ? { file } : undefined,
	});
}

function unknownKeys(value: Record<string, unknown>, known: readonly string[]): string[] {
	return Object.keys(value).filter((key) => !known.includes(key));
}

function parseChange(
	raw: unknown,
	file: string,
	changeIndex: number,
	errors: ApplyErrorRecord[],
	warnings: ApplyErrorRecord[],
): LineChange | undefined {
	const ref = { file, changeIndex };
	if (!isRecord(raw)) {
		errors.push(
			createErrorRecord("json_structure", `Change ${changeIndex} of ${file} must be an object`, {
				details: { file, change_index: changeIndex },
				ref,
			}),
		);
		return undefined;
	}

	const originalLines = raw.original_lines ?? [];
	const changedLines = raw.changed_lines ?? [];
	let valid = true;
	for (const [key, value] of [
		["original_lines", originalLines],
		["changed_lines", changedLines],
	] as const) {
		if (!isLines(value)) {
			errors.push(
				createErrorRecord("json_structure", `${key} must be a list of strings`, {
					details: { file, change_index: changeIndex, field: key },
					ref,
				}),
			);
			valid = false;
		}
	}

	const extra = unknownKeys(raw, KNOWN_CHANGE_KEYS);
	if (extra.length > 0) {
		warnings.push(
			createErrorRecord("json_structure", `Ignoring unknown keys in change: ${extra.join(", ")}`, {
				severity: "warning",
				details: { file, change_index: changeIndex, keys: extra },
				ref,
			}),
		);
	}

	if (!valid || !isLines(originalLines) || !isLines(changedLines)) {
		return undefined;
	}
	return { originalLines, changedLines };
}

function parseEntry(
	raw: unknown,
	index: number,
	errors: ApplyErrorRecord[],
	warnings: ApplyErrorRecord[],
): FileEntry | undefined {
	if (!isRecord(raw)) {
		errors.push(structureError(`file_entries[${index}] must be an object`, { entry_index: index }));
		return undefined;
	}

	const file = raw.file;
	if (typeof file !== "string" || file.trim() === "") {
		errors.push(structureError(`file_entries[${index}] is missing a file path`, { entry_index: index }));
		return undefined;
	}

	const extra = unknownKeys(raw, KNOWN_ENTRY_KEYS);
	if (extra.length > 0) {
		warnings.push(
			createErrorRecord("json_structure", `Ignoring unknown keys in entry for ${file}: ${extra.join(", ")}`, {
				severity: "warning",
				details: { file, keys: extra },
				ref: { file },
			}),
		);
	}

	const action = raw.action;
	if (!isAction(action)) {
		errors.push(
			createErrorRecord("invalid_action", `Invalid action for ${file}: ${JSON.stringify(action ?? null)}`, {
				details: { file, action: typeof action === "string" ? action : null },
				ref: { file },
			}),
		);
		return undefined;
	}

	const rawChanges = raw.changes ?? [];
	if (!Array.isArray(rawChanges)) {
		errors.push(structureError(`changes for ${file} must be a list`, { file }, file));
		return undefined;
	}

	const errorCount = errors.length;
	const changes: LineChange[] = [];
	rawChanges.forEach((rawChange: unknown, changeIndex: number) => {
		const change = parseChange(rawChange, file, changeIndex, errors, warnings);
		if (change) {
			changes.push(change);
		}
	});
	if (errors.length > errorCount) {
		return undefined;
	}

	return { file, action, changes };
}

/**
 * Validate a decoded change-set envelope `{ message?, file_entries }` and convert it
 * into file entries. Every problem found is reported; nothing is applied on failure.
 */
export function parseChangeSet(raw: unknown): ParseChangeSetResult {
	if (!isRecord(raw)) {
		return { ok: false, errors: [structureError("Change set must be a JSON object")] };
	}

	const errors: ApplyErrorRecord[] = [];
	const warnings: ApplyErrorRecord[] = [];

	const message = raw.message;
	if (message !== undefined && (typeof message !== "string" || message.trim() === "")) {
		errors.push(structureError("message must be a non-empty string when present"));
	}

	const extra = unknownKeys(raw, KNOWN_ENVELOPE_KEYS);
	if (extra.length > 0) {
		warnings.push(
			createErrorRecord("json_structure", `Ignoring unknown top-level keys: ${extra.join(", ")}`, {
				severity: "warning",
				details: { keys: extra },
			}),
		);
	}

	const rawEntries = raw.file_entries;
	if (!Array.isArray(rawEntries) || rawEntries.length === 0) {
		errors.push(structureError("file_entries must be a non-empty list"));
		return { ok: false, errors };
	}

	const entries: FileEntry[] = [];
	rawEntries.forEach((rawEntry: unknown, index: number) => {
		const entry = parseEntry(rawEntry, index, errors, warnings);
		if (entry) {
			entries.push(entry);
		}
	});

	if (errors.length > 0) {
		return { ok: false, errors };
	}
	return {
		ok: true,
		changeSet: typeof message === "string" ? { message, entries } : { entries },
		warnings,
	};
}

export function parseChangeSetText(text: string): ParseChangeSetResult {
	let decoded: unknown;
	try {
		decoded = JSON.parse(text);
	} catch (error) {
		return {
			ok: false,
			errors: [structureError(`Invalid JSON: ${describeCause(error)}`)],
		};
	}
	return parseChangeSet(decoded);
}

export function parseChangeSetOrThrow(raw: unknown): ChangeSet {
	const result = parseChangeSet(raw);
	if (!result.ok) {
		throw new ChangeSetInputError(result.errors);
	}
	return result.changeSet;
}
