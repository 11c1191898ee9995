/**
 * Applies file entries to disk.
 *
 * Each entry moves through validation, matching (replace only) and mutation.
 * Failures are recorded as data and only skip the change that produced them:
 * sibling changes and sibling entries are always attempted, and changes already
 * written stay written. Within one entry every change is matched against the file
 * as left by the previous change.
 */
import { createErrorRecord, describeCause, isBlocking } from "../errors.js";
import type {
	Action,
	ApplyConfig,
	ApplyErrorRecord,
	ApplyLogger,
	ApplyResult,
	ApplyRunResult,
	ChangeRef,
	FileEntry,
	LineChange,
} from "../types.js";
import { createDiskFileStore, createDryRunFileStore, type FileStore } from "./file-store.js";
import { joinContent, splitContent, spliceLines } from "./lines.js";
import { matchChange } from "./matcher.js";
import { resolveEntryPath } from "./paths.js";
import { validateChange } from "./validator.js";

export interface ApplyOptions {
	/** Run every check and match without writing to disk */
	dryRun?: boolean;
	fileStore?: FileStore;
	log?: ApplyLogger;
}

interface EntryContext {
	entry: FileEntry;
	relativePath: string;
	absolutePath: string;
	config: ApplyConfig;
	store: FileStore;
	log: ApplyLogger;
	records: ApplyErrorRecord[];
}

const noopLogger: ApplyLogger = () => {};

/** A dry run always stages writes in memory, over the given store when there is one */
function selectFileStore(options: ApplyOptions): FileStore {
	const store = options.fileStore ?? createDiskFileStore();
	return options.dryRun ? createDryRunFileStore(store) : store;
}

function finish(context: EntryContext, changeCount: number): ApplyResult {
	const { entry, records } = context;
	if (records.some(isBlocking)) {
		context.log("warn", `${entry.file}: ${entry.action} failed with ${records.filter(isBlocking).length} error(s)`);
		return { ok: false, file: entry.file, action: entry.action, errors: records };
	}
	context.log("info", `${entry.file}: ${entry.action} applied (${changeCount} change${changeCount === 1 ? "" : "s"})`);
	return { ok: true, file: entry.file, action: entry.action, changeCount, warnings: records };
}

function recordFileSystemError(context: EntryContext, error: unknown, ref: ChangeRef): void {
	const cause = describeCause(error);
	context.records.push(
		createErrorRecord("file_system", `File system error: ${cause}`, {
			details: { file: context.relativePath, cause },
			ref,
		}),
	);
}

function validateInto(context: EntryContext, change: LineChange, ref: ChangeRef): boolean {
	const found = validateChange(context.entry.action, change, context.relativePath, context.config, ref);
	context.records.push(...found);
	return !found.some(isBlocking);
}

function deleteFile(context: EntryContext): ApplyResult {
	const { entry, relativePath, absolutePath, store } = context;
	const ref: ChangeRef = { file: entry.file };

	if (!context.config.allowFileDeletion) {
		context.records.push(
			createErrorRecord("permission_denied", "File deletion is not allowed by configuration", {
				details: { file: relativePath },
				ref,
			}),
		);
		return finish(context, 0);
	}

	entry.changes.forEach((change, changeIndex) => {
		validateInto(context, change, { file: entry.file, changeIndex });
	});
	if (context.records.some(isBlocking)) {
		return finish(context, 0);
	}

	try {
		if (!store.exists(absolutePath)) {
			context.records.push(
				createErrorRecord("file_not_found", "File does not exist for deletion", {
					details: { file: relativePath },
					ref,
				}),
			);
			return finish(context, 0);
		}
		store.remove(absolutePath);
	} catch (error) {
		recordFileSystemError(context, error, ref);
		return finish(context, 0);
	}

	context.log("debug", `Deleted ${absolutePath}`);
	return finish(context, 1);
}

function createFile(context: EntryContext, change: LineChange, ref: ChangeRef): boolean {
	const { relativePath, absolutePath, store } = context;
	if (store.exists(absolutePath)) {
		context.records.push(
			createErrorRecord("file_already_exists", "File already exists for create_file", {
				details: { file: relativePath },
				ref,
			}),
		);
		return false;
	}

	store.write(absolutePath, joinContent({ lines: [...change.changedLines], eol: "\n", trailingNewline: true }));
	context.log("debug", `Created ${absolutePath}`);
	return true;
}

function replaceLines(context: EntryContext, change: LineChange, ref: ChangeRef): boolean {
	const { relativePath, absolutePath, store } = context;
	if (!store.exists(absolutePath)) {
		context.records.push(
			createErrorRecord("file_not_found", "File does not exist for replace_lines", {
				details: { file: relativePath },
				ref,
			}),
		);
		return false;
	}

	const buffer = splitContent(store.read(absolutePath));
	const match = matchChange(buffer.lines, change, relativePath, context.config, ref);
	if (!match.ok) {
		context.records.push(match.error);
		return false;
	}

	const { start, end } = match.range;
	store.write(absolutePath, joinContent(spliceLines(buffer, start, end, change.changedLines)));
	context.log(
		"debug",
		`Replaced lines ${start + 1}-${end} of ${relativePath} (${match.strategy}, confidence ${match.confidence.toFixed(3)})`,
	);
	return true;
}

function applyLineChanges(context: EntryContext, mutate: typeof createFile): ApplyResult {
	const { entry } = context;
	if (entry.changes.length === 0) {
		context.records.push(
			createErrorRecord("changes_empty", `Changes array is empty for ${entry.action}`, {
				details: { file: context.relativePath },
				ref: { file: entry.file },
			}),
		);
		return finish(context, 0);
	}

	let applied = 0;

	entry.changes.forEach((change, changeIndex) => {
		const ref: ChangeRef = { file: entry.file, changeIndex };
		if (!validateInto(context, change, ref)) {
			return;
		}
		try {
			if (mutate(context, change, ref)) {
				applied++;
			}
		} catch (error) {
			recordFileSystemError(context, error, ref);
		}
	});

	return finish(context, applied);
}

function invalidAction(entry: FileEntry, action: string): ApplyResult {
	return {
		ok: false,
		file: entry.file,
		action: entry.action,
		errors: [
			createErrorRecord("invalid_action", `Invalid action: ${action}`, {
				details: { file: entry.file, action },
				ref: { file: entry.file },
			}),
		],
	};
}

/**
 * Apply one file entry and report either an aggregated success or the records
 * produced while processing it.
 */
export function applyEntry(
	entry: FileEntry,
	baseDir: string,
	config: ApplyConfig,
	options: ApplyOptions = {},
): ApplyResult {
	const log = options.log ?? noopLogger;
	const store = selectFileStore(options);

	const resolved = resolveEntryPath(baseDir, entry.file);
	if (!resolved.ok) {
		return { ok: false, file: entry.file, action: entry.action, errors: [resolved.error] };
	}

	const context: EntryContext = {
		entry,
		relativePath: resolved.relativePath,
		absolutePath: resolved.absolutePath,
		config,
		store,
		log,
		records: [],
	};

	const action: Action = entry.action;
	switch (action) {
		case "delete_file":
			return deleteFile(context);
		case "create_file":
			return applyLineChanges(context, createFile);
		case "replace_lines":
			return applyLineChanges(context, replaceLines);
		default: {
			const unknownAction: never = action;
			return invalidAction(entry, String(unknownAction));
		}
	}
}

/**
 * Apply every entry in order. Entries never abort each other; the run is `ok`
 * only when every entry succeeded.
 */
export function applyAll(
	entries: readonly FileEntry[],
	baseDir: string,
	config: ApplyConfig,
	options: ApplyOptions = {},
): ApplyRunResult {
	if (!config) {
		throw new TypeError("applyAll requires a config");
	}
	if (typeof baseDir !== "string" || baseDir.length === 0) {
		throw new TypeError("applyAll requires a base directory");
	}

	const store = selectFileStore(options);
	const results = entries.map((entry) =>
		applyEntry(entry, baseDir, config, { ...options, dryRun: false, fileStore: store }),
	);
	return { ok: results.every((result) => result.ok), results };
}
