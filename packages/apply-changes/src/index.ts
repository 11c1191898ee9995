import { readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { getApplyChangesHelpText, parseApplyCommandArgs } from "./args.js";
import { describeCause } from "./errors.js";
import { formatApplyReport, formatErrorRecord, getChangeFormatDescription } from "./format.js";
import { parseChangeSetText } from "./input/envelope.js";
import { runChangeSet } from "./run.js";
import { registerApplyChangesTool } from "./tools/apply-tool.js";

export { parseApplyCommandArgs, getApplyChangesHelpText } from "./args.js";
export { DEFAULT_APPLY_CONFIG, withOverrides, type ApplyConfigOverrides } from "./config/defaults.js";
export { configFromObject, createApplyConfigResolver } from "./config/loader.js";
export { getFileExtension, resolveMatchOptions, resolveRule } from "./config/rules.js";
export { applyAll, applyEntry, type ApplyOptions } from "./engine/applicator.js";
export { createDiskFileStore, createDryRunFileStore, type FileStore } from "./engine/file-store.js";
export { matchChange } from "./engine/matcher.js";
export { resolveEntryPath } from "./engine/paths.js";
export { hasNonAscii, validateChange } from "./engine/validator.js";
export { ChangeSetInputError } from "./errors.js";
export { formatApplyReport, formatErrorRecord, getChangeFormatDescription } from "./format.js";
export { type ChangeSet, parseChangeSet, parseChangeSetOrThrow, parseChangeSetText } from "./input/envelope.js";
export { runChangeSet } from "./run.js";
export { registerApplyChangesTool } from "./tools/apply-tool.js";
export type {
	Action,
	ApplyConfig,
	ApplyErrorRecord,
	ApplyFailure,
	ApplyLogger,
	ApplyResult,
	ApplyRunResult,
	ApplySuccess,
	ChangeRef,
	ErrorDetailValue,
	ErrorSeverity,
	ErrorType,
	ExtensionRule,
	FileEntry,
	LineChange,
	LogLevel,
	MatchRange,
	NonAsciiAction,
	RuleSet,
} from "./types.js";
export { ACTIONS, isAction, NON_ASCII_ACTIONS } from "./types.js";

export interface ApplyChangesExtensionOptions {
	/** Home directory searched for user config; defaults to the OS home */
	homeDir?: string;
}

export function createApplyChangesExtension(options: ApplyChangesExtensionOptions = {}): (pi: ExtensionAPI) => void {
	return (pi) => registerApplyChangesExtension(pi, options);
}

export default function applyChangesExtension(pi: ExtensionAPI): void {
	registerApplyChangesExtension(pi, {});
}

function registerApplyChangesExtension(pi: ExtensionAPI, extensionOptions: ApplyChangesExtensionOptions): void {
	registerApplyChangesTool(pi, { homeDir: extensionOptions.homeDir });

	pi.registerCommand("apply-changes", {
		description: "Apply a JSON change set (file_entries) to files under the working directory",
		handler: async (args, ctx) => {
			const parsed = parseApplyCommandArgs(args);
			if (!parsed.ok) {
				ctx.ui.notify(`apply-changes error: ${parsed.error}`, "warning");
				ctx.ui.notify(getApplyChangesHelpText(), "info");
				return;
			}

			const options = parsed.value;
			if (options.help || !options.inputPath) {
				ctx.ui.notify(getApplyChangesHelpText(), "info");
				return;
			}

			const inputPath = isAbsolute(options.inputPath) ? options.inputPath : resolve(ctx.cwd, options.inputPath);
			let text: string;
			try {
				text = readFileSync(inputPath, "utf-8");
			} catch (error) {
				ctx.ui.notify(`Cannot read ${inputPath}: ${describeCause(error)}`, "error");
				return;
			}

			const changeSet = parseChangeSetText(text);
			if (!changeSet.ok) {
				const lines = [`Invalid change set in ${inputPath}:`, ...changeSet.errors.map(formatErrorRecord)];
				ctx.ui.notify(lines.join("\n"), "warning");
				return;
			}
			for (const warning of changeSet.warnings) {
				ctx.ui.notify(formatErrorRecord(warning), "warning");
			}

			const run = runChangeSet(changeSet.changeSet, {
				cwd: ctx.cwd,
				homeDir: extensionOptions.homeDir,
				baseDir: options.baseDir,
				configPath: options.configPath,
				overrides: {
					nonAsciiAction: options.nonAsciiAction,
					allowFileDeletion: options.noAllowFileDeletion ? false : undefined,
				},
				dryRun: options.dryRun,
				warn: (message) => ctx.ui.notify(message, "warning"),
			});
			ctx.ui.notify(
				formatApplyReport(run, { message: changeSet.changeSet.message, dryRun: options.dryRun }),
				run.ok ? "info" : "warning",
			);
		},
	});

	pi.registerCommand("apply-changes-format", {
		description: "Show the JSON change-set format accepted by apply_changes",
		handler: async (_args, ctx) => {
			ctx.ui.notify(getChangeFormatDescription(), "info");
		},
	});
}
