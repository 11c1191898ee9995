import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { Type } from "@sinclair/typebox";
import type { FileStore } from "../engine/file-store.js";
import { formatApplyReport, formatErrorRecord } from "../format.js";
import { parseChangeSet } from "../input/envelope.js";
import { FILE_ENTRY_SCHEMA } from "../input/schema.js";
import { runChangeSet } from "../run.js";
import type { ApplyConfig } from "../types.js";

const APPLY_CHANGES_PARAMS = Type.Object({
	file_entries: Type.Array(FILE_ENTRY_SCHEMA, { description: "One entry per file to change, create or delete" }),
	message: Type.Optional(Type.String({ description: "Commit message for the change set" })),
	dry_run: Type.Optional(Type.Boolean({ description: "Check and match without writing files" })),
});

export interface ApplyChangesToolOptions {
	resolveConfig?: (cwd: string) => ApplyConfig;
	homeDir?: string;
	fileStore?: FileStore;
}

export function registerApplyChangesTool(pi: ExtensionAPI, options: ApplyChangesToolOptions = {}): void {
	pi.registerTool({
		name: "apply_changes",
		label: "Apply Changes",
		description:
			"Apply line-based edits, file creations and deletions described as file_entries. original_lines must match one place in the file.",
		parameters: APPLY_CHANGES_PARAMS,
		async execute(_toolCallId, params, _signal, _onUpdate, ctx) {
			const { dry_run: dryRun, ...envelope } = params;
			const parsed = parseChangeSet(envelope);
			if (!parsed.ok) {
				const text = ["Change set rejected:", ...parsed.errors.map((error) => `  ${formatErrorRecord(error)}`)].join(
					"\n",
				);
				notifyStatus(ctx, `apply_changes rejected input (${parsed.errors.length} error(s))`, "warning");
				return {
					isError: true,
					content: [{ type: "text", text }],
					details: { errors: parsed.errors },
				};
			}

			const run = runChangeSet(parsed.changeSet, {
				cwd: ctx.cwd,
				config: options.resolveConfig?.(ctx.cwd),
				homeDir: options.homeDir,
				fileStore: options.fileStore,
				dryRun: dryRun ?? false,
				warn: (message) => notifyStatus(ctx, message, "warning"),
			});
			const text = formatApplyReport(run, { message: parsed.changeSet.message, dryRun });
			notifyStatus(
				ctx,
				run.ok ? "apply_changes completed" : "apply_changes finished with errors",
				run.ok ? "info" : "warning",
			);

			return {
				isError: !run.ok,
				content: [{ type: "text", text }],
				details: {
					ok: run.ok,
					dryRun: dryRun ?? false,
					results: run.results,
					inputWarnings: parsed.warnings,
					configSources: run.configSources,
				},
			};
		},
	});
}

function notifyStatus(
	ctx: { ui?: { notify?: (message: string, level?: "info" | "warning" | "error") => void } } | undefined,
	message: string,
	level: "info" | "warning" | "error",
): void {
	ctx?.ui?.notify?.(message, level);
}
