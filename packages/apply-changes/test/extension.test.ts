import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_APPLY_CONFIG } from "../src/config/defaults.js";
import { getChangeFormatDescription } from "../src/format.js";
import applyChangesExtension, { createApplyChangesExtension } from "../src/index.js";
import { registerApplyChangesTool } from "../src/tools/apply-tool.js";

interface ToolResult {
	isError?: boolean;
	content?: Array<{ type?: string; text?: string }>;
	details?: Record<string, unknown>;
}

type RegisteredTools = Record<string, { execute: (...args: unknown[]) => Promise<unknown> }>;
type RegisteredCommands = Record<string, { handler: (args: string, ctx: unknown) => Promise<void> }>;

const tempDirs: string[] = [];

function createTempDir(): string {
	const dir = mkdtempSync(join(tmpdir(), "apply-ext-"));
	tempDirs.push(dir);
	return dir;
}

afterEach(() => {
	for (const dir of tempDirs.splice(0, tempDirs.length)) {
		rmSync(dir, { recursive: true, force: true });
	}
});

function setupTool(cwd: string): (params: Record<string, unknown>) => Promise<ToolResult> {
	const tools: RegisteredTools = {};
	registerApplyChangesTool(
		{
			registerTool: (tool: { name: string; execute: (...args: unknown[]) => Promise<unknown> }) => {
				tools[tool.name] = tool;
			},
		} as unknown as Parameters<typeof registerApplyChangesTool>[0],
		{ resolveConfig: () => DEFAULT_APPLY_CONFIG },
	);

	const execute = tools.apply_changes?.execute;
	if (!execute) {
		throw new Error("apply_changes tool was not registered");
	}

	return async (params: Record<string, unknown>) =>
		execute("test", params, undefined, undefined, {
			cwd,
			ui: {
				notify: vi.fn(),
			},
		}) as Promise<ToolResult>;
}

function setupExtension(
	extension: typeof applyChangesExtension = createApplyChangesExtension({ homeDir: createTempDir() }),
): { tools: RegisteredTools; commands: RegisteredCommands } {
	const tools: RegisteredTools = {};
	const commands: RegisteredCommands = {};
	extension({
		registerTool: (tool: { name: string; execute: (...args: unknown[]) => Promise<unknown> }) => {
			tools[tool.name] = tool;
		},
		registerCommand: (name: string, command: { handler: (args: string, ctx: unknown) => Promise<void> }) => {
			commands[name] = command;
		},
	} as unknown as Parameters<typeof applyChangesExtension>[0]);
	return { tools, commands };
}

describe("apply_changes tool", () => {
	it("applies the change set and reports each entry", async () => {
		const cwd = createTempDir();
		const execute = setupTool(cwd);

		const result = await execute({
			message: "Add greeting",
			file_entries: [
				{ file: "hello.txt", action: "create_file", changes: [{ original_lines: [], changed_lines: ["hi"] }] },
			],
		});

		expect(result.isError).toBe(false);
		expect(result.content?.[0]?.text).toBe(
			["1/1 file entry applied", "✓ hello.txt: create_file (1 change)", "", "Message: Add greeting"].join("\n"),
		);
		expect(readFileSync(join(cwd, "hello.txt"), "utf-8")).toBe("hi\n");
	});

	it("flags failed entries as an error result", async () => {
		const cwd = createTempDir();
		const execute = setupTool(cwd);

		const result = await execute({
			file_entries: [
				{
					file: "missing.txt",
					action: "replace_lines",
					changes: [{ original_lines: ["a"], changed_lines: ["b"] }],
				},
			],
		});

		expect(result.isError).toBe(true);
		expect(result.content?.[0]?.text).toBe(
			[
				"0/1 file entry applied",
				"✗ missing.txt: replace_lines failed",
				"  error file_not_found [change 1]: File does not exist for replace_lines",
			].join("\n"),
		);
	});

	it("leaves files untouched on dry runs", async () => {
		const cwd = createTempDir();
		const execute = setupTool(cwd);

		const result = await execute({
			dry_run: true,
			file_entries: [
				{ file: "hello.txt", action: "create_file", changes: [{ original_lines: [], changed_lines: ["hi"] }] },
			],
		});

		expect(result.isError).toBe(false);
		expect(result.content?.[0]?.text?.split("\n")[0]).toBe("Dry run: 1/1 file entry applied");
		expect(existsSync(join(cwd, "hello.txt"))).toBe(false);
	});

	it("rejects an empty change set before touching files", async () => {
		const execute = setupTool(createTempDir());
		const result = await execute({ file_entries: [] });

		expect(result.isError).toBe(true);
		expect(result.content?.[0]?.text).toBe(
			"Change set rejected:\n  error json_structure: file_entries must be a non-empty list",
		);
	});
});

describe("apply-changes commands", () => {
	it("registers the tool and both commands", () => {
		const { tools, commands } = setupExtension(applyChangesExtension);
		expect(Object.keys(tools)).toEqual(["apply_changes"]);
		expect(Object.keys(commands).sort()).toEqual(["apply-changes", "apply-changes-format"]);
	});

	it("applies a change-set file from the working directory", async () => {
		const cwd = createTempDir();
		writeFileSync(join(cwd, "notes.txt"), "draft\n");
		writeFileSync(
			join(cwd, "changes.json"),
			JSON.stringify({
				file_entries: [
					{ file: "notes.txt", action: "replace_lines", changes: [{ original_lines: ["draft"], changed_lines: ["final"] }] },
				],
			}),
		);
		const notify = vi.fn();
		const { commands } = setupExtension();

		await commands["apply-changes"]?.handler("changes.json --config none.json", { cwd, ui: { notify } });

		expect(readFileSync(join(cwd, "notes.txt"), "utf-8")).toBe("final\n");
		expect(notify).toHaveBeenCalledWith(`Config file not found: ${join(cwd, "none.json")}`, "warning");
		expect(notify).toHaveBeenLastCalledWith(
			"1/1 file entry applied\n✓ notes.txt: replace_lines (1 change)",
			"info",
		);
	});

	it("reads user config from the configured home directory", async () => {
		const home = createTempDir();
		const cwd = createTempDir();
		mkdirSync(join(home, ".pi"), { recursive: true });
		writeFileSync(join(home, ".pi", "apply-changes.json"), JSON.stringify({ allow_file_deletion: false }));
		writeFileSync(join(cwd, "old.txt"), "bye\n");
		writeFileSync(
			join(cwd, "changes.json"),
			JSON.stringify({ file_entries: [{ file: "old.txt", action: "delete_file", changes: [] }] }),
		);
		const notify = vi.fn();
		const { commands } = setupExtension(createApplyChangesExtension({ homeDir: home }));

		await commands["apply-changes"]?.handler("changes.json", { cwd, ui: { notify } });

		expect(existsSync(join(cwd, "old.txt"))).toBe(true);
		expect(notify).toHaveBeenLastCalledWith(
			[
				"0/1 file entry applied",
				"✗ old.txt: delete_file failed",
				"  error permission_denied: File deletion is not allowed by configuration",
			].join("\n"),
			"warning",
		);
	});

	it("reports argument errors with the help text", async () => {
		const notify = vi.fn();
		const { commands } = setupExtension();

		await commands["apply-changes"]?.handler("--bogus", { cwd: createTempDir(), ui: { notify } });

		expect(notify).toHaveBeenNthCalledWith(1, "apply-changes error: Unknown flag: --bogus", "warning");
		expect(notify).toHaveBeenNthCalledWith(2, expect.stringContaining("Usage: /apply-changes"), "info");
	});

	it("shows the change-set format", async () => {
		const notify = vi.fn();
		const { commands } = setupExtension();

		await commands["apply-changes-format"]?.handler("", { cwd: createTempDir(), ui: { notify } });

		expect(notify).toHaveBeenCalledWith(getChangeFormatDescription(), "info");
		expect(getChangeFormatDescription()).toContain('"file_entries": [');
	});
});
