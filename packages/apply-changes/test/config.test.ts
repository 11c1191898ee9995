import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_APPLY_CONFIG, withOverrides } from "../src/config/defaults.js";
import { configFromObject, createApplyConfigResolver } from "../src/config/loader.js";
import { getFileExtension, resolveMatchOptions, resolveRule } from "../src/config/rules.js";

const tempDirs: string[] = [];

function createTempDir(prefix: string): string {
	const dir = mkdtempSync(join(tmpdir(), prefix));
	tempDirs.push(dir);
	return dir;
}

afterEach(() => {
	for (const dir of tempDirs.splice(0, tempDirs.length)) {
		rmSync(dir, { recursive: true, force: true });
	}
});

describe("rule resolution", () => {
	it("picks the first rule listing the lower-cased extension", () => {
		expect(resolveRule("non_ascii", "src/app.py", DEFAULT_APPLY_CONFIG)).toBe("error");
		expect(resolveRule("non_ascii", "docs/README.MD", DEFAULT_APPLY_CONFIG)).toBe("ignore");
		expect(resolveRule("non_ascii", "notes.txt", DEFAULT_APPLY_CONFIG)).toBe("warning");
	});

	it("falls back to the default for files without an extension", () => {
		expect(getFileExtension("Makefile")).toBe("");
		expect(resolveRule("non_ascii", "Makefile", DEFAULT_APPLY_CONFIG)).toBe("warning");
	});

	it("uses the first matching rule when several list the extension", () => {
		const config = configFromObject({
			matching: {
				similarity: {
					default: 0.9,
					rules: [
						{ extensions: [".ts"], value: 0.7 },
						{ extensions: [".ts", ".js"], value: 0.5 },
					],
				},
			},
		});
		expect(resolveRule("similarity", "a.ts", config)).toBe(0.7);
		expect(resolveRule("similarity", "a.js", config)).toBe(0.5);
		expect(resolveRule("similarity", "a.go", config)).toBe(0.9);
	});

	it("builds matcher options from the resolved categories", () => {
		expect(resolveMatchOptions("main.py", DEFAULT_APPLY_CONFIG)).toEqual({
			whitespace: "collapse",
			caseSensitive: true,
			useFuzzy: true,
			threshold: 0.95,
			metric: "sequence_matcher",
			maxSearchLines: undefined,
		});
	});

	it("does not mutate the config it reads", () => {
		const before = JSON.stringify(DEFAULT_APPLY_CONFIG);
		resolveRule("whitespace", "a.py", DEFAULT_APPLY_CONFIG);
		withOverrides(DEFAULT_APPLY_CONFIG, { nonAsciiAction: "ignore", allowFileDeletion: false });
		expect(JSON.stringify(DEFAULT_APPLY_CONFIG)).toBe(before);
	});
});

describe("withOverrides", () => {
	it("replaces the non-ASCII default but keeps extension rules", () => {
		const config = withOverrides(DEFAULT_APPLY_CONFIG, { nonAsciiAction: "ignore", allowFileDeletion: false });
		expect(config.allowFileDeletion).toBe(false);
		expect(resolveRule("non_ascii", "notes.txt", config)).toBe("ignore");
		expect(resolveRule("non_ascii", "app.py", config)).toBe("error");
	});
});

describe("apply-changes config resolver", () => {
	it("merges home and project config files in precedence order", () => {
		const home = createTempDir("apply-home-");
		const cwd = createTempDir("apply-cwd-");
		mkdirSync(join(home, ".pi", "agent"), { recursive: true });
		mkdirSync(join(cwd, ".pi"), { recursive: true });

		writeFileSync(
			join(home, ".pi", "agent", "apply-changes.yaml"),
			[
				"allow_file_deletion: false",
				"validation:",
				"  non_ascii:",
				"    default: error",
				"matching:",
				"  similarity:",
				"    default: 0.8",
				"    rules:",
				"      - extensions: [PY, '.Md']",
				"        threshold: 0.7",
			].join("\n"),
		);
		writeFileSync(
			join(cwd, ".pi", "apply-changes.json"),
			JSON.stringify({ matching: { whitespace: { default: "strict" }, max_search_lines: 100 } }),
		);

		const warnings: string[] = [];
		const resolved = createApplyConfigResolver({ cwd, homeDir: home, warn: (message) => warnings.push(message) }).resolve();

		expect(warnings).toEqual([]);
		expect(resolved.sources).toEqual([
			join(home, ".pi", "agent", "apply-changes.yaml"),
			join(cwd, ".pi", "apply-changes.json"),
		]);
		expect(resolved.config.allowFileDeletion).toBe(false);
		expect(resolved.config.validation.nonAscii.default).toBe("error");
		expect(resolved.config.validation.nonAscii.rules).toEqual(DEFAULT_APPLY_CONFIG.validation.nonAscii.rules);
		expect(resolved.config.matching.similarity).toEqual({
			default: 0.8,
			rules: [{ extensions: [".py", ".md"], value: 0.7 }],
		});
		expect(resolved.config.matching.whitespace.default).toBe("strict");
		expect(resolved.config.matching.maxSearchLines).toBe(100);
	});

	it("applies an explicit config file last and warns when it is missing", () => {
		const home = createTempDir("apply-home-");
		const cwd = createTempDir("apply-cwd-");
		writeFileSync(join(cwd, "custom.json"), JSON.stringify({ matching: { use_fuzzy: { default: false } } }));

		const resolved = createApplyConfigResolver({ cwd, homeDir: home, explicitConfigPath: "custom.json" }).resolve();
		expect(resolved.sources).toEqual([join(cwd, "custom.json")]);
		expect(resolved.config.matching.useFuzzy.default).toBe(false);

		const warnings: string[] = [];
		createApplyConfigResolver({
			cwd,
			homeDir: home,
			explicitConfigPath: "absent.yaml",
			warn: (message) => warnings.push(message),
		}).resolve();
		expect(warnings).toEqual([`Config file not found: ${join(cwd, "absent.yaml")}`]);
	});

	it("warns about unparseable files and keeps the defaults", () => {
		const home = createTempDir("apply-home-");
		const cwd = createTempDir("apply-cwd-");
		mkdirSync(join(cwd, ".pi"), { recursive: true });
		writeFileSync(join(cwd, ".pi", "apply-changes.json"), "{ not json");

		const warnings: string[] = [];
		const resolved = createApplyConfigResolver({ cwd, homeDir: home, warn: (message) => warnings.push(message) }).resolve();
		expect(resolved.sources).toEqual([]);
		expect(resolved.config).toEqual(DEFAULT_APPLY_CONFIG);
		expect(warnings).toHaveLength(1);
		expect(warnings[0]).toMatch(/^Failed to parse apply-changes config /);
	});

	it("reports invalid values and ignores them", () => {
		const warnings: string[] = [];
		const config = configFromObject(
			{ matching: { whitespace: { default: "tabs" }, similarity: { default: 1.5 } } },
			(message) => warnings.push(message),
		);
		expect(warnings).toEqual([
			'inline config: invalid matching.whitespace.default "tabs"',
			"inline config: invalid matching.similarity.default 1.5",
		]);
		expect(config).toEqual(DEFAULT_APPLY_CONFIG);
	});
});
