import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import { SIMILARITY_METRICS, WHITESPACE_HANDLINGS } from "pi-line-match";
import { parse as parseYaml } from "yaml";
import { NON_ASCII_ACTIONS, type ApplyConfig, type ExtensionRule, type RuleSet } from "../types.js";
import { DEFAULT_APPLY_CONFIG } from "./defaults.js";

const CONFIG_BASENAME = "apply-changes";
const CONFIG_FILENAMES = [`${CONFIG_BASENAME}.json`, `${CONFIG_BASENAME}.yaml`, `${CONFIG_BASENAME}.yml`];

interface RuleSetLayer<T> {
	default?: T;
	rules?: ExtensionRule<T>[];
}

interface ApplyConfigLayer {
	allowFileDeletion?: boolean;
	nonAscii?: RuleSetLayer<ApplyConfig["validation"]["nonAscii"]["default"]>;
	whitespace?: RuleSetLayer<ApplyConfig["matching"]["whitespace"]["default"]>;
	similarity?: RuleSetLayer<number>;
	similarityMetric?: RuleSetLayer<ApplyConfig["matching"]["similarityMetric"]["default"]>;
	useFuzzy?: RuleSetLayer<boolean>;
	caseSensitive?: RuleSetLayer<boolean>;
	maxSearchLines?: number;
}

interface CategorySpec<T> {
	path: string;
	/** Key older config files use in place of `value` inside a rule */
	legacyKey: string;
	isValue: (value: unknown) => value is T;
}

export interface ApplyConfigResolverOptions {
	cwd?: string;
	homeDir?: string;
	explicitConfigPath?: string;
	warn?: (message: string) => void;
}

export interface ResolvedApplyConfig {
	config: ApplyConfig;
	/** Config files that contributed, lowest precedence first */
	sources: string[];
}

export interface ApplyConfigResolver {
	resolve(): ResolvedApplyConfig;
}

function isOneOf<T extends string>(values: readonly T[]): (value: unknown) => value is T {
	return (value: unknown): value is T => typeof value === "string" && (values as readonly string[]).includes(value);
}

function isBoolean(value: unknown): value is boolean {
	return typeof value === "boolean";
}

function isRatio(value: unknown): value is number {
	return typeof value === "number" && Number.isFinite(value) && value >= 0 && value <= 1;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

const NON_ASCII_SPEC: CategorySpec<ApplyConfig["validation"]["nonAscii"]["default"]> = {
	path: "validation.non_ascii",
	legacyKey: "action",
	isValue: isOneOf(NON_ASCII_ACTIONS),
};
const WHITESPACE_SPEC: CategorySpec<ApplyConfig["matching"]["whitespace"]["default"]> = {
	path: "matching.whitespace",
	legacyKey: "handling",
	isValue: isOneOf(WHITESPACE_HANDLINGS),
};
const SIMILARITY_SPEC: CategorySpec<number> = {
	path: "matching.similarity",
	legacyKey: "threshold",
	isValue: isRatio,
};
const METRIC_SPEC: CategorySpec<ApplyConfig["matching"]["similarityMetric"]["default"]> = {
	path: "matching.similarity_metric",
	legacyKey: "metric",
	isValue: isOneOf(SIMILARITY_METRICS),
};
const USE_FUZZY_SPEC: CategorySpec<boolean> = { path: "matching.use_fuzzy", legacyKey: "use_fuzzy", isValue: isBoolean };
const CASE_SENSITIVE_SPEC: CategorySpec<boolean> = {
	path: "matching.case_sensitive",
	legacyKey: "case_sensitive",
	isValue: isBoolean,
};

export function createApplyConfigResolver(options: ApplyConfigResolverOptions = {}): ApplyConfigResolver {
	const cwd = options.cwd ?? process.cwd();
	const homeDir = options.homeDir ?? homedir();
	const warn = options.warn ?? ((message: string) => console.warn(message));

	return {
		resolve(): ResolvedApplyConfig {
			let config = DEFAULT_APPLY_CONFIG;
			const sources: string[] = [];

			for (const candidate of getConfigCandidates(cwd, homeDir, options.explicitConfigPath, warn)) {
				const parsed = parseConfigFile(candidate, warn);
				if (!parsed) {
					continue;
				}
				config = mergeConfig(config, normalizeConfig(parsed, candidate, warn));
				sources.push(candidate);
			}

			return { config, sources };
		},
	};
}

function getConfigCandidates(
	cwd: string,
	homeDir: string,
	explicitConfigPath: string | undefined,
	warn: (message: string) => void,
): string[] {
	// `~/.pi/agent` is the coding-agent convention. `~/.pi` is supported as a lightweight fallback.
	const dirs = [join(homeDir, ".pi"), join(homeDir, ".pi", "agent"), join(cwd, ".pi")];
	const candidates: string[] = [];
	for (const dir of dirs) {
		const found = CONFIG_FILENAMES.map((filename) => join(dir, filename)).find((filePath) => existsSync(filePath));
		if (found) {
			candidates.push(found);
		}
	}

	if (explicitConfigPath) {
		const explicit = isAbsolute(explicitConfigPath) ? explicitConfigPath : resolve(cwd, explicitConfigPath);
		if (existsSync(explicit)) {
			candidates.push(explicit);
		} else {
			warn(`Config file not found: ${explicit}`);
		}
	}

	return candidates;
}

function parseConfigFile(filePath: string, warn: (message: string) => void): Record<string, unknown> | undefined {
	try {
		const content = readFileSync(filePath, "utf-8");
		const parsed: unknown = filePath.endsWith(".json") ? JSON.parse(content) : parseYaml(content);
		if (!isRecord(parsed)) {
			warn(`Ignoring non-object apply-changes config in ${filePath}`);
			return undefined;
		}
		return parsed;
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		warn(`Failed to parse apply-changes config ${filePath}: ${message}`);
		return undefined;
	}
}

function getSection(raw: Record<string, unknown>, key: string): Record<string, unknown> {
	const section = raw[key];
	return isRecord(section) ? section : {};
}

export function normalizeConfig(
	raw: Record<string, unknown>,
	source: string,
	warn: (message: string) => void,
): ApplyConfigLayer {
	const validation = getSection(raw, "validation");
	const matching = getSection(raw, "matching");
	const layer: ApplyConfigLayer = {
		nonAscii: normalizeRuleSet(validation.non_ascii, NON_ASCII_SPEC, source, warn),
		whitespace: normalizeRuleSet(matching.whitespace, WHITESPACE_SPEC, source, warn),
		similarity: normalizeRuleSet(matching.similarity, SIMILARITY_SPEC, source, warn),
		similarityMetric: normalizeRuleSet(matching.similarity_metric, METRIC_SPEC, source, warn),
		useFuzzy: normalizeRuleSet(matching.use_fuzzy, USE_FUZZY_SPEC, source, warn),
		caseSensitive: normalizeRuleSet(matching.case_sensitive, CASE_SENSITIVE_SPEC, source, warn),
	};

	const allowFileDeletion = raw.allow_file_deletion;
	if (allowFileDeletion !== undefined) {
		if (isBoolean(allowFileDeletion)) {
			layer.allowFileDeletion = allowFileDeletion;
		} else {
			warn(`${source}: allow_file_deletion must be a boolean`);
		}
	}

	const maxSearchLines = matching.max_search_lines;
	if (maxSearchLines !== undefined && maxSearchLines !== null) {
		if (typeof maxSearchLines === "number" && Number.isInteger(maxSearchLines) && maxSearchLines > 0) {
			layer.maxSearchLines = maxSearchLines;
		} else {
			warn(`${source}: matching.max_search_lines must be a positive integer`);
		}
	}

	return layer;
}

function normalizeExtension(raw: string): string {
	const trimmed = raw.trim().toLowerCase();
	return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

function normalizeRuleSet<T>(
	raw: unknown,
	spec: CategorySpec<T>,
	source: string,
	warn: (message: string) => void,
): RuleSetLayer<T> | undefined {
	if (raw === undefined) {
		return undefined;
	}
	if (!isRecord(raw)) {
		warn(`${source}: ${spec.path} must be an object with default/rules`);
		return undefined;
	}

	const layer: RuleSetLayer<T> = {};
	const defaultValue = raw.default;
	if (defaultValue !== undefined) {
		if (spec.isValue(defaultValue)) {
			layer.default = defaultValue;
		} else {
			warn(`${source}: invalid ${spec.path}.default ${JSON.stringify(defaultValue)}`);
		}
	}

	const rawRules = raw.rules;
	if (rawRules !== undefined) {
		if (!Array.isArray(rawRules)) {
			warn(`${source}: ${spec.path}.rules must be a list`);
			return layer;
		}
		const rules: ExtensionRule<T>[] = [];
		rawRules.forEach((entry: unknown, index: number) => {
			const rule = normalizeRule(entry, spec);
			if (rule) {
				rules.push(rule);
			} else {
				warn(`${source}: ignoring invalid rule ${spec.path}.rules[${index}]`);
			}
		});
		layer.rules = rules;
	}

	return layer;
}

function normalizeRule<T>(entry: unknown, spec: CategorySpec<T>): ExtensionRule<T> | undefined {
	if (!isRecord(entry)) {
		return undefined;
	}
	const rawExtensions = entry.extensions;
	if (!Array.isArray(rawExtensions)) {
		return undefined;
	}
	const extensions = rawExtensions
		.filter((extension: unknown): extension is string => typeof extension === "string" && extension.trim() !== "")
		.map(normalizeExtension);
	const value = entry.value !== undefined ? entry.value : entry[spec.legacyKey];
	if (extensions.length === 0 || !spec.isValue(value)) {
		return undefined;
	}
	return { extensions, value };
}

function mergeRuleSet<T>(base: RuleSet<T>, layer: RuleSetLayer<T> | undefined): RuleSet<T> {
	if (!layer) {
		return base;
	}
	return {
		default: layer.default !== undefined ? layer.default : base.default,
		rules: layer.rules ?? base.rules,
	};
}

export function mergeConfig(base: ApplyConfig, layer: ApplyConfigLayer): ApplyConfig {
	return {
		allowFileDeletion: layer.allowFileDeletion ?? base.allowFileDeletion,
		validation: {
			nonAscii: mergeRuleSet(base.validation.nonAscii, layer.nonAscii),
		},
		matching: {
			whitespace: mergeRuleSet(base.matching.whitespace, layer.whitespace),
			similarity: mergeRuleSet(base.matching.similarity, layer.similarity),
			similarityMetric: mergeRuleSet(base.matching.similarityMetric, layer.similarityMetric),
			useFuzzy: mergeRuleSet(base.matching.useFuzzy, layer.useFuzzy),
			caseSensitive: mergeRuleSet(base.matching.caseSensitive, layer.caseSensitive),
			maxSearchLines: layer.maxSearchLines ?? base.matching.maxSearchLines,
		},
	};
}

/** Build a config from an in-memory object shaped like the config file */
export function configFromObject(raw: Record<string, unknown>, warn: (message: string) => void = () => {}): ApplyConfig {
	return mergeConfig(DEFAULT_APPLY_CONFIG, normalizeConfig(raw, "inline config", warn));
}
