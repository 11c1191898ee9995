import { extname } from "node:path";
import type { LineMatchOptions } from "pi-line-match";
import type { ApplyConfig, NonAsciiAction, RuleSet } from "../types.js";

interface RuleCategories {
	non_ascii: NonAsciiAction;
	whitespace: ApplyConfig["matching"]["whitespace"]["default"];
	similarity: number;
	similarity_metric: ApplyConfig["matching"]["similarityMetric"]["default"];
	use_fuzzy: boolean;
	case_sensitive: boolean;
}

export type RuleCategory = keyof RuleCategories;

export type RuleValue<C extends RuleCategory> = RuleCategories[C];

export const RULE_CATEGORIES = [
	"non_ascii",
	"whitespace",
	"similarity",
	"similarity_metric",
	"use_fuzzy",
	"case_sensitive",
] as const satisfies readonly RuleCategory[];

export function getRuleSet<C extends RuleCategory>(config: ApplyConfig, category: C): RuleSet<RuleValue<C>> {
	const sets: { [K in RuleCategory]: RuleSet<RuleValue<K>> } = {
		non_ascii: config.validation.nonAscii,
		whitespace: config.matching.whitespace,
		similarity: config.matching.similarity,
		similarity_metric: config.matching.similarityMetric,
		use_fuzzy: config.matching.useFuzzy,
		case_sensitive: config.matching.caseSensitive,
	};
	return sets[category];
}

/** Lower-cased extension of a path including the dot, or "" when there is none */
export function getFileExtension(filePath: string): string {
	return extname(filePath).toLowerCase();
}

export function resolveFromRuleSet<T>(ruleSet: RuleSet<T>, filePath: string): T {
	const extension = getFileExtension(filePath);
	if (!extension) {
		return ruleSet.default;
	}
	for (const rule of ruleSet.rules) {
		if (rule.extensions.some((candidate) => candidate.toLowerCase() === extension)) {
			return rule.value;
		}
	}
	return ruleSet.default;
}

/**
 * Resolve a per-extension setting: the first rule listing the file's extension wins,
 * otherwise the category default applies.
 */
export function resolveRule<C extends RuleCategory>(category: C, filePath: string, config: ApplyConfig): RuleValue<C> {
	return resolveFromRuleSet(getRuleSet(config, category), filePath);
}

export function resolveMatchOptions(filePath: string, config: ApplyConfig): LineMatchOptions {
	return {
		whitespace: resolveRule("whitespace", filePath, config),
		caseSensitive: resolveRule("case_sensitive", filePath, config),
		useFuzzy: resolveRule("use_fuzzy", filePath, config),
		threshold: resolveRule("similarity", filePath, config),
		metric: resolveRule("similarity_metric", filePath, config),
		maxSearchLines: config.matching.maxSearchLines,
	};
}
