/**
 * Line-window matching for change application.
 *
 * Locates the single range of file lines that a change's expected lines refer to.
 * An exact pass over normalized lines runs first; the fuzzy pass only runs when the
 * exact pass finds nothing and fuzzy matching is enabled. Results from the two passes
 * are never mixed, and more than one accepted window is always reported as ambiguous.
 */
import { normalizeLines } from "./normalize.js";
import { levenshteinRatio, sequenceRatio } from "./similarity.js";
import type {
	ClosestCandidate,
	LineMatchFailure,
	LineMatchOptions,
	LineMatchResult,
	MatchFailureReason,
	MatchStrategy,
	SimilarityMetric,
} from "./types.js";

export { normalizeLine, normalizeLines } from "./normalize.js";
export {
	getMatchingBlocks,
	levenshteinDistance,
	levenshteinRatio,
	sequenceRatio,
	similarity,
} from "./similarity.js";
export type { MatchingBlock } from "./similarity.js";
export { SIMILARITY_METRICS, WHITESPACE_HANDLINGS } from "./types.js";
export type {
	ClosestCandidate,
	LineMatchFailure,
	LineMatchOptions,
	LineMatchResult,
	LineMatchSuccess,
	MatchFailureReason,
	MatchRange,
	MatchStrategy,
	NormalizeOptions,
	SimilarityMetric,
	WhitespaceHandling,
} from "./types.js";

/** Default similarity threshold for fuzzy matching */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.95;

const MAX_REPORTED_INDICES = 10;

function fail(
	reason: MatchFailureReason,
	extra: { strategy?: MatchStrategy; matchIndices?: number[]; closest?: ClosestCandidate } = {},
): LineMatchFailure {
	return {
		ok: false,
		reason,
		strategy: extra.strategy,
		matchIndices: extra.matchIndices ?? [],
		closest: extra.closest,
	};
}

function windowEquals(content: readonly string[], pattern: readonly string[], start: number): boolean {
	for (let j = 0; j < pattern.length; j++) {
		if (content[start + j] !== pattern[j]) {
			return false;
		}
	}
	return true;
}

export function windowRatio(metric: SimilarityMetric, window: readonly string[], pattern: readonly string[]): number {
	return metric === "levenshtein" ? levenshteinRatio(window, pattern) : sequenceRatio(window, pattern);
}

/** Number of start offsets examined for a pattern of `patternLength` lines */
export function countCandidates(fileLength: number, patternLength: number, maxSearchLines?: number): number {
	const available = patternLength > fileLength ? 0 : fileLength - patternLength + 1;
	if (maxSearchLines === undefined) return available;
	return Math.min(available, Math.max(0, Math.floor(maxSearchLines)));
}

/**
 * Find the one window of `fileLines` that matches `patternLines`.
 */
export function matchLines(
	fileLines: readonly string[],
	patternLines: readonly string[],
	options: LineMatchOptions,
): LineMatchResult {
	if (fileLines.length === 0) {
		return fail("empty_file");
	}
	if (patternLines.length === 0) {
		return fail("empty_pattern");
	}

	const patternLength = patternLines.length;
	const candidates = countCandidates(fileLines.length, patternLength, options.maxSearchLines);
	const content = normalizeLines(fileLines, options);
	const pattern = normalizeLines(patternLines, options);

	const exactIndices: number[] = [];
	for (let start = 0; start < candidates; start++) {
		if (windowEquals(content, pattern, start)) {
			exactIndices.push(start);
		}
	}

	if (exactIndices.length === 1) {
		const start = exactIndices[0];
		return { ok: true, range: { start, end: start + patternLength }, strategy: "exact", confidence: 1 };
	}
	if (exactIndices.length > 1) {
		return fail("multiple_matches", { strategy: "exact", matchIndices: exactIndices });
	}
	if (!options.useFuzzy) {
		return fail("no_match", { strategy: "exact" });
	}

	const accepted: Array<{ start: number; confidence: number }> = [];
	let closest: ClosestCandidate | undefined;
	for (let start = 0; start < candidates; start++) {
		const confidence = windowRatio(options.metric, content.slice(start, start + patternLength), pattern);
		if (confidence >= options.threshold) {
			accepted.push({ start, confidence });
		}
		if (!closest || confidence > closest.confidence) {
			closest = { start, confidence };
		}
	}

	if (accepted.length === 0) {
		return fail("no_match", { strategy: "fuzzy", closest });
	}
	if (accepted.length > 1) {
		return fail("multiple_matches", { strategy: "fuzzy", matchIndices: accepted.map((entry) => entry.start) });
	}

	const [only] = accepted;
	return {
		ok: true,
		range: { start: only.start, end: only.start + patternLength },
		strategy: "fuzzy",
		confidence: only.confidence,
	};
}

/**
 * Human-readable description of a failed match, with 1-based line numbers.
 */
export function formatMatchFailure(
	path: string,
	failure: LineMatchFailure,
	options: Pick<LineMatchOptions, "useFuzzy" | "threshold">,
): string {
	switch (failure.reason) {
		case "empty_file":
			return `No match: ${path} is empty`;
		case "empty_pattern":
			return "No match: original_lines is empty";
		case "multiple_matches": {
			const shown = failure.matchIndices.slice(0, MAX_REPORTED_INDICES).map((index) => index + 1);
			const more = failure.matchIndices.length - shown.length;
			const suffix = more > 0 ? ` and ${more} more` : "";
			const pass = failure.strategy === "fuzzy" ? "fuzzy " : "";
			return `Multiple ${pass}matches found for original_lines in ${path} at lines ${shown.join(", ")}${suffix}. Include more context lines to make the match unique.`;
		}
		case "no_match": {
			if (!options.useFuzzy) {
				return `No matching lines found in ${path}. Fuzzy matching is disabled for this file type.`;
			}
			if (!failure.closest) {
				return `No matching lines found in ${path}.`;
			}
			const similarityPercent = Math.round(failure.closest.confidence * 100);
			const thresholdPercent = Math.round(options.threshold * 100);
			return `No matching lines found in ${path}. Closest candidate at line ${failure.closest.start + 1} was ${similarityPercent}% similar (threshold ${thresholdPercent}%).`;
		}
	}
}
