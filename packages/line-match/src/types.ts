/**
 * Shared types for the line matcher.
 */

/** How whitespace is treated before two lines are compared */
export type WhitespaceHandling = "strict" | "collapse" | "remove" | "ignore";

/** Similarity metric used by the fuzzy pass */
export type SimilarityMetric = "sequence_matcher" | "levenshtein";

export const WHITESPACE_HANDLINGS = ["strict", "collapse", "remove", "ignore"] as const satisfies readonly WhitespaceHandling[];
export const SIMILARITY_METRICS = ["sequence_matcher", "levenshtein"] as const satisfies readonly SimilarityMetric[];

export interface NormalizeOptions {
	whitespace: WhitespaceHandling;
	caseSensitive: boolean;
}

export interface LineMatchOptions extends NormalizeOptions {
	useFuzzy: boolean;
	threshold: number;
	metric: SimilarityMetric;
	/** Caps how many start offsets (from the top of the file) are examined */
	maxSearchLines?: number;
}

/** Half-open `[start, end)` line range */
export interface MatchRange {
	start: number;
	end: number;
}

export type MatchStrategy = "exact" | "fuzzy";

export type MatchFailureReason = "empty_file" | "empty_pattern" | "no_match" | "multiple_matches";

export interface ClosestCandidate {
	start: number;
	confidence: number;
}

export interface LineMatchSuccess {
	ok: true;
	range: MatchRange;
	strategy: MatchStrategy;
	confidence: number;
}

export interface LineMatchFailure {
	ok: false;
	reason: MatchFailureReason;
	/** Pass that produced the failure; absent for empty inputs */
	strategy?: MatchStrategy;
	/** Start offsets of every accepted window (only for `multiple_matches`) */
	matchIndices: number[];
	/** Best window below the threshold when the fuzzy pass found nothing */
	closest?: ClosestCandidate;
}

export type LineMatchResult = LineMatchSuccess | LineMatchFailure;
