import { formatMatchFailure, type LineMatchSuccess, matchLines } from "pi-line-match";
import { resolveMatchOptions } from "../config/rules.js";
import { createErrorRecord } from "../errors.js";
import type { ApplyConfig, ApplyErrorRecord, ChangeRef, LineChange } from "../types.js";

export type ChangeMatchResult = LineMatchSuccess | { ok: false; error: ApplyErrorRecord };

/**
 * Locate a change's original lines in the current file lines using the
 * matching settings resolved for the file's extension.
 */
export function matchChange(
	fileLines: readonly string[],
	change: LineChange,
	filePath: string,
	config: ApplyConfig,
	ref: ChangeRef = { file: filePath },
): ChangeMatchResult {
	const options = resolveMatchOptions(filePath, config);
	const result = matchLines(fileLines, change.originalLines, options);
	if (result.ok) {
		return result;
	}

	const message = formatMatchFailure(filePath, result, options);
	if (result.reason === "multiple_matches") {
		return {
			ok: false,
			error: createErrorRecord("multiple_matches", message, {
				details: {
					file: filePath,
					match_count: result.matchIndices.length,
					match_indices: result.matchIndices,
					strategy: result.strategy ?? "exact",
				},
				ref,
			}),
		};
	}

	const details: Record<string, string | number> = { file: filePath, reason: result.reason };
	if (result.closest) {
		details.closest_line = result.closest.start + 1;
		details.closest_similarity = Number(result.closest.confidence.toFixed(4));
	}
	return { ok: false, error: createErrorRecord("no_match", message, { details, ref }) };
}
