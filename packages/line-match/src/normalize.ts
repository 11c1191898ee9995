/**
 * Line normalization applied identically to file windows and patterns.
 */
import type { NormalizeOptions, WhitespaceHandling } from "./types.js";

const WHITESPACE_RUN_RE = /\s+/g;

function applyWhitespaceHandling(line: string, handling: WhitespaceHandling): string {
	switch (handling) {
		case "strict":
			return line;
		case "collapse":
			return line.trim().replace(WHITESPACE_RUN_RE, " ");
		case "remove":
		case "ignore":
			return line.replace(WHITESPACE_RUN_RE, "");
	}
}

/** Normalize a single line for comparison */
export function normalizeLine(line: string, options: NormalizeOptions): string {
	const normalized = applyWhitespaceHandling(line, options.whitespace);
	return options.caseSensitive ? normalized : normalized.toLowerCase();
}

export function normalizeLines(lines: readonly string[], options: NormalizeOptions): string[] {
	return lines.map((line) => normalizeLine(line, options));
}
