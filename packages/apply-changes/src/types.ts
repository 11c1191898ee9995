/**
 * Shared types for change application.
 */
import type { MatchRange, SimilarityMetric, WhitespaceHandling } from "pi-line-match";

export const ACTIONS = ["replace_lines", "create_file", "delete_file"] as const;

export type Action = (typeof ACTIONS)[number];

export function isAction(value: unknown): value is Action {
	return typeof value === "string" && (ACTIONS as readonly string[]).includes(value);
}

export interface LineChange {
	readonly originalLines: readonly string[];
	readonly changedLines: readonly string[];
}

export interface FileEntry {
	/** Path relative to the base directory */
	readonly file: string;
	readonly action: Action;
	readonly changes: readonly LineChange[];
}

export type { MatchRange };

export const NON_ASCII_ACTIONS = ["error", "warning", "ignore"] as const;

export type NonAsciiAction = (typeof NON_ASCII_ACTIONS)[number];

export interface ExtensionRule<T> {
	readonly extensions: readonly string[];
	readonly value: T;
}

/** Extension-keyed overrides with a default fallback */
export interface RuleSet<T> {
	readonly default: T;
	readonly rules: readonly ExtensionRule<T>[];
}

export interface ApplyConfig {
	readonly allowFileDeletion: boolean;
	readonly validation: {
		readonly nonAscii: RuleSet<NonAsciiAction>;
	};
	readonly matching: {
		readonly whitespace: RuleSet<WhitespaceHandling>;
		readonly similarity: RuleSet<number>;
		readonly similarityMetric: RuleSet<SimilarityMetric>;
		readonly useFuzzy: RuleSet<boolean>;
		readonly caseSensitive: RuleSet<boolean>;
		readonly maxSearchLines?: number;
	};
}

export type ErrorType =
	| "json_structure"
	| "file_path"
	| "invalid_action"
	| "changes_empty"
	| "orig_lines_empty"
	| "orig_lines_not_empty"
	| "empty_changed_lines"
	| "changed_lines_not_empty"
	| "non_ascii_chars"
	| "file_not_found"
	| "file_already_exists"
	| "permission_denied"
	| "no_match"
	| "multiple_matches"
	| "file_system";

export type ErrorSeverity = "error" | "warning" | "info";

export type ErrorDetailValue = string | number | boolean | null | readonly (string | number)[];

/** Position of the change an error refers to; never a live reference */
export interface ChangeRef {
	file: string;
	/** 0-based index into the entry's change list */
	changeIndex?: number;
}

export interface ApplyErrorRecord {
	errorType: ErrorType;
	severity: ErrorSeverity;
	message: string;
	details: Record<string, ErrorDetailValue>;
	ref?: ChangeRef;
}

export interface ApplySuccess {
	ok: true;
	file: string;
	action: Action;
	changeCount: number;
	/** Non-blocking records produced while applying */
	warnings: ApplyErrorRecord[];
}

export interface ApplyFailure {
	ok: false;
	file: string;
	action: Action;
	errors: ApplyErrorRecord[];
}

export type ApplyResult = ApplySuccess | ApplyFailure;

export interface ApplyRunResult {
	ok: boolean;
	results: ApplyResult[];
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type ApplyLogger = (level: LogLevel, message: string) => void;
