import type { ApplyErrorRecord, ChangeRef, ErrorDetailValue, ErrorSeverity, ErrorType } from "./types.js";

export function createErrorRecord(
	errorType: ErrorType,
	message: string,
	options: { severity?: ErrorSeverity; details?: Record<string, ErrorDetailValue>; ref?: ChangeRef } = {},
): ApplyErrorRecord {
	return {
		errorType,
		severity: options.severity ?? "error",
		message,
		details: options.details ?? {},
		ref: options.ref,
	};
}

export function isBlocking(record: ApplyErrorRecord): boolean {
	return record.severity === "error";
}

export function describeCause(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** Thrown by callers that prefer exceptions to result unions for malformed input */
export class ChangeSetInputError extends Error {
	constructor(public readonly records: ApplyErrorRecord[]) {
		super(ChangeSetInputError.formatMessage(records));
		this.name = "ChangeSetInputError";
	}

	static formatMessage(records: ApplyErrorRecord[]): string {
		const lines = ["Invalid change set:"];
		for (const record of records.slice(0, 10)) {
			lines.push(`- [${record.errorType}] ${record.message}`);
		}
		if (records.length > 10) {
			lines.push(`... and ${records.length - 10} more`);
		}
		return lines.join("\n");
	}
}
