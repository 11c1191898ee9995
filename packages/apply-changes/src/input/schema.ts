import { StringEnum } from "@mariozechner/pi-ai";
import { Type } from "@sinclair/typebox";
import { ACTIONS } from "../types.js";

export const LINES_SCHEMA = Type.Array(Type.String());

export const LINE_CHANGE_SCHEMA = Type.Object({
	original_lines: Type.Array(Type.String(), {
		description: "Lines expected in the file, copied verbatim with enough context to be unique",
	}),
	changed_lines: Type.Array(Type.String(), { description: "Replacement lines" }),
});

export const FILE_ENTRY_SCHEMA = Type.Object({
	file: Type.String({ description: "Path relative to the base directory" }),
	action: StringEnum(ACTIONS),
	changes: Type.Array(LINE_CHANGE_SCHEMA),
});

export const KNOWN_ENVELOPE_KEYS = ["message", "file_entries"] as const;
export const KNOWN_ENTRY_KEYS = ["file", "action", "changes"] as const;
export const KNOWN_CHANGE_KEYS = ["original_lines", "changed_lines"] as const;
