import { DEFAULT_SIMILARITY_THRESHOLD } from "pi-line-match";
import type { ApplyConfig, NonAsciiAction } from "../types.js";

export const DEFAULT_APPLY_CONFIG: ApplyConfig = {
	allowFileDeletion: true,
	validation: {
		nonAscii: {
			default: "warning",
			rules: [
				{ extensions: [".py", ".js", ".ts"], value: "error" },
				{ extensions: [".md", ".markdown"], value: "ignore" },
			],
		},
	},
	matching: {
		whitespace: { default: "collapse", rules: [] },
		similarity: { default: DEFAULT_SIMILARITY_THRESHOLD, rules: [] },
		similarityMetric: { default: "sequence_matcher", rules: [] },
		useFuzzy: { default: true, rules: [] },
		caseSensitive: { default: true, rules: [] },
	},
};

export interface ApplyConfigOverrides {
	/** Replaces the non-ASCII default; extension rules still apply */
	nonAsciiAction?: NonAsciiAction;
	allowFileDeletion?: boolean;
}

export function withOverrides(config: ApplyConfig, overrides: ApplyConfigOverrides): ApplyConfig {
	return {
		...config,
		allowFileDeletion: overrides.allowFileDeletion ?? config.allowFileDeletion,
		validation: {
			...config.validation,
			nonAscii: {
				...config.validation.nonAscii,
				default: overrides.nonAsciiAction ?? config.validation.nonAscii.default,
			},
		},
	};
}
