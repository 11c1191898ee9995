import { NON_ASCII_ACTIONS, type NonAsciiAction } from "./types.js";

export interface ParsedApplyCommandArgs {
	inputPath?: string;
	baseDir?: string;
	configPath?: string;
	nonAsciiAction?: NonAsciiAction;
	noAllowFileDeletion: boolean;
	dryRun: boolean;
	help: boolean;
}

const FLAG_ALIASES = new Map<string, string>([
	["-b", "--base-dir"],
	["-c", "--config"],
	["-n", "--dry-run"],
	["-h", "--help"],
]);

function isNonAsciiAction(value: string): value is NonAsciiAction {
	return (NON_ASCII_ACTIONS as readonly string[]).includes(value);
}

export function parseApplyCommandArgs(
	raw: string,
): { ok: true; value: ParsedApplyCommandArgs } | { ok: false; error: string } {
	const tokensResult = tokenizeArgs(raw);
	if (!tokensResult.ok) {
		return tokensResult;
	}

	const tokens = tokensResult.tokens;
	const parsed: ParsedApplyCommandArgs = {
		noAllowFileDeletion: false,
		dryRun: false,
		help: false,
	};

	for (let index = 0; index < tokens.length; index += 1) {
		const token = tokens[index] ?? "";
		const flag = FLAG_ALIASES.get(token) ?? token;

		switch (flag) {
			case "--dry-run":
				parsed.dryRun = true;
				break;
			case "--no-allow-file-deletion":
				parsed.noAllowFileDeletion = true;
				break;
			case "--help":
				parsed.help = true;
				break;
			case "--base-dir": {
				const value = tokens[index + 1];
				if (!value || value.startsWith("-")) {
					return { ok: false, error: "--base-dir requires a value" };
				}
				parsed.baseDir = value;
				index += 1;
				break;
			}
			case "--config": {
				const value = tokens[index + 1];
				if (!value || value.startsWith("-")) {
					return { ok: false, error: "--config requires a value" };
				}
				parsed.configPath = value;
				index += 1;
				break;
			}
			case "--non-ascii-action": {
				const value = tokens[index + 1];
				if (!value || value.startsWith("-")) {
					return { ok: false, error: "--non-ascii-action requires a value" };
				}
				if (!isNonAsciiAction(value)) {
					return { ok: false, error: `--non-ascii-action must be one of: ${NON_ASCII_ACTIONS.join(", ")}` };
				}
				parsed.nonAsciiAction = value;
				index += 1;
				break;
			}
			default:
				if (flag.startsWith("-")) {
					return { ok: false, error: `Unknown flag: ${flag}` };
				}
				if (parsed.inputPath) {
					return { ok: false, error: `Unexpected argument: ${flag}` };
				}
				parsed.inputPath = flag;
		}
	}

	if (!parsed.help && !parsed.inputPath) {
		return { ok: false, error: "Missing input file. Usage: /apply-changes <input.json> [options]" };
	}

	return { ok: true, value: parsed };
}

/**
 * Split a command line into words. Quotes group text verbatim and may sit inside a word;
 * outside quotes a backslash keeps the next character literal.
 */
function tokenizeArgs(input: string): { ok: true; tokens: string[] } | { ok: false; error: string } {
	const tokens: string[] = [];
	let index = 0;

	while (index < input.length) {
		if (/\s/.test(input.charAt(index))) {
			index += 1;
			continue;
		}

		let word = "";
		while (index < input.length && !/\s/.test(input.charAt(index))) {
			const char = input.charAt(index);
			if (char === '"' || char === "'") {
				const close = input.indexOf(char, index + 1);
				if (close === -1) {
					return { ok: false, error: `Unterminated quote: ${char}` };
				}
				word += input.slice(index + 1, close);
				index = close + 1;
			} else if (char === "\\" && index + 1 < input.length) {
				word += input.charAt(index + 1);
				index += 2;
			} else {
				word += char;
				index += 1;
			}
		}
		tokens.push(word);
	}

	return { ok: true, tokens };
}

export function getApplyChangesHelpText(): string {
	return [
		"Usage: /apply-changes <input.json> [options]",
		"",
		"Options:",
		"  --base-dir, -b           Directory file paths resolve against (default: cwd)",
		"  --config, -c             Extra config file applied after discovered ones",
		"  --non-ascii-action       Default non-ASCII policy: error, warning or ignore",
		"  --no-allow-file-deletion Reject delete_file entries",
		"  --dry-run, -n            Check and match every change without writing",
		"  --help, -h               Show this help",
	].join("\n");
}
