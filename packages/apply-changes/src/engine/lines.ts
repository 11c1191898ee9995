/**
 * In-memory line buffer that round-trips the file's line terminator.
 */
export interface LineBuffer {
	lines: string[];
	eol: "\n" | "\r\n";
	trailingNewline: boolean;
}

/** The terminator used by most lines; ties and terminator-free content use `\n` */
function dominantEol(content: string): LineBuffer["eol"] {
	const crlf = content.match(/\r\n/g)?.length ?? 0;
	const lf = (content.match(/\n/g)?.length ?? 0) - crlf;
	return crlf > lf ? "\r\n" : "\n";
}

/**
 * Split on either terminator. Mixed files are rewritten with the dominant one.
 */
export function splitContent(content: string): LineBuffer {
	const eol = dominantEol(content);
	if (content.length === 0) {
		return { lines: [], eol, trailingNewline: false };
	}

	const lines = content.split(/\r?\n/);
	const trailingNewline = content.endsWith("\n");
	if (trailingNewline) {
		lines.pop();
	}
	return { lines, eol, trailingNewline };
}

export function joinContent(buffer: LineBuffer): string {
	if (buffer.lines.length === 0) {
		return "";
	}
	const body = buffer.lines.join(buffer.eol);
	return buffer.trailingNewline ? `${body}${buffer.eol}` : body;
}

/** Replace `[start, end)` with `replacement`, returning a new buffer */
export function spliceLines(buffer: LineBuffer, start: number, end: number, replacement: readonly string[]): LineBuffer {
	return {
		...buffer,
		lines: [...buffer.lines.slice(0, start), ...replacement, ...buffer.lines.slice(end)],
	};
}
