/**
 * Similarity metrics for the fuzzy pass.
 *
 * Both metrics return a ratio in [0, 1] where 1 means identical input.
 */

/** Compute Levenshtein distance between two strings */
export function levenshteinDistance(a: string, b: string): number {
	if (a === b) return 0;
	const aLen = a.length;
	const bLen = b.length;
	if (aLen === 0) return bLen;
	if (bLen === 0) return aLen;

	let prev = new Array<number>(bLen + 1);
	let curr = new Array<number>(bLen + 1);
	for (let j = 0; j <= bLen; j++) {
		prev[j] = j;
	}

	for (let i = 1; i <= aLen; i++) {
		curr[0] = i;
		const aCode = a.charCodeAt(i - 1);
		for (let j = 1; j <= bLen; j++) {
			const cost = aCode === b.charCodeAt(j - 1) ? 0 : 1;
			const deletion = prev[j] + 1;
			const insertion = curr[j - 1] + 1;
			const substitution = prev[j - 1] + cost;
			curr[j] = Math.min(deletion, insertion, substitution);
		}
		const tmp = prev;
		prev = curr;
		curr = tmp;
	}

	return prev[bLen];
}

/** Edit-distance complement of two strings (0 to 1) */
export function similarity(a: string, b: string): number {
	const maxLen = Math.max(a.length, b.length);
	if (maxLen === 0) return 1;
	return 1 - levenshteinDistance(a, b) / maxLen;
}

/**
 * Edit-distance complement of two line windows, compared as newline-joined text.
 * Windows of different lengths never match.
 */
export function levenshteinRatio(a: readonly string[], b: readonly string[]): number {
	if (a.length !== b.length) return 0;
	return similarity(a.join("\n"), b.join("\n"));
}

export interface MatchingBlock {
	aStart: number;
	bStart: number;
	size: number;
}

function buildIndex<T>(b: readonly T[]): Map<T, number[]> {
	const index = new Map<T, number[]>();
	for (let j = 0; j < b.length; j++) {
		const positions = index.get(b[j]);
		if (positions) positions.push(j);
		else index.set(b[j], [j]);
	}
	return index;
}

function findLongestMatch<T>(
	a: readonly T[],
	bIndex: Map<T, number[]>,
	aLo: number,
	aHi: number,
	bLo: number,
	bHi: number,
): MatchingBlock {
	let best: MatchingBlock = { aStart: aLo, bStart: bLo, size: 0 };
	let runLengths = new Map<number, number>();

	for (let i = aLo; i < aHi; i++) {
		const next = new Map<number, number>();
		for (const j of bIndex.get(a[i]) ?? []) {
			if (j < bLo) continue;
			if (j >= bHi) break;
			const k = (runLengths.get(j - 1) ?? 0) + 1;
			next.set(j, k);
			if (k > best.size) {
				best = { aStart: i - k + 1, bStart: j - k + 1, size: k };
			}
		}
		runLengths = next;
	}

	return best;
}

/**
 * Longest-matching-blocks decomposition of two sequences: the longest common
 * contiguous block is taken first, then both sides of it are searched recursively.
 */
export function getMatchingBlocks<T>(a: readonly T[], b: readonly T[]): MatchingBlock[] {
	const bIndex = buildIndex(b);
	const blocks: MatchingBlock[] = [];
	const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

	while (queue.length > 0) {
		const range = queue.pop();
		if (!range) break;
		const [aLo, aHi, bLo, bHi] = range;
		const block = findLongestMatch(a, bIndex, aLo, aHi, bLo, bHi);
		if (block.size === 0) continue;

		blocks.push(block);
		if (aLo < block.aStart && bLo < block.bStart) {
			queue.push([aLo, block.aStart, bLo, block.bStart]);
		}
		if (block.aStart + block.size < aHi && block.bStart + block.size < bHi) {
			queue.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
		}
	}

	return blocks.sort((x, y) => x.aStart - y.aStart || x.bStart - y.bStart);
}

/** `2 * matched / total` over the matching blocks of two sequences */
export function sequenceRatio<T>(a: readonly T[], b: readonly T[]): number {
	const total = a.length + b.length;
	if (total === 0) return 1;
	let matched = 0;
	for (const block of getMatchingBlocks(a, b)) {
		matched += block.size;
	}
	return (2 * matched) / total;
}
