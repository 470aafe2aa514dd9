/**
 * Insertions + deletions needed to turn `a` into `b` (no substitutions),
 * i.e. |a| + |b| - 2·LCS.
 */
export const indelDistance = (a: string, b: string) => {
	const lcs: number[][] = Array.from({ length: a.length + 1 }, () =>
		Array.from({ length: b.length + 1 }, () => 0),
	);

	for (let i = 1; i <= a.length; i += 1) {
		for (let j = 1; j <= b.length; j += 1) {
			lcs[i][j] =
				a[i - 1] === b[j - 1]
					? lcs[i - 1][j - 1] + 1
					: Math.max(lcs[i - 1][j], lcs[i][j - 1]);
		}
	}

	return a.length + b.length - 2 * lcs[a.length][b.length];
};

/**
 * Normalized indel similarity in [0, 100]
 */
export const ratio = (a: string, b: string) => {
	const total = a.length + b.length;
	if (total === 0) return 100;
	return (100 * (total - indelDistance(a, b))) / total;
};

const sortTokens = (value: string) =>
	value.split(/\s+/).filter(Boolean).sort().join(" ");

/**
 * Token-order-insensitive similarity in [0, 100], unrounded.
 * "alvarez jose" vs "jose alvarez" → 100
 */
export const tokenSortRatio = (a: string, b: string) => ratio(sortTokens(a), sortTokens(b));

export type BestMatch = {
	choice: string;
	score: number;
};

/**
 * Highest-scoring choice. Ties keep the earliest choice.
 */
export const extractBest = (
	query: string,
	choices: readonly string[],
	scorer: (a: string, b: string) => number = tokenSortRatio,
): BestMatch | null => {
	let best: BestMatch | null = null;
	for (const choice of choices) {
		const score = scorer(query, choice);
		if (!best || score > best.score) {
			best = { choice, score };
		}
	}
	return best;
};
