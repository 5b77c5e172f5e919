/**
 * Copyright (c) 2025 Mike Odnis
 *
 * Permission is hereby granted, free of charge, to any person obtaining a copy
 * of this software and associated documentation files (the "Software"), to deal
 * in the Software without restriction, including without limitation the rights
 * to use, copy, modify, merge, publish, distribute, sublicense, and/or sell
 * copies of the Software, and to permit persons to whom the Software is
 * furnished to do so, subject to the following conditions:
 *
 * The above copyright notice and this permission notice shall be included in all
 * copies or substantial portions of the Software.
 *
 * THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
 * IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,
 * FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE
 * AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER
 * LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM,
 * OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE
 * SOFTWARE.
 */

export type ComplexityClass = "linear" | "linearithmic" | "quadratic";

export interface ExpectedGrowth {
	linear: number;
	linearithmic: number;
	quadratic: number;
}

export interface GrowthRatio {
	pattern: string;
	algorithm: string;
	fromSize: number;
	toSize: number;
	/** elapsed(toSize) / elapsed(fromSize), or null when fromSize measured no time at all. */
	ratio: number | null;
	expected: ExpectedGrowth;
	closest: ComplexityClass | null;
}

interface TimedEntry {
	pattern: string;
	algorithm: string;
	size: number;
	elapsedSeconds: number;
}

const nLogN = (n: number): number => (n <= 1 ? n : n * Math.log2(n));

/**
 * Time ratios each complexity class predicts when going from `fromSize` to `toSize`.
 * For 1000 -> 2000 that is roughly 2, 2.2 and 4.
 */
export const expectedGrowth = (fromSize: number, toSize: number): ExpectedGrowth => {
	const linear = toSize / fromSize;
	return {
		linear,
		linearithmic: nLogN(fromSize) > 0 ? nLogN(toSize) / nLogN(fromSize) : linear,
		quadratic: linear * linear,
	};
};

/**
 * Complexity class whose expected ratio is nearest to `ratio` on a log scale.
 */
export const classifyGrowth = (
	ratio: number,
	expected: ExpectedGrowth,
): ComplexityClass | null => {
	if (!Number.isFinite(ratio) || ratio <= 0) return null;
	const target = Math.log(ratio);
	let best: ComplexityClass | null = null;
	let bestDistance = Number.POSITIVE_INFINITY;
	for (const cls of ["linear", "linearithmic", "quadratic"] as const) {
		const distance = Math.abs(Math.log(expected[cls]) - target);
		if (distance < bestDistance) {
			best = cls;
			bestDistance = distance;
		}
	}
	return best;
};

/**
 * Growth ratios for each (pattern, algorithm) over every pair of consecutive
 * requested sizes. A pair is left out when either size has no record, for
 * example because the combination was skipped or failed.
 */
export const computeGrowthRatios = (
	records: readonly TimedEntry[],
	sizes: readonly number[],
): GrowthRatio[] => {
	const byKey = new Map<string, Map<number, TimedEntry>>();
	for (const record of records) {
		const key = `${record.pattern}\u0000${record.algorithm}`;
		let bySize = byKey.get(key);
		if (!bySize) {
			bySize = new Map();
			byKey.set(key, bySize);
		}
		bySize.set(record.size, record);
	}

	const growth: GrowthRatio[] = [];
	for (const bySize of byKey.values()) {
		for (let i = 1; i < sizes.length; i++) {
			const from = bySize.get(sizes[i - 1]);
			const to = bySize.get(sizes[i]);
			if (!from || !to) continue;

			const expected = expectedGrowth(from.size, to.size);
			const ratio =
				from.elapsedSeconds > 0 ? to.elapsedSeconds / from.elapsedSeconds : null;
			growth.push({
				pattern: from.pattern,
				algorithm: from.algorithm,
				fromSize: from.size,
				toSize: to.size,
				ratio,
				expected,
				closest: ratio === null ? null : classifyGrowth(ratio, expected),
			});
		}
	}
	return growth;
};
