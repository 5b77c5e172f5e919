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

import { InvalidArgumentError } from "./errors";

/** Negative when `a` sorts before `b`, positive when after, zero when they tie. */
export type Comparator<T> = (a: T, b: T) => number;

export type Orderable = number | string | bigint;

const isOrderable = (value: unknown): value is Orderable =>
	typeof value === "number" ||
	typeof value === "string" ||
	typeof value === "bigint";

/**
 * Natural ascending order for numbers, strings and bigints.
 * Used whenever a sort is called without a comparator.
 */
export const naturalOrder: Comparator<unknown> = (a, b) => {
	if (!isOrderable(a) || !isOrderable(b) || typeof a !== typeof b) {
		throw new InvalidArgumentError(
			"Elements without a natural order need an explicit comparator",
			{ left: typeof a, right: typeof b },
		);
	}
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
};

export interface CountingComparator<T> {
	compare: Comparator<T>;
	/** Number of comparisons made since creation or the last reset. */
	readonly count: number;
	reset(): void;
}

/**
 * Wraps a comparator so every call is counted.
 * @example
 * ```typescript
 * const counter = countingComparator<number>();
 * hybridSort(data, counter.compare);
 * console.log(counter.count);
 * ```
 */
export const countingComparator = <T>(
	compare: Comparator<T> = naturalOrder,
): CountingComparator<T> => {
	let count = 0;
	return {
		compare: (a, b) => {
			count++;
			return compare(a, b);
		},
		get count() {
			return count;
		},
		reset() {
			count = 0;
		},
	};
};

/**
 * Checks that `seq` is non-decreasing under `compare`.
 */
export const isSorted = <T>(
	seq: readonly T[],
	compare: Comparator<T> = naturalOrder,
): boolean => {
	for (let i = 1; i < seq.length; i++) {
		if (compare(seq[i - 1], seq[i]) > 0) return false;
	}
	return true;
};
