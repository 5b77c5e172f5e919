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

/**
 * @file hybrid-sort.ts
 * @module HybridSort
 * @description Run-adaptive merge sort.
 *
 * The input is scanned left to right for natural runs. Strictly descending runs are
 * reversed in place, short runs are extended with insertion sort up to a minimum
 * run length, and runs wait on a pending stack that is merged whenever its lengths
 * stop shrinking fast enough. Merges trim already placed prefixes and suffixes and
 * switch to galloping when one side keeps winning.
 *
 * - Time Complexity: O(n) on sorted or reverse-sorted input, O(n log n) worst case
 * - Space Complexity: O(n) temporary storage for the left run of a merge
 * - Stable: Yes
 */

import { Algorithms } from "./algorithms";
import { type Comparator, naturalOrder } from "./compare";
import { InvalidArgumentError } from "./errors";

/** Inputs shorter than this are sorted as a single extended run. */
export const MIN_MERGE = 32;

/** Consecutive wins by one side before a merge switches to galloping. */
export const MIN_GALLOP = 7;

export interface Run {
	start: number;
	length: number;
	/** True when the run was strictly descending before normalization. */
	descending: boolean;
}

export interface HybridSortStats {
	/** Runs pushed onto the pending stack, after short-run extension. */
	runs: number;
	merges: number;
	/** Deepest the pending stack got. */
	maxPendingRuns: number;
}

/**
 * Minimum run length for an input of `n` elements: the top six bits of `n`, plus
 * one if any of the remaining bits is set. Lands in [32, 64] for n >= 64, which
 * keeps the number of runs at or just below a power of two.
 */
export const minRunLength = (n: number): number => {
	let r = 0;
	while (n >= 64) {
		r |= n & 1;
		n >>= 1;
	}
	return n + r;
};

/**
 * Length and direction of the maximal run starting at `lo`, looking no further than `hi`.
 * Ascending runs allow equal neighbours; descending runs must be strict so that
 * reversing them cannot reorder equal elements.
 */
export const detectRun = <T>(
	arr: readonly T[],
	lo: number,
	hi: number,
	compare: Comparator<T>,
): Omit<Run, "start"> => {
	let runHi = lo + 1;
	if (runHi >= hi) return { length: hi - lo, descending: false };

	if (compare(arr[runHi++], arr[lo]) < 0) {
		while (runHi < hi && compare(arr[runHi], arr[runHi - 1]) < 0) runHi++;
		return { length: runHi - lo, descending: true };
	}
	while (runHi < hi && compare(arr[runHi], arr[runHi - 1]) >= 0) runHi++;
	return { length: runHi - lo, descending: false };
};

/**
 * Natural runs of `arr` from a single left-to-right scan, without modifying it.
 * The runs partition the sequence exactly.
 */
export const findRuns = <T>(
	arr: readonly T[],
	compare: Comparator<T> = naturalOrder,
): Run[] => {
	const runs: Run[] = [];
	let lo = 0;
	while (lo < arr.length) {
		const run = detectRun(arr, lo, arr.length, compare);
		runs.push({ start: lo, ...run });
		lo += run.length;
	}
	return runs;
};

const reverseRange = <T>(arr: T[], lo: number, hi: number): void => {
	hi--;
	while (lo < hi) {
		const tmp = arr[lo];
		arr[lo++] = arr[hi];
		arr[hi--] = tmp;
	}
};

/**
 * Position where `key` belongs in the sorted slice `arr[base, base + len)`, left of
 * any equal elements. Searches outward from `hint` in exponentially growing steps,
 * then binary-searches the last bracket.
 */
export const gallopLeft = <T>(
	key: T,
	arr: readonly T[],
	base: number,
	len: number,
	hint: number,
	compare: Comparator<T>,
): number => {
	let lastOfs = 0;
	let ofs = 1;

	if (compare(key, arr[base + hint]) > 0) {
		const maxOfs = len - hint;
		while (ofs < maxOfs && compare(key, arr[base + hint + ofs]) > 0) {
			lastOfs = ofs;
			ofs = (ofs << 1) + 1;
		}
		if (ofs > maxOfs) ofs = maxOfs;
		lastOfs += hint;
		ofs += hint;
	} else {
		const maxOfs = hint + 1;
		while (ofs < maxOfs && compare(key, arr[base + hint - ofs]) <= 0) {
			lastOfs = ofs;
			ofs = (ofs << 1) + 1;
		}
		if (ofs > maxOfs) ofs = maxOfs;
		const tmp = lastOfs;
		lastOfs = hint - ofs;
		ofs = hint - tmp;
	}

	// arr[base + lastOfs] < key <= arr[base + ofs]
	lastOfs++;
	while (lastOfs < ofs) {
		const m = lastOfs + ((ofs - lastOfs) >>> 1);
		if (compare(key, arr[base + m]) > 0) lastOfs = m + 1;
		else ofs = m;
	}
	return ofs;
};

/**
 * Like {@link gallopLeft}, but lands right of any elements equal to `key`.
 */
export const gallopRight = <T>(
	key: T,
	arr: readonly T[],
	base: number,
	len: number,
	hint: number,
	compare: Comparator<T>,
): number => {
	let lastOfs = 0;
	let ofs = 1;

	if (compare(key, arr[base + hint]) < 0) {
		const maxOfs = hint + 1;
		while (ofs < maxOfs && compare(key, arr[base + hint - ofs]) < 0) {
			lastOfs = ofs;
			ofs = (ofs << 1) + 1;
		}
		if (ofs > maxOfs) ofs = maxOfs;
		const tmp = lastOfs;
		lastOfs = hint - ofs;
		ofs = hint - tmp;
	} else {
		const maxOfs = len - hint;
		while (ofs < maxOfs && compare(key, arr[base + hint + ofs]) >= 0) {
			lastOfs = ofs;
			ofs = (ofs << 1) + 1;
		}
		if (ofs > maxOfs) ofs = maxOfs;
		lastOfs += hint;
		ofs += hint;
	}

	// arr[base + lastOfs] <= key < arr[base + ofs]
	lastOfs++;
	while (lastOfs < ofs) {
		const m = lastOfs + ((ofs - lastOfs) >>> 1);
		if (compare(key, arr[base + m]) < 0) ofs = m;
		else lastOfs = m + 1;
	}
	return ofs;
};

/**
 * One sort call. Holds the pending run stack and the adaptive gallop threshold,
 * both of which only live for the duration of {@link HybridSort.sort}.
 *
 * @example
 * ```typescript
 * const sorter = new HybridSort(data);
 * sorter.sort();
 * console.log(sorter.stats.maxPendingRuns);
 * ```
 */
export class HybridSort<T> {
	private readonly pending: Array<{ start: number; length: number }> = [];
	private minGallop = MIN_GALLOP;
	private readonly counters: HybridSortStats = {
		runs: 0,
		merges: 0,
		maxPendingRuns: 0,
	};

	constructor(
		private readonly arr: T[],
		private readonly compare: Comparator<T> = naturalOrder,
	) {}

	get stats(): HybridSortStats {
		return { ...this.counters };
	}

	sort(): T[] {
		const { arr, compare } = this;
		const n = arr.length;
		if (n < 2) return arr;

		if (n < MIN_MERGE) {
			const run = this.nextRun(0, n);
			Algorithms.insertionSortRange(arr, 0, n, run, compare);
			this.counters.runs = 1;
			this.counters.maxPendingRuns = 1;
			return arr;
		}

		const minRun = minRunLength(n);
		let lo = 0;
		let remaining = n;
		while (remaining > 0) {
			let runLen = this.nextRun(lo, n);
			if (runLen < minRun) {
				const forced = Math.min(remaining, minRun);
				Algorithms.insertionSortRange(arr, lo, lo + forced, lo + runLen, compare);
				runLen = forced;
			}

			this.pushRun(lo, runLen);
			this.mergeCollapse();

			lo += runLen;
			remaining -= runLen;
		}

		this.mergeForceCollapse();
		return arr;
	}

	/** Detects the run at `lo`, reverses it if descending, and returns its length. */
	private nextRun(lo: number, hi: number): number {
		const run = detectRun(this.arr, lo, hi, this.compare);
		if (run.descending) reverseRange(this.arr, lo, lo + run.length);
		return run.length;
	}

	private pushRun(start: number, length: number): void {
		this.pending.push({ start, length });
		this.counters.runs++;
		this.counters.maxPendingRuns = Math.max(
			this.counters.maxPendingRuns,
			this.pending.length,
		);
	}

	/**
	 * Restores the stack invariants, reading lengths from the top as C (top), B, A, D:
	 * A > B + C, D > A + B and B > C. Whenever one fails, B is merged with the
	 * smaller of its neighbours.
	 */
	private mergeCollapse(): void {
		const runs = this.pending;
		while (runs.length > 1) {
			let n = runs.length - 2;
			if (
				(n > 0 && runs[n - 1].length <= runs[n].length + runs[n + 1].length) ||
				(n > 1 && runs[n - 2].length <= runs[n - 1].length + runs[n].length)
			) {
				if (runs[n - 1].length < runs[n + 1].length) n--;
			} else if (runs[n].length > runs[n + 1].length) {
				break;
			}
			this.mergeAt(n);
		}
	}

	private mergeForceCollapse(): void {
		const runs = this.pending;
		while (runs.length > 1) {
			let n = runs.length - 2;
			if (n > 0 && runs[n - 1].length < runs[n + 1].length) n--;
			this.mergeAt(n);
		}
	}

	/** Merges pending runs `i` and `i + 1`, which are adjacent in the array. */
	private mergeAt(i: number): void {
		const { arr, compare } = this;
		const first = this.pending[i];
		const second = this.pending[i + 1];

		this.pending[i] = {
			start: first.start,
			length: first.length + second.length,
		};
		this.pending.splice(i + 1, 1);
		this.counters.merges++;

		let base1 = first.start;
		let len1 = first.length;
		const base2 = second.start;
		let len2 = second.length;

		// leading elements of the first run that are <= every element of the second stay put
		const k = gallopRight(arr[base2], arr, base1, len1, 0, compare);
		base1 += k;
		len1 -= k;
		if (len1 === 0) return;

		// trailing elements of the second run that are >= the first run's last element stay put
		len2 = gallopLeft(arr[base1 + len1 - 1], arr, base2, len2, len2 - 1, compare);
		if (len2 === 0) return;

		this.mergeLo(base1, len1, base2, len2);
	}

	/**
	 * Stable merge of `arr[base1, base1 + len1)` with the run that follows it.
	 * The first run is copied out and the merge proceeds left to right.
	 * Callers guarantee that the first element of the second run belongs before
	 * the first run's head, and the last element of the first run belongs after
	 * the second run's tail.
	 */
	private mergeLo(base1: number, len1: number, base2: number, len2: number): void {
		const { arr, compare } = this;
		const tmp = arr.slice(base1, base1 + len1);
		let cursor1 = 0;
		let cursor2 = base2;
		let dest = base1;

		arr[dest++] = arr[cursor2++];
		if (--len2 === 0) {
			copyInto(tmp, cursor1, arr, dest, len1);
			return;
		}
		if (len1 === 1) {
			arr.copyWithin(dest, cursor2, cursor2 + len2);
			arr[dest + len2] = tmp[cursor1];
			return;
		}

		let minGallop = this.minGallop;
		outer: while (true) {
			let count1 = 0;
			let count2 = 0;

			// one pair at a time until one side wins minGallop times in a row
			do {
				if (compare(arr[cursor2], tmp[cursor1]) < 0) {
					arr[dest++] = arr[cursor2++];
					count2++;
					count1 = 0;
					if (--len2 === 0) break outer;
				} else {
					arr[dest++] = tmp[cursor1++];
					count1++;
					count2 = 0;
					if (--len1 === 1) break outer;
				}
			} while ((count1 | count2) < minGallop);

			// galloping: move whole stretches while either side keeps winning big
			do {
				count1 = gallopRight(arr[cursor2], tmp, cursor1, len1, 0, compare);
				if (count1 !== 0) {
					copyInto(tmp, cursor1, arr, dest, count1);
					dest += count1;
					cursor1 += count1;
					len1 -= count1;
					if (len1 <= 1) break outer;
				}
				arr[dest++] = arr[cursor2++];
				if (--len2 === 0) break outer;

				count2 = gallopLeft(tmp[cursor1], arr, cursor2, len2, 0, compare);
				if (count2 !== 0) {
					arr.copyWithin(dest, cursor2, cursor2 + count2);
					dest += count2;
					cursor2 += count2;
					len2 -= count2;
					if (len2 === 0) break outer;
				}
				arr[dest++] = tmp[cursor1++];
				if (--len1 === 1) break outer;
				minGallop--;
			} while (count1 >= MIN_GALLOP || count2 >= MIN_GALLOP);

			if (minGallop < 0) minGallop = 0;
			minGallop += 2;
		}
		this.minGallop = minGallop < 1 ? 1 : minGallop;

		if (len1 === 1) {
			arr.copyWithin(dest, cursor2, cursor2 + len2);
			arr[dest + len2] = tmp[cursor1];
		} else if (len1 === 0) {
			throw new InvalidArgumentError(
				"Comparator violates its contract: ordering is not consistent",
			);
		} else {
			copyInto(tmp, cursor1, arr, dest, len1);
		}
	}
}

const copyInto = <T>(
	src: readonly T[],
	srcPos: number,
	dest: T[],
	destPos: number,
	length: number,
): void => {
	for (let i = 0; i < length; i++) {
		dest[destPos + i] = src[srcPos + i];
	}
};

/**
 * Sorts `seq` in place with the run-adaptive hybrid sort and returns it.
 * @example
 * ```typescript
 * hybridSort([]); // []
 * hybridSort([3, 1, 2]); // [1, 2, 3]
 * ```
 */
export const hybridSort = <T>(
	seq: T[],
	compare: Comparator<T> = naturalOrder,
): T[] => new HybridSort(seq, compare).sort();
