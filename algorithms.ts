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
 * @file algorithms.ts
 * @fileoverview Insertion sort and merge sort over mutable sequences.
 * @module Algorithms
 * @description Both algorithms are stable and sort the caller's array in place:
 * - Insertion Sort: quadratic worst case, linear on already ordered input
 * - Merge Sort: guaranteed O(n log n), not adaptive to existing order
 *
 * Each sort returns the array it was given, so calls can be chained or compared
 * directly in tests.
 */

import { type Comparator, naturalOrder } from "./compare";

export class Algorithms {
	/**
	 * Performs Insertion Sort.
	 * @param arr - Array to be sorted in place
	 * @param compare - Ordering, defaults to the natural order of numbers and strings
	 * @returns The same array, sorted
	 * @description
	 * For each index i from 1 to n-1 the element at i is held, every strictly
	 * greater element to its left is shifted one slot right, and the held element
	 * drops into the gap.
	 * - Time Complexity: O(n²) worst and average case, O(n) best case
	 * - Space Complexity: O(1), one held element
	 * - Stable: Yes, equal elements are never shifted past each other
	 * - In-place: Yes
	 *
	 * @example
	 * ```typescript
	 * Algorithms.insertionSort([3, 1, 2]);
	 * // returns [1, 2, 3]
	 * ```
	 */
	public static insertionSort<T>(
		arr: T[],
		compare: Comparator<T> = naturalOrder,
	): T[] {
		if (arr.length <= 1) return arr;
		Algorithms.insertionSortRange(arr, 0, arr.length, 1, compare);
		return arr;
	}

	/**
	 * Insertion-sorts `arr[lo, hi)` given that `arr[lo, start)` is already sorted.
	 * @description
	 * Used directly by {@link Algorithms.insertionSort} with `start = lo + 1`, and by
	 * the hybrid sort to extend a short natural run up to its minimum run length.
	 */
	public static insertionSortRange<T>(
		arr: T[],
		lo: number,
		hi: number,
		start: number,
		compare: Comparator<T>,
	): void {
		for (let i = Math.max(start, lo + 1); i < hi; i++) {
			const key = arr[i];
			let j = i - 1;

			while (j >= lo && compare(arr[j], key) > 0) {
				arr[j + 1] = arr[j];
				j--;
			}

			arr[j + 1] = key;
		}
	}

	/**
	 * Performs top-down Merge Sort.
	 * @param arr - Array to be sorted in place
	 * @param compare - Ordering, defaults to the natural order of numbers and strings
	 * @returns The same array, sorted
	 * @description
	 * Splits at the midpoint until sub-lengths reach 1, then merges adjacent halves
	 * by repeatedly taking the smaller head. Ties go to the left half.
	 * - Time Complexity: O(n log n) for every input distribution
	 * - Space Complexity: O(n) auxiliary buffer, allocated once per call
	 * - Recursion depth: O(log n)
	 * - Stable: Yes
	 *
	 * @example
	 * ```typescript
	 * Algorithms.mergeSort([5, 4, 3, 2, 1]);
	 * // returns [1, 2, 3, 4, 5]
	 * ```
	 */
	public static mergeSort<T>(
		arr: T[],
		compare: Comparator<T> = naturalOrder,
	): T[] {
		if (arr.length <= 1) return arr;
		const buffer = arr.slice();
		Algorithms.mergeSortRange(arr, buffer, 0, arr.length, compare);
		return arr;
	}

	private static mergeSortRange<T>(
		arr: T[],
		buffer: T[],
		lo: number,
		hi: number,
		compare: Comparator<T>,
	): void {
		if (hi - lo <= 1) return;
		const mid = lo + ((hi - lo) >>> 1);
		Algorithms.mergeSortRange(arr, buffer, lo, mid, compare);
		Algorithms.mergeSortRange(arr, buffer, mid, hi, compare);
		Algorithms.merge(arr, buffer, lo, mid, hi, compare);
	}

	/**
	 * Merges the sorted halves `arr[lo, mid)` and `arr[mid, hi)` through `buffer`.
	 */
	private static merge<T>(
		arr: T[],
		buffer: T[],
		lo: number,
		mid: number,
		hi: number,
		compare: Comparator<T>,
	): void {
		for (let k = lo; k < hi; k++) {
			buffer[k] = arr[k];
		}

		let i = lo;
		let j = mid;
		let k = lo;
		while (i < mid && j < hi) {
			// right wins only when strictly smaller
			if (compare(buffer[j], buffer[i]) < 0) {
				arr[k++] = buffer[j++];
			} else {
				arr[k++] = buffer[i++];
			}
		}
		while (i < mid) arr[k++] = buffer[i++];
		while (j < hi) arr[k++] = buffer[j++];
	}
}

/**
 * Sorts `seq` in place with insertion sort and returns it.
 */
export const insertionSort = <T>(
	seq: T[],
	compare: Comparator<T> = naturalOrder,
): T[] => Algorithms.insertionSort(seq, compare);

/**
 * Sorts `seq` in place with merge sort and returns it.
 */
export const mergeSort = <T>(
	seq: T[],
	compare: Comparator<T> = naturalOrder,
): T[] => Algorithms.mergeSort(seq, compare);
