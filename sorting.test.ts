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

import { describe, expect, it } from "vitest";
import { insertionSort, mergeSort } from "./algorithms";
import { type Comparator, isSorted } from "./compare";
import { InvalidArgumentError } from "./errors";
import { hybridSort } from "./hybrid-sort";
import { generate, PATTERN_NAMES } from "./patterns";

interface Tagged {
	key: number;
	tag: number;
}

const byKey = (a: Tagged, b: Tagged) => a.key - b.key;

type SortFn = <T>(seq: T[], compare?: Comparator<T>) => T[];

const SORTS: Array<[string, SortFn]> = [
	["insertionSort", insertionSort],
	["mergeSort", mergeSort],
	["hybridSort", hybridSort],
];

describe.each(SORTS)("%s", (_name, sort) => {
	it("handles empty and single-element input", () => {
		expect(sort([])).toEqual([]);
		expect(sort([7])).toEqual([7]);
	});

	it("sorts in place and returns the same array", () => {
		const seq = [3, 1, 2];
		const result = sort(seq);
		expect(result).toBe(seq);
		expect(seq).toEqual([1, 2, 3]);
	});

	it("sorts a reversed sequence", () => {
		expect(sort([5, 4, 3, 2, 1])).toEqual([1, 2, 3, 4, 5]);
	});

	it("sorts strings by natural order", () => {
		expect(sort(["pear", "apple", "fig", "apple"])).toEqual([
			"apple",
			"apple",
			"fig",
			"pear",
		]);
	});

	describe.each(PATTERN_NAMES)("on %s input", (pattern) => {
		it.each([2, 31, 32, 33, 64, 257, 1500])(
			"produces a sorted permutation for size %d",
			(size) => {
				const input = generate(size, pattern, size);
				const expected = [...input].sort((a, b) => a - b);
				const seq = [...input];

				sort(seq);

				expect(seq).toEqual(expected);
				expect(isSorted(seq)).toBe(true);
			},
		);
	});

	it("is idempotent", () => {
		const seq = generate(700, "random", 11);
		sort(seq);
		const once = [...seq];
		sort(seq);
		expect(seq).toEqual(once);
	});

	it("keeps equal keys in their original order", () => {
		const keys = generate(900, "random", 5);
		const input: Tagged[] = keys.map((value, tag) => ({ key: value % 13, tag }));
		const expected = [...input].sort(byKey);

		const seq = [...input];
		sort(seq, byKey);

		expect(seq).toEqual(expected);
	});

	it("keeps equal keys in order across long interleaved runs", () => {
		const first = Array.from({ length: 600 }, (_, i) => ({
			key: Math.floor(i / 3),
			tag: i,
		}));
		const second = Array.from({ length: 600 }, (_, i) => ({
			key: Math.floor(i / 5),
			tag: 600 + i,
		}));
		const input: Tagged[] = [...first, ...second];
		const expected = [...input].sort(byKey);

		const seq = [...input];
		sort(seq, byKey);

		expect(seq).toEqual(expected);
	});

	it("rejects elements with no natural order when no comparator is given", () => {
		const seq: Tagged[] = [
			{ key: 2, tag: 0 },
			{ key: 1, tag: 1 },
		];
		expect(() => sort(seq)).toThrow(InvalidArgumentError);
	});
});
