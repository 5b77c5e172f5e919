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
import { countingComparator } from "./compare";
import { InvalidArgumentError } from "./errors";
import {
	findRuns,
	gallopLeft,
	gallopRight,
	HybridSort,
	hybridSort,
	minRunLength,
} from "./hybrid-sort";
import { generate } from "./patterns";

describe("minRunLength", () => {
	it("returns small inputs unchanged", () => {
		expect(minRunLength(10)).toBe(10);
		expect(minRunLength(63)).toBe(63);
	});

	it("keeps the top six bits and rounds up when lower bits are set", () => {
		expect(minRunLength(64)).toBe(32);
		expect(minRunLength(65)).toBe(33);
		expect(minRunLength(1000)).toBe(63);
		expect(minRunLength(10_000)).toBe(40);
	});
});

describe("findRuns", () => {
	it("returns no runs for an empty sequence", () => {
		expect(findRuns([])).toEqual([]);
	});

	it("splits a sequence into ascending and strictly descending runs", () => {
		expect(findRuns([1, 2, 2, 5, 3, 1, 4])).toEqual([
			{ start: 0, length: 4, descending: false },
			{ start: 4, length: 2, descending: true },
			{ start: 6, length: 1, descending: false },
		]);
	});

	it("does not treat equal neighbours as descending", () => {
		expect(findRuns([3, 3, 2])).toEqual([
			{ start: 0, length: 2, descending: false },
			{ start: 2, length: 1, descending: false },
		]);
	});

	it("finds exactly one descending run in a reversed pattern", () => {
		expect(findRuns(generate(500, "reversed"))).toEqual([
			{ start: 0, length: 500, descending: true },
		]);
	});

	it("does not modify its input", () => {
		const seq = [4, 3, 2, 1];
		findRuns(seq);
		expect(seq).toEqual([4, 3, 2, 1]);
	});
});

describe("gallop", () => {
	const arr = [1, 2, 2, 2, 5];

	it("gallopLeft lands before equal elements", () => {
		expect(gallopLeft(2, arr, 0, arr.length, 0, (a, b) => a - b)).toBe(1);
		expect(gallopLeft(2, arr, 0, arr.length, 4, (a, b) => a - b)).toBe(1);
		expect(gallopLeft(9, arr, 0, arr.length, 0, (a, b) => a - b)).toBe(5);
	});

	it("gallopRight lands after equal elements", () => {
		expect(gallopRight(2, arr, 0, arr.length, 0, (a, b) => a - b)).toBe(4);
		expect(gallopRight(0, arr, 0, arr.length, 0, (a, b) => a - b)).toBe(0);
	});
});

describe("HybridSort", () => {
	it("sorts an already sorted sequence with n - 1 comparisons", () => {
		const counter = countingComparator<number>();
		const seq = generate(1000, "sorted");

		hybridSort(seq, counter.compare);

		expect(counter.count).toBe(999);
		expect(seq[0]).toBe(0);
		expect(seq[999]).toBe(999);
	});

	it("sorts a reversed sequence with n - 1 comparisons", () => {
		const counter = countingComparator<number>();
		const seq = generate(1000, "reversed");

		hybridSort(seq, counter.compare);

		expect(counter.count).toBe(999);
		expect(seq).toEqual(Array.from({ length: 1000 }, (_, i) => i + 1));
	});

	it("stays close to linear on nearly sorted input", () => {
		const n = 5000;
		const counter = countingComparator<number>();
		hybridSort(generate(n, "nearly_sorted", 3), counter.compare);

		expect(counter.count).toBeLessThan(n * Math.log2(n));
	});

	it("keeps the pending run stack logarithmic", () => {
		const n = 10_000;
		const sorter = new HybridSort(generate(n, "random", 7));
		sorter.sort();
		const { runs, merges, maxPendingRuns } = sorter.stats;

		expect(runs).toBe(250);
		expect(merges).toBe(runs - 1);
		expect(maxPendingRuns).toBeLessThanOrEqual(2 * Math.log2(n));
	});

	it("reports a single run for short input", () => {
		const sorter = new HybridSort([3, 1, 2]);
		expect(sorter.sort()).toEqual([1, 2, 3]);
		expect(sorter.stats).toEqual({ runs: 1, merges: 0, maxPendingRuns: 1 });
	});

	it("returns an empty sequence unchanged", () => {
		expect(hybridSort([])).toEqual([]);
	});

	it("surfaces comparator errors", () => {
		const seq = [{ id: 1 }, { id: 2 }];
		expect(() => hybridSort(seq)).toThrow(InvalidArgumentError);
	});
});
