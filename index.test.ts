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
import { generate, hybridSort, insertionSort, mergeSort, runBenchmark } from "./index";
import { Logger } from "./logger";

describe("public surface", () => {
	it("covers the basic scenarios end to end", () => {
		expect(generate(5, "sorted", 1)).toEqual([0, 1, 2, 3, 4]);
		expect(insertionSort([3, 1, 2])).toEqual([1, 2, 3]);
		expect(mergeSort([5, 4, 3, 2, 1])).toEqual([1, 2, 3, 4, 5]);
		expect(hybridSort([])).toEqual([]);

		const result = runBenchmark([1000, 2000], new Set(["random"]), new Set(["insertion_sort"]), {
			logger: new Logger("index-test", { silent: true }),
		});
		expect(result.records).toHaveLength(2);
		expect(result.growth).toHaveLength(1);
	});
});
