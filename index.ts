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

export { Algorithms, insertionSort, mergeSort } from "./algorithms";
export {
	ALGORITHM_NAMES,
	type AlgorithmName,
	BenchmarkHarness,
	type BenchmarkPlan,
	type BenchmarkResult,
	DEFAULT_ALGORITHMS,
	DEFAULT_SIZE_LIMITS,
	type HarnessOptions,
	runBenchmark,
	SORT_ALGORITHMS,
	type SkippedTrial,
	type TimingRecord,
	type TrialFailure,
} from "./benchmark";
export {
	type Comparator,
	countingComparator,
	isSorted,
	naturalOrder,
} from "./compare";
export { type BenchConfig, loadConfig } from "./config";
export {
	InvalidArgumentError,
	isInvalidArgumentError,
	SortBenchError,
} from "./errors";
export {
	classifyGrowth,
	type ComplexityClass,
	computeGrowthRatios,
	expectedGrowth,
	type GrowthRatio,
} from "./growth";
export {
	findRuns,
	HybridSort,
	type HybridSortStats,
	hybridSort,
	minRunLength,
	type Run,
} from "./hybrid-sort";
export { Logger, LogLevel } from "./logger";
export { generate, PATTERN_NAMES, type PatternName } from "./patterns";
export { measureSort } from "./performance";
