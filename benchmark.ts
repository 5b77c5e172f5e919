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
 * @file benchmark.ts
 * @module Benchmark
 * @description Empirical complexity harness.
 *
 * For every (pattern, size) one input is generated and reused across algorithms.
 * Each algorithm sorts fresh copies of it, only the sort call is timed, and the
 * output is checked before a {@link TimingRecord} is kept. Combinations excluded
 * by a size limit become {@link SkippedTrial} entries; anything that throws or
 * returns unsorted output becomes a {@link TrialFailure}, and the run continues.
 */

import { z } from "zod";
import { Algorithms } from "./algorithms";
import { isSorted } from "./compare";
import { InvalidArgumentError, toErrorMessage } from "./errors";
import { computeGrowthRatios, type GrowthRatio } from "./growth";
import { hybridSort } from "./hybrid-sort";
import { Logger } from "./logger";
import { assertValidSize, generate, type PatternName, parsePatternName } from "./patterns";
import { type Clock, measureSort, type SortFunction, systemClock } from "./performance";

export const ALGORITHM_NAMES = [
	"insertion_sort",
	"merge_sort",
	"hybrid_sort",
	"native_sort",
] as const;

export const AlgorithmNameSchema = z.enum(ALGORITHM_NAMES);

export type AlgorithmName = z.infer<typeof AlgorithmNameSchema>;

/** What a plain run compares when no algorithms are named. */
export const DEFAULT_ALGORITHMS: readonly AlgorithmName[] = [
	"insertion_sort",
	"merge_sort",
	"hybrid_sort",
];

export const DEFAULT_SIZE_LIMITS: Readonly<Partial<Record<AlgorithmName, number>>> = {
	insertion_sort: 5_000,
};

export type SortRegistry = Record<AlgorithmName, SortFunction<number>>;

export const SORT_ALGORITHMS: SortRegistry = {
	insertion_sort: (seq) => Algorithms.insertionSort(seq),
	merge_sort: (seq) => Algorithms.mergeSort(seq),
	hybrid_sort: (seq) => hybridSort(seq),
	// runtime's own sort, kept only as a baseline to compare against
	native_sort: (seq) => seq.sort((a, b) => a - b),
};

export interface TrialKey {
	pattern: PatternName;
	algorithm: AlgorithmName;
	size: number;
}

export interface TimingRecord extends TrialKey {
	elapsedSeconds: number;
	repeats: number;
}

export interface SkippedTrial extends TrialKey {
	reason: string;
}

export interface TrialFailure extends TrialKey {
	message: string;
}

export interface BenchmarkResult {
	records: TimingRecord[];
	growth: GrowthRatio[];
	skipped: SkippedTrial[];
	failures: TrialFailure[];
}

export interface BenchmarkPlan {
	sizes: readonly number[];
	patterns: Iterable<string>;
	algorithms: Iterable<string>;
}

export interface HarnessOptions {
	/** Runs per trial; the fastest is recorded. */
	repeats?: number;
	seed?: number;
	/** Largest size each algorithm is run on. Missing entries mean no limit. */
	sizeLimits?: Partial<Record<AlgorithmName, number>>;
	registry?: SortRegistry;
	now?: Clock;
	logger?: Logger;
}

const unique = <T>(values: Iterable<T>): T[] => [...new Set(values)];

export const parseAlgorithmName = (value: string): AlgorithmName => {
	const parsed = AlgorithmNameSchema.safeParse(value);
	if (!parsed.success) {
		throw new InvalidArgumentError(`Unknown algorithm "${value}"`, {
			algorithm: value,
			expected: ALGORITHM_NAMES,
		});
	}
	return parsed.data;
};

export class BenchmarkHarness {
	private readonly repeats: number;
	private readonly seed: number;
	private readonly sizeLimits: Partial<Record<AlgorithmName, number>>;
	private readonly registry: SortRegistry;
	private readonly now: Clock;
	private readonly logger: Logger;

	constructor(options: HarnessOptions = {}) {
		this.repeats = options.repeats ?? 3;
		this.seed = options.seed ?? 123;
		this.sizeLimits = options.sizeLimits ?? DEFAULT_SIZE_LIMITS;
		this.registry = options.registry ?? SORT_ALGORITHMS;
		this.now = options.now ?? systemClock;
		this.logger = options.logger ?? Logger.getLogger("Benchmark");

		if (!Number.isInteger(this.repeats) || this.repeats < 1) {
			throw new InvalidArgumentError(
				`Repeats must be a positive integer, got ${this.repeats}`,
				{ repeats: this.repeats },
			);
		}
	}

	/**
	 * Runs every (pattern, algorithm, size) combination of `plan`.
	 * @throws {InvalidArgumentError} before any trial runs, for a bad size or an unknown name
	 */
	run(plan: BenchmarkPlan): BenchmarkResult {
		for (const size of plan.sizes) assertValidSize(size);
		const sizes = unique(plan.sizes);
		const patterns = unique(plan.patterns).map(parsePatternName);
		const algorithms = unique(plan.algorithms).map(parseAlgorithmName);

		const records: TimingRecord[] = [];
		const skipped: SkippedTrial[] = [];
		const failures: TrialFailure[] = [];

		this.logger.info("Starting benchmark", {
			sizes,
			patterns,
			algorithms,
			repeats: this.repeats,
		});

		for (const pattern of patterns) {
			for (const size of sizes) {
				const input = generate(size, pattern, this.seed);

				for (const algorithm of algorithms) {
					const key: TrialKey = { pattern, algorithm, size };
					const limit = this.sizeLimits[algorithm];
					if (limit !== undefined && size > limit) {
						const reason = `size ${size} exceeds the ${algorithm} limit of ${limit}`;
						this.logger.debug("Skipping trial", { ...key, reason });
						skipped.push({ ...key, reason });
						continue;
					}

					const outcome = this.runTrial(key, input);
					if ("message" in outcome) failures.push(outcome);
					else records.push(outcome);
				}
			}
		}

		const growth = computeGrowthRatios(records, sizes);
		this.logger.info("Benchmark finished", {
			records: records.length,
			growth: growth.length,
			skipped: skipped.length,
			failures: failures.length,
		});

		return { records, growth, skipped, failures };
	}

	private runTrial(
		key: TrialKey,
		input: readonly number[],
	): TimingRecord | TrialFailure {
		try {
			const measurement = measureSort(this.registry[key.algorithm], input, {
				repeats: this.repeats,
				now: this.now,
			});
			if (!isSorted(measurement.output)) {
				const message = "output is not in non-decreasing order";
				this.logger.warn("Trial produced unsorted output", { ...key });
				return { ...key, message };
			}

			this.logger.debug("Trial finished", {
				...key,
				elapsedSeconds: measurement.elapsedSeconds,
			});
			return Object.freeze({
				...key,
				elapsedSeconds: measurement.elapsedSeconds,
				repeats: this.repeats,
			});
		} catch (error) {
			const message = toErrorMessage(error);
			this.logger.warn("Trial failed", { ...key, error: message });
			return { ...key, message };
		}
	}
}

/**
 * Benchmarks `algorithms` on every pattern and size, with harness defaults unless overridden.
 * @example
 * ```typescript
 * const result = runBenchmark([1000, 2000], ["random"], ["insertion_sort"]);
 * // result.records has two entries, result.growth one
 * ```
 */
export const runBenchmark = (
	sizes: readonly number[],
	patterns: Iterable<string>,
	algorithms: Iterable<string>,
	options?: HarnessOptions,
): BenchmarkResult =>
	new BenchmarkHarness(options).run({ sizes, patterns, algorithms });
