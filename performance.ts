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

/** Monotonic clock in milliseconds. */
export type Clock = () => number;

export const systemClock: Clock = () => performance.now();

export type SortFunction<T> = (seq: T[]) => unknown;

export interface TimingOptions {
	/** Times the sort is run, each on a fresh copy. The fastest run is kept. */
	repeats?: number;
	now?: Clock;
}

export interface Measurement<T> {
	/** Fastest of the repeats, in seconds. */
	elapsedSeconds: number;
	samples: number[];
	/** Output of the last repeat, for checking the result. */
	output: T[];
}

/**
 * Measures the wall-clock time of `sort` on copies of `input`.
 * Only the sort call is inside the timed window; copying the input is not.
 * @throws whatever `sort` throws
 */
export const measureSort = <T>(
	sort: SortFunction<T>,
	input: readonly T[],
	{ repeats = 1, now = systemClock }: TimingOptions = {},
): Measurement<T> => {
	const samples: number[] = [];
	let output: T[] = [];

	for (let i = 0; i < Math.max(1, repeats); i++) {
		const copy = input.slice();
		const start = now();
		sort(copy);
		const end = now();
		samples.push((end - start) / 1000);
		output = copy;
	}

	return {
		elapsedSeconds: Math.min(...samples),
		samples,
		output,
	};
};
