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

import { z } from "zod";
import { InvalidArgumentError } from "./errors";

export const PATTERN_NAMES = [
	"random",
	"sorted",
	"reversed",
	"nearly_sorted",
] as const;

export const PatternNameSchema = z.enum(PATTERN_NAMES);

export type PatternName = z.infer<typeof PatternNameSchema>;

/** Largest value the `random` pattern draws, inclusive. */
export const RANDOM_VALUE_MAX = 1_000_000;

/** Share of positions the `nearly_sorted` pattern perturbs. */
export const NEARLY_SORTED_SWAP_FRACTION = 0.01;

/**
 * Small seeded PRNG returning floats in [0, 1).
 */
export const mulberry32 = (seed: number): (() => number) => {
	let t = seed >>> 0;
	return () => {
		t += 0x6d2b79f5;
		let r = Math.imul(t ^ (t >>> 15), t | 1);
		r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
		return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
	};
};

export const parsePatternName = (value: string): PatternName => {
	const parsed = PatternNameSchema.safeParse(value);
	if (!parsed.success) {
		throw new InvalidArgumentError(`Unknown pattern "${value}"`, {
			pattern: value,
			expected: PATTERN_NAMES,
		});
	}
	return parsed.data;
};

export const assertValidSize = (size: number): void => {
	if (!Number.isInteger(size) || size < 0) {
		throw new InvalidArgumentError(
			`Size must be a non-negative integer, got ${size}`,
			{ size },
		);
	}
};

/**
 * Builds an input sequence of `size` integers following a named distribution.
 *
 * - `random`: independent uniform integers in [0, {@link RANDOM_VALUE_MAX}]
 * - `sorted`: `0, 1, ..., size - 1`
 * - `reversed`: `size, size - 1, ..., 1`
 * - `nearly_sorted`: `sorted` followed by `round(0.01 * size)` swaps of two
 *   independently chosen positions. Swaps may overlap or undo each other.
 *
 * The same seed always yields the same sequence. Without a seed one is drawn
 * from `Math.random`.
 *
 * @throws {InvalidArgumentError} when `size` is negative or not an integer, or the pattern is unknown
 * @example
 * ```typescript
 * generate(5, "sorted", 1); // [0, 1, 2, 3, 4]
 * ```
 */
export function generate(size: number, pattern: string, seed?: number): number[] {
	assertValidSize(size);
	const name = parsePatternName(pattern);
	const rng = mulberry32(seed ?? Math.floor(Math.random() * 2 ** 32));

	switch (name) {
		case "random":
			return Array.from({ length: size }, () =>
				Math.floor(rng() * (RANDOM_VALUE_MAX + 1)),
			);
		case "sorted":
			return Array.from({ length: size }, (_, i) => i);
		case "reversed":
			return Array.from({ length: size }, (_, i) => size - i);
		case "nearly_sorted": {
			const seq = Array.from({ length: size }, (_, i) => i);
			const swaps = Math.round(NEARLY_SORTED_SWAP_FRACTION * size);
			for (let k = 0; k < swaps; k++) {
				const i = Math.floor(rng() * size);
				const j = Math.floor(rng() * size);
				[seq[i], seq[j]] = [seq[j], seq[i]];
			}
			return seq;
		}
	}
}
