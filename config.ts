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
import { LogLevel } from "./logger";

const ConfigSchema = z.object({
	LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.INFO),
	LOG_FORMAT: z.enum(["simple", "json"]).default("simple"),
	BENCH_SEED: z.coerce.number().int().default(123),
	BENCH_REPEATS: z.coerce.number().int().positive().default(3),
	BENCH_INSERTION_MAX_SIZE: z.coerce.number().int().nonnegative().default(5_000),
});

export interface BenchConfig {
	logLevel: LogLevel;
	logJson: boolean;
	seed: number;
	repeats: number;
	/** Largest input size insertion sort is run on; bigger sizes are skipped. */
	insertionMaxSize: number;
}

/**
 * Reads benchmark settings from the environment, applying defaults for anything unset.
 * Empty strings count as unset so a blank line in `.env` does not fail validation.
 */
export const loadConfig = (
	env: Record<string, string | undefined> = process.env,
): BenchConfig => {
	const raw = Object.fromEntries(
		Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
	);
	const parsed = ConfigSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues.map(
			(issue) => `${issue.path.join(".")}: ${issue.message}`,
		);
		throw new InvalidArgumentError(`Invalid configuration: ${issues.join("; ")}`, {
			issues,
		});
	}

	const data = parsed.data;
	return {
		logLevel: data.LOG_LEVEL,
		logJson: data.LOG_FORMAT === "json",
		seed: data.BENCH_SEED,
		repeats: data.BENCH_REPEATS,
		insertionMaxSize: data.BENCH_INSERTION_MAX_SIZE,
	};
};
