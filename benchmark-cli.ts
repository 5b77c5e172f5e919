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
 * Benchmark CLI
 *
 * Runs the sorting benchmark and prints the raw result (timing records, growth
 * ratios, skipped and failed trials) as JSON. Rendering tables or charts from
 * that output is left to other tools.
 *
 * @module benchmark-cli
 */

import { writeFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { Command } from "commander";
import dotenv from "dotenv";
import { z } from "zod";
import {
	AlgorithmNameSchema,
	BenchmarkHarness,
	type BenchmarkResult,
	DEFAULT_ALGORITHMS,
} from "./benchmark";
import { type BenchConfig, loadConfig } from "./config";
import { InvalidArgumentError, toErrorMessage } from "./errors";
import { Logger } from "./logger";
import { PATTERN_NAMES, PatternNameSchema } from "./patterns";

export const DEFAULT_SIZES = [1_000, 2_000, 5_000, 10_000, 20_000, 50_000];

const list = z
	.string()
	.transform((value) =>
		value
			.split(",")
			.map((item) => item.trim())
			.filter((item) => item.length > 0),
	);

const CliOptionsSchema = z.object({
	sizes: list.pipe(z.array(z.coerce.number().int().nonnegative()).min(1)),
	patterns: list.pipe(z.array(PatternNameSchema).min(1)),
	algorithms: list.pipe(z.array(AlgorithmNameSchema).min(1)),
	repeats: z.coerce.number().int().positive().optional(),
	seed: z.coerce.number().int().optional(),
	insertionMaxSize: z.coerce.number().int().nonnegative().optional(),
	out: z.string().min(1).optional(),
});

export type CliOptions = z.output<typeof CliOptionsSchema>;

/**
 * Validates raw commander option values.
 * @throws {InvalidArgumentError} listing every offending option
 */
export const parseCliOptions = (raw: Record<string, unknown>): CliOptions => {
	const parsed = CliOptionsSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues.map(
			(issue) => `--${issue.path[0] ?? "?"}: ${issue.message}`,
		);
		throw new InvalidArgumentError(`Invalid options: ${issues.join("; ")}`, {
			issues,
		});
	}
	return parsed.data;
};

export interface CliDependencies {
	config?: BenchConfig;
	/** Where the JSON result goes when `--out` is not given. */
	write?: (text: string) => void;
}

export const createProgram = ({
	config = loadConfig(),
	write = (text) => process.stdout.write(text),
}: CliDependencies = {}): Command => {
	const program = new Command();

	program
		.name("sort-bench")
		.description(
			"Benchmark insertion, merge and hybrid sort across sizes and input patterns",
		)
		.version("1.0.0")
		.option("-s, --sizes <list>", "Comma separated input sizes", DEFAULT_SIZES.join(","))
		.option("-p, --patterns <list>", "Comma separated patterns", PATTERN_NAMES.join(","))
		.option(
			"-a, --algorithms <list>",
			"Comma separated algorithms (insertion_sort, merge_sort, hybrid_sort, native_sort)",
			DEFAULT_ALGORITHMS.join(","),
		)
		.option("-r, --repeats <count>", "Runs per trial, fastest is kept")
		.option("--seed <number>", "Seed for input generation")
		.option("--insertion-max-size <size>", "Skip insertion sort above this size")
		.option("-o, --out <file>", "Write the JSON result to a file instead of stdout")
		.action(async () => {
			const options = parseCliOptions(program.opts());
			const logger = Logger.getLogger("Benchmark", {
				level: config.logLevel,
				json: config.logJson,
			});

			const harness = new BenchmarkHarness({
				repeats: options.repeats ?? config.repeats,
				seed: options.seed ?? config.seed,
				sizeLimits: {
					insertion_sort: options.insertionMaxSize ?? config.insertionMaxSize,
				},
				logger,
			});
			const result: BenchmarkResult = harness.run(options);
			const json = `${JSON.stringify(result, null, 2)}\n`;

			if (options.out) {
				await writeFile(options.out, json, "utf-8");
				logger.info(`Results written to ${options.out}`);
			} else {
				write(json);
			}

			for (const failure of result.failures) {
				logger.error("Trial failed", { ...failure });
			}
			if (result.failures.length > 0) process.exitCode = 1;
		});

	return program;
};

const isEntryPoint =
	process.argv[1] !== undefined &&
	import.meta.url === pathToFileURL(process.argv[1]).href;

if (isEntryPoint) {
	dotenv.config();
	createProgram()
		.parseAsync(process.argv)
		.catch((err: unknown) => {
			Logger.getLogger("Benchmark").error(toErrorMessage(err));
			process.exit(1);
		});
}
