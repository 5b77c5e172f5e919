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
 * @file errors.ts
 * @module Errors
 * @description Error types shared by the generator, the sorts and the benchmark harness.
 * Invalid input is reported synchronously with an {@link InvalidArgumentError}; the
 * harness turns anything thrown inside a single trial into a failure entry.
 */

export type SortBenchErrorCode = "INVALID_ARGUMENT";

export class SortBenchError extends Error {
	readonly code: SortBenchErrorCode;
	readonly details?: Record<string, unknown>;

	constructor(
		code: SortBenchErrorCode,
		message: string,
		details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "SortBenchError";
		this.code = code;
		if (details && typeof details === "object" && !Array.isArray(details)) {
			this.details = details;
		}
	}

	toString() {
		return `${this.name} [${this.code}]: ${this.message}`;
	}
}

/**
 * Raised for a negative size, an unknown pattern or algorithm name, or a
 * comparator that breaks its contract mid-merge.
 */
export class InvalidArgumentError extends SortBenchError {
	constructor(message: string, details?: Record<string, unknown>) {
		super("INVALID_ARGUMENT", message, details);
		this.name = "InvalidArgumentError";
	}
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null;

export const isSortBenchError = (value: unknown): value is SortBenchError =>
	value instanceof SortBenchError;

export const isInvalidArgumentError = (
	value: unknown,
): value is InvalidArgumentError =>
	isSortBenchError(value) && value.code === "INVALID_ARGUMENT";

/**
 * Reduces anything that was thrown to a single line suitable for a failure record.
 */
export const toErrorMessage = (value: unknown): string => {
	if (value instanceof Error) return `${value.name}: ${value.message}`;
	if (isRecord(value) && typeof value.message === "string") {
		return value.message;
	}
	return String(value);
};
