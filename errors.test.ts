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
import {
	InvalidArgumentError,
	isInvalidArgumentError,
	isSortBenchError,
	SortBenchError,
	toErrorMessage,
} from "./errors";

describe("errors", () => {
	it("tags invalid arguments with a code and details", () => {
		const error = new InvalidArgumentError("bad size", { size: -1 });

		expect(error).toBeInstanceOf(SortBenchError);
		expect(error).toBeInstanceOf(Error);
		expect(error.code).toBe("INVALID_ARGUMENT");
		expect(error.details).toEqual({ size: -1 });
		expect(error.toString()).toBe("InvalidArgumentError [INVALID_ARGUMENT]: bad size");
	});

	it("narrows with the type guards", () => {
		expect(isInvalidArgumentError(new InvalidArgumentError("x"))).toBe(true);
		expect(isSortBenchError(new InvalidArgumentError("x"))).toBe(true);
		expect(isSortBenchError(new Error("x"))).toBe(false);
		expect(isInvalidArgumentError({ code: "INVALID_ARGUMENT" })).toBe(false);
	});

	it("turns thrown values into messages", () => {
		expect(toErrorMessage(new TypeError("nope"))).toBe("TypeError: nope");
		expect(toErrorMessage({ message: "plain object" })).toBe("plain object");
		expect(toErrorMessage(42)).toBe("42");
	});
});
