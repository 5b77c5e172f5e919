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
import { Logger, LogLevel } from "./logger";

describe("Logger", () => {
	it("caches one logger per name", () => {
		expect(Logger.getLogger("cache-test")).toBe(Logger.getLogger("cache-test"));
	});

	it("replaces the cached logger when options are given", () => {
		const first = Logger.getLogger("reconfigure-test");
		const second = Logger.getLogger("reconfigure-test", { level: LogLevel.DEBUG });

		expect(second).not.toBe(first);
		expect(Logger.getLogger("reconfigure-test")).toBe(second);
		expect(second.level).toBe("debug");
	});

	it("changes level at runtime", () => {
		const logger = new Logger("level-test", { silent: true });
		logger.setLevel(LogLevel.ERROR);

		expect(logger.level).toBe("error");
		expect(() => logger.info("dropped", { size: 10 })).not.toThrow();
	});
});
