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

import winston from "winston";

export enum LogLevel {
	ERROR = "error",
	WARN = "warn",
	INFO = "info",
	DEBUG = "debug",
}

export interface LoggerOptions {
	level?: LogLevel;
	/** Emit one JSON object per line instead of the human readable format. */
	json?: boolean;
	silent?: boolean;
}

/**
 * Thin named wrapper around a winston logger.
 *
 * Loggers are cached per name through {@link Logger.getLogger}, so modules can
 * ask for theirs at load time and the CLI can reconfigure the level later.
 */
export class Logger {
	private static readonly registry = new Map<string, Logger>();

	private readonly inner: winston.Logger;

	constructor(
		readonly name: string,
		options: LoggerOptions = {},
	) {
		const level = options.level ?? LogLevel.INFO;
		this.inner = winston.createLogger({
			level,
			silent: options.silent ?? process.env.NODE_ENV === "test",
			format: winston.format.combine(
				winston.format.label({ label: name }),
				winston.format.timestamp(),
				options.json
					? winston.format.json()
					: winston.format.printf(
							({ timestamp, label, level: lvl, message, ...meta }) => {
								const extra = Object.keys(meta).length
									? ` ${JSON.stringify(meta)}`
									: "";
								return `${String(timestamp)} [${String(label)}] ${lvl}: ${String(message)}${extra}`;
							},
						),
			),
			transports: [
				new winston.transports.Console({
					stderrLevels: ["error", "warn", "info", "debug"],
				}),
			],
		});
	}

	static getLogger(name: string, options?: LoggerOptions): Logger {
		const existing = Logger.registry.get(name);
		if (existing && !options) return existing;
		const logger = new Logger(name, options);
		Logger.registry.set(name, logger);
		return logger;
	}

	get level(): string {
		return this.inner.level;
	}

	setLevel(level: LogLevel): void {
		this.inner.level = level;
	}

	error(message: string, meta?: Record<string, unknown>): void {
		this.write(LogLevel.ERROR, message, meta);
	}

	warn(message: string, meta?: Record<string, unknown>): void {
		this.write(LogLevel.WARN, message, meta);
	}

	info(message: string, meta?: Record<string, unknown>): void {
		this.write(LogLevel.INFO, message, meta);
	}

	debug(message: string, meta?: Record<string, unknown>): void {
		this.write(LogLevel.DEBUG, message, meta);
	}

	private write(
		level: LogLevel,
		message: string,
		meta?: Record<string, unknown>,
	): void {
		this.inner.log({ ...meta, level, message });
	}
}
